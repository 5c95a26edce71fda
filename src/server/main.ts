/**
 * ClinicDesk - HTTP server entry point
 *
 * Run: npm start (reads CLINICDESK_CONFIG and CLINICDESK_* variables)
 */

import { createClinicApp } from "../app.ts";
import { createTokenService } from "../auth/jwt.ts";
import { resolveClinicConfig } from "../config/clinic-config.ts";
import { closeDb } from "../db/connection.ts";
import { createLogger } from "../logger.ts";
import { createHttpApp } from "./app.ts";

const log = createLogger("server");

function main(): void {
  const config = resolveClinicConfig(process.env, (message, issues) => log.warn({ issues }, message));
  const { jwtSecret } = config.security;
  if (!jwtSecret) {
    throw new Error("[clinicdesk:server] security.jwtSecret (CLINICDESK_JWT_SECRET) is required for the HTTP API");
  }

  const { gateway } = createClinicApp(config);
  const tokens = createTokenService({
    secret: jwtSecret,
    accessTokenTtlSeconds: config.security.accessTokenTtlSeconds,
    refreshTokenTtlSeconds: config.security.refreshTokenTtlSeconds,
  });

  const { host, port } = config.server;
  const server = createHttpApp({ gateway, tokens }).listen(port, host, () => {
    log.info({ host, port }, "ClinicDesk API listening");
  });

  const shutdown = (signal: string) => {
    log.info({ signal }, "Shutting down");
    server.close(() => {
      closeDb();
      process.exit(0);
    });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

try {
  main();
} catch (err) {
  log.fatal({ err }, "ClinicDesk failed to start");
  process.exit(1);
}
