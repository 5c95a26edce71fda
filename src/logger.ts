/**
 * ClinicDesk - Application Logger
 *
 * One pino root logger; subsystems take a child tagged with their module name
 * (`clinicdesk:db`, `clinicdesk:billing`, ...). Password and token fields are
 * redacted.
 */

import pino, { type Logger, type LevelWithSilent } from "pino";

export type { Logger };

const REDACT_PATHS = [
  "password",
  "passwordHash",
  "newPassword",
  "currentPassword",
  "token",
  "accessToken",
  "refreshToken",
  "*.password",
  "*.passwordHash",
  "*.refreshToken",
  "req.headers.authorization",
];

function isLevel(value: string | undefined): value is LevelWithSilent {
  return (
    value === "fatal" ||
    value === "error" ||
    value === "warn" ||
    value === "info" ||
    value === "debug" ||
    value === "trace" ||
    value === "silent"
  );
}

const envLevel = process.env.CLINICDESK_LOG_LEVEL;

export const rootLogger: Logger = pino({
  name: "clinicdesk",
  level: isLevel(envLevel) ? envLevel : "info",
  redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
});

// pino children copy the level at creation time, so keep them for setLogLevel.
const children = new Set<Logger>();

export function createLogger(module: string): Logger {
  const child = rootLogger.child({ module: `clinicdesk:${module}` });
  children.add(child);
  return child;
}

/** Apply the configured level once config has been resolved. */
export function setLogLevel(level: LevelWithSilent): void {
  rootLogger.level = level;
  for (const child of children) child.level = level;
}
