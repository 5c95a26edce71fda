/**
 * ClinicDesk - Application Bootstrap
 *
 * Opens the database, builds the gateway and registers the built-in
 * plugins. Both the HTTP server and the tests start from here.
 */

import clinicAuthPlugin from "../extensions/clinic-auth/index.ts";
import patientsPlugin from "../extensions/patients/index.ts";
import appointmentsPlugin from "../extensions/appointments/index.ts";
import treatmentsPlugin from "../extensions/treatments/index.ts";
import billingPlugin from "../extensions/billing/index.ts";
import dashboardPlugin from "../extensions/dashboard/index.ts";
import usersPlugin from "../extensions/users/index.ts";
import type { ClinicConfig } from "./config/clinic-config.ts";
import { openDb, type ClinicDb } from "./db/connection.ts";
import { Gateway } from "./gateway/gateway.ts";
import type { ClinicPlugin } from "./gateway/types.ts";
import { createLogger, setLogLevel } from "./logger.ts";

export const BUILTIN_PLUGINS: readonly ClinicPlugin[] = [
  clinicAuthPlugin,
  patientsPlugin,
  appointmentsPlugin,
  treatmentsPlugin,
  billingPlugin,
  dashboardPlugin,
  usersPlugin,
];

export type ClinicApp = {
  config: ClinicConfig;
  db: ClinicDb;
  gateway: Gateway;
};

export type ClinicAppOptions = {
  /** Wall clock handed to gateway handlers. */
  clock?: () => Date;
};

export function createClinicApp(config: ClinicConfig, options: ClinicAppOptions = {}): ClinicApp {
  setLogLevel(config.logging.level);
  const log = createLogger("app");

  const db = openDb(config.database.path);
  const gateway = new Gateway({ config, clock: options.clock });
  gateway.registerPlugins([...BUILTIN_PLUGINS]);

  log.info(
    { clinic: config.clinic.name, methods: gateway.listMethods().length },
    "ClinicDesk ready",
  );
  return { config, db, gateway };
}
