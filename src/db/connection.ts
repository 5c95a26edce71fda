/**
 * ClinicDesk - Database Connection Layer
 *
 * One synchronous better-sqlite3 connection wrapped by Drizzle ORM. The schema
 * in schema.sql is applied when the connection opens, so a fresh file (or
 * ":memory:") is ready to use straight away.
 */

import { readFileSync } from "node:fs";
import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";

import { createLogger } from "../logger.ts";
import * as users from "./schema/users.ts";
import * as patients from "./schema/patients.ts";
import * as appointments from "./schema/appointments.ts";
import * as treatments from "./schema/treatments.ts";
import * as billing from "./schema/billing.ts";
import * as audit from "./schema/audit.ts";

const schema = {
  ...users,
  ...patients,
  ...appointments,
  ...treatments,
  ...billing,
  ...audit,
};

export type ClinicSchema = typeof schema;
export type ClinicDb = BetterSQLite3Database<ClinicSchema>;
/** The handle passed to a `db.transaction` callback. */
export type ClinicTx = Parameters<Parameters<ClinicDb["transaction"]>[0]>[0];
export type DbExecutor = ClinicDb | ClinicTx;

const log = createLogger("db");

const SCHEMA_SQL_URL = new URL("./schema.sql", import.meta.url);

let sqlite: Database.Database | undefined;
let db: ClinicDb | undefined;

export function applySchema(connection: Database.Database): void {
  connection.exec(readFileSync(SCHEMA_SQL_URL, "utf8"));
}

/**
 * Open (or reopen) the clinic database. Any previously open connection is
 * closed first.
 */
export function openDb(path: string): ClinicDb {
  closeDb();
  const connection = new Database(path);
  connection.pragma("foreign_keys = ON");
  if (path !== ":memory:") connection.pragma("journal_mode = WAL");
  applySchema(connection);

  sqlite = connection;
  db = drizzle(connection, { schema });
  log.info({ path }, "Database opened");
  return db;
}

export function getDb(): ClinicDb {
  if (!db) {
    return openDb(process.env.CLINICDESK_DB_PATH ?? "dental_clinic.db");
  }
  return db;
}

export function closeDb(): void {
  if (sqlite) {
    sqlite.close();
    sqlite = undefined;
    db = undefined;
    log.debug("Database closed");
  }
}

export { schema };
