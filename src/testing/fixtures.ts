/**
 * ClinicDesk - Test fixtures
 *
 * Every test file gets a fresh in-memory database and a pinned clock.
 */

import { afterEach, beforeEach } from "vitest";

import { createClinicApp, type ClinicApp } from "../app.ts";
import { clinicConfigSchema, type ClinicConfig } from "../config/clinic-config.ts";
import { closeDb, openDb } from "../db/connection.ts";
import type { UserRole } from "../db/schema/users.ts";
import type { Session } from "../gateway/types.ts";
import type { WriteContext } from "../repositories/context.ts";
import { createPatient, type PatientInput } from "../repositories/patients.ts";
import { createTreatment, type TreatmentInput } from "../repositories/treatments.ts";
import { createUser } from "../repositories/users.ts";

/** Monday 2 March 2026, 09:00 local time. */
export const NOW = new Date(2026, 2, 2, 9, 0, 0);
export const TODAY = "2026-03-02";
export const TOMORROW = "2026-03-03";
export const YESTERDAY = "2026-03-01";

export const at = (actorId: number | null = null): WriteContext & { now: Date } => ({ actorId, now: NOW });

/** Open a fresh `:memory:` database around each test. */
export function useTestDb(): void {
  beforeEach(() => {
    openDb(":memory:");
  });
  afterEach(() => {
    closeDb();
  });
}

/**
 * Build the whole application (database, gateway, built-in plugins) around
 * each test. Returns an accessor for the current instance.
 */
export function useTestApp(config: () => ClinicConfig = () => testConfig()): () => ClinicApp {
  let app: ClinicApp | undefined;
  beforeEach(() => {
    app = createClinicApp(config(), { clock: () => NOW });
  });
  afterEach(() => {
    app = undefined;
    closeDb();
  });
  return () => {
    if (!app) throw new Error("useTestApp() accessor called outside a test");
    return app;
  };
}

export function testConfig(overrides: Partial<ClinicConfig> = {}): ClinicConfig {
  return {
    ...clinicConfigSchema.parse({
      database: { path: ":memory:" },
      security: { jwtSecret: "test-secret" },
      logging: { level: "silent" },
    }),
    ...overrides,
  };
}

export function addUser(username: string, role: UserRole, password = "password1") {
  return createUser({
    username,
    password,
    firstName: username.charAt(0).toUpperCase() + username.slice(1),
    lastName: "Tester",
    email: `${username}@clinic.test`,
    role,
  });
}

export function addPatient(overrides: Partial<PatientInput> = {}) {
  return createPatient({ firstName: "Alice", lastName: "Walker", ...overrides }, at());
}

export function addTreatment(overrides: Partial<TreatmentInput> = {}) {
  return createTreatment(
    { name: "Composite Filling", category: "restorative", duration: 60, baseCost: 150, ...overrides },
    at(),
  );
}

/** A signed-in session for a freshly created user of the given role. */
export async function signIn(username: string, role: UserRole): Promise<Session> {
  const user = await addUser(username, role);
  return { userId: user.id, username: user.username, role: user.role };
}
