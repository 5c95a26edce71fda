/**
 * ClinicDesk - Database Seed Script
 *
 * Seeds the default staff accounts and the treatment catalog. Safe to run
 * more than once: existing usernames and treatment names are skipped.
 * Run: npm run seed
 */

import { readFileSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { resolveClinicConfig } from "../config/clinic-config.ts";
import { literalUnion } from "../gateway/schemas.ts";
import { createTreatment, listTreatments } from "../repositories/treatments.ts";
import { createUser, getUserByUsername, type CreateUserInput } from "../repositories/users.ts";
import { closeDb, openDb } from "./connection.ts";
import { TREATMENT_CATEGORIES } from "./schema/treatments.ts";

const CatalogEntry = Type.Object({
  name: Type.String({ minLength: 1 }),
  description: Type.Optional(Type.String()),
  category: literalUnion(TREATMENT_CATEGORIES),
  duration: Type.Integer({ minimum: 1, maximum: 480 }),
  baseCost: Type.Number({ minimum: 0 }),
});
const Catalog = Type.Array(CatalogEntry);

// Change these passwords after the first login.
export const DEFAULT_USERS: CreateUserInput[] = [
  { username: "admin", password: "admin123", firstName: "System", lastName: "Administrator", email: "admin@clinic.local", role: "admin" },
  { username: "doctor", password: "doctor123", firstName: "Dana", lastName: "Smith", email: "doctor@clinic.local", role: "doctor" },
  { username: "receptionist", password: "recep123", firstName: "Riley", lastName: "Jones", email: "reception@clinic.local", role: "receptionist" },
];

export function loadTreatmentCatalog(url = new URL("./seed-data/treatments.json", import.meta.url)) {
  const raw: unknown = JSON.parse(readFileSync(url, "utf8"));
  if (!Value.Check(Catalog, raw)) {
    const first = [...Value.Errors(Catalog, raw)][0];
    throw new Error(`[seed] Invalid treatment catalog at ${first?.path ?? "/"}: ${first?.message ?? "unknown"}`);
  }
  return raw;
}

export async function seedDatabase(): Promise<{ users: number; treatments: number }> {
  let userCount = 0;
  for (const user of DEFAULT_USERS) {
    if (getUserByUsername(user.username)) continue;
    await createUser(user);
    userCount++;
  }

  const existing = new Set(listTreatments({ includeInactive: true }).map((t) => t.name.toLowerCase()));
  let treatmentCount = 0;
  for (const entry of loadTreatmentCatalog()) {
    if (existing.has(entry.name.toLowerCase())) continue;
    createTreatment(entry);
    treatmentCount++;
  }
  return { users: userCount, treatments: treatmentCount };
}

async function main() {
  const config = resolveClinicConfig();
  openDb(config.database.path);
  console.log(`[seed] Seeding ${config.database.path}...`);

  const seeded = await seedDatabase();
  console.log(`[seed] Created ${seeded.users} users and ${seeded.treatments} treatments`);
  if (seeded.users > 0) {
    console.log("[seed] WARNING: Change the default passwords (admin/admin123, doctor/doctor123, receptionist/recep123)!");
  }
  closeDb();
}

if (process.argv[1] && pathToFileURL(process.argv[1]).href === import.meta.url) {
  main().catch((err: unknown) => {
    console.error("[seed] Seed failed:", err);
    process.exit(1);
  });
}
