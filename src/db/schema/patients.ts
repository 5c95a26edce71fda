/**
 * ClinicDesk - Patient Schema
 *
 * Demographics, contacts, insurance and free-text medical history.
 * Patients are never deleted; `is_active = 0` hides them from lists.
 */

import { sql } from "drizzle-orm";
import { sqliteTable, integer, text, index } from "drizzle-orm/sqlite-core";

import { users } from "./users.ts";

export const GENDERS = ["male", "female", "other", "prefer_not_to_say"] as const;
export type Gender = (typeof GENDERS)[number];

export const patients = sqliteTable(
  "patients",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    firstName: text("first_name").notNull(),
    lastName: text("last_name").notNull(),
    dateOfBirth: text("date_of_birth"), // YYYY-MM-DD
    gender: text("gender", { enum: GENDERS }),
    phone: text("phone"),
    email: text("email"),
    address: text("address"),
    city: text("city"),
    state: text("state"),
    postalCode: text("postal_code"),
    emergencyContactName: text("emergency_contact_name"),
    emergencyContactPhone: text("emergency_contact_phone"),
    emergencyContactRelationship: text("emergency_contact_relationship"),
    medicalHistory: text("medical_history"),
    allergies: text("allergies"),
    insuranceProvider: text("insurance_provider"),
    insuranceNumber: text("insurance_number"),
    insuranceGroupNumber: text("insurance_group_number"),
    isActive: integer("is_active", { mode: "boolean" }).default(true).notNull(),
    createdBy: integer("created_by").references(() => users.id),
    createdAt: text("created_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
    updatedAt: text("updated_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
  },
  (table) => [index("idx_patients_name").on(table.lastName, table.firstName)],
);

export type Patient = typeof patients.$inferSelect;
export type NewPatient = typeof patients.$inferInsert;
