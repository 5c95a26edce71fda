/**
 * ClinicDesk - Treatment Schema
 *
 * `treatments` is the procedure catalog with base costs; `treatment_records`
 * are procedures actually performed on a patient.
 */

import { sql } from "drizzle-orm";
import { sqliteTable, integer, text, real, index } from "drizzle-orm/sqlite-core";

import { patients } from "./patients.ts";
import { appointments } from "./appointments.ts";
import { users } from "./users.ts";

export const TREATMENT_CATEGORIES = [
  "preventive",
  "restorative",
  "cosmetic",
  "surgical",
  "emergency",
  "general",
] as const;
export type TreatmentCategory = (typeof TREATMENT_CATEGORIES)[number];

export const RECORD_PAYMENT_STATUSES = ["pending", "partial", "paid", "overdue", "cancelled"] as const;
export type RecordPaymentStatus = (typeof RECORD_PAYMENT_STATUSES)[number];

export const treatments = sqliteTable("treatments", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  name: text("name").notNull(),
  description: text("description"),
  category: text("category", { enum: TREATMENT_CATEGORIES }).default("general").notNull(),
  duration: integer("duration").default(60).notNull(),
  baseCost: real("base_cost").notNull(),
  isActive: integer("is_active", { mode: "boolean" }).default(true).notNull(),
  createdBy: integer("created_by").references(() => users.id),
  createdAt: text("created_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
  updatedAt: text("updated_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
});

export const treatmentRecords = sqliteTable(
  "treatment_records",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    patientId: integer("patient_id").notNull().references(() => patients.id),
    treatmentId: integer("treatment_id").notNull().references(() => treatments.id),
    appointmentId: integer("appointment_id").references(() => appointments.id),
    dentistId: integer("dentist_id").references(() => users.id),
    treatmentDate: text("treatment_date").notNull(),
    treatmentNotes: text("treatment_notes"),
    actualCost: real("actual_cost").notNull(),
    paymentStatus: text("payment_status", { enum: RECORD_PAYMENT_STATUSES }).default("pending").notNull(),
    completedAt: text("completed_at"),
    createdBy: integer("created_by").references(() => users.id),
    createdAt: text("created_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
    updatedAt: text("updated_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
  },
  (table) => [index("idx_treatment_records_patient").on(table.patientId)],
);

export type Treatment = typeof treatments.$inferSelect;
export type NewTreatment = typeof treatments.$inferInsert;
export type TreatmentRecord = typeof treatmentRecords.$inferSelect;
export type NewTreatmentRecord = typeof treatmentRecords.$inferInsert;
