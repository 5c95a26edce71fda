/**
 * ClinicDesk - Appointment Schema
 */

import { sql } from "drizzle-orm";
import { sqliteTable, integer, text, index } from "drizzle-orm/sqlite-core";

import { patients } from "./patients.ts";
import { users } from "./users.ts";

export const APPOINTMENT_STATUSES = [
  "scheduled",
  "confirmed",
  "in_progress",
  "completed",
  "cancelled",
  "no_show",
] as const;
export type AppointmentStatus = (typeof APPOINTMENT_STATUSES)[number];

export const APPOINTMENT_TYPES = [
  "checkup",
  "cleaning",
  "filling",
  "extraction",
  "root_canal",
  "crown",
  "consultation",
  "emergency",
  "follow_up",
] as const;
export type AppointmentType = (typeof APPOINTMENT_TYPES)[number];

export const appointments = sqliteTable(
  "appointments",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    patientId: integer("patient_id").notNull().references(() => patients.id),
    dentistId: integer("dentist_id").references(() => users.id),
    appointmentDate: text("appointment_date").notNull(), // YYYY-MM-DD
    appointmentTime: text("appointment_time").notNull(), // HH:MM
    duration: integer("duration").default(60).notNull(), // minutes
    appointmentType: text("appointment_type", { enum: APPOINTMENT_TYPES }).default("checkup").notNull(),
    treatmentPlan: text("treatment_plan"),
    notes: text("notes"),
    status: text("status", { enum: APPOINTMENT_STATUSES }).default("scheduled").notNull(),
    cancelReason: text("cancel_reason"),
    createdBy: integer("created_by").references(() => users.id),
    createdAt: text("created_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
    updatedAt: text("updated_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
  },
  (table) => [
    index("idx_appointments_date").on(table.appointmentDate),
    index("idx_appointments_patient").on(table.patientId),
    index("idx_appointments_dentist").on(table.dentistId, table.appointmentDate),
  ],
);

export type Appointment = typeof appointments.$inferSelect;
export type NewAppointment = typeof appointments.$inferInsert;
