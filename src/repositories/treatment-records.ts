/**
 * ClinicDesk - Treatment Records
 *
 * A record is a catalog treatment performed on a patient. Its payment status
 * follows the invoice that bills it (see invoices.ts).
 */

import { desc, eq } from "drizzle-orm";

import { getDb } from "../db/connection.ts";
import { appointments } from "../db/schema/appointments.ts";
import { users } from "../db/schema/users.ts";
import {
  treatmentRecords,
  treatments,
  type RecordPaymentStatus,
  type TreatmentCategory,
  type TreatmentRecord,
} from "../db/schema/treatments.ts";
import { roundMoney } from "../domain/billing.ts";
import { FieldChecker, toIsoDate } from "../domain/validators.ts";
import { ValidationError, withDbErrors } from "../errors.ts";
import { createLogger } from "../logger.ts";
import { actorOf, blankToNull, found, nowOf, type WriteContext } from "./context.ts";
import { requireActivePatient } from "./patients.ts";
import { getTreatment } from "./treatments.ts";
import { requireActiveClinician } from "./users.ts";

const log = createLogger("treatment-records");

export type TreatmentRecordInput = {
  patientId: number;
  treatmentId: number;
  appointmentId?: number | null;
  dentistId?: number | null;
  /** Defaults to today. */
  treatmentDate?: string;
  treatmentNotes?: string | null;
  /** Defaults to the treatment's base cost. */
  actualCost?: number;
};

export type TreatmentHistoryEntry = {
  id: number;
  treatmentDate: string;
  treatmentId: number;
  treatmentName: string;
  treatmentDescription: string | null;
  category: TreatmentCategory;
  actualCost: number;
  paymentStatus: RecordPaymentStatus;
  treatmentNotes: string | null;
  appointmentId: number | null;
  dentistId: number | null;
  dentistUsername: string | null;
};

export function createTreatmentRecord(input: TreatmentRecordInput, ctx: WriteContext = {}): TreatmentRecord {
  const now = nowOf(ctx);
  const checker = new FieldChecker().date("treatmentDate", input.treatmentDate, "Treatment date");
  if (input.actualCost !== undefined) {
    checker.check(
      Number.isFinite(input.actualCost) && input.actualCost >= 0,
      "actualCost",
      "Actual cost cannot be negative",
    );
  }
  if (!checker.ok) throw ValidationError.fromIssues(checker.issues);

  requireActivePatient(input.patientId);
  const treatment = getTreatment(input.treatmentId);
  if (!treatment.isActive) {
    throw new ValidationError("Treatment is no longer offered", [
      { field: "treatmentId", message: "Treatment is no longer offered" },
    ]);
  }
  if (input.dentistId != null) requireActiveClinician(input.dentistId);

  if (input.appointmentId != null) {
    const appointment = getDb()
      .select({ patientId: appointments.patientId })
      .from(appointments)
      .where(eq(appointments.id, input.appointmentId))
      .get();
    if (found(appointment, "Appointment", input.appointmentId).patientId !== input.patientId) {
      throw new ValidationError("Appointment belongs to a different patient", [
        { field: "appointmentId", message: "Appointment belongs to a different patient" },
      ]);
    }
  }

  const created = withDbErrors(() =>
    getDb()
      .insert(treatmentRecords)
      .values({
        patientId: input.patientId,
        treatmentId: input.treatmentId,
        appointmentId: input.appointmentId ?? null,
        dentistId: input.dentistId ?? null,
        treatmentDate: input.treatmentDate ?? toIsoDate(now),
        treatmentNotes: blankToNull(input.treatmentNotes),
        actualCost: roundMoney(input.actualCost ?? treatment.baseCost),
        completedAt: now.toISOString(),
        createdBy: actorOf(ctx),
      })
      .returning()
      .get(),
  );

  log.info(
    { recordId: created.id, patientId: created.patientId, treatmentId: created.treatmentId },
    "Treatment recorded",
  );
  return created;
}

export function getTreatmentRecord(id: number): TreatmentRecord {
  const row = getDb().select().from(treatmentRecords).where(eq(treatmentRecords.id, id)).get();
  return found(row, "Treatment record", id);
}

/** A patient's treatments, newest first. */
export function getPatientTreatmentHistory(patientId: number): TreatmentHistoryEntry[] {
  return getDb()
    .select({
      id: treatmentRecords.id,
      treatmentDate: treatmentRecords.treatmentDate,
      treatmentId: treatmentRecords.treatmentId,
      treatmentName: treatments.name,
      treatmentDescription: treatments.description,
      category: treatments.category,
      actualCost: treatmentRecords.actualCost,
      paymentStatus: treatmentRecords.paymentStatus,
      treatmentNotes: treatmentRecords.treatmentNotes,
      appointmentId: treatmentRecords.appointmentId,
      dentistId: treatmentRecords.dentistId,
      dentistUsername: users.username,
    })
    .from(treatmentRecords)
    .innerJoin(treatments, eq(treatmentRecords.treatmentId, treatments.id))
    .leftJoin(users, eq(treatmentRecords.dentistId, users.id))
    .where(eq(treatmentRecords.patientId, patientId))
    .orderBy(desc(treatmentRecords.treatmentDate), desc(treatmentRecords.id))
    .all();
}
