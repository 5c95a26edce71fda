/**
 * ClinicDesk - Appointment Book
 *
 * Bookings for a patient with an optional dentist. Status changes go through
 * the lifecycle in domain/appointment-status.ts. Overlapping bookings for the
 * same dentist are allowed; `findConflicts` reports them so the front desk
 * can decide.
 */

import { and, asc, eq, inArray, ne, notInArray, sql, type SQL } from "drizzle-orm";

import { getDb } from "../db/connection.ts";
import {
  appointments,
  type Appointment,
  type AppointmentStatus,
  type AppointmentType,
} from "../db/schema/appointments.ts";
import { patients } from "../db/schema/patients.ts";
import { users } from "../db/schema/users.ts";
import { assertTransition, isEditable } from "../domain/appointment-status.ts";
import { FieldChecker, appointmentEndTime, timeToMinutes, toIsoDate, toIsoTime } from "../domain/validators.ts";
import { InvalidTransitionError, ValidationError, withDbErrors } from "../errors.ts";
import { createLogger } from "../logger.ts";
import { actorOf, blankToNull, found, nowOf, type WriteContext } from "./context.ts";
import { requireActivePatient } from "./patients.ts";
import { requireActiveClinician } from "./users.ts";

const log = createLogger("appointments");

export const MAX_APPOINTMENT_MINUTES = 480;

export type AppointmentInput = {
  patientId: number;
  dentistId?: number | null;
  appointmentDate: string;
  appointmentTime: string;
  duration?: number;
  appointmentType?: AppointmentType;
  treatmentPlan?: string | null;
  notes?: string | null;
};

export type AppointmentUpdate = Partial<Omit<AppointmentInput, "patientId">>;

export type AppointmentFilter = {
  date?: string;
  from?: string;
  to?: string;
  patientId?: number;
  dentistId?: number;
  status?: AppointmentStatus | AppointmentStatus[];
};

export type AppointmentListEntry = Appointment & {
  patientFirstName: string;
  patientLastName: string;
  dentistUsername: string | null;
  endTime: string;
};

export type AppointmentSlot = {
  dentistId: number;
  appointmentDate: string;
  appointmentTime: string;
  duration: number;
  excludeId?: number;
};

/** Statuses that no longer occupy the chair. */
const RELEASED: AppointmentStatus[] = ["cancelled", "no_show"];

function checkSchedule(
  fields: { appointmentDate?: string; appointmentTime?: string; duration?: number },
  now: Date,
): void {
  const checker = new FieldChecker()
    .date("appointmentDate", fields.appointmentDate, "Appointment date")
    .time("appointmentTime", fields.appointmentTime, "Appointment time");

  if (fields.duration !== undefined) {
    checker.check(
      Number.isInteger(fields.duration) && fields.duration >= 1 && fields.duration <= MAX_APPOINTMENT_MINUTES,
      "duration",
      `Duration must be between 1 and ${MAX_APPOINTMENT_MINUTES} minutes`,
    );
  }

  const today = toIsoDate(now);
  if (checker.ok && fields.appointmentDate !== undefined) {
    checker.check(fields.appointmentDate >= today, "appointmentDate", "Appointment date cannot be in the past");
    if (fields.appointmentDate === today && fields.appointmentTime !== undefined) {
      checker.check(
        fields.appointmentTime >= toIsoTime(now),
        "appointmentTime",
        "Appointment time cannot be in the past",
      );
    }
  }
  if (!checker.ok) throw ValidationError.fromIssues(checker.issues);
}

export function createAppointment(input: AppointmentInput, ctx: WriteContext = {}): Appointment {
  const checker = new FieldChecker()
    .required("appointmentDate", input.appointmentDate, "Appointment date")
    .required("appointmentTime", input.appointmentTime, "Appointment time");
  if (!checker.ok) throw ValidationError.fromIssues(checker.issues);
  checkSchedule(input, nowOf(ctx));

  requireActivePatient(input.patientId);
  if (input.dentistId != null) requireActiveClinician(input.dentistId);

  const created = withDbErrors(() =>
    getDb()
      .insert(appointments)
      .values({
        patientId: input.patientId,
        dentistId: input.dentistId ?? null,
        appointmentDate: input.appointmentDate,
        appointmentTime: input.appointmentTime,
        duration: input.duration,
        appointmentType: input.appointmentType,
        treatmentPlan: blankToNull(input.treatmentPlan),
        notes: blankToNull(input.notes),
        createdBy: actorOf(ctx),
      })
      .returning()
      .get(),
  );

  log.info(
    {
      appointmentId: created.id,
      patientId: created.patientId,
      date: created.appointmentDate,
      time: created.appointmentTime,
    },
    "Appointment scheduled",
  );
  return created;
}

export function getAppointment(id: number): Appointment {
  const row = getDb().select().from(appointments).where(eq(appointments.id, id)).get();
  return found(row, "Appointment", id);
}

/** Appointments with patient name and dentist username, by date then time. */
export function listAppointments(filter: AppointmentFilter = {}): AppointmentListEntry[] {
  const filters: SQL[] = [];
  if (filter.date) filters.push(eq(appointments.appointmentDate, filter.date));
  if (filter.from) filters.push(sql`${appointments.appointmentDate} >= ${filter.from}`);
  if (filter.to) filters.push(sql`${appointments.appointmentDate} <= ${filter.to}`);
  if (filter.patientId !== undefined) filters.push(eq(appointments.patientId, filter.patientId));
  if (filter.dentistId !== undefined) filters.push(eq(appointments.dentistId, filter.dentistId));
  if (filter.status !== undefined) {
    const statuses = Array.isArray(filter.status) ? filter.status : [filter.status];
    filters.push(inArray(appointments.status, statuses));
  }

  const rows = getDb()
    .select({
      appointment: appointments,
      patientFirstName: patients.firstName,
      patientLastName: patients.lastName,
      dentistUsername: users.username,
    })
    .from(appointments)
    .innerJoin(patients, eq(appointments.patientId, patients.id))
    .leftJoin(users, eq(appointments.dentistId, users.id))
    .where(and(...filters))
    .orderBy(asc(appointments.appointmentDate), asc(appointments.appointmentTime), asc(appointments.id))
    .all();

  return rows.map((row) => ({
    ...row.appointment,
    patientFirstName: row.patientFirstName,
    patientLastName: row.patientLastName,
    dentistUsername: row.dentistUsername,
    endTime: appointmentEndTime(row.appointment.appointmentTime, row.appointment.duration),
  }));
}

/** Reschedule or edit an appointment that is still scheduled or confirmed. */
export function updateAppointment(id: number, input: AppointmentUpdate, ctx: WriteContext = {}): Appointment {
  const current = getAppointment(id);
  if (!isEditable(current.status)) {
    throw new ValidationError(`A ${current.status} appointment can no longer be changed`, [
      { field: "status", message: `A ${current.status} appointment can no longer be changed` },
    ]);
  }

  const rescheduling = input.appointmentDate !== undefined || input.appointmentTime !== undefined;
  checkSchedule(
    {
      appointmentDate: rescheduling ? (input.appointmentDate ?? current.appointmentDate) : undefined,
      appointmentTime: rescheduling ? (input.appointmentTime ?? current.appointmentTime) : undefined,
      duration: input.duration,
    },
    nowOf(ctx),
  );
  if (input.dentistId != null) requireActiveClinician(input.dentistId);

  const row = withDbErrors(() =>
    getDb()
      .update(appointments)
      .set({
        dentistId: input.dentistId,
        appointmentDate: input.appointmentDate,
        appointmentTime: input.appointmentTime,
        duration: input.duration,
        appointmentType: input.appointmentType,
        treatmentPlan: blankToNull(input.treatmentPlan),
        notes: blankToNull(input.notes),
        updatedAt: sql`CURRENT_TIMESTAMP`,
      })
      .where(eq(appointments.id, id))
      .returning()
      .get(),
  );
  return found(row, "Appointment", id);
}

/**
 * Move an appointment along its lifecycle. A cancellation may carry a reason.
 * Throws InvalidTransitionError for moves the lifecycle does not allow.
 */
export function updateAppointmentStatus(
  id: number,
  status: AppointmentStatus,
  options: { cancelReason?: string | null } = {},
  ctx: WriteContext = {},
): Appointment {
  const current = getAppointment(id);
  assertTransition(current.status, status);

  // Applies only while the status is still the one read above.
  const row = getDb()
    .update(appointments)
    .set({
      status,
      cancelReason: status === "cancelled" ? blankToNull(options.cancelReason) : undefined,
      updatedAt: sql`CURRENT_TIMESTAMP`,
    })
    .where(and(eq(appointments.id, id), eq(appointments.status, current.status)))
    .returning()
    .get();
  if (!row) throw new InvalidTransitionError(current.status, status);

  log.info({ appointmentId: id, from: current.status, to: status, actorId: actorOf(ctx) }, "Appointment status changed");
  return row;
}

/**
 * Active appointments of the same dentist on the same day whose time range
 * overlaps the given slot.
 */
export function findConflicts(slot: AppointmentSlot): Appointment[] {
  const filters: SQL[] = [
    eq(appointments.dentistId, slot.dentistId),
    eq(appointments.appointmentDate, slot.appointmentDate),
    notInArray(appointments.status, RELEASED),
  ];
  if (slot.excludeId !== undefined) filters.push(ne(appointments.id, slot.excludeId));

  const start = timeToMinutes(slot.appointmentTime);
  const end = start + slot.duration;

  return getDb()
    .select()
    .from(appointments)
    .where(and(...filters))
    .orderBy(asc(appointments.appointmentTime))
    .all()
    .filter((other) => {
      const otherStart = timeToMinutes(other.appointmentTime);
      return otherStart < end && start < otherStart + other.duration;
    });
}
