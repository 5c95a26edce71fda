/**
 * ClinicDesk - Patient Registry
 *
 * Patients are soft-deleted: deactivating one hides it from lists and
 * pickers but keeps its appointments, treatment records and invoices.
 */

import { and, asc, eq, like, or, sql, type SQL } from "drizzle-orm";

import { getDb } from "../db/connection.ts";
import { patients, type Gender, type Patient } from "../db/schema/patients.ts";
import { FieldChecker, toIsoDate } from "../domain/validators.ts";
import { ValidationError, withDbErrors } from "../errors.ts";
import { createLogger } from "../logger.ts";
import { actorOf, blankToNull, found, nowOf, type WriteContext } from "./context.ts";

const log = createLogger("patients");

export type PatientInput = {
  firstName: string;
  lastName: string;
  dateOfBirth?: string | null;
  gender?: Gender | null;
  phone?: string | null;
  email?: string | null;
  address?: string | null;
  city?: string | null;
  state?: string | null;
  postalCode?: string | null;
  emergencyContactName?: string | null;
  emergencyContactPhone?: string | null;
  emergencyContactRelationship?: string | null;
  medicalHistory?: string | null;
  allergies?: string | null;
  insuranceProvider?: string | null;
  insuranceNumber?: string | null;
  insuranceGroupNumber?: string | null;
};

export type PatientUpdate = Partial<PatientInput>;

export type PatientQuery = {
  search?: string;
  includeInactive?: boolean;
  limit?: number;
};

function checkPatient(input: PatientUpdate, creating: boolean, today: string): void {
  const checker = new FieldChecker();
  if (creating || input.firstName !== undefined) checker.required("firstName", input.firstName, "First name");
  if (creating || input.lastName !== undefined) checker.required("lastName", input.lastName, "Last name");
  checker
    .email("email", input.email)
    .phone("phone", input.phone)
    .phone("emergencyContactPhone", input.emergencyContactPhone)
    .date("dateOfBirth", input.dateOfBirth, "Date of birth");
  if (input.dateOfBirth && checker.ok) {
    checker.check(input.dateOfBirth <= today, "dateOfBirth", "Date of birth cannot be in the future");
  }
  if (!checker.ok) throw ValidationError.fromIssues(checker.issues);
}

function columns(input: PatientUpdate) {
  const email = blankToNull(input.email);
  return {
    firstName: input.firstName?.trim(),
    lastName: input.lastName?.trim(),
    dateOfBirth: blankToNull(input.dateOfBirth),
    gender: input.gender,
    phone: blankToNull(input.phone),
    email: typeof email === "string" ? email.toLowerCase() : email,
    address: blankToNull(input.address),
    city: blankToNull(input.city),
    state: blankToNull(input.state),
    postalCode: blankToNull(input.postalCode),
    emergencyContactName: blankToNull(input.emergencyContactName),
    emergencyContactPhone: blankToNull(input.emergencyContactPhone),
    emergencyContactRelationship: blankToNull(input.emergencyContactRelationship),
    medicalHistory: blankToNull(input.medicalHistory),
    allergies: blankToNull(input.allergies),
    insuranceProvider: blankToNull(input.insuranceProvider),
    insuranceNumber: blankToNull(input.insuranceNumber),
    insuranceGroupNumber: blankToNull(input.insuranceGroupNumber),
  };
}

export function createPatient(input: PatientInput, ctx: WriteContext = {}): Patient {
  checkPatient(input, true, toIsoDate(nowOf(ctx)));

  const created = withDbErrors(() =>
    getDb()
      .insert(patients)
      .values({
        ...columns(input),
        firstName: input.firstName.trim(),
        lastName: input.lastName.trim(),
        createdBy: actorOf(ctx),
      })
      .returning()
      .get(),
  );

  log.info({ patientId: created.id, actorId: actorOf(ctx) }, "Patient registered");
  return created;
}

export function getPatient(id: number): Patient {
  const row = getDb().select().from(patients).where(eq(patients.id, id)).get();
  return found(row, "Patient", id);
}

/**
 * Active patients ordered by last then first name. `search` matches any part
 * of the first name, last name, phone or email.
 */
export function listPatients(query: PatientQuery = {}): Patient[] {
  const filters: (SQL | undefined)[] = [];
  if (!query.includeInactive) filters.push(eq(patients.isActive, true));

  const search = query.search?.trim();
  if (search) {
    const pattern = `%${search}%`;
    filters.push(
      or(
        like(patients.firstName, pattern),
        like(patients.lastName, pattern),
        like(patients.phone, pattern),
        like(patients.email, pattern),
      ),
    );
  }

  const base = getDb()
    .select()
    .from(patients)
    .where(and(...filters))
    .orderBy(asc(patients.lastName), asc(patients.firstName));

  return query.limit !== undefined ? base.limit(query.limit).all() : base.all();
}

export function updatePatient(id: number, input: PatientUpdate, ctx: WriteContext = {}): Patient {
  checkPatient(input, false, toIsoDate(nowOf(ctx)));

  const row = withDbErrors(() =>
    getDb()
      .update(patients)
      .set({ ...columns(input), updatedAt: sql`CURRENT_TIMESTAMP` })
      .where(eq(patients.id, id))
      .returning()
      .get(),
  );
  return found(row, "Patient", id);
}

function setActive(id: number, isActive: boolean): Patient {
  const row = getDb()
    .update(patients)
    .set({ isActive, updatedAt: sql`CURRENT_TIMESTAMP` })
    .where(eq(patients.id, id))
    .returning()
    .get();
  return found(row, "Patient", id);
}

export function deactivatePatient(id: number, ctx: WriteContext = {}): Patient {
  const patient = setActive(id, false);
  log.info({ patientId: id, actorId: actorOf(ctx) }, "Patient deactivated");
  return patient;
}

export function reactivatePatient(id: number): Patient {
  return setActive(id, true);
}

/** Throws unless the patient exists and is active. */
export function requireActivePatient(id: number): Patient {
  const patient = getPatient(id);
  if (!patient.isActive) {
    throw new ValidationError("Patient is inactive", [{ field: "patientId", message: "Patient is inactive" }]);
  }
  return patient;
}
