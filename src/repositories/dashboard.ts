/**
 * ClinicDesk - Dashboard and Daily Report
 *
 * Read-only aggregates. The dashboard's statistic cards depend on the role
 * looking at it; the daily report is the admin's end-of-day summary.
 */

import { and, count, eq, inArray, notInArray, sql, type SQL } from "drizzle-orm";
import type { SQLiteTable } from "drizzle-orm/sqlite-core";

import { ROLE_SUBTITLES } from "../auth/rbac.ts";
import { getDb } from "../db/connection.ts";
import { appointments, type AppointmentStatus } from "../db/schema/appointments.ts";
import { invoices, payments, type PaymentMethod } from "../db/schema/billing.ts";
import { patients } from "../db/schema/patients.ts";
import { treatmentRecords, treatments } from "../db/schema/treatments.ts";
import type { UserRole } from "../db/schema/users.ts";
import { roundMoney } from "../domain/billing.ts";
import { fullName } from "../domain/validators.ts";
import { outstandingBalance } from "./invoices.ts";
import { listAppointments, type AppointmentListEntry } from "./appointments.ts";

export type StatKey =
  | "totalPatients"
  | "todaysAppointments"
  | "pendingAppointments"
  | "outstandingInvoices"
  | "patientsSeenToday"
  | "pendingTreatments"
  | "treatmentRecords"
  | "totalTreatments";

export type StatCard = { key: StatKey; label: string; value: number };

export type DashboardAppointment = Pick<
  AppointmentListEntry,
  "id" | "appointmentTime" | "appointmentType" | "status" | "dentistUsername"
> & { patientName: string };

export type Dashboard = {
  role: UserRole;
  subtitle: string;
  today: string;
  stats: StatCard[];
  todaysAppointments: DashboardAppointment[];
};

export type DashboardOptions = {
  today: string;
  /** Narrows clinician statistics to one doctor or dentist. */
  dentistId?: number;
};

export type DailyReport = {
  date: string;
  invoicesIssued: number;
  invoicedTotal: number;
  paymentsReceived: number;
  collectedTotal: number;
  collectedByMethod: Record<PaymentMethod, number>;
  outstandingBalance: number;
  appointmentsByStatus: Record<AppointmentStatus, number>;
};

const LABELS: Record<StatKey, string> = {
  totalPatients: "Total Patients",
  todaysAppointments: "Today's Appointments",
  pendingAppointments: "Pending Appointments",
  outstandingInvoices: "Outstanding Invoices",
  patientsSeenToday: "Patients Seen Today",
  pendingTreatments: "Pending Treatments",
  treatmentRecords: "Treatment Records",
  totalTreatments: "Total Treatments",
};

const CARDS: Record<"front" | "clinician" | "general", StatKey[]> = {
  front: ["totalPatients", "todaysAppointments", "pendingAppointments", "outstandingInvoices"],
  clinician: ["todaysAppointments", "patientsSeenToday", "pendingTreatments", "treatmentRecords"],
  general: ["totalPatients", "todaysAppointments", "pendingAppointments", "totalTreatments"],
};

function cardsFor(role: UserRole): StatKey[] {
  if (role === "receptionist") return CARDS.front;
  if (role === "doctor" || role === "dentist" || role === "hygienist") return CARDS.clinician;
  return CARDS.general;
}

function countWhere(table: SQLiteTable, where: SQL | undefined): number {
  const row = getDb().select({ n: count() }).from(table).where(where).get();
  return row?.n ?? 0;
}

function computeStat(key: StatKey, options: DashboardOptions): number {
  const { today, dentistId } = options;
  const forDentist = dentistId !== undefined ? eq(appointments.dentistId, dentistId) : undefined;
  const todays = and(eq(appointments.appointmentDate, today), forDentist);

  switch (key) {
    case "totalPatients":
      return countWhere(patients, eq(patients.isActive, true));
    case "todaysAppointments":
      return countWhere(appointments, todays);
    case "pendingAppointments":
      return countWhere(appointments, and(todays, eq(appointments.status, "scheduled")));
    case "outstandingInvoices":
      return countWhere(invoices, inArray(invoices.status, ["pending", "partial", "overdue"]));
    case "patientsSeenToday":
      return countWhere(appointments, and(todays, eq(appointments.status, "completed")));
    case "pendingTreatments":
      return countWhere(
        appointments,
        and(todays, inArray(appointments.status, ["scheduled", "confirmed", "in_progress"])),
      );
    case "treatmentRecords":
      return countWhere(
        treatmentRecords,
        dentistId !== undefined ? eq(treatmentRecords.dentistId, dentistId) : undefined,
      );
    case "totalTreatments":
      return countWhere(treatments, eq(treatments.isActive, true));
  }
}

/** Statistic cards and today's schedule for the role's home screen. */
export function getDashboard(role: UserRole, options: DashboardOptions): Dashboard {
  const stats = cardsFor(role).map((key) => ({ key, label: LABELS[key], value: computeStat(key, options) }));

  const todaysAppointments = listAppointments({ date: options.today, dentistId: options.dentistId }).map(
    (a) => ({
      id: a.id,
      appointmentTime: a.appointmentTime,
      appointmentType: a.appointmentType,
      status: a.status,
      dentistUsername: a.dentistUsername,
      patientName: fullName({ firstName: a.patientFirstName, lastName: a.patientLastName }),
    }),
  );

  return { role, subtitle: ROLE_SUBTITLES[role], today: options.today, stats, todaysAppointments };
}

/** Billing and appointment totals for one day. */
export function getDailyReport(date: string): DailyReport {
  const db = getDb();

  const issued = db
    .select({ n: count(), total: sql<number>`coalesce(sum(${invoices.totalAmount}), 0)` })
    .from(invoices)
    .where(and(eq(invoices.invoiceDate, date), notInArray(invoices.status, ["draft", "cancelled"])))
    .get();

  const byMethod = db
    .select({
      method: payments.paymentMethod,
      n: count(),
      total: sql<number>`coalesce(sum(${payments.paymentAmount}), 0)`,
    })
    .from(payments)
    .where(eq(payments.paymentDate, date))
    .groupBy(payments.paymentMethod)
    .all();

  const methodTotals = emptyMethodTotals();
  let paymentsReceived = 0;
  for (const row of byMethod) {
    methodTotals[row.method] = roundMoney(row.total);
    paymentsReceived += row.n;
  }

  const statusRows = db
    .select({ status: appointments.status, n: count() })
    .from(appointments)
    .where(eq(appointments.appointmentDate, date))
    .groupBy(appointments.status)
    .all();
  const appointmentsByStatus = emptyStatusCounts();
  for (const row of statusRows) appointmentsByStatus[row.status] = row.n;

  return {
    date,
    invoicesIssued: issued?.n ?? 0,
    invoicedTotal: roundMoney(issued?.total ?? 0),
    paymentsReceived,
    collectedTotal: roundMoney(byMethod.reduce((sum, row) => sum + row.total, 0)),
    collectedByMethod: methodTotals,
    outstandingBalance: outstandingBalance(),
    appointmentsByStatus,
  };
}

function emptyMethodTotals(): Record<PaymentMethod, number> {
  return { cash: 0, credit_card: 0, debit_card: 0, check: 0, insurance: 0, online: 0, other: 0 };
}

function emptyStatusCounts(): Record<AppointmentStatus, number> {
  return { scheduled: 0, confirmed: 0, in_progress: 0, completed: 0, cancelled: 0, no_show: 0 };
}
