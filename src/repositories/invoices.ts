/**
 * ClinicDesk - Invoices
 *
 * An invoice and its line items are written in one transaction: if any item
 * fails, nothing is stored. Header amounts always satisfy
 *
 *   total_amount = subtotal + tax_amount - discount_amount
 *   balance_due  = total_amount - amount_paid
 *
 * and the invoice status is mirrored onto every treatment record it bills.
 */

import { and, asc, desc, eq, inArray, like, lt, notInArray, sql, type SQL } from "drizzle-orm";

import type { ClinicConfig } from "../config/clinic-config.ts";
import { getDb, type DbExecutor } from "../db/connection.ts";
import {
  invoiceItems,
  invoices,
  payments,
  type Invoice,
  type InvoiceItem,
  type InvoiceStatus,
  type Payment,
} from "../db/schema/billing.ts";
import { patients } from "../db/schema/patients.ts";
import { treatmentRecords, treatments, type RecordPaymentStatus } from "../db/schema/treatments.ts";
import {
  MONEY_EPSILON,
  balanceDue,
  computeInvoiceTotals,
  derivePaymentStatus,
  roundMoney,
  type LineItemInput,
} from "../domain/billing.ts";
import { FieldChecker, addDays, fullName, toIsoDate } from "../domain/validators.ts";
import { InvoiceStateError, ValidationError, withDbErrors } from "../errors.ts";
import { createLogger } from "../logger.ts";
import { actorOf, blankToNull, found, nowOf, type WriteContext } from "./context.ts";
import { requireActivePatient } from "./patients.ts";

const log = createLogger("invoices");

export type BillingSettings = ClinicConfig["billing"];

export const DEFAULT_BILLING: BillingSettings = {
  taxRate: 0,
  paymentTermsDays: 30,
  paymentTerms: "Net 30",
  invoicePrefix: "INV",
};

export type InvoiceItemInput = LineItemInput & { treatmentRecordId?: number | null };

export type InvoiceInput = {
  patientId: number;
  items: InvoiceItemInput[];
  treatmentRecordId?: number | null;
  appointmentId?: number | null;
  /** Defaults to today. */
  invoiceDate?: string;
  /** Defaults to the invoice date plus the configured payment terms. */
  dueDate?: string;
  discountAmount?: number;
  notes?: string | null;
  /** Keep the invoice as a draft instead of issuing it. */
  draft?: boolean;
};

export type FromRecordsOptions = Omit<InvoiceInput, "patientId" | "items" | "treatmentRecordId">;

export type InvoiceDetail = {
  invoice: Invoice;
  items: InvoiceItem[];
  payments: Payment[];
  patientName: string;
};

export type InvoiceListEntry = Invoice & { patientFirstName: string; patientLastName: string };

export type InvoiceFilter = {
  patientId?: number;
  status?: InvoiceStatus | InvoiceStatus[];
  from?: string;
  to?: string;
};

const RECORD_STATUS: Record<InvoiceStatus, RecordPaymentStatus> = {
  draft: "pending",
  pending: "pending",
  partial: "partial",
  paid: "paid",
  overdue: "overdue",
  cancelled: "cancelled",
  refunded: "cancelled",
};

/** Statuses of invoices that still bill their treatment records. */
const BILLING_STATUSES: InvoiceStatus[] = ["draft", "pending", "partial", "paid", "overdue"];

// ── Helpers shared with payments.ts ────────────────────────

/** `<prefix>-<YYYYMMDD>-<NNNN>`, numbered per invoice date. */
export function nextInvoiceNumber(db: DbExecutor, prefix: string, invoiceDate: string): string {
  const stem = `${prefix}-${invoiceDate.replaceAll("-", "")}-`;
  const last = db
    .select({ invoiceNumber: invoices.invoiceNumber })
    .from(invoices)
    .where(like(invoices.invoiceNumber, `${stem}%`))
    .orderBy(desc(sql`cast(substr(${invoices.invoiceNumber}, ${stem.length + 1}) as integer)`))
    .limit(1)
    .get();
  const seq = last ? Number.parseInt(last.invoiceNumber.slice(stem.length), 10) + 1 : 1;
  return `${stem}${String(Number.isNaN(seq) ? 1 : seq).padStart(4, "0")}`;
}

/** Treatment records billed by an invoice, through its header or its items. */
export function linkedRecordIds(db: DbExecutor, invoice: Pick<Invoice, "id" | "treatmentRecordId">): number[] {
  const ids = new Set<number>();
  if (invoice.treatmentRecordId !== null) ids.add(invoice.treatmentRecordId);
  const rows = db
    .select({ treatmentRecordId: invoiceItems.treatmentRecordId })
    .from(invoiceItems)
    .where(eq(invoiceItems.invoiceId, invoice.id))
    .all();
  for (const row of rows) {
    if (row.treatmentRecordId !== null) ids.add(row.treatmentRecordId);
  }
  return [...ids];
}

/**
 * Throws when any of `ids` is already billed, through an item or an invoice
 * header, on an invoice that has not been cancelled or refunded.
 */
function assertRecordsUnbilled(db: DbExecutor, ids: number[]): void {
  if (ids.length === 0) return;
  const viaItem = db
    .select({ treatmentRecordId: invoiceItems.treatmentRecordId, invoiceNumber: invoices.invoiceNumber })
    .from(invoiceItems)
    .innerJoin(invoices, eq(invoiceItems.invoiceId, invoices.id))
    .where(and(inArray(invoiceItems.treatmentRecordId, ids), inArray(invoices.status, BILLING_STATUSES)))
    .get();
  const billed =
    viaItem ??
    db
      .select({ treatmentRecordId: invoices.treatmentRecordId, invoiceNumber: invoices.invoiceNumber })
      .from(invoices)
      .where(and(inArray(invoices.treatmentRecordId, ids), inArray(invoices.status, BILLING_STATUSES)))
      .get();
  if (billed) {
    throw new InvoiceStateError(
      `Treatment record ${billed.treatmentRecordId} is already billed on ${billed.invoiceNumber}`,
      "billed",
    );
  }
}

export function syncRecordStatuses(db: DbExecutor, invoice: Pick<Invoice, "id" | "treatmentRecordId" | "status">): void {
  const ids = linkedRecordIds(db, invoice);
  if (ids.length === 0) return;
  db.update(treatmentRecords)
    .set({ paymentStatus: RECORD_STATUS[invoice.status], updatedAt: sql`CURRENT_TIMESTAMP` })
    .where(inArray(treatmentRecords.id, ids))
    .run();
}

/**
 * Recompute amount paid from the invoice's payments, then its balance and
 * status. Draft, cancelled and refunded invoices keep their status.
 */
export function refreshInvoiceBalance(db: DbExecutor, invoiceId: number, today: string): Invoice {
  const invoice = found(db.select().from(invoices).where(eq(invoices.id, invoiceId)).get(), "Invoice", invoiceId);
  const paid = db
    .select({ total: sql<number>`coalesce(sum(${payments.paymentAmount}), 0)` })
    .from(payments)
    .where(eq(payments.invoiceId, invoiceId))
    .get();
  const amountPaid = roundMoney(paid?.total ?? 0);
  const settled = invoice.status === "draft" || invoice.status === "cancelled" || invoice.status === "refunded";
  const status = settled ? invoice.status : derivePaymentStatus(invoice.totalAmount, amountPaid, invoice.dueDate, today);

  const updated = found(
    db
      .update(invoices)
      .set({
        amountPaid,
        balanceDue: balanceDue(invoice.totalAmount, amountPaid),
        status,
        updatedAt: sql`CURRENT_TIMESTAMP`,
      })
      .where(eq(invoices.id, invoiceId))
      .returning()
      .get(),
    "Invoice",
    invoiceId,
  );
  syncRecordStatuses(db, updated);
  return updated;
}

// ── Operations ─────────────────────────────────────────────

function checkDates(invoiceDate: string | undefined, dueDate: string | undefined): void {
  const checker = new FieldChecker()
    .date("invoiceDate", invoiceDate, "Invoice date")
    .date("dueDate", dueDate, "Due date");
  if (checker.ok && invoiceDate && dueDate) {
    checker.check(dueDate >= invoiceDate, "dueDate", "Due date cannot be before the invoice date");
  }
  if (!checker.ok) throw ValidationError.fromIssues(checker.issues);
}

function assertRecordsBelongTo(db: DbExecutor, patientId: number, ids: number[]): void {
  if (ids.length === 0) return;
  const rows = db
    .select({ id: treatmentRecords.id })
    .from(treatmentRecords)
    .where(and(inArray(treatmentRecords.id, ids), eq(treatmentRecords.patientId, patientId)))
    .all();
  if (rows.length !== new Set(ids).size) {
    throw new ValidationError("Treatment record does not belong to this patient", [
      { field: "treatmentRecordId", message: "Treatment record does not belong to this patient" },
    ]);
  }
}

/**
 * Create an invoice with its items. Totals come from the items, the
 * configured tax rate and the discount. Everything is written in one
 * transaction.
 */
export function createInvoice(
  input: InvoiceInput,
  settings: BillingSettings = DEFAULT_BILLING,
  ctx: WriteContext = {},
): InvoiceDetail {
  const today = toIsoDate(nowOf(ctx));
  const invoiceDate = input.invoiceDate ?? today;
  const dueDate = input.dueDate ?? addDays(invoiceDate, settings.paymentTermsDays);
  checkDates(invoiceDate, dueDate);

  const { items, totals } = computeInvoiceTotals(input.items, {
    taxRate: settings.taxRate,
    discountAmount: input.discountAmount,
  });
  const patient = requireActivePatient(input.patientId);

  const status: InvoiceStatus = input.draft
    ? "draft"
    : derivePaymentStatus(totals.totalAmount, 0, dueDate, today);

  const invoice = withDbErrors(() =>
    getDb().transaction((tx) => {
      const recordIds = new Set<number>();
      if (input.treatmentRecordId != null) recordIds.add(input.treatmentRecordId);
      for (const item of items) {
        if (item.treatmentRecordId != null) recordIds.add(item.treatmentRecordId);
      }
      assertRecordsBelongTo(tx, input.patientId, [...recordIds]);
      assertRecordsUnbilled(tx, [...recordIds]);

      const created = tx
        .insert(invoices)
        .values({
          invoiceNumber: nextInvoiceNumber(tx, settings.invoicePrefix, invoiceDate),
          patientId: input.patientId,
          treatmentRecordId: input.treatmentRecordId ?? null,
          appointmentId: input.appointmentId ?? null,
          ...totals,
          amountPaid: 0,
          balanceDue: totals.totalAmount,
          invoiceDate,
          dueDate,
          status,
          paymentTerms: settings.paymentTerms,
          notes: blankToNull(input.notes),
          createdBy: actorOf(ctx),
        })
        .returning()
        .get();

      for (const item of items) {
        tx.insert(invoiceItems)
          .values({
            invoiceId: created.id,
            treatmentRecordId: item.treatmentRecordId ?? null,
            description: item.description.trim(),
            quantity: item.quantity,
            unitPrice: roundMoney(item.unitPrice),
            totalPrice: item.totalPrice,
          })
          .run();
      }

      syncRecordStatuses(tx, created);
      return created;
    }),
  );

  log.info(
    {
      invoiceId: invoice.id,
      invoiceNumber: invoice.invoiceNumber,
      patientId: invoice.patientId,
      total: invoice.totalAmount,
      items: items.length,
    },
    "Invoice created",
  );
  return getInvoiceDetail(invoice.id, fullName(patient));
}

/**
 * Bill performed treatments: one line per record at its actual cost. Records
 * already on an invoice that has not been cancelled are refused.
 */
export function createInvoiceFromTreatmentRecords(
  patientId: number,
  recordIds: number[],
  options: FromRecordsOptions = {},
  settings: BillingSettings = DEFAULT_BILLING,
  ctx: WriteContext = {},
): InvoiceDetail {
  const ids = [...new Set(recordIds)];
  if (ids.length === 0) {
    throw new ValidationError("Select at least one treatment to bill", [
      { field: "recordIds", message: "Select at least one treatment to bill" },
    ]);
  }

  const db = getDb();
  const records = db
    .select({
      id: treatmentRecords.id,
      treatmentDate: treatmentRecords.treatmentDate,
      actualCost: treatmentRecords.actualCost,
      treatmentName: treatments.name,
    })
    .from(treatmentRecords)
    .innerJoin(treatments, eq(treatmentRecords.treatmentId, treatments.id))
    .where(and(eq(treatmentRecords.patientId, patientId), inArray(treatmentRecords.id, ids)))
    .orderBy(asc(treatmentRecords.treatmentDate), asc(treatmentRecords.id))
    .all();
  if (records.length !== ids.length) {
    throw new ValidationError("Treatment record does not belong to this patient", [
      { field: "recordIds", message: "Treatment record does not belong to this patient" },
    ]);
  }

  const [only] = records;
  return createInvoice(
    {
      ...options,
      patientId,
      treatmentRecordId: records.length === 1 && only ? only.id : null,
      items: records.map((r) => ({
        description: `${r.treatmentName} (${r.treatmentDate})`,
        quantity: 1,
        unitPrice: r.actualCost,
        treatmentRecordId: r.id,
      })),
    },
    settings,
    ctx,
  );
}

function getInvoiceDetail(id: number, patientName?: string): InvoiceDetail {
  const db = getDb();
  const invoice = found(db.select().from(invoices).where(eq(invoices.id, id)).get(), "Invoice", id);
  let name = patientName;
  if (name === undefined) {
    const patient = db
      .select({ firstName: patients.firstName, lastName: patients.lastName })
      .from(patients)
      .where(eq(patients.id, invoice.patientId))
      .get();
    name = patient ? fullName(patient) : "";
  }
  return {
    invoice,
    items: db.select().from(invoiceItems).where(eq(invoiceItems.invoiceId, id)).orderBy(asc(invoiceItems.id)).all(),
    payments: db
      .select()
      .from(payments)
      .where(eq(payments.invoiceId, id))
      .orderBy(asc(payments.paymentDate), asc(payments.id))
      .all(),
    patientName: name,
  };
}

/** An invoice with its items and payments. */
export function getInvoice(id: number): InvoiceDetail {
  return getInvoiceDetail(id);
}

export function listInvoices(filter: InvoiceFilter = {}): InvoiceListEntry[] {
  const filters: SQL[] = [];
  if (filter.patientId !== undefined) filters.push(eq(invoices.patientId, filter.patientId));
  if (filter.status !== undefined) {
    const statuses = Array.isArray(filter.status) ? filter.status : [filter.status];
    filters.push(inArray(invoices.status, statuses));
  }
  if (filter.from) filters.push(sql`${invoices.invoiceDate} >= ${filter.from}`);
  if (filter.to) filters.push(sql`${invoices.invoiceDate} <= ${filter.to}`);

  return getDb()
    .select({
      invoice: invoices,
      patientFirstName: patients.firstName,
      patientLastName: patients.lastName,
    })
    .from(invoices)
    .innerJoin(patients, eq(invoices.patientId, patients.id))
    .where(and(...filters))
    .orderBy(desc(invoices.invoiceDate), desc(invoices.id))
    .all()
    .map((row) => ({ ...row.invoice, patientFirstName: row.patientFirstName, patientLastName: row.patientLastName }));
}

/** Draft → pending (or paid for a zero total, overdue past its due date). */
export function issueInvoice(id: number, ctx: WriteContext = {}): Invoice {
  const today = toIsoDate(nowOf(ctx));
  const invoice = getDb().transaction((tx) => {
    const current = found(tx.select().from(invoices).where(eq(invoices.id, id)).get(), "Invoice", id);
    if (current.status !== "draft") {
      throw new InvoiceStateError(`Only draft invoices can be issued (invoice is ${current.status})`, current.status);
    }
    tx.update(invoices).set({ status: "pending" }).where(eq(invoices.id, id)).run();
    return refreshInvoiceBalance(tx, id, today);
  });
  log.info({ invoiceId: id, status: invoice.status }, "Invoice issued");
  return invoice;
}

/** Cancel an invoice that has taken no payments. */
export function cancelInvoice(id: number, reason?: string | null, ctx: WriteContext = {}): Invoice {
  const invoice = getDb().transaction((tx) => {
    const current = found(tx.select().from(invoices).where(eq(invoices.id, id)).get(), "Invoice", id);
    if (current.status === "cancelled" || current.status === "refunded" || current.status === "paid") {
      throw new InvoiceStateError(`A ${current.status} invoice cannot be cancelled`, current.status);
    }
    if (current.amountPaid > MONEY_EPSILON) {
      throw new InvoiceStateError("An invoice with payments cannot be cancelled", current.status);
    }

    const note = blankToNull(reason);
    const updated = found(
      tx
        .update(invoices)
        .set({
          status: "cancelled",
          notes: note ? [current.notes, `Cancelled: ${note}`].filter(Boolean).join("\n") : undefined,
          updatedAt: sql`CURRENT_TIMESTAMP`,
        })
        .where(eq(invoices.id, id))
        .returning()
        .get(),
      "Invoice",
      id,
    );
    syncRecordStatuses(tx, updated);
    return updated;
  });
  log.info({ invoiceId: id, actorId: actorOf(ctx) }, "Invoice cancelled");
  return invoice;
}

/** Flag open invoices whose due date has passed. Returns how many changed. */
export function markOverdueInvoices(today: string): number {
  const changed = getDb().transaction((tx) => {
    const rows = tx
      .update(invoices)
      .set({ status: "overdue", updatedAt: sql`CURRENT_TIMESTAMP` })
      .where(
        and(
          inArray(invoices.status, ["pending", "partial"]),
          lt(invoices.dueDate, today),
          sql`${invoices.balanceDue} > ${MONEY_EPSILON}`,
        ),
      )
      .returning()
      .all();
    for (const row of rows) syncRecordStatuses(tx, row);
    return rows.length;
  });
  if (changed > 0) log.info({ count: changed, today }, "Invoices marked overdue");
  return changed;
}

/** Sum of the open balances on invoices that still expect payment. */
export function outstandingBalance(): number {
  const row = getDb()
    .select({ total: sql<number>`coalesce(sum(${invoices.balanceDue}), 0)` })
    .from(invoices)
    .where(notInArray(invoices.status, ["draft", "cancelled", "refunded", "paid"]))
    .get();
  return roundMoney(row?.total ?? 0);
}
