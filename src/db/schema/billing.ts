/**
 * ClinicDesk - Billing Schema
 *
 * Invoices, their line items, and payments received against them.
 * Amounts are stored rounded to cents; see src/domain/billing.ts for the
 * arithmetic that keeps totals consistent.
 */

import { sql } from "drizzle-orm";
import { sqliteTable, integer, text, real, index, uniqueIndex } from "drizzle-orm/sqlite-core";

import { patients } from "./patients.ts";
import { appointments } from "./appointments.ts";
import { treatmentRecords } from "./treatments.ts";
import { users } from "./users.ts";

export const INVOICE_STATUSES = [
  "draft",
  "pending",
  "partial",
  "paid",
  "overdue",
  "cancelled",
  "refunded",
] as const;
export type InvoiceStatus = (typeof INVOICE_STATUSES)[number];

export const PAYMENT_METHODS = [
  "cash",
  "credit_card",
  "debit_card",
  "check",
  "insurance",
  "online",
  "other",
] as const;
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export const invoices = sqliteTable(
  "invoices",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    invoiceNumber: text("invoice_number").notNull(),
    patientId: integer("patient_id").notNull().references(() => patients.id),
    treatmentRecordId: integer("treatment_record_id").references(() => treatmentRecords.id),
    appointmentId: integer("appointment_id").references(() => appointments.id),
    subtotal: real("subtotal").default(0).notNull(),
    taxAmount: real("tax_amount").default(0).notNull(),
    discountAmount: real("discount_amount").default(0).notNull(),
    totalAmount: real("total_amount").default(0).notNull(),
    amountPaid: real("amount_paid").default(0).notNull(),
    balanceDue: real("balance_due").default(0).notNull(),
    invoiceDate: text("invoice_date").notNull(),
    dueDate: text("due_date").notNull(),
    status: text("status", { enum: INVOICE_STATUSES }).default("pending").notNull(),
    paymentTerms: text("payment_terms").default("Net 30"),
    notes: text("notes"),
    createdBy: integer("created_by").references(() => users.id),
    createdAt: text("created_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
    updatedAt: text("updated_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
  },
  (table) => [
    uniqueIndex("invoices_invoice_number_unique").on(table.invoiceNumber),
    index("idx_invoices_patient").on(table.patientId),
    index("idx_invoices_status").on(table.status),
  ],
);

export const invoiceItems = sqliteTable(
  "invoice_items",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    invoiceId: integer("invoice_id").notNull().references(() => invoices.id),
    treatmentRecordId: integer("treatment_record_id").references(() => treatmentRecords.id),
    description: text("description").notNull(),
    quantity: integer("quantity").default(1).notNull(),
    unitPrice: real("unit_price").notNull(),
    totalPrice: real("total_price").notNull(),
    createdAt: text("created_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
  },
  (table) => [index("idx_invoice_items_invoice").on(table.invoiceId)],
);

export const payments = sqliteTable(
  "payments",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    invoiceId: integer("invoice_id").notNull().references(() => invoices.id),
    paymentDate: text("payment_date").notNull(),
    paymentAmount: real("payment_amount").notNull(),
    paymentMethod: text("payment_method", { enum: PAYMENT_METHODS }).notNull(),
    paymentReference: text("payment_reference"),
    notes: text("notes"),
    createdBy: integer("created_by").references(() => users.id),
    createdAt: text("created_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
  },
  (table) => [index("idx_payments_invoice").on(table.invoiceId)],
);

export type Invoice = typeof invoices.$inferSelect;
export type NewInvoice = typeof invoices.$inferInsert;
export type InvoiceItem = typeof invoiceItems.$inferSelect;
export type NewInvoiceItem = typeof invoiceItems.$inferInsert;
export type Payment = typeof payments.$inferSelect;
export type NewPayment = typeof payments.$inferInsert;
