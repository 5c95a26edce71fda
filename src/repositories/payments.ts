/**
 * ClinicDesk - Payments
 *
 * A payment is written together with the invoice update it causes. The
 * invoice's amount paid is always re-summed from its payments rather than
 * incremented.
 */

import { asc, desc, eq } from "drizzle-orm";

import { getDb } from "../db/connection.ts";
import { invoices, payments, type Invoice, type Payment, type PaymentMethod } from "../db/schema/billing.ts";
import { PAYABLE_STATUSES, checkPaymentAmount } from "../domain/billing.ts";
import { FieldChecker, toIsoDate } from "../domain/validators.ts";
import { InvoiceStateError, ValidationError, withDbErrors } from "../errors.ts";
import { createLogger } from "../logger.ts";
import { actorOf, blankToNull, found, nowOf, type WriteContext } from "./context.ts";
import { refreshInvoiceBalance } from "./invoices.ts";

const log = createLogger("payments");

export type PaymentInput = {
  invoiceId: number;
  paymentAmount: number;
  paymentMethod: PaymentMethod;
  /** Defaults to today. */
  paymentDate?: string;
  paymentReference?: string | null;
  notes?: string | null;
};

export type PaymentResult = { payment: Payment; invoice: Invoice };

/**
 * Record a payment against an open invoice. A payment above the balance due
 * throws OverpaymentError and writes nothing.
 */
export function recordPayment(input: PaymentInput, ctx: WriteContext = {}): PaymentResult {
  const today = toIsoDate(nowOf(ctx));
  const checker = new FieldChecker().date("paymentDate", input.paymentDate, "Payment date");
  if (input.paymentDate && checker.ok) {
    checker.check(input.paymentDate <= today, "paymentDate", "Payment date cannot be in the future");
  }
  if (!checker.ok) throw ValidationError.fromIssues(checker.issues);

  const result = withDbErrors(() =>
    getDb().transaction((tx) => {
      const invoice = found(
        tx.select().from(invoices).where(eq(invoices.id, input.invoiceId)).get(),
        "Invoice",
        input.invoiceId,
      );
      if (!PAYABLE_STATUSES.includes(invoice.status)) {
        throw new InvoiceStateError(`Payments cannot be taken on a ${invoice.status} invoice`, invoice.status);
      }
      const amount = checkPaymentAmount(input.paymentAmount, invoice.balanceDue);

      const payment = tx
        .insert(payments)
        .values({
          invoiceId: invoice.id,
          paymentDate: input.paymentDate ?? today,
          paymentAmount: amount,
          paymentMethod: input.paymentMethod,
          paymentReference: blankToNull(input.paymentReference),
          notes: blankToNull(input.notes),
          createdBy: actorOf(ctx),
        })
        .returning()
        .get();

      return { payment, invoice: refreshInvoiceBalance(tx, invoice.id, today) };
    }),
  );

  log.info(
    {
      paymentId: result.payment.id,
      invoiceId: result.invoice.id,
      amount: result.payment.paymentAmount,
      method: result.payment.paymentMethod,
      status: result.invoice.status,
    },
    "Payment recorded",
  );
  return result;
}

/** Payments of one invoice in the order taken, or all payments newest first. */
export function listPayments(invoiceId?: number): Payment[] {
  const db = getDb();
  if (invoiceId !== undefined) {
    return db
      .select()
      .from(payments)
      .where(eq(payments.invoiceId, invoiceId))
      .orderBy(asc(payments.paymentDate), asc(payments.id))
      .all();
  }
  return db.select().from(payments).orderBy(desc(payments.paymentDate), desc(payments.id)).all();
}
