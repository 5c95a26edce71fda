/**
 * ClinicDesk - Invoice and Payment Arithmetic
 *
 *   item total   = round(quantity × unit price)
 *   subtotal     = Σ item totals
 *   tax          = round(subtotal × tax rate)
 *   total        = subtotal + tax − discount
 *   balance due  = total − amount paid
 *
 * All amounts are rounded to cents. Overpayment is rejected rather than
 * capped: a payment may not exceed the balance due.
 */

import { OverpaymentError, ValidationError, type FieldIssue } from "../errors.ts";
import type { InvoiceStatus } from "../db/schema/billing.ts";

/** Amounts closer than half a cent are treated as equal. */
export const MONEY_EPSILON = 0.005;

export function roundMoney(amount: number): number {
  return Math.round((amount + Number.EPSILON) * 100) / 100;
}

export type LineItemInput = {
  description: string;
  quantity: number;
  unitPrice: number;
};

export type PricedLineItem<T extends LineItemInput = LineItemInput> = T & { totalPrice: number };

export type InvoiceTotals = {
  subtotal: number;
  taxAmount: number;
  discountAmount: number;
  totalAmount: number;
};

export type TotalsOptions = {
  taxRate?: number;
  discountAmount?: number;
};

export function lineItemTotal(quantity: number, unitPrice: number): number {
  return roundMoney(quantity * unitPrice);
}

function checkItems(items: LineItemInput[]): FieldIssue[] {
  const issues: FieldIssue[] = [];
  if (items.length === 0) {
    issues.push({ field: "items", message: "An invoice needs at least one item" });
  }
  items.forEach((item, i) => {
    if (item.description.trim() === "") {
      issues.push({ field: `items.${i}.description`, message: "Item description is required" });
    }
    if (!Number.isInteger(item.quantity) || item.quantity <= 0) {
      issues.push({ field: `items.${i}.quantity`, message: "Quantity must be a whole number greater than 0" });
    }
    if (!Number.isFinite(item.unitPrice) || item.unitPrice < 0) {
      issues.push({ field: `items.${i}.unitPrice`, message: "Unit price cannot be negative" });
    }
  });
  return issues;
}

/**
 * Price each line item and compute the invoice header totals.
 * Throws ValidationError on bad items, a tax rate outside [0, 1], or a
 * discount larger than subtotal plus tax.
 */
export function computeInvoiceTotals<T extends LineItemInput>(
  items: T[],
  options: TotalsOptions = {},
): { items: PricedLineItem<T>[]; totals: InvoiceTotals } {
  const taxRate = options.taxRate ?? 0;
  const discountAmount = roundMoney(options.discountAmount ?? 0);

  const issues = checkItems(items);
  if (!Number.isFinite(taxRate) || taxRate < 0 || taxRate > 1) {
    issues.push({ field: "taxRate", message: "Tax rate must be between 0 and 1" });
  }
  if (!Number.isFinite(discountAmount) || discountAmount < 0) {
    issues.push({ field: "discountAmount", message: "Discount cannot be negative" });
  }
  if (issues.length > 0) throw ValidationError.fromIssues(issues);

  const priced = items.map((item) => ({
    ...item,
    totalPrice: lineItemTotal(item.quantity, item.unitPrice),
  }));
  const subtotal = roundMoney(priced.reduce((sum, item) => sum + item.totalPrice, 0));
  const taxAmount = roundMoney(subtotal * taxRate);

  if (discountAmount > subtotal + taxAmount + MONEY_EPSILON) {
    throw new ValidationError("Discount cannot exceed the invoice amount", [
      { field: "discountAmount", message: "Discount cannot exceed the invoice amount" },
    ]);
  }

  return {
    items: priced,
    totals: {
      subtotal,
      taxAmount,
      discountAmount,
      totalAmount: roundMoney(subtotal + taxAmount - discountAmount),
    },
  };
}

export function balanceDue(totalAmount: number, amountPaid: number): number {
  return Math.max(0, roundMoney(totalAmount - amountPaid));
}

/** The statuses a payment can move an invoice between. */
export type PaymentDerivedStatus = Extract<InvoiceStatus, "pending" | "partial" | "paid" | "overdue">;

/**
 * Status of an open invoice from what has been paid and the due date.
 * `today` and `dueDate` are YYYY-MM-DD, so string comparison orders them.
 */
export function derivePaymentStatus(
  totalAmount: number,
  amountPaid: number,
  dueDate: string,
  today: string,
): PaymentDerivedStatus {
  if (amountPaid >= totalAmount - MONEY_EPSILON) return "paid";
  if (dueDate < today) return "overdue";
  if (amountPaid > MONEY_EPSILON) return "partial";
  return "pending";
}

export function isOverdue(
  invoice: { status: InvoiceStatus; dueDate: string; balanceDue: number },
  today: string,
): boolean {
  const open = invoice.status === "pending" || invoice.status === "partial" || invoice.status === "overdue";
  return open && invoice.balanceDue > MONEY_EPSILON && invoice.dueDate < today;
}

/** Statuses that accept payments. */
export const PAYABLE_STATUSES: readonly InvoiceStatus[] = ["pending", "partial", "overdue"];

/**
 * Validate a payment amount against the balance due.
 * Returns the amount rounded to cents.
 */
export function checkPaymentAmount(amount: number, currentBalance: number): number {
  const rounded = roundMoney(amount);
  if (!Number.isFinite(rounded) || rounded <= 0) {
    throw new ValidationError("Payment amount must be greater than 0", [
      { field: "paymentAmount", message: "Payment amount must be greater than 0" },
    ]);
  }
  if (rounded > currentBalance + MONEY_EPSILON) {
    throw new OverpaymentError(rounded, currentBalance);
  }
  return rounded;
}
