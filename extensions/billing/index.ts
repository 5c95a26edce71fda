/**
 * ClinicDesk - Billing Extension
 *
 * Provides:
 *   - Invoice creation (free-form items or from treatment records)
 *   - Issuing, cancelling and overdue sweeps
 *   - Payment processing
 *
 * Tax rate, payment terms and the invoice number prefix come from the
 * `billing` section of the clinic config.
 */

import { Type } from "@sinclair/typebox";

import { INVOICE_STATUSES, PAYMENT_METHODS } from "../../src/db/schema/billing.ts";
import { isOverdue } from "../../src/domain/billing.ts";
import { formatCurrency, toIsoDate } from "../../src/domain/validators.ts";
import { ById, Id, IsoDate, Money, OptionalText, literalUnion } from "../../src/gateway/schemas.ts";
import type { ClinicPlugin, ClinicPluginApi } from "../../src/gateway/types.ts";
import {
  cancelInvoice,
  createInvoice,
  createInvoiceFromTreatmentRecords,
  getInvoice,
  issueInvoice,
  listInvoices,
  markOverdueInvoices,
} from "../../src/repositories/invoices.ts";
import { listPayments, recordPayment } from "../../src/repositories/payments.ts";

const InvoiceStatus = literalUnion(INVOICE_STATUSES);

const InvoiceOptions = {
  appointmentId: Type.Optional(Type.Union([Id, Type.Null()])),
  invoiceDate: Type.Optional(IsoDate),
  dueDate: Type.Optional(IsoDate),
  discountAmount: Type.Optional(Money),
  notes: OptionalText,
  draft: Type.Optional(Type.Boolean()),
};

const billingPlugin: ClinicPlugin = {
  id: "billing",
  name: "Billing",
  description: "Invoices, payments and overdue tracking",
  version: "1.0.0",

  register(api: ClinicPluginApi) {
    api.logger.info("Billing plugin registering...");
    const settings = api.config.billing;
    const currency = api.config.clinic.currency;

    // ── Invoices ────────────────────────────────────────────
    api.registerGatewayMethod("billing.invoices.list", {
      permission: { resource: "billing", action: "read" },
      params: Type.Object({
        patientId: Type.Optional(Id),
        status: Type.Optional(Type.Union([InvoiceStatus, Type.Array(InvoiceStatus)])),
        from: Type.Optional(IsoDate),
        to: Type.Optional(IsoDate),
      }),
      handler(params) {
        return { invoices: listInvoices(params) };
      },
    });

    api.registerGatewayMethod("billing.invoices.get", {
      description: "An invoice with its items and payments",
      permission: { resource: "billing", action: "read" },
      params: ById,
      handler(params, { write }) {
        const detail = getInvoice(params.id);
        return {
          ...detail,
          overdue: isOverdue(detail.invoice, toIsoDate(write.now)),
          display: {
            total: formatCurrency(detail.invoice.totalAmount, currency),
            paid: formatCurrency(detail.invoice.amountPaid, currency),
            balance: formatCurrency(detail.invoice.balanceDue, currency),
          },
        };
      },
    });

    api.registerGatewayMethod("billing.invoices.create", {
      description: "Create an invoice from line items",
      permission: { resource: "billing", action: "create" },
      params: Type.Object({
        patientId: Id,
        treatmentRecordId: Type.Optional(Type.Union([Id, Type.Null()])),
        items: Type.Array(
          Type.Object({
            description: Type.String(),
            quantity: Type.Integer({ minimum: 1 }),
            unitPrice: Money,
            treatmentRecordId: Type.Optional(Type.Union([Id, Type.Null()])),
          }),
          { minItems: 1 },
        ),
        ...InvoiceOptions,
      }),
      handler(params, { write }) {
        return createInvoice(params, settings, write);
      },
      audit: { action: "create", resourceType: "invoice", resourceId: (_p, result) => result.invoice.id },
    });

    api.registerGatewayMethod("billing.invoices.fromRecords", {
      description: "Bill performed treatments at their actual cost",
      permission: { resource: "billing", action: "create" },
      params: Type.Object({
        patientId: Id,
        recordIds: Type.Array(Id, { minItems: 1 }),
        ...InvoiceOptions,
      }),
      handler(params, { write }) {
        const { patientId, recordIds, ...options } = params;
        return createInvoiceFromTreatmentRecords(patientId, recordIds, options, settings, write);
      },
      audit: { action: "create", resourceType: "invoice", resourceId: (_p, result) => result.invoice.id },
    });

    api.registerGatewayMethod("billing.invoices.issue", {
      description: "Issue a draft invoice",
      permission: { resource: "billing", action: "create" },
      params: ById,
      handler(params, { write }) {
        return { invoice: issueInvoice(params.id, write) };
      },
      audit: { action: "issue", resourceType: "invoice", resourceId: (p) => p.id },
    });

    api.registerGatewayMethod("billing.invoices.cancel", {
      permission: { resource: "billing", action: "cancel" },
      params: Type.Object({ id: Id, reason: OptionalText }),
      handler(params, { write }) {
        return { invoice: cancelInvoice(params.id, params.reason, write) };
      },
      audit: { action: "cancel", resourceType: "invoice", resourceId: (p) => p.id },
    });

    api.registerGatewayMethod("billing.invoices.markOverdue", {
      description: "Flag open invoices past their due date",
      permission: { resource: "billing", action: "collect" },
      params: Type.Object({ today: Type.Optional(IsoDate) }),
      handler(params, { write }) {
        return { updated: markOverdueInvoices(params.today ?? toIsoDate(write.now)) };
      },
      audit: { action: "mark_overdue", resourceType: "invoice" },
    });

    // ── Payments ────────────────────────────────────────────
    api.registerGatewayMethod("billing.payments.record", {
      description: "Take a payment against an open invoice",
      permission: { resource: "billing", action: "collect" },
      params: Type.Object({
        invoiceId: Id,
        paymentAmount: Type.Number({ exclusiveMinimum: 0 }),
        paymentMethod: literalUnion(PAYMENT_METHODS),
        paymentDate: Type.Optional(IsoDate),
        paymentReference: OptionalText,
        notes: OptionalText,
      }),
      handler(params, { write }) {
        return recordPayment(params, write);
      },
      audit: {
        action: "pay",
        resourceType: "invoice",
        resourceId: (p) => p.invoiceId,
      },
    });

    api.registerGatewayMethod("billing.payments.list", {
      permission: { resource: "billing", action: "read" },
      params: Type.Object({ invoiceId: Type.Optional(Id) }),
      handler(params) {
        return { payments: listPayments(params.invoiceId) };
      },
    });

    api.logger.info(
      "Billing plugin registered (RPC: billing.invoices.list/get/create/fromRecords/issue/cancel/markOverdue, billing.payments.record/list)",
    );
  },
};

export default billingPlugin;
