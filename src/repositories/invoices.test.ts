import { eq } from "drizzle-orm";
import { describe, expect, it } from "vitest";

import { getDb } from "../db/connection.ts";
import { invoiceItems, invoices } from "../db/schema/billing.ts";
import { InvoiceStateError, ValidationError } from "../errors.ts";
import { TODAY, addPatient, addTreatment, at, useTestDb } from "../testing/fixtures.ts";
import {
  DEFAULT_BILLING,
  cancelInvoice,
  createInvoice,
  createInvoiceFromTreatmentRecords,
  getInvoice,
  issueInvoice,
  listInvoices,
  markOverdueInvoices,
  outstandingBalance,
} from "./invoices.ts";
import { recordPayment } from "./payments.ts";
import { createTreatmentRecord, getTreatmentRecord } from "./treatment-records.ts";

const withTax = { ...DEFAULT_BILLING, taxRate: 0.1 };

function setup() {
  const patient = addPatient();
  const filling = addTreatment({ name: "Composite Filling", baseCost: 150 });
  const exam = addTreatment({ name: "Routine Checkup", category: "preventive", baseCost: 75 });
  const fillingRecord = createTreatmentRecord({ patientId: patient.id, treatmentId: filling.id }, at());
  const examRecord = createTreatmentRecord({ patientId: patient.id, treatmentId: exam.id }, at());
  return { patient, fillingRecord, examRecord };
}

describe("createInvoice", () => {
  useTestDb();

  it("writes the header and items with computed totals", () => {
    const { patient } = setup();
    const detail = createInvoice(
      { patientId: patient.id, items: [{ description: "Cleaning", quantity: 2, unitPrice: 95 }] },
      withTax,
      at(),
    );

    expect(detail.invoice).toMatchObject({
      invoiceNumber: "INV-20260302-0001",
      invoiceDate: TODAY,
      dueDate: "2026-04-01",
      subtotal: 190,
      taxAmount: 19,
      discountAmount: 0,
      totalAmount: 209,
      amountPaid: 0,
      balanceDue: 209,
      status: "pending",
      paymentTerms: "Net 30",
    });
    expect(detail.items).toHaveLength(1);
    expect(detail.items[0]).toMatchObject({ description: "Cleaning", quantity: 2, unitPrice: 95, totalPrice: 190 });
    expect(detail.patientName).toBe("Alice Walker");
  });

  it("numbers invoices per day with the configured prefix", () => {
    const { patient } = setup();
    const item = { description: "Exam", quantity: 1, unitPrice: 50 };
    const settings = { ...DEFAULT_BILLING, invoicePrefix: "DENT" };
    createInvoice({ patientId: patient.id, items: [item] }, settings, at());
    const second = createInvoice({ patientId: patient.id, items: [item] }, settings, at());
    const backdated = createInvoice({ patientId: patient.id, items: [item], invoiceDate: "2026-02-27" }, settings, at());

    expect(second.invoice.invoiceNumber).toBe("DENT-20260302-0002");
    expect(backdated.invoice.invoiceNumber).toBe("DENT-20260227-0001");
  });

  it("writes nothing when an item fails", () => {
    const { patient } = setup();
    const stranger = addPatient({ firstName: "Bob" });
    const strangersTreatment = addTreatment({ name: "Extraction", baseCost: 200 });
    const strangersRecord = createTreatmentRecord({ patientId: stranger.id, treatmentId: strangersTreatment.id }, at());

    expect(() =>
      createInvoice(
        {
          patientId: patient.id,
          items: [
            { description: "Exam", quantity: 1, unitPrice: 50 },
            { description: "Extraction", quantity: 1, unitPrice: 200, treatmentRecordId: strangersRecord.id },
          ],
        },
        DEFAULT_BILLING,
        at(),
      ),
    ).toThrow("Treatment record does not belong to this patient");

    expect(listInvoices()).toEqual([]);
    expect(getDb().select().from(invoiceItems).all()).toEqual([]);
    const next = createInvoice({ patientId: patient.id, items: [{ description: "Exam", quantity: 1, unitPrice: 50 }] }, DEFAULT_BILLING, at());
    expect(next.invoice.invoiceNumber).toBe("INV-20260302-0001");
  });

  it("validates dates and the patient", () => {
    const { patient } = setup();
    const items = [{ description: "Exam", quantity: 1, unitPrice: 50 }];
    expect(() =>
      createInvoice({ patientId: patient.id, items, invoiceDate: TODAY, dueDate: "2026-03-01" }, DEFAULT_BILLING, at()),
    ).toThrow("Due date cannot be before the invoice date");
    expect(() => createInvoice({ patientId: 999, items }, DEFAULT_BILLING, at())).toThrow("Patient not found: 999");
  });

  it("keeps numbering past 9999 invoices on one date", () => {
    const { patient } = setup();
    const items = [{ description: "Exam", quantity: 1, unitPrice: 50 }];
    const first = createInvoice({ patientId: patient.id, items }, DEFAULT_BILLING, at());
    getDb().update(invoices).set({ invoiceNumber: "INV-20260302-9999" }).where(eq(invoices.id, first.invoice.id)).run();

    expect(createInvoice({ patientId: patient.id, items }, DEFAULT_BILLING, at()).invoice.invoiceNumber).toBe(
      "INV-20260302-10000",
    );
    expect(createInvoice({ patientId: patient.id, items }, DEFAULT_BILLING, at()).invoice.invoiceNumber).toBe(
      "INV-20260302-10001",
    );
  });

  it("marks a zero-total invoice as paid", () => {
    const { patient } = setup();
    const detail = createInvoice(
      { patientId: patient.id, items: [{ description: "Courtesy check", quantity: 1, unitPrice: 0 }] },
      DEFAULT_BILLING,
      at(),
    );
    expect(detail.invoice.status).toBe("paid");
    expect(detail.invoice.balanceDue).toBe(0);
  });
});

describe("billing treatment records", () => {
  useTestDb();

  it("bills records at their actual cost and links them", () => {
    const { patient, fillingRecord, examRecord } = setup();
    const detail = createInvoiceFromTreatmentRecords(patient.id, [examRecord.id, fillingRecord.id, examRecord.id], {}, DEFAULT_BILLING, at());

    expect(detail.items.map((i) => [i.description, i.totalPrice, i.treatmentRecordId])).toEqual([
      [`Composite Filling (${TODAY})`, 150, fillingRecord.id],
      [`Routine Checkup (${TODAY})`, 75, examRecord.id],
    ]);
    expect(detail.invoice.totalAmount).toBe(225);
    expect(detail.invoice.treatmentRecordId).toBeNull();
  });

  it("links the header when a single record is billed", () => {
    const { patient, fillingRecord } = setup();
    const detail = createInvoiceFromTreatmentRecords(patient.id, [fillingRecord.id], {}, DEFAULT_BILLING, at());
    expect(detail.invoice.treatmentRecordId).toBe(fillingRecord.id);
  });

  it("refuses records already billed until that invoice is cancelled", () => {
    const { patient, fillingRecord } = setup();
    const first = createInvoiceFromTreatmentRecords(patient.id, [fillingRecord.id], {}, DEFAULT_BILLING, at());

    expect(() => createInvoiceFromTreatmentRecords(patient.id, [fillingRecord.id], {}, DEFAULT_BILLING, at())).toThrow(
      `Treatment record ${fillingRecord.id} is already billed on INV-20260302-0001`,
    );

    cancelInvoice(first.invoice.id, "Wrong patient plan", at());
    expect(getTreatmentRecord(fillingRecord.id).paymentStatus).toBe("cancelled");

    const rebilled = createInvoiceFromTreatmentRecords(patient.id, [fillingRecord.id], {}, DEFAULT_BILLING, at());
    expect(rebilled.invoice.invoiceNumber).toBe("INV-20260302-0002");
    expect(getTreatmentRecord(fillingRecord.id).paymentStatus).toBe("pending");
  });

  it("refuses a hand-built invoice for a record that is already billed", () => {
    const { patient, fillingRecord } = setup();
    const first = createInvoiceFromTreatmentRecords(patient.id, [fillingRecord.id], {}, DEFAULT_BILLING, at());

    expect(() =>
      createInvoice(
        {
          patientId: patient.id,
          items: [{ description: "Filling again", quantity: 1, unitPrice: 150, treatmentRecordId: fillingRecord.id }],
        },
        DEFAULT_BILLING,
        at(),
      ),
    ).toThrow(`Treatment record ${fillingRecord.id} is already billed on INV-20260302-0001`);
    expect(listInvoices()).toHaveLength(1);

    cancelInvoice(first.invoice.id, null, at());
    const rebilled = createInvoice(
      {
        patientId: patient.id,
        items: [{ description: "Filling again", quantity: 1, unitPrice: 150, treatmentRecordId: fillingRecord.id }],
      },
      DEFAULT_BILLING,
      at(),
    );
    expect(rebilled.invoice.invoiceNumber).toBe("INV-20260302-0002");
    expect(getTreatmentRecord(fillingRecord.id).paymentStatus).toBe("pending");
  });

  it("counts a record linked only on the invoice header as billed", () => {
    const { patient, fillingRecord } = setup();
    createInvoice(
      {
        patientId: patient.id,
        treatmentRecordId: fillingRecord.id,
        items: [{ description: "Filling", quantity: 1, unitPrice: 150 }],
      },
      DEFAULT_BILLING,
      at(),
    );

    expect(() => createInvoiceFromTreatmentRecords(patient.id, [fillingRecord.id], {}, DEFAULT_BILLING, at())).toThrow(
      InvoiceStateError,
    );
    expect(() =>
      createInvoice(
        { patientId: patient.id, treatmentRecordId: fillingRecord.id, items: [{ description: "Filling", quantity: 1, unitPrice: 150 }] },
        DEFAULT_BILLING,
        at(),
      ),
    ).toThrow(`Treatment record ${fillingRecord.id} is already billed on INV-20260302-0001`);
    expect(listInvoices()).toHaveLength(1);
  });

  it("refuses records of another patient and an empty selection", () => {
    const { fillingRecord } = setup();
    const stranger = addPatient({ firstName: "Bob" });
    expect(() => createInvoiceFromTreatmentRecords(stranger.id, [fillingRecord.id], {}, DEFAULT_BILLING, at())).toThrow(
      ValidationError,
    );
    expect(() => createInvoiceFromTreatmentRecords(stranger.id, [], {}, DEFAULT_BILLING, at())).toThrow(
      "Select at least one treatment to bill",
    );
  });
});

describe("invoice lifecycle", () => {
  useTestDb();

  it("issues a draft", () => {
    const { patient, fillingRecord } = setup();
    const draft = createInvoiceFromTreatmentRecords(patient.id, [fillingRecord.id], { draft: true }, DEFAULT_BILLING, at());
    expect(draft.invoice.status).toBe("draft");
    expect(getTreatmentRecord(fillingRecord.id).paymentStatus).toBe("pending");

    expect(issueInvoice(draft.invoice.id, at()).status).toBe("pending");
    expect(() => issueInvoice(draft.invoice.id, at())).toThrow(InvoiceStateError);
  });

  it("cancels with a note, but not once paid into", () => {
    const { patient } = setup();
    const items = [{ description: "Exam", quantity: 1, unitPrice: 80 }];
    const open = createInvoice({ patientId: patient.id, items, notes: "Front desk" }, DEFAULT_BILLING, at());
    const cancelled = cancelInvoice(open.invoice.id, "Duplicate", at());
    expect(cancelled.status).toBe("cancelled");
    expect(cancelled.notes).toBe("Front desk\nCancelled: Duplicate");
    expect(() => cancelInvoice(open.invoice.id, null, at())).toThrow("A cancelled invoice cannot be cancelled");

    const paidInto = createInvoice({ patientId: patient.id, items }, DEFAULT_BILLING, at());
    recordPayment({ invoiceId: paidInto.invoice.id, paymentAmount: 20, paymentMethod: "cash" }, at());
    expect(() => cancelInvoice(paidInto.invoice.id, null, at())).toThrow("An invoice with payments cannot be cancelled");
  });

  it("flags open invoices past their due date", () => {
    const { patient, fillingRecord } = setup();
    const earlier = { now: new Date(2026, 0, 10, 9, 0) };
    const old = createInvoiceFromTreatmentRecords(patient.id, [fillingRecord.id], {}, DEFAULT_BILLING, earlier);
    expect(old.invoice).toMatchObject({ invoiceDate: "2026-01-10", dueDate: "2026-02-09", status: "pending" });
    createInvoice({ patientId: patient.id, items: [{ description: "Exam", quantity: 1, unitPrice: 50 }] }, DEFAULT_BILLING, at());

    expect(markOverdueInvoices(TODAY)).toBe(1);
    expect(getInvoice(old.invoice.id).invoice.status).toBe("overdue");
    expect(getTreatmentRecord(fillingRecord.id).paymentStatus).toBe("overdue");
    expect(markOverdueInvoices(TODAY)).toBe(0);
  });

  it("lists invoices newest first and sums the open balance", () => {
    const { patient } = setup();
    const bob = addPatient({ firstName: "Bob", lastName: "Stone" });
    const item = (unitPrice: number) => [{ description: "Exam", quantity: 1, unitPrice }];
    const a = createInvoice({ patientId: patient.id, items: item(100), invoiceDate: "2026-02-20" }, DEFAULT_BILLING, at());
    const b = createInvoice({ patientId: bob.id, items: item(60) }, DEFAULT_BILLING, at());
    const draft = createInvoice({ patientId: bob.id, items: item(500), draft: true }, DEFAULT_BILLING, at());
    recordPayment({ invoiceId: a.invoice.id, paymentAmount: 30, paymentMethod: "cash" }, at());

    expect(listInvoices().map((i) => i.id)).toEqual([draft.invoice.id, b.invoice.id, a.invoice.id]);
    expect(listInvoices({ patientId: bob.id, status: "pending" }).map((i) => i.patientLastName)).toEqual(["Stone"]);
    expect(listInvoices({ from: "2026-02-01", to: "2026-02-28" }).map((i) => i.id)).toEqual([a.invoice.id]);
    expect(outstandingBalance()).toBe(130);
  });
});
