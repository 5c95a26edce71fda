/**
 * ClinicDesk - Treatments Extension Plugin
 *
 * The procedure catalog and the treatment records clinicians add after a
 * visit.
 */

import { Type } from "@sinclair/typebox";

import { isClinician } from "../../src/auth/rbac.ts";
import { TREATMENT_CATEGORIES } from "../../src/db/schema/treatments.ts";
import { ById, Id, IsoDate, Money, OptionalText, literalUnion } from "../../src/gateway/schemas.ts";
import type { ClinicPlugin, ClinicPluginApi } from "../../src/gateway/types.ts";
import {
  createTreatmentRecord,
  getPatientTreatmentHistory,
  getTreatmentRecord,
} from "../../src/repositories/treatment-records.ts";
import {
  createTreatment,
  deactivateTreatment,
  getTreatment,
  listTreatments,
  updateTreatment,
} from "../../src/repositories/treatments.ts";

const Category = literalUnion(TREATMENT_CATEGORIES);
const Minutes = Type.Integer({ minimum: 1, maximum: 480 });

const treatmentsPlugin: ClinicPlugin = {
  id: "treatments",
  name: "Treatments",
  description: "Treatment catalog and performed-treatment records",
  version: "1.0.0",

  register(api: ClinicPluginApi) {
    api.logger.info("Treatments plugin registering...");

    // ── Catalog ─────────────────────────────────────────────
    api.registerGatewayMethod("treatments.list", {
      permission: { resource: "treatments", action: "read" },
      params: Type.Object({
        category: Type.Optional(Category),
        includeInactive: Type.Optional(Type.Boolean()),
      }),
      handler(params) {
        return { treatments: listTreatments(params) };
      },
    });

    api.registerGatewayMethod("treatments.get", {
      permission: { resource: "treatments", action: "read" },
      params: ById,
      handler(params) {
        return { treatment: getTreatment(params.id) };
      },
    });

    api.registerGatewayMethod("treatments.create", {
      permission: { resource: "treatments", action: "manage" },
      params: Type.Object({
        name: Type.String(),
        description: OptionalText,
        category: Type.Optional(Category),
        duration: Type.Optional(Minutes),
        baseCost: Money,
      }),
      handler(params, { write }) {
        return { treatment: createTreatment(params, write) };
      },
      audit: { action: "create", resourceType: "treatment", resourceId: (_p, result) => result.treatment.id },
    });

    api.registerGatewayMethod("treatments.update", {
      permission: { resource: "treatments", action: "manage" },
      params: Type.Object({
        id: Id,
        name: Type.Optional(Type.String()),
        description: OptionalText,
        category: Type.Optional(Category),
        duration: Type.Optional(Minutes),
        baseCost: Type.Optional(Money),
      }),
      handler(params) {
        const { id, ...changes } = params;
        return { treatment: updateTreatment(id, changes) };
      },
      audit: { action: "update", resourceType: "treatment", resourceId: (p) => p.id },
    });

    api.registerGatewayMethod("treatments.deactivate", {
      permission: { resource: "treatments", action: "manage" },
      params: ById,
      handler(params) {
        return { treatment: deactivateTreatment(params.id) };
      },
      audit: { action: "deactivate", resourceType: "treatment", resourceId: (p) => p.id },
    });

    // ── Records ─────────────────────────────────────────────
    api.registerGatewayMethod("treatments.records.create", {
      description: "Record a treatment performed on a patient",
      permission: { resource: "treatment_records", action: "create" },
      params: Type.Object({
        patientId: Id,
        treatmentId: Id,
        appointmentId: Type.Optional(Type.Union([Id, Type.Null()])),
        dentistId: Type.Optional(Type.Union([Id, Type.Null()])),
        treatmentDate: Type.Optional(IsoDate),
        treatmentNotes: OptionalText,
        actualCost: Type.Optional(Money),
      }),
      handler(params, { session, write }) {
        // A clinician recording their own work is the default dentist.
        const dentistId =
          params.dentistId === undefined && session && isClinician(session.role)
            ? session.userId
            : params.dentistId;
        return { record: createTreatmentRecord({ ...params, dentistId }, write) };
      },
      audit: { action: "create", resourceType: "treatment_record", resourceId: (_p, result) => result.record.id },
    });

    api.registerGatewayMethod("treatments.records.get", {
      permission: { resource: "treatment_records", action: "read" },
      params: ById,
      handler(params) {
        return { record: getTreatmentRecord(params.id) };
      },
    });

    api.registerGatewayMethod("treatments.history", {
      description: "A patient's treatments, newest first",
      permission: { resource: "treatment_records", action: "read" },
      params: Type.Object({ patientId: Id }),
      handler(params) {
        return { history: getPatientTreatmentHistory(params.patientId) };
      },
    });

    api.logger.info(
      "Treatments plugin registered (RPC: treatments.list, treatments.get, treatments.create, treatments.update, treatments.deactivate, treatments.records.create, treatments.records.get, treatments.history)",
    );
  },
};

export default treatmentsPlugin;
