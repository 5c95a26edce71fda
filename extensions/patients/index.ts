/**
 * ClinicDesk - Patient Management Extension Plugin
 *
 * Gateway methods behind the Patients screen: search, registration,
 * demographics edits, soft delete, and the patient's history (past
 * treatments and appointments).
 */

import { Type } from "@sinclair/typebox";

import { GENDERS } from "../../src/db/schema/patients.ts";
import { formatPhone, patientAge, toIsoDate } from "../../src/domain/validators.ts";
import { ById, Id, IsoDate, OptionalText, literalUnion } from "../../src/gateway/schemas.ts";
import type { ClinicPlugin, ClinicPluginApi } from "../../src/gateway/types.ts";
import { listAppointments } from "../../src/repositories/appointments.ts";
import {
  createPatient,
  deactivatePatient,
  getPatient,
  listPatients,
  reactivatePatient,
  updatePatient,
} from "../../src/repositories/patients.ts";
import { getPatientTreatmentHistory } from "../../src/repositories/treatment-records.ts";

const PatientFields = {
  dateOfBirth: Type.Optional(Type.Union([IsoDate, Type.Null(), Type.Literal("")])),
  gender: Type.Optional(Type.Union([literalUnion(GENDERS), Type.Null()])),
  phone: OptionalText,
  email: OptionalText,
  address: OptionalText,
  city: OptionalText,
  state: OptionalText,
  postalCode: OptionalText,
  emergencyContactName: OptionalText,
  emergencyContactPhone: OptionalText,
  emergencyContactRelationship: OptionalText,
  medicalHistory: OptionalText,
  allergies: OptionalText,
  insuranceProvider: OptionalText,
  insuranceNumber: OptionalText,
  insuranceGroupNumber: OptionalText,
};

const patientsPlugin: ClinicPlugin = {
  id: "patients",
  name: "Patient Management",
  description: "Patient registration, search, demographics and history",
  version: "1.0.0",

  register(api: ClinicPluginApi) {
    api.logger.info("Patient Management plugin registering...");

    api.registerGatewayMethod("patients.search", {
      description: "Active patients matching a name, phone or email fragment",
      permission: { resource: "patients", action: "read" },
      params: Type.Object({
        query: Type.Optional(Type.String()),
        includeInactive: Type.Optional(Type.Boolean()),
        limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 500 })),
      }),
      handler(params) {
        return {
          patients: listPatients({
            search: params.query,
            includeInactive: params.includeInactive,
            limit: params.limit,
          }),
        };
      },
    });

    api.registerGatewayMethod("patients.get", {
      permission: { resource: "patients", action: "read" },
      params: ById,
      handler(params, { write }) {
        const patient = getPatient(params.id);
        return {
          patient,
          age: patientAge(patient.dateOfBirth, toIsoDate(write.now)),
          displayPhone: formatPhone(patient.phone),
        };
      },
    });

    api.registerGatewayMethod("patients.create", {
      description: "Register a new patient",
      permission: { resource: "patients", action: "create" },
      params: Type.Object({
        firstName: Type.String(),
        lastName: Type.String(),
        ...PatientFields,
      }),
      handler(params, { write }) {
        return { patient: createPatient(params, write) };
      },
      audit: { action: "create", resourceType: "patient", resourceId: (_p, result) => result.patient.id },
    });

    api.registerGatewayMethod("patients.update", {
      permission: { resource: "patients", action: "update" },
      params: Type.Object({
        id: Id,
        firstName: Type.Optional(Type.String()),
        lastName: Type.Optional(Type.String()),
        ...PatientFields,
      }),
      handler(params, { write }) {
        const { id, ...changes } = params;
        return { patient: updatePatient(id, changes, write) };
      },
      audit: { action: "update", resourceType: "patient", resourceId: (p) => p.id },
    });

    api.registerGatewayMethod("patients.deactivate", {
      description: "Hide a patient from lists; their records stay",
      permission: { resource: "patients", action: "delete" },
      params: ById,
      handler(params, { write }) {
        return { patient: deactivatePatient(params.id, write) };
      },
      audit: { action: "deactivate", resourceType: "patient", resourceId: (p) => p.id },
    });

    api.registerGatewayMethod("patients.reactivate", {
      permission: { resource: "patients", action: "update" },
      params: ById,
      handler(params) {
        return { patient: reactivatePatient(params.id) };
      },
      audit: { action: "reactivate", resourceType: "patient", resourceId: (p) => p.id },
    });

    api.registerGatewayMethod("patients.history", {
      description: "Treatment history and appointments of one patient",
      permission: { resource: "treatment_records", action: "read" },
      params: ById,
      handler(params) {
        const patient = getPatient(params.id);
        return {
          patient,
          treatments: getPatientTreatmentHistory(patient.id),
          appointments: listAppointments({ patientId: patient.id }),
        };
      },
    });

    api.logger.info(
      "Patient Management plugin registered (RPC: patients.search, patients.get, patients.create, patients.update, patients.deactivate, patients.reactivate, patients.history)",
    );
  },
};

export default patientsPlugin;
