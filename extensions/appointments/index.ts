/**
 * ClinicDesk - Scheduling Extension Plugin
 *
 * Provides:
 *   - Booking, rescheduling and the status lifecycle of appointments
 *   - Day and range views of the appointment book
 *   - Dentist picker and overlap report
 */

import { Type } from "@sinclair/typebox";

import { APPOINTMENT_STATUSES, APPOINTMENT_TYPES } from "../../src/db/schema/appointments.ts";
import { allowedTransitions, isTerminal, STATUS_LABELS } from "../../src/domain/appointment-status.ts";
import { ById, ClockTime, Id, IsoDate, NoParams, OptionalText, literalUnion } from "../../src/gateway/schemas.ts";
import type { ClinicPlugin, ClinicPluginApi } from "../../src/gateway/types.ts";
import {
  MAX_APPOINTMENT_MINUTES,
  createAppointment,
  findConflicts,
  getAppointment,
  listAppointments,
  updateAppointment,
  updateAppointmentStatus,
} from "../../src/repositories/appointments.ts";
import { listDentists } from "../../src/repositories/users.ts";

const Status = literalUnion(APPOINTMENT_STATUSES);
const AppointmentType = literalUnion(APPOINTMENT_TYPES);
const Duration = Type.Integer({ minimum: 1, maximum: MAX_APPOINTMENT_MINUTES });

const appointmentsPlugin: ClinicPlugin = {
  id: "appointments",
  name: "Scheduling",
  description: "Appointment booking, rescheduling and status tracking",
  version: "1.0.0",

  register(api: ClinicPluginApi) {
    api.logger.info("Scheduling plugin registering...");

    api.registerGatewayMethod("appointments.list", {
      description: "Appointments by day, range, patient, dentist or status",
      permission: { resource: "appointments", action: "read" },
      params: Type.Object({
        date: Type.Optional(IsoDate),
        from: Type.Optional(IsoDate),
        to: Type.Optional(IsoDate),
        patientId: Type.Optional(Id),
        dentistId: Type.Optional(Id),
        status: Type.Optional(Type.Union([Status, Type.Array(Status)])),
      }),
      handler(params) {
        return { appointments: listAppointments(params) };
      },
    });

    api.registerGatewayMethod("appointments.get", {
      permission: { resource: "appointments", action: "read" },
      params: ById,
      handler(params) {
        const appointment = getAppointment(params.id);
        return {
          appointment,
          statusLabel: STATUS_LABELS[appointment.status],
          nextStatuses: allowedTransitions(appointment.status),
          terminal: isTerminal(appointment.status),
        };
      },
    });

    api.registerGatewayMethod("appointments.create", {
      description: "Book an appointment; overlaps with the dentist's other bookings are reported",
      permission: { resource: "appointments", action: "create" },
      params: Type.Object({
        patientId: Id,
        dentistId: Type.Optional(Type.Union([Id, Type.Null()])),
        appointmentDate: IsoDate,
        appointmentTime: ClockTime,
        duration: Type.Optional(Duration),
        appointmentType: Type.Optional(AppointmentType),
        treatmentPlan: OptionalText,
        notes: OptionalText,
      }),
      handler(params, { write }) {
        const appointment = createAppointment(params, write);
        const conflicts =
          appointment.dentistId === null
            ? []
            : findConflicts({
                dentistId: appointment.dentistId,
                appointmentDate: appointment.appointmentDate,
                appointmentTime: appointment.appointmentTime,
                duration: appointment.duration,
                excludeId: appointment.id,
              });
        return { appointment, conflicts };
      },
      audit: { action: "create", resourceType: "appointment", resourceId: (_p, result) => result.appointment.id },
    });

    api.registerGatewayMethod("appointments.update", {
      description: "Reschedule or edit a scheduled or confirmed appointment",
      permission: { resource: "appointments", action: "update" },
      params: Type.Object({
        id: Id,
        dentistId: Type.Optional(Type.Union([Id, Type.Null()])),
        appointmentDate: Type.Optional(IsoDate),
        appointmentTime: Type.Optional(ClockTime),
        duration: Type.Optional(Duration),
        appointmentType: Type.Optional(AppointmentType),
        treatmentPlan: OptionalText,
        notes: OptionalText,
      }),
      handler(params, { write }) {
        const { id, ...changes } = params;
        return { appointment: updateAppointment(id, changes, write) };
      },
      audit: { action: "update", resourceType: "appointment", resourceId: (p) => p.id },
    });

    api.registerGatewayMethod("appointments.setStatus", {
      description: "Move an appointment along its lifecycle",
      permission: { resource: "appointments", action: "status" },
      params: Type.Object({ id: Id, status: Status, cancelReason: OptionalText }),
      handler(params, { write }) {
        return {
          appointment: updateAppointmentStatus(params.id, params.status, { cancelReason: params.cancelReason }, write),
        };
      },
      audit: { action: "status", resourceType: "appointment", resourceId: (p) => p.id },
    });

    api.registerGatewayMethod("appointments.conflicts", {
      description: "Bookings of a dentist overlapping a proposed slot",
      permission: { resource: "appointments", action: "read" },
      params: Type.Object({
        dentistId: Id,
        appointmentDate: IsoDate,
        appointmentTime: ClockTime,
        duration: Duration,
        excludeId: Type.Optional(Id),
      }),
      handler(params) {
        return { conflicts: findConflicts(params) };
      },
    });

    api.registerGatewayMethod("appointments.dentists", {
      description: "Active doctors and dentists",
      permission: { resource: "appointments", action: "read" },
      params: NoParams,
      handler() {
        return { dentists: listDentists() };
      },
    });

    api.logger.info(
      "Scheduling plugin registered (RPC: appointments.list, appointments.get, appointments.create, appointments.update, appointments.setStatus, appointments.conflicts, appointments.dentists)",
    );
  },
};

export default appointmentsPlugin;
