import { describe, expect, it } from "vitest";

import { InvalidTransitionError } from "../errors.ts";
import { TODAY, TOMORROW, YESTERDAY, addPatient, addUser, at, useTestDb } from "../testing/fixtures.ts";
import {
  createAppointment,
  findConflicts,
  getAppointment,
  listAppointments,
  updateAppointment,
  updateAppointmentStatus,
} from "./appointments.ts";

describe("appointments repository", () => {
  useTestDb();

  it("books with default duration, type and status", () => {
    const patient = addPatient();
    const appointment = createAppointment(
      { patientId: patient.id, appointmentDate: TOMORROW, appointmentTime: "10:00", notes: " " },
      at(),
    );
    expect(appointment).toMatchObject({
      patientId: patient.id,
      dentistId: null,
      duration: 60,
      appointmentType: "checkup",
      status: "scheduled",
      notes: null,
    });
  });

  it("refuses slots in the past", () => {
    const patient = addPatient();
    expect(() =>
      createAppointment({ patientId: patient.id, appointmentDate: YESTERDAY, appointmentTime: "10:00" }, at()),
    ).toThrow("Appointment date cannot be in the past");
    expect(() =>
      createAppointment({ patientId: patient.id, appointmentDate: TODAY, appointmentTime: "08:30" }, at()),
    ).toThrow("Appointment time cannot be in the past");
    expect(
      createAppointment({ patientId: patient.id, appointmentDate: TODAY, appointmentTime: "09:00" }, at()).appointmentTime,
    ).toBe("09:00");
  });

  it("validates times, durations and the dentist", async () => {
    const patient = addPatient();
    const hygienist = await addUser("hy", "hygienist");
    expect(() =>
      createAppointment({ patientId: patient.id, appointmentDate: TOMORROW, appointmentTime: "25:00" }, at()),
    ).toThrow("Appointment time must be a valid time (HH:MM)");
    expect(() =>
      createAppointment({ patientId: patient.id, appointmentDate: TOMORROW, appointmentTime: "10:00", duration: 0 }, at()),
    ).toThrow("Duration must be between 1 and 480 minutes");
    expect(() =>
      createAppointment(
        { patientId: patient.id, dentistId: hygienist.id, appointmentDate: TOMORROW, appointmentTime: "10:00" },
        at(),
      ),
    ).toThrow("Dentist must be an active doctor or dentist");
  });

  it("lists by date and time with patient and dentist names", async () => {
    const dentist = await addUser("drlee", "dentist");
    const alice = addPatient();
    const bob = addPatient({ firstName: "Bob", lastName: "Stone" });
    createAppointment({ patientId: bob.id, appointmentDate: TOMORROW, appointmentTime: "14:00", duration: 30 }, at());
    createAppointment(
      { patientId: alice.id, dentistId: dentist.id, appointmentDate: TOMORROW, appointmentTime: "09:15", duration: 45 },
      at(),
    );
    createAppointment({ patientId: alice.id, appointmentDate: TODAY, appointmentTime: "16:00" }, at());

    const tomorrow = listAppointments({ date: TOMORROW });
    expect(tomorrow.map((a) => [a.appointmentTime, a.endTime, a.patientLastName, a.dentistUsername])).toEqual([
      ["09:15", "10:00", "Walker", "drlee"],
      ["14:00", "14:30", "Stone", null],
    ]);
    expect(listAppointments({ patientId: alice.id }).map((a) => a.appointmentDate)).toEqual([TODAY, TOMORROW]);
    expect(listAppointments({ dentistId: dentist.id })).toHaveLength(1);
    expect(listAppointments({ from: TOMORROW, to: TOMORROW })).toHaveLength(2);
  });

  it("moves along the status lifecycle", () => {
    const patient = addPatient();
    const { id } = createAppointment({ patientId: patient.id, appointmentDate: TOMORROW, appointmentTime: "10:00" }, at());

    expect(updateAppointmentStatus(id, "confirmed", {}, at()).status).toBe("confirmed");
    expect(updateAppointmentStatus(id, "in_progress", {}, at()).status).toBe("in_progress");
    expect(() => updateAppointmentStatus(id, "cancelled", { cancelReason: "late" }, at())).toThrow(InvalidTransitionError);
    expect(updateAppointmentStatus(id, "completed", {}, at()).status).toBe("completed");
    expect(() => updateAppointmentStatus(id, "scheduled", {}, at())).toThrow(
      "Cannot change appointment status from completed to scheduled",
    );
    expect(listAppointments({ status: ["completed", "no_show"] }).map((a) => a.id)).toEqual([id]);
  });

  it("stores the reason on cancellation only", () => {
    const patient = addPatient();
    const first = createAppointment({ patientId: patient.id, appointmentDate: TOMORROW, appointmentTime: "10:00" }, at());
    const second = createAppointment({ patientId: patient.id, appointmentDate: TOMORROW, appointmentTime: "11:00" }, at());

    expect(updateAppointmentStatus(first.id, "cancelled", { cancelReason: "Patient is ill" }, at()).cancelReason).toBe(
      "Patient is ill",
    );
    expect(updateAppointmentStatus(second.id, "no_show", { cancelReason: "ignored" }, at()).cancelReason).toBeNull();
  });

  it("reschedules only scheduled or confirmed appointments", () => {
    const patient = addPatient();
    const { id } = createAppointment({ patientId: patient.id, appointmentDate: TOMORROW, appointmentTime: "10:00" }, at());

    const moved = updateAppointment(id, { appointmentTime: "15:30", appointmentType: "cleaning" }, at());
    expect(moved).toMatchObject({ appointmentDate: TOMORROW, appointmentTime: "15:30", appointmentType: "cleaning" });
    expect(() => updateAppointment(id, { appointmentDate: YESTERDAY }, at())).toThrow(
      "Appointment date cannot be in the past",
    );

    updateAppointmentStatus(id, "cancelled", {}, at());
    expect(() => updateAppointment(id, { notes: "too late" }, at())).toThrow(
      "A cancelled appointment can no longer be changed",
    );
    expect(getAppointment(id).notes).toBeNull();
  });

  it("reports overlapping bookings for the same dentist", async () => {
    const dentist = await addUser("drlee", "dentist");
    const other = await addUser("drkim", "doctor");
    const patient = addPatient();
    const book = (dentistId: number, appointmentTime: string, duration: number) =>
      createAppointment({ patientId: patient.id, dentistId, appointmentDate: TOMORROW, appointmentTime, duration }, at());

    const a = book(dentist.id, "10:00", 60);
    const b = book(dentist.id, "10:30", 30);
    book(dentist.id, "11:00", 30);
    book(other.id, "10:15", 30);
    const cancelled = book(dentist.id, "10:15", 15);
    updateAppointmentStatus(cancelled.id, "cancelled", {}, at());

    const slot = { dentistId: dentist.id, appointmentDate: TOMORROW, appointmentTime: "10:15", duration: 30 };
    expect(findConflicts(slot).map((c) => c.id)).toEqual([a.id, b.id]);
    // Back-to-back bookings do not overlap.
    expect(findConflicts({ ...slot, appointmentTime: "10:00", excludeId: a.id })).toEqual([]);
  });
});
