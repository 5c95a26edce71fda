/**
 * ClinicDesk - Appointment Status Lifecycle
 *
 *   scheduled ──► confirmed ──► in_progress ──► completed
 *       │             │
 *       └─────────────┴──► cancelled | no_show
 *
 * completed, cancelled and no_show are terminal.
 */

import { InvalidTransitionError } from "../errors.ts";
import type { AppointmentStatus } from "../db/schema/appointments.ts";

const TRANSITIONS: Record<AppointmentStatus, readonly AppointmentStatus[]> = {
  scheduled: ["confirmed", "cancelled", "no_show"],
  confirmed: ["in_progress", "cancelled", "no_show"],
  in_progress: ["completed"],
  completed: [],
  cancelled: [],
  no_show: [],
};

export const STATUS_LABELS: Record<AppointmentStatus, string> = {
  scheduled: "Scheduled",
  confirmed: "Confirmed",
  in_progress: "In Progress",
  completed: "Completed",
  cancelled: "Cancelled",
  no_show: "No Show",
};

export function allowedTransitions(from: AppointmentStatus): readonly AppointmentStatus[] {
  return TRANSITIONS[from];
}

export function canTransition(from: AppointmentStatus, to: AppointmentStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: AppointmentStatus, to: AppointmentStatus): void {
  if (!canTransition(from, to)) throw new InvalidTransitionError(from, to);
}

export function isTerminal(status: AppointmentStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

/** Appointments that may still be edited or rescheduled. */
export function isEditable(status: AppointmentStatus): boolean {
  return status === "scheduled" || status === "confirmed";
}
