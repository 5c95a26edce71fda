/**
 * ClinicDesk - Schema barrel export
 */

export * from "./users.ts";
export * from "./patients.ts";
export * from "./appointments.ts";
export * from "./treatments.ts";
export * from "./billing.ts";
export * from "./audit.ts";
