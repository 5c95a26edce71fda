/**
 * ClinicDesk - Role-Based Access Control
 *
 * Permissions are a fixed matrix per role, and the screens each role sees
 * follow from it. Receptionists run the front desk (patients, scheduling,
 * billing); doctors and dentists own the treatment side; admins see all.
 */

import type { UserRole } from "../db/schema/users.ts";

export const RESOURCES = {
  patients: ["create", "read", "update", "delete"],
  appointments: ["create", "read", "update", "status"],
  treatments: ["read", "manage"],
  treatment_records: ["create", "read"],
  billing: ["create", "read", "collect", "cancel"],
  reports: ["read"],
  dashboard: ["read"],
  users: ["manage"],
  audit: ["read"],
} as const;

export type Resource = keyof typeof RESOURCES;
export type Action<R extends Resource = Resource> = (typeof RESOURCES)[R][number];

export type PermissionCheck = {
  [R in Resource]: { resource: R; action: Action<R> };
}[Resource];

export type Permission = { [R in Resource]: `${R}:${Action<R>}` }[Resource];

export type AccessContext = {
  userId: number;
  username: string;
  role: UserRole;
};

const ALL_PERMISSIONS: string[] = Object.entries(RESOURCES).flatMap(([resource, actions]) =>
  actions.map((action) => `${resource}:${action}`),
);

const CLINICIAN: Permission[] = [
  "dashboard:read",
  "patients:read",
  "appointments:read",
  "appointments:status",
  "treatments:read",
  "treatments:manage",
  "treatment_records:create",
  "treatment_records:read",
  "billing:read",
];

const ROLE_PERMISSIONS: Record<UserRole, ReadonlySet<string>> = {
  admin: new Set(ALL_PERMISSIONS),
  receptionist: new Set<Permission>([
    "dashboard:read",
    "patients:create",
    "patients:read",
    "patients:update",
    "patients:delete",
    "appointments:create",
    "appointments:read",
    "appointments:update",
    "appointments:status",
    "treatments:read",
    "treatment_records:read",
    "billing:create",
    "billing:read",
    "billing:collect",
    "billing:cancel",
  ]),
  doctor: new Set(CLINICIAN),
  dentist: new Set(CLINICIAN),
  hygienist: new Set<Permission>([
    "dashboard:read",
    "patients:read",
    "appointments:read",
    "appointments:status",
    "treatments:read",
    "treatment_records:create",
    "treatment_records:read",
  ]),
  staff: new Set<Permission>(["dashboard:read", "patients:read", "appointments:read", "treatments:read"]),
};

export function permissionKey(check: PermissionCheck): string {
  return `${check.resource}:${check.action}`;
}

export function hasPermission(role: UserRole, check: PermissionCheck): boolean {
  return ROLE_PERMISSIONS[role].has(permissionKey(check));
}

export function permissionsFor(role: UserRole): string[] {
  return [...ROLE_PERMISSIONS[role]].sort();
}

export function isClinician(role: UserRole): boolean {
  return role === "doctor" || role === "dentist";
}

// ── Navigation ─────────────────────────────────────────────

export type Screen = "dashboard" | "patients" | "appointments" | "billing" | "treatments" | "users" | "reports";

export type NavigationEntry = { screen: Screen; label: string };

const SCREENS: { screen: Screen; label: string; requires: PermissionCheck }[] = [
  { screen: "dashboard", label: "Dashboard", requires: { resource: "dashboard", action: "read" } },
  { screen: "patients", label: "Patients", requires: { resource: "patients", action: "create" } },
  { screen: "appointments", label: "Appointments", requires: { resource: "appointments", action: "create" } },
  { screen: "billing", label: "Billing", requires: { resource: "billing", action: "collect" } },
  { screen: "treatments", label: "Treatments", requires: { resource: "treatment_records", action: "create" } },
  { screen: "users", label: "Users", requires: { resource: "users", action: "manage" } },
  { screen: "reports", label: "Reports", requires: { resource: "reports", action: "read" } },
];

/** The screens shown in a role's main navigation, in menu order. */
export function navigationFor(role: UserRole): NavigationEntry[] {
  return SCREENS.filter((s) => hasPermission(role, s.requires)).map(({ screen, label }) => ({
    screen,
    label,
  }));
}

export const ROLE_SUBTITLES: Record<UserRole, string> = {
  admin: "System Administrator - Full Access",
  receptionist: "Patient Management & Scheduling",
  doctor: "Patient Care & Treatment",
  dentist: "Patient Care & Treatment",
  hygienist: "Dental Hygiene Services",
  staff: "General Staff Access",
};
