/**
 * ClinicDesk - Field Validators and Formatters
 *
 * Plain functions shared by the repositories. Empty optional values are
 * considered valid; required-ness is checked separately.
 */

import type { FieldIssue } from "../errors.ts";

const EMAIL_RE = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
const PHONE_RE = /^\+?[1-9]\d{0,15}$/;
const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_RE = /^([01]\d|2[0-3]):([0-5]\d)$/;

export function isValidEmail(email: string | null | undefined): boolean {
  if (!email) return true;
  return EMAIL_RE.test(email);
}

export function isValidPhone(phone: string | null | undefined): boolean {
  if (!phone) return true;
  return PHONE_RE.test(phone.replace(/[\s\-()]/g, ""));
}

/** Strict YYYY-MM-DD that names a real calendar day. */
export function isValidDate(value: string | null | undefined): boolean {
  if (!value) return true;
  const match = DATE_RE.exec(value);
  if (!match) return false;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return (
    date.getUTCFullYear() === Number(y) &&
    date.getUTCMonth() === Number(m) - 1 &&
    date.getUTCDate() === Number(d)
  );
}

/** 24-hour HH:MM. */
export function isValidTime(value: string | null | undefined): boolean {
  if (!value) return true;
  return TIME_RE.test(value);
}

export function isBlank(value: string | null | undefined): boolean {
  return value === undefined || value === null || value.trim() === "";
}

/**
 * Collects field issues and throws them together, so a form can highlight
 * every bad field at once.
 */
export class FieldChecker {
  readonly issues: FieldIssue[] = [];

  required(field: string, value: string | null | undefined, label: string): this {
    if (isBlank(value)) this.issues.push({ field, message: `${label} is required` });
    return this;
  }

  email(field: string, value: string | null | undefined): this {
    if (!isValidEmail(value)) this.issues.push({ field, message: "Invalid email format" });
    return this;
  }

  phone(field: string, value: string | null | undefined): this {
    if (!isValidPhone(value)) this.issues.push({ field, message: "Invalid phone number format" });
    return this;
  }

  date(field: string, value: string | null | undefined, label: string): this {
    if (!isValidDate(value)) {
      this.issues.push({ field, message: `${label} must be a valid date (YYYY-MM-DD)` });
    }
    return this;
  }

  time(field: string, value: string | null | undefined, label: string): this {
    if (!isValidTime(value)) {
      this.issues.push({ field, message: `${label} must be a valid time (HH:MM)` });
    }
    return this;
  }

  check(condition: boolean, field: string, message: string): this {
    if (!condition) this.issues.push({ field, message });
    return this;
  }

  get ok(): boolean {
    return this.issues.length === 0;
  }
}

// ── Dates ──────────────────────────────────────────────────

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/** Local calendar date of `now` as YYYY-MM-DD. */
export function toIsoDate(now: Date = new Date()): string {
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
}

/** Local wall-clock time of `now` as HH:MM. */
export function toIsoTime(now: Date = new Date()): string {
  return `${pad(now.getHours())}:${pad(now.getMinutes())}`;
}

/** Add whole days to a YYYY-MM-DD date. */
export function addDays(isoDate: string, days: number): string {
  const [y, m, d] = isoDate.split("-").map(Number);
  const date = new Date(Date.UTC(y ?? 1970, (m ?? 1) - 1, d ?? 1));
  date.setUTCDate(date.getUTCDate() + days);
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

export function timeToMinutes(time: string): number {
  const [h, m] = time.split(":").map(Number);
  return (h ?? 0) * 60 + (m ?? 0);
}

/** End of an appointment as HH:MM; wraps past midnight. */
export function appointmentEndTime(startTime: string, durationMinutes: number): string {
  const total = (timeToMinutes(startTime) + durationMinutes) % (24 * 60);
  return `${pad(Math.floor(total / 60))}:${pad(total % 60)}`;
}

/** Age in whole years on `today` (YYYY-MM-DD), or null without a birth date. */
export function patientAge(dateOfBirth: string | null | undefined, today: string): number | null {
  if (!dateOfBirth || !isValidDate(dateOfBirth)) return null;
  const [by, bm, bd] = dateOfBirth.split("-").map(Number);
  const [ty, tm, td] = today.split("-").map(Number);
  if (by === undefined || bm === undefined || bd === undefined) return null;
  if (ty === undefined || tm === undefined || td === undefined) return null;
  const beforeBirthday = tm < bm || (tm === bm && td < bd);
  return ty - by - (beforeBirthday ? 1 : 0);
}

// ── Display ────────────────────────────────────────────────

export function formatCurrency(amount: number, currency = "USD"): string {
  return new Intl.NumberFormat("en-US", { style: "currency", currency }).format(amount);
}

export function formatPhone(phone: string | null | undefined): string {
  if (!phone) return "";
  const digits = phone.replace(/\D/g, "");
  if (digits.length === 10) {
    return `(${digits.slice(0, 3)}) ${digits.slice(3, 6)}-${digits.slice(6)}`;
  }
  if (digits.length === 11 && digits.startsWith("1")) {
    return `+1 (${digits.slice(1, 4)}) ${digits.slice(4, 7)}-${digits.slice(7)}`;
  }
  return phone;
}

export function fullName(person: { firstName: string; lastName: string }): string {
  return `${person.firstName} ${person.lastName}`.trim();
}
