/**
 * ClinicDesk - Error Types
 *
 * Every error raised on purpose by the data access layer, the domain rules
 * or the gateway is a ClinicError carrying a stable code and an HTTP-style
 * status. Messages are written to be shown to the person at the desk.
 */

import Database from "better-sqlite3";

export type SafeErrorDetails = {
  code: string;
  message: string;
  statusCode: number;
  details?: unknown;
};

export class ClinicError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly details: unknown;

  constructor(message: string, code: string, statusCode = 500, details?: unknown) {
    super(message);
    this.name = "ClinicError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }

  toSafeError(): SafeErrorDetails {
    const safe: SafeErrorDetails = {
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
    };
    if (this.details !== undefined) safe.details = this.details;
    return safe;
  }
}

export type FieldIssue = { field: string; message: string };

export class ValidationError extends ClinicError {
  readonly issues: FieldIssue[];

  constructor(message: string, issues: FieldIssue[] = []) {
    super(message, "VALIDATION_ERROR", 400, issues.length > 0 ? issues : undefined);
    this.name = "ValidationError";
    this.issues = issues;
  }

  /** Build from a list of issues; the first one becomes the message. */
  static fromIssues(issues: FieldIssue[]): ValidationError {
    const first = issues[0];
    return new ValidationError(first ? first.message : "Invalid input", issues);
  }
}

export class NotFoundError extends ClinicError {
  constructor(resource: string, id: number | string) {
    super(`${resource} not found: ${id}`, "NOT_FOUND", 404, { resource, id });
    this.name = "NotFoundError";
  }
}

export type ConstraintKind = "unique" | "check" | "foreign_key" | "not_null" | "other";

export class ConstraintError extends ClinicError {
  readonly kind: ConstraintKind;

  constructor(message: string, kind: ConstraintKind, cause?: unknown) {
    super(message, "CONSTRAINT_VIOLATION", 409, { kind });
    this.name = "ConstraintError";
    this.kind = kind;
    this.cause = cause;
  }
}

export class AuthenticationError extends ClinicError {
  constructor(message = "Invalid username or password") {
    super(message, "AUTHENTICATION_ERROR", 401);
    this.name = "AuthenticationError";
  }
}

export class AccountLockedError extends ClinicError {
  readonly lockedUntil: string;

  constructor(lockedUntil: string) {
    super("Account temporarily locked", "ACCOUNT_LOCKED", 423, { lockedUntil });
    this.name = "AccountLockedError";
    this.lockedUntil = lockedUntil;
  }
}

export class ForbiddenError extends ClinicError {
  constructor(required: string) {
    super(`Not permitted: ${required}`, "FORBIDDEN", 403, { required });
    this.name = "ForbiddenError";
  }
}

export class InvalidTransitionError extends ClinicError {
  constructor(from: string, to: string) {
    super(`Cannot change appointment status from ${from} to ${to}`, "INVALID_TRANSITION", 409, {
      from,
      to,
    });
    this.name = "InvalidTransitionError";
  }
}

export class OverpaymentError extends ClinicError {
  constructor(amount: number, balanceDue: number) {
    super(
      `Payment of ${amount.toFixed(2)} exceeds the balance due of ${balanceDue.toFixed(2)}`,
      "OVERPAYMENT",
      422,
      { amount, balanceDue },
    );
    this.name = "OverpaymentError";
  }
}

export class InvoiceStateError extends ClinicError {
  constructor(message: string, status: string) {
    super(message, "INVOICE_STATE", 409, { status });
    this.name = "InvoiceStateError";
  }
}

const CONSTRAINT_CODES: Record<string, ConstraintKind> = {
  SQLITE_CONSTRAINT_UNIQUE: "unique",
  SQLITE_CONSTRAINT_PRIMARYKEY: "unique",
  SQLITE_CONSTRAINT_CHECK: "check",
  SQLITE_CONSTRAINT_FOREIGNKEY: "foreign_key",
  SQLITE_CONSTRAINT_NOTNULL: "not_null",
};

type SqliteError = InstanceType<typeof Database.SqliteError>;

function findSqliteError(err: unknown): SqliteError | undefined {
  let current: unknown = err;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    if (current instanceof Database.SqliteError) return current;
    current = current.cause;
  }
  return undefined;
}

function describeConstraint(kind: ConstraintKind, raw: string): string {
  switch (kind) {
    case "unique": {
      // "UNIQUE constraint failed: users.email"
      const column = raw.split(":")[1]?.trim().split(".").pop();
      return column ? `A record with this ${column} already exists` : "Duplicate value";
    }
    case "check":
      return "A value is outside the allowed set";
    case "foreign_key":
      return "A referenced record does not exist";
    case "not_null": {
      const column = raw.split(":")[1]?.trim().split(".").pop();
      return column ? `${column} is required` : "A required value is missing";
    }
    default:
      return "The change violates a database constraint";
  }
}

/**
 * Translate a SQLite constraint failure into a ConstraintError. Anything else
 * is returned unchanged.
 */
export function fromDbError(err: unknown): unknown {
  if (err instanceof ClinicError) return err;
  const sqliteErr = findSqliteError(err);
  if (!sqliteErr || !sqliteErr.code.startsWith("SQLITE_CONSTRAINT")) return err;
  const kind = CONSTRAINT_CODES[sqliteErr.code] ?? "other";
  return new ConstraintError(describeConstraint(kind, sqliteErr.message), kind, sqliteErr);
}

/** Run a database operation, rethrowing constraint failures as ConstraintError. */
export function withDbErrors<T>(operation: () => T): T {
  try {
    return operation();
  } catch (err) {
    throw fromDbError(err);
  }
}

export function toSafeErrorResponse(err: unknown): SafeErrorDetails {
  if (err instanceof ClinicError) return err.toSafeError();
  return { code: "INTERNAL_ERROR", message: "An unexpected error occurred", statusCode: 500 };
}
