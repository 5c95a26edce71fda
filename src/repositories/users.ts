/**
 * ClinicDesk - User Accounts
 *
 * Account CRUD and the login check. Accounts are deactivated, never deleted,
 * so appointments and records keep a valid dentist/creator reference.
 */

import { and, asc, eq, inArray, sql } from "drizzle-orm";

import { getDb } from "../db/connection.ts";
import { users, CLINICIAN_ROLES, type PublicUser, type User, type UserRole } from "../db/schema/users.ts";
import { hashPassword, needsRehash, verifyPassword, MIN_PASSWORD_LENGTH } from "../auth/password.ts";
import { FieldChecker } from "../domain/validators.ts";
import { AccountLockedError, AuthenticationError, ValidationError, withDbErrors } from "../errors.ts";
import { createLogger } from "../logger.ts";
import { found, nowOf, type WriteContext } from "./context.ts";

const log = createLogger("users");

export type CreateUserInput = {
  username: string;
  password: string;
  firstName: string;
  lastName: string;
  email: string;
  role?: UserRole;
};

export type UpdateUserInput = {
  firstName?: string;
  lastName?: string;
  email?: string;
};

export type LoginPolicy = {
  maxLoginAttempts: number;
  lockoutDurationMinutes: number;
};

export function toPublicUser(user: User): PublicUser {
  const { passwordHash: _passwordHash, refreshToken: _refreshToken, ...rest } = user;
  return rest;
}

function checkPassword(password: string): void {
  if (password.length < MIN_PASSWORD_LENGTH) {
    throw new ValidationError(`Password must be at least ${MIN_PASSWORD_LENGTH} characters`, [
      { field: "password", message: `Password must be at least ${MIN_PASSWORD_LENGTH} characters` },
    ]);
  }
}

export async function createUser(input: CreateUserInput): Promise<PublicUser> {
  const checker = new FieldChecker()
    .required("username", input.username, "Username")
    .required("firstName", input.firstName, "First name")
    .required("lastName", input.lastName, "Last name")
    .required("email", input.email, "Email")
    .email("email", input.email)
    .check(/^[a-zA-Z0-9._-]*$/.test(input.username), "username", "Username may only contain letters, digits, '.', '_' and '-'");
  if (!checker.ok) throw ValidationError.fromIssues(checker.issues);
  checkPassword(input.password);

  const passwordHash = await hashPassword(input.password);
  const db = getDb();

  const created = withDbErrors(() =>
    db
      .insert(users)
      .values({
        username: input.username.trim(),
        passwordHash,
        firstName: input.firstName.trim(),
        lastName: input.lastName.trim(),
        email: input.email.trim().toLowerCase(),
        role: input.role ?? "staff",
      })
      .returning()
      .get(),
  );

  log.info({ userId: created.id, username: created.username, role: created.role }, "User created");
  return toPublicUser(created);
}

export function getUser(id: number): PublicUser {
  const row = getDb().select().from(users).where(eq(users.id, id)).get();
  return toPublicUser(found(row, "User", id));
}

/** The account behind a session, or undefined once it is deactivated or removed. */
export function findActiveUser(id: number): PublicUser | undefined {
  const row = getDb().select().from(users).where(eq(users.id, id)).get();
  return row?.isActive ? toPublicUser(row) : undefined;
}

export function getUserByUsername(username: string): PublicUser | undefined {
  const row = getDb().select().from(users).where(eq(users.username, username)).get();
  return row ? toPublicUser(row) : undefined;
}

export function listUsers(options: { includeInactive?: boolean } = {}): PublicUser[] {
  const db = getDb();
  const rows = db
    .select()
    .from(users)
    .where(options.includeInactive ? undefined : eq(users.isActive, true))
    .orderBy(asc(users.lastName), asc(users.firstName))
    .all();
  return rows.map(toPublicUser);
}

/** Active doctors and dentists, for appointment and treatment pickers. */
export function listDentists(): PublicUser[] {
  return getDb()
    .select()
    .from(users)
    .where(and(inArray(users.role, [...CLINICIAN_ROLES]), eq(users.isActive, true)))
    .orderBy(asc(users.lastName), asc(users.firstName))
    .all()
    .map(toPublicUser);
}

export function updateUser(id: number, input: UpdateUserInput): PublicUser {
  const checker = new FieldChecker().email("email", input.email);
  if (input.firstName !== undefined) checker.required("firstName", input.firstName, "First name");
  if (input.lastName !== undefined) checker.required("lastName", input.lastName, "Last name");
  if (!checker.ok) throw ValidationError.fromIssues(checker.issues);

  const row = withDbErrors(() =>
    getDb()
      .update(users)
      .set({
        firstName: input.firstName?.trim(),
        lastName: input.lastName?.trim(),
        email: input.email?.trim().toLowerCase(),
        updatedAt: sql`CURRENT_TIMESTAMP`,
      })
      .where(eq(users.id, id))
      .returning()
      .get(),
  );
  return toPublicUser(found(row, "User", id));
}

export function updateUserRole(id: number, role: UserRole): PublicUser {
  const row = withDbErrors(() =>
    getDb()
      .update(users)
      .set({ role, updatedAt: sql`CURRENT_TIMESTAMP` })
      .where(eq(users.id, id))
      .returning()
      .get(),
  );
  const user = found(row, "User", id);
  log.info({ userId: id, role }, "User role updated");
  return toPublicUser(user);
}

export async function changePassword(id: number, newPassword: string): Promise<void> {
  checkPassword(newPassword);
  const passwordHash = await hashPassword(newPassword);
  const row = getDb()
    .update(users)
    .set({ passwordHash, refreshToken: null, updatedAt: sql`CURRENT_TIMESTAMP` })
    .where(eq(users.id, id))
    .returning({ id: users.id })
    .get();
  found(row, "User", id);
  log.info({ userId: id }, "Password changed");
}

function setActive(id: number, isActive: boolean): PublicUser {
  const row = getDb()
    .update(users)
    .set({
      isActive,
      refreshToken: isActive ? undefined : null,
      updatedAt: sql`CURRENT_TIMESTAMP`,
    })
    .where(eq(users.id, id))
    .returning()
    .get();
  return toPublicUser(found(row, "User", id));
}

export function deactivateUser(id: number): PublicUser {
  const user = setActive(id, false);
  log.info({ userId: id }, "User deactivated");
  return user;
}

export function reactivateUser(id: number): PublicUser {
  return setActive(id, true);
}

/**
 * Check a username and password.
 *
 * Unknown and inactive accounts fail exactly like a wrong password. Each wrong
 * password counts towards `maxLoginAttempts`; reaching it locks the account
 * for `lockoutDurationMinutes`. Legacy password hashes are upgraded on a
 * successful login.
 */
export async function authenticateUser(
  username: string,
  password: string,
  policy: LoginPolicy,
  ctx: WriteContext = {},
): Promise<PublicUser> {
  const db = getDb();
  const now = nowOf(ctx);
  const user = db.select().from(users).where(eq(users.username, username)).get();

  if (!user || !user.isActive) {
    log.warn({ username }, "Authentication failed: unknown or inactive user");
    throw new AuthenticationError();
  }

  if (user.lockedUntil && new Date(user.lockedUntil) > now) {
    throw new AccountLockedError(user.lockedUntil);
  }

  const valid = await verifyPassword(password, user.passwordHash);
  if (!valid) {
    const attempts = user.failedLoginAttempts + 1;
    const lock = attempts >= policy.maxLoginAttempts;
    const lockedUntil = lock
      ? new Date(now.getTime() + policy.lockoutDurationMinutes * 60_000).toISOString()
      : null;
    db.update(users)
      .set({ failedLoginAttempts: lock ? 0 : attempts, lockedUntil })
      .where(eq(users.id, user.id))
      .run();
    log.warn({ username, attempts, locked: lock }, "Authentication failed: wrong password");
    throw new AuthenticationError();
  }

  const passwordHash = needsRehash(user.passwordHash) ? await hashPassword(password) : undefined;
  const updated = db
    .update(users)
    .set({
      failedLoginAttempts: 0,
      lockedUntil: null,
      lastLogin: now.toISOString(),
      passwordHash,
    })
    .where(eq(users.id, user.id))
    .returning()
    .get();

  log.info({ userId: user.id, username, rehashed: passwordHash !== undefined }, "User authenticated");
  return toPublicUser(found(updated, "User", user.id));
}

export function setRefreshToken(id: number, token: string | null): void {
  getDb().update(users).set({ refreshToken: token }).where(eq(users.id, id)).run();
}

/** True when `token` is the refresh token currently stored for an active user. */
export function isCurrentRefreshToken(id: number, token: string): boolean {
  const row = getDb()
    .select({ refreshToken: users.refreshToken, isActive: users.isActive })
    .from(users)
    .where(eq(users.id, id))
    .get();
  return row !== undefined && row.isActive && row.refreshToken === token;
}

/** Throws unless `id` is an active doctor or dentist. */
export function requireActiveClinician(id: number, field = "dentistId"): PublicUser {
  const user = getDb().select().from(users).where(eq(users.id, id)).get();
  const clinician = user !== undefined && user.isActive && CLINICIAN_ROLES.some((r) => r === user.role);
  if (!user || !clinician) {
    throw new ValidationError("Dentist must be an active doctor or dentist", [
      { field, message: "Dentist must be an active doctor or dentist" },
    ]);
  }
  return toPublicUser(user);
}

/** Re-check a signed-in user's current password. */
export async function verifyUserPassword(id: number, password: string): Promise<boolean> {
  const row = getDb().select({ passwordHash: users.passwordHash }).from(users).where(eq(users.id, id)).get();
  return row !== undefined && verifyPassword(password, row.passwordHash);
}
