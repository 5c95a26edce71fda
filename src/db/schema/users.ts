/**
 * ClinicDesk - User Schema
 *
 * Clinic staff accounts. Roles are a closed set; doctor and dentist are
 * treated alike everywhere a clinician is expected.
 */

import { sql } from "drizzle-orm";
import { sqliteTable, integer, text, uniqueIndex } from "drizzle-orm/sqlite-core";

export const USER_ROLES = ["admin", "doctor", "dentist", "hygienist", "receptionist", "staff"] as const;
export type UserRole = (typeof USER_ROLES)[number];

export const CLINICIAN_ROLES = ["doctor", "dentist"] as const satisfies readonly UserRole[];

export const users = sqliteTable(
  "users",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    username: text("username").notNull(),
    passwordHash: text("password_hash").notNull(),
    firstName: text("first_name").notNull(),
    lastName: text("last_name").notNull(),
    email: text("email").notNull(),
    role: text("role", { enum: USER_ROLES }).default("staff").notNull(),
    isActive: integer("is_active", { mode: "boolean" }).default(true).notNull(),
    failedLoginAttempts: integer("failed_login_attempts").default(0).notNull(),
    lockedUntil: text("locked_until"), // ISO timestamp
    lastLogin: text("last_login"),
    refreshToken: text("refresh_token"),
    createdAt: text("created_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
    updatedAt: text("updated_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
  },
  (table) => [
    uniqueIndex("users_username_unique").on(table.username),
    uniqueIndex("users_email_unique").on(table.email),
  ],
);

export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;

/** A user row without credentials, safe to hand to callers. */
export type PublicUser = Omit<User, "passwordHash" | "refreshToken">;
