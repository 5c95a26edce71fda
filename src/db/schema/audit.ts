/**
 * ClinicDesk - Audit Log Schema
 *
 * Append-only trail of every mutation made through the gateway.
 */

import { sql } from "drizzle-orm";
import { sqliteTable, integer, text, index } from "drizzle-orm/sqlite-core";

export const auditLogs = sqliteTable(
  "audit_logs",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    operatorId: integer("operator_id"),
    operatorName: text("operator_name"),
    action: text("action").notNull(),
    // create, update, deactivate, status, pay, cancel, login, logout, ...
    resourceType: text("resource_type").notNull(),
    resourceId: text("resource_id"),
    detail: text("detail", { mode: "json" }).$type<Record<string, unknown>>(),
    createdAt: text("created_at").default(sql`CURRENT_TIMESTAMP`).notNull(),
  },
  (table) => [index("idx_audit_resource").on(table.resourceType, table.resourceId)],
);

export type AuditLog = typeof auditLogs.$inferSelect;
export type NewAuditLog = typeof auditLogs.$inferInsert;
