/**
 * ClinicDesk - Audit Trail
 *
 * Append-only record of who changed what. The gateway writes one entry per
 * successful audited method; logins and logouts are written by the auth
 * plugin.
 */

import { and, desc, eq, type SQL } from "drizzle-orm";

import { getDb, type DbExecutor } from "../db/connection.ts";
import { auditLogs, type AuditLog, type NewAuditLog } from "../db/schema/audit.ts";

export type AuditContext = {
  operatorId: number | null;
  operatorName?: string;
};

export type AuditEntry = {
  action: string;
  resourceType: string;
  resourceId?: string | number | null;
  detail?: Record<string, unknown>;
};

export type AuditQuery = {
  resourceType?: string;
  resourceId?: string | number;
  operatorId?: number;
  limit?: number;
};

function toRecord(ctx: AuditContext, entry: AuditEntry): NewAuditLog {
  return {
    operatorId: ctx.operatorId,
    operatorName: ctx.operatorName,
    action: entry.action,
    resourceType: entry.resourceType,
    resourceId: entry.resourceId == null ? null : String(entry.resourceId),
    detail: entry.detail,
  };
}

/**
 * Write a single audit log entry.
 */
export function writeAuditLog(ctx: AuditContext, entry: AuditEntry, db: DbExecutor = getDb()): void {
  db.insert(auditLogs).values(toRecord(ctx, entry)).run();
}

/** Most recent entries first. */
export function listAuditLogs(query: AuditQuery = {}): AuditLog[] {
  const filters: SQL[] = [];
  if (query.resourceType) filters.push(eq(auditLogs.resourceType, query.resourceType));
  if (query.resourceId !== undefined) filters.push(eq(auditLogs.resourceId, String(query.resourceId)));
  if (query.operatorId !== undefined) filters.push(eq(auditLogs.operatorId, query.operatorId));

  return getDb()
    .select()
    .from(auditLogs)
    .where(and(...filters))
    .orderBy(desc(auditLogs.id))
    .limit(query.limit ?? 100)
    .all();
}
