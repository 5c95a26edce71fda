/**
 * ClinicDesk - Dashboard & Reports Extension
 */

import { Type } from "@sinclair/typebox";

import { listAuditLogs } from "../../src/audit/logger.ts";
import { isClinician } from "../../src/auth/rbac.ts";
import { toIsoDate } from "../../src/domain/validators.ts";
import { AuthenticationError } from "../../src/errors.ts";
import { Id, IsoDate } from "../../src/gateway/schemas.ts";
import type { ClinicPlugin, ClinicPluginApi } from "../../src/gateway/types.ts";
import { getDailyReport, getDashboard } from "../../src/repositories/dashboard.ts";

const dashboardPlugin: ClinicPlugin = {
  id: "dashboard",
  name: "Dashboard & Reports",
  description: "Role home screen statistics, daily report and audit trail",
  version: "1.0.0",

  register(api: ClinicPluginApi) {
    api.logger.info("Dashboard plugin registering...");

    api.registerGatewayMethod("dashboard.get", {
      description: "Statistic cards and today's appointments for the signed-in role",
      permission: { resource: "dashboard", action: "read" },
      params: Type.Object({ date: Type.Optional(IsoDate) }),
      handler(params, { session, write }) {
        if (!session) throw new AuthenticationError("Authentication required");
        return getDashboard(session.role, {
          today: params.date ?? toIsoDate(write.now),
          // Doctors and dentists see their own numbers.
          dentistId: isClinician(session.role) ? session.userId : undefined,
        });
      },
    });

    api.registerGatewayMethod("reports.daily", {
      description: "Invoiced, collected and outstanding totals for one day",
      permission: { resource: "reports", action: "read" },
      params: Type.Object({ date: Type.Optional(IsoDate) }),
      handler(params, { write }) {
        return getDailyReport(params.date ?? toIsoDate(write.now));
      },
    });

    api.registerGatewayMethod("audit.list", {
      permission: { resource: "audit", action: "read" },
      params: Type.Object({
        resourceType: Type.Optional(Type.String()),
        resourceId: Type.Optional(Type.Union([Type.String(), Type.Integer()])),
        operatorId: Type.Optional(Id),
        limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 1000 })),
      }),
      handler(params) {
        return { entries: listAuditLogs(params) };
      },
    });

    api.logger.info("Dashboard plugin registered (RPC: dashboard.get, reports.daily, audit.list)");
  },
};

export default dashboardPlugin;
