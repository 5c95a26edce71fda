import { describe, expect, it } from "vitest";

import { useTestDb } from "../testing/fixtures.ts";
import { listAuditLogs, writeAuditLog } from "./logger.ts";

describe("audit trail", () => {
  useTestDb();

  it("stores entries with a string resource id and JSON detail", () => {
    writeAuditLog(
      { operatorId: 7, operatorName: "frontdesk" },
      { action: "create", resourceType: "patient", resourceId: 12, detail: { method: "patients.create" } },
    );

    const [entry] = listAuditLogs();
    expect(entry).toMatchObject({
      operatorId: 7,
      operatorName: "frontdesk",
      action: "create",
      resourceType: "patient",
      resourceId: "12",
      detail: { method: "patients.create" },
    });
  });

  it("filters by resource and operator, newest first", () => {
    writeAuditLog({ operatorId: 1 }, { action: "create", resourceType: "invoice", resourceId: 5 });
    writeAuditLog({ operatorId: 2 }, { action: "pay", resourceType: "invoice", resourceId: 5 });
    writeAuditLog({ operatorId: 2 }, { action: "login", resourceType: "session" });

    expect(listAuditLogs({ resourceType: "invoice", resourceId: "5" }).map((e) => e.action)).toEqual(["pay", "create"]);
    expect(listAuditLogs({ operatorId: 2 }).map((e) => e.action)).toEqual(["login", "pay"]);
    expect(listAuditLogs({ limit: 1 }).map((e) => e.resourceId)).toEqual([null]);
  });
});
