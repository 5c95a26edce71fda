import { Type } from "@sinclair/typebox";
import { describe, expect, it } from "vitest";

import { listAuditLogs } from "../audit/logger.ts";
import { AuthenticationError, ForbiddenError, NotFoundError, ValidationError } from "../errors.ts";
import { NOW, testConfig, useTestDb } from "../testing/fixtures.ts";
import { Gateway } from "./gateway.ts";
import type { ClinicPlugin, Session } from "./types.ts";

const frontDesk: Session = { userId: 3, username: "frontdesk", role: "receptionist" };
const hygienist: Session = { userId: 4, username: "hy", role: "hygienist" };

const probe: ClinicPlugin = {
  id: "probe",
  name: "Probe",
  description: "Methods for exercising the gateway",
  version: "1.0.0",
  register(api) {
    api.registerGatewayMethod("probe.echo", {
      public: true,
      params: Type.Object({ text: Type.String() }),
      handler: ({ text }, { session, write }) => ({ text, userId: session?.userId ?? null, now: write.now }),
    });
    api.registerGatewayMethod("probe.open", {
      params: Type.Object({}),
      handler: () => "signed in",
    });
    api.registerGatewayMethod("probe.rename", {
      permission: { resource: "patients", action: "update" },
      params: Type.Object({ id: Type.Integer({ minimum: 1 }), name: Type.String({ minLength: 1 }) }),
      handler: ({ id, name }) => ({ id, name }),
      audit: { action: "update", resourceType: "patient", resourceId: (_params, result) => result.id },
    });
    api.registerGatewayMethod("probe.fail", {
      permission: { resource: "patients", action: "update" },
      params: Type.Object({}),
      handler: () => {
        throw new NotFoundError("Patient", 9);
      },
      audit: { action: "update", resourceType: "patient" },
    });
  },
};

function gateway(): Gateway {
  const gw = new Gateway({ config: testConfig(), clock: () => NOW });
  gw.registerPlugins([probe]);
  return gw;
}

async function validationIssues(call: Promise<unknown>) {
  const err = await call.then(
    () => undefined,
    (error: unknown) => error,
  );
  if (!(err instanceof ValidationError)) throw new Error("expected a ValidationError");
  return err;
}

describe("Gateway", () => {
  useTestDb();

  it("runs public methods without a session and passes the pinned clock", async () => {
    await expect(gateway().call("probe.echo", { text: "hi" }, null)).resolves.toEqual({
      text: "hi",
      userId: null,
      now: NOW,
    });
  });

  it("checks existence, then session, then permission", async () => {
    const gw = gateway();
    await expect(gw.call("probe.missing", {}, frontDesk)).rejects.toThrow(NotFoundError);
    await expect(gw.call("probe.open", {}, null)).rejects.toThrow(AuthenticationError);
    await expect(gw.call("probe.rename", { id: 1, name: "x" }, null)).rejects.toThrow("Authentication required");
    // Permission is checked before the params are looked at.
    await expect(gw.call("probe.rename", { id: "bad" }, hygienist)).rejects.toThrow(ForbiddenError);
    await expect(gw.call("probe.rename", { id: 1, name: "x" }, hygienist)).rejects.toThrow(
      "Not permitted: patients:update",
    );
    await expect(gw.call("probe.open", undefined, hygienist)).resolves.toBe("signed in");
  });

  it("reports schema failures by field", async () => {
    const gw = gateway();
    const err = await validationIssues(gw.call("probe.rename", { id: 0, name: "" }, frontDesk));
    expect(err.message).toBe("Invalid parameters for probe.rename");
    expect(err.issues.map((i) => i.field)).toEqual(expect.arrayContaining(["id", "name"]));

    const root = await validationIssues(gw.call("probe.echo", "text", null));
    expect(root.issues.map((i) => i.field)).toContain("params");
  });

  it("audits a successful call with its resource id", async () => {
    await gateway().call("probe.rename", { id: 12, name: "Alice" }, frontDesk);
    expect(listAuditLogs()).toEqual([
      expect.objectContaining({
        operatorId: 3,
        operatorName: "frontdesk",
        action: "update",
        resourceType: "patient",
        resourceId: "12",
        detail: { method: "probe.rename" },
      }),
    ]);
  });

  it("does not audit a failed call", async () => {
    await expect(gateway().call("probe.fail", {}, frontDesk)).rejects.toThrow("Patient not found: 9");
    expect(listAuditLogs()).toEqual([]);
  });

  it("refuses a second registration under the same name", () => {
    const gw = gateway();
    expect(() => gw.registerPlugins([probe])).toThrow("Method already registered: probe.echo");
  });

  it("lists the methods a role may call", () => {
    const gw = gateway();
    expect(gw.listMethods().map((m) => m.name)).toEqual(["probe.echo", "probe.fail", "probe.open", "probe.rename"]);
    expect(gw.methodsFor(hygienist).map((m) => m.name)).toEqual(["probe.echo", "probe.open"]);
    expect(gw.methodsFor(frontDesk).find((m) => m.name === "probe.rename")).toEqual({
      name: "probe.rename",
      description: undefined,
      permission: "patients:update",
      public: false,
    });
  });
});
