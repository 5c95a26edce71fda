import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";

import { configFromEnv, loadClinicConfig, mergeConfig, resolveClinicConfig } from "./clinic-config.ts";

describe("loadClinicConfig", () => {
  it("fills in defaults", () => {
    const config = loadClinicConfig();
    expect(config.database.path).toBe("dental_clinic.db");
    expect(config.billing).toEqual({ taxRate: 0, paymentTermsDays: 30, paymentTerms: "Net 30", invoicePrefix: "INV" });
    expect(config.security.maxLoginAttempts).toBe(5);
    expect(config.security.lockoutDurationMinutes).toBe(15);
    expect(config.security.jwtSecret).toBeUndefined();
    expect(config.server).toEqual({ host: "127.0.0.1", port: 4780 });
  });

  it("keeps valid overrides", () => {
    const config = loadClinicConfig({ billing: { taxRate: 0.08 }, clinic: { name: "Smile Dental" } });
    expect(config.billing.taxRate).toBe(0.08);
    expect(config.billing.paymentTermsDays).toBe(30);
    expect(config.clinic.name).toBe("Smile Dental");
  });

  it("falls back to defaults and warns on invalid input", () => {
    const onInvalid = vi.fn();
    const config = loadClinicConfig({ billing: { taxRate: 2 } }, onInvalid);
    expect(config.billing.taxRate).toBe(0);
    expect(onInvalid).toHaveBeenCalledTimes(1);
    expect(onInvalid.mock.calls[0]?.[0]).toBe("Invalid clinic config, using defaults");
  });
});

describe("configFromEnv", () => {
  it("reads CLINICDESK_* variables and skips unset or non-numeric ones", () => {
    expect(
      configFromEnv({ CLINICDESK_TAX_RATE: "0.07", CLINICDESK_PORT: "abc", CLINICDESK_DB_PATH: "/data/clinic.db" }),
    ).toEqual({
      clinic: {},
      database: { path: "/data/clinic.db" },
      billing: { taxRate: 0.07 },
      security: {},
      server: {},
      logging: {},
    });
  });
});

describe("mergeConfig", () => {
  it("merges nested objects with later sources winning", () => {
    expect(mergeConfig({ billing: { taxRate: 0.05, paymentTermsDays: 14 } }, { billing: { taxRate: 0.1 } }, null)).toEqual(
      { billing: { taxRate: 0.1, paymentTermsDays: 14 } },
    );
  });
});

describe("resolveClinicConfig", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("layers the config file under environment variables", () => {
    dir = mkdtempSync(join(tmpdir(), "clinicdesk-"));
    const file = join(dir, "clinic.json");
    writeFileSync(file, JSON.stringify({ billing: { taxRate: 0.05, invoicePrefix: "DENT" }, security: { maxLoginAttempts: 10 } }));

    const config = resolveClinicConfig({ CLINICDESK_CONFIG: file, CLINICDESK_MAX_LOGIN_ATTEMPTS: "3" });
    expect(config.billing.taxRate).toBe(0.05);
    expect(config.billing.invoicePrefix).toBe("DENT");
    expect(config.security.maxLoginAttempts).toBe(3);
  });
});
