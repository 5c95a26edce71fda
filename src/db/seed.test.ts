import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { pathToFileURL } from "node:url";
import { describe, expect, it } from "vitest";

import { listTreatments } from "../repositories/treatments.ts";
import { authenticateUser, listUsers } from "../repositories/users.ts";
import { NOW, addTreatment, useTestDb } from "../testing/fixtures.ts";
import { loadTreatmentCatalog, seedDatabase } from "./seed.ts";

describe("seedDatabase", () => {
  useTestDb();

  it("creates the default staff and the catalog once", async () => {
    const catalogSize = loadTreatmentCatalog().length;

    await expect(seedDatabase()).resolves.toEqual({ users: 3, treatments: catalogSize });
    await expect(seedDatabase()).resolves.toEqual({ users: 0, treatments: 0 });

    expect(listUsers().map((u) => u.role).sort()).toEqual(["admin", "doctor", "receptionist"]);
    expect(listTreatments()).toHaveLength(catalogSize);
    await expect(
      authenticateUser("admin", "admin123", { maxLoginAttempts: 5, lockoutDurationMinutes: 15 }, { now: NOW }),
    ).resolves.toMatchObject({ role: "admin" });
  });

  it("skips treatments that already exist by name", async () => {
    addTreatment({ name: "routine checkup", baseCost: 60 });
    const catalogSize = loadTreatmentCatalog().length;
    await expect(seedDatabase()).resolves.toMatchObject({ treatments: catalogSize - 1 });
    expect(listTreatments().find((t) => t.name === "routine checkup")?.baseCost).toBe(60);
  });
});

describe("loadTreatmentCatalog", () => {
  it("rejects a catalog entry with a bad category", () => {
    const dir = mkdtempSync(join(tmpdir(), "clinicdesk-seed-"));
    const file = join(dir, "treatments.json");
    writeFileSync(file, JSON.stringify([{ name: "Sealant", category: "magic", duration: 10, baseCost: 45 }]));
    const bad = pathToFileURL(file);
    try {
      expect(() => loadTreatmentCatalog(bad)).toThrow("[seed] Invalid treatment catalog at /0/category");
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
