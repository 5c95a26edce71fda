/**
 * ClinicDesk - Treatment Catalog
 */

import { and, asc, eq, sql, type SQL } from "drizzle-orm";

import { getDb } from "../db/connection.ts";
import { treatments, type Treatment, type TreatmentCategory } from "../db/schema/treatments.ts";
import { roundMoney } from "../domain/billing.ts";
import { FieldChecker } from "../domain/validators.ts";
import { ValidationError, withDbErrors } from "../errors.ts";
import { createLogger } from "../logger.ts";
import { actorOf, blankToNull, found, type WriteContext } from "./context.ts";

const log = createLogger("treatments");

export type TreatmentInput = {
  name: string;
  description?: string | null;
  category?: TreatmentCategory;
  duration?: number;
  baseCost: number;
};

export type TreatmentUpdate = Partial<TreatmentInput>;

function checkTreatment(input: TreatmentUpdate, creating: boolean): void {
  const checker = new FieldChecker();
  if (creating || input.name !== undefined) checker.required("name", input.name, "Treatment name");
  if (creating || input.baseCost !== undefined) {
    checker.check(
      input.baseCost !== undefined && Number.isFinite(input.baseCost) && input.baseCost >= 0,
      "baseCost",
      "Base cost cannot be negative",
    );
  }
  if (input.duration !== undefined) {
    checker.check(
      Number.isInteger(input.duration) && input.duration > 0 && input.duration <= 480,
      "duration",
      "Duration must be between 1 and 480 minutes",
    );
  }
  if (!checker.ok) throw ValidationError.fromIssues(checker.issues);
}

export function createTreatment(input: TreatmentInput, ctx: WriteContext = {}): Treatment {
  checkTreatment(input, true);

  const created = withDbErrors(() =>
    getDb()
      .insert(treatments)
      .values({
        name: input.name.trim(),
        description: blankToNull(input.description),
        category: input.category,
        duration: input.duration,
        baseCost: roundMoney(input.baseCost),
        createdBy: actorOf(ctx),
      })
      .returning()
      .get(),
  );
  log.info({ treatmentId: created.id, name: created.name }, "Treatment added to catalog");
  return created;
}

export function getTreatment(id: number): Treatment {
  const row = getDb().select().from(treatments).where(eq(treatments.id, id)).get();
  return found(row, "Treatment", id);
}

export function listTreatments(options: { category?: TreatmentCategory; includeInactive?: boolean } = {}): Treatment[] {
  const filters: SQL[] = [];
  if (!options.includeInactive) filters.push(eq(treatments.isActive, true));
  if (options.category) filters.push(eq(treatments.category, options.category));

  return getDb()
    .select()
    .from(treatments)
    .where(and(...filters))
    .orderBy(asc(treatments.name))
    .all();
}

export function updateTreatment(id: number, input: TreatmentUpdate): Treatment {
  checkTreatment(input, false);

  const row = withDbErrors(() =>
    getDb()
      .update(treatments)
      .set({
        name: input.name?.trim(),
        description: blankToNull(input.description),
        category: input.category,
        duration: input.duration,
        baseCost: input.baseCost === undefined ? undefined : roundMoney(input.baseCost),
        updatedAt: sql`CURRENT_TIMESTAMP`,
      })
      .where(eq(treatments.id, id))
      .returning()
      .get(),
  );
  return found(row, "Treatment", id);
}

/** Retire a treatment; records that reference it keep their link. */
export function deactivateTreatment(id: number): Treatment {
  const row = getDb()
    .update(treatments)
    .set({ isActive: false, updatedAt: sql`CURRENT_TIMESTAMP` })
    .where(eq(treatments.id, id))
    .returning()
    .get();
  log.info({ treatmentId: id }, "Treatment deactivated");
  return found(row, "Treatment", id);
}
