/**
 * ClinicDesk - Shared repository types
 */

import { NotFoundError } from "../errors.ts";

/** Who is making a change, and when. Filled in by the calling layer. */
export type WriteContext = {
  actorId?: number | null;
  /** Defaults to the wall clock; tests pin it. */
  now?: Date;
};

export function nowOf(ctx: WriteContext): Date {
  return ctx.now ?? new Date();
}

export function actorOf(ctx: WriteContext): number | null {
  return ctx.actorId ?? null;
}

/** Narrow a possibly-missing row, throwing NotFoundError. */
export function found<T>(row: T | undefined, resource: string, id: number | string): T {
  if (row === undefined) throw new NotFoundError(resource, id);
  return row;
}

/**
 * Empty strings from a form become NULL in the database; undefined stays
 * undefined so an update leaves the column alone.
 */
export function blankToNull(value: string | null | undefined): string | null | undefined {
  if (value === undefined || value === null) return value;
  const trimmed = value.trim();
  return trimmed === "" ? null : trimmed;
}
