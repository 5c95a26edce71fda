/**
 * ClinicDesk - Shared parameter schemas
 */

import { Type, type TLiteral, type TUnion } from "@sinclair/typebox";

/** A union of string literals from one of the schema's closed sets. */
export function literalUnion<T extends string>(values: readonly T[]): TUnion<TLiteral<T>[]> {
  return Type.Union(values.map((value) => Type.Literal(value)));
}

export const Id = Type.Integer({ minimum: 1 });

export const IsoDate = Type.String({ pattern: "^\\d{4}-\\d{2}-\\d{2}$", description: "YYYY-MM-DD" });

export const ClockTime = Type.String({ pattern: "^\\d{2}:\\d{2}$", description: "HH:MM" });

export const OptionalText = Type.Optional(Type.Union([Type.String(), Type.Null()]));

export const Money = Type.Number({ minimum: 0 });

export const ById = Type.Object({ id: Id });

export const NoParams = Type.Object({});
