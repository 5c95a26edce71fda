/**
 * ClinicDesk - Configuration Schema
 *
 * Validated with Zod. Values come from built-in defaults, an optional JSON file
 * named by CLINICDESK_CONFIG, and CLINICDESK_* environment variables (highest
 * precedence).
 */

import { readFileSync } from "node:fs";
import { z } from "zod";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export const clinicConfigSchema = z
  .object({
    /** Clinic identity */
    clinic: z
      .object({
        name: z.string().default("Dental Clinic"),
        address: z.string().optional(),
        phone: z.string().optional(),
        timezone: z.string().default("UTC"),
        currency: z.string().length(3).default("USD"),
      })
      .default({}),

    /** SQLite database file (":memory:" for a throwaway database) */
    database: z
      .object({
        path: z.string().min(1).default("dental_clinic.db"),
      })
      .default({}),

    billing: z
      .object({
        /** Fraction of the subtotal charged as tax, e.g. 0.08 */
        taxRate: z.number().min(0).max(1).default(0),
        paymentTermsDays: z.number().int().min(0).default(30),
        paymentTerms: z.string().default("Net 30"),
        invoicePrefix: z.string().regex(/^[A-Z]{2,6}$/).default("INV"),
      })
      .default({}),

    security: z
      .object({
        /** HMAC secret for API tokens; required only when the HTTP API runs */
        jwtSecret: z.string().min(8).optional(),
        accessTokenTtlSeconds: z.number().int().positive().default(60 * 60),
        refreshTokenTtlSeconds: z.number().int().positive().default(60 * 60 * 24 * 7),
        maxLoginAttempts: z.number().int().positive().default(5),
        lockoutDurationMinutes: z.number().int().positive().default(15),
      })
      .default({}),

    server: z
      .object({
        host: z.string().default("127.0.0.1"),
        port: z.number().int().min(0).max(65535).default(4780),
      })
      .default({}),

    logging: z
      .object({
        level: z.enum(LOG_LEVELS).default("info"),
      })
      .default({}),
  })
  .default({});

export type ClinicConfig = z.infer<typeof clinicConfigSchema>;
export type ClinicConfigInput = z.input<typeof clinicConfigSchema>;

type Plain = { [key: string]: unknown };

export type ConfigWarning = (message: string, issues: z.ZodIssue[]) => void;

/**
 * Parse a raw config object. Invalid input is reported through `onInvalid`
 * and replaced by the defaults.
 */
export function loadClinicConfig(rawConfig?: unknown, onInvalid?: ConfigWarning): ClinicConfig {
  const parsed = clinicConfigSchema.safeParse(rawConfig ?? {});
  if (!parsed.success) {
    onInvalid?.("Invalid clinic config, using defaults", parsed.error.issues);
    return clinicConfigSchema.parse({});
  }
  return parsed.data;
}

function envNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

/** Config fragment taken from CLINICDESK_* environment variables. */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Plain {
  const fragment = {
    clinic: { name: env.CLINICDESK_CLINIC_NAME, currency: env.CLINICDESK_CURRENCY },
    database: { path: env.CLINICDESK_DB_PATH },
    billing: {
      taxRate: envNumber(env.CLINICDESK_TAX_RATE),
      paymentTermsDays: envNumber(env.CLINICDESK_PAYMENT_TERMS_DAYS),
    },
    security: {
      jwtSecret: env.CLINICDESK_JWT_SECRET,
      maxLoginAttempts: envNumber(env.CLINICDESK_MAX_LOGIN_ATTEMPTS),
    },
    server: { host: env.CLINICDESK_HOST, port: envNumber(env.CLINICDESK_PORT) },
    logging: { level: env.CLINICDESK_LOG_LEVEL },
  };
  return pruneUndefined(fragment);
}

function isPlain(value: unknown): value is Plain {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pruneUndefined(obj: Plain): Plain {
  const out: Plain = {};
  for (const [key, value] of Object.entries(obj)) {
    if (value === undefined) continue;
    out[key] = isPlain(value) ? pruneUndefined(value) : value;
  }
  return out;
}

/** Deep merge of plain objects; later sources win. */
export function mergeConfig(...sources: unknown[]): Plain {
  const out: Plain = {};
  for (const source of sources) {
    if (!isPlain(source)) continue;
    for (const [key, value] of Object.entries(source)) {
      const current = out[key];
      out[key] = isPlain(current) && isPlain(value) ? mergeConfig(current, value) : value;
    }
  }
  return out;
}

/**
 * Resolve the effective config: defaults, then the JSON file named by
 * CLINICDESK_CONFIG, then environment variables.
 */
export function resolveClinicConfig(
  env: NodeJS.ProcessEnv = process.env,
  onInvalid?: ConfigWarning,
): ClinicConfig {
  const fromFile: unknown = env.CLINICDESK_CONFIG
    ? JSON.parse(readFileSync(env.CLINICDESK_CONFIG, "utf8"))
    : {};
  return loadClinicConfig(mergeConfig(fromFile, configFromEnv(env)), onInvalid);
}
