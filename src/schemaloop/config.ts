import { z } from "zod";

import { ExtractionConfigError } from "./errors.js";
import type { LogLevel } from "./logger.js";

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BACKEND_RETRY_BUDGET = 2;

export const DEFAULT_INSTRUCTIONS =
  "Extract the requested information from the conversation. " +
  "Respond only with JSON matching the schema description below.";

/**
 * Per-call extraction settings.
 */
export const ExtractionConfigSchema = z.object({
  maxAttempts: z
    .number()
    .int()
    .min(1)
    .default(DEFAULT_MAX_ATTEMPTS)
    .describe("Upper bound on generate-and-validate attempts."),
  backendRetryBudget: z
    .number()
    .int()
    .min(0)
    .default(DEFAULT_BACKEND_RETRY_BUDGET)
    .describe("Re-invocations allowed per attempt after a transient backend failure."),
  strictUnknownFields: z
    .boolean()
    .default(false)
    .describe("Report keys the schema does not declare."),
  instructions: z
    .string()
    .default(DEFAULT_INSTRUCTIONS)
    .describe("Instructions placed ahead of the schema description in the system prompt."),
  backend: z
    .record(z.unknown())
    .default({})
    .describe("Opaque settings passed through to the generation backend."),
  deadline: z
    .union([z.number(), z.date()])
    .optional()
    .describe("Epoch milliseconds or Date after which no further attempt starts."),
  signal: z.instanceof(AbortSignal).optional(),
});

export type ExtractionConfigInput = z.input<typeof ExtractionConfigSchema>;
export type ExtractionConfig = z.output<typeof ExtractionConfigSchema>;

/**
 * Merge client defaults with per-call overrides and validate the result.
 */
export function resolveExtractionConfig(
  defaults: ExtractionConfigInput = {},
  overrides: ExtractionConfigInput = {}
): ExtractionConfig {
  const merged: Record<string, unknown> = { ...defaults };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  const result = ExtractionConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ExtractionConfigError(result.error.issues);
  }
  return result.data;
}

const envFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const EnvSchema = z.object({
  SCHEMALOOP_MAX_ATTEMPTS: z.coerce.number().int().min(1).optional(),
  SCHEMALOOP_BACKEND_RETRY_BUDGET: z.coerce.number().int().min(0).optional(),
  SCHEMALOOP_STRICT_UNKNOWN_FIELDS: envFlag.optional(),
  SCHEMALOOP_LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).optional(),
});

export interface EnvConfig {
  defaults: ExtractionConfigInput;
  logLevel?: LogLevel;
}

/**
 * Read client defaults from environment variables. Unset variables are left
 * to the built-in defaults.
 */
export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): EnvConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ExtractionConfigError(result.error.issues);
  }
  const parsed = result.data;
  const defaults: ExtractionConfigInput = {};
  if (parsed.SCHEMALOOP_MAX_ATTEMPTS !== undefined) {
    defaults.maxAttempts = parsed.SCHEMALOOP_MAX_ATTEMPTS;
  }
  if (parsed.SCHEMALOOP_BACKEND_RETRY_BUDGET !== undefined) {
    defaults.backendRetryBudget = parsed.SCHEMALOOP_BACKEND_RETRY_BUDGET;
  }
  if (parsed.SCHEMALOOP_STRICT_UNKNOWN_FIELDS !== undefined) {
    defaults.strictUnknownFields = parsed.SCHEMALOOP_STRICT_UNKNOWN_FIELDS;
  }
  return { defaults, logLevel: parsed.SCHEMALOOP_LOG_LEVEL };
}

/**
 * Convert a configured deadline to epoch milliseconds.
 */
export function deadlineMillis(deadline: ExtractionConfig["deadline"]): number | undefined {
  if (deadline === undefined) return undefined;
  return deadline instanceof Date ? deadline.getTime() : deadline;
}
