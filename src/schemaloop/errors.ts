import type { z } from "zod";
import type { ExtractionAttempt } from "./types.js";

export type SchemaDefinitionErrorKind =
  | "DuplicateField"
  | "UnsupportedType"
  | "CyclicSchema"
  | "InvalidDefault"
  | "InvalidName"
  | "DuplicateSchema";

/**
 * Raised while a schema is being built. Never retried.
 */
export class SchemaDefinitionError extends Error {
  readonly kind: SchemaDefinitionErrorKind;
  /** Schema the error was raised for, when known. */
  readonly schemaName?: string;
  /** Field the error was raised for, when known. */
  readonly fieldName?: string;

  constructor(
    kind: SchemaDefinitionErrorKind,
    message: string,
    details: { schemaName?: string; fieldName?: string } = {}
  ) {
    super(message);
    this.name = "SchemaDefinitionError";
    this.kind = kind;
    this.schemaName = details.schemaName;
    this.fieldName = details.fieldName;
  }
}

/**
 * The generation backend kept failing past its retry budget.
 */
export class BackendInvocationError extends Error {
  /** Number of backend calls made for the attempt that failed. */
  readonly invocations: number;
  /** Attempts completed before the backend gave up. */
  readonly attempts: ExtractionAttempt[];

  constructor(
    message: string,
    options: { cause: unknown; invocations: number; attempts: ExtractionAttempt[] }
  ) {
    super(message, { cause: options.cause });
    this.name = "BackendInvocationError";
    this.invocations = options.invocations;
    this.attempts = options.attempts;
  }
}

export class ExtractionCancelledError extends Error {
  readonly reason: "deadline" | "aborted";
  readonly attempts: ExtractionAttempt[];

  constructor(reason: "deadline" | "aborted", attempts: ExtractionAttempt[]) {
    super(
      reason === "deadline"
        ? `Extraction deadline elapsed after ${attempts.length} attempt(s)`
        : `Extraction aborted after ${attempts.length} attempt(s)`
    );
    this.name = "ExtractionCancelledError";
    this.reason = reason;
    this.attempts = attempts;
  }
}

export class ExtractionConfigError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(issues: z.ZodIssue[]) {
    super(
      `Invalid extraction config: ${issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ")}`
    );
    this.name = "ExtractionConfigError";
    this.issues = issues;
  }
}

/**
 * Render an unknown thrown value as a message.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
