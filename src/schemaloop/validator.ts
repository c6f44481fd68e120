import type { z } from "zod";

import { compileSchema, type CompiledSchema } from "./compiler.js";
import { isRecord, parseJsonDocument, valueAt, withoutPrototypes } from "./json.js";
import type { SchemaDefinition } from "./schema.js";
import type {
  Instance,
  OutputValidator,
  ValidationError,
  ValidationOutcome,
} from "./types.js";

export interface ResponseValidatorOptions {
  /** Report keys the schema does not declare instead of dropping them. */
  strictUnknownFields?: boolean;
}

function describeReceived(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "number" && !Number.isInteger(value)) return "float";
  return typeof value;
}

/**
 * Translate zod issues into validation errors. Paths are reported relative
 * to `basePath`; observed values are read back from the parsed document.
 */
export function toValidationErrors(
  issues: readonly z.ZodIssue[],
  document: unknown,
  basePath: readonly string[] = []
): ValidationError[] {
  const errors: ValidationError[] = [];

  for (const issue of issues) {
    const path = issue.path.map(String);

    if (issue.code === "unrecognized_keys") {
      for (const key of issue.keys) {
        errors.push({
          kind: "UnknownField",
          fieldPath: [...basePath, ...path, key],
          message: "unknown field",
          observedValue: valueAt(document, [...path, key]),
        });
      }
      continue;
    }

    const observedValue = valueAt(document, path);
    const fieldPath = [...basePath, ...path];

    if (observedValue === undefined) {
      errors.push({ kind: "MissingField", fieldPath, message: "missing required field" });
      continue;
    }

    let message: string;
    switch (issue.code) {
      case "invalid_type":
        message = `expected ${issue.expected}, received ${describeReceived(observedValue)}`;
        break;
      case "invalid_enum_value":
        message = `expected one of ${issue.options
          .map((option) => JSON.stringify(option))
          .join(" | ")}, received ${JSON.stringify(observedValue)}`;
        break;
      default:
        message = issue.message;
    }
    errors.push({ kind: "TypeMismatch", fieldPath, message, observedValue });
  }

  return errors;
}

/**
 * Parses raw backend output and checks it against a compiled schema.
 */
export class ResponseValidator implements OutputValidator<Instance> {
  readonly compiled: CompiledSchema;
  readonly strictUnknownFields: boolean;

  constructor(compiled: CompiledSchema, options: ResponseValidatorOptions = {}) {
    this.compiled = compiled;
    this.strictUnknownFields = options.strictUnknownFields ?? false;
  }

  /**
   * Validate raw text. Unparsable text yields a single `ParseFailure` at the
   * document root; nothing is partially accepted.
   */
  validate(rawOutput: string): ValidationOutcome<Instance> {
    const parsed = parseJsonDocument(rawOutput);
    if (!parsed.ok) {
      return {
        ok: false,
        errors: [{ kind: "ParseFailure", fieldPath: [], message: parsed.reason }],
      };
    }
    return this.validateDocument(parsed.document);
  }

  /**
   * Validate an already-parsed document. Errors are prefixed with `basePath`.
   */
  validateDocument(
    document: unknown,
    basePath: readonly string[] = []
  ): ValidationOutcome<Instance> {
    if (!isRecord(document)) {
      return {
        ok: false,
        errors: [
          {
            kind: "ParseFailure",
            fieldPath: [...basePath],
            message: `expected a JSON object, received ${describeReceived(document)}`,
            observedValue: document,
          },
        ],
      };
    }

    const parser = this.strictUnknownFields
      ? this.compiled.validators.strict
      : this.compiled.validators.permissive;
    const result = parser.safeParse(withoutPrototypes(document));
    if (result.success) {
      return { ok: true, value: result.data };
    }
    return { ok: false, errors: toValidationErrors(result.error.issues, document, basePath) };
  }
}

/**
 * One-off validation without a compilation cache.
 */
export function validateResponse(
  rawOutput: string,
  schema: SchemaDefinition,
  options: ResponseValidatorOptions = {}
): ValidationOutcome<Instance> {
  return new ResponseValidator(compileSchema(schema), options).validate(rawOutput);
}
