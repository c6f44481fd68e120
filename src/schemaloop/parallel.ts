import { CompilationCache, type CompiledSchema } from "./compiler.js";
import { SchemaDefinitionError } from "./errors.js";
import { isRecord, parseJsonDocument } from "./json.js";
import type { SchemaDefinition } from "./schema.js";
import type {
  Instance,
  OutputValidator,
  PortableSchema,
  ValidationError,
  ValidationOutcome,
} from "./types.js";
import { ResponseValidator, type ResponseValidatorOptions } from "./validator.js";

/**
 * One validated call from a parallel response.
 */
export interface ParallelCall {
  /** Name of the schema the call was validated against. */
  name: string;
  value: Instance;
}

/**
 * Several schemas the backend may answer with in one response, registered by
 * name.
 */
export class ParallelSchemas {
  readonly schemas: readonly SchemaDefinition[];
  private readonly registry: ReadonlyMap<string, SchemaDefinition>;

  constructor(schemas: readonly SchemaDefinition[]) {
    if (schemas.length === 0) {
      throw new Error("At least one schema is required for parallel extraction");
    }
    const registry = new Map<string, SchemaDefinition>();
    for (const schema of schemas) {
      if (registry.has(schema.name)) {
        throw new SchemaDefinitionError(
          "DuplicateSchema",
          `Schema name "${schema.name}" is used more than once`,
          { schemaName: schema.name }
        );
      }
      registry.set(schema.name, schema);
    }
    this.schemas = [...schemas];
    this.registry = registry;
  }

  get names(): string[] {
    return this.schemas.map((schema) => schema.name);
  }

  get(name: string): SchemaDefinition | undefined {
    return this.registry.get(name);
  }

  compile(cache: CompilationCache = new CompilationCache()): CompiledParallelSchemas {
    const compiled = this.schemas.map((schema) => cache.get(schema));
    return {
      portable: compiled.map((entry) => entry.portable),
      promptText: [
        "Respond with a JSON array of calls. Each call is an object " +
          '{"name": <schema name>, "arguments": <object matching that schema>}. ' +
          "Include one call per item found; an empty array means nothing was found.",
        ...compiled.map((entry) => entry.promptText),
      ].join("\n\n"),
      compiled,
    };
  }
}

export interface CompiledParallelSchemas {
  portable: PortableSchema[];
  promptText: string;
  compiled: CompiledSchema[];
}

/**
 * Validates a JSON array of `{ name, arguments }` calls. `arguments` may be
 * an object or a JSON string holding one, as tool-calling APIs return it.
 */
export class ParallelResponseValidator implements OutputValidator<ParallelCall[]> {
  private readonly validators: ReadonlyMap<string, ResponseValidator>;

  constructor(compiled: readonly CompiledSchema[], options: ResponseValidatorOptions = {}) {
    this.validators = new Map(
      compiled.map((entry) => [entry.schema.name, new ResponseValidator(entry, options)])
    );
  }

  validate(rawOutput: string): ValidationOutcome<ParallelCall[]> {
    const parsed = parseJsonDocument(rawOutput);
    if (!parsed.ok) {
      return {
        ok: false,
        errors: [{ kind: "ParseFailure", fieldPath: [], message: parsed.reason }],
      };
    }
    if (!Array.isArray(parsed.document)) {
      return {
        ok: false,
        errors: [
          {
            kind: "ParseFailure",
            fieldPath: [],
            message: "expected a JSON array of calls",
            observedValue: parsed.document,
          },
        ],
      };
    }

    const calls: ParallelCall[] = [];
    const errors: ValidationError[] = [];

    parsed.document.forEach((entry: unknown, index: number) => {
      const at = String(index);
      if (!isRecord(entry) || typeof entry.name !== "string") {
        errors.push({
          kind: "TypeMismatch",
          fieldPath: [at],
          message: 'expected a call object with a string "name"',
          observedValue: entry,
        });
        return;
      }

      const validator = this.validators.get(entry.name);
      if (!validator) {
        errors.push({
          kind: "UnknownField",
          fieldPath: [at, "name"],
          message: `unknown schema "${entry.name}", expected one of: ${[...this.validators.keys()].join(", ")}`,
          observedValue: entry.name,
        });
        return;
      }

      let args: unknown = entry.arguments;
      if (typeof args === "string") {
        const inner = parseJsonDocument(args);
        if (!inner.ok) {
          errors.push({
            kind: "ParseFailure",
            fieldPath: [at, "arguments"],
            message: inner.reason,
          });
          return;
        }
        args = inner.document;
      }

      const outcome = validator.validateDocument(args, [at]);
      if (outcome.ok) {
        calls.push({ name: entry.name, value: outcome.value });
      } else {
        errors.push(...outcome.errors);
      }
    });

    return errors.length > 0 ? { ok: false, errors } : { ok: true, value: calls };
  }
}
