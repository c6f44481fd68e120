import { z } from "zod";

import { deepFreeze } from "./json.js";
import type { FieldSpec, SchemaDefinition, TypeTag } from "./schema.js";
import type { Instance, PortableProperty, PortableSchema } from "./types.js";

/**
 * Zod parser for instances of a compiled schema.
 */
export type InstanceParser = z.ZodType<Instance, z.ZodTypeDef, unknown>;

/**
 * Everything derived from a SchemaDefinition that an extraction run needs.
 */
export interface CompiledSchema {
  schema: SchemaDefinition;
  /** JSON-Schema-shaped rendering handed to the generation backend. */
  portable: PortableSchema;
  /** Human-readable field listing placed in the prompt. */
  promptText: string;
  validators: {
    /** Drops keys the schema does not declare. */
    permissive: InstanceParser;
    /** Reports keys the schema does not declare. */
    strict: InstanceParser;
  };
}

function renderTag(tag: TypeTag): PortableProperty {
  switch (tag.kind) {
    case "string":
    case "integer":
    case "number":
    case "boolean":
      return { type: tag.kind };
    case "enum":
      return { type: "string", enum: [...tag.values] };
    case "array":
      return { type: "array", items: renderTag(tag.items) };
    case "object":
      return {
        type: "object",
        title: tag.schema.name,
        properties: renderProperties(tag.schema),
        required: tag.schema.requiredFields,
      };
  }
}

function renderField(field: FieldSpec): PortableProperty {
  const { type, ...shape } = renderTag(field.type);
  const property: PortableProperty = { type, description: field.description, ...shape };
  if (!field.required) {
    property.default = structuredClone(field.default ?? null);
  }
  return property;
}

function renderProperties(schema: SchemaDefinition): Record<string, PortableProperty> {
  const properties: Record<string, PortableProperty> = {};
  for (const field of schema.fields) {
    properties[field.name] = renderField(field);
  }
  return properties;
}

/**
 * Render a schema in the interchange shape:
 * `{ title, type: "object", properties, required }`.
 */
export function toPortableSchema(schema: SchemaDefinition): PortableSchema {
  return {
    title: schema.name,
    type: "object",
    properties: renderProperties(schema),
    required: schema.requiredFields,
  };
}

export function describeTypeTag(tag: TypeTag): string {
  switch (tag.kind) {
    case "enum":
      return `one of ${tag.values.map((value) => JSON.stringify(value)).join(" | ")}`;
    case "array":
      return `array of ${describeTypeTag(tag.items)}`;
    case "object":
      return `object ${tag.schema.name}`;
    default:
      return tag.kind;
  }
}

function nestedSchemaOf(tag: TypeTag): SchemaDefinition | undefined {
  if (tag.kind === "array") return nestedSchemaOf(tag.items);
  return tag.kind === "object" ? tag.schema : undefined;
}

function fieldLines(schema: SchemaDefinition, depth: number): string[] {
  const indent = "  ".repeat(depth);
  const lines: string[] = [];
  for (const field of schema.fields) {
    const status = field.required
      ? "required"
      : `optional, default ${JSON.stringify(field.default ?? null)}`;
    const description = field.description ? `: ${field.description}` : "";
    lines.push(`${indent}- ${field.name} (${describeTypeTag(field.type)}, ${status})${description}`);

    const nested = nestedSchemaOf(field.type);
    if (nested) {
      lines.push(...fieldLines(nested, depth + 1));
    }
  }
  return lines;
}

/**
 * Render the field listing used in prompts, in declaration order.
 */
export function toPromptText(schema: SchemaDefinition): string {
  const header = schema.doc ? `${schema.name}: ${schema.doc}` : schema.name;
  return [header, "Fields:", ...fieldLines(schema, 0)].join("\n");
}

function parserForTag(tag: TypeTag, strict: boolean): z.ZodTypeAny {
  switch (tag.kind) {
    case "string":
      return z.string();
    case "integer":
      return z.number().int();
    case "number":
      return z.number();
    case "boolean":
      return z.boolean();
    case "array":
      return z.array(parserForTag(tag.items, strict));
    case "enum": {
      const [first = "", ...rest] = tag.values;
      return z.enum([first, ...rest]);
    }
    case "object":
      return parserForSchema(tag.schema, strict);
  }
}

/**
 * Build the zod parser for a schema. Numeric strings are never coerced;
 * explicit `null` is only accepted by optional fields whose default is null.
 */
export function parserForSchema(schema: SchemaDefinition, strict: boolean): InstanceParser {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const field of schema.fields) {
    let parser = parserForTag(field.type, strict);
    if (!field.required) {
      const fallback = field.default ?? null;
      parser =
        fallback === null
          ? parser.nullable().default(null)
          : parser.default(() => structuredClone(fallback));
    }
    shape[field.name] = parser;
  }
  const object = z.object(shape);
  return strict ? object.strict() : object.strip();
}

/**
 * Compile a schema. Pure: structurally equal schemas compile to identical
 * output.
 */
export function compileSchema(schema: SchemaDefinition): CompiledSchema {
  return {
    schema,
    portable: deepFreeze(toPortableSchema(schema)),
    promptText: toPromptText(schema),
    validators: {
      permissive: parserForSchema(schema, false),
      strict: parserForSchema(schema, true),
    },
  };
}

/**
 * Compute-once-per-key cache of compiled schemas, keyed by the schema's
 * structural key. Safe to share between clients: a concurrent first use may
 * compile twice, and either result is correct.
 */
export class CompilationCache {
  private readonly entries = new Map<string, CompiledSchema>();

  get(schema: SchemaDefinition): CompiledSchema {
    const cached = this.entries.get(schema.key);
    if (cached) {
      return cached;
    }
    const compiled = compileSchema(schema);
    this.entries.set(schema.key, compiled);
    return compiled;
  }

  has(schema: SchemaDefinition): boolean {
    return this.entries.has(schema.key);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
