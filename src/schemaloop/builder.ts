import { z } from "zod";

import { SchemaDefinitionError } from "./errors.js";
import {
  SchemaDefinition,
  tags,
  type FieldSpec,
  type FieldSpecInput,
  type TypeTag,
} from "./schema.js";
import type { FieldValue } from "./types.js";

/**
 * Everything about a field except its name.
 */
export interface FieldMetadata {
  type: TypeTag;
  description?: string;
  required?: boolean;
  default?: FieldValue;
}

export interface MergeOptions {
  /** Replace an existing field of the same name in place instead of failing. */
  override?: boolean;
}

function toInput(field: FieldSpec): FieldSpecInput {
  return {
    name: field.name,
    type: field.type,
    description: field.description,
    required: field.required,
    default: field.default,
  };
}

/**
 * Assembles a SchemaDefinition at runtime, optionally on top of a base
 * schema. Every method returns a new builder; the base is never modified.
 *
 * @example
 * ```typescript
 * const Contact = DynamicSchemaBuilder.extend(User)
 *   .withFields({
 *     phone: { type: tags.string(), description: "Phone number", required: false },
 *   })
 *   .build();
 * ```
 */
export class DynamicSchemaBuilder {
  private readonly name: string;
  private readonly doc: string;
  private readonly fields: readonly FieldSpecInput[];

  private constructor(name: string, doc: string, fields: readonly FieldSpecInput[]) {
    this.name = name;
    this.doc = doc;
    this.fields = fields;
  }

  static create(name: string, doc = ""): DynamicSchemaBuilder {
    return new DynamicSchemaBuilder(name, doc, []);
  }

  /**
   * Start from the fields of `base`. Name and doc default to the base's.
   */
  static extend(
    base: SchemaDefinition,
    options: { name?: string; doc?: string } = {}
  ): DynamicSchemaBuilder {
    return new DynamicSchemaBuilder(
      options.name ?? base.name,
      options.doc ?? base.doc,
      base.fields.map(toInput)
    );
  }

  /**
   * Add a field. A name that is already present fails with `DuplicateField`
   * unless `override` is set, in which case the field is replaced at its
   * existing position.
   */
  withField(name: string, metadata: FieldMetadata, options: MergeOptions = {}): DynamicSchemaBuilder {
    const input: FieldSpecInput = { name, ...metadata };
    const index = this.fields.findIndex((field) => field.name === name);
    if (index === -1) {
      return new DynamicSchemaBuilder(this.name, this.doc, [...this.fields, input]);
    }
    if (!options.override) {
      throw new SchemaDefinitionError(
        "DuplicateField",
        `Field "${name}" already exists in schema "${this.name}"`,
        { schemaName: this.name, fieldName: name }
      );
    }
    const fields = [...this.fields];
    fields[index] = input;
    return new DynamicSchemaBuilder(this.name, this.doc, fields);
  }

  withFields(
    mapping: Readonly<Record<string, FieldMetadata>> | Map<string, FieldMetadata>,
    options: MergeOptions = {}
  ): DynamicSchemaBuilder {
    const entries = mapping instanceof Map ? [...mapping.entries()] : Object.entries(mapping);
    let builder: DynamicSchemaBuilder = this;
    for (const [name, metadata] of entries) {
      builder = builder.withField(name, metadata, options);
    }
    return builder;
  }

  get fieldNames(): string[] {
    return this.fields.map((field) => field.name);
  }

  build(): SchemaDefinition {
    return new SchemaDefinition({ name: this.name, doc: this.doc, fields: this.fields });
  }
}

/**
 * Named schemas that metadata documents can refer to.
 */
export class SchemaRegistry {
  private readonly schemas = new Map<string, SchemaDefinition>();

  constructor(schemas: Iterable<SchemaDefinition> = []) {
    for (const schema of schemas) {
      this.register(schema);
    }
  }

  /**
   * Register a schema under its name. Registering a structurally equal
   * schema again is a no-op; a different schema under a taken name fails.
   */
  register(schema: SchemaDefinition): this {
    const existing = this.schemas.get(schema.name);
    if (existing && !existing.equals(schema)) {
      throw new SchemaDefinitionError(
        "DuplicateSchema",
        `A different schema named "${schema.name}" is already registered`,
        { schemaName: schema.name }
      );
    }
    this.schemas.set(schema.name, schema);
    return this;
  }

  get(name: string): SchemaDefinition | undefined {
    return this.schemas.get(name);
  }

  has(name: string): boolean {
    return this.schemas.has(name);
  }

  get names(): string[] {
    return [...this.schemas.keys()];
  }
}

export type TypeDescriptor =
  | "string"
  | "integer"
  | "number"
  | "boolean"
  | { array: TypeDescriptor }
  | { enum: string[] }
  | { ref: string };

export const TypeDescriptorSchema: z.ZodType<TypeDescriptor> = z.lazy(() =>
  z.union([
    z.enum(["string", "integer", "number", "boolean"]),
    z.object({ array: TypeDescriptorSchema }).strict(),
    z.object({ enum: z.array(z.string()).min(1) }).strict(),
    z.object({ ref: z.string().min(1) }).strict(),
  ])
);

const JsonValueSchema: z.ZodType<FieldValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const FieldMetadataSchema = z.object({
  type: TypeDescriptorSchema,
  description: z.string().optional(),
  required: z.boolean().optional(),
  default: JsonValueSchema.optional(),
});

/**
 * External description of a schema, e.g. loaded from a JSON config file.
 */
export const SchemaMetadataSchema = z.object({
  name: z.string().min(1),
  doc: z.string().optional(),
  /** Name of a registered schema whose fields come first. */
  extends: z.string().min(1).optional(),
  /** Let fields replace same-named fields of the base. */
  override: z.boolean().optional(),
  fields: z.record(FieldMetadataSchema),
});

export type SchemaMetadata = z.infer<typeof SchemaMetadataSchema>;

function parseMetadata(document: unknown): SchemaMetadata {
  const result = SchemaMetadataSchema.safeParse(document);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new SchemaDefinitionError("UnsupportedType", `Invalid schema metadata: ${details}`);
  }
  return result.data;
}

function referencesOf(descriptor: TypeDescriptor): string[] {
  if (typeof descriptor === "string" || "enum" in descriptor) return [];
  if ("array" in descriptor) return referencesOf(descriptor.array);
  return [descriptor.ref];
}

function dependenciesOf(metadata: SchemaMetadata): string[] {
  const names = Object.values(metadata.fields).flatMap((field) => referencesOf(field.type));
  return metadata.extends ? [metadata.extends, ...names] : names;
}

function toTypeTag(
  descriptor: TypeDescriptor,
  registry: SchemaRegistry,
  schemaName: string,
  fieldName: string
): TypeTag {
  if (typeof descriptor === "string") {
    return tags[descriptor]();
  }
  if ("array" in descriptor) {
    return tags.arrayOf(toTypeTag(descriptor.array, registry, schemaName, fieldName));
  }
  if ("enum" in descriptor) {
    return tags.enumOf(...descriptor.enum);
  }
  if (descriptor.ref === schemaName) {
    throw new SchemaDefinitionError(
      "CyclicSchema",
      `Field "${fieldName}" of schema "${schemaName}" refers to its own schema`,
      { schemaName, fieldName }
    );
  }
  const nested = registry.get(descriptor.ref);
  if (!nested) {
    throw new SchemaDefinitionError(
      "UnsupportedType",
      `Field "${fieldName}" of schema "${schemaName}" refers to unregistered schema "${descriptor.ref}"`,
      { schemaName, fieldName }
    );
  }
  return tags.nested(nested);
}

function buildFromMetadata(metadata: SchemaMetadata, registry: SchemaRegistry): SchemaDefinition {
  let builder: DynamicSchemaBuilder;
  if (metadata.extends) {
    const base = registry.get(metadata.extends);
    if (!base) {
      throw new SchemaDefinitionError(
        "UnsupportedType",
        `Schema "${metadata.name}" extends unregistered schema "${metadata.extends}"`,
        { schemaName: metadata.name }
      );
    }
    builder = DynamicSchemaBuilder.extend(base, { name: metadata.name, doc: metadata.doc });
  } else {
    builder = DynamicSchemaBuilder.create(metadata.name, metadata.doc);
  }

  for (const [fieldName, field] of Object.entries(metadata.fields)) {
    builder = builder.withField(
      fieldName,
      {
        type: toTypeTag(field.type, registry, metadata.name, fieldName),
        description: field.description,
        required: field.required,
        default: field.default,
      },
      { override: metadata.override }
    );
  }
  return builder.build();
}

/**
 * Build a schema from an external metadata document. Nested `ref` types and
 * `extends` are resolved against `registry`.
 *
 * @example
 * ```typescript
 * const Query = schemaFromMetadata({
 *   name: "Query",
 *   fields: {
 *     text: { type: "string", description: "Search text" },
 *     kind: { type: { enum: ["web", "image", "video"] } },
 *   },
 * });
 * ```
 */
export function schemaFromMetadata(
  document: unknown,
  registry: SchemaRegistry = new SchemaRegistry()
): SchemaDefinition {
  return buildFromMetadata(parseMetadata(document), registry);
}

/**
 * Build several metadata documents that may refer to each other. Documents
 * are built in dependency order and registered in `registry`; results come
 * back in input order.
 */
export function schemasFromMetadata(
  documents: readonly unknown[],
  registry: SchemaRegistry = new SchemaRegistry()
): SchemaDefinition[] {
  const parsed = documents.map(parseMetadata);
  const byName = new Map<string, SchemaMetadata>();
  for (const metadata of parsed) {
    if (byName.has(metadata.name)) {
      throw new SchemaDefinitionError(
        "DuplicateSchema",
        `Schema metadata for "${metadata.name}" appears more than once`,
        { schemaName: metadata.name }
      );
    }
    byName.set(metadata.name, metadata);
  }

  const built = new Map<string, SchemaDefinition>();
  const visiting: string[] = [];

  const build = (metadata: SchemaMetadata): SchemaDefinition => {
    const done = built.get(metadata.name);
    if (done) return done;

    const cycleStart = visiting.indexOf(metadata.name);
    if (cycleStart !== -1) {
      const cycle = [...visiting.slice(cycleStart), metadata.name].join(" -> ");
      throw new SchemaDefinitionError("CyclicSchema", `Schema references form a cycle: ${cycle}`, {
        schemaName: metadata.name,
      });
    }

    visiting.push(metadata.name);
    for (const dependency of dependenciesOf(metadata)) {
      const next = byName.get(dependency);
      if (next) build(next);
    }
    visiting.pop();

    const schema = buildFromMetadata(metadata, registry);
    registry.register(schema);
    built.set(metadata.name, schema);
    return schema;
  };

  return parsed.map(build);
}
