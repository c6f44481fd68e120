import { SchemaDefinitionError } from "./errors.js";
import { canonicalCopy, isRecord, stableStringify } from "./json.js";
import type { FieldValue } from "./types.js";

/**
 * The type of a field. Recursive through `array` and `object`.
 */
export type TypeTag =
  | { readonly kind: "string" }
  | { readonly kind: "integer" }
  | { readonly kind: "number" }
  | { readonly kind: "boolean" }
  | { readonly kind: "array"; readonly items: TypeTag }
  | { readonly kind: "enum"; readonly values: readonly string[] }
  | { readonly kind: "object"; readonly schema: SchemaDefinition };

export type TypeTagKind = TypeTag["kind"];

const TYPE_TAG_KINDS: readonly TypeTagKind[] = [
  "string",
  "integer",
  "number",
  "boolean",
  "array",
  "enum",
  "object",
];

/**
 * Type tag constructors.
 *
 * @example
 * ```typescript
 * const Address = defineSchema("Address", [
 *   { name: "city", type: tags.string(), description: "City name" },
 * ]);
 * const User = defineSchema("User", [
 *   { name: "name", type: tags.string(), description: "Full name" },
 *   { name: "tags", type: tags.arrayOf(tags.string()), description: "Labels" },
 *   { name: "home", type: tags.nested(Address), description: "Home address" },
 * ]);
 * ```
 */
export const tags = {
  string: (): TypeTag => ({ kind: "string" }),
  integer: (): TypeTag => ({ kind: "integer" }),
  number: (): TypeTag => ({ kind: "number" }),
  boolean: (): TypeTag => ({ kind: "boolean" }),
  arrayOf: (items: TypeTag): TypeTag => ({ kind: "array", items }),
  enumOf: (...values: string[]): TypeTag => ({ kind: "enum", values: [...values] }),
  nested: (schema: SchemaDefinition): TypeTag => ({ kind: "object", schema }),
};

/**
 * A field as callers declare it.
 */
export interface FieldSpecInput {
  name: string;
  type: TypeTag;
  description?: string;
  /** Defaults to `true` unless a default value is given. */
  required?: boolean;
  /** Value used when an optional field is absent. Omitted means `null`. */
  default?: FieldValue;
}

export interface FieldSpec {
  readonly name: string;
  readonly type: TypeTag;
  readonly description: string;
  readonly required: boolean;
  /** Always defined (possibly `null`) for optional fields, `undefined` for required ones. */
  readonly default: FieldValue | undefined;
}

export interface SchemaDefinitionInit {
  name: string;
  doc?: string;
  fields: readonly FieldSpecInput[];
}

/**
 * Field names that would read as array indices in field paths, and that
 * object key ordering would move ahead of the other fields.
 */
const INDEX_LIKE = /^\d+$/;

function isTypeTagKind(value: unknown): value is TypeTagKind {
  return typeof value === "string" && TYPE_TAG_KINDS.some((kind) => kind === value);
}

function unsupportedType(
  schemaName: string,
  fieldName: string,
  detail: string
): SchemaDefinitionError {
  return new SchemaDefinitionError(
    "UnsupportedType",
    `Field "${fieldName}" of schema "${schemaName}" has an unsupported type: ${detail}`,
    { schemaName, fieldName }
  );
}

/**
 * Check that a value really is a well-formed TypeTag. Tags can arrive from
 * untyped callers, so every level is inspected.
 */
function assertTypeTag(
  value: unknown,
  schemaName: string,
  fieldName: string
): asserts value is TypeTag {
  if (!isRecord(value) || !isTypeTagKind(value.kind)) {
    throw unsupportedType(schemaName, fieldName, `unknown type tag ${stableStringify(value)}`);
  }

  if (value.kind === "array") {
    if (value.items === undefined) {
      throw unsupportedType(schemaName, fieldName, "array without an item type");
    }
    assertTypeTag(value.items, schemaName, fieldName);
  } else if (value.kind === "enum") {
    const values = value.values;
    if (
      !Array.isArray(values) ||
      values.length === 0 ||
      !values.every((entry) => typeof entry === "string")
    ) {
      throw unsupportedType(schemaName, fieldName, "enum needs a non-empty list of strings");
    }
  } else if (value.kind === "object" && !(value.schema instanceof SchemaDefinition)) {
    throw unsupportedType(
      schemaName,
      fieldName,
      "nested type is not a registered schema definition"
    );
  }
}

/**
 * Does a value conform to a type tag? Used to check declared defaults.
 */
export function conformsTo(value: unknown, tag: TypeTag): boolean {
  switch (tag.kind) {
    case "string":
      return typeof value === "string";
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "number":
      return typeof value === "number" && Number.isFinite(value);
    case "boolean":
      return typeof value === "boolean";
    case "enum":
      return typeof value === "string" && tag.values.includes(value);
    case "array":
      return Array.isArray(value) && value.every((item) => conformsTo(item, tag.items));
    case "object": {
      if (!isRecord(value)) return false;
      return tag.schema.fields.every((field) => {
        const entry = Object.hasOwn(value, field.name) ? value[field.name] : undefined;
        if (entry === undefined) return !field.required;
        if (entry === null && !field.required && field.default === null) return true;
        return conformsTo(entry, field.type);
      });
    }
  }
}

/**
 * Canonical text for a type tag, used in the structural key.
 */
function tagKey(tag: TypeTag): string {
  switch (tag.kind) {
    case "array":
      return `array<${tagKey(tag.items)}>`;
    case "enum":
      return `enum${JSON.stringify(tag.values)}`;
    case "object":
      return `object<${tag.schema.key}>`;
    default:
      return tag.kind;
  }
}

function freezeTag(tag: TypeTag): TypeTag {
  let copy: TypeTag;
  switch (tag.kind) {
    case "array":
      copy = { kind: "array", items: freezeTag(tag.items) };
      break;
    case "enum":
      copy = { kind: "enum", values: Object.freeze([...tag.values]) };
      break;
    default:
      copy = { ...tag };
  }
  return Object.freeze(copy);
}

/**
 * Does `tag` reach a schema called `name`?
 */
function reachesSchemaNamed(
  tag: TypeTag,
  name: string,
  seen: Set<SchemaDefinition>
): boolean {
  if (tag.kind === "array") {
    return reachesSchemaNamed(tag.items, name, seen);
  }
  if (tag.kind !== "object") {
    return false;
  }
  const nested = tag.schema;
  if (nested.name === name) {
    return true;
  }
  if (seen.has(nested)) {
    return false;
  }
  seen.add(nested);
  return nested.fields.some((field) => reachesSchemaNamed(field.type, name, seen));
}

/**
 * A named, ordered set of fields. Read-only once constructed.
 */
export class SchemaDefinition {
  readonly name: string;
  readonly doc: string;
  readonly fields: readonly FieldSpec[];
  /**
   * Canonical structural identity: name, doc and the ordered fields.
   * Two definitions with the same key compile identically.
   */
  readonly key: string;
  private readonly byName: ReadonlyMap<string, FieldSpec>;

  constructor(init: SchemaDefinitionInit) {
    const { name, doc = "" } = init;
    if (typeof name !== "string" || name.trim() === "") {
      throw new SchemaDefinitionError("InvalidName", "Schema name must be a non-empty string");
    }

    const byName = new Map<string, FieldSpec>();
    const fields: FieldSpec[] = [];

    for (const input of init.fields) {
      if (typeof input.name !== "string" || input.name.trim() === "") {
        throw new SchemaDefinitionError(
          "InvalidName",
          `Schema "${name}" has a field without a name`,
          { schemaName: name }
        );
      }
      if (input.name === "__proto__" || INDEX_LIKE.test(input.name)) {
        throw new SchemaDefinitionError(
          "InvalidName",
          `Field name "${input.name}" of schema "${name}" is reserved`,
          { schemaName: name, fieldName: input.name }
        );
      }
      if (byName.has(input.name)) {
        throw new SchemaDefinitionError(
          "DuplicateField",
          `Schema "${name}" declares field "${input.name}" more than once`,
          { schemaName: name, fieldName: input.name }
        );
      }

      assertTypeTag(input.type, name, input.name);

      if (reachesSchemaNamed(input.type, name, new Set())) {
        throw new SchemaDefinitionError(
          "CyclicSchema",
          `Field "${input.name}" makes schema "${name}" contain itself`,
          { schemaName: name, fieldName: input.name }
        );
      }

      const required = input.required ?? input.default === undefined;
      let fallback: FieldValue | undefined;
      if (!required) {
        const declared = input.default ?? null;
        if (declared !== null && !conformsTo(declared, input.type)) {
          throw new SchemaDefinitionError(
            "InvalidDefault",
            `Default for field "${input.name}" of schema "${name}" does not match its type`,
            { schemaName: name, fieldName: input.name }
          );
        }
        fallback = canonicalCopy(declared);
      }

      const field: FieldSpec = Object.freeze({
        name: input.name,
        type: freezeTag(input.type),
        description: input.description ?? "",
        required,
        default: fallback,
      });
      byName.set(field.name, field);
      fields.push(field);
    }

    this.name = name;
    this.doc = doc;
    this.fields = Object.freeze(fields);
    this.byName = byName;
    this.key = JSON.stringify([
      name,
      doc,
      fields.map((field) => [
        field.name,
        tagKey(field.type),
        field.description,
        field.required,
        field.default === undefined ? null : stableStringify(field.default),
      ]),
    ]);
    Object.freeze(this);
  }

  field(name: string): FieldSpec | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  /** Names of the required fields, in declaration order. */
  get requiredFields(): string[] {
    return this.fields.filter((field) => field.required).map((field) => field.name);
  }

  equals(other: SchemaDefinition): boolean {
    return this === other || this.key === other.key;
  }
}

/**
 * Shorthand for `new SchemaDefinition(...)`.
 */
export function defineSchema(
  name: string,
  fields: readonly FieldSpecInput[],
  doc?: string
): SchemaDefinition {
  return new SchemaDefinition({ name, doc, fields });
}
