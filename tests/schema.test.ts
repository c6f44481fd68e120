import { describe, it, expect } from "vitest";

import { SchemaDefinitionError } from "../src/schemaloop/errors.js";
import {
  SchemaDefinition,
  conformsTo,
  defineSchema,
  tags,
} from "../src/schemaloop/schema.js";
import { Address, Person, User } from "./fixtures.js";

function captureError(build: () => unknown): SchemaDefinitionError {
  try {
    build();
  } catch (error) {
    if (error instanceof SchemaDefinitionError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a SchemaDefinitionError");
}

describe("SchemaDefinition", () => {
  describe("construction", () => {
    it("should keep fields in declaration order", () => {
      expect(User.fields.map((field) => field.name)).toEqual(["name", "age", "email"]);
      expect(User.doc).toBe("A person");
    });

    it("should treat fields without a default as required", () => {
      expect(User.requiredFields).toEqual(["name", "age"]);
      expect(User.field("name")?.required).toBe(true);
    });

    it("should give optional fields without a default a null default", () => {
      const email = User.field("email");
      expect(email?.required).toBe(false);
      expect(email?.default).toBeNull();
    });

    it("should make a field with a default optional", () => {
      const tagsField = Person.field("tags");
      expect(tagsField?.required).toBe(false);
      expect(tagsField?.default).toEqual([]);
    });

    it("should default description to an empty string", () => {
      expect(Address.field("city")?.description).toBe("");
    });

    it("should look up fields by name", () => {
      expect(User.has("age")).toBe(true);
      expect(User.has("phone")).toBe(false);
      expect(User.field("phone")).toBeUndefined();
    });
  });

  describe("errors", () => {
    it("should reject a repeated field name", () => {
      const error = captureError(() =>
        defineSchema("User", [
          { name: "age", type: tags.integer() },
          { name: "age", type: tags.string() },
        ])
      );
      expect(error.kind).toBe("DuplicateField");
      expect(error.fieldName).toBe("age");
      expect(error.message).toBe('Schema "User" declares field "age" more than once');
    });

    it("should reject an empty schema name", () => {
      const error = captureError(() => defineSchema("  ", []));
      expect(error.kind).toBe("InvalidName");
    });

    it("should reject an empty field name", () => {
      const error = captureError(() => defineSchema("User", [{ name: "", type: tags.string() }]));
      expect(error.kind).toBe("InvalidName");
      expect(error.schemaName).toBe("User");
    });

    it("should reject __proto__ as a field name", () => {
      const error = captureError(() =>
        defineSchema("S", [{ name: "__proto__", type: tags.string() }])
      );
      expect(error.kind).toBe("InvalidName");
      expect(error.message).toBe('Field name "__proto__" of schema "S" is reserved');
    });

    it("should reject field names that look like array indices", () => {
      const error = captureError(() =>
        defineSchema("Pair", [
          { name: "first", type: tags.string() },
          { name: "2", type: tags.string() },
        ])
      );
      expect(error.kind).toBe("InvalidName");
      expect(error.fieldName).toBe("2");
    });

    it("should reject an unknown type tag", () => {
      const error = captureError(() =>
        defineSchema("Event", [{ name: "when", type: JSON.parse('{"kind":"date"}') }])
      );
      expect(error.kind).toBe("UnsupportedType");
      expect(error.message).toBe(
        'Field "when" of schema "Event" has an unsupported type: unknown type tag {"kind":"date"}'
      );
    });

    it("should reject an enum without values", () => {
      const error = captureError(() => defineSchema("Query", [{ name: "kind", type: tags.enumOf() }]));
      expect(error.kind).toBe("UnsupportedType");
      expect(error.message).toContain("enum needs a non-empty list of strings");
    });

    it("should reject a nested type that is not a schema definition", () => {
      const error = captureError(() =>
        defineSchema("User", [
          { name: "home", type: JSON.parse('{"kind":"object","schema":{"name":"Address"}}') },
        ])
      );
      expect(error.kind).toBe("UnsupportedType");
      expect(error.fieldName).toBe("home");
    });

    it("should reject a schema that would contain itself", () => {
      const Tree = defineSchema("Tree", [{ name: "label", type: tags.string() }]);
      const error = captureError(() =>
        defineSchema("Tree", [{ name: "children", type: tags.arrayOf(tags.nested(Tree)) }])
      );
      expect(error.kind).toBe("CyclicSchema");
      expect(error.fieldName).toBe("children");
    });

    it("should reject a default that does not match the field type", () => {
      const error = captureError(() =>
        defineSchema("Query", [{ name: "limit", type: tags.integer(), default: "ten" }])
      );
      expect(error.kind).toBe("InvalidDefault");
      expect(error.message).toBe(
        'Default for field "limit" of schema "Query" does not match its type'
      );
    });

    it("should reject a fractional default for an integer field", () => {
      const error = captureError(() =>
        defineSchema("Query", [{ name: "limit", type: tags.integer(), default: 2.5 }])
      );
      expect(error.kind).toBe("InvalidDefault");
    });
  });

  describe("immutability", () => {
    it("should freeze the definition and its fields", () => {
      expect(Object.isFrozen(User)).toBe(true);
      expect(Object.isFrozen(User.fields)).toBe(true);
      expect(Reflect.set(User, "name", "Renamed")).toBe(false);
      expect(User.name).toBe("User");
    });

    it("should not share the default value passed in", () => {
      const fallback = ["a"];
      const schema = defineSchema("Labels", [
        { name: "values", type: tags.arrayOf(tags.string()), default: fallback },
      ]);
      fallback.push("b");
      expect(schema.field("values")?.default).toEqual(["a"]);
    });
  });

  describe("structural identity", () => {
    it("should treat separately built identical schemas as equal", () => {
      const again = new SchemaDefinition({
        name: "User",
        doc: "A person",
        fields: [
          { name: "name", type: tags.string(), description: "Full name" },
          { name: "age", type: tags.integer(), description: "Age in years" },
          { name: "email", type: tags.string(), description: "Email address", required: false },
        ],
      });
      expect(again).not.toBe(User);
      expect(again.equals(User)).toBe(true);
      expect(again.key).toBe(User.key);
    });

    it("should distinguish schemas that differ only in a description", () => {
      const other = defineSchema(
        "User",
        [
          { name: "name", type: tags.string(), description: "Name" },
          { name: "age", type: tags.integer(), description: "Age in years" },
          { name: "email", type: tags.string(), description: "Email address", required: false },
        ],
        "A person"
      );
      expect(other.equals(User)).toBe(false);
    });

    it("should ignore key order inside object defaults", () => {
      const Settings = defineSchema("Settings", [{ name: "mode", type: tags.string() }]);
      const first = defineSchema("Wrapper", [
        {
          name: "settings",
          type: tags.nested(Settings),
          default: { mode: "fast", extra: 1 },
        },
      ]);
      const second = defineSchema("Wrapper", [
        {
          name: "settings",
          type: tags.nested(Settings),
          default: { extra: 1, mode: "fast" },
        },
      ]);
      expect(first.key).toBe(second.key);
    });
  });
});

describe("conformsTo", () => {
  it("should check primitive tags without coercion", () => {
    expect(conformsTo("3", tags.integer())).toBe(false);
    expect(conformsTo(3, tags.integer())).toBe(true);
    expect(conformsTo(3.5, tags.number())).toBe(true);
    expect(conformsTo(true, tags.boolean())).toBe(true);
    expect(conformsTo(1, tags.boolean())).toBe(false);
  });

  it("should check enum membership", () => {
    const kind = tags.enumOf("web", "image");
    expect(conformsTo("web", kind)).toBe(true);
    expect(conformsTo("audio", kind)).toBe(false);
  });

  it("should check every array element", () => {
    expect(conformsTo(["a", "b"], tags.arrayOf(tags.string()))).toBe(true);
    expect(conformsTo(["a", 2], tags.arrayOf(tags.string()))).toBe(false);
  });

  it("should not read inherited keys as present", () => {
    const Labelled = defineSchema("Labelled", [
      { name: "toString", type: tags.string(), required: false },
    ]);
    expect(conformsTo({}, tags.nested(Labelled))).toBe(true);
  });

  it("should check nested objects against their schema", () => {
    expect(conformsTo({ street: "Main St", city: "Springfield" }, tags.nested(Address))).toBe(true);
    expect(conformsTo({ street: "Main St" }, tags.nested(Address))).toBe(false);
  });
});
