import { describe, it, expect } from "vitest";

import {
  DynamicSchemaBuilder,
  SchemaRegistry,
  schemaFromMetadata,
  schemasFromMetadata,
} from "../src/schemaloop/builder.js";
import { SchemaDefinitionError } from "../src/schemaloop/errors.js";
import { defineSchema, tags } from "../src/schemaloop/schema.js";
import { Address, User } from "./fixtures.js";

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

describe("DynamicSchemaBuilder", () => {
  it("should build a schema from scratch", () => {
    const schema = DynamicSchemaBuilder.create("Note", "A short note")
      .withField("title", { type: tags.string(), description: "Title" })
      .withField("pinned", { type: tags.boolean(), default: false })
      .build();

    expect(schema.name).toBe("Note");
    expect(schema.doc).toBe("A short note");
    expect(schema.fields.map((field) => field.name)).toEqual(["title", "pinned"]);
    expect(schema.requiredFields).toEqual(["title"]);
  });

  it("should append new fields after the base fields", () => {
    const Contact = DynamicSchemaBuilder.extend(User, { name: "Contact" })
      .withFields({
        phone: { type: tags.string(), description: "Phone number", required: false },
      })
      .build();

    expect(Contact.name).toBe("Contact");
    expect(Contact.doc).toBe("A person");
    expect(Contact.fields.map((field) => field.name)).toEqual(["name", "age", "email", "phone"]);
  });

  it("should leave the base schema untouched", () => {
    DynamicSchemaBuilder.extend(User)
      .withField("phone", { type: tags.string() })
      .build();
    expect(User.fields.map((field) => field.name)).toEqual(["name", "age", "email"]);
  });

  it("should reject a field that already exists in the base", () => {
    const error = captureError(() =>
      DynamicSchemaBuilder.extend(User).withFields({ age: { type: tags.number() } })
    );
    expect(error.kind).toBe("DuplicateField");
    expect(error.fieldName).toBe("age");
    expect(error.message).toBe('Field "age" already exists in schema "User"');
  });

  it("should replace a base field in place when override is set", () => {
    const schema = DynamicSchemaBuilder.extend(User)
      .withFields(
        { age: { type: tags.number(), description: "Age, may be fractional" } },
        { override: true }
      )
      .build();

    expect(schema.fields.map((field) => field.name)).toEqual(["name", "age", "email"]);
    expect(schema.field("age")?.type).toEqual({ kind: "number" });
    expect(schema.field("age")?.description).toBe("Age, may be fractional");
  });

  it("should accept a Map of fields", () => {
    const schema = DynamicSchemaBuilder.create("Pair")
      .withFields(
        new Map([
          ["left", { type: tags.integer() }],
          ["right", { type: tags.integer() }],
        ])
      )
      .build();
    expect(schema.fields.map((field) => field.name)).toEqual(["left", "right"]);
  });

  it("should return a new builder from every call", () => {
    const base = DynamicSchemaBuilder.create("Note");
    const withTitle = base.withField("title", { type: tags.string() });
    expect(base.fieldNames).toEqual([]);
    expect(withTitle.fieldNames).toEqual(["title"]);
  });

  it("should build a schema equal to the statically declared one", () => {
    const built = DynamicSchemaBuilder.create("Address")
      .withField("street", { type: tags.string(), description: "Street" })
      .withField("city", { type: tags.string() })
      .build();
    expect(built.equals(Address)).toBe(true);
  });

  it("should surface construction errors from build", () => {
    const error = captureError(() =>
      DynamicSchemaBuilder.create("Query")
        .withField("limit", { type: tags.integer(), default: "ten" })
        .build()
    );
    expect(error.kind).toBe("InvalidDefault");
  });
});

describe("SchemaRegistry", () => {
  it("should register and look up schemas by name", () => {
    const registry = new SchemaRegistry([User, Address]);
    expect(registry.get("User")).toBe(User);
    expect(registry.has("Address")).toBe(true);
    expect(registry.names).toEqual(["User", "Address"]);
  });

  it("should accept a structurally equal schema under the same name", () => {
    const registry = new SchemaRegistry([Address]);
    const again = defineSchema("Address", [
      { name: "street", type: tags.string(), description: "Street" },
      { name: "city", type: tags.string() },
    ]);
    expect(() => registry.register(again)).not.toThrow();
  });

  it("should reject a different schema under a taken name", () => {
    const registry = new SchemaRegistry([Address]);
    const error = captureError(() =>
      registry.register(defineSchema("Address", [{ name: "line", type: tags.string() }]))
    );
    expect(error.kind).toBe("DuplicateSchema");
    expect(error.schemaName).toBe("Address");
  });
});

describe("schemaFromMetadata", () => {
  it("should build a schema from a metadata document", () => {
    const schema = schemaFromMetadata({
      name: "Query",
      doc: "A search request",
      fields: {
        text: { type: "string", description: "Search text" },
        kind: { type: { enum: ["web", "image", "video"] } },
        limit: { type: "integer", default: 10 },
        filters: { type: { array: "string" }, required: false },
      },
    });

    expect(schema.name).toBe("Query");
    expect(schema.doc).toBe("A search request");
    expect(schema.fields.map((field) => field.name)).toEqual(["text", "kind", "limit", "filters"]);
    expect(schema.field("kind")?.type).toEqual({ kind: "enum", values: ["web", "image", "video"] });
    expect(schema.field("limit")?.default).toBe(10);
    expect(schema.field("filters")?.type).toEqual({ kind: "array", items: { kind: "string" } });
    expect(schema.field("filters")?.default).toBeNull();
    expect(schema.requiredFields).toEqual(["text", "kind"]);
  });

  it("should resolve references through the registry", () => {
    const registry = new SchemaRegistry([Address]);
    const schema = schemaFromMetadata(
      { name: "Company", fields: { office: { type: { ref: "Address" } } } },
      registry
    );
    const office = schema.field("office")?.type;
    expect(office?.kind).toBe("object");
    if (office?.kind === "object") {
      expect(office.schema).toBe(Address);
    }
  });

  it("should extend a registered base", () => {
    const registry = new SchemaRegistry([User]);
    const schema = schemaFromMetadata(
      {
        name: "Employee",
        extends: "User",
        override: true,
        fields: {
          age: { type: "number", description: "Age" },
          team: { type: "string" },
        },
      },
      registry
    );
    expect(schema.doc).toBe("A person");
    expect(schema.fields.map((field) => field.name)).toEqual(["name", "age", "email", "team"]);
    expect(schema.field("age")?.type).toEqual({ kind: "number" });
  });

  it("should reject a base field collision without override", () => {
    const registry = new SchemaRegistry([User]);
    const error = captureError(() =>
      schemaFromMetadata(
        { name: "Employee", extends: "User", fields: { age: { type: "number" } } },
        registry
      )
    );
    expect(error.kind).toBe("DuplicateField");
  });

  it("should reject malformed metadata", () => {
    const error = captureError(() =>
      schemaFromMetadata({ name: "Event", fields: { when: { type: "date" } } })
    );
    expect(error.kind).toBe("UnsupportedType");
    expect(error.message).toMatch(/^Invalid schema metadata: fields\.when\.type: /);
  });

  it("should reject a reference to an unregistered schema", () => {
    const error = captureError(() =>
      schemaFromMetadata({ name: "Company", fields: { office: { type: { ref: "Office" } } } })
    );
    expect(error.kind).toBe("UnsupportedType");
    expect(error.message).toBe(
      'Field "office" of schema "Company" refers to unregistered schema "Office"'
    );
  });

  it("should reject a self reference", () => {
    const error = captureError(() =>
      schemaFromMetadata({
        name: "Category",
        fields: { parent: { type: { ref: "Category" } } },
      })
    );
    expect(error.kind).toBe("CyclicSchema");
    expect(error.fieldName).toBe("parent");
  });
});

describe("schemasFromMetadata", () => {
  it("should build documents in dependency order", () => {
    const registry = new SchemaRegistry();
    const [person, place] = schemasFromMetadata(
      [
        { name: "Person", fields: { home: { type: { ref: "Place" } } } },
        { name: "Place", fields: { city: { type: "string" } } },
      ],
      registry
    );

    expect(person?.name).toBe("Person");
    expect(place?.name).toBe("Place");
    expect(registry.names).toEqual(["Place", "Person"]);
    const home = person?.field("home")?.type;
    if (home?.kind === "object") {
      expect(home.schema).toBe(place);
    } else {
      throw new Error("expected a nested field");
    }
  });

  it("should report a reference cycle", () => {
    const error = captureError(() =>
      schemasFromMetadata([
        { name: "A", fields: { b: { type: { ref: "B" } } } },
        { name: "B", fields: { a: { type: { array: { ref: "A" } } } } },
      ])
    );
    expect(error.kind).toBe("CyclicSchema");
    expect(error.message).toBe("Schema references form a cycle: A -> B -> A");
  });

  it("should reject the same name twice", () => {
    const error = captureError(() =>
      schemasFromMetadata([
        { name: "A", fields: {} },
        { name: "A", fields: {} },
      ])
    );
    expect(error.kind).toBe("DuplicateSchema");
  });
});
