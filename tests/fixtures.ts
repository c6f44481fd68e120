import { defineSchema, tags } from "../src/schemaloop/schema.js";

export const User = defineSchema(
  "User",
  [
    { name: "name", type: tags.string(), description: "Full name" },
    { name: "age", type: tags.integer(), description: "Age in years" },
    { name: "email", type: tags.string(), description: "Email address", required: false },
  ],
  "A person"
);

export const Address = defineSchema("Address", [
  { name: "street", type: tags.string(), description: "Street" },
  { name: "city", type: tags.string() },
]);

export const Person = defineSchema("Person", [
  { name: "name", type: tags.string(), description: "Full name" },
  { name: "home", type: tags.nested(Address), description: "Home address" },
  { name: "tags", type: tags.arrayOf(tags.string()), description: "Labels", default: [] },
]);

export const Query = defineSchema("Query", [
  { name: "text", type: tags.string(), description: "Search text" },
  {
    name: "kind",
    type: tags.enumOf("web", "image", "video"),
    description: "Result type",
  },
  { name: "limit", type: tags.integer(), description: "Maximum results", default: 10 },
]);
