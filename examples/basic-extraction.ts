/**
 * schemaloop - Basic Extraction Example
 *
 * Run with: OPENAI_API_KEY=... npx tsx examples/basic-extraction.ts
 */

import { ChatOpenAI } from "@langchain/openai";
import { HumanMessage, SystemMessage } from "@langchain/core/messages";

import {
  DynamicSchemaBuilder,
  HandlerRegistry,
  createConsoleLogger,
  createExtractionClient,
  defineSchema,
  loadConfigFromEnv,
  schemaFromMetadata,
  tags,
} from "../src/schemaloop/index.js";

// Statically declared schemas
const UserInfo = defineSchema(
  "UserInfo",
  [
    { name: "name", type: tags.string(), description: "User's full name" },
    { name: "age", type: tags.integer(), description: "User's age in years" },
    { name: "email", type: tags.string(), description: "User's email address", required: false },
  ],
  "A person mentioned in the conversation"
);

const Headquarters = defineSchema("Headquarters", [
  { name: "city", type: tags.string() },
  { name: "country", type: tags.string() },
]);

const CompanyProfile = defineSchema("CompanyProfile", [
  { name: "name", type: tags.string(), description: "Company name" },
  { name: "founded", type: tags.integer(), description: "Year founded" },
  { name: "headquarters", type: tags.nested(Headquarters), description: "Company headquarters" },
  {
    name: "products",
    type: tags.arrayOf(tags.string()),
    description: "Main products or services",
    default: [],
  },
]);

async function main() {
  if (!process.env.OPENAI_API_KEY) {
    console.error("Please set OPENAI_API_KEY environment variable");
    process.exit(1);
  }

  const env = loadConfigFromEnv();
  const client = createExtractionClient(new ChatOpenAI({ model: "gpt-4o-mini", temperature: 0 }), {
    defaults: env.defaults,
    logger: createConsoleLogger(env.logLevel ?? "info"),
  });

  // ==================================================
  // Example 1: String input (simplest)
  // ==================================================
  console.log("=== Example 1: String input ===\n");

  const user = await client.extract(
    UserInfo,
    "My name is Alice Johnson and I'm 30 years old. Email me at alice@example.com"
  );
  if (user.status === "success") {
    console.log("Extracted user:", JSON.stringify(user.value, null, 2));
  }
  console.log(`Attempts needed: ${user.attempts.length}\n`);

  // ==================================================
  // Example 2: Message list with a nested schema
  // ==================================================
  console.log("=== Example 2: Nested schema ===\n");

  const company = await client.extract(CompanyProfile, [
    new SystemMessage("Only use facts stated by the user."),
    new HumanMessage(
      "Example Robotics was founded in 2015 and is based in Lyon, France. " +
        "They build warehouse robots and fleet management software."
    ),
  ]);
  console.log("Extracted company:", JSON.stringify(company, null, 2), "\n");

  // ==================================================
  // Example 3: Schema extended at runtime
  // ==================================================
  console.log("=== Example 3: Runtime schema ===\n");

  const Contact = DynamicSchemaBuilder.extend(UserInfo, { name: "Contact" })
    .withField("phone", { type: tags.string(), description: "Phone number", required: false })
    .build();

  const handlers = new HandlerRegistry();
  handlers.on(Contact, (value) => console.log("Handled contact:", value.name));

  const contact = await client.extract(Contact, [
    ["user", "Reach Bob Lee (41) on 555-0100."],
  ]);
  if (contact.status === "success") {
    await handlers.dispatch(Contact, contact.value);
  }

  // ==================================================
  // Example 4: Schema loaded from metadata, parallel calls
  // ==================================================
  console.log("=== Example 4: Parallel extraction ===\n");

  const Query = schemaFromMetadata({
    name: "Query",
    fields: {
      text: { type: "string", description: "Search text" },
      kind: { type: { enum: ["web", "image", "video"] }, description: "Result type" },
    },
  });

  const calls = await client.extractParallel(
    [UserInfo, Query],
    "I'm Carol, 28. Can you find me videos of sea otters and web pages about kelp forests?"
  );
  console.log("Extracted calls:", JSON.stringify(calls, null, 2));
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
