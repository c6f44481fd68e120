import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import type { BaseMessage, MessageContent } from "@langchain/core/messages";

import type { PortableSchema } from "./types.js";

/**
 * Opaque, backend-specific settings passed through unchanged.
 */
export type BackendConfig = Record<string, unknown>;

/**
 * The external generation capability. Given the prompt and the portable
 * schema (or several, for parallel calls) it returns raw text, or throws.
 *
 * Interrupting a call already in flight is up to the backend: it receives
 * the caller's abort signal, when there is one.
 */
export interface GenerationBackend {
  invoke(
    messages: BaseMessage[],
    schema: PortableSchema | PortableSchema[],
    config: BackendConfig,
    signal?: AbortSignal
  ): Promise<string>;
}

/**
 * Convert a portable schema to OpenAI function-tool format.
 */
export function toToolDefinition(schema: PortableSchema) {
  return {
    type: "function" as const,
    function: {
      name: schema.title,
      description: `Record a ${schema.title} object.`,
      parameters: structuredClone(schema),
    },
  };
}

function messageText(content: MessageContent): string {
  if (typeof content === "string") {
    return content;
  }
  return content
    .map((part) => ("text" in part && typeof part.text === "string" ? part.text : ""))
    .join("");
}

/**
 * Generation backend over a LangChain chat model. Each portable schema is
 * bound as a function tool; the tool call arguments come back as JSON text.
 * The model object itself is left untouched.
 *
 * @example
 * ```typescript
 * import { ChatOpenAI } from "@langchain/openai";
 *
 * const backend = new ChatModelBackend(new ChatOpenAI({ model: "gpt-4o-mini" }));
 * const client = createExtractionClient(backend);
 * ```
 */
export class ChatModelBackend implements GenerationBackend {
  readonly model: BaseChatModel;

  constructor(model: BaseChatModel) {
    // Verify the model supports tool binding
    if (!model.bindTools) {
      throw new Error(
        "The provided chat model does not support tool binding. " +
          "Please use a model that supports tool calling (e.g., ChatOpenAI, ChatAnthropic)."
      );
    }
    this.model = model;
  }

  async invoke(
    messages: BaseMessage[],
    schema: PortableSchema | PortableSchema[],
    config: BackendConfig,
    signal?: AbortSignal
  ): Promise<string> {
    const schemas = Array.isArray(schema) ? schema : [schema];
    const [only] = schemas;
    const model = this.model;
    if (!model.bindTools) {
      throw new Error("The provided chat model does not support tool binding.");
    }

    const bound = model.bindTools(schemas.map(toToolDefinition), {
      tool_choice: schemas.length === 1 && only ? only.title : "any",
    });
    const response = await bound.invoke(messages, { signal, metadata: config });

    const toolCalls = response.tool_calls ?? [];
    const [first] = toolCalls;
    if (!first) {
      return messageText(response.content);
    }
    if (Array.isArray(schema)) {
      return JSON.stringify(toolCalls.map((call) => ({ name: call.name, arguments: call.args })));
    }
    return JSON.stringify(first.args);
  }
}
