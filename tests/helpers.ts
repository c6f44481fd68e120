import {
  BaseChatModel,
  type BaseChatModelCallOptions,
  type BindToolsInput,
} from "@langchain/core/language_models/chat_models";
import type { AIMessage, BaseMessage } from "@langchain/core/messages";
import type { ChatResult } from "@langchain/core/outputs";

import type { BackendConfig, GenerationBackend } from "../src/schemaloop/backend.js";
import type { PortableSchema } from "../src/schemaloop/types.js";

export interface RecordedCall {
  messages: BaseMessage[];
  schema: PortableSchema | PortableSchema[];
  config: BackendConfig;
  signal?: AbortSignal;
}

/**
 * Generation backend that replays scripted replies in order. An `Error`
 * entry is thrown instead of returned.
 */
export class ScriptedBackend implements GenerationBackend {
  readonly calls: RecordedCall[] = [];
  private readonly replies: Array<string | Error>;
  private readonly onInvoke?: (call: RecordedCall) => void;

  constructor(replies: Array<string | Error>, onInvoke?: (call: RecordedCall) => void) {
    this.replies = [...replies];
    this.onInvoke = onInvoke;
  }

  async invoke(
    messages: BaseMessage[],
    schema: PortableSchema | PortableSchema[],
    config: BackendConfig,
    signal?: AbortSignal
  ): Promise<string> {
    const call: RecordedCall = { messages, schema, config, signal };
    this.calls.push(call);
    this.onInvoke?.(call);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error("ScriptedBackend ran out of replies");
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}

/**
 * Chat model that answers with scripted AI messages and records the tools
 * bound to it.
 */
export class ScriptedChatModel extends BaseChatModel {
  readonly received: BaseMessage[][] = [];
  boundTools: BindToolsInput[] = [];
  toolChoice: unknown;
  private readonly responses: AIMessage[];

  constructor(responses: AIMessage[]) {
    super({});
    this.responses = [...responses];
  }

  _llmType(): string {
    return "scripted";
  }

  async _generate(messages: BaseMessage[]): Promise<ChatResult> {
    this.received.push(messages);
    const message = this.responses.shift();
    if (!message) {
      throw new Error("ScriptedChatModel ran out of responses");
    }
    const text = typeof message.content === "string" ? message.content : "";
    return { generations: [{ message, text }] };
  }

  override bindTools(tools: BindToolsInput[], kwargs?: Partial<BaseChatModelCallOptions>) {
    this.boundTools = tools;
    this.toolChoice = kwargs?.tool_choice;
    return this.withConfig(kwargs ?? {});
  }
}
