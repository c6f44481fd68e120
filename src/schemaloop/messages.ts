import {
  AIMessage,
  BaseMessage,
  HumanMessage,
  SystemMessage,
  ToolMessage,
} from "@langchain/core/messages";
import { z } from "zod";

const RoleSchema = z.enum(["system", "user", "human", "assistant", "ai", "tool"]);

/**
 * A `{ role, content }` turn as chat-completion APIs write it.
 */
export const MessageDictSchema = z.object({
  role: RoleSchema,
  content: z.string(),
  tool_call_id: z.string().optional(),
  name: z.string().optional(),
});

export type MessageDict = z.infer<typeof MessageDictSchema>;

/** `[role, content]`; roles outside the known set are read as user turns. */
export const MessageTupleSchema = z.tuple([z.string(), z.string()]);

export type MessageTuple = z.infer<typeof MessageTupleSchema>;

export type MessageLike = BaseMessage | MessageDict | MessageTuple | string;

type Role = z.infer<typeof RoleSchema>;

const buildTurn: Record<Role, (turn: MessageDict) => BaseMessage> = {
  system: ({ content }) => new SystemMessage({ content }),
  user: ({ content }) => new HumanMessage({ content }),
  human: ({ content }) => new HumanMessage({ content }),
  assistant: ({ content }) => new AIMessage({ content }),
  ai: ({ content }) => new AIMessage({ content }),
  tool: ({ content, tool_call_id, name }) =>
    new ToolMessage({ content, tool_call_id: tool_call_id ?? "", name }),
};

/**
 * Convert one caller turn to a BaseMessage.
 *
 * @throws {TypeError} for values that are none of the accepted shapes.
 */
export function toBaseMessage(msg: MessageLike): BaseMessage {
  if (msg instanceof BaseMessage) {
    return msg;
  }
  if (typeof msg === "string") {
    return new HumanMessage({ content: msg });
  }

  const tuple = MessageTupleSchema.safeParse(msg);
  if (tuple.success) {
    const [role, content] = tuple.data;
    const known = RoleSchema.safeParse(role);
    const resolved = known.success ? known.data : "user";
    return buildTurn[resolved]({ role: resolved, content });
  }

  const dict = MessageDictSchema.safeParse(msg);
  if (dict.success) {
    return buildTurn[dict.data.role](dict.data);
  }
  throw new TypeError(`Unsupported message: ${JSON.stringify(msg)}`);
}

/**
 * Coerce the caller's conversation to BaseMessages. A bare string becomes a
 * single human turn.
 */
export function toBaseMessages(messages: MessageLike[] | string): BaseMessage[] {
  if (typeof messages === "string") {
    return [new HumanMessage({ content: messages })];
  }
  return messages.map(toBaseMessage);
}

/**
 * Put `text` into the system prompt: appended to a leading system message
 * with plain-text content, or prepended as a new one.
 */
export function withSystemText(messages: BaseMessage[], text: string): BaseMessage[] {
  const [first, ...rest] = messages;
  if (first instanceof SystemMessage && typeof first.content === "string") {
    return [new SystemMessage({ content: `${first.content}\n\n${text}` }), ...rest];
  }
  return [new SystemMessage({ content: text }), ...messages];
}
