import { BaseChatModel } from "@langchain/core/language_models/chat_models";

import { ChatModelBackend, type GenerationBackend } from "./backend.js";
import { CompilationCache } from "./compiler.js";
import {
  deadlineMillis,
  resolveExtractionConfig,
  type ExtractionConfig,
  type ExtractionConfigInput,
} from "./config.js";
import type { FeedbackFormatter } from "./feedback.js";
import { silentLogger, type ExtractionLogger } from "./logger.js";
import { toBaseMessages, type MessageLike } from "./messages.js";
import { ParallelResponseValidator, ParallelSchemas, type ParallelCall } from "./parallel.js";
import { RetryController } from "./retry-controller.js";
import type { SchemaDefinition } from "./schema.js";
import type { ExtractionResult, Instance } from "./types.js";
import { ResponseValidator } from "./validator.js";

/**
 * Options for creating an extraction client.
 */
export interface ExtractionClientOptions {
  /** Settings applied to every call unless the call overrides them. */
  defaults?: ExtractionConfigInput;
  logger?: ExtractionLogger;
  /** Compilation cache; pass one to share compiled schemas between clients. */
  cache?: CompilationCache;
  /** Decides whether a backend error is worth re-invoking. */
  isTransient?: (error: unknown) => boolean;
  formatFeedback?: FeedbackFormatter;
  /** Clock used for deadlines, in epoch milliseconds. */
  now?: () => number;
}

export interface ExtractionClient {
  /** Compilation cache used by this client. */
  readonly cache: CompilationCache;
  /**
   * Extract one instance of `schema` from the conversation.
   *
   * @throws {ExtractionConfigError} for an invalid config, before any backend call.
   * @throws {BackendInvocationError} when the backend fails past its budget.
   * @throws {ExtractionCancelledError} when the deadline passes or the signal aborts.
   */
  extract(
    schema: SchemaDefinition,
    messages: MessageLike[] | string,
    config?: ExtractionConfigInput
  ): Promise<ExtractionResult<Instance>>;
  /**
   * Extract any number of instances of several schemas in one response.
   * The whole response is validated and retried as a unit.
   */
  extractParallel(
    schemas: readonly SchemaDefinition[],
    messages: MessageLike[] | string,
    config?: ExtractionConfigInput
  ): Promise<ExtractionResult<ParallelCall[]>>;
}

function systemTextFor(config: ExtractionConfig, promptText: string): string {
  return config.instructions ? `${config.instructions}\n\n${promptText}` : promptText;
}

/**
 * Create an extraction client over a generation backend, or over a LangChain
 * chat model that supports tool calling.
 *
 * @example
 * ```typescript
 * import { ChatOpenAI } from "@langchain/openai";
 * import { createExtractionClient, defineSchema, tags } from "schemaloop";
 *
 * const User = defineSchema("User", [
 *   { name: "name", type: tags.string(), description: "Full name" },
 *   { name: "age", type: tags.integer(), description: "Age in years" },
 * ]);
 *
 * const client = createExtractionClient(new ChatOpenAI({ model: "gpt-4o-mini" }));
 * const result = await client.extract(User, "My name is Ann and I'm 30.");
 *
 * if (result.status === "success") {
 *   console.log(result.value); // { name: "Ann", age: 30 }
 * }
 * ```
 */
export function createExtractionClient(
  backendOrModel: GenerationBackend | BaseChatModel,
  options: ExtractionClientOptions = {}
): ExtractionClient {
  const backend =
    backendOrModel instanceof BaseChatModel ? new ChatModelBackend(backendOrModel) : backendOrModel;
  const cache = options.cache ?? new CompilationCache();
  const logger = options.logger ?? silentLogger;

  const controllerFor = (config: ExtractionConfig) =>
    new RetryController({
      backend,
      maxAttempts: config.maxAttempts,
      backendRetryBudget: config.backendRetryBudget,
      logger,
      isTransient: options.isTransient,
      formatFeedback: options.formatFeedback,
      now: options.now,
    });

  return {
    cache,

    async extract(schema, messages, overrides) {
      const config = resolveExtractionConfig(options.defaults, overrides);
      const compiled = cache.get(schema);
      return controllerFor(config).run({
        messages: toBaseMessages(messages),
        systemText: systemTextFor(config, compiled.promptText),
        schema: compiled.portable,
        subject: `the ${schema.name} schema`,
        validator: new ResponseValidator(compiled, {
          strictUnknownFields: config.strictUnknownFields,
        }),
        backendConfig: config.backend,
        deadline: deadlineMillis(config.deadline),
        signal: config.signal,
      });
    },

    async extractParallel(schemas, messages, overrides) {
      const config = resolveExtractionConfig(options.defaults, overrides);
      const parallel = new ParallelSchemas(schemas);
      const compiled = parallel.compile(cache);
      return controllerFor(config).run({
        messages: toBaseMessages(messages),
        systemText: systemTextFor(config, compiled.promptText),
        schema: compiled.portable,
        subject: `the schemas ${parallel.names.join(", ")}`,
        validator: new ParallelResponseValidator(compiled.compiled, {
          strictUnknownFields: config.strictUnknownFields,
        }),
        backendConfig: config.backend,
        deadline: deadlineMillis(config.deadline),
        signal: config.signal,
      });
    },
  };
}
