import { AIMessage, BaseMessage, HumanMessage } from "@langchain/core/messages";
import { Annotation, END, START, StateGraph } from "@langchain/langgraph";
import { v4 as uuidv4 } from "uuid";

import type { BackendConfig, GenerationBackend } from "./backend.js";
import { BackendInvocationError, ExtractionCancelledError, describeError } from "./errors.js";
import { defaultFeedbackFormatter, type FeedbackFormatter } from "./feedback.js";
import { silentLogger, type ExtractionLogger } from "./logger.js";
import { withSystemText } from "./messages.js";
import type {
  ExtractionAttempt,
  ExtractionResult,
  OutputValidator,
  PortableSchema,
} from "./types.js";

export type RetryStatus =
  | "pending"
  | "awaiting_backend"
  | "validating"
  | "succeeded"
  | "failed";

type RetryFailure =
  | { kind: "exhausted" }
  | { kind: "backend"; error: unknown; invocations: number }
  | { kind: "cancelled"; reason: "deadline" | "aborted" };

function isRetryableByDefault(error: unknown): boolean {
  return !(error instanceof Error && error.name === "AbortError");
}

export interface RetryControllerOptions {
  backend: GenerationBackend;
  /** Upper bound on attempts, at least 1. */
  maxAttempts: number;
  /** Re-invocations allowed per attempt after a transient backend failure. */
  backendRetryBudget: number;
  logger?: ExtractionLogger;
  /** Decides whether a backend error is worth re-invoking. Defaults to every error but an abort. */
  isTransient?: (error: unknown) => boolean;
  formatFeedback?: FeedbackFormatter;
  /** Clock used for deadlines, in epoch milliseconds. */
  now?: () => number;
}

/**
 * One extraction run as the controller sees it.
 */
export interface RetryRequest<T> {
  /** Caller conversation, before any system text is added. */
  messages: BaseMessage[];
  /** Instructions and schema description for the system prompt. */
  systemText: string;
  /** Portable schema(s) handed to the backend. */
  schema: PortableSchema | PortableSchema[];
  /** What the output should satisfy, named in feedback. */
  subject: string;
  validator: OutputValidator<T>;
  backendConfig?: BackendConfig;
  /** Epoch milliseconds after which no attempt starts. */
  deadline?: number;
  signal?: AbortSignal;
}

/**
 * Drives the bounded generate/validate loop for one extraction call.
 *
 * The loop is a small state graph whose nodes are the transitions:
 * `startAttempt` (-> awaiting_backend), `invokeBackend` (-> validating, or
 * back to itself on a transient failure) and `validateOutput` (-> succeeded,
 * another attempt, or failed). Only the most recent attempt's output and
 * feedback are added to the next prompt; the full history is kept in the
 * result.
 */
export class RetryController {
  readonly maxAttempts: number;
  readonly backendRetryBudget: number;
  private readonly backend: GenerationBackend;
  private readonly logger: ExtractionLogger;
  private readonly isTransient: (error: unknown) => boolean;
  private readonly formatFeedback: FeedbackFormatter;
  private readonly now: () => number;

  constructor(options: RetryControllerOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be an integer >= 1, got ${options.maxAttempts}`);
    }
    if (!Number.isInteger(options.backendRetryBudget) || options.backendRetryBudget < 0) {
      throw new RangeError(
        `backendRetryBudget must be an integer >= 0, got ${options.backendRetryBudget}`
      );
    }
    this.backend = options.backend;
    this.maxAttempts = options.maxAttempts;
    this.backendRetryBudget = options.backendRetryBudget;
    this.logger = options.logger ?? silentLogger;
    this.isTransient = options.isTransient ?? isRetryableByDefault;
    this.formatFeedback = options.formatFeedback ?? defaultFeedbackFormatter;
    this.now = options.now ?? Date.now;
  }

  /**
   * Run the loop to completion.
   *
   * @returns `success` with the validated value, or `exhausted` with exactly
   *   `maxAttempts` attempts.
   * @throws {BackendInvocationError} when the backend fails past its budget.
   * @throws {ExtractionCancelledError} when the deadline passes or the signal
   *   aborts between attempts.
   */
  async run<T>(request: RetryRequest<T>): Promise<ExtractionResult<T>> {
    const runId = uuidv4();
    const graph = this.buildGraph(request, runId);

    // startAttempt + (budget + 1) backend calls + validateOutput per attempt
    const recursionLimit = this.maxAttempts * (this.backendRetryBudget + 3) + 2;
    const final = await graph.invoke(
      { status: "pending", attemptIndex: 0, backendFailures: 0 },
      { recursionLimit }
    );

    const attempts = final.attempts;
    if (final.status === "succeeded" && final.success) {
      this.logger.info("schemaloop:succeeded", { runId, attempts: attempts.length });
      return { status: "success", value: final.success.value, attempts };
    }

    const failure: RetryFailure = final.failure ?? { kind: "exhausted" };
    switch (failure.kind) {
      case "exhausted":
        this.logger.warn("schemaloop:exhausted", { runId, attempts: attempts.length });
        return { status: "exhausted", attempts };
      case "backend":
        throw new BackendInvocationError(
          `Generation backend failed after ${failure.invocations} invocation(s): ${describeError(failure.error)}`,
          { cause: failure.error, invocations: failure.invocations, attempts }
        );
      case "cancelled":
        throw new ExtractionCancelledError(failure.reason, attempts);
    }
  }

  private cancellation(request: RetryRequest<unknown>): "deadline" | "aborted" | undefined {
    if (request.signal?.aborted) {
      return "aborted";
    }
    if (request.deadline !== undefined && this.now() >= request.deadline) {
      return "deadline";
    }
    return undefined;
  }

  private composePrompt(request: RetryRequest<unknown>, previous?: ExtractionAttempt): BaseMessage[] {
    const prompt = withSystemText(request.messages, request.systemText);
    if (previous) {
      prompt.push(
        new AIMessage({ content: previous.rawOutput }),
        new HumanMessage({ content: this.formatFeedback(previous, request.subject) })
      );
    }
    return prompt;
  }

  private buildGraph<T>(request: RetryRequest<T>, runId: string) {
    const RetryState = Annotation.Root({
      status: Annotation<RetryStatus>,
      attemptIndex: Annotation<number>,
      backendFailures: Annotation<number>,
      prompt: Annotation<BaseMessage[]>,
      rawOutput: Annotation<string>,
      attempts: Annotation<ExtractionAttempt[]>({
        reducer: (curr, update) => [...curr, ...update],
        default: () => [],
      }),
      success: Annotation<{ value: T } | undefined>,
      failure: Annotation<RetryFailure | undefined>,
    });
    type State = typeof RetryState.State;
    type Update = typeof RetryState.Update;

    const startAttempt = (state: State): Update => {
      const reason = this.cancellation(request);
      if (reason) {
        this.logger.warn("schemaloop:cancelled", { runId, reason, attempts: state.attempts.length });
        return { status: "failed", failure: { kind: "cancelled", reason } };
      }
      const attemptIndex = state.attemptIndex + 1;
      this.logger.debug("schemaloop:attempt-started", { runId, attempt: attemptIndex });
      return {
        status: "awaiting_backend",
        attemptIndex,
        backendFailures: 0,
        prompt: this.composePrompt(request, state.attempts[state.attempts.length - 1]),
      };
    };

    const invokeBackend = async (state: State): Promise<Update> => {
      try {
        const rawOutput = await this.backend.invoke(
          state.prompt,
          request.schema,
          request.backendConfig ?? {},
          request.signal
        );
        return { status: "validating", rawOutput };
      } catch (error) {
        const invocations = state.backendFailures + 1;
        if (request.signal?.aborted) {
          this.logger.warn("schemaloop:cancelled", { runId, reason: "aborted" });
          return { status: "failed", failure: { kind: "cancelled", reason: "aborted" } };
        }
        if (this.isTransient(error) && state.backendFailures < this.backendRetryBudget) {
          this.logger.warn("schemaloop:backend-retry", {
            runId,
            attempt: state.attemptIndex,
            invocations,
            error: describeError(error),
          });
          return { status: "awaiting_backend", backendFailures: invocations };
        }
        this.logger.error("schemaloop:backend-failed", {
          runId,
          attempt: state.attemptIndex,
          invocations,
          error: describeError(error),
        });
        return { status: "failed", failure: { kind: "backend", error, invocations } };
      }
    };

    const validateOutput = (state: State): Update => {
      const outcome = request.validator.validate(state.rawOutput);
      if (outcome.ok) {
        return {
          status: "succeeded",
          success: { value: outcome.value },
          attempts: [{ index: state.attemptIndex, rawOutput: state.rawOutput, errors: [] }],
        };
      }

      const attempt: ExtractionAttempt = {
        index: state.attemptIndex,
        rawOutput: state.rawOutput,
        errors: outcome.errors,
      };
      this.logger.info("schemaloop:attempt-failed", {
        runId,
        attempt: attempt.index,
        errors: attempt.errors.length,
      });
      if (state.attemptIndex < this.maxAttempts) {
        return { status: "awaiting_backend", attempts: [attempt] };
      }
      return { status: "failed", failure: { kind: "exhausted" }, attempts: [attempt] };
    };

    const routeAfterStart = (state: State): "invokeBackend" | typeof END =>
      state.status === "failed" ? END : "invokeBackend";

    const routeAfterBackend = (state: State): "invokeBackend" | "validateOutput" | typeof END => {
      if (state.status === "validating") return "validateOutput";
      if (state.status === "awaiting_backend") return "invokeBackend";
      return END;
    };

    const routeAfterValidate = (state: State): "startAttempt" | typeof END =>
      state.status === "awaiting_backend" ? "startAttempt" : END;

    return new StateGraph(RetryState)
      .addNode("startAttempt", startAttempt)
      .addNode("invokeBackend", invokeBackend)
      .addNode("validateOutput", validateOutput)
      .addEdge(START, "startAttempt")
      .addConditionalEdges("startAttempt", routeAfterStart, ["invokeBackend", END])
      .addConditionalEdges("invokeBackend", routeAfterBackend, [
        "invokeBackend",
        "validateOutput",
        END,
      ])
      .addConditionalEdges("validateOutput", routeAfterValidate, ["startAttempt", END])
      .compile();
  }
}
