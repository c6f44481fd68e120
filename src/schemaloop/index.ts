/**
 * schemaloop - schema-driven structured extraction with bounded
 * generate/validate/feedback retries.
 *
 * Schemas are declared statically or assembled at runtime, compiled once
 * into a portable JSON-Schema shape, prompt text and validators, and then
 * used to drive a generation backend until its output validates or the
 * attempt budget runs out.
 */

export {
  createExtractionClient,
  type ExtractionClient,
  type ExtractionClientOptions,
} from "./client.js";

export {
  SchemaDefinition,
  defineSchema,
  conformsTo,
  tags,
  type FieldSpec,
  type FieldSpecInput,
  type SchemaDefinitionInit,
  type TypeTag,
  type TypeTagKind,
} from "./schema.js";

export {
  DynamicSchemaBuilder,
  SchemaRegistry,
  schemaFromMetadata,
  schemasFromMetadata,
  SchemaMetadataSchema,
  type FieldMetadata,
  type MergeOptions,
  type SchemaMetadata,
  type TypeDescriptor,
} from "./builder.js";

export {
  CompilationCache,
  compileSchema,
  describeTypeTag,
  toPortableSchema,
  toPromptText,
  type CompiledSchema,
} from "./compiler.js";

export {
  ResponseValidator,
  validateResponse,
  type ResponseValidatorOptions,
} from "./validator.js";

export {
  RetryController,
  type RetryControllerOptions,
  type RetryRequest,
  type RetryStatus,
} from "./retry-controller.js";

export {
  ParallelResponseValidator,
  ParallelSchemas,
  type CompiledParallelSchemas,
  type ParallelCall,
} from "./parallel.js";

export { HandlerRegistry, type ExtractionHandler } from "./handlers.js";

export {
  ChatModelBackend,
  toToolDefinition,
  type BackendConfig,
  type GenerationBackend,
} from "./backend.js";

export {
  DEFAULT_BACKEND_RETRY_BUDGET,
  DEFAULT_INSTRUCTIONS,
  DEFAULT_MAX_ATTEMPTS,
  ExtractionConfigSchema,
  loadConfigFromEnv,
  resolveExtractionConfig,
  type EnvConfig,
  type ExtractionConfig,
  type ExtractionConfigInput,
} from "./config.js";

export {
  defaultFeedbackFormatter,
  formatFieldPath,
  formatValidationError,
  type FeedbackFormatter,
} from "./feedback.js";

export {
  createConsoleLogger,
  silentLogger,
  type ExtractionLogger,
  type LogLevel,
} from "./logger.js";

export { toBaseMessages, type MessageDict, type MessageLike, type MessageTuple } from "./messages.js";

export {
  BackendInvocationError,
  ExtractionCancelledError,
  ExtractionConfigError,
  SchemaDefinitionError,
  type SchemaDefinitionErrorKind,
} from "./errors.js";

export type {
  ExtractionAttempt,
  ExtractionResult,
  FieldValue,
  Instance,
  OutputValidator,
  PortableProperty,
  PortableSchema,
  ValidationError,
  ValidationErrorKind,
  ValidationOutcome,
} from "./types.js";
