/**
 * A value held by an extracted instance.
 */
export type FieldValue =
  | string
  | number
  | boolean
  | null
  | FieldValue[]
  | Instance;

/**
 * Extracted data: field name to value. Schemas assembled at runtime produce
 * instances of this shape rather than new static types.
 */
export interface Instance {
  [field: string]: FieldValue;
}

export type ValidationErrorKind =
  | "MissingField"
  | "TypeMismatch"
  | "UnknownField"
  | "ParseFailure";

/**
 * A single problem found while validating raw output.
 */
export interface ValidationError {
  kind: ValidationErrorKind;
  /** Path from the document root; array indices are decimal segments. */
  fieldPath: string[];
  message: string;
  /** The offending value, when there was one. */
  observedValue?: unknown;
}

export type ValidationOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; errors: ValidationError[] };

/**
 * Anything that can turn raw backend text into a value or a list of errors.
 */
export interface OutputValidator<T> {
  validate(rawOutput: string): ValidationOutcome<T>;
}

/**
 * One request/response/validate cycle.
 */
export interface ExtractionAttempt {
  /** 1-based, strictly increasing within a run. */
  index: number;
  rawOutput: string;
  errors: ValidationError[];
}

export type ExtractionResult<T> =
  | { status: "success"; value: T; attempts: ExtractionAttempt[] }
  | { status: "exhausted"; attempts: ExtractionAttempt[] };

export type PortableType = "string" | "integer" | "number" | "boolean" | "array" | "object";

/**
 * JSON-Schema-shaped rendering of a type. Declared as type aliases so they
 * stay assignable to plain records.
 */
export type PortableProperty = {
  type: PortableType;
  description?: string;
  default?: FieldValue;
  enum?: string[];
  items?: PortableProperty;
  title?: string;
  properties?: Record<string, PortableProperty>;
  required?: string[];
};

export type PortableSchema = {
  title: string;
  type: "object";
  properties: Record<string, PortableProperty>;
  required: string[];
};
