import type { ExtractionAttempt, ValidationError } from "./types.js";

const INDEX_SEGMENT = /^\d+$/;

/**
 * Render a field path for people: `address.street`, `tags[1]`,
 * `[0].name`. The document root renders as `(document)`.
 */
export function formatFieldPath(path: readonly string[]): string {
  if (path.length === 0) {
    return "(document)";
  }
  let rendered = "";
  for (const segment of path) {
    if (INDEX_SEGMENT.test(segment)) {
      rendered += `[${segment}]`;
    } else {
      rendered += rendered === "" ? segment : `.${segment}`;
    }
  }
  return rendered;
}

export function formatValidationError(error: ValidationError): string {
  return `- ${formatFieldPath(error.fieldPath)}: ${error.message}`;
}

/**
 * Turns a failed attempt into the correction request appended to the next
 * prompt.
 */
export type FeedbackFormatter = (attempt: ExtractionAttempt, subject: string) => string;

export const defaultFeedbackFormatter: FeedbackFormatter = (attempt, subject) =>
  [
    `Your previous response (attempt ${attempt.index}) did not satisfy ${subject}:`,
    ...attempt.errors.map(formatValidationError),
    "",
    "Respond again with the complete corrected JSON, fixing every error listed above.",
  ].join("\n");
