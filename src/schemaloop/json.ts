import type { FieldValue } from "./types.js";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * JSON.stringify with object keys sorted at every level, so equal values
 * always serialize to the same text.
 */
export function stableStringify(value: unknown): string {
  if (value === undefined) {
    return "undefined";
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(",")}]`;
  }
  if (isRecord(value)) {
    const entries = Object.keys(value)
      .sort()
      .filter((key) => value[key] !== undefined)
      .map((key) => `${JSON.stringify(key)}:${stableStringify(value[key])}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value);
}

/**
 * Deep copy of a JSON value with object keys in sorted order.
 */
export function canonicalCopy(value: FieldValue): FieldValue {
  return JSON.parse(stableStringify(value));
}

/**
 * Freeze a JSON-like value and everything inside it.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const entry of Object.values(value)) {
      deepFreeze(entry);
    }
  }
  return value;
}

export type JsonParseResult =
  | { ok: true; document: unknown }
  | { ok: false; reason: string };

const CODE_FENCE = /^```[a-zA-Z0-9_-]*\s*\n?([\s\S]*?)\n?```$/;

function tryParse(text: string): JsonParseResult {
  try {
    return { ok: true, document: JSON.parse(text) };
  } catch (e) {
    return { ok: false, reason: e instanceof Error ? e.message : String(e) };
  }
}

/**
 * Parse backend text as JSON. Models often wrap the document in a markdown
 * code fence or surround it with prose, so the fence is stripped first and
 * the outermost `{...}` or `[...]` span is tried when the whole text fails.
 */
export function parseJsonDocument(rawOutput: string): JsonParseResult {
  let text = rawOutput.trim();
  const fenced = text.match(CODE_FENCE);
  if (fenced && fenced[1] !== undefined) {
    text = fenced[1].trim();
  }

  if (text === "") {
    return { ok: false, reason: "response was empty" };
  }

  const whole = tryParse(text);
  if (whole.ok) {
    return whole;
  }

  for (const [open, close] of [
    ["{", "}"],
    ["[", "]"],
  ] as const) {
    const start = text.indexOf(open);
    const end = text.lastIndexOf(close);
    if (start === -1 || end <= start) {
      continue;
    }
    const span = tryParse(text.slice(start, end + 1));
    if (span.ok) {
      return span;
    }
  }

  return { ok: false, reason: `response is not valid JSON (${whole.reason})` };
}

/**
 * Deep copy of a parsed document whose objects have no prototype, so a key
 * like `toString` or `constructor` is only present when the document has it.
 */
export function withoutPrototypes(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(withoutPrototypes);
  }
  if (!isRecord(value)) {
    return value;
  }
  const copy: Record<string, unknown> = Object.create(null);
  for (const [key, entry] of Object.entries(value)) {
    copy[key] = withoutPrototypes(entry);
  }
  return copy;
}

/**
 * Read the value at a path inside a parsed document. Inherited keys read as
 * absent.
 */
export function valueAt(document: unknown, path: ReadonlyArray<string | number>): unknown {
  let current: unknown = document;
  for (const segment of path) {
    if (Array.isArray(current)) {
      current = current[Number(segment)];
    } else if (isRecord(current) && Object.hasOwn(current, String(segment))) {
      current = current[String(segment)];
    } else {
      return undefined;
    }
  }
  return current;
}
