import type { SchemaDefinition } from "./schema.js";
import type { Instance } from "./types.js";

export type ExtractionHandler<R = unknown> = (
  value: Instance,
  schema: SchemaDefinition
) => R | Promise<R>;

/**
 * Caller-defined behaviour attached to schemas. Handlers are keyed by the
 * schema's structural key and only run when the caller dispatches a value
 * it received from a successful extraction.
 *
 * @example
 * ```typescript
 * const handlers = new HandlerRegistry();
 * handlers.on(User, async (user) => saveUser(user));
 *
 * const result = await client.extract(User, "Ann is 30");
 * if (result.status === "success") {
 *   await handlers.dispatch(User, result.value);
 * }
 * ```
 */
export class HandlerRegistry {
  private readonly handlers = new Map<string, ExtractionHandler[]>();

  /**
   * Register a handler. Returns a function that removes it again.
   */
  on(schema: SchemaDefinition, handler: ExtractionHandler): () => void {
    const list = this.handlers.get(schema.key) ?? [];
    list.push(handler);
    this.handlers.set(schema.key, list);
    return () => {
      const current = this.handlers.get(schema.key);
      if (!current) return;
      const remaining = current.filter((entry) => entry !== handler);
      if (remaining.length === 0) {
        this.handlers.delete(schema.key);
      } else {
        this.handlers.set(schema.key, remaining);
      }
    };
  }

  has(schema: SchemaDefinition): boolean {
    return this.handlers.has(schema.key);
  }

  /**
   * Run every handler registered for `schema`, in registration order.
   */
  async dispatch(schema: SchemaDefinition, value: Instance): Promise<unknown[]> {
    const results: unknown[] = [];
    for (const handler of this.handlers.get(schema.key) ?? []) {
      results.push(await handler(value, schema));
    }
    return results;
  }
}
