import type { z } from "zod";
import { SchemaError, type ParseResult } from "../shared/errors.js";
import type { JsonValue } from "../shared/json.js";

/**
 * Two-way conversion between a protocol type and its JSON wire form.
 *
 * Encoding is canonical: object fields keep their declared order and the keys
 * of every free-form mapping are sorted, so equal values always produce the
 * same text. Decoding ignores fields it does not know about and rejects
 * missing or mistyped ones with a {@link SchemaError}.
 */
export interface MessageCodec<T> {
  readonly name: string;
  encode(value: T): string;
  toJSON(value: T): JsonValue;
  decode(text: string): T;
  parse(payload: unknown): T;
  safeDecode(text: string): ParseResult<T, SchemaError>;
  safeParse(payload: unknown): ParseResult<T, SchemaError>;
}

class ZodMessageCodec<T> implements MessageCodec<T> {
  constructor(
    readonly name: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ) {}

  encode(value: T): string {
    // Re-validating puts fields in declared order and sorts free-form maps.
    return JSON.stringify(this.parse(value));
  }

  toJSON(value: T): JsonValue {
    const json: JsonValue = JSON.parse(this.encode(value));
    return json;
  }

  decode(text: string): T {
    const result = this.safeDecode(text);
    if (!result.success) {
      throw result.error;
    }
    return result.data;
  }

  parse(payload: unknown): T {
    const result = this.safeParse(payload);
    if (!result.success) {
      throw result.error;
    }
    return result.data;
  }

  safeDecode(text: string): ParseResult<T, SchemaError> {
    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { success: false, error: new SchemaError(this.name, [{ path: "", message }]) };
    }
    return this.safeParse(payload);
  }

  safeParse(payload: unknown): ParseResult<T, SchemaError> {
    const result = this.schema.safeParse(payload);
    if (!result.success) {
      return { success: false, error: SchemaError.fromZod(this.name, result.error) };
    }
    return { success: true, data: result.data };
  }
}

export function createCodec<T>(name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): MessageCodec<T> {
  return new ZodMessageCodec(name, schema);
}
