import { z } from "zod";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/** Returns a copy of `record` whose keys are in code-unit order. */
export function sortKeys<T>(record: Record<string, T>): Record<string, T> {
  const sorted: Record<string, T> = {};
  for (const key of Object.keys(record).sort()) {
    const value = record[key];
    if (value !== undefined) {
      sorted[key] = value;
    }
  }
  return sorted;
}

/** A value TOML can hold: JSON without `null`. */
export type TomlValue = string | number | boolean | TomlValue[] | { [key: string]: TomlValue };
export type TomlObject = { [key: string]: TomlValue };

// Own `__proto__` keys survive JSON.parse but not a record copy, so they are refused.
const recordKeySchema = z.string().refine((key) => key !== "__proto__", { message: "Key __proto__ is not allowed" });

/**
 * TOML dates become their ISO text. TOML integers arrive as bigints and
 * become numbers when they fit exactly.
 */
function normalizeScalar(value: unknown, ctx: z.RefinementCtx): unknown {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === "bigint") {
    if (value < BigInt(Number.MIN_SAFE_INTEGER) || value > BigInt(Number.MAX_SAFE_INTEGER)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Integer does not fit in a JSON number", fatal: true });
      return value;
    }
    return Number(value);
  }
  return value;
}

/**
 * Any JSON value. Nested objects come out with sorted keys so that two equal
 * values always serialize to the same text.
 */
export const jsonValueSchema: z.ZodType<JsonValue, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.preprocess(
    normalizeScalar,
    z.union([
      z.string(),
      z.number().finite(),
      z.boolean(),
      z.null(),
      z.array(jsonValueSchema),
      z.record(recordKeySchema, jsonValueSchema).transform(sortKeys),
    ])
  )
);

/** A string-keyed mapping of arbitrary JSON values. */
export const jsonObjectSchema = z.record(recordKeySchema, jsonValueSchema).transform(sortKeys);

export const tomlValueSchema: z.ZodType<TomlValue, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.preprocess(
    normalizeScalar,
    z.union([
      z.string(),
      z.number().finite(),
      z.boolean(),
      z.array(tomlValueSchema),
      z.record(recordKeySchema, tomlValueSchema).transform(sortKeys),
    ])
  )
);

/** Like `jsonObjectSchema`, minus `null`, which TOML cannot write. */
export const tomlObjectSchema = z.record(recordKeySchema, tomlValueSchema).transform(sortKeys);

export function stringMapSchema() {
  return z.record(recordKeySchema, z.string()).transform(sortKeys);
}

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Turns the position a JSON.parse SyntaxError reports into a 1-based
 * line/column pair, when the message carries one.
 */
export function jsonErrorLocation(text: string, error: unknown): { line: number; column: number } | undefined {
  if (!(error instanceof SyntaxError)) {
    return undefined;
  }

  const match = error.message.match(/position (\d+)/);
  if (!match?.[1]) {
    return undefined;
  }

  const offset = Math.min(Number(match[1]), text.length);
  const before = text.slice(0, offset);
  const lines = before.split("\n");
  const lastLine = lines[lines.length - 1] ?? "";
  return { line: lines.length, column: lastLine.length + 1 };
}
