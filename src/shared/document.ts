import { parse, stringify, TomlError } from "smol-toml";
import type { z } from "zod";
import { ConfigError, type ParseResult } from "./errors.js";
import { jsonErrorLocation } from "./json.js";

/**
 * Parses TOML text into a plain table, reporting syntax errors with their
 * location. Integers come back as bigints so that schemas can tell them
 * from floats.
 */
export function readToml(document: string, text: string): Record<string, unknown> {
  try {
    return parse(text, { integersAsBigInt: true });
  } catch (error) {
    if (error instanceof TomlError) {
      const reason = error.message.split("\n")[0] ?? "syntax error";
      throw new ConfigError(document, reason, { line: error.line, column: error.column, cause: error });
    }
    throw error;
  }
}

export function writeToml(table: Record<string, unknown>): string {
  return stringify(table);
}

export function readJson(document: string, text: string): unknown {
  try {
    const data: unknown = JSON.parse(text);
    return data;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(document, reason, { ...jsonErrorLocation(text, error), cause: error });
  }
}

/** Validates a parsed document against a strict schema. */
export function decodeDocument<T>(document: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw ConfigError.fromZod(document, result.error);
  }
  return result.data;
}

export function toResult<T>(run: () => T): ParseResult<T, ConfigError> {
  try {
    return { success: true, data: run() };
  } catch (error) {
    if (error instanceof ConfigError) {
      return { success: false, error };
    }
    throw error;
  }
}
