import type { ZodError, ZodIssue } from "zod";

export interface SchemaIssue {
  readonly path: string;
  readonly message: string;
}

export type ParseResult<T, E extends Error> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: E };

/** Renders a zod issue path as `providers[0].provider_type`. */
export function formatPath(path: ReadonlyArray<string | number>): string {
  let out = "";
  for (const segment of path) {
    if (typeof segment === "number") {
      out += `[${segment}]`;
    } else {
      out += out === "" ? segment : `.${segment}`;
    }
  }
  return out;
}

function toIssue(issue: ZodIssue): SchemaIssue {
  return { path: formatPath(issue.path), message: issue.message };
}

/** A protocol payload that is not valid JSON or is missing/mistyping a required field. */
export class SchemaError extends Error {
  readonly codec: string;
  readonly issues: readonly SchemaIssue[];

  constructor(codec: string, issues: readonly SchemaIssue[]) {
    const first = issues[0];
    const detail = first ? (first.path ? `${first.path}: ${first.message}` : first.message) : "invalid payload";
    super(`Invalid ${codec} payload: ${detail}`);
    this.name = "SchemaError";
    this.codec = codec;
    this.issues = issues;
  }

  static fromZod(codec: string, error: ZodError): SchemaError {
    return new SchemaError(codec, error.issues.map(toIssue));
  }
}

export interface ConfigErrorDetails {
  readonly path?: string;
  readonly line?: number;
  readonly column?: number;
  readonly cause?: unknown;
}

/**
 * A configuration or skill document that could not be read: bad syntax,
 * an unknown key, a value outside a closed set, or a mistyped field.
 */
export class ConfigError extends Error {
  readonly document: string;
  readonly path: string | undefined;
  readonly line: number | undefined;
  readonly column: number | undefined;

  constructor(document: string, reason: string, details: ConfigErrorDetails = {}) {
    const where = details.line !== undefined ? ` (line ${details.line}, column ${details.column ?? 1})` : "";
    const field = details.path ? `${details.path}: ` : "";
    super(`Invalid ${document}${where}: ${field}${reason}`, { cause: details.cause });
    this.name = "ConfigError";
    this.document = document;
    this.path = details.path;
    this.line = details.line;
    this.column = details.column;
  }

  static fromZod(document: string, error: ZodError): ConfigError {
    const issue = error.issues[0];
    if (!issue) {
      return new ConfigError(document, "invalid document");
    }
    const path = formatPath(issue.path);
    return new ConfigError(document, issue.message, path ? { path } : {});
  }
}
