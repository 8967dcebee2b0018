import { decodeDocument, readToml, toResult, writeToml } from "../shared/document.js";
import type { ConfigError, ParseResult } from "../shared/errors.js";
import { skillConfigSchema } from "./schemas.js";
import type { SkillConfig, SkillEndpoint } from "./types.js";

const DOCUMENT = "skill config";

export function parseSkillConfig(toml: string): SkillConfig {
  return decodeDocument(DOCUMENT, skillConfigSchema, readToml(DOCUMENT, toml));
}

export function safeParseSkillConfig(toml: string): ParseResult<SkillConfig, ConfigError> {
  return toResult(() => parseSkillConfig(toml));
}

export function serializeSkillConfig(config: SkillConfig): string {
  const valid = decodeDocument(DOCUMENT, skillConfigSchema, config);
  const table: Record<string, unknown> = {};
  if (valid.auth_ref !== null) {
    table.auth_ref = valid.auth_ref;
  }
  table.endpoints = valid.endpoints.map((endpoint) => {
    const entry: Record<string, unknown> = { name: endpoint.name, url: endpoint.url, method: endpoint.method };
    if (Object.keys(endpoint.headers).length > 0) {
      entry.headers = endpoint.headers;
    }
    return entry;
  });
  if (Object.keys(valid.extra).length > 0) {
    table.extra = valid.extra;
  }
  return writeToml(table);
}

export function findEndpoint(config: SkillConfig, name: string): SkillEndpoint | undefined {
  return config.endpoints.find((endpoint) => endpoint.name === name);
}
