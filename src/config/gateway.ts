import { createHash } from "node:crypto";
import type { Logger } from "../logger.js";
import { decodeDocument, readJson, readToml, toResult, writeToml } from "../shared/document.js";
import { ConfigError, type ParseResult } from "../shared/errors.js";
import { gatewayConfigSchema, gatewayConfigTomlSchema } from "./schemas.js";
import { SUBPROCESS_PROVIDER_TYPES, type GatewayConfig, type ProviderConfig, type ProviderType } from "./types.js";

const DOCUMENT = "gateway config";

export interface ParseOptions {
  /** Receives deprecation warnings for legacy provider keys. */
  readonly logger?: Pick<Logger, "warn">;
}

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Providers used to name a single key variable in `api_key_env`. That shape
 * is read as a one-entry `api_key_envs` pool; writing always uses the pool.
 */
function migrateLegacyProviders(data: unknown, options: ParseOptions): unknown {
  if (!isTable(data) || !Array.isArray(data.providers)) {
    return data;
  }

  const providers = data.providers.map((provider: unknown, index: number) => {
    if (!isTable(provider) || !("api_key_env" in provider)) {
      return provider;
    }

    const path = `providers[${index}].api_key_env`;
    const { api_key_env: legacy, ...rest } = provider;
    if ("api_key_envs" in rest) {
      throw new ConfigError(DOCUMENT, "api_key_env and api_key_envs cannot both be set", { path });
    }
    if (typeof legacy !== "string") {
      throw new ConfigError(DOCUMENT, `Expected string, received ${typeof legacy}`, { path });
    }

    options.logger?.warn({ provider: rest.name, path }, "api_key_env is deprecated, use api_key_envs");
    return { ...rest, api_key_envs: [legacy] };
  });

  return { ...data, providers };
}

function providerTable(provider: ProviderConfig): Record<string, unknown> {
  const table: Record<string, unknown> = {
    name: provider.name,
    base_url: provider.base_url,
    api_key_envs: provider.api_key_envs,
    enabled: provider.enabled,
    provider_type: provider.provider_type,
    models: provider.models,
  };
  if (Object.keys(provider.extra_headers).length > 0) {
    table.extra_headers = provider.extra_headers;
  }
  if (provider.rate_limit) {
    table.rate_limit = { ...provider.rate_limit };
  }
  return table;
}

export function parseGatewayConfig(toml: string, options: ParseOptions = {}): GatewayConfig {
  const data = migrateLegacyProviders(readToml(DOCUMENT, toml), options);
  return decodeDocument(DOCUMENT, gatewayConfigTomlSchema, data);
}

export function safeParseGatewayConfig(toml: string, options: ParseOptions = {}): ParseResult<GatewayConfig, ConfigError> {
  return toResult(() => parseGatewayConfig(toml, options));
}

export function serializeGatewayConfig(config: GatewayConfig): string {
  const valid = decodeDocument(DOCUMENT, gatewayConfigSchema, config);
  return writeToml({
    server: { host: valid.server.host, port: valid.server.port },
    providers: valid.providers.map(providerTable),
  });
}

export function gatewayConfigFromJson(json: string, options: ParseOptions = {}): GatewayConfig {
  const data = migrateLegacyProviders(readJson(DOCUMENT, json), options);
  return decodeDocument(DOCUMENT, gatewayConfigSchema, data);
}

/** Canonical JSON: declared field order, header maps sorted by key, no whitespace. */
export function gatewayConfigToJson(config: GatewayConfig): string {
  return JSON.stringify(decodeDocument(DOCUMENT, gatewayConfigSchema, config));
}

/** SHA-256 of the canonical JSON, as announced in `king:config_update`. */
export function gatewayConfigHash(config: GatewayConfig): string {
  return createHash("sha256").update(gatewayConfigToJson(config)).digest("hex");
}

export function isSubprocessProvider(type: ProviderType): boolean {
  return SUBPROCESS_PROVIDER_TYPES.includes(type);
}
