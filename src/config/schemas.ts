import { z } from "zod";
import { stringMapSchema } from "../shared/json.js";
import {
  PROVIDER_TYPES,
  type AgentConfig,
  type GatewayConfig,
  type ProviderConfig,
  type RateLimitConfig,
  type ServerConfig,
} from "./types.js";

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

type Integer = (max: number) => Schema<number>;

/** JSON documents and values built in code carry plain numbers. */
const numberInteger: Integer = (max) => z.number().int().nonnegative().max(max);

/**
 * TOML is read with integers as bigints, so a float such as `8080.0` is
 * a type error here rather than a whole number.
 */
const tomlInteger: Integer = (max) =>
  z
    .bigint({ invalid_type_error: "Expected an integer" })
    .nonnegative()
    .max(BigInt(max))
    .transform((value) => Number(value));

export const providerTypeSchema = z.enum(PROVIDER_TYPES);

interface GatewaySchemas {
  readonly server: Schema<ServerConfig>;
  readonly rateLimit: Schema<RateLimitConfig>;
  readonly provider: Schema<ProviderConfig>;
  readonly gateway: Schema<GatewayConfig>;
}

function gatewaySchemas(integer: Integer): GatewaySchemas {
  const server = z
    .object({
      host: z.string(),
      port: integer(65535),
    })
    .strict();

  const rateLimit = z
    .object({
      requests_per_minute: integer(0xffff_ffff),
      burst_size: integer(0xffff_ffff),
    })
    .strict();

  const provider = z
    .object({
      name: z.string(),
      base_url: z.string(),
      api_key_envs: z.array(z.string()).default([]),
      enabled: z.boolean(),
      provider_type: providerTypeSchema.default("open_ai_compatible"),
      extra_headers: stringMapSchema().default({}),
      rate_limit: rateLimit.nullish().transform((value) => value ?? null),
      models: z.array(z.string()).default([]),
    })
    .strict();

  const gateway = z
    .object({
      server,
      providers: z.array(provider).default([]),
    })
    .strict();

  return { server, rateLimit, provider, gateway };
}

const plain = gatewaySchemas(numberInteger);
const fromToml = gatewaySchemas(tomlInteger);

export const serverConfigSchema = plain.server;
export const rateLimitConfigSchema = plain.rateLimit;
export const providerConfigSchema = plain.provider;
export const gatewayConfigSchema = plain.gateway;

/** The gateway document as read from TOML. */
export const gatewayConfigTomlSchema = fromToml.gateway;

export const agentConfigSchema: Schema<AgentConfig> = z
  .object({
    role: z.string(),
    skills: z.array(z.string()).default([]),
    king_address: z.string(),
  })
  .strict();
