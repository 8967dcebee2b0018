export * from "./protocol/types.js";
export * from "./protocol/schemas.js";
export * from "./protocol/messages.js";
export * from "./protocol/events.js";
export * from "./protocol/roles.js";
export { createCodec, type MessageCodec } from "./protocol/codec.js";

export * from "./config/types.js";
export * from "./config/schemas.js";
export * from "./config/gateway.js";
export * from "./config/agent.js";
export * from "./config/loader.js";
export * from "./config/handle.js";

export * from "./skills/types.js";
export * from "./skills/schemas.js";
export * from "./skills/manifest.js";
export * from "./skills/skill-config.js";

export { ConfigError, SchemaError, type ConfigErrorDetails, type ParseResult, type SchemaIssue } from "./shared/errors.js";
export {
  jsonObjectSchema,
  jsonValueSchema,
  tomlObjectSchema,
  tomlValueSchema,
  type JsonObject,
  type JsonPrimitive,
  type JsonValue,
  type TomlObject,
  type TomlValue,
} from "./shared/json.js";

export * from "./logger.js";
export { injectTraceContext, extractTraceContext, type TraceCarrier } from "./tracing/context.js";
export { startTelemetry } from "./tracing/telemetry.js";
