import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { ConfigError } from "../shared/errors.js";
import { parseAgentConfig } from "./agent.js";
import { parseGatewayConfig, type ParseOptions } from "./gateway.js";
import type { AgentConfig, GatewayConfig } from "./types.js";

export const ENV_GATEWAY_CONFIG = "EVO_GATEWAY_CONFIG";
export const ENV_AGENT_CONFIG = "EVO_AGENT_CONFIG";

function readConfigFile(document: string, filePath: string): string {
  try {
    return readFileSync(filePath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(document, `Failed to read ${filePath}: ${message}`, { cause: err });
  }
}

export function gatewayConfigPath(configPath?: string): string {
  return configPath ?? process.env[ENV_GATEWAY_CONFIG] ?? resolve(process.cwd(), "gateway.toml");
}

export function agentConfigPath(configPath?: string): string {
  return configPath ?? process.env[ENV_AGENT_CONFIG] ?? resolve(process.cwd(), "agent.toml");
}

export function loadGatewayConfig(configPath?: string, options: ParseOptions = {}): GatewayConfig {
  const filePath = gatewayConfigPath(configPath);
  return parseGatewayConfig(readConfigFile("gateway config", filePath), options);
}

export function loadAgentConfig(configPath?: string): AgentConfig {
  const filePath = agentConfigPath(configPath);
  return parseAgentConfig(readConfigFile("agent config", filePath));
}
