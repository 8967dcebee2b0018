import { agentRoleFromName } from "../protocol/roles.js";
import type { AgentRole } from "../protocol/types.js";
import { decodeDocument, readToml, toResult, writeToml } from "../shared/document.js";
import type { ConfigError, ParseResult } from "../shared/errors.js";
import { agentConfigSchema } from "./schemas.js";
import type { AgentConfig } from "./types.js";

const DOCUMENT = "agent config";

export function parseAgentConfig(toml: string): AgentConfig {
  return decodeDocument(DOCUMENT, agentConfigSchema, readToml(DOCUMENT, toml));
}

export function safeParseAgentConfig(toml: string): ParseResult<AgentConfig, ConfigError> {
  return toResult(() => parseAgentConfig(toml));
}

export function serializeAgentConfig(config: AgentConfig): string {
  const valid = decodeDocument(DOCUMENT, agentConfigSchema, config);
  return writeToml({ role: valid.role, skills: valid.skills, king_address: valid.king_address });
}

/** The role an agent registers with, given the role name from its config. */
export function agentConfigRole(config: AgentConfig): AgentRole {
  return agentRoleFromName(config.role);
}
