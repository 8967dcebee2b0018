export const PROVIDER_TYPES = ["open_ai_compatible", "anthropic", "cursor", "claude_code", "codex_cli"] as const;
export type ProviderType = (typeof PROVIDER_TYPES)[number];

/** Provider types that run as a local CLI subprocess instead of over HTTP. */
export const SUBPROCESS_PROVIDER_TYPES: readonly ProviderType[] = ["cursor", "claude_code", "codex_cli"];

export interface ServerConfig {
  readonly host: string;
  readonly port: number;
}

/** Zero in either field is a valid "no traffic" limit. */
export interface RateLimitConfig {
  readonly requests_per_minute: number;
  readonly burst_size: number;
}

export interface ProviderConfig {
  readonly name: string;
  readonly base_url: string;
  /** Environment variables holding API keys, used round-robin. Empty for unauthenticated providers. */
  readonly api_key_envs: readonly string[];
  readonly enabled: boolean;
  readonly provider_type: ProviderType;
  readonly extra_headers: Readonly<Record<string, string>>;
  readonly rate_limit: RateLimitConfig | null;
  readonly models: readonly string[];
}

export interface GatewayConfig {
  readonly server: ServerConfig;
  readonly providers: readonly ProviderConfig[];
}

export interface AgentConfig {
  readonly role: string;
  readonly skills: readonly string[];
  readonly king_address: string;
}
