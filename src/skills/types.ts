import type { TomlValue } from "../shared/json.js";

export const HTTP_METHODS = ["GET", "POST", "PUT", "DELETE", "PATCH"] as const;
export type HttpMethod = (typeof HTTP_METHODS)[number];

export interface SkillIO {
  readonly name: string;
  /** Free-form type tag such as `string` or `array`; not checked here. */
  readonly type: string;
  readonly required: boolean;
  readonly description: string | null;
}

export interface SkillManifest {
  readonly name: string;
  readonly version: string;
  readonly description: string;
  readonly capabilities: readonly string[];
  readonly inputs: readonly SkillIO[];
  readonly outputs: readonly SkillIO[];
  /** Names of other skills. Resolution and cycle checks belong to the loader. */
  readonly dependencies: readonly string[];
  readonly has_code: boolean;
}

export interface SkillEndpoint {
  readonly name: string;
  readonly url: string;
  readonly method: HttpMethod;
  readonly headers: Readonly<Record<string, string>>;
}

export interface SkillConfig {
  readonly endpoints: readonly SkillEndpoint[];
  /** Environment variable holding the skill's credential. */
  readonly auth_ref: string | null;
  /** Free-form settings. `null` is not allowed since TOML cannot write it. */
  readonly extra: Readonly<Record<string, TomlValue>>;
}
