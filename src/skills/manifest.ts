import { decodeDocument, readToml, toResult } from "../shared/document.js";
import type { ConfigError, ParseResult } from "../shared/errors.js";
import { skillManifestSchema } from "./schemas.js";
import type { SkillIO, SkillManifest } from "./types.js";

const DOCUMENT = "skill manifest";

export function parseSkillManifest(toml: string): SkillManifest {
  return decodeDocument(DOCUMENT, skillManifestSchema, readToml(DOCUMENT, toml));
}

export function safeParseSkillManifest(toml: string): ParseResult<SkillManifest, ConfigError> {
  return toResult(() => parseSkillManifest(toml));
}

export function requiredInputs(manifest: SkillManifest): SkillIO[] {
  return manifest.inputs.filter((input) => input.required);
}
