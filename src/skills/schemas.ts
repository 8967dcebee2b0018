import { z } from "zod";
import { stringMapSchema, tomlObjectSchema } from "../shared/json.js";
import { HTTP_METHODS, type SkillConfig, type SkillEndpoint, type SkillIO, type SkillManifest } from "./types.js";

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export const httpMethodSchema = z.enum(HTTP_METHODS);

export const skillIOSchema: Schema<SkillIO> = z
  .object({
    name: z.string(),
    type: z.string(),
    required: z.boolean().default(false),
    description: z
      .string()
      .nullish()
      .transform((value) => value ?? null),
  })
  .strict();

export const skillManifestSchema: Schema<SkillManifest> = z
  .object({
    name: z.string(),
    version: z.string(),
    description: z.string(),
    capabilities: z.array(z.string()).default([]),
    inputs: z.array(skillIOSchema).default([]),
    outputs: z.array(skillIOSchema).default([]),
    dependencies: z.array(z.string()).default([]),
    has_code: z.boolean().default(false),
  })
  .strict();

export const skillEndpointSchema: Schema<SkillEndpoint> = z
  .object({
    name: z.string(),
    url: z.string(),
    method: httpMethodSchema,
    headers: stringMapSchema().default({}),
  })
  .strict();

// `extra` is the escape hatch: any keys, any TOML values.
export const skillConfigSchema: Schema<SkillConfig> = z
  .object({
    endpoints: z.array(skillEndpointSchema).default([]),
    auth_ref: z
      .string()
      .nullish()
      .transform((value) => value ?? null),
    extra: tomlObjectSchema.default({}),
  })
  .strict();
