import { z } from "zod";
import { jsonObjectSchema, jsonValueSchema } from "../shared/json.js";
import {
  MEMORY_CATEGORIES,
  MEMORY_SCOPES,
  PIPELINE_ROLE_NAMES,
  PIPELINE_RUN_STATUSES,
  PIPELINE_STAGES,
  RUNNER_STATUSES,
  TASK_STATUSES,
  type AgentHealth,
  type AgentRegister,
  type AgentRole,
  type AgentSkillReport,
  type AgentStatus,
  type HealthCheck,
  type KingCommand,
  type KingConfigUpdate,
  type MemoryChanged,
  type MemoryQuery,
  type MemoryRecord,
  type MemoryResult,
  type MemoryStore,
  type MemoryTierEntry,
  type MemoryTierRecord,
  type PipelineNext,
  type PipelineStageResult,
  type SkillResult,
  type TaskCreate,
  type TaskDelete,
  type TaskEvaluate,
  type TaskGet,
  type TaskInvite,
  type TaskList,
  type TaskOutput,
  type TaskRecord,
  type TaskSummary,
  type TaskUpdate,
} from "./types.js";

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/** Absent and `null` both decode to `null`; `null` is what gets encoded. */
function nullable<T>(schema: Schema<T>): Schema<T | null> {
  return schema.nullish().transform((value) => value ?? null);
}

const u32 = z.number().int().nonnegative().max(0xffff_ffff);
const u64 = z.number().int().nonnegative();
const i32 = z.number().int().min(-0x8000_0000).max(0x7fff_ffff);

export const agentRoleSchema: Schema<AgentRole> = z.union([
  z.enum(PIPELINE_ROLE_NAMES),
  z.object({ user: z.string() }).strict(),
]);

export const runnerStatusSchema = z.enum(RUNNER_STATUSES);

export const skillResultSchema: Schema<SkillResult> = z.union([
  z.literal("success"),
  z.object({ failure: z.string() }).strict(),
  z.object({ partial: z.string() }).strict(),
]);

export const pipelineStageSchema = z.enum(PIPELINE_STAGES);
export const pipelineRunStatusSchema = z.enum(PIPELINE_RUN_STATUSES);
export const taskStatusSchema = z.enum(TASK_STATUSES);
export const memoryScopeSchema = z.enum(MEMORY_SCOPES);
export const memoryCategorySchema = z.enum(MEMORY_CATEGORIES);

export const agentRegisterSchema: Schema<AgentRegister> = z.object({
  agent_id: z.string(),
  role: agentRoleSchema,
  capabilities: z.array(z.string()),
});

export const agentStatusSchema: Schema<AgentStatus> = z.object({
  agent_id: z.string(),
  status: runnerStatusSchema,
  metrics: jsonObjectSchema,
});

export const agentSkillReportSchema: Schema<AgentSkillReport> = z.object({
  agent_id: z.string(),
  skill_id: z.string(),
  result: skillResultSchema,
  score: nullable(z.number().finite()),
});

export const healthCheckSchema: Schema<HealthCheck> = z.object({
  name: z.string(),
  endpoint: z.string(),
  healthy: z.boolean(),
  latency_ms: nullable(u64),
  error: nullable(z.string()),
});

export const agentHealthSchema: Schema<AgentHealth> = z.object({
  agent_id: z.string(),
  health_checks: z.array(healthCheckSchema),
});

export const kingCommandSchema: Schema<KingCommand> = z.object({
  command: z.string(),
  target_agent: z.string(),
  params: jsonObjectSchema,
});

export const kingConfigUpdateSchema: Schema<KingConfigUpdate> = z.object({
  config_type: z.string(),
  new_config_hash: z.string(),
});

export const pipelineNextSchema: Schema<PipelineNext> = z.object({
  stage: pipelineStageSchema,
  artifact_id: z.string(),
  metadata: jsonObjectSchema,
});

export const pipelineStageResultSchema: Schema<PipelineStageResult> = z.object({
  run_id: z.string(),
  stage: pipelineStageSchema,
  agent_id: z.string(),
  status: pipelineRunStatusSchema,
  artifact_id: z.string(),
  output: jsonValueSchema,
  error: nullable(z.string()),
});

export const taskCreateSchema: Schema<TaskCreate> = z.object({
  task_type: z.string(),
  agent_id: nullable(z.string()),
  payload: jsonValueSchema.default({}),
  parent_id: nullable(z.string()),
});

export const taskUpdateSchema: Schema<TaskUpdate> = z.object({
  task_id: z.string(),
  status: nullable(taskStatusSchema),
  agent_id: nullable(z.string()),
  payload: nullable(jsonValueSchema),
});

export const taskGetSchema: Schema<TaskGet> = z.object({ task_id: z.string() });

export const taskListSchema: Schema<TaskList> = z.object({
  limit: u32.default(50),
  status: nullable(taskStatusSchema),
  agent_id: nullable(z.string()),
  parent_id: nullable(z.string()),
});

export const taskDeleteSchema: Schema<TaskDelete> = z.object({ task_id: z.string() });

export const taskRecordSchema: Schema<TaskRecord> = z.object({
  id: z.string(),
  task_type: z.string(),
  status: z.string(),
  agent_id: z.string(),
  payload: jsonValueSchema,
  parent_id: z.string().default(""),
  created_at: z.string(),
  updated_at: z.string(),
});

export const memoryTierEntrySchema: Schema<MemoryTierEntry> = z.object({
  tier: z.string(),
  content: z.string(),
});

export const memoryStoreSchema: Schema<MemoryStore> = z.object({
  scope: memoryScopeSchema,
  category: memoryCategorySchema,
  key: z.string().default(""),
  metadata: jsonValueSchema.default({}),
  tags: z.array(z.string()).default([]),
  agent_id: z.string().default(""),
  run_id: z.string().default(""),
  skill_id: z.string().default(""),
  relevance_score: z.number().finite().default(0),
  tiers: z.array(memoryTierEntrySchema).default([]),
  task_id: nullable(z.string()),
});

export const memoryQuerySchema: Schema<MemoryQuery> = z.object({
  query: z.string(),
  scope: nullable(memoryScopeSchema),
  category: nullable(memoryCategorySchema),
  agent_id: nullable(z.string()),
  tier: nullable(z.string()),
  task_id: nullable(z.string()),
  limit: u32.default(20),
});

export const memoryTierRecordSchema: Schema<MemoryTierRecord> = z.object({
  id: z.string(),
  memory_id: z.string(),
  tier: z.string(),
  content: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
});

export const memoryRecordSchema: Schema<MemoryRecord> = z.object({
  id: z.string(),
  scope: z.string(),
  category: z.string(),
  key: z.string(),
  tiers: z.array(memoryTierRecordSchema).default([]),
  metadata: jsonValueSchema.default({}),
  tags: z.array(z.string()).default([]),
  agent_id: z.string().default(""),
  run_id: z.string().default(""),
  skill_id: z.string().default(""),
  relevance_score: z.number().finite().default(0),
  access_count: z.number().int().default(0),
  created_at: z.string(),
  updated_at: z.string(),
});

export const memoryResultSchema: Schema<MemoryResult> = z.object({
  memories: z.array(memoryRecordSchema),
  count: u32,
});

export const memoryChangedSchema: Schema<MemoryChanged> = z.object({
  action: z.string(),
  memory: nullable(memoryRecordSchema),
  memory_id: nullable(z.string()),
});

export const taskInviteSchema: Schema<TaskInvite> = z.object({
  task_id: z.string(),
  task_type: z.string(),
  payload: jsonValueSchema.default(null),
});

export const taskOutputSchema: Schema<TaskOutput> = z.object({
  task_id: z.string(),
  request_id: z.string(),
  source: z.string(),
  delta: z.string(),
  chunk_index: u32,
  is_final: z.boolean().default(false),
});

export const taskEvaluateSchema: Schema<TaskEvaluate> = z.object({
  task_id: z.string(),
  task_type: z.string(),
  output_summary: z.string().default(""),
  exit_code: nullable(i32),
  latency_ms: nullable(u64),
  metadata: jsonValueSchema.default(null),
});

export const taskSummarySchema: Schema<TaskSummary> = z.object({
  task_id: z.string(),
  agent_id: z.string(),
  summary: z.string(),
  score: nullable(z.number().finite()),
  tags: z.array(z.string()).default([]),
  evaluation: jsonValueSchema.default(null),
});
