import type { JsonObject, JsonValue } from "../shared/json.js";

export const PIPELINE_ROLE_NAMES = ["skill_manage", "learning", "pre_load", "building", "evaluation"] as const;
export type PipelineRoleName = (typeof PIPELINE_ROLE_NAMES)[number];

/** A canonical pipeline role, or an operator-defined role carried verbatim. */
export type AgentRole = PipelineRoleName | { readonly user: string };

export const RUNNER_STATUSES = ["starting", "ready", "busy", "error", "shutting"] as const;
export type RunnerStatus = (typeof RUNNER_STATUSES)[number];

export type SkillResult = "success" | { readonly failure: string } | { readonly partial: string };

/** Stages in the order a pipeline run walks them. */
export const PIPELINE_STAGES = ["learning", "building", "pre_load", "evaluation", "skill_manage"] as const;
export type PipelineStage = (typeof PIPELINE_STAGES)[number];

export const PIPELINE_RUN_STATUSES = ["running", "completed", "failed", "timed_out"] as const;
export type PipelineRunStatus = (typeof PIPELINE_RUN_STATUSES)[number];

export const TASK_STATUSES = ["pending", "in_progress", "completed", "failed", "cancelled"] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export const MEMORY_SCOPES = ["system", "agent", "pipeline", "skill"] as const;
export type MemoryScope = (typeof MEMORY_SCOPES)[number];

export const MEMORY_CATEGORIES = ["case", "pattern", "fact", "preference", "resource", "event"] as const;
export type MemoryCategory = (typeof MEMORY_CATEGORIES)[number];

// Agent -> king

export interface AgentRegister {
  readonly agent_id: string;
  readonly role: AgentRole;
  readonly capabilities: readonly string[];
}

export interface AgentStatus {
  readonly agent_id: string;
  readonly status: RunnerStatus;
  readonly metrics: JsonObject;
}

export interface AgentSkillReport {
  readonly agent_id: string;
  readonly skill_id: string;
  readonly result: SkillResult;
  readonly score: number | null;
}

export interface HealthCheck {
  readonly name: string;
  readonly endpoint: string;
  readonly healthy: boolean;
  readonly latency_ms: number | null;
  readonly error: string | null;
}

export interface AgentHealth {
  readonly agent_id: string;
  readonly health_checks: readonly HealthCheck[];
}

// King -> agent

export interface KingCommand {
  readonly command: string;
  readonly target_agent: string;
  readonly params: JsonObject;
}

export interface KingConfigUpdate {
  readonly config_type: string;
  readonly new_config_hash: string;
}

// Pipeline

export interface PipelineNext {
  readonly stage: PipelineStage;
  readonly artifact_id: string;
  readonly metadata: JsonObject;
}

/** Sent by an agent when it finishes its stage of a pipeline run. */
export interface PipelineStageResult {
  readonly run_id: string;
  readonly stage: PipelineStage;
  readonly agent_id: string;
  readonly status: PipelineRunStatus;
  readonly artifact_id: string;
  readonly output: JsonValue;
  readonly error: string | null;
}

// Task management

export interface TaskCreate {
  readonly task_type: string;
  readonly agent_id: string | null;
  readonly payload: JsonValue;
  readonly parent_id: string | null;
}

export interface TaskUpdate {
  readonly task_id: string;
  readonly status: TaskStatus | null;
  readonly agent_id: string | null;
  readonly payload: JsonValue | null;
}

export interface TaskGet {
  readonly task_id: string;
}

export interface TaskList {
  readonly limit: number;
  readonly status: TaskStatus | null;
  readonly agent_id: string | null;
  readonly parent_id: string | null;
}

export interface TaskDelete {
  readonly task_id: string;
}

export interface TaskRecord {
  readonly id: string;
  readonly task_type: string;
  readonly status: string;
  readonly agent_id: string;
  readonly payload: JsonValue;
  readonly parent_id: string;
  readonly created_at: string;
  readonly updated_at: string;
}

// Memory

/** One tier (`l0`, `l1`, `l2`) of a memory being stored or updated. */
export interface MemoryTierEntry {
  readonly tier: string;
  readonly content: string;
}

export interface MemoryStore {
  readonly scope: MemoryScope;
  readonly category: MemoryCategory;
  readonly key: string;
  readonly metadata: JsonValue;
  readonly tags: readonly string[];
  readonly agent_id: string;
  readonly run_id: string;
  readonly skill_id: string;
  readonly relevance_score: number;
  readonly tiers: readonly MemoryTierEntry[];
  readonly task_id: string | null;
}

export interface MemoryQuery {
  readonly query: string;
  readonly scope: MemoryScope | null;
  readonly category: MemoryCategory | null;
  readonly agent_id: string | null;
  readonly tier: string | null;
  readonly task_id: string | null;
  readonly limit: number;
}

export interface MemoryTierRecord {
  readonly id: string;
  readonly memory_id: string;
  readonly tier: string;
  readonly content: string;
  readonly created_at: string;
  readonly updated_at: string;
}

export interface MemoryRecord {
  readonly id: string;
  readonly scope: string;
  readonly category: string;
  readonly key: string;
  readonly tiers: readonly MemoryTierRecord[];
  readonly metadata: JsonValue;
  readonly tags: readonly string[];
  readonly agent_id: string;
  readonly run_id: string;
  readonly skill_id: string;
  readonly relevance_score: number;
  readonly access_count: number;
  readonly created_at: string;
  readonly updated_at: string;
}

export interface MemoryResult {
  readonly memories: readonly MemoryRecord[];
  readonly count: number;
}

/** Broadcast when a memory is created, updated or deleted. */
export interface MemoryChanged {
  readonly action: string;
  readonly memory: MemoryRecord | null;
  readonly memory_id: string | null;
}

// Task rooms

export interface TaskInvite {
  readonly task_id: string;
  readonly task_type: string;
  readonly payload: JsonValue;
}

export interface TaskOutput {
  readonly task_id: string;
  readonly request_id: string;
  /** `pty` or `llm`. */
  readonly source: string;
  readonly delta: string;
  readonly chunk_index: number;
  readonly is_final: boolean;
}

export interface TaskEvaluate {
  readonly task_id: string;
  readonly task_type: string;
  /** Accumulated output, truncated by the sender when very large. */
  readonly output_summary: string;
  readonly exit_code: number | null;
  readonly latency_ms: number | null;
  readonly metadata: JsonValue;
}

export interface TaskSummary {
  readonly task_id: string;
  readonly agent_id: string;
  readonly summary: string;
  readonly score: number | null;
  readonly tags: readonly string[];
  readonly evaluation: JsonValue;
}
