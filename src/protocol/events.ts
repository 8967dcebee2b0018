import type { MessageCodec } from "./codec.js";
import * as codecs from "./messages.js";
import { agentRoleName } from "./roles.js";
import type {
  AgentHealth,
  AgentRegister,
  AgentRole,
  AgentSkillReport,
  AgentStatus,
  KingCommand,
  KingConfigUpdate,
  MemoryChanged,
  MemoryQuery,
  MemoryStore,
  PipelineNext,
  PipelineStageResult,
  TaskCreate,
  TaskDelete,
  TaskEvaluate,
  TaskGet,
  TaskInvite,
  TaskList,
  TaskOutput,
  TaskSummary,
  TaskUpdate,
} from "./types.js";

/**
 * Event names on the coordinator/agent channel. These strings are shared by
 * every participant; changing one needs a coordinated release.
 */
export const EVENTS = {
  AGENT_REGISTER: "agent:register",
  AGENT_STATUS: "agent:status",
  AGENT_SKILL_REPORT: "agent:skill_report",
  AGENT_HEALTH: "agent:health",
  KING_COMMAND: "king:command",
  KING_CONFIG_UPDATE: "king:config_update",
  PIPELINE_NEXT: "pipeline:next",
  PIPELINE_STAGE_RESULT: "pipeline:stage_result",

  TASK_CREATE: "task:create",
  TASK_UPDATE: "task:update",
  TASK_GET: "task:get",
  TASK_LIST: "task:list",
  TASK_DELETE: "task:delete",
  TASK_CHANGED: "task:changed",

  DEBUG_PROMPT: "debug:prompt",
  DEBUG_RESPONSE: "debug:response",
  DEBUG_STREAM: "debug:stream",

  MEMORY_STORE: "memory:store",
  MEMORY_QUERY: "memory:query",
  MEMORY_UPDATE: "memory:update",
  MEMORY_DELETE: "memory:delete",
  MEMORY_CHANGED: "memory:changed",

  TASK_INVITE: "task:invite",
  TASK_JOIN: "task:join",
  TASK_OUTPUT: "task:output",
  TASK_EVALUATE: "task:evaluate",
  TASK_SUMMARY: "task:summary",
  TASK_LOG: "task:log",
} as const;

export type EventName = (typeof EVENTS)[keyof typeof EVENTS];

export const ROOMS = {
  KERNEL: "kernel",
  ROLE_PREFIX: "role:",
  TASK_PREFIX: "task:",
} as const;

export function roleRoom(role: AgentRole): string {
  return `${ROOMS.ROLE_PREFIX}${agentRoleName(role)}`;
}

export function taskRoom(taskId: string): string {
  return `${ROOMS.TASK_PREFIX}${taskId}`;
}

const EVENT_NAMES: ReadonlySet<string> = new Set(Object.values(EVENTS));

export function isKnownEvent(name: string): name is EventName {
  return EVENT_NAMES.has(name);
}

/** Payload type of every event that carries a typed message. */
export interface EventPayloads {
  "agent:register": AgentRegister;
  "agent:status": AgentStatus;
  "agent:skill_report": AgentSkillReport;
  "agent:health": AgentHealth;
  "king:command": KingCommand;
  "king:config_update": KingConfigUpdate;
  "pipeline:next": PipelineNext;
  "pipeline:stage_result": PipelineStageResult;
  "task:create": TaskCreate;
  "task:update": TaskUpdate;
  "task:get": TaskGet;
  "task:list": TaskList;
  "task:delete": TaskDelete;
  "memory:store": MemoryStore;
  "memory:query": MemoryQuery;
  "memory:changed": MemoryChanged;
  "task:invite": TaskInvite;
  "task:output": TaskOutput;
  "task:evaluate": TaskEvaluate;
  "task:summary": TaskSummary;
}

export type TypedEventName = keyof EventPayloads;

export const EVENT_CODECS: { readonly [E in TypedEventName]: MessageCodec<EventPayloads[E]> } = {
  "agent:register": codecs.agentRegisterCodec,
  "agent:status": codecs.agentStatusCodec,
  "agent:skill_report": codecs.agentSkillReportCodec,
  "agent:health": codecs.agentHealthCodec,
  "king:command": codecs.kingCommandCodec,
  "king:config_update": codecs.kingConfigUpdateCodec,
  "pipeline:next": codecs.pipelineNextCodec,
  "pipeline:stage_result": codecs.pipelineStageResultCodec,
  "task:create": codecs.taskCreateCodec,
  "task:update": codecs.taskUpdateCodec,
  "task:get": codecs.taskGetCodec,
  "task:list": codecs.taskListCodec,
  "task:delete": codecs.taskDeleteCodec,
  "memory:store": codecs.memoryStoreCodec,
  "memory:query": codecs.memoryQueryCodec,
  "memory:changed": codecs.memoryChangedCodec,
  "task:invite": codecs.taskInviteCodec,
  "task:output": codecs.taskOutputCodec,
  "task:evaluate": codecs.taskEvaluateCodec,
  "task:summary": codecs.taskSummaryCodec,
};

export function isTypedEvent(name: string): name is TypedEventName {
  return Object.prototype.hasOwnProperty.call(EVENT_CODECS, name);
}

/** Validates a payload received on `event`. Throws a SchemaError when it does not fit. */
export function decodeEvent<E extends TypedEventName>(event: E, payload: unknown): EventPayloads[E] {
  const codec: MessageCodec<EventPayloads[E]> = EVENT_CODECS[event];
  return codec.parse(payload);
}

/** Canonical JSON text of a payload about to be sent on `event`. */
export function encodeEvent<E extends TypedEventName>(event: E, payload: EventPayloads[E]): string {
  const codec: MessageCodec<EventPayloads[E]> = EVENT_CODECS[event];
  return codec.encode(payload);
}
