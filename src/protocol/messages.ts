import { createCodec } from "./codec.js";
import * as schemas from "./schemas.js";

export const agentRoleCodec = createCodec("AgentRole", schemas.agentRoleSchema);
export const runnerStatusCodec = createCodec("RunnerStatus", schemas.runnerStatusSchema);
export const skillResultCodec = createCodec("SkillResult", schemas.skillResultSchema);
export const pipelineStageCodec = createCodec("PipelineStage", schemas.pipelineStageSchema);
export const pipelineRunStatusCodec = createCodec("PipelineRunStatus", schemas.pipelineRunStatusSchema);
export const taskStatusCodec = createCodec("TaskStatus", schemas.taskStatusSchema);
export const memoryScopeCodec = createCodec("MemoryScope", schemas.memoryScopeSchema);
export const memoryCategoryCodec = createCodec("MemoryCategory", schemas.memoryCategorySchema);

export const agentRegisterCodec = createCodec("AgentRegister", schemas.agentRegisterSchema);
export const agentStatusCodec = createCodec("AgentStatus", schemas.agentStatusSchema);
export const agentSkillReportCodec = createCodec("AgentSkillReport", schemas.agentSkillReportSchema);
export const agentHealthCodec = createCodec("AgentHealth", schemas.agentHealthSchema);
export const healthCheckCodec = createCodec("HealthCheck", schemas.healthCheckSchema);
export const kingCommandCodec = createCodec("KingCommand", schemas.kingCommandSchema);
export const kingConfigUpdateCodec = createCodec("KingConfigUpdate", schemas.kingConfigUpdateSchema);
export const pipelineNextCodec = createCodec("PipelineNext", schemas.pipelineNextSchema);
export const pipelineStageResultCodec = createCodec("PipelineStageResult", schemas.pipelineStageResultSchema);

export const taskCreateCodec = createCodec("TaskCreate", schemas.taskCreateSchema);
export const taskUpdateCodec = createCodec("TaskUpdate", schemas.taskUpdateSchema);
export const taskGetCodec = createCodec("TaskGet", schemas.taskGetSchema);
export const taskListCodec = createCodec("TaskList", schemas.taskListSchema);
export const taskDeleteCodec = createCodec("TaskDelete", schemas.taskDeleteSchema);
export const taskRecordCodec = createCodec("TaskRecord", schemas.taskRecordSchema);

export const memoryStoreCodec = createCodec("MemoryStore", schemas.memoryStoreSchema);
export const memoryQueryCodec = createCodec("MemoryQuery", schemas.memoryQuerySchema);
export const memoryRecordCodec = createCodec("MemoryRecord", schemas.memoryRecordSchema);
export const memoryResultCodec = createCodec("MemoryResult", schemas.memoryResultSchema);
export const memoryChangedCodec = createCodec("MemoryChanged", schemas.memoryChangedSchema);

export const taskInviteCodec = createCodec("TaskInvite", schemas.taskInviteSchema);
export const taskOutputCodec = createCodec("TaskOutput", schemas.taskOutputSchema);
export const taskEvaluateCodec = createCodec("TaskEvaluate", schemas.taskEvaluateSchema);
export const taskSummaryCodec = createCodec("TaskSummary", schemas.taskSummarySchema);
