import {
  PIPELINE_ROLE_NAMES,
  PIPELINE_STAGES,
  type AgentRole,
  type PipelineRoleName,
  type PipelineStage,
} from "./types.js";

// Every canonical role has a pipeline stage of the same name and vice versa.
type Same<A, B> = [A] extends [B] ? ([B] extends [A] ? true : false) : false;
const rolesMatchStages: Same<PipelineRoleName, PipelineStage> = true;
void rolesMatchStages;

export function isPipelineRoleName(name: string): name is PipelineRoleName {
  return PIPELINE_ROLE_NAMES.some((role) => role === name);
}

export function isUserRole(role: AgentRole): role is { readonly user: string } {
  return typeof role !== "string";
}

/** The bare role name: `learning`, or the operator-defined name of a user role. */
export function agentRoleName(role: AgentRole): string {
  return isUserRole(role) ? role.user : role;
}

/**
 * Maps a role name as written in an agent config to a role. Names outside
 * the canonical set become user roles, kept verbatim.
 */
export function agentRoleFromName(name: string): AgentRole {
  return isPipelineRoleName(name) ? name : { user: name };
}

export function agentRolesEqual(a: AgentRole, b: AgentRole): boolean {
  if (isUserRole(a) || isUserRole(b)) {
    return isUserRole(a) && isUserRole(b) && a.user === b.user;
  }
  return a === b;
}

export function stageForRole(role: AgentRole): PipelineStage | null {
  return isUserRole(role) ? null : role;
}

export function roleForStage(stage: PipelineStage): AgentRole {
  return stage;
}

/** The stage after `stage`; the pipeline wraps from skill_manage back to learning. */
export function nextStage(stage: PipelineStage): PipelineStage {
  const index = PIPELINE_STAGES.indexOf(stage);
  return PIPELINE_STAGES[(index + 1) % PIPELINE_STAGES.length] ?? PIPELINE_STAGES[0];
}
