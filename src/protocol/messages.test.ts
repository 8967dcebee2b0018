import { describe, it, expect } from "vitest";
import { SchemaError } from "../shared/errors.js";
import {
  agentHealthCodec,
  agentRegisterCodec,
  agentSkillReportCodec,
  agentStatusCodec,
  kingCommandCodec,
  memoryChangedCodec,
  memoryQueryCodec,
  memoryStoreCodec,
  pipelineNextCodec,
  pipelineRunStatusCodec,
  pipelineStageResultCodec,
  skillResultCodec,
  taskCreateCodec,
  taskEvaluateCodec,
  taskListCodec,
  taskOutputCodec,
  taskStatusCodec,
  taskUpdateCodec,
} from "./messages.js";
import type {
  AgentHealth,
  AgentRegister,
  KingCommand,
  MemoryStore,
  PipelineStageResult,
} from "./types.js";

describe("AgentRegister", () => {
  it("decodes a registration from a learning agent", () => {
    const message = agentRegisterCodec.decode(
      '{"agent_id":"learning-001","role":"learning","capabilities":["discover","evaluate"]}'
    );

    expect(message.agent_id).toBe("learning-001");
    expect(message.role).toBe("learning");
    expect(message.capabilities).toEqual(["discover", "evaluate"]);
  });

  it("encodes fields in declared order", () => {
    const message: AgentRegister = {
      capabilities: ["build"],
      role: "building",
      agent_id: "building-001",
    };

    expect(agentRegisterCodec.encode(message)).toBe(
      '{"agent_id":"building-001","role":"building","capabilities":["build"]}'
    );
  });

  it("keeps user roles verbatim", () => {
    const message: AgentRegister = { agent_id: "ops-1", role: { user: "Night-Shift Reviewer" }, capabilities: [] };

    const json = agentRegisterCodec.encode(message);
    expect(json).toBe('{"agent_id":"ops-1","role":{"user":"Night-Shift Reviewer"},"capabilities":[]}');
    expect(agentRegisterCodec.decode(json)).toEqual(message);
  });

  it("does not confuse a user role named like a canonical role", () => {
    const decoded = agentRegisterCodec.decode('{"agent_id":"a","role":{"user":"learning"},"capabilities":[]}');
    expect(decoded.role).toEqual({ user: "learning" });
  });

  it("ignores unknown extra fields", () => {
    const plain = agentRegisterCodec.decode('{"agent_id":"a","role":"evaluation","capabilities":["score"]}');
    const extended = agentRegisterCodec.decode(
      '{"agent_id":"a","role":"evaluation","capabilities":["score"],"skills":["web-search"]}'
    );

    expect(extended).toEqual(plain);
  });

  it("rejects a missing required field", () => {
    const result = agentRegisterCodec.safeDecode('{"agent_id":"a","role":"learning"}');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(SchemaError);
      expect(result.error.codec).toBe("AgentRegister");
      expect(result.error.issues[0]?.path).toBe("capabilities");
    }
  });

  it("rejects a mistyped field", () => {
    expect(() => agentRegisterCodec.decode('{"agent_id":"a","role":5,"capabilities":[]}')).toThrow(SchemaError);
  });

  it("rejects an unknown role variant", () => {
    expect(() => agentRegisterCodec.decode('{"agent_id":"a","role":"janitor","capabilities":[]}')).toThrow(
      SchemaError
    );
  });

  it("reports malformed JSON as a schema error", () => {
    const result = agentRegisterCodec.safeDecode("{not json");

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toBe("");
    }
  });
});

describe("SkillResult", () => {
  it("encodes success as a bare string", () => {
    expect(skillResultCodec.encode("success")).toBe('"success"');
  });

  it("recovers the failure variant and its message", () => {
    expect(skillResultCodec.decode('{"failure":"timeout"}')).toEqual({ failure: "timeout" });
  });

  it("keeps failure and partial apart", () => {
    expect(skillResultCodec.decode('{"partial":"2 of 3 sources"}')).toEqual({ partial: "2 of 3 sources" });
    expect(() => skillResultCodec.decode('{"failure":"a","partial":"b"}')).toThrow(SchemaError);
  });
});

describe("AgentSkillReport", () => {
  it("encodes an absent score as null", () => {
    const json = agentSkillReportCodec.encode({
      agent_id: "evaluation-001",
      skill_id: "web-search",
      result: { partial: "2 of 3" },
      score: null,
    });

    expect(json).toBe('{"agent_id":"evaluation-001","skill_id":"web-search","result":{"partial":"2 of 3"},"score":null}');
  });

  it("decodes a missing score to null", () => {
    const report = agentSkillReportCodec.decode('{"agent_id":"a","skill_id":"s","result":"success"}');
    expect(report.score).toBeNull();
  });
});

describe("AgentStatus", () => {
  it("encodes equal metrics identically regardless of key order", () => {
    const first = agentStatusCodec.encode({ agent_id: "w", status: "busy", metrics: { b: 1, a: { d: 2, c: 3 } } });
    const second = agentStatusCodec.encode({ agent_id: "w", status: "busy", metrics: { a: { c: 3, d: 2 }, b: 1 } });

    expect(first).toBe(second);
    expect(first).toBe('{"agent_id":"w","status":"busy","metrics":{"a":{"c":3,"d":2},"b":1}}');
  });

  it("refuses a __proto__ key instead of dropping it", () => {
    const result = agentStatusCodec.safeDecode('{"agent_id":"w","status":"busy","metrics":{"__proto__":{"x":1},"k":1}}');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]).toEqual({ path: "metrics.__proto__", message: "Key __proto__ is not allowed" });
    }
  });

  it("requires metrics", () => {
    expect(() => agentStatusCodec.parse({ agent_id: "w", status: "ready" })).toThrow(SchemaError);
  });
});

describe("round trips", () => {
  it("round-trips health reports", () => {
    const health: AgentHealth = {
      agent_id: "building-001",
      health_checks: [
        { name: "gateway", endpoint: "http://localhost:8080/health", healthy: true, latency_ms: 12, error: null },
        { name: "registry", endpoint: "http://localhost:9000/health", healthy: false, latency_ms: null, error: "refused" },
      ],
    };

    expect(agentHealthCodec.decode(agentHealthCodec.encode(health))).toEqual(health);
  });

  it("round-trips king commands with nested params", () => {
    const command: KingCommand = {
      command: "reload",
      target_agent: "learning-001",
      params: { force: true, sources: ["a", "b"], limits: { depth: 2 } },
    };

    expect(kingCommandCodec.decode(kingCommandCodec.encode(command))).toEqual(command);
  });

  it("round-trips stage results with and without an error", () => {
    const completed: PipelineStageResult = {
      run_id: "run-001",
      stage: "learning",
      agent_id: "learning-001",
      status: "completed",
      artifact_id: "artifact-xyz",
      output: { candidates: 3 },
      error: null,
    };
    const failed: PipelineStageResult = {
      run_id: "run-002",
      stage: "building",
      agent_id: "building-001",
      status: "failed",
      artifact_id: "",
      output: null,
      error: "build failed: missing dependency",
    };

    expect(pipelineStageResultCodec.decode(pipelineStageResultCodec.encode(completed))).toEqual(completed);
    expect(pipelineStageResultCodec.decode(pipelineStageResultCodec.encode(failed))).toEqual(failed);
  });

  it("round-trips memory stores", () => {
    const store: MemoryStore = {
      scope: "agent",
      category: "pattern",
      key: "memory://agent/learning/api_pattern",
      metadata: { source: "pipeline" },
      tags: ["discovery", "api"],
      agent_id: "learning-001",
      run_id: "",
      skill_id: "",
      relevance_score: 0.85,
      tiers: [
        { tier: "l0", content: "API discovery pattern" },
        { tier: "l2", content: "Full detailed content" },
      ],
      task_id: null,
    };

    expect(memoryStoreCodec.decode(memoryStoreCodec.encode(store))).toEqual(store);
  });

  it("requires the output of a stage result even when it is null", () => {
    expect(() =>
      pipelineStageResultCodec.parse({
        run_id: "r",
        stage: "learning",
        agent_id: "a",
        status: "running",
        artifact_id: "x",
      })
    ).toThrow(SchemaError);
  });
});

describe("enumerations", () => {
  it("uses snake case on the wire", () => {
    expect(pipelineRunStatusCodec.encode("timed_out")).toBe('"timed_out"');
    expect(taskStatusCodec.encode("in_progress")).toBe('"in_progress"');
    expect(taskStatusCodec.decode('"in_progress"')).toBe("in_progress");
  });

  it("rejects upper-case variants", () => {
    expect(() => taskStatusCodec.decode('"IN_PROGRESS"')).toThrow(SchemaError);
  });
});

describe("defaults", () => {
  it("fills task list defaults", () => {
    expect(taskListCodec.decode("{}")).toEqual({ limit: 50, status: null, agent_id: null, parent_id: null });
  });

  it("keeps an explicit parent filter", () => {
    const list = taskListCodec.decode('{"parent_id":"parent-001"}');
    expect(list.parent_id).toBe("parent-001");
    expect(list.limit).toBe(50);
  });

  it("fills task create defaults", () => {
    expect(taskCreateCodec.decode('{"task_type":"test"}')).toEqual({
      task_type: "test",
      agent_id: null,
      payload: {},
      parent_id: null,
    });
  });

  it("decodes a partial task update", () => {
    const update = taskUpdateCodec.decode('{"task_id":"abc-123","status":"completed"}');
    expect(update).toEqual({ task_id: "abc-123", status: "completed", agent_id: null, payload: null });
  });

  it("fills memory query defaults", () => {
    const query = memoryQueryCodec.decode('{"query":"api discovery"}');
    expect(query.limit).toBe(20);
    expect(query.scope).toBeNull();
    expect(query.task_id).toBeNull();
  });

  it("fills task room defaults", () => {
    expect(taskOutputCodec.decode('{"task_id":"t","request_id":"r","source":"pty","delta":"ok","chunk_index":0}').is_final).toBe(
      false
    );
    expect(taskEvaluateCodec.decode('{"task_id":"t","task_type":"build"}')).toEqual({
      task_id: "t",
      task_type: "build",
      output_summary: "",
      exit_code: null,
      latency_ms: null,
      metadata: null,
    });
  });

  it("decodes a memory change without a record", () => {
    const changed = memoryChangedCodec.decode('{"action":"created","memory_id":"mem-001"}');
    expect(changed).toEqual({ action: "created", memory: null, memory_id: "mem-001" });
  });
});

describe("integer fields", () => {
  it("rejects negative and fractional counters", () => {
    expect(() =>
      agentHealthCodec.parse({
        agent_id: "a",
        health_checks: [{ name: "n", endpoint: "e", healthy: true, latency_ms: -1 }],
      })
    ).toThrow(SchemaError);
    expect(() =>
      taskOutputCodec.parse({ task_id: "t", request_id: "r", source: "llm", delta: "", chunk_index: 1.5 })
    ).toThrow(SchemaError);
  });

  it("accepts a negative exit code", () => {
    expect(taskEvaluateCodec.parse({ task_id: "t", task_type: "build", exit_code: -1 }).exit_code).toBe(-1);
  });
});

describe("PipelineNext", () => {
  it("decodes the stage variant", () => {
    const next = pipelineNextCodec.parse({ stage: "pre_load", artifact_id: "skill-xyz", metadata: {} });
    expect(next.stage).toBe("pre_load");
  });

  it("returns plain JSON from toJSON", () => {
    expect(pipelineNextCodec.toJSON({ stage: "building", artifact_id: "skill-xyz", metadata: { z: 1, a: 2 } })).toEqual({
      stage: "building",
      artifact_id: "skill-xyz",
      metadata: { a: 2, z: 1 },
    });
  });
});
