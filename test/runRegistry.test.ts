import { describe, expect, it } from "vitest";
import { RunRegistry, statusForReason } from "../src/troupe/pipeline/runRegistry.js";
import type { RunResult, TerminalReason } from "../src/troupe/pipeline/types.js";

function result(runId: string, reason: TerminalReason): RunResult {
  return {
    runId,
    pipeline: "p",
    strategy: "sequential",
    reason,
    content: "out",
    finalAgent: reason === "completed" ? "a" : null,
    transcript: [],
    startedAt: "2026-01-01T00:00:00.000Z",
    durationMs: 1
  };
}

describe("RunRegistry", () => {
  it("tracks a run from creation to result", () => {
    const registry = new RunRegistry();
    const { id, signal } = registry.create("p", "task");

    expect(registry.get(id)?.status).toBe("running");
    expect(signal.aborted).toBe(false);

    expect(registry.setResult(id, result(id, "completed"))).toEqual({ success: true, wasIdempotent: false });
    expect(registry.get(id)?.status).toBe("completed");
    expect(registry.get(id)?.result?.content).toBe("out");
  });

  it("ignores a second result for the same run", () => {
    const registry = new RunRegistry();
    const { id } = registry.create("p", "task");
    registry.setResult(id, result(id, "agent_failed"));

    expect(registry.setResult(id, result(id, "completed"))).toEqual({ success: true, wasIdempotent: true });
    expect(registry.get(id)?.status).toBe("failed");
  });

  it("reports unknown runs", () => {
    expect(new RunRegistry().setResult("missing", result("missing", "completed"))).toEqual({
      success: false,
      reason: "not_found"
    });
  });

  it("aborts the run signal on cancel and takes the status from the result", () => {
    const registry = new RunRegistry();
    const { id, signal } = registry.create("p", "task");

    expect(registry.cancel(id)).toBe(true);
    expect(signal.aborted).toBe(true);
    expect(registry.get(id)).toMatchObject({ status: "running", cancelRequested: true });
    expect(registry.cancel(id)).toBe(false);

    registry.setResult(id, result(id, "canceled"));
    expect(registry.get(id)?.status).toBe("canceled");
    expect(registry.cancel(id)).toBe(false);
  });

  it("reports a run that finished despite a cancel request as completed", () => {
    const registry = new RunRegistry();
    const { id } = registry.create("p", "task");
    registry.cancel(id);

    registry.setResult(id, result(id, "completed"));

    expect(registry.get(id)?.status).toBe("completed");
    expect(registry.get(id)?.result?.reason).toBe("completed");
  });

  it("evicts the oldest finished run when full", () => {
    const registry = new RunRegistry(2);
    const first = registry.create("p", "1");
    const second = registry.create("p", "2");
    registry.setResult(first.id, result(first.id, "completed"));
    registry.setResult(second.id, result(second.id, "completed"));
    const third = registry.create("p", "3");

    expect(registry.get(first.id)).toBeUndefined();
    expect(registry.list().map((r) => r.id)).toEqual([second.id, third.id]);
  });

  it("never evicts a running run", () => {
    const registry = new RunRegistry(1);
    const first = registry.create("p", "slow");
    const second = registry.create("p", "fast");

    expect(registry.list().map((r) => r.id)).toEqual([first.id, second.id]);
    expect(registry.cancel(first.id)).toBe(true);

    registry.setResult(first.id, result(first.id, "agent_failed"));
    expect(registry.get(first.id)?.status).toBe("failed");

    registry.setResult(second.id, result(second.id, "completed"));
    const third = registry.create("p", "next");
    expect(registry.list().map((r) => r.id)).toEqual([third.id]);
  });

  it("accepts a caller-chosen id once", () => {
    const registry = new RunRegistry();
    const { id } = registry.create("p", "task", "run-1");

    expect(id).toBe("run-1");
    expect(() => registry.create("p", "again", "run-1")).toThrow(
      expect.objectContaining({ code: "CONFLICT", message: "Run run-1 already exists" })
    );
  });

  it("filters and counts by status", () => {
    const registry = new RunRegistry();
    const a = registry.create("p", "a");
    registry.create("p", "b");
    registry.setResult(a.id, result(a.id, "routing_failed"));

    expect(registry.list("running")).toHaveLength(1);
    expect(registry.stats()).toEqual({ total: 2, byStatus: { running: 1, completed: 0, failed: 1, canceled: 0 } });
  });

  it("maps terminal reasons onto run statuses", () => {
    expect(statusForReason("max_rounds_exceeded")).toBe("completed");
    expect(statusForReason("agent_failed")).toBe("failed");
    expect(statusForReason("canceled")).toBe("canceled");
  });
});
