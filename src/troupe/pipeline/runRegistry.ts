/**
 * Run Registry for the HTTP surface.
 * Tracks runs in flight and recently finished so they can be listed, inspected and canceled.
 */

import crypto from "node:crypto";
import { TroupeError } from "../errors.js";
import type { RunResult, TerminalReason } from "./types.js";

function isoNow(): string {
  return new Date().toISOString();
}

export type RunStatus = "running" | "completed" | "failed" | "canceled";

export type RunRecord = {
  id: string;
  pipeline: string;
  task: string;
  createdAt: string;
  updatedAt: string;
  status: RunStatus;
  /** Set by `cancel`; the status only changes once the run reports its result */
  cancelRequested: boolean;
  result?: RunResult;
};

export type SetResultOutcome =
  | { success: true; wasIdempotent: boolean }
  | { success: false; reason: "not_found" };

export function statusForReason(reason: TerminalReason): RunStatus {
  switch (reason) {
    case "completed":
    case "max_rounds_exceeded":
      return "completed";
    case "canceled":
      return "canceled";
    case "agent_failed":
    case "routing_failed":
      return "failed";
  }
}

/**
 * In-memory run registry. Once `maxRuns` is reached the oldest finished records
 * are evicted. Running records are never evicted; their number is bounded by
 * the caller's concurrency limit.
 */
export class RunRegistry {
  private readonly runs = new Map<string, RunRecord>();
  private readonly controllers = new Map<string, AbortController>();
  private readonly maxRuns: number;

  constructor(maxRuns = 1000) {
    this.maxRuns = maxRuns;
  }

  /**
   * Record a new running run.
   * @throws TroupeError CONFLICT if `requestedId` is already in use
   */
  create(pipeline: string, task: string, requestedId?: string): { id: string; signal: AbortSignal } {
    if (requestedId !== undefined && this.runs.has(requestedId)) {
      throw new TroupeError("CONFLICT", `Run ${requestedId} already exists`, { runId: requestedId });
    }
    this.evictFinished();

    const id = requestedId ?? crypto.randomUUID();
    const now = isoNow();
    const controller = new AbortController();
    this.runs.set(id, {
      id,
      pipeline,
      task,
      createdAt: now,
      updatedAt: now,
      status: "running",
      cancelRequested: false
    });
    this.controllers.set(id, controller);
    return { id, signal: controller.signal };
  }

  get(id: string): RunRecord | undefined {
    return this.runs.get(id);
  }

  /**
   * Attach the final result. Idempotent: a second call for the same run is a no-op.
   * The status follows the result's terminal reason, so a run that finished
   * normally after a late cancel request reads `completed`.
   */
  setResult(id: string, result: RunResult): SetResultOutcome {
    const run = this.runs.get(id);
    if (!run) {
      return { success: false, reason: "not_found" };
    }
    if (run.result !== undefined) {
      return { success: true, wasIdempotent: true };
    }

    run.result = result;
    run.status = statusForReason(result.reason);
    run.updatedAt = isoNow();
    this.controllers.delete(id);
    return { success: true, wasIdempotent: false };
  }

  /**
   * Signal cancellation to a running run. Takes effect at its next turn boundary.
   * Returns false for unknown or finished runs and for repeated requests.
   */
  cancel(id: string): boolean {
    const run = this.runs.get(id);
    if (!run || run.status !== "running" || run.cancelRequested) return false;

    run.cancelRequested = true;
    run.updatedAt = isoNow();
    this.controllers.get(id)?.abort();
    return true;
  }

  list(status?: RunStatus): RunRecord[] {
    const all = [...this.runs.values()];
    return status ? all.filter((r) => r.status === status) : all;
  }

  delete(id: string): boolean {
    this.controllers.delete(id);
    return this.runs.delete(id);
  }

  private evictFinished(): void {
    if (this.runs.size < this.maxRuns) return;
    for (const [id, run] of this.runs) {
      if (run.status === "running") continue;
      this.delete(id);
      if (this.runs.size < this.maxRuns) return;
    }
  }

  stats(): { total: number; byStatus: Record<RunStatus, number> } {
    const byStatus: Record<RunStatus, number> = { running: 0, completed: 0, failed: 0, canceled: 0 };
    for (const run of this.runs.values()) {
      byStatus[run.status]++;
    }
    return { total: this.runs.size, byStatus };
  }
}
