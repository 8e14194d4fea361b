/**
 * Pipeline engine: resolves a pipeline against a roster, builds agent handles,
 * hands the run to the matching strategy and shapes the result.
 *
 * The engine holds no turn-taking logic and no state between runs. Every run
 * gets its own Conversation, handles and cancellation signal, so any number
 * of runs may execute concurrently on one engine.
 */

import crypto from "node:crypto";
import {
  createBackendContext,
  createDefaultBackendRegistry,
  type BackendContext,
  type BackendRegistry
} from "../agents/registry.js";
import type { AgentHandle } from "../agents/types.js";
import type { AgentSpec, PipelineSpec, Roster } from "../config/types.js";
import { Conversation, composeFollowUpTask } from "../conversation.js";
import { configurationError } from "../errors.js";
import { createLogger, preview, type Logger } from "../logger.js";
import { STRATEGIES, keywordTermination } from "./strategies/index.js";
import type {
  RunEvent,
  RunEventOptions,
  RunEventPayload,
  RunOptions,
  RunResult,
  TerminationPredicate
} from "./types.js";

function isoNow(): string {
  return new Date().toISOString();
}

/**
 * Deliver an event to the observer in its own microtask, so a throwing or slow
 * observer can neither break nor re-enter the run.
 */
function emitEvent(options: RunEventOptions | undefined, event: RunEvent, logger: Logger): void {
  if (!options?.onEvent) return;
  const handler = options.onEvent;
  if (event.type === "turn_started" && options.emitTurnStarted === false) return;
  if (event.type === "turn_completed" && options.emitTurnCompleted === false) return;

  const report = (err: unknown): void => {
    logger.debug("event_handler_failed", { event: event.type, reason: err instanceof Error ? err.message : String(err) });
  };

  queueMicrotask(() => {
    try {
      const result = handler(event);
      if (result instanceof Promise) {
        result.catch(report);
      }
    } catch (err) {
      report(err);
    }
  });
}

function combineSignals(options: RunOptions): AbortSignal {
  const signals: AbortSignal[] = [];
  if (options.signal) signals.push(options.signal);
  if (options.timeoutMs !== undefined && options.timeoutMs > 0) {
    signals.push(AbortSignal.timeout(options.timeoutMs));
  }
  const [only] = signals;
  if (signals.length === 1 && only) return only;
  if (signals.length > 1) return AbortSignal.any(signals);
  return new AbortController().signal;
}

export type ResolvedPipeline = {
  spec: PipelineSpec;
  /** Agent specs in pipeline order (repeats preserved for sequential pipelines) */
  agents: AgentSpec[];
};

export type PipelineEngineOptions = {
  backends?: BackendRegistry;
  /** Credentials, tools and I/O hooks handed to every backend */
  context?: Partial<BackendContext>;
  logger?: Logger;
  /** Clock for turn timestamps */
  clock?: () => Date;
};

export class PipelineEngine {
  private readonly backends: BackendRegistry;
  private readonly context: BackendContext;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(options: PipelineEngineOptions = {}) {
    this.backends = options.backends ?? createDefaultBackendRegistry();
    this.logger = options.logger ?? createLogger("engine");
    this.context = createBackendContext({ logger: this.logger.child("agents"), ...options.context });
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Check a pipeline against a roster without invoking anything.
   * @throws TroupeError CONFIGURATION_ERROR
   */
  resolve(spec: PipelineSpec, roster: Roster): ResolvedPipeline {
    if (spec.agents.length === 0) {
      throw configurationError(`Pipeline '${spec.name}' lists no agents`);
    }
    if (!Number.isInteger(spec.maxRounds) || spec.maxRounds < 1) {
      throw configurationError(`Pipeline '${spec.name}' has invalid max_rounds ${spec.maxRounds}`);
    }

    const missing = spec.agents.filter((name) => !roster.has(name));
    if (missing.length > 0) {
      throw configurationError(
        `Pipeline '${spec.name}' references unknown agent(s): ${[...new Set(missing)].join(", ")}`,
        { pipeline: spec.name, missing }
      );
    }

    if (spec.strategy !== "sequential" && new Set(spec.agents).size !== spec.agents.length) {
      throw configurationError(`Pipeline '${spec.name}' lists an agent more than once; only sequential pipelines may repeat agents`);
    }

    if (spec.strategy === "supervisor") {
      if (!spec.supervisorAgent) {
        throw configurationError(`Pipeline '${spec.name}' uses the supervisor strategy but sets no supervisor_agent`);
      }
      if (!spec.agents.includes(spec.supervisorAgent)) {
        throw configurationError(
          `Supervisor '${spec.supervisorAgent}' of pipeline '${spec.name}' is not one of its agents`
        );
      }
      if (spec.agents.length < 2) {
        throw configurationError(`Supervisor pipeline '${spec.name}' has no specialists to route to`);
      }
    }

    const agents: AgentSpec[] = [];
    for (const name of spec.agents) {
      const agent = roster.get(name);
      if (!agent) throw configurationError(`Agent '${name}' vanished from roster during resolution`);
      if (!this.backends.has(agent.backend)) {
        throw configurationError(
          `Unknown backend '${agent.backend}' for agent '${agent.name}'. Choose one of: ${this.backends.kinds().join(" | ")}`
        );
      }
      agents.push(agent);
    }

    return { spec, agents };
  }

  /**
   * Build one handle per distinct agent, in pipeline order.
   */
  private buildHandles(resolved: ResolvedPipeline): AgentHandle[] {
    const byName = new Map<string, AgentHandle>();
    return resolved.agents.map((agent) => {
      const existing = byName.get(agent.name);
      if (existing) return existing;
      const handle = this.backends.create(agent, this.context);
      byName.set(agent.name, handle);
      return handle;
    });
  }

  private terminationFor(spec: PipelineSpec, options: RunOptions): TerminationPredicate | undefined {
    if (options.terminate) return options.terminate;
    if (spec.terminationKeyword !== undefined) return keywordTermination(spec.terminationKeyword);
    return undefined;
  }

  /**
   * Run a pipeline to completion.
   *
   * Configuration problems throw before any agent is invoked. Everything that
   * happens after the first turn starts is reported through `RunResult.reason`.
   */
  async run(spec: PipelineSpec, message: string, roster: Roster, options: RunOptions = {}): Promise<RunResult> {
    const task = options.history ? composeFollowUpTask(options.history, message) : message;
    const resolved = this.resolve(spec, roster);
    const agents = this.buildHandles(resolved);

    const runId = options.runId ?? crypto.randomUUID();
    const startedAt = this.clock().toISOString();
    const start = Date.now();
    const signal = combineSignals(options);
    const conversation = new Conversation(this.clock);
    const logger = this.logger.child(spec.name);

    const emit = (payload: RunEventPayload): void => {
      emitEvent(options.events, { ...payload, timestamp: isoNow(), runId, pipeline: spec.name }, logger);
    };

    logger.info("pipeline_start", { runId, strategy: spec.strategy, task: preview(task) });
    emit({ type: "run_started", strategy: spec.strategy, task });

    const terminate = this.terminationFor(spec, options);
    const outcome = await STRATEGIES[spec.strategy]({
      runId,
      spec,
      task,
      agents,
      conversation,
      signal,
      emit,
      logger,
      ...(terminate !== undefined && { terminate })
    });

    const result: RunResult = {
      runId,
      pipeline: spec.name,
      strategy: spec.strategy,
      reason: outcome.reason,
      content: outcome.content,
      finalAgent: outcome.finalAgent,
      transcript: conversation.snapshot(),
      startedAt,
      durationMs: Date.now() - start
    };
    if (outcome.error) {
      result.error = outcome.error;
    }

    logger.info("pipeline_done", {
      runId,
      reason: result.reason,
      turns: result.transcript.length,
      finalAgent: result.finalAgent,
      durationMs: result.durationMs
    });
    emit({ type: "run_completed", reason: result.reason, turns: result.transcript.length, durationMs: result.durationMs });

    return result;
  }
}
