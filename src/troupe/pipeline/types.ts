/**
 * Pipeline run types: results, options and the events a run emits.
 */

import type { AgentHandle } from "../agents/types.js";
import type { PipelineSpec, StrategyKind } from "../config/types.js";
import type { ChatMessage, Conversation, Turn } from "../conversation.js";
import type { Logger } from "../logger.js";

/**
 * Why a run stopped. Only `completed` and `max_rounds_exceeded` are normal endings.
 */
export type TerminalReason =
  | "completed"
  | "max_rounds_exceeded"
  | "agent_failed"
  | "routing_failed"
  | "canceled";

export type RunError = {
  code: "AGENT_FAILED" | "ROUTING_FAILED" | "CANCELED";
  message: string;
  /** Agent whose invocation or output caused the failure */
  agent?: string;
  /** Normalised backend failure type, for AGENT_FAILED */
  type?: string;
};

/**
 * Final result of one pipeline run. Plain data, safe to serialise.
 */
export type RunResult = {
  runId: string;
  pipeline: string;
  strategy: StrategyKind;
  reason: TerminalReason;
  /** Final output, or the error message for failure outcomes */
  content: string;
  /** Agent that produced `content`; null for failure outcomes */
  finalAgent: string | null;
  transcript: Turn[];
  startedAt: string;
  durationMs: number;
  error?: RunError;
};

/**
 * Decides, after each appended turn, whether a group chat is done.
 */
export type TerminationPredicate = (turn: Turn, transcript: readonly Turn[]) => boolean;

/**
 * What a strategy reports back to the engine. The engine adds identity and timing.
 */
export type StrategyOutcome = {
  reason: TerminalReason;
  content: string;
  finalAgent: string | null;
  error?: RunError;
};

export type StrategyContext = {
  runId: string;
  spec: PipelineSpec;
  task: string;
  /** Handles in the order the pipeline declares them */
  agents: readonly AgentHandle[];
  conversation: Conversation;
  signal: AbortSignal;
  terminate?: TerminationPredicate;
  emit: (event: RunEventPayload) => void;
  logger: Logger;
};

export type Strategy = (context: StrategyContext) => Promise<StrategyOutcome>;

export type RunOptions = {
  /** External cancellation; takes effect at the next turn boundary */
  signal?: AbortSignal;
  /** Whole-run budget in ms, folded into the same cancellation path */
  timeoutMs?: number;
  /** Group chat termination predicate; overrides `terminationKeyword` */
  terminate?: TerminationPredicate;
  /** Run identifier; generated when absent */
  runId?: string;
  /** Earlier exchanges the caller carries across runs; folded into the task */
  history?: readonly ChatMessage[];
  events?: RunEventOptions;
};

// ============================================================================
// Run events
// ============================================================================

export type RunEventBase = {
  timestamp: string;
  runId: string;
  pipeline: string;
};

export type RunStartedEvent = RunEventBase & {
  type: "run_started";
  strategy: StrategyKind;
  task: string;
};

export type TurnStartedEvent = RunEventBase & {
  type: "turn_started";
  agent: string;
  /** 1-based round for group chat and supervisor pipelines */
  round?: number;
};

export type TurnCompletedEvent = RunEventBase & {
  type: "turn_completed";
  turn: Turn;
  durationMs: number;
};

export type RoutingDecidedEvent = RunEventBase & {
  type: "routing_decided";
  supervisor: string;
  /** Trimmed supervisor reply */
  choice: string;
  round: number;
  outcome: "routed" | "done" | "unrecognized";
};

export type RunCompletedEvent = RunEventBase & {
  type: "run_completed";
  reason: TerminalReason;
  turns: number;
  durationMs: number;
};

export type RunEvent =
  | RunStartedEvent
  | TurnStartedEvent
  | TurnCompletedEvent
  | RoutingDecidedEvent
  | RunCompletedEvent;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** Strategy-side view of an event: the engine stamps timestamp, run and pipeline. */
export type RunEventPayload = DistributiveOmit<RunEvent, keyof RunEventBase>;

export type RunEventHandler = (event: RunEvent) => void | Promise<void>;

export type RunEventOptions = {
  onEvent?: RunEventHandler;
  /** Whether to emit turn_started events (default true) */
  emitTurnStarted?: boolean;
  /** Whether to emit turn_completed events (default true) */
  emitTurnCompleted?: boolean;
};
