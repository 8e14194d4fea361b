import { AgentInvocationError, type AgentHandle } from "../../agents/types.js";
import type { ChatMessage, Turn } from "../../conversation.js";
import { preview } from "../../logger.js";
import type { StrategyContext, StrategyOutcome } from "../types.js";

export type TurnAttempt =
  | { kind: "ok"; turn: Turn }
  | { kind: "stopped"; outcome: StrategyOutcome };

function cancellationMessage(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (reason instanceof Error && reason.name === "TimeoutError") {
    return "Run timed out";
  }
  return "Run canceled";
}

export function canceledOutcome(signal: AbortSignal): StrategyOutcome {
  const message = cancellationMessage(signal);
  return {
    reason: "canceled",
    content: message,
    finalAgent: null,
    error: { code: "CANCELED", message }
  };
}

export function agentFailedOutcome(failure: AgentInvocationError, agent: string): StrategyOutcome {
  return {
    reason: "agent_failed",
    content: failure.message,
    finalAgent: null,
    error: { code: "AGENT_FAILED", message: failure.message, agent, type: failure.type }
  };
}

/**
 * Run one turn: check for cancellation, invoke the agent, append its reply.
 *
 * Cancellation is only observed here, at the turn boundary. A rejection that
 * arrives after the signal fired is reported as cancellation, not as an agent
 * failure.
 */
export async function takeTurn(
  ctx: StrategyContext,
  agent: AgentHandle,
  input: readonly ChatMessage[],
  round?: number
): Promise<TurnAttempt> {
  if (ctx.signal.aborted) {
    return { kind: "stopped", outcome: canceledOutcome(ctx.signal) };
  }

  ctx.emit({ type: "turn_started", agent: agent.name, ...(round !== undefined && { round }) });
  ctx.logger.debug("turn_start", { agent: agent.name, round, input: preview(input[input.length - 1]?.content ?? "") });

  const started = Date.now();
  let content: string;
  try {
    content = await agent.invoke(input, { signal: ctx.signal });
  } catch (err) {
    if (ctx.signal.aborted) {
      return { kind: "stopped", outcome: canceledOutcome(ctx.signal) };
    }
    const failure = AgentInvocationError.from(err, agent.name);
    ctx.logger.warn("agent_failed", { agent: agent.name, type: failure.type, message: failure.message });
    return { kind: "stopped", outcome: agentFailedOutcome(failure, agent.name) };
  }

  const turn = ctx.conversation.append(agent.name, content);
  ctx.emit({ type: "turn_completed", turn, durationMs: Date.now() - started });
  return { kind: "ok", turn };
}

export function completed(turn: Turn): StrategyOutcome {
  return { reason: "completed", content: turn.content, finalAgent: turn.speaker };
}
