/**
 * Supervisor strategy: a supervisor agent names the specialist that handles the task.
 *
 * single       supervisor once, chosen specialist once.
 * multi_round  after each specialist reply control returns to the supervisor,
 *              until it answers with the done sentinel or `maxRounds`
 *              consultations have happened.
 *
 * The supervisor's reply is trimmed and matched case-sensitively against the
 * specialist names. Anything else ends the run with `routing_failed`.
 */

import type { AgentHandle } from "../../agents/types.js";
import { TASK_SPEAKER, type ChatMessage, type Turn } from "../../conversation.js";
import type { Strategy, StrategyContext, StrategyOutcome } from "../types.js";
import { completed, takeTurn } from "./base.js";

const INSTRUCTIONS_PREVIEW = 100;

/**
 * Routing prompt shown to the supervisor in place of the raw task turn.
 */
export function routingBrief(
  task: string,
  specialists: readonly AgentHandle[],
  doneSentinel?: string
): string {
  const roster = specialists
    .map((s) => `- ${s.name}: ${s.spec.instructions.slice(0, INSTRUCTIONS_PREVIEW)}`)
    .join("\n");
  const lines = [
    `You are a supervisor. Available specialists:\n${roster}`,
    `Task: ${task}`,
    "Reply with ONLY the name of the specialist that should handle this task."
  ];
  if (doneSentinel !== undefined) {
    lines.push(`When the task is complete, reply with ONLY ${doneSentinel}.`);
  }
  return lines.join("\n\n");
}

function routingFailed(supervisor: string, choice: string, specialists: readonly AgentHandle[]): StrategyOutcome {
  const message =
    choice === supervisor
      ? `Supervisor '${supervisor}' routed the task to itself`
      : `Supervisor '${supervisor}' chose '${choice}', which is not a specialist in this pipeline (expected one of: ${specialists
          .map((s) => s.name)
          .join(", ")})`;
  return {
    reason: "routing_failed",
    content: message,
    finalAgent: null,
    error: { code: "ROUTING_FAILED", message, agent: supervisor }
  };
}

function splitRoster(ctx: StrategyContext): { supervisor: AgentHandle; specialists: AgentHandle[] } | undefined {
  const name = ctx.spec.supervisorAgent;
  const supervisor = ctx.agents.find((a) => a.name === name);
  if (!supervisor) return undefined;
  return { supervisor, specialists: ctx.agents.filter((a) => a !== supervisor) };
}

export const runSupervisor: Strategy = async (ctx) => {
  const { conversation, spec } = ctx;
  const roster = splitRoster(ctx);
  if (!roster) {
    // Resolution guarantees the supervisor is part of the pipeline.
    throw new Error(`Supervisor '${spec.supervisorAgent ?? ""}' missing from resolved agents`);
  }
  const { supervisor, specialists } = roster;

  const multiRound = spec.supervisorMode === "multi_round";
  const consultations = multiRound ? spec.maxRounds : 1;
  const taskMessage: ChatMessage = { speaker: TASK_SPEAKER, content: ctx.task };
  const brief: ChatMessage = {
    speaker: TASK_SPEAKER,
    content: routingBrief(ctx.task, specialists, multiRound ? spec.doneSentinel : undefined)
  };

  conversation.append(TASK_SPEAKER, ctx.task);
  let lastReply: Turn | undefined;

  for (let round = 1; round <= consultations; round++) {
    const view = [brief, ...conversation.turns.slice(1)];
    const consulted = await takeTurn(ctx, supervisor, view, round);
    if (consulted.kind === "stopped") return consulted.outcome;

    const choice = consulted.turn.content.trim();

    if (multiRound && choice === spec.doneSentinel) {
      ctx.emit({ type: "routing_decided", supervisor: supervisor.name, choice, round, outcome: "done" });
      return lastReply
        ? completed(lastReply)
        : { reason: "completed", content: "", finalAgent: null };
    }

    const specialist = specialists.find((s) => s.name === choice);
    if (!specialist) {
      ctx.emit({ type: "routing_decided", supervisor: supervisor.name, choice, round, outcome: "unrecognized" });
      ctx.logger.warn("supervisor_bad_routing", { supervisor: supervisor.name, choice });
      return routingFailed(supervisor.name, choice, specialists);
    }

    ctx.emit({ type: "routing_decided", supervisor: supervisor.name, choice, round, outcome: "routed" });
    ctx.logger.info("supervisor_routing", { supervisor: supervisor.name, chosen: choice, round });

    const input = round === 1 ? [taskMessage] : conversation.snapshot();
    const handled = await takeTurn(ctx, specialist, input, round);
    if (handled.kind === "stopped") return handled.outcome;
    lastReply = handled.turn;

    if (!multiRound) return completed(lastReply);
  }

  if (!lastReply) {
    return { reason: "max_rounds_exceeded", content: "", finalAgent: null };
  }
  return { reason: "max_rounds_exceeded", content: lastReply.content, finalAgent: lastReply.speaker };
};
