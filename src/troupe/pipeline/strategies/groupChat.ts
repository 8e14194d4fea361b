/**
 * Group chat strategy: round-robin over the roster in declared order.
 *
 * Every agent sees the full transcript, task turn included. The run ends when
 * the termination predicate accepts a turn, or after `maxRounds` full rounds.
 */

import { TASK_SPEAKER } from "../../conversation.js";
import type { Strategy } from "../types.js";
import { completed, takeTurn } from "./base.js";

export const runGroupChat: Strategy = async (ctx) => {
  const { conversation, spec } = ctx;
  const taskTurn = conversation.append(TASK_SPEAKER, ctx.task);

  for (let round = 1; round <= spec.maxRounds; round++) {
    for (const agent of ctx.agents) {
      const attempt = await takeTurn(ctx, agent, conversation.snapshot(), round);
      if (attempt.kind === "stopped") return attempt.outcome;

      if (ctx.terminate?.(attempt.turn, conversation.turns)) {
        ctx.logger.debug("termination_predicate_matched", { agent: agent.name, round });
        return completed(attempt.turn);
      }
    }
  }

  const last = conversation.last() ?? taskTurn;
  return { reason: "max_rounds_exceeded", content: last.content, finalAgent: last.speaker };
};

/**
 * Predicate for the `termination_keyword` convention: the trimmed reply ends with the keyword.
 */
export function keywordTermination(keyword: string): (turn: { content: string }) => boolean {
  return (turn) => turn.content.trim().endsWith(keyword);
}
