/**
 * Sequential strategy: A -> B -> C.
 * Each agent sees only the previous agent's output (the first sees the task).
 */

import { TASK_SPEAKER, type Turn } from "../../conversation.js";
import type { Strategy } from "../types.js";
import { completed, takeTurn } from "./base.js";

export const runSequential: Strategy = async (ctx) => {
  let input = { speaker: TASK_SPEAKER, content: ctx.task };
  let last: Turn | undefined;

  for (const agent of ctx.agents) {
    const attempt = await takeTurn(ctx, agent, [input]);
    if (attempt.kind === "stopped") return attempt.outcome;
    last = attempt.turn;
    input = { speaker: last.speaker, content: last.content };
  }

  // Resolution rejects empty pipelines, so `last` is always set here.
  return last ? completed(last) : { reason: "completed", content: ctx.task, finalAgent: null };
};
