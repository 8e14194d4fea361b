import type { Interface } from "node:readline/promises";
import chalk from "chalk";
import type { HumanInputFn } from "./agents/humanReview.js";

/**
 * Human review prompts on an interface the caller already owns.
 * The interface is never closed here, so a surrounding prompt loop keeps reading.
 */
export function readlineHumanInput(rl: Interface): HumanInputFn {
  return (prompt, options) =>
    rl.question(`${chalk.magenta(prompt)} `, options?.signal ? { signal: options.signal } : {});
}
