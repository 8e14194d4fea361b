import type { PipelineSpec, Roster } from "./config/types.js";
import type { ChatMessage } from "./conversation.js";
import type { PipelineEngine } from "./pipeline/engine.js";
import type { RunOptions, RunResult } from "./pipeline/types.js";

export const USER_SPEAKER = "user";

/**
 * Keeps a conversation going across pipeline runs.
 *
 * The engine keeps nothing between runs; the session owns the history and
 * hands it to every run explicitly.
 */
export class ChatSession {
  private readonly engine: PipelineEngine;
  private readonly spec: PipelineSpec;
  private readonly roster: Roster;
  private readonly exchanges: ChatMessage[] = [];

  constructor(engine: PipelineEngine, spec: PipelineSpec, roster: Roster) {
    this.engine = engine;
    this.spec = spec;
    this.roster = roster;
  }

  get history(): readonly ChatMessage[] {
    return this.exchanges;
  }

  async send(message: string, options: RunOptions = {}): Promise<RunResult> {
    const result = await this.engine.run(this.spec, message, this.roster, {
      ...options,
      history: [...this.exchanges]
    });

    this.exchanges.push({ speaker: USER_SPEAKER, content: message });
    // Failed or canceled runs carry no reply worth remembering
    if (result.finalAgent !== null && (result.reason === "completed" || result.reason === "max_rounds_exceeded")) {
      this.exchanges.push({ speaker: result.finalAgent, content: result.content });
    }
    return result;
  }

  reset(): void {
    this.exchanges.length = 0;
  }
}
