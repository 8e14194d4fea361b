import type { AgentSpec } from "../config/types.js";
import type { ChatMessage } from "../conversation.js";
import { AgentInvocationError, type AgentHandle, type InvokeOptions } from "./types.js";

/**
 * Asks a human a question and resolves with their answer.
 */
export type HumanInputFn = (prompt: string, options?: InvokeOptions) => Promise<string>;

/**
 * Wraps a handle so every reply is shown to a human before it enters the transcript.
 * An empty answer accepts the reply; anything else replaces it.
 */
export class HumanReviewHandle implements AgentHandle {
  readonly name: string;
  readonly spec: AgentSpec;
  private readonly inner: AgentHandle;
  private readonly ask: HumanInputFn;

  constructor(inner: AgentHandle, ask: HumanInputFn) {
    this.inner = inner;
    this.ask = ask;
    this.name = inner.name;
    this.spec = inner.spec;
  }

  async invoke(messages: readonly ChatMessage[], options?: InvokeOptions): Promise<string> {
    const draft = await this.inner.invoke(messages, options);

    let answer: string;
    try {
      answer = await this.ask(
        `${this.name} proposes:\n${draft}\n\nPress Enter to accept, or type a replacement reply:`,
        options
      );
    } catch (err) {
      throw new AgentInvocationError("unknown", `Human review failed for '${this.name}'`, {
        agent: this.name,
        cause: err
      });
    }

    const trimmed = answer.trim();
    return trimmed === "" ? draft : trimmed;
  }
}
