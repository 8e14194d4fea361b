import type { AgentSpec } from "../../config/types.js";
import type { ChatMessage } from "../../conversation.js";
import { AgentInvocationError, type AgentHandle, type InvokeOptions } from "../types.js";

/**
 * Offline backend: replies with the content of the last message it sees,
 * prefixed by `extra.prefix` when set. Useful for dry runs of a pipeline's wiring.
 */
export class EchoAgent implements AgentHandle {
  readonly name: string;
  readonly spec: AgentSpec;
  private readonly prefix: string;

  constructor(spec: AgentSpec) {
    this.name = spec.name;
    this.spec = spec;
    this.prefix = typeof spec.extra.prefix === "string" ? spec.extra.prefix : "";
  }

  invoke(messages: readonly ChatMessage[], options?: InvokeOptions): Promise<string> {
    if (options?.signal?.aborted) {
      return Promise.reject(new AgentInvocationError("canceled", "Invocation canceled", { agent: this.name }));
    }
    const last = messages[messages.length - 1];
    return Promise.resolve(`${this.prefix}${last?.content ?? ""}`);
  }
}
