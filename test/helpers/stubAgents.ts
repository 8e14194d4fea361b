import { BackendRegistry } from "../../src/troupe/agents/registry.js";
import type { AgentHandle, InvokeOptions } from "../../src/troupe/agents/types.js";
import { createRoster, defineAgent, type AgentSpecInput } from "../../src/troupe/config/schemas.js";
import type { AgentSpec, Roster } from "../../src/troupe/config/types.js";
import type { ChatMessage } from "../../src/troupe/conversation.js";
import { createLogger, type Logger } from "../../src/troupe/logger.js";
import { PipelineEngine } from "../../src/troupe/pipeline/engine.js";

export type StubBehavior = (messages: readonly ChatMessage[], call: number, options?: InvokeOptions) => string | Promise<string>;

export const FIXED_CLOCK = (): Date => new Date("2026-01-01T00:00:00.000Z");

export function silentLogger(lines?: string[]): Logger {
  return createLogger("test", { level: "debug", sink: (line) => lines?.push(line) });
}

/**
 * Deterministic agents for engine and strategy tests.
 * Every invocation is recorded with a copy of the messages it received.
 */
export class StubAgents {
  readonly calls = new Map<string, ChatMessage[][]>();
  private readonly behaviors = new Map<string, StubBehavior>();
  private readonly specs: AgentSpec[] = [];

  define(name: string, behavior: StubBehavior, input: Partial<AgentSpecInput> = {}): AgentSpec {
    const spec = defineAgent({ backend: "stub", ...input, name });
    this.behaviors.set(name, behavior);
    this.specs.push(spec);
    return spec;
  }

  roster(): Roster {
    return createRoster(this.specs);
  }

  callCount(name: string): number {
    return this.calls.get(name)?.length ?? 0;
  }

  totalCalls(): number {
    let total = 0;
    for (const list of this.calls.values()) total += list.length;
    return total;
  }

  handle(spec: AgentSpec): AgentHandle {
    const behavior = this.behaviors.get(spec.name);
    if (!behavior) throw new Error(`No stub behavior for ${spec.name}`);
    return {
      name: spec.name,
      spec,
      invoke: async (messages, options) => {
        const list = this.calls.get(spec.name) ?? [];
        list.push(messages.map((m) => ({ speaker: m.speaker, content: m.content })));
        this.calls.set(spec.name, list);
        return behavior(messages, list.length, options);
      }
    };
  }

  registry(): BackendRegistry {
    return new BackendRegistry().register("stub", (spec) => this.handle(spec));
  }

  engine(): PipelineEngine {
    return new PipelineEngine({ backends: this.registry(), logger: silentLogger(), clock: FIXED_CLOCK });
  }
}

export const lastContent = (messages: readonly ChatMessage[]): string => messages[messages.length - 1]?.content ?? "";

/** Resolves after the microtasks queued so far have run. */
export const flushEvents = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 0));

/** Polls until the condition holds, failing after `timeoutMs`. */
export async function waitFor(condition: () => boolean, timeoutMs = 1000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error("Condition not met in time");
    await new Promise((resolve) => setTimeout(resolve, 1));
  }
}
