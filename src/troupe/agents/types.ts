/**
 * Agent handle contract and the normalised failure type every backend raises.
 */

import type { AgentSpec } from "../config/types.js";
import type { ChatMessage } from "../conversation.js";

/**
 * Failure categories, normalised across backends.
 */
export type AgentInvocationErrorType =
  | "rate_limited"      // Provider rate limit hit
  | "timeout"           // Request timed out
  | "auth_error"        // Invalid API key or auth failure
  | "invalid_request"   // Malformed request (terminal error)
  | "provider_error"    // Provider-side issue (5xx)
  | "malformed_response"
  | "context_length"    // Input too long for model
  | "tool_error"        // A tool raised while the agent was using it
  | "turn_limit"        // Tool-call loop hit max_turns
  | "canceled"
  | "unknown";

export type AgentInvocationErrorOptions = {
  agent?: string;
  retryable?: boolean;
  provider?: string;
  statusCode?: number;
  cause?: unknown;
};

export class AgentInvocationError extends Error {
  readonly type: AgentInvocationErrorType;
  readonly retryable: boolean;
  readonly agent?: string;
  readonly provider?: string;
  readonly statusCode?: number;

  constructor(type: AgentInvocationErrorType, message: string, options: AgentInvocationErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "AgentInvocationError";
    this.type = type;
    this.retryable = options.retryable ?? AgentInvocationError.isDefaultRetryable(type);
    if (options.agent !== undefined) this.agent = options.agent;
    if (options.provider !== undefined) this.provider = options.provider;
    if (options.statusCode !== undefined) this.statusCode = options.statusCode;
  }

  private static isDefaultRetryable(type: AgentInvocationErrorType): boolean {
    switch (type) {
      case "rate_limited":
      case "timeout":
      case "provider_error":
        return true;
      default:
        return false;
    }
  }

  /**
   * Wrap anything a handle threw. Errors that are already normalised pass through.
   */
  static from(err: unknown, agent: string): AgentInvocationError {
    if (err instanceof AgentInvocationError) return err;
    if (err instanceof Error) {
      const type: AgentInvocationErrorType = err.name === "AbortError" ? "canceled" : "unknown";
      return new AgentInvocationError(type, err.message, { agent, cause: err });
    }
    return new AgentInvocationError("unknown", String(err), { agent });
  }

  toJSON(): Record<string, unknown> {
    return {
      type: this.type,
      message: this.message,
      retryable: this.retryable,
      ...(this.agent !== undefined && { agent: this.agent }),
      ...(this.provider !== undefined && { provider: this.provider }),
      ...(this.statusCode !== undefined && { statusCode: this.statusCode })
    };
  }
}

export type InvokeOptions = {
  /** Cancellation for the in-flight backend call */
  signal?: AbortSignal;
};

/**
 * Capability reference to one configured agent.
 *
 * `invoke` receives a read-only view of the conversation and resolves with the
 * reply text, or rejects with an AgentInvocationError. How the view is turned
 * into a backend request is the handle's own business.
 */
export interface AgentHandle {
  readonly name: string;
  readonly spec: AgentSpec;
  invoke(messages: readonly ChatMessage[], options?: InvokeOptions): Promise<string>;
}
