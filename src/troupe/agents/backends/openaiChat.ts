/**
 * OpenAI-compatible chat backend.
 *
 * Works with:
 * - OpenAI API
 * - Azure OpenAI (deployment URLs, `api-key` header)
 * - OpenAI-compatible gateways (Ollama, LM Studio, vLLM, etc.) through `llm.base_url`
 *
 * Tools referenced by the agent are offered to the model; tool calls are
 * executed through the ToolRegistry and fed back until the model answers in
 * text or `max_turns` model calls have been made.
 */

import { z } from "zod";
import type { AgentSpec } from "../../config/types.js";
import { TASK_SPEAKER, type ChatMessage } from "../../conversation.js";
import { configurationError } from "../../errors.js";
import type { Logger } from "../../logger.js";
import type { ToolDefinition } from "../toolRegistry.js";
import {
  AgentInvocationError,
  type AgentHandle,
  type AgentInvocationErrorType,
  type InvokeOptions
} from "../types.js";

type WireToolCall = {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
};

type WireMessage =
  | { role: "system" | "user"; content: string }
  | { role: "assistant"; content: string | null; tool_calls?: WireToolCall[] }
  | { role: "tool"; tool_call_id: string; content: string };

const ToolCallSchema = z.object({
  id: z.string(),
  type: z.literal("function").default("function"),
  function: z.object({
    name: z.string(),
    arguments: z.string().default("{}")
  })
});

const ChatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
          tool_calls: z.array(ToolCallSchema).optional()
        }),
        finish_reason: z.string().nullable().optional()
      })
    )
    .min(1),
  model: z.string().optional()
});

const ErrorBodySchema = z.object({
  error: z.object({ message: z.string() })
});

export type ChatVariant = "openai" | "azure_openai";

export type OpenAIChatOptions = {
  variant: ChatVariant;
  apiKey: string;
  tools: ToolDefinition[];
  logger: Logger;
  fetch?: typeof fetch;
  timeoutMs?: number;
};

const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";
const DEFAULT_AZURE_API_VERSION = "2024-02-01";
const DEFAULT_TIMEOUT_MS = 60_000;

export class OpenAIChatAgent implements AgentHandle {
  readonly name: string;
  readonly spec: AgentSpec;

  private readonly variant: ChatVariant;
  private readonly apiKey: string;
  private readonly tools: ToolDefinition[];
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;
  private readonly url: string;

  constructor(spec: AgentSpec, options: OpenAIChatOptions) {
    this.name = spec.name;
    this.spec = spec;
    this.variant = options.variant;
    this.apiKey = options.apiKey;
    this.tools = options.tools;
    this.logger = options.logger;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.url = this.buildUrl();
  }

  private buildUrl(): string {
    const { baseUrl, apiVersion, model } = this.spec.llm;
    if (this.variant === "azure_openai") {
      if (!baseUrl) {
        throw configurationError(`Agent '${this.name}' uses azure_openai but llm.base_url is not set`);
      }
      const root = baseUrl.replace(/\/+$/, "");
      const version = encodeURIComponent(apiVersion ?? DEFAULT_AZURE_API_VERSION);
      return `${root}/openai/deployments/${encodeURIComponent(model)}/chat/completions?api-version=${version}`;
    }
    return `${(baseUrl ?? DEFAULT_OPENAI_BASE_URL).replace(/\/+$/, "")}/chat/completions`;
  }

  private get provider(): string {
    return this.variant;
  }

  /**
   * Map the transcript view onto chat roles: this agent's own turns become
   * assistant messages, everyone else's become attributed user messages.
   */
  toWireMessages(messages: readonly ChatMessage[]): WireMessage[] {
    const wire: WireMessage[] = [];
    if (this.spec.instructions) {
      wire.push({ role: "system", content: this.spec.instructions });
    }
    for (const message of messages) {
      if (message.speaker === this.name) {
        wire.push({ role: "assistant", content: message.content });
      } else if (message.speaker === TASK_SPEAKER) {
        wire.push({ role: "user", content: message.content });
      } else {
        wire.push({ role: "user", content: `${message.speaker}: ${message.content}` });
      }
    }
    return wire;
  }

  async invoke(messages: readonly ChatMessage[], options?: InvokeOptions): Promise<string> {
    const wire = this.toWireMessages(messages);

    for (let call = 1; call <= this.spec.maxTurns; call++) {
      const response = await this.complete(wire, options?.signal);
      const choice = response.choices[0];
      if (!choice) {
        throw this.error("malformed_response", "Response contained no choices");
      }

      const toolCalls = choice.message.tool_calls ?? [];
      if (toolCalls.length === 0) {
        return choice.message.content ?? "";
      }

      this.logger.debug("tool_calls", { agent: this.name, count: toolCalls.length, call });
      wire.push({ role: "assistant", content: choice.message.content ?? null, tool_calls: toolCalls });
      for (const toolCall of toolCalls) {
        wire.push({
          role: "tool",
          tool_call_id: toolCall.id,
          content: await this.runTool(toolCall.function.name, toolCall.function.arguments)
        });
      }
    }

    throw this.error("turn_limit", `Agent '${this.name}' exceeded max_turns (${this.spec.maxTurns}) without a final reply`);
  }

  private async runTool(name: string, rawArgs: string): Promise<string> {
    const tool = this.tools.find((t) => t.name === name);
    if (!tool) {
      throw this.error("tool_error", `Model requested unknown tool '${name}'`);
    }

    let args: unknown;
    try {
      args = JSON.parse(rawArgs);
    } catch (err) {
      throw this.error("tool_error", `Tool '${name}' received arguments that are not JSON`, { cause: err });
    }
    const parsedArgs = z.record(z.unknown()).safeParse(args);
    if (!parsedArgs.success) {
      throw this.error("tool_error", `Tool '${name}' expects an object of arguments`);
    }

    try {
      return await tool.handler(parsedArgs.data);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw this.error("tool_error", `Tool '${name}' failed: ${reason}`, { cause: err });
    }
  }

  private buildBody(wire: WireMessage[]): Record<string, unknown> {
    const { model, temperature, maxTokens } = this.spec.llm;
    return {
      ...(this.variant === "openai" && { model }),
      messages: wire,
      temperature,
      ...(maxTokens !== undefined && { max_tokens: maxTokens }),
      ...(this.tools.length > 0 && {
        tools: this.tools.map((tool) => ({
          type: "function",
          function: { name: tool.name, description: tool.description, parameters: tool.parameters }
        }))
      })
    };
  }

  private buildHeaders(): Record<string, string> {
    return this.variant === "azure_openai"
      ? { "Content-Type": "application/json", "api-key": this.apiKey }
      : { "Content-Type": "application/json", Authorization: `Bearer ${this.apiKey}` };
  }

  private async complete(wire: WireMessage[], signal: AbortSignal | undefined): Promise<z.infer<typeof ChatResponseSchema>> {
    if (signal?.aborted) {
      throw this.error("canceled", "Invocation canceled");
    }

    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        method: "POST",
        headers: this.buildHeaders(),
        body: JSON.stringify(this.buildBody(wire)),
        signal: controller.signal
      });
    } catch (err) {
      if (signal?.aborted) {
        throw this.error("canceled", "Invocation canceled", { cause: err });
      }
      if (err instanceof Error && err.name === "AbortError") {
        throw this.error("timeout", `Request timed out after ${this.timeoutMs}ms`, { cause: err });
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw this.error("provider_error", `Request failed: ${reason}`, { cause: err, retryable: true });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
    }

    if (!response.ok) {
      throw await this.errorFromResponse(response);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw this.error("malformed_response", "Response body is not JSON", { cause: err });
    }
    const parsed = ChatResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw this.error("malformed_response", "Response does not match the chat completions format", {
        cause: parsed.error
      });
    }
    return parsed.data;
  }

  private async errorFromResponse(response: Response): Promise<AgentInvocationError> {
    const status = response.status;
    let message = `HTTP ${status}`;

    try {
      const parsed = ErrorBodySchema.safeParse(await response.json());
      if (parsed.success) message = parsed.data.error.message;
    } catch (err) {
      this.logger.debug("error_body_unreadable", { agent: this.name, status, reason: String(err) });
    }

    let type: AgentInvocationErrorType;
    switch (status) {
      case 401:
      case 403:
        type = "auth_error";
        break;
      case 429:
        type = "rate_limited";
        break;
      case 400: {
        const lower = message.toLowerCase();
        type = lower.includes("context length") || lower.includes("maximum context") ? "context_length" : "invalid_request";
        break;
      }
      default:
        type = status >= 500 ? "provider_error" : "unknown";
    }

    return this.error(type, message, { statusCode: status });
  }

  private error(
    type: AgentInvocationErrorType,
    message: string,
    extra: { cause?: unknown; statusCode?: number; retryable?: boolean } = {}
  ): AgentInvocationError {
    return new AgentInvocationError(type, message, { ...extra, agent: this.name, provider: this.provider });
  }
}
