import { describe, expect, it, vi } from "vitest";
import { OpenAIChatAgent, type OpenAIChatOptions } from "../src/troupe/agents/backends/openaiChat.js";
import { ToolRegistry } from "../src/troupe/agents/toolRegistry.js";
import { AgentInvocationError } from "../src/troupe/agents/types.js";
import { defineAgent, type AgentSpecInput } from "../src/troupe/config/schemas.js";
import { TroupeError } from "../src/troupe/errors.js";
import { silentLogger } from "./helpers/stubAgents.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function reply(content: string): Response {
  return jsonResponse({ choices: [{ message: { content }, finish_reason: "stop" }] });
}

function toolCall(id: string, name: string, args: string): Response {
  return jsonResponse({
    choices: [{ message: { content: null, tool_calls: [{ id, type: "function", function: { name, arguments: args } }] } }]
  });
}

type FetchArgs = Parameters<typeof fetch>;

function makeAgent(
  input: Partial<AgentSpecInput>,
  fetchImpl: (...args: FetchArgs) => Promise<Response>,
  options: Partial<OpenAIChatOptions> = {}
): OpenAIChatAgent {
  const spec = defineAgent({ name: "helper", backend: "openai", ...input });
  return new OpenAIChatAgent(spec, {
    variant: "openai",
    apiKey: "test-secret",
    tools: [],
    logger: silentLogger(),
    fetch: fetchImpl,
    ...options
  });
}

function requestBody(call: FetchArgs | undefined): Record<string, unknown> {
  const init = call?.[1];
  const raw = typeof init?.body === "string" ? init.body : "{}";
  const parsed: unknown = JSON.parse(raw);
  return typeof parsed === "object" && parsed !== null ? Object.fromEntries(Object.entries(parsed)) : {};
}

async function failureOf(promise: Promise<unknown>): Promise<AgentInvocationError> {
  const err: unknown = await promise.then(
    () => undefined,
    (e: unknown) => e
  );
  if (!(err instanceof AgentInvocationError)) throw new Error(`expected AgentInvocationError, got ${String(err)}`);
  return err;
}

describe("OpenAIChatAgent requests", () => {
  it("posts the transcript as chat messages to the OpenAI endpoint", async () => {
    const fetchMock = vi.fn(async (..._args: FetchArgs) => reply("hi there"));
    const agent = makeAgent({ instructions: "Be brief.", llm: { model: "gpt-4o-mini", maxTokens: 64 } }, fetchMock);

    const content = await agent.invoke([
      { speaker: "task", content: "say hi" },
      { speaker: "helper", content: "earlier reply" },
      { speaker: "critic", content: "shorter" }
    ]);

    expect(content).toBe("hi there");
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const call = fetchMock.mock.calls[0];
    expect(call?.[0]).toBe("https://api.openai.com/v1/chat/completions");
    expect(call?.[1]?.headers).toEqual({ "Content-Type": "application/json", Authorization: "Bearer test-secret" });
    expect(requestBody(call)).toEqual({
      model: "gpt-4o-mini",
      messages: [
        { role: "system", content: "Be brief." },
        { role: "user", content: "say hi" },
        { role: "assistant", content: "earlier reply" },
        { role: "user", content: "critic: shorter" }
      ],
      temperature: 0.1,
      max_tokens: 64
    });
  });

  it("uses base_url for OpenAI-compatible gateways", async () => {
    const fetchMock = vi.fn(async (..._args: FetchArgs) => reply("ok"));
    const agent = makeAgent({ llm: { baseUrl: "http://localhost:11434/v1/" } }, fetchMock);

    await agent.invoke([{ speaker: "task", content: "x" }]);

    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://localhost:11434/v1/chat/completions");
  });

  it("targets the Azure deployment with an api-key header and no model in the body", async () => {
    const fetchMock = vi.fn(async (..._args: FetchArgs) => reply("ok"));
    const agent = makeAgent(
      { backend: "azure_openai", llm: { model: "gpt4-deploy", baseUrl: "https://example.openai.azure.com" } },
      fetchMock,
      { variant: "azure_openai" }
    );

    await agent.invoke([{ speaker: "task", content: "x" }]);

    const call = fetchMock.mock.calls[0];
    expect(call?.[0]).toBe("https://example.openai.azure.com/openai/deployments/gpt4-deploy/chat/completions?api-version=2024-02-01");
    expect(call?.[1]?.headers).toEqual({ "Content-Type": "application/json", "api-key": "test-secret" });
    expect("model" in requestBody(call)).toBe(false);
  });

  it("requires base_url for Azure", () => {
    expect(() => makeAgent({ backend: "azure_openai" }, vi.fn(), { variant: "azure_openai" })).toThrow(TroupeError);
  });
});

describe("OpenAIChatAgent tool loop", () => {
  it("runs requested tools and feeds results back until the model answers", async () => {
    const tools = new ToolRegistry().register({
      name: "add",
      description: "Add two numbers",
      parameters: { type: "object", properties: { a: { type: "number" }, b: { type: "number" } } },
      handler: (args) => String(Number(args.a) + Number(args.b))
    });
    const fetchMock = vi
      .fn(async (..._args: FetchArgs) => reply("unused"))
      .mockResolvedValueOnce(toolCall("call_1", "add", '{"a":2,"b":3}'))
      .mockResolvedValueOnce(reply("The sum is 5"));
    const agent = makeAgent({ tools: [{ name: "add" }] }, fetchMock, { tools: tools.resolve("helper", [{ name: "add" }]) });

    const content = await agent.invoke([{ speaker: "task", content: "2+3?" }]);

    expect(content).toBe("The sum is 5");
    expect(fetchMock).toHaveBeenCalledTimes(2);
    const second = requestBody(fetchMock.mock.calls[1]);
    expect(second.messages).toEqual([
      { role: "user", content: "2+3?" },
      {
        role: "assistant",
        content: null,
        tool_calls: [{ id: "call_1", type: "function", function: { name: "add", arguments: '{"a":2,"b":3}' } }]
      },
      { role: "tool", tool_call_id: "call_1", content: "5" }
    ]);
    expect(second.tools).toEqual([
      {
        type: "function",
        function: {
          name: "add",
          description: "Add two numbers",
          parameters: { type: "object", properties: { a: { type: "number" }, b: { type: "number" } } }
        }
      }
    ]);
  });

  it("gives up after max_turns model calls", async () => {
    const tools = new ToolRegistry().register({ name: "noop", description: "Nothing", handler: () => "" });
    const fetchMock = vi.fn(async (..._args: FetchArgs) => toolCall("c", "noop", "{}"));
    const agent = makeAgent({ maxTurns: 2 }, fetchMock, { tools: tools.resolve("helper", [{ name: "noop" }]) });

    const err = await failureOf(agent.invoke([{ speaker: "task", content: "loop" }]));

    expect(err.type).toBe("turn_limit");
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("reports a failing tool as tool_error", async () => {
    const tools = new ToolRegistry().register({
      name: "explode",
      description: "Always fails",
      handler: () => {
        throw new Error("kaboom");
      }
    });
    const fetchMock = vi.fn(async (..._args: FetchArgs) => toolCall("c", "explode", "{}"));
    const agent = makeAgent({}, fetchMock, { tools: tools.resolve("helper", [{ name: "explode" }]) });

    const err = await failureOf(agent.invoke([{ speaker: "task", content: "go" }]));

    expect(err.type).toBe("tool_error");
    expect(err.message).toBe("Tool 'explode' failed: kaboom");
  });

  it("reports a tool the agent was not given as tool_error", async () => {
    const fetchMock = vi.fn(async (..._args: FetchArgs) => toolCall("c", "rm_rf", "{}"));
    const agent = makeAgent({}, fetchMock);

    const err = await failureOf(agent.invoke([{ speaker: "task", content: "go" }]));

    expect(err.type).toBe("tool_error");
    expect(err.message).toBe("Model requested unknown tool 'rm_rf'");
  });
});

describe("OpenAIChatAgent error mapping", () => {
  const cases: Array<[number, string, string]> = [
    [401, "Incorrect API key provided", "auth_error"],
    [429, "Rate limit reached", "rate_limited"],
    [400, "This model's maximum context length is 8192 tokens", "context_length"],
    [400, "Unrecognized request argument", "invalid_request"],
    [503, "Service unavailable", "provider_error"],
    [404, "Not found", "unknown"]
  ];

  it.each(cases)("maps HTTP %i to its failure type", async (status, message, type) => {
    const fetchMock = vi.fn(async (..._args: FetchArgs) => jsonResponse({ error: { message } }, status));
    const agent = makeAgent({}, fetchMock);

    const err = await failureOf(agent.invoke([{ speaker: "task", content: "x" }]));

    expect(err.type).toBe(type);
    expect(err.message).toBe(message);
    expect(err.statusCode).toBe(status);
    expect(err.agent).toBe("helper");
  });

  it("rejects a response without choices as malformed", async () => {
    const fetchMock = vi.fn(async (..._args: FetchArgs) => jsonResponse({ choices: [] }));
    const agent = makeAgent({}, fetchMock);

    const err = await failureOf(agent.invoke([{ speaker: "task", content: "x" }]));

    expect(err.type).toBe("malformed_response");
  });

  it("marks network failures as retryable provider errors", async () => {
    const fetchMock = vi.fn(async (..._args: FetchArgs): Promise<Response> => {
      throw new TypeError("fetch failed");
    });
    const agent = makeAgent({}, fetchMock);

    const err = await failureOf(agent.invoke([{ speaker: "task", content: "x" }]));

    expect(err.type).toBe("provider_error");
    expect(err.retryable).toBe(true);
    expect(err.message).toBe("Request failed: fetch failed");
  });

  it("does not call the provider when the signal is already aborted", async () => {
    const fetchMock = vi.fn(async (..._args: FetchArgs) => reply("x"));
    const agent = makeAgent({}, fetchMock);

    const err = await failureOf(agent.invoke([{ speaker: "task", content: "x" }], { signal: AbortSignal.abort() }));

    expect(err.type).toBe("canceled");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("maps its own request timeout to timeout", async () => {
    const fetchMock = vi.fn(
      (_url: FetchArgs[0], init?: FetchArgs[1]) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => {
            const abort = new Error("This operation was aborted");
            abort.name = "AbortError";
            reject(abort);
          });
        })
    );
    const agent = makeAgent({}, fetchMock, { timeoutMs: 5 });

    const err = await failureOf(agent.invoke([{ speaker: "task", content: "x" }]));

    expect(err.type).toBe("timeout");
    expect(err.message).toBe("Request timed out after 5ms");
  });
});
