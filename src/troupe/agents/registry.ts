import type { AgentSpec } from "../config/types.js";
import { configurationError } from "../errors.js";
import { createLogger, type Logger } from "../logger.js";
import { EchoAgent } from "./backends/echo.js";
import { OpenAIChatAgent, type ChatVariant } from "./backends/openaiChat.js";
import { HumanReviewHandle, type HumanInputFn } from "./humanReview.js";
import { ToolRegistry } from "./toolRegistry.js";
import type { AgentHandle } from "./types.js";

/**
 * Everything a backend may need to build a handle. Credentials and I/O
 * hooks arrive here explicitly; backends never read process-wide state.
 */
export type BackendContext = {
  /** Credential values keyed by name (e.g. an agent's `llm.api_key_env`) */
  credentials: Readonly<Record<string, string | undefined>>;
  tools: ToolRegistry;
  logger: Logger;
  /** Required when any agent sets `human_input` */
  humanInput?: HumanInputFn;
  /** Override for HTTP backends */
  fetch?: typeof fetch;
};

export type BackendFactory = (spec: AgentSpec, context: BackendContext) => AgentHandle;

/**
 * Backend kinds mapped to handle factories.
 */
export class BackendRegistry {
  private readonly factories = new Map<string, BackendFactory>();

  register(kind: string, factory: BackendFactory): this {
    this.factories.set(kind, factory);
    return this;
  }

  has(kind: string): boolean {
    return this.factories.has(kind);
  }

  kinds(): string[] {
    return [...this.factories.keys()].sort();
  }

  /**
   * Build the handle for one agent. Agents flagged for human input are wrapped
   * in a review step.
   */
  create(spec: AgentSpec, context: BackendContext): AgentHandle {
    const factory = this.factories.get(spec.backend);
    if (!factory) {
      throw configurationError(
        `Unknown backend '${spec.backend}' for agent '${spec.name}'. Choose one of: ${this.kinds().join(" | ")}`
      );
    }

    const handle = factory(spec, context);
    if (!spec.humanInput) return handle;

    if (!context.humanInput) {
      throw configurationError(`Agent '${spec.name}' requires human input but no input source was provided`);
    }
    return new HumanReviewHandle(handle, context.humanInput);
  }
}

function chatFactory(variant: ChatVariant): BackendFactory {
  return (spec, context) => {
    const apiKey = context.credentials[spec.llm.apiKeyEnv];
    if (!apiKey) {
      throw configurationError(`Agent '${spec.name}' needs credential '${spec.llm.apiKeyEnv}', which is not set`);
    }
    const timeoutMs = spec.extra.timeout_ms;
    return new OpenAIChatAgent(spec, {
      variant,
      apiKey,
      tools: context.tools.resolve(spec.name, spec.tools),
      logger: context.logger.child(spec.name),
      ...(context.fetch !== undefined && { fetch: context.fetch }),
      ...(typeof timeoutMs === "number" && timeoutMs > 0 && { timeoutMs })
    });
  };
}

/**
 * Registry with the built-in backends: `openai`, `azure_openai` and `echo`.
 */
export function createDefaultBackendRegistry(): BackendRegistry {
  return new BackendRegistry()
    .register("openai", chatFactory("openai"))
    .register("azure_openai", chatFactory("azure_openai"))
    .register("echo", (spec, context) => {
      context.tools.resolve(spec.name, spec.tools);
      return new EchoAgent(spec);
    });
}

export function createBackendContext(overrides: Partial<BackendContext> = {}): BackendContext {
  return {
    credentials: overrides.credentials ?? {},
    tools: overrides.tools ?? new ToolRegistry(),
    logger: overrides.logger ?? createLogger("agents"),
    ...(overrides.humanInput !== undefined && { humanInput: overrides.humanInput }),
    ...(overrides.fetch !== undefined && { fetch: overrides.fetch })
  };
}
