/**
 * Static agent and pipeline descriptions.
 * Created when configuration loads and read-only for the rest of the process.
 */

export type LlmConfig = {
  /** Model or deployment identifier */
  model: string;
  /** Name of the credential holding the API key (looked up in the credentials map) */
  apiKeyEnv: string;
  /** Custom API base URL (Azure OpenAI, proxies, self-hosted gateways) */
  baseUrl?: string;
  /** API version, Azure OpenAI only */
  apiVersion?: string;
  temperature: number;
  maxTokens?: number;
};

export type ToolRef = {
  name: string;
  description?: string;
};

export type AgentSpec = {
  /** Unique within a roster */
  name: string;
  /** Backend kind, resolved through the BackendRegistry */
  backend: string;
  instructions: string;
  llm: LlmConfig;
  tools: readonly ToolRef[];
  /** Upper bound on model calls per invocation (tool-call loop) */
  maxTurns: number;
  /** Route every reply through a human reviewer */
  humanInput: boolean;
  /** Backend-specific options passed through verbatim */
  extra: Readonly<Record<string, unknown>>;
};

export type StrategyKind = "sequential" | "group_chat" | "supervisor";

export type SupervisorMode = "single" | "multi_round";

export type PipelineSpec = {
  name: string;
  /** Ordered agent names: the chain for sequential, the roster for the others */
  agents: readonly string[];
  strategy: StrategyKind;
  /** Round budget for group_chat and multi_round supervisor pipelines */
  maxRounds: number;
  supervisorAgent?: string;
  supervisorMode: SupervisorMode;
  /** Supervisor reply that ends a multi_round pipeline */
  doneSentinel: string;
  /** Group chat ends when a trimmed reply ends with this keyword */
  terminationKeyword?: string;
};

/** Agent specs keyed by name. */
export type Roster = ReadonlyMap<string, AgentSpec>;

export const DEFAULT_MAX_TURNS = 10;
export const DEFAULT_MAX_ROUNDS = 10;
export const DEFAULT_DONE_SENTINEL = "DONE";

export const DEFAULT_LLM_CONFIG: LlmConfig = {
  model: "gpt-4o",
  apiKeyEnv: "OPENAI_API_KEY",
  temperature: 0.1
};
