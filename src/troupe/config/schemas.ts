import { z } from "zod";
import { configurationError } from "../errors.js";
import {
  DEFAULT_DONE_SENTINEL,
  DEFAULT_LLM_CONFIG,
  DEFAULT_MAX_ROUNDS,
  DEFAULT_MAX_TURNS,
  type AgentSpec,
  type LlmConfig,
  type PipelineSpec,
  type Roster,
  type ToolRef
} from "./types.js";

// ============================================================================
// File schemas (snake_case, as written in YAML/JSON config files)
// ============================================================================

export const LlmConfigFileSchema = z.object({
  model: z.string().min(1).default(DEFAULT_LLM_CONFIG.model),
  api_key_env: z.string().min(1).default(DEFAULT_LLM_CONFIG.apiKeyEnv),
  base_url: z.string().url().optional(),
  api_version: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).default(DEFAULT_LLM_CONFIG.temperature),
  max_tokens: z.number().int().positive().optional()
});

export const ToolRefFileSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional()
});

export const AgentFileSchema = z.object({
  name: z.string().min(1),
  backend: z.string().min(1),
  instructions: z.string().default(""),
  llm: LlmConfigFileSchema.default({}),
  tools: z.array(ToolRefFileSchema).default([]),
  human_input: z.boolean().default(false),
  max_turns: z.number().int().min(1).default(DEFAULT_MAX_TURNS),
  extra: z.record(z.unknown()).default({})
});

export const PipelineFileSchema = z
  .object({
    name: z.string().min(1),
    agents: z.array(z.string().min(1)).min(1),
    strategy: z.enum(["sequential", "group_chat", "supervisor"]).default("sequential"),
    max_rounds: z.number().int().min(1).default(DEFAULT_MAX_ROUNDS),
    supervisor_agent: z.string().min(1).optional(),
    supervisor_mode: z.enum(["single", "multi_round"]).default("single"),
    done_sentinel: z.string().min(1).default(DEFAULT_DONE_SENTINEL),
    termination_keyword: z.string().min(1).optional()
  })
  .superRefine((value, ctx) => {
    if (value.strategy === "supervisor" && !value.supervisor_agent) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["supervisor_agent"],
        message: "supervisor_agent must be set when strategy is 'supervisor'"
      });
    }
  });

export type AgentFile = z.infer<typeof AgentFileSchema>;
export type PipelineFile = z.infer<typeof PipelineFileSchema>;

// ============================================================================
// Programmatic construction
// ============================================================================

export type AgentSpecInput = {
  name: string;
  backend: string;
  instructions?: string;
  llm?: Partial<LlmConfig>;
  tools?: readonly ToolRef[];
  maxTurns?: number;
  humanInput?: boolean;
  extra?: Record<string, unknown>;
};

export type PipelineSpecInput = {
  name: string;
  agents: readonly string[];
  strategy?: PipelineSpec["strategy"];
  maxRounds?: number;
  supervisorAgent?: string;
  supervisorMode?: PipelineSpec["supervisorMode"];
  doneSentinel?: string;
  terminationKeyword?: string;
};

function positiveInt(value: number, field: string, owner: string): number {
  if (!Number.isInteger(value) || value < 1) {
    throw configurationError(`${field} must be a positive integer (got ${value}) in '${owner}'`);
  }
  return value;
}

/**
 * Build an immutable AgentSpec, filling in defaults.
 */
export function defineAgent(input: AgentSpecInput): AgentSpec {
  if (!input.name.trim()) {
    throw configurationError("Agent name must not be empty");
  }
  const llm: LlmConfig = { ...DEFAULT_LLM_CONFIG, ...input.llm };
  const tools = (input.tools ?? []).map((tool) => Object.freeze({ ...tool }));
  return Object.freeze({
    name: input.name,
    backend: input.backend,
    instructions: input.instructions ?? "",
    llm: Object.freeze(llm),
    tools: Object.freeze(tools),
    maxTurns: positiveInt(input.maxTurns ?? DEFAULT_MAX_TURNS, "max_turns", input.name),
    humanInput: input.humanInput ?? false,
    extra: Object.freeze({ ...input.extra })
  });
}

/**
 * Build an immutable PipelineSpec, filling in defaults.
 * Cross-references against a roster are checked later, at resolution time.
 */
export function definePipeline(input: PipelineSpecInput): PipelineSpec {
  const spec: PipelineSpec = {
    name: input.name,
    agents: Object.freeze([...input.agents]),
    strategy: input.strategy ?? "sequential",
    maxRounds: positiveInt(input.maxRounds ?? DEFAULT_MAX_ROUNDS, "max_rounds", input.name),
    supervisorMode: input.supervisorMode ?? "single",
    doneSentinel: input.doneSentinel ?? DEFAULT_DONE_SENTINEL
  };
  if (input.supervisorAgent !== undefined) {
    spec.supervisorAgent = input.supervisorAgent;
  }
  if (input.terminationKeyword !== undefined) {
    spec.terminationKeyword = input.terminationKeyword;
  }
  return Object.freeze(spec);
}

export function agentFromFile(file: AgentFile): AgentSpec {
  const llm: Partial<LlmConfig> = {
    model: file.llm.model,
    apiKeyEnv: file.llm.api_key_env,
    temperature: file.llm.temperature
  };
  if (file.llm.base_url !== undefined) llm.baseUrl = file.llm.base_url;
  if (file.llm.api_version !== undefined) llm.apiVersion = file.llm.api_version;
  if (file.llm.max_tokens !== undefined) llm.maxTokens = file.llm.max_tokens;

  const tools = file.tools.map((tool): ToolRef =>
    tool.description !== undefined ? { name: tool.name, description: tool.description } : { name: tool.name }
  );

  return defineAgent({
    name: file.name,
    backend: file.backend,
    instructions: file.instructions,
    llm,
    tools,
    maxTurns: file.max_turns,
    humanInput: file.human_input,
    extra: file.extra
  });
}

export function pipelineFromFile(file: PipelineFile): PipelineSpec {
  const input: PipelineSpecInput = {
    name: file.name,
    agents: file.agents,
    strategy: file.strategy,
    maxRounds: file.max_rounds,
    supervisorMode: file.supervisor_mode,
    doneSentinel: file.done_sentinel
  };
  if (file.supervisor_agent !== undefined) input.supervisorAgent = file.supervisor_agent;
  if (file.termination_keyword !== undefined) input.terminationKeyword = file.termination_keyword;
  return definePipeline(input);
}

/**
 * Index agent specs by name. Duplicate names are a configuration error.
 */
export function createRoster(specs: Iterable<AgentSpec>): Roster {
  const roster = new Map<string, AgentSpec>();
  for (const spec of specs) {
    if (roster.has(spec.name)) {
      throw configurationError(`Duplicate agent name '${spec.name}' in roster`);
    }
    roster.set(spec.name, spec);
  }
  return roster;
}
