/**
 * Troupe - multi-agent pipeline orchestration.
 *
 * Exports:
 * - PipelineEngine and the three strategies (sequential, group chat, supervisor)
 * - Config schemas, loaders and the roster
 * - Agent handles, backends and the tool registry
 * - HTTP app factory and run registry
 */

// Engine and strategies
export { PipelineEngine } from "./troupe/pipeline/engine.js";
export type { PipelineEngineOptions, ResolvedPipeline } from "./troupe/pipeline/engine.js";
export { STRATEGIES, runSequential, runGroupChat, runSupervisor, keywordTermination, routingBrief } from "./troupe/pipeline/strategies/index.js";
export type {
  TerminalReason,
  RunError,
  RunResult,
  RunOptions,
  TerminationPredicate,
  Strategy,
  StrategyContext,
  StrategyOutcome,
  RunEvent,
  RunEventHandler,
  RunEventOptions
} from "./troupe/pipeline/types.js";

// Conversation
export { Conversation, composeFollowUpTask, TASK_SPEAKER } from "./troupe/conversation.js";
export type { ChatMessage, Turn } from "./troupe/conversation.js";
export { ChatSession } from "./troupe/chatSession.js";

// Config
export { defineAgent, definePipeline, createRoster } from "./troupe/config/schemas.js";
export type { AgentSpecInput, PipelineSpecInput } from "./troupe/config/schemas.js";
export { loadAgentSpec, loadPipelineSpec, loadRosterDir, loadPipelinesDir } from "./troupe/config/loader.js";
export type { AgentSpec, PipelineSpec, Roster, LlmConfig, ToolRef, StrategyKind, SupervisorMode } from "./troupe/config/types.js";

// Agents
export { AgentInvocationError } from "./troupe/agents/types.js";
export type { AgentHandle, AgentInvocationErrorType, InvokeOptions } from "./troupe/agents/types.js";
export { BackendRegistry, createDefaultBackendRegistry, createBackendContext } from "./troupe/agents/registry.js";
export type { BackendContext, BackendFactory } from "./troupe/agents/registry.js";
export { ToolRegistry } from "./troupe/agents/toolRegistry.js";
export type { ToolDefinition } from "./troupe/agents/toolRegistry.js";
export type { HumanInputFn } from "./troupe/agents/humanReview.js";

// Errors and logging
export { TroupeError, toTroupeError, isConfigurationError } from "./troupe/errors.js";
export type { TroupeErrorCode } from "./troupe/errors.js";
export { Logger, createLogger } from "./troupe/logger.js";
export type { LogLevel } from "./troupe/logger.js";

// HTTP
export { createHttpApp, startHttpServer } from "./server/http.js";
export { RunRegistry } from "./troupe/pipeline/runRegistry.js";
export type { RunRecord, RunStatus } from "./troupe/pipeline/runRegistry.js";
