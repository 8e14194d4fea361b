#!/usr/bin/env node
import { Command, Option } from "commander";
import path from "node:path";
import process from "node:process";
import readline, { type Interface } from "node:readline/promises";
import chalk from "chalk";
import { createDefaultBackendRegistry } from "./troupe/agents/registry.js";
import type { HumanInputFn } from "./troupe/agents/humanReview.js";
import { ChatSession } from "./troupe/chatSession.js";
import { collectCredentials, readServerEnv } from "./troupe/config/env.js";
import {
  describeConfigDir,
  loadAgentSpec,
  loadPipelineSpec,
  loadPipelinesDir,
  loadRosterDir
} from "./troupe/config/loader.js";
import { createRoster, definePipeline } from "./troupe/config/schemas.js";
import type { Roster } from "./troupe/config/types.js";
import { TroupeError } from "./troupe/errors.js";
import { preview } from "./troupe/logger.js";
import { PipelineEngine } from "./troupe/pipeline/engine.js";
import type { RunEvent, RunResult, TerminalReason } from "./troupe/pipeline/types.js";
import { scaffoldProject, createAgentFile } from "./troupe/scaffold.js";
import { readlineHumanInput } from "./troupe/terminalInput.js";
import { startHttpServer } from "./server/http.js";

/**
 * Exit codes for CLI commands, one per terminal reason.
 */
const EXIT_CODES = {
  OK: 0,               // Run completed
  MAX_ROUNDS: 10,      // Round budget spent without an explicit finish
  ROUTING_FAILED: 20,  // Supervisor named nobody usable
  ERROR: 30,           // Agent failure or fatal error
  CANCELLED: 40        // Cancelled by user (SIGINT/SIGTERM) or timed out
} as const;

function reasonToExitCode(reason: TerminalReason): number {
  switch (reason) {
    case "completed":
      return EXIT_CODES.OK;
    case "max_rounds_exceeded":
      return EXIT_CODES.MAX_ROUNDS;
    case "routing_failed":
      return EXIT_CODES.ROUTING_FAILED;
    case "agent_failed":
      return EXIT_CODES.ERROR;
    case "canceled":
      return EXIT_CODES.CANCELLED;
  }
}

function terminalInterface(): Interface {
  // Prompts go to stderr so stdout only ever carries results
  return readline.createInterface({ input: process.stdin, output: process.stderr });
}

/**
 * One-shot review prompt for commands that hold no interface of their own.
 * Never use it while another interface is reading stdin: closing this one pauses stdin.
 */
const askOnTerminal: HumanInputFn = async (prompt, options) => {
  const rl = terminalInterface();
  try {
    return await readlineHumanInput(rl)(prompt, options);
  } finally {
    rl.close();
  }
};

function createEngine(roster: Roster, humanInput: HumanInputFn = askOnTerminal): PipelineEngine {
  return new PipelineEngine({
    backends: createDefaultBackendRegistry(),
    context: {
      credentials: collectCredentials([...roster.values()].map((agent) => agent.llm.apiKeyEnv)),
      humanInput
    }
  });
}

function printEvent(event: RunEvent): void {
  switch (event.type) {
    case "turn_completed":
      process.stderr.write(`${chalk.cyan(event.turn.speaker)} ${chalk.dim(`(${event.durationMs}ms)`)} ${preview(event.turn.content, 120)}\n`);
      break;
    case "routing_decided":
      process.stderr.write(chalk.dim(`  round ${event.round}: ${event.supervisor} -> ${event.choice} [${event.outcome}]\n`));
      break;
    default:
      break;
  }
}

function outputResultHuman(result: RunResult): void {
  switch (result.reason) {
    case "completed":
      process.stderr.write(chalk.green(`✓ ${result.pipeline} completed`));
      break;
    case "max_rounds_exceeded":
      process.stderr.write(chalk.yellow(`⚠ ${result.pipeline} stopped after its round limit`));
      break;
    case "routing_failed":
    case "agent_failed":
      process.stderr.write(chalk.red(`✗ ${result.pipeline} failed: [${result.error?.code ?? result.reason}] ${result.content}`));
      break;
    case "canceled":
      process.stderr.write(chalk.yellow(`✗ ${result.pipeline}: ${result.content}`));
      break;
  }
  process.stderr.write(chalk.dim(` (${result.transcript.length} turns, ${result.durationMs}ms)\n`));

  if (result.finalAgent !== null) {
    process.stderr.write(chalk.bold(`\n--- ${result.finalAgent} ---\n`));
    process.stdout.write(`${result.content}\n`);
  }
}

function fail(err: unknown): never {
  if (err instanceof TroupeError) {
    process.stderr.write(chalk.red(`Error [${err.code}]: ${err.message}\n`));
  } else {
    process.stderr.write(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}\n`));
  }
  process.exit(EXIT_CODES.ERROR);
}

/**
 * Abort the run on the first SIGINT/SIGTERM; force exit on the second.
 */
function installSignalHandlers(controller: AbortController): void {
  let cancelled = false;
  const handleSignal = (signal: string): void => {
    if (cancelled) {
      process.stderr.write(chalk.red(`\nForced exit on second ${signal}\n`));
      process.exit(EXIT_CODES.CANCELLED);
    }
    cancelled = true;
    process.stderr.write(chalk.yellow(`\nReceived ${signal}, cancelling...\n`));
    controller.abort();
  };
  process.on("SIGINT", () => handleSignal("SIGINT"));
  process.on("SIGTERM", () => handleSignal("SIGTERM"));
}

type RunCommandOptions = {
  json: boolean;
  timeout?: string;
};

async function executeRun(
  run: (signal: AbortSignal, timeoutMs: number | undefined) => Promise<RunResult>,
  opts: RunCommandOptions
): Promise<never> {
  const controller = new AbortController();
  installSignalHandlers(controller);
  const timeoutMs = opts.timeout !== undefined ? Number(opts.timeout) : undefined;
  if (timeoutMs !== undefined && (!Number.isInteger(timeoutMs) || timeoutMs <= 0)) {
    fail(new TroupeError("BAD_REQUEST", `--timeout must be a positive integer (got ${opts.timeout})`));
  }

  const result = await run(controller.signal, timeoutMs);
  if (opts.json) {
    process.stdout.write(JSON.stringify(result, null, 2) + "\n");
  } else {
    outputResultHuman(result);
  }
  process.exit(reasonToExitCode(result.reason));
}

const program = new Command();

program.name("troupe").description("Multi-agent pipeline runner").version("0.1.0");

program
  .command("init")
  .description("Scaffold agents/ and pipelines/ with examples")
  .argument("[dir]", "Project directory", ".")
  .action((dir: string) => {
    try {
      const result = scaffoldProject(path.resolve(dir));
      for (const created of result.created) {
        process.stdout.write(`  created ${path.relative(process.cwd(), created) || "."}\n`);
      }
      for (const skipped of result.skipped) {
        process.stdout.write(chalk.dim(`  exists  ${path.relative(process.cwd(), skipped)}\n`));
      }
      process.stdout.write(chalk.green(`\nProject scaffolded in '${dir}'. Edit agents/example-agent.yaml to get started.\n`));
    } catch (err) {
      fail(err);
    }
  });

program
  .command("create")
  .description("Write an agent config template")
  .argument("<name>", "Agent name")
  .addOption(new Option("--backend <kind>", "Backend kind").choices(createDefaultBackendRegistry().kinds()).default("openai"))
  .option("--out-dir <dir>", "Output directory", "agents")
  .action((name: string, opts: { backend: string; outDir: string }) => {
    try {
      const dest = createAgentFile(name, opts.backend, opts.outDir);
      process.stdout.write(chalk.green(`Created ${dest}\n`));
    } catch (err) {
      fail(err);
    }
  });

program
  .command("list")
  .description("List agent and pipeline configs in a directory")
  .argument("[dir]", "Config directory", "agents")
  .action((dir: string) => {
    try {
      const { configs, errors } = describeConfigDir(dir);
      if (configs.length === 0 && errors.length === 0) {
        process.stdout.write(chalk.yellow(`No configs found in ${dir}\n`));
        return;
      }
      for (const config of configs) {
        const kind = config.kind === "agent" ? chalk.cyan("agent   ") : chalk.magenta("pipeline");
        process.stdout.write(`${kind} ${chalk.bold(config.name)} ${chalk.dim(`[${config.detail}]`)} ${path.basename(config.file)}\n`);
      }
      for (const error of errors) {
        process.stdout.write(chalk.red(`invalid  ${path.basename(error.file)}: ${error.message}\n`));
      }
    } catch (err) {
      fail(err);
    }
  });

program
  .command("run")
  .description("Send one message to a single agent")
  .argument("<agent-config>", "Agent config file")
  .argument("<message>", "Message to send")
  .option("--timeout <ms>", "Total timeout in ms")
  .option("--json", "Output full JSON result", false)
  .action(async (config: string, message: string, opts: RunCommandOptions) => {
    try {
      const agent = loadAgentSpec(config);
      const roster = createRoster([agent]);
      const spec = definePipeline({ name: agent.name, agents: [agent.name] });
      const engine = createEngine(roster);
      process.stderr.write(chalk.blue(`Running agent '${agent.name}' [${agent.backend}]...\n`));
      await executeRun((signal, timeoutMs) => engine.run(spec, message, roster, {
        signal,
        ...(timeoutMs !== undefined && { timeoutMs })
      }), opts);
    } catch (err) {
      fail(err);
    }
  });

const pipeline = program.command("pipeline").description("Multi-agent pipeline commands");

pipeline
  .command("run")
  .description("Run a pipeline on a task")
  .argument("<pipeline-config>", "Pipeline config file")
  .argument("<task>", "Task to run")
  .option("--agents-dir <dir>", "Directory with the agent configs the pipeline names", "agents")
  .option("--timeout <ms>", "Total timeout in ms")
  .option("--json", "Output full JSON result", false)
  .action(async (config: string, task: string, opts: RunCommandOptions & { agentsDir: string }) => {
    try {
      const spec = loadPipelineSpec(config);
      const roster = loadRosterDir(opts.agentsDir);
      const engine = createEngine(roster);
      process.stderr.write(chalk.blue(`Running pipeline '${spec.name}' [${spec.strategy}]...\n`));
      await executeRun((signal, timeoutMs) => engine.run(spec, task, roster, {
        signal,
        ...(timeoutMs !== undefined && { timeoutMs }),
        ...(!opts.json && { events: { onEvent: printEvent, emitTurnStarted: false } })
      }), opts);
    } catch (err) {
      fail(err);
    }
  });

program
  .command("chat")
  .description("Interactive chat with a pipeline; history carries across messages")
  .argument("<pipeline-config>", "Pipeline config file")
  .option("--agents-dir <dir>", "Directory with the agent configs the pipeline names", "agents")
  .option("--no-color", "Disable coloured output")
  .action(async (config: string, opts: { agentsDir: string; color: boolean }) => {
    if (!opts.color) chalk.level = 0;

    // Review prompts share the chat's interface; a second one would pause stdin when it closed.
    const rl = terminalInterface();
    let session: ChatSession;
    let pipelineName: string;
    try {
      const spec = loadPipelineSpec(config);
      const roster = loadRosterDir(opts.agentsDir);
      const engine = createEngine(roster, readlineHumanInput(rl));
      // Surface config problems before the first prompt
      engine.resolve(spec, roster);
      session = new ChatSession(engine, spec, roster);
      pipelineName = spec.name;
    } catch (err) {
      fail(err);
    }

    process.stderr.write(chalk.cyan.bold(`\nChatting with pipeline '${pipelineName}'\n`));
    process.stderr.write(chalk.yellow("Type 'exit' or 'quit' to stop. Type 'reset' to clear conversation history.\n\n"));

    let current: AbortController | undefined;
    rl.on("SIGINT", () => {
      if (current) {
        current.abort();
      } else {
        rl.close();
      }
    });

    try {
      for (;;) {
        let input: string;
        try {
          input = (await rl.question(chalk.green.bold("You: "))).trim();
        } catch {
          // stdin closed (Ctrl-D) or readline shut down
          break;
        }
        if (!input) continue;
        if (input === "exit" || input === "quit") break;
        if (input === "reset") {
          session.reset();
          process.stderr.write(chalk.yellow("[Conversation history cleared]\n"));
          continue;
        }

        current = new AbortController();
        try {
          const result = await session.send(input, {
            signal: current.signal,
            events: { onEvent: printEvent, emitTurnStarted: false }
          });
          if (result.finalAgent !== null) {
            process.stdout.write(`\n${chalk.blue.bold(`${result.finalAgent}:`)} ${result.content}\n\n`);
          } else {
            process.stderr.write(chalk.red(`[${result.reason}] ${result.content}\n\n`));
          }
        } catch (err) {
          process.stderr.write(chalk.red(`[Error] ${err instanceof Error ? err.message : String(err)}\n`));
        } finally {
          current = undefined;
        }
      }
    } finally {
      rl.close();
    }
    process.stderr.write(chalk.yellow("Goodbye!\n"));
  });

program
  .command("serve")
  .description("Run the HTTP server")
  .option("--agents-dir <dir>", "Agent config directory", "agents")
  .option("--pipelines-dir <dir>", "Pipeline config directory", "pipelines")
  .option("--port <port>", "Port", "8765")
  .action((opts: { agentsDir: string; pipelinesDir: string; port: string }) => {
    try {
      const env = readServerEnv();
      const roster = loadRosterDir(opts.agentsDir);
      const pipelines = loadPipelinesDir(opts.pipelinesDir);
      const engine = new PipelineEngine({
        context: {
          credentials: collectCredentials([...roster.values()].map((agent) => agent.llm.apiKeyEnv))
        }
      });
      // Reject broken pipeline files at startup rather than on the first request
      for (const spec of pipelines.values()) {
        engine.resolve(spec, roster);
      }
      startHttpServer({
        engine,
        pipelines,
        roster,
        port: Number(opts.port),
        maxConcurrentRuns: env.maxConcurrentRuns,
        queueTimeoutMs: env.queueTimeoutMs
      });
    } catch (err) {
      fail(err);
    }
  });

await program.parseAsync(process.argv);
