import fs from "node:fs";
import path from "node:path";
import { TroupeError } from "./errors.js";

const EXAMPLE_AGENT = `name: example-agent
backend: openai            # openai | azure_openai | echo
instructions: "You are a helpful assistant."
llm:
  model: gpt-4o
  api_key_env: OPENAI_API_KEY
tools: []
max_turns: 5
`;

const EXAMPLE_REVIEWER = `name: example-reviewer
backend: echo
instructions: "Review the previous answer."
extra:
  prefix: "reviewed: "
`;

const EXAMPLE_PIPELINE = `name: example-pipeline
strategy: sequential       # sequential | group_chat | supervisor
agents:
  - example-agent
  - example-reviewer
max_rounds: 5
`;

export type ScaffoldResult = {
  /** Directories and files this call created */
  created: string[];
  /** Files left alone because they already existed */
  skipped: string[];
};

function writeIfMissing(file: string, content: string, result: ScaffoldResult): void {
  if (fs.existsSync(file)) {
    result.skipped.push(file);
    return;
  }
  fs.writeFileSync(file, content, "utf8");
  result.created.push(file);
}

/**
 * Lay out a project: `agents/`, `pipelines/`, one example of each and `.env.example`.
 * Existing files are never overwritten.
 */
export function scaffoldProject(projectDir: string): ScaffoldResult {
  const result: ScaffoldResult = { created: [], skipped: [] };
  const agentsDir = path.join(projectDir, "agents");
  const pipelinesDir = path.join(projectDir, "pipelines");

  for (const dir of [agentsDir, pipelinesDir]) {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
      result.created.push(dir);
    }
  }

  writeIfMissing(path.join(agentsDir, "example-agent.yaml"), EXAMPLE_AGENT, result);
  writeIfMissing(path.join(agentsDir, "example-reviewer.yaml"), EXAMPLE_REVIEWER, result);
  writeIfMissing(path.join(pipelinesDir, "example-pipeline.yaml"), EXAMPLE_PIPELINE, result);
  writeIfMissing(path.join(projectDir, ".env.example"), "OPENAI_API_KEY=\n", result);
  return result;
}

export function agentTemplate(name: string, backend: string): string {
  const azure = backend === "azure_openai"
    ? "  base_url: https://YOUR-RESOURCE.openai.azure.com\n  api_version: 2024-02-01\n"
    : "";
  return `name: ${name}
backend: ${backend}
instructions: "You are a helpful assistant named ${name}."
llm:
  model: gpt-4o
  api_key_env: ${backend === "azure_openai" ? "AZURE_OPENAI_API_KEY" : "OPENAI_API_KEY"}
${azure}tools: []
max_turns: 10
`;
}

/**
 * Write `<outDir>/<name>.yaml` from the agent template.
 * @throws TroupeError IO_ERROR if the file already exists
 */
export function createAgentFile(name: string, backend: string, outDir: string): string {
  fs.mkdirSync(outDir, { recursive: true });
  const dest = path.join(outDir, `${name}.yaml`);
  if (fs.existsSync(dest)) {
    throw new TroupeError("IO_ERROR", `'${dest}' already exists`, { file: dest });
  }
  fs.writeFileSync(dest, agentTemplate(name, backend), "utf8");
  return dest;
}
