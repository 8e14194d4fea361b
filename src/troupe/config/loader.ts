import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import type { ZodType, ZodTypeDef } from "zod";
import { configurationError, TroupeError } from "../errors.js";
import {
  AgentFileSchema,
  PipelineFileSchema,
  agentFromFile,
  createRoster,
  pipelineFromFile
} from "./schemas.js";
import type { AgentSpec, PipelineSpec, Roster } from "./types.js";

const CONFIG_EXTENSIONS = new Set([".yaml", ".yml", ".json"]);

export function isConfigFile(file: string): boolean {
  return CONFIG_EXTENSIONS.has(path.extname(file).toLowerCase());
}

function readConfigFile(file: string): unknown {
  const ext = path.extname(file).toLowerCase();
  if (!CONFIG_EXTENSIONS.has(ext)) {
    throw configurationError(`Unsupported config format: ${ext || "(none)"}. Use .yaml, .yml, or .json`, { file });
  }

  let raw: string;
  try {
    raw = fs.readFileSync(file, "utf8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw configurationError(`Config file not found or unreadable: ${file}`, { file, reason });
  }

  try {
    return ext === ".json" ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw configurationError(`Config file is not valid ${ext === ".json" ? "JSON" : "YAML"}: ${file}`, { file, reason });
  }
}

function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, file: string): T {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const summary = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw configurationError(`Invalid config in ${file}: ${summary}`, { file, issues: parsed.error.issues });
  }
  return parsed.data;
}

/**
 * Load and validate an agent definition from a YAML or JSON file.
 */
export function loadAgentSpec(file: string): AgentSpec {
  return agentFromFile(validate(AgentFileSchema, readConfigFile(file), file));
}

/**
 * Load and validate a pipeline definition from a YAML or JSON file.
 */
export function loadPipelineSpec(file: string): PipelineSpec {
  return pipelineFromFile(validate(PipelineFileSchema, readConfigFile(file), file));
}

function listConfigFiles(dir: string): string[] {
  let entries: string[];
  try {
    entries = fs.readdirSync(dir);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw configurationError(`Config directory not found or unreadable: ${dir}`, { dir, reason });
  }
  return entries
    .filter(isConfigFile)
    .sort((a, b) => a.localeCompare(b))
    .map((entry) => path.join(dir, entry));
}

/**
 * Load every agent file in a directory into a roster.
 */
export function loadRosterDir(dir: string): Roster {
  return createRoster(listConfigFiles(dir).map(loadAgentSpec));
}

/**
 * Load every pipeline file in a directory, keyed by pipeline name.
 */
export function loadPipelinesDir(dir: string): ReadonlyMap<string, PipelineSpec> {
  const pipelines = new Map<string, PipelineSpec>();
  for (const file of listConfigFiles(dir)) {
    const spec = loadPipelineSpec(file);
    if (pipelines.has(spec.name)) {
      throw configurationError(`Duplicate pipeline name '${spec.name}'`, { file });
    }
    pipelines.set(spec.name, spec);
  }
  return pipelines;
}

export type ConfigSummary = {
  file: string;
  kind: "agent" | "pipeline";
  name: string;
  detail: string;
};

/**
 * Describe every config file in a directory without failing on the first bad one.
 * Files that are neither a valid agent nor a valid pipeline are reported with their error.
 */
export function describeConfigDir(dir: string): { configs: ConfigSummary[]; errors: Array<{ file: string; message: string }> } {
  const configs: ConfigSummary[] = [];
  const errors: Array<{ file: string; message: string }> = [];

  for (const file of listConfigFiles(dir)) {
    let data: unknown;
    try {
      data = readConfigFile(file);
    } catch (err) {
      errors.push({ file, message: err instanceof TroupeError ? err.message : String(err) });
      continue;
    }

    const pipeline = PipelineFileSchema.safeParse(data);
    if (pipeline.success) {
      configs.push({ file, kind: "pipeline", name: pipeline.data.name, detail: pipeline.data.strategy });
      continue;
    }
    const agent = AgentFileSchema.safeParse(data);
    if (agent.success) {
      configs.push({ file, kind: "agent", name: agent.data.name, detail: agent.data.backend });
      continue;
    }
    errors.push({ file, message: "Not a valid agent or pipeline config" });
  }

  return { configs, errors };
}
