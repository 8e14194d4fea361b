import { configurationError } from "../errors.js";
import type { ToolRef } from "../config/types.js";

/** JSON Schema object describing a tool's arguments. */
export type ToolParameters = {
  type: "object";
  properties: Record<string, unknown>;
  required?: string[];
  additionalProperties?: boolean;
};

export type ToolDefinition = {
  name: string;
  description: string;
  parameters: ToolParameters;
  handler: (args: Record<string, unknown>) => string | Promise<string>;
};

const EMPTY_PARAMETERS: ToolParameters = { type: "object", properties: {} };

/**
 * Named tools that agents may reference from their config.
 * Tools are registered in code; config files only name them.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>();

  register(tool: Omit<ToolDefinition, "parameters"> & { parameters?: ToolParameters }): this {
    if (this.tools.has(tool.name)) {
      throw configurationError(`Tool '${tool.name}' is already registered`);
    }
    this.tools.set(tool.name, { ...tool, parameters: tool.parameters ?? EMPTY_PARAMETERS });
    return this;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  /**
   * Resolve an agent's tool references. A description in the agent config
   * overrides the registered one.
   */
  resolve(agent: string, refs: readonly ToolRef[]): ToolDefinition[] {
    return refs.map((ref) => {
      const tool = this.tools.get(ref.name);
      if (!tool) {
        throw configurationError(
          `Agent '${agent}' references unknown tool '${ref.name}'. Registered: ${this.names().join(", ") || "(none)"}`
        );
      }
      return ref.description !== undefined ? { ...tool, description: ref.description } : tool;
    });
  }
}
