import type { Tool, ToolDefinition } from '../types/index.js';
import { DuplicateToolError, toToolDefinition } from '../types/index.js';

/**
 * Catalog of tools keyed by name. Registration order is preserved by the
 * underlying Map and is the order every listing returns.
 *
 * Tool tasks only read from the registry while a batch runs; mutation
 * happens between runs.
 */
export type ToolRegistry = {
  readonly register: (tool: Tool) => void;
  readonly unregister: (name: string) => boolean;
  readonly get: (name: string) => Tool | null;
  readonly has: (name: string) => boolean;
  readonly listTools: () => ReadonlyArray<Tool>;
  readonly listToolNames: () => ReadonlyArray<string>;
  readonly getToolDefinitions: () => ReadonlyArray<ToolDefinition>;
  readonly getSafeTools: () => ReadonlyArray<Tool>;
  readonly getDangerousTools: () => ReadonlyArray<Tool>;
  readonly size: () => number;
  readonly clear: () => void;
};

export function createToolRegistry(initial?: ReadonlyArray<Tool>): ToolRegistry {
  const tools = new Map<string, Tool>();

  const register = (tool: Tool): void => {
    if (tools.has(tool.name)) {
      throw new DuplicateToolError(tool.name);
    }
    tools.set(tool.name, tool);
  };

  for (const tool of initial ?? []) {
    register(tool);
  }

  return {
    register,
    unregister(name: string): boolean {
      return tools.delete(name);
    },
    get(name: string): Tool | null {
      return tools.get(name) ?? null;
    },
    has(name: string): boolean {
      return tools.has(name);
    },
    listTools(): ReadonlyArray<Tool> {
      return Array.from(tools.values());
    },
    listToolNames(): ReadonlyArray<string> {
      return Array.from(tools.keys());
    },
    getToolDefinitions(): ReadonlyArray<ToolDefinition> {
      return Array.from(tools.values()).map(toToolDefinition);
    },
    getSafeTools(): ReadonlyArray<Tool> {
      return Array.from(tools.values()).filter((t) => !t.isDangerous);
    },
    getDangerousTools(): ReadonlyArray<Tool> {
      return Array.from(tools.values()).filter((t) => t.isDangerous);
    },
    size(): number {
      return tools.size;
    },
    clear(): void {
      tools.clear();
    },
  };
}
