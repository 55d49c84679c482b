import type { Tool } from "../types/tools.js";
import { ToolNotFoundError } from "../errors.js";
import { cliExec } from "./cli/exec.js";
import { httpRequest } from "./http/request.js";

export type ToolRegistry = Record<string, Tool>;

export function buildToolRegistry(): ToolRegistry {
  return {
    [cliExec.name]: cliExec,
    [httpRequest.name]: httpRequest,
  };
}

/** Assembles the tool list for one agent-loop invocation. */
export function buildToolSet(names: readonly string[], registry: ToolRegistry = buildToolRegistry()): Tool[] {
  return names.map((name) => {
    const tool = Object.hasOwn(registry, name) ? registry[name] : undefined;
    if (!tool) throw new ToolNotFoundError(name, Object.keys(registry));
    return tool;
  });
}
