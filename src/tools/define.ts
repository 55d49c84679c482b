import type { CanonicalParameterType, Tool, ToolParameter, ToolSpec } from "../types/tools.js";
import { ToolExecutionError, errorMessage } from "../errors.js";

const TYPE_ALIASES: Record<string, CanonicalParameterType> = {
  string: "string",
  str: "string",
  integer: "integer",
  int: "integer",
  number: "number",
  float: "number",
  boolean: "boolean",
  bool: "boolean",
  array: "array",
  list: "array",
  object: "object",
  dict: "object",
};

/** Canonical form of a declared parameter type, or `undefined` when it has none. */
export function normalizeParameterType(type: string): CanonicalParameterType | undefined {
  const key = type.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(TYPE_ALIASES, key) ? TYPE_ALIASES[key] : undefined;
}

function matchesType(value: unknown, type: CanonicalParameterType): boolean {
  switch (type) {
    case "string":
      return typeof value === "string";
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "number":
      return typeof value === "number" && Number.isFinite(value);
    case "boolean":
      return typeof value === "boolean";
    case "array":
      return Array.isArray(value);
    case "object":
      return typeof value === "object" && value !== null && !Array.isArray(value);
  }
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

/** Problems with `args` against the declared parameters; empty when valid. */
export function validateToolArgs(parameters: Record<string, ToolParameter>, args: Record<string, unknown>): string[] {
  const problems: string[] = [];
  for (const [name, param] of Object.entries(parameters)) {
    const value = args[name];
    if (value === undefined || value === null) {
      if (param.required) problems.push(`missing required parameter "${name}"`);
      continue;
    }
    const type = normalizeParameterType(param.type);
    if (type && !matchesType(value, type)) {
      problems.push(`parameter "${name}" expected ${type} but got ${describeValue(value)}`);
    }
  }
  return problems;
}

export type ToolHandler<TOut = unknown> = (args: Record<string, unknown>) => Promise<TOut> | TOut;

/**
 * Wraps a handler into a Tool that checks its input first. Anything the
 * handler throws surfaces as a ToolExecutionError.
 */
export function defineTool<TOut>(spec: ToolSpec, handler: ToolHandler<TOut>): Tool {
  const parameters = Object.freeze({ ...spec.parameters });
  return Object.freeze({
    name: spec.name,
    description: spec.description,
    parameters,
    async execute(args: Record<string, unknown>): Promise<unknown> {
      const problems = validateToolArgs(parameters, args);
      if (problems.length) throw new ToolExecutionError(spec.name, `invalid input: ${problems.join("; ")}`);
      try {
        return await handler(args);
      } catch (e) {
        if (e instanceof ToolExecutionError) throw e;
        throw new ToolExecutionError(spec.name, errorMessage(e), e);
      }
    },
  });
}
