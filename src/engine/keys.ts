import { z } from "zod";
import type { ToolCallRecord } from "../types/tools.js";

export interface GitStatus {
  branch: string;
  clean: boolean;
  modified: string[];
  untracked: string[];
}

/** Value types of the well-known `ctx.data` keys. */
export interface KnownShapes {
  /** Working directory for command steps. */
  cwd: string;
  /** Opt-in switch for AI steps; anything but `true` turns them into skips. */
  use_ai: boolean;
  prompt: string;
  system_prompt: string;
  command: string;
  command_output: string;
  ai_response: string;
  ai_tool_calls: ToolCallRecord[];
  /** Built-in tool names handed to `core.ai_agent`. */
  tools: string[];
  max_iterations: number;
  commit_message: string;
  git_status: GitStatus;
}

export type KnownKey = keyof KnownShapes;

type KnownSchemas = { [K in KnownKey]: z.ZodType<KnownShapes[K], z.ZodTypeDef, unknown> };

/**
 * Core contract for `ctx.data`. Any step may write any key, but these are
 * shared across the built-in steps and validated whenever they are read
 * through `WorkflowContext.read`.
 */
export const KNOWN_KEYS: KnownSchemas = {
  cwd: z.string(),
  use_ai: z.boolean(),
  prompt: z.string(),
  system_prompt: z.string(),
  command: z.string(),
  command_output: z.string(),
  ai_response: z.string(),
  ai_tool_calls: z.array(
    z.object({
      toolName: z.string(),
      input: z.record(z.unknown()),
      output: z.unknown().optional(),
      error: z.string().optional(),
      iterationIndex: z.number().int().nonnegative(),
    }),
  ),
  tools: z.array(z.string()),
  max_iterations: z.number().int().positive(),
  commit_message: z.string(),
  git_status: z.object({
    branch: z.string(),
    clean: z.boolean(),
    modified: z.array(z.string()).default([]),
    untracked: z.array(z.string()).default([]),
  }),
};

export function isKnownKey(key: string): key is KnownKey {
  return Object.prototype.hasOwnProperty.call(KNOWN_KEYS, key);
}
