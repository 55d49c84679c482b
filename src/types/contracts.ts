import type { Result } from "../engine/result.js";
import type { WorkflowContext } from "../engine/context.js";
import type { Tool, ToolCallRecord } from "./tools.js";

export type StepId = string;

export type StepFn = (ctx: WorkflowContext) => Result | Promise<Result>;

export interface StepEntry {
  readonly id: StepId;
  readonly ref: string;
  readonly fn: StepFn;
  /** An Error from an optional step is recorded and the run continues. */
  readonly optional: boolean;
  /** Merged into `ctx.data` right before this step runs. */
  readonly with: Readonly<Record<string, unknown>>;
}

export interface WorkflowDefinition {
  readonly name: string;
  readonly description: string;
  readonly params: Readonly<Record<string, unknown>>;
  readonly steps: readonly StepEntry[];
}

/** User-facing output sink. Messages written here are meant for people, not for control flow. */
export interface UIHandle {
  title(text: string): void;
  info(text: string): void;
  success(text: string): void;
  warning(text: string): void;
  error(text: string): void;
}

export interface GenerateOptions {
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
  maxIterations?: number;
  signal?: AbortSignal;
}

export type AgentStopReason = "completed" | "max_iterations";

export interface AgentLoopResult {
  content: string;
  toolCalls: readonly ToolCallRecord[];
  /** Number of tool-execution turns taken before the loop stopped. */
  iterations: number;
  stopReason: AgentStopReason;
}

export interface AICapability {
  readonly provider: string;
  generate(prompt: string, systemPrompt?: string, options?: { signal?: AbortSignal }): Promise<string>;
  generateWithTools(prompt: string, tools: Tool[], options?: GenerateOptions): Promise<AgentLoopResult>;
}
