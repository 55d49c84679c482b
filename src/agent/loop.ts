// Iterative tool-calling loop.
// request → (tool calls?) → execute each in order → append results → request again,
// until the provider answers without tool calls or the iteration cap is hit.
// Tool failures go back to the provider as tool results; only transport
// failures (and an aborted signal) end the loop with an exception.

import type { Message, ToolCallOut } from "../types/llm.js";
import type { Tool, ToolCallRecord } from "../types/tools.js";
import type { AgentLoopResult } from "../types/contracts.js";
import type { LLMProvider } from "../llm/provider.js";
import type { ToolAdapter } from "../tap/adapter.js";
import { AgentLoopAbortedError, errorMessage } from "../errors.js";
import { fmtMs, silentLogger, type Logger } from "../log/logger.js";

export const DEFAULT_MAX_ITERATIONS = 10;

export interface AgentLoopOptions {
  provider: LLMProvider;
  adapter: ToolAdapter;
  prompt: string;
  tools: readonly Tool[];
  systemPrompt?: string;
  maxIterations?: number;
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
  logger?: Logger;
}

export function maxIterationsMessage(maxIterations: number): string {
  return `Stopped after reaching the maximum of ${maxIterations} iterations without a final answer.`;
}

type ParsedArguments = { ok: true; value: Record<string, unknown> } | { ok: false; error: string };

function parseArguments(raw: string): ParsedArguments {
  if (!raw.trim()) return { ok: true, value: {} };
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (e) {
    return { ok: false, error: `arguments are not valid JSON: ${errorMessage(e)}` };
  }
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return { ok: false, error: "arguments must be a JSON object" };
  }
  return { ok: true, value: Object.fromEntries(Object.entries(value)) };
}

function serializeOutput(output: unknown): string {
  if (typeof output === "string") return output;
  if (output === undefined) return "";
  try {
    return JSON.stringify(output);
  } catch {
    return String(output);
  }
}

function preview(text: string, max = 140): string {
  return text.length > max ? text.slice(0, max) + "…" : text;
}

export async function runAgentLoop(opts: AgentLoopOptions): Promise<AgentLoopResult> {
  const { provider, adapter, tools } = opts;
  const logger = opts.logger ?? silentLogger;
  const maxIterations = opts.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  if (!Number.isInteger(maxIterations) || maxIterations < 1) {
    throw new RangeError(`maxIterations must be a positive integer, got ${maxIterations}`);
  }

  const schemas = adapter.convertTools(tools);
  const history: ToolCallRecord[] = [];
  const messages: Message[] = [{ role: "user", content: opts.prompt }];
  let iteration = 0;

  const executeCall = async (call: ToolCallOut): Promise<void> => {
    const started = Date.now();
    const args = parseArguments(call.arguments);
    const input: Readonly<Record<string, unknown>> = Object.freeze(args.ok ? { ...args.value } : {});
    let record: ToolCallRecord;
    let content: string;
    let isError = false;

    if (!args.ok) {
      record = { toolName: call.name, input, error: args.error, iterationIndex: iteration };
      content = `Error: ${args.error}`;
      isError = true;
    } else {
      try {
        const output = await adapter.executeTool(call.name, args.value, tools);
        record = { toolName: call.name, input, output, iterationIndex: iteration };
        content = serializeOutput(output);
      } catch (e) {
        const error = errorMessage(e);
        record = { toolName: call.name, input, error, iterationIndex: iteration };
        content = `Error: ${error}`;
        isError = true;
      }
    }

    history.push(Object.freeze(record));
    messages.push({ role: "tool", tool_call_id: call.id, name: call.name, content, ...(isError ? { is_error: true } : {}) });
    logger.debug(
      `tool ${call.name}(${preview(call.arguments || "{}")}) ${isError ? "failed" : "ok"} [${fmtMs(Date.now() - started)}]`,
    );
  };

  while (iteration < maxIterations) {
    if (opts.signal?.aborted) throw new AgentLoopAbortedError(iteration);

    const t0 = Date.now();
    const out = await provider.complete({
      messages: [...messages],
      system: opts.systemPrompt,
      tools: schemas,
      max_tokens: opts.maxTokens,
      temperature: opts.temperature,
      signal: opts.signal,
    });
    const thinkMs = Date.now() - t0;

    if (out.tool_calls.length === 0) {
      logger.debug(`iter ${iteration + 1} — final answer (model ${fmtMs(thinkMs)})`);
      return { content: out.content, toolCalls: history, iterations: iteration, stopReason: "completed" };
    }

    logger.debug(
      `iter ${iteration + 1} — tool_call → ${out.tool_calls.map((tc) => tc.name).join(", ")} (model ${fmtMs(thinkMs)})`,
    );
    messages.push({ role: "assistant", content: out.content, tool_calls: out.tool_calls });
    // Results are appended in provider order before the next request.
    for (const call of out.tool_calls) {
      await executeCall(call);
    }
    iteration++;
  }

  logger.warn(`agent loop hit the iteration cap (${maxIterations})`, { toolCalls: history.length });
  return { content: maxIterationsMessage(maxIterations), toolCalls: history, iterations: iteration, stopReason: "max_iterations" };
}
