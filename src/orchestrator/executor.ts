// Sequential step executor.
// Params (defaults + overrides) are merged into ctx.data, then each step runs
// in declared order. Success metadata is merged back into ctx.data; Skip and
// optional Errors are recorded and the run goes on; a required Error halts.

import type { StepEntry, WorkflowDefinition } from "../types/contracts.js";
import type { WorkflowContext } from "../engine/context.js";
import { fail, success, describeCause, type Result, type Metadata } from "../engine/result.js";
import { errorMessage } from "../errors.js";
import { fmtMs, silentLogger, type Logger } from "../log/logger.js";

export interface StepRecord {
  readonly id: string;
  readonly ref: string;
  readonly status: Result["status"];
  readonly message: string;
  readonly optional: boolean;
  readonly durationMs: number;
  /** Diagnostic text of a wrapped cause, when the step failed with one. */
  readonly cause?: string;
}

export interface WorkflowReport {
  result: Result;
  steps: StepRecord[];
  /** Errors from optional steps that did not halt the run. */
  recoveredErrors: StepRecord[];
}

export interface ExecuteOptions {
  paramsOverride?: Readonly<Record<string, unknown>>;
  logger?: Logger;
  signal?: AbortSignal;
  /** Called after every step, in order. */
  onStep?: (record: StepRecord) => void;
}

function cloneValue(value: unknown): unknown {
  if (value === null || typeof value !== "object") return value;
  try {
    return structuredClone(value);
  } catch {
    // class instances holding functions and the like are passed through by reference
    return value;
  }
}

function cloneEntries(values: Readonly<Record<string, unknown>>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(values)) out[k] = cloneValue(v);
  return out;
}

async function invoke(entry: StepEntry, ctx: WorkflowContext): Promise<Result> {
  try {
    return await entry.fn(ctx);
  } catch (e) {
    return fail(`Step '${entry.id}' raised an exception: ${errorMessage(e)}`, e);
  }
}

function reportOutcome(ctx: WorkflowContext, result: Result, optional: boolean): void {
  if (!ctx.ui) return;
  switch (result.status) {
    case "success":
      ctx.ui.success(`  ✓ ${result.message}`);
      break;
    case "skip":
      ctx.ui.warning(`  ⊝ ${result.message}`);
      break;
    case "error":
      if (optional) ctx.ui.warning(`  ✗ ${result.message} (optional, continuing)`);
      else ctx.ui.error(`  ✗ ${result.message}`);
      break;
  }
}

export async function runWorkflow(
  definition: WorkflowDefinition,
  ctx: WorkflowContext,
  opts: ExecuteOptions = {},
): Promise<WorkflowReport> {
  const logger = opts.logger ?? silentLogger;
  // Steps may mutate what they read, so each run gets its own copy of params and overrides.
  const effectiveParams = { ...cloneEntries(definition.params), ...cloneEntries(opts.paramsOverride ?? {}) };
  ctx.merge(effectiveParams);
  if (opts.signal) ctx.signal = opts.signal;

  const outputs: Metadata = { ...effectiveParams };
  const steps: StepRecord[] = [];
  const recoveredErrors: StepRecord[] = [];
  const total = definition.steps.length;

  ctx.ui?.title(definition.name);
  logger.info(`workflow ${definition.name} started`, { steps: total });

  for (const [index, entry] of definition.steps.entries()) {
    if (opts.signal?.aborted) {
      const result = fail(`Workflow '${definition.name}' was cancelled`, opts.signal.reason);
      ctx.ui?.error(result.message);
      logger.warn(`workflow ${definition.name} cancelled before step ${entry.id}`);
      return { result, steps, recoveredErrors };
    }

    ctx.ui?.info(`[${index + 1}/${total}] ${entry.id}`);
    if (Object.keys(entry.with).length > 0) ctx.merge(cloneEntries(entry.with));

    const started = Date.now();
    const result = await invoke(entry, ctx);
    const durationMs = Date.now() - started;

    const record: StepRecord = Object.freeze({
      id: entry.id,
      ref: entry.ref,
      status: result.status,
      message: result.message,
      optional: entry.optional,
      durationMs,
      ...(result.status === "error" && result.cause !== undefined ? { cause: describeCause(result.cause) } : {}),
    });
    steps.push(record);
    opts.onStep?.(record);
    reportOutcome(ctx, result, entry.optional);
    logger.debug(`step ${entry.id} → ${result.status} (${fmtMs(durationMs)})`);

    if (result.status === "success") {
      ctx.merge(result.metadata);
      Object.assign(outputs, result.metadata);
      continue;
    }
    if (result.status === "error") {
      if (!entry.optional) {
        logger.error(`workflow ${definition.name} halted at step ${entry.id}: ${result.message}`);
        return { result, steps, recoveredErrors };
      }
      recoveredErrors.push(record);
      logger.warn(`optional step ${entry.id} failed: ${result.message}`);
    }
  }

  const summary =
    recoveredErrors.length > 0
      ? `${definition.name} completed with ${recoveredErrors.length} optional step error(s)`
      : `${definition.name} completed`;
  ctx.ui?.success(summary);
  logger.info(`workflow ${definition.name} completed`, { recoveredErrors: recoveredErrors.length });
  return { result: success(summary, outputs), steps, recoveredErrors };
}

/** Runs a workflow and returns only its overall result. */
export async function execute(
  definition: WorkflowDefinition,
  ctx: WorkflowContext,
  paramsOverride?: Readonly<Record<string, unknown>>,
  opts: Omit<ExecuteOptions, "paramsOverride"> = {},
): Promise<Result> {
  const report = await runWorkflow(definition, ctx, { ...opts, paramsOverride });
  return report.result;
}
