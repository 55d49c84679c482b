#!/usr/bin/env node
// src/runner.ts
// Command-line entry point: load a workflow file, build a context from the
// environment, run it and print the per-step summary.
import 'dotenv/config';
import { realpathSync } from 'node:fs';
import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { parse as parseYaml } from 'yaml';
import { StepRegistry } from './orchestrator/registry.js';
import { compileWorkflow } from './orchestrator/compiler.js';
import { runWorkflow, type StepRecord } from './orchestrator/executor.js';
import { loadWorkflowFile } from './workflow/loader.js';
import { ContextBuilder } from './engine/builder.js';
import { registerBuiltinSteps } from './steps/index.js';
import { COLOR, createConsoleLogger, createConsoleUI, fmtMs, logSwitchesFromEnv } from './log/logger.js';
import { SteplineError, errorMessage } from './errors.js';

export const USAGE =
  'Usage: stepline --workflow path/to/workflow.yaml [--param key=value]... [--max-iterations N]';

export interface CliArgs {
  workflowPath: string;
  params: Record<string, unknown>;
  maxIterations?: number;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/** `--param` values are read as YAML scalars, so `use_ai=false` is a boolean and `n=3` a number. */
export function parseParam(spec: string): [string, unknown] {
  const eq = spec.indexOf('=');
  if (eq <= 0) throw new UsageError(`--param expects key=value, got "${spec}"`);
  const raw = spec.slice(eq + 1);
  let value: unknown = raw;
  try {
    const scalar: unknown = raw === '' ? '' : parseYaml(raw);
    if (typeof scalar === 'string' || typeof scalar === 'number' || typeof scalar === 'boolean') value = scalar;
  } catch {
    // not YAML; keep the text
  }
  return [spec.slice(0, eq), value];
}

export function parseArgs(argv: readonly string[]): CliArgs {
  let workflowPath: string | undefined;
  let maxIterations: number | undefined;
  const params: Record<string, unknown> = {};

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    const eq = a.startsWith('--') ? a.indexOf('=') : -1;
    const flag = eq > 0 ? a.slice(0, eq) : a;
    const inline = eq > 0 ? a.slice(eq + 1) : undefined;
    const value = (): string => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) throw new UsageError(`${flag} expects a value`);
      i++;
      return next;
    };

    if (flag === '--workflow' || flag === '-w') workflowPath = value();
    else if (flag === '--param' || flag === '-p') {
      const [k, v] = parseParam(value());
      params[k] = v;
    } else if (flag === '--max-iterations') {
      const n = Number(value());
      if (!Number.isInteger(n) || n < 1) throw new UsageError('--max-iterations expects a positive integer');
      maxIterations = n;
    } else throw new UsageError(`Unknown argument "${a}"`);
  }

  if (!workflowPath) throw new UsageError('--workflow is required');
  return { workflowPath, params, ...(maxIterations !== undefined ? { maxIterations } : {}) };
}

const MARK: Record<StepRecord['status'], string> = {
  success: COLOR.green('✓'),
  skip: COLOR.yellow('⊝'),
  error: COLOR.red('✗'),
};

function printSummary(steps: readonly StepRecord[]): void {
  console.log('\n[Summary]');
  for (const s of steps) {
    const note = s.status === 'error' && s.optional ? COLOR.gray(' (optional)') : '';
    console.log(`${MARK[s.status]} ${s.id}${note} ${COLOR.gray(fmtMs(s.durationMs))} ${s.message}`);
  }
}

export async function runCli(argv: readonly string[]): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (e) {
    if (!(e instanceof UsageError)) throw e;
    console.error(e.message);
    console.error(USAGE);
    return 2;
  }

  const switches = logSwitchesFromEnv();
  const logger = createConsoleLogger(switches);
  const controller = new AbortController();
  const onSigint = () => controller.abort(new Error('interrupted'));
  process.once('SIGINT', onSigint);

  try {
    const registry = registerBuiltinSteps(new StepRegistry());
    const source = await loadWorkflowFile(resolve(process.cwd(), args.workflowPath));
    const definition = compileWorkflow(source, registry);

    const ctx = new ContextBuilder()
      .withData({ cwd: process.cwd(), ...(args.maxIterations !== undefined ? { max_iterations: args.maxIterations } : {}) })
      .withUI(createConsoleUI(switches))
      .withAIFromEnv(process.env, { logger })
      .build();

    const report = await runWorkflow(definition, ctx, {
      paramsOverride: args.params,
      logger,
      signal: controller.signal,
    });
    if (!switches.quiet) printSummary(report.steps);
    return report.result.status === 'error' ? 1 : 0;
  } catch (e) {
    if (!(e instanceof SteplineError)) throw e;
    logger.error(`[${e.code}] ${errorMessage(e)}`);
    return 1;
  } finally {
    process.off('SIGINT', onSigint);
  }
}

// True when invoked directly or through the `stepline` bin symlink, not when imported.
function isEntrypoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}

if (isEntrypoint()) {
  runCli(process.argv.slice(2))
    .then((code) => { process.exitCode = code; })
    .catch((e) => { console.error('[fatal]', e); process.exitCode = 1; });
}
