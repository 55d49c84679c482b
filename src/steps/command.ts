import type { StepFn } from "../types/contracts.js";
import { fail, success } from "../engine/result.js";
import { missingPlaceholders, renderTemplate } from "../prompt/renderer.js";
import { runShell } from "../tools/cli/exec.js";

export const COMMAND_TIMEOUT_MS = 120_000;

/** Runs `command` in `cwd` after `${key}` substitution from the context data. */
export const commandStep: StepFn = async (ctx) => {
  const template = ctx.read("command");
  if (!template?.trim()) return fail("No command specified (set 'command' in params)");

  const unresolved = missingPlaceholders(template, ctx.data);
  if (unresolved.length > 0) ctx.ui?.warning(`Unresolved placeholder(s) in command: ${unresolved.join(", ")}`);

  const command = renderTemplate(template, ctx.data);
  const cwd = ctx.read("cwd") ?? process.cwd();
  ctx.ui?.info(`$ ${command}`);

  const outcome = await runShell(command, cwd, COMMAND_TIMEOUT_MS, ctx.signal);
  if (ctx.signal?.aborted) return fail(`Command cancelled: ${command}`, ctx.signal.reason);
  if (outcome.exit_code !== 0) {
    const detail = outcome.stderr.trim() || outcome.stdout.trim();
    return fail(`Command exited with ${outcome.exit_code}: ${command}${detail ? `\n${detail}` : ""}`);
  }
  return success(`Ran: ${command}`, { command_output: outcome.stdout.trimEnd() });
};
