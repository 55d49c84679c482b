import 'dotenv/config';
import { fileURLToPath } from 'node:url';
import { StepRegistry } from '../../orchestrator/registry.js';
import { compileWorkflow } from '../../orchestrator/compiler.js';
import { runWorkflow } from '../../orchestrator/executor.js';
import { loadWorkflowFile } from '../../workflow/loader.js';
import { ContextBuilder } from '../../engine/builder.js';
import { fail, success } from '../../engine/result.js';
import type { GitStatus } from '../../engine/keys.js';
import type { StepFn } from '../../types/contracts.js';
import { registerBuiltinSteps } from '../../steps/index.js';
import { runShell } from '../../tools/cli/exec.js';
import { createConsoleLogger, createConsoleUI } from '../../log/logger.js';

function parsePorcelain(text: string): GitStatus {
  const status: GitStatus = { branch: 'HEAD', clean: true, modified: [], untracked: [] };
  for (const line of text.split('\n')) {
    if (line.startsWith('## ')) status.branch = line.slice(3).split('...')[0];
    else if (line.startsWith('?? ')) status.untracked.push(line.slice(3));
    else if (line.trim()) status.modified.push(line.slice(3));
  }
  status.clean = status.modified.length === 0 && status.untracked.length === 0;
  return status;
}

const gitStatus: StepFn = async (ctx) => {
  const out = await runShell('git status --porcelain=v1 --branch', ctx.read('cwd') ?? process.cwd(), 10_000);
  if (out.exit_code !== 0) return fail(`git status failed: ${out.stderr.trim()}`);
  const status = parsePorcelain(out.stdout);
  // A clean tree turns the drafting step into a skip.
  if (status.clean) return success('Nothing to commit, working tree clean', { git_status: status, use_ai: false });
  return success(`${status.modified.length} modified, ${status.untracked.length} untracked on ${status.branch}`, {
    git_status: status,
    branch: status.branch,
    changed_files: [...status.modified, ...status.untracked].join(', '),
  });
};

async function main() {
  const logger = createConsoleLogger();
  const registry = registerBuiltinSteps(new StepRegistry()).register('git', 'status', gitStatus);
  const source = await loadWorkflowFile(fileURLToPath(new URL('./workflow.yaml', import.meta.url)));
  const ctx = new ContextBuilder()
    .withData({ cwd: process.cwd() })
    .withUI(createConsoleUI())
    .withAIFromEnv(process.env, { logger })
    .build();

  const report = await runWorkflow(compileWorkflow(source, registry), ctx, { logger });
  const draft = ctx.read('ai_response');
  if (draft) {
    ctx.set('commit_message', draft.trim());
    console.log(`\n${ctx.require('commit_message')}`);
  }
  if (report.result.status === 'error') process.exitCode = 1;
}

main().catch(e => { console.error(e); process.exit(1); });
