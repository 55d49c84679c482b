import { describe, it, expect } from 'vitest';
import { commandStep } from '../steps/command.js';
import { aiGenerateStep, createAIAgentStep } from '../steps/ai.js';
import { registerBuiltinSteps } from '../steps/index.js';
import { StepRegistry } from '../orchestrator/registry.js';
import { compileWorkflow } from '../orchestrator/compiler.js';
import { runWorkflow } from '../orchestrator/executor.js';
import { WorkflowContext } from '../engine/context.js';
import type { AICapability, AgentLoopResult, GenerateOptions, UIHandle } from '../types/contracts.js';
import type { Tool } from '../types/tools.js';

class FakeAI implements AICapability {
  readonly provider = 'fake';
  readonly prompts: string[] = [];
  readonly systemPrompts: (string | undefined)[] = [];
  readonly toolNames: string[][] = [];
  readonly options: GenerateOptions[] = [];
  readonly generateSignals: (AbortSignal | undefined)[] = [];

  constructor(private readonly stopReason: AgentLoopResult['stopReason'] = 'completed') {}

  async generate(prompt: string, systemPrompt?: string, options: { signal?: AbortSignal } = {}): Promise<string> {
    this.prompts.push(prompt);
    this.systemPrompts.push(systemPrompt);
    this.generateSignals.push(options.signal);
    return `answer to: ${prompt}`;
  }

  async generateWithTools(prompt: string, tools: Tool[], options: GenerateOptions = {}): Promise<AgentLoopResult> {
    this.prompts.push(prompt);
    this.toolNames.push(tools.map((t) => t.name));
    this.options.push(options);
    return {
      content: this.stopReason === 'completed' ? 'agent answer' : 'Stopped after reaching the maximum of 1 iterations without a final answer.',
      toolCalls: [{ toolName: 'cli_exec', input: { cmd: 'ls' }, output: 'files', iterationIndex: 0 }],
      iterations: 1,
      stopReason: this.stopReason,
    };
  }
}

function warnings(lines: string[]): UIHandle {
  const ignore = () => {};
  return { title: ignore, info: ignore, success: ignore, warning: (t) => lines.push(t), error: ignore };
}

describe('core.command', () => {
  it('interpolates placeholders and captures stdout', async () => {
    const ctx = new WorkflowContext({ data: { command: 'echo ${greeting}', greeting: 'hi' } });
    expect(await commandStep(ctx)).toEqual({ status: 'success', message: 'Ran: echo hi', metadata: { command_output: 'hi' } });
  });

  it('fails on a non-zero exit', async () => {
    const ctx = new WorkflowContext({ data: { command: 'exit 3' } });
    expect(await commandStep(ctx)).toEqual({ status: 'error', message: 'Command exited with 3: exit 3' });
  });

  it('warns about placeholders with no value and runs the literal text', async () => {
    const lines: string[] = [];
    const ctx = new WorkflowContext({ data: { command: 'echo \'${missing}\'' }, ui: warnings(lines) });
    expect(await commandStep(ctx)).toEqual({
      status: 'success',
      message: 'Ran: echo \'${missing}\'',
      metadata: { command_output: '${missing}' },
    });
    expect(lines).toEqual(['Unresolved placeholder(s) in command: missing']);
  });

  it('fails without running once the context signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('stop'));
    const ctx = new WorkflowContext({ data: { command: 'sleep 5' }, signal: controller.signal });
    const started = Date.now();
    const result = await commandStep(ctx);
    expect(result).toMatchObject({ status: 'error', message: 'Command cancelled: sleep 5' });
    expect(Date.now() - started).toBeLessThan(4000);
  });

  it('fails without a command', async () => {
    expect(await commandStep(new WorkflowContext())).toEqual({
      status: 'error',
      message: "No command specified (set 'command' in params)",
    });
  });
});

describe('core.ai_generate', () => {
  it('skips when opted in without an AI capability', async () => {
    const ctx = new WorkflowContext({ data: { prompt: 'x', use_ai: true } });
    expect(await aiGenerateStep(ctx)).toEqual({ status: 'skip', message: 'AI not configured' });
  });

  it('skips by default when use_ai is not set', async () => {
    const ai = new FakeAI();
    const ctx = new WorkflowContext({ data: { prompt: 'x' }, ai });
    expect(await aiGenerateStep(ctx)).toEqual({ status: 'skip', message: 'AI not requested for this run (use_ai=false)' });
    expect(ai.prompts).toEqual([]);
  });

  it('skips when use_ai is false', async () => {
    const ai = new FakeAI();
    const ctx = new WorkflowContext({ data: { prompt: 'x', use_ai: false }, ai });
    expect(await aiGenerateStep(ctx)).toEqual({ status: 'skip', message: 'AI not requested for this run (use_ai=false)' });
    expect(ai.prompts).toEqual([]);
  });

  it('renders the prompt and returns the response as metadata', async () => {
    const ai = new FakeAI();
    const ctx = new WorkflowContext({
      data: { prompt: 'Summarize ${topic}', topic: 'the diff', system_prompt: 'terse', use_ai: true },
      ai,
    });
    const result = await aiGenerateStep(ctx);

    expect(result).toEqual({
      status: 'success',
      message: 'Generated 29 characters with fake',
      metadata: { ai_response: 'answer to: Summarize the diff' },
    });
    expect(ai.systemPrompts).toEqual(['terse']);
  });

  it('passes the context signal and warns about unresolved placeholders', async () => {
    const ai = new FakeAI();
    const lines: string[] = [];
    const controller = new AbortController();
    const ctx = new WorkflowContext({
      data: { prompt: 'Explain ${thing} to ${audience}', audience: 'me', use_ai: true },
      ai,
      ui: warnings(lines),
      signal: controller.signal,
    });
    await aiGenerateStep(ctx);

    expect(ai.prompts).toEqual(['Explain ${thing} to me']);
    expect(ai.generateSignals).toEqual([controller.signal]);
    expect(lines).toEqual(['Unresolved placeholder(s) in prompt: thing']);
  });

  it('fails without a prompt', async () => {
    const ctx = new WorkflowContext({ data: { use_ai: true }, ai: new FakeAI() });
    expect(await aiGenerateStep(ctx)).toEqual({ status: 'error', message: "No prompt provided (set 'prompt' in params)" });
  });
});

describe('core.ai_agent', () => {
  it('hands the named tools to the agent and records its calls', async () => {
    const ai = new FakeAI();
    const ctx = new WorkflowContext({ data: { prompt: 'inspect', tools: ['cli_exec'], max_iterations: 3, use_ai: true }, ai });
    const result = await createAIAgentStep()(ctx);

    expect(result).toEqual({
      status: 'success',
      message: 'Agent answered after 1 tool turn(s)',
      metadata: {
        ai_response: 'agent answer',
        ai_tool_calls: [{ toolName: 'cli_exec', input: { cmd: 'ls' }, output: 'files', iterationIndex: 0 }],
      },
    });
    expect(ai.toolNames).toEqual([['cli_exec']]);
    expect(ai.options[0].maxIterations).toBe(3);
  });

  it('fails at the iteration cap without writing an answer', async () => {
    const ai = new FakeAI('max_iterations');
    const ctx = new WorkflowContext({ data: { prompt: 'loop', tools: ['cli_exec'], max_iterations: 1, use_ai: true }, ai });
    const result = await createAIAgentStep()(ctx);

    expect(result).toEqual({
      status: 'error',
      message: 'Stopped after reaching the maximum of 1 iterations without a final answer.',
    });
    expect(ctx.has('ai_response')).toBe(false);
    expect(ctx.read('ai_tool_calls')).toEqual([{ toolName: 'cli_exec', input: { cmd: 'ls' }, output: 'files', iterationIndex: 0 }]);
  });

  it('receives the run signal when executed by a workflow', async () => {
    const ai = new FakeAI();
    const controller = new AbortController();
    const registry = new StepRegistry().register('core', 'ai_agent', createAIAgentStep());
    const def = compileWorkflow(
      { name: 'agent', params: { use_ai: true, prompt: 'go' }, steps: [{ id: 'agent', ref: 'core.ai_agent' }] },
      registry,
    );
    const report = await runWorkflow(def, new WorkflowContext({ ai }), { signal: controller.signal });

    expect(report.result.status).toBe('success');
    expect(ai.options[0].signal).toBe(controller.signal);
  });

  it('fails on an unknown tool name', async () => {
    const ctx = new WorkflowContext({ data: { prompt: 'p', tools: ['teleport'], use_ai: true }, ai: new FakeAI() });
    const result = await createAIAgentStep()(ctx);
    expect(result.status).toBe('error');
    expect(result.message).toBe('AI agent failed: Tool not found: "teleport". Available tools: cli_exec, http_request');
  });
});

describe('built-in steps in a workflow', () => {
  it('registers the core steps with their defaults', () => {
    const reg = registerBuiltinSteps(new StepRegistry());
    expect(reg.refs()).toEqual(['core.command', 'core.ai_generate', 'core.ai_agent']);
    expect(reg.resolve('core.command').required).toBe(true);
    expect(reg.resolve('core.ai_generate').required).toBe(false);
  });

  it('runs a command then skips the AI step without a provider', async () => {
    const def = compileWorkflow(
      {
        name: 'commit',
        params: { message: 'initial' },
        steps: [
          { id: 'show', ref: 'core.command', with: { command: 'printf %s "${message}"' } },
          { id: 'suggest', ref: 'core.ai_generate', with: { prompt: 'Improve: ${command_output}' } },
        ],
      },
      registerBuiltinSteps(new StepRegistry()),
    );
    const ctx = new WorkflowContext();
    const report = await runWorkflow(def, ctx);

    expect(report.steps.map((s) => [s.id, s.status])).toEqual([['show', 'success'], ['suggest', 'skip']]);
    expect(ctx.get('command_output')).toBe('initial');
    expect(report.result).toEqual({
      status: 'success',
      message: 'commit completed',
      metadata: { message: 'initial', command_output: 'initial' },
    });
  });
});
