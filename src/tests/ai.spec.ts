import { describe, it, expect } from 'vitest';
import { aiConfigFromEnv } from '../ai/config.js';
import { AIClient, createAIClient } from '../ai/client.js';
import { AnthropicAdapter } from '../tap/anthropic.js';
import { defineTool } from '../tools/define.js';
import { AdapterNotFoundError, AIConfigurationError } from '../errors.js';
import type { LLMProvider } from '../llm/provider.js';
import type { CompletionArgs, CompletionOut } from '../types/llm.js';

class StubProvider implements LLMProvider {
  readonly calls: CompletionArgs[] = [];
  constructor(
    readonly name: string,
    private readonly replies: CompletionOut[],
  ) {}

  async complete(args: CompletionArgs): Promise<CompletionOut> {
    this.calls.push(args);
    return this.replies[Math.min(this.calls.length, this.replies.length) - 1];
  }
}

const echo = defineTool(
  { name: 'echo', description: 'Echo text', parameters: { text: { type: 'string', description: 't', required: true } } },
  (args) => args.text,
);

describe('aiConfigFromEnv', () => {
  it('returns undefined when nothing is configured', () => {
    expect(aiConfigFromEnv({})).toBeUndefined();
    expect(aiConfigFromEnv({ OPENAI_API_KEY: '   ' })).toBeUndefined();
  });

  it('picks the first provider with a key', () => {
    const config = aiConfigFromEnv({ OPENAI_API_KEY: 'test-openai', ANTHROPIC_API_KEY: 'test-anthropic' });
    expect(config).toMatchObject({ provider: 'anthropic', apiKey: 'test-anthropic' });
  });

  it('accepts GOOGLE_API_KEY for gemini', () => {
    expect(aiConfigFromEnv({ GOOGLE_API_KEY: 'test-secret' })).toMatchObject({ provider: 'gemini', apiKey: 'test-secret' });
  });

  it('honours an explicit provider and its overrides', () => {
    const config = aiConfigFromEnv({
      STEPLINE_AI_PROVIDER: 'OpenAI',
      ANTHROPIC_API_KEY: 'test-anthropic',
      OPENAI_API_KEY: 'test-openai',
      OPENAI_BASE_URL: 'http://localhost:1234/v1',
      OPENAI_MODEL: 'gpt-test',
      STEPLINE_MAX_ITERATIONS: '4',
      STEPLINE_TEMPERATURE: '0.2',
    });
    expect(config).toEqual({
      provider: 'openai',
      apiKey: 'test-openai',
      baseUrl: 'http://localhost:1234/v1',
      model: 'gpt-test',
      temperature: 0.2,
      maxIterations: 4,
    });
  });

  it('rejects a named provider without a key', () => {
    expect(() => aiConfigFromEnv({ STEPLINE_AI_PROVIDER: 'gemini' })).toThrow(
      'Invalid AI configuration for gemini: apiKey: Required',
    );
  });

  it('falls back to the default-model variables', () => {
    expect(aiConfigFromEnv({ ANTHROPIC_API_KEY: 'test-secret', ANTHROPIC_DEFAULT_SONNET_MODEL: 'sonnet-test' })?.model).toBe('sonnet-test');
    expect(
      aiConfigFromEnv({
        ANTHROPIC_API_KEY: 'test-secret',
        ANTHROPIC_DEFAULT_MODEL: 'default-test',
        ANTHROPIC_DEFAULT_SONNET_MODEL: 'sonnet-test',
      })?.model,
    ).toBe('default-test');
    expect(aiConfigFromEnv({ GEMINI_API_KEY: 'test-secret', GEMINI_DEFAULT_MODEL: 'gemini-test' })?.model).toBe('gemini-test');
    expect(
      aiConfigFromEnv({ OPENAI_API_KEY: 'test-secret', OPENAI_MODEL: 'explicit', OPENAI_DEFAULT_MODEL: 'fallback' })?.model,
    ).toBe('explicit');
  });

  it('reads OPENAI_API_BASE when OPENAI_BASE_URL is unset', () => {
    expect(aiConfigFromEnv({ OPENAI_API_KEY: 'test-secret', OPENAI_API_BASE: 'http://localhost:8080/v1' })?.baseUrl).toBe(
      'http://localhost:8080/v1',
    );
    expect(
      aiConfigFromEnv({
        OPENAI_API_KEY: 'test-secret',
        OPENAI_BASE_URL: 'http://localhost:1/v1',
        OPENAI_API_BASE: 'http://localhost:2/v1',
      })?.baseUrl,
    ).toBe('http://localhost:1/v1');
  });

  it('rejects malformed numbers', () => {
    expect(() => aiConfigFromEnv({ OPENAI_API_KEY: 'test-secret', STEPLINE_MAX_ITERATIONS: 'many' })).toThrow(
      AIConfigurationError,
    );
    expect(() => aiConfigFromEnv({ OPENAI_API_KEY: 'test-secret', STEPLINE_MAX_ITERATIONS: '0' })).toThrow(
      /maxIterations: /,
    );
  });
});

describe('AIClient', () => {
  it('generates a single completion', async () => {
    const provider = new StubProvider('anthropic', [{ content: 'hello', tool_calls: [] }]);
    const client = new AIClient({ provider, defaults: { maxTokens: 50, temperature: 0.5 } });

    await expect(client.generate('say hi', 'be nice')).resolves.toBe('hello');
    expect(client.provider).toBe('anthropic');
    expect(provider.calls[0]).toEqual({
      messages: [{ role: 'user', content: 'say hi' }],
      system: 'be nice',
      max_tokens: 50,
      temperature: 0.5,
    });
  });

  it('forwards the abort signal to the provider', async () => {
    const provider = new StubProvider('openai', [{ content: 'ok', tool_calls: [] }]);
    const controller = new AbortController();
    await new AIClient({ provider }).generate('hi', undefined, { signal: controller.signal });
    expect(provider.calls[0].signal).toBe(controller.signal);
  });

  it('runs the agent loop with the adapter of the same provider', async () => {
    const provider = new StubProvider('anthropic', [
      { content: '', tool_calls: [{ id: 't1', name: 'echo', arguments: '{"text":"hey"}' }] },
      { content: 'said hey', tool_calls: [] },
    ]);
    const client = new AIClient({ provider });
    const out = await client.generateWithTools('echo hey', [echo], { systemPrompt: 'tools only' });

    expect(out.content).toBe('said hey');
    expect(out.toolCalls).toEqual([{ toolName: 'echo', input: { text: 'hey' }, output: 'hey', iterationIndex: 0 }]);
    expect(provider.calls[0].tools).toEqual(new AnthropicAdapter().convertTools([echo]));
    expect(provider.calls[0].system).toBe('tools only');
  });

  it('applies the default iteration cap', async () => {
    const provider = new StubProvider('openai', [
      { content: '', tool_calls: [{ id: 't', name: 'echo', arguments: '{"text":"again"}' }] },
    ]);
    const out = await new AIClient({ provider, defaults: { maxIterations: 2 } }).generateWithTools('loop', [echo]);

    expect(out.stopReason).toBe('max_iterations');
    expect(provider.calls).toHaveLength(2);
  });

  it('needs an adapter for the provider', () => {
    expect(() => new AIClient({ provider: new StubProvider('mistral', []) })).toThrow(AdapterNotFoundError);
  });

  it('builds from configuration', () => {
    const client = createAIClient({ provider: 'gemini', apiKey: 'test-secret' });
    expect(client.provider).toBe('gemini');
  });
});
