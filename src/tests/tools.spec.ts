import { describe, it, expect, vi, afterEach } from 'vitest';
import { buildToolRegistry, buildToolSet } from '../tools/registry.js';
import { defineTool, normalizeParameterType, validateToolArgs } from '../tools/define.js';
import { runShell } from '../tools/cli/exec.js';
import { ToolExecutionError, ToolNotFoundError } from '../errors.js';

describe('tools registry', () => {
  it('contains expected tools', () => {
    const reg = buildToolRegistry();
    expect(Object.keys(reg)).toEqual(['cli_exec', 'http_request']);
  });

  it('builds a tool set by name', () => {
    expect(buildToolSet(['http_request']).map((t) => t.name)).toEqual(['http_request']);
    expect(() => buildToolSet(['web_search'])).toThrow(ToolNotFoundError);
    expect(() => buildToolSet(['constructor'])).toThrow('Tool not found: "constructor". Available tools: cli_exec, http_request');
  });
});

describe('defineTool', () => {
  it('normalizes type aliases', () => {
    expect(['str', 'INT', 'float', 'bool', 'list', 'dict', 'toString'].map(normalizeParameterType)).toEqual([
      'string',
      'integer',
      'number',
      'boolean',
      'array',
      'object',
      undefined,
    ]);
  });

  it('validates required parameters and types', () => {
    const params = {
      name: { type: 'string', description: 'n', required: true },
      count: { type: 'int', description: 'c', required: false },
    };
    expect(validateToolArgs(params, { name: 'x', count: 2 })).toEqual([]);
    expect(validateToolArgs(params, { count: 2.5 })).toEqual([
      'missing required parameter "name"',
      'parameter "count" expected integer but got number',
    ]);
  });

  it('wraps handler errors in ToolExecutionError', async () => {
    const cause = new Error('nope');
    const tool = defineTool({ name: 't', description: 'd', parameters: {} }, () => {
      throw cause;
    });
    const err = await tool.execute({}).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ToolExecutionError);
    expect(err).toMatchObject({ message: 'Tool "t" failed: nope', toolName: 't', cause });
  });

  it('does not call the handler on invalid input', async () => {
    const handler = vi.fn(() => 'ran');
    const tool = defineTool(
      { name: 't', description: 'd', parameters: { q: { type: 'string', description: 'q', required: true } } },
      handler,
    );
    await expect(tool.execute({})).rejects.toThrow('Tool "t" failed: invalid input: missing required parameter "q"');
    expect(handler).not.toHaveBeenCalled();
    await expect(tool.execute({ q: 'x' })).resolves.toBe('ran');
  });
});

describe('cli_exec', () => {
  it('captures stdout and exit code', async () => {
    await expect(runShell('echo hello', process.cwd(), 5000)).resolves.toEqual({ stdout: 'hello\n', stderr: '', exit_code: 0 });
    const failed = await runShell('echo oops >&2; exit 3', process.cwd(), 5000);
    expect(failed.exit_code).toBe(3);
    expect(failed.stderr).toBe('oops\n');
  });

  it('kills the command when the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const out = await runShell('sleep 5', process.cwd(), 10_000, controller.signal);
    expect(out.exit_code).toBe('ABORT_ERR');
  });
});

describe('http_request', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('returns status, headers and body text', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response('pong', { status: 201, headers: { 'x-test': '1' } }));
    vi.stubGlobal('fetch', fetchMock);

    const out = await buildToolRegistry().http_request.execute({ url: 'http://localhost/ping', method: 'post', body: 'ping' });

    expect(out).toMatchObject({ status: 201, ok: true, body: 'pong', headers: { 'x-test': '1' } });
    expect(fetchMock).toHaveBeenCalledWith('http://localhost/ping', { method: 'POST', headers: {}, body: 'ping' });
  });

  it('parses headers from JSON text', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response('{}'));
    vi.stubGlobal('fetch', fetchMock);

    await buildToolRegistry().http_request.execute({ url: 'http://localhost/x', headers: '{"accept":"application/json","x-n":2}' });

    expect(fetchMock).toHaveBeenCalledWith('http://localhost/x', {
      method: 'GET',
      headers: { accept: 'application/json', 'x-n': '2' },
      body: undefined,
    });
  });

  it('rejects headers that are not a JSON object', async () => {
    const fetchMock = vi.fn(async () => new Response(''));
    vi.stubGlobal('fetch', fetchMock);

    await expect(buildToolRegistry().http_request.execute({ url: 'http://localhost/x', headers: '["a"]' })).rejects.toThrow(
      'Tool "http_request" failed: headers must be a JSON object',
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
