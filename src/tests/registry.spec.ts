import { describe, it, expect } from 'vitest';
import { StepRegistry } from '../orchestrator/registry.js';
import { success } from '../engine/result.js';
import { StepNotFoundError } from '../errors.js';

describe('step registry', () => {
  const noop = () => success('noop');

  it('resolves namespaced refs', () => {
    const reg = new StepRegistry().register('git', 'status', noop, { description: 'Read git status' });
    const found = reg.resolve('git.status');
    expect(found.ref).toBe('git.status');
    expect(found.fn).toBe(noop);
    expect(found.required).toBe(true);
    expect(found.description).toBe('Read git status');
  });

  it('allows dots inside the step id', () => {
    const reg = new StepRegistry().register('github', 'pr.create', noop);
    expect(reg.has('github.pr.create')).toBe(true);
  });

  it('rejects duplicates and dotted namespaces', () => {
    const reg = new StepRegistry().register('git', 'status', noop);
    expect(() => reg.register('git', 'status', noop)).toThrow('Step "git.status" is already registered');
    expect(() => reg.register('a.b', 'c', noop)).toThrow('Invalid step namespace "a.b"');
  });

  it('throws StepNotFoundError for unknown refs', () => {
    const reg = new StepRegistry();
    expect(() => reg.resolve('nope.step')).toThrow(StepNotFoundError);
    expect(() => reg.resolve('nope.step')).toThrow('No step registered under "nope.step"');
  });

  it('lists refs in registration order', () => {
    const reg = new StepRegistry().register('b', 'one', noop).register('a', 'two', noop, { required: false });
    expect(reg.refs()).toEqual(['b.one', 'a.two']);
    expect(reg.size).toBe(2);
    expect(reg.resolve('a.two').required).toBe(false);
  });
});
