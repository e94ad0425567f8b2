import { describe, expect, it } from 'vitest';
import { WorkflowExecutionContext } from '../../../src/engine/context.js';

describe('WorkflowExecutionContext', () => {
  it('resolves variables before env, then the empty string', () => {
    const ctx = new WorkflowExecutionContext('/work', { NAME: 'from-env', ONLY_ENV: 'e' }, { NAME: 'from-vars' });
    expect(ctx.resolve('NAME')).toBe('from-vars');
    expect(ctx.resolve('ONLY_ENV')).toBe('e');
    expect(ctx.resolve('nothing')).toBe('');
  });

  it('seeds variables from the initial map', () => {
    const ctx = new WorkflowExecutionContext('/work', {}, { target: 'staging' });
    expect(ctx.get('target')).toBe('staging');
    expect(ctx.variables).toEqual({ target: 'staging' });
  });

  it('snapshots the environment at construction', () => {
    const source: Record<string, string | undefined> = { A: '1', SKIP: undefined };
    const ctx = new WorkflowExecutionContext('/work', source);
    source.A = '2';
    source.B = '3';
    expect(ctx.env).toEqual({ A: '1' });
    expect(Object.isFrozen(ctx.env)).toBe(true);
  });

  it('keeps set() out of env', () => {
    const ctx = new WorkflowExecutionContext('/work', { A: '1' });
    ctx.set('A', 'override');
    expect(ctx.env.A).toBe('1');
    expect(ctx.resolve('A')).toBe('override');
  });

  it('returns snapshots that ignore later writes', () => {
    const ctx = new WorkflowExecutionContext('/work', {}, { x: 'before' });
    const lookup = ctx.snapshot();
    ctx.set('x', 'after');
    expect(lookup('x')).toBe('before');
    expect(ctx.snapshot()('x')).toBe('after');
  });

  it('lets the snapshot overlay shadow variables', () => {
    const ctx = new WorkflowExecutionContext('/work', {}, { error: 'var' });
    const lookup = ctx.snapshot({ error: 'overlay', failed_step: 'build' });
    expect(lookup('error')).toBe('overlay');
    expect(lookup('failed_step')).toBe('build');
  });

  it('does not resolve inherited object properties', () => {
    const ctx = new WorkflowExecutionContext('/work', {});
    expect(ctx.snapshot()('toString')).toBe('');
    expect(ctx.snapshot()('constructor')).toBe('');
  });

  it('builds the process environment with variables over env', () => {
    const ctx = new WorkflowExecutionContext('/work', { PATH: '/bin', MODE: 'env' }, { MODE: 'var' });
    ctx.set('out', 'value');
    expect(ctx.processEnv()).toEqual({ PATH: '/bin', MODE: 'var', out: 'value' });
  });
});
