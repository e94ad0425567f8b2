import { describe, expect, it, vi } from 'vitest';
import { WorkflowExecutionContext } from '../../../src/engine/context.js';
import { StepRunner, captureValue } from '../../../src/engine/step-runner.js';
import type { WorkflowStep } from '../../../src/types/workflow.js';
import { FakeRunner, echoRunner, fakeClock } from '../../fakes.js';

function makeStep(overrides: Partial<WorkflowStep> = {}): WorkflowStep {
  return { name: 'step', run: 'echo hi', ...overrides };
}

function makeContext(vars: Record<string, string> = {}) {
  return new WorkflowExecutionContext('/work', { PATH: '/bin' }, vars);
}

describe('StepRunner', () => {
  it('runs the rendered command with shell, cwd and merged env', async () => {
    const runner = new FakeRunner();
    const ctx = makeContext({ who: 'world' });
    await new StepRunner({ runner }).execute(makeStep({ run: 'echo ${who}' }), ctx);

    expect(runner.requests).toEqual([
      {
        command: 'echo world',
        shell: 'sh',
        cwd: '/work',
        env: { PATH: '/bin', who: 'world' },
        timeoutMs: undefined,
      },
    ]);
  });

  it('uses the step shell over the default', async () => {
    const runner = new FakeRunner();
    const stepRunner = new StepRunner({ runner, defaultShell: 'bash' });
    await stepRunner.execute(makeStep(), makeContext());
    await stepRunner.execute(makeStep({ shell: 'zsh' }), makeContext());
    expect(runner.requests.map((r) => r.shell)).toEqual(['bash', 'zsh']);
  });

  it('skips without invoking the runner when the guard is false', async () => {
    const runner = new FakeRunner();
    const result = await new StepRunner({ runner }).execute(makeStep({ when: 'flag == "on"' }), makeContext());

    expect(runner.requests).toHaveLength(0);
    expect(result).toEqual({
      name: 'step',
      success: true,
      exitCode: 0,
      stdout: '',
      stderr: '',
      duration: 0,
      skipped: true,
      attempts: 0,
    });
  });

  it('runs when the guard holds', async () => {
    const runner = echoRunner();
    const result = await new StepRunner({ runner }).execute(
      makeStep({ when: 'flag == "on"' }),
      makeContext({ flag: 'on' }),
    );
    expect(result.skipped).toBe(false);
    expect(result.success).toBe(true);
    expect(result.stdout).toBe('hi\n');
    expect(result.command).toBe('echo hi');
    expect(result.attempts).toBe(1);
  });

  it('stores stdout without trailing newlines into the output variable', async () => {
    const ctx = makeContext();
    await new StepRunner({ runner: echoRunner() }).execute(makeStep({ run: 'echo v1', output: 'version' }), ctx);
    expect(ctx.get('version')).toBe('v1');
  });

  it('does not store output when the step fails', async () => {
    const ctx = makeContext();
    const runner = new FakeRunner(() => ({ exitCode: 2, stdout: 'partial\n' }));
    await new StepRunner({ runner }).execute(makeStep({ output: 'version' }), ctx);
    expect(ctx.get('version')).toBeUndefined();
  });

  it('makes exactly retries + 1 attempts when every attempt fails', async () => {
    const runner = new FakeRunner((_req, call) => ({ exitCode: call, stderr: `attempt ${call}` }));
    const clock = fakeClock();
    const result = await new StepRunner({ runner, sleep: clock.sleep, now: clock.now }).execute(
      makeStep({ retries: 3 }),
      makeContext(),
    );

    expect(runner.requests).toHaveLength(4);
    expect(result.success).toBe(false);
    expect(result.attempts).toBe(4);
    expect(result.exitCode).toBe(4);
    expect(result.stderr).toBe('attempt 4');
  });

  it('stops retrying at the first success', async () => {
    const runner = new FakeRunner((_req, call) => (call < 2 ? { exitCode: 1 } : { stdout: 'ok' }));
    const onRetry = vi.fn();
    const clock = fakeClock();
    const result = await new StepRunner({ runner, sleep: clock.sleep, now: clock.now, onRetry }).execute(
      makeStep({ name: 'flaky', retries: 5 }),
      makeContext(),
    );

    expect(result.success).toBe(true);
    expect(result.attempts).toBe(2);
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry).toHaveBeenCalledWith(expect.objectContaining({ name: 'flaky' }), {
      attempt: 1,
      maxAttempts: 6,
      exitCode: 1,
      delaySec: 0,
    });
  });

  it('waits retry_delay between attempts and counts it in the duration', async () => {
    const runner = new FakeRunner(() => ({ exitCode: 1 }));
    const clock = fakeClock(1_000);
    const result = await new StepRunner({ runner, sleep: clock.sleep, now: clock.now }).execute(
      makeStep({ retries: 2, retryDelay: 2 }),
      makeContext(),
    );

    expect(clock.sleeps).toEqual([2000, 2000]);
    expect(result.duration).toBe(4);
  });

  it('does not sleep when retry_delay is zero', async () => {
    const clock = fakeClock();
    await new StepRunner({ runner: new FakeRunner(() => ({ exitCode: 1 })), sleep: clock.sleep }).execute(
      makeStep({ retries: 2 }),
      makeContext(),
    );
    expect(clock.sleeps).toEqual([]);
  });

  it('renders the command once and reuses it for retries', async () => {
    const runner = new FakeRunner(() => ({ exitCode: 1 }));
    const ctx = makeContext({ n: '1' });
    await new StepRunner({ runner }).execute(makeStep({ run: 'echo ${n}', retries: 1 }), ctx);
    expect(runner.commands).toEqual(['echo 1', 'echo 1']);
  });

  it('passes the timeout in milliseconds', async () => {
    const runner = new FakeRunner();
    const stepRunner = new StepRunner({ runner });
    await stepRunner.execute(makeStep({ timeout: 3 }), makeContext());
    await stepRunner.execute(makeStep({ timeout: 0 }), makeContext());
    expect(runner.requests.map((r) => r.timeoutMs)).toEqual([3000, undefined]);
  });

  it('reports a timed-out attempt with exit code 124', async () => {
    const runner = new FakeRunner(() => ({ exitCode: 124, stderr: 'partial\n', timedOut: true }));
    const result = await new StepRunner({ runner }).execute(makeStep({ name: 'slow', timeout: 1 }), makeContext());

    expect(result.success).toBe(false);
    expect(result.exitCode).toBe(124);
    expect(result.timedOut).toBe(true);
    expect(result.stderr).toBe("partial\nStep 'slow' timed out after 1s");
  });

  it('counts a thrown runner error as a failed attempt', async () => {
    const runner = new FakeRunner(() => {
      throw new Error('spawn exploded');
    });
    const result = await new StepRunner({ runner }).execute(makeStep({ name: 'boom', retries: 1 }), makeContext());

    expect(runner.requests).toHaveLength(2);
    expect(result.success).toBe(false);
    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe("Step 'boom' failed: spawn exploded");
  });

  it('fails a malformed guard without running the command', async () => {
    const runner = new FakeRunner();
    const result = await new StepRunner({ runner }).execute(makeStep({ when: 'a ==' }), makeContext());

    expect(runner.requests).toHaveLength(0);
    expect(result.success).toBe(false);
    expect(result.skipped).toBe(false);
    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe('Condition evaluation failed: a == (expected a value at 4)');
  });

  it('fails an invalid template without running the command', async () => {
    const runner = new FakeRunner();
    const result = await new StepRunner({ runner }).execute(makeStep({ run: 'echo ${oops' }), makeContext());

    expect(runner.requests).toHaveLength(0);
    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe('Invalid template: echo ${oops (unterminated placeholder at 5)');
  });

  it('calls onStart with the rendered command before the first attempt', async () => {
    const onStart = vi.fn();
    await new StepRunner({ runner: new FakeRunner(), onStart }).execute(
      makeStep({ run: 'echo ${x}' }),
      makeContext({ x: '42' }),
    );
    expect(onStart).toHaveBeenCalledWith(expect.objectContaining({ name: 'step' }), 'echo 42');
  });

  it('returns frozen results', async () => {
    const result = await new StepRunner({ runner: new FakeRunner() }).execute(makeStep(), makeContext());
    expect(Object.isFrozen(result)).toBe(true);
  });
});

describe('captureValue', () => {
  it('strips trailing CR and LF only', () => {
    expect(captureValue('v1\n\n')).toBe('v1');
    expect(captureValue('  v1  \r\n')).toBe('  v1  ');
    expect(captureValue('a\nb\n')).toBe('a\nb');
    expect(captureValue('')).toBe('');
  });
});
