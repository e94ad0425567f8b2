// packages/core/src/engine/step-runner.ts

import type { WorkflowStep, WorkflowStepResult } from '../types/workflow.js';
import { DEFAULT_SHELL, GENERIC_FAILURE_EXIT_CODE, TIMEOUT_EXIT_CODE } from '../utils/constants.js';
import { ConditionError, InvalidTemplateError, StepFailedError, StepTimeoutError, errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { sleep as realSleep } from '../utils/sleep.js';
import type { CommandResult, CommandRunner } from './command-runner.js';
import { evaluateCondition } from './condition.js';
import type { WorkflowExecutionContext } from './context.js';
import { renderTemplate } from './template.js';

export interface RetryInfo {
  attempt: number;
  maxAttempts: number;
  exitCode: number;
  delaySec: number;
}

export interface StepRunnerOptions {
  runner: CommandRunner;
  defaultShell?: string;
  /** Injected for tests; defaults to a setTimeout-based sleep. */
  sleep?: (ms: number) => Promise<void>;
  /** Milliseconds clock; defaults to Date.now. */
  now?: () => number;
  logger?: Logger;
  /** Called once per executed step, before the first attempt. */
  onStart?: (step: WorkflowStep, command: string) => void;
  onRetry?: (step: WorkflowStep, info: RetryInfo) => void;
}

export type PreparedStep =
  | { kind: 'skip'; result: WorkflowStepResult }
  | { kind: 'fail'; result: WorkflowStepResult }
  | { kind: 'ready'; command: string };

/** Build a frozen step result; every result leaves the runner through here. */
export function stepResult(
  fields: Omit<WorkflowStepResult, 'attempts' | 'skipped'> & { attempts?: number; skipped?: boolean },
): WorkflowStepResult {
  return Object.freeze({ skipped: false, attempts: 0, ...fields });
}

export function skippedResult(name: string): WorkflowStepResult {
  return stepResult({
    name,
    success: true,
    exitCode: 0,
    stdout: '',
    stderr: '',
    duration: 0,
    skipped: true,
  });
}

/** Failure raised before any command ran (bad guard, bad template). */
function preflightFailure(name: string, message: string, command?: string): WorkflowStepResult {
  return stepResult({
    name,
    success: false,
    exitCode: GENERIC_FAILURE_EXIT_CODE,
    stdout: '',
    stderr: message,
    duration: 0,
    command,
  });
}

function succeeded(result: CommandResult): boolean {
  return result.exitCode === 0 && !result.timedOut;
}

/** Strip trailing CR/LF only; leading and inner whitespace is kept. */
export function captureValue(stdout: string): string {
  return stdout.replace(/[\r\n]+$/, '');
}

export class StepRunner {
  private runner: CommandRunner;
  private defaultShell: string;
  private sleep: (ms: number) => Promise<void>;
  private now: () => number;
  private logger?: Logger;
  private onStart?: (step: WorkflowStep, command: string) => void;
  private onRetry?: (step: WorkflowStep, info: RetryInfo) => void;

  constructor(options: StepRunnerOptions) {
    this.runner = options.runner;
    this.defaultShell = options.defaultShell ?? DEFAULT_SHELL;
    this.sleep = options.sleep ?? realSleep;
    this.now = options.now ?? Date.now;
    this.logger = options.logger;
    this.onStart = options.onStart;
    this.onRetry = options.onRetry;
  }

  /**
   * Evaluate the guard and render the command against the current context.
   * Shared by real execution and dry runs.
   */
  prepare(step: WorkflowStep, context: WorkflowExecutionContext): PreparedStep {
    const lookup = context.snapshot();

    let shouldRun: boolean;
    try {
      shouldRun = evaluateCondition(step.when, lookup);
    } catch (err) {
      const message = err instanceof ConditionError ? err.message : errorMessage(err);
      return { kind: 'fail', result: preflightFailure(step.name, message) };
    }
    if (!shouldRun) {
      return { kind: 'skip', result: skippedResult(step.name) };
    }

    try {
      return { kind: 'ready', command: renderTemplate(step.run, lookup) };
    } catch (err) {
      const message = err instanceof InvalidTemplateError ? err.message : errorMessage(err);
      return { kind: 'fail', result: preflightFailure(step.name, message) };
    }
  }

  /**
   * Run one step to completion: guard, render once, then up to 1 + retries
   * attempts. On success the step's `output` variable is written to `context`.
   */
  async execute(step: WorkflowStep, context: WorkflowExecutionContext): Promise<WorkflowStepResult> {
    const prepared = this.prepare(step, context);
    if (prepared.kind !== 'ready') {
      return prepared.result;
    }

    const command = prepared.command;
    const maxAttempts = 1 + Math.max(0, step.retries ?? 0);
    const delayMs = Math.max(0, step.retryDelay ?? 0) * 1000;
    const timeoutMs = step.timeout !== undefined && step.timeout > 0 ? step.timeout * 1000 : undefined;
    const start = this.now();
    this.onStart?.(step, command);

    let attempt = 1;
    this.logger?.debug(`Step '${step.name}' attempt 1/${maxAttempts}: ${command}`);
    let last = await this.attempt(step, command, context, timeoutMs);

    while (!succeeded(last) && attempt < maxAttempts) {
      this.logger?.warn(
        `Step '${step.name}' failed with exit code ${last.exitCode}, retrying (${attempt}/${maxAttempts - 1})`,
      );
      this.onRetry?.(step, {
        attempt,
        maxAttempts,
        exitCode: last.exitCode,
        delaySec: delayMs / 1000,
      });
      if (delayMs > 0) {
        await this.sleep(delayMs);
      }

      attempt++;
      this.logger?.debug(`Step '${step.name}' attempt ${attempt}/${maxAttempts}: ${command}`);
      last = await this.attempt(step, command, context, timeoutMs);
    }

    const success = succeeded(last);
    if (success && step.output) {
      context.set(step.output, captureValue(last.stdout));
    }

    return stepResult({
      name: step.name,
      success,
      exitCode: last.exitCode,
      stdout: last.stdout,
      stderr: last.stderr,
      duration: (this.now() - start) / 1000,
      attempts: attempt,
      command,
      timedOut: last.timedOut || undefined,
    });
  }

  private async attempt(
    step: WorkflowStep,
    command: string,
    context: WorkflowExecutionContext,
    timeoutMs: number | undefined,
  ): Promise<CommandResult> {
    let result: CommandResult;
    try {
      result = await this.runner.run({
        command,
        shell: step.shell ?? this.defaultShell,
        cwd: context.workingDirectory,
        env: context.processEnv(),
        timeoutMs,
      });
    } catch (err) {
      return {
        exitCode: GENERIC_FAILURE_EXIT_CODE,
        stdout: '',
        stderr: new StepFailedError(step.name, errorMessage(err)).message,
        timedOut: false,
      };
    }

    if (result.timedOut) {
      const notice = new StepTimeoutError(step.name, step.timeout ?? 0).message;
      return {
        ...result,
        exitCode: TIMEOUT_EXIT_CODE,
        stderr: result.stderr ? `${result.stderr.replace(/\n$/, '')}\n${notice}` : notice,
      };
    }
    return result;
  }
}
