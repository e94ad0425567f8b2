// packages/core/src/engine/workflow-engine.ts

import { DEFAULT_CONFIG } from '../config/defaults.js';
import type { RunbookConfig } from '../types/config.js';
import type {
  Workflow,
  WorkflowListing,
  WorkflowResult,
  WorkflowRunOptions,
  WorkflowRunState,
  WorkflowStep,
  WorkflowStepResult,
  WorkflowValidationResult,
} from '../types/workflow.js';
import { DRY_RUN_PREFIX, HANDLER_TIMEOUT_MS } from '../utils/constants.js';
import { errorMessage } from '../utils/errors.js';
import { generateRunId } from '../utils/id.js';
import { type Logger, createLogger } from '../utils/logger.js';
import { listWorkflows } from '../workflow/discovery.js';
import { loadWorkflow, parseWorkflow } from '../workflow/parser.js';
import { validateWorkflow } from '../workflow/validator.js';
import { type CommandRunner, ShellCommandRunner } from './command-runner.js';
import { WorkflowExecutionContext } from './context.js';
import { EventBus } from './event-bus.js';
import { StepRunner, stepResult } from './step-runner.js';
import { renderTemplate } from './template.js';

export interface WorkflowEngineOptions {
  config?: Partial<RunbookConfig>;
  /** Command-execution collaborator. Defaults to a ShellCommandRunner. */
  runner?: CommandRunner;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  logger?: Logger;
  /** Process environment snapshotted at the start of each run. */
  env?: Record<string, string | undefined>;
}

interface BlockingFailure {
  step: WorkflowStep;
  result: WorkflowStepResult;
}

/**
 * Loads, validates and runs workflows. Each `run` call builds its own context
 * and result list, so one engine can serve any number of runs.
 *
 * Emits `event` with a WorkflowEvent for every state change of a run.
 */
export class WorkflowEngine extends EventBus {
  private config: RunbookConfig;
  private runner: CommandRunner;
  private sleep?: (ms: number) => Promise<void>;
  private now: () => number;
  private env?: Record<string, string | undefined>;
  private readonly log: Logger;

  constructor(options: WorkflowEngineOptions = {}) {
    const config = { ...DEFAULT_CONFIG, ...options.config };
    const logger = options.logger ?? createLogger(config.logLevel, 'workflow');
    super(logger);
    this.log = logger;
    this.config = config;
    this.runner = options.runner ?? new ShellCommandRunner({ maxOutputBytes: config.maxOutputBytes });
    this.sleep = options.sleep;
    this.now = options.now ?? Date.now;
    this.env = options.env;
  }

  listWorkflows(directory?: string): WorkflowListing[] {
    return listWorkflows(directory ?? this.config.workflowsDir, this.log);
  }

  load(path: string): Workflow {
    return loadWorkflow(path);
  }

  parse(text: string): Workflow {
    return parseWorkflow(text);
  }

  validate(workflow: Workflow): WorkflowValidationResult {
    return validateWorkflow(workflow);
  }

  /**
   * Execute every step in order. Never throws for step failures: the outcome,
   * including the failing step and exit code, is in the returned result.
   */
  async run(workflow: Workflow, options: WorkflowRunOptions = {}): Promise<WorkflowResult> {
    const dryRun = options.dryRun ?? false;
    const verbose = options.verbose ?? false;
    const runId = generateRunId();
    const start = this.now();

    const validation = this.validate(workflow);
    if (!validation.valid) {
      const error = `Workflow validation failed: ${validation.errors.join('; ')}`;
      this.log.error(error);
      this.emitEvent({
        type: 'workflow.completed',
        runId,
        workflow: workflow.name,
        state: 'failed',
        totalDuration: 0,
        error,
        timestamp: '',
      });
      return freezeResult({
        workflow: workflow.name,
        success: false,
        totalDuration: 0,
        steps: [],
        error,
        dryRun,
        notifications: [],
      });
    }

    const context = new WorkflowExecutionContext(
      options.workingDirectory ?? process.cwd(),
      this.env ?? process.env,
      workflow.env ?? {},
    );
    let currentIndex = 0;
    const stepRunner = new StepRunner({
      runner: this.runner,
      defaultShell: this.config.defaultShell,
      sleep: this.sleep,
      now: this.now,
      logger: this.log,
      onStart: (step, command) => {
        this.emitEvent({
          type: 'step.started',
          runId,
          stepName: step.name,
          index: currentIndex,
          command,
          timestamp: '',
        });
      },
      onRetry: (step, info) => {
        this.emitEvent({ type: 'step.retry', runId, stepName: step.name, ...info, timestamp: '' });
      },
    });

    let state: WorkflowRunState = 'running';
    this.log.debug(`Running workflow '${workflow.name}' (${runId})${dryRun ? ' [dry-run]' : ''}`);
    this.emitEvent({
      type: 'workflow.started',
      runId,
      workflow: workflow.name,
      stepCount: workflow.steps.length,
      dryRun,
      timestamp: '',
    });

    const results: WorkflowStepResult[] = [];
    let blocking: BlockingFailure | undefined;

    for (const [index, step] of workflow.steps.entries()) {
      // After a blocking failure only a dry run keeps going
      if (blocking && !dryRun) break;
      currentIndex = index;

      const result = dryRun
        ? this.simulate(step, index, context, stepRunner, runId)
        : await stepRunner.execute(step, context);
      results.push(result);

      if (result.skipped) {
        this.log.debug(`Skipping step '${step.name}' (condition not met)`);
        this.emitEvent({
          type: 'step.skipped',
          runId,
          stepName: step.name,
          index,
          condition: step.when ?? '',
          timestamp: '',
        });
        continue;
      }

      if (result.success) {
        this.emitEvent({
          type: 'step.completed',
          runId,
          stepName: step.name,
          index,
          duration: result.duration,
          attempts: result.attempts,
          timestamp: '',
        });
        if (verbose) this.echoOutput(step, result, runId);
        continue;
      }

      const tolerated = step.continueOnError === true;
      this.emitEvent({
        type: 'step.failed',
        runId,
        stepName: step.name,
        index,
        exitCode: result.exitCode,
        error: result.stderr,
        tolerated,
        timestamp: '',
      });
      if (verbose) this.echoOutput(step, result, runId);
      if (tolerated) {
        this.log.debug(`Step '${step.name}' failed but continuing (continue_on_error: true)`);
      } else if (!blocking) {
        blocking = { step, result };
      }
    }

    let error: string | undefined;
    let notifications: string[] = [];
    if (blocking) {
      state = 'failed';
      error = `Step '${blocking.step.name}' failed with exit code ${blocking.result.exitCode}`;
      this.log.debug(error);
      notifications = await this.runErrorHandlers(workflow, context, blocking, error, dryRun, runId);
    } else {
      state = 'succeeded';
    }

    const totalDuration = (this.now() - start) / 1000;
    this.emitEvent({
      type: 'workflow.completed',
      runId,
      workflow: workflow.name,
      state,
      totalDuration,
      error,
      timestamp: '',
    });

    return freezeResult({
      workflow: workflow.name,
      success: state === 'succeeded',
      totalDuration,
      steps: results,
      error,
      dryRun,
      notifications,
    });
  }

  private echoOutput(step: WorkflowStep, result: WorkflowStepResult, runId: string): void {
    if (!result.stdout) return;
    this.log.debug(`[${step.name}] ${result.stdout.replace(/\n$/, '')}`);
    this.emitEvent({ type: 'step.output', runId, stepName: step.name, stdout: result.stdout });
  }

  /**
   * Guard and substitution run for real; the command does not. A step's
   * `output` receives the synthetic stdout so later guards see a value.
   */
  private simulate(
    step: WorkflowStep,
    index: number,
    context: WorkflowExecutionContext,
    stepRunner: StepRunner,
    runId: string,
  ): WorkflowStepResult {
    const prepared = stepRunner.prepare(step, context);
    if (prepared.kind !== 'ready') {
      return prepared.result;
    }
    this.emitEvent({
      type: 'step.started',
      runId,
      stepName: step.name,
      index,
      command: prepared.command,
      timestamp: '',
    });
    const stdout = `${DRY_RUN_PREFIX}${prepared.command}`;
    if (step.output) {
      context.set(step.output, stdout);
    }
    return stepResult({
      name: step.name,
      success: true,
      exitCode: 0,
      stdout,
      stderr: '',
      duration: 0,
      command: prepared.command,
    });
  }

  /**
   * Run each on_error handler once. Handler problems are logged and reported
   * as events; they never change the run's outcome.
   */
  private async runErrorHandlers(
    workflow: Workflow,
    context: WorkflowExecutionContext,
    blocking: BlockingFailure,
    error: string,
    dryRun: boolean,
    runId: string,
  ): Promise<string[]> {
    const notifications: string[] = [];
    const lookup = context.snapshot({ error, failed_step: blocking.step.name });

    for (const handler of workflow.onError ?? []) {
      if (handler.notify) {
        let message: string;
        try {
          message = renderTemplate(handler.notify, lookup);
        } catch (err) {
          this.log.warn(`Error handler notify template rejected: ${errorMessage(err)}`);
          message = handler.notify;
        }
        notifications.push(message);
        this.log.warn(`Notify: ${message}`);
        this.emitEvent({ type: 'handler.notify', runId, message, timestamp: '' });
      }

      if (handler.run) {
        await this.runHandlerCommand(handler.run, lookup, context, dryRun, runId);
      }
    }

    return notifications;
  }

  private async runHandlerCommand(
    template: string,
    lookup: (name: string) => string,
    context: WorkflowExecutionContext,
    dryRun: boolean,
    runId: string,
  ): Promise<void> {
    let command = template;
    try {
      command = renderTemplate(template, lookup);
      if (dryRun) {
        this.log.info(`${DRY_RUN_PREFIX}${command}`);
        return;
      }
      const result = await this.runner.run({
        command,
        shell: this.config.defaultShell,
        cwd: context.workingDirectory,
        env: context.processEnv(),
        timeoutMs: HANDLER_TIMEOUT_MS,
      });
      if (result.exitCode !== 0 || result.timedOut) {
        const detail = result.timedOut
          ? `timed out after ${HANDLER_TIMEOUT_MS / 1000}s`
          : result.stderr.trim() || `exit code ${result.exitCode}`;
        this.log.error(`Error handler command failed: ${detail}`);
        this.emitEvent({ type: 'handler.failed', runId, command, error: detail, timestamp: '' });
      }
    } catch (err) {
      this.log.error(`Error handler command failed: ${errorMessage(err)}`);
      this.emitEvent({ type: 'handler.failed', runId, command, error: errorMessage(err), timestamp: '' });
    }
  }
}

function freezeResult(result: WorkflowResult): WorkflowResult {
  return Object.freeze({
    ...result,
    steps: Object.freeze([...result.steps]),
    notifications: Object.freeze([...result.notifications]),
  });
}
