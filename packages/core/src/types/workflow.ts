// packages/core/src/types/workflow.ts

/**
 * A workflow is an ordered list of shell steps loaded from YAML.
 * Field names are camelCase here; the YAML uses snake_case.
 */
export interface Workflow {
  name: string;
  description?: string;
  version?: string;
  author?: string;
  triggers?: WorkflowTrigger[];
  /** Static variables seeded into the execution context at start. */
  env?: Record<string, string>;
  steps: WorkflowStep[];
  onError?: WorkflowErrorHandler[];
}

/** Advisory only: the engine never schedules or listens for events itself. */
export interface WorkflowTrigger {
  schedule?: string;
  manual?: boolean;
  event?: string;
}

export interface WorkflowStep {
  name: string;
  run: string;
  shell?: string;
  /** Variable that receives this step's stdout on success. */
  output?: string;
  /** Guard expression; see engine/condition.ts for the grammar. */
  when?: string;
  /** Seconds. Absent means no limit. */
  timeout?: number;
  continueOnError?: boolean;
  retries?: number;
  /** Seconds between attempts. */
  retryDelay?: number;
}

export interface WorkflowErrorHandler {
  notify?: string;
  run?: string;
}

export interface WorkflowStepResult {
  readonly name: string;
  readonly success: boolean;
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
  /** Seconds, wall-clock, including retries and retry delays. */
  readonly duration: number;
  readonly skipped: boolean;
  /** Command invocations made. 0 for skipped and simulated steps. */
  readonly attempts: number;
  /** Rendered command text. Absent for skipped steps. */
  readonly command?: string;
  readonly timedOut?: boolean;
}

export interface WorkflowResult {
  readonly workflow: string;
  readonly success: boolean;
  /** Seconds. */
  readonly totalDuration: number;
  readonly steps: readonly WorkflowStepResult[];
  readonly error?: string;
  readonly dryRun: boolean;
  /** Rendered `notify` messages from error handlers, in order. */
  readonly notifications: readonly string[];
}

export interface WorkflowValidationResult {
  readonly valid: boolean;
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
}

export interface WorkflowRunOptions {
  dryRun?: boolean;
  verbose?: boolean;
  /** Defaults to process.cwd(). */
  workingDirectory?: string;
}

export interface WorkflowListing {
  path: string;
  workflow: Workflow;
}

export type WorkflowRunState = 'pending' | 'running' | 'succeeded' | 'failed';
