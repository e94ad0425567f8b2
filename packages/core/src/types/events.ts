// packages/core/src/types/events.ts

/**
 * Engine events, emitted on the `event` channel of WorkflowEngine.
 * Type names are dot-separated, `<subject>.<verb>`.
 */

// -- Lifecycle events --
export interface WorkflowStartedEvent {
  type: 'workflow.started';
  runId: string;
  workflow: string;
  stepCount: number;
  dryRun: boolean;
  timestamp: string;
}

export interface WorkflowCompletedEvent {
  type: 'workflow.completed';
  runId: string;
  workflow: string;
  state: 'succeeded' | 'failed';
  totalDuration: number;
  error?: string;
  timestamp: string;
}

// -- Step events --
export interface StepStartedEvent {
  type: 'step.started';
  runId: string;
  stepName: string;
  index: number;
  command: string;
  timestamp: string;
}

export interface StepSkippedEvent {
  type: 'step.skipped';
  runId: string;
  stepName: string;
  index: number;
  condition: string;
  timestamp: string;
}

export interface StepRetryEvent {
  type: 'step.retry';
  runId: string;
  stepName: string;
  attempt: number;
  maxAttempts: number;
  exitCode: number;
  delaySec: number;
  timestamp: string;
}

export interface StepCompletedEvent {
  type: 'step.completed';
  runId: string;
  stepName: string;
  index: number;
  duration: number;
  attempts: number;
  timestamp: string;
}

export interface StepFailedEvent {
  type: 'step.failed';
  runId: string;
  stepName: string;
  index: number;
  exitCode: number;
  error: string;
  tolerated: boolean;
  timestamp: string;
}

/** Only emitted when the run is verbose. */
export interface StepOutputEvent {
  type: 'step.output';
  runId: string;
  stepName: string;
  stdout: string;
}

// -- Error handler events --
export interface HandlerNotifyEvent {
  type: 'handler.notify';
  runId: string;
  message: string;
  timestamp: string;
}

export interface HandlerFailedEvent {
  type: 'handler.failed';
  runId: string;
  command: string;
  error: string;
  timestamp: string;
}

// -- Union type --
export type WorkflowEvent =
  | WorkflowStartedEvent
  | WorkflowCompletedEvent
  | StepStartedEvent
  | StepSkippedEvent
  | StepRetryEvent
  | StepCompletedEvent
  | StepFailedEvent
  | StepOutputEvent
  | HandlerNotifyEvent
  | HandlerFailedEvent;
