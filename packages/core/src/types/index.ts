// packages/core/src/types/index.ts -- barrel re-export

export type { RunbookConfig } from './config.js';

export type {
  Workflow,
  WorkflowTrigger,
  WorkflowStep,
  WorkflowErrorHandler,
  WorkflowStepResult,
  WorkflowResult,
  WorkflowValidationResult,
  WorkflowRunOptions,
  WorkflowListing,
  WorkflowRunState,
} from './workflow.js';

export type {
  WorkflowStartedEvent,
  WorkflowCompletedEvent,
  StepStartedEvent,
  StepSkippedEvent,
  StepRetryEvent,
  StepCompletedEvent,
  StepFailedEvent,
  StepOutputEvent,
  HandlerNotifyEvent,
  HandlerFailedEvent,
  WorkflowEvent,
} from './events.js';
