// @runbook/core - YAML workflow engine for sequential shell automation

export const VERSION = '0.1.0';

// Type definitions
export type {
  RunbookConfig,
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
} from './types/index.js';

// Utilities
export {
  generateRunId,
  ConfigError,
  WorkflowError,
  FileNotFoundError,
  ParseError,
  ValidationError,
  StepFailedError,
  ConditionError,
  StepTimeoutError,
  InvalidTemplateError,
  errorMessage,
  createLogger,
  isLogLevel,
  sleep,
  expandHome,
} from './utils/index.js';
export type { Logger, LogLevel } from './utils/index.js';
export {
  CONFIG_FILENAME,
  DEFAULT_WORKFLOWS_DIR,
  DEFAULT_SHELL,
  DEFAULT_MAX_OUTPUT_BYTES,
  TIMEOUT_EXIT_CODE,
  HANDLER_TIMEOUT_MS,
  DRY_RUN_PREFIX,
} from './utils/constants.js';

// Configuration
export { DEFAULT_CONFIG, runbookConfigSchema, validateConfig, loadConfig } from './config/index.js';
export type { RunbookConfigInput } from './config/index.js';

// Workflow definitions
export {
  parseWorkflow,
  loadWorkflow,
  workflowFileSchema,
  toWorkflow,
  validateWorkflow,
  assertValid,
  formatWorkflowResult,
  formatValidationResult,
  generateWorkflowTemplate,
  slugifyWorkflowName,
  listWorkflows,
} from './workflow/index.js';
export type { WorkflowFile } from './workflow/index.js';

// Engine
export {
  EventBus,
  WorkflowEngine,
  StepRunner,
  stepResult,
  skippedResult,
  captureValue,
  ShellCommandRunner,
  buildShellArgs,
  killProcessTree,
  WorkflowExecutionContext,
  parseCondition,
  evaluateCondition,
  evaluateNode,
  isValidCondition,
  renderTemplate,
  templateVariables,
  isValidTemplate,
  isVariableName,
  applyFilters,
  TEMPLATE_FILTERS,
} from './engine/index.js';
export type {
  TemplateFilter,
  WorkflowEngineOptions,
  StepRunnerOptions,
  RetryInfo,
  PreparedStep,
  CommandRequest,
  CommandResult,
  CommandRunner,
  ShellCommandRunnerOptions,
  ConditionNode,
  VariableLookup,
} from './engine/index.js';
