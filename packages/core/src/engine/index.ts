// packages/core/src/engine -- Guard evaluation, substitution, and execution

export { EventBus } from './event-bus.js';
export { WorkflowEngine } from './workflow-engine.js';
export type { WorkflowEngineOptions } from './workflow-engine.js';
export { StepRunner, stepResult, skippedResult, captureValue } from './step-runner.js';
export type { StepRunnerOptions, RetryInfo, PreparedStep } from './step-runner.js';
export { ShellCommandRunner, buildShellArgs, killProcessTree } from './command-runner.js';
export type {
  CommandRequest,
  CommandResult,
  CommandRunner,
  ShellCommandRunnerOptions,
} from './command-runner.js';
export { WorkflowExecutionContext } from './context.js';
export { parseCondition, evaluateCondition, evaluateNode, isValidCondition } from './condition.js';
export type { ConditionNode, VariableLookup } from './condition.js';
export {
  renderTemplate,
  templateVariables,
  isValidTemplate,
  isVariableName,
  applyFilters,
  TEMPLATE_FILTERS,
} from './template.js';
export type { TemplateFilter } from './template.js';
