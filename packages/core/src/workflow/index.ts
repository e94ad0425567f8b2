// packages/core/src/workflow -- Definition loading, validation and rendering

export { parseWorkflow, loadWorkflow } from './parser.js';
export { workflowFileSchema, toWorkflow } from './schema.js';
export type { WorkflowFile } from './schema.js';
export { validateWorkflow, assertValid } from './validator.js';
export { formatWorkflowResult, formatValidationResult } from './format.js';
export { generateWorkflowTemplate, slugifyWorkflowName } from './scaffold.js';
export { listWorkflows } from './discovery.js';
