// packages/core/src/workflow/schema.ts — On-disk (snake_case) workflow shape

import { z } from 'zod';
import type { Workflow, WorkflowErrorHandler, WorkflowStep, WorkflowTrigger } from '../types/workflow.js';

// Plain YAML scalars (`run: true`, `when: false`, `name: 2024`) read as text
const scalarString = z.preprocess(
  (value) => (typeof value === 'number' || typeof value === 'boolean' ? String(value) : value),
  z.string(),
);

const triggerSchema = z.object({
  schedule: scalarString.optional(),
  manual: z.boolean().optional(),
  event: scalarString.optional(),
});

const stepSchema = z.object({
  name: scalarString,
  run: scalarString,
  shell: scalarString.optional(),
  output: scalarString.optional(),
  when: scalarString.optional(),
  timeout: z.number().int().optional(),
  continue_on_error: z.boolean().optional(),
  retries: z.number().int().optional(),
  retry_delay: z.number().int().optional(),
});

const errorHandlerSchema = z.object({
  notify: scalarString.optional(),
  run: scalarString.optional(),
});

export const workflowFileSchema = z.object({
  name: scalarString,
  description: scalarString.optional(),
  version: scalarString.optional(),
  author: scalarString.optional(),
  // A single mapping or a list of mappings; both normalize to a list
  triggers: z
    .union([triggerSchema, z.array(triggerSchema)])
    .optional()
    .transform((value) => (value === undefined || Array.isArray(value) ? value : [value])),
  env: z.record(z.string(), scalarString).optional(),
  steps: z.array(stepSchema).min(1, 'at least one step is required'),
  on_error: z.array(errorHandlerSchema).optional(),
});

export type WorkflowFile = z.output<typeof workflowFileSchema>;

function toStep(step: WorkflowFile['steps'][number]): WorkflowStep {
  return {
    name: step.name,
    run: step.run,
    shell: step.shell,
    output: step.output,
    when: step.when,
    timeout: step.timeout,
    continueOnError: step.continue_on_error,
    retries: step.retries,
    retryDelay: step.retry_delay,
  };
}

/** Map the validated file shape onto the camelCase model. */
export function toWorkflow(file: WorkflowFile): Workflow {
  return {
    name: file.name,
    description: file.description,
    version: file.version,
    author: file.author,
    triggers: file.triggers?.map((t): WorkflowTrigger => ({ ...t })),
    env: file.env,
    steps: file.steps.map(toStep),
    onError: file.on_error?.map((h): WorkflowErrorHandler => ({ notify: h.notify, run: h.run })),
  };
}
