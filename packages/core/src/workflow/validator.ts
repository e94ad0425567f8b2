// packages/core/src/workflow/validator.ts

import { isValidCondition } from '../engine/condition.js';
import { isValidTemplate, isVariableName, templateVariables } from '../engine/template.js';
import type { Workflow, WorkflowStep, WorkflowValidationResult } from '../types/workflow.js';
import { ValidationError } from '../utils/errors.js';

/** Upper-case names are taken to come from the process environment. */
const ENV_STYLE_NAME = /^[A-Z][A-Z0-9_]*$/;

function label(step: WorkflowStep, index: number): string {
  return step.name ? `Step ${index + 1} ('${step.name}')` : `Step ${index + 1}`;
}

function checkNonNegative(
  step: WorkflowStep,
  index: number,
  field: 'timeout' | 'retries' | 'retryDelay',
  errors: string[],
): void {
  const value = step[field];
  if (value !== undefined && value < 0) {
    errors.push(`${label(step, index)} has invalid ${field}: ${value} (must be >= 0)`);
  }
}

/**
 * Check a workflow for structural and semantic problems. Never throws and
 * never mutates the workflow; the same input always yields an equal result.
 */
export function validateWorkflow(workflow: Workflow): WorkflowValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  const steps = workflow.steps ?? [];

  // 1. name
  if (!workflow.name || workflow.name.trim() === '') {
    errors.push('Workflow name is required');
  }

  // 2. steps
  if (steps.length === 0) {
    errors.push('Workflow must have at least one step');
  }

  // 3. run / name per step
  steps.forEach((step, index) => {
    if (!step.name || step.name.trim() === '') {
      errors.push(`Step ${index + 1} must have a name`);
    }
    if (!step.run || step.run.trim() === '') {
      errors.push(`${label(step, index)} must have a 'run' command`);
    }
  });

  // 4. numeric ranges
  steps.forEach((step, index) => {
    checkNonNegative(step, index, 'timeout', errors);
    checkNonNegative(step, index, 'retries', errors);
    checkNonNegative(step, index, 'retryDelay', errors);
  });

  // 5. guard expressions and templates
  steps.forEach((step, index) => {
    if (step.when !== undefined && step.when.trim() !== '' && !isValidCondition(step.when)) {
      errors.push(`${label(step, index)} has an invalid 'when' expression: ${step.when}`);
    }
    if (step.run && !isValidTemplate(step.run)) {
      errors.push(`${label(step, index)} has an invalid template in 'run': ${step.run}`);
    }
  });

  // 6. duplicate names
  const seen = new Set<string>();
  const reported = new Set<string>();
  for (const step of steps) {
    if (!step.name) continue;
    if (seen.has(step.name) && !reported.has(step.name)) {
      warnings.push(`Duplicate step name: ${step.name}`);
      reported.add(step.name);
    }
    seen.add(step.name);
  }

  // 7. error handlers
  const handlers = workflow.onError ?? [];
  handlers.forEach((handler, index) => {
    if (!handler.notify && !handler.run) {
      errors.push(`on_error entry ${index + 1} must define 'notify' or 'run'`);
    }
  });
  const canFail = steps.some((step) => step.continueOnError !== true);
  if (handlers.some((h) => h.run) && !canFail) {
    warnings.push(
      "on_error 'run' handlers will never execute: every step has continue_on_error set",
    );
  }

  // Output names and variable references
  const defined = new Set(Object.keys(workflow.env ?? {}));
  steps.forEach((step, index) => {
    if (step.run && isValidTemplate(step.run)) {
      for (const name of templateVariables(step.run)) {
        if (!defined.has(name) && !ENV_STYLE_NAME.test(name)) {
          warnings.push(`${label(step, index)} references undefined variable '${name}'`);
        }
      }
    }
    if (step.output !== undefined) {
      if (isVariableName(step.output)) {
        defined.add(step.output);
      } else {
        warnings.push(
          `${label(step, index)} output variable '${step.output}' is not a valid name and cannot be referenced`,
        );
      }
    }
  });

  return Object.freeze({
    valid: errors.length === 0,
    errors: Object.freeze(errors),
    warnings: Object.freeze(warnings),
  });
}

/** Throw ValidationError unless the result is valid. */
export function assertValid(result: WorkflowValidationResult): void {
  if (!result.valid) {
    throw new ValidationError(result);
  }
}
