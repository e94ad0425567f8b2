// packages/core/src/utils/errors.ts

import type { WorkflowValidationResult } from '../types/workflow.js';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Base class for everything the workflow engine throws. */
export class WorkflowError extends Error {
  constructor(
    message: string,
    public readonly stepName?: string,
  ) {
    super(message);
    this.name = 'WorkflowError';
  }
}

export class FileNotFoundError extends WorkflowError {
  constructor(public readonly path: string) {
    super(`Workflow file not found: ${path}`);
    this.name = 'FileNotFoundError';
  }
}

export class ParseError extends WorkflowError {
  constructor(detail: string) {
    super(`Failed to parse workflow: ${detail}`);
    this.name = 'ParseError';
  }
}

export class ValidationError extends WorkflowError {
  constructor(public readonly result: WorkflowValidationResult) {
    super(`Workflow validation failed: ${result.errors.join('; ')}`);
    this.name = 'ValidationError';
  }
}

export class StepFailedError extends WorkflowError {
  constructor(stepName: string, detail: string) {
    super(`Step '${stepName}' failed: ${detail}`, stepName);
    this.name = 'StepFailedError';
  }
}

export class ConditionError extends WorkflowError {
  constructor(
    public readonly expression: string,
    detail?: string,
  ) {
    super(`Condition evaluation failed: ${expression}${detail ? ` (${detail})` : ''}`);
    this.name = 'ConditionError';
  }
}

export class StepTimeoutError extends WorkflowError {
  constructor(
    stepName: string,
    public readonly seconds: number,
  ) {
    super(`Step '${stepName}' timed out after ${seconds}s`, stepName);
    this.name = 'StepTimeoutError';
  }
}

export class InvalidTemplateError extends WorkflowError {
  constructor(
    public readonly template: string,
    detail?: string,
  ) {
    super(`Invalid template: ${template}${detail ? ` (${detail})` : ''}`);
    this.name = 'InvalidTemplateError';
  }
}

/** Render any thrown value as a single-line message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
