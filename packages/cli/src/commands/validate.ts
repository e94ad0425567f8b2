import { errorMessage, formatValidationResult, loadWorkflow, validateWorkflow } from '@runbook/core';
import type { WorkflowValidationResult } from '@runbook/core';

import { printError } from '../utils.js';

export interface ValidateCommandOptions {
  json?: boolean;
  errorsOnly?: boolean;
}

export function validateCommand(file: string, options: ValidateCommandOptions): number {
  let result: WorkflowValidationResult;
  try {
    result = validateWorkflow(loadWorkflow(file));
  } catch (error) {
    // Load failures are reported in the same shape as validation errors
    if (options.json) {
      console.log(JSON.stringify({ valid: false, errors: [errorMessage(error)], warnings: [] }, null, 2));
    } else {
      printError(error);
    }
    return 1;
  }

  const shown = options.errorsOnly ? { ...result, warnings: [] } : result;
  if (options.json) {
    console.log(JSON.stringify(shown, null, 2));
  } else {
    process.stdout.write(formatValidationResult(shown));
  }
  return result.valid ? 0 : 1;
}
