// packages/core/src/workflow/format.ts — Plain-text rendering of results

import type { WorkflowResult, WorkflowValidationResult } from '../types/workflow.js';
import { VERBOSE_STDOUT_PREVIEW } from '../utils/constants.js';

function seconds(value: number): string {
  return `${value.toFixed(2)}s`;
}

/**
 * Status block for a finished run. Step details are included when the run
 * failed or `verbose` is set.
 */
export function formatWorkflowResult(result: WorkflowResult, verbose = false): string {
  const lines: string[] = [];
  const executed = result.steps.filter((s) => !s.skipped).length;

  lines.push(`Workflow: ${result.workflow}`);
  lines.push(`Status: ${result.success ? 'SUCCESS' : 'FAILED'}${result.dryRun ? ' (dry run)' : ''}`);
  lines.push(`Duration: ${seconds(result.totalDuration)}`);
  lines.push(`Steps: ${executed}/${result.steps.length}`);

  if (verbose || !result.success) {
    lines.push('');
    lines.push('Step Details:');
    for (const step of result.steps) {
      const status = step.skipped ? 'SKIPPED' : step.success ? 'OK' : 'FAILED';
      lines.push(
        step.skipped ? `  - ${step.name}: ${status}` : `  - ${step.name}: ${status} (${seconds(step.duration)})`,
      );
      if (verbose && step.stdout) {
        lines.push(`    stdout: ${step.stdout.slice(0, VERBOSE_STDOUT_PREVIEW)}`);
      }
      if (!step.success && step.stderr) {
        lines.push(`    stderr: ${step.stderr}`);
      }
    }
  }

  if (result.error) {
    lines.push('');
    lines.push(`Error: ${result.error}`);
  }

  return `${lines.join('\n')}\n`;
}

export function formatValidationResult(result: WorkflowValidationResult): string {
  const lines: string[] = [];
  if (result.valid) {
    lines.push('Workflow is valid');
  } else {
    lines.push('Workflow has errors:');
    for (const error of result.errors) {
      lines.push(`  ERROR: ${error}`);
    }
  }
  if (result.warnings.length > 0) {
    lines.push('Warnings:');
    for (const warning of result.warnings) {
      lines.push(`  WARN: ${warning}`);
    }
  }
  return `${lines.join('\n')}\n`;
}
