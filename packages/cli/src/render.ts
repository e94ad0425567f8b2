// packages/cli/src/render.ts — Terminal rendering for engine events

import type { WorkflowEvent } from '@runbook/core';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';

function seconds(value: number): string {
  return `${value.toFixed(2)}s`;
}

function indent(text: string): string {
  return text
    .replace(/\n$/, '')
    .split('\n')
    .map((line) => `    ${line}`)
    .join('\n');
}

/**
 * Build an `event` listener that draws run progress on stderr, one spinner per
 * executing step. stdout is left for the final summary.
 */
export function createEventRenderer(): (event: WorkflowEvent) => void {
  let spinner: Ora | null = null;

  const settle = (finish: (s: Ora) => void, fallback: () => void) => {
    if (spinner) {
      finish(spinner);
      spinner = null;
    } else {
      fallback();
    }
  };

  return (event) => {
    switch (event.type) {
      case 'workflow.started':
        console.error(
          chalk.gray(`━━━ ${event.workflow} (${event.stepCount} steps${event.dryRun ? ', dry run' : ''}) ━━━`),
        );
        break;

      case 'step.started':
        spinner = ora({ text: `${event.stepName}: ${chalk.dim(event.command)}`, stream: process.stderr }).start();
        break;

      case 'step.retry':
        if (spinner) {
          spinner.text = chalk.yellow(
            `${event.stepName}: exit ${event.exitCode}, retry ${event.attempt}/${event.maxAttempts - 1}` +
              (event.delaySec > 0 ? ` in ${event.delaySec}s` : ''),
          );
        }
        break;

      case 'step.completed':
        settle(
          (s) => s.succeed(`${event.stepName} ${chalk.gray(`(${seconds(event.duration)})`)}`),
          () => console.error(chalk.green(`  ✓ ${event.stepName}`)),
        );
        break;

      case 'step.skipped':
        console.error(chalk.gray(`  ○ ${event.stepName} skipped (when: ${event.condition})`));
        break;

      case 'step.failed': {
        const text = `${event.stepName}: exit code ${event.exitCode}${event.tolerated ? ' (continuing)' : ''}`;
        if (event.tolerated) {
          settle(
            (s) => s.warn(chalk.yellow(text)),
            () => console.error(chalk.yellow(`  ! ${text}`)),
          );
        } else {
          settle(
            (s) => s.fail(chalk.red(text)),
            () => console.error(chalk.red(`  ✗ ${text}`)),
          );
        }
        break;
      }

      case 'step.output':
        console.error(chalk.dim(indent(event.stdout)));
        break;

      case 'handler.notify':
        console.error(chalk.yellow(`  ⚑ ${event.message}`));
        break;

      case 'handler.failed':
        console.error(chalk.red(`  ✗ on_error '${event.command}' failed: ${event.error}`));
        break;

      case 'workflow.completed':
        break;
    }
  };
}
