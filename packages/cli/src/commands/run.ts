import { resolve } from 'node:path';

import {
  type CommandRunner,
  ValidationError,
  WorkflowEngine,
  assertValid,
  createLogger,
  formatValidationResult,
  formatWorkflowResult,
} from '@runbook/core';
import chalk from 'chalk';

import { createEventRenderer } from '../render.js';
import { type GlobalOptions, printError, resolveConfig } from '../utils.js';

export interface RunCommandOptions extends GlobalOptions {
  dryRun?: boolean;
  verbose?: boolean;
  json?: boolean;
  workdir?: string;
}

/** Test seam: lets callers swap the shell runner. */
export interface RunCommandDeps {
  runner?: CommandRunner;
}

export async function runCommand(
  file: string,
  options: RunCommandOptions,
  deps: RunCommandDeps = {},
): Promise<number> {
  try {
    const config = resolveConfig(options);
    const engine = new WorkflowEngine({
      config,
      runner: deps.runner,
      logger: createLogger(config.logLevel, 'run'),
    });

    const workflow = engine.load(file);
    const validation = engine.validate(workflow);
    assertValid(validation);
    for (const warning of validation.warnings) {
      console.error(chalk.yellow(`Warning: ${warning}`));
    }

    if (!options.json) {
      engine.on('event', createEventRenderer());
    }

    const result = await engine.run(workflow, {
      dryRun: options.dryRun,
      verbose: options.verbose,
      workingDirectory: options.workdir ? resolve(options.workdir) : undefined,
    });

    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      process.stdout.write(formatWorkflowResult(result, options.verbose));
    }
    return result.success ? 0 : 1;
  } catch (error) {
    if (error instanceof ValidationError) {
      if (options.json) {
        console.log(JSON.stringify(error.result, null, 2));
      } else {
        process.stderr.write(chalk.red(formatValidationResult(error.result)));
      }
      return 1;
    }
    printError(error);
    return 1;
  }
}
