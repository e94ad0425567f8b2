import { createLogger, expandHome, listWorkflows } from '@runbook/core';
import chalk from 'chalk';

import { type GlobalOptions, printError, resolveConfig } from '../utils.js';

export interface ListCommandOptions extends GlobalOptions {
  dir?: string;
  json?: boolean;
  verbose?: boolean;
}

export function listCommand(options: ListCommandOptions): number {
  try {
    const config = resolveConfig(options);
    const dir = expandHome(options.dir ?? config.workflowsDir);
    const listings = listWorkflows(dir, createLogger(config.logLevel, 'list'));

    if (options.json) {
      const rows = listings.map(({ path, workflow }) => ({
        name: workflow.name,
        description: workflow.description ?? null,
        version: workflow.version ?? null,
        steps: workflow.steps.length,
        path,
      }));
      console.log(JSON.stringify(rows, null, 2));
      return 0;
    }

    if (listings.length === 0) {
      console.log(chalk.gray(`No workflows found in ${dir}`));
      return 0;
    }

    for (const { path, workflow } of listings) {
      const version = workflow.version ? chalk.gray(` v${workflow.version}`) : '';
      console.log(`${chalk.bold(workflow.name)}${version}${workflow.description ? ` - ${workflow.description}` : ''}`);
      if (options.verbose) {
        console.log(chalk.gray(`  path:  ${path}`));
        console.log(chalk.gray(`  steps: ${workflow.steps.map((s) => s.name).join(', ')}`));
        for (const trigger of workflow.triggers ?? []) {
          if (trigger.schedule) console.log(chalk.gray(`  schedule: ${trigger.schedule}`));
          if (trigger.event) console.log(chalk.gray(`  event: ${trigger.event}`));
          if (trigger.manual) console.log(chalk.gray('  manual: true'));
        }
      }
    }
    return 0;
  } catch (error) {
    printError(error);
    return 1;
  }
}
