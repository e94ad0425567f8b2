import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';

import { expandHome, generateWorkflowTemplate, slugifyWorkflowName } from '@runbook/core';
import chalk from 'chalk';

import { type GlobalOptions, printError, resolveConfig } from '../utils.js';

export interface NewCommandOptions extends GlobalOptions {
  dir?: string;
  description?: string;
  force?: boolean;
  stdout?: boolean;
}

export function newCommand(name: string, options: NewCommandOptions): number {
  try {
    const slug = slugifyWorkflowName(name);
    if (!slug) {
      printError('Workflow name must not be empty');
      return 1;
    }

    const content = generateWorkflowTemplate(name, options.description);
    if (options.stdout) {
      process.stdout.write(content);
      return 0;
    }

    const config = resolveConfig(options);
    const dir = resolve(expandHome(options.dir ?? config.workflowsDir));
    const path = join(dir, `${slug}.yml`);
    if (existsSync(path) && !options.force) {
      printError(`Workflow file already exists: ${path} (use --force to overwrite)`);
      return 1;
    }

    mkdirSync(dir, { recursive: true });
    writeFileSync(path, content, 'utf-8');
    console.log(chalk.green(`Created ${path}`));
    console.log(chalk.gray(`  Run it with: runbook run ${path}`));
    return 0;
  } catch (error) {
    printError(error);
    return 1;
  }
}
