import { Command, InvalidArgumentError } from 'commander';

import { type LogLevel, VERSION, isLogLevel } from '@runbook/core';

import { type ListCommandOptions, listCommand } from './commands/list.js';
import { type NewCommandOptions, newCommand } from './commands/new.js';
import { type RunCommandOptions, runCommand } from './commands/run.js';
import { type ValidateCommandOptions, validateCommand } from './commands/validate.js';

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError('Must be one of debug, info, warn, error, silent');
  }
  return value;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('runbook')
    .description('Run declarative multi-step shell workflows defined in YAML')
    .version(VERSION)
    .option('--log-level <level>', 'Log level (debug|info|warn|error|silent)', parseLogLevel);

  program
    .command('run')
    .description('Run a workflow file')
    .argument('<file>', 'Workflow YAML file')
    .option('--dry-run', 'Show what would run without executing commands', false)
    .option('-v, --verbose', 'Show step output', false)
    .option('--json', 'Print the result as JSON', false)
    .option('--workdir <dir>', 'Working directory for step commands')
    .action(async (file: string, _options: unknown, command: Command) => {
      const options: RunCommandOptions = command.optsWithGlobals();
      process.exitCode = await runCommand(file, options);
    });

  program
    .command('validate')
    .description('Check a workflow file without running it')
    .argument('<file>', 'Workflow YAML file')
    .option('--json', 'Print the result as JSON', false)
    .option('--errors-only', 'Hide warnings', false)
    .action((file: string, _options: unknown, command: Command) => {
      const options: ValidateCommandOptions = command.optsWithGlobals();
      process.exitCode = validateCommand(file, options);
    });

  program
    .command('list')
    .description('List workflows in the workflows directory')
    .option('--dir <dir>', 'Directory to search (default: workflowsDir from config)')
    .option('--json', 'Print the list as JSON', false)
    .option('-v, --verbose', 'Show path, steps and triggers', false)
    .action((_options: unknown, command: Command) => {
      const options: ListCommandOptions = command.optsWithGlobals();
      process.exitCode = listCommand(options);
    });

  program
    .command('new')
    .description('Create a starter workflow file')
    .argument('<name>', 'Workflow name')
    .option('--dir <dir>', 'Directory to write to (default: workflowsDir from config)')
    .option('-d, --description <text>', 'Workflow description')
    .option('--force', 'Overwrite an existing file', false)
    .option('--stdout', 'Print the workflow instead of writing a file', false)
    .action((name: string, _options: unknown, command: Command) => {
      const options: NewCommandOptions = command.optsWithGlobals();
      process.exitCode = newCommand(name, options);
    });

  return program;
}
