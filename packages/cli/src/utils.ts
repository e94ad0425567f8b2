import { type LogLevel, type RunbookConfig, errorMessage, loadConfig } from '@runbook/core';
import chalk from 'chalk';

/** Options every command receives through `optsWithGlobals()`. */
export interface GlobalOptions {
  logLevel?: LogLevel;
}

/** Project config from the current directory, with the `--log-level` override applied. */
export function resolveConfig(options: GlobalOptions): RunbookConfig {
  return loadConfig({ overrides: { logLevel: options.logLevel } });
}

export function printError(error: unknown): void {
  console.error(chalk.red(`Error: ${errorMessage(error)}`));
}
