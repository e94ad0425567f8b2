// packages/core/src/types/config.ts

import type { LogLevel } from '../utils/logger.js';

export interface RunbookConfig {
  /** Where `list` and `new` look by default. A leading `~` is expanded. */
  workflowsDir: string;
  /** Interpreter for steps that do not set `shell`. */
  defaultShell: string;
  /** Per-stream capture cap for step stdout/stderr. */
  maxOutputBytes: number;
  logLevel: LogLevel;
}
