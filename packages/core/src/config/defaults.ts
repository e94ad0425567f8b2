// packages/core/src/config/defaults.ts

import type { RunbookConfig } from '../types/config.js';
import { DEFAULT_MAX_OUTPUT_BYTES, DEFAULT_SHELL, DEFAULT_WORKFLOWS_DIR } from '../utils/constants.js';

export const DEFAULT_CONFIG: RunbookConfig = {
  workflowsDir: DEFAULT_WORKFLOWS_DIR,
  defaultShell: DEFAULT_SHELL,
  maxOutputBytes: DEFAULT_MAX_OUTPUT_BYTES,
  logLevel: 'info',
};
