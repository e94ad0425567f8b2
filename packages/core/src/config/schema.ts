// packages/core/src/config/schema.ts

import { z } from 'zod';
import type { RunbookConfig } from '../types/config.js';
import { DEFAULT_MAX_OUTPUT_BYTES, DEFAULT_SHELL, DEFAULT_WORKFLOWS_DIR } from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';

export const runbookConfigSchema = z.object({
  workflowsDir: z.string().min(1).default(DEFAULT_WORKFLOWS_DIR),
  defaultShell: z.string().min(1).default(DEFAULT_SHELL),
  maxOutputBytes: z.number().int().positive().default(DEFAULT_MAX_OUTPUT_BYTES),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type RunbookConfigInput = z.input<typeof runbookConfigSchema>;

/**
 * Validate and parse a config object. Throws ConfigError on invalid input.
 */
export function validateConfig(config: unknown): RunbookConfig {
  const result = runbookConfigSchema.safeParse(config);
  if (!result.success) {
    const first = result.error.issues[0];
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`, first?.path.join('.'));
  }
  return result.data;
}
