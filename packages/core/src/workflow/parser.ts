// packages/core/src/workflow/parser.ts

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { YAMLParseError, parse as parseYaml } from 'yaml';
import type { Workflow } from '../types/workflow.js';
import { FileNotFoundError, ParseError, errorMessage } from '../utils/errors.js';
import { expandHome } from '../utils/paths.js';
import { toWorkflow, workflowFileSchema } from './schema.js';

/**
 * Decode a YAML document into a Workflow. Structural only: expressions and
 * cross-field rules are left to validateWorkflow.
 */
export function parseWorkflow(text: string): Workflow {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    const detail = err instanceof YAMLParseError ? err.message.split('\n')[0] : errorMessage(err);
    throw new ParseError(`invalid YAML: ${detail}`);
  }

  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ParseError('document must be a mapping');
  }

  const result = workflowFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
      .join('; ');
    throw new ParseError(issues);
  }
  return toWorkflow(result.data);
}

/** Read and parse a workflow file. `~` expands to the home directory. */
export function loadWorkflow(path: string): Workflow {
  const fullPath = resolve(expandHome(path));
  if (!existsSync(fullPath)) {
    throw new FileNotFoundError(fullPath);
  }
  return parseWorkflow(readFileSync(fullPath, 'utf-8'));
}
