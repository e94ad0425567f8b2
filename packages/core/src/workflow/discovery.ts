// packages/core/src/workflow/discovery.ts

import { existsSync, readdirSync } from 'node:fs';
import { extname, join, resolve } from 'node:path';
import type { WorkflowListing } from '../types/workflow.js';
import { errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { expandHome } from '../utils/paths.js';
import { loadWorkflow } from './parser.js';

const WORKFLOW_EXTENSIONS = new Set(['.yml', '.yaml']);

/**
 * Load every `.yml`/`.yaml` workflow in `directory`, sorted by workflow name.
 * Files that fail to load are logged and skipped; a missing directory is empty.
 */
export function listWorkflows(directory: string, logger?: Logger): WorkflowListing[] {
  const dir = resolve(expandHome(directory));
  if (!existsSync(dir)) {
    return [];
  }

  const listings: WorkflowListing[] = [];
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    if (!entry.isFile() || !WORKFLOW_EXTENSIONS.has(extname(entry.name).toLowerCase())) {
      continue;
    }
    const path = join(dir, entry.name);
    try {
      listings.push({ path, workflow: loadWorkflow(path) });
    } catch (err) {
      logger?.warn(`Failed to load workflow '${entry.name}': ${errorMessage(err)}`);
    }
  }

  return listings.sort(
    (a, b) => a.workflow.name.localeCompare(b.workflow.name) || a.path.localeCompare(b.path),
  );
}
