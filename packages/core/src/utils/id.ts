// packages/core/src/utils/id.ts

import { nanoid } from 'nanoid';

/** Generate a workflow run ID with "run_" prefix. */
export function generateRunId(): string {
  return `run_${nanoid(16)}`;
}
