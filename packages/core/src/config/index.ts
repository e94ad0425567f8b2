// packages/core/src/config/index.ts -- barrel re-export

export { DEFAULT_CONFIG } from './defaults.js';
export { runbookConfigSchema, validateConfig } from './schema.js';
export type { RunbookConfigInput } from './schema.js';
export { loadConfig } from './loader.js';
