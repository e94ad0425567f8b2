// packages/core/src/utils/index.ts -- barrel re-export

export { generateRunId } from './id.js';
export {
  ConfigError,
  WorkflowError,
  FileNotFoundError,
  ParseError,
  ValidationError,
  StepFailedError,
  ConditionError,
  StepTimeoutError,
  InvalidTemplateError,
  errorMessage,
} from './errors.js';
export { createLogger, isLogLevel } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export { sleep } from './sleep.js';
export { expandHome } from './paths.js';
