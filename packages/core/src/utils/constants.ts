// packages/core/src/utils/constants.ts — Shared magic number constants

/** Default directory searched by `list` and written by `new` */
export const DEFAULT_WORKFLOWS_DIR = '~/.runbook/workflows';

/** Project config file name, looked up in the project directory */
export const CONFIG_FILENAME = '.runbook.yml';

/** Interpreter for steps without `shell` */
export const DEFAULT_SHELL = 'sh';

/** Per-stream capture cap for step output (1 MiB) */
export const DEFAULT_MAX_OUTPUT_BYTES = 1024 * 1024;

/** Exit code reported for an attempt killed by its step timeout (same as coreutils `timeout`) */
export const TIMEOUT_EXIT_CODE = 124;

/** Exit code reported when the interpreter could not be started */
export const SPAWN_FAILURE_EXIT_CODE = 127;

/** Exit code for failures raised before a command runs (bad guard, bad template) */
export const GENERIC_FAILURE_EXIT_CODE = 1;

/** Longest delay a Node timer can hold (2^31 - 1 ms, about 24.8 days); larger values fire at once */
export const MAX_TIMER_MS = 2_147_483_647;

/** Time limit for an on_error `run` command (5 minutes) */
export const HANDLER_TIMEOUT_MS = 5 * 60 * 1000;

/** Grace period between SIGTERM and SIGKILL for a timed-out process group */
export const KILL_GRACE_MS = 2000;

/** Characters of stdout shown per step in verbose formatted output */
export const VERBOSE_STDOUT_PREVIEW = 200;

/** Prefix of the synthetic stdout recorded for simulated steps */
export const DRY_RUN_PREFIX = '[dry-run] Would execute: ';
