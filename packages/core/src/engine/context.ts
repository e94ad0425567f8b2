// packages/core/src/engine/context.ts — Per-run variable store

import type { VariableLookup } from './condition.js';

/**
 * Variables, environment snapshot and working directory for one workflow run.
 * Created by the engine at the start of `run` and dropped when it returns.
 */
export class WorkflowExecutionContext {
  private readonly vars = new Map<string, string>();
  readonly env: Readonly<Record<string, string>>;

  constructor(
    readonly workingDirectory: string,
    env: Record<string, string | undefined> = process.env,
    initialVariables: Record<string, string> = {},
  ) {
    const snapshot: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
      if (value !== undefined) snapshot[key] = value;
    }
    this.env = Object.freeze(snapshot);

    for (const [key, value] of Object.entries(initialVariables)) {
      this.vars.set(key, value);
    }
  }

  get variables(): Readonly<Record<string, string>> {
    return Object.fromEntries(this.vars);
  }

  set(name: string, value: string): void {
    this.vars.set(name, value);
  }

  get(name: string): string | undefined {
    return this.vars.get(name);
  }

  /** variables, then env, then ''. */
  resolve(name: string): string {
    return this.vars.get(name) ?? this.env[name] ?? '';
  }

  /**
   * Frozen lookup over the current state. Later `set` calls are not visible
   * through it.
   */
  snapshot(overlay: Record<string, string> = {}): VariableLookup {
    const vars = Object.freeze({ ...this.variables, ...overlay });
    const env = this.env;
    return (name) => (Object.hasOwn(vars, name) ? vars[name] : Object.hasOwn(env, name) ? env[name] : '');
  }

  /** Environment handed to step processes: env overlaid with variables. */
  processEnv(): Record<string, string> {
    return { ...this.env, ...this.variables };
  }
}
