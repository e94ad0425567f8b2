// packages/core/src/engine/command-runner.ts — Shell subprocess execution

import { spawn } from 'node:child_process';
import {
  DEFAULT_MAX_OUTPUT_BYTES,
  DEFAULT_SHELL,
  KILL_GRACE_MS,
  MAX_TIMER_MS,
  SPAWN_FAILURE_EXIT_CODE,
  TIMEOUT_EXIT_CODE,
} from '../utils/constants.js';

const TRUNCATION_MARKER = '\n[TRUNCATED: output exceeded capture limit]';

export interface CommandRequest {
  command: string;
  shell: string;
  cwd: string;
  env: Record<string, string>;
  /** Kill the attempt after this many ms. Absent means wait forever. */
  timeoutMs?: number;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

/**
 * The command-execution collaborator. Implementations resolve with a result
 * for every attempt, including failed and timed-out ones.
 */
export interface CommandRunner {
  run(request: CommandRequest): Promise<CommandResult>;
}

/** Flag each interpreter takes to run inline code. */
const INLINE_FLAGS: Record<string, string> = {
  sh: '-c',
  bash: '-c',
  zsh: '-c',
  fish: '-c',
  dash: '-c',
  python: '-c',
  python3: '-c',
  node: '-e',
  ruby: '-e',
  perl: '-e',
  pwsh: '-Command',
  powershell: '-Command',
};

/** `/bin/bash` and `bash` both map to `-c`; unknown interpreters get `-c`. */
export function buildShellArgs(shell: string, command: string): string[] {
  const base = shell.split(/[\\/]/).pop() ?? shell;
  const flag = INLINE_FLAGS[base.replace(/\.exe$/i, '')] ?? '-c';
  return [flag, command];
}

export interface ShellCommandRunnerOptions {
  maxOutputBytes?: number;
}

/**
 * Runs each request as `<shell> -c <command>` in its own process group, so a
 * timeout kills the command together with anything it spawned.
 */
export class ShellCommandRunner implements CommandRunner {
  private maxOutputBytes: number;

  constructor(options: ShellCommandRunnerOptions = {}) {
    this.maxOutputBytes = options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
  }

  run(request: CommandRequest): Promise<CommandResult> {
    return new Promise((resolve) => {
      const shell = request.shell || DEFAULT_SHELL;
      const child = spawn(shell, buildShellArgs(shell, request.command), {
        cwd: request.cwd,
        env: request.env,
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
        detached: process.platform !== 'win32',
      });

      const stdout = new OutputBuffer(this.maxOutputBytes);
      const stderr = new OutputBuffer(this.maxOutputBytes);
      let settled = false;
      let timer: ReturnType<typeof setTimeout> | undefined;

      const finish = (result: CommandResult) => {
        if (settled) return;
        settled = true;
        if (timer !== undefined) clearTimeout(timer);
        resolve(result);
      };

      if (request.timeoutMs !== undefined) {
        timer = setTimeout(() => {
          killProcessTree(child.pid);
          finish({
            exitCode: TIMEOUT_EXIT_CODE,
            stdout: stdout.text(),
            stderr: stderr.text(),
            timedOut: true,
          });
        }, Math.min(request.timeoutMs, MAX_TIMER_MS));
      }

      child.stdout.on('data', (data: Buffer) => stdout.append(data));
      child.stderr.on('data', (data: Buffer) => stderr.append(data));

      child.on('error', (err) => {
        finish({
          exitCode: SPAWN_FAILURE_EXIT_CODE,
          stdout: stdout.text(),
          stderr: `Failed to start '${shell}': ${err.message}`,
          timedOut: false,
        });
      });

      child.on('close', (code, signal) => {
        finish({
          exitCode: code ?? (signal ? 128 + signalNumber(signal) : 1),
          stdout: stdout.text(),
          stderr: stderr.text(),
          timedOut: false,
        });
      });
    });
  }
}

class OutputBuffer {
  private chunks: Buffer[] = [];
  private bytes = 0;
  private truncated = false;

  constructor(private readonly limit: number) {}

  append(data: Buffer): void {
    if (this.truncated) return;
    const room = this.limit - this.bytes;
    if (data.byteLength <= room) {
      this.chunks.push(data);
      this.bytes += data.byteLength;
      return;
    }
    this.chunks.push(data.subarray(0, room));
    this.bytes = this.limit;
    this.truncated = true;
  }

  text(): string {
    const bytes = Buffer.concat(this.chunks);
    if (!this.truncated) return bytes.toString('utf-8');
    return bytes.subarray(0, completeUtf8Length(bytes)).toString('utf-8') + TRUNCATION_MARKER;
  }
}

/** Length of `bytes` without a trailing, incomplete UTF-8 sequence. */
function completeUtf8Length(bytes: Buffer): number {
  let lead = bytes.length - 1;
  while (lead >= 0 && bytes.length - lead < 4 && (bytes[lead] & 0xc0) === 0x80) lead--;
  if (lead < 0) return bytes.length;
  const byte = bytes[lead];
  const width = byte >= 0xf0 ? 4 : byte >= 0xe0 ? 3 : byte >= 0xc0 ? 2 : 1;
  return bytes.length - lead >= width ? bytes.length : lead;
}

const SIGNAL_NUMBERS: Record<string, number> = {
  SIGHUP: 1,
  SIGINT: 2,
  SIGKILL: 9,
  SIGTERM: 15,
};

function signalNumber(signal: NodeJS.Signals): number {
  return SIGNAL_NUMBERS[signal] ?? 0;
}

export function killProcessTree(pid: number | undefined): void {
  if (pid === undefined) return;
  try {
    if (process.platform === 'win32') {
      spawn('taskkill', ['/pid', String(pid), '/T', '/F'], { stdio: 'ignore' });
    } else {
      process.kill(-pid, 'SIGTERM');
      setTimeout(() => {
        try {
          process.kill(-pid, 'SIGKILL');
        } catch {
          // Process group already gone
        }
      }, KILL_GRACE_MS).unref();
    }
  } catch {
    // Process group already gone
  }
}
