import type { CommandRequest, CommandResult, CommandRunner } from '../src/engine/command-runner.js';

type Respond = (request: CommandRequest, call: number) => Partial<CommandResult>;

/** Records every request and answers from `respond`; defaults to a clean exit. */
export class FakeRunner implements CommandRunner {
  readonly requests: CommandRequest[] = [];

  constructor(private readonly respond: Respond = () => ({})) {}

  async run(request: CommandRequest): Promise<CommandResult> {
    this.requests.push(request);
    return { exitCode: 0, stdout: '', stderr: '', timedOut: false, ...this.respond(request, this.requests.length) };
  }

  get commands(): string[] {
    return this.requests.map((r) => r.command);
  }
}

/** Prints the argument of `echo <text>`, exits 1 for `false`, 0 otherwise. */
export const echoRunner = (): FakeRunner =>
  new FakeRunner((request) => {
    if (request.command === 'false') return { exitCode: 1, stderr: 'failed\n' };
    if (request.command.startsWith('echo ')) return { stdout: `${request.command.slice(5)}\n` };
    return {};
  });

/** Millisecond clock that only moves when `sleep` or `advance` is called. */
export function fakeClock(start = 0) {
  let time = start;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => time,
    advance(ms: number) {
      time += ms;
    },
    sleep: async (ms: number) => {
      sleeps.push(ms);
      time += ms;
    },
  };
}
