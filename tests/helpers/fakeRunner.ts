import type { CommandResult, CommandRunner } from '../../src/core/commandRunner.js';
import { Errors } from '../../src/core/errors.js';

export type FakeResponse =
  | Partial<Pick<CommandResult, 'exitCode' | 'stdout' | 'stderr'>>
  | Error;

type Responder = (command: string, args: string[]) => FakeResponse | Promise<FakeResponse>;

/**
 * In-process stand-in for ExecFileRunner. Records every call and answers
 * from the responder; an Error answer rejects like a failed spawn.
 */
export class FakeRunner implements CommandRunner {
  readonly calls: Array<{ command: string; args: string[] }> = [];

  constructor(private readonly responder: Responder) {}

  async execute(command: string, args: string[]): Promise<CommandResult> {
    this.calls.push({ command, args });
    const response = await this.responder(command, args);
    if (response instanceof Error) {
      throw response;
    }
    return {
      command,
      args,
      exitCode: response.exitCode === undefined ? 0 : response.exitCode,
      stdout: response.stdout ?? '',
      stderr: response.stderr ?? '',
    };
  }
}

/** Same rejection ExecFileRunner gives for a missing executable */
export function spawnError(command: string): Error {
  return Errors.spawnFailed(command, Object.assign(new Error(`spawn ${command} ENOENT`), { code: 'ENOENT' }));
}

/** waybackurls/curl stand-in keyed by domain */
export function toolRunner(options: {
  urls?: (domain: string) => string[] | FakeResponse;
  status?: (domain: string) => string | FakeResponse;
}): FakeRunner {
  return new FakeRunner((command, args) => {
    if (command === 'waybackurls') {
      const domain = args[0] ?? '';
      const answer = options.urls?.(domain) ?? [];
      return Array.isArray(answer) ? { stdout: answer.map((u) => `${u}\n`).join('') } : answer;
    }
    if (command === 'curl') {
      const domain = args[5] ?? '';
      const answer = options.status?.(domain) ?? '200';
      return typeof answer === 'string' ? { stdout: answer } : answer;
    }
    if (command === 'which') {
      return { stdout: `/usr/bin/${args[0]}\n` };
    }
    return { exitCode: 127, stderr: `${command}: not found` };
  });
}
