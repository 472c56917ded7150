import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { tools } from './env.js';
import { Errors } from './errors.js';

const execFileAsync = promisify(execFile);

export interface CommandResult {
  command: string;
  args: string[];
  /** Process exit code; null when the process was killed by a signal */
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

/**
 * Boundary to external executables. Modules depend on this instead of
 * child_process so tests can substitute a fake.
 */
export interface CommandRunner {
  /**
   * Resolves once the process exits, whatever its exit code.
   * Rejects with a TOOL_SPAWN_FAILED ReconError when the process could not
   * be started or its output overflowed the buffer.
   */
  execute(command: string, args: string[]): Promise<CommandResult>;
}

interface ExecFailure {
  code?: unknown;
  signal?: unknown;
  stdout?: unknown;
  stderr?: unknown;
}

function isExecFailure(error: unknown): error is Error & ExecFailure {
  return error instanceof Error && ('code' in error || 'signal' in error);
}

function asText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (Buffer.isBuffer(value)) return value.toString('utf8');
  return '';
}

export class ExecFileRunner implements CommandRunner {
  constructor(private readonly maxBuffer: number = tools.MAX_OUTPUT_BYTES) {}

  async execute(command: string, args: string[]): Promise<CommandResult> {
    try {
      const { stdout, stderr } = await execFileAsync(command, args, {
        maxBuffer: this.maxBuffer,
        encoding: 'utf8',
      });
      return { command, args, exitCode: 0, stdout, stderr };
    } catch (error) {
      // Numeric code = process ran and exited non-zero. String code (ENOENT,
      // EACCES, ERR_CHILD_PROCESS_STDIO_MAXBUFFER) = it never ran or was cut off.
      if (isExecFailure(error) && typeof error.code === 'number') {
        return {
          command,
          args,
          exitCode: error.code,
          stdout: asText(error.stdout),
          stderr: asText(error.stderr),
        };
      }
      if (isExecFailure(error) && error.code == null && typeof error.signal === 'string') {
        return {
          command,
          args,
          exitCode: null,
          stdout: asText(error.stdout),
          stderr: asText(error.stderr),
        };
      }
      throw Errors.spawnFailed(command, error);
    }
  }
}
