import type { CommandRunner } from '../core/commandRunner.js';
import { tools } from '../core/env.js';
import { Errors } from '../core/errors.js';
import { createModuleLogger } from '../core/logger.js';

const log = createModuleLogger('reachabilityProbe');

const STATUS_RE = /^\d+$/;

export interface ProbeOptions {
  runner: CommandRunner;
  /** Passed to the HTTP tool's --proxy flag as given */
  proxy?: string;
  verbose?: boolean;
  command?: string;
  echo?: (line: string) => void;
}

/** Silent fetch that discards the body and prints only the status code */
export function buildProbeArgs(domain: string, proxy?: string): string[] {
  const args = ['-s', '-o', '/dev/null', '-w', '%{http_code}', domain];
  if (proxy) {
    args.push('--proxy', proxy);
  }
  return args;
}

export function parseStatusCode(output: string): number | null {
  const trimmed = output.trim();
  return STATUS_RE.test(trimmed) ? parseInt(trimmed, 10) : null;
}

/**
 * Single probe of the domain's current HTTP status. Null when the tool
 * fails or prints something other than a number.
 */
export async function probeHttpStatus(domain: string, options: ProbeOptions): Promise<number | null> {
  const command = options.command ?? tools.HTTP_TOOL;
  const echo = options.echo ?? ((line: string) => console.log(line));

  try {
    const result = await options.runner.execute(command, buildProbeArgs(domain, options.proxy));
    if (options.verbose) {
      echo(`HTTP response: ${result.stdout}`);
    }
    if (result.exitCode !== 0) {
      throw Errors.nonZeroExit(command, result.exitCode ?? -1, result.stderr);
    }

    const status = parseStatusCode(result.stdout);
    if (status === null) {
      throw Errors.badOutput(command, result.stdout);
    }
    return status;
  } catch (error) {
    log.warn({ domain, err: error }, `Error running ${command} for ${domain}`);
    return null;
  }
}
