/*
 * =============================================================================
 * MODULE: archiveLookup.ts
 * =============================================================================
 * Historical URL enumeration through the external archive tool (waybackurls).
 * Failures degrade to an empty list; a lookup never aborts the run.
 * =============================================================================
 */

import type { CommandRunner } from '../core/commandRunner.js';
import { tools } from '../core/env.js';
import { Errors } from '../core/errors.js';
import { createModuleLogger } from '../core/logger.js';

const log = createModuleLogger('archiveLookup');

export interface ArchiveLookupOptions {
  runner: CommandRunner;
  verbose?: boolean;
  /** Override for the archive executable */
  command?: string;
  /** Receives raw lines in verbose mode */
  echo?: (line: string) => void;
}

/**
 * Split tool output into URLs. Trailing whitespace of the whole output is
 * dropped, interior blank lines are kept.
 */
export function splitArchiveOutput(stdout: string): string[] {
  const trimmed = stdout.trimEnd();
  if (!trimmed) return [];
  return trimmed.split(/\r?\n/);
}

export async function lookupArchivedUrls(domain: string, options: ArchiveLookupOptions): Promise<string[]> {
  const command = options.command ?? tools.ARCHIVE_TOOL;
  const echo = options.echo ?? ((line: string) => console.log(line));

  try {
    const result = await options.runner.execute(command, [domain]);
    if (result.exitCode !== 0) {
      throw Errors.nonZeroExit(command, result.exitCode ?? -1, result.stderr);
    }

    const urls = splitArchiveOutput(result.stdout);
    if (options.verbose) {
      for (const url of urls) {
        echo(`Wayback URL: ${url}`);
      }
    }
    log.debug({ domain, count: urls.length }, 'Archive lookup completed');
    return urls;
  } catch (error) {
    log.warn({ domain, err: error }, `Error running ${command} for ${domain}`);
    return [];
  }
}
