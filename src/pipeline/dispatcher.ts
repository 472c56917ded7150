/**
 * Dispatcher - turns raw CLI input into domains and runs the domain
 * pipeline over them on a bounded worker pool.
 */

import { existsSync, statSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import pLimit from 'p-limit';
import type { CommandRunner } from '../core/commandRunner.js';
import { pool } from '../core/env.js';
import { Errors } from '../core/errors.js';
import { createModuleLogger } from '../core/logger.js';
import { ReportWriter, type DomainReport } from '../report/reporter.js';
import { runDomain } from './domainPipeline.js';

const log = createModuleLogger('dispatcher');

export type InputSource =
  | { kind: 'comma-list'; raw: string }
  | { kind: 'file'; path: string }
  | { kind: 'literal'; domain: string };

export function isRegularFile(path: string): boolean {
  return existsSync(path) && statSync(path).isFile();
}

/**
 * A comma always means a domain list, even if a file of that name exists.
 * Otherwise an existing file is read, and anything else is one domain.
 */
export function classifyInput(raw: string, isFile: (path: string) => boolean = isRegularFile): InputSource {
  if (raw.includes(',')) {
    return { kind: 'comma-list', raw };
  }
  if (isFile(raw)) {
    return { kind: 'file', path: raw };
  }
  return { kind: 'literal', domain: raw.trim() };
}

export function splitLines(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export async function resolveDomains(source: InputSource): Promise<string[]> {
  switch (source.kind) {
    case 'comma-list':
      return source.raw
        .split(',')
        .map((segment) => segment.trim())
        .filter((segment) => segment.length > 0);
    case 'file': {
      let content: string;
      try {
        content = await readFile(source.path, 'utf8');
      } catch (error) {
        throw Errors.inputReadFailed(source.path, error);
      }
      return splitLines(content);
    }
    case 'literal':
      return source.domain ? [source.domain] : [];
  }
}

export interface ProgressEvent {
  completed: number;
  total: number;
  domain: string;
  ok: boolean;
}

export interface ReconOptions {
  /** File path, single domain or comma-separated list */
  input: string;
  runner: CommandRunner;
  proxy?: string;
  verbose?: boolean;
  poolSize?: number;
  /** Console and output-file sink; console only when omitted */
  writer?: ReportWriter;
  onProgress?: (event: ProgressEvent) => void;
  echo?: (line: string) => void;
}

export interface ReconSummary {
  total: number;
  completed: number;
  failed: number;
  reports: DomainReport[];
}

/**
 * Runs every domain to completion. Every domain contributes one report; a
 * domain whose file append fails is also logged and counted as failed, and
 * never stops the others.
 */
export async function runRecon(options: ReconOptions): Promise<ReconSummary> {
  const source = classifyInput(options.input);
  const domains = await resolveDomains(source);
  const total = domains.length;
  const summary: ReconSummary = { total, completed: 0, failed: 0, reports: [] };

  if (total === 0) {
    log.warn({ source: source.kind }, 'No domains to process');
    return summary;
  }

  const poolSize = Math.max(1, options.poolSize ?? pool.WORKER_POOL_SIZE);
  const writer = options.writer ?? new ReportWriter();
  const limit = pLimit(poolSize);

  log.info({ total, poolSize, source: source.kind, output: writer.outputPath }, 'Processing domains');

  const tasks = domains.map((domain) =>
    limit(async () => {
      let ok = true;
      try {
        await runDomain(domain, {
          runner: options.runner,
          writer,
          proxy: options.proxy,
          verbose: options.verbose,
          echo: options.echo,
          onReport: (report) => summary.reports.push(report),
        });
      } catch (error) {
        ok = false;
        summary.failed += 1;
        log.error({ domain, err: error }, `Processing failed for ${domain}`);
      }
      summary.completed += 1;
      options.onProgress?.({ completed: summary.completed, total, domain, ok });
    })
  );

  await Promise.all(tasks);

  log.info({ total, failed: summary.failed }, 'All domains processed');
  return summary;
}
