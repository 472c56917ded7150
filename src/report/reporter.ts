/*
 * =============================================================================
 * MODULE: reporter.ts
 * =============================================================================
 * Per-domain result rendering. Console output is ANSI-colored, file output is
 * plain text appended to a file shared by every worker.
 * =============================================================================
 */

import { appendFile } from 'node:fs/promises';
import { Mutex } from 'async-mutex';
import { Errors } from '../core/errors.js';
import { createModuleLogger } from '../core/logger.js';
import { interestingPatterns, type PatternCounts } from '../modules/patternScanner.js';

const log = createModuleLogger('reporter');

export interface DomainReport {
  readonly domain: string;
  readonly archiveCount: number;
  readonly httpStatus: number | null;
  readonly patternCounts: Readonly<PatternCounts>;
}

// ───────────────── Styling ─────────────────────────────────────────────────
const ANSI = {
  bold: '\u001b[1m',
  green: '\u001b[92m',
  yellow: '\u001b[93m',
  red: '\u001b[91m',
  reset: '\u001b[0m',
} as const;

const ARCHIVE_HIGHLIGHT_MIN = 5;
const ARCHIVE_HIGHLIGHT_MAX = 9999;

const REDIRECT_OR_MISSING = new Set([301, 302, 404]);
const CLIENT_OR_SERVER_ERROR = new Set([400, 401, 403, 503]);

export type ArchiveCountTier = 'highlight' | 'plain';
export type HttpStatusTier = 'success' | 'redirect' | 'error' | 'plain';

export function archiveCountTier(count: number): ArchiveCountTier {
  return count >= ARCHIVE_HIGHLIGHT_MIN && count <= ARCHIVE_HIGHLIGHT_MAX ? 'highlight' : 'plain';
}

export function httpStatusTier(status: number | null): HttpStatusTier {
  if (status === 200) return 'success';
  if (status !== null && REDIRECT_OR_MISSING.has(status)) return 'redirect';
  if (status !== null && CLIENT_OR_SERVER_ERROR.has(status)) return 'error';
  return 'plain';
}

const STATUS_COLORS: Record<HttpStatusTier, string | null> = {
  success: ANSI.green,
  redirect: ANSI.yellow,
  error: ANSI.red,
  plain: null,
};

function paint(text: string, color: string | null): string {
  return color ? `${color}${text}${ANSI.reset}` : text;
}

export function formatStatus(status: number | null): string {
  return status === null ? 'None' : String(status);
}

// ───────────────── Formatting ──────────────────────────────────────────────
export const INTERESTING_HEADING = 'Wayback URLs with Interesting Directories or Parameters:';

function patternLines(counts: PatternCounts): string[] {
  return interestingPatterns(counts).map(([pattern, count]) => ` - ${pattern} URLs: [${count}]`);
}

export function formatConsoleReport(report: DomainReport): string {
  const domain = paint(report.domain, ANSI.bold);
  const count = paint(
    String(report.archiveCount),
    archiveCountTier(report.archiveCount) === 'highlight' ? ANSI.green : null
  );
  const status = paint(formatStatus(report.httpStatus), STATUS_COLORS[httpStatusTier(report.httpStatus)]);

  return [
    `${domain} | Wayback URLs: ${count} | HTTP Status Code: ${status}`,
    INTERESTING_HEADING,
    ...patternLines(report.patternCounts),
  ].join('\n');
}

/** Newline-terminated plain-text block, one per domain */
export function formatFileReport(report: DomainReport): string {
  const lines = [
    `${report.domain} | Wayback URLs: ${report.archiveCount} | HTTP Status Code: ${formatStatus(report.httpStatus)}`,
    ...patternLines(report.patternCounts),
  ];
  return `${lines.join('\n')}\n`;
}

// ───────────────── Output ──────────────────────────────────────────────────
export interface ReportWriterOptions {
  outputPath?: string;
  print?: (block: string) => void;
}

/**
 * Emits each report to the console and, when configured, appends it to the
 * output file. Appends are serialized so blocks from concurrent workers
 * never interleave.
 */
export class ReportWriter {
  private readonly fileLock = new Mutex();
  private readonly print: (block: string) => void;
  readonly outputPath?: string;

  constructor(options: ReportWriterOptions = {}) {
    this.outputPath = options.outputPath;
    this.print = options.print ?? ((block) => console.log(block));
  }

  async write(report: DomainReport): Promise<void> {
    this.print(formatConsoleReport(report));
    if (this.outputPath) {
      await this.append(this.outputPath, formatFileReport(report));
    }
  }

  private async append(path: string, block: string): Promise<void> {
    await this.fileLock.runExclusive(async () => {
      try {
        await appendFile(path, block, { encoding: 'utf8', flag: 'a' });
      } catch (error) {
        log.error({ path, err: error }, 'Failed to append report');
        throw Errors.outputWriteFailed(path, error);
      }
    });
  }
}
