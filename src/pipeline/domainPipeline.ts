import type { CommandRunner } from '../core/commandRunner.js';
import { createModuleLogger } from '../core/logger.js';
import { lookupArchivedUrls } from '../modules/archiveLookup.js';
import { scanUrls } from '../modules/patternScanner.js';
import { probeHttpStatus } from '../modules/reachabilityProbe.js';
import type { DomainReport, ReportWriter } from '../report/reporter.js';

const log = createModuleLogger('domainPipeline');

export interface DomainPipelineOptions {
  runner: CommandRunner;
  writer: ReportWriter;
  proxy?: string;
  verbose?: boolean;
  /** Sink for verbose raw output */
  echo?: (line: string) => void;
  /** Called with the finished report before it is written */
  onReport?: (report: DomainReport) => void;
}

/**
 * Archive lookup and status check for one domain, then scan and report.
 * Both tools degrade to empty/null on failure, so a report is always
 * produced and handed to onReport; only the writer can reject afterwards.
 */
export async function runDomain(domain: string, options: DomainPipelineOptions): Promise<DomainReport> {
  const startTime = Date.now();
  const { runner, proxy, verbose, echo } = options;

  // No data dependency between the two tools
  const [urls, httpStatus] = await Promise.all([
    lookupArchivedUrls(domain, { runner, verbose, echo }),
    probeHttpStatus(domain, { runner, proxy, verbose, echo }),
  ]);

  const report: DomainReport = Object.freeze({
    domain,
    archiveCount: urls.length,
    httpStatus,
    patternCounts: Object.freeze(scanUrls(urls)),
  });

  options.onReport?.(report);
  await options.writer.write(report);

  log.debug(
    { domain, archiveCount: report.archiveCount, httpStatus, durationMs: Date.now() - startTime },
    'Domain processed'
  );
  return report;
}
