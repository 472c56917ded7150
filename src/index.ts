export { ExecFileRunner, type CommandRunner, type CommandResult } from './core/commandRunner.js';
export { ErrorCode, ReconError, isReconError, type ErrorCodeType } from './core/errors.js';
export { lookupArchivedUrls, splitArchiveOutput } from './modules/archiveLookup.js';
export { probeHttpStatus, buildProbeArgs, parseStatusCode } from './modules/reachabilityProbe.js';
export {
  SENSITIVE_PATTERNS,
  scanUrls,
  interestingPatterns,
  emptyPatternCounts,
  type PatternCounts,
  type SensitivePattern,
} from './modules/patternScanner.js';
export { ensureDependencies, locateTool, type RequiredTool } from './modules/preflight.js';
export {
  ReportWriter,
  formatConsoleReport,
  formatFileReport,
  archiveCountTier,
  httpStatusTier,
  type DomainReport,
} from './report/reporter.js';
export { runDomain } from './pipeline/domainPipeline.js';
export {
  classifyInput,
  resolveDomains,
  runRecon,
  type InputSource,
  type ReconOptions,
  type ReconSummary,
} from './pipeline/dispatcher.js';
