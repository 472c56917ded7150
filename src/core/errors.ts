/**
 * Structured error codes for the recon pipeline
 *
 * Error code format: CATEGORY_SPECIFIC_ERROR
 * Categories:
 * - SETUP: Required tooling missing before any domain runs (fatal)
 * - TOOL: External tool invocation failed for one domain (degraded)
 * - OUTPUT: Result file could not be written (fails that domain's append)
 * - INPUT: Raw input could not be turned into domains
 */

export const ErrorCode = {
  // Setup (fatal, exit 1)
  SETUP_TOOL_MISSING: 'SETUP_TOOL_MISSING',
  SETUP_INSTALL_FAILED: 'SETUP_INSTALL_FAILED',

  // Tool (recovered per domain)
  TOOL_SPAWN_FAILED: 'TOOL_SPAWN_FAILED',
  TOOL_NONZERO_EXIT: 'TOOL_NONZERO_EXIT',
  TOOL_BAD_OUTPUT: 'TOOL_BAD_OUTPUT',

  // Output
  OUTPUT_WRITE_FAILED: 'OUTPUT_WRITE_FAILED',

  // Input
  INPUT_READ_FAILED: 'INPUT_READ_FAILED',
} as const;

export type ErrorCodeType = typeof ErrorCode[keyof typeof ErrorCode];

export class ReconError extends Error {
  readonly code: ErrorCodeType;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCodeType,
    message: string,
    options?: { details?: Record<string, unknown>; cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ReconError';
    this.code = code;
    this.details = options?.details;
  }
}

export function isReconError(error: unknown): error is ReconError {
  return error instanceof ReconError;
}

/**
 * Common errors
 */
export const Errors = {
  toolMissing: (tool: string) =>
    new ReconError(ErrorCode.SETUP_TOOL_MISSING, `${tool} is not installed. Please install ${tool} manually and try again.`, {
      details: { tool },
    }),

  installFailed: (tool: string, cause: unknown) =>
    new ReconError(ErrorCode.SETUP_INSTALL_FAILED, `Failed to install ${tool}: ${errorMessage(cause)}`, {
      details: { tool },
      cause,
    }),

  spawnFailed: (command: string, cause: unknown) =>
    new ReconError(ErrorCode.TOOL_SPAWN_FAILED, `Could not run ${command}: ${errorMessage(cause)}`, {
      details: { command },
      cause,
    }),

  nonZeroExit: (command: string, exitCode: number, stderr: string) =>
    new ReconError(ErrorCode.TOOL_NONZERO_EXIT, `${command} exited with code ${exitCode}`, {
      details: { command, exitCode, stderr: stderr.slice(0, 500) },
    }),

  badOutput: (command: string, output: string) =>
    new ReconError(ErrorCode.TOOL_BAD_OUTPUT, `${command} returned unparseable output`, {
      details: { command, output: output.slice(0, 200) },
    }),

  outputWriteFailed: (path: string, cause: unknown) =>
    new ReconError(ErrorCode.OUTPUT_WRITE_FAILED, `Could not append to ${path}: ${errorMessage(cause)}`, {
      details: { path },
      cause,
    }),

  inputReadFailed: (path: string, cause: unknown) =>
    new ReconError(ErrorCode.INPUT_READ_FAILED, `Could not read input file ${path}: ${errorMessage(cause)}`, {
      details: { path },
      cause,
    }),
} as const;

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
