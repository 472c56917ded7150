/**
 * Centralized environment configuration for the recon pipeline
 *
 * All environment variables should be accessed through this module to ensure:
 * - Type safety with proper parsing
 * - Sensible defaults
 * - Single source of truth
 */

// =============================================================================
// Helper Functions
// =============================================================================

function parseIntEnv(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function parseStringEnv(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

// =============================================================================
// Runtime Environment
// =============================================================================

export const env = {
  /** Current environment: 'production' | 'development' | 'test' */
  NODE_ENV: parseStringEnv('NODE_ENV', 'development'),
  /** Is production environment */
  isProduction: process.env.NODE_ENV === 'production',
  /** Is test environment */
  isTest: process.env.NODE_ENV === 'test',
  /** Log level: 'debug' | 'info' | 'warn' | 'error' | 'silent' */
  LOG_LEVEL: parseStringEnv('LOG_LEVEL', 'info').toLowerCase(),
} as const;

// =============================================================================
// Worker Pool
// =============================================================================

export const pool = {
  /** Domains processed concurrently. Two subprocesses run per domain at peak. */
  WORKER_POOL_SIZE: Math.max(1, parseIntEnv('WORKER_POOL_SIZE', 10)),
} as const;

// =============================================================================
// External Tools
// =============================================================================

export const tools = {
  /** Archive lookup executable, takes a domain and prints one URL per line */
  ARCHIVE_TOOL: parseStringEnv('ARCHIVE_TOOL', 'waybackurls'),
  /** HTTP fetch executable, curl-compatible flags */
  HTTP_TOOL: parseStringEnv('HTTP_TOOL', 'curl'),
  /** Install command for the archive tool when it is missing from PATH */
  ARCHIVE_TOOL_INSTALL: parseStringEnv('ARCHIVE_TOOL_INSTALL', 'go install github.com/tomnomnom/waybackurls@latest'),
  /** Max captured stdout per subprocess; large domains yield hundreds of MB of URLs */
  MAX_OUTPUT_BYTES: parseIntEnv('MAX_OUTPUT_BYTES', 256 * 1024 * 1024),
} as const;
