/**
 * Environment variable type definitions
 */

declare global {
  namespace NodeJS {
    interface ProcessEnv {
      NODE_ENV?: 'development' | 'production' | 'test';
      LOG_LEVEL?: string;

      // Worker pool
      WORKER_POOL_SIZE?: string;

      // External tools
      ARCHIVE_TOOL?: string;
      ARCHIVE_TOOL_INSTALL?: string;
      HTTP_TOOL?: string;
      MAX_OUTPUT_BYTES?: string;
    }
  }
}

export {};
