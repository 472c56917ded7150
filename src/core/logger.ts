import pino, { type Logger, type LoggerOptions } from 'pino';
import { env } from './env.js';

// Pretty output for interactive runs; JSON lines in production.
// Everything goes to stderr so stdout carries only the domain reports.
const usePretty = !env.isProduction && !env.isTest;

const baseOptions: LoggerOptions = {
  level: env.LOG_LEVEL,
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: {
    service: 'wayback-recon',
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: ['*.password', '*.apiKey', '*.token', '*.secret', '*.proxyAuth'],
    censor: '[REDACTED]',
  },
};

// Create base logger
export const logger: Logger = usePretty
  ? pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname,service',
          singleLine: false,
          destination: 2,
        },
      },
    })
  : pino(baseOptions, pino.destination(2));

// Child logger factory for modules
export function createModuleLogger(module: string): Logger {
  return logger.child({ module });
}
