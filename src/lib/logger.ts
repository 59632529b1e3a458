// Path: src/lib/logger.ts
// Centralized Pino logger for cfgvault

import pino from 'pino';
import fs from 'node:fs';
import path from 'node:path';
import { createRequire } from 'node:module';

const require = createRequire(import.meta.url);

const isDev = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';
const logFile = process.env.LOG_FILE;

/**
 * Create file stream for logging if LOG_FILE is set
 */
function createFileStream(): pino.DestinationStream | undefined {
  if (!logFile) return undefined;

  const logDir = path.dirname(logFile);
  if (!fs.existsSync(logDir)) {
    try {
      fs.mkdirSync(logDir, { recursive: true, mode: 0o700 });
    } catch {
      // Can't create log directory, skip file logging
      return undefined;
    }
  }

  try {
    return pino.destination({
      dest: logFile,
      sync: true,
      mkdir: true,
    });
  } catch {
    return undefined;
  }
}

// Cache the result
let pinoPrettyAvailable: boolean | null = null;

/**
 * Pretty transport for interactive development, when pino-pretty is installed
 */
function createTransport(): pino.TransportSingleOptions | undefined {
  if (!isDev || logFile) {
    return undefined;
  }

  if (pinoPrettyAvailable === null) {
    try {
      require.resolve('pino-pretty');
      pinoPrettyAvailable = true;
    } catch {
      pinoPrettyAvailable = false;
    }
  }

  if (!pinoPrettyAvailable) {
    return undefined;
  }

  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname,service',
      destination: 2,
    },
  };
}

const transport = createTransport();

/**
 * Base logger instance
 *
 * Logs go to stderr (or LOG_FILE) so that command output on stdout can be
 * piped, e.g. `eval "$(cfgvault export-env db)"`.
 *
 * Configure via environment variables:
 * - LOG_LEVEL: trace, debug, info, warn, error, fatal, silent (default: warn)
 * - LOG_FILE: Path to log file
 */
export const logger = pino(
  {
    level: process.env.LOG_LEVEL ?? 'warn',
    transport,
    base: {
      service: 'cfgvault',
      pid: process.pid,
    },
    redact: {
      paths: [
        'password',
        'newPassword',
        'secret',
        'token',
        'data.password',
        '*.password',
      ],
      censor: '[REDACTED]',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  transport ? undefined : (createFileStream() ?? pino.destination(2))
);

/**
 * Create a child logger with additional context
 *
 * @example
 * const log = createLogger({ module: 'store' });
 * log.info({ name: 'db' }, 'Added config');
 */
export function createLogger(context: Record<string, unknown>): pino.Logger {
  return logger.child(context);
}

// Pre-configured module loggers
export const storeLogger = createLogger({ module: 'store' });
export const cryptLogger = createLogger({ module: 'crypt' });
export const cliLogger = createLogger({ module: 'cli' });

export type Logger = pino.Logger;
