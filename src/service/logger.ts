/**
 * Logger Configuration
 *
 * Configures pino logger with environment-aware formatting:
 * - Production: JSON output for log aggregation
 * - Development: Pretty-printed colorized output for readability
 * - Test: silent unless LOG_LEVEL is set
 *
 * Usage:
 *   import { createComponentLogger } from './logger';
 *   const log = createComponentLogger('orchestrator');
 *   log.info({ proposalId }, 'Proposal created');
 */

import pino, { Logger, LoggerOptions } from 'pino';
import { loadRuntimeConfig } from './config';

// =============================================================================
// Configuration
// =============================================================================

const runtime = loadRuntimeConfig();

/**
 * Base logger options shared across environments
 */
const baseOptions: LoggerOptions = {
  level: runtime.logLevel,
  base: {
    pid: process.pid,
    env: runtime.nodeEnv,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  // Generated text and credentials never reach the logs
  redact: {
    paths: [
      'apiKey',
      'token',
      'secret',
      '*.apiKey',
      '*.token',
      '*.secret',
      'proposal.current_text',
      'proposal.proposed_text',
    ],
    remove: true,
  },
};

/**
 * Development-specific options with pretty printing
 */
const developmentOptions: LoggerOptions = {
  ...baseOptions,
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:HH:MM:ss.l',
      ignore: 'pid,hostname,env',
      messageFormat: '[{component}] {msg}',
      singleLine: false,
    },
  },
};

/**
 * Production options - JSON output for log aggregation
 */
const productionOptions: LoggerOptions = {
  ...baseOptions,
  formatters: {
    level: (label) => ({ level: label }),
    bindings: (bindings) => ({
      pid: bindings.pid,
      host: bindings.hostname,
      env: runtime.nodeEnv,
    }),
  },
};

// =============================================================================
// Logger Instance
// =============================================================================

/**
 * Root logger. Components should use a child from createComponentLogger.
 */
export const logger: Logger = pino(
  runtime.isDevelopment ? developmentOptions : productionOptions
);

/**
 * Create a child logger for a specific component/module
 *
 * @example
 * const auditLogger = createComponentLogger('audit');
 * auditLogger.info({ seq }, 'Audit record appended');
 */
export function createComponentLogger(component: string, bindings: Record<string, unknown> = {}): Logger {
  return logger.child({ component, ...bindings });
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Serialize an error for structured logging
 * Extracts useful properties from Error objects
 */
export function serializeError(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    const extras: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(err)) {
      if (!['name', 'message', 'stack'].includes(key)) {
        extras[key] = value;
      }
    }
    return {
      type: err.name,
      message: err.message,
      stack: runtime.isDevelopment ? err.stack : undefined,
      ...extras,
    };
  }
  return { message: String(err) };
}

/**
 * Log a fatal error and optionally exit
 * Use for unrecoverable errors during startup
 */
export function logFatal(err: unknown, message: string, exitCode = 1): void {
  logger.fatal({ err: serializeError(err) }, message);
  if (exitCode !== 0) {
    process.exit(exitCode);
  }
}

export default logger;
