/**
 * Logger Utility
 *
 * Process-wide pino logger plus the operation helpers shared by the
 * repository and the API routes.
 */

import pino, { type BaseLogger, type Logger } from 'pino';
import { resolveLogLevel, type LogLevel } from '../config';
import { describeError, isRepositoryError, toErrorPayload } from '../db/repositories/errors';

export type { Logger };

export interface LogContext {
  [key: string]: unknown;
}

/**
 * Anything pino-shaped: the root logger, a child logger or `fastify.log`
 */
export type OperationLogger = Pick<BaseLogger, 'info' | 'warn' | 'error' | 'debug'>;

export interface LoggingOptions {
  level?: LogLevel;
}

let rootLogger: Logger | null = null;

/**
 * Set up the process-wide logger. Safe to call any number of times; only the
 * first call creates the logger, later calls return the same instance.
 * Without an explicit level only `LOG_LEVEL` is read.
 */
export function initializeLogging(options: LoggingOptions = {}): Logger {
  if (rootLogger) {
    return rootLogger;
  }

  rootLogger = pino({
    name: 'exercise-log',
    level: options.level ?? resolveLogLevel(),
    timestamp: pino.stdTimeFunctions.isoTime,
  });
  rootLogger.info('🏋️ Exercise library logging initialized');

  return rootLogger;
}

function withDuration(operation: string, context: LogContext, durationMs?: number): LogContext {
  return durationMs === undefined
    ? { operation, ...context }
    : { operation, ...context, durationMs };
}

/**
 * Log the start of an operation
 */
export function logOperation(
  log: OperationLogger,
  operation: string,
  context: LogContext = {}
): void {
  log.debug({ operation, ...context }, `▶ ${operation}`);
}

/**
 * Log a successful operation completion
 */
export function logSuccess(
  log: OperationLogger,
  operation: string,
  context: LogContext = {},
  durationMs?: number
): void {
  const message = durationMs !== undefined
    ? `✅ ${operation} (${durationMs}ms)`
    : `✅ ${operation}`;

  log.info(withDuration(operation, context, durationMs), message);
}

/**
 * Log a failed operation. Repository errors are logged with their payload;
 * a missing exercise is an expected outcome and goes to `warn`.
 */
export function logFailure(
  log: OperationLogger,
  operation: string,
  error: unknown,
  context: LogContext = {},
  durationMs?: number
): void {
  const fields = withDuration(operation, context, durationMs);

  if (!isRepositoryError(error)) {
    const message = describeError(error);
    log.error({ ...fields, error: { type: 'Unexpected', message } }, `❌ ${operation}: ${message}`);
    return;
  }

  if (error.kind === 'ExerciseNotFound') {
    log.warn({ ...fields, error: toErrorPayload(error) }, `⚠️ ${operation}: ${error.message}`);
    return;
  }

  log.error({ ...fields, error: toErrorPayload(error) }, `❌ ${operation}: ${error.message}`);
}
