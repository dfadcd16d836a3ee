/**
 * Package-aware logging
 *
 * ```typescript
 * import { createPackageLogger } from '@rhodl-sync/utils';
 *
 * const logger = createPackageLogger('@rhodl-sync/storage');
 * logger.info('Cache written', { path });
 * ```
 */

import { Logger, createLogger } from '../logger.js';
import type { LogContext } from '../logger.js';

const packageLoggers = new Map<string, Logger>();

/**
 * Create or retrieve a package-specific logger
 */
export function createPackageLogger(packageName: string): Logger {
  const existing = packageLoggers.get(packageName);
  if (existing) {
    return existing;
  }

  const packageLogger = createLogger(packageName);
  packageLoggers.set(packageName, packageLogger);
  return packageLogger;
}

/**
 * Structured log helpers for the operations every run performs
 */
export class LogHelpers {
  static apiRequest(logger: Logger, method: string, url: string, context?: LogContext): void {
    logger.debug('API Request', { method, url, ...context });
  }

  static apiResponse(
    logger: Logger,
    method: string,
    url: string,
    statusCode: number,
    duration: number,
    context?: LogContext
  ): void {
    const level = statusCode >= 400 ? 'warn' : 'debug';
    logger[level]('API Response', { method, url, statusCode, duration, ...context });
  }

  static sheetCall(
    logger: Logger,
    operation: string,
    range: string,
    duration: number,
    context?: LogContext
  ): void {
    logger.debug('Sheets Call', { operation, range, duration, ...context });
  }
}
