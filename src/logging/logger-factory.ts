/**
 * Logger Factory
 *
 * Creates service-specific Pino child loggers with consistent patterns.
 * Provides utility functions for common logging scenarios.
 */

import type pino from 'pino';
import { logger as baseLogger } from './logger.js';

/**
 * Service logger
 * Pino logger bound to a service context
 */
export type ServiceLogger = pino.Logger;

/**
 * Create a service-specific logger with structured context
 *
 * @param serviceName - Name of the service (e.g., 'BondAnalyticsService')
 *
 * @example
 * ```typescript
 * const logger = createServiceLogger('BondAnalyticsService');
 * logger.info('Analyzing bond');
 * // Output: {"level":"info","service":"BondAnalyticsService","msg":"Analyzing bond"}
 * ```
 */
export function createServiceLogger(serviceName: string): ServiceLogger {
  return baseLogger.child({
    service: serviceName,
  });
}

/**
 * Common logging patterns for services
 *
 * Use these patterns to keep a uniform log format across services.
 */
export const LogPatterns = {
  /**
   * Log service method entry (debug level)
   *
   * @example
   * ```typescript
   * LogPatterns.methodEntry(logger, 'analyze', { frequency: 2 });
   * // Output: {"level":"debug","service":"...","method":"analyze","params":{"frequency":2},"msg":"Entering analyze"}
   * ```
   */
  methodEntry: (
    logger: ServiceLogger,
    method: string,
    params: Record<string, unknown> = {}
  ) => {
    logger.debug({ method, params }, `Entering ${method}`);
  },

  /**
   * Log service method exit (debug level)
   *
   * @param result - Optional result summary (avoid logging large objects)
   */
  methodExit: (
    logger: ServiceLogger,
    method: string,
    result?: Record<string, unknown>
  ) => {
    logger.debug({ method, result }, `Exiting ${method}`);
  },

  /**
   * Log service method error (error level)
   *
   * @example
   * ```typescript
   * LogPatterns.methodError(logger, 'yieldFromPrice', error, { marketPrice: -5 });
   * // Output: {"level":"error","service":"...","method":"yieldFromPrice","error":"...","errorName":"InvalidPriceError","marketPrice":-5,"msg":"Error in yieldFromPrice"}
   * ```
   */
  methodError: (
    logger: ServiceLogger,
    method: string,
    error: Error,
    context: Record<string, unknown> = {}
  ) => {
    logger.error(
      {
        method,
        error: error.message,
        errorName: error.name,
        stack: error.stack,
        ...context,
      },
      `Error in ${method}`
    );
  },

  /**
   * Log a completed numerical calculation (debug level)
   *
   * @param calculation - Calculation name (e.g., 'yieldToMaturity')
   * @param details - Inputs and outputs worth keeping (iterations, results)
   *
   * @example
   * ```typescript
   * LogPatterns.calculation(logger, 'yieldToMaturity', { iterations: 4, annualYield: 0.0566 });
   * // Output: {"level":"debug","service":"...","calculation":"yieldToMaturity","details":{...},"msg":"Calculated yieldToMaturity"}
   * ```
   */
  calculation: (
    logger: ServiceLogger,
    calculation: string,
    details: Record<string, unknown> = {}
  ) => {
    logger.debug({ calculation, details }, `Calculated ${calculation}`);
  },
};

/**
 * Alias for LogPatterns for more concise usage
 *
 * @example
 * ```typescript
 * import { log } from 'bond-analytics-services';
 *
 * log.methodEntry(logger, 'myMethod', { param: 'value' });
 * log.methodExit(logger, 'myMethod');
 * ```
 */
export const log = LogPatterns;
