/**
 * Error reporting utilities for listener failures
 *
 * @module error-handler
 *
 * @remarks
 * Failures raised inside host event listeners must never reach the host event
 * loop, so reporters only observe: they log, forward, or stay silent.
 *
 * @example
 * ```typescript
 * // Log to console (default)
 * const report = createErrorHandler('log');
 *
 * // Silent
 * const quiet = createErrorHandler('ignore');
 * ```
 */

import { DEFAULTS } from '../constants.js';

/**
 * Error reporting strategy
 * - `log`: Log error to console
 * - `ignore`: Silent
 */
export type ErrorStrategy = 'log' | 'ignore';

export type ErrorHandler = (error: Error, context: string) => void;

/**
 * Safely executes a custom error handler
 *
 * @remarks
 * Wraps handler in try-catch to prevent handler errors from propagating
 */
const executeCustomHandler = (customHandler: ErrorHandler, error: Error, context: string): void => {
  try {
    customHandler(error, context);
  } catch (handlerError) {
    console.error(
      `${DEFAULTS.LOG_PREFIX} Error in custom error handler:`,
      handlerError instanceof Error ? handlerError.message : String(handlerError),
    );
  }
};

const logErrorToConsole = (error: Error, context: string): void => {
  console.error(`${DEFAULTS.LOG_PREFIX} Error in ${context}:`, error.message);
  if (error.stack) {
    console.error(error.stack);
  }
};

/**
 * Creates an error handler with the specified strategy
 *
 * @param strategy - Error reporting strategy (default: 'log')
 * @param customHandler - Optional custom handler to execute before applying strategy
 *
 * @example
 * ```typescript
 * const monitored = createErrorHandler('ignore', (error, context) => {
 *   monitoringService.captureError(error, { context });
 * });
 * ```
 */
export const createErrorHandler = (strategy: ErrorStrategy = 'log', customHandler?: ErrorHandler): ErrorHandler => {
  return (error: Error, context: string): void => {
    if (customHandler) {
      executeCustomHandler(customHandler, error, context);
    }

    switch (strategy) {
      case 'log':
        logErrorToConsole(error, context);
        break;

      case 'ignore':
        break;

      default: {
        const exhaustiveCheck: never = strategy;
        console.error(`${DEFAULTS.LOG_PREFIX} Unknown error strategy: ${exhaustiveCheck}`);
      }
    }
  };
};
