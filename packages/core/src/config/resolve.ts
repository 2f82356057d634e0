/**
 * Configuration Resolution
 *
 * Options are validated and resolved once, when a factory is created,
 * and the resolved value is handed down to every wrapper it produces.
 *
 * @module config/resolve
 */

import { DEFAULTS } from '../constants.js';
import { createFinishClassifier } from '../domain/finish-markers.js';
import { createErrorHandler } from '../utils/error-handler.js';
import type { IdbOptions, ResolvedIdbConfig } from './types.js';
import { validateIdbOptions } from './validation.js';

/**
 * Validates and resolves user options
 */
export const resolveIdbConfig = (options: IdbOptions = {}): ResolvedIdbConfig => {
  validateIdbOptions(options);

  return Object.freeze({
    classify: createFinishClassifier(options.extraFinishMarkers),
    reportListenerError: createErrorHandler(
      options.listenerErrors ?? DEFAULTS.LISTENER_ERROR_STRATEGY,
      options.onListenerError,
    ),
  });
};
