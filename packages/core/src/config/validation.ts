/**
 * Configuration Validation
 *
 * Validates options before a factory is initialized.
 *
 * @module config/validation
 */

import { ConfigurationError } from '../domain/errors.js';
import type { ErrorStrategy } from '../utils/error-handler.js';
import type { IdbOptions } from './types.js';

const LISTENER_ERROR_STRATEGIES: ReadonlySet<string> = new Set<ErrorStrategy>(['log', 'ignore']);

/**
 * Validates user options
 *
 * @throws {ConfigurationError} If a finish marker has an empty pattern or the strategy is unknown
 */
export const validateIdbOptions = (options: IdbOptions): void => {
  for (const marker of options.extraFinishMarkers ?? []) {
    const pattern = marker.kind === 'message-suffix' ? marker.suffix : marker.name;
    if (pattern.trim() === '') {
      throw new ConfigurationError(
        `Configuration error: finish marker of kind '${marker.kind}' must have a non-empty pattern.`,
      );
    }
  }

  if (options.listenerErrors !== undefined && !LISTENER_ERROR_STRATEGIES.has(options.listenerErrors)) {
    throw new ConfigurationError(
      `Configuration error: unknown listenerErrors strategy '${String(options.listenerErrors)}'. Expected 'log' or 'ignore'.`,
    );
  }
};

