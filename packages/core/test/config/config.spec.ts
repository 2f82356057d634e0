/**
 * Configuration Tests
 */

import { describe, expect, it, vi } from 'vitest';
import { ConfigurationError, type ErrorStrategy, resolveIdbConfig, validateIdbOptions } from '../../src/index.js';

describe('validateIdbOptions', () => {
  it('should accept empty options', () => {
    expect(() => validateIdbOptions({})).not.toThrow();
  });

  it('should reject a finish marker with an empty pattern', () => {
    expect(() =>
      validateIdbOptions({
        extraFinishMarkers: [{ kind: 'message-suffix', reason: 'transaction-finished', suffix: '  ' }],
      }),
    ).toThrow("Configuration error: finish marker of kind 'message-suffix' must have a non-empty pattern.");
  });

  it('should reject an unknown listener error strategy', () => {
    const options = { listenerErrors: 'throw' as unknown as ErrorStrategy };

    expect(() => validateIdbOptions(options)).toThrow(ConfigurationError);
    expect(() => validateIdbOptions(options)).toThrow(
      "Configuration error: unknown listenerErrors strategy 'throw'. Expected 'log' or 'ignore'.",
    );
  });
});

describe('resolveIdbConfig', () => {
  it('should resolve a frozen config', () => {
    const config = resolveIdbConfig();

    expect(Object.isFrozen(config)).toBe(true);
  });

  it('should build the classifier from the extra markers', () => {
    // Arrange
    const config = resolveIdbConfig({
      extraFinishMarkers: [{ kind: 'error-name', reason: 'transaction-finished', name: 'TransactionInactiveError' }],
    });

    // Act
    const reason = config.classify(new DOMException('inactive', 'TransactionInactiveError'));

    // Assert
    expect(reason).toBe('transaction-finished');
  });

  it('should route listener errors to the custom reporter', () => {
    // Arrange
    const onListenerError = vi.fn();
    const consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const config = resolveIdbConfig({ listenerErrors: 'ignore', onListenerError });
    const error = new Error('listener broke');

    // Act
    config.reportListenerError(error, 'request listener');

    // Assert
    expect(onListenerError).toHaveBeenCalledWith(error, 'request listener');
    expect(consoleErrorSpy).not.toHaveBeenCalled();

    consoleErrorSpy.mockRestore();
  });
});
