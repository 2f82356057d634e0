/**
 * Debug logging utilities using the `debug` package
 *
 * Enable logging by setting the DEBUG environment variable.
 *
 * @example Environment variable configuration
 * ```bash
 * # Enable all logs
 * DEBUG=durable-idb:* node app.js
 *
 * # Enable specific namespaces
 * DEBUG=durable-idb:retry npm test
 * DEBUG=durable-idb:durable,durable-idb:txn npm start
 * ```
 */

import type { Debugger } from 'debug';
import debug from 'debug';

/**
 * Debug logger for request listeners
 */
export const requestLog: Debugger = debug('durable-idb:request');

/**
 * Debug logger for cursor traversal
 */
export const cursorLog: Debugger = debug('durable-idb:cursor');

/**
 * Debug logger for transaction lifecycle
 */
export const txnLog: Debugger = debug('durable-idb:txn');

/**
 * Debug logger for the one-shot retry wrapper
 */
export const retryLog: Debugger = debug('durable-idb:retry');

/**
 * Debug logger for durable transactions
 */
export const durableLog: Debugger = debug('durable-idb:durable');

/**
 * Debug logger for database open/delete
 */
export const factoryLog: Debugger = debug('durable-idb:factory');
