/**
 * Configuration Module - Re-exports
 *
 * @module config
 */

export { resolveIdbConfig } from './resolve.js';
export type { IdbOptions, ResolvedIdbConfig } from './types.js';
export { validateIdbOptions } from './validation.js';
