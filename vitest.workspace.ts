/**
 * Vitest Workspace Configuration
 *
 * One project per package, each with its own vitest.config.ts:
 * - core: bridge, cursor, transaction, retry and factory specs
 * - durable: durable transaction and store specs
 * - integration-tests: end-to-end scenarios across both packages
 *
 * Run one package: npx vitest --project=@durable-idb/core
 */

import { defineWorkspace } from 'vitest/config';

export default defineWorkspace(['packages/*']);
