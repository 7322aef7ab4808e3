/**
 * @fileoverview Domain Package Exports
 *
 * - **Sync**: Extractor, LoadStateGate, GraphLoader and the ordered `runGraphSync` driver
 * - **Questions**: QueryRouter intent table, ResultProjector, translated questions
 *
 * @module @clinigraph/domain
 *
 * @example
 * ```typescript
 * import { QueryRouter } from '@clinigraph/domain';
 *
 * const answer = await new QueryRouter(graph).answer('show patients with diabetes');
 * ```
 */

export * from './sync/index.js';
export * from './questions/index.js';
