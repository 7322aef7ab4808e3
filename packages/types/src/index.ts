/**
 * Clinigraph Types Package
 *
 * Zod schemas and inferred types shared by the sync pipeline, the question
 * router and the HTTP surface.
 *
 * @module @clinigraph/types
 */

export * from './graph.schema.js';
export * from './source-rows.schema.js';
export * from './question.schema.js';
export * from './sync.schema.js';
