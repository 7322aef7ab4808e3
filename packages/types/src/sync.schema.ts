import { z } from 'zod';

import { EntityTypeSchema } from './graph.schema.js';

/**
 * Sync run reporting schemas
 */

export const EntityLoadStatusSchema = z.enum(['loaded', 'skipped', 'failed']);

export const EntityLoadResultSchema = z.object({
  entityType: EntityTypeSchema,
  status: EntityLoadStatusSchema,
  /** Rows returned by the source */
  fetched: z.number().int().nonnegative(),
  /** Rows written to the graph */
  processed: z.number().int().nonnegative(),
  /** Rows without a natural key, never written */
  skippedRows: z.number().int().nonnegative(),
  /** Nodes already present when the gate skipped the type */
  existingNodes: z.number().int().nonnegative().optional(),
  error: z
    .object({
      code: z.string(),
      message: z.string(),
    })
    .optional(),
});

export const SyncRunSummarySchema = z.object({
  correlationId: z.string(),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  results: z.array(EntityLoadResultSchema),
  succeeded: z.boolean(),
});

export type EntityLoadStatus = z.infer<typeof EntityLoadStatusSchema>;
export type EntityLoadResult = z.infer<typeof EntityLoadResultSchema>;
export type SyncRunSummary = z.infer<typeof SyncRunSummarySchema>;
