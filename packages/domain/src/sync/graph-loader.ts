import { ZodError } from 'zod';

import { RowUpsertError, createLogger, toError, type GraphStore, type Logger } from '@clinigraph/core';
import type { EntityType, RawSourceRow } from '@clinigraph/types';

import { planRow } from './upsert-plans.js';

export const PROGRESS_INTERVAL = 500;

export interface BatchLoadResult {
  /** Rows written */
  processed: number;
  /** Rows without a natural key */
  skipped: number;
}

function describeFailure(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues
      .map((issue) => `${issue.path.join('.') || 'row'}: ${issue.message}`)
      .join('; ');
  }
  return toError(error).message;
}

/**
 * Idempotent, row-at-a-time upsert of one entity type's batch.
 * Each row commits on its own; the first failing row stops the batch.
 */
export class GraphLoader {
  private readonly logger: Logger;

  constructor(
    private readonly graph: GraphStore,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger({ name: 'graph-loader' });
  }

  async upsert(entityType: EntityType, rows: readonly RawSourceRow[]): Promise<number> {
    return (await this.load(entityType, rows)).processed;
  }

  async load(entityType: EntityType, rows: readonly RawSourceRow[]): Promise<BatchLoadResult> {
    const total = rows.length;
    let processed = 0;
    let skipped = 0;

    for (const [index, raw] of rows.entries()) {
      try {
        const planned = planRow(entityType, raw);
        if (planned.kind === 'skip') {
          skipped++;
          this.logger.debug({ entityType, rowIndex: index }, planned.reason);
        } else {
          await this.graph.applyUpsertPlan(planned.plan);
          processed++;
        }
      } catch (error) {
        throw new RowUpsertError(
          entityType,
          index,
          processed,
          describeFailure(error),
          error instanceof Error ? error : undefined
        );
      }

      const position = index + 1;
      if (position % PROGRESS_INTERVAL === 0 || position === total) {
        this.logger.info(
          { entityType, position, total },
          `${entityType}s loaded: ${position}/${total}`
        );
      }
    }

    this.logger.info(
      { entityType, processed, skipped },
      `Finished loading ${processed} ${entityType} records`
    );
    return { processed, skipped };
  }
}
