import {
  RowUpsertError,
  SourceQueryError,
  createLogger,
  generateCorrelationId,
  withCorrelationId,
  type GraphStore,
  type Logger,
  type SourceConnection,
} from '@clinigraph/core';
import {
  ENTITY_LOAD_ORDER,
  type EntityLoadResult,
  type EntityType,
  type RawSourceRow,
  type SyncRunSummary,
} from '@clinigraph/types';

import { DEFAULT_MAX_ROWS, Extractor } from './extractor.js';
import { GraphLoader } from './graph-loader.js';
import { LoadStateGate } from './load-state-gate.js';

export interface GraphSyncOptions {
  source: SourceConnection;
  graph: GraphStore;
  maxRowsPerEntity?: number;
  namespace?: string;
  correlationId?: string;
  /** Defaults to the dependency order */
  entityTypes?: readonly EntityType[];
  logger?: Logger;
}

/**
 * Ordered relational-to-graph load.
 *
 * Per entity type: gate, extract, load. A SourceQueryError or RowUpsertError
 * fails that type only and the run moves on; connection failures end the run.
 */
export async function runGraphSync(options: GraphSyncOptions): Promise<SyncRunSummary> {
  const correlationId = options.correlationId ?? generateCorrelationId();
  const logger = withCorrelationId(
    options.logger ?? createLogger({ name: 'graph-sync' }),
    correlationId
  );
  const maxRows = options.maxRowsPerEntity ?? DEFAULT_MAX_ROWS;
  const gate = new LoadStateGate(options.graph, logger);
  const extractor = new Extractor(options.source, { namespace: options.namespace, logger });
  const loader = new GraphLoader(options.graph, logger);
  const startedAt = new Date().toISOString();
  const results: EntityLoadResult[] = [];

  logger.info({ maxRows }, 'Graph sync started');

  for (const entityType of options.entityTypes ?? ENTITY_LOAD_ORDER) {
    const decision = await gate.check(entityType);
    if (decision.skip) {
      results.push({
        entityType,
        status: 'skipped',
        fetched: 0,
        processed: 0,
        skippedRows: 0,
        existingNodes: decision.existingNodes,
      });
      continue;
    }

    let rows: RawSourceRow[] = [];
    try {
      rows = await extractor.fetch(entityType, maxRows);
      const batch = await loader.load(entityType, rows);
      results.push({
        entityType,
        status: 'loaded',
        fetched: rows.length,
        processed: batch.processed,
        skippedRows: batch.skipped,
      });
    } catch (error) {
      if (!(error instanceof SourceQueryError) && !(error instanceof RowUpsertError)) {
        throw error;
      }
      logger.error({ err: error, entityType }, `${entityType} load failed`);
      results.push({
        entityType,
        status: 'failed',
        fetched: rows.length,
        processed: error instanceof RowUpsertError ? error.processed : 0,
        skippedRows: 0,
        error: { code: error.code, message: error.message },
      });
    }
  }

  const succeeded = results.every((result) => result.status !== 'failed');
  logger.info(
    { succeeded, failed: results.filter((r) => r.status === 'failed').map((r) => r.entityType) },
    'Graph sync finished'
  );

  return {
    correlationId,
    startedAt,
    finishedAt: new Date().toISOString(),
    results,
    succeeded,
  };
}
