import {
  SourceQueryError,
  SourceUnavailableError,
  ValidationError,
  createLogger,
  toError,
  type Logger,
  type SourceConnection,
  type SourceResult,
} from '@clinigraph/core';
import { sourceColumnsOf, type EntityType, type RawSourceRow } from '@clinigraph/types';

/**
 * Warehouse view (or table) behind each entity type
 */
export const SOURCE_VIEWS: Record<EntityType, string> = {
  Provider: 'V_PROVIDERS',
  Patient: 'V_PATIENTS',
  Encounter: 'V_ENCOUNTERS',
  Condition: 'V_CONDITIONS',
  Medication: 'V_MEDICATIONS',
  Observation: 'OBSERVATIONS',
};

export const DEFAULT_MAX_ROWS = 7000;

export interface ExtractorOptions {
  /** Qualifier such as `MEDIGRAPH.PUBLIC` */
  namespace?: string;
  logger?: Logger;
}

/**
 * Build the bounded select for one entity type.
 * Observations come oldest first and only with an id.
 */
export function buildExtractStatement(
  entityType: EntityType,
  maxRows: number,
  namespace?: string
): string {
  const view = namespace ? `${namespace}.${SOURCE_VIEWS[entityType]}` : SOURCE_VIEWS[entityType];
  const filter =
    entityType === 'Observation' ? ' WHERE OBSERVATION_ID IS NOT NULL ORDER BY OBS_DATETIME' : '';

  return `SELECT ${sourceColumnsOf(entityType).join(', ')} FROM ${view}${filter} LIMIT ${maxRows}`;
}

function upperCaseKeys(row: RawSourceRow): RawSourceRow {
  const result: RawSourceRow = {};
  for (const [key, value] of Object.entries(row)) {
    result[key.toUpperCase()] = value;
  }
  return result;
}

/**
 * Reads bounded batches of raw rows from the source. Read-only.
 */
export class Extractor {
  private readonly logger: Logger;

  constructor(
    private readonly source: SourceConnection,
    private readonly options: ExtractorOptions = {}
  ) {
    this.logger = options.logger ?? createLogger({ name: 'extractor' });
  }

  async fetch(entityType: EntityType, maxRows: number = DEFAULT_MAX_ROWS): Promise<RawSourceRow[]> {
    if (!Number.isInteger(maxRows) || maxRows < 1) {
      throw new ValidationError(`maxRows must be a positive integer, got ${maxRows}`);
    }

    const sql = buildExtractStatement(entityType, maxRows, this.options.namespace);

    let result: SourceResult;
    try {
      result = await this.source.query(sql);
    } catch (error) {
      if (error instanceof SourceUnavailableError) throw error;
      const cause = toError(error);
      throw new SourceQueryError(entityType, cause.message, [], cause);
    }

    const returned = new Set(result.columns.map((column) => column.toUpperCase()));
    const missing = sourceColumnsOf(entityType).filter((column) => !returned.has(column));
    if (missing.length > 0) {
      throw new SourceQueryError(entityType, `missing columns ${missing.join(', ')}`, missing);
    }

    this.logger.info(
      { entityType, rows: result.rows.length, maxRows },
      `Source returned ${result.rows.length} ${entityType} rows (capped at ${maxRows})`
    );

    return result.rows.map(upperCaseKeys);
  }
}
