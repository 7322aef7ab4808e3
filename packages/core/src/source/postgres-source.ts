import pg from 'pg';

import { SourceUnavailableError, toError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { toSourceError } from './connection-errors.js';
import type { SourceConnection, SourceResult } from './types.js';

/**
 * Postgres-compatible warehouse source
 */
export class PostgresSourceConnection implements SourceConnection {
  readonly driver = 'postgres';
  private readonly logger: Logger;

  private constructor(private readonly client: pg.Client) {
    this.logger = createLogger({ name: 'source-postgres' });
  }

  static async connect(connectionString: string): Promise<PostgresSourceConnection> {
    const isTest = process.env.NODE_ENV === 'test';
    const client = new pg.Client({
      connectionString,
      ssl: isTest || process.env.SOURCE_SSL === 'false' ? undefined : { rejectUnauthorized: false },
      connectionTimeoutMillis: 10000,
    });

    try {
      await client.connect();
    } catch (error) {
      throw new SourceUnavailableError('Could not connect to the Postgres source', toError(error));
    }

    const connection = new PostgresSourceConnection(client);
    connection.logger.info('Source connection opened');
    return connection;
  }

  async query(sql: string): Promise<SourceResult> {
    try {
      const result = await this.client.query<Record<string, unknown>>(sql);
      return {
        columns: result.fields.map((field) => field.name),
        rows: result.rows,
      };
    } catch (error) {
      throw toSourceError(error, 'Postgres');
    }
  }

  async close(): Promise<void> {
    await this.client.end();
    this.logger.info('Source connection closed');
  }
}
