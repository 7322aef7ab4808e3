import snowflake, { type Connection } from 'snowflake-sdk';

import type { SourceConfig } from '../env.js';
import { SourceUnavailableError, toError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { toSourceError } from './connection-errors.js';
import type { SourceConnection, SourceResult } from './types.js';

type SnowflakeSourceConfig = Extract<SourceConfig, { driver: 'snowflake' }>;

snowflake.configure({ logLevel: 'ERROR' });

/**
 * Snowflake warehouse source (username/password, optional MFA passcode)
 */
export class SnowflakeSourceConnection implements SourceConnection {
  readonly driver = 'snowflake';
  private readonly logger: Logger;

  private constructor(private readonly connection: Connection) {
    this.logger = createLogger({ name: 'source-snowflake' });
  }

  static async connect(
    config: SnowflakeSourceConfig,
    passcode?: string
  ): Promise<SnowflakeSourceConnection> {
    const options = {
      account: config.account,
      username: config.username,
      password: config.password,
      warehouse: config.warehouse,
      database: config.database,
      schema: config.schema,
      role: config.role,
      authenticator: passcode ? 'USERNAME_PASSWORD_MFA' : 'SNOWFLAKE',
      passcode,
    };
    const connection = snowflake.createConnection(options);

    await new Promise<void>((resolve, reject) => {
      connection.connect((err) => {
        if (err) {
          reject(new SourceUnavailableError('Could not connect to Snowflake', err));
          return;
        }
        resolve();
      });
    });

    const source = new SnowflakeSourceConnection(connection);
    source.logger.info({ account: config.account, database: config.database }, 'Source connection opened');
    return source;
  }

  query(sql: string): Promise<SourceResult> {
    return new Promise((resolve, reject) => {
      this.connection.execute({
        sqlText: sql,
        complete: (err, stmt, rows) => {
          if (err) {
            reject(toSourceError(err, 'Snowflake'));
            return;
          }
          resolve({
            columns: stmt.getColumns().map((column) => column.getName()),
            rows: rows ?? [],
          });
        },
      });
    });
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.connection.destroy((err) => {
        if (err) {
          reject(toError(err));
          return;
        }
        this.logger.info('Source connection closed');
        resolve();
      });
    });
  }
}
