import type { SourceConfig } from '../env.js';
import { PostgresSourceConnection } from './postgres-source.js';
import { SnowflakeSourceConnection } from './snowflake-source.js';
import type { SourceConnectOptions, SourceConnection } from './types.js';

export type { SourceConnection, SourceConnectOptions, SourceResult } from './types.js';
export { isSourceConnectionError, toSourceError } from './connection-errors.js';
export { PostgresSourceConnection } from './postgres-source.js';
export { SnowflakeSourceConnection } from './snowflake-source.js';

/**
 * Open a connection for the configured source driver
 */
export async function createSourceConnection(
  config: SourceConfig,
  options: SourceConnectOptions = {}
): Promise<SourceConnection> {
  switch (config.driver) {
    case 'snowflake':
      return SnowflakeSourceConnection.connect(config, options.passcode);
    case 'postgres':
      return PostgresSourceConnection.connect(config.connectionString);
  }
}

/**
 * Run `fn` with an open source connection, closing it on every exit path
 *
 * @example
 * ```typescript
 * const rows = await withSourceConnection(() => createSourceConnection(config.source), (source) =>
 *   new Extractor(source).fetch('Patient', 100)
 * );
 * ```
 */
export async function withSourceConnection<T>(
  open: () => Promise<SourceConnection>,
  fn: (source: SourceConnection) => Promise<T>
): Promise<T> {
  const source = await open();
  try {
    return await fn(source);
  } finally {
    await source.close();
  }
}
