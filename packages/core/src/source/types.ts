import type { RawSourceRow } from '@clinigraph/types';

/**
 * Tabular result of one source statement.
 * Column names are returned as the driver reports them.
 */
export interface SourceResult {
  columns: string[];
  rows: RawSourceRow[];
}

/**
 * Read-only connection to the relational source
 */
export interface SourceConnection {
  readonly driver: string;
  query(sql: string): Promise<SourceResult>;
  close(): Promise<void>;
}

export interface SourceConnectOptions {
  /** One-time passcode for multi-factor sign-in */
  passcode?: string;
}
