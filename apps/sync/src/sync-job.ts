import {
  ConfigurationError,
  createGraphStore,
  createLogger,
  createSourceConnection,
  generateCorrelationId,
  loadSyncConfig,
  toSafeErrorResponse,
  withGraphStore,
  withSourceConnection,
  type EnvSource,
  type GraphConfig,
  type GraphStore,
  type Logger,
  type SourceConfig,
  type SourceConnectOptions,
  type SourceConnection,
  type SyncConfig,
} from '@clinigraph/core';
import { runGraphSync } from '@clinigraph/domain';
import type { EntityType, SyncRunSummary } from '@clinigraph/types';

import { promptPasscode } from './passcode-prompt.js';

// =============================================================================
// Types
// =============================================================================

export interface JobDependencies {
  env?: EnvSource;
  openSource?: (config: SourceConfig, options: SourceConnectOptions) => Promise<SourceConnection>;
  openGraphStore?: (config: GraphConfig) => Promise<GraphStore>;
  promptPasscode?: () => Promise<string>;
  /** Receives the human-readable report, one line per call */
  output?: (line: string) => void;
  logger?: Logger;
}

export interface SyncJobOptions {
  entityTypes?: readonly EntityType[];
  correlationId?: string;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

/**
 * Load configuration, reporting every missing key at once
 */
export function readConfig(env: EnvSource, output: (line: string) => void): SyncConfig | null {
  try {
    return loadSyncConfig(env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      output(error.message);
      return null;
    }
    throw error;
  }
}

/**
 * Passcode from SOURCE_PASSCODE, else one prompt. Only the Snowflake source signs in with one.
 */
export async function resolvePasscode(
  config: SyncConfig,
  prompt: () => Promise<string>
): Promise<SourceConnectOptions> {
  if (config.source.driver !== 'snowflake') {
    return {};
  }
  const passcode = config.passcode ?? (await prompt());
  return passcode === '' ? {} : { passcode };
}

export function formatSummary(summary: SyncRunSummary): string[] {
  const lines = summary.results.map((result) => {
    const label = result.entityType.padEnd(12);
    switch (result.status) {
      case 'loaded':
        return (
          `${label} loaded   ${result.processed}/${result.fetched} rows` +
          (result.skippedRows > 0 ? ` (${result.skippedRows} without keys)` : '')
        );
      case 'skipped':
        return `${label} skipped  ${result.existingNodes ?? 0} nodes already present`;
      case 'failed':
        return `${label} FAILED   ${result.error?.message ?? 'unknown error'}`;
    }
  });
  lines.push(summary.succeeded ? 'Sync succeeded' : 'Sync finished with failures');
  return lines;
}

// =============================================================================
// Job
// =============================================================================

/**
 * One-shot relational-to-graph sync. Resolves to the process exit code.
 *
 * Configuration is validated before any connection is opened; both
 * connections are released on every exit path.
 */
export async function runSyncJob(
  deps: JobDependencies = {},
  options: SyncJobOptions = {}
): Promise<number> {
  const output = deps.output ?? ((line: string) => console.log(line));
  const logger = deps.logger ?? createLogger({ name: 'sync-job' });
  const openSource = deps.openSource ?? createSourceConnection;
  const openGraphStore = deps.openGraphStore ?? createGraphStore;
  const correlationId = options.correlationId ?? generateCorrelationId();

  const config = readConfig(deps.env ?? process.env, output);
  if (!config) {
    return EXIT_FAILURE;
  }

  try {
    const connectOptions = await resolvePasscode(config, deps.promptPasscode ?? promptPasscode);

    const summary = await withSourceConnection(
      () => openSource(config.source, connectOptions),
      (source) =>
        withGraphStore(
          () => openGraphStore(config.graph),
          async (graph) => {
            await graph.ensureConstraints();
            return runGraphSync({
              source,
              graph,
              maxRowsPerEntity: config.maxRowsPerEntity,
              namespace: config.namespace,
              correlationId,
              entityTypes: options.entityTypes,
              logger,
            });
          }
        )
    );

    for (const line of formatSummary(summary)) {
      output(line);
    }
    return summary.succeeded ? EXIT_OK : EXIT_FAILURE;
  } catch (error) {
    logger.error({ err: error, correlationId }, 'Sync run failed');
    output(`Sync failed: ${toSafeErrorResponse(error).message}`);
    return EXIT_FAILURE;
  }
}
