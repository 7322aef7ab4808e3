import {
  createGraphStore,
  createLogger,
  createSourceConnection,
  toSafeErrorResponse,
  withGraphStore,
  withSourceConnection,
} from '@clinigraph/core';
import { ENTITY_LOAD_ORDER, type EntityType } from '@clinigraph/types';

import { promptPasscode } from './passcode-prompt.js';
import {
  EXIT_FAILURE,
  EXIT_OK,
  readConfig,
  resolvePasscode,
  type JobDependencies,
} from './sync-job.js';

export interface HealthCheckResult {
  source: { ok: boolean; serverTime?: string; error?: string };
  graph: { ok: boolean; nodes?: Partial<Record<EntityType, number>>; error?: string };
}

const SOURCE_PROBE = 'SELECT CURRENT_TIMESTAMP AS NOW';

/**
 * Connectivity check for the source and the graph store.
 * Both are probed even when the first fails; the graph check also ensures the
 * natural-key constraints exist.
 */
export async function runHealthCheck(deps: JobDependencies = {}): Promise<number> {
  const output = deps.output ?? ((line: string) => console.log(line));
  const logger = deps.logger ?? createLogger({ name: 'health-check' });
  const openSource = deps.openSource ?? createSourceConnection;
  const openGraphStore = deps.openGraphStore ?? createGraphStore;

  const config = readConfig(deps.env ?? process.env, output);
  if (!config) {
    return EXIT_FAILURE;
  }

  const result: HealthCheckResult = { source: { ok: false }, graph: { ok: false } };

  try {
    const connectOptions = await resolvePasscode(config, deps.promptPasscode ?? promptPasscode);
    const probe = await withSourceConnection(
      () => openSource(config.source, connectOptions),
      (source) => source.query(SOURCE_PROBE)
    );
    const now = probe.rows[0] ? Object.values(probe.rows[0])[0] : undefined;
    result.source = { ok: true, serverTime: now === undefined ? 'unknown' : String(now) };
  } catch (error) {
    logger.error({ err: error }, 'Source health check failed');
    result.source = { ok: false, error: toSafeErrorResponse(error).message };
  }

  try {
    const nodes = await withGraphStore(
      () => openGraphStore(config.graph),
      async (graph) => {
        await graph.ensureConstraints();
        const counts: Partial<Record<EntityType, number>> = {};
        for (const label of ENTITY_LOAD_ORDER) {
          counts[label] = await graph.countNodes(label);
        }
        return counts;
      }
    );
    result.graph = { ok: true, nodes };
  } catch (error) {
    logger.error({ err: error }, 'Graph health check failed');
    result.graph = { ok: false, error: toSafeErrorResponse(error).message };
  }

  output(
    result.source.ok
      ? `Source (${config.source.driver}): OK, server time ${result.source.serverTime ?? 'unknown'}`
      : `Source (${config.source.driver}): FAILED, ${result.source.error ?? 'unknown error'}`
  );
  if (result.graph.ok) {
    const counts = ENTITY_LOAD_ORDER.map((label) => `${label}=${result.graph.nodes?.[label] ?? 0}`);
    output(`Graph store: OK, constraints ensured, ${counts.join(' ')}`);
  } else {
    output(`Graph store: FAILED, ${result.graph.error ?? 'unknown error'}`);
  }

  return result.source.ok && result.graph.ok ? EXIT_OK : EXIT_FAILURE;
}
