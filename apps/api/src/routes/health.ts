import type { FastifyPluginAsync } from 'fastify';
import { toSafeErrorResponse, withGraphStore, type GraphStore } from '@clinigraph/core';
import { ENTITY_LOAD_ORDER, type EntityType } from '@clinigraph/types';

export interface HealthRouteDependencies {
  openGraphStore: () => Promise<GraphStore>;
  version?: string;
}

interface HealthResponse {
  status: 'ok';
  timestamp: string;
  version: string;
  uptime: number;
}

/**
 * GET /health - liveness, touches no dependency
 * GET /health/graph - graph connectivity and node counts per label
 */
export function createHealthRoutes(deps: HealthRouteDependencies): FastifyPluginAsync {
  const version = deps.version ?? '1.0.0';

  const healthRoutes: FastifyPluginAsync = async (fastify) => {
    fastify.get('/health', async (): Promise<HealthResponse> => {
      return {
        status: 'ok',
        timestamp: new Date().toISOString(),
        version,
        uptime: process.uptime(),
      };
    });

    fastify.get('/health/graph', async (request, reply) => {
      try {
        const nodes = await withGraphStore(deps.openGraphStore, async (graph) => {
          await graph.verifyConnectivity();
          const counts: Partial<Record<EntityType, number>> = {};
          for (const label of ENTITY_LOAD_ORDER) {
            counts[label] = await graph.countNodes(label);
          }
          return counts;
        });
        return await reply.send({ status: 'ok', timestamp: new Date().toISOString(), nodes });
      } catch (error) {
        request.log.error({ err: error }, 'Graph health check failed');
        const safe = toSafeErrorResponse(error);
        return await reply.status(503).send({
          status: 'unhealthy',
          timestamp: new Date().toISOString(),
          error: { code: safe.code, message: safe.message },
        });
      }
    });
  };

  return healthRoutes;
}
