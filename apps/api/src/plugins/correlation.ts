/**
 * Correlation ID plugin for request tracing
 *
 * Reads the x-correlation-id header or generates a new id, echoes it on the
 * response and binds it to the request logger.
 */

import { type FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { generateCorrelationId } from '@clinigraph/core';

declare module 'fastify' {
  interface FastifyRequest {
    correlationId: string;
  }
}

export const CORRELATION_HEADER = 'x-correlation-id';

const correlationPlugin: FastifyPluginAsync = async (fastify) => {
  fastify.decorateRequest('correlationId', '');

  fastify.addHook('onRequest', async (request, reply) => {
    const header = request.headers[CORRELATION_HEADER];
    const correlationId = typeof header === 'string' && header !== '' ? header : generateCorrelationId();

    request.correlationId = correlationId;
    void reply.header(CORRELATION_HEADER, correlationId);
    request.log = request.log.child({ correlationId });
  });
};

export default fp(correlationPlugin, {
  name: 'correlation',
  fastify: '5.x',
});
