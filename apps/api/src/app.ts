import Fastify, { type FastifyError } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import {
  createLogger,
  isOperationalError,
  toSafeErrorResponse,
  type GraphStore,
  type Logger,
} from '@clinigraph/core';
import type { QueryTranslator } from '@clinigraph/domain';
import correlationPlugin, { CORRELATION_HEADER } from './plugins/correlation.js';
import { createHealthRoutes, createQuestionRoutes } from './routes/index.js';

/**
 * Clinigraph API
 *
 * Answers questions over the clinical graph and reports graph health.
 */

export interface AppDependencies {
  openGraphStore: () => Promise<GraphStore>;
  translator: QueryTranslator | null;
  logLevel?: string;
  isProduction?: boolean;
  /** Comma-separated allowed origins; CORS is off when unset */
  corsOrigin?: string | undefined;
  logger?: Logger;
}

const DEV_ORIGINS = ['http://localhost:3000', 'http://localhost:5173', 'http://127.0.0.1:3000'];

/**
 * Parse and validate CORS origins. A wildcard is never passed through.
 */
export function parseCorsOrigins(corsOrigin: string | undefined, isProduction: boolean): string[] | false {
  if (!corsOrigin) return false;

  if (corsOrigin === '*') {
    if (isProduction) {
      throw new Error('CORS_ORIGIN cannot be "*" in production');
    }
    return DEV_ORIGINS;
  }

  const origins = corsOrigin
    .split(',')
    .map((o) => o.trim())
    .filter(Boolean);

  for (const origin of origins) {
    if (!URL.canParse(origin)) {
      throw new Error(`Invalid CORS origin: ${origin}`);
    }
  }
  return origins;
}

export async function buildApp(deps: AppDependencies) {
  const isProduction = deps.isProduction ?? false;
  const corsOrigins = parseCorsOrigins(deps.corsOrigin, isProduction);
  const logger = deps.logger ?? createLogger({ name: 'api' });

  const fastify = Fastify({
    logger: {
      level: deps.logLevel ?? 'info',
      serializers: {
        req(request) {
          return {
            method: request.method,
            url: request.url,
            correlationId: request.headers[CORRELATION_HEADER],
          };
        },
        res(reply) {
          return { statusCode: reply.statusCode };
        },
      },
    },
  });

  await fastify.register(correlationPlugin);

  await fastify.register(helmet, {
    contentSecurityPolicy: false,
    strictTransportSecurity: {
      maxAge: 31536000,
      includeSubDomains: true,
      preload: true,
    },
    xFrameOptions: { action: 'deny' },
    xContentTypeOptions: true,
    xPoweredBy: true,
  });

  await fastify.register(cors, {
    origin: corsOrigins,
    methods: ['GET', 'POST'],
  });

  await fastify.register(createHealthRoutes({ openGraphStore: deps.openGraphStore }));
  await fastify.register(
    createQuestionRoutes({
      openGraphStore: deps.openGraphStore,
      translator: deps.translator,
      logger,
    })
  );

  fastify.setErrorHandler<FastifyError>((error, request, reply) => {
    if (isOperationalError(error)) {
      const safe = toSafeErrorResponse(error);
      if (safe.statusCode >= 500) {
        request.log.error({ err: error }, 'Request failed');
      }
      return reply.status(safe.statusCode).send({ ...safe, correlationId: request.correlationId });
    }

    // Fastify's own client errors (malformed JSON, oversized body)
    const statusCode = error.statusCode ?? 500;
    if (statusCode < 500) {
      return reply.status(statusCode).send({
        code: error.code,
        message: error.message,
        statusCode,
        correlationId: request.correlationId,
      });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.status(500).send({ ...toSafeErrorResponse(error), correlationId: request.correlationId });
  });

  fastify.setNotFoundHandler((_request, reply) => {
    return reply.status(404).send({
      code: 'NOT_FOUND',
      message: 'Route not found',
      statusCode: 404,
    });
  });

  return fastify;
}
