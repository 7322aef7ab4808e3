import type { FastifyPluginAsync } from 'fastify';
import {
  ValidationError,
  withCorrelationId,
  withGraphStore,
  type GraphStore,
  type Logger,
} from '@clinigraph/core';
import { QueryRouter, TranslatedQuestionService, type QueryTranslator } from '@clinigraph/domain';
import { QuestionRequestSchema, type QuestionAnswer } from '@clinigraph/types';

// =============================================================================
// Dependencies Interface
// =============================================================================

export interface QuestionRouteDependencies {
  /** Opens a graph store for one question; closed when the answer is built */
  openGraphStore: () => Promise<GraphStore>;
  translator: QueryTranslator | null;
  logger: Logger;
}

/**
 * POST /questions
 *
 * `rules` mode goes through the deterministic router; `translated` mode asks the
 * configured translator for Cypher and is unavailable without one.
 */
export function createQuestionRoutes(deps: QuestionRouteDependencies): FastifyPluginAsync {
  const questionRoutes: FastifyPluginAsync = async (fastify) => {
    fastify.post('/questions', async (request, reply) => {
      const parsed = QuestionRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        throw new ValidationError('Invalid question request', parsed.error.flatten());
      }
      const { question, mode } = parsed.data;
      const { translator } = deps;

      if (mode === 'translated' && !translator) {
        return reply.status(503).send({
          code: 'TRANSLATOR_UNAVAILABLE',
          message: 'Translated questions are not configured',
          statusCode: 503,
        });
      }

      const log = withCorrelationId(deps.logger, request.correlationId);
      const answer = await withGraphStore(deps.openGraphStore, (graph): Promise<QuestionAnswer> => {
        if (mode === 'translated' && translator) {
          return new TranslatedQuestionService(translator, graph, log).answer(question);
        }
        return new QueryRouter(graph, log).answer(question);
      });

      request.log.info({ mode, status: answer.status, intent: answer.intent }, 'Question handled');
      return reply.send({ ...answer, correlationId: request.correlationId });
    });
  };

  return questionRoutes;
}
