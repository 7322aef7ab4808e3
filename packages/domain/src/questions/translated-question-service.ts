import {
  QueryExecutionError,
  createLogger,
  type GraphStore,
  type Logger,
} from '@clinigraph/core';
import type { QuestionAnswer } from '@clinigraph/types';

import { NO_DATA_MESSAGE } from './intents.js';
import { columnsOf, project } from './result-projector.js';

/**
 * External text-to-Cypher translator
 */
export interface QueryTranslator {
  translate(question: string): Promise<string>;
}

const WRITE_CLAUSES = /\b(CREATE|MERGE|SET|DELETE|DETACH|REMOVE|DROP|FOREACH|CALL)\b|\bLOAD\s+CSV\b/i;

/**
 * Refuse anything that could write to the graph
 */
export function assertReadOnly(cypher: string): void {
  const match = WRITE_CLAUSES.exec(cypher);
  if (match) {
    throw new QueryExecutionError(`Translated query is not read-only (${match[0].toUpperCase()})`);
  }
}

/**
 * Free-form questions answered through the external translator.
 * Translation and execution failures produce the same soft answer as the router.
 */
export class TranslatedQuestionService {
  private readonly logger: Logger;

  constructor(
    private readonly translator: QueryTranslator,
    private readonly graph: GraphStore,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger({ name: 'translated-questions' });
  }

  async answer(question: string): Promise<QuestionAnswer> {
    try {
      const cypher = await this.translator.translate(question);
      assertReadOnly(cypher);
      this.logger.debug({ cypherLength: cypher.length }, 'Running translated query');

      const records = await this.graph.read({ cypher, params: {} });
      if (records.length === 0) {
        return {
          status: 'not_found',
          intent: null,
          parameter: null,
          message: 'The translated query returned no rows.',
          table: null,
        };
      }

      return {
        status: 'answered',
        intent: null,
        parameter: null,
        message: `Found ${records.length} rows:`,
        table: project(records, columnsOf(records)),
      };
    } catch (error) {
      this.logger.error({ err: error }, 'Translated question failed');
      return { status: 'no_data', intent: null, parameter: null, message: NO_DATA_MESSAGE, table: null };
    }
  }
}
