import {
  collapseWhitespace,
  createLogger,
  type GraphQuery,
  type GraphStore,
  type Logger,
} from '@clinigraph/core';
import type { GraphRecord, QuestionAnswer } from '@clinigraph/types';

import {
  DEFAULT_CONDITION_TERM,
  HELP_TEXT,
  INTENT_TABLE,
  NO_DATA_MESSAGE,
  needsPatientMessage,
  type IntentEntry,
} from './intents.js';
import { project } from './result-projector.js';

export type RouteDecision =
  | { kind: 'unsupported' }
  | { kind: 'needs_parameter'; entry: IntentEntry }
  | { kind: 'query'; entry: IntentEntry; parameter: string; query: GraphQuery };

/**
 * Trim, collapse inner whitespace and drop trailing ?, . and !
 * Casing is kept so identifiers can be echoed back as typed.
 */
export function normalizeQuestion(question: string): string {
  return collapseWhitespace(question).replace(/[?.!\s]+$/, '');
}

/**
 * Pure routing step: question text to intent, parameter and query
 */
export function routeQuestion(question: string): RouteDecision {
  const normalized = normalizeQuestion(question);
  const lowered = normalized.toLowerCase();
  const entry = INTENT_TABLE.find((candidate) => candidate.matches(lowered));

  if (!entry) {
    return { kind: 'unsupported' };
  }

  let parameter = entry.extractParameter(normalized);
  if (parameter === '') {
    if (entry.scope === 'patient') {
      return { kind: 'needs_parameter', entry };
    }
    parameter = DEFAULT_CONDITION_TERM;
  }

  return { kind: 'query', entry, parameter, query: entry.buildQuery(parameter) };
}

/**
 * Deterministic question router over the clinical graph.
 * Query failures become a soft answer; nothing is thrown to the caller.
 */
export class QueryRouter {
  private readonly logger: Logger;

  constructor(
    private readonly graph: GraphStore,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger({ name: 'query-router' });
  }

  async answer(question: string): Promise<QuestionAnswer> {
    const decision = routeQuestion(question);

    if (decision.kind === 'unsupported') {
      this.logger.info('Question did not match any intent');
      return { status: 'unsupported', intent: null, parameter: null, message: HELP_TEXT, table: null };
    }

    const { entry } = decision;
    if (decision.kind === 'needs_parameter') {
      return {
        status: 'needs_parameter',
        intent: entry.intent,
        parameter: null,
        message: needsPatientMessage(entry),
        table: null,
      };
    }

    const { parameter } = decision;
    let records: GraphRecord[];
    try {
      records = await this.graph.read(decision.query);
    } catch (error) {
      this.logger.error({ err: error, intent: entry.intent }, 'Question query failed');
      return { status: 'no_data', intent: entry.intent, parameter, message: NO_DATA_MESSAGE, table: null };
    }

    this.logger.info({ intent: entry.intent, rows: records.length }, 'Question answered');

    if (records.length === 0) {
      return {
        status: 'not_found',
        intent: entry.intent,
        parameter,
        message: entry.notFound(parameter),
        table: null,
      };
    }

    return {
      status: 'answered',
      intent: entry.intent,
      parameter,
      message: entry.answered(parameter),
      table: project(records, entry.columns),
    };
  }
}
