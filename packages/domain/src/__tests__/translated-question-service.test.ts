import { describe, it, expect, vi } from 'vitest';
import { InMemoryGraphStore, QueryExecutionError, createLogger } from '@clinigraph/core';
import {
  TranslatedQuestionService,
  assertReadOnly,
  type QueryTranslator,
} from '../questions/translated-question-service.js';
import { NO_DATA_MESSAGE } from '../questions/intents.js';

const silent = createLogger({ name: 'test', level: 'silent' });

function translatorReturning(cypher: string): QueryTranslator {
  return { translate: vi.fn().mockResolvedValue(cypher) };
}

describe('assertReadOnly', () => {
  it('should accept a plain read', () => {
    expect(() => assertReadOnly('MATCH (p:Patient) RETURN p.id AS id LIMIT 5')).not.toThrow();
  });

  it('should refuse write clauses', () => {
    expect(() => assertReadOnly('MATCH (p:Patient) detach delete p')).toThrow(
      new QueryExecutionError('Translated query is not read-only (DETACH)')
    );
    expect(() => assertReadOnly("LOAD  CSV FROM 'file:///x.csv' AS row RETURN row")).toThrow(
      QueryExecutionError
    );
  });

  it('should not trip on property names that contain a keyword', () => {
    expect(() => assertReadOnly('MATCH (o:Observation) RETURN o.settled AS settled')).not.toThrow();
  });
});

describe('TranslatedQuestionService', () => {
  it('should project whatever columns the translated query returns', async () => {
    const graph = new InMemoryGraphStore();
    vi.spyOn(graph, 'read').mockResolvedValue([
      { id: 'P001', age: 45 },
      { id: 'P002', age: 61 },
    ]);
    const service = new TranslatedQuestionService(
      translatorReturning('MATCH (p:Patient) RETURN p.id AS id, p.age AS age'),
      graph,
      silent
    );

    const answer = await service.answer('how old are my patients?');

    expect(answer).toEqual({
      status: 'answered',
      intent: null,
      parameter: null,
      message: 'Found 2 rows:',
      table: {
        columns: ['id', 'age'],
        rows: [
          ['P001', 45],
          ['P002', 61],
        ],
      },
    });
    expect(graph.read).toHaveBeenCalledWith({
      cypher: 'MATCH (p:Patient) RETURN p.id AS id, p.age AS age',
      params: {},
    });
  });

  it('should report an empty result', async () => {
    const graph = new InMemoryGraphStore();
    vi.spyOn(graph, 'read').mockResolvedValue([]);
    const service = new TranslatedQuestionService(
      translatorReturning('MATCH (p:Patient) RETURN p.id AS id'),
      graph,
      silent
    );

    expect(await service.answer('anyone?')).toMatchObject({
      status: 'not_found',
      message: 'The translated query returned no rows.',
    });
  });

  it('should not run a translated write', async () => {
    const graph = new InMemoryGraphStore();
    const read = vi.spyOn(graph, 'read');
    const service = new TranslatedQuestionService(
      translatorReturning('MATCH (p:Patient) SET p.flag = true'),
      graph,
      silent
    );

    const answer = await service.answer('flag everyone');

    expect(answer).toMatchObject({ status: 'no_data', message: NO_DATA_MESSAGE });
    expect(read).not.toHaveBeenCalled();
  });

  it('should give a soft answer when translation fails', async () => {
    const translator: QueryTranslator = {
      translate: vi.fn().mockRejectedValue(new Error('quota exceeded')),
    };
    const service = new TranslatedQuestionService(translator, new InMemoryGraphStore(), silent);

    expect(await service.answer('anything')).toEqual({
      status: 'no_data',
      intent: null,
      parameter: null,
      message: NO_DATA_MESSAGE,
      table: null,
    });
  });
});
