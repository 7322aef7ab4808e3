import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as fc from 'fast-check';
import { InMemoryGraphStore, RowUpsertError, createLogger } from '@clinigraph/core';
import type { RawSourceRow } from '@clinigraph/types';
import { GraphLoader } from '../sync/graph-loader.js';
import { alice } from './fakes.js';

const silent = createLogger({ name: 'test', level: 'silent' });

const idArb = fc.stringMatching(/^[A-Z][0-9]{1,3}$/);
const nameArb = fc.option(fc.constantFrom('Alice', 'Bob', 'Chen', 'Dana'), { nil: null });

const patientRowArb = fc.record({
  PATIENT_ID: idArb,
  FIRST_NAME: nameArb,
  LAST_NAME: nameArb,
  SEX: fc.constantFrom('F', 'M', null),
  ZIP: fc.option(fc.stringMatching(/^[0-9]{5}$/), { nil: null }),
  AGE: fc.option(fc.integer({ min: 0, max: 110 }), { nil: null }),
});

const encounterRowArb = fc.record({
  ENC_ID: idArb,
  PATIENT_ID: idArb,
  PROVIDER_NPI: fc.option(idArb, { nil: null }),
  START_TIME: fc.constant('2024-03-01T09:30:00Z'),
  END_TIME: fc.constant(null),
});

const observationRowArb = fc.record({
  OBSERVATION_ID: fc.option(idArb, { nil: null }),
  PATIENT_ID: fc.option(idArb, { nil: null }),
  ENCOUNTER_ID: fc.option(idArb, { nil: null }),
  DESCRIPTION: fc.constant('Body weight'),
  VALUE: fc.option(fc.double({ min: 0, max: 300, noNaN: true }), { nil: null }),
  UNIT: fc.constant('kg'),
  CATEGORY: fc.constant('vital-signs'),
  CODE: fc.constant('29463-7'),
  OBS_DATETIME: fc.constant('2024-03-01T09:30:00Z'),
});

function snapshotCounts(store: InMemoryGraphStore) {
  return { nodes: store.nodeCount, edges: store.edgeCount };
}

describe('GraphLoader', () => {
  let store: InMemoryGraphStore;
  let loader: GraphLoader;

  beforeEach(() => {
    store = new InMemoryGraphStore();
    loader = new GraphLoader(store, silent);
  });

  it('should create a patient with its derived full name', async () => {
    const processed = await loader.upsert('Patient', [alice]);

    expect(processed).toBe(1);
    expect(store.getNode('Patient', 'P001')).toMatchObject({ full_name: 'Alice Nguyen' });
  });

  it('should keep one node when the same row is loaded twice', async () => {
    await loader.upsert('Patient', [alice]);
    await loader.upsert('Patient', [alice]);

    expect(await store.countNodes('Patient')).toBe(1);
  });

  it('should process nothing for an empty batch', async () => {
    const apply = vi.spyOn(store, 'applyUpsertPlan');

    expect(await loader.load('Medication', [])).toEqual({ processed: 0, skipped: 0 });
    expect(apply).not.toHaveBeenCalled();
  });

  it('should count observation rows without keys as skipped', async () => {
    const rows: RawSourceRow[] = [
      { OBSERVATION_ID: 'O-1', PATIENT_ID: 'P001', VALUE: 72 },
      { OBSERVATION_ID: 'O-2', PATIENT_ID: null, VALUE: 80 },
    ];

    expect(await loader.load('Observation', rows)).toEqual({ processed: 1, skipped: 1 });
    expect(store.getNode('Observation', 'O-2')).toBeUndefined();
  });

  it('should load a batch mixing numeric and coded observation values', async () => {
    const observation = (id: string, description: string, value: unknown): RawSourceRow => ({
      OBSERVATION_ID: id,
      PATIENT_ID: 'P001',
      ENCOUNTER_ID: null,
      DESCRIPTION: description,
      VALUE: value,
      UNIT: null,
      CATEGORY: 'social-history',
      CODE: null,
      OBS_DATETIME: '2024-03-01T09:30:00Z',
    });

    const result = await loader.load('Observation', [
      observation('O1', 'Body weight', '81.5'),
      observation('O2', 'Tobacco smoking status', 'Never smoker'),
      observation('O3', 'Heart rate', 72),
    ]);

    expect(result).toEqual({ processed: 3, skipped: 0 });
    expect(store.getNode('Observation', 'O1')).toMatchObject({ value: 81.5 });
    expect(store.getNode('Observation', 'O2')).toMatchObject({ value: 'Never smoker' });
    expect(store.getNode('Observation', 'O3')).toMatchObject({ value: 72 });
  });

  it('should keep provider attributes when a later encounter references it', async () => {
    await loader.upsert('Provider', [
      { PROVIDER_ID: 'NPI-1', PROVIDER_NAME: 'Dr. Rivera', SPECIALTY: 'Endocrinology', STATE: 'MA', ZIP: '02115' },
    ]);
    await loader.upsert('Encounter', [
      { ENC_ID: 'E-1', PATIENT_ID: 'P001', PROVIDER_NPI: 'NPI-1', START_TIME: null, END_TIME: null },
    ]);

    expect(store.getNode('Provider', 'NPI-1')).toEqual({
      name: 'Dr. Rivera',
      specialty: 'Endocrinology',
      state: 'MA',
      zip: '02115',
    });
  });

  it('should enrich a provider stub with the full provider load', async () => {
    await loader.upsert('Encounter', [
      { ENC_ID: 'E-1', PATIENT_ID: 'P001', PROVIDER_NPI: 'NPI-1', START_TIME: null, END_TIME: null },
    ]);
    expect(store.getNode('Provider', 'NPI-1')).toEqual({});

    await loader.upsert('Provider', [
      { PROVIDER_ID: 'NPI-1', PROVIDER_NAME: 'Dr. Rivera', SPECIALTY: 'Endocrinology', STATE: 'MA', ZIP: '02115' },
    ]);

    expect(store.getNode('Provider', 'NPI-1')).toEqual({
      name: 'Dr. Rivera',
      specialty: 'Endocrinology',
      state: 'MA',
      zip: '02115',
    });
    expect(await store.countNodes('Provider')).toBe(1);
    expect(
      store.hasEdge({
        from: { label: 'Encounter', key: 'E-1' },
        type: 'HAS_PROVIDER',
        to: { label: 'Provider', key: 'NPI-1' },
      })
    ).toBe(true);
  });

  it('should stop at the first failing row and keep earlier rows', async () => {
    const rows: RawSourceRow[] = [alice, { ...alice, PATIENT_ID: '' }, { ...alice, PATIENT_ID: 'P003' }];

    const error = await loader.load('Patient', rows).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RowUpsertError);
    expect(error).toMatchObject({
      message: 'Patient row 2 upsert failed: PATIENT_ID: Identifier must not be empty',
      rowIndex: 1,
      processed: 1,
    });
    expect(await store.countNodes('Patient')).toBe(1);
    expect(store.getNode('Patient', 'P003')).toBeUndefined();
  });

  it('should wrap graph store write failures', async () => {
    vi.spyOn(store, 'applyUpsertPlan').mockRejectedValueOnce(new Error('write refused'));

    await expect(loader.upsert('Patient', [alice])).rejects.toThrow(
      'Patient row 1 upsert failed: write refused'
    );
  });

  it('should log progress every 500 rows and at the end', async () => {
    const info = vi.spyOn(silent, 'info');
    const rows = Array.from({ length: 1001 }, (_, i) => ({ ...alice, PATIENT_ID: `P${i}` }));

    await loader.upsert('Patient', rows);

    const progress = info.mock.calls
      .map((call) => call[1])
      .filter((msg) => typeof msg === 'string' && msg.startsWith('Patients loaded'));
    expect(progress).toEqual([
      'Patients loaded: 500/1001',
      'Patients loaded: 1000/1001',
      'Patients loaded: 1001/1001',
    ]);
    info.mockRestore();
  });

  describe('properties', () => {
    it('should be idempotent for patients', async () => {
      await fc.assert(
        fc.asyncProperty(fc.array(patientRowArb, { maxLength: 30 }), async (rows) => {
          const graph = new InMemoryGraphStore();
          const batchLoader = new GraphLoader(graph, silent);

          await batchLoader.upsert('Patient', rows);
          const once = snapshotCounts(graph);
          await batchLoader.upsert('Patient', rows);

          expect(snapshotCounts(graph)).toEqual(once);
          expect(once.nodes).toBe(new Set(rows.map((r) => r.PATIENT_ID)).size);
        })
      );
    });

    it('should be idempotent for encounters and never leave dangling edges', async () => {
      await fc.assert(
        fc.asyncProperty(fc.array(encounterRowArb, { maxLength: 30 }), async (rows) => {
          const graph = new InMemoryGraphStore();
          const batchLoader = new GraphLoader(graph, silent);

          await batchLoader.upsert('Encounter', rows);
          const once = snapshotCounts(graph);
          await batchLoader.upsert('Encounter', rows);

          expect(snapshotCounts(graph)).toEqual(once);
          for (const row of rows) {
            expect(graph.getNode('Patient', row.PATIENT_ID)).toBeDefined();
            expect(
              graph.hasEdge({
                from: { label: 'Patient', key: row.PATIENT_ID },
                type: 'HAS_ENCOUNTER',
                to: { label: 'Encounter', key: row.ENC_ID },
              })
            ).toBe(true);
          }
        })
      );
    });

    it('should write exactly the keyed observations', async () => {
      await fc.assert(
        fc.asyncProperty(fc.array(observationRowArb, { maxLength: 30 }), async (rows) => {
          const graph = new InMemoryGraphStore();
          const batchLoader = new GraphLoader(graph, silent);

          const first = await batchLoader.load('Observation', rows);
          const keyed = rows.filter((r) => r.OBSERVATION_ID !== null && r.PATIENT_ID !== null);
          const nodesAfterFirst = graph.nodeCount;
          await batchLoader.load('Observation', rows);

          expect(first).toEqual({ processed: keyed.length, skipped: rows.length - keyed.length });
          expect(graph.nodeCount).toBe(nodesAfterFirst);
        })
      );
    });
  });
});
