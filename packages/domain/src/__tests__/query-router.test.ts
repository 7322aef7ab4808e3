import { describe, it, expect, vi, beforeEach } from 'vitest';
import { InMemoryGraphStore, createLogger } from '@clinigraph/core';
import { GraphLoader } from '../sync/graph-loader.js';
import { QueryRouter, normalizeQuestion, routeQuestion } from '../questions/query-router.js';
import { HELP_TEXT, NO_DATA_MESSAGE } from '../questions/intents.js';
import { alice } from './fakes.js';

const silent = createLogger({ name: 'test', level: 'silent' });

describe('normalizeQuestion', () => {
  it('should trim, collapse whitespace and drop trailing punctuation', () => {
    expect(normalizeQuestion('  Show   patients with\tDiabetes?! ')).toBe(
      'Show patients with Diabetes'
    );
  });
});

describe('routeQuestion', () => {
  it('should prefer the patient-scoped medication intent over patients-with', () => {
    const decision = routeQuestion('show medications for patient P001 and patients with asthma');
    expect(decision.kind === 'query' && decision.entry.intent).toBe('medications-by-patient');
  });

  it('should prefer medications-for over patients-with', () => {
    const decision = routeQuestion('show medications for asthma patients with inhalers');
    expect(decision.kind === 'query' && decision.entry.intent).toBe('medications-by-condition');
  });

  it('should remove a trigger that runs into a longer word', () => {
    const decision = routeQuestion('show medications for patients with diabetes');

    expect(decision).toMatchObject({
      kind: 'query',
      entry: { intent: 'medications-by-patient' },
      parameter: 'with diabetes',
    });
  });

  it('should extract the condition term and lower-case the query parameter', () => {
    const decision = routeQuestion('List patients who have Hypertension.');

    expect(decision).toMatchObject({
      kind: 'query',
      parameter: 'Hypertension',
      query: {
        params: { term: 'hypertension' },
        named: { intent: 'patients-by-condition', term: 'hypertension', patientMatch: null, limit: 50 },
      },
    });
  });

  it('should fall back to diabetes for an empty condition', () => {
    const decision = routeQuestion('show medications for');
    expect(decision).toMatchObject({ kind: 'query', parameter: 'diabetes' });
  });

  it('should treat hyphenated parameters as exact identifiers', () => {
    const decision = routeQuestion('show encounters for patient 3F2A-77B1');

    expect(decision).toMatchObject({
      kind: 'query',
      parameter: '3F2A-77B1',
      query: { named: { patientMatch: 'id', term: '3f2a-77b1', limit: 100 } },
    });
    expect(decision.kind === 'query' && decision.query.cypher).toContain(
      'WHERE toLower(p.id) = $term'
    );
  });

  it('should match other parameters by name or identifier', () => {
    const decision = routeQuestion('show doctors for patient alice');

    expect(decision).toMatchObject({
      kind: 'query',
      entry: { intent: 'provider-by-patient' },
      parameter: 'alice',
      query: { named: { patientMatch: 'name-or-id' } },
    });
  });

  it('should ask for a patient when none is named', () => {
    const decision = routeQuestion('show visits for patient');
    expect(decision.kind).toBe('needs_parameter');
  });

  it('should not match unrelated text', () => {
    expect(routeQuestion('glorb')).toEqual({ kind: 'unsupported' });
  });
});

describe('QueryRouter', () => {
  let graph: InMemoryGraphStore;
  let router: QueryRouter;

  beforeEach(() => {
    graph = new InMemoryGraphStore();
    router = new QueryRouter(graph, silent);
  });

  it('should list medications for a patient', async () => {
    const loader = new GraphLoader(graph, silent);
    await loader.upsert('Patient', [alice]);
    await loader.upsert('Medication', [
      { ENC_ID: null, PATIENT_ID: 'P001', RXNORM: '860975', NAME: 'Metformin' },
      { ENC_ID: null, PATIENT_ID: 'P001', RXNORM: '314076', NAME: 'Lisinopril' },
    ]);

    const answer = await router.answer('show medications for patient P001');

    expect(answer).toEqual({
      status: 'answered',
      intent: 'medications-by-patient',
      parameter: 'P001',
      message: "Medications for patient 'P001':",
      table: {
        columns: ['patient_id', 'full_name', 'rxnorm', 'medication'],
        rows: [
          ['P001', 'Alice Nguyen', '860975', 'Metformin'],
          ['P001', 'Alice Nguyen', '314076', 'Lisinopril'],
        ],
      },
    });
  });

  it('should report when no patient has the condition', async () => {
    const answer = await router.answer('show patients with diabetes');

    expect(answer).toEqual({
      status: 'not_found',
      intent: 'patients-by-condition',
      parameter: 'diabetes',
      message: "I couldn't find patients with conditions matching 'diabetes'.",
      table: null,
    });
  });

  it('should answer unmatched questions with help and run no query', async () => {
    const read = vi.spyOn(graph, 'read');

    const answer = await router.answer('glorb');

    expect(answer).toEqual({
      status: 'unsupported',
      intent: null,
      parameter: null,
      message: HELP_TEXT,
      table: null,
    });
    expect(read).not.toHaveBeenCalled();
  });

  it('should prompt for a patient without querying', async () => {
    const read = vi.spyOn(graph, 'read');

    const answer = await router.answer('show medications for patient');

    expect(answer).toEqual({
      status: 'needs_parameter',
      intent: 'medications-by-patient',
      parameter: null,
      message: "Please name a patient, for example 'show medications for patient P001'.",
      table: null,
    });
    expect(read).not.toHaveBeenCalled();
  });

  it('should turn query failures into a soft answer', async () => {
    vi.spyOn(graph, 'read').mockRejectedValue(new Error('connection reset'));

    const answer = await router.answer('show medications for diabetes');

    expect(answer).toEqual({
      status: 'no_data',
      intent: 'medications-by-condition',
      parameter: 'diabetes',
      message: NO_DATA_MESSAGE,
      table: null,
    });
  });

  it('should return a loaded observation when asked by name', async () => {
    const loader = new GraphLoader(graph, silent);
    await loader.upsert('Patient', [alice]);
    await loader.upsert('Observation', [
      {
        OBSERVATION_ID: 'O-1',
        PATIENT_ID: 'P001',
        ENCOUNTER_ID: null,
        DESCRIPTION: 'Heart rate',
        VALUE: '72',
        UNIT: '/min',
        CATEGORY: 'vital-signs',
        CODE: '8867-4',
        OBS_DATETIME: '2024-03-01T09:30:00Z',
      },
    ]);

    const answer = await router.answer('Show vitals for patient Alice Nguyen?');

    expect(answer.status).toBe('answered');
    expect(answer.parameter).toBe('Alice Nguyen');
    expect(answer.table).toEqual({
      columns: [
        'patient_id',
        'full_name',
        'observation_id',
        'description',
        'value',
        'unit',
        'category',
        'obs_datetime',
      ],
      rows: [
        ['P001', 'Alice Nguyen', 'O-1', 'Heart rate', 72, '/min', 'vital-signs', '2024-03-01T09:30:00Z'],
      ],
    });
  });

  it('should list the providers a patient was seen by', async () => {
    const loader = new GraphLoader(graph, silent);
    await loader.upsert('Provider', [
      { PROVIDER_ID: 'NPI-1', PROVIDER_NAME: 'Dr. Rivera', SPECIALTY: 'Endocrinology', STATE: 'MA', ZIP: '02115' },
    ]);
    await loader.upsert('Patient', [alice]);
    await loader.upsert('Encounter', [
      { ENC_ID: 'E-1', PATIENT_ID: 'P001', PROVIDER_NPI: 'NPI-1', START_TIME: '2024-01-10T09:00:00Z', END_TIME: null },
      { ENC_ID: 'E-2', PATIENT_ID: 'P001', PROVIDER_NPI: 'NPI-1', START_TIME: '2024-02-10T09:00:00Z', END_TIME: null },
    ]);

    const answer = await router.answer('show providers for patient P001');

    expect(answer).toEqual({
      status: 'answered',
      intent: 'provider-by-patient',
      parameter: 'P001',
      message: "Providers for patient 'P001':",
      table: {
        columns: ['patient_id', 'full_name', 'provider_id', 'provider', 'specialty', 'state'],
        rows: [['P001', 'Alice Nguyen', 'NPI-1', 'Dr. Rivera', 'Endocrinology', 'MA']],
      },
    });
  });

  it('should list encounters newest first', async () => {
    const loader = new GraphLoader(graph, silent);
    await loader.upsert('Patient', [alice]);
    await loader.upsert('Encounter', [
      { ENC_ID: 'E-1', PATIENT_ID: 'P001', PROVIDER_NPI: 'NPI-1', START_TIME: '2024-01-10T09:00:00Z', END_TIME: '2024-01-10T09:30:00Z' },
      { ENC_ID: 'E-3', PATIENT_ID: 'P001', PROVIDER_NPI: null, START_TIME: '2024-03-05T14:00:00Z', END_TIME: null },
      { ENC_ID: 'E-2', PATIENT_ID: 'P001', PROVIDER_NPI: 'NPI-1', START_TIME: '2024-02-10T09:00:00Z', END_TIME: null },
    ]);

    const answer = await router.answer('show encounters for patient alice');

    expect(answer.status).toBe('answered');
    expect(answer.message).toBe("Encounters for patient 'alice':");
    expect(answer.table).toEqual({
      columns: ['patient_id', 'full_name', 'encounter_id', 'start_time', 'end_time', 'provider_id'],
      rows: [
        ['P001', 'Alice Nguyen', 'E-3', '2024-03-05T14:00:00Z', null, null],
        ['P001', 'Alice Nguyen', 'E-2', '2024-02-10T09:00:00Z', null, 'NPI-1'],
        ['P001', 'Alice Nguyen', 'E-1', '2024-01-10T09:00:00Z', '2024-01-10T09:30:00Z', 'NPI-1'],
      ],
    });
  });

  it('should count patients per medication for a condition', async () => {
    const loader = new GraphLoader(graph, silent);
    await loader.upsert('Condition', [
      { ENC_ID: null, PATIENT_ID: 'P001', ICD_CODE: 'E11', NAME: 'Type 2 diabetes' },
      { ENC_ID: null, PATIENT_ID: 'P002', ICD_CODE: 'E11', NAME: 'Type 2 diabetes' },
    ]);
    await loader.upsert('Medication', [
      { ENC_ID: null, PATIENT_ID: 'P001', RXNORM: '860975', NAME: 'Metformin' },
      { ENC_ID: null, PATIENT_ID: 'P002', RXNORM: '860975', NAME: 'Metformin' },
    ]);

    const answer = await router.answer('show medications for Diabetes');

    expect(answer.message).toBe("Medications used by patients with conditions matching 'Diabetes':");
    expect(answer.table?.rows).toEqual([['860975', 'Metformin', 2]]);
  });
});
