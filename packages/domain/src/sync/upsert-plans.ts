import {
  ConditionSourceRowSchema,
  EncounterSourceRowSchema,
  MedicationSourceRowSchema,
  ObservationSourceRowSchema,
  PatientSourceRowSchema,
  ProviderSourceRowSchema,
  type ConditionSourceRow,
  type EdgeSpec,
  type EncounterSourceRow,
  type EntityType,
  type MedicationSourceRow,
  type NodeRef,
  type ObservationSourceRow,
  type PatientSourceRow,
  type ProviderSourceRow,
  type RawSourceRow,
  type RelationshipType,
  type UpsertPlan,
} from '@clinigraph/types';

/**
 * Upsert plans
 *
 * Turns one validated source row into the node, stubs and edges it writes.
 * Every edge endpoint is either the primary node or one of the stubs.
 */

export type RowPlan = { kind: 'upsert'; plan: UpsertPlan } | { kind: 'skip'; reason: string };

const ref = (label: EntityType, key: string): NodeRef => ({ label, key });

const edge = (from: NodeRef, type: RelationshipType, to: NodeRef): EdgeSpec => ({
  from,
  type,
  to,
});

export function fullNameOf(first: string | null, last: string | null): string | null {
  const parts = [first, last].filter((part): part is string => part !== null && part !== '');
  return parts.length > 0 ? parts.join(' ') : null;
}

export function planProvider(row: ProviderSourceRow): UpsertPlan {
  return {
    node: {
      ...ref('Provider', row.PROVIDER_ID),
      properties: {
        name: row.PROVIDER_NAME,
        specialty: row.SPECIALTY,
        state: row.STATE,
        zip: row.ZIP,
      },
    },
    stubs: [],
    edges: [],
  };
}

export function planPatient(row: PatientSourceRow): UpsertPlan {
  return {
    node: {
      ...ref('Patient', row.PATIENT_ID),
      properties: {
        first_name: row.FIRST_NAME,
        last_name: row.LAST_NAME,
        full_name: fullNameOf(row.FIRST_NAME, row.LAST_NAME),
        sex: row.SEX,
        zip: row.ZIP,
        age: row.AGE,
      },
    },
    stubs: [],
    edges: [],
  };
}

export function planEncounter(row: EncounterSourceRow): UpsertPlan {
  const encounter = ref('Encounter', row.ENC_ID);
  const patient = ref('Patient', row.PATIENT_ID);
  const stubs = [patient];
  const edges = [edge(patient, 'HAS_ENCOUNTER', encounter)];

  if (row.PROVIDER_NPI) {
    const provider = ref('Provider', row.PROVIDER_NPI);
    stubs.push(provider);
    edges.push(edge(encounter, 'HAS_PROVIDER', provider), edge(patient, 'HAS_PROVIDER', provider));
  }

  return {
    node: {
      ...encounter,
      properties: {
        start_time: row.START_TIME,
        end_time: row.END_TIME,
        provider_npi: row.PROVIDER_NPI,
      },
    },
    stubs,
    edges,
  };
}

/** Shared shape of condition and medication rows: coded concept seen in an encounter */
function planCodedConcept(
  label: 'Condition' | 'Medication',
  code: string,
  name: string | null,
  patientId: string,
  encounterId: string | null,
  patientEdge: RelationshipType,
  encounterEdge: RelationshipType
): UpsertPlan {
  const concept = ref(label, code);
  const patient = ref('Patient', patientId);
  const stubs = [patient];
  const edges = [edge(patient, patientEdge, concept)];

  if (encounterId) {
    const encounter = ref('Encounter', encounterId);
    stubs.push(encounter);
    edges.push(edge(encounter, encounterEdge, concept));
  }

  return { node: { ...concept, properties: { name } }, stubs, edges };
}

export function planCondition(row: ConditionSourceRow): UpsertPlan {
  return planCodedConcept(
    'Condition',
    row.ICD_CODE,
    row.NAME,
    row.PATIENT_ID,
    row.ENC_ID,
    'HAS_CONDITION',
    'HAS_CONDITION'
  );
}

export function planMedication(row: MedicationSourceRow): UpsertPlan {
  return planCodedConcept(
    'Medication',
    row.RXNORM,
    row.NAME,
    row.PATIENT_ID,
    row.ENC_ID,
    'TAKES_MEDICATION',
    'HAS_MEDICATION'
  );
}

export function planObservation(row: ObservationSourceRow): RowPlan {
  if (!row.OBSERVATION_ID || !row.PATIENT_ID) {
    return { kind: 'skip', reason: 'observation row without OBSERVATION_ID or PATIENT_ID' };
  }

  const observation = ref('Observation', row.OBSERVATION_ID);
  const patient = ref('Patient', row.PATIENT_ID);
  const stubs = [patient];
  const edges = [edge(patient, 'HAS_OBSERVATION', observation)];

  if (row.ENCOUNTER_ID) {
    const encounter = ref('Encounter', row.ENCOUNTER_ID);
    stubs.push(encounter);
    edges.push(edge(encounter, 'HAS_OBSERVATION', observation));
  }

  return {
    kind: 'upsert',
    plan: {
      node: {
        ...observation,
        properties: {
          description: row.DESCRIPTION,
          value: row.VALUE,
          unit: row.UNIT,
          category: row.CATEGORY,
          code: row.CODE,
          obs_datetime: row.OBS_DATETIME,
        },
      },
      stubs,
      edges,
    },
  };
}

const upsert = (plan: UpsertPlan): RowPlan => ({ kind: 'upsert', plan });

/**
 * Validate a raw row and plan its writes. Throws a ZodError on invalid rows.
 */
export function planRow(entityType: EntityType, raw: RawSourceRow): RowPlan {
  switch (entityType) {
    case 'Provider':
      return upsert(planProvider(ProviderSourceRowSchema.parse(raw)));
    case 'Patient':
      return upsert(planPatient(PatientSourceRowSchema.parse(raw)));
    case 'Encounter':
      return upsert(planEncounter(EncounterSourceRowSchema.parse(raw)));
    case 'Condition':
      return upsert(planCondition(ConditionSourceRowSchema.parse(raw)));
    case 'Medication':
      return upsert(planMedication(MedicationSourceRowSchema.parse(raw)));
    case 'Observation':
      return planObservation(ObservationSourceRowSchema.parse(raw));
  }
}
