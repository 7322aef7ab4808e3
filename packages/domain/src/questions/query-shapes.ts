import type { GraphQuery, PatientMatch } from '@clinigraph/core';
import type { Intent } from '@clinigraph/types';

/**
 * Parameterized Cypher for each intent. `$term` is always lower-cased;
 * limits are fixed per intent and inlined because Cypher wants an integer there.
 */

const patientFilter = (match: PatientMatch): string =>
  match === 'id'
    ? 'toLower(p.id) = $term'
    : '(toLower(p.full_name) CONTAINS $term OR toLower(p.id) = $term)';

const PATIENT_COLUMNS = 'p.id AS patient_id, p.full_name AS full_name';

function conditionCypher(intent: Intent, limit: number): string {
  if (intent === 'medications-by-condition') {
    return [
      'MATCH (p:Patient)-[:HAS_CONDITION]->(c:Condition), (p)-[:TAKES_MEDICATION]->(m:Medication)',
      'WHERE toLower(c.name) CONTAINS $term',
      'RETURN m.code AS rxnorm, m.name AS medication, COUNT(DISTINCT p) AS patients_on_med',
      'ORDER BY patients_on_med DESC',
      `LIMIT ${limit}`,
    ].join('\n');
  }
  return [
    'MATCH (p:Patient)-[:HAS_CONDITION]->(c:Condition)',
    'WHERE toLower(c.name) CONTAINS $term',
    `RETURN ${PATIENT_COLUMNS}, p.sex AS sex, p.age AS age, c.name AS condition`,
    `LIMIT ${limit}`,
  ].join('\n');
}

function patientCypher(intent: Intent, match: PatientMatch, limit: number): string {
  const where = `WHERE ${patientFilter(match)}`;
  switch (intent) {
    case 'medications-by-patient':
      return [
        'MATCH (p:Patient)-[:TAKES_MEDICATION]->(m:Medication)',
        where,
        `RETURN ${PATIENT_COLUMNS}, m.code AS rxnorm, m.name AS medication`,
        `LIMIT ${limit}`,
      ].join('\n');
    case 'provider-by-patient':
      return [
        'MATCH (p:Patient)-[:HAS_PROVIDER]->(pr:Provider)',
        where,
        `RETURN ${PATIENT_COLUMNS}, pr.id AS provider_id, pr.name AS provider, pr.specialty AS specialty, pr.state AS state`,
        `LIMIT ${limit}`,
      ].join('\n');
    case 'observations-by-patient':
      return [
        'MATCH (p:Patient)-[:HAS_OBSERVATION]->(o:Observation)',
        where,
        `RETURN ${PATIENT_COLUMNS}, o.id AS observation_id, o.description AS description, o.value AS value, o.unit AS unit, o.category AS category, o.obs_datetime AS obs_datetime`,
        'ORDER BY o.obs_datetime DESC',
        `LIMIT ${limit}`,
      ].join('\n');
    default:
      return [
        'MATCH (p:Patient)-[:HAS_ENCOUNTER]->(e:Encounter)',
        where,
        `RETURN ${PATIENT_COLUMNS}, e.id AS encounter_id, e.start_time AS start_time, e.end_time AS end_time, e.provider_npi AS provider_id`,
        'ORDER BY e.start_time DESC',
        `LIMIT ${limit}`,
      ].join('\n');
  }
}

export function buildConditionQuery(intent: Intent, term: string, limit: number): GraphQuery {
  const lowered = term.toLowerCase();
  return {
    cypher: conditionCypher(intent, limit),
    params: { term: lowered },
    named: { intent, term: lowered, patientMatch: null, limit },
  };
}

/**
 * Identifiers in the source carry hyphens (UUIDs); anything else may be a name
 */
export function patientMatchFor(parameter: string): PatientMatch {
  return parameter.includes('-') ? 'id' : 'name-or-id';
}

export function buildPatientQuery(intent: Intent, parameter: string, limit: number): GraphQuery {
  const lowered = parameter.toLowerCase();
  const match = patientMatchFor(parameter);
  return {
    cypher: patientCypher(intent, match, limit),
    params: { term: lowered },
    named: { intent, term: lowered, patientMatch: match, limit },
  };
}
