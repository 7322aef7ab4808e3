import { collapseWhitespace, type GraphQuery } from '@clinigraph/core';
import type { Intent } from '@clinigraph/types';

import { buildConditionQuery, buildPatientQuery } from './query-shapes.js';

export const DEFAULT_CONDITION_TERM = 'diabetes';

const BASE_FILLERS = ['show', 'list', 'who have'];

export interface IntentEntry {
  intent: Intent;
  scope: 'condition' | 'patient';
  columns: readonly string[];
  limit: number;
  /** `question` is normalized and lower-cased */
  matches(question: string): boolean;
  /** `question` is normalized with its original casing; may return '' */
  extractParameter(question: string): string;
  buildQuery(parameter: string): GraphQuery;
  answered(parameter: string): string;
  notFound(parameter: string): string;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Triggers are removed wherever they occur, together with the rest of the word
 * they end in ("medications for patients"); fillers only as whole words.
 */
function stripPhrases(
  question: string,
  triggers: readonly string[],
  fillers: readonly string[]
): string {
  let result = question;
  for (const trigger of triggers) {
    result = result.replace(new RegExp(`${escapeRegExp(trigger)}\\w*`, 'gi'), ' ');
  }
  for (const filler of fillers) {
    result = result.replace(new RegExp(`\\b${escapeRegExp(filler)}\\b`, 'gi'), ' ');
  }
  return collapseWhitespace(result);
}

interface EntrySpec {
  intent: Intent;
  triggers: readonly string[];
  columns: readonly string[];
  limit: number;
  subject: string;
  prefixes?: readonly string[];
  extraFillers?: readonly string[];
}

function conditionEntry(spec: EntrySpec): IntentEntry {
  const fillers = [...BASE_FILLERS, ...(spec.extraFillers ?? [])];
  return {
    intent: spec.intent,
    scope: 'condition',
    columns: spec.columns,
    limit: spec.limit,
    matches: (q) =>
      spec.triggers.some((t) => q.includes(t)) ||
      (spec.prefixes ?? []).some((prefix) => q.startsWith(prefix)),
    extractParameter: (q) => stripPhrases(q, spec.triggers, fillers),
    buildQuery: (parameter) => buildConditionQuery(spec.intent, parameter, spec.limit),
    answered: (p) => `${spec.subject} with conditions matching '${p}':`,
    notFound: (p) =>
      spec.intent === 'medications-by-condition'
        ? `I couldn't find medications for conditions matching '${p}'.`
        : `I couldn't find patients with conditions matching '${p}'.`,
  };
}

function patientEntry(spec: EntrySpec): IntentEntry {
  return {
    intent: spec.intent,
    scope: 'patient',
    columns: spec.columns,
    limit: spec.limit,
    matches: (q) => spec.triggers.some((t) => q.includes(t)),
    extractParameter: (q) => stripPhrases(q, spec.triggers, BASE_FILLERS),
    buildQuery: (parameter) => buildPatientQuery(spec.intent, parameter, spec.limit),
    answered: (p) => `${spec.subject} for patient '${p}':`,
    notFound: (p) => `I couldn't find ${spec.subject.toLowerCase()} for patient '${p}'.`,
  };
}

const PATIENT_COLUMNS = ['patient_id', 'full_name'] as const;

/**
 * Ordered intent table. The first entry whose trigger occurs in the question wins,
 * so the patient-scoped phrases precede the broader "medications for".
 */
export const INTENT_TABLE: readonly IntentEntry[] = [
  patientEntry({
    intent: 'medications-by-patient',
    triggers: ['medications for patient', 'medication for patient'],
    columns: [...PATIENT_COLUMNS, 'rxnorm', 'medication'],
    limit: 50,
    subject: 'Medications',
  }),
  patientEntry({
    intent: 'provider-by-patient',
    triggers: [
      'providers for patient',
      'provider for patient',
      'doctors for patient',
      'doctor for patient',
    ],
    columns: [...PATIENT_COLUMNS, 'provider_id', 'provider', 'specialty', 'state'],
    limit: 50,
    subject: 'Providers',
  }),
  patientEntry({
    intent: 'observations-by-patient',
    triggers: [
      'observations for patient',
      'observation for patient',
      'labs for patient',
      'vitals for patient',
    ],
    columns: [
      ...PATIENT_COLUMNS,
      'observation_id',
      'description',
      'value',
      'unit',
      'category',
      'obs_datetime',
    ],
    limit: 100,
    subject: 'Observations',
  }),
  patientEntry({
    intent: 'encounters-by-patient',
    triggers: ['encounters for patient', 'encounter for patient', 'visits for patient'],
    columns: [...PATIENT_COLUMNS, 'encounter_id', 'start_time', 'end_time', 'provider_id'],
    limit: 100,
    subject: 'Encounters',
  }),
  conditionEntry({
    intent: 'medications-by-condition',
    triggers: ['medications for', 'medication for'],
    columns: ['rxnorm', 'medication', 'patients_on_med'],
    limit: 50,
    subject: 'Medications used by patients',
  }),
  conditionEntry({
    intent: 'patients-by-condition',
    triggers: ['patients with'],
    prefixes: ['show patients', 'list patients'],
    extraFillers: ['patients'],
    columns: [...PATIENT_COLUMNS, 'sex', 'age', 'condition'],
    limit: 50,
    subject: 'Patients',
  }),
];

export const HELP_TEXT = [
  'Right now I support questions like:',
  '- show patients with diabetes',
  '- show patients with hypertension',
  '- show medications for diabetes',
  '- show medications for patient P001',
  '- show providers for patient P001',
  '- show observations for patient P001',
  '- show encounters for patient P001',
].join('\n');

export const NO_DATA_MESSAGE = "I couldn't find any data for this question.";

export function needsPatientMessage(entry: IntentEntry): string {
  const example = entry.intent.replace('-by-patient', '').replace('provider', 'providers');
  return `Please name a patient, for example 'show ${example} for patient P001'.`;
}
