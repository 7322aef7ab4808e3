import { z } from 'zod';

import type { EntityType } from './graph.schema.js';

/**
 * Source row schemas
 *
 * One schema per warehouse view. Keys are the upper-case column names; the
 * extractor upper-cases whatever the driver returns before validation.
 */

/** Non-empty identifier; numeric ids from the warehouse become strings */
const IdentifierSchema = z
  .union([z.string(), z.number(), z.bigint()])
  .transform((value) => String(value).trim())
  .pipe(z.string().min(1, 'Identifier must not be empty'));

const NullableIdentifierSchema = z
  .union([z.string(), z.number(), z.bigint()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) return null;
    const id = String(value).trim();
    return id.length > 0 ? id : null;
  });

const NullableTextSchema = z
  .union([z.string(), z.number(), z.bigint()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? null : String(value)));

const NullableNumberSchema = z
  .union([z.number(), z.string(), z.bigint()])
  .nullish()
  .transform((value, ctx) => {
    if (value === null || value === undefined) return null;
    const parsed = Number(value);
    if (typeof value === 'string' && value.trim() === '') return null;
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a number, got "${value}"` });
      return z.NEVER;
    }
    return parsed;
  });

/** Numeric strings become numbers; coded answers such as "Never smoker" stay text */
const ObservationValueSchema = z
  .union([z.number(), z.string(), z.bigint()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string') {
      const trimmed = value.trim();
      if (trimmed === '') return null;
      const parsed = Number(trimmed);
      return Number.isFinite(parsed) ? parsed : value;
    }
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : String(value);
  });

// Timestamps land in the graph as strings
const NullableTimestampSchema = z
  .union([z.date(), z.string(), z.number()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) return null;
    return value instanceof Date ? value.toISOString() : String(value);
  });

export const ProviderSourceRowSchema = z.object({
  PROVIDER_ID: IdentifierSchema,
  PROVIDER_NAME: NullableTextSchema,
  SPECIALTY: NullableTextSchema,
  STATE: NullableTextSchema,
  ZIP: NullableTextSchema,
});

export const PatientSourceRowSchema = z.object({
  PATIENT_ID: IdentifierSchema,
  FIRST_NAME: NullableTextSchema,
  LAST_NAME: NullableTextSchema,
  SEX: NullableTextSchema,
  ZIP: NullableTextSchema,
  AGE: NullableNumberSchema,
});

export const EncounterSourceRowSchema = z.object({
  ENC_ID: IdentifierSchema,
  PATIENT_ID: IdentifierSchema,
  PROVIDER_NPI: NullableIdentifierSchema,
  START_TIME: NullableTimestampSchema,
  END_TIME: NullableTimestampSchema,
});

export const ConditionSourceRowSchema = z.object({
  ENC_ID: NullableIdentifierSchema,
  PATIENT_ID: IdentifierSchema,
  ICD_CODE: IdentifierSchema,
  NAME: NullableTextSchema,
});

export const MedicationSourceRowSchema = z.object({
  ENC_ID: NullableIdentifierSchema,
  PATIENT_ID: IdentifierSchema,
  RXNORM: IdentifierSchema,
  NAME: NullableTextSchema,
});

/** Observation ids are nullable here: rows without them are skipped, not rejected */
export const ObservationSourceRowSchema = z.object({
  OBSERVATION_ID: NullableIdentifierSchema,
  PATIENT_ID: NullableIdentifierSchema,
  ENCOUNTER_ID: NullableIdentifierSchema,
  DESCRIPTION: NullableTextSchema,
  VALUE: ObservationValueSchema,
  UNIT: NullableTextSchema,
  CATEGORY: NullableTextSchema,
  CODE: NullableTextSchema,
  OBS_DATETIME: NullableTimestampSchema,
});

export const SourceRowSchemas = {
  Provider: ProviderSourceRowSchema,
  Patient: PatientSourceRowSchema,
  Encounter: EncounterSourceRowSchema,
  Condition: ConditionSourceRowSchema,
  Medication: MedicationSourceRowSchema,
  Observation: ObservationSourceRowSchema,
} as const satisfies Record<EntityType, z.ZodTypeAny>;

/**
 * Columns the extractor selects for an entity type, in select-list order
 */
export function sourceColumnsOf(entityType: EntityType): string[] {
  return Object.keys(SourceRowSchemas[entityType].shape);
}

export type ProviderSourceRow = z.infer<typeof ProviderSourceRowSchema>;
export type PatientSourceRow = z.infer<typeof PatientSourceRowSchema>;
export type EncounterSourceRow = z.infer<typeof EncounterSourceRowSchema>;
export type ConditionSourceRow = z.infer<typeof ConditionSourceRowSchema>;
export type MedicationSourceRow = z.infer<typeof MedicationSourceRowSchema>;
export type ObservationSourceRow = z.infer<typeof ObservationSourceRowSchema>;

/** A row as the driver returned it, keys upper-cased */
export type RawSourceRow = Record<string, unknown>;
