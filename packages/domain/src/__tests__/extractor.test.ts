import { describe, it, expect, vi } from 'vitest';
import {
  SourceQueryError,
  SourceUnavailableError,
  ValidationError,
  type SourceConnection,
  type SourceResult,
} from '@clinigraph/core';
import { Extractor, buildExtractStatement } from '../sync/extractor.js';
import { FakeSource, alice } from './fakes.js';

function sourceReturning(result: Promise<SourceResult>): SourceConnection {
  return {
    driver: 'stub',
    query: vi.fn().mockReturnValue(result),
    close: vi.fn().mockResolvedValue(undefined),
  };
}

describe('buildExtractStatement', () => {
  it('should select the view columns with the row cap', () => {
    expect(buildExtractStatement('Patient', 7000)).toBe(
      'SELECT PATIENT_ID, FIRST_NAME, LAST_NAME, SEX, ZIP, AGE FROM V_PATIENTS LIMIT 7000'
    );
  });

  it('should filter and order observations and qualify the view', () => {
    expect(buildExtractStatement('Observation', 100, 'MEDIGRAPH.PUBLIC')).toBe(
      'SELECT OBSERVATION_ID, PATIENT_ID, ENCOUNTER_ID, DESCRIPTION, VALUE, UNIT, CATEGORY, CODE, OBS_DATETIME ' +
        'FROM MEDIGRAPH.PUBLIC.OBSERVATIONS WHERE OBSERVATION_ID IS NOT NULL ORDER BY OBS_DATETIME LIMIT 100'
    );
  });
});

describe('Extractor', () => {
  it('should return rows in source order up to the cap', async () => {
    const bob = { ...alice, PATIENT_ID: 'P002', FIRST_NAME: 'Bob' };
    const source = new FakeSource({ Patient: [alice, bob] });

    const rows = await new Extractor(source).fetch('Patient', 1);

    expect(rows).toEqual([alice]);
    expect(source.statements).toEqual([
      'SELECT PATIENT_ID, FIRST_NAME, LAST_NAME, SEX, ZIP, AGE FROM V_PATIENTS LIMIT 1',
    ]);
  });

  it('should upper-case column names from drivers that fold to lower case', async () => {
    const source = sourceReturning(
      Promise.resolve({
        columns: ['rxnorm', 'name', 'enc_id', 'patient_id'],
        rows: [{ rxnorm: '860975', name: 'Metformin', enc_id: null, patient_id: 'P001' }],
      })
    );

    const rows = await new Extractor(source).fetch('Medication', 10);

    expect(rows).toEqual([{ RXNORM: '860975', NAME: 'Metformin', ENC_ID: null, PATIENT_ID: 'P001' }]);
  });

  it('should fail with the missing columns', async () => {
    const source = sourceReturning(
      Promise.resolve({
        columns: ['PATIENT_ID', 'FIRST_NAME', 'LAST_NAME', 'SEX', 'ZIP'],
        rows: [],
      })
    );

    const error = await new Extractor(source).fetch('Patient', 10).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SourceQueryError);
    expect(error).toMatchObject({
      message: 'Patient extract failed: missing columns AGE',
      missingColumns: ['AGE'],
    });
  });

  it('should wrap a rejected statement', async () => {
    const source = sourceReturning(Promise.reject(new Error("Object 'V_PATIENTS' does not exist")));

    await expect(new Extractor(source).fetch('Patient', 10)).rejects.toThrow(
      "Patient extract failed: Object 'V_PATIENTS' does not exist"
    );
  });

  it('should let connection failures through unchanged', async () => {
    const unavailable = new SourceUnavailableError();
    const source = sourceReturning(Promise.reject(unavailable));

    await expect(new Extractor(source).fetch('Provider', 10)).rejects.toBe(unavailable);
  });

  it('should reject a non-positive row cap before querying', async () => {
    const source = new FakeSource();

    await expect(new Extractor(source).fetch('Patient', 0)).rejects.toBeInstanceOf(ValidationError);
    await expect(new Extractor(source).fetch('Patient', 2.5)).rejects.toBeInstanceOf(ValidationError);
    expect(source.statements).toEqual([]);
  });
});
