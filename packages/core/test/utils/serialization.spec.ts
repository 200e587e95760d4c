/**
 * Serialization Tests
 */

import { describe, expect, it } from 'vitest';
import {
  convertDatesToISOStrings,
  serializeDocument,
  toSnakeCase,
  toSnakeCaseKeys,
} from '../../src/utils/serialization.js';
import { createMockQuantiles, createMockRecord } from '../helpers/fixtures.js';

describe('convertDatesToISOStrings', () => {
  it('should convert nested dates', () => {
    expect(convertDatesToISOStrings({ nested: { at: new Date('2025-01-02T00:00:00.000Z') } })).toEqual({
      nested: { at: '2025-01-02T00:00:00.000Z' },
    });
  });

  it('should convert dates inside arrays', () => {
    expect(convertDatesToISOStrings([new Date(0), 'x'])).toEqual(['1970-01-01T00:00:00.000Z', 'x']);
  });

  it('should pass primitives and null through', () => {
    expect(convertDatesToISOStrings(null)).toBeNull();
    expect(convertDatesToISOStrings(3)).toBe(3);
    expect(convertDatesToISOStrings('text')).toBe('text');
  });

  it('should throw RangeError for an invalid date', () => {
    expect(() => convertDatesToISOStrings({ at: new Date(Number.NaN) })).toThrow(RangeError);
  });
});

describe('toSnakeCase', () => {
  it.each([
    ['initialAnomalyScore', 'initial_anomaly_score'],
    ['jobId', 'job_id'],
    ['probability', 'probability'],
  ])('should convert %s to %s', (input, expected) => {
    expect(toSnakeCase(input)).toBe(expected);
  });
});

describe('toSnakeCaseKeys', () => {
  it('should rename nested keys and drop undefined values', () => {
    expect(
      toSnakeCaseKeys({
        jobId: 'job-1',
        overFieldName: undefined,
        causes: [{ influencerFieldName: 'host' }],
        nullable: null,
      }),
    ).toEqual({
      job_id: 'job-1',
      causes: [{ influencer_field_name: 'host' }],
      nullable: null,
    });
  });
});

describe('serializeDocument', () => {
  it('should produce snake_case JSON with ISO dates', () => {
    expect(serializeDocument(createMockQuantiles())).toBe(
      '{"result_type":"quantiles","job_id":"job-1","timestamp":"2024-01-01T00:00:00.000Z","quantile_state":"quantile-state"}',
    );
  });

  it('should omit absent optional fields', () => {
    const parsed: Record<string, unknown> = JSON.parse(serializeDocument(createMockRecord()));
    expect(parsed.record_score).toBe(80);
    expect(parsed.sequence_num).toBe(1);
    expect(Object.hasOwn(parsed, 'by_field_value')).toBe(false);
  });

  it('should throw for an invalid timestamp', () => {
    expect(() => serializeDocument(createMockRecord({ timestamp: new Date(Number.NaN) }))).toThrow(RangeError);
  });
});
