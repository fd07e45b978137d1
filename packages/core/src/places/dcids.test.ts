import { describe, expect, it } from 'vitest';
import { DataCommonsValidationError } from '../datacommons/errors.js';
import {
  normalizeDcids,
  normalizeObservationDate,
  uniqueDcids,
} from './dcids.js';

describe('normalizeDcids', () => {
  it('should trim and drop blanks but keep duplicates', () => {
    expect(normalizeDcids([' geoId/06', '', 'geoId/06 ', 'geoId/36'])).toEqual([
      'geoId/06',
      'geoId/06',
      'geoId/36',
    ]);
  });

  it('should throw when nothing remains', () => {
    expect(() => normalizeDcids(['  '])).toThrow(DataCommonsValidationError);
  });
});

describe('uniqueDcids', () => {
  it('should keep the first occurrence of each DCID', () => {
    expect(uniqueDcids(['geoId/36', 'geoId/06', 'geoId/36'])).toEqual([
      'geoId/36',
      'geoId/06',
    ]);
  });
});

describe('normalizeObservationDate', () => {
  it('should default to LATEST', () => {
    expect(normalizeObservationDate()).toBe('LATEST');
    expect(normalizeObservationDate('  ')).toBe('LATEST');
    expect(normalizeObservationDate('Latest')).toBe('LATEST');
  });

  it('should keep ISO date prefixes', () => {
    expect(normalizeObservationDate(' 2020-04 ')).toBe('2020-04');
  });

  it('should reject other formats', () => {
    expect(() => normalizeObservationDate('04/2020')).toThrow(
      "Invalid date '04/2020': use YYYY, YYYY-MM, YYYY-MM-DD or LATEST",
    );
  });
});
