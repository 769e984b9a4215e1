/**
 * Tests for the symmetric distance matrix
 */

import { describe, it, expect } from 'vitest';
import { CentroidTable } from '../../../core/centroid-table.js';
import { DistanceMatrix } from '../../../core/distance-matrix.js';
import { InvalidInputError } from '../../../core/errors.js';
import { haversineKm } from '../../../core/geo-utils.js';
import {
  COMPASS_ROSE,
  DATE_LINE_PAIR,
  TEN_DEGREES_KM,
  WORLD_SAMPLE,
} from '../../fixtures/centroid-fixtures.js';

describe('DistanceMatrix', () => {
  const table = CentroidTable.fromCountries(WORLD_SAMPLE);
  const matrix = DistanceMatrix.fromTable(table);
  const n = table.size;

  it('has one row and column per country', () => {
    expect(matrix.size).toBe(10);
    expect(matrix.row('Egypt')).toHaveLength(10);
  });

  it('has a zero diagonal', () => {
    for (let i = 0; i < n; i++) {
      expect(matrix.get(i, i)).toBe(0);
    }
  });

  it('is exactly symmetric', () => {
    for (let i = 0; i < n; i++) {
      for (let j = 0; j < n; j++) {
        expect(matrix.get(i, j)).toBe(matrix.get(j, i));
      }
    }
  });

  it('matches haversine for every pair', () => {
    const countries = table.toArray();
    for (let i = 0; i < n; i++) {
      for (let j = i + 1; j < n; j++) {
        expect(matrix.get(i, j)).toBe(haversineKm(countries[i], countries[j]));
      }
    }
  });

  it('satisfies the triangle inequality', () => {
    for (let i = 0; i < n; i++) {
      for (let j = 0; j < n; j++) {
        for (let k = 0; k < n; k++) {
          expect(matrix.get(i, k)).toBeLessThanOrEqual(matrix.get(i, j) + matrix.get(j, k) + 1e-6);
        }
      }
    }
  });

  it('looks up distances by name', () => {
    const rose = DistanceMatrix.fromTable(CentroidTable.fromCountries(COMPASS_ROSE));
    expect(rose.between('Origin', 'Eastland')).toBeCloseTo(TEN_DEGREES_KM, 6);
    expect(rose.between('Northland', 'Northland')).toBe(0);
  });

  it('measures short distances across the date line', () => {
    const pair = DistanceMatrix.fromTable(CentroidTable.fromCountries(DATE_LINE_PAIR));
    expect(pair.between('Westisle', 'Eastisle')).toBeCloseTo(212.6716, 3);
  });

  it('returns row copies that do not affect the matrix', () => {
    const row = matrix.row('Thailand');
    row[1] = -1;
    expect(matrix.between('Thailand', 'Eritrea')).toBeGreaterThan(0);
  });

  it('rejects unknown names', () => {
    expect(() => matrix.between('Thailand', 'Atlantis')).toThrow(InvalidInputError);
    expect(() => matrix.row('Atlantis')).toThrow(InvalidInputError);
  });

  it('rejects out-of-range indices', () => {
    expect(() => matrix.get(0, 10)).toThrow(RangeError);
    expect(() => matrix.get(-1, 0)).toThrow(RangeError);
    expect(() => matrix.get(0.5, 0)).toThrow(RangeError);
    expect(() => matrix.rowView(10)).toThrow(RangeError);
  });

  it('handles an empty table', () => {
    const empty = DistanceMatrix.fromTable(CentroidTable.fromCountries([]));
    expect(empty.size).toBe(0);
  });
});
