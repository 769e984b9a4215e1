/**
 * Tests for TriangulationSession
 */

import { describe, it, expect } from 'vitest';
import { CentroidTable } from '../../../core/centroid-table.js';
import { InvalidInputError } from '../../../core/errors.js';
import { TriangulationSession } from '../../../core/session.js';
import { COMPASS_ROSE, DATE_LINE_PAIR, TEN_DEGREES_KM } from '../../fixtures/centroid-fixtures.js';

describe('TriangulationSession', () => {
  const session = TriangulationSession.create(COMPASS_ROSE);

  it('builds a table and matrix from raw centroids', () => {
    expect(session.size).toBe(9);
    expect(session.matrix.size).toBe(9);
    expect(session.table.names()[0]).toBe('Origin');
  });

  it('reuses an existing table', () => {
    const table = CentroidTable.fromCountries(DATE_LINE_PAIR);
    const fromTable = TriangulationSession.create(table);
    expect(fromTable.table).toBe(table);
  });

  it('rejects invalid centroids', () => {
    expect(() => TriangulationSession.create([{ name: 'Bad', lon: 0, lat: -95 }])).toThrow(InvalidInputError);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(session)).toBe(true);
  });

  it('measures distances by name', () => {
    expect(session.distance('Origin', 'Southland')).toBeCloseTo(TEN_DEGREES_KM, 6);
  });

  it('classifies directions by name', () => {
    expect(session.direction('Origin', 'Southwestia')).toBe('SW');
    expect(session.direction('Origin', 'Southwestia', 6)).toBeNull();
    expect(session.direction('Origin', 'Origin')).toBeNull();
  });

  it('classifies directions across the date line', () => {
    const pair = TriangulationSession.create(DATE_LINE_PAIR);
    expect(pair.direction('Westisle', 'Eastisle')).toBe('E');
    expect(pair.direction('Eastisle', 'Westisle')).toBe('W');
  });

  it('rejects a negative tolerance for directions', () => {
    expect(() => session.direction('Origin', 'Eastland', -1)).toThrow(InvalidInputError);
  });

  it('rejects unknown names', () => {
    expect(() => session.distance('Origin', 'Atlantis')).toThrow(InvalidInputError);
    expect(() => session.direction('Atlantis', 'Origin')).toThrow(InvalidInputError);
  });

  it('ranks and scores through the shared matrix', () => {
    const ranking = session.rank([{ country: 'Origin', distanceKm: 0 }]);
    expect(ranking.entries[0].country).toBe('Origin');
    expect(session.scoreHint({ country: 'Origin', distanceKm: 0 })).toEqual(ranking.entries);
  });

  it('gives identical results for repeated rankings', () => {
    const hints = [{ country: 'Northland', distanceKm: 1500, direction: 'S' }];
    expect(session.rank(hints, { penalty: 3 })).toEqual(session.rank(hints, { penalty: 3 }));
  });
});
