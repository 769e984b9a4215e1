/**
 * Tests for the rank, distance and countries commands
 */

import { describe, it, expect } from 'vitest';

import { runCountries } from '../../../cli/commands/countries.js';
import { runDistance } from '../../../cli/commands/distance.js';
import { rankLogMetadata, resolveRankSettings, runRank, type RankSettings } from '../../../cli/commands/rank.js';
import { createCLILogger } from '../../../cli/lib/logger.js';
import { ConfigurationError, DEFAULT_CONFIG, type TriangulatorConfig } from '../../../cli/lib/config.js';
import { InvalidInputError } from '../../../core/errors.js';
import { TriangulationSession } from '../../../core/session.js';

// Bravo is due north of Alpha, Delta due south, Charlie 20° east
const session = TriangulationSession.create([
  { name: 'Alpha', lon: 0, lat: 0 },
  { name: 'Bravo', lon: 0, lat: 10 },
  { name: 'Charlie', lon: 20, lat: 0 },
  { name: 'Delta', lon: 0, lat: -10 },
]);

const SETTINGS: RankSettings = {
  penalty: 10,
  tolerance: 0,
  limit: 10,
  excludeGuesses: false,
  format: 'table',
};

const CONFIG: TriangulatorConfig = {
  ...DEFAULT_CONFIG,
  verbose: false,
  json: false,
  configPath: null,
};

describe('rank command', () => {
  it('prints a ranked table', () => {
    const { output } = runRank(session, ['Alpha:1000:N'], SETTINGS);
    expect(output).toBe(
      [
        '# | Country | Error (km)',
        '--+---------+-----------',
        '1 | Bravo   |      111.9',
        '2 | Alpha   |     1000.0',
        '3 | Delta   |     1119.5',
        '4 | Charlie |     1223.9',
      ].join('\n')
    );
  });

  it('limits the printed rows but keeps the full ranking', () => {
    const result = runRank(session, ['Alpha:1000:N'], { ...SETTINGS, limit: 2 });
    expect(result.rows.map((row) => row.country)).toEqual(['Bravo', 'Alpha']);
    expect(result.ranking.entries).toHaveLength(4);
  });

  it('drops guessed countries on request and renumbers', () => {
    const result = runRank(session, ['alpha:1000:n'], { ...SETTINGS, excludeGuesses: true });
    expect(result.rows.map((row) => [row.rank, row.country])).toEqual([
      [1, 'Bravo'],
      [2, 'Delta'],
      [3, 'Charlie'],
    ]);
  });

  it('writes infinite errors as strings in JSON', () => {
    const result = runRank(session, ['Alpha:1000:N'], { ...SETTINGS, penalty: Infinity, format: 'json' });
    const rows: unknown = JSON.parse(result.output);
    expect(rows).toEqual([
      { rank: 1, country: 'Bravo', error_km: expect.closeTo(111.9493, 3) },
      { rank: 2, country: 'Alpha', error_km: 1000 },
      { rank: 3, country: 'Charlie', error_km: expect.closeTo(1223.8985, 3) },
      { rank: 4, country: 'Delta', error_km: 'Infinity' },
    ]);
  });

  it('prints infinite errors as inf in tables', () => {
    const { output } = runRank(session, ['Alpha:1000:N'], { ...SETTINGS, penalty: Infinity, limit: 4 });
    expect(output.split('\n')[5]).toBe('4 | Delta   |        inf');
  });

  it('rejects unknown countries, bad directions and malformed hints', () => {
    expect(() => runRank(session, ['Atlantis:100'], SETTINGS)).toThrow(InvalidInputError);
    expect(() => runRank(session, ['Alpha:100:NNW'], SETTINGS)).toThrow(/Invalid direction "NNW"/);
    expect(() => runRank(session, ['Alpha'], SETTINGS)).toThrow(/expected Country:distance/);
    expect(() => runRank(session, ['Alpha:-3'], SETTINGS)).toThrow(InvalidInputError);
  });

  describe('rankLogMetadata', () => {
    it('keeps an infinite penalty in JSON log lines', () => {
      const lines: string[] = [];
      const logger = createCLILogger({ level: 'debug', json: true, sink: (line) => lines.push(line) });

      logger.commandStart('rank', rankLogMetadata(2, { ...SETTINGS, penalty: Infinity }));

      expect(JSON.parse(lines[0])).toMatchObject({
        message: 'Starting rank',
        hints: 2,
        penalty: 'Infinity',
        tolerance: 0,
        limit: 10,
      });
    });

    it('logs finite penalties as numbers', () => {
      expect(rankLogMetadata(1, SETTINGS)).toEqual({ hints: 1, ...SETTINGS });
    });
  });

  describe('resolveRankSettings', () => {
    it('takes configuration values when no flag is given', () => {
      expect(resolveRankSettings({}, CONFIG)).toEqual({
        penalty: 10,
        tolerance: 0,
        limit: 10,
        excludeGuesses: false,
        format: 'table',
      });
    });

    it('lets flags win over configuration', () => {
      expect(
        resolveRankSettings(
          { penalty: 'inf', tolerance: '2', limit: '3', excludeGuesses: true, format: 'csv' },
          CONFIG
        )
      ).toEqual({ penalty: Infinity, tolerance: 2, limit: 3, excludeGuesses: true, format: 'csv' });
    });

    it('rejects invalid flags', () => {
      expect(() => resolveRankSettings({ limit: '0' }, CONFIG)).toThrow(ConfigurationError);
      expect(() => resolveRankSettings({ penalty: '-1' }, CONFIG)).toThrow(ConfigurationError);
    });
  });
});

describe('distance command', () => {
  it('prints distance and direction', () => {
    const { output } = runDistance(session, 'Alpha', 'Bravo', 0, 'table');
    expect(output).toBe(
      [
        'From  | To    | Distance (km) | Direction',
        '------+-------+---------------+----------',
        'Alpha | Bravo |        1111.9 | N',
      ].join('\n')
    );
  });

  it('matches names case-insensitively', () => {
    const { row } = runDistance(session, 'alpha', 'CHARLIE', 0, 'json');
    expect(row.from).toBe('Alpha');
    expect(row.to).toBe('Charlie');
    expect(row.distance_km).toBeCloseTo(2223.8985, 3);
    expect(row.direction).toBe('E');
  });

  it('reports no direction within tolerance', () => {
    const { row, output } = runDistance(session, 'Alpha', 'Bravo', 15, 'csv');
    expect(row.direction).toBeNull();
    expect(output).toBe('From,To,Distance (km),Direction\nAlpha,Bravo,1111.9,-');
  });

  it('rejects unknown countries', () => {
    expect(() => runDistance(session, 'Alpha', 'Atlantis', 0, 'table')).toThrow(InvalidInputError);
  });
});

describe('countries command', () => {
  it('lists centroids in table order', () => {
    expect(runCountries(session, 'csv')).toBe(
      ['Country,Lon,Lat', 'Alpha,0.00,0.00', 'Bravo,0.00,10.00', 'Charlie,20.00,0.00', 'Delta,0.00,-10.00'].join(
        '\n'
      )
    );
  });

  it('writes one object per country as NDJSON', () => {
    expect(runCountries(session, 'ndjson').split('\n')[2]).toBe('{"name":"Charlie","lon":20,"lat":0}');
  });
});
