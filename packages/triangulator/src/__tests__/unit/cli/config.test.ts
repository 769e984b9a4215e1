/**
 * Tests for CLI configuration loading
 */

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import {
  ConfigurationError,
  DEFAULT_CONFIG,
  findConfigFile,
  loadConfig,
  parseFormat,
  parseLimit,
  parsePenalty,
  parseTolerance,
} from '../../../cli/lib/config.js';

describe('Value parsing', () => {
  describe('parsePenalty', () => {
    it('parses numbers and infinity words', () => {
      expect(parsePenalty('2.5')).toBe(2.5);
      expect(parsePenalty('0')).toBe(0);
      expect(parsePenalty('inf')).toBe(Infinity);
      expect(parsePenalty('Infinity')).toBe(Infinity);
      expect(parsePenalty(' .inf ')).toBe(Infinity);
      expect(parsePenalty(Infinity)).toBe(Infinity);
    });

    it('rejects empty, non-numeric and negative values', () => {
      expect(() => parsePenalty('')).toThrow(ConfigurationError);
      expect(() => parsePenalty('lots')).toThrow(ConfigurationError);
      expect(() => parsePenalty('-1')).toThrow(ConfigurationError);
      expect(() => parsePenalty(-0.5)).toThrow(ConfigurationError);
    });

    it('records where the value came from', () => {
      try {
        parsePenalty('-1', '--penalty');
        expect.unreachable('should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        if (error instanceof ConfigurationError) {
          expect(error.source).toBe('--penalty');
        }
      }
    });
  });

  describe('parseTolerance', () => {
    it('accepts finite non-negative degrees', () => {
      expect(parseTolerance('1.5')).toBe(1.5);
      expect(parseTolerance(0)).toBe(0);
    });

    it('rejects negative and infinite tolerances', () => {
      expect(() => parseTolerance('-0.1')).toThrow(ConfigurationError);
      expect(() => parseTolerance('inf')).toThrow(ConfigurationError);
      expect(() => parseTolerance(' ')).toThrow(ConfigurationError);
    });
  });

  describe('parseLimit', () => {
    it('accepts positive integers', () => {
      expect(parseLimit('7')).toBe(7);
      expect(parseLimit(3)).toBe(3);
    });

    it('rejects zero, fractions and words', () => {
      expect(() => parseLimit('0')).toThrow(ConfigurationError);
      expect(() => parseLimit('2.5')).toThrow(ConfigurationError);
      expect(() => parseLimit('ten')).toThrow(ConfigurationError);
    });
  });

  describe('parseFormat', () => {
    it('accepts known formats in any case', () => {
      expect(parseFormat('CSV')).toBe('csv');
      expect(parseFormat(' table ')).toBe('table');
    });

    it('rejects unknown formats', () => {
      expect(() => parseFormat('xml')).toThrow(/expected one of table, json, ndjson, csv/);
    });
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'triangulator-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('uses defaults when nothing is configured', async () => {
    const config = await loadConfig({ cwd: dir, env: {} });
    expect(config).toEqual({
      ...DEFAULT_CONFIG,
      verbose: false,
      json: false,
      configPath: null,
    });
  });

  it('reads a YAML rc file', async () => {
    await writeFile(
      join(dir, '.triangulatorrc'),
      [
        'dataset: data/centroids.json',
        'penalty: .inf',
        'tolerance: 1.5',
        'limit: 5',
        'excludeGuesses: true',
        'format: json',
      ].join('\n')
    );

    const config = await loadConfig({ cwd: dir, env: {} });
    expect(config.configPath).toBe(join(dir, '.triangulatorrc'));
    expect(config.dataset).toBe(join(dir, 'data/centroids.json'));
    expect(config.penalty).toBe(Infinity);
    expect(config.tolerance).toBe(1.5);
    expect(config.limit).toBe(5);
    expect(config.excludeGuesses).toBe(true);
    expect(config.format).toBe('json');
  });

  it('finds a JSON rc file in a parent directory', async () => {
    await writeFile(join(dir, '.triangulatorrc.json'), JSON.stringify({ limit: 3, penalty: 'inf' }));
    const nested = join(dir, 'nested', 'deeper');
    await mkdir(nested, { recursive: true });

    expect(findConfigFile(nested)).toBe(join(dir, '.triangulatorrc.json'));

    const config = await loadConfig({ cwd: nested, env: {} });
    expect(config.limit).toBe(3);
    expect(config.penalty).toBe(Infinity);
  });

  it('treats an empty rc file as empty configuration', async () => {
    await writeFile(join(dir, '.triangulatorrc.yml'), '');
    const config = await loadConfig({ cwd: dir, env: {} });
    expect(config.configPath).toBe(join(dir, '.triangulatorrc.yml'));
    expect(config.penalty).toBe(DEFAULT_CONFIG.penalty);
  });

  it('lets environment variables override the file', async () => {
    await writeFile(join(dir, '.triangulatorrc'), 'penalty: 4\nformat: csv\n');
    const config = await loadConfig({
      cwd: dir,
      env: {
        TRIANGULATOR_PENALTY: '3',
        TRIANGULATOR_EXCLUDE_GUESSES: 'yes',
        TRIANGULATOR_VERBOSE: '1',
      },
    });
    expect(config.penalty).toBe(3);
    expect(config.format).toBe('csv');
    expect(config.excludeGuesses).toBe(true);
    expect(config.verbose).toBe(true);
  });

  it('ignores empty environment variables', async () => {
    const config = await loadConfig({ cwd: dir, env: { TRIANGULATOR_LIMIT: '' } });
    expect(config.limit).toBe(DEFAULT_CONFIG.limit);
  });

  it('lets flags override environment variables', async () => {
    const config = await loadConfig({
      cwd: dir,
      env: { TRIANGULATOR_DATASET: 'from-env.json', TRIANGULATOR_JSON: 'true' },
      overrides: { dataset: 'from-flag.geojson', json: false },
    });
    expect(config.dataset).toBe(join(dir, 'from-flag.geojson'));
    expect(config.json).toBe(false);
  });

  it('resolves environment datasets against the working directory', async () => {
    const config = await loadConfig({ cwd: dir, env: { TRIANGULATOR_DATASET: 'from-env.json' } });
    expect(config.dataset).toBe(join(dir, 'from-env.json'));
  });

  it('loads an explicit config path from TRIANGULATOR_CONFIG', async () => {
    await writeFile(join(dir, 'custom.yaml'), 'limit: 2\n');
    const config = await loadConfig({ cwd: dir, env: { TRIANGULATOR_CONFIG: 'custom.yaml' } });
    expect(config.configPath).toBe(join(dir, 'custom.yaml'));
    expect(config.limit).toBe(2);
  });

  it('fails when an explicit config file is missing', async () => {
    await expect(loadConfig({ cwd: dir, env: {}, configPath: 'absent.yaml' })).rejects.toBeInstanceOf(
      ConfigurationError
    );
  });

  it('rejects unknown keys', async () => {
    await writeFile(join(dir, '.triangulatorrc'), 'penalty: 2\ncolour: blue\n');
    await expect(loadConfig({ cwd: dir, env: {} })).rejects.toThrow(/Invalid config file/);
  });

  it('rejects malformed YAML', async () => {
    await writeFile(join(dir, '.triangulatorrc'), 'penalty: [2\n');
    await expect(loadConfig({ cwd: dir, env: {} })).rejects.toThrow(/Cannot parse config file/);
  });

  it('rejects invalid values with their source', async () => {
    await expect(loadConfig({ cwd: dir, env: { TRIANGULATOR_PENALTY: '-2' } })).rejects.toMatchObject({
      name: 'ConfigurationError',
      source: 'TRIANGULATOR_PENALTY',
    });
  });
});
