/**
 * Triangulator CLI Configuration Management
 *
 * Loads configuration from .triangulatorrc (YAML or JSON) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (TRIANGULATOR_*)
 * 3. Config file (.triangulatorrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { DEFAULT_PENALTY, DEFAULT_TOLERANCE } from '../../core/constants.js';
import { TriangulatorError } from '../../core/errors.js';
import { firstIssueMessage } from '../../validation/input-schemas.js';
import { OUTPUT_FORMATS, type OutputFormat } from './output.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Full CLI configuration
 */
export interface TriangulatorConfig {
  /** Absolute dataset path, or null for the bundled centroids */
  readonly dataset: string | null;
  /** Direction mismatch multiplier (may be Infinity) */
  readonly penalty: number;
  /** Directional tolerance in degrees */
  readonly tolerance: number;
  /** Rows printed by `rank` */
  readonly limit: number;
  /** Drop guessed countries from printed rankings */
  readonly excludeGuesses: boolean;
  readonly format: OutputFormat;

  // Runtime flags
  readonly verbose: boolean;
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Error thrown for unreadable or invalid configuration
 */
export class ConfigurationError extends TriangulatorError {
  constructor(message: string, public readonly source: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<TriangulatorConfig, 'verbose' | 'json' | 'configPath'> = {
  dataset: null,
  penalty: DEFAULT_PENALTY,
  tolerance: DEFAULT_TOLERANCE,
  limit: 10,
  excludeGuesses: false,
  format: 'table',
};

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = [
  '.triangulatorrc',
  '.triangulatorrc.yaml',
  '.triangulatorrc.yml',
  '.triangulatorrc.json',
];

// ============================================================================
// Value Parsing
// ============================================================================

const INFINITY_WORDS = new Set(['inf', '+inf', 'infinity', '+infinity', '.inf']);

/**
 * Parse a penalty: a non-negative number, or "inf"/"infinity"
 *
 * @throws ConfigurationError
 */
export function parsePenalty(value: string | number, source = 'penalty'): number {
  const penalty =
    typeof value === 'number'
      ? value
      : INFINITY_WORDS.has(value.trim().toLowerCase())
        ? Infinity
        : Number(value.trim());

  if ((typeof value === 'string' && value.trim() === '') || Number.isNaN(penalty) || penalty < 0) {
    throw new ConfigurationError(`Invalid penalty "${value}": expected a number >= 0 or "inf"`, source);
  }
  return penalty;
}

/**
 * Parse a tolerance in degrees (finite, >= 0)
 *
 * @throws ConfigurationError
 */
export function parseTolerance(value: string | number, source = 'tolerance'): number {
  const tolerance = typeof value === 'number' ? value : Number(value.trim());
  if ((typeof value === 'string' && value.trim() === '') || !Number.isFinite(tolerance) || tolerance < 0) {
    throw new ConfigurationError(`Invalid tolerance "${value}": expected degrees >= 0`, source);
  }
  return tolerance;
}

/**
 * Parse a row limit (positive integer)
 *
 * @throws ConfigurationError
 */
export function parseLimit(value: string | number, source = 'limit'): number {
  const limit = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new ConfigurationError(`Invalid limit "${value}": expected a positive integer`, source);
  }
  return limit;
}

export function parseFormat(value: string, source = 'format'): OutputFormat {
  const format = OUTPUT_FORMATS.find((candidate) => candidate === value.trim().toLowerCase());
  if (!format) {
    throw new ConfigurationError(
      `Invalid format "${value}": expected one of ${OUTPUT_FORMATS.join(', ')}`,
      source
    );
  }
  return format;
}

function parseBoolean(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  return normalized === 'true' || normalized === '1' || normalized === 'yes';
}

// ============================================================================
// Config File
// ============================================================================

/**
 * Config file structure (YAML or JSON)
 */
const ConfigFileSchema = z
  .object({
    dataset: z.string().min(1).optional(),
    penalty: z.union([z.number(), z.string()]).optional(),
    tolerance: z.union([z.number(), z.string()]).optional(),
    limit: z.union([z.number(), z.string()]).optional(),
    excludeGuesses: z.boolean().optional(),
    format: z.string().optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Find config file in a directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Read and validate a config file (YAML also covers JSON)
 */
function parseConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot parse config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  // An empty file parses to null
  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid config file ${filePath}: ${firstIssueMessage(result.error, 'unexpected shape')}`,
      filePath
    );
  }
  return result.data;
}

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory to resolve paths against and search for config files */
  cwd?: string;
  /** Environment to read TRIANGULATOR_* variables from */
  env?: NodeJS.ProcessEnv;
  /** CLI flag overrides */
  overrides?: {
    dataset?: string;
    verbose?: boolean;
    json?: boolean;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigurationError
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<TriangulatorConfig> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const getEnvVar = (name: string): string | undefined => {
    const value = env[`TRIANGULATOR_${name}`];
    return value === undefined || value === '' ? undefined : value;
  };

  // Find config file
  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  const explicitPath = options.configPath ?? getEnvVar('CONFIG');
  if (explicitPath) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`, configPath);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(cwd);
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const fileSource = configPath ?? 'config file';
  const fileDir = configPath ? dirname(configPath) : cwd;

  // Flags and env resolve against cwd, file entries against the file
  const flagDataset = options.overrides?.dataset ?? getEnvVar('DATASET');
  const dataset = flagDataset
    ? resolve(cwd, flagDataset)
    : fileConfig.dataset
      ? resolve(fileDir, fileConfig.dataset)
      : DEFAULT_CONFIG.dataset;

  const envPenalty = getEnvVar('PENALTY');
  const envTolerance = getEnvVar('TOLERANCE');
  const envLimit = getEnvVar('LIMIT');
  const envFormat = getEnvVar('FORMAT');
  const envExclude = getEnvVar('EXCLUDE_GUESSES');
  const envVerbose = getEnvVar('VERBOSE');
  const envJson = getEnvVar('JSON');

  return {
    dataset,
    penalty:
      envPenalty !== undefined
        ? parsePenalty(envPenalty, 'TRIANGULATOR_PENALTY')
        : fileConfig.penalty !== undefined
          ? parsePenalty(fileConfig.penalty, fileSource)
          : DEFAULT_CONFIG.penalty,
    tolerance:
      envTolerance !== undefined
        ? parseTolerance(envTolerance, 'TRIANGULATOR_TOLERANCE')
        : fileConfig.tolerance !== undefined
          ? parseTolerance(fileConfig.tolerance, fileSource)
          : DEFAULT_CONFIG.tolerance,
    limit:
      envLimit !== undefined
        ? parseLimit(envLimit, 'TRIANGULATOR_LIMIT')
        : fileConfig.limit !== undefined
          ? parseLimit(fileConfig.limit, fileSource)
          : DEFAULT_CONFIG.limit,
    excludeGuesses:
      envExclude !== undefined
        ? parseBoolean(envExclude)
        : fileConfig.excludeGuesses ?? DEFAULT_CONFIG.excludeGuesses,
    format:
      envFormat !== undefined
        ? parseFormat(envFormat, 'TRIANGULATOR_FORMAT')
        : fileConfig.format !== undefined
          ? parseFormat(fileConfig.format, fileSource)
          : DEFAULT_CONFIG.format,

    verbose: options.overrides?.verbose ?? (envVerbose !== undefined && parseBoolean(envVerbose)),
    json: options.overrides?.json ?? (envJson !== undefined && parseBoolean(envJson)),
    configPath,
  };
}
