/**
 * Rank Command
 *
 * Rank candidate countries against a sequence of hints.
 *
 * Usage:
 *   triangulator rank <hint...> [options]
 *
 * Each hint is Country:distance[:direction], e.g. Thailand:7705:NW
 *
 * Options:
 *   --penalty <n>       Direction mismatch multiplier ("inf" eliminates)
 *   --tolerance <deg>   Degrees treated as neither N/S nor E/W
 *   --limit <n>         Rows to print (default: 10)
 *   --exclude-guesses   Leave the guessed countries out of the output
 *   --format <fmt>      Output format: table|json|ndjson|csv
 *
 * @module cli/commands/rank
 */

import type { Command } from 'commander';

import { excludeGuessedCountries } from '../../core/scorer.js';
import type { TriangulationSession } from '../../core/session.js';
import type { Ranking, ScoreEntry } from '../../core/types.js';
import { parseFormat, parseLimit, parsePenalty, parseTolerance, type TriangulatorConfig } from '../lib/config.js';
import type { CommandContext } from '../lib/context.js';
import type { LogMetadata } from '../lib/logger.js';
import { parseHintArguments } from '../lib/hint-parser.js';
import {
  formatOutput,
  formatters,
  jsonSafeNumber,
  printOutput,
  type OutputFormat,
  type TableColumn,
} from '../lib/output.js';

/**
 * Rank options as commander delivers them
 */
export interface RankCliOptions {
  readonly penalty?: string;
  readonly tolerance?: string;
  readonly limit?: string;
  readonly excludeGuesses?: boolean;
  readonly format?: string;
}

/**
 * Rank options after merging flags with configuration
 */
export interface RankSettings {
  readonly penalty: number;
  readonly tolerance: number;
  readonly limit: number;
  readonly excludeGuesses: boolean;
  readonly format: OutputFormat;
}

export interface RankRow {
  readonly [key: string]: unknown;
  readonly rank: number;
  readonly country: string;
  readonly error_km: number | string;
}

export interface RankResult {
  readonly ranking: Ranking;
  readonly rows: RankRow[];
  readonly output: string;
}

const RANK_COLUMNS: TableColumn[] = [
  { key: 'rank', header: '#', align: 'right' },
  { key: 'country', header: 'Country' },
  { key: 'error_km', header: 'Error (km)', align: 'right', formatter: formatters.km },
];

/**
 * Merge command flags over configuration
 */
export function resolveRankSettings(options: RankCliOptions, config: TriangulatorConfig): RankSettings {
  return {
    penalty: options.penalty !== undefined ? parsePenalty(options.penalty, '--penalty') : config.penalty,
    tolerance:
      options.tolerance !== undefined ? parseTolerance(options.tolerance, '--tolerance') : config.tolerance,
    limit: options.limit !== undefined ? parseLimit(options.limit, '--limit') : config.limit,
    excludeGuesses: options.excludeGuesses ?? config.excludeGuesses,
    format: options.format !== undefined ? parseFormat(options.format, '--format') : config.format,
  };
}

/**
 * Log metadata for a rank invocation; an infinite penalty is logged as a
 * string so JSON log lines keep it
 */
export function rankLogMetadata(hintCount: number, settings: RankSettings): LogMetadata {
  return { hints: hintCount, ...settings, penalty: jsonSafeNumber(settings.penalty) };
}

/**
 * Rank a session's countries against hint arguments and format the result
 *
 * @throws InvalidInputError for unparsable or invalid hints
 */
export function runRank(
  session: TriangulationSession,
  hintArguments: readonly string[],
  settings: RankSettings
): RankResult {
  const hints = parseHintArguments(hintArguments, session.table);
  const ranking = session.rank(hints, {
    penalty: settings.penalty,
    tolerance: settings.tolerance,
  });

  const entries: readonly ScoreEntry[] = settings.excludeGuesses
    ? excludeGuessedCountries(ranking)
    : ranking.entries;

  const rows = entries.slice(0, settings.limit).map((entry, index) => ({
    rank: index + 1,
    country: entry.country,
    error_km: jsonSafeNumber(entry.error),
  }));

  return { ranking, rows, output: formatOutput(rows, settings.format, RANK_COLUMNS) };
}

/**
 * Register the rank command
 */
export function registerRankCommand(program: Command, getContext: () => CommandContext): void {
  program
    .command('rank')
    .description('Rank candidate countries against hints (Country:distance[:direction])')
    .argument('<hints...>', 'Hints such as Thailand:7705:NW Eritrea:4985')
    .option('--penalty <n>', 'Direction mismatch multiplier, or "inf" to eliminate')
    .option('--tolerance <deg>', 'Degrees treated as neither N/S nor E/W')
    .option('-l, --limit <n>', 'Rows to print')
    .option('--exclude-guesses', 'Leave the guessed countries out of the output')
    .option('--format <fmt>', 'Output format: table|json|ndjson|csv')
    .action(async (hintArguments: string[], options: RankCliOptions) => {
      const context = getContext();
      const settings = resolveRankSettings(options, context.config);
      context.logger.commandStart('rank', rankLogMetadata(hintArguments.length, settings));

      const session = await context.loadSession();
      const result = runRank(session, hintArguments, settings);
      printOutput(result.output);

      context.logger.commandEnd(true, { candidates: result.ranking.entries.length });
    });
}
