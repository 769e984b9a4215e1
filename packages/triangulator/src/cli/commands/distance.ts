/**
 * Distance Command
 *
 * Great-circle distance and implied direction between two countries.
 *
 * Usage:
 *   triangulator distance <from> <to> [--tolerance <deg>] [--format <fmt>]
 *
 * @module cli/commands/distance
 */

import type { Command } from 'commander';

import type { TriangulationSession } from '../../core/session.js';
import { parseFormat, parseTolerance } from '../lib/config.js';
import type { CommandContext } from '../lib/context.js';
import { canonicalCountryName } from '../lib/hint-parser.js';
import { formatOutput, formatters, printOutput, type OutputFormat, type TableColumn } from '../lib/output.js';

interface DistanceCliOptions {
  readonly tolerance?: string;
  readonly format?: string;
}

export interface DistanceRow {
  readonly [key: string]: unknown;
  readonly from: string;
  readonly to: string;
  readonly distance_km: number;
  /** null when both axes are within tolerance */
  readonly direction: string | null;
}

const DISTANCE_COLUMNS: TableColumn[] = [
  { key: 'from', header: 'From' },
  { key: 'to', header: 'To' },
  { key: 'distance_km', header: 'Distance (km)', align: 'right', formatter: formatters.km },
  { key: 'direction', header: 'Direction', formatter: formatters.orDash },
];

/**
 * Measure one pair of countries
 *
 * @throws InvalidInputError for unknown names or a negative tolerance
 */
export function runDistance(
  session: TriangulationSession,
  from: string,
  to: string,
  tolerance: number,
  format: OutputFormat
): { row: DistanceRow; output: string } {
  const fromName = canonicalCountryName(session.table, from);
  const toName = canonicalCountryName(session.table, to);

  const row: DistanceRow = {
    from: fromName,
    to: toName,
    distance_km: session.distance(fromName, toName),
    direction: session.direction(fromName, toName, tolerance),
  };

  return { row, output: formatOutput([row], format, DISTANCE_COLUMNS) };
}

/**
 * Register the distance command
 */
export function registerDistanceCommand(program: Command, getContext: () => CommandContext): void {
  program
    .command('distance')
    .description('Distance and implied direction between two countries')
    .argument('<from>', 'Country the direction is measured from')
    .argument('<to>', 'Country the direction points to')
    .option('--tolerance <deg>', 'Degrees treated as neither N/S nor E/W')
    .option('--format <fmt>', 'Output format: table|json|ndjson|csv')
    .action(async (from: string, to: string, options: DistanceCliOptions) => {
      const context = getContext();
      const tolerance =
        options.tolerance !== undefined
          ? parseTolerance(options.tolerance, '--tolerance')
          : context.config.tolerance;
      const format = options.format !== undefined ? parseFormat(options.format, '--format') : context.config.format;
      context.logger.commandStart('distance', { from, to, tolerance });

      const session = await context.loadSession();
      printOutput(runDistance(session, from, to, tolerance, format).output);

      context.logger.commandEnd(true);
    });
}
