/**
 * Countries Command
 *
 * List the countries of the loaded dataset with their centroids.
 *
 * Usage:
 *   triangulator countries [--format <fmt>]
 *
 * @module cli/commands/countries
 */

import type { Command } from 'commander';

import type { TriangulationSession } from '../../core/session.js';
import { parseFormat } from '../lib/config.js';
import type { CommandContext } from '../lib/context.js';
import { formatOutput, formatters, printOutput, type OutputFormat, type TableColumn } from '../lib/output.js';

const COUNTRY_COLUMNS: TableColumn[] = [
  { key: 'name', header: 'Country' },
  { key: 'lon', header: 'Lon', align: 'right', formatter: formatters.degrees },
  { key: 'lat', header: 'Lat', align: 'right', formatter: formatters.degrees },
];

export function runCountries(session: TriangulationSession, format: OutputFormat): string {
  const rows = session.table.toArray().map((country) => ({
    name: country.name,
    lon: country.lon,
    lat: country.lat,
  }));
  return formatOutput(rows, format, COUNTRY_COLUMNS);
}

/**
 * Register the countries command
 */
export function registerCountriesCommand(program: Command, getContext: () => CommandContext): void {
  program
    .command('countries')
    .description('List the countries of the dataset')
    .option('--format <fmt>', 'Output format: table|json|ndjson|csv')
    .action(async (options: { format?: string }) => {
      const context = getContext();
      const format = options.format !== undefined ? parseFormat(options.format, '--format') : context.config.format;
      context.logger.commandStart('countries', { format });

      const session = await context.loadSession();
      printOutput(runCountries(session, format));

      context.logger.commandEnd(true, { countries: session.size });
    });
}
