/**
 * Hint Argument Parsing
 *
 * Turns CLI hint arguments of the form `Country:distance[:direction]` into
 * hints. The distance and direction are always the trailing fields, so a
 * country name may itself contain colons or spaces.
 *
 * Examples:
 *   Thailand:7705:NW
 *   Eritrea:4985
 *   "Bosnia and Herz.:1,250km:se"
 *
 * @module cli/lib/hint-parser
 */

import type { CentroidTable } from '../../core/centroid-table.js';
import { InvalidInputError } from '../../core/errors.js';
import type { Hint } from '../../core/types.js';

const DIRECTION_FIELD = /^[A-Za-z]+$/;
const DISTANCE_FIELD = /^-?\d+(\.\d+)?$/;

/**
 * Parse a distance field, tolerating thousands separators and a "km" suffix
 *
 * @returns The number, or null when the field is not a distance
 */
export function parseDistanceField(field: string): number | null {
  const cleaned = field.trim().replace(/km$/i, '').replace(/[,_\s]/g, '');
  return DISTANCE_FIELD.test(cleaned) ? Number(cleaned) : null;
}

/**
 * Parse one hint argument
 *
 * Range checks (negative distance, unknown direction symbol) are left to
 * the scorer so the CLI and library reject the same inputs.
 *
 * @throws InvalidInputError if the argument has no country or distance
 */
export function parseHintArgument(argument: string, hintIndex = 0): Hint {
  const fields = argument.split(':');

  let direction: string | undefined;
  if (fields.length >= 3 && DIRECTION_FIELD.test(fields[fields.length - 1].trim())) {
    direction = fields.pop()?.trim();
  }

  const distanceField = fields.pop();
  const country = fields.join(':').trim();
  const distanceKm = distanceField === undefined ? null : parseDistanceField(distanceField);

  if (country === '' || distanceKm === null) {
    throw new InvalidInputError(
      `Cannot parse hint "${argument}": expected Country:distance[:direction]`,
      'invalid-hint',
      hintIndex
    );
  }

  return direction === undefined ? { country, distanceKm } : { country, distanceKm, direction };
}

/**
 * Map a country name onto the table's spelling when it matches
 * case-insensitively and unambiguously; otherwise return it unchanged
 */
export function canonicalCountryName(table: CentroidTable, name: string): string {
  if (table.has(name)) return name;

  const lowered = name.toLowerCase();
  const matches = table.names().filter((candidate) => candidate.toLowerCase() === lowered);
  return matches.length === 1 ? matches[0] : name;
}

/**
 * Parse hint arguments and align country names with a table
 */
export function parseHintArguments(argumentsList: readonly string[], table: CentroidTable): Hint[] {
  return argumentsList.map((argument, index) => {
    const hint = parseHintArgument(argument, index);
    return { ...hint, country: canonicalCountryName(table, hint.country) };
  });
}
