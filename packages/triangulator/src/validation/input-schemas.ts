/**
 * Input Validation Schemas
 *
 * Zod schemas for centroid records and hints. Everything that enters the
 * scorer from outside (dataset files, CLI arguments, library callers) is
 * checked against these before use.
 */

import { z } from 'zod';
import {
  COMPASS_DIRECTIONS,
  MAX_LATITUDE,
  MAX_LONGITUDE,
  MIN_LATITUDE,
  MIN_LONGITUDE,
} from '../core/constants.js';

// ============================================================================
// Centroids
// ============================================================================

/**
 * WGS84 centroid record
 *
 * Latitude: -90 to +90 (inclusive)
 * Longitude: -180 to +180 (inclusive)
 */
export const CountrySchema = z.object({
  name: z.string().trim().min(1, 'Country name must not be empty'),
  lon: z
    .number({ invalid_type_error: 'Longitude must be a number' })
    .finite('Longitude must be a finite number')
    .min(MIN_LONGITUDE, 'Longitude must be >= -180')
    .max(MAX_LONGITUDE, 'Longitude must be <= 180'),
  lat: z
    .number({ invalid_type_error: 'Latitude must be a number' })
    .finite('Latitude must be a finite number')
    .min(MIN_LATITUDE, 'Latitude must be >= -90')
    .max(MAX_LATITUDE, 'Latitude must be <= 90'),
});

/**
 * Centroid table file: a bare array or `{ countries: [...] }`.
 * Records are validated individually when the table is built.
 */
export const CentroidFileSchema = z.union([
  z.array(z.unknown()),
  z.object({ countries: z.array(z.unknown()) }).transform((file) => file.countries),
]);

// ============================================================================
// Hints
// ============================================================================

/**
 * Compass direction, case-insensitive, surrounding whitespace ignored
 */
export const CompassDirectionSchema = z
  .string()
  .transform((value) => value.trim().toUpperCase())
  .pipe(z.enum(COMPASS_DIRECTIONS));

/**
 * Hint as supplied by a caller. Only the shape is checked here; range
 * checks and country lookup happen against a centroid table.
 */
export const HintSchema = z.object({
  country: z.string().min(1, 'Hint country must not be empty'),
  distanceKm: z.number({
    required_error: 'Hint distance is required',
    invalid_type_error: 'Hint distance must be a number',
  }),
  direction: z.string().optional(),
});

/**
 * Extract the first issue message from a failed parse
 */
export function firstIssueMessage(error: z.ZodError, fallback: string): string {
  const issue = error.issues[0];
  if (!issue) return fallback;
  const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
  return `${path}${issue.message}`;
}
