/**
 * Shared constants for distance and direction scoring
 */

// ============================================================================
// Earth Model
// ============================================================================

/**
 * Mean Earth radius in kilometres (spherical model used by haversine)
 */
export const EARTH_RADIUS_KM = 6371.0;

export const MIN_LATITUDE = -90;
export const MAX_LATITUDE = 90;
export const MIN_LONGITUDE = -180;
export const MAX_LONGITUDE = 180;

// ============================================================================
// Directions
// ============================================================================

/**
 * The eight compass directions a hint may report
 */
export const COMPASS_DIRECTIONS = ['N', 'NE', 'E', 'SE', 'S', 'SW', 'W', 'NW'] as const;

export type CompassDirection = (typeof COMPASS_DIRECTIONS)[number];

// ============================================================================
// Scoring Defaults
// ============================================================================

/**
 * Default direction-mismatch multiplier
 */
export const DEFAULT_PENALTY = 10;

/**
 * Default directional tolerance in degrees
 */
export const DEFAULT_TOLERANCE = 0;
