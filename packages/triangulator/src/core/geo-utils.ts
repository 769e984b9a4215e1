/**
 * Geographic Utilities - Spherical Distance and Longitude Arithmetic
 *
 * - haversineKm: great-circle distance on a sphere of EARTH_RADIUS_KM
 * - normalizeLongitudeDelta: shortest signed longitude difference
 */

import { EARTH_RADIUS_KM } from './constants.js';
import type { GeoPoint } from './types.js';

// ============================================================================
// Angles
// ============================================================================

export function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/**
 * Normalize a longitude difference into (-180, 180]
 *
 * A raw difference whose magnitude exceeds 180 crosses the date line the
 * long way round; shifting by 360 gives the shorter signed path.
 * Exactly -180 maps to +180.
 *
 * @param delta - Raw difference lon(to) - lon(from), in [-360, 360]
 */
export function normalizeLongitudeDelta(delta: number): number {
  if (delta > 180) return delta - 360;
  if (delta <= -180) return delta + 360;
  return delta;
}

// ============================================================================
// Distance
// ============================================================================

/**
 * Great-circle distance between two points using the haversine formula
 *
 * The haversine term is clamped to [0, 1] before the square root so that
 * rounding on antipodal or identical points never leaves asin's domain.
 *
 * @returns Distance in kilometres
 */
export function haversineKm(a: GeoPoint, b: GeoPoint): number {
  const lat1 = toRadians(a.lat);
  const lat2 = toRadians(b.lat);
  const dLat = lat2 - lat1;
  const dLon = toRadians(b.lon - a.lon);

  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLon / 2) ** 2;
  const clamped = Math.min(1, Math.max(0, h));

  return 2 * EARTH_RADIUS_KM * Math.asin(Math.sqrt(clamped));
}
