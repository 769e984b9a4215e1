/**
 * Country Triangulator Core Types
 *
 * Shared type definitions for the centroid table, hints and rankings.
 * Every record here is treated as immutable once constructed.
 */

import type { CompassDirection } from './constants.js';

export type { CompassDirection } from './constants.js';

// ============================================================================
// Geography
// ============================================================================

/**
 * A point in decimal degrees
 */
export interface GeoPoint {
  readonly lon: number;
  readonly lat: number;
}

/**
 * Representative centroid of a country
 */
export interface Country extends GeoPoint {
  /** Canonical name, unique across a centroid table */
  readonly name: string;
}

/**
 * North/south component of a direction
 */
export type NorthSouth = 'N' | 'S';

/**
 * East/west component of a direction
 */
export type EastWest = 'E' | 'W';

/**
 * Per-axis classification of the offset between two points.
 * `null` marks an axis whose delta is within tolerance.
 */
export interface AxisOffset {
  readonly ns: NorthSouth | null;
  readonly ew: EastWest | null;
}

// ============================================================================
// Hints and Scoring
// ============================================================================

/**
 * Player hint: a guessed country, the reported distance to the target,
 * and optionally the reported direction from the guess to the target.
 *
 * `direction` is typed as string because hints usually arrive from user
 * input; it is parsed during validation.
 */
export interface Hint {
  readonly country: string;
  readonly distanceKm: number;
  readonly direction?: CompassDirection | string;
}

/**
 * Hint after validation against a centroid table
 */
export interface ResolvedHint {
  readonly country: string;
  readonly index: number;
  readonly distanceKm: number;
  readonly direction: CompassDirection | null;
}

/**
 * Scoring options
 */
export interface ScoringOptions {
  /** Multiplier for direction mismatches (default 10, may be Infinity) */
  readonly penalty?: number;
  /** Degrees within which an axis delta counts as neutral (default 0) */
  readonly tolerance?: number;
}

/**
 * Score of one candidate country
 */
export interface ScoreEntry {
  readonly country: string;
  /** Aggregate error in km; lower is better */
  readonly error: number;
  /** Per-hint terms, in hint order. Sums to `error`. */
  readonly contributions: readonly number[];
}

/**
 * Result of ranking a hint sequence
 */
export interface Ranking {
  readonly hints: readonly ResolvedHint[];
  readonly penalty: number;
  readonly tolerance: number;
  /** Every candidate, ascending by error; ties keep table order */
  readonly entries: readonly ScoreEntry[];
}
