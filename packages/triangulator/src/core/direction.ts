/**
 * Direction Classifier
 *
 * Approximates the compass direction from one centroid to another by
 * comparing latitude and (date-line adjusted) longitude independently.
 * This is a rectangular approximation, not a geodesic bearing: it drifts
 * near the poles and for very long east-west paths.
 */

import type { CompassDirection } from './constants.js';
import { InvalidInputError } from './errors.js';
import { normalizeLongitudeDelta } from './geo-utils.js';
import type { AxisOffset, EastWest, GeoPoint, NorthSouth } from './types.js';
import { CompassDirectionSchema } from '../validation/input-schemas.js';

/**
 * Classify the offset of `to` relative to `from` on each axis
 *
 * An axis whose absolute delta is within `tolerance` degrees is neutral
 * (`null`).
 */
export function classifyOffset(from: GeoPoint, to: GeoPoint, tolerance = 0): AxisOffset {
  const dLat = to.lat - from.lat;
  const dLon = normalizeLongitudeDelta(to.lon - from.lon);

  let ns: NorthSouth | null = null;
  if (Math.abs(dLat) > tolerance) {
    ns = dLat > 0 ? 'N' : 'S';
  }

  let ew: EastWest | null = null;
  if (Math.abs(dLon) > tolerance) {
    ew = dLon > 0 ? 'E' : 'W';
  }

  return { ns, ew };
}

/**
 * Combine per-axis components into a compass direction
 *
 * @returns The direction, or null when both axes are neutral
 */
export function offsetToDirection(offset: AxisOffset): CompassDirection | null {
  const { ns, ew } = offset;
  if (ns && ew) return `${ns}${ew}`;
  return ns ?? ew;
}

/**
 * Split a compass direction into its axis components
 */
export function directionToOffset(direction: CompassDirection): AxisOffset {
  const ns = direction.startsWith('N') ? 'N' : direction.startsWith('S') ? 'S' : null;
  const ew = direction.endsWith('E') ? 'E' : direction.endsWith('W') ? 'W' : null;
  return { ns, ew };
}

/**
 * Compass direction of `to` as seen from `from`
 *
 * @returns One of the eight directions, or null when both axes are within
 *   tolerance
 */
export function classifyDirection(
  from: GeoPoint,
  to: GeoPoint,
  tolerance = 0
): CompassDirection | null {
  return offsetToDirection(classifyOffset(from, to, tolerance));
}

/**
 * Whether an implied offset agrees with a reported direction
 *
 * Checked per axis: on every axis where the reported direction has a
 * component, the implied component must be the same or neutral. Axes the
 * reported direction does not mention are ignored, so a fully neutral
 * offset is compatible with every direction.
 */
export function isDirectionCompatible(
  reported: CompassDirection,
  implied: AxisOffset | CompassDirection | null
): boolean {
  const expected = directionToOffset(reported);
  const actual =
    implied === null
      ? { ns: null, ew: null }
      : typeof implied === 'string'
        ? directionToOffset(implied)
        : implied;

  if (expected.ns !== null && actual.ns !== null && actual.ns !== expected.ns) return false;
  if (expected.ew !== null && actual.ew !== null && actual.ew !== expected.ew) return false;
  return true;
}

/**
 * Parse a user-supplied direction string
 *
 * Accepts the eight symbols in any case, ignoring surrounding whitespace.
 *
 * @throws InvalidInputError for anything else (e.g. "NNW")
 */
export function parseCompassDirection(value: string, hintIndex?: number): CompassDirection {
  const parsed = CompassDirectionSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidInputError(
      `Invalid direction "${value}": expected one of N, NE, E, SE, S, SW, W, NW`,
      'invalid-direction',
      hintIndex
    );
  }
  return parsed.data;
}
