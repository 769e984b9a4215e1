/**
 * Country Triangulator
 *
 * Ranks candidate countries for a geography-guessing puzzle from hints of
 * the form (guessed country, reported distance, optional direction).
 *
 * @example
 * ```typescript
 * import { TriangulationSession, loadDataset } from 'country-triangulator';
 *
 * const session = TriangulationSession.create(await loadDataset());
 * const ranking = session.rank(
 *   [
 *     { country: 'Thailand', distanceKm: 7705, direction: 'NW' },
 *     { country: 'Eritrea', distanceKm: 4985 },
 *   ],
 *   { penalty: 10 }
 * );
 * console.log(ranking.entries[0]);
 * ```
 */

// Core types
export type {
  AxisOffset,
  CompassDirection,
  Country,
  EastWest,
  GeoPoint,
  Hint,
  NorthSouth,
  Ranking,
  ResolvedHint,
  ScoreEntry,
  ScoringOptions,
} from './core/types.js';

export {
  COMPASS_DIRECTIONS,
  DEFAULT_PENALTY,
  DEFAULT_TOLERANCE,
  EARTH_RADIUS_KM,
} from './core/constants.js';

// Errors
export {
  TriangulatorError,
  InvalidInputError,
  DatasetLoadError,
  type InvalidInputReason,
} from './core/errors.js';

// Geometry
export { haversineKm, normalizeLongitudeDelta, toRadians } from './core/geo-utils.js';
export {
  classifyDirection,
  classifyOffset,
  directionToOffset,
  isDirectionCompatible,
  offsetToDirection,
  parseCompassDirection,
} from './core/direction.js';

// Tables and scoring
export { CentroidTable } from './core/centroid-table.js';
export { DistanceMatrix } from './core/distance-matrix.js';
export {
  excludeGuessedCountries,
  hintTerms,
  rankCandidates,
  resolveScoringOptions,
  scoreHint,
  validateHints,
  type ResolvedScoringOptions,
} from './core/scorer.js';
export { TriangulationSession } from './core/session.js';

// Datasets
export {
  BUNDLED_DATASET_PATH,
  centroidsFromFeatureCollection,
  loadCentroidTable,
  loadDataset,
  loadGeoJsonCentroids,
  polygonalCentroid,
  type GeoJsonCentroidOptions,
  type GeoJsonCentroidResult,
} from './data/loaders/centroid-loader.js';

// Validation
export {
  CompassDirectionSchema,
  CountrySchema,
  HintSchema,
} from './validation/input-schemas.js';

// Logging
export { createLogger, type LoggerLike, type LogLevel, type LogMetadata } from './core/utils/logger.js';
