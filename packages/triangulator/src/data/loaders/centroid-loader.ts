/**
 * Centroid Dataset Loader
 *
 * Builds a CentroidTable from one of two on-disk formats:
 * - JSON centroid tables: `[{ name, lon, lat }]` or `{ countries: [...] }`
 * - GeoJSON FeatureCollections of country polygons; each centroid is the
 *   area-weighted center of mass computed with turf
 *
 * USAGE:
 * ```typescript
 * const table = await loadDataset('./data/country-centroids.json');
 * const session = TriangulationSession.create(table);
 * ```
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { area, centerOfMass, centroid } from '@turf/turf';
import type { FeatureCollection, MultiPolygon, Polygon } from 'geojson';
import { z } from 'zod';

import { CentroidTable } from '../../core/centroid-table.js';
import { DatasetLoadError } from '../../core/errors.js';
import type { Country, GeoPoint } from '../../core/types.js';
import { createLogger, type LoggerLike } from '../../core/utils/logger.js';
import { CentroidFileSchema, firstIssueMessage } from '../../validation/input-schemas.js';

/**
 * Approximate country centroids shipped with the package
 */
export const BUNDLED_DATASET_PATH = fileURLToPath(
  new URL('../../../data/country-centroids.json', import.meta.url)
);

export interface GeoJsonCentroidOptions {
  /** Feature property holding the country name (default: 'name') */
  readonly nameProperty?: string;
  readonly logger?: LoggerLike;
}

export interface GeoJsonCentroidResult {
  readonly countries: Country[];
  /** Features without a polygonal geometry or a string name */
  readonly skipped: number;
}

// ============================================================================
// Schemas
// ============================================================================

const PositionSchema = z.array(z.number()).min(2);

const PolygonSchema = z.object({
  type: z.literal('Polygon'),
  coordinates: z.array(z.array(PositionSchema)),
});

const MultiPolygonSchema = z.object({
  type: z.literal('MultiPolygon'),
  coordinates: z.array(z.array(z.array(PositionSchema))),
});

const PolygonalGeometrySchema = z.discriminatedUnion('type', [PolygonSchema, MultiPolygonSchema]);

const FeatureCollectionSchema = z.object({
  type: z.literal('FeatureCollection'),
  features: z.array(
    z.object({
      properties: z.record(z.unknown()).nullable().optional(),
      geometry: z.unknown(),
    })
  ),
});

// ============================================================================
// Geometry
// ============================================================================

/**
 * Area-weighted centroid of a polygon or multipolygon
 *
 * Multipolygon parts are weighted by their geodesic area. Parts are
 * averaged in plain degrees, so a country straddling the date line gets
 * a centroid on the wrong side of the globe.
 */
export function polygonalCentroid(geometry: Polygon | MultiPolygon): GeoPoint {
  if (geometry.type === 'Polygon') {
    const [lon, lat] = centerOfMass(geometry).geometry.coordinates;
    return { lon, lat };
  }

  let totalArea = 0;
  let lonSum = 0;
  let latSum = 0;

  for (const rings of geometry.coordinates) {
    const part: Polygon = { type: 'Polygon', coordinates: rings };
    const partArea = area(part);
    const [lon, lat] = centerOfMass(part).geometry.coordinates;
    totalArea += partArea;
    lonSum += lon * partArea;
    latSum += lat * partArea;
  }

  if (totalArea === 0) {
    const [lon, lat] = centroid(geometry).geometry.coordinates;
    return { lon, lat };
  }

  return { lon: lonSum / totalArea, lat: latSum / totalArea };
}

function extractCentroids(input: unknown, options: GeoJsonCentroidOptions): GeoJsonCentroidResult {
  const nameProperty = options.nameProperty ?? 'name';
  const log = options.logger ?? createLogger('centroid-loader');

  const parsed = FeatureCollectionSchema.safeParse(input);
  if (!parsed.success) {
    throw new TypeError(
      `Not a GeoJSON FeatureCollection: ${firstIssueMessage(parsed.error, 'unexpected shape')}`
    );
  }

  const countries: Country[] = [];
  let skipped = 0;

  parsed.data.features.forEach((feature, position) => {
    const name = feature.properties?.[nameProperty];
    const geometry = PolygonalGeometrySchema.safeParse(feature.geometry);

    if (typeof name !== 'string' || name.trim() === '' || !geometry.success) {
      skipped++;
      log.debug('Skipping feature', {
        position,
        reason: typeof name !== 'string' || name.trim() === '' ? 'missing name' : 'not polygonal',
      });
      return;
    }

    const point = polygonalCentroid(geometry.data);
    countries.push({ name: name.trim(), lon: point.lon, lat: point.lat });
  });

  if (skipped > 0) {
    log.warn('Skipped features without a name or polygon geometry', { skipped });
  }

  return { countries, skipped };
}

/**
 * Compute one centroid per named polygonal feature
 */
export function centroidsFromFeatureCollection(
  collection: FeatureCollection,
  options: GeoJsonCentroidOptions = {}
): GeoJsonCentroidResult {
  return extractCentroids(collection, options);
}

// ============================================================================
// File Loading
// ============================================================================

async function readJsonFile(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new DatasetLoadError(
      `Cannot read dataset ${path}: ${error instanceof Error ? error.message : String(error)}`,
      path,
      error
    );
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new DatasetLoadError(
      `Dataset ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      path,
      error
    );
  }
}

/**
 * Load a JSON centroid table file
 *
 * @throws DatasetLoadError if the file is unreadable or not a centroid list
 * @throws InvalidInputError if a record is invalid or a name is duplicated
 */
export async function loadCentroidTable(path: string): Promise<CentroidTable> {
  const raw = await readJsonFile(path);
  const parsed = CentroidFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DatasetLoadError(
      `Dataset ${path} must be an array of centroids or { countries: [...] }`,
      path
    );
  }
  return CentroidTable.fromCountries(parsed.data);
}

/**
 * Load a GeoJSON FeatureCollection of country polygons
 *
 * @throws DatasetLoadError if the file is unreadable or not a FeatureCollection
 * @throws InvalidInputError if two features share a name
 */
export async function loadGeoJsonCentroids(
  path: string,
  options: GeoJsonCentroidOptions = {}
): Promise<CentroidTable> {
  const raw = await readJsonFile(path);

  let result: GeoJsonCentroidResult;
  try {
    result = extractCentroids(raw, options);
  } catch (error) {
    if (error instanceof TypeError) {
      throw new DatasetLoadError(`Dataset ${path}: ${error.message}`, path, error);
    }
    throw error;
  }

  return CentroidTable.fromCountries(result.countries);
}

/**
 * Load a dataset, choosing the format by extension
 *
 * `.geojson` files are read as country polygons; anything else as a JSON
 * centroid table.
 */
export async function loadDataset(
  path: string = BUNDLED_DATASET_PATH,
  options: GeoJsonCentroidOptions = {}
): Promise<CentroidTable> {
  const log = options.logger ?? createLogger('centroid-loader');
  const isGeoJson = extname(path).toLowerCase() === '.geojson';

  const table = isGeoJson ? await loadGeoJsonCentroids(path, options) : await loadCentroidTable(path);

  log.debug('Loaded centroid dataset', {
    path,
    format: isGeoJson ? 'geojson' : 'centroids',
    countries: table.size,
  });
  return table;
}
