/**
 * Distance Matrix
 *
 * Symmetric N×N great-circle distances between every pair of centroids in
 * a table. Each unordered pair is computed once and mirrored; the diagonal
 * stays zero. Read-only after construction.
 */

import type { CentroidTable } from './centroid-table.js';
import { InvalidInputError } from './errors.js';
import { haversineKm } from './geo-utils.js';

export class DistanceMatrix {
  private readonly table: CentroidTable;
  /** Row-major, size × size */
  private readonly cells: Float64Array;

  private constructor(table: CentroidTable, cells: Float64Array) {
    this.table = table;
    this.cells = cells;
  }

  /**
   * Build the matrix for a centroid table
   */
  static fromTable(table: CentroidTable): DistanceMatrix {
    const n = table.size;
    const cells = new Float64Array(n * n);
    const countries = table.toArray();

    for (let i = 0; i < n; i++) {
      for (let j = i + 1; j < n; j++) {
        const km = haversineKm(countries[i], countries[j]);
        cells[i * n + j] = km;
        cells[j * n + i] = km;
      }
    }

    return new DistanceMatrix(table, cells);
  }

  get size(): number {
    return this.table.size;
  }

  /**
   * Distance between two table positions
   *
   * @throws RangeError when either index is out of bounds
   */
  get(i: number, j: number): number {
    const n = this.size;
    if (!Number.isInteger(i) || !Number.isInteger(j) || i < 0 || j < 0 || i >= n || j >= n) {
      throw new RangeError(`Matrix index (${i}, ${j}) out of range (size ${n})`);
    }
    return this.cells[i * n + j];
  }

  /**
   * Distance between two countries by name
   *
   * @throws InvalidInputError if either name is unknown
   */
  between(from: string, to: string): number {
    const i = this.indexOrThrow(from);
    const j = this.indexOrThrow(to);
    return this.cells[i * this.size + j];
  }

  /**
   * Copy of one row: distances from the named country to every country,
   * in table order
   */
  row(name: string): number[] {
    return Array.from(this.rowView(this.indexOrThrow(name)));
  }

  /**
   * Read-only view of a row by index, without copying.
   * Callers must not write to the returned array.
   */
  rowView(index: number): Readonly<Float64Array> {
    const n = this.size;
    if (!Number.isInteger(index) || index < 0 || index >= n) {
      throw new RangeError(`Matrix row ${index} out of range (size ${n})`);
    }
    return this.cells.subarray(index * n, index * n + n);
  }

  private indexOrThrow(name: string): number {
    const index = this.table.indexOf(name);
    if (index === undefined) {
      throw new InvalidInputError(`Unknown country: ${name}`, 'unknown-country');
    }
    return index;
  }
}
