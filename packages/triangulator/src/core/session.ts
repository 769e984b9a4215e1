/**
 * Triangulation Session
 *
 * Immutable pairing of a centroid table with its distance matrix. Build one
 * per loaded dataset and pass it to every scoring call; the matrix is
 * computed once here and never mutated, so a session can be shared freely.
 */

import { CentroidTable } from './centroid-table.js';
import type { CompassDirection } from './constants.js';
import { classifyDirection } from './direction.js';
import { DistanceMatrix } from './distance-matrix.js';
import { rankCandidates, resolveScoringOptions, scoreHint } from './scorer.js';
import type { Country, Hint, Ranking, ScoreEntry, ScoringOptions } from './types.js';

export class TriangulationSession {
  private constructor(
    public readonly table: CentroidTable,
    public readonly matrix: DistanceMatrix
  ) {
    Object.freeze(this);
  }

  /**
   * Create a session from raw centroids or an existing table
   *
   * @throws InvalidInputError if the centroids are invalid
   */
  static create(source: CentroidTable | readonly Country[]): TriangulationSession {
    const table = source instanceof CentroidTable ? source : CentroidTable.fromCountries(source);
    return new TriangulationSession(table, DistanceMatrix.fromTable(table));
  }

  get size(): number {
    return this.table.size;
  }

  /**
   * Rank every country against a hint sequence (most likely first)
   */
  rank(hints: readonly Hint[], options: ScoringOptions = {}): Ranking {
    return rankCandidates(hints, this.table, this.matrix, options);
  }

  /**
   * Score every country against one hint
   */
  scoreHint(hint: Hint, options: ScoringOptions = {}): ScoreEntry[] {
    return scoreHint(hint, this.table, this.matrix, options);
  }

  /**
   * Great-circle distance between two countries in km
   */
  distance(from: string, to: string): number {
    return this.matrix.between(from, to);
  }

  /**
   * Implied compass direction of `to` from `from`
   *
   * @returns null when both axes are within tolerance
   */
  direction(from: string, to: string, tolerance?: number): CompassDirection | null {
    const resolved = resolveScoringOptions({ tolerance });
    return classifyDirection(this.table.get(from), this.table.get(to), resolved.tolerance);
  }
}
