/**
 * Hint Scorer / Ranker
 *
 * For each hint, a candidate's term is |D[guess][candidate] - reported|.
 * When the hint carries a direction and the candidate's implied direction
 * from the guess disagrees with it, the term is multiplied by the penalty.
 * Terms are summed per candidate and candidates are sorted ascending.
 *
 * All hints and options are validated before any scoring starts; an
 * invalid hint aborts the whole ranking.
 */

import type { CentroidTable } from './centroid-table.js';
import { DEFAULT_PENALTY, DEFAULT_TOLERANCE } from './constants.js';
import { classifyOffset, isDirectionCompatible, parseCompassDirection } from './direction.js';
import type { DistanceMatrix } from './distance-matrix.js';
import { InvalidInputError } from './errors.js';
import type { Hint, Ranking, ResolvedHint, ScoreEntry, ScoringOptions } from './types.js';
import { HintSchema, firstIssueMessage } from '../validation/input-schemas.js';

/**
 * Scoring options after validation and defaulting
 */
export interface ResolvedScoringOptions {
  readonly penalty: number;
  readonly tolerance: number;
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Validate penalty and tolerance, applying defaults
 *
 * Penalty may be Infinity; values below 1 are accepted even though they
 * weaken direction filtering. Negative or NaN penalties are rejected.
 *
 * @throws InvalidInputError
 */
export function resolveScoringOptions(options: ScoringOptions = {}): ResolvedScoringOptions {
  const penalty = options.penalty ?? DEFAULT_PENALTY;
  const tolerance = options.tolerance ?? DEFAULT_TOLERANCE;

  if (Number.isNaN(penalty) || penalty < 0) {
    throw new InvalidInputError(`Penalty must be a non-negative number, got ${penalty}`, 'invalid-penalty');
  }
  if (Number.isNaN(tolerance) || tolerance < 0) {
    throw new InvalidInputError(
      `Tolerance must be a non-negative number of degrees, got ${tolerance}`,
      'negative-tolerance'
    );
  }

  return { penalty, tolerance };
}

/**
 * Validate every hint against a centroid table
 *
 * @returns Hints with their table index and parsed direction
 * @throws InvalidInputError for the first invalid hint, with its index
 */
export function validateHints(hints: readonly Hint[], table: CentroidTable): ResolvedHint[] {
  return hints.map((hint, hintIndex) => {
    const parsed = HintSchema.safeParse(hint);
    if (!parsed.success) {
      throw new InvalidInputError(
        `Invalid hint #${hintIndex + 1}: ${firstIssueMessage(parsed.error, 'malformed hint')}`,
        'invalid-hint',
        hintIndex
      );
    }

    const { country, distanceKm, direction } = parsed.data;

    const index = table.indexOf(country);
    if (index === undefined) {
      throw new InvalidInputError(
        `Hint #${hintIndex + 1}: unknown country "${country}"`,
        'unknown-country',
        hintIndex
      );
    }
    if (!Number.isFinite(distanceKm)) {
      throw new InvalidInputError(
        `Hint #${hintIndex + 1}: distance must be finite, got ${distanceKm}`,
        'invalid-distance',
        hintIndex
      );
    }
    if (distanceKm < 0) {
      throw new InvalidInputError(
        `Hint #${hintIndex + 1}: distance must be >= 0, got ${distanceKm}`,
        'negative-distance',
        hintIndex
      );
    }

    return {
      country,
      index,
      distanceKm,
      direction: direction === undefined ? null : parseCompassDirection(direction, hintIndex),
    };
  });
}

// ============================================================================
// Scoring
// ============================================================================

/**
 * Per-candidate terms for one validated hint, in table order
 */
export function hintTerms(
  hint: ResolvedHint,
  table: CentroidTable,
  matrix: DistanceMatrix,
  options: ResolvedScoringOptions
): number[] {
  const distances = matrix.rowView(hint.index);
  const guess = table.at(hint.index);
  const terms = new Array<number>(table.size);

  for (let c = 0; c < table.size; c++) {
    const base = Math.abs(distances[c] - hint.distanceKm);

    if (hint.direction === null) {
      terms[c] = base;
      continue;
    }

    const implied = classifyOffset(guess, table.at(c), options.tolerance);
    if (isDirectionCompatible(hint.direction, implied)) {
      terms[c] = base;
    } else {
      // 0 * Infinity is NaN; an infinite penalty always eliminates
      terms[c] = options.penalty === Infinity ? Infinity : base * options.penalty;
    }
  }

  return terms;
}

/**
 * Sort entries (built in table order) ascending by error.
 * Array.prototype.sort is stable, so ties keep table order.
 */
function sortEntries(entries: ScoreEntry[]): ScoreEntry[] {
  return entries.sort((a, b) => {
    if (a.error === b.error) return 0;
    return a.error < b.error ? -1 : 1;
  });
}

/**
 * Score every candidate against a single hint
 */
export function scoreHint(
  hint: Hint,
  table: CentroidTable,
  matrix: DistanceMatrix,
  options: ScoringOptions = {}
): ScoreEntry[] {
  const resolvedOptions = resolveScoringOptions(options);
  const [resolved] = validateHints([hint], table);
  const terms = hintTerms(resolved, table, matrix, resolvedOptions);

  const entries = table.names().map((country, c) => ({
    country,
    error: terms[c],
    contributions: [terms[c]],
  }));
  return sortEntries(entries);
}

/**
 * Rank every country of the table against a sequence of hints
 *
 * Guessed countries are not excluded; filtering them out is up to the
 * caller. Candidates eliminated by an infinite penalty stay in the result
 * with an infinite error.
 *
 * @throws InvalidInputError before any scoring if a hint or option is invalid
 */
export function rankCandidates(
  hints: readonly Hint[],
  table: CentroidTable,
  matrix: DistanceMatrix,
  options: ScoringOptions = {}
): Ranking {
  const resolvedOptions = resolveScoringOptions(options);
  const resolvedHints = validateHints(hints, table);

  const termsByHint = resolvedHints.map((hint) => hintTerms(hint, table, matrix, resolvedOptions));

  const entries = table.names().map((country, c) => {
    const contributions = termsByHint.map((terms) => terms[c]);
    const error = contributions.reduce((sum, term) => sum + term, 0);
    return { country, error, contributions };
  });

  return {
    hints: resolvedHints,
    penalty: resolvedOptions.penalty,
    tolerance: resolvedOptions.tolerance,
    entries: sortEntries(entries),
  };
}

/**
 * Drop the guessed countries from a ranking's entries
 */
export function excludeGuessedCountries(ranking: Ranking): ScoreEntry[] {
  const guessed = new Set(ranking.hints.map((hint) => hint.country));
  return ranking.entries.filter((entry) => !guessed.has(entry.country));
}
