/**
 * Centroid Table
 *
 * Ordered, immutable list of country centroids indexed by name. Built once
 * per dataset; every later structure (distance matrix, session) refers to
 * countries by their position in this table.
 */

import { InvalidInputError } from './errors.js';
import type { Country } from './types.js';
import { CountrySchema, firstIssueMessage } from '../validation/input-schemas.js';

export class CentroidTable implements Iterable<Country> {
  private readonly countries: readonly Country[];
  private readonly indexByName: ReadonlyMap<string, number>;

  private constructor(countries: readonly Country[], indexByName: ReadonlyMap<string, number>) {
    this.countries = countries;
    this.indexByName = indexByName;
  }

  /**
   * Validate and freeze a list of centroids
   *
   * @throws InvalidInputError on an empty or duplicate name, or on a
   *   coordinate that is non-finite or outside its range
   */
  static fromCountries(input: readonly unknown[]): CentroidTable {
    const countries: Country[] = [];
    const indexByName = new Map<string, number>();

    input.forEach((record, position) => {
      const parsed = CountrySchema.safeParse(record);
      if (!parsed.success) {
        const nameIssue = parsed.error.issues.some((issue) => issue.path[0] === 'name');
        throw new InvalidInputError(
          `Invalid centroid at position ${position}: ${firstIssueMessage(parsed.error, 'malformed record')}`,
          nameIssue ? 'invalid-country-name' : 'invalid-coordinates'
        );
      }

      const { name, lon, lat } = parsed.data;
      if (indexByName.has(name)) {
        throw new InvalidInputError(`Duplicate country name: ${name}`, 'duplicate-country');
      }

      indexByName.set(name, countries.length);
      countries.push(Object.freeze({ name, lon, lat }));
    });

    return new CentroidTable(Object.freeze(countries), indexByName);
  }

  get size(): number {
    return this.countries.length;
  }

  /**
   * Position of a country, or undefined when the name is unknown
   */
  indexOf(name: string): number | undefined {
    return this.indexByName.get(name);
  }

  has(name: string): boolean {
    return this.indexByName.has(name);
  }

  /**
   * Look up a country by name
   *
   * @throws InvalidInputError if the name is not in the table
   */
  get(name: string): Country {
    const index = this.indexByName.get(name);
    if (index === undefined) {
      throw new InvalidInputError(`Unknown country: ${name}`, 'unknown-country');
    }
    return this.countries[index];
  }

  /**
   * Country at a table position
   *
   * @throws RangeError when the index is out of bounds
   */
  at(index: number): Country {
    const country = this.countries[index];
    if (country === undefined) {
      throw new RangeError(`Country index ${index} out of range (size ${this.size})`);
    }
    return country;
  }

  names(): string[] {
    return this.countries.map((country) => country.name);
  }

  toArray(): readonly Country[] {
    return this.countries;
  }

  [Symbol.iterator](): Iterator<Country> {
    return this.countries[Symbol.iterator]();
  }
}
