/**
 * CLI Commands Index
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import type { CommandContext } from '../lib/context.js';
import { registerCountriesCommand } from './countries.js';
import { registerDistanceCommand } from './distance.js';
import { registerRankCommand } from './rank.js';

export { runRank, resolveRankSettings, rankLogMetadata, registerRankCommand } from './rank.js';
export type { RankCliOptions, RankResult, RankRow, RankSettings } from './rank.js';
export { runDistance, registerDistanceCommand } from './distance.js';
export type { DistanceRow } from './distance.js';
export { runCountries, registerCountriesCommand } from './countries.js';

/**
 * Register every command on a program
 */
export function registerCommands(program: Command, getContext: () => CommandContext): void {
  registerRankCommand(program, getContext);
  registerDistanceCommand(program, getContext);
  registerCountriesCommand(program, getContext);
}
