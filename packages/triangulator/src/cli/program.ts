/**
 * CLI Program Definition
 *
 * Builds the commander program: global options, a preAction hook that
 * loads configuration once per invocation, and the command set.
 *
 * @module cli/program
 */

import { readFileSync } from 'node:fs';
import { Command } from 'commander';

import { registerCommands } from './commands/index.js';
import { initializeContext, type CommandContext } from './lib/context.js';

/**
 * Global options shared by every command
 */
export type GlobalOptions = {
  verbose?: boolean;
  json?: boolean;
  config?: string;
  dataset?: string;
};

export const CLI_NAME = 'triangulator';

export function getVersion(): string {
  try {
    const packageJson: unknown = JSON.parse(
      readFileSync(new URL('../../package.json', import.meta.url), 'utf-8')
    );
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch {
    // Running from a layout without package.json
  }
  return '0.0.0';
}

/**
 * Create the CLI program
 *
 * @param onContext - Receives the context once configuration is loaded
 */
export function createProgram(onContext?: (context: CommandContext) => void): Command {
  const program = new Command();
  let context: CommandContext | null = null;

  const getContext = (): CommandContext => {
    if (!context) {
      throw new Error('Command context not initialized');
    }
    return context;
  };

  program
    .name(CLI_NAME)
    .description('Rank candidate countries from distance and direction hints')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable debug logging')
    .option('--json', 'Log as JSON lines')
    .option('--config <path>', 'Path to config file (default: .triangulatorrc)')
    .option('--dataset <path>', 'Centroid dataset (.json centroids or .geojson polygons)')
    .hook('preAction', async (thisCommand) => {
      const options = thisCommand.opts<GlobalOptions>();
      context = await initializeContext({
        configPath: options.config,
        overrides: {
          dataset: options.dataset,
          verbose: options.verbose,
          json: options.json,
        },
      });
      onContext?.(context);
    });

  registerCommands(program, getContext);

  return program;
}
