/**
 * Command Context
 *
 * Configuration, logger and lazily loaded session shared by every command
 * of one CLI invocation.
 *
 * @module cli/lib/context
 */

import { TriangulationSession } from '../../core/session.js';
import { BUNDLED_DATASET_PATH, loadDataset } from '../../data/loaders/centroid-loader.js';
import { loadConfig, type LoadConfigOptions, type TriangulatorConfig } from './config.js';
import { createCLILogger, type CLILogger } from './logger.js';

export interface CommandContext {
  readonly config: TriangulatorConfig;
  readonly logger: CLILogger;
  /** Load the configured dataset once and reuse it */
  loadSession(): Promise<TriangulationSession>;
}

/**
 * Build a context from an already-loaded configuration
 */
export function createCommandContext(
  config: TriangulatorConfig,
  logger: CLILogger = createCLILogger({ level: config.verbose ? 'debug' : 'info', json: config.json })
): CommandContext {
  let session: Promise<TriangulationSession> | null = null;

  return {
    config,
    logger,
    loadSession(): Promise<TriangulationSession> {
      if (!session) {
        const path = config.dataset ?? BUNDLED_DATASET_PATH;
        session = loadDataset(path, { logger }).then((table) => {
          logger.debug('Distance matrix built', { countries: table.size });
          return TriangulationSession.create(table);
        });
      }
      return session;
    },
  };
}

/**
 * Load configuration and build a context
 *
 * @throws ConfigurationError
 */
export async function initializeContext(options: LoadConfigOptions): Promise<CommandContext> {
  const config = await loadConfig(options);
  return createCommandContext(config);
}
