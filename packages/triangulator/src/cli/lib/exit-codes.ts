/**
 * CLI exit codes and error mapping
 *
 * @module cli/lib/exit-codes
 */

import { DatasetLoadError, InvalidInputError } from '../../core/errors.js';
import { ConfigurationError } from './config.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  UNEXPECTED_ERROR: 1,
  INVALID_INPUT: 2,
  CONFIG_ERROR: 3,
  DATASET_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code for an error thrown by a command
 */
export function exitCodeForError(error: unknown): ExitCode {
  if (error instanceof InvalidInputError) return EXIT_CODES.INVALID_INPUT;
  if (error instanceof ConfigurationError) return EXIT_CODES.CONFIG_ERROR;
  if (error instanceof DatasetLoadError) return EXIT_CODES.DATASET_ERROR;
  return EXIT_CODES.UNEXPECTED_ERROR;
}
