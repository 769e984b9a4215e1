#!/usr/bin/env tsx
/**
 * Country Triangulator CLI Entry Point
 *
 * @module triangulator-cli
 */

import { createProgram } from '../src/cli/program.js';
import type { CommandContext } from '../src/cli/lib/context.js';
import { EXIT_CODES, exitCodeForError } from '../src/cli/lib/exit-codes.js';
import { printError } from '../src/cli/lib/output.js';

async function main(): Promise<void> {
  const state: { context: CommandContext | null } = { context: null };
  const program = createProgram((created) => {
    state.context = created;
  });

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const exitCode = exitCodeForError(error);

    state.context?.logger.commandEnd(false, { error: message, exit_code: exitCode });
    printError(message);
    process.exit(exitCode);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.UNEXPECTED_ERROR);
});
