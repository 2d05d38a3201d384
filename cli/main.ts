/**
 * routegraph CLI entry point
 */

import { CommanderError } from 'commander';
import dotenv from 'dotenv';
import { EXIT_USAGE } from './output';
import { createProgram } from './program';

async function main(): Promise<void> {
  dotenv.config();

  try {
    await createProgram().parseAsync(process.argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      // help and version exit with 0; anything else is a usage error
      process.exitCode = error.exitCode === 0 ? 0 : EXIT_USAGE;
      return;
    }
    throw error;
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = EXIT_USAGE;
});
