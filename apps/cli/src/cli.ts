#!/usr/bin/env node

import { CommanderError } from "commander";
import { createProgram } from "./program";

const program = createProgram();

// Global error handler
program.exitOverride();

async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      // --help, --version and usage errors have already been printed
      process.exit(error.exitCode);
    }
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
    } else {
      console.error("An unexpected error occurred");
    }
    process.exit(1);
  }
}

main();
