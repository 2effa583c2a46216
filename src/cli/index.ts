#!/usr/bin/env node
/**
 * readme-synth CLI entry point
 */

import { formatError } from "./formatters.js";
import { createProgram } from "./program.js";

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(formatError(error instanceof Error ? error : new Error(String(error))));
    process.exit(1);
  });
