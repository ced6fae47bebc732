#!/usr/bin/env node

/**
 * CLI entry point for the batch document converter
 */

import { createProgram } from "./program";

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
