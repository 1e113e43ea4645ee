#!/usr/bin/env node
import { createCLI } from './cli.js';

createCLI()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  });
