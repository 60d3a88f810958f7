#!/usr/bin/env node

import { createProgram } from './program.js';

const program = createProgram();

// Error handling
program.exitOverride((err) => {
  if (
    err.code === 'commander.help' ||
    err.code === 'commander.helpDisplayed' ||
    err.code === 'commander.version'
  ) {
    process.exit(0);
  }
  process.exit(1);
});

// Parse arguments
await program.parseAsync();
