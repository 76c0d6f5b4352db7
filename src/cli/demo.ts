#!/usr/bin/env node
// Demo CLI - send one prompt to a local backend and print the answer with timings
// Usage: npx tsx src/cli/demo.ts [--backend <name>] [--prompt <text>] [--stream] [--raw]

import { config } from 'dotenv';
import { runDemo } from './run.js';

config();

runDemo(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`Fatal: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  },
);
