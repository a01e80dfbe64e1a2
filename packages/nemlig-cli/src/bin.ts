#!/usr/bin/env -S npx tsx
import { main } from './cli.js';

main(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('[nemlig] Unexpected failure:', error);
    process.exitCode = 1;
  }
);
