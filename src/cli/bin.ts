#!/usr/bin/env node
// labdev-verify executable. Runs unconditionally, so it works through npm's bin symlink.

import { main, EXIT_USAGE } from './verify-devices.js';

export const done: Promise<void> = main().then(
  code => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error('[Verify] Fatal error:', err);
    process.exitCode = EXIT_USAGE;
  }
);
