#!/usr/bin/env node
/**
 * Satori Telegram — Entry Point
 */

import { run } from './cli/main.js';

// `satori-telegram render ... | head` may close stdout before the plan is written.
process.stdout.on('error', (error: NodeJS.ErrnoException) => {
  if (error.code !== 'EPIPE') throw error;
  process.exit(process.exitCode ?? 0);
});

await run(process.argv);
