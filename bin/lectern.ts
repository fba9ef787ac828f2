#!/usr/bin/env node
/**
 * Lectern CLI Entry Point
 */

import { main } from '../src/cli/index.js';

main().catch((error: unknown) => {
  console.error('Fatal error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
