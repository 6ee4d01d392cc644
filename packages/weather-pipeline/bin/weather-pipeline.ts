#!/usr/bin/env tsx
/**
 * Weather Pipeline CLI Entry Point
 *
 * @module weather-pipeline-cli
 */

import { main } from '../src/cli/program.js';

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(2);
});
