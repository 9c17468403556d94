#!/usr/bin/env node
/**
 * Deploy Studio CLI
 * Netlify deploy assistant: project analysis, config generation, deploys and an AI helper
 */

import { runCLI } from './cli/index.js';

// Run the CLI
runCLI().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
