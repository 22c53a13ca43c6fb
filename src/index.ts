#!/usr/bin/env node

// Loads .env; must stay the first import so the logger sees CPC_LOG_LEVEL
import 'dotenv/config';

import { runCli } from './cli/cli.js';

/**
 * Main entry point for the cpc CLI.
 */
async function main(): Promise<void> {
  try {
    await runCli();
  } catch (error) {
    // eslint-disable-next-line no-console -- CLI error output
    console.error(
      'Fatal error:',
      error instanceof Error ? error.message : String(error)
    );
    process.exitCode = 1;
  }
}

void main();
