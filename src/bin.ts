#!/usr/bin/env node
import { run } from './cli/program.js';
import { logger } from './utils/logger.js';

run().catch((err: unknown) => {
  logger.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
