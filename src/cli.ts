#!/usr/bin/env node
import { main } from './index.js';
import { logger } from './utils/logger.js';

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  logger.error(message);
  process.exitCode = 1;
});
