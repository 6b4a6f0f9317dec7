#!/usr/bin/env node
import { createCli } from './index.js';
import { logger } from '../utils/logger.js';

createCli().parseAsync(process.argv).catch((err: unknown) => {
  logger.error('Command failed', err instanceof Error ? err : undefined);
  process.exit(1);
});
