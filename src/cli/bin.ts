#!/usr/bin/env node
import { createCli } from './index.js';
import { logger as log } from '../utils/logger.js';

createCli()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    log.error(error instanceof Error ? error.message : 'Unknown error');
    process.exit(1);
  });
