#!/usr/bin/env node
import './config/env';
import { run } from './cli';
import { logger } from './utils/logger';

run(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error(error instanceof Error ? error : String(error));
    process.exitCode = 1;
  });
