#!/usr/bin/env node
import { Logger } from './utils/logger.js';
import { run } from './cli.js';

const logger = new Logger('Main');

run(process.argv.slice(2)).catch(error => {
  logger.error('❌ Failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
