#!/usr/bin/env node
import { logger } from './config/logger.js';
import { main } from './app.js';

process.on('uncaughtException', (error) => {
  logger.fatal({ error }, 'Uncaught exception');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.fatal({ reason }, 'Unhandled promise rejection');
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Bootstrap crashed');
  process.exit(1);
});
