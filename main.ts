#!/usr/bin/env node
'use strict';

import dotenv from 'dotenv';

import { RouterMonitorApp } from './app';
import { loadConfigFromEnv } from './lib/config';
import { errorMessage } from './lib/errors';
import { createConsoleLogger } from './lib/logger';

dotenv.config();

const logger = createConsoleLogger('router-monitor');

async function main() {
  const app = new RouterMonitorApp(loadConfigFromEnv(), { logger });

  const shutdown = (signal: string) => {
    logger.log(`Received ${signal}; waiting for the current poll cycle.`);
    app.onUninit()
      .then(() => {
        process.exit(0);
      })
      .catch((error) => {
        logger.error('Shutdown failed:', errorMessage(error));
        process.exit(1);
      });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await app.onInit();
}

main().catch((error) => {
  logger.error('Router monitor failed to start:', errorMessage(error));
  process.exitCode = 1;
});
