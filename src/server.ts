import dotenv from 'dotenv';
dotenv.config();

import { createApp } from './app';
import type { SqliteDatabase } from './config/database';
import { openDatabase } from './config/database';
import logger from './config/logger';
import type { AppConfig } from './config/settings';
import { getConfig } from './config/settings';
import { createServices } from './container';

function loadConfigOrExit(): AppConfig {
  try {
    return getConfig();
  } catch (error) {
    logger.error('Invalid configuration:', error);
    process.exit(1);
  }
}

function openDatabaseOrExit(databasePath: string): SqliteDatabase {
  try {
    const db = openDatabase(databasePath);
    logger.info(`Database ready at ${databasePath}`);
    return db;
  } catch (error) {
    logger.error('Failed to initialize database:', error);
    process.exit(1);
  }
}

const config = loadConfigOrExit();
const db = openDatabaseOrExit(config.databasePath);

const services = createServices(config, db);
services.worker.start();

const app = createApp({
  queue: services.queue,
  events: services.events,
  apiKey: config.apiKey,
  health: () => ({ worker: services.worker.running, tickInProgress: services.scheduler.isRunning }),
});

const server = app.listen(config.port, () => {
  logger.info(`Audiobook pipeline API listening on port ${config.port}`);
  logger.info(`Environment: ${process.env.NODE_ENV || 'development'}`);
});

function shutdown(signal: string) {
  logger.info(`${signal} signal received: stopping worker and closing HTTP server`);
  services.worker
    .stop()
    .catch((error: unknown) => logger.error('Worker did not stop cleanly:', error))
    .finally(() => {
      server.close(() => {
        db.close();
        logger.info('HTTP server closed');
        process.exit(0);
      });
    });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
