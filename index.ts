// index.ts
import type { Server } from 'node:http';
import * as path from 'node:path';
import { config } from 'dotenv';
import type Database from 'better-sqlite3';
import { createApp } from './app';
import { openDatabase, closeDatabase } from './services/database';
import { ActivityStore } from './services/activity-store';
import { ActivityService } from './services/activity-service';
import { seedActivities } from './services/seed';
import { logger } from './utils/logger';

config();

const PORT = parseInt(process.env.PORT || '8000', 10);
const DATABASE_PATH = process.env.DATABASE_PATH || './data/activities.db';
const STATIC_DIR = process.env.STATIC_DIR || path.resolve(process.cwd(), 'static');
const allowedOriginsEnv = process.env.ALLOWED_ORIGINS || '*';

interface RunningServer {
  server: Server;
  db: Database.Database;
}

// Start Server: open store, seed, listen
function startServer(): RunningServer {
  const db = openDatabase(DATABASE_PATH);
  const store = new ActivityStore(db);
  seedActivities(store);

  const app = createApp({
    activityService: new ActivityService(store),
    staticDir: STATIC_DIR,
    allowedOrigins: allowedOriginsEnv,
  });

  const server = app.listen(PORT, () => {
    logger.info(`Server is running on http://localhost:${PORT}`);
    logger.info(`Serving static front-end from ${STATIC_DIR}`);
    logger.info(`Allowed CORS origins: ${allowedOriginsEnv === '*' ? 'All (*)' : allowedOriginsEnv}`);
  });

  return { server, db };
}

function registerShutdown({ server, db }: RunningServer): void {
  const shutdown = (signal: string): void => {
    logger.info(`Server shutting down (${signal})...`);
    server.close((error) => {
      if (error) {
        logger.error('Error while closing HTTP server:', error);
      }
      closeDatabase(db);
      process.exit(error ? 1 : 0);
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

// Start the server if not in test mode
if (process.env.NODE_ENV !== 'test') {
  try {
    registerShutdown(startServer());
  } catch (err) {
    logger.error('Critical error during server startup. Server not started.', err);
    process.exit(1);
  }
}
