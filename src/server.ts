#!/usr/bin/env node

import express, { Express } from 'express';
import cors from 'cors';
import { Server } from 'http';
import { createDashboardRouter } from './api/dashboard-routes.js';
import { createSupabaseClient } from './database/client.js';
import { SnapshotStore, SupabaseSnapshotStore } from './database/snapshot-store.js';
import { loadConfig } from './utils/config.js';
import { logger } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';

export function createApp(store: SnapshotStore, now?: () => Date): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Health check endpoint
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use('/api', createDashboardRouter(store, now));

  return app;
}

export function startServer(store: SnapshotStore, port: number): Server {
  return createApp(store).listen(port, () => {
    logger.info('API server started', { port });
    logger.info(`Health check: http://localhost:${port}/api/health`);
  });
}

// Run if called directly
if (import.meta.url === `file://${process.argv[1]}`) {
  try {
    const config = loadConfig();
    startServer(new SupabaseSnapshotStore(createSupabaseClient(config)), config.app.apiPort);
  } catch (error) {
    logger.error('Failed to start API server', { error: errorMessage(error) });
    process.exit(1);
  }
}
