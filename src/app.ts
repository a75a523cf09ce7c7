import express, { Application } from 'express';
import morgan from 'morgan';
import { TocgenConfig } from './config.js';
import { createApiRoutes } from './routes/api.js';
import { getVersion } from './version.js';

/**
 * Create and configure the Express application
 */
export function createApp(config: TocgenConfig = {}): Application {
  const app = express();

  // Middleware
  app.use(morgan('dev'));
  app.use(express.json({ limit: '5mb' }));

  // API routes
  app.use('/api', createApiRoutes(config));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: getVersion()
    });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
