/**
 * Express app: CORS, JSON body, request logging, API routes and the error handler.
 * Built from AppServices so tests can mount it over fakes.
 */

import express, { type Express } from 'express';
import cors from 'cors';
import type { AppServices } from '../services';
import { requestLogger } from './middleware/requestLogger';
import { errorHandler } from './middleware/errors';
import { chatRoutes } from './routes/chat.routes';
import { voiceRoutes } from './routes/voice.routes';
import { weatherRoutes } from './routes/weather.routes';
import { translateRoutes } from './routes/translate.routes';
import { infoRoutes } from './routes/info.routes';

function corsOrigin(setting: string): boolean | string[] {
  if (setting.trim() === '*') return true;
  return setting
    .split(',')
    .map((o) => o.trim())
    .filter(Boolean);
}

export function createApp(services: AppServices): Express {
  const app = express();

  app.use(cors({ origin: corsOrigin(services.config.corsOrigin), credentials: true }));
  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger);

  app.get('/', (_req, res) => {
    res.json({ status: 'online', message: 'Voice Assist Gateway is running' });
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'healthy', message: 'All systems operational', ts: new Date().toISOString() });
  });

  app.use('/api', chatRoutes(services));
  app.use('/api', voiceRoutes(services));
  app.use('/api', weatherRoutes(services));
  app.use('/api', translateRoutes(services));
  app.use('/api', infoRoutes(services));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });
  app.use(errorHandler);

  return app;
}
