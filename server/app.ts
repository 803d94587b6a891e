import express, { type ErrorRequestHandler } from 'express';
import cors from 'cors';
import multer from 'multer';
import { requestLogger } from './middleware/logger.js';
import { insightRoutes } from './routes/assistant.js';
import { authRoutes } from './routes/auth.js';
import { recordRoutes } from './routes/records.js';
import type { AppServices } from './services.js';

export type CreateAppOptions = {
  log?: (line: string) => void;
};

export function createApp(services: AppServices, options: CreateAppOptions = {}) {
  const app = express();

  // Middleware
  app.use(requestLogger(options.log));
  app.use(cors({ origin: services.config.corsOrigin }));
  app.use(express.json({ limit: '1mb' }));

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/api', authRoutes(services));
  app.use('/api', recordRoutes(services));
  app.use('/api', insightRoutes(services));

  app.use('/api', (req, res) => {
    res.status(404).json({ error: `Route not found: ${req.method} ${req.originalUrl}` });
  });

  // Upload limits and malformed JSON bodies end up here
  const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
    if (err instanceof multer.MulterError) {
      res.status(400).json({ error: err.message });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    console.error('Unhandled error:', err);
    res.status(500).json({ error: 'Internal server error' });
  };
  app.use(errorHandler);

  return app;
}
