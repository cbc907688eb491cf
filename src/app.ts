import cors from 'cors';
import express, { Application, NextFunction, Request, Response } from 'express';
import morgan from 'morgan';
import { getConfig } from './config.js';
import { isEpiError } from './errors.js';
import { createApiRoutes } from './routes/api.js';

export interface AppOptions {
  /** morgan access logging (default: true) */
  logRequests?: boolean;
  /** Overrides config.maxSectionDepth */
  maxSectionDepth?: number;
}

/**
 * Create and configure the Express application
 */
export function createApp(options: AppOptions = {}): Application {
  const config = getConfig();
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: config.jsonLimit }));
  if (options.logRequests ?? true) {
    app.use(morgan('dev'));
  }

  app.use('/api', createApiRoutes({
    maxDepth: options.maxSectionDepth ?? config.maxSectionDepth,
    untitledTitle: config.untitledSectionTitle,
  }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Domain errors carry their own status; anything else is a 500
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isEpiError(err)) {
      res.status(err.statusCode).json({ error: err.message, code: err.code });
      return;
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body', code: 'VALIDATION_FAILED' });
      return;
    }
    console.error('Unhandled error:', err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
