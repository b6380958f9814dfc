import express from 'express';
import cors from 'cors';
import { createLogger } from '@brillopad/parser';
import { AppConfig } from './config.js';
import { createUploadRouter } from './routes/upload.js';
import { createParseRouter } from './routes/parse.js';
import { ResultStore } from './store.js';

const log = createLogger('server');

export function createApp(config: AppConfig, store = new ResultStore(config.resultTtlMs)) {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Routes
  app.use('/api/upload', createUploadRouter(config));
  app.use('/api/parse', createParseRouter(config, store));

  // Error handler
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    log.error(err.message);
    res.status(500).json({ error: err.message });
  });

  return app;
}
