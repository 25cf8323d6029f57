import express from 'express';
import { setupOpenAPI } from './openapi/index.js';
import { createTextAnomalyRouter } from './routes/text-anomalies.js';
import { requestLogger } from './middleware/request-logger.js';
import { errorHandler } from './middleware/error-handler.js';
import type { TextAnomalyPipeline } from '../services/pipeline/index.js';

export function createApp(pipeline: TextAnomalyPipeline): express.Express {
  const app = express();

  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger);

  setupOpenAPI(app);

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(createTextAnomalyRouter(pipeline));

  app.use(errorHandler);

  return app;
}
