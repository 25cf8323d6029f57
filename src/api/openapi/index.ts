import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import swaggerUi from 'swagger-ui-express';
import YAML from 'yaml';
import type { Express } from 'express';
import { logger } from '../../infrastructure/logger.js';

const log = logger.child({ module: 'openapi' });

const specPath = join(dirname(fileURLToPath(import.meta.url)), 'spec.yaml');

export function loadOpenApiDocument(path: string = specPath): Record<string, unknown> {
  const document: unknown = YAML.parse(readFileSync(path, 'utf-8'));
  if (document === null || typeof document !== 'object' || Array.isArray(document)) {
    throw new Error(`OpenAPI document at ${path} is not a YAML mapping`);
  }
  return { ...document };
}

export function setupOpenAPI(app: Express, document: Record<string, unknown> = loadOpenApiDocument()): void {
  app.use('/docs', swaggerUi.serve, swaggerUi.setup(document, {
    customCss: '.swagger-ui .topbar { display: none }',
    customSiteTitle: 'Text Anomaly Detection API',
  }));

  app.get('/openapi.json', (_req, res) => {
    res.json(document);
  });

  log.debug({ title: 'Text Anomaly Detection API' }, 'OpenAPI routes mounted');
}
