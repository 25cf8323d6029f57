import 'dotenv/config';
import { createApp } from './app.js';
import { loadConfig } from '../infrastructure/config.js';
import { createOciClients } from '../infrastructure/oci/client.js';
import { createPipeline } from '../services/pipeline/index.js';
import { logger } from '../infrastructure/logger.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const clients = await createOciClients(config);
  const app = createApp(createPipeline(config, clients));

  app.listen(config.port, () => {
    logger.info({ port: config.port, bucket: config.storage.bucket }, 'Text Anomaly Detection API started');
  });
}

main().catch((err) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start server');
  process.exit(1);
});
