import express, { type Express } from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import cors from 'cors';
import swaggerUi from 'swagger-ui-express';
import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import YAML from 'yaml';
import { z } from 'zod';
import type { AppConfig } from './config.js';
import type { QueryClient } from './warehouse.js';
import { createHealthRouter } from './routes/health.js';
import { createSkuMetricsRouter } from './routes/sku-metrics.js';
import { createPurchaseOrdersRouter } from './routes/purchase-orders.js';
import { errorHandler } from './middleware/error-handler.js';

const currentDir = path.dirname(fileURLToPath(import.meta.url));
const openApiPath = path.resolve(currentDir, '../openapi/openapi.yaml');
const openApiDocument = z.record(z.unknown()).parse(YAML.parse(readFileSync(openApiPath, 'utf8')));

export type AppDeps = {
  client: QueryClient;
  config: AppConfig;
  now?: () => Date;
};

export function createApp({ client, config, now = () => new Date() }: AppDeps): Express {
  const app = express();
  app.set('trust proxy', true);
  app.use(helmet());
  app.use(cors(config.corsOrigin ? { origin: config.corsOrigin } : undefined));
  if (config.httpLogFormat) {
    app.use(morgan(config.httpLogFormat));
  }

  app.get('/', (_req, res) => {
    res.json({ message: 'Server is running' });
  });
  app.use('/health', createHealthRouter(client));

  app.use('/docs', swaggerUi.serve, swaggerUi.setup(openApiDocument));
  app.get('/openapi.json', (_req, res) => {
    res.json(openApiDocument);
  });

  app.use('/sku-metrics', createSkuMetricsRouter(client, config));
  app.use(createPurchaseOrdersRouter({ client, config, now }));

  app.use(errorHandler);

  return app;
}
