import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  API_PORT: z.coerce.number().int().min(1).max(65535).default(8011),
  CORS_ORIGIN: z.string().trim().min(1).optional(),
  // morgan format name, or `off`
  HTTP_LOG_FORMAT: z.string().trim().min(1).default('combined'),

  BIGQUERY_PROJECT_ID: z.string().trim().min(1, 'BIGQUERY_PROJECT_ID is required'),
  BIGQUERY_LOCATION: z.string().trim().min(1).optional(),
  GOOGLE_APPLICATION_CREDENTIALS: z.string().trim().min(1).optional(),
  STAGING_DATASET: z.string().trim().min(1).default('staging'),
  AGENT_DATASET: z.string().trim().min(1).default('agent'),

  ORDER_SKU_PREFIX: z.string().min(1).default('ETIQL'),
  OPEN_ORDERS_SINCE: z.string().date().default('2024-09-01'),
  CACHE_MAX_AGE_SECONDS: z.coerce.number().int().min(0).default(300),
});

export type AppConfig = {
  env: 'development' | 'production' | 'test';
  port: number;
  corsOrigin: string | null;
  httpLogFormat: string | null;
  warehouse: {
    projectId: string;
    location: string | null;
    keyFilename: string | null;
    stagingDataset: string;
    agentDataset: string;
  };
  orderSkuPrefix: string;
  openOrdersSince: string;
  cacheMaxAgeSeconds: number;
};

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = envSchema.parse(source);
  return {
    env: env.NODE_ENV,
    port: env.API_PORT,
    corsOrigin: env.CORS_ORIGIN ?? null,
    httpLogFormat: env.HTTP_LOG_FORMAT === 'off' ? null : env.HTTP_LOG_FORMAT,
    warehouse: {
      projectId: env.BIGQUERY_PROJECT_ID,
      location: env.BIGQUERY_LOCATION ?? null,
      keyFilename: env.GOOGLE_APPLICATION_CREDENTIALS ?? null,
      stagingDataset: env.STAGING_DATASET,
      agentDataset: env.AGENT_DATASET,
    },
    orderSkuPrefix: env.ORDER_SKU_PREFIX,
    openOrdersSince: env.OPEN_ORDERS_SINCE,
    cacheMaxAgeSeconds: env.CACHE_MAX_AGE_SECONDS,
  };
}

export function cacheControlHeader(config: AppConfig): string {
  return `private, max-age=${config.cacheMaxAgeSeconds}`;
}
