import { Router } from 'express';
import { z } from 'zod';
import { cacheControlHeader, type AppConfig } from '../config.js';
import type { QueryClient } from '../warehouse.js';
import { styleNotFound } from '../errors.js';
import { asyncHandler } from '../utils/async-handler.js';
import { responseAbortSignal } from '../utils/request-signal.js';
import { fetchSkuMetrics, skuMetricsOptionsFromConfig } from '../services/sku-metrics.js';

const styleParamsSchema = z.object({
  style_code: z
    .string()
    .trim()
    .min(1)
    .max(64)
    .regex(/^[A-Za-z0-9_-]+$/, 'style_code may only contain letters, digits, "-" and "_"'),
});

export function createSkuMetricsRouter(client: QueryClient, config: AppConfig): Router {
  const router = Router();
  const metricsOptions = skuMetricsOptionsFromConfig(config);
  const cacheControl = cacheControlHeader(config);

  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      const metrics = await fetchSkuMetrics(client, {
        ...metricsOptions,
        signal: responseAbortSignal(res),
      });
      console.log(`[sku-metrics] returning ${metrics.length} size records`);
      res.set('Cache-Control', cacheControl).json(metrics);
    })
  );

  router.get(
    '/:style_code',
    asyncHandler<{ style_code: string }>(async (req, res) => {
      const { style_code: styleCode } = styleParamsSchema.parse(req.params);
      const metrics = await fetchSkuMetrics(client, {
        ...metricsOptions,
        styleCode,
        signal: responseAbortSignal(res),
      });

      if (metrics.length === 0) {
        throw styleNotFound(styleCode);
      }

      console.log(`[sku-metrics] returning ${metrics.length} size records for ${styleCode}`);
      res.set('Cache-Control', cacheControl).json(metrics);
    })
  );

  return router;
}
