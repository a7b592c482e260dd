import { Router } from 'express';
import { cacheControlHeader, type AppConfig } from '../config.js';
import type { QueryClient } from '../warehouse.js';
import { asyncHandler } from '../utils/async-handler.js';
import { responseAbortSignal } from '../utils/request-signal.js';
import { buildPurchaseOrderQueries } from '../queries/purchase-orders.js';
import { fetchAllPurchaseOrders, fetchPurchaseOrders } from '../services/purchase-orders.js';

export type PurchaseOrderRouterDeps = {
  client: QueryClient;
  config: AppConfig;
  now: () => Date;
};

export function createPurchaseOrdersRouter({ client, config, now }: PurchaseOrderRouterDeps): Router {
  const router = Router();
  const queries = buildPurchaseOrderQueries(config.warehouse);
  const cacheControl = cacheControlHeader(config);

  router.get(
    '/purchase-orders',
    asyncHandler(async (_req, res) => {
      const orders = await fetchPurchaseOrders(client, {
        queries,
        skuPrefix: config.orderSkuPrefix,
        today: now(),
        signal: responseAbortSignal(res),
      });
      console.log(`[purchase-orders] returning ${Object.keys(orders).length} orders`);
      res.set('Cache-Control', cacheControl).json(orders);
    })
  );

  router.get(
    '/all-purchase-orders',
    asyncHandler(async (_req, res) => {
      const orders = await fetchAllPurchaseOrders(client, {
        queries,
        signal: responseAbortSignal(res),
      });
      console.log(`[purchase-orders] returning ${orders.length} raw orders`);
      res.set('Cache-Control', cacheControl).json(orders);
    })
  );

  return router;
}
