import type { AppConfig } from '../config.js';

export type PurchaseOrderQueries = {
  upcomingItems: string;
  allOrders: string;
};

export function buildPurchaseOrderQueries(warehouse: AppConfig['warehouse']): PurchaseOrderQueries {
  const purchaseOrders = `\`${warehouse.projectId}.${warehouse.agentDataset}.purchase_orders\``;

  return {
    upcomingItems: `
      SELECT
        po.id,
        po.delivery_date,
        item.product_id,
        item.sku,
        item.size,
        item.quantity
      FROM ${purchaseOrders} po,
      UNNEST(po.items) AS item
      WHERE po.delivery_date >= @today
      ORDER BY po.delivery_date, po.id, item.product_id`,

    allOrders: `
      SELECT *
      FROM ${purchaseOrders}`,
  };
}
