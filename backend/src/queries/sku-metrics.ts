import type { AppConfig } from '../config.js';

/**
 * Every query takes `@style_code` (empty for all styles); `openOrders` also
 * takes `@open_orders_since` as `YYYY-MM-DD`.
 */
export type SkuMetricsQueries = {
  inventory: string;
  purchased: string;
  soldTotal: string;
  soldMonthly: string;
  openOrders: string;
  catalog: string;
};

export function buildSkuMetricsQueries(warehouse: AppConfig['warehouse']): SkuMetricsQueries {
  const staging = (table: string) => `\`${warehouse.projectId}.${warehouse.stagingDataset}.${table}\``;
  const variants = staging('stg_shopify__products_variant');
  const products = staging('stg_xentral__products');
  const inventory = staging('stg_xentral__inventory');
  const purchaseOrderDetails = staging('stg_xentral__purchase_order_details');
  const orderItems = staging('stg_shopify__orders_items');
  const openOrders = staging('stg_xentral__open_orders');

  return {
    inventory: `
      WITH latest_inventory_date AS (
        SELECT MAX(date) AS max_date
        FROM ${inventory}
        WHERE warehouse IS NOT NULL
      )
      SELECT
        v.base_sku AS sku,
        v.size AS size,
        SUM(i.quantity) AS available_count
      FROM ${variants} v
      JOIN ${products} p ON v.sku = p.sku
      JOIN ${inventory} i ON p.id = i.product_id
      CROSS JOIN latest_inventory_date lid
      WHERE i.warehouse IS NOT NULL
        AND i.date = lid.max_date
        AND (@style_code = '' OR v.base_sku = @style_code)
      GROUP BY 1, 2`,

    purchased: `
      SELECT
        pod.base_sku AS sku,
        pod.size AS size,
        SUM(pod.quantity) AS purchased_count
      FROM ${purchaseOrderDetails} pod
      WHERE CAST(pod.confirmed_delivery_date AS DATE) >= CURRENT_DATE()
        AND (@style_code = '' OR pod.base_sku = @style_code)
      GROUP BY 1, 2`,

    soldTotal: `
      SELECT
        v.base_sku AS sku,
        SUBSTR(v.sku, 10) AS size,
        SUM(o.item_quantity) AS total_sold
      FROM ${orderItems} o
      JOIN ${variants} v ON o.variant_id = v.id
      WHERE EXTRACT(DATE FROM o.created_at) >= DATE_SUB(CURRENT_DATE(), INTERVAL 24 MONTH)
        AND (@style_code = '' OR v.base_sku = @style_code)
      GROUP BY 1, 2`,

    soldMonthly: `
      SELECT
        v.base_sku AS sku,
        SUBSTR(v.sku, 10) AS size,
        FORMAT_DATE('%Y-%m', o.created_at) AS year_month,
        FORMAT_DATE('%B', o.created_at) AS month_name,
        SUM(o.item_quantity) AS monthly_sold
      FROM ${orderItems} o
      JOIN ${variants} v ON o.variant_id = v.id
      WHERE EXTRACT(DATE FROM o.created_at) >= DATE_SUB(CURRENT_DATE(), INTERVAL 24 MONTH)
        AND (@style_code = '' OR v.base_sku = @style_code)
      GROUP BY 1, 2, 3, 4`,

    openOrders: `
      SELECT
        SUBSTR(o.product_sku, 1, 9) AS sku,
        SUBSTR(o.product_sku, 10) AS size,
        COUNT(*) AS quantity
      FROM ${openOrders} o
      WHERE o.product_sku IS NOT NULL
        AND o.order_date >= CAST(@open_orders_since AS DATE)
        AND (@style_code = '' OR SUBSTR(o.product_sku, 1, 9) = @style_code)
      GROUP BY 1, 2`,

    catalog: `
      SELECT
        pr.sku AS sku,
        pr.id AS product_id
      FROM ${products} pr
      WHERE pr.sku IS NOT NULL
        AND (@style_code = '' OR STARTS_WITH(pr.sku, @style_code))`,
  };
}
