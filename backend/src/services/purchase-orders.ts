import { z } from 'zod';
import type { PurchaseOrderQueries } from '../queries/purchase-orders.js';
import type { QueryClient } from '../warehouse.js';
import { DataSourceError } from '../errors.js';
import {
  countField,
  decodeRows,
  integerField,
  numberField,
  optionalTextField,
  type TabularRow,
  unwrapScalars,
} from '../utils/rows.js';

export type OrderLineItem = {
  sku: string;
  quantity: number;
};

export type AggregatedOrder = {
  estimated_delivery_date: string;
  items: OrderLineItem[];
};

const orderItemRowSchema = z.object({
  id: integerField,
  delivery_date: optionalTextField,
  product_id: countField,
  size: optionalTextField,
  quantity: countField,
});

export type PurchaseOrderItemRow = z.infer<typeof orderItemRowSchema>;

const isoCalendarDate = z.string().date();

export function isIsoCalendarDate(value: string): boolean {
  return isoCalendarDate.safeParse(value).success;
}

type OrderGroup = {
  orderId: number;
  deliveryDate: string;
  rows: PurchaseOrderItemRow[];
};

function groupByOrderAndDate(rows: readonly PurchaseOrderItemRow[]): OrderGroup[] {
  const groups = new Map<string, OrderGroup>();
  for (const row of rows) {
    const deliveryDate = row.delivery_date ?? '';
    const key = JSON.stringify([row.id, deliveryDate]);
    let group = groups.get(key);
    if (!group) {
      group = { orderId: row.id, deliveryDate, rows: [] };
      groups.set(key, group);
    }
    group.rows.push(row);
  }
  return Array.from(groups.values());
}

function toOrder(group: OrderGroup, skuPrefix: string): AggregatedOrder | null {
  if (!group.deliveryDate || group.rows.length === 0 || !isIsoCalendarDate(group.deliveryDate)) {
    return null;
  }

  const items = group.rows
    .filter((row) => row.quantity > 0 && row.product_id > 0)
    .map((row) => ({ sku: `${skuPrefix}${row.product_id}`, quantity: row.quantity }));

  if (items.length === 0) {
    return null;
  }

  return { estimated_delivery_date: group.deliveryDate, items };
}

// An order id left with several delivery dates is keyed `order_<id>_<date>` per date.
export function aggregatePurchaseOrders(
  rows: readonly PurchaseOrderItemRow[],
  options: { skuPrefix: string }
): Record<string, AggregatedOrder> {
  const surviving: Array<{ group: OrderGroup; order: AggregatedOrder }> = [];
  const datesPerOrder = new Map<number, number>();

  for (const group of groupByOrderAndDate(rows)) {
    const order = toOrder(group, options.skuPrefix);
    if (!order) continue;
    surviving.push({ group, order });
    datesPerOrder.set(group.orderId, (datesPerOrder.get(group.orderId) ?? 0) + 1);
  }

  const result: Record<string, AggregatedOrder> = {};
  for (const { group, order } of surviving) {
    const split = (datesPerOrder.get(group.orderId) ?? 0) > 1;
    const key = split ? `order_${group.orderId}_${group.deliveryDate}` : `order_${group.orderId}`;
    result[key] = order;
  }

  const splitOrders = Array.from(datesPerOrder).filter(([, count]) => count > 1);
  if (splitOrders.length > 0) {
    console.warn(
      `[purchase-orders] ${splitOrders.length} order(s) span several delivery dates, keyed per date: ${splitOrders
        .map(([orderId]) => orderId)
        .join(', ')}`
    );
  }

  return result;
}

export function decodePurchaseOrderItems(rows: readonly TabularRow[]): PurchaseOrderItemRow[] {
  return decodeRows(orderItemRowSchema, rows, 'purchase_orders');
}

export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export async function fetchPurchaseOrders(
  client: QueryClient,
  options: { queries: PurchaseOrderQueries; skuPrefix: string; today: Date; signal?: AbortSignal }
): Promise<Record<string, AggregatedOrder>> {
  const rows = await client.query(options.queries.upcomingItems, {
    params: { today: formatIsoDate(options.today) },
    signal: options.signal,
    label: 'purchase_orders',
  });
  return aggregatePurchaseOrders(decodePurchaseOrderItems(rows), { skuPrefix: options.skuPrefix });
}

const rawOrderSchema = z
  .object({
    items: z.array(z.record(z.unknown())).nullable(),
  })
  .passthrough();

function hasProductId(item: Record<string, unknown>): boolean {
  const productId = numberField.safeParse(item.product_id);
  return productId.success && productId.data !== 0;
}

export function filterRawPurchaseOrders(rows: readonly TabularRow[]): Record<string, unknown>[] {
  const filtered: Record<string, unknown>[] = [];
  rows.forEach((row, index) => {
    const parsed = rawOrderSchema.safeParse(row);
    if (!parsed.success) {
      throw new DataSourceError(`malformed all_purchase_orders row ${index}: items is not a list of records`, {
        source: 'all_purchase_orders',
        cause: parsed.error,
      });
    }
    const items = (parsed.data.items ?? []).filter(hasProductId);
    if (items.length > 0) {
      filtered.push({ ...row, items });
    }
  });
  return filtered;
}

export async function fetchAllPurchaseOrders(
  client: QueryClient,
  options: { queries: PurchaseOrderQueries; signal?: AbortSignal }
): Promise<unknown[]> {
  const rows = await client.query(options.queries.allOrders, {
    signal: options.signal,
    label: 'all_purchase_orders',
  });
  return filterRawPurchaseOrders(rows).map(unwrapScalars);
}
