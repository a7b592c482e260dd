import { afterEach, describe, it, expect, vi } from 'vitest';
import { FakeQueryClient } from '../../test/fake-query-client.js';
import { testConfig } from '../../test/test-config.js';
import { buildPurchaseOrderQueries } from '../queries/purchase-orders.js';
import {
  aggregatePurchaseOrders,
  decodePurchaseOrderItems,
  fetchAllPurchaseOrders,
  fetchPurchaseOrders,
  filterRawPurchaseOrders,
  isIsoCalendarDate,
  type PurchaseOrderItemRow,
} from './purchase-orders.js';

function item(id: number, deliveryDate: string | null, productId: number, quantity: number): PurchaseOrderItemRow {
  return { id, delivery_date: deliveryDate, product_id: productId, size: null, quantity };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('isIsoCalendarDate', () => {
  it('accepts real calendar days in YYYY-MM-DD form', () => {
    expect(isIsoCalendarDate('2025-01-10')).toBe(true);
    expect(isIsoCalendarDate('2024-02-29')).toBe(true);
  });

  it('rejects other shapes and impossible days', () => {
    expect(isIsoCalendarDate('')).toBe(false);
    expect(isIsoCalendarDate('not-a-date')).toBe(false);
    expect(isIsoCalendarDate('2025-02-29')).toBe(false);
    expect(isIsoCalendarDate('2025-1-10')).toBe(false);
    expect(isIsoCalendarDate('2025-01-10T00:00:00Z')).toBe(false);
  });
});

describe('aggregatePurchaseOrders', () => {
  it('keys single-date orders by order id and drops non-positive products', () => {
    const orders = aggregatePurchaseOrders(
      [item(7, '2025-03-01', 500, 2), item(7, '2025-03-01', 0, 3), item(8, '2025-03-02', 12, 1)],
      { skuPrefix: 'ETIQL' }
    );

    expect(orders).toEqual({
      order_7: { estimated_delivery_date: '2025-03-01', items: [{ sku: 'ETIQL500', quantity: 2 }] },
      order_8: { estimated_delivery_date: '2025-03-02', items: [{ sku: 'ETIQL12', quantity: 1 }] },
    });
  });

  it('emits one order per delivery date and keys them per date when an order spans several', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const orders = aggregatePurchaseOrders(
      [item(1, '2025-01-10', 500, 2), item(1, '2025-01-10', 0, 3), item(1, '2025-02-01', 501, 1)],
      { skuPrefix: 'ETIQL' }
    );

    expect(orders).toEqual({
      'order_1_2025-01-10': { estimated_delivery_date: '2025-01-10', items: [{ sku: 'ETIQL500', quantity: 2 }] },
      'order_1_2025-02-01': { estimated_delivery_date: '2025-02-01', items: [{ sku: 'ETIQL501', quantity: 1 }] },
    });
    expect(warn).toHaveBeenCalledWith('[purchase-orders] 1 order(s) span several delivery dates, keyed per date: 1');
  });

  it('drops groups whose delivery date is empty or invalid', () => {
    const orders = aggregatePurchaseOrders(
      [
        item(1, '', 500, 2),
        item(2, null, 500, 2),
        item(3, 'not-a-date', 500, 2),
        item(4, '2025-02-30', 500, 2),
        item(5, '2025-02-28', 500, 2),
      ],
      { skuPrefix: 'ETIQL' }
    );

    expect(Object.keys(orders)).toEqual(['order_5']);
  });

  it('omits an order whose items are all filtered out', () => {
    const orders = aggregatePurchaseOrders(
      [item(1, '2025-01-10', 0, 2), item(1, '2025-01-10', 500, 0), item(1, '2025-01-10', 501, -1)],
      { skuPrefix: 'ETIQL' }
    );

    expect(orders).toEqual({});
  });

  it('keeps the plain key when only one delivery date of an order survives', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const orders = aggregatePurchaseOrders([item(9, '2025-01-10', 0, 1), item(9, '2025-01-11', 44, 3)], {
      skuPrefix: 'PO-',
    });

    expect(orders).toEqual({
      order_9: { estimated_delivery_date: '2025-01-11', items: [{ sku: 'PO-44', quantity: 3 }] },
    });
    expect(warn).not.toHaveBeenCalled();
  });

  it('keeps line items in row order and does not merge repeated products', () => {
    const orders = aggregatePurchaseOrders(
      [item(3, '2025-05-05', 20, 1), item(3, '2025-05-05', 10, 4), item(3, '2025-05-05', 20, 2)],
      { skuPrefix: 'ETIQL' }
    );

    expect(orders.order_3?.items).toEqual([
      { sku: 'ETIQL20', quantity: 1 },
      { sku: 'ETIQL10', quantity: 4 },
      { sku: 'ETIQL20', quantity: 2 },
    ]);
  });
});

describe('decodePurchaseOrderItems', () => {
  it('decodes warehouse scalars into typed rows', () => {
    expect(
      decodePurchaseOrderItems([
        { id: '42', delivery_date: { value: '2025-01-10' }, product_id: null, sku: 'X', size: '40', quantity: 3 },
      ])
    ).toEqual([{ id: 42, delivery_date: '2025-01-10', product_id: 0, size: '40', quantity: 3 }]);
  });

  it('raises a data source error for a non-numeric order id', () => {
    expect(() => decodePurchaseOrderItems([{ id: 'abc', delivery_date: '2025-01-10', product_id: 1, quantity: 1 }])).toThrow(
      'malformed purchase_orders row 0: id: not a number: abc'
    );
  });
});

describe('fetchPurchaseOrders', () => {
  const queries = buildPurchaseOrderQueries(testConfig().warehouse);

  it('asks for deliveries from the current UTC date onwards', async () => {
    const client = new FakeQueryClient().respond(queries.upcomingItems, [
      { id: 5, delivery_date: '2026-03-06', product_id: 300, sku: null, size: null, quantity: 2 },
    ]);

    const orders = await fetchPurchaseOrders(client, {
      queries,
      skuPrefix: 'ETIQL',
      today: new Date('2026-03-05T23:30:00Z'),
    });

    expect(client.calls[0]?.options.params).toEqual({ today: '2026-03-05' });
    expect(orders).toEqual({
      order_5: { estimated_delivery_date: '2026-03-06', items: [{ sku: 'ETIQL300', quantity: 2 }] },
    });
  });
});

describe('filterRawPurchaseOrders', () => {
  it('removes items without a product and orders left empty', () => {
    const rows = [
      {
        id: 1,
        supplier: 'Test Supplier',
        items: [
          { product_id: 0, quantity: 1 },
          { product_id: 12, quantity: 2 },
          { product_id: null, quantity: 5 },
        ],
      },
      { id: 2, supplier: 'Test Supplier', items: [{ product_id: 0, quantity: 4 }] },
      { id: 3, supplier: 'Test Supplier', items: null },
    ];

    expect(filterRawPurchaseOrders(rows)).toEqual([
      { id: 1, supplier: 'Test Supplier', items: [{ product_id: 12, quantity: 2 }] },
    ]);
  });

  it('raises a data source error when items is not a list', () => {
    expect(() => filterRawPurchaseOrders([{ id: 1, items: 'nope' }])).toThrow(
      'malformed all_purchase_orders row 0: items is not a list of records'
    );
  });
});

describe('fetchAllPurchaseOrders', () => {
  it('returns filtered rows with wrapped date values flattened', async () => {
    const queries = buildPurchaseOrderQueries(testConfig().warehouse);
    const client = new FakeQueryClient().respond(queries.allOrders, [
      { id: 4, delivery_date: { value: '2025-06-01' }, items: [{ product_id: 9, size: '40', quantity: 1 }] },
    ]);

    await expect(fetchAllPurchaseOrders(client, { queries })).resolves.toEqual([
      { id: 4, delivery_date: '2025-06-01', items: [{ product_id: 9, size: '40', quantity: 1 }] },
    ]);
  });
});
