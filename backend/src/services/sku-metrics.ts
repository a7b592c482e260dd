import { z } from 'zod';
import { buildSkuMetricsQueries, type SkuMetricsQueries } from '../queries/sku-metrics.js';
import type { AppConfig } from '../config.js';
import type { QueryClient, QueryParams } from '../warehouse.js';
import { createFanOut } from '../utils/fan-out.js';
import { countField, decodeRows, integerField, optionalTextField } from '../utils/rows.js';
import { compareLabels, encodedSizeLabel, normalizeSizeLabel } from './size-labels.js';

const MONTHS = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
] as const;

type Month = (typeof MONTHS)[number];

export type MonthlySold = Record<`sold_${Month}`, number>;

export type SkuSizeMetric = {
  sku: string;
  product_id: number | null;
  size: string;
  available_count: number;
  purchased_count: number;
  sold_last_24_months: number;
} & MonthlySold & {
    open_orders_quantity: number;
  };

const monthField = z.string().transform((value, ctx) => {
  const month = MONTHS.find((candidate) => candidate === value.trim().toLowerCase());
  if (!month) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown month: ${value}` });
    return z.NEVER;
  }
  return month;
});

const sizeKeyFields = {
  sku: optionalTextField,
  size: optionalTextField,
};

const inventoryFactSchema = z.object({ ...sizeKeyFields, available_count: countField });
const purchasedFactSchema = z.object({ ...sizeKeyFields, purchased_count: countField });
const soldTotalFactSchema = z.object({ ...sizeKeyFields, total_sold: countField });
const soldMonthlyFactSchema = z.object({ ...sizeKeyFields, month_name: monthField, monthly_sold: countField });
const openOrderFactSchema = z.object({ ...sizeKeyFields, quantity: countField });
const catalogEntrySchema = z.object({ sku: optionalTextField, product_id: integerField.nullable() });

export type InventoryFact = z.infer<typeof inventoryFactSchema>;
export type PurchasedFact = z.infer<typeof purchasedFactSchema>;
export type SoldTotalFact = z.infer<typeof soldTotalFactSchema>;
export type SoldMonthlyFact = z.infer<typeof soldMonthlyFactSchema>;
export type OpenOrderFact = z.infer<typeof openOrderFactSchema>;
export type CatalogEntry = z.infer<typeof catalogEntrySchema>;

export type MetricSources = {
  inventory: readonly InventoryFact[];
  purchased: readonly PurchasedFact[];
  soldTotal: readonly SoldTotalFact[];
  soldMonthly: readonly SoldMonthlyFact[];
  openOrders: readonly OpenOrderFact[];
};

type SizeFacts = {
  styleCode: string;
  sizeLabel: string;
  available: number;
  purchased: number;
  soldTotal: number;
  monthly: MonthlySold;
  openOrders: number;
};

function monthlyKey(month: Month): keyof MonthlySold {
  return `sold_${month}`;
}

function emptyMonthlySold(): MonthlySold {
  return {
    sold_january: 0,
    sold_february: 0,
    sold_march: 0,
    sold_april: 0,
    sold_may: 0,
    sold_june: 0,
    sold_july: 0,
    sold_august: 0,
    sold_september: 0,
    sold_october: 0,
    sold_november: 0,
    sold_december: 0,
  };
}

function sizeKey(styleCode: string, sizeLabel: string): string {
  return JSON.stringify([styleCode, sizeLabel]);
}

function buildCatalogIndex(catalog: readonly CatalogEntry[]): Map<string, number> {
  const index = new Map<string, number>();
  for (const entry of catalog) {
    if (entry.sku === null || entry.product_id === null) continue;
    if (!index.has(entry.sku)) {
      index.set(entry.sku, entry.product_id);
    }
  }
  return index;
}

function resolveProductId(index: Map<string, number>, styleCode: string, sizeLabel: string): number | null {
  const direct = index.get(`${styleCode}${sizeLabel}`);
  if (direct !== undefined) return direct;
  const encoded = encodedSizeLabel(sizeLabel);
  return encoded === null ? null : index.get(`${styleCode}${encoded}`) ?? null;
}

/**
 * One zero-filled record per (style, normalized size) seen in any source.
 * Monthly buckets sum the same calendar month across years.
 */
export function reconcileSkuMetrics(
  sources: MetricSources,
  catalog: readonly CatalogEntry[],
  options: { styleCode?: string } = {}
): SkuSizeMetric[] {
  const facts = new Map<string, SizeFacts>();

  // Rows missing a style or a size carry no key and are skipped.
  const factsFor = (styleCode: string | null, size: string | null): SizeFacts | null => {
    if (styleCode === null || size === null) return null;
    if (options.styleCode !== undefined && styleCode !== options.styleCode) return null;

    const sizeLabel = normalizeSizeLabel(size);
    const key = sizeKey(styleCode, sizeLabel);
    let entry = facts.get(key);
    if (!entry) {
      entry = {
        styleCode,
        sizeLabel,
        available: 0,
        purchased: 0,
        soldTotal: 0,
        monthly: emptyMonthlySold(),
        openOrders: 0,
      };
      facts.set(key, entry);
    }
    return entry;
  };

  for (const row of sources.inventory) {
    const entry = factsFor(row.sku, row.size);
    if (entry) entry.available += row.available_count;
  }
  for (const row of sources.purchased) {
    const entry = factsFor(row.sku, row.size);
    if (entry) entry.purchased += row.purchased_count;
  }
  for (const row of sources.soldTotal) {
    const entry = factsFor(row.sku, row.size);
    if (entry) entry.soldTotal += row.total_sold;
  }
  for (const row of sources.soldMonthly) {
    const entry = factsFor(row.sku, row.size);
    if (entry) entry.monthly[monthlyKey(row.month_name)] += row.monthly_sold;
  }
  for (const row of sources.openOrders) {
    const entry = factsFor(row.sku, row.size);
    if (entry) entry.openOrders += row.quantity;
  }

  const catalogIndex = buildCatalogIndex(catalog);

  return Array.from(facts.values())
    .sort((a, b) => compareLabels(a.styleCode, b.styleCode) || compareLabels(a.sizeLabel, b.sizeLabel))
    .map((entry) => ({
      sku: entry.styleCode,
      product_id: resolveProductId(catalogIndex, entry.styleCode, entry.sizeLabel),
      size: entry.sizeLabel,
      available_count: entry.available,
      purchased_count: entry.purchased,
      sold_last_24_months: entry.soldTotal,
      ...entry.monthly,
      open_orders_quantity: entry.openOrders,
    }));
}

export type FetchSkuMetricsOptions = {
  queries: SkuMetricsQueries;
  openOrdersSince: string;
  styleCode?: string;
  signal?: AbortSignal;
};

export async function fetchSkuMetrics(client: QueryClient, options: FetchSkuMetricsOptions): Promise<SkuSizeMetric[]> {
  // An empty style code selects every style.
  const styleParams: QueryParams = { style_code: options.styleCode ?? '' };
  const fanOut = createFanOut(options.signal);
  const read = <S extends z.ZodTypeAny>(label: string, sql: string, schema: S, params: QueryParams = styleParams) =>
    fanOut.track(
      client.query(sql, { params, signal: fanOut.signal, label }).then((rows) => decodeRows(schema, rows, label))
    );

  try {
    const [inventory, purchased, soldTotal, soldMonthly, openOrders, catalog] = await Promise.all([
      read('inventory', options.queries.inventory, inventoryFactSchema),
      read('purchased', options.queries.purchased, purchasedFactSchema),
      read('sold_total', options.queries.soldTotal, soldTotalFactSchema),
      read('sold_monthly', options.queries.soldMonthly, soldMonthlyFactSchema),
      read('open_orders', options.queries.openOrders, openOrderFactSchema, {
        ...styleParams,
        open_orders_since: options.openOrdersSince,
      }),
      read('catalog', options.queries.catalog, catalogEntrySchema),
    ]);

    return reconcileSkuMetrics(
      { inventory, purchased, soldTotal, soldMonthly, openOrders },
      catalog,
      { styleCode: options.styleCode }
    );
  } finally {
    fanOut.dispose();
  }
}

export function skuMetricsOptionsFromConfig(config: AppConfig): Omit<FetchSkuMetricsOptions, 'styleCode' | 'signal'> {
  return {
    queries: buildSkuMetricsQueries(config.warehouse),
    openOrdersSince: config.openOrdersSince,
  };
}
