import { z } from 'zod';
import { DataSourceError } from '../errors.js';

export type TabularRow = Readonly<Record<string, unknown>>;

// DATE, DATETIME and TIMESTAMP columns arrive wrapped as `{ value }`.
const wrappedScalar = z.object({ value: z.union([z.string(), z.number()]) }).transform((wrapper) => wrapper.value);

// NUMERIC and BIGNUMERIC columns arrive as big.js decimals.
const decimalScalar = z
  .custom<{ toFixed(): string }>(
    (value) => typeof value === 'object' && value !== null && 'toFixed' in value && typeof value.toFixed === 'function'
  )
  .transform((decimal) => decimal.toFixed());

export function toNumeric(value: string | number | bigint | null): number | null {
  if (value === null) return null;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  const trimmed = value.trim();
  if (!trimmed) return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

export const numberField = z
  .union([z.number(), z.string(), z.bigint(), wrappedScalar, decimalScalar])
  .transform((value, ctx) => {
    const parsed = toNumeric(value);
    if (parsed === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a number: ${String(value)}` });
      return z.NEVER;
    }
    return parsed;
  });

export const integerField = numberField.pipe(z.number().int());

// `SUM` over no rows yields NULL.
export const countField = integerField.nullable().transform((value) => value ?? 0);

export const textField = z.union([z.string(), z.number(), wrappedScalar]).transform((value) => String(value).trim());

export const optionalTextField = textField
  .nullable()
  .optional()
  .transform((value) => (value ? value : null));

export function decodeRows<S extends z.ZodTypeAny>(schema: S, rows: readonly TabularRow[], source: string): z.output<S>[] {
  return rows.map((row, index) => {
    const result = schema.safeParse(row);
    if (!result.success) {
      const issue = result.error.issues[0];
      const field = issue?.path.join('.') || 'row';
      throw new DataSourceError(`malformed ${source} row ${index}: ${field}: ${issue?.message ?? 'invalid'}`, {
        source,
        cause: result.error,
      });
    }
    return result.data;
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPlainRecord(value: Record<string, unknown>): boolean {
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

export function unwrapScalars(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(unwrapScalars);
  }
  if (!isRecord(value)) {
    return value;
  }
  const keys = Object.keys(value);
  if (keys.length === 1 && keys[0] === 'value') {
    const inner = value.value;
    if (typeof inner === 'string' || typeof inner === 'number') {
      return inner;
    }
  }
  if (!isPlainRecord(value)) {
    return value;
  }
  const plain: Record<string, unknown> = {};
  for (const key of keys) {
    plain[key] = unwrapScalars(value[key]);
  }
  return plain;
}
