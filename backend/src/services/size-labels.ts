// Half sizes are stored encoded without the decimal point.
const HALF_SIZE_CODES = new Map<string, string>([
  ['385', '38.5'],
  ['395', '39.5'],
  ['425', '42.5'],
  ['435', '43.5'],
]);

const ENCODED_HALF_SIZES = new Map<string, string>(
  Array.from(HALF_SIZE_CODES, ([encoded, display]) => [display, encoded])
);

export function normalizeSizeLabel(label: string): string {
  return HALF_SIZE_CODES.get(label) ?? label;
}

export function encodedSizeLabel(label: string): string | null {
  return ENCODED_HALF_SIZES.get(label) ?? null;
}

const labelCollator = new Intl.Collator('en', { numeric: true });

export function compareLabels(a: string, b: string): number {
  return labelCollator.compare(a, b);
}
