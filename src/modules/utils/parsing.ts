const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function parsePositivePrice(value: unknown): number | null {
  if (typeof value !== 'number' && typeof value !== 'string') return null;
  if (typeof value === 'string' && !DECIMAL_PATTERN.test(value.trim())) return null;
  const price = Number(value);
  return Number.isFinite(price) && price > 0 ? price : null;
}

export function normalizeSymbol(symbol: string): string {
  return symbol.replaceAll('-', '').trim().toUpperCase();
}
