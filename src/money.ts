// Amounts live in memory as integer cents and in the database as decimal(12,2).

const DECIMAL_RE = /^\d+(\.\d{1,2})?$/;

/**
 * Parse a request amount (number or decimal string) into cents.
 * Returns null for anything that is not a non-negative value with at most
 * two fractional digits.
 */
export function parseAmount(input: unknown): number | null {
  if (typeof input === 'number') {
    if (!Number.isFinite(input) || input < 0) return null;
    const cents = Math.round(input * 100);
    if (Math.abs(cents - input * 100) > 1e-6) return null;
    return cents;
  }
  if (typeof input === 'string') {
    const s = input.trim();
    if (!DECIMAL_RE.test(s)) return null;
    const [whole, frac = ''] = s.split('.');
    return Number(whole) * 100 + Number(frac.padEnd(2, '0'));
  }
  return null;
}

/** Read a stored decimal column; pg returns strings, SQLite numbers. */
export function toCents(stored: string | number | null | undefined): number {
  if (stored === null || stored === undefined) return 0;
  const n = typeof stored === 'number' ? stored : Number(stored);
  if (!Number.isFinite(n)) {
    throw new TypeError(`Not a decimal amount: ${String(stored)}`);
  }
  return Math.round(n * 100);
}

export function formatAmount(cents: number): string {
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(cents);
  return `${sign}${Math.floor(abs / 100)}.${String(abs % 100).padStart(2, '0')}`;
}
