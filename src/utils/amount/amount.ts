const NUMERIC_TEXT = /^-?(\d+\.?\d*|\.\d+)$/;
const STRICT_NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Converts stored amount text to a number.
 *
 * Keeps only ASCII digits, `.` and `-` in their original order and parses
 * what is left as a signed decimal. Anything that does not parse is `0`.
 *
 * @example
 * ```typescript
 * normalizeAmount('₹500.00'); // 500
 * normalizeAmount('$1,234.50'); // 1234.5
 * normalizeAmount('abc'); // 0
 * ```
 */
export function normalizeAmount(value: unknown): number {
  return readAmount(value) ?? 0;
}

/**
 * Same cleaning as {@link normalizeAmount}, but reports unreadable text as null
 */
export function readAmount(value: unknown): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  const cleaned = Array.from(String(value).trim())
    .filter((ch) => (ch >= '0' && ch <= '9') || ch === '.' || ch === '-')
    .join('');
  if (!NUMERIC_TEXT.test(cleaned)) {
    return null;
  }
  return Number(cleaned);
}

/**
 * Parses user input as a number, rejecting anything that is not a plain
 * decimal (optionally signed, optionally with an exponent).
 *
 * @returns The number, or null when the text is blank or not numeric
 */
export function parseNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') {
    return null;
  }
  const text = value.trim();
  if (!STRICT_NUMBER.test(text)) {
    return null;
  }
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Formats an amount the way it is stored in the expense file: symbol
 * followed by a fixed two-decimal number, e.g. `₹500.00`.
 */
export function formatAmount(symbol: string, amount: number): string {
  return `${symbol}${plainDecimal(amount)}`;
}

/**
 * Writes a number with a fixed count of decimals and every integer digit,
 * never in exponent form: `plainDecimal(1e21)` is `1000000000000000000000.00`.
 */
export function plainDecimal(amount: number, digits: number = 2): string {
  // -0 would otherwise print as "-0.00"
  return (amount === 0 ? 0 : amount).toLocaleString('en-US', {
    useGrouping: false,
    minimumFractionDigits: digits,
    maximumFractionDigits: digits,
  });
}

/**
 * Formats an amount for display with thousands separators, e.g. `$12,809.33`.
 */
export function formatMoney(symbol: string, amount: number): string {
  return `${symbol}${amount.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;
}
