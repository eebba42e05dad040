import { formatAmount, formatMoney, parseNumber, plainDecimal } from '../amount/amount';

export type SipInput = {
  monthly: number;
  annualRatePercent: number;
  years: number;
  goal: number | null;
};

export type SipRawInput = {
  monthly?: unknown;
  annualRate?: unknown;
  years?: unknown;
  goal?: unknown;
};

export type SipResult = SipInput & {
  periods: number;
  monthlyRate: number;
  futureValue: number;
  requiredMonthly: number | null;
  lines: string[];
};

export class SipInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SipInputError';
  }
}

export const DEFAULT_ANNUAL_RATE = '12';
export const DEFAULT_YEARS = '10';

const AUTOMATION_SUGGESTION =
  'Suggestion: Automate this SIP via your bank or mutual fund platform. Start small and increase regularly.';

/**
 * Number of monthly contributions in the period
 */
export function sipPeriods(years: number): number {
  return Math.floor(years * 12);
}

export function monthlyRate(annualRatePercent: number): number {
  return annualRatePercent / 100 / 12;
}

// Value at the end of the period of 1 paid at the start of every month
function annuityDueFactor(rate: number, periods: number): number {
  if (rate === 0) {
    return periods;
  }
  return ((Math.pow(1 + rate, periods) - 1) / rate) * (1 + rate);
}

/**
 * Future value of a monthly contribution paid at the start of each month
 * (annuity-due) and compounded monthly.
 *
 * @example
 * ```typescript
 * futureValue(1000, 12, 1); // ≈ 12809.33
 * ```
 */
export function futureValue(monthly: number, annualRatePercent: number, years: number): number {
  return monthly * annuityDueFactor(monthlyRate(annualRatePercent), sipPeriods(years));
}

/**
 * Monthly contribution needed to reach `goal`; the inverse of {@link futureValue}
 */
export function requiredMonthly(goal: number, annualRatePercent: number, years: number): number {
  return goal / annuityDueFactor(monthlyRate(annualRatePercent), sipPeriods(years));
}

function requireNumber(value: unknown, fallback: string | undefined, label: string): number {
  const text = value === undefined || value === null || value === '' ? fallback : value;
  const parsed = parseNumber(text);
  if (parsed === null) {
    throw new SipInputError(`${label} must be numeric.`);
  }
  return parsed;
}

/**
 * Validates calculator input given as numbers or text.
 *
 * @throws SipInputError when a value is not numeric, the contribution is
 * negative, or the period is shorter than one month
 */
export function parseSipInput(raw: SipRawInput): SipInput {
  const monthly = requireNumber(raw.monthly, undefined, 'Monthly investment');
  const annualRatePercent = requireNumber(raw.annualRate, DEFAULT_ANNUAL_RATE, 'Expected annual return');
  const years = requireNumber(raw.years, DEFAULT_YEARS, 'Investment period');
  const goalGiven = raw.goal !== undefined && raw.goal !== null && String(raw.goal).trim() !== '';
  const goal = goalGiven ? requireNumber(raw.goal, undefined, 'Goal amount') : null;

  if (monthly < 0) {
    throw new SipInputError('Monthly investment cannot be negative.');
  }
  if (years <= 0) {
    throw new SipInputError('Investment period must be greater than zero.');
  }
  if (sipPeriods(years) === 0) {
    throw new SipInputError('Investment period must be at least one month.');
  }
  return { monthly, annualRatePercent, years, goal };
}

/**
 * Runs the savings calculator and builds the lines shown to the user
 */
export function calculateSip(input: SipInput, symbol: string): SipResult {
  const periods = sipPeriods(input.years);
  const rate = monthlyRate(input.annualRatePercent);
  const fv = futureValue(input.monthly, input.annualRatePercent, input.years);
  const required = input.goal === null ? null : requiredMonthly(input.goal, input.annualRatePercent, input.years);

  const lines = [
    `Monthly SIP: ${formatAmount(symbol, input.monthly)}`,
    `Annual return assumed: ${plainDecimal(input.annualRatePercent)}%`,
    `Period: ${plainDecimal(input.years, 1)} years (${periods} months)`,
    '',
    `Estimated corpus at end: ${formatMoney(symbol, fv)}`,
  ];
  if (input.goal !== null && required !== null) {
    lines.push(`To reach goal ${formatMoney(symbol, input.goal)}, you need ~ ${formatMoney(symbol, required)}/month`);
  }
  lines.push('', AUTOMATION_SUGGESTION);

  return {
    ...input,
    periods,
    monthlyRate: rate,
    futureValue: fv,
    requiredMonthly: required,
    lines,
  };
}
