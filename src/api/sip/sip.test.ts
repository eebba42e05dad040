import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { useTempDataDir } from '../../utils/test/dataDir';
import { createMockRequest } from '../../utils/test/mockData';
import { ApiError } from '../errors';
import { calculateSipHandler } from './sip';

describe('calculateSipHandler', () => {
  let cleanup: () => void;

  beforeEach(() => {
    ({ cleanup } = useTempDataDir());
  });

  afterEach(() => {
    cleanup();
  });

  it('should use the default rate and period', () => {
    const result = calculateSipHandler(createMockRequest({ body: { monthly: '1000' } }));

    expect(result.annualRatePercent).toBe(12);
    expect(result.years).toBe(10);
    expect(result.periods).toBe(120);
    expect(result.text.split('\n').slice(0, 3)).toEqual([
      'Monthly SIP: ₹1000.00',
      'Annual return assumed: 12.00%',
      'Period: 10.0 years (120 months)',
    ]);
  });

  it('should include the goal line', () => {
    const result = calculateSipHandler(
      createMockRequest({ body: { monthly: 500, annualRate: 0, years: 1, goal: '12000' } }),
    );

    expect(result.futureValue).toBe(6000);
    expect(result.requiredMonthly).toBe(1000);
    expect(result.lines[4]).toBe('Estimated corpus at end: ₹6,000.00');
    expect(result.lines[5]).toBe('To reach goal ₹12,000.00, you need ~ ₹1,000.00/month');
  });

  it('should turn input errors into bad requests', () => {
    const attempt = () => calculateSipHandler(createMockRequest({ body: { monthly: 'ten' } }));

    expect(attempt).toThrow(ApiError);
    expect(attempt).toThrow('Monthly investment must be numeric.');
  });

  it('should reject a period shorter than a month', () => {
    expect(() => calculateSipHandler(createMockRequest({ body: { monthly: 100, years: '0.05' } }))).toThrow(
      'Investment period must be at least one month.',
    );
  });
});
