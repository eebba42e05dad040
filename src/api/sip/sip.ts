import { Request } from 'express';
import { loadPreferences } from '../../utils/io/preferences';
import { calculateSip, parseSipInput, SipInputError, SipResult } from '../../utils/sip/sip';
import { ApiError } from '../errors';
import { getBody } from '../request';

/**
 * Runs the savings calculator. Numbers may be sent as numbers or text.
 *
 * @throws ApiError 400 when an input is invalid
 */
export function calculateSipHandler(request: Request): SipResult & { text: string } {
  const body = getBody(request);
  try {
    const input = parseSipInput({
      monthly: body.monthly,
      annualRate: body.annualRate,
      years: body.years,
      goal: body.goal,
    });
    const result = calculateSip(input, loadPreferences().currency_symbol);
    return { ...result, text: result.lines.join('\n') };
  } catch (error) {
    if (error instanceof SipInputError) {
      throw new ApiError(error.message, 400);
    }
    throw error;
  }
}
