import { Request } from 'express';
import { ApiError } from './errors';

export type Body = Record<string, unknown>;

function isBody(value: unknown): value is Body {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * The request body as a plain object; anything else reads as empty
 */
export function getBody(request: Request): Body {
  const body: unknown = request.body;
  return isBody(body) ? body : {};
}

/**
 * A text field, trimmed. Numbers are accepted as their decimal text.
 * Missing, null and other types read as an empty string.
 */
export function textField(body: Body, key: string): string {
  const value = body[key];
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return '';
}

/**
 * A query parameter given once, trimmed, or an empty string
 */
export function queryField(request: Request, key: string): string {
  const value: unknown = request.query[key];
  return typeof value === 'string' ? value.trim() : '';
}

/**
 * The `:index` route parameter as a row position
 *
 * @throws ApiError 400 when it is not a non-negative integer
 */
export function rowIndex(request: Request): number {
  const { index } = request.params;
  if (!/^\d+$/.test(index ?? '')) {
    throw new ApiError('Row index must be a non-negative integer', 400);
  }
  return Number(index);
}
