/**
 * An error a handler throws on purpose. The route wrapper answers with
 * `statusCode` and `{ error: message }`.
 */
export class ApiError extends Error {
  statusCode: number;
  constructor(message: string, statusCode: number) {
    super(message);
    this.statusCode = statusCode;
  }
}

export const ROW_UNAVAILABLE = 'Row unavailable.';
