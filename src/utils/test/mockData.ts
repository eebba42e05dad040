import { Request } from 'express';
import { vi } from 'vitest';
import { Expense } from '../../data/expense/expense';
import { ExpenseData } from '../../data/expense/types';

/**
 * Creates a mock Express Request object for testing
 */
export function createMockRequest(overrides: Partial<Request> = {}): Request {
  return {
    query: {},
    params: {},
    body: {},
    headers: {},
    get: vi.fn(),
    header: vi.fn(),
    ...overrides,
  } as unknown as Request;
}

/**
 * Builds expense rows from compact tuples of date, category, amount
 */
export function createExpenses(rows: Array<[string, string, string] | ExpenseData>): Expense[] {
  return rows.map((row) =>
    Array.isArray(row) ? new Expense({ date: row[0], category: row[1], amount: row[2] }) : new Expense(row),
  );
}
