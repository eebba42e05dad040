import express, { Express, NextFunction, Request, Response } from 'express';
import bodyParser from 'body-parser';
import { ApiError } from './api/errors';
import { deleteExpense, getExpense, updateExpense } from './api/expenses/expense';
import { addExpense, getExpenses, openExpensesFile } from './api/expenses/expenses';
import { getIncomes, setIncome } from './api/incomes/incomes';
import { getPreferences, savePreferencesHandler } from './api/preferences/preferences';
import { getCharts, getShareSvg } from './api/charts/charts';
import { getSuggestions } from './api/suggestions/suggestions';
import { calculateSipHandler } from './api/sip/sip';
import { createReport } from './api/report/report';
import { closeView, getOpenViews, getView, refreshViews, setEntryDate } from './api/views/views';
import { err } from './utils/log/logger';
import { ViewRegistry } from './utils/views/registry';

type Handler = (request: Request, views: ViewRegistry) => unknown;
type Send = (res: Response, data: unknown) => void;

const sendJson: Send = (res, data) => {
  res.json(data);
};

const sendSvg: Send = (res, data) => {
  res.type('image/svg+xml').send(String(data));
};

/**
 * Answers an error: an ApiError with its own status, anything else with 500
 */
export function sendError(res: Response, error: unknown) {
  if (error instanceof ApiError) {
    res.status(error.statusCode).json({ error: error.message });
    return;
  }
  const message = error instanceof Error ? error.message : 'Unknown error';
  err('Unhandled error', { error: message });
  res.status(500).json({ error: message });
}

/**
 * Builds the application. Every handler receives the same view registry.
 */
export function createApp(views: ViewRegistry = new ViewRegistry()): Express {
  const app: Express = express();

  const route =
    (handler: Handler, send: Send = sendJson) =>
    async (req: Request, res: Response) => {
      try {
        send(res, await handler(req, views));
      } catch (error) {
        sendError(res, error);
      }
    };

  // Middleware
  app.use(express.json());
  app.use(bodyParser.urlencoded({ extended: true }));

  // Expense routes
  app.route('/api/expenses').get(route(getExpenses)).put(route(addExpense));
  app.post('/api/expenses/open', route(openExpensesFile));
  app.route('/api/expenses/:index').get(route(getExpense)).post(route(updateExpense)).delete(route(deleteExpense));

  // Income routes
  app.route('/api/incomes').get(route(getIncomes)).put(route(setIncome));

  // Preference routes
  app.route('/api/preferences').get(route(getPreferences)).post(route(savePreferencesHandler));

  // Insight routes
  app.get('/api/charts', route(getCharts));
  app.get('/api/charts/share.svg', route(getShareSvg, sendSvg));
  app.get('/api/suggestions', route(getSuggestions));
  app.post('/api/sip', route(calculateSipHandler));
  app.post('/api/report', route(createReport));

  // View routes
  app.get('/api/views', route(getOpenViews));
  app.post('/api/views/entry/date', route(setEntryDate));
  app.post('/api/views/refresh', route(refreshViews));
  app.route('/api/views/:id').get(route(getView)).delete(route(closeView));

  app.use('/api', (_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Only the body parsers get here; route handlers answer their own errors
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    sendError(res, error instanceof SyntaxError ? new ApiError('Malformed request body', 400) : error);
  });

  return app;
}
