import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import { Server } from 'http';

vi.mock('./utils/system/openFile');

import { createApp } from './app';
import { useTempDataDir } from './utils/test/dataDir';
import { ViewRegistry } from './utils/views/registry';

describe('createApp', () => {
  let dir: string;
  let cleanup: () => void;
  let server: Server;
  let baseUrl: string;
  let views: ViewRegistry;

  const call = (method: string, route: string, body?: unknown) =>
    fetch(`${baseUrl}${route}`, {
      method,
      headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });

  beforeEach(async () => {
    ({ dir, cleanup } = useTempDataDir());
    views = new ViewRegistry();
    server = createApp(views).listen(0, '127.0.0.1');
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    cleanup();
  });

  it('should add and list expenses', async () => {
    const added = await call('PUT', '/api/expenses', {
      date: '2024-03-05',
      category: 'Food',
      amount: 12.5,
      currency: '$',
    });
    expect(added.status).toBe(200);

    const listed = await call('GET', '/api/expenses');
    expect(await listed.json()).toEqual([
      { index: 0, date: '2024-03-05', category: 'Food', amount: '$12.50', note: '' },
    ]);
  });

  it('should answer handler errors with their status', async () => {
    const response = await call('DELETE', '/api/expenses/4');

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Row unavailable.' });
  });

  it('should answer validation errors with 400', async () => {
    const response = await call('PUT', '/api/expenses', { category: 'Food', amount: 'lots' });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Please enter a valid numeric amount.' });
  });

  it('should reject a malformed JSON body', async () => {
    const response = await fetch(`${baseUrl}/api/sip`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"monthly":',
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Malformed request body' });
  });

  it('should route the open action before the index routes', async () => {
    const response = await call('POST', '/api/expenses/open');

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      error: "File 'expenses.csv' not found. Add at least one expense to create it.",
    });
  });

  it('should serve the share chart as SVG', async () => {
    fs.writeFileSync(path.join(dir, 'expenses.csv'), 'Date,Category,Amount,Note\n2024-03-01,Food,₹10.00,\n');

    const response = await call('GET', '/api/charts/share.svg');

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('image/svg+xml; charset=utf-8');
    expect((await response.text()).startsWith('<svg')).toBe(true);
  });

  it('should share one view registry between requests', async () => {
    await call('GET', '/api/views/suggestions');
    await call('POST', '/api/views/entry/date', { date: '2024-02-10' });

    expect(await (await call('GET', '/api/views')).json()).toEqual({ views: ['suggestions', 'entry'] });
    expect(views.list()).toEqual(['suggestions', 'entry']);
  });

  it('should answer unknown API routes with 404', async () => {
    const response = await call('GET', '/api/nothing');

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Not found' });
  });
});
