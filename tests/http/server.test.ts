import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Server } from 'http';
import { createExpenseServer } from '../../src/http/index.js';
import {
  ExpenseLedger,
  InMemoryExpenseStore,
  StorageError,
  type ExpenseStore,
} from '../../src/expenses/index.js';

async function listen(server: Server): Promise<string> {
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }
  return `http://127.0.0.1:${address.port}`;
}

async function close(server: Server): Promise<void> {
  await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
}

function postJson(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

describe('Expense HTTP API', () => {
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    const ledger = new ExpenseLedger(new InMemoryExpenseStore(), {
      now: () => new Date(2024, 2, 1),
    });
    server = createExpenseServer({ ledger, maxBodyBytes: 1024 });
    baseUrl = await listen(server);
  });

  afterEach(async () => {
    await close(server);
  });

  it('should answer health checks', async () => {
    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok' });
  });

  it('should list the form options', async () => {
    const res = await fetch(`${baseUrl}/api/options`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      spenders: ['Shakib', 'Junit'],
      years: [2022, 2023, 2024, 2025, 2026],
      months: expect.arrayContaining([{ value: 1, label: 'January' }]),
    });
  });

  it('should record a JSON expense', async () => {
    const res = await postJson(`${baseUrl}/api/expenses`, {
      spender: 'Shakib',
      date: '2024-03-05',
      shop: 'Costco',
      amount: 100,
    });

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({
      expense: { id: 1, spender: 'Shakib', date: '2024-03-05', shop: 'Costco', amount: 100 },
    });
  });

  it('should record a form-encoded expense', async () => {
    const res = await fetch(`${baseUrl}/api/expenses`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: 'spender=Junit&date=2024-03-10&shop=Walmart&amount=20.5',
    });

    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({ expense: { spender: 'Junit', amount: 20.5 } });
  });

  it('should summarise a filtered period', async () => {
    await postJson(`${baseUrl}/api/expenses`, { spender: 'Shakib', date: '2024-03-05', shop: 'Costco', amount: '100' });
    await postJson(`${baseUrl}/api/expenses`, { spender: 'Junit', date: '2024-03-10', shop: 'Walmart', amount: '20' });
    await postJson(`${baseUrl}/api/expenses`, { spender: 'Junit', date: '2025-03-10', shop: 'Amazon', amount: '70' });

    const res = await fetch(`${baseUrl}/api/expenses?year=2024&month=3`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      filter: { year: 2024, month: 3 },
      expenses: [{ shop: 'Costco' }, { shop: 'Walmart' }],
      totals: { Shakib: 100, Junit: 20 },
      balanceMessage: 'Junit owes Shakib 40.00$.',
    });
  });

  it('should treat non-digit filter values as wildcards', async () => {
    await postJson(`${baseUrl}/api/expenses`, { spender: 'Junit', date: '2024-03-10', shop: 'Walmart', amount: '20' });

    const res = await fetch(`${baseUrl}/api/expenses?year=all&month=`);

    expect(await res.json()).toMatchObject({
      filter: {},
      expenses: [{ shop: 'Walmart' }],
    });
  });

  it('should gate the view on a chosen month', async () => {
    const withoutMonth = await (await fetch(`${baseUrl}/api/view?year=2024`)).json();
    const withMonth = await (await fetch(`${baseUrl}/api/view?month=3`)).json();

    expect(withoutMonth).toMatchObject({
      showResults: false,
      balanceMessage: 'Please select a month to see expenses.',
    });
    expect(withMonth).toMatchObject({
      showResults: true,
      balanceMessage: 'No expenses recorded for this period.',
    });
  });

  it('should reject an invalid date with 400', async () => {
    const res = await postJson(`${baseUrl}/api/expenses`, {
      spender: 'Shakib',
      date: '2024-02-30',
      shop: 'Costco',
      amount: '5',
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: 'INVALID_DATE' });
  });

  it('should reject missing fields with 400', async () => {
    const res = await postJson(`${baseUrl}/api/expenses`, { spender: 'Shakib' });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: 'INVALID_INPUT',
      issues: [{ path: 'date' }, { path: 'shop' }],
    });
  });

  it('should reject malformed and oversized bodies', async () => {
    const malformed = await fetch(`${baseUrl}/api/expenses`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"spender":',
    });
    expect(malformed.status).toBe(400);
    expect(await malformed.json()).toEqual({ error: 'Malformed JSON body' });

    const oversized = await postJson(`${baseUrl}/api/expenses`, { shop: 'x'.repeat(2048) });
    expect(oversized.status).toBe(413);
  });

  it('should reject unsupported content types', async () => {
    const res = await fetch(`${baseUrl}/api/expenses`, {
      method: 'POST',
      headers: { 'Content-Type': 'text/plain' },
      body: 'hello',
    });

    expect(res.status).toBe(415);
  });

  it('should return 404 and 405 for unknown routes and methods', async () => {
    expect((await fetch(`${baseUrl}/nope`)).status).toBe(404);
    expect((await fetch(`${baseUrl}/api/options`, { method: 'DELETE' })).status).toBe(405);
  });
});

describe('Expense HTTP API storage failures', () => {
  it('should answer 500 with the storage error code', async () => {
    const failing: ExpenseStore = {
      initialize: async () => {},
      add: async () => {
        throw new StorageError('add', new Error('disk full'));
      },
      list: async () => [],
      totals: async () => ({}),
    };
    const server = createExpenseServer({ ledger: new ExpenseLedger(failing) });
    const baseUrl = await listen(server);

    try {
      const res = await postJson(`${baseUrl}/api/expenses`, {
        spender: 'Junit',
        date: '2024-01-01',
        shop: 'Newon',
        amount: '3',
      });

      expect(res.status).toBe(500);
      expect(await res.json()).toMatchObject({
        error: 'STORAGE_ERROR',
        message: 'Expense store add failed: disk full',
      });
    } finally {
      await close(server);
    }
  });
});
