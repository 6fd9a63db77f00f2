import { describe, it, expect, afterEach } from 'vitest';
import { createApp, type ExpenseApp } from '../../src/app.js';
import { ConfigSchema } from '../../src/config/index.js';
import { DatabaseExpenseStore, InMemoryExpenseStore } from '../../src/expenses/index.js';

describe('createApp', () => {
  let app: ExpenseApp | null = null;

  afterEach(async () => {
    await app?.close();
    app = null;
  });

  it('should wire an in-memory store without a database', async () => {
    app = await createApp(ConfigSchema.parse({ database: { type: 'memory' } }));

    expect(app.adapter).toBeNull();
    expect(app.store).toBeInstanceOf(InMemoryExpenseStore);
    expect(app.server.listening).toBe(false);
  });

  it('should connect SQLite and initialize the schema', async () => {
    app = await createApp(
      ConfigSchema.parse({ database: { type: 'sqlite', filename: ':memory:' } })
    );

    expect(app.adapter?.isConnected()).toBe(true);
    expect(app.store).toBeInstanceOf(DatabaseExpenseStore);

    const expense = await app.ledger.record({
      spender: 'Shakib',
      date: '2024-03-05',
      shop: 'Costco',
      amount: '100',
    });
    expect(await app.store.list({ year: 2024 })).toEqual([expense]);
  });

  it('should release the database on close', async () => {
    const created = await createApp(
      ConfigSchema.parse({ database: { type: 'sqlite', filename: ':memory:' } })
    );
    await created.close();

    expect(created.adapter?.isConnected()).toBe(false);
  });

  it('should apply the ledger configuration', async () => {
    app = await createApp(
      ConfigSchema.parse({ database: { type: 'memory' }, ledger: { amountPolicy: 'strict' } })
    );

    await expect(
      app.ledger.record({ spender: 'Junit', date: '2024-03-05', shop: 'Costco', amount: 'lots' })
    ).rejects.toMatchObject({ code: 'INVALID_AMOUNT' });
  });
});
