import { describe, it, expect } from 'vitest';
import { parseTransaction } from '../types/transactions.js';
import { InMemoryTransactionStore } from '../store/transaction-store.js';
import { DataError } from '../types/errors.js';

describe('parseTransaction', () => {
  it('coerces timestamps and amounts', () => {
    const record = parseTransaction({
      userId: ' u-1 ',
      timestamp: '2025-04-02T10:00:00.000Z',
      amount: '-12.5',
      category: 'groceries',
      direction: 'cash-out',
    });

    expect(record.userId).toBe('u-1');
    expect(record.timestamp).toEqual(new Date('2025-04-02T10:00:00.000Z'));
    expect(record.amount).toBe(-12.5);
    expect(record.method).toBeUndefined();
    expect(Object.isFrozen(record)).toBe(true);
  });

  it('rejects an unknown direction', () => {
    expect(() => parseTransaction({
      userId: 'u-1',
      timestamp: '2025-04-02T10:00:00.000Z',
      amount: 10,
      category: 'salary',
      direction: 'sideways',
    })).toThrow(DataError);
  });

  it('rejects zero amounts and timestamps outside the supported range', () => {
    const base = { userId: 'u-1', category: 'misc', direction: 'cash-in' };
    expect(() => parseTransaction({ ...base, timestamp: '2025-04-02T00:00:00Z', amount: 0 })).toThrow(/amount must be non-zero/);
    expect(() => parseTransaction({ ...base, timestamp: '1999-12-31T23:59:59Z', amount: 5 })).toThrow(/outside supported range/);
    expect(() => parseTransaction({ ...base, timestamp: 'not a date', amount: 5 })).toThrow(DataError);
  });
});

describe('InMemoryTransactionStore', () => {
  const store = new InMemoryTransactionStore([
    { userId: 'u-1', timestamp: '2025-03-31T23:59:59.999Z', amount: -5, category: 'misc', direction: 'cash-out' },
    { userId: 'u-1', timestamp: '2025-04-01T00:00:00.000Z', amount: -20, category: 'misc', direction: 'cash-out' },
    { userId: 'u-1', timestamp: '2025-04-15T00:00:00.000Z', amount: 100, category: 'salary', direction: 'cash-in' },
    { userId: 'u-2', timestamp: '2025-05-01T00:00:00.000Z', amount: -7, category: 'misc', direction: 'cash-out' },
  ]);
  const start = new Date('2025-04-01T00:00:00.000Z');
  const end = new Date('2025-05-01T00:00:00.000Z');

  it('lists records in a half-open window', async () => {
    const records = await store.listTransactions('u-1', start, end);
    expect(records.map(r => r.amount)).toEqual([-20, 100]);
    expect(await store.listTransactions('u-2', start, end)).toEqual([]);
  });

  it('summarizes only users with activity in the window', async () => {
    expect(await store.summarizeUsers(start, end)).toEqual([
      { userId: 'u-1', transactionCount: 2, totalSpend: 20, totalCashIn: 100 },
    ]);
  });

  it('reports the data horizon', async () => {
    expect(store.size).toBe(4);
    expect(await store.dataHorizon()).toEqual({
      earliest: new Date('2025-03-31T23:59:59.999Z'),
      latest: new Date('2025-05-01T00:00:00.000Z'),
    });
    expect(await new InMemoryTransactionStore().dataHorizon()).toBeNull();
  });

  it('rejects a batch containing an invalid record', () => {
    const empty = new InMemoryTransactionStore();
    expect(() => empty.addAll([
      { userId: 'u-3', timestamp: '2025-04-01T00:00:00Z', amount: 1, category: 'misc', direction: 'cash-in' },
      { userId: '', timestamp: '2025-04-01T00:00:00Z', amount: 1, category: 'misc', direction: 'cash-in' },
    ])).toThrow(DataError);
    expect(empty.size).toBe(0);
  });
});
