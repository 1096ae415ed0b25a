// TransactionStore — queryable source of canonical transaction records
// In-memory implementation backs tests, fixtures and programmatic callers.

import type { TransactionRecord } from '../types/transactions.js';
import { parseTransaction } from '../types/transactions.js';

export interface UserActivity {
  userId: string;
  transactionCount: number;
  totalSpend: number;
  totalCashIn: number;
}

export interface DataHorizon {
  earliest: Date;
  latest: Date;
}

export interface TransactionStore {
  /** Records for one user with start <= timestamp < end */
  listTransactions(userId: string, start: Date, end: Date): Promise<TransactionRecord[]>;
  /** Per-user activity over start <= timestamp < end; users without records are absent */
  summarizeUsers(start: Date, end: Date): Promise<UserActivity[]>;
  /** Earliest and latest timestamps available, or null for an empty store */
  dataHorizon(): Promise<DataHorizon | null>;
}

export class InMemoryTransactionStore implements TransactionStore {
  private byUser = new Map<string, TransactionRecord[]>();

  constructor(records: Iterable<unknown> = []) {
    this.addAll(records);
  }

  /** Validates every record before storing it; one invalid record rejects the batch. */
  addAll(records: Iterable<unknown>): void {
    const parsed = Array.from(records, parseTransaction);
    for (const record of parsed) {
      let list = this.byUser.get(record.userId);
      if (!list) {
        list = [];
        this.byUser.set(record.userId, list);
      }
      list.push(record);
    }
  }

  get size(): number {
    let n = 0;
    for (const list of this.byUser.values()) n += list.length;
    return n;
  }

  async listTransactions(userId: string, start: Date, end: Date): Promise<TransactionRecord[]> {
    const list = this.byUser.get(userId) ?? [];
    return list.filter(r => r.timestamp >= start && r.timestamp < end);
  }

  async summarizeUsers(start: Date, end: Date): Promise<UserActivity[]> {
    const out: UserActivity[] = [];
    for (const [userId, list] of this.byUser) {
      let transactionCount = 0;
      let totalSpend = 0;
      let totalCashIn = 0;
      for (const r of list) {
        if (r.timestamp < start || r.timestamp >= end) continue;
        transactionCount++;
        if (r.direction === 'cash-out') totalSpend += Math.abs(r.amount);
        else totalCashIn += Math.abs(r.amount);
      }
      if (transactionCount > 0) out.push({ userId, transactionCount, totalSpend, totalCashIn });
    }
    return out;
  }

  async dataHorizon(): Promise<DataHorizon | null> {
    let earliest: Date | null = null;
    let latest: Date | null = null;
    for (const list of this.byUser.values()) {
      for (const r of list) {
        if (!earliest || r.timestamp < earliest) earliest = r.timestamp;
        if (!latest || r.timestamp > latest) latest = r.timestamp;
      }
    }
    return earliest && latest ? { earliest, latest } : null;
  }
}
