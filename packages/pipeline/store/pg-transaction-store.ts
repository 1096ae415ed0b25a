// PgTransactionStore — TransactionStore over the `transactions` table

import type { TransactionStore, UserActivity, DataHorizon } from './transaction-store.js';
import type { TransactionRecord } from '../types/transactions.js';
import { parseTransaction } from '../types/transactions.js';
import type { PgClient } from '../db/pg-client.js';

interface TransactionRow {
  user_id: string;
  occurred_at: Date;
  amount: string;
  category: string;
  direction: string;
  method: string | null;
  merchant: string | null;
  segment: string | null;
}

interface ActivityRow {
  user_id: string;
  transaction_count: string;
  total_spend: string;
  total_cash_in: string;
}

interface HorizonRow {
  earliest: Date | null;
  latest: Date | null;
}

export class PgTransactionStore implements TransactionStore {
  constructor(private readonly client: PgClient) {}

  async listTransactions(userId: string, start: Date, end: Date): Promise<TransactionRecord[]> {
    const { rows } = await this.client.queryWithRetry<TransactionRow>(
      `SELECT user_id, occurred_at, amount, category, direction, method, merchant, segment
         FROM transactions
        WHERE user_id = $1 AND occurred_at >= $2 AND occurred_at < $3
        ORDER BY occurred_at, id`,
      [userId, start, end],
    );

    // NUMERIC arrives as a string; parseTransaction coerces and re-validates each row
    return rows.map(row => parseTransaction({
      userId: row.user_id,
      timestamp: row.occurred_at,
      amount: row.amount,
      category: row.category,
      direction: row.direction,
      method: row.method ?? undefined,
      merchant: row.merchant ?? undefined,
      segment: row.segment ?? undefined,
    }));
  }

  async summarizeUsers(start: Date, end: Date): Promise<UserActivity[]> {
    const { rows } = await this.client.queryWithRetry<ActivityRow>(
      `SELECT user_id,
              COUNT(*) AS transaction_count,
              COALESCE(SUM(CASE WHEN direction = 'cash-out' THEN ABS(amount) ELSE 0 END), 0) AS total_spend,
              COALESCE(SUM(CASE WHEN direction = 'cash-in' THEN ABS(amount) ELSE 0 END), 0) AS total_cash_in
         FROM transactions
        WHERE occurred_at >= $1 AND occurred_at < $2
        GROUP BY user_id`,
      [start, end],
    );

    return rows.map(row => ({
      userId: row.user_id,
      transactionCount: Number(row.transaction_count),
      totalSpend: Number(row.total_spend),
      totalCashIn: Number(row.total_cash_in),
    }));
  }

  async dataHorizon(): Promise<DataHorizon | null> {
    const { rows } = await this.client.queryWithRetry<HorizonRow>(
      'SELECT MIN(occurred_at) AS earliest, MAX(occurred_at) AS latest FROM transactions',
      [],
    );
    const row = rows[0];
    if (!row?.earliest || !row.latest) return null;
    return { earliest: row.earliest, latest: row.latest };
  }
}
