// CohortSelector — active users for a period, by per-user activity thresholds

import type { TransactionStore } from '../store/transaction-store.js';
import type { CohortConfig } from '../config/index.js';
import { DataError } from '../types/errors.js';
import { monthWindow } from '../utils/calendar.js';
import { compareStrings } from '../utils/compare.js';

export type CohortCriteria = CohortConfig;

export const DEFAULT_COHORT_CRITERIA: CohortCriteria = {
  minTransactions: 3,
  minSpend: 0,
  minCashIn: 0,
  maxUsers: 1000,
};

export class CohortSelector {
  constructor(private readonly store: TransactionStore) {}

  /**
   * Users meeting every threshold over the calendar month, ordered by
   * descending transaction count then ascending user id, truncated to maxUsers.
   * An empty result is not an error.
   */
  async selectActive(
    year: number,
    month: number,
    criteria: Partial<CohortCriteria> = {},
  ): Promise<string[]> {
    const c = { ...DEFAULT_COHORT_CRITERIA, ...criteria };
    for (const [key, value] of Object.entries(c)) {
      if (!Number.isFinite(value) || value < 0) {
        throw new DataError(`Cohort criterion ${key} must be a non-negative number, got ${value}`);
      }
    }

    const { start, end } = monthWindow(year, month);
    const activity = await this.store.summarizeUsers(start, end);

    return activity
      .filter(a =>
        a.transactionCount >= c.minTransactions
        && a.totalSpend >= c.minSpend
        && a.totalCashIn >= c.minCashIn)
      .sort((a, b) =>
        b.transactionCount - a.transactionCount
        || compareStrings(a.userId, b.userId))
      .slice(0, Math.floor(c.maxUsers))
      .map(a => a.userId);
  }
}
