// ProfileAggregator — per-user, per-month fold over canonical transaction records

import type { TransactionStore } from '../store/transaction-store.js';
import type { TransactionRecord } from '../types/transactions.js';
import type { CategoryTotal, MonthlyProfile, MethodBreakdown, MerchantTotal } from '../types/profile.js';
import { DataError } from '../types/errors.js';
import { monthWindow } from '../utils/calendar.js';
import { compareStrings } from '../utils/compare.js';

export const TOP_MERCHANT_LIMIT = 5;
const UNKNOWN_METHOD = 'unknown';

export interface BuildProfileOptions {
  /**
   * The caller expects an active user: a period outside the store's data
   * horizon is then a DataError instead of a zero profile.
   */
  requireActivity?: boolean;
}

function compareRecords(a: TransactionRecord, b: TransactionRecord): number {
  return a.timestamp.getTime() - b.timestamp.getTime()
    || a.amount - b.amount
    || compareStrings(a.category, b.category)
    || compareStrings(a.direction, b.direction)
    || compareStrings(a.method ?? '', b.method ?? '')
    || compareStrings(a.merchant ?? '', b.merchant ?? '');
}

function sortedRecord(entries: Map<string, number>): Record<string, number> {
  const out: Record<string, number> = {};
  for (const key of [...entries.keys()].sort()) {
    out[key] = entries.get(key) ?? 0;
  }
  return out;
}

/**
 * Pure fold. Records outside the month or belonging to other users are ignored.
 * Records are folded in a canonical order so floating-point sums do not depend
 * on the order the store returned them in.
 */
export function aggregateProfile(
  userId: string,
  year: number,
  month: number,
  records: readonly TransactionRecord[],
): MonthlyProfile {
  const { start, end } = monthWindow(year, month);
  const inWindow = records
    .filter(r => r.userId === userId && r.timestamp >= start && r.timestamp < end)
    .sort(compareRecords);

  let spendCount = 0;
  let cashInCount = 0;
  let totalSpend = 0;
  let totalCashIn = 0;
  const categories = new Map<string, number>();
  const spendCategories = new Map<string, number>();
  const methods = new Map<string, { method: string; direction: TransactionRecord['direction']; count: number; total: number }>();
  const merchants = new Map<string, number>();
  const segments = new Set<string>();

  for (const r of inWindow) {
    const magnitude = Math.abs(r.amount);
    if (r.direction === 'cash-out') {
      spendCount++;
      totalSpend += magnitude;
      if (r.merchant) merchants.set(r.merchant, (merchants.get(r.merchant) ?? 0) + magnitude);
      spendCategories.set(r.category, (spendCategories.get(r.category) ?? 0) + magnitude);
    } else {
      cashInCount++;
      totalCashIn += magnitude;
    }

    categories.set(r.category, (categories.get(r.category) ?? 0) + magnitude);

    const method = r.method ?? UNKNOWN_METHOD;
    const key = `${r.direction}\u0000${method}`;
    const entry = methods.get(key) ?? { method, direction: r.direction, count: 0, total: 0 };
    entry.count++;
    entry.total += magnitude;
    methods.set(key, entry);

    if (r.segment) segments.add(r.segment);
  }

  const methodBreakdown: MethodBreakdown[] = [...methods.values()]
    .sort((a, b) => compareStrings(a.direction, b.direction) || b.total - a.total || compareStrings(a.method, b.method))
    .map(m => Object.freeze({ ...m }));

  const topMerchants: MerchantTotal[] = [...merchants.entries()]
    .map(([merchant, total]) => ({ merchant, total }))
    .sort((a, b) => b.total - a.total || compareStrings(a.merchant, b.merchant))
    .slice(0, TOP_MERCHANT_LIMIT)
    .map(m => Object.freeze(m));

  const spendByCategory: CategoryTotal[] = [...spendCategories.entries()]
    .map(([category, total]) => ({ category, total }))
    .sort((a, b) => b.total - a.total || compareStrings(a.category, b.category))
    .map(c => Object.freeze(c));

  return Object.freeze({
    userId,
    year,
    month,
    transactionCount: spendCount + cashInCount,
    spendCount,
    cashInCount,
    totalSpend,
    totalCashIn,
    categoryBreakdown: Object.freeze(sortedRecord(categories)),
    spendCategories: Object.freeze(spendByCategory),
    methodBreakdown: Object.freeze(methodBreakdown),
    topMerchants: Object.freeze(topMerchants),
    segments: Object.freeze([...segments].sort()),
    netFlow: totalCashIn - totalSpend,
  });
}

export class ProfileAggregator {
  constructor(private readonly store: TransactionStore) {}

  async buildProfile(
    userId: string,
    year: number,
    month: number,
    options: BuildProfileOptions = {},
  ): Promise<MonthlyProfile> {
    const { start, end } = monthWindow(year, month);

    if (options.requireActivity) {
      const horizon = await this.store.dataHorizon();
      if (!horizon) {
        throw new DataError('No transaction data available');
      }
      if (end <= horizon.earliest || start > horizon.latest) {
        throw new DataError(
          `${year}-${String(month).padStart(2, '0')} lies outside the data horizon ` +
          `${horizon.earliest.toISOString()}..${horizon.latest.toISOString()}`,
        );
      }
    }

    const records = await this.store.listTransactions(userId, start, end);
    return aggregateProfile(userId, year, month, records);
  }
}
