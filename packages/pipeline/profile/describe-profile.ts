// Textual transaction summary of a monthly profile, embedded in every prompt

import type { MonthlyProfile } from '../types/profile.js';
import { monthName } from '../utils/calendar.js';

export function formatAmount(value: number): string {
  return value.toFixed(2);
}

export function formatPercent(fraction: number): string {
  return `${(fraction * 100).toFixed(2)}%`;
}

function humanize(tag: string): string {
  return tag.toLowerCase().replace(/_/g, ' ');
}

export function describeProfile(profile: MonthlyProfile): string {
  const period = `${monthName(profile.month)} ${profile.year}`;
  if (profile.transactionCount === 0) {
    return `User ${profile.userId} (${period})\nNo transaction data found for this period.`;
  }

  const lines = [
    `User ${profile.userId} monthly transaction summary (${period})`,
    `- Total spend is ${formatAmount(profile.totalSpend)} with ${profile.spendCount} transactions`,
  ];

  const shares = (direction: 'cash-out' | 'cash-in', total: number): string[] =>
    total > 0
      ? profile.methodBreakdown
        .filter(m => m.direction === direction)
        .map(m => `${humanize(m.method)} with ${formatPercent(m.total / total)}`)
      : [];

  const spendMethods = shares('cash-out', profile.totalSpend);
  lines.push(spendMethods.length > 0
    ? `- Spending methods include ${spendMethods.join(', ')}`
    : '- No spending methods recorded or zero total spend.');

  if (profile.spendCategories.length > 0 && profile.totalSpend > 0) {
    const categories = profile.spendCategories.map(c =>
      `${humanize(c.category)} ${formatAmount(c.total)} (${formatPercent(c.total / profile.totalSpend)})`);
    lines.push(`- Spending categories: ${categories.join(', ')}`);
  }

  lines.push(`- Total cash-in is ${formatAmount(profile.totalCashIn)} with ${profile.cashInCount} transactions`);

  const cashInMethods = shares('cash-in', profile.totalCashIn);
  lines.push(cashInMethods.length > 0
    ? `- Cash-in methods include ${cashInMethods.join(', ')}`
    : '- No cash-in methods recorded or zero total cash-in.');

  if (profile.totalCashIn > 0) {
    lines.push(`- Spending accounts for ${formatPercent(profile.totalSpend / profile.totalCashIn)} of total cash-in`);
  }
  lines.push(`- Net flow is ${formatAmount(profile.netFlow)}`);

  if (profile.topMerchants.length > 0) {
    lines.push(`- Top merchants: ${profile.topMerchants.map(m => `${m.merchant} (${formatAmount(m.total)})`).join(', ')}`);
  }

  lines.push(profile.segments.length > 0
    ? `- User tags: ${profile.segments.map(humanize).join(', ')}`
    : '- User tags: Not available');

  return lines.join('\n');
}
