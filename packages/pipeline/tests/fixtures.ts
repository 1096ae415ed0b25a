// Transaction fixture for u-1, April 2025: spend 1000.00 over two payments, cash-in 1200.00

import { parseTransaction } from '../types/transactions.js';
import type { TransactionRecord } from '../types/transactions.js';

export const APRIL_RAW = [
  { userId: 'u-1', timestamp: '2025-04-03T09:00:00Z', amount: -250.5, category: 'groceries', direction: 'cash-out', method: 'card', merchant: 'FreshMart', segment: 'prudent_planners' },
  { userId: 'u-1', timestamp: '2025-04-01T08:00:00Z', amount: -749.5, category: 'rent', direction: 'cash-out', method: 'transfer', merchant: 'Landlord Co' },
  { userId: 'u-1', timestamp: '2025-04-25T12:00:00Z', amount: 1200, category: 'salary', direction: 'cash-in', method: 'bank_transfer' },
];

export const APRIL_RECORDS: TransactionRecord[] = APRIL_RAW.map(parseTransaction);
