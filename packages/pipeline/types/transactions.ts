// Canonical transaction records — the input contract from the ingestion side

import { z } from 'zod';
import { DataError } from './errors.js';

export type Direction = 'cash-in' | 'cash-out';

export interface TransactionRecord {
  readonly userId: string;
  readonly timestamp: Date;
  /** Signed, currency-normalised amount. The sign is informational; `direction` decides the bucket. */
  readonly amount: number;
  readonly category: string;
  readonly direction: Direction;
  /** Payment rail, e.g. "qr", "send_money", "bank_transfer" */
  readonly method?: string;
  readonly merchant?: string;
  /** Behavioural segment tag assigned upstream */
  readonly segment?: string;
}

export const SUPPORTED_RANGE = {
  start: new Date(Date.UTC(2000, 0, 1)),
  end: new Date(Date.UTC(2100, 0, 1)),
} as const;

export const TransactionRecordSchema = z.object({
  userId: z.string().trim().min(1),
  timestamp: z.coerce.date().refine(
    (d) => !Number.isNaN(d.getTime()) && d >= SUPPORTED_RANGE.start && d < SUPPORTED_RANGE.end,
    { message: 'timestamp outside supported range 2000-01-01..2100-01-01' },
  ),
  amount: z.coerce.number().finite().refine((n) => n !== 0, { message: 'amount must be non-zero' }),
  category: z.string().trim().min(1),
  direction: z.enum(['cash-in', 'cash-out']),
  method: z.string().trim().min(1).optional(),
  merchant: z.string().trim().min(1).optional(),
  segment: z.string().trim().min(1).optional(),
});

/**
 * Validate and freeze a raw record. Throws DataError listing every violated field.
 */
export function parseTransaction(raw: unknown): TransactionRecord {
  const result = TransactionRecordSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || 'record'}: ${i.message}`);
    throw new DataError(`Invalid transaction record — ${issues.join('; ')}`);
  }
  return Object.freeze({ ...result.data });
}
