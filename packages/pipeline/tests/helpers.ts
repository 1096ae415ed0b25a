// Shared builders for pipeline tests

import type { LlmConfig, GenerationConfig, ClassifierConfig } from '../config/index.js';
import { DEFAULT_THRESHOLDS } from '../safety/ethical-gate.js';

export interface RawRecord {
  userId: string;
  timestamp: string;
  amount: number;
  category: string;
  direction: 'cash-in' | 'cash-out';
  method?: string;
  merchant?: string;
  segment?: string;
}

export function at(year: number, month: number, day: number, hour = 12): string {
  return new Date(Date.UTC(year, month - 1, day, hour)).toISOString();
}

/** Spends on days 1, 2, 3…; cash-ins from day 20 */
export function monthOf(userId: string, year: number, month: number, spends: number[], cashIns: number[]): RawRecord[] {
  return [
    ...spends.map((amount, i): RawRecord => ({
      userId,
      timestamp: at(year, month, i + 1),
      amount: -amount,
      category: i % 2 === 0 ? 'groceries' : 'bills',
      direction: 'cash-out',
      method: i % 2 === 0 ? 'card' : 'transfer',
      merchant: i % 2 === 0 ? 'FreshMart' : 'City Power',
    })),
    ...cashIns.map((amount, i): RawRecord => ({
      userId,
      timestamp: at(year, month, 20 + i),
      amount,
      category: 'salary',
      direction: 'cash-in',
      method: 'bank_transfer',
    })),
  ];
}

export const TEST_LLM: LlmConfig = {
  apiKey: 'test-key',
  model: 'test-model',
  maxTokens: 256,
  temperature: 0,
  timeoutMs: 1_000,
  maxConcurrentCalls: 2,
  maxAttempts: 3,
  baseDelayMs: 0,
  maxDelayMs: 0,
};

export const TEST_GENERATION: GenerationConfig = {
  maxValidationAttempts: 3,
  maxSectionLength: 2_000,
  numericTolerance: 0.01,
  approach: 'zero_shot',
  sections: ['executive_summary'],
};

export const TEST_CLASSIFIER: ClassifierConfig = {
  url: 'https://classifier.test/score',
  token: 'test-token',
  timeoutMs: 1_000,
  concurrency: 1,
  maxAttempts: 2,
  thresholds: DEFAULT_THRESHOLDS,
};
