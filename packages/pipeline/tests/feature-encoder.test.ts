import { describe, it, expect } from 'vitest';
import { FeatureEncoder, FEATURE_SCHEMA_V1 } from '../features/feature-encoder.js';
import { aggregateProfile } from '../profile/profile-aggregator.js';
import { parseTransaction } from '../types/transactions.js';

const encoder = new FeatureEncoder();

describe('FeatureEncoder', () => {
  it('exposes a versioned feature list', () => {
    expect(encoder.version).toBe('v1');
    expect(encoder.featureNames).toEqual(FEATURE_SCHEMA_V1.features.map(f => f.name));
    expect(encoder.featureNames).toHaveLength(8);
  });

  it('encodes the zero profile to finite values', () => {
    const vector = encoder.encode(aggregateProfile('u-0', 2025, 4, []));

    expect(vector.userId).toBe('u-0');
    expect(vector.values).toEqual([0, 0, 0, 0, 0, 0, 0.5, 0]);
    expect(vector.raw).toEqual([0, 0, 0, 0, 0, 0, 0, 0]);
  });

  it('saturates spend without cash-in', () => {
    const records = [
      parseTransaction({ userId: 'u-1', timestamp: '2025-04-02T00:00:00Z', amount: -400, category: 'rent', direction: 'cash-out' }),
      parseTransaction({ userId: 'u-1', timestamp: '2025-04-03T00:00:00Z', amount: -600, category: 'rent', direction: 'cash-out' }),
    ];
    const vector = encoder.encode(aggregateProfile('u-1', 2025, 4, records));
    const at = (name: string): number => vector.values[vector.names.indexOf(name)];

    expect(at('spend_to_income_ratio')).toBe(1);
    expect(at('net_flow_ratio')).toBe(0);
    expect(at('category_diversity')).toBe(0);
    expect(vector.raw[vector.names.indexOf('average_spend_ticket')]).toBe(500);
  });

  it('keeps every normalised value within [0, 1]', () => {
    const records = [
      parseTransaction({ userId: 'u-2', timestamp: '2025-04-02T00:00:00Z', amount: -5_000_000, category: 'cars', direction: 'cash-out' }),
      parseTransaction({ userId: 'u-2', timestamp: '2025-04-05T00:00:00Z', amount: 10, category: 'refund', direction: 'cash-in' }),
    ];
    const vector = encoder.encode(aggregateProfile('u-2', 2025, 4, records));
    for (const value of vector.values) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThanOrEqual(1);
    }
  });

  it('measures an even category mix as fully diverse', () => {
    const records = [
      parseTransaction({ userId: 'u-3', timestamp: '2025-04-02T00:00:00Z', amount: -50, category: 'food', direction: 'cash-out' }),
      parseTransaction({ userId: 'u-3', timestamp: '2025-04-03T00:00:00Z', amount: -50, category: 'fuel', direction: 'cash-out' }),
    ];
    const vector = encoder.encode(aggregateProfile('u-3', 2025, 4, records));
    expect(vector.raw[vector.names.indexOf('category_diversity')]).toBeCloseTo(1, 10);
  });
});
