// FeatureEncoder — fixed, versioned encoding of a monthly profile into a
// numeric vector. Changing the feature list or any bound requires a new
// version: clusters built under one version are never compared with another.

import type { MonthlyProfile, FeatureVector } from '../types/profile.js';

export type FeatureScale = 'linear' | 'log';

export interface FeatureDefinition {
  readonly name: string;
  readonly description: string;
  /** Raw value; may be non-finite for degenerate profiles, in which case `fallback` applies */
  readonly extract: (profile: MonthlyProfile) => number;
  readonly fallback: number;
  readonly scale: FeatureScale;
  readonly min: number;
  readonly max: number;
}

export interface FeatureEncoderConfig {
  readonly version: string;
  readonly features: readonly FeatureDefinition[];
}

function ratio(numerator: number, denominator: number): number {
  return denominator > 0 ? numerator / denominator : Number.NaN;
}

/** Shannon entropy of the category mix divided by its maximum, ln(n) */
function categoryDiversity(profile: MonthlyProfile): number {
  const values = Object.values(profile.categoryBreakdown).filter(v => v > 0);
  if (values.length < 2) return 0;
  const total = values.reduce((s, v) => s + v, 0);
  let entropy = 0;
  for (const v of values) {
    const p = v / total;
    entropy -= p * Math.log(p);
  }
  return entropy / Math.log(values.length);
}

export const FEATURE_SCHEMA_V1: FeatureEncoderConfig = Object.freeze({
  version: 'v1',
  features: Object.freeze([
    {
      name: 'spend_count',
      description: 'number of spend transactions',
      extract: (p: MonthlyProfile) => p.spendCount,
      fallback: 0, scale: 'log', min: 0, max: 500,
    },
    {
      name: 'cash_in_count',
      description: 'number of cash-in transactions',
      extract: (p: MonthlyProfile) => p.cashInCount,
      fallback: 0, scale: 'log', min: 0, max: 100,
    },
    {
      name: 'total_spend',
      description: 'total amount spent',
      extract: (p: MonthlyProfile) => p.totalSpend,
      fallback: 0, scale: 'log', min: 0, max: 1_000_000,
    },
    {
      name: 'total_cash_in',
      description: 'total amount received',
      extract: (p: MonthlyProfile) => p.totalCashIn,
      fallback: 0, scale: 'log', min: 0, max: 1_000_000,
    },
    {
      name: 'spend_to_income_ratio',
      description: 'spend as a multiple of cash-in',
      // Spend without any cash-in saturates at the upper bound
      extract: (p: MonthlyProfile) => p.totalCashIn > 0 ? p.totalSpend / p.totalCashIn : (p.totalSpend > 0 ? 3 : Number.NaN),
      fallback: 0, scale: 'linear', min: 0, max: 3,
    },
    {
      name: 'category_diversity',
      description: 'evenness of the category mix',
      extract: categoryDiversity,
      fallback: 0, scale: 'linear', min: 0, max: 1,
    },
    {
      name: 'net_flow_ratio',
      description: 'net flow relative to gross flow',
      extract: (p: MonthlyProfile) => ratio(p.netFlow, p.totalCashIn + p.totalSpend),
      fallback: 0, scale: 'linear', min: -1, max: 1,
    },
    {
      name: 'average_spend_ticket',
      description: 'average spend per transaction',
      extract: (p: MonthlyProfile) => ratio(p.totalSpend, p.spendCount),
      fallback: 0, scale: 'log', min: 0, max: 100_000,
    },
  ] satisfies FeatureDefinition[]),
});

function normalize(def: FeatureDefinition, raw: number): number {
  const transform = def.scale === 'log'
    ? (v: number) => Math.log1p(Math.max(0, v))
    : (v: number) => v;
  const lo = transform(def.min);
  const hi = transform(def.max);
  const span = hi - lo;
  if (span <= 0) return 0;
  const scaled = (transform(raw) - lo) / span;
  return Math.min(1, Math.max(0, scaled));
}

export class FeatureEncoder {
  constructor(readonly config: FeatureEncoderConfig = FEATURE_SCHEMA_V1) {}

  get version(): string {
    return this.config.version;
  }

  get featureNames(): string[] {
    return this.config.features.map(f => f.name);
  }

  /** Total: every profile, including the zero profile, yields finite values. */
  encode(profile: MonthlyProfile): FeatureVector {
    const raw: number[] = [];
    const values: number[] = [];

    for (const def of this.config.features) {
      const extracted = def.extract(profile);
      const value = Number.isFinite(extracted) ? extracted : def.fallback;
      raw.push(value);
      values.push(normalize(def, value));
    }

    return Object.freeze({
      userId: profile.userId,
      version: this.config.version,
      names: Object.freeze(this.featureNames),
      values: Object.freeze(values),
      raw: Object.freeze(raw),
    });
  }
}
