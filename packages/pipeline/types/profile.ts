// Monthly profile and feature vector — derived entities owned by the pipeline

import type { Direction } from './transactions.js';

export interface MethodBreakdown {
  readonly method: string;
  readonly direction: Direction;
  readonly count: number;
  readonly total: number;
}

export interface MerchantTotal {
  readonly merchant: string;
  readonly total: number;
}

export interface CategoryTotal {
  readonly category: string;
  readonly total: number;
}

export interface MonthlyProfile {
  readonly userId: string;
  readonly year: number;
  readonly month: number;
  readonly transactionCount: number;
  readonly spendCount: number;
  readonly cashInCount: number;
  readonly totalSpend: number;
  readonly totalCashIn: number;
  /** category → summed magnitude, across both directions */
  readonly categoryBreakdown: Readonly<Record<string, number>>;
  /** Cash-out categories by descending magnitude, ties by name */
  readonly spendCategories: readonly CategoryTotal[];
  readonly methodBreakdown: readonly MethodBreakdown[];
  readonly topMerchants: readonly MerchantTotal[];
  readonly segments: readonly string[];
  /** totalCashIn − totalSpend */
  readonly netFlow: number;
}

export interface FeatureVector {
  readonly userId: string;
  /** Encoder schema version; vectors from different versions are never compared */
  readonly version: string;
  readonly names: readonly string[];
  /** Normalised values in feature order, used for clustering */
  readonly values: readonly number[];
  /** Un-normalised values in feature order, used for peer statistics and narrative */
  readonly raw: readonly number[];
}
