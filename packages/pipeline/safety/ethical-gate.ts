// EthicalGate — maps a classifier result to Safe / Flagged / Blocked.
// Pure function of the classification and the threshold table.
//
//   risk = confidence       for unsafe (and unknown) labels
//   risk = 1 − confidence   for safe labels
//   risk < flagAt → Safe, flagAt ≤ risk < blockAt → Flagged, risk ≥ blockAt → Blocked

import type { Classification, EthicalFlag, GateResult } from '../types/report.js';
import type { GateThresholds } from '../config/index.js';

export const DEFAULT_THRESHOLDS: GateThresholds = Object.freeze({
  flagAt: 0.3,
  blockAt: 0.9,
  safeLabels: ['safe'],
  unsafeLabels: ['unsafe'],
});

export const FLAG_SEVERITY: Readonly<Record<EthicalFlag, number>> = Object.freeze({
  Safe: 0,
  Flagged: 1,
  Blocked: 2,
});

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

export class EthicalGate {
  private readonly safe: ReadonlySet<string>;
  private readonly unsafe: ReadonlySet<string>;

  constructor(readonly thresholds: GateThresholds = DEFAULT_THRESHOLDS) {
    if (!(thresholds.flagAt <= thresholds.blockAt)) {
      throw new RangeError(`flagAt (${thresholds.flagAt}) must not exceed blockAt (${thresholds.blockAt})`);
    }
    this.safe = new Set(thresholds.safeLabels.map(l => l.toLowerCase()));
    this.unsafe = new Set(thresholds.unsafeLabels.map(l => l.toLowerCase()));
  }

  /** False for labels outside the configured label set; those are screened as unsafe */
  isKnownLabel(label: string): boolean {
    const key = label.toLowerCase();
    return this.safe.has(key) || this.unsafe.has(key);
  }

  screen(classification: Classification): GateResult {
    const label = classification.label.toLowerCase();
    const raw = classification.confidence;
    const confidence = Number.isNaN(raw) ? 0 : clamp01(raw);
    // An unreadable score is screened at maximum risk
    const risk = Number.isNaN(raw) ? 1 : this.safe.has(label) ? 1 - confidence : confidence;

    let flag: EthicalFlag;
    if (risk >= this.thresholds.blockAt) flag = 'Blocked';
    else if (risk >= this.thresholds.flagAt) flag = 'Flagged';
    else flag = 'Safe';

    return Object.freeze({ flag, confidence, risk, label });
  }
}
