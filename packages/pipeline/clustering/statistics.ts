// Distribution helpers for cluster summaries

/** Linear-interpolated percentile (q in [0, 1]) of an ascending-sorted array */
export function percentile(sorted: readonly number[], q: number): number {
  if (sorted.length === 0) return 0;
  const pos = (sorted.length - 1) * q;
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  const a = sorted[lo] ?? 0;
  const b = sorted[hi] ?? a;
  return a + (b - a) * (pos - lo);
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

export function squaredDistance(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = (a[i] ?? 0) - (b[i] ?? 0);
    sum += d * d;
  }
  return sum;
}

/**
 * Mean silhouette coefficient of a labelling. Points in singleton clusters
 * score 0; a labelling with fewer than two clusters scores 0.
 */
export function silhouetteScore(points: readonly (readonly number[])[], labels: readonly number[]): number {
  const k = new Set(labels).size;
  if (k < 2 || points.length < 3) return 0;

  const total = points.reduce((score, point, i) => {
    const sums = new Map<number, { sum: number; count: number }>();
    for (let j = 0; j < points.length; j++) {
      if (i === j) continue;
      const label = labels[j] ?? 0;
      const entry = sums.get(label) ?? { sum: 0, count: 0 };
      entry.sum += Math.sqrt(squaredDistance(point, points[j] ?? []));
      entry.count++;
      sums.set(label, entry);
    }

    const own = sums.get(labels[i] ?? 0);
    if (!own || own.count === 0) return score;
    const a = own.sum / own.count;

    let b = Number.POSITIVE_INFINITY;
    for (const [label, entry] of sums) {
      if (label === labels[i] || entry.count === 0) continue;
      b = Math.min(b, entry.sum / entry.count);
    }
    if (!Number.isFinite(b)) return score;

    const denom = Math.max(a, b);
    return score + (denom > 0 ? (b - a) / denom : 0);
  }, 0);

  return total / points.length;
}
