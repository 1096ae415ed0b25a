// Seeded k-means (k-means++ initialisation, Lloyd iterations)

import { squaredDistance } from './statistics.js';
import type { RandomSource } from '../utils/random.js';

export interface KMeansResult {
  labels: number[];
  centroids: number[][];
  inertia: number;
  iterations: number;
}

function nearest(point: readonly number[], centroids: readonly (readonly number[])[]): { index: number; distance: number } {
  let index = 0;
  let distance = Number.POSITIVE_INFINITY;
  centroids.forEach((c, i) => {
    const d = squaredDistance(point, c);
    // strict comparison keeps the lowest index on ties
    if (d < distance) {
      distance = d;
      index = i;
    }
  });
  return { index, distance };
}

function initCentroids(points: readonly (readonly number[])[], k: number, random: RandomSource): number[][] {
  const first = points[Math.floor(random() * points.length)] ?? [];
  const centroids: number[][] = [[...first]];

  while (centroids.length < k) {
    const weights = points.map(p => nearest(p, centroids).distance);
    const total = weights.reduce((s, w) => s + w, 0);
    if (total === 0) {
      // Every point coincides with a centroid; duplicate rather than loop forever
      centroids.push([...(points[centroids.length % points.length] ?? first)]);
      continue;
    }
    let target = random() * total;
    let chosen = points.length - 1;
    for (let i = 0; i < weights.length; i++) {
      target -= weights[i] ?? 0;
      if (target < 0) {
        chosen = i;
        break;
      }
    }
    centroids.push([...(points[chosen] ?? first)]);
  }
  return centroids;
}

export function kMeans(
  points: readonly (readonly number[])[],
  k: number,
  random: RandomSource,
  maxIterations = 100,
): KMeansResult {
  const dims = points[0]?.length ?? 0;
  let centroids = initCentroids(points, k, random);
  let labels = points.map(() => -1);
  let iterations = 0;

  for (; iterations < maxIterations; iterations++) {
    const next = points.map(p => nearest(p, centroids).index);
    const changed = next.some((label, i) => label !== labels[i]);
    labels = next;
    if (!changed) break;

    const sums = centroids.map(() => new Array<number>(dims).fill(0));
    const counts = centroids.map(() => 0);
    points.forEach((p, i) => {
      const label = labels[i] ?? 0;
      const sum = sums[label];
      if (!sum) return;
      counts[label] = (counts[label] ?? 0) + 1;
      for (let d = 0; d < dims; d++) sum[d] = (sum[d] ?? 0) + (p[d] ?? 0);
    });

    centroids = centroids.map((c, ci) => {
      const count = counts[ci] ?? 0;
      if (count === 0) {
        // Empty cluster: re-seed at the point farthest from its centroid
        let far = 0;
        let farDist = -1;
        points.forEach((p, i) => {
          const d = squaredDistance(p, centroids[labels[i] ?? 0] ?? c);
          if (d > farDist) {
            farDist = d;
            far = i;
          }
        });
        return [...(points[far] ?? c)];
      }
      return (sums[ci] ?? c).map(v => v / count);
    });
  }

  const inertia = points.reduce((s, p, i) => s + squaredDistance(p, centroids[labels[i] ?? 0] ?? []), 0);
  return { labels, centroids, inertia, iterations };
}
