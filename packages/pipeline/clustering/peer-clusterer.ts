// PeerClusterer — partitions a cohort snapshot's feature vectors into peer
// groups and exposes per-user benchmark statistics. Output is immutable and
// shared read-only by every per-user report run against the snapshot.

import type { FeatureVector } from '../types/profile.js';
import type { Cluster, ClusterOptions, ClusterPolicy, FeatureStats, PeerSummary } from '../types/clustering.js';
import { ClusteringError } from '../types/errors.js';
import { seededRandom } from '../utils/random.js';
import { compareStrings } from '../utils/compare.js';
import { createLogger } from '../utils/logger.js';
import { kMeans, type KMeansResult } from './kmeans.js';
import { mean, percentile, silhouetteScore, squaredDistance } from './statistics.js';

const log = createLogger('PeerClusterer');

const DEFAULT_RESTARTS = 4;

export class PeerClustering {
  private readonly byUser: ReadonlyMap<string, Cluster>;

  constructor(
    readonly version: string,
    readonly featureNames: readonly string[],
    readonly clusters: readonly Cluster[],
    private readonly vectors: ReadonlyMap<string, FeatureVector>,
  ) {
    const byUser = new Map<string, Cluster>();
    for (const cluster of clusters) {
      for (const id of cluster.memberIds) byUser.set(id, cluster);
    }
    this.byUser = byUser;
  }

  /** user id → assigned cluster */
  get assignments(): ReadonlyMap<string, Cluster> {
    return this.byUser;
  }

  clusterOf(userId: string): Cluster | undefined {
    return this.byUser.get(userId);
  }

  /** Benchmark a cohort member against the rest of their cluster. */
  summaryFor(userId: string): PeerSummary | undefined {
    const cluster = this.byUser.get(userId);
    const vector = this.vectors.get(userId);
    if (!cluster || !vector) return undefined;
    return this.summarize(vector, cluster, true);
  }

  /**
   * Benchmark any vector of the same encoder version; users outside the
   * cohort are matched to the nearest centroid.
   */
  compare(vector: FeatureVector): PeerSummary {
    const member = this.summaryFor(vector.userId);
    if (member) return member;

    if (vector.version !== this.version) {
      throw new ClusteringError(
        `Feature vector version ${vector.version} cannot be compared with clusters built under ${this.version}`,
      );
    }

    let best = this.clusters[0];
    let bestDistance = Number.POSITIVE_INFINITY;
    for (const cluster of this.clusters) {
      const d = squaredDistance(vector.values, cluster.centroid);
      if (d < bestDistance) {
        bestDistance = d;
        best = cluster;
      }
    }
    if (!best) throw new ClusteringError('Clustering has no clusters');
    return this.summarize(vector, best, false);
  }

  private summarize(vector: FeatureVector, cluster: Cluster, inCohort: boolean): PeerSummary {
    const peers = cluster.memberIds
      .filter(id => id !== vector.userId)
      .map(id => this.vectors.get(id))
      .filter((v): v is FeatureVector => v !== undefined);

    const ranks: Record<string, number | null> = {};
    this.featureNames.forEach((name, i) => {
      if (peers.length === 0) {
        ranks[name] = null;
        return;
      }
      const own = vector.raw[i] ?? 0;
      const below = peers.filter(p => (p.raw[i] ?? 0) < own).length;
      ranks[name] = below / peers.length;
    });

    return Object.freeze({
      cluster,
      clusterCount: this.clusters.length,
      ranks: Object.freeze(ranks),
      inCohort,
    });
  }
}

function validate(vectors: ReadonlyMap<string, FeatureVector>): { version: string; names: readonly string[] } {
  const first = vectors.values().next();
  if (first.done) {
    throw new ClusteringError('Cannot cluster an empty cohort');
  }
  const { version, names } = first.value;

  for (const [userId, v] of vectors) {
    if (v.version !== version) {
      throw new ClusteringError(`Mixed encoder versions in cohort: ${version} and ${v.version} (user ${userId})`);
    }
    if (v.values.length !== names.length || v.raw.length !== names.length) {
      throw new ClusteringError(`Feature vector for user ${userId} has the wrong dimension`);
    }
    if (!v.values.every(Number.isFinite) || !v.raw.every(Number.isFinite)) {
      throw new ClusteringError(`Feature vector for user ${userId} contains non-finite values`);
    }
  }
  return { version, names };
}

function bestOf(points: readonly (readonly number[])[], k: number, options: ClusterOptions): KMeansResult {
  // A fresh stream per k keeps each k's result independent of which others were tried
  const random = seededRandom(options.seed);
  let best: KMeansResult | undefined;
  const restarts = Math.max(1, options.restarts ?? DEFAULT_RESTARTS);
  for (let r = 0; r < restarts; r++) {
    const result = kMeans(points, k, random, options.maxIterations);
    if (!best || result.inertia < best.inertia) best = result;
  }
  if (!best) throw new ClusteringError(`k-means produced no result for k=${k}`);
  return best;
}

function buildStats(names: readonly string[], members: readonly FeatureVector[]): FeatureStats[] {
  return names.map((name, i) => {
    const sorted = members.map(m => m.raw[i] ?? 0).sort((a, b) => a - b);
    return Object.freeze({
      name,
      mean: mean(sorted),
      min: sorted[0] ?? 0,
      p25: percentile(sorted, 0.25),
      p50: percentile(sorted, 0.5),
      p75: percentile(sorted, 0.75),
      p90: percentile(sorted, 0.9),
      max: sorted[sorted.length - 1] ?? 0,
    });
  });
}

export class PeerClusterer {
  /**
   * Deterministic for a given input and seed: users are processed in id order,
   * k-means draws from a seeded PRNG and cluster labels are assigned in order
   * of each cluster's smallest member id.
   */
  cluster(
    vectors: ReadonlyMap<string, FeatureVector>,
    policy: ClusterPolicy,
    options: ClusterOptions,
  ): PeerClustering {
    const { version, names } = validate(vectors);
    if (policy.kind === 'fixed' && (!Number.isInteger(policy.k) || policy.k < 1)) {
      throw new ClusteringError(`Cluster count must be a positive integer, got ${policy.k}`);
    }

    const userIds = [...vectors.keys()].sort(compareStrings);
    const ordered = userIds.map(id => vectors.get(id)).filter((v): v is FeatureVector => v !== undefined);
    const points = ordered.map(v => v.values);
    const n = points.length;

    const distinct = new Set(points.map(p => p.join(','))).size;
    const capacity = Math.max(1, Math.min(distinct, Math.floor(n / Math.max(1, options.minClusterSize))));

    let labels: number[];
    if (n < options.minClusterSize || capacity < 2) {
      labels = points.map(() => 0);
    } else if (policy.kind === 'fixed') {
      const k = Math.min(policy.k, capacity);
      labels = k === 1 ? points.map(() => 0) : bestOf(points, k, options).labels;
    } else {
      const upper = Math.min(policy.maxK, capacity, n - 1);
      let bestLabels = points.map(() => 0);
      let bestScore = Number.NEGATIVE_INFINITY;
      for (let k = 2; k <= upper; k++) {
        const candidate = bestOf(points, k, options).labels;
        const score = silhouetteScore(points, candidate);
        // strict comparison: ties keep the smaller k
        if (score > bestScore) {
          bestScore = score;
          bestLabels = candidate;
        }
      }
      labels = bestLabels;
    }

    // Relabel by first appearance in id order
    const relabel = new Map<number, number>();
    for (const label of labels) {
      if (!relabel.has(label)) relabel.set(label, relabel.size);
    }

    const groups: FeatureVector[][] = Array.from({ length: relabel.size }, () => []);
    ordered.forEach((v, i) => {
      groups[relabel.get(labels[i] ?? 0) ?? 0]?.push(v);
    });

    const clusters: Cluster[] = groups.map((members, label) => Object.freeze({
      label,
      version,
      memberIds: Object.freeze(members.map(m => m.userId)),
      centroid: Object.freeze(names.map((_, d) => mean(members.map(m => m.values[d] ?? 0)))),
      stats: Object.freeze(buildStats(names, members)),
    }));

    log.info('clustered cohort', { users: n, clusters: clusters.length, policy: policy.kind, seed: options.seed });
    return new PeerClustering(version, names, Object.freeze(clusters), new Map(vectors));
  }
}
