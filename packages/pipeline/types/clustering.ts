// Peer clusters — created fresh per clustering run over a cohort snapshot

export interface FeatureStats {
  readonly name: string;
  readonly mean: number;
  readonly min: number;
  readonly p25: number;
  readonly p50: number;
  readonly p75: number;
  readonly p90: number;
  readonly max: number;
}

export interface Cluster {
  readonly label: number;
  readonly version: string;
  /** Sorted ascending */
  readonly memberIds: readonly string[];
  /** Mean normalised feature vector */
  readonly centroid: readonly number[];
  /** Per-feature distribution over raw feature values */
  readonly stats: readonly FeatureStats[];
}

export type ClusterPolicy =
  | { kind: 'fixed'; k: number }
  | { kind: 'auto'; maxK: number };

export interface ClusterOptions {
  seed: number;
  minClusterSize: number;
  /** Seeded k-means restarts; the lowest-inertia run wins */
  restarts?: number;
  maxIterations?: number;
}

/** What a single user's report is benchmarked against */
export interface PeerSummary {
  readonly cluster: Cluster;
  readonly clusterCount: number;
  /**
   * Per feature, the share of *other* cluster members whose raw value is strictly
   * below this user's (0..1); null when the user has no peers.
   */
  readonly ranks: Readonly<Record<string, number | null>>;
  /** False when the user was matched to the nearest centroid instead of clustered */
  readonly inCohort: boolean;
}
