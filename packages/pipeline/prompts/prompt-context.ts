// Facts block embedded in every section prompt: the user's monthly summary,
// the peer-relative comparison and the set of numbers the model may quote.

import type { FeatureVector, MonthlyProfile } from '../types/profile.js';
import type { PeerSummary } from '../types/clustering.js';
import { describeProfile, formatAmount, formatPercent } from '../profile/describe-profile.js';
import { extractNumbers } from './numbers.js';

export interface PromptContext {
  readonly userId: string;
  readonly facts: string;
  /** Every number stated in `facts`, plus the report's year and month */
  readonly numbers: readonly number[];
}

function label(feature: string): string {
  return feature.replace(/_/g, ' ');
}

export function describePeers(vector: FeatureVector, peers: PeerSummary): string {
  const { cluster } = peers;
  const lines = [
    `Peer group ${cluster.label + 1} of ${peers.clusterCount} with ${cluster.memberIds.length} members` +
      (peers.inCohort ? '' : ' (matched by similarity; this user is not a member)'),
  ];

  cluster.stats.forEach((stat, i) => {
    const own = vector.raw[i] ?? 0;
    const rank = peers.ranks[stat.name];
    const position = rank === null || rank === undefined
      ? 'no other peers to compare with'
      : `higher than ${formatPercent(rank)} of peers`;
    lines.push(
      `- ${label(stat.name)}: this user ${formatAmount(own)}; peer median ${formatAmount(stat.p50)}, ` +
      `upper quartile ${formatAmount(stat.p75)}, top decile from ${formatAmount(stat.p90)}; ${position}`,
    );
  });

  return lines.join('\n');
}

export function buildPromptContext(
  profile: MonthlyProfile,
  vector?: FeatureVector,
  peers?: PeerSummary,
): PromptContext {
  const blocks = [describeProfile(profile)];
  if (vector && peers) blocks.push(describePeers(vector, peers));
  const facts = blocks.join('\n\n');

  const numbers = new Set<number>(extractNumbers(facts).map(m => m.value));
  numbers.add(profile.year);
  numbers.add(profile.month);

  return Object.freeze({
    userId: profile.userId,
    facts,
    numbers: Object.freeze([...numbers].sort((a, b) => a - b)),
  });
}
