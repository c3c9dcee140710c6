// ClusterPlanner.ts
// Pure clustering helpers for the request batcher.
// - Greedy, arrival-ordered partition of pending requests into similar groups
// - Representative request synthesis (mean for numeric fields, mode for categorical ones)

import type {
  ActorSnapshot,
  BehaviorVector,
  BrokerRequest,
  EducationLevel,
  OpinionVector,
  RequestType,
} from '../../../shared/types';
import { incomeBracket } from '../cache/KeyGenerator';

export interface SimilarityThresholds {
  opinion: number;          // max normalized opinion distance, [0, 1]
  behavior: number;         // max mean absolute behavior difference, [0, 1]
  maxAgeDifference: number; // years
}

export interface PlanOptions {
  maxClusterSize: number;
  maxBatchSize: number;
  thresholds: SimilarityThresholds;
}

/**
 * Synthetic request sent once on behalf of a whole cluster.
 */
export interface RepresentativeRequest {
  requestType: RequestType;
  actor: ActorSnapshot;
  content?: string;
  memberCount: number;
}

// Opinion axes span [-1, 1], so the largest possible distance is 2 * sqrt(3)
const MAX_OPINION_DISTANCE = 2 * Math.sqrt(3);

/**
 * Euclidean distance across the three opinion axes, normalized to [0, 1].
 */
export function opinionDistance(a: OpinionVector, b: OpinionVector): number {
  const de = a.economic - b.economic;
  const ds = a.social - b.social;
  const dv = a.environmental - b.environmental;
  return Math.sqrt(de * de + ds * ds + dv * dv) / MAX_OPINION_DISTANCE;
}

/**
 * Mean absolute difference of the three behavior values.
 */
export function behaviorDistance(a: BehaviorVector, b: BehaviorVector): number {
  return (
    (Math.abs(a.satisfaction - b.satisfaction) +
      Math.abs(a.engagement - b.engagement) +
      Math.abs(a.volatility - b.volatility)) /
    3
  );
}

type Clusterable = Pick<BrokerRequest, 'requestType' | 'actor' | 'content'>;

/**
 * Every check must pass: same type and content, opinion and behavior within threshold,
 * age gap within limit, identical education level.
 */
export function areSimilar(a: Clusterable, b: Clusterable, thresholds: SimilarityThresholds): boolean {
  if (a.requestType !== b.requestType) return false;
  if ((a.content ?? '') !== (b.content ?? '')) return false;
  if (opinionDistance(a.actor.opinion, b.actor.opinion) > thresholds.opinion) return false;
  if (behaviorDistance(a.actor.behavior, b.actor.behavior) > thresholds.behavior) return false;
  if (Math.abs(a.actor.age - b.actor.age) > thresholds.maxAgeDifference) return false;
  return a.actor.educationLevel === b.actor.educationLevel;
}

/**
 * Greedy partition in arrival order.
 * Each unconsumed request seeds a cluster; later requests similar to the seed join
 * until maxClusterSize. Oversized clusters are then cut into maxBatchSize chunks,
 * the last chunk holding the remainder.
 */
export function planClusters<R extends Clusterable>(
  requests: readonly R[],
  opts: PlanOptions
): R[][] {
  const maxCluster = Math.max(1, Math.trunc(opts.maxClusterSize));
  const maxBatch = Math.max(1, Math.trunc(opts.maxBatchSize));
  const consumed = new Array<boolean>(requests.length).fill(false);
  const out: R[][] = [];

  for (let i = 0; i < requests.length; i++) {
    if (consumed[i]) continue;
    const seed = requests[i];
    const cluster: R[] = [seed];
    consumed[i] = true;

    for (let j = i + 1; j < requests.length && cluster.length < maxCluster; j++) {
      if (consumed[j]) continue;
      if (areSimilar(seed, requests[j], opts.thresholds)) {
        cluster.push(requests[j]);
        consumed[j] = true;
      }
    }

    for (let start = 0; start < cluster.length; start += maxBatch) {
      out.push(cluster.slice(start, start + maxBatch));
    }
  }

  return out;
}

/**
 * Most frequent value; ties go to the value seen first.
 */
export function mode<T>(values: readonly T[]): T {
  if (values.length === 0) {
    throw new RangeError('mode() of an empty list');
  }
  const counts = new Map<T, number>();
  for (const v of values) counts.set(v, (counts.get(v) ?? 0) + 1);
  let best = values[0];
  let bestCount = 0;
  for (const [v, c] of counts) {
    if (c > bestCount) {
      best = v;
      bestCount = c;
    }
  }
  return best;
}

function mean(values: readonly number[]): number {
  return values.reduce((a, v) => a + v, 0) / values.length;
}

/**
 * Build the representative for a non-empty cluster.
 * Age is truncated to whole years. Income becomes the midpoint of the modal bracket.
 */
export function buildRepresentative(
  members: readonly Clusterable[],
  clusterId = 'cluster'
): RepresentativeRequest {
  if (members.length === 0) {
    throw new RangeError('buildRepresentative() needs at least one member');
  }
  const actors = members.map((m) => m.actor);
  const bracket = mode(actors.map((a) => incomeBracket(a.incomePercentile)));
  const regions = actors.map((a) => a.region).filter((r): r is string => typeof r === 'string');
  const urban = actors.map((a) => a.isUrban).filter((u): u is boolean => typeof u === 'boolean');

  const actor: ActorSnapshot = {
    actorId: `representative:${clusterId}`,
    age: Math.trunc(mean(actors.map((a) => a.age))),
    educationLevel: mode<EducationLevel>(actors.map((a) => a.educationLevel)),
    incomePercentile: bracket * 20 + 10,
    opinion: {
      economic: mean(actors.map((a) => a.opinion.economic)),
      social: mean(actors.map((a) => a.opinion.social)),
      environmental: mean(actors.map((a) => a.opinion.environmental)),
    },
    behavior: {
      satisfaction: mean(actors.map((a) => a.behavior.satisfaction)),
      engagement: mean(actors.map((a) => a.behavior.engagement)),
      volatility: mean(actors.map((a) => a.behavior.volatility)),
    },
  };
  if (regions.length > 0) actor.region = mode(regions);
  if (urban.length > 0) actor.isUrban = mode(urban);

  return {
    requestType: members[0].requestType,
    actor,
    content: members[0].content,
    memberCount: members.length,
  };
}
