import type { ActorSnapshot, BrokerResult, ResultSource } from '../../../shared/types';
import type { BackendResult } from '../types';

export interface CustomizeOptions {
  batchSize: number;
  processingTimeMs: number;
  source: ResultSource;
  random?: () => number;
}

const UNIVERSITY_EDUCATION = 5;
const HIGH_VOLATILITY = 0.7;

function clamp01(v: number): number {
  return Math.min(1, Math.max(0, v));
}

/**
 * Personalize a cluster's shared result for one member.
 * Confidence gets a [0.95, 1.05) jitter, a x1.1 boost for university education
 * and a x0.9 cut for volatile voters, then is clamped to [0, 1].
 */
export function customizeForActor(
  shared: BackendResult,
  actor: ActorSnapshot,
  opts: CustomizeOptions
): BrokerResult {
  const random = opts.random ?? Math.random;
  let confidence = shared.confidence * (0.95 + random() * 0.1);
  if (actor.educationLevel === UNIVERSITY_EDUCATION) confidence *= 1.1;
  if (actor.behavior.volatility > HIGH_VOLATILITY) confidence *= 0.9;

  return {
    requestType: shared.requestType,
    summary: shared.summary,
    sentiment: shared.sentiment,
    confidence: clamp01(confidence),
    topics: [...shared.topics],
    partyRecommendations: shared.partyRecommendations.map((p) => ({ ...p })),
    predictedBehavior: shared.predictedBehavior,
    influenceFactors: [...shared.influenceFactors],
    batchSize: opts.batchSize,
    processingTimeMs: opts.processingTimeMs,
    source: opts.source,
  };
}

/**
 * Copy of a cached result relabelled with the tier that served it.
 */
export function fromCache(result: BrokerResult, source: 'exact-cache' | 'bucket-cache'): BrokerResult {
  return {
    ...result,
    topics: [...result.topics],
    partyRecommendations: result.partyRecommendations.map((p) => ({ ...p })),
    influenceFactors: [...result.influenceFactors],
    processingTimeMs: 0,
    source,
  };
}
