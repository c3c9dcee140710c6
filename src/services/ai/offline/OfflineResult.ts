import type {
  ActorSnapshot,
  BrokerResult,
  PartyRecommendation,
  PredictedBehavior,
  RequestType,
  VoterResponse,
  VoterResponseType,
} from '../../../shared/types';
import { opinionDistance } from '../optimization/ClusterPlanner';
import { detectContext, type ContentType, type OfflineGenerator } from './OfflineGenerator';

export interface OfflineSubject {
  requestType: RequestType;
  /** Absent for content-only analysis */
  actor?: ActorSnapshot;
  content?: string;
}

// Offline answers are heuristics; keep their confidence well below backend results
const OFFLINE_CONFIDENCE = 0.3;

export function predictBehavior(engagement: number): PredictedBehavior {
  if (engagement < 0.2) return 'abstain';
  if (engagement < 0.4) return 'unlikely';
  if (engagement < 0.6) return 'possible';
  if (engagement < 0.85) return 'likely';
  return 'certain';
}

function satisfactionSentiment(actor: ActorSnapshot): number {
  return Math.round((actor.behavior.satisfaction * 2 - 1) * 100) / 100;
}

export function responseTypeFor(sentiment: number): VoterResponseType {
  if (sentiment > 0.2) return 'support';
  if (sentiment < -0.2) return 'opposition';
  return 'neutral';
}

/**
 * Three parties closest to the voter's opinion vector, nearest first.
 */
export function nearestParties(actor: ActorSnapshot, generator: OfflineGenerator, count = 3): PartyRecommendation[] {
  return generator.vocabulary.parties
    .map((p) => ({ id: p.id, distance: opinionDistance(actor.opinion, p.position) }))
    .sort((a, b) => a.distance - b.distance)
    .slice(0, count)
    .map((p) => ({
      partyId: p.id,
      confidence: Math.round((1 - p.distance) * 100) / 100,
      reasoning: 'Closest opinion position',
    }));
}

/**
 * Offline summary text is keyed by the content (or a per-type placeholder),
 * so equal content yields equal text across voters.
 */
export function offlineSummaryKey(subject: OfflineSubject): string {
  return subject.content && subject.content.trim() ? subject.content : `${subject.requestType}: political outlook`;
}

/**
 * Voter reactions read as opinion pieces; analyses are composed from the content's keywords.
 */
export function offlineContentType(requestType: RequestType): ContentType {
  return requestType === 'generation' ? 'opinion' : 'general';
}

export function buildOfflineResult(
  subject: OfflineSubject,
  generator: OfflineGenerator,
  opts: { batchSize?: number; processingTimeMs?: number } = {}
): BrokerResult {
  const key = offlineSummaryKey(subject);
  const generation = generator.generate(key, offlineContentType(subject.requestType));
  const context = detectContext(key, generator.vocabulary);
  const actor = subject.actor;

  return {
    requestType: subject.requestType,
    summary: generation.text,
    sentiment: actor ? satisfactionSentiment(actor) : 0,
    confidence: OFFLINE_CONFIDENCE,
    topics: context === 'general' ? [] : [context],
    partyRecommendations: actor ? nearestParties(actor, generator) : [],
    predictedBehavior: actor ? predictBehavior(actor.behavior.engagement) : 'possible',
    influenceFactors: ['offline-fallback', `strategy:${generation.strategy}`],
    batchSize: opts.batchSize ?? 1,
    processingTimeMs: opts.processingTimeMs ?? 0,
    source: 'offline',
  };
}

/**
 * Offline reaction for one voter; the text is shared by every voter reacting to `content`.
 */
export function buildOfflineVoterResponse(
  actor: ActorSnapshot,
  content: string,
  generator: OfflineGenerator,
  generationTimeMs = 0
): VoterResponse {
  const generation = generator.generate(content, offlineContentType('generation'));
  const sentiment = satisfactionSentiment(actor);
  return {
    actorId: actor.actorId,
    content: generation.text,
    sentiment,
    engagementLevel: actor.behavior.engagement,
    responseType: responseTypeFor(sentiment),
    generationTimeMs,
    createdAt: Date.now(),
    source: 'offline',
  };
}
