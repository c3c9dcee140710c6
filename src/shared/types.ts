// Core data types shared between the simulation host and the AI broker

/**
 * Political positions of a voter. Every axis is in [-1, 1].
 */
export interface OpinionVector {
  economic: number;      // left (-1) to right (+1)
  social: number;        // conservative (-1) to progressive (+1)
  environmental: number; // skeptical (-1) to activist (+1)
}

/**
 * Behavioral state of a voter. Every value is in [0, 1].
 */
export interface BehaviorVector {
  satisfaction: number; // with the current government
  engagement: number;   // political engagement
  volatility: number;   // how easily opinions move
}

/**
 * Education on a 1-5 scale; 5 is university level.
 */
export type EducationLevel = 1 | 2 | 3 | 4 | 5;

/**
 * The minimal voter state read at enqueue time.
 * Copied by value into the request; later changes to the voter are not seen.
 */
export interface ActorSnapshot {
  actorId: string;
  age: number;
  educationLevel: EducationLevel;
  incomePercentile: number; // 0..100
  opinion: OpinionVector;
  behavior: BehaviorVector;
  region?: string;
  isUrban?: boolean;
}

/**
 * Kind of work requested from the backend.
 * - analysis: political reading of the voter and the given content
 * - generation: a written reaction from the voter's point of view
 */
export type RequestType = 'analysis' | 'generation';

export type PredictedBehavior = 'unlikely' | 'possible' | 'likely' | 'certain' | 'abstain';

export interface PartyRecommendation {
  partyId: string;
  confidence: number;
  reasoning: string;
}

/**
 * Where a result came from.
 */
export type ResultSource = 'exact-cache' | 'bucket-cache' | 'batch' | 'offline';

/**
 * The result delivered to a request's callback.
 */
export interface BrokerResult {
  requestType: RequestType;
  summary: string;
  sentiment: number;  // -1..1
  confidence: number; // 0..1
  topics: string[];
  partyRecommendations: PartyRecommendation[];
  predictedBehavior: PredictedBehavior;
  influenceFactors: string[];
  batchSize: number;
  processingTimeMs: number;
  source: ResultSource;
}

export type ResultCallback = (result: BrokerResult) => void;

export type VoterResponseType = 'support' | 'opposition' | 'question' | 'neutral' | 'emotional' | 'factual';

/**
 * One voter's reaction, as returned by AIRequestBroker.generateVoterResponses().
 */
export interface VoterResponse {
  actorId: string;
  content: string;
  sentiment: number;       // -1..1
  engagementLevel: number; // 0..1
  responseType: VoterResponseType;
  generationTimeMs: number;
  createdAt: number;
  source: Extract<ResultSource, 'batch' | 'offline'>;
}

/**
 * One unit of work accepted by the broker.
 */
export interface BrokerRequest {
  id: string;
  actor: ActorSnapshot;
  requestType: RequestType;
  content?: string;
  callback: ResultCallback;
  enqueuedAt: number;
  exactKey: string;
  bucketKey: string;
}

/**
 * Read-only snapshot returned by AIRequestBroker.getStatistics().
 */
export interface BrokerStatistics {
  totalRequests: number;
  cacheHits: number;
  batchedRequests: number;
  cacheHitRatio: number;
  batchingEfficiency: number;
  activeCacheEntries: number;
  activeBatches: number;
  averageBatchSize: number;
}
