import { z } from 'zod';

// Inbound: actor snapshot accepted at intake

export const OpinionVectorSchema = z.object({
  economic: z.number().min(-1).max(1),
  social: z.number().min(-1).max(1),
  environmental: z.number().min(-1).max(1),
});

export const BehaviorVectorSchema = z.object({
  satisfaction: z.number().min(0).max(1),
  engagement: z.number().min(0).max(1),
  volatility: z.number().min(0).max(1),
});

export const EducationLevelSchema = z.union([
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
  z.literal(5),
]);

export const ActorSnapshotSchema = z.object({
  actorId: z.string().min(1, 'actorId must be non-empty'),
  age: z.number().min(0).max(130),
  educationLevel: EducationLevelSchema,
  incomePercentile: z.number().min(0).max(100),
  opinion: OpinionVectorSchema,
  behavior: BehaviorVectorSchema,
  region: z.string().optional(),
  isUrban: z.boolean().optional(),
});

export const RequestTypeEnum = z.enum(['analysis', 'generation']);

// Outbound: chat-completions envelope returned by the backend

export const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().default(''),
        }),
      })
    )
    .min(1, 'choices must contain at least one entry'),
});

// Payload the model writes into message.content

export const PredictedBehaviorEnum = z.enum(['unlikely', 'possible', 'likely', 'certain', 'abstain']);

export const PartyRecommendationSchema = z.object({
  partyId: z.string().min(1),
  confidence: z.number().min(0).max(1).catch(0.5),
  reasoning: z.string().default(''),
});

export const AnalysisPayloadSchema = z.object({
  summary: z.string().default(''),
  sentiment: z.number().min(-1).max(1).default(0),
  confidence: z.number().min(0).max(1).default(0.5),
  topics: z.array(z.string()).default([]),
  partyRecommendations: z.array(PartyRecommendationSchema).default([]),
  predictedBehavior: PredictedBehaviorEnum.catch('possible'),
  influenceFactors: z.array(z.string()).default([]),
});

// Payload for a multi-voter reaction request

export const VoterResponseTypeEnum = z.enum(['support', 'opposition', 'question', 'neutral', 'emotional', 'factual']);

export const VoterResponseEntrySchema = z.object({
  voterId: z.string().min(1),
  content: z.string(),
  sentiment: z.number().min(-1).max(1).catch(0),
  engagementLevel: z.number().min(0).max(1).catch(0.5),
  responseType: VoterResponseTypeEnum.catch('neutral'),
});

export const VoterResponsesPayloadSchema = z.object({
  responses: z.array(VoterResponseEntrySchema).min(1, 'responses must contain at least one entry'),
});

// Type exports
export type VoterResponseEntry = z.infer<typeof VoterResponseEntrySchema>;
export type AnalysisPayload = z.infer<typeof AnalysisPayloadSchema>;
