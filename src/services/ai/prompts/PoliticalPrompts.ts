// Prompt templates for voter analysis and voter reaction generation

import type { ActorSnapshot, RequestType } from '../../../shared/types';
import type { BuiltPrompt } from '../types';

export type BuildPromptParams = {
  requestType: RequestType;
  actor: ActorSnapshot;
  content?: string;
};

const PROMPT_LIMITS: Record<RequestType, { maxTokens: number; temperature: number }> = {
  analysis: { maxTokens: 500, temperature: 0.3 },
  generation: { maxTokens: 1000, temperature: 0.7 },
};

const PARTY_CONTEXT =
  'Dutch political parties (VVD, PVV, CDA, D66, SP, PvdA, GL, CU, SGP, DENK, FvD, Volt), ' +
  'recurring issues (immigration, housing, climate, healthcare, economy) and coalition dynamics.';

const OUTPUT_SHAPE = [
  '{ "summary": string,',
  '  "sentiment": number (-1..1),',
  '  "confidence": number (0..1),',
  '  "topics": string[],',
  '  "partyRecommendations": [{ "partyId": string, "confidence": number, "reasoning": string }],',
  '  "predictedBehavior": "unlikely" | "possible" | "likely" | "certain" | "abstain",',
  '  "influenceFactors": string[] }',
].join('\n');

const VOTER_RESPONSES_SHAPE = [
  '{ "responses": [{ "voterId": string,',
  '    "content": string,',
  '    "sentiment": number (-1..1),',
  '    "engagementLevel": number (0..1),',
  '    "responseType": "support" | "opposition" | "question" | "neutral" | "emotional" | "factual" }] }',
].join('\n');

function fmt(n: number): string {
  return n.toFixed(2);
}

/**
 * Profile lines shared by both request types. actorId is left out on purpose:
 * identical profiles must render identical text.
 */
export function describeVoter(actor: ActorSnapshot): string {
  const place = [actor.region, actor.isUrban === undefined ? undefined : actor.isUrban ? 'urban' : 'rural']
    .filter((p): p is string => Boolean(p))
    .join(', ');
  return [
    `Voter profile: age ${Math.trunc(actor.age)}, education level ${actor.educationLevel}/5, income percentile ${Math.round(actor.incomePercentile)}${place ? `, ${place}` : ''}.`,
    `Opinions (-1..1): economic ${fmt(actor.opinion.economic)}, social ${fmt(actor.opinion.social)}, environmental ${fmt(actor.opinion.environmental)}.`,
    `Behavior (0..1): satisfaction ${fmt(actor.behavior.satisfaction)}, engagement ${fmt(actor.behavior.engagement)}, volatility ${fmt(actor.behavior.volatility)}.`,
  ].join('\n');
}

function systemPrompt(role: string, task: string[], output: string[]): string {
  return ['## Role', role, '', '## Context', PARTY_CONTEXT, '', '## Task', ...task, '', '## Output Format', ...output].join(
    '\n'
  );
}

const ANALYST_ROLE = 'You are an expert analyst of Dutch politics.';
const WRITER_ROLE = 'You write realistic reactions of Dutch voters to political content.';
const JSON_ONLY = 'Return ONLY valid JSON. No markdown. No code fences.';
const STRICT_JSON = [JSON_ONLY, OUTPUT_SHAPE];

function assemble(requestType: RequestType, system: string, user: string): BuiltPrompt {
  const limits = PROMPT_LIMITS[requestType];
  return {
    requestType,
    messages: [
      { role: 'system', content: system },
      { role: 'user', content: user },
    ],
    maxTokens: limits.maxTokens,
    temperature: limits.temperature,
    literal: `${system}\n\n${user}`,
  };
}

function buildSystem(requestType: RequestType): string {
  if (requestType === 'analysis') {
    return systemPrompt(
      ANALYST_ROLE,
      [
        'Assess how this voter reads the given content and which parties fit them best.',
        'Scores run from -1.0 to 1.0 for sentiment; confidence from 0 to 1.',
      ],
      STRICT_JSON
    );
  }
  return systemPrompt(
    WRITER_ROLE,
    ['Write a short reaction (at most three sentences) in the voice of this voter.'],
    ['Prefer JSON with the reaction in "summary":', OUTPUT_SHAPE, 'Plain text is accepted as the reaction itself.']
  );
}

function buildUser(params: BuildPromptParams): string {
  const parts: string[] = ['## Input', describeVoter(params.actor)];
  if (params.content && params.content.trim()) {
    parts.push(`Content: ${JSON.stringify(params.content)}`);
  } else {
    parts.push('Content: none. Assess the voter\'s current political outlook.');
  }
  return parts.join('\n');
}

/**
 * Analysis of a piece of content on its own, without a voter profile.
 */
export function buildContentAnalysisPrompt(content: string): BuiltPrompt {
  const system = systemPrompt(
    ANALYST_ROLE,
    ['Summarize the political content, its sentiment and the parties it favors.'],
    STRICT_JSON
  );
  const user = ['## Input', `Content: ${JSON.stringify(content)}`].join('\n');
  return assemble('analysis', system, user);
}

/**
 * One request for several voters. Each profile carries its actorId so the
 * reply's entries can be matched back.
 */
export function buildVoterResponsesPrompt(content: string, actors: readonly ActorSnapshot[]): BuiltPrompt {
  const system = systemPrompt(
    WRITER_ROLE,
    [
      "Write one short reaction (at most three sentences) per voter, in that voter's voice.",
      'Classify each reaction as support, opposition, question, neutral, emotional or factual.',
    ],
    [JSON_ONLY, VOTER_RESPONSES_SHAPE]
  );
  const voters = actors.map((actor) => `### Voter ${actor.actorId}\n${describeVoter(actor)}`);
  const user = ['## Input', `Content: ${JSON.stringify(content)}`, ...voters].join('\n');
  return assemble('generation', system, user);
}

export function buildPoliticalPrompt(params: BuildPromptParams): BuiltPrompt {
  return assemble(params.requestType, buildSystem(params.requestType), buildUser(params));
}
