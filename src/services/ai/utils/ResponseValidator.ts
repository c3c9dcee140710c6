import type { RequestType } from '../../../shared/types';
import {
  AnalysisPayloadSchema,
  ChatCompletionResponseSchema,
  VoterResponsesPayloadSchema,
  type AnalysisPayload,
  type VoterResponseEntry,
} from '../schemas/ResponseSchemas';
import { ValidationError, failure, success, type BackendResult, type Outcome } from '../types';

// ------------ JSON extraction ------------

function stripBOM(s: string): string {
  return s.charCodeAt(0) === 0xfeff ? s.slice(1) : s;
}

/**
 * Extract the first JSON object from arbitrary text using bracket counting.
 * Strips a code fence first. Braces inside strings are ignored.
 * Returns '' when no balanced object is found.
 */
export function extractJsonFromText(text: string): string {
  const fenceMatch = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  if (fenceMatch) {
    text = fenceMatch[1];
  }

  let start = -1;
  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escape) {
        escape = false;
      } else if (ch === '\\') {
        escape = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
      continue;
    }

    if (ch === '{') {
      if (depth === 0) start = i;
      depth++;
    } else if (ch === '}' && depth > 0) {
      depth--;
      if (depth === 0 && start >= 0) {
        return text.slice(start, i + 1);
      }
    }
  }
  return '';
}

function tryParseObject(text: string): unknown {
  const trimmed = stripBOM(text).trim();
  try {
    return JSON.parse(trimmed);
  } catch {
    // fall through to extraction
  }
  const sub = extractJsonFromText(trimmed);
  if (!sub) return undefined;
  try {
    return JSON.parse(sub);
  } catch {
    return undefined;
  }
}

function toBackendResult(requestType: RequestType, payload: AnalysisPayload): BackendResult {
  return {
    requestType,
    summary: payload.summary,
    sentiment: payload.sentiment,
    confidence: payload.confidence,
    topics: payload.topics,
    partyRecommendations: payload.partyRecommendations,
    predictedBehavior: payload.predictedBehavior,
    influenceFactors: payload.influenceFactors,
  };
}

// ------------ Public API ------------

/**
 * Pull message content out of a chat-completions body.
 */
export function extractMessageContent(provider: string, body: unknown): Outcome<string, ValidationError> {
  const parsed = ChatCompletionResponseSchema.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    return failure(new ValidationError(provider, `Unexpected response envelope: ${issues.join('; ')}`));
  }
  return success(parsed.data.choices[0].message.content ?? '');
}

/**
 * Turn model message content into a BackendResult.
 * - analysis: content must hold a JSON object matching AnalysisPayloadSchema with a summary
 * - generation: JSON is preferred, plain text becomes the summary
 */
export function parseModelContent(
  provider: string,
  requestType: RequestType,
  content: string
): Outcome<BackendResult, ValidationError> {
  const candidate = tryParseObject(content);

  if (candidate !== undefined) {
    const z = AnalysisPayloadSchema.safeParse(candidate);
    if (z.success) {
      if (!z.data.summary.trim()) {
        const label = requestType === 'analysis' ? 'Analysis' : 'Generation';
        return failure(new ValidationError(provider, `${label} payload has an empty summary`));
      }
      return success(toBackendResult(requestType, z.data));
    }
    if (requestType === 'analysis') {
      const issues = z.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
      return failure(new ValidationError(provider, `Analysis payload failed validation: ${issues.join('; ')}`));
    }
  }

  if (requestType === 'analysis') {
    return failure(new ValidationError(provider, 'Analysis response is not JSON'));
  }

  const text = content.trim();
  if (!text) {
    return failure(new ValidationError(provider, 'Empty generation response'));
  }
  return success(
    toBackendResult('generation', {
      summary: text,
      sentiment: 0,
      confidence: 0.5,
      topics: [],
      partyRecommendations: [],
      predictedBehavior: 'possible',
      influenceFactors: [],
    })
  );
}

/**
 * Entries of a multi-voter reply. Matching entries to voters is left to the caller.
 */
export function parseVoterResponses(provider: string, content: string): Outcome<VoterResponseEntry[], ValidationError> {
  const candidate = tryParseObject(content);
  if (candidate === undefined) {
    return failure(new ValidationError(provider, 'Voter responses are not JSON'));
  }
  const z = VoterResponsesPayloadSchema.safeParse(candidate);
  if (!z.success) {
    const issues = z.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    return failure(new ValidationError(provider, `Voter responses failed validation: ${issues.join('; ')}`));
  }
  return success(z.data.responses);
}
