/**
 * KeyGenerator
 *
 * Two keys per request:
 * - exact key: sha256 over the literal prompt text, for byte-identical repeats
 * - bucket key: coarse quantized voter profile, so near-identical voters share a result
 *   for the same content
 *
 * Both functions are pure.
 */

import { sha256 } from 'js-sha256';
import type { ActorSnapshot, RequestType } from '../../../shared/types';

/**
 * Income bracket 0..4 from a 0..100 percentile.
 */
export function incomeBracket(incomePercentile: number): number {
  const bracket = Math.floor(incomePercentile / 20);
  return Math.min(4, Math.max(0, bracket));
}

/**
 * Age rounded down to its decade (37 -> 30).
 */
export function ageDecade(age: number): number {
  return Math.floor(age / 10) * 10;
}

/**
 * Truncate toward zero to one decimal and print with one decimal.
 * 0.27 -> "0.2", -0.27 -> "-0.2", -0.05 -> "0.0"
 */
export function quantizeTenth(value: number): string {
  const truncated = Math.trunc(value * 10) / 10;
  // Avoid "-0.0" so that -0.05 and 0.05 share a bucket
  return (truncated === 0 ? 0 : truncated).toFixed(1);
}

export function exactKey(requestType: RequestType, literalContent: string): string {
  return sha256(`${requestType}\u0000${literalContent}`);
}

/**
 * Short digest scoping a bucket to the content it answers; 'none' when there is no content.
 */
export function contentScope(content?: string): string {
  return content ? sha256(content).slice(0, 12) : 'none';
}

export function bucketKey(requestType: RequestType, actor: ActorSnapshot, content?: string): string {
  return [
    requestType,
    contentScope(content),
    ageDecade(actor.age),
    `edu${actor.educationLevel}`,
    `inc${incomeBracket(actor.incomePercentile)}`,
    quantizeTenth(actor.opinion.economic),
    quantizeTenth(actor.opinion.social),
    quantizeTenth(actor.behavior.satisfaction),
  ].join('|');
}
