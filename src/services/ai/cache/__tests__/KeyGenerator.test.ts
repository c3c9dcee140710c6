import { describe, it, expect } from 'vitest';
import { ageDecade, bucketKey, contentScope, exactKey, incomeBracket, quantizeTenth } from '../KeyGenerator';
import { makeActor } from '../../../../__tests__/integration/testUtils';

describe('KeyGenerator', () => {
  it('incomeBracket clamps to 0..4', () => {
    expect(incomeBracket(0)).toBe(0);
    expect(incomeBracket(19.9)).toBe(0);
    expect(incomeBracket(20)).toBe(1);
    expect(incomeBracket(99)).toBe(4);
    expect(incomeBracket(100)).toBe(4);
  });

  it('ageDecade rounds down', () => {
    expect(ageDecade(37)).toBe(30);
    expect(ageDecade(40)).toBe(40);
  });

  it('quantizeTenth truncates toward zero and never prints -0.0', () => {
    expect(quantizeTenth(0.27)).toBe('0.2');
    expect(quantizeTenth(-0.27)).toBe('-0.2');
    expect(quantizeTenth(-0.05)).toBe('0.0');
    expect(quantizeTenth(1)).toBe('1.0');
  });

  it('exactKey is stable for identical input and differs by request type', () => {
    expect(exactKey('analysis', 'same text')).toBe(exactKey('analysis', 'same text'));
    expect(exactKey('analysis', 'same text')).not.toBe(exactKey('generation', 'same text'));
    expect(exactKey('analysis', 'same text')).toMatch(/^[0-9a-f]{64}$/);
  });

  it('bucketKey joins the quantized profile', () => {
    const actor = makeActor({
      age: 37,
      educationLevel: 4,
      incomePercentile: 61,
      opinion: { economic: 0.27, social: -0.35 },
      behavior: { satisfaction: 0.68 },
    });
    expect(bucketKey('analysis', actor)).toBe('analysis|none|30|edu4|inc3|0.2|-0.3|0.6');
  });

  it('near-identical voters share a bucket for the same content', () => {
    const a = makeActor({ actorId: 'a', age: 31, opinion: { economic: 0.21 } });
    const b = makeActor({ actorId: 'b', age: 38, opinion: { economic: 0.29 } });
    expect(bucketKey('generation', a, 'Tax plan')).toBe(bucketKey('generation', b, 'Tax plan'));
    expect(bucketKey('generation', a, 'Tax plan')).not.toBe(bucketKey('generation', b, 'Housing plan'));
  });

  it('contentScope is a 12-char digest or "none"', () => {
    expect(contentScope()).toBe('none');
    expect(contentScope('')).toBe('none');
    expect(contentScope('hello')).toHaveLength(12);
  });
});
