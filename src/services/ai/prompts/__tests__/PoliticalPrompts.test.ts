import { describe, it, expect } from 'vitest';
import { buildContentAnalysisPrompt, buildPoliticalPrompt, buildVoterResponsesPrompt, describeVoter } from '../PoliticalPrompts';
import { makeActor } from '../../../../__tests__/integration/testUtils';

describe('PoliticalPrompts', () => {
  it('describeVoter renders the profile with two-decimal vectors', () => {
    expect(describeVoter(makeActor())).toBe(
      [
        'Voter profile: age 42, education level 3/5, income percentile 55.',
        'Opinions (-1..1): economic 0.10, social 0.20, environmental 0.30.',
        'Behavior (0..1): satisfaction 0.50, engagement 0.50, volatility 0.30.',
      ].join('\n')
    );
  });

  it('describeVoter adds region and settlement type when known', () => {
    const first = describeVoter(makeActor({ region: 'Utrecht', isUrban: false })).split('\n')[0];
    expect(first).toBe('Voter profile: age 42, education level 3/5, income percentile 55, Utrecht, rural.');
  });

  it('renders identical text for voters that differ only by id', () => {
    const a = buildPoliticalPrompt({ requestType: 'analysis', actor: makeActor({ actorId: 'a' }) });
    const b = buildPoliticalPrompt({ requestType: 'analysis', actor: makeActor({ actorId: 'b' }) });
    expect(a.literal).toBe(b.literal);
  });

  it('analysis prompts ask for strict JSON with low temperature', () => {
    const p = buildPoliticalPrompt({ requestType: 'analysis', actor: makeActor(), content: 'Rent freeze' });
    expect(p.maxTokens).toBe(500);
    expect(p.temperature).toBe(0.3);
    expect(p.messages.map((m) => m.role)).toEqual(['system', 'user']);
    expect(p.messages[0].content.startsWith('## Role\nYou are an expert analyst of Dutch politics.')).toBe(true);
    expect(p.messages[0].content).toContain('Return ONLY valid JSON. No markdown. No code fences.');
    expect(p.messages[1].content.split('\n').pop()).toBe('Content: "Rent freeze"');
    expect(p.literal).toBe(`${p.messages[0].content}\n\n${p.messages[1].content}`);
  });

  it('generation prompts accept plain text and run warmer', () => {
    const p = buildPoliticalPrompt({ requestType: 'generation', actor: makeActor() });
    expect(p.maxTokens).toBe(1000);
    expect(p.temperature).toBe(0.7);
    expect(p.messages[0].content).toContain('Plain text is accepted as the reaction itself.');
    expect(p.messages[1].content.split('\n').pop()).toBe("Content: none. Assess the voter's current political outlook.");
  });

  it('treats blank content as absent', () => {
    const blank = buildPoliticalPrompt({ requestType: 'analysis', actor: makeActor(), content: '   ' });
    const none = buildPoliticalPrompt({ requestType: 'analysis', actor: makeActor() });
    expect(blank.literal).toBe(none.literal);
  });

  it('content analysis omits the voter profile', () => {
    const p = buildContentAnalysisPrompt('Coalition talks stall');
    expect(p.requestType).toBe('analysis');
    expect(p.messages[1].content).toBe('## Input\nContent: "Coalition talks stall"');
    expect(p.literal).not.toContain('Voter profile');
  });

  it('multi-voter prompts tag every profile with its actor id', () => {
    const p = buildVoterResponsesPrompt('Rent freeze', [makeActor({ actorId: 'a1' }), makeActor({ actorId: 'a2' })]);
    expect(p.requestType).toBe('generation');
    expect(p.maxTokens).toBe(1000);
    expect(p.temperature).toBe(0.7);
    const lines = p.messages[1].content.split('\n');
    expect(lines.slice(0, 3)).toEqual(['## Input', 'Content: "Rent freeze"', '### Voter a1']);
    expect(lines[6]).toBe('### Voter a2');
    expect(p.messages[0].content).toContain('"responses"');
  });
});
