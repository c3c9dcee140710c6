import { describe, it, expect } from 'vitest';
import {
  areSimilar,
  behaviorDistance,
  buildRepresentative,
  mode,
  opinionDistance,
  planClusters,
  type PlanOptions,
} from '../ClusterPlanner';
import type { RequestType } from '../../../../shared/types';
import { makeActor } from '../../../../__tests__/integration/testUtils';

const thresholds = { opinion: 0.15, behavior: 0.2, maxAgeDifference: 15 };
const opts: PlanOptions = { maxClusterSize: 20, maxBatchSize: 50, thresholds };

function req(id: string, overrides: Parameters<typeof makeActor>[0] = {}, requestType: RequestType = 'analysis', content?: string) {
  return { id, requestType, content, actor: makeActor({ actorId: id, ...overrides }) };
}

// Deterministic pseudo-random sequence for property-style checks
function lcg(seed: number): () => number {
  let s = seed;
  return () => {
    s = (s * 1664525 + 1013904223) % 4294967296;
    return s / 4294967296;
  };
}

describe('ClusterPlanner', () => {
  it('opinionDistance is normalized to [0, 1]', () => {
    const a = { economic: -1, social: -1, environmental: -1 };
    const b = { economic: 1, social: 1, environmental: 1 };
    expect(opinionDistance(a, b)).toBeCloseTo(1, 10);
    expect(opinionDistance(a, a)).toBe(0);
  });

  it('behaviorDistance is the mean absolute difference', () => {
    const a = { satisfaction: 0.2, engagement: 0.5, volatility: 0.9 };
    const b = { satisfaction: 0.5, engagement: 0.5, volatility: 0.6 };
    expect(behaviorDistance(a, b)).toBeCloseTo(0.2, 10);
  });

  describe('areSimilar', () => {
    it('accepts near-identical voters', () => {
      expect(areSimilar(req('a'), req('b', { age: 50 }), thresholds)).toBe(true);
    });

    it('rejects different request types', () => {
      expect(areSimilar(req('a'), req('b', {}, 'generation'), thresholds)).toBe(false);
    });

    it('rejects different content', () => {
      expect(areSimilar(req('a', {}, 'analysis', 'x'), req('b', {}, 'analysis', 'y'), thresholds)).toBe(false);
    });

    it('rejects each failing similarity check', () => {
      const base = req('a');
      expect(areSimilar(base, req('b', { opinion: { economic: 0.9 } }), thresholds)).toBe(false);
      expect(areSimilar(base, req('b', { behavior: { satisfaction: 1, engagement: 1 } }), thresholds)).toBe(false);
      expect(areSimilar(base, req('b', { age: 60 }), thresholds)).toBe(false);
      expect(areSimilar(base, req('b', { educationLevel: 4 }), thresholds)).toBe(false);
    });
  });

  describe('planClusters', () => {
    it('groups greedily in arrival order', () => {
      const input = [
        req('a'),
        req('left', { opinion: { economic: -0.9 } }),
        req('b'),
        req('left2', { opinion: { economic: -0.85 } }),
        req('c'),
      ];
      const clusters = planClusters(input, opts);
      expect(clusters.map((c) => c.map((r) => r.id))).toEqual([['a', 'b', 'c'], ['left', 'left2']]);
    });

    it('caps clusters at maxClusterSize and splits at maxBatchSize', () => {
      const input = Array.from({ length: 7 }, (_, i) => req(`r${i}`));
      expect(planClusters(input, { ...opts, maxClusterSize: 3 }).map((c) => c.length)).toEqual([3, 3, 1]);
      expect(planClusters(input, { ...opts, maxClusterSize: 20, maxBatchSize: 4 }).map((c) => c.length)).toEqual([4, 3]);
    });

    it('never exceeds the size bound and never mixes dissimilar requests', () => {
      const rand = lcg(42);
      const types: RequestType[] = ['analysis', 'generation'];
      const input = Array.from({ length: 200 }, (_, i) =>
        req(
          `r${i}`,
          {
            age: 18 + Math.floor(rand() * 60),
            educationLevel: rand() < 0.5 ? 3 : 5,
            opinion: { economic: rand() * 0.4 - 0.2, social: rand() * 0.4 - 0.2, environmental: rand() * 0.4 - 0.2 },
            behavior: { satisfaction: rand(), engagement: 0.5, volatility: 0.3 },
          },
          types[i % 2]
        )
      );

      const clusters = planClusters(input, { ...opts, maxClusterSize: 10 });
      expect(clusters.flat()).toHaveLength(200);
      for (const cluster of clusters) {
        expect(cluster.length).toBeLessThanOrEqual(10);
        for (const member of cluster.slice(1)) {
          expect(areSimilar(cluster[0], member, thresholds)).toBe(true);
        }
      }
    });

    it('is deterministic for the same input order', () => {
      const input = Array.from({ length: 12 }, (_, i) => req(`r${i}`, { age: 20 + i * 4 }));
      expect(planClusters(input, opts)).toEqual(planClusters(input, opts));
    });
  });

  it('mode breaks ties by first appearance', () => {
    expect(mode([2, 3, 3, 2])).toBe(2);
    expect(mode(['x', 'y', 'y'])).toBe('y');
    expect(() => mode([])).toThrow(RangeError);
  });

  it('buildRepresentative averages numbers and takes modes for categories', () => {
    const members = [
      req('a', { age: 30, incomePercentile: 10, region: 'Zeeland', opinion: { economic: 0.1 } }, 'generation', 'Budget'),
      req('b', { age: 35, incomePercentile: 45, region: 'Utrecht', opinion: { economic: 0.2 } }, 'generation', 'Budget'),
      req('c', { age: 36, incomePercentile: 50, region: 'Utrecht', opinion: { economic: 0.3 } }, 'generation', 'Budget'),
    ];
    const rep = buildRepresentative(members, 'batch-7');

    expect(rep.memberCount).toBe(3);
    expect(rep.requestType).toBe('generation');
    expect(rep.content).toBe('Budget');
    expect(rep.actor.actorId).toBe('representative:batch-7');
    expect(rep.actor.age).toBe(33);
    expect(rep.actor.incomePercentile).toBe(50);
    expect(rep.actor.region).toBe('Utrecht');
    expect(rep.actor.educationLevel).toBe(3);
    expect(rep.actor.opinion.economic).toBeCloseTo(0.2, 10);
  });
});
