/**
 * OfflineGenerator
 *
 * Network-free text generation used when the backend is unavailable
 * (circuit open, missing key, failed batch). Three strategies, tried in order:
 * 1. template fill, when the content type has a template set
 * 2. rule-based composition from keywords found in the summary
 * 3. a fixed neutral sentence
 *
 * Generated text is cached by the literal summary.
 */

import { z } from 'zod';
import vocabularyJson from './vocabulary.json';
import { ResponseCache } from '../cache/ResponseCache';
import { OFFLINE_CONFIG } from '../../../shared/constants';

const TemplateSchema = z.object({
  template: z.string(),
  variables: z.record(z.array(z.string()).min(1)),
});

const PositionSchema = z.object({
  economic: z.number(),
  social: z.number(),
  environmental: z.number(),
});

const VocabularySchema = z.object({
  templates: z.record(z.array(TemplateSchema).min(1)),
  politicalTerms: z.array(z.string()).min(1),
  contextualWords: z.record(z.array(z.string())),
  contextKeywords: z.object({
    economy: z.array(z.string()),
    environment: z.array(z.string()),
    society: z.array(z.string()),
  }),
  toneKeywords: z.object({
    news: z.array(z.string()),
    opinion: z.array(z.string()),
    analysis: z.array(z.string()),
  }),
  sentenceStarters: z.record(z.array(z.string()).min(1)),
  defaultStarter: z.string(),
  contentTemplates: z.array(z.string()).min(1),
  conclusions: z.array(z.string()).min(1),
  fallbackResponse: z.string(),
  parties: z.array(z.object({ id: z.string(), position: PositionSchema })).min(3),
});

export type Vocabulary = z.infer<typeof VocabularySchema>;

export const VOCABULARY: Vocabulary = VocabularySchema.parse(vocabularyJson);

export type ContentType = 'political_news' | 'opinion' | 'crisis' | 'general';
export type TopicContext = 'economy' | 'environment' | 'society' | 'general';
export type Tone = 'news' | 'opinion' | 'analysis' | 'general';
export type GenerationStrategy = 'template' | 'rule-based' | 'fallback';

export interface OfflineGeneration {
  text: string;
  strategy: GenerationStrategy;
  cached: boolean;
}

export interface OfflineStatistics {
  cacheHitRate: number;
  cachedResponseCount: number;
  generatedResponseCount: number;
  averageResponseTimeMs: number;
}

export interface OfflineGeneratorOptions {
  capacity?: number;
  ttlMs?: number;
  enableTemplates?: boolean;
  enableRuleBased?: boolean;
  random?: () => number;
  vocabulary?: Vocabulary;
}

type CachedText = { text: string; strategy: GenerationStrategy };

function matchesAny(lower: string, keywords: readonly string[]): boolean {
  return keywords.some((k) => lower.includes(k));
}

/**
 * Coarse topic from keywords; first match wins in economy, environment, society order.
 */
export function detectContext(summary: string, vocabulary: Vocabulary = VOCABULARY): TopicContext {
  const lower = summary.toLowerCase();
  const kw = vocabulary.contextKeywords;
  if (matchesAny(lower, kw.economy)) return 'economy';
  if (matchesAny(lower, kw.environment)) return 'environment';
  if (matchesAny(lower, kw.society)) return 'society';
  return 'general';
}

export function detectTone(summary: string, vocabulary: Vocabulary = VOCABULARY): Tone {
  const lower = summary.toLowerCase();
  const kw = vocabulary.toneKeywords;
  if (matchesAny(lower, kw.news)) return 'news';
  if (matchesAny(lower, kw.opinion)) return 'opinion';
  if (matchesAny(lower, kw.analysis)) return 'analysis';
  return 'general';
}

// Cached text is per content type: the same summary reads differently as news and as opinion
function entryKey(summary: string, contentType: ContentType): string {
  return `${contentType}:${summary}`;
}

export class OfflineGenerator {
  private readonly cache: ResponseCache<CachedText>;
  private readonly enableTemplates: boolean;
  private readonly enableRuleBased: boolean;
  private readonly random: () => number;
  readonly vocabulary: Vocabulary;

  private generated = 0;
  private calls = 0;
  private averageMs = 0;

  constructor(opts: OfflineGeneratorOptions = {}) {
    this.cache = new ResponseCache<CachedText>({
      name: 'offline',
      capacity: opts.capacity ?? OFFLINE_CONFIG.CAPACITY,
      ttlMs: opts.ttlMs ?? OFFLINE_CONFIG.TTL_MS,
      policy: 'oldest',
    });
    this.enableTemplates = opts.enableTemplates ?? true;
    this.enableRuleBased = opts.enableRuleBased ?? true;
    this.random = opts.random ?? Math.random;
    this.vocabulary = opts.vocabulary ?? VOCABULARY;
  }

  public generate(summary: string, contentType: ContentType = 'general'): OfflineGeneration {
    const started = Date.now();
    const key = entryKey(summary, contentType);
    const hit = this.cache.lookup(key);
    let out: OfflineGeneration;
    if (hit) {
      out = { text: hit.text, strategy: hit.strategy, cached: true };
    } else {
      const fresh = this.compose(summary, contentType);
      this.cache.store(key, fresh);
      out = { ...fresh, cached: false };
    }
    this.recordTiming(Date.now() - started);
    return out;
  }

  /**
   * Warm the cache; prompts already cached are left alone.
   */
  public preload(prompts: readonly string[], contentType: ContentType = 'general'): number {
    let added = 0;
    for (const prompt of prompts) {
      const key = entryKey(prompt, contentType);
      if (this.cache.has(key)) continue;
      this.cache.store(key, this.compose(prompt, contentType));
      added++;
    }
    console.debug(`[OfflineGenerator] preloaded ${added}/${prompts.length} responses`);
    return added;
  }

  public clearCache(): void {
    this.cache.clear();
    this.cache.resetStats();
    console.debug('[OfflineGenerator] cache cleared');
  }

  public getStatistics(): OfflineStatistics {
    const stats = this.cache.stats();
    return {
      cacheHitRate: stats.hitRate,
      cachedResponseCount: stats.size,
      generatedResponseCount: this.generated,
      averageResponseTimeMs: this.averageMs,
    };
  }

  // Generation strategies

  private compose(summary: string, contentType: ContentType): CachedText {
    this.generated++;
    const templates = this.vocabulary.templates[contentType];
    if (this.enableTemplates && templates) {
      return { text: this.fillTemplate(this.pick(templates)), strategy: 'template' };
    }
    if (this.enableRuleBased) {
      return { text: this.ruleBased(summary), strategy: 'rule-based' };
    }
    return { text: this.vocabulary.fallbackResponse, strategy: 'fallback' };
  }

  private fillTemplate(t: z.infer<typeof TemplateSchema>): string {
    let text = t.template;
    for (const [name, values] of Object.entries(t.variables)) {
      const placeholder = `{${name}}`;
      if (text.includes(placeholder)) {
        text = text.split(placeholder).join(this.pick(values));
      }
    }
    return text;
  }

  private ruleBased(summary: string): string {
    const context = detectContext(summary, this.vocabulary);
    const tone = detectTone(summary, this.vocabulary);

    const starters = this.vocabulary.sentenceStarters[tone];
    const starter = starters ? this.pick(starters) : this.vocabulary.defaultStarter;

    const words = [...(this.vocabulary.contextualWords[context] ?? []), ...this.vocabulary.politicalTerms];
    const clause = this.pick(this.vocabulary.contentTemplates)
      .replace('{first}', this.pick(words))
      .replace('{second}', this.pick(words));

    const closing = this.pick(this.vocabulary.conclusions);
    return `${starter} ${clause} ${closing}`.trim();
  }

  private pick<T>(list: readonly T[]): T {
    const idx = Math.min(list.length - 1, Math.max(0, Math.floor(this.random() * list.length)));
    return list[idx];
  }

  private recordTiming(ms: number): void {
    this.calls++;
    this.averageMs += (ms - this.averageMs) / this.calls;
  }
}

export default OfflineGenerator;
