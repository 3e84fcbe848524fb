import { describe, expect, it } from 'vitest';
import { syntheticProviders } from '../signals/providers/index.js';
import { generateSynthetic } from '../signals/synthetic.js';
import type { Axis, AxisMetrics, FetchOptions, ProviderSet, SignalProvider } from '../signals/types.js';
import { normalize } from '../topics/normalizer.js';
import { createTopic } from '../topics/types.js';
import { analyzeTopic, rankAnalyses, runAnalysis, scoresByName } from './runner.js';

/** Answers synthetically, except for keywords that never answer. */
class GatedProvider<A extends Axis> implements SignalProvider<A> {
  readonly name = 'gated';

  constructor(readonly axis: A, private readonly hang: ReadonlySet<string>) {}

  async fetch(keyword: string, _options?: FetchOptions): Promise<AxisMetrics[A]> {
    if (this.hang.has(keyword)) return new Promise<AxisMetrics[A]>(() => undefined);
    return generateSynthetic(keyword, this.axis);
  }
}

class BrokenProvider<A extends Axis> implements SignalProvider<A> {
  readonly name = 'broken';

  constructor(readonly axis: A) {}

  async fetch(): Promise<AxisMetrics[A]> {
    throw new Error('service unavailable');
  }
}

describe('runAnalysis', () => {
  it('scores a topic on demand and competition only by default', async () => {
    const topics = normalize([{ 'ジャンル名': 'X', '関連するキーワード例': ['X', 'Y'] }]);
    const result = await runAnalysis(topics, syntheticProviders());

    expect(result.cancelled).toBe(false);
    expect(result.includeSocial).toBe(false);
    expect(result.providers).toEqual({ demand: 'synthetic', competition: 'synthetic', social: 'synthetic' });
    expect(result.analyses).toHaveLength(1);

    const [analysis] = result.analyses;
    expect(analysis?.social).toBeUndefined();
    expect(Object.keys(analysis?.demand.perKeyword ?? {})).toEqual(['X', 'Y']);
    expect(analysis?.demand.axisScore).toBeCloseTo(44.8875);
    expect(analysis?.competition.axisScore).toBeCloseTo(10.85);
    expect(analysis?.score.weights).toEqual({ demand: 0.5, competition: 0.5 });
    expect(analysis?.score.total).toBeCloseTo(27.86875);
    expect(analysis?.complete).toBe(true);
  });

  it('adds the social axis on request', async () => {
    const topics = [createTopic('X', ['X', 'Y'])];
    const result = await runAnalysis(topics, syntheticProviders(), { includeSocial: true });
    const score = result.analyses[0]?.score;

    expect(score?.social).toBeCloseTo(68.38);
    expect(score?.weights).toEqual({ demand: 0.4, competition: 0.4, social: 0.2 });
    expect(score?.total).toBeCloseTo(35.971);
  });

  it('yields an empty result for an unreadable payload', async () => {
    const result = await runAnalysis(normalize('not a topic list'), syntheticProviders());
    expect(result.analyses).toEqual([]);
    expect(scoresByName(result).size).toBe(0);
  });

  it('isolates provider failures to synthetic fallbacks', async () => {
    const providers: ProviderSet = {
      demand: new BrokenProvider('demand'),
      competition: new BrokenProvider('competition'),
      social: new BrokenProvider('social'),
    };
    const result = await runAnalysis([createTopic('X', ['X', 'Y'])], providers);
    const analysis = result.analyses[0];

    expect(analysis?.demand.fallbackKeywords).toEqual(['X', 'Y']);
    expect(analysis?.competition.fallbackKeywords).toEqual(['X', 'Y']);
    expect(analysis?.score.total).toBeCloseTo(27.86875);
  });

  it('returns partial results in input order when cancelled', async () => {
    const hang = new Set(['slow']);
    const providers: ProviderSet = {
      demand: new GatedProvider('demand', hang),
      competition: new GatedProvider('competition', hang),
      social: new GatedProvider('social', hang),
    };
    const topics = [
      createTopic('T1', ['fast']),
      createTopic('T2', ['slow']),
      createTopic('T3', ['fast2', 'slow']),
    ];
    const controller = new AbortController();

    const running = runAnalysis(topics, providers, { signal: controller.signal, maxConcurrency: 8 });
    await new Promise(resolve => setTimeout(resolve, 20));
    controller.abort();
    const result = await running;

    expect(result.cancelled).toBe(true);
    expect(result.analyses.map(a => a.topic.name)).toEqual(['T1', 'T3']);
    expect(result.analyses.map(a => a.complete)).toEqual([true, false]);
    expect(Object.keys(result.analyses[1]?.demand.perKeyword ?? {})).toEqual(['fast2']);
  });

  it('freezes the result', async () => {
    const result = await runAnalysis([createTopic('a', ['a'])], syntheticProviders());
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.analyses)).toBe(true);
  });
});

describe('analyzeTopic', () => {
  it('analyzes a single topic', async () => {
    const analysis = await analyzeTopic(createTopic('X', ['X', 'Y']), syntheticProviders());
    expect(analysis.topic.name).toBe('X');
    expect(analysis.score.total).toBeCloseTo(27.86875);
  });
});

describe('scoresByName / rankAnalyses', () => {
  it('lets a later duplicate name win', async () => {
    const result = await runAnalysis([createTopic('dup', ['a']), createTopic('dup', ['b'])], syntheticProviders());
    const scores = scoresByName(result);

    expect(scores.size).toBe(1);
    expect(scores.get('dup')).toBe(result.analyses[1]?.score);
  });

  it('ranks by total, highest first', async () => {
    const result = await runAnalysis(
      [createTopic('hard', ['方法']), createTopic('easy', ['xyzxyzxyz123'])],
      syntheticProviders(),
    );

    expect(rankAnalyses(result).map(a => a.topic.name)).toEqual(['easy', 'hard']);
    expect(result.analyses.map(a => a.topic.name)).toEqual(['hard', 'easy']);
  });
});
