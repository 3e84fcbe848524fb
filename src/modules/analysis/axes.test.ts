import { describe, expect, it } from 'vitest';
import type { DemandMetric, SocialMetric } from '../signals/types.js';
import { scoreCompetition, scoreDemand, scoreSocial } from './axes.js';
import { DEFAULT_WEIGHTS } from './weights.js';

function demand(interest: number, trend: DemandMetric['trend'], monthlyVolume: number): DemandMetric {
  return { interest, trend, monthlyVolume, source: 'test' };
}

function social(tweetCount: number, engagementRate: number, sentiment: SocialMetric['sentiment']): SocialMetric {
  return { tweetCount, engagementRate, sentiment, source: 'test' };
}

describe('scoreDemand', () => {
  it('weights interest, normalized volume and rising share', () => {
    const score = scoreDemand([demand(50, 'rising', 2000), demand(30, 'falling', 4000)], DEFAULT_WEIGHTS);
    // 0.3*40 + 0.5*30 + 0.2*100*0.5
    expect(score).toBeCloseTo(37);
  });

  it('caps the volume score at 100', () => {
    expect(scoreDemand([demand(0, 'unknown', 50_000)], DEFAULT_WEIGHTS)).toBeCloseTo(50);
  });

  it('honours a custom volume scale', () => {
    const weights = { ...DEFAULT_WEIGHTS, demand: { ...DEFAULT_WEIGHTS.demand, volumeScale: 1000 } };
    expect(scoreDemand([demand(0, 'unknown', 5000)], weights)).toBeCloseTo(2.5);
  });

  it('is 0 without metrics', () => {
    expect(scoreDemand([], DEFAULT_WEIGHTS)).toBe(0);
  });
});

describe('scoreCompetition', () => {
  it('inverts mean difficulty', () => {
    expect(scoreCompetition([
      { difficulty: 30, competitorCount: 1, source: 'test' },
      { difficulty: 70, competitorCount: 1, source: 'test' },
    ])).toBe(50);
  });

  it('is 0 without metrics', () => {
    expect(scoreCompetition([])).toBe(0);
  });
});

describe('scoreSocial', () => {
  it('weights volume, engagement and sentiment', () => {
    // tweets 2500/50 = 50, engagement 4*10 = 40, sentiment (0.5+1)*50 = 75
    expect(scoreSocial([social(2500, 4, 'slightly-positive')], DEFAULT_WEIGHTS)).toBeCloseTo(50);
  });

  it('stays within 100', () => {
    expect(scoreSocial([social(1_000_000, 50, 'very-positive')], DEFAULT_WEIGHTS)).toBeCloseTo(100);
  });

  it('gives a very negative, silent topic the floor', () => {
    expect(scoreSocial([social(0, 0, 'very-negative')], DEFAULT_WEIGHTS)).toBe(0);
  });
});
