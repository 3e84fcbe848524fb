import { createHash } from 'node:crypto';
import {
  SYNTHETIC_SOURCE,
  type Axis,
  type AxisMetrics,
  type CompetitionMetric,
  type DemandMetric,
  type Sentiment,
  type SocialMetric,
} from './types.js';

/**
 * Deterministic stand-in metrics, used whenever a live provider is absent or
 * fails. The same keyword yields the same numbers on every machine.
 */

/** Substrings that usually mark crowded how-to / comparison searches. */
export const HIGH_COMPETITION_MARKERS = ['方法', 'やり方', 'おすすめ', 'ランキング', '比較'];

/** Substrings of perennially busy social topics. */
export const POPULAR_TOPIC_MARKERS = ['食べ物', '旅行', 'アニメ', 'ゲーム', '健康', 'スポーツ'];

export const SENTIMENT_DISTRIBUTION: ReadonlyArray<readonly [Sentiment, number]> = [
  ['very-positive', 0.2],
  ['slightly-positive', 0.3],
  ['neutral', 0.3],
  ['slightly-negative', 0.15],
  ['very-negative', 0.05],
];

/** Mulberry32 seeded PRNG, uniform over [0, 1) */
export function mulberry32(seed: number): () => number {
  let s = seed >>> 0;
  return () => {
    s |= 0;
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** First four bytes of the keyword's MD5 digest, as an unsigned 32-bit seed. */
export function seedFromKeyword(keyword: string): number {
  return createHash('md5').update(keyword, 'utf8').digest().readUInt32BE(0);
}

function uniform(rand: () => number, min: number, max: number): number {
  return min + rand() * (max - min);
}

function uniformInt(rand: () => number, min: number, max: number): number {
  return min + Math.floor(rand() * (max - min + 1));
}

function roundTo(value: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}

function countMarkers(keyword: string, markers: readonly string[]): number {
  return markers.filter(m => keyword.includes(m)).length;
}

export function syntheticCompetition(keyword: string): CompetitionMetric {
  const rand = mulberry32(seedFromKeyword(keyword));
  const base = uniform(rand, 0, 100);
  // Long-tail phrases are usually easier; count code points, not UTF-16 units
  const lengthFactor = [...keyword].length / 10;
  const commonFactor = countMarkers(keyword, HIGH_COMPETITION_MARKERS) * 10;
  const difficulty = Math.min(100, Math.max(0, base + commonFactor - lengthFactor));

  return {
    difficulty: roundTo(difficulty, 1),
    competitorCount: Math.round(difficulty * 1000 + uniform(rand, 0, 10000)),
    source: SYNTHETIC_SOURCE,
  };
}

export function pickSentiment(roll: number): Sentiment {
  let acc = 0;
  for (const [sentiment, weight] of SENTIMENT_DISTRIBUTION) {
    acc += weight;
    if (roll < acc) return sentiment;
  }
  return 'very-negative';
}

export function syntheticSocial(keyword: string): SocialMetric {
  const rand = mulberry32(seedFromKeyword(keyword));
  const baseTweets = uniformInt(rand, 50, 5000);
  const popular = countMarkers(keyword, POPULAR_TOPIC_MARKERS) > 0;

  return {
    tweetCount: baseTweets * (popular ? 3 : 1),
    engagementRate: roundTo(uniform(rand, 0.5, 10), 2),
    sentiment: pickSentiment(rand()),
    source: SYNTHETIC_SOURCE,
  };
}

/** Interest and trend need a live provider; only volume is simulated. */
export function syntheticDemand(keyword: string): DemandMetric {
  const rand = mulberry32(seedFromKeyword(keyword));
  return {
    interest: 0,
    trend: 'unknown',
    monthlyVolume: uniformInt(rand, 500, 10000),
    source: SYNTHETIC_SOURCE,
  };
}

const GENERATORS: { [A in Axis]: (keyword: string) => AxisMetrics[A] } = {
  demand: syntheticDemand,
  competition: syntheticCompetition,
  social: syntheticSocial,
};

export function generateSynthetic<A extends Axis>(keyword: string, axis: A): AxisMetrics[A] {
  const generate: (keyword: string) => AxisMetrics[A] = GENERATORS[axis];
  return generate(keyword);
}
