import { clamp, mean } from '../../utils/guards.js';
import { SENTIMENT_VALUES } from '../signals/sentiment.js';
import type { CompetitionMetric, DemandMetric, SocialMetric } from '../signals/types.js';
import { AxisAnalyzer } from './axis-analyzer.js';
import type { ScoringWeights } from './weights.js';

/**
 * Demand: relative interest, normalized volume and the share of rising
 * keywords.
 */
export function scoreDemand(metrics: readonly DemandMetric[], weights: ScoringWeights): number {
  if (metrics.length === 0) return 0;
  const w = weights.demand;

  const interest = mean(metrics.map(m => m.interest));
  const volumeScore = Math.min(100, mean(metrics.map(m => m.monthlyVolume)) / w.volumeScale);
  const fractionRising = metrics.filter(m => m.trend === 'rising').length / metrics.length;

  return clamp(w.interest * interest + w.volume * volumeScore + w.rising * 100 * fractionRising);
}

/** Competition ease: 100 minus mean difficulty, higher is easier. */
export function scoreCompetition(metrics: readonly CompetitionMetric[]): number {
  if (metrics.length === 0) return 0;
  return clamp(100 - mean(metrics.map(m => m.difficulty)));
}

export function scoreSocial(metrics: readonly SocialMetric[], weights: ScoringWeights): number {
  if (metrics.length === 0) return 0;
  const w = weights.social;

  const tweetScore = Math.min(100, mean(metrics.map(m => m.tweetCount)) / w.tweetScale);
  const engagementScore = Math.min(100, mean(metrics.map(m => m.engagementRate)) * w.engagementScale);
  const sentimentScore = (mean(metrics.map(m => SENTIMENT_VALUES[m.sentiment])) + 1) * 50;

  return clamp(w.tweets * tweetScore + w.engagement * engagementScore + w.sentiment * sentimentScore);
}

export const demandAnalyzer = new AxisAnalyzer('demand', scoreDemand);
export const competitionAnalyzer = new AxisAnalyzer('competition', scoreCompetition);
export const socialAnalyzer = new AxisAnalyzer('social', scoreSocial);
