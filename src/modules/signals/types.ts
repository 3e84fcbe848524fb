export const AXES = ['demand', 'competition', 'social'] as const;

export type Axis = (typeof AXES)[number];

export type Trend = 'rising' | 'falling' | 'unknown';

export const SENTIMENTS = [
  'very-positive',
  'slightly-positive',
  'neutral',
  'slightly-negative',
  'very-negative',
] as const;

export type Sentiment = (typeof SENTIMENTS)[number];

/** Source name carried by every metric the deterministic generator produces. */
export const SYNTHETIC_SOURCE = 'synthetic';

export interface DemandMetric {
  /** Relative search interest, 0-100 */
  interest: number;
  trend: Trend;
  monthlyVolume: number;
  source: string;
}

export interface CompetitionMetric {
  /** Keyword difficulty, 0-100 (higher = harder to rank) */
  difficulty: number;
  competitorCount: number;
  source: string;
}

export interface SocialMetric {
  tweetCount: number;
  /** Mean interactions (likes, reposts, replies, quotes) per post */
  engagementRate: number;
  sentiment: Sentiment;
  source: string;
}

export interface AxisMetrics {
  demand: DemandMetric;
  competition: CompetitionMetric;
  social: SocialMetric;
}

export type KeywordMetric<A extends Axis = Axis> = AxisMetrics[A];

export interface FetchOptions {
  signal?: AbortSignal;
}

/**
 * Anything that can measure one keyword on one axis.
 * Implementations reject on failure; callers decide what to fall back to.
 */
export interface SignalProvider<A extends Axis> {
  readonly name: string;
  readonly axis: A;
  fetch(keyword: string, options?: FetchOptions): Promise<AxisMetrics[A]>;
}

export type ProviderSet = { [A in Axis]: SignalProvider<A> };

export function isSynthetic(metric: { source: string }): boolean {
  return metric.source === SYNTHETIC_SOURCE;
}
