import { clamp } from '../../utils/guards.js';
import type { Topic } from '../topics/types.js';
import type { AxisResult } from './axis-analyzer.js';
import { DEFAULT_WEIGHTS, type ScoringWeights } from './weights.js';

export interface CompositeWeights {
  demand: number;
  competition: number;
  social?: number;
}

export interface CompositeScore {
  topicName: string;
  /** 0-100, not rounded */
  total: number;
  demand: number;
  competitionEase: number;
  social?: number;
  /** Weights actually applied; they cover only the axes present */
  weights: CompositeWeights;
}

/**
 * Combine the axis scores of one topic. Without a social result the social
 * share is redistributed to demand and competition.
 */
export function aggregate(
  topic: Pick<Topic, 'name'>,
  demand: AxisResult<'demand'>,
  competition: AxisResult<'competition'>,
  social?: AxisResult<'social'>,
  weights: ScoringWeights = DEFAULT_WEIGHTS,
): CompositeScore {
  if (social) {
    const w = weights.composite.withSocial;
    const total =
      demand.axisScore * w.demand +
      competition.axisScore * w.competition +
      social.axisScore * w.social;

    return {
      topicName: topic.name,
      total: clamp(total),
      demand: demand.axisScore,
      competitionEase: competition.axisScore,
      social: social.axisScore,
      weights: { ...w },
    };
  }

  const w = weights.composite.withoutSocial;
  return {
    topicName: topic.name,
    total: clamp(demand.axisScore * w.demand + competition.axisScore * w.competition),
    demand: demand.axisScore,
    competitionEase: competition.axisScore,
    weights: { ...w },
  };
}
