import { z } from 'zod';
import { ConfigError } from '../errors.js';

/**
 * Every coefficient used to turn raw metrics into 0-100 scores. The defaults
 * are empirical; override them through the rc file's `weights` object.
 */
export interface ScoringWeights {
  demand: {
    interest: number;
    volume: number;
    rising: number;
    /** mean monthly volume that maps to a volume score of 1 */
    volumeScale: number;
  };
  social: {
    tweets: number;
    engagement: number;
    sentiment: number;
    /** mean tweet count that maps to a tweet score of 1 */
    tweetScale: number;
    /** multiplier from engagement rate to engagement score */
    engagementScale: number;
  };
  composite: {
    withSocial: { demand: number; competition: number; social: number };
    withoutSocial: { demand: number; competition: number };
  };
}

export const DEFAULT_WEIGHTS: ScoringWeights = {
  demand: { interest: 0.3, volume: 0.5, rising: 0.2, volumeScale: 100 },
  social: { tweets: 0.3, engagement: 0.5, sentiment: 0.2, tweetScale: 50, engagementScale: 10 },
  composite: {
    withSocial: { demand: 0.4, competition: 0.4, social: 0.2 },
    withoutSocial: { demand: 0.5, competition: 0.5 },
  },
};

const SUM_TOLERANCE = 1e-6;

const fraction = z.number().min(0).max(1);
const scale = z.number().positive();

function sumsToOne(values: Record<string, number>): boolean {
  const total = Object.values(values).reduce((s, v) => s + v, 0);
  return Math.abs(total - 1) <= SUM_TOLERANCE;
}

const weightsSchema = z.object({
  demand: z.object({
    interest: fraction,
    volume: fraction,
    rising: fraction,
    volumeScale: scale,
  }),
  social: z.object({
    tweets: fraction,
    engagement: fraction,
    sentiment: fraction,
    tweetScale: scale,
    engagementScale: scale,
  }),
  composite: z.object({
    withSocial: z
      .object({ demand: fraction, competition: fraction, social: fraction })
      .refine(sumsToOne, { message: 'composite.withSocial weights must sum to 1' }),
    withoutSocial: z
      .object({ demand: fraction, competition: fraction })
      .refine(sumsToOne, { message: 'composite.withoutSocial weights must sum to 1' }),
  }),
});

/** Partial override as written in the rc file; groups merge over the defaults. */
const overrideSchema = z.object({
  demand: weightsSchema.shape.demand.partial().optional(),
  social: weightsSchema.shape.social.partial().optional(),
  composite: z.object({
    withSocial: z.object({ demand: fraction, competition: fraction, social: fraction }).optional(),
    withoutSocial: z.object({ demand: fraction, competition: fraction }).optional(),
  }).optional(),
}).strict();

/**
 * Merge an untrusted override over DEFAULT_WEIGHTS and validate the result.
 * Composite groups are replaced whole, so a partial group cannot silently
 * stop summing to 1.
 */
export function resolveWeights(override: unknown, base: ScoringWeights = DEFAULT_WEIGHTS): ScoringWeights {
  if (override === undefined || override === null) return base;

  const parsed = overrideSchema.safeParse(override);
  if (!parsed.success) throw new ConfigError(`Invalid weights: ${formatIssues(parsed.error)}`);

  const o = parsed.data;
  const merged = weightsSchema.safeParse({
    demand: { ...base.demand, ...o.demand },
    social: { ...base.social, ...o.social },
    composite: {
      withSocial: o.composite?.withSocial ?? base.composite.withSocial,
      withoutSocial: o.composite?.withoutSocial ?? base.composite.withoutSocial,
    },
  });
  if (!merged.success) throw new ConfigError(`Invalid weights: ${formatIssues(merged.error)}`);
  return merged.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
