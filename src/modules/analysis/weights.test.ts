import { describe, expect, it } from 'vitest';
import { ConfigError } from '../errors.js';
import { DEFAULT_WEIGHTS, resolveWeights } from './weights.js';

describe('resolveWeights', () => {
  it('returns the defaults without an override', () => {
    expect(resolveWeights(undefined)).toBe(DEFAULT_WEIGHTS);
  });

  it('merges a partial group over the defaults', () => {
    const weights = resolveWeights({ demand: { volumeScale: 200 } });
    expect(weights.demand).toEqual({ interest: 0.3, volume: 0.5, rising: 0.2, volumeScale: 200 });
    expect(weights.social).toEqual(DEFAULT_WEIGHTS.social);
  });

  it('replaces a composite group whole', () => {
    const weights = resolveWeights({ composite: { withoutSocial: { demand: 0.7, competition: 0.3 } } });
    expect(weights.composite.withoutSocial).toEqual({ demand: 0.7, competition: 0.3 });
    expect(weights.composite.withSocial).toEqual(DEFAULT_WEIGHTS.composite.withSocial);
  });

  it('rejects composite weights that do not sum to 1', () => {
    expect(() => resolveWeights({ composite: { withoutSocial: { demand: 0.7, competition: 0.7 } } }))
      .toThrow(/withoutSocial weights must sum to 1/);
  });

  it('rejects unknown groups and out-of-range values', () => {
    expect(() => resolveWeights({ trends: {} })).toThrow(ConfigError);
    expect(() => resolveWeights({ demand: { interest: -0.1 } })).toThrow(ConfigError);
    expect(() => resolveWeights({ social: { tweetScale: 0 } })).toThrow(ConfigError);
  });
});
