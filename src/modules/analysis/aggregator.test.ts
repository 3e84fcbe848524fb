import { describe, expect, it } from 'vitest';
import type { Axis } from '../signals/types.js';
import { aggregate } from './aggregator.js';
import type { AxisResult } from './axis-analyzer.js';

function result<A extends Axis>(axis: A, axisScore: number): AxisResult<A> {
  return { axis, topicName: 'T', perKeyword: {}, axisScore, fallbackKeywords: [], complete: true };
}

describe('aggregate', () => {
  it('splits evenly between demand and competition without social', () => {
    const score = aggregate({ name: 'T' }, result('demand', 44.8875), result('competition', 10.85));

    expect(score.total).toBeCloseTo(27.86875);
    expect(score.weights).toEqual({ demand: 0.5, competition: 0.5 });
    expect(score).not.toHaveProperty('social');
    expect(score.competitionEase).toBe(10.85);
  });

  it('uses 0.4 / 0.4 / 0.2 with social', () => {
    const score = aggregate({ name: 'T' }, result('demand', 50), result('competition', 50), result('social', 100));

    expect(score.total).toBeCloseTo(60);
    expect(score.social).toBe(100);
    expect(score.weights).toEqual({ demand: 0.4, competition: 0.4, social: 0.2 });
  });

  it('applied weights sum to 1', () => {
    const score = aggregate({ name: 'T' }, result('demand', 1), result('competition', 1), result('social', 1));
    const sum = Object.values(score.weights).reduce((s, w) => s + w, 0);
    expect(sum).toBeCloseTo(1);
  });

  it('is 0 when every axis is 0', () => {
    expect(aggregate({ name: 'T' }, result('demand', 0), result('competition', 0)).total).toBe(0);
  });

  it('keeps the total within 0-100', () => {
    const score = aggregate({ name: 'T' }, result('demand', 100), result('competition', 100), result('social', 100));
    expect(score.total).toBeLessThanOrEqual(100);
    expect(score.total).toBeGreaterThanOrEqual(99.999);
  });
});
