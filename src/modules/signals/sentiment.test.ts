import { describe, expect, it } from 'vitest';
import { classifyPolarity, classifySentiment, loadLexicon, postPolarity, type SentimentLexicon } from './sentiment.js';

const lexicon: SentimentLexicon = {
  positive: ['good', '最高'],
  negative: ['bad', '最悪'],
};

describe('postPolarity', () => {
  it('returns null without opinion words', () => {
    expect(postPolarity('just a post', lexicon)).toBeNull();
  });

  it('balances positive and negative hits', () => {
    expect(postPolarity('Good but bad', lexicon)).toBe(0);
    expect(postPolarity('今日は最高', lexicon)).toBe(1);
  });

  it('matches latin words on word boundaries only', () => {
    expect(postPolarity('badminton tonight', lexicon)).toBeNull();
  });
});

describe('classifyPolarity', () => {
  it('buckets the polarity range', () => {
    expect(classifyPolarity(0.6)).toBe('very-positive');
    expect(classifyPolarity(0.2)).toBe('slightly-positive');
    expect(classifyPolarity(0)).toBe('neutral');
    expect(classifyPolarity(-0.2)).toBe('slightly-negative');
    expect(classifyPolarity(-0.6)).toBe('very-negative');
  });
});

describe('classifySentiment', () => {
  it('is neutral when nothing carries an opinion', () => {
    expect(classifySentiment([], lexicon)).toBe('neutral');
    expect(classifySentiment(['hello'], lexicon)).toBe('neutral');
  });

  it('averages over opinionated posts only', () => {
    // polarities 1 and 0 → mean 0.5
    expect(classifySentiment(['good', 'good bad', 'unrelated'], lexicon)).toBe('slightly-positive');
    expect(classifySentiment(['最悪', '最悪'], lexicon)).toBe('very-negative');
  });
});

describe('loadLexicon', () => {
  it('reads the bundled word lists', () => {
    const bundled = loadLexicon();
    expect(bundled.positive.length).toBeGreaterThan(0);
    expect(bundled.negative.length).toBeGreaterThan(0);
  });
});
