import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { isRecord } from '../../utils/guards.js';
import type { Sentiment } from './types.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// src/modules/signals or dist/modules/signals → project root is three levels up
const DEFAULT_LEXICON_PATH = path.resolve(__dirname, '../../..', 'resources/sentiment-lexicon.json');

export interface SentimentLexicon {
  positive: string[];
  negative: string[];
}

/** Numeric value of each sentiment class, used when averaging. */
export const SENTIMENT_VALUES: Record<Sentiment, number> = {
  'very-positive': 1.0,
  'slightly-positive': 0.5,
  neutral: 0.0,
  'slightly-negative': -0.5,
  'very-negative': -1.0,
};

let cached: SentimentLexicon | undefined;

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

export function loadLexicon(lexiconPath = DEFAULT_LEXICON_PATH): SentimentLexicon {
  if (cached && lexiconPath === DEFAULT_LEXICON_PATH) return cached;
  const raw: unknown = JSON.parse(fs.readFileSync(lexiconPath, 'utf-8'));
  const lexicon = {
    positive: isRecord(raw) ? stringList(raw.positive) : [],
    negative: isRecord(raw) ? stringList(raw.negative) : [],
  };
  if (lexiconPath === DEFAULT_LEXICON_PATH) cached = lexicon;
  return lexicon;
}

function hits(text: string, words: readonly string[]): number {
  let count = 0;
  for (const word of words) {
    // Latin words need boundaries ("bad" must not match "badminton"); CJK has none
    const found = /^[a-z]+$/.test(word)
      ? new RegExp(`\\b${word}\\b`).test(text)
      : text.includes(word);
    if (found) count++;
  }
  return count;
}

/** Polarity of one post in [-1, 1]; null when no lexicon word occurs. */
export function postPolarity(text: string, lexicon: SentimentLexicon): number | null {
  const lower = text.toLowerCase();
  const pos = hits(lower, lexicon.positive);
  const neg = hits(lower, lexicon.negative);
  if (pos + neg === 0) return null;
  return (pos - neg) / (pos + neg);
}

export function classifyPolarity(polarity: number): Sentiment {
  if (polarity >= 0.6) return 'very-positive';
  if (polarity >= 0.2) return 'slightly-positive';
  if (polarity > -0.2) return 'neutral';
  if (polarity > -0.6) return 'slightly-negative';
  return 'very-negative';
}

/** Average the polarity of every post that carries an opinion word. */
export function classifySentiment(texts: readonly string[], lexicon: SentimentLexicon): Sentiment {
  const polarities = texts
    .map(t => postPolarity(t, lexicon))
    .filter((p): p is number => p !== null);
  if (polarities.length === 0) return 'neutral';
  const avg = polarities.reduce((s, p) => s + p, 0) / polarities.length;
  return classifyPolarity(avg);
}
