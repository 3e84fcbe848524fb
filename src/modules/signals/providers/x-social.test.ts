import { describe, expect, it } from 'vitest';
import { ProviderError } from '../../errors.js';
import type { PostSample, SocialSearchClient } from '../../x-api/client.js';
import { RateLimiter } from '../rate-limiter.js';
import type { SentimentLexicon } from '../sentiment.js';
import { buildQuery, engagementPerPost, XSocialProvider } from './x-social.js';

const lexicon: SentimentLexicon = { positive: ['good'], negative: ['bad'] };

class FakeSearchClient implements SocialSearchClient {
  queries: string[] = [];

  constructor(
    private readonly count: number,
    private readonly posts: PostSample[],
    private readonly failure?: Error,
  ) {}

  async countRecent(query: string): Promise<number> {
    this.queries.push(query);
    if (this.failure) throw this.failure;
    return this.count;
  }

  async searchRecent(query: string): Promise<PostSample[]> {
    this.queries.push(query);
    if (this.failure) throw this.failure;
    return this.posts;
  }
}

function provider(client: SocialSearchClient) {
  return new XSocialProvider(client, {
    language: 'ja',
    lexicon,
    limiter: new RateLimiter(100, 100),
    retry: { maxRetries: 0 },
  });
}

describe('buildQuery', () => {
  it('filters language and reposts', () => {
    expect(buildQuery('キャンプ', 'ja')).toBe('キャンプ lang:ja -is:retweet');
  });

  it('quotes multi-word keywords', () => {
    expect(buildQuery('solo camp', 'en')).toBe('"solo camp" lang:en -is:retweet');
  });
});

describe('engagementPerPost', () => {
  it('averages all interaction kinds', () => {
    expect(engagementPerPost([
      { text: 'a', likes: 10, reposts: 2, replies: 1, quotes: 1 },
      { text: 'b', likes: 4, reposts: 0, replies: 0, quotes: 0 },
    ])).toBe(9);
    expect(engagementPerPost([])).toBe(0);
  });
});

describe('XSocialProvider', () => {
  it('combines count, engagement and sentiment', async () => {
    const client = new FakeSearchClient(1200, [
      { text: 'good stuff', likes: 10, reposts: 2, replies: 1, quotes: 1 },
      { text: 'meh', likes: 4, reposts: 0, replies: 0, quotes: 0 },
    ]);

    await expect(provider(client).fetch('キャンプ')).resolves.toEqual({
      tweetCount: 1200,
      engagementRate: 9,
      sentiment: 'very-positive',
      source: 'x',
    });
    expect(client.queries).toEqual(['キャンプ lang:ja -is:retweet', 'キャンプ lang:ja -is:retweet']);
  });

  it('takes one rate-limit token per X API call', async () => {
    const limiter = new RateLimiter(5, 0.001);
    const social = new XSocialProvider(new FakeSearchClient(10, []), {
      language: 'ja',
      lexicon,
      limiter,
      retry: { maxRetries: 0 },
    });

    await social.fetch('キャンプ');

    expect(limiter.available).toBe(3);
  });

  it('wraps client errors with their HTTP status', async () => {
    const client = new FakeSearchClient(0, [], Object.assign(new Error('Too Many Requests'), { code: 429 }));

    const err = await provider(client).fetch('キャンプ').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProviderError);
    expect(err).toMatchObject({ provider: 'x', status: 429, message: 'x: Too Many Requests' });
  });
});
