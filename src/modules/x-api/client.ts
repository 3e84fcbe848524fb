import { TwitterApi, type TweetV2 } from 'twitter-api-v2';

export interface PostSample {
  text: string;
  likes: number;
  reposts: number;
  replies: number;
  quotes: number;
}

/** The read-only slice of the X API the social provider needs. */
export interface SocialSearchClient {
  countRecent(query: string): Promise<number>;
  searchRecent(query: string, maxResults: number): Promise<PostSample[]>;
}

function toSample(tweet: TweetV2): PostSample {
  const m = tweet.public_metrics;
  return {
    text: tweet.text,
    likes: m?.like_count ?? 0,
    reposts: m?.retweet_count ?? 0,
    replies: m?.reply_count ?? 0,
    quotes: m?.quote_count ?? 0,
  };
}

/**
 * Read-only X API client using bearer token authentication.
 * Errors propagate; the caller decides whether to fall back.
 */
export class XReadClient implements SocialSearchClient {
  private client: TwitterApi;

  constructor(bearerToken: string) {
    this.client = new TwitterApi(bearerToken);
  }

  /** Total matching posts over the recent-search window (7 days). */
  async countRecent(query: string): Promise<number> {
    const result = await this.client.v2.tweetCountRecent(query);
    return result.meta.total_tweet_count;
  }

  async searchRecent(query: string, maxResults: number): Promise<PostSample[]> {
    const result = await this.client.v2.search(query, {
      // API accepts 10..100
      max_results: Math.min(100, Math.max(10, maxResults)),
      'tweet.fields': ['public_metrics', 'created_at'],
    });
    return (result.data?.data ?? []).map(toSample);
  }
}
