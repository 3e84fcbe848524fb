import { errorMessage } from '../../errors.js';
import type { PostSample, SocialSearchClient } from '../../x-api/client.js';
import { classifySentiment, loadLexicon, type SentimentLexicon } from '../sentiment.js';
import type { SocialMetric } from '../types.js';
import { ExternalProvider, type ExternalProviderOptions } from './external.js';

export interface XSocialOptions extends ExternalProviderOptions {
  /** Language filter appended to every query, e.g. "ja" */
  language: string;
  sampleSize?: number;
  lexicon?: SentimentLexicon;
}

export function buildQuery(keyword: string, language: string): string {
  const phrase = /\s/.test(keyword) ? `"${keyword.replace(/"/g, '')}"` : keyword;
  return `${phrase} lang:${language} -is:retweet`;
}

/** Mean interactions per sampled post. */
export function engagementPerPost(posts: readonly PostSample[]): number {
  if (posts.length === 0) return 0;
  const total = posts.reduce((sum, p) => sum + p.likes + p.reposts + p.replies + p.quotes, 0);
  return Math.round((total / posts.length) * 100) / 100;
}

/**
 * Social signal from X: recent post volume, engagement on a sample of
 * recent posts, and lexicon sentiment of that sample.
 */
export class XSocialProvider extends ExternalProvider<'social'> {
  readonly name = 'x';
  readonly axis = 'social';
  // countRecent and search are separate calls
  protected override readonly requestCost = 2;
  private readonly lexicon: SentimentLexicon;

  constructor(
    private readonly client: SocialSearchClient,
    private readonly social: XSocialOptions,
  ) {
    super(social);
    this.lexicon = social.lexicon ?? loadLexicon();
  }

  protected async request(keyword: string, signal: AbortSignal): Promise<SocialMetric> {
    const query = buildQuery(keyword, this.social.language);
    try {
      // twitter-api-v2 takes no AbortSignal; the race below bounds the wait
      const [tweetCount, sample] = await abortable(signal, Promise.all([
        this.client.countRecent(query),
        this.client.searchRecent(query, this.social.sampleSize ?? 100),
      ]));

      return {
        tweetCount,
        engagementRate: engagementPerPost(sample),
        sentiment: classifySentiment(sample.map(p => p.text), this.lexicon),
        source: this.name,
      };
    } catch (err) {
      if (signal.aborted) throw err;
      throw this.fail(keyword, errorMessage(err), statusOf(err), err);
    }
  }
}

function statusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'number') {
    return err.code;
  }
  return undefined;
}

function abortable<T>(signal: AbortSignal, work: Promise<T>): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new Error('aborted'));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}
