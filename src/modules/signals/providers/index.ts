import type { Config } from '../../../config.js';
import { getLogger } from '../../../utils/logger.js';
import { XReadClient, type SocialSearchClient } from '../../x-api/client.js';
import { RateLimiter } from '../rate-limiter.js';
import type { ProviderSet } from '../types.js';
import { DataForSeoDemandProvider } from './dataforseo.js';
import type { ExternalProviderOptions } from './external.js';
import { SemrushCompetitionProvider } from './semrush.js';
import { SyntheticProvider } from './synthetic.js';
import { XSocialProvider } from './x-social.js';

export { SyntheticProvider } from './synthetic.js';

export type ProviderConfig = Pick<
  Config,
  | 'dataForSeoLogin'
  | 'dataForSeoPassword'
  | 'semrushApiKey'
  | 'xBearerToken'
  | 'marketLocationCode'
  | 'marketLanguage'
  | 'semrushDatabase'
  | 'fetchTimeoutMs'
  | 'providerRpm'
  | 'retryMaxRetries'
  | 'retryBaseDelayMs'
  | 'retryMaxDelayMs'
>;

export interface ProviderFactories {
  /** Builds the X client; replaced in tests */
  socialClient?: (bearerToken: string) => SocialSearchClient;
}

export function syntheticProviders(): ProviderSet {
  return {
    demand: new SyntheticProvider('demand'),
    competition: new SyntheticProvider('competition'),
    social: new SyntheticProvider('social'),
  };
}

/**
 * Pick one provider per axis for a run. An axis whose credentials are not
 * configured gets the synthetic provider; live providers each get their own
 * rate limiter.
 */
export function createProviders(config: ProviderConfig, factories: ProviderFactories = {}): ProviderSet {
  const log = getLogger();
  const external = (): ExternalProviderOptions => ({
    limiter: RateLimiter.perMinute(config.providerRpm),
    requestTimeoutMs: config.fetchTimeoutMs,
    retry: {
      maxRetries: config.retryMaxRetries,
      baseDelayMs: config.retryBaseDelayMs,
      maxDelayMs: config.retryMaxDelayMs,
    },
  });

  const providers = syntheticProviders();

  if (config.dataForSeoLogin && config.dataForSeoPassword) {
    providers.demand = new DataForSeoDemandProvider(
      { login: config.dataForSeoLogin, password: config.dataForSeoPassword },
      { locationCode: config.marketLocationCode, languageCode: config.marketLanguage },
      external(),
    );
  }

  if (config.semrushApiKey) {
    providers.competition = new SemrushCompetitionProvider(config.semrushApiKey, config.semrushDatabase, external());
  }

  if (config.xBearerToken) {
    const client = (factories.socialClient ?? ((token: string) => new XReadClient(token)))(config.xBearerToken);
    providers.social = new XSocialProvider(client, { ...external(), language: config.marketLanguage });
  }

  log.debug({
    demand: providers.demand.name,
    competition: providers.competition.name,
    social: providers.social.name,
  }, 'Signal providers selected');

  return providers;
}

/**
 * Upper bound for one keyword fetch through a live provider: every attempt
 * timing out plus the longest backoff between attempts.
 */
export function fetchBudgetMs(config: Pick<ProviderConfig, 'fetchTimeoutMs' | 'retryMaxRetries' | 'retryMaxDelayMs'>): number {
  const attempts = config.retryMaxRetries + 1;
  return config.fetchTimeoutMs * attempts + config.retryMaxDelayMs * config.retryMaxRetries;
}
