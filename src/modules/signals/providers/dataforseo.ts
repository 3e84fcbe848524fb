import { isRecord, mean, numberOr } from '../../../utils/guards.js';
import { MissingCredentialsError } from '../../errors.js';
import type { DemandMetric, Trend } from '../types.js';
import { ExternalProvider, type ExternalProviderOptions } from './external.js';

const BASE_URL = 'https://api.dataforseo.com/v3';
const SEARCH_VOLUME_PATH = 'keywords_data/google_ads/search_volume/live';
const OK_STATUS = 20000;
const RATE_LIMITED_STATUS = 40202;

export interface DataForSeoCredentials {
  login: string;
  password: string;
}

export interface DataForSeoMarket {
  /** Google Ads location code, e.g. 2392 for Japan */
  locationCode: number;
  languageCode: string;
}

export interface MonthlySearches {
  year: number;
  month: number;
  searchVolume: number;
}

/**
 * Reduce a monthly search series to interest (mean relative to the peak
 * month, 0-100) and trend (second half vs first half).
 */
export function summarizeMonthlySeries(series: readonly MonthlySearches[]): { interest: number; trend: Trend } {
  const ordered = [...series].sort((a, b) => a.year - b.year || a.month - b.month);
  const volumes = ordered.map(m => m.searchVolume);
  const peak = Math.max(0, ...volumes);
  const interest = peak > 0 ? mean(volumes.map(v => (v / peak) * 100)) : 0;

  if (volumes.length < 2) return { interest, trend: 'unknown' };

  const half = Math.floor(volumes.length / 2);
  const firstHalf = mean(volumes.slice(0, half));
  const secondHalf = mean(volumes.slice(half));
  return { interest, trend: secondHalf > firstHalf ? 'rising' : 'falling' };
}

function parseMonthly(value: unknown): MonthlySearches[] {
  if (!Array.isArray(value)) return [];
  const rows: MonthlySearches[] = [];
  for (const item of value) {
    if (!isRecord(item)) continue;
    const { year, month, search_volume: volume } = item;
    if (typeof year !== 'number' || typeof month !== 'number') continue;
    rows.push({ year, month, searchVolume: numberOr(volume, 0) });
  }
  return rows;
}

/**
 * Demand signal from DataForSEO's Google Ads search-volume endpoint.
 * One live task per keyword; monthly_searches drives interest and trend.
 */
export class DataForSeoDemandProvider extends ExternalProvider<'demand'> {
  readonly name = 'dataforseo';
  readonly axis = 'demand';
  private readonly authHeader: string;

  constructor(
    credentials: DataForSeoCredentials,
    private readonly market: DataForSeoMarket,
    options: ExternalProviderOptions,
  ) {
    super(options);
    if (!credentials.login || !credentials.password) {
      throw new MissingCredentialsError('dataforseo', ['DATAFORSEO_LOGIN', 'DATAFORSEO_PASSWORD']);
    }
    this.authHeader = 'Basic ' + Buffer.from(`${credentials.login}:${credentials.password}`).toString('base64');
  }

  protected async request(keyword: string, signal: AbortSignal): Promise<DemandMetric> {
    const res = await fetch(`${BASE_URL}/${SEARCH_VOLUME_PATH}`, {
      method: 'POST',
      headers: {
        Authorization: this.authHeader,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify([{
        keywords: [keyword],
        location_code: this.market.locationCode,
        language_code: this.market.languageCode,
      }]),
      signal,
    });

    if (!res.ok) {
      throw this.fail(keyword, `HTTP ${res.status} ${res.statusText}`, res.status);
    }

    const body: unknown = await res.json();
    return this.parse(keyword, body);
  }

  parse(keyword: string, body: unknown): DemandMetric {
    const task = isRecord(body) && Array.isArray(body.tasks) ? body.tasks[0] : undefined;
    if (!isRecord(task)) throw this.fail(keyword, 'response has no task');

    // DataForSEO reports task-level failures with HTTP 200
    if (task.status_code !== OK_STATUS) {
      const code = numberOr(task.status_code, 0);
      const status = code === RATE_LIMITED_STATUS ? 429 : code >= 50000 ? 500 : 400;
      throw this.fail(keyword, `task failed: ${String(task.status_message ?? task.status_code)}`, status);
    }

    const rows = Array.isArray(task.result) ? task.result : [];
    const row = rows.find(r => isRecord(r) && r.keyword === keyword) ?? rows[0];
    if (!isRecord(row)) throw this.fail(keyword, 'no result row');

    const { interest, trend } = summarizeMonthlySeries(parseMonthly(row.monthly_searches));
    return {
      interest,
      trend,
      monthlyVolume: Math.max(0, Math.round(numberOr(row.search_volume, 0))),
      source: this.name,
    };
  }
}
