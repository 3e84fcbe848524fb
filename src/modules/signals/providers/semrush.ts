import { MissingCredentialsError } from '../../errors.js';
import type { CompetitionMetric } from '../types.js';
import { ExternalProvider, type ExternalProviderOptions } from './external.js';

const BASE_URL = 'https://api.semrush.com/';
const EXPORT_COLUMNS = ['Ph', 'Kd', 'Nr'] as const;

export interface SemrushRow {
  phrase: string;
  difficulty: number;
  results: number;
}

/**
 * Parse a `phrase_this` export: a header line followed by semicolon-separated
 * rows, columns in EXPORT_COLUMNS order. Semrush signals errors in-band with
 * bodies like `ERROR 50 :: NOTHING FOUND`.
 */
export function parseSemrushCsv(body: string): SemrushRow | { error: string } {
  const text = body.trim();
  if (text.startsWith('ERROR')) return { error: text };

  const lines = text.split(/\r?\n/).filter(l => l.trim() !== '');
  const data = lines[1];
  if (!data) return { error: 'empty export' };

  const [phrase = '', kd = '', nr = ''] = data.split(';');
  const difficulty = Number(kd);
  const results = Number(nr);
  if (!Number.isFinite(difficulty)) return { error: `bad difficulty value "${kd}"` };

  return {
    phrase,
    difficulty: Math.max(0, Math.min(100, difficulty)),
    results: Number.isFinite(results) ? Math.max(0, Math.round(results)) : 0,
  };
}

/**
 * Competition signal from Semrush keyword difficulty (Kd) and the number of
 * ranking results (Nr) for the phrase.
 */
export class SemrushCompetitionProvider extends ExternalProvider<'competition'> {
  readonly name = 'semrush';
  readonly axis = 'competition';

  constructor(
    private readonly apiKey: string,
    private readonly database: string,
    options: ExternalProviderOptions,
  ) {
    super(options);
    if (!apiKey) throw new MissingCredentialsError('semrush', ['SEMRUSH_API_KEY']);
  }

  protected async request(keyword: string, signal: AbortSignal): Promise<CompetitionMetric> {
    const url = new URL(BASE_URL);
    url.searchParams.set('type', 'phrase_this');
    url.searchParams.set('key', this.apiKey);
    url.searchParams.set('phrase', keyword);
    url.searchParams.set('database', this.database);
    url.searchParams.set('export_columns', EXPORT_COLUMNS.join(','));

    const res = await fetch(url, { signal });
    if (!res.ok) {
      throw this.fail(keyword, `HTTP ${res.status} ${res.statusText}`, res.status);
    }

    const parsed = parseSemrushCsv(await res.text());
    if ('error' in parsed) throw this.fail(keyword, parsed.error, 400);

    return {
      difficulty: parsed.difficulty,
      competitorCount: parsed.results,
      source: this.name,
    };
  }
}
