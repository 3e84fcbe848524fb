import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { resolveWeights, type ScoringWeights } from './modules/analysis/weights.js';
import { ConfigError, errorMessage } from './modules/errors.js';
import { isRecord } from './utils/guards.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// Project root is one level up from both src/ and dist/
const PROJECT_ROOT = path.resolve(__dirname, '..');

export const RC_FILE_NAME = '.nicheradarrc.json';

export interface Config {
  // Anthropic (genre suggestions)
  anthropicApiKey: string;

  // Signal providers; an empty credential means the axis stays synthetic
  dataForSeoLogin: string;
  dataForSeoPassword: string;
  semrushApiKey: string;
  xBearerToken: string;

  // Market
  marketLocationCode: number;
  marketLanguage: string;
  semrushDatabase: string;

  // Concurrency and resilience
  maxConcurrency: number;
  fetchTimeoutMs: number;
  providerRpm: number;
  retryMaxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;

  // Suggestions
  suggestionCount: number;

  // Scoring
  weights: ScoringWeights;

  // Paths
  dataDir: string;
  dbPath: string;

  // Logging
  logLevel: string;
}

export interface LoadConfigOptions {
  /** Directory holding .env and the rc file; defaults to the project root */
  root?: string;
  env?: NodeJS.ProcessEnv;
}

function parseEnvFile(text: string): Record<string, string> {
  const vars: Record<string, string> = {};
  for (const line of text.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eq = trimmed.indexOf('=');
    if (eq > 0) {
      const key = trimmed.slice(0, eq).trim();
      const val = trimmed.slice(eq + 1).trim().replace(/^(['"])(.*)\1$/, '$2');
      vars[key] = val;
    }
  }
  return vars;
}

function readEnvFile(root: string): Record<string, string> {
  const envPath = path.resolve(root, '.env');
  if (!fs.existsSync(envPath)) return {};
  return parseEnvFile(fs.readFileSync(envPath, 'utf-8'));
}

function readRcFile(root: string): Record<string, unknown> {
  const rcPath = path.resolve(root, RC_FILE_NAME);
  if (!fs.existsSync(rcPath)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(rcPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`${RC_FILE_NAME} is not valid JSON: ${errorMessage(err)}`);
  }
  if (!isRecord(raw)) throw new ConfigError(`${RC_FILE_NAME} must contain a JSON object`);
  return raw;
}

/**
 * Resolve configuration. Priority: overrides > process env > .env > rc file > default.
 */
export function loadConfig(overrides: Partial<Config> = {}, options: LoadConfigOptions = {}): Config {
  const root = options.root ?? PROJECT_ROOT;
  const processEnv = options.env ?? process.env;
  const dotenv = readEnvFile(root);
  const rc = readRcFile(root);

  const lookup = (key: string): string | undefined => {
    const fromRc = rc[key];
    return processEnv[key] ?? dotenv[key] ?? (typeof fromRc === 'string' || typeof fromRc === 'number' ? String(fromRc) : undefined);
  };

  const str = (key: string, fallback = ''): string => lookup(key) ?? fallback;

  const num = (key: string, fallback: number, min = 0): number => {
    const raw = lookup(key);
    if (raw === undefined || raw === '') return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value) || value < min) {
      throw new ConfigError(`${key} must be a number >= ${min}, got "${raw}"`);
    }
    return value;
  };

  const dataDir = overrides.dataDir ?? path.resolve(root, 'data');

  return {
    anthropicApiKey: overrides.anthropicApiKey ?? str('ANTHROPIC_API_KEY'),
    dataForSeoLogin: overrides.dataForSeoLogin ?? str('DATAFORSEO_LOGIN'),
    dataForSeoPassword: overrides.dataForSeoPassword ?? str('DATAFORSEO_PASSWORD'),
    semrushApiKey: overrides.semrushApiKey ?? str('SEMRUSH_API_KEY'),
    xBearerToken: overrides.xBearerToken ?? str('X_BEARER_TOKEN'),

    marketLocationCode: overrides.marketLocationCode ?? num('MARKET_LOCATION_CODE', 2392),
    marketLanguage: overrides.marketLanguage ?? str('MARKET_LANGUAGE', 'ja'),
    semrushDatabase: overrides.semrushDatabase ?? str('SEMRUSH_DATABASE', 'jp'),

    maxConcurrency: overrides.maxConcurrency ?? num('MAX_CONCURRENCY', 4, 1),
    fetchTimeoutMs: overrides.fetchTimeoutMs ?? num('FETCH_TIMEOUT_MS', 10_000, 1),
    providerRpm: overrides.providerRpm ?? num('PROVIDER_RPM', 30, 1),
    retryMaxRetries: overrides.retryMaxRetries ?? num('RETRY_MAX_RETRIES', 2),
    retryBaseDelayMs: overrides.retryBaseDelayMs ?? num('RETRY_BASE_DELAY_MS', 500),
    retryMaxDelayMs: overrides.retryMaxDelayMs ?? num('RETRY_MAX_DELAY_MS', 8000),

    suggestionCount: overrides.suggestionCount ?? num('SUGGESTION_COUNT', 5, 1),

    weights: overrides.weights ?? resolveWeights(rc.weights),

    dataDir,
    dbPath: overrides.dbPath ?? path.resolve(dataDir, 'niche-radar.db'),

    logLevel: overrides.logLevel ?? str('LOG_LEVEL', 'info'),
  };
}
