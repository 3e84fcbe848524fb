import pLimit, { type LimitFunction } from 'p-limit';
import { getLogger } from '../../utils/logger.js';
import type { Axis, ProviderSet } from '../signals/types.js';
import type { Topic } from '../topics/types.js';
import { aggregate, type CompositeScore } from './aggregator.js';
import type { AxisResult } from './axis-analyzer.js';
import { competitionAnalyzer, demandAnalyzer, socialAnalyzer } from './axes.js';
import { DEFAULT_WEIGHTS, type ScoringWeights } from './weights.js';

export const DEFAULT_MAX_CONCURRENCY = 4;

export interface AnalysisOptions {
  /** Social is opt-in */
  includeSocial?: boolean;
  maxConcurrency?: number;
  fetchTimeoutMs?: number;
  signal?: AbortSignal;
  weights?: ScoringWeights;
}

export interface TopicAnalysis {
  topic: Topic;
  demand: AxisResult<'demand'>;
  competition: AxisResult<'competition'>;
  social?: AxisResult<'social'>;
  score: CompositeScore;
  /** False when cancellation left some keyword unmeasured */
  complete: boolean;
}

export interface RunResult {
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly cancelled: boolean;
  readonly includeSocial: boolean;
  readonly providers: Readonly<Record<Axis, string>>;
  readonly analyses: readonly TopicAnalysis[];
}

interface TopicRunOptions extends AnalysisOptions {
  limit: LimitFunction;
}

async function runTopic(topic: Topic, providers: ProviderSet, options: TopicRunOptions): Promise<TopicAnalysis> {
  const weights = options.weights ?? DEFAULT_WEIGHTS;
  const axisOptions = {
    signal: options.signal,
    fetchTimeoutMs: options.fetchTimeoutMs,
    limit: options.limit,
    weights,
  };

  const [demand, competition, social] = await Promise.all([
    demandAnalyzer.analyze(topic, providers.demand, axisOptions),
    competitionAnalyzer.analyze(topic, providers.competition, axisOptions),
    options.includeSocial ? socialAnalyzer.analyze(topic, providers.social, axisOptions) : undefined,
  ]);

  const score = aggregate(topic, demand, competition, social, weights);
  const complete = demand.complete && competition.complete && (social?.complete ?? true);

  return {
    topic,
    demand,
    competition,
    ...(social ? { social } : {}),
    score,
    complete,
  };
}

/** Analyze one topic with its own concurrency limiter. */
export function analyzeTopic(topic: Topic, providers: ProviderSet, options: AnalysisOptions = {}): Promise<TopicAnalysis> {
  const limit = pLimit(options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY);
  return runTopic(topic, providers, { ...options, limit });
}

function hasMeasurement(analysis: TopicAnalysis): boolean {
  const results = [analysis.demand, analysis.competition, analysis.social];
  return results.some(r => r !== undefined && Object.keys(r.perKeyword).length > 0);
}

/**
 * Analyze every topic concurrently. All provider calls of the run share one
 * limiter; results keep input order. When `signal` aborts, outstanding calls
 * are abandoned and topics without any measurement are dropped.
 */
export async function runAnalysis(
  topics: readonly Topic[],
  providers: ProviderSet,
  options: AnalysisOptions = {},
): Promise<RunResult> {
  const log = getLogger();
  const startedAt = new Date().toISOString();
  const includeSocial = options.includeSocial ?? false;
  const maxConcurrency = options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY;
  const limit = pLimit(maxConcurrency);

  log.info({ topics: topics.length, includeSocial, maxConcurrency }, 'Analysis started');

  const all = await Promise.all(
    topics.map(topic => runTopic(topic, providers, { ...options, includeSocial, limit })),
  );

  const cancelled = options.signal?.aborted ?? false;
  const analyses = cancelled ? all.filter(hasMeasurement) : all;

  if (cancelled) {
    log.warn({ kept: analyses.length, dropped: all.length - analyses.length }, 'Analysis cancelled, returning partial results');
  }

  const result: RunResult = {
    startedAt,
    finishedAt: new Date().toISOString(),
    cancelled,
    includeSocial,
    providers: Object.freeze({
      demand: providers.demand.name,
      competition: providers.competition.name,
      social: providers.social.name,
    }),
    analyses: Object.freeze(analyses),
  };

  log.info({ analyzed: analyses.length, cancelled }, 'Analysis finished');
  return Object.freeze(result);
}

/** Composite score per topic name; a later duplicate name overwrites an earlier one. */
export function scoresByName(result: RunResult): Map<string, CompositeScore> {
  const scores = new Map<string, CompositeScore>();
  for (const analysis of result.analyses) scores.set(analysis.topic.name, analysis.score);
  return scores;
}

/** Analyses by descending total; ties keep input order. */
export function rankAnalyses(result: RunResult): TopicAnalysis[] {
  return [...result.analyses].sort((a, b) => b.score.total - a.score.total);
}
