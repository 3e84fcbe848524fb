import type { LimitFunction } from 'p-limit';
import { getLogger } from '../../utils/logger.js';
import { AbortError, ProviderTimeoutError, errorMessage } from '../errors.js';
import { generateSynthetic } from '../signals/synthetic.js';
import type { Axis, AxisMetrics, SignalProvider } from '../signals/types.js';
import type { Topic } from '../topics/types.js';
import { DEFAULT_WEIGHTS, type ScoringWeights } from './weights.js';

export interface AxisResult<A extends Axis = Axis> {
  axis: A;
  topicName: string;
  /**
   * Keyed by keyword. Enumeration order follows object key rules, so use
   * `metricsInKeywordOrder` to list keywords as the topic gives them.
   */
  perKeyword: Record<string, AxisMetrics[A]>;
  axisScore: number;
  /** Keywords whose provider call failed and were replaced by synthetic data */
  fallbackKeywords: string[];
  /** False when the run was cancelled before every keyword was measured */
  complete: boolean;
}

export interface AxisAnalyzeOptions {
  signal?: AbortSignal;
  /** Upper bound for one provider call, including its retries */
  fetchTimeoutMs?: number;
  /** Shared concurrency limiter; without one, keywords run unbounded */
  limit?: LimitFunction;
  weights?: ScoringWeights;
}

export type AxisScorer<A extends Axis> = (metrics: readonly AxisMetrics[A][], weights: ScoringWeights) => number;

type Measurement<A extends Axis> =
  | { status: 'measured'; metric: AxisMetrics[A] }
  | { status: 'fallback'; metric: AxisMetrics[A] }
  | { status: 'skipped' };

function unique(keywords: readonly string[]): string[] {
  return [...new Set(keywords)];
}

/** Measured `[keyword, metric]` pairs in the order the topic lists its keywords. */
export function metricsInKeywordOrder<A extends Axis>(
  keywords: readonly string[],
  result: AxisResult<A>,
): Array<[string, AxisMetrics[A]]> {
  const pairs: Array<[string, AxisMetrics[A]]> = [];
  for (const keyword of unique(keywords)) {
    if (!Object.hasOwn(result.perKeyword, keyword)) continue;
    const metric = result.perKeyword[keyword];
    if (metric !== undefined) pairs.push([keyword, metric]);
  }
  return pairs;
}

/**
 * Run `work` until it settles, the timeout elapses, or `parent` aborts,
 * whichever comes first. The signal handed to `work` aborts in the latter
 * two cases.
 */
function withDeadline<T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number | undefined,
  parent: AbortSignal | undefined,
  onTimeout: () => Error,
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let timer: ReturnType<typeof setTimeout> | undefined;

    const cleanup = () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onAbort);
    };
    const onAbort = () => {
      cleanup();
      controller.abort();
      reject(new AbortError());
    };

    if (parent?.aborted) {
      reject(new AbortError());
      return;
    }
    parent?.addEventListener('abort', onAbort, { once: true });

    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        cleanup();
        controller.abort();
        reject(onTimeout());
      }, timeoutMs);
    }

    work(controller.signal).then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      },
    );
  });
}

/**
 * Measures every keyword of a topic on one axis and reduces the results to
 * an axis score. A failing keyword is replaced by synthetic data and never
 * fails the topic.
 */
export class AxisAnalyzer<A extends Axis> {
  constructor(
    readonly axis: A,
    private readonly scorer: AxisScorer<A>,
  ) {}

  async analyze(topic: Topic, provider: SignalProvider<A>, options: AxisAnalyzeOptions = {}): Promise<AxisResult<A>> {
    const keywords = unique(topic.keywords);
    const measurements = await Promise.all(
      keywords.map(keyword => {
        const task = () => this.measure(topic, keyword, provider, options);
        return options.limit ? options.limit(task) : task();
      }),
    );

    const measured: Array<[string, AxisMetrics[A]]> = [];
    const fallbackKeywords: string[] = [];
    let complete = true;

    keywords.forEach((keyword, i) => {
      const m = measurements[i];
      if (!m || m.status === 'skipped') {
        complete = false;
        return;
      }
      measured.push([keyword, m.metric]);
      if (m.status === 'fallback') fallbackKeywords.push(keyword);
    });

    // fromEntries defines own properties, so "__proto__" stays a keyword
    const perKeyword: Record<string, AxisMetrics[A]> = Object.fromEntries(measured);
    const axisScore = this.scorer(measured.map(([, metric]) => metric), options.weights ?? DEFAULT_WEIGHTS);

    return { axis: this.axis, topicName: topic.name, perKeyword, axisScore, fallbackKeywords, complete };
  }

  private async measure(
    topic: Topic,
    keyword: string,
    provider: SignalProvider<A>,
    options: AxisAnalyzeOptions,
  ): Promise<Measurement<A>> {
    const { signal, fetchTimeoutMs } = options;
    // Queued behind the limiter while the run was cancelled
    if (signal?.aborted) return { status: 'skipped' };

    try {
      const metric = await withDeadline(
        (s) => provider.fetch(keyword, { signal: s }),
        fetchTimeoutMs,
        signal,
        () => new ProviderTimeoutError(provider.name, keyword, fetchTimeoutMs ?? 0),
      );
      return { status: 'measured', metric };
    } catch (err) {
      if (signal?.aborted) return { status: 'skipped' };

      getLogger().warn(
        { provider: provider.name, axis: this.axis, topic: topic.name, keyword, err: errorMessage(err) },
        'Provider failed, using synthetic data',
      );
      return { status: 'fallback', metric: generateSynthetic(keyword, this.axis) };
    }
  }
}
