import { generateSynthetic } from '../synthetic.js';
import { AbortError } from '../../errors.js';
import { SYNTHETIC_SOURCE, type Axis, type AxisMetrics, type FetchOptions, type SignalProvider } from '../types.js';

/** Provider used for an axis that has no live data source configured. */
export class SyntheticProvider<A extends Axis> implements SignalProvider<A> {
  readonly name = SYNTHETIC_SOURCE;

  constructor(readonly axis: A) {}

  async fetch(keyword: string, options: FetchOptions = {}): Promise<AxisMetrics[A]> {
    if (options.signal?.aborted) throw new AbortError();
    return generateSynthetic(keyword, this.axis);
  }
}
