import pLimit, { type LimitFunction } from 'p-limit';
import { FatalConfigurationError } from './errors';

/**
 * Bounded worker pool shared by the discovery, validation and parsing
 * fan-outs of one run. Owned by the orchestrator and handed to each stage.
 *
 * Tasks are expected to catch their own failures; a rejected task rejects
 * the whole `map` call.
 */
export class WorkerPool {
  private readonly limit: LimitFunction;

  constructor(readonly width: number) {
    if (!Number.isInteger(width) || width < 1) {
      throw new FatalConfigurationError(`Worker pool width must be a positive integer, got ${width}`);
    }
    this.limit = pLimit(width);
  }

  /** Run `worker` over every input; results keep input order. */
  map<I, O>(inputs: readonly I[], worker: (input: I, index: number) => Promise<O>): Promise<O[]> {
    return Promise.all(inputs.map((input, index) => this.limit(() => worker(input, index))));
  }
}
