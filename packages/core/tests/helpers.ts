import { HistoryTable } from '../src/HistoryTable.js';
import { createSampler } from '../src/Sampler.js';
import { silentLogger } from '../src/logger.js';
import type { EconomyState, PoolStepContext, Sampler, StepContext } from '../src/types.js';

export function makeState(overrides: Partial<EconomyState> = {}): EconomyState {
  return {
    token: 'tok',
    fiat: '$',
    unitOfTime: 'day',
    price: 1,
    supply: 1000,
    holdingTime: 1,
    users: 0,
    fiatVolume: 0,
    tokenVolume: 0,
    ...overrides,
  };
}

export interface ContextOptions {
  state?: Partial<EconomyState>;
  sampler?: Sampler;
  history?: HistoryTable;
  iterations?: number;
}

export function makeContext(step = 0, options: ContextOptions = {}): StepContext {
  return {
    step,
    iterations: options.iterations,
    sampler: options.sampler ?? createSampler(42),
    history: options.history ?? new HistoryTable(),
    state: makeState(options.state),
    logger: silentLogger,
  };
}

export function makePoolContext(
  users: number,
  step = 0,
  options: ContextOptions & { currency?: string } = {},
): PoolStepContext {
  const currency = options.currency ?? '$';
  return {
    ...makeContext(step, options),
    pool: { name: currency, currency, users },
  };
}

/** Sampler that returns queued values in order, whatever distribution is asked for. */
export function scriptedSampler(values: number[], seed = 0): Sampler {
  const queue = [...values];
  const next = (): number => {
    const v = queue.shift();
    if (v === undefined) throw new Error('scripted sampler exhausted');
    return v;
  };
  return {
    seed,
    random: next,
    draw: () => next(),
    sample: (_d, count) => Array.from({ length: count }, next),
  };
}
