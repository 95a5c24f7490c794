import { describe, it, expect, vi } from 'vitest';
import { TokenMetaSimulator } from '../src/TokenMetaSimulator.js';
import { TokenEconomy, type TokenEconomyConfig } from '../src/TokenEconomy.js';
import { AgentPool } from '../src/AgentPool.js';
import { EquationOfExchange, priceFunction } from '../src/PriceFunctions.js';
import { StochasticTransactions } from '../src/TransactionModels.js';
import {
  AllRepetitionsFailedError,
  ConfigurationError,
  InconsistentSeriesError,
  InvalidParameterError,
  KeyNotFoundError,
} from '../src/errors.js';
import { silentLogger } from '../src/logger.js';
import { createSampler } from '../src/Sampler.js';
import type { Logger, RepetitionFailure, SamplerFactory } from '../src/types.js';

function economy(overrides: Partial<TokenEconomyConfig> = {}): TokenEconomy {
  return new TokenEconomy({
    token: 'tok',
    initialPrice: 0.03,
    supply: 1_000_000,
    priceFunction: new EquationOfExchange(),
    agentPools: [
      new AgentPool({
        currency: '$',
        users: 1,
        transactions: new StochasticTransactions({
          transactionsPerUser: 1,
          valueDistribution: { kind: 'lognormal', mu: 5, sigma: 0.5 },
          sampleSize: 1,
        }),
      }),
    ],
    logger: silentLogger,
    ...overrides,
  });
}

/** Price equals the repetition's sub-seed, so with base seed 0 repetition i prices at i. */
const seedPrice = priceFunction((_h, ctx) => ctx.sampler.seed, 'seed');

function spyLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('TokenMetaSimulator: execute', () => {
  it('one pool, sampled volume, fixed supply: five length-10 price series', async () => {
    const sim = new TokenMetaSimulator(economy(), { seed: 1, logger: silentLogger });
    const result = await sim.execute(10, 5);

    expect(result.cancelled).toBe(false);
    expect(result.scenarios).toEqual([{ scenario: 'tok', successes: 5, failures: [] }]);
    const prices = sim.getTimeseries('tok_price');
    expect(prices).toHaveLength(5);
    for (const series of prices) {
      expect(series).toHaveLength(10);
      for (const p of series) expect(p).toBeGreaterThanOrEqual(0);
    }
    for (const series of sim.getTimeseries('tok_supply')) {
      expect(series).toEqual(new Array<number>(10).fill(1_000_000));
    }
  });

  it('repetitions differ from one another', async () => {
    const sim = new TokenMetaSimulator(economy(), { seed: 1, logger: silentLogger });
    await sim.execute(5, 2);
    const [a, b] = sim.getTimeseries('tok_price');
    expect(a).not.toEqual(b);
  });

  it('identical seeds reproduce identical aggregates', async () => {
    const first = new TokenMetaSimulator(economy(), { seed: 99, logger: silentLogger });
    const second = new TokenMetaSimulator(economy(), { seed: 99, logger: silentLogger });
    await first.execute(8, 4);
    await second.execute(8, 4);
    expect(second.getTimeseries('tok_price')).toEqual(first.getTimeseries('tok_price'));
    expect(second.getData()).toEqual(first.getData());
  });

  it('running repetitions in another order yields the same trajectories', async () => {
    const sim = new TokenMetaSimulator(economy(), { seed: 123, logger: silentLogger });
    const result = await sim.execute(6, 4);
    const inOrder = sim.getTimeseries('tok_price');
    const reversed = [3, 2, 1, 0].map(rep => sim.runRepetition('tok', 6, rep, result.baseSeed).series['tok_price']);
    expect(reversed.reverse()).toEqual(inOrder);
  });

  it('rejects non-positive or fractional counts before doing any work', async () => {
    const e = economy();
    const reset = vi.spyOn(e, 'reset');
    const sim = new TokenMetaSimulator(e, { logger: silentLogger });
    await expect(sim.execute(0, 1)).rejects.toThrow(InvalidParameterError);
    await expect(sim.execute(1, 0)).rejects.toThrow(InvalidParameterError);
    await expect(sim.execute(1.5, 1)).rejects.toThrow(InvalidParameterError);
    expect(reset).not.toHaveBeenCalled();
  });

  it('surfaces a schedule/iteration mismatch before any repetition runs', async () => {
    const sim = new TokenMetaSimulator(economy({ supply: new Array<number>(9).fill(1000) }), { logger: silentLogger });
    const onRepetition = vi.fn();
    sim.on('repetition', onRepetition);
    await expect(sim.execute(270, 2)).rejects.toThrow(ConfigurationError);
    expect(onRepetition).not.toHaveBeenCalled();
  });

  it('discards numerically failed repetitions and keeps going', async () => {
    const logger = spyLogger();
    const evenFails = priceFunction((_h, ctx) => (ctx.sampler.seed % 2 === 0 ? Number.NaN : 1));
    const sim = new TokenMetaSimulator(economy({ priceFunction: evenFails }), { seed: 0, logger });
    const failures: RepetitionFailure[] = [];
    sim.on('failure', f => failures.push(f));

    const result = await sim.execute(3, 4);
    expect(result.scenarios[0]?.successes).toBe(2);
    expect(failures.map(f => f.repetition)).toEqual([0, 2]);
    expect(failures[0]).toMatchObject({ scenario: 'tok', seed: 0, step: 0, variable: 'tok_price' });
    expect(sim.getTimeseries('tok_price')).toEqual([[1, 1, 1], [1, 1, 1]]);
    expect(sim.getRepetitions().map(r => r.repetition)).toEqual([1, 3]);
    expect(sim.getFailures()).toHaveLength(2);
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  it('fails when every repetition of a scenario fails', async () => {
    const sim = new TokenMetaSimulator(economy({ priceFunction: priceFunction(() => Number.NaN) }), {
      logger: silentLogger,
    });
    const err = await sim.execute(2, 3).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AllRepetitionsFailedError);
    if (err instanceof AllRepetitionsFailedError) {
      expect(err.failures).toBe(3);
      expect(err.repetitions).toBe(3);
      expect(err.scenario).toBe('tok');
    }
  });

  it('reports repetitions whose variable set changes as inconsistent', async () => {
    const e = economy();
    const sim = new TokenMetaSimulator(e, { logger: silentLogger });
    sim.on('repetition', () => {
      e.addAgentPool(new AgentPool({ currency: '$', name: `late${e.agentPools.length}`, users: 1, transactions: 1 }));
    });
    await expect(sim.execute(2, 2)).rejects.toThrow(InconsistentSeriesError);
  });

  it('clears the previous result when a later run fails', async () => {
    let broken = false;
    const e = economy({ priceFunction: priceFunction(() => (broken ? Number.NaN : 1)) });
    const sim = new TokenMetaSimulator(e, { seed: 0, logger: silentLogger });
    await sim.execute(2, 2);
    expect(sim.result?.repetitions).toBe(2);

    broken = true;
    await expect(sim.execute(2, 2)).rejects.toThrow(AllRepetitionsFailedError);
    expect(sim.result).toBeNull();
  });
});

describe('TokenMetaSimulator: cancellation and events', () => {
  it('stops between repetitions and keeps what finished', async () => {
    const controller = new AbortController();
    const sim = new TokenMetaSimulator(economy(), { seed: 3, logger: silentLogger });
    sim.on('repetition', () => controller.abort());
    const result = await sim.execute(4, 10, { signal: controller.signal });
    expect(result.cancelled).toBe(true);
    expect(result.scenarios[0]?.successes).toBe(1);
    expect(sim.getTimeseries('tok_price')).toHaveLength(1);
  });

  it('returns an empty cancelled result for an already-aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    const sim = new TokenMetaSimulator(economy(), { logger: silentLogger });
    const result = await sim.execute(4, 3, { signal: controller.signal });
    expect(result.cancelled).toBe(true);
    expect(result.scenarios[0]?.successes).toBe(0);
  });

  it('refuses a second execute while one is running', async () => {
    const sim = new TokenMetaSimulator(economy(), { logger: silentLogger });
    const running = sim.execute(2, 3);
    expect(sim.isRunning).toBe(true);
    await expect(sim.execute(2, 3)).rejects.toThrow(InvalidParameterError);
    await running;
    expect(sim.isRunning).toBe(false);
  });

  it('emits repetition and complete events', async () => {
    const sim = new TokenMetaSimulator(economy(), { seed: 5, logger: silentLogger });
    const reps: number[] = [];
    const complete = vi.fn();
    sim.on('repetition', r => reps.push(r.repetition)).on('complete', complete);
    const result = await sim.execute(2, 3);
    expect(reps).toEqual([0, 1, 2]);
    expect(complete).toHaveBeenCalledWith(result);
    expect(sim.result).toBe(result);
  });

  it('a throwing handler does not stop the run or later handlers', async () => {
    const logger = spyLogger();
    const sim = new TokenMetaSimulator(economy(), { logger });
    const second = vi.fn();
    sim.on('repetition', () => {
      throw new Error('boom');
    });
    sim.on('repetition', second);
    await sim.execute(1, 2);
    expect(second).toHaveBeenCalledTimes(2);
    expect(logger.error).toHaveBeenCalledTimes(2);
  });

  it('off removes a handler', async () => {
    const sim = new TokenMetaSimulator(economy(), { logger: silentLogger });
    const handler = vi.fn();
    sim.on('repetition', handler).off('repetition', handler);
    await sim.execute(1, 1);
    expect(handler).not.toHaveBeenCalled();
  });
});

describe('TokenMetaSimulator: queries', () => {
  async function seeded(): Promise<TokenMetaSimulator> {
    const sim = new TokenMetaSimulator(economy({ priceFunction: seedPrice }), { seed: 0, logger: silentLogger });
    await sim.execute(3, 4);
    return sim;
  }

  it('getSummary bands each step across repetitions', async () => {
    const sim = await seeded();
    const bands = sim.getSummary('tok_price');
    expect(bands).toHaveLength(3);
    const first = bands[0];
    expect(first?.step).toBe(0);
    expect(first?.mean).toBe(1.5);
    expect(first?.median).toBe(1.5);
    expect(first?.min).toBe(0);
    expect(first?.max).toBe(3);
    expect(first?.p10).toBeCloseTo(0.3, 12);
    expect(first?.p90).toBeCloseTo(2.7, 12);
  });

  it('getReport summarizes per-repetition averages', async () => {
    const sim = await seeded();
    const [report] = sim.getReport({ variables: ['tok_price'], from: 1 });
    expect(report).toMatchObject({ variable: 'tok_price', scenario: 'tok', mean: 1.5, min: 0, max: 3 });
    expect(() => sim.getReport({ from: 2, to: 1 })).toThrow(InvalidParameterError);
  });

  it('getData returns one row per scenario, repetition and step', async () => {
    const sim = await seeded();
    const rows = sim.getData();
    expect(rows).toHaveLength(12);
    expect(rows[5]).toMatchObject({ scenario: 'tok', repetition: 1, step: 2, tok_price: 1, tok_supply: 1_000_000 });
  });

  it('throws KeyNotFoundError for unknown variables and scenarios', async () => {
    const sim = await seeded();
    expect(() => sim.getTimeseries('nope')).toThrow(KeyNotFoundError);
    expect(() => sim.getTimeseries('tok_price', 'other')).toThrow(KeyNotFoundError);
    expect(() => sim.runRepetition('other', 1, 0)).toThrow(KeyNotFoundError);
  });

  it('has nothing to report before execute', () => {
    const sim = new TokenMetaSimulator(economy(), { logger: silentLogger });
    expect(() => sim.getTimeseries('tok_price')).toThrow(KeyNotFoundError);
    expect(sim.getData()).toEqual([]);
    expect(sim.result).toBeNull();
  });
});

describe('TokenMetaSimulator: scenarios', () => {
  it('runs every named scenario with common random numbers', async () => {
    const sim = new TokenMetaSimulator(
      { low: economy({ priceFunction: seedPrice }), high: economy({ priceFunction: seedPrice, initialPrice: 1 }) },
      { seed: 0, logger: silentLogger },
    );
    expect(sim.scenarioNames).toEqual(['low', 'high']);
    const result = await sim.execute(2, 2);
    expect(result.scenarios.map(s => s.scenario)).toEqual(['low', 'high']);
    expect(sim.getTimeseries('tok_price', 'high')).toEqual(sim.getTimeseries('tok_price', 'low'));
    expect(Object.keys(sim.toJSON())).toEqual(['low', 'high']);
  });

  it('names array scenarios after their economies and rejects duplicates', () => {
    const a = economy({ name: 'a' });
    expect(new TokenMetaSimulator([a, economy({ name: 'b' })]).scenarioNames).toEqual(['a', 'b']);
    expect(() => new TokenMetaSimulator([a, economy({ name: 'a' })])).toThrow(InvalidParameterError);
    expect(() => new TokenMetaSimulator([])).toThrow(InvalidParameterError);
  });
});

// ── Samplers ────────────────────────────────────────────────────────────────

describe('TokenMetaSimulator: samplers', () => {
  function countingFactory(seeds: number[]): SamplerFactory {
    return (seed) => {
      seeds.push(seed);
      return createSampler(seed);
    };
  }

  it("builds each repetition's sampler through the economy's own factory", async () => {
    const seeds: number[] = [];
    const sim = new TokenMetaSimulator(economy({ samplerFactory: countingFactory(seeds), seed: 5 }), {
      seed: 0,
      logger: silentLogger,
    });
    seeds.length = 0;
    await sim.execute(2, 3);
    // pre-run reset with the economy's seed, then repetition sub-seeds 0, 1, 2
    expect(seeds).toEqual([5, 0, 1, 2]);
  });

  it('a simulator factory overrides the economy factory for repetitions', async () => {
    const seeds: number[] = [];
    const simFactory = vi.fn(createSampler);
    const sim = new TokenMetaSimulator(economy({ samplerFactory: countingFactory(seeds), seed: 5 }), {
      seed: 0,
      samplerFactory: simFactory,
      logger: silentLogger,
    });
    seeds.length = 0;
    await sim.execute(2, 2);
    expect(seeds).toEqual([5]);
    expect(simFactory.mock.calls).toEqual([[0], [1]]);
  });
});
