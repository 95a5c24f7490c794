import { describe, it, expect } from 'vitest';
import {
  ConstantTransactions,
  LinearTransactions,
  MarketCapTransactions,
  StochasticTransactions,
  TransactionsFromData,
  TrendTransactions,
  toTransactionModel,
} from '../src/TransactionModels.js';
import { ConfigurationError } from '../src/errors.js';
import { makePoolContext, scriptedSampler } from './helpers.js';

describe('TransactionModels: deterministic', () => {
  it('ConstantTransactions scales with users unless told not to', () => {
    expect(new ConstantTransactions(2).nextVolume(makePoolContext(10))).toBe(20);
    expect(new ConstantTransactions(2, { ignoreUsers: true }).nextVolume(makePoolContext(10))).toBe(2);
    expect(() => new ConstantTransactions(Number.NaN)).toThrow(ConfigurationError);
  });

  it('TransactionsFromData reads per-user data and repeats the last entry', () => {
    const tx = new TransactionsFromData([1, 2]);
    expect(tx.nextVolume(makePoolContext(10, 1))).toBe(20);
    expect(tx.nextVolume(makePoolContext(10, 5))).toBe(20);
    expect(new TransactionsFromData([1, 2], { perUser: false }).nextVolume(makePoolContext(10, 0))).toBe(1);
  });

  it('TransactionsFromData without repeatLast fails past the end', () => {
    const tx = new TransactionsFromData([1, 2], { repeatLast: false });
    expect(() => tx.nextVolume(makePoolContext(10, 2))).toThrow(ConfigurationError);
  });

  it('TrendTransactions multiplies users by a spaced average', () => {
    const tx = new TrendTransactions({ initial: 1, final: 3, steps: 3 });
    expect(tx.averages).toEqual([1, 2, 3]);
    expect(tx.nextVolume(makePoolContext(10, 1))).toBe(20);
    expect(tx.nextVolume(makePoolContext(10, 7))).toBe(30);
  });

  it('LinearTransactions ignores users', () => {
    expect(new LinearTransactions(100, 10).nextVolume(makePoolContext(999, 3))).toBe(130);
  });
});

describe('TransactionModels: stochastic', () => {
  it('uses every user when activity is 1 and fixed per-user values', () => {
    const tx = new StochasticTransactions({ transactionsPerUser: 2, valuePerTransaction: 5 });
    expect(tx.nextVolume(makePoolContext(10, 0, { sampler: scriptedSampler([]) }))).toBe(100);
  });

  it('draws active users from a binomial when activity is below 1', () => {
    const tx = new StochasticTransactions({ activity: 0.5, transactionsPerUser: 2, valuePerTransaction: 5 });
    expect(tx.nextVolume(makePoolContext(10, 0, { sampler: scriptedSampler([4]) }))).toBe(40);
  });

  it('averages sampleSize draws for the value per transaction', () => {
    const tx = new StochasticTransactions({
      transactionsPerUser: 2,
      valueDistribution: { kind: 'normal', mean: 4, std: 1 },
      sampleSize: 2,
    });
    expect(tx.nextVolume(makePoolContext(10, 0, { sampler: scriptedSampler([3, 5]) }))).toBe(80);
  });

  it('applies the sign policy', () => {
    const base = { transactionsPerUser: 2, valueDistribution: { kind: 'normal', mean: 0, std: 1 } as const, sampleSize: 1 };
    const ctx = (v: number) => makePoolContext(10, 0, { sampler: scriptedSampler([v]) });
    expect(new StochasticTransactions({ ...base }).nextVolume(ctx(-4))).toBe(0);
    expect(new StochasticTransactions({ ...base, sign: 'negative' }).nextVolume(ctx(4))).toBe(0);
    expect(new StochasticTransactions({ ...base, sign: 'mixed' }).nextVolume(ctx(-4))).toBe(-80);
  });

  it('rejects incomplete or inconsistent parameters', () => {
    expect(() => new StochasticTransactions({ valuePerTransaction: 1 })).toThrow(ConfigurationError);
    expect(() => new StochasticTransactions({ transactionsPerUser: 1 })).toThrow(ConfigurationError);
    expect(
      () => new StochasticTransactions({ activity: 1.5, transactionsPerUser: 1, valuePerTransaction: 1 }),
    ).toThrow(ConfigurationError);
    const d = { kind: 'constant', value: 1 } as const;
    expect(
      () => new StochasticTransactions({ activity: [0.5, 0.5], transactionsPerUser: 1, valueDistribution: [d, d, d] }),
    ).toThrow('Per-step parameter lists must share one length, got 2, 3');
  });

  it('MarketCapTransactions trades a fraction of market cap, or of supply for token pools', () => {
    const state = { price: 2, supply: 1000 };
    const fiat = new MarketCapTransactions().nextVolume(
      makePoolContext(1, 0, { state, sampler: scriptedSampler([0.1]) }),
    );
    expect(fiat).toBeCloseTo(200, 9);
    const token = new MarketCapTransactions().nextVolume(
      makePoolContext(1, 0, { state, currency: 'tok', sampler: scriptedSampler([0.1]) }),
    );
    expect(token).toBeCloseTo(100, 9);
    const positive = new MarketCapTransactions({ sign: 'positive' }).nextVolume(
      makePoolContext(1, 0, { state, sampler: scriptedSampler([-0.1]) }),
    );
    expect(positive).toBeCloseTo(200, 9);
  });

  it('toTransactionModel normalizes shorthand forms', () => {
    expect(toTransactionModel(3)).toBeInstanceOf(ConstantTransactions);
    expect(toTransactionModel([1, 2])).toBeInstanceOf(TransactionsFromData);
  });
});
