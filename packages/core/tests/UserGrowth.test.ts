import { describe, it, expect } from 'vitest';
import {
  ConstantUsers,
  LogisticUsers,
  SpacedUsers,
  StochasticUsers,
  UsersFromData,
  toUserGrowth,
} from '../src/UserGrowth.js';
import { RandomNoise } from '../src/AddOns.js';
import { ConfigurationError } from '../src/errors.js';
import { makeContext, scriptedSampler } from './helpers.js';

describe('UserGrowth: deterministic models', () => {
  it('ConstantUsers rounds to whole users', () => {
    expect(new ConstantUsers(10.4).nextUsers(makeContext())).toBe(10);
    expect(() => new ConstantUsers(-1)).toThrow(ConfigurationError);
  });

  it('never reports fewer than zero users after add-ons', () => {
    const users = new ConstantUsers(10, [new RandomNoise()]);
    expect(users.nextUsers(makeContext(0, { sampler: scriptedSampler([-20]) }))).toBe(0);
  });

  it('UsersFromData repeats the last value past the end', () => {
    const users = new UsersFromData([1, 2, 3]);
    expect([0, 1, 2, 5].map(s => users.nextUsers(makeContext(s)))).toEqual([1, 2, 3, 3]);
    expect(() => new UsersFromData([])).toThrow(ConfigurationError);
  });

  it('SpacedUsers pre-computes a curve and holds the final value', () => {
    const users = new SpacedUsers({ initial: 0, final: 100, steps: 5 });
    expect(users.curve).toEqual([0, 25, 50, 75, 100]);
    expect(users.nextUsers(makeContext(9))).toBe(100);
  });

  it('SpacedUsers can emit step-to-step growth', () => {
    const users = new SpacedUsers({ initial: 10, final: 50, steps: 5, useDifference: true });
    expect(users.curve).toEqual([10, 10, 10, 10, 10]);
  });

  it('SpacedUsers rejects a non-positive step count', () => {
    expect(() => new SpacedUsers({ initial: 0, final: 10, steps: 0 })).toThrow(ConfigurationError);
  });

  it('LogisticUsers grows towards capacity', () => {
    const users = new LogisticUsers({ initial: 10, rate: 0.5, capacity: 100 });
    // 10 → 14.5 → 20.69875
    expect([0, 1, 2].map(s => users.nextUsers(makeContext(s)))).toEqual([10, 15, 21]);
    users.reset();
    expect(users.nextUsers(makeContext(0))).toBe(10);
  });
});

describe('UserGrowth: stochastic', () => {
  it('replaces the user base with each draw by default', () => {
    const users = new StochasticUsers({ distribution: { kind: 'poisson', mean: 3 } });
    const sampler = scriptedSampler([3, 4]);
    expect([0, 1].map(s => users.nextUsers(makeContext(s, { sampler })))).toEqual([3, 4]);
  });

  it('adds draws to the user base when asked', () => {
    const users = new StochasticUsers({ distribution: { kind: 'poisson', mean: 3 }, addToUserbase: true, initial: 10 });
    const sampler = scriptedSampler([3, 4, 6]);
    expect([0, 1].map(s => users.nextUsers(makeContext(s, { sampler })))).toEqual([13, 17]);
    users.reset();
    expect(users.nextUsers(makeContext(0, { sampler }))).toBe(16);
  });

  it('validates every scheduled distribution', () => {
    expect(() => new StochasticUsers({ distribution: [] })).toThrow(ConfigurationError);
    expect(
      () => new StochasticUsers({ distribution: [{ kind: 'poisson', mean: 1 }, { kind: 'poisson', mean: -1 }] }),
    ).toThrow(ConfigurationError);
  });
});

describe('toUserGrowth', () => {
  it('normalizes shorthand forms', () => {
    expect(toUserGrowth(5)).toBeInstanceOf(ConstantUsers);
    expect(toUserGrowth([1, 2])).toBeInstanceOf(UsersFromData);
    const model = new ConstantUsers(1);
    expect(toUserGrowth(model)).toBe(model);
  });
});
