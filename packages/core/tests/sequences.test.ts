import { describe, it, expect } from 'vitest';
import {
  differences,
  distributionSequence,
  geomspace,
  harmonizeSequence,
  linspace,
  logSaturatedSpace,
  logisticSaturatedSpace,
  logspace,
  mergeSequences,
  space,
} from '../src/sequences.js';
import { ConfigurationError } from '../src/errors.js';

describe('sequences: spacing', () => {
  it('linspace includes both endpoints', () => {
    expect(linspace(0, 10, 5)).toEqual([0, 2.5, 5, 7.5, 10]);
    expect(linspace(3, 9, 1)).toEqual([3]);
    expect(linspace(3, 9, 0)).toEqual([]);
  });

  it('logspace raises the base to evenly spaced exponents', () => {
    expect(logspace(0, 2, 3)).toEqual([1, 10, 100]);
  });

  it('geomspace keeps a constant ratio and the sign of its endpoints', () => {
    const up = geomspace(1, 1000, 4);
    [1, 10, 100, 1000].forEach((v, i) => expect(up[i]).toBeCloseTo(v, 9));
    const down = geomspace(-1, -100, 3);
    [-1, -10, -100].forEach((v, i) => expect(down[i]).toBeCloseTo(v, 9));
  });

  it('geomspace rejects zero or sign-crossing endpoints', () => {
    expect(() => geomspace(0, 5, 3)).toThrow(ConfigurationError);
    expect(() => geomspace(-1, 5, 3)).toThrow(ConfigurationError);
  });

  it('logSaturatedSpace climbs fast then flattens towards stop + start', () => {
    const s = logSaturatedSpace(1, 10, 4);
    expect(s[0]).toBe(0);
    expect(s[3]).toBeCloseTo(11, 9);
    const firstJump = (s[1] ?? 0) - (s[0] ?? 0);
    const lastJump = (s[3] ?? 0) - (s[2] ?? 0);
    expect(firstJump).toBeGreaterThan(lastJump);
    expect(() => logSaturatedSpace(0, 10, 4)).toThrow(ConfigurationError);
  });

  it('logisticSaturatedSpace is increasing and ends at stop + start', () => {
    const s = logisticSaturatedSpace(10, 100, 20);
    for (let i = 1; i < s.length; i++) expect(s[i] ?? 0).toBeGreaterThan(s[i - 1] ?? 0);
    expect(s[19]).toBeCloseTo(110, 9);
  });

  it('space dispatches on the spacing kind', () => {
    expect(space('linear', 0, 4, 3)).toEqual([0, 2, 4]);
    expect(space('log', 0, 1, 2)).toEqual([1, 10]);
  });
});

describe('sequences: helpers', () => {
  it('differences keeps the first element then takes successive deltas', () => {
    expect(differences([1, 3, 6])).toEqual([1, 2, 3]);
    expect(differences([])).toEqual([]);
  });

  it('distributionSequence centres one distribution on each value', () => {
    expect(distributionSequence([10, -20], 'uniform', 0.5)).toEqual([
      { kind: 'uniform', min: 5, max: 15 },
      { kind: 'uniform', min: -30, max: -10 },
    ]);
    expect(distributionSequence([4, -3], 'poisson')).toEqual([
      { kind: 'poisson', mean: 4 },
      { kind: 'poisson', mean: 0 },
    ]);
    expect(distributionSequence([8], 'normal', 0.25)).toEqual([{ kind: 'normal', mean: 8, std: 2 }]);
  });

  it('harmonizeSequence pads with the last entry or truncates', () => {
    expect(harmonizeSequence([1, 2], 4)).toEqual([1, 2, 2, 2]);
    expect(harmonizeSequence([1, 2, 3], 2)).toEqual([1, 2]);
    expect(() => harmonizeSequence([], 3)).toThrow(ConfigurationError);
  });

  it('mergeSequences concatenates', () => {
    expect(mergeSequences([1], [2, 3], [])).toEqual([1, 2, 3]);
  });
});
