// Seeded sampler backed by d3-random. All generators of one sampler share a single
// LCG source, so a seed fixes the entire sequence of draws.

import {
  randomLcg,
  randomUniform,
  randomNormal,
  randomLogNormal,
  randomExponential,
  randomGamma,
  randomBeta,
  randomPoisson,
  randomBinomial,
  randomBernoulli,
} from 'd3-random';
import type { Distribution, DistributionSchedule, Sampler, SamplerFactory } from './types.js';
import { ConfigurationError } from './errors.js';

const UINT32 = 2 ** 32;

/** Maps a base seed and a repetition index to the repetition's sub-seed. */
export function deriveSeed(baseSeed: number, repetition: number): number {
  return (baseSeed ^ repetition) >>> 0;
}

/** Fresh unsigned 32-bit seed for runs that were not given one. */
export function randomSeed(): number {
  return Math.floor(Math.random() * UINT32) >>> 0;
}

export function createSampler(seed: number = randomSeed()): Sampler {
  const source = randomLcg(seed);

  const generator = (d: Distribution): (() => number) => {
    switch (d.kind) {
      case 'constant': {
        const value = d.value;
        return () => value;
      }
      case 'uniform':
        return randomUniform.source(source)(d.min, d.max);
      case 'normal':
        return randomNormal.source(source)(d.mean, d.std);
      case 'lognormal': {
        const g = randomLogNormal.source(source)(d.mu, d.sigma);
        const loc = d.loc ?? 0;
        return () => loc + g();
      }
      case 'exponential':
        return randomExponential.source(source)(d.rate);
      case 'gamma':
        return randomGamma.source(source)(d.shape, d.scale);
      case 'beta':
        return randomBeta.source(source)(d.alpha, d.beta);
      case 'poisson':
        return randomPoisson.source(source)(d.mean);
      case 'binomial': {
        // no trials, nothing to draw
        if (d.trials <= 0) return () => 0;
        return randomBinomial.source(source)(Math.floor(d.trials), d.p);
      }
      case 'bernoulli':
        return randomBernoulli.source(source)(d.p);
      case 'studentT': {
        // t = Z / sqrt(X / df), X ~ chi-squared(df) = gamma(df/2, 2)
        const z = randomNormal.source(source)(0, 1);
        const chi2 = randomGamma.source(source)(d.df / 2, 2);
        const loc = d.loc ?? 0;
        const scale = d.scale ?? 1;
        const df = d.df;
        return () => loc + scale * (z() / Math.sqrt(chi2() / df));
      }
    }
  };

  return {
    seed,
    random: source,
    draw(distribution) {
      return generator(distribution)();
    },
    sample(distribution, count) {
      const g = generator(distribution);
      const out: number[] = new Array<number>(count);
      for (let i = 0; i < count; i++) out[i] = g();
      return out;
    },
  };
}

export const defaultSamplerFactory: SamplerFactory = createSampler;

/** Expected value of a distribution. */
export function distributionMean(d: Distribution): number {
  switch (d.kind) {
    case 'constant': return d.value;
    case 'uniform': return (d.min + d.max) / 2;
    case 'normal': return d.mean;
    case 'lognormal': return (d.loc ?? 0) + Math.exp(d.mu + (d.sigma * d.sigma) / 2);
    case 'exponential': return 1 / d.rate;
    case 'gamma': return d.shape * d.scale;
    case 'beta': return d.alpha / (d.alpha + d.beta);
    case 'poisson': return d.mean;
    case 'binomial': return d.trials * d.p;
    case 'bernoulli': return d.p;
    case 'studentT': return d.df > 1 ? (d.loc ?? 0) : NaN;
  }
}

/** Distribution for `step` out of a fixed or per-step schedule. */
export function distributionAt(schedule: DistributionSchedule, step: number): Distribution {
  if (!Array.isArray(schedule)) return schedule;
  const d = schedule[Math.min(step, schedule.length - 1)];
  if (!d) throw new ConfigurationError('Distribution schedule is empty');
  return d;
}

/** Throws ConfigurationError when a descriptor's parameters are out of range. */
export function assertDistribution(d: Distribution, label: string): void {
  const fail = (msg: string): never => {
    throw new ConfigurationError(`${label}: ${msg}`);
  };
  const finite = (v: number, name: string): void => {
    if (!Number.isFinite(v)) fail(`${d.kind}.${name} must be finite, got ${String(v)}`);
  };
  switch (d.kind) {
    case 'constant':
      finite(d.value, 'value');
      break;
    case 'uniform':
      finite(d.min, 'min');
      finite(d.max, 'max');
      if (d.max < d.min) fail('uniform.max must be >= min');
      break;
    case 'normal':
      finite(d.mean, 'mean');
      finite(d.std, 'std');
      if (d.std < 0) fail('normal.std must be >= 0');
      break;
    case 'lognormal':
      finite(d.mu, 'mu');
      finite(d.sigma, 'sigma');
      if (d.sigma < 0) fail('lognormal.sigma must be >= 0');
      break;
    case 'exponential':
      if (!(d.rate > 0)) fail('exponential.rate must be > 0');
      break;
    case 'gamma':
      if (!(d.shape > 0) || !(d.scale > 0)) fail('gamma.shape and gamma.scale must be > 0');
      break;
    case 'beta':
      if (!(d.alpha > 0) || !(d.beta > 0)) fail('beta.alpha and beta.beta must be > 0');
      break;
    case 'poisson':
      if (!(d.mean >= 0)) fail('poisson.mean must be >= 0');
      break;
    case 'binomial':
      if (!(d.trials >= 0) || !(d.p >= 0 && d.p <= 1)) fail('binomial needs trials >= 0 and p in [0, 1]');
      break;
    case 'bernoulli':
      if (!(d.p >= 0 && d.p <= 1)) fail('bernoulli.p must be in [0, 1]');
      break;
    case 'studentT':
      if (!(d.df > 0)) fail('studentT.df must be > 0');
      break;
  }
}
