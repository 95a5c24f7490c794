// Value transforms applied after a component produces a number.
// Used on economy variables (price, supply, ...) and inside growth and transaction models.

import type { AddOn, Distribution, StepContext } from './types.js';
import { ConfigurationError } from './errors.js';
import { assertDistribution } from './Sampler.js';

/** value + draw */
export class RandomNoise implements AddOn {
  readonly name = 'randomNoise';

  constructor(private readonly distribution: Distribution = { kind: 'normal', mean: 0, std: 1 }) {
    assertDistribution(distribution, 'RandomNoise');
  }

  apply(value: number, ctx: StepContext): number {
    return value + ctx.sampler.draw(this.distribution);
  }
}

/**
 * Gaussian noise whose spread follows the input: value + N(mean, |value| / divisor).
 * Larger values swing harder.
 */
export class ProportionalNoise implements AddOn {
  readonly name = 'proportionalNoise';

  constructor(private readonly options: { mean?: number; divisor?: number } = {}) {
    if (options.divisor !== undefined && !(options.divisor > 0)) {
      throw new ConfigurationError(`ProportionalNoise divisor must be > 0, got ${options.divisor}`);
    }
  }

  apply(value: number, ctx: StepContext): number {
    const divisor = this.options.divisor ?? 5;
    return value + ctx.sampler.draw({
      kind: 'normal',
      mean: this.options.mean ?? 0,
      std: Math.abs(value) / divisor,
    });
  }
}

/** Removes a random fraction of the value; the fraction is clamped to [0, 1]. */
export class RandomReduction implements AddOn {
  readonly name = 'randomReduction';

  constructor(private readonly distribution: Distribution = { kind: 'uniform', min: 0, max: 1 }) {
    assertDistribution(distribution, 'RandomReduction');
  }

  apply(value: number, ctx: StepContext): number {
    const fraction = Math.min(1, Math.max(0, ctx.sampler.draw(this.distribution)));
    return value * (1 - fraction);
  }
}

/** Multiplies the value while `from <= step <= to`. */
export class TimedMultiplier implements AddOn {
  readonly name = 'timedMultiplier';

  constructor(
    private readonly multiplier: number,
    private readonly window: { from: number; to: number },
  ) {
    if (window.to < window.from) {
      throw new ConfigurationError(`TimedMultiplier window [${window.from}, ${window.to}] is empty`);
    }
  }

  apply(value: number, ctx: StepContext): number {
    return ctx.step >= this.window.from && ctx.step <= this.window.to ? value * this.multiplier : value;
  }
}

export type ConditionPredicate = (values: number[], ctx: StepContext) => boolean;

/**
 * Applies `inner` only when `predicate` holds over the latest recorded values of `variables`.
 * A variable with nothing recorded yet reads as NaN.
 */
export class ConditionalAddOn implements AddOn {
  readonly name: string;

  constructor(
    private readonly inner: AddOn,
    private readonly variables: string[],
    private readonly predicate: ConditionPredicate,
  ) {
    this.name = `conditional(${inner.name ?? 'addOn'})`;
  }

  apply(value: number, ctx: StepContext): number {
    const values = this.variables.map(v => ctx.history.latest(v) ?? NaN);
    return this.predicate(values, ctx) ? this.inner.apply(value, ctx) : value;
  }

  reset(): void {
    this.inner.reset?.();
  }
}

/** Wraps a plain function as an AddOn. */
export function addOn(fn: (value: number, ctx: StepContext) => number, name = 'custom'): AddOn {
  return { name, apply: fn };
}

/** Runs `value` through each add-on in order. */
export function applyAddOns(addOns: readonly AddOn[], value: number, ctx: StepContext): number {
  let v = value;
  for (const a of addOns) v = a.apply(v, ctx);
  return v;
}

export function resetAddOns(addOns: readonly AddOn[]): void {
  for (const a of addOns) a.reset?.();
}
