// Holding time: how long a token is held before it circulates again (units of the economy's time step).
// Feeds velocity in the pricing functions.

import type { AddOn, DistributionSchedule, HoldingTimeModel, StepContext } from './types.js';
import { ConfigurationError } from './errors.js';
import { applyAddOns, resetAddOns } from './AddOns.js';
import { assertDistribution, distributionAt } from './Sampler.js';
import { clamp } from './utils.js';

export class ConstantHoldingTime implements HoldingTimeModel {
  constructor(readonly value: number) {
    if (!(value > 0)) throw new ConfigurationError(`Holding time must be > 0, got ${value}`);
  }

  nextHoldingTime(): number {
    return this.value;
  }

  reset(): void {}
}

export class StochasticHoldingTime implements HoldingTimeModel {
  private readonly distribution: DistributionSchedule;
  private readonly minimum: number;

  constructor(options: { distribution?: DistributionSchedule; minimum?: number } = {}) {
    this.distribution = options.distribution ?? { kind: 'lognormal', mu: 0, sigma: 1 };
    this.minimum = options.minimum ?? 0.1;
    const list = Array.isArray(this.distribution) ? this.distribution : [this.distribution];
    if (list.length === 0) throw new ConfigurationError('StochasticHoldingTime needs a distribution');
    list.forEach((d, i) => assertDistribution(d, `StochasticHoldingTime.distribution[${i}]`));
  }

  nextHoldingTime(ctx: StepContext): number {
    return Math.max(this.minimum, ctx.sampler.draw(distributionAt(this.distribution, ctx.step)));
  }

  reset(): void {}
}

export interface AdaptiveHoldingTimeOptions {
  /** Used while the economy has no volume to infer from. */
  initial: number;
  minimum?: number;
  maximum?: number;
  addOns?: readonly AddOn[];
}

/**
 * Infers holding time from the settled step: new price × token volume / fiat volume,
 * clamped to [minimum, maximum]. Token volume was bought at the previous price, so the
 * value tracks the step's price ratio and takes effect on the next step.
 * Defaults assume a monthly step (at most a year).
 */
export class AdaptiveHoldingTime implements HoldingTimeModel {
  private readonly minimum: number;
  private readonly maximum: number;
  private current: number;

  constructor(private readonly options: AdaptiveHoldingTimeOptions) {
    if (!(options.initial > 0)) {
      throw new ConfigurationError(`AdaptiveHoldingTime initial must be > 0, got ${options.initial}`);
    }
    this.minimum = options.minimum ?? 0.01;
    this.maximum = options.maximum ?? 12;
    if (this.maximum < this.minimum) {
      throw new ConfigurationError(`AdaptiveHoldingTime maximum ${this.maximum} is below minimum ${this.minimum}`);
    }
    this.current = options.initial;
  }

  nextHoldingTime(): number {
    return this.current;
  }

  observe(ctx: StepContext): void {
    const { price, tokenVolume, fiatVolume } = ctx.state;
    if (tokenVolume === 0 && fiatVolume === 0) return;
    const inferred = (price * tokenVolume) / (fiatVolume + 1e-9);
    const adjusted = applyAddOns(this.options.addOns ?? [], inferred, ctx);
    // noise that would push the value to zero or below is ignored
    const value = adjusted > 0 ? adjusted : inferred;
    this.current = clamp(value, this.minimum, this.maximum);
  }

  reset(): void {
    this.current = this.options.initial;
    resetAddOns(this.options.addOns ?? []);
  }
}

export function toHoldingTimeModel(holdingTime: HoldingTimeModel | number): HoldingTimeModel {
  return typeof holdingTime === 'number' ? new ConstantHoldingTime(holdingTime) : holdingTime;
}
