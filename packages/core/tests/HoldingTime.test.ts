import { describe, it, expect } from 'vitest';
import {
  AdaptiveHoldingTime,
  ConstantHoldingTime,
  StochasticHoldingTime,
  toHoldingTimeModel,
} from '../src/HoldingTime.js';
import { addOn } from '../src/AddOns.js';
import { ConfigurationError } from '../src/errors.js';
import { makeContext, scriptedSampler } from './helpers.js';

describe('HoldingTime', () => {
  it('ConstantHoldingTime returns its value and rejects non-positive ones', () => {
    expect(new ConstantHoldingTime(2).nextHoldingTime()).toBe(2);
    expect(() => new ConstantHoldingTime(0)).toThrow(ConfigurationError);
  });

  it('StochasticHoldingTime floors draws at the minimum', () => {
    const h = new StochasticHoldingTime();
    expect(h.nextHoldingTime(makeContext(0, { sampler: scriptedSampler([0.05]) }))).toBe(0.1);
    expect(h.nextHoldingTime(makeContext(0, { sampler: scriptedSampler([3]) }))).toBe(3);
    expect(() => new StochasticHoldingTime({ distribution: [] })).toThrow(ConfigurationError);
  });

  it('AdaptiveHoldingTime holds its initial value until a step with volume is observed', () => {
    const h = new AdaptiveHoldingTime({ initial: 2 });
    expect(h.nextHoldingTime()).toBe(2);
    h.observe(makeContext());
    expect(h.nextHoldingTime()).toBe(2);
  });

  it('AdaptiveHoldingTime observes price × token volume / fiat volume, clamped', () => {
    const h = new AdaptiveHoldingTime({ initial: 2 });
    h.observe(makeContext(0, { state: { price: 2, tokenVolume: 50, fiatVolume: 100 } }));
    expect(h.nextHoldingTime()).toBeCloseTo(1, 9);
    h.observe(makeContext(1, { state: { price: 100, tokenVolume: 50, fiatVolume: 100 } }));
    expect(h.nextHoldingTime()).toBe(12);
    h.observe(makeContext(2, { state: { price: 1, tokenVolume: 0.0001, fiatVolume: 100 } }));
    expect(h.nextHoldingTime()).toBe(0.01);
    h.reset();
    expect(h.nextHoldingTime()).toBe(2);
  });

  it('AdaptiveHoldingTime ignores noise that would make it non-positive', () => {
    const h = new AdaptiveHoldingTime({ initial: 2, addOns: [addOn(() => -1)] });
    h.observe(makeContext(0, { state: { price: 2, tokenVolume: 50, fiatVolume: 100 } }));
    expect(h.nextHoldingTime()).toBeCloseTo(1, 9);
  });

  it('AdaptiveHoldingTime validates its bounds', () => {
    expect(() => new AdaptiveHoldingTime({ initial: 0 })).toThrow(ConfigurationError);
    expect(() => new AdaptiveHoldingTime({ initial: 1, minimum: 5, maximum: 2 })).toThrow(ConfigurationError);
  });

  it('toHoldingTimeModel wraps numbers', () => {
    expect(toHoldingTimeModel(3)).toBeInstanceOf(ConstantHoldingTime);
  });
});
