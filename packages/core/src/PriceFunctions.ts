// Pricing policies. Each maps the run's history (this step's volumes, holding time
// and supply already staged) to the step's price.

import type { AddOn, HistoryView, PriceFunction, StepContext } from './types.js';
import { ConfigurationError } from './errors.js';
import { applyAddOns, resetAddOns } from './AddOns.js';
import { economyKeys } from './variables.js';

function read(history: HistoryView, name: string): number {
  return history.latest(name) ?? 0;
}

/** Empirical velocity curve over holding time. */
export function velocityFromHoldingTime(holdingTime: number, floor = 0.01): number {
  const v = 0.03358 + 1.20329 / holdingTime;
  return v < 0 ? floor : v;
}

export interface EquationOfExchangeOptions {
  /**
   * true: price = fiat volume / (supply × velocity(holding time)).
   * false: price = holding time × fiat volume / supply.
   */
  useVelocity?: boolean;
  /** Weight of the new price against the previous one, in [0, 1]. 1 means no smoothing. */
  smoothing?: number;
  /** Noise on the price; ignored for a step when it would make the price negative. */
  addOns?: readonly AddOn[];
}

/** Quantity theory of money: M V = P Q, solved for the token price. */
export class EquationOfExchange implements PriceFunction {
  readonly name = 'equationOfExchange';
  private readonly smoothing: number;

  constructor(private readonly options: EquationOfExchangeOptions = {}) {
    this.smoothing = options.smoothing ?? 1;
    if (!(this.smoothing >= 0 && this.smoothing <= 1)) {
      throw new ConfigurationError(`EquationOfExchange smoothing must be in [0, 1], got ${this.smoothing}`);
    }
  }

  compute(history: HistoryView, ctx: StepContext): number {
    const keys = economyKeys(ctx.state.token, ctx.state.fiat);
    const fiat = read(history, keys.fiatVolume);
    const holdingTime = read(history, keys.holdingTime);
    const supply = read(history, keys.supply);

    const raw = (this.options.useVelocity ?? true)
      ? fiat / (supply * velocityFromHoldingTime(holdingTime))
      : (holdingTime * fiat) / supply;
    const smoothed = this.smoothing * raw + (1 - this.smoothing) * ctx.state.price;

    const addOns = this.options.addOns ?? [];
    if (addOns.length === 0) return smoothed;
    const noisy = applyAddOns(addOns, smoothed, ctx);
    return noisy < 0 ? smoothed : noisy;
  }

  reset(): void {
    resetAddOns(this.options.addOns ?? []);
  }
}

/**
 * Demand-driven repricing with constant elasticity:
 * price = previous × (demand / previous demand) ^ (1 / elasticity), demand = fiat volume / supply.
 * Holds the previous price while either demand reading is zero.
 */
export class ConstantElasticity implements PriceFunction {
  readonly name = 'constantElasticity';

  constructor(private readonly elasticity: number) {
    if (!Number.isFinite(elasticity) || elasticity === 0) {
      throw new ConfigurationError(`ConstantElasticity needs a finite non-zero elasticity, got ${elasticity}`);
    }
  }

  compute(history: HistoryView, ctx: StepContext): number {
    const prev = ctx.state.price;
    if (ctx.step === 0) return prev;
    const keys = economyKeys(ctx.state.token, ctx.state.fiat);
    const demand = read(history, keys.fiatVolume) / read(history, keys.supply);
    const prevDemand = history.value(keys.fiatVolume, ctx.step - 1) / history.value(keys.supply, ctx.step - 1);
    if (!(demand > 0) || !(prevDemand > 0)) return prev;
    return prev * (demand / prevDemand) ** (1 / this.elasticity);
  }
}

/** price = curve(circulating supply), with supply capped at `maxSupply`. */
export class BondingCurve implements PriceFunction {
  readonly name = 'bondingCurve';

  constructor(
    private readonly curve: (supply: number) => number,
    private readonly maxSupply = Number.POSITIVE_INFINITY,
  ) {}

  compute(history: HistoryView, ctx: StepContext): number {
    const supply = read(history, economyKeys(ctx.state.token, ctx.state.fiat).supply);
    return this.curve(Math.min(supply, this.maxSupply));
  }
}

/**
 * price = curve(tokens ever bought), i.e. the running total of token volume,
 * capped at `maxIssued`. Unlike a bonding curve, sells do not walk the price back.
 */
export class IssuanceCurve implements PriceFunction {
  readonly name = 'issuanceCurve';

  constructor(
    private readonly curve: (issued: number) => number,
    private readonly maxIssued = Number.POSITIVE_INFINITY,
  ) {}

  compute(history: HistoryView, ctx: StepContext): number {
    const column = history.column(economyKeys(ctx.state.token, ctx.state.fiat).tokenVolume);
    const issued = column.reduce((s, v) => s + v, 0);
    return this.curve(Math.min(issued, this.maxIssued));
  }
}

export interface LogLinearRegressionOptions {
  /** Largest allowed rise per step, as a fraction of the previous price. Default 0.3. */
  topAppreciation?: number;
  /** Spread of the prediction noise. Default 0.1. */
  stdPrior?: number;
  /** Weight of the previous price in the result, in [0, 1]. Default 0.1. */
  anchoring?: number;
  /** Scale the noise by the previous price. Default true. */
  proportionalNoise?: boolean;
  coefficients?: { volume: number; supply: number; velocity: number };
  /** Degrees of freedom of the Student-t noise. Default 13000. */
  df?: number;
}

const DEFAULT_COEFFICIENTS = { volume: 0.88, supply: 0.84, velocity: 1.15 } as const;

/**
 * log p = a·ln(fiat volume) + b·ln(1 / supply) + c·ln(1 / velocity) + t-noise,
 * then anchored to the previous price, floored at 0.0001 and capped at
 * previous × (1 + topAppreciation).
 */
export class LogLinearRegression implements PriceFunction {
  readonly name = 'logLinearRegression';
  private readonly topAppreciation: number;
  private readonly stdPrior: number;
  private readonly anchoring: number;
  private readonly proportionalNoise: boolean;
  private readonly coefficients: { volume: number; supply: number; velocity: number };
  private readonly df: number;

  constructor(options: LogLinearRegressionOptions = {}) {
    this.topAppreciation = options.topAppreciation ?? 0.3;
    this.stdPrior = options.stdPrior ?? 0.1;
    this.anchoring = options.anchoring ?? 0.1;
    this.proportionalNoise = options.proportionalNoise ?? true;
    this.coefficients = options.coefficients ?? DEFAULT_COEFFICIENTS;
    this.df = options.df ?? 13000;
    if (!(this.anchoring >= 0 && this.anchoring <= 1)) {
      throw new ConfigurationError(`LogLinearRegression anchoring must be in [0, 1], got ${this.anchoring}`);
    }
    if (!(this.df > 0)) throw new ConfigurationError(`LogLinearRegression df must be > 0, got ${this.df}`);
  }

  compute(history: HistoryView, ctx: StepContext): number {
    const keys = economyKeys(ctx.state.token, ctx.state.fiat);
    const fiat = read(history, keys.fiatVolume);
    const supply = read(history, keys.supply);
    const velocity = velocityFromHoldingTime(read(history, keys.holdingTime), 0.001);
    const prev = ctx.state.price;

    const { volume, supply: b, velocity: c } = this.coefficients;
    const logPrice = volume * Math.log(fiat) + b * Math.log(1 / supply) + c * Math.log(1 / velocity);
    const noiseScale = this.proportionalNoise ? this.stdPrior * prev : this.stdPrior;
    const sample = logPrice + ctx.sampler.draw({ kind: 'studentT', df: this.df }) * noiseScale;

    let price = (1 - this.anchoring) * Math.exp(sample) + this.anchoring * prev;
    if (price <= 0) price = 0.0001;
    const cap = prev * (1 + this.topAppreciation);
    return price > cap ? cap : price;
  }
}

/** Wraps a closure as a PriceFunction. */
export function priceFunction(
  fn: (history: HistoryView, ctx: StepContext) => number,
  name = 'custom',
): PriceFunction {
  return { name, compute: fn };
}
