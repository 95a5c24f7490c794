// Transaction models: a cohort's aggregate volume per step, in the pool's currency.
// Positive volume is buying/spending; negative volume is selling.

import type {
  AddOn,
  Distribution,
  DistributionSchedule,
  PoolStepContext,
  SignPolicy,
  SpaceKind,
  TransactionModel,
} from './types.js';
import { ConfigurationError } from './errors.js';
import { applyAddOns, resetAddOns } from './AddOns.js';
import { assertDistribution, distributionAt } from './Sampler.js';
import { space, type SpaceOptions } from './sequences.js';
import { mean } from './utils.js';

function applySign(value: number, sign: SignPolicy): number {
  switch (sign) {
    case 'positive': return Math.max(0, value);
    case 'negative': return Math.min(0, value);
    case 'mixed': return value;
  }
}

function scheduleList(schedule: DistributionSchedule): Distribution[] {
  return Array.isArray(schedule) ? schedule : [schedule];
}

/** `perUser × users`, or just `perUser` when `ignoreUsers` is set. */
export class ConstantTransactions implements TransactionModel {
  constructor(
    private readonly perUser: number,
    private readonly options: { ignoreUsers?: boolean; addOns?: readonly AddOn[] } = {},
  ) {
    if (!Number.isFinite(perUser)) {
      throw new ConfigurationError(`ConstantTransactions needs a finite value, got ${perUser}`);
    }
  }

  nextVolume(ctx: PoolStepContext): number {
    const base = this.options.ignoreUsers ? this.perUser : this.perUser * ctx.pool.users;
    return applyAddOns(this.options.addOns ?? [], base, ctx);
  }

  reset(): void {
    resetAddOns(this.options.addOns ?? []);
  }
}

export interface TransactionsFromDataOptions {
  /** Multiply each datum by the pool's users. Default true. */
  perUser?: boolean;
  /** Keep returning the last datum past the end of the data. Default true. */
  repeatLast?: boolean;
}

export class TransactionsFromData implements TransactionModel {
  private readonly data: readonly number[];

  constructor(data: readonly number[], private readonly options: TransactionsFromDataOptions = {}) {
    if (data.length === 0) throw new ConfigurationError('TransactionsFromData needs at least one value');
    this.data = [...data];
  }

  nextVolume(ctx: PoolStepContext): number {
    if (ctx.step >= this.data.length && this.options.repeatLast === false) {
      throw new ConfigurationError(
        `TransactionsFromData has ${this.data.length} values but step ${ctx.step} was requested`,
      );
    }
    const datum = this.data[Math.min(ctx.step, this.data.length - 1)] ?? 0;
    return (this.options.perUser ?? true) ? datum * ctx.pool.users : datum;
  }

  reset(): void {}
}

export interface TrendTransactionsOptions extends SpaceOptions {
  /** Average transaction size per user at the first step. */
  initial: number;
  /** Average transaction size per user at the last step. */
  final: number;
  steps: number;
  space?: SpaceKind;
  addOns?: readonly AddOn[];
}

/** users × average size, where the average follows a pre-computed curve. */
export class TrendTransactions implements TransactionModel {
  readonly averages: readonly number[];

  constructor(private readonly options: TrendTransactionsOptions) {
    if (!Number.isInteger(options.steps) || options.steps <= 0) {
      throw new ConfigurationError(`TrendTransactions steps must be a positive integer, got ${options.steps}`);
    }
    this.averages = space(options.space ?? 'linear', options.initial, options.final, options.steps, options);
  }

  nextVolume(ctx: PoolStepContext): number {
    const avg = this.averages[Math.min(ctx.step, this.averages.length - 1)] ?? 0;
    return applyAddOns(this.options.addOns ?? [], avg * ctx.pool.users, ctx);
  }

  reset(): void {
    resetAddOns(this.options.addOns ?? []);
  }
}

/** start + step × increment, optionally perturbed. Independent of users. */
export class LinearTransactions implements TransactionModel {
  constructor(
    private readonly start: number,
    private readonly increment: number,
    private readonly addOns: readonly AddOn[] = [],
  ) {}

  nextVolume(ctx: PoolStepContext): number {
    return applyAddOns(this.addOns, this.start + ctx.step * this.increment, ctx);
  }

  reset(): void {
    resetAddOns(this.addOns);
  }
}

export interface StochasticTransactionsOptions {
  /** Probability that a user is active this step; a list gives one per step. Default 1. */
  activity?: number | readonly number[];
  /** Fixed number of transactions per active user. Overrides `transactionsDistribution`. */
  transactionsPerUser?: number;
  transactionsDistribution?: DistributionSchedule;
  /** Fixed value per transaction. Overrides `valueDistribution`. */
  valuePerTransaction?: number;
  valueDistribution?: DistributionSchedule;
  sign?: SignPolicy;
  /** Draws averaged to estimate the per-user means. Default 100. */
  sampleSize?: number;
}

/**
 * active users ~ Binomial(users, activity)
 * volume = active × transactions per user × value per transaction
 */
export class StochasticTransactions implements TransactionModel {
  private readonly sign: SignPolicy;
  private readonly sampleSize: number;

  constructor(private readonly options: StochasticTransactionsOptions) {
    if (options.transactionsPerUser === undefined && options.transactionsDistribution === undefined) {
      throw new ConfigurationError('StochasticTransactions needs transactionsPerUser or transactionsDistribution');
    }
    if (options.valuePerTransaction === undefined && options.valueDistribution === undefined) {
      throw new ConfigurationError('StochasticTransactions needs valuePerTransaction or valueDistribution');
    }

    const lengths = new Set<number>();
    if (Array.isArray(options.activity)) lengths.add(options.activity.length);
    if (options.transactionsPerUser === undefined && Array.isArray(options.transactionsDistribution)) {
      lengths.add(options.transactionsDistribution.length);
    }
    if (options.valuePerTransaction === undefined && Array.isArray(options.valueDistribution)) {
      lengths.add(options.valueDistribution.length);
    }
    if (lengths.size > 1) {
      throw new ConfigurationError(`Per-step parameter lists must share one length, got ${[...lengths].join(', ')}`);
    }

    for (const p of typeof options.activity === 'number' ? [options.activity] : options.activity ?? []) {
      if (!(p >= 0 && p <= 1)) throw new ConfigurationError(`Activity probability must be in [0, 1], got ${p}`);
    }
    if (options.transactionsDistribution) {
      scheduleList(options.transactionsDistribution)
        .forEach((d, i) => assertDistribution(d, `transactionsDistribution[${i}]`));
    }
    if (options.valueDistribution) {
      scheduleList(options.valueDistribution).forEach((d, i) => assertDistribution(d, `valueDistribution[${i}]`));
    }

    this.sign = options.sign ?? 'positive';
    this.sampleSize = options.sampleSize ?? 100;
    if (!Number.isInteger(this.sampleSize) || this.sampleSize <= 0) {
      throw new ConfigurationError(`sampleSize must be a positive integer, got ${this.sampleSize}`);
    }
  }

  nextVolume(ctx: PoolStepContext): number {
    const { sampler, step } = ctx;
    const activity = this.activityAt(step);
    const active = activity >= 1
      ? ctx.pool.users
      : sampler.draw({ kind: 'binomial', trials: ctx.pool.users, p: activity });

    const perUser = this.options.transactionsPerUser
      ?? Math.max(0, this.meanDraw(ctx, this.options.transactionsDistribution));
    const value = this.options.valuePerTransaction
      ?? this.meanDraw(ctx, this.options.valueDistribution);

    return applySign(active * perUser * value, this.sign);
  }

  reset(): void {}

  private activityAt(step: number): number {
    const a = this.options.activity ?? 1;
    if (typeof a === 'number') return a;
    return a[Math.min(step, a.length - 1)] ?? 1;
  }

  private meanDraw(ctx: PoolStepContext, schedule: DistributionSchedule | undefined): number {
    if (!schedule) return 0;
    return mean(ctx.sampler.sample(distributionAt(schedule, ctx.step), this.sampleSize));
  }
}

/**
 * Volume as a random fraction of market cap (price × supply). Token-denominated pools
 * get the same fraction of supply.
 */
export class MarketCapTransactions implements TransactionModel {
  constructor(
    private readonly options: { distribution?: Distribution; sign?: SignPolicy } = {},
  ) {
    if (options.distribution) assertDistribution(options.distribution, 'MarketCapTransactions');
  }

  nextVolume(ctx: PoolStepContext): number {
    const fraction = ctx.sampler.draw(this.options.distribution ?? { kind: 'normal', mean: 0, std: 0.25 });
    const { price, supply, token } = ctx.state;
    const base = ctx.pool.currency === token ? supply : price * supply;
    const sign = this.options.sign ?? 'mixed';
    const raw = fraction * base;
    switch (sign) {
      case 'positive': return Math.abs(raw);
      case 'negative': return -Math.abs(raw);
      case 'mixed': return raw;
    }
  }

  reset(): void {}
}

export function toTransactionModel(tx: TransactionModel | number | readonly number[]): TransactionModel {
  if (typeof tx === 'number') return new ConstantTransactions(tx);
  if (isTransactionModel(tx)) return tx;
  return new TransactionsFromData(tx);
}

function isTransactionModel(value: TransactionModel | readonly number[]): value is TransactionModel {
  return !Array.isArray(value);
}
