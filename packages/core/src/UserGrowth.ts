// User growth models: how many users a pool has at each step.
// Built-in models round to whole users and never report fewer than zero.

import type {
  AddOn,
  DistributionSchedule,
  SpaceKind,
  StepContext,
  UserGrowth,
} from './types.js';
import { ConfigurationError } from './errors.js';
import { applyAddOns, resetAddOns } from './AddOns.js';
import { assertDistribution, distributionAt } from './Sampler.js';
import { differences, space, type SpaceOptions } from './sequences.js';

abstract class BaseUserGrowth implements UserGrowth {
  protected constructor(protected readonly addOns: readonly AddOn[] = []) {}

  protected abstract produce(ctx: StepContext): number;

  nextUsers(ctx: StepContext): number {
    const raw = applyAddOns(this.addOns, this.produce(ctx), ctx);
    return Math.max(0, Math.round(raw));
  }

  reset(): void {
    resetAddOns(this.addOns);
  }
}

export class ConstantUsers extends BaseUserGrowth {
  constructor(private readonly users: number, addOns: readonly AddOn[] = []) {
    super(addOns);
    if (!(users >= 0)) throw new ConfigurationError(`ConstantUsers needs users >= 0, got ${users}`);
  }

  protected produce(): number {
    return this.users;
  }
}

/** Reads users from a data series; the last value repeats past the end. */
export class UsersFromData extends BaseUserGrowth {
  private readonly data: readonly number[];

  constructor(data: readonly number[], addOns: readonly AddOn[] = []) {
    super(addOns);
    if (data.length === 0) throw new ConfigurationError('UsersFromData needs at least one value');
    this.data = [...data];
  }

  protected produce(ctx: StepContext): number {
    return this.data[Math.min(ctx.step, this.data.length - 1)] ?? 0;
  }
}

export interface SpacedUsersOptions extends SpaceOptions {
  initial: number;
  final: number;
  steps: number;
  space?: SpaceKind;
  /**
   * Emit step-to-step growth instead of the running total:
   * [initial, u1 - u0, u2 - u1, ...].
   */
  useDifference?: boolean;
  addOns?: readonly AddOn[];
}

/** Pre-computes a curve from `initial` to `final` over `steps`; holds the final value afterwards. */
export class SpacedUsers extends BaseUserGrowth {
  readonly curve: readonly number[];

  constructor(options: SpacedUsersOptions) {
    super(options.addOns);
    if (!Number.isInteger(options.steps) || options.steps <= 0) {
      throw new ConfigurationError(`SpacedUsers steps must be a positive integer, got ${options.steps}`);
    }
    const rounded = space(options.space ?? 'linear', options.initial, options.final, options.steps, options)
      .map(v => Math.round(v));
    this.curve = options.useDifference ? [options.initial, ...differences(rounded).slice(1)] : rounded;
  }

  protected produce(ctx: StepContext): number {
    return this.curve[Math.min(ctx.step, this.curve.length - 1)] ?? 0;
  }
}

export interface StochasticUsersOptions {
  /** Fixed distribution, or one per step. */
  distribution: DistributionSchedule;
  /** Add each draw to the running user base instead of replacing it. */
  addToUserbase?: boolean;
  initial?: number;
  addOns?: readonly AddOn[];
}

export class StochasticUsers extends BaseUserGrowth {
  private users: number;

  constructor(private readonly options: StochasticUsersOptions) {
    super(options.addOns);
    const list = Array.isArray(options.distribution) ? options.distribution : [options.distribution];
    if (list.length === 0) throw new ConfigurationError('StochasticUsers needs a distribution');
    list.forEach((d, i) => assertDistribution(d, `StochasticUsers.distribution[${i}]`));
    this.users = options.initial ?? 0;
  }

  protected produce(ctx: StepContext): number {
    const drawn = ctx.sampler.draw(distributionAt(this.options.distribution, ctx.step));
    this.users = this.options.addToUserbase ? this.users + drawn : drawn;
    return this.users;
  }

  override reset(): void {
    super.reset();
    this.users = this.options.initial ?? 0;
  }
}

/** Discrete logistic growth: N' = N + r N (1 - N / K). Step 0 reports `initial`. */
export class LogisticUsers extends BaseUserGrowth {
  private users: number;

  constructor(
    private readonly options: { initial: number; rate: number; capacity: number; addOns?: readonly AddOn[] },
  ) {
    super(options.addOns);
    if (!(options.capacity > 0)) {
      throw new ConfigurationError(`LogisticUsers capacity must be > 0, got ${options.capacity}`);
    }
    this.users = options.initial;
  }

  protected produce(ctx: StepContext): number {
    if (ctx.step > 0) {
      const { rate, capacity } = this.options;
      this.users = this.users + rate * this.users * (1 - this.users / capacity);
    }
    return this.users;
  }

  override reset(): void {
    super.reset();
    this.users = this.options.initial;
  }
}

/** Normalizes the shorthand forms a pool accepts. */
export function toUserGrowth(users: UserGrowth | number | readonly number[]): UserGrowth {
  if (typeof users === 'number') return new ConstantUsers(users);
  if (isUserGrowth(users)) return users;
  return new UsersFromData(users);
}

function isUserGrowth(value: UserGrowth | readonly number[]): value is UserGrowth {
  return !Array.isArray(value);
}
