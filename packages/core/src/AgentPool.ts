// AgentPool: one cohort of users transacting in a single currency

import type {
  PoolStepContext,
  StepContext,
  TransactionModel,
  UserGrowth,
} from './types.js';
import { ConfigurationError, NumericalError } from './errors.js';
import { toUserGrowth } from './UserGrowth.js';
import { toTransactionModel } from './TransactionModels.js';

export interface AgentPoolConfig {
  /** Fiat label or token id. */
  currency: string;
  /** Cohort label; defaults to the currency. Must be unique within an economy. */
  name?: string;
  /** Growth model, a constant user count, or a per-step user series. */
  users: UserGrowth | number | readonly number[];
  /** Transaction model, a constant per-user volume, or a per-step per-user series. */
  transactions: TransactionModel | number | readonly number[];
  /** First step at which the pool takes part. Earlier steps report 0 users and 0 volume. */
  activationStep?: number;
  /** Positive volume buys tokens back at the step's price; they are burned at the supply stage. */
  buyback?: boolean;
}

export class AgentPool {
  readonly name: string;
  readonly currency: string;
  readonly activationStep: number;
  readonly buyback: boolean;
  private readonly growth: UserGrowth;
  private readonly transactionModel: TransactionModel;

  private _users = 0;
  private _volume = 0;

  constructor(config: AgentPoolConfig) {
    if (!config.currency) throw new ConfigurationError('AgentPool needs a currency');
    this.currency = config.currency;
    this.name = config.name ?? config.currency;
    this.activationStep = config.activationStep ?? 0;
    if (!Number.isInteger(this.activationStep) || this.activationStep < 0) {
      throw new ConfigurationError(`AgentPool "${this.name}" activationStep must be a non-negative integer`);
    }
    this.buyback = config.buyback ?? false;
    this.growth = toUserGrowth(config.users);
    this.transactionModel = toTransactionModel(config.transactions);
  }

  get users(): number {
    return this._users;
  }

  get volume(): number {
    return this._volume;
  }

  /** Advances users, then volume. Returns the pool's signed volume for the step. */
  step(ctx: StepContext): number {
    if (ctx.step < this.activationStep) {
      this._users = 0;
      this._volume = 0;
      return 0;
    }

    const users = this.growth.nextUsers(ctx);
    if (!Number.isFinite(users) || users < 0) {
      throw new NumericalError(`${this.name}_users`, ctx.step, users);
    }
    this._users = users;

    const poolCtx: PoolStepContext = {
      ...ctx,
      pool: { name: this.name, currency: this.currency, users },
    };
    const volume = this.transactionModel.nextVolume(poolCtx);
    if (!Number.isFinite(volume)) {
      throw new NumericalError(`${this.name}_transactions`, ctx.step, volume);
    }
    this._volume = volume;
    return volume;
  }

  reset(): void {
    this._users = 0;
    this._volume = 0;
    this.growth.reset();
    this.transactionModel.reset();
  }
}
