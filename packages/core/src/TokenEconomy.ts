// TokenEconomy: single-run state container and stepper
//
// Per step, in fixed order:
//   1. agent pools (users, then volume)
//   2. volume aggregation, sell pressure, holding time
//   3. supply: schedule or carried supply, then controllers in registration order, then buybacks
//   4. price function
//   5. add-ons on their target variables, then the holding-time model observes the settled step
// One row per step is appended to the history.

import type {
  AddOn,
  EconomyState,
  HistoryView,
  HoldingTimeModel,
  Logger,
  PriceFunction,
  Sampler,
  SamplerFactory,
  SeriesRecord,
  StepContext,
  SupplyController,
  UnitOfTime,
} from './types.js';
import { ConfigurationError, NumericalError } from './errors.js';
import { AgentPool } from './AgentPool.js';
import { HistoryTable } from './HistoryTable.js';
import { toHoldingTimeModel } from './HoldingTime.js';
import { defaultSamplerFactory, randomSeed } from './Sampler.js';
import { defaultLogger } from './logger.js';
import { DEFAULT_ECONOMY, UNITS_OF_TIME, VOLUME_EPSILON } from './defaults.js';
import { economyKeys, poolKeys, type EconomyKeys } from './variables.js';

export interface AddOnBinding {
  addOn: AddOn;
  /** Variable the add-on rewrites. Defaults to the token's price. */
  target?: string;
}

export interface TokenEconomyConfig {
  token: string;
  fiat?: string;
  unitOfTime?: UnitOfTime;
  initialPrice: number;
  /** Constant starting supply, or a target supply for every planned step. */
  supply: number | readonly number[];
  /** Planned step count. Inferred from a supply schedule when omitted. */
  iterations?: number;
  /** Apply attached supply controllers. Default true. */
  burnMint?: boolean;
  /** Take each step's token volume out of circulation. Default false. */
  burnSpentTokens?: boolean;
  /** From step 1 on, cap a step's token volume at the circulating supply. Default false. */
  safeguardSupply?: boolean;
  priceFunction?: PriceFunction;
  holdingTime?: HoldingTimeModel | number;
  agentPools?: AgentPool[];
  supplyControllers?: SupplyController[];
  addOns?: Array<AddOn | AddOnBinding>;
  samplerFactory?: SamplerFactory;
  /** Seed used by resets that are not handed a sampler or seed. */
  seed?: number;
  logger?: Logger;
  name?: string;
}

export interface ResetOptions {
  iterations?: number;
  sampler?: Sampler;
  seed?: number;
}

function initialHoldingTimeOf(holdingTime: HoldingTimeModel | number): number {
  return typeof holdingTime === 'number' ? holdingTime : DEFAULT_ECONOMY.holdingTime;
}

function isBinding(value: AddOn | AddOnBinding): value is AddOnBinding {
  return 'addOn' in value;
}

export class TokenEconomy implements EconomyState {
  readonly name: string;
  readonly token: string;
  readonly fiat: string;
  readonly unitOfTime: UnitOfTime;
  readonly initialPrice: number;
  readonly keys: EconomyKeys;
  burnMint: boolean;
  burnSpentTokens: boolean;
  safeguardSupply: boolean;

  private readonly schedule: readonly number[] | null;
  private readonly initialSupply: number;
  private readonly configuredIterations: number | undefined;
  private readonly configuredSeed: number | undefined;
  private readonly samplerFactory: SamplerFactory;
  private readonly logger: Logger;

  private priceFn: PriceFunction | undefined;
  private holdingModel: HoldingTimeModel;
  private initialHoldingTime: number;
  private readonly pools: AgentPool[] = [];
  private readonly controllers: SupplyController[] = [];
  private readonly addOnBindings: Array<{ addOn: AddOn; target: string }> = [];

  private readonly table = new HistoryTable();
  private sampler: Sampler;
  private plannedIterations: number | undefined;

  // ── Carried state ──
  private _price: number;
  private _supply: number;
  private _holdingTime: number;
  private _users = 0;
  private _fiatVolume = 0;
  private _tokenVolume = 0;
  /** Tokens released by negative pool volume, added to supply at the supply stage. */
  private pendingSellPressure = 0;
  /** Tokens bought back by buyback pools, burned at the supply stage. */
  private pendingBuyback = 0;
  private _supplyClamps = 0;
  private _priceClamps = 0;

  constructor(config: TokenEconomyConfig) {
    if (!config.token) throw new ConfigurationError('TokenEconomy needs a token id');
    this.token = config.token;
    this.fiat = config.fiat ?? DEFAULT_ECONOMY.fiat;
    if (this.fiat === this.token) {
      throw new ConfigurationError(`Token and fiat labels must differ, both are "${this.token}"`);
    }
    this.unitOfTime = config.unitOfTime ?? DEFAULT_ECONOMY.unitOfTime;
    if (!UNITS_OF_TIME.includes(this.unitOfTime)) {
      throw new ConfigurationError(`Unknown unit of time "${String(this.unitOfTime)}"`);
    }
    if (!Number.isFinite(config.initialPrice) || config.initialPrice < 0) {
      throw new ConfigurationError(`initialPrice must be a finite number >= 0, got ${config.initialPrice}`);
    }
    this.initialPrice = config.initialPrice;
    this.name = config.name ?? config.token;
    this.keys = economyKeys(this.token, this.fiat);
    this.burnMint = config.burnMint ?? DEFAULT_ECONOMY.burnMint;
    this.burnSpentTokens = config.burnSpentTokens ?? DEFAULT_ECONOMY.burnSpentTokens;
    this.safeguardSupply = config.safeguardSupply ?? DEFAULT_ECONOMY.safeguardSupply;

    if (typeof config.supply === 'number') {
      if (!Number.isFinite(config.supply) || config.supply < 0) {
        throw new ConfigurationError(`supply must be a finite number >= 0, got ${config.supply}`);
      }
      this.schedule = null;
      this.initialSupply = config.supply;
    } else {
      const first = config.supply[0];
      if (first === undefined) throw new ConfigurationError('Supply schedule is empty');
      config.supply.forEach((s, i) => {
        if (!Number.isFinite(s) || s < 0) {
          throw new ConfigurationError(`Supply schedule entry ${i} must be a finite number >= 0, got ${s}`);
        }
      });
      this.schedule = [...config.supply];
      this.initialSupply = first;
    }

    this.configuredIterations = config.iterations;
    this.configuredSeed = config.seed;
    this.samplerFactory = config.samplerFactory ?? defaultSamplerFactory;
    this.logger = config.logger ?? defaultLogger;
    this.priceFn = config.priceFunction;

    const holding = config.holdingTime ?? DEFAULT_ECONOMY.holdingTime;
    this.holdingModel = toHoldingTimeModel(holding);
    this.initialHoldingTime = initialHoldingTimeOf(holding);

    this.addAgentPools(config.agentPools ?? []);
    this.addSupplyControllers(config.supplyControllers ?? []);
    for (const a of config.addOns ?? []) {
      if (isBinding(a)) this.addAddOn(a.addOn, a.target === undefined ? {} : { target: a.target });
      else this.addAddOn(a);
    }

    this.plannedIterations = this.resolvePlan(config.iterations);
    this._price = this.initialPrice;
    this._supply = this.initialSupply;
    this._holdingTime = this.initialHoldingTime;
    this.sampler = this.samplerFactory(config.seed ?? randomSeed());
  }

  // ── Wiring ──────────────────────────────────────────────────────────────────

  addAgentPool(pool: AgentPool): this {
    if (pool.currency !== this.fiat && pool.currency !== this.token) {
      throw new ConfigurationError(
        `Pool "${pool.name}" trades in "${pool.currency}", expected "${this.fiat}" or "${this.token}"`,
      );
    }
    if (this.pools.some(p => p.name === pool.name)) {
      throw new ConfigurationError(`Duplicate agent pool name "${pool.name}"`);
    }
    const taken = new Set<string>(Object.values(this.keys));
    const keys = poolKeys(pool.name);
    if (taken.has(keys.users) || taken.has(keys.transactions)) {
      throw new ConfigurationError(`Pool name "${pool.name}" collides with an economy variable`);
    }
    this.pools.push(pool);
    return this;
  }

  addAgentPools(pools: readonly AgentPool[]): this {
    for (const p of pools) this.addAgentPool(p);
    return this;
  }

  addSupplyController(controller: SupplyController): this {
    this.controllers.push(controller);
    return this;
  }

  addSupplyControllers(controllers: readonly SupplyController[]): this {
    for (const c of controllers) this.addSupplyController(c);
    return this;
  }

  /** Attaches an add-on to a recorded variable (default: the token's price). */
  addAddOn(addOn: AddOn, options: { target?: string } = {}): this {
    this.addOnBindings.push({ addOn, target: options.target ?? this.keys.price });
    return this;
  }

  setPriceFunction(fn: PriceFunction): this {
    this.priceFn = fn;
    return this;
  }

  setHoldingTime(holdingTime: HoldingTimeModel | number): this {
    this.holdingModel = toHoldingTimeModel(holdingTime);
    this.initialHoldingTime = initialHoldingTimeOf(holdingTime);
    return this;
  }

  // ── Lifecycle ───────────────────────────────────────────────────────────────

  /**
   * Back to step 0: clears the history, resets every component and installs a fresh sampler.
   * Wiring survives. Validates the plan before touching any state.
   */
  reset(options: ResetOptions = {}): void {
    const planned = this.resolvePlan(options.iterations ?? this.configuredIterations);
    this.validateWiring();

    this.plannedIterations = planned;
    this.table.clear();
    this._price = this.initialPrice;
    this._supply = this.initialSupply;
    this._holdingTime = this.initialHoldingTime;
    this._users = 0;
    this._fiatVolume = 0;
    this._tokenVolume = 0;
    this.pendingSellPressure = 0;
    this.pendingBuyback = 0;
    this._supplyClamps = 0;
    this._priceClamps = 0;
    this.sampler = options.sampler ?? this.samplerFactory(options.seed ?? this.configuredSeed ?? randomSeed());

    for (const p of this.pools) p.reset();
    for (const c of this.controllers) c.reset();
    this.holdingModel.reset();
    this.priceFn?.reset?.();
    for (const b of this.addOnBindings) b.addOn.reset?.();
  }

  /** Resets, steps through the whole plan and returns the recorded series. */
  run(iterations?: number): SeriesRecord {
    this.reset(iterations === undefined ? {} : { iterations });
    const planned = this.plannedIterations;
    if (planned === undefined) {
      throw new ConfigurationError('run() needs an iteration count or a supply schedule');
    }
    for (let i = 0; i < planned; i++) this.step();
    return this.getData();
  }

  step(): void {
    const priceFn = this.priceFn;
    if (!priceFn) throw new ConfigurationError(`Economy "${this.name}" has no price function`);
    const step = this.table.currentStep;
    if (this.plannedIterations !== undefined && step >= this.plannedIterations) {
      throw new ConfigurationError(`Step ${step} is past the planned ${this.plannedIterations} iterations`);
    }
    if (step === 0) this.validateWiring();

    const ctx = this.context(step);
    this.table.beginRow();
    try {
      this.stepPools(ctx);
      this.stepHoldingTime(ctx);
      this.stepSupply(ctx);
      this.stepPrice(priceFn, ctx);
      this.stepAddOns(ctx);
      this.holdingModel.observe?.(ctx);
      this.table.set(
        this.keys.effectiveHoldingTime,
        (this._price * this._supply) / (this._fiatVolume + VOLUME_EPSILON),
      );
      this.table.commitRow();
    } catch (err) {
      this.table.discardRow();
      throw err;
    }
  }

  // ── Step stages ─────────────────────────────────────────────────────────────

  private stepPools(ctx: StepContext): void {
    let users = 0;
    let fiatVolume = 0;
    let tokenVolume = 0;
    let sellPressure = 0;
    let buyback = 0;
    const price = this._price;

    for (const pool of this.pools) {
      const volume = pool.step(ctx);
      const keys = poolKeys(pool.name);
      this.table.set(keys.users, pool.users);
      this.table.set(keys.transactions, volume);
      users += pool.users;
      if (pool.buyback && volume > 0) {
        buyback += pool.currency === this.token ? volume : price > 0 ? volume / price : 0;
      }

      if (pool.currency === this.token) {
        if (volume >= 0) {
          tokenVolume += volume;
          fiatVolume += volume * price;
        } else {
          sellPressure -= volume;
        }
      } else if (volume >= 0) {
        fiatVolume += volume;
        // nothing can be bought at a zero price
        tokenVolume += price > 0 ? volume / price : 0;
      } else {
        sellPressure += price > 0 ? -volume / price : 0;
      }
    }

    if (this.safeguardSupply && ctx.step > 0 && tokenVolume > this._supply) {
      tokenVolume = this._supply;
      fiatVolume = tokenVolume * price;
    }

    this._users = users;
    this._fiatVolume = fiatVolume;
    this._tokenVolume = tokenVolume;
    this.pendingSellPressure = sellPressure;
    this.pendingBuyback = buyback;
    this.table.set(this.keys.fiatVolume, fiatVolume);
    this.table.set(this.keys.tokenVolume, tokenVolume);
    this.table.set(this.keys.users, users);
  }

  private stepHoldingTime(ctx: StepContext): void {
    const produced = this.holdingModel.nextHoldingTime(ctx);
    const value = typeof produced === 'number' ? produced : ctx.sampler.draw(produced);
    if (!Number.isFinite(value) || value <= 0) {
      throw new NumericalError(this.keys.holdingTime, ctx.step, value);
    }
    this._holdingTime = value;
    this.table.set(this.keys.holdingTime, value);
  }

  private stepSupply(ctx: StepContext): void {
    const baseline = this.schedule ? (this.schedule[ctx.step] ?? this._supply) : this._supply;
    this._supply = baseline + this.pendingSellPressure;

    if (this.burnMint) {
      for (const controller of this.controllers) {
        const delta = controller.delta(this._supply, ctx);
        if (!Number.isFinite(delta)) throw new NumericalError(this.keys.supply, ctx.step, delta);
        this._supply = this.clampSupply(this._supply + delta, controller.name, ctx.step);
      }
    }
    if (this.pendingBuyback > 0) {
      this._supply = this.clampSupply(this._supply - this.pendingBuyback, 'buyback', ctx.step);
    }
    if (this.burnSpentTokens) {
      this._supply = this.clampSupply(this._supply - this._tokenVolume, 'burnSpentTokens', ctx.step);
    }

    if (!Number.isFinite(this._supply)) throw new NumericalError(this.keys.supply, ctx.step, this._supply);
    this.table.set(this.keys.supply, this._supply);
  }

  private stepPrice(priceFn: PriceFunction, ctx: StepContext): void {
    const price = priceFn.compute(this.table, ctx);
    if (!Number.isFinite(price)) throw new NumericalError(this.keys.price, ctx.step, price);
    this._price = this.clampPrice(price, priceFn.name, ctx.step);
    this.table.set(this.keys.price, this._price);
  }

  private stepAddOns(ctx: StepContext): void {
    for (const { addOn, target } of this.addOnBindings) {
      const current = this.table.latest(target);
      if (current === undefined) {
        throw new ConfigurationError(`Add-on target "${target}" is not a recorded variable`);
      }
      let value = addOn.apply(current, ctx);
      if (!Number.isFinite(value)) throw new NumericalError(target, ctx.step, value);
      const label = `addOn ${addOn.name ?? 'anonymous'}`;
      if (target === this.keys.price) {
        value = this.clampPrice(value, label, ctx.step);
        this._price = value;
      } else if (target === this.keys.supply) {
        value = this.clampSupply(value, label, ctx.step);
        this._supply = value;
      }
      this.table.set(target, value);
    }
  }

  private clampSupply(value: number, source: string, step: number): number {
    if (value >= 0) return value;
    if (this._supplyClamps === 0) {
      this.logger.warn(`Supply of ${this.token} would go negative (${value}) via ${source} at step ${step}; clamped to 0`);
    }
    this._supplyClamps++;
    return 0;
  }

  private clampPrice(value: number, source: string, step: number): number {
    if (value >= 0) return value;
    if (this._priceClamps === 0) {
      this.logger.warn(`Price of ${this.token} would go negative (${value}) via ${source} at step ${step}; clamped to 0`);
    }
    this._priceClamps++;
    return 0;
  }

  // ── Validation ──────────────────────────────────────────────────────────────

  private resolvePlan(iterations: number | undefined): number | undefined {
    if (iterations !== undefined && (!Number.isInteger(iterations) || iterations <= 0)) {
      throw new ConfigurationError(`Planned iterations must be a positive integer, got ${iterations}`);
    }
    if (this.schedule) {
      if (iterations !== undefined && this.schedule.length !== iterations) {
        throw new ConfigurationError(
          `Supply schedule has ${this.schedule.length} entries but ${iterations} iterations are planned`,
        );
      }
      return this.schedule.length;
    }
    return iterations;
  }

  private validateWiring(): void {
    if (!this.priceFn) throw new ConfigurationError(`Economy "${this.name}" has no price function`);
    const produced = new Set(this.variableNames());
    for (const { target } of this.addOnBindings) {
      if (!produced.has(target)) {
        throw new ConfigurationError(`Add-on target "${target}" is not a recorded variable`);
      }
    }
  }

  /** Every variable a step records, in recording order. */
  variableNames(): string[] {
    const names: string[] = [];
    for (const p of this.pools) {
      const k = poolKeys(p.name);
      names.push(k.users, k.transactions);
    }
    const k = this.keys;
    names.push(k.fiatVolume, k.tokenVolume, k.users, k.holdingTime, k.supply, k.price, k.effectiveHoldingTime);
    return names;
  }

  // ── Accessors ───────────────────────────────────────────────────────────────

  private context(step: number): StepContext {
    return {
      step,
      iterations: this.plannedIterations,
      sampler: this.sampler,
      history: this.table,
      state: this,
      logger: this.logger,
    };
  }

  get price(): number {
    return this._price;
  }

  get supply(): number {
    return this._supply;
  }

  get holdingTime(): number {
    return this._holdingTime;
  }

  get users(): number {
    return this._users;
  }

  get fiatVolume(): number {
    return this._fiatVolume;
  }

  get tokenVolume(): number {
    return this._tokenVolume;
  }

  get currentStep(): number {
    return this.table.length;
  }

  get iterations(): number | undefined {
    return this.plannedIterations;
  }

  get supplyClamps(): number {
    return this._supplyClamps;
  }

  get priceClamps(): number {
    return this._priceClamps;
  }

  get history(): HistoryView {
    return this.table;
  }

  get agentPools(): readonly AgentPool[] {
    return this.pools;
  }

  get supplyControllers(): readonly SupplyController[] {
    return this.controllers;
  }

  get priceFunction(): PriceFunction | undefined {
    return this.priceFn;
  }

  getSampler(): Sampler {
    return this.sampler;
  }

  /** Copy of every recorded series, keyed by variable name. */
  getData(): SeriesRecord {
    return this.table.toRecord();
  }
}
