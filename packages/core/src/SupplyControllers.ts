// Supply controllers: signed changes to circulating supply, applied in registration order.
// The economy clamps every application so supply never drops below zero.

import type {
  AddOn,
  Distribution,
  SpaceKind,
  StepContext,
  SupplyController,
  SupplyStyle,
} from './types.js';
import { ConfigurationError } from './errors.js';
import { applyAddOns, resetAddOns } from './AddOns.js';
import { assertDistribution } from './Sampler.js';
import { space, type SpaceOptions } from './sequences.js';

const SUPPLY_STYLES: ReadonlySet<string> = new Set<SupplyStyle>(['perc', 'fixed']);

function isSupplyStyle(style: string): style is SupplyStyle {
  return SUPPLY_STYLES.has(style);
}

// ── Burn / Mint ──────────────────────────────────────────────────────────────

export interface RateControllerOptions {
  /** Fraction of current supply (`perc`) or absolute token amount (`fixed`). */
  param: number;
  /** Default 'perc'. Typed loosely because configs arrive from JSON. */
  style?: SupplyStyle | (string & {});
  /** Apply once, then do nothing until the next reset. */
  selfDestruct?: boolean;
  name?: string;
}

abstract class RateController implements SupplyController {
  readonly name: string;
  readonly param: number;
  readonly style: SupplyStyle;
  private readonly selfDestruct: boolean;
  private spent = false;

  protected constructor(kind: string, private readonly direction: 1 | -1, options: RateControllerOptions) {
    const style = options.style ?? 'perc';
    if (!isSupplyStyle(style)) {
      throw new ConfigurationError(`${kind} style must be "perc" or "fixed", got "${style}"`);
    }
    if (!Number.isFinite(options.param) || options.param < 0) {
      throw new ConfigurationError(`${kind} param must be a finite number >= 0, got ${options.param}`);
    }
    this.name = options.name ?? kind;
    this.param = options.param;
    this.style = style;
    this.selfDestruct = options.selfDestruct ?? false;
  }

  delta(supply: number, _ctx?: StepContext): number {
    if (this.spent) return 0;
    if (this.selfDestruct) this.spent = true;
    const amount = this.style === 'perc' ? supply * this.param : this.param;
    return this.direction * amount;
  }

  reset(): void {
    this.spent = false;
  }
}

/** Removes `param` × supply (perc) or `param` tokens (fixed) each step. */
export class BurnController extends RateController {
  constructor(options: RateControllerOptions) {
    super('burn', -1, options);
  }
}

/** Adds `param` × supply (perc) or `param` tokens (fixed) each step. */
export class MintController extends RateController {
  constructor(options: RateControllerOptions) {
    super('mint', 1, options);
  }
}

// ── Schedules ────────────────────────────────────────────────────────────────

/** Per-step deltas from data; zero past the end. */
export class SupplyFromData implements SupplyController {
  readonly name: string;
  private readonly deltas: readonly number[];

  constructor(deltas: readonly number[], name = 'supplyFromData') {
    this.deltas = [...deltas];
    this.name = name;
  }

  delta(_supply: number, ctx: StepContext): number {
    return this.deltas[ctx.step] ?? 0;
  }

  reset(): void {}
}

export interface CliffVestingOptions {
  amount: number;
  /** Steps over which `amount` is released in equal chunks. */
  vestingPeriod: number;
  /** Steps with no release after `delay`. */
  cliff: number;
  delay?: number;
  name?: string;
}

/** Releases locked tokens in equal chunks once the delay and cliff have passed. */
export class CliffVesting implements SupplyController {
  readonly name: string;
  readonly releases: readonly number[];

  constructor(options: CliffVestingOptions) {
    const delay = options.delay ?? 0;
    for (const [key, v] of Object.entries({ vestingPeriod: options.vestingPeriod, cliff: options.cliff, delay })) {
      if (!Number.isInteger(v) || v < 0) {
        throw new ConfigurationError(`CliffVesting ${key} must be a non-negative integer, got ${v}`);
      }
    }
    if (!(options.amount >= 0)) {
      throw new ConfigurationError(`CliffVesting amount must be >= 0, got ${options.amount}`);
    }
    this.name = options.name ?? 'cliffVesting';

    const chunk = options.vestingPeriod > 0 ? options.amount / options.vestingPeriod : options.amount;
    const periods = Math.max(options.vestingPeriod, 1);
    let remaining = options.amount;
    const releases: number[] = new Array<number>(delay + options.cliff).fill(0);
    for (let i = 0; i < periods; i++) {
      const release = Math.min(remaining, chunk);
      releases.push(release);
      remaining -= release;
    }
    this.releases = releases;
  }

  delta(_supply: number, ctx: StepContext): number {
    return this.releases[ctx.step] ?? 0;
  }

  reset(): void {}
}

export interface InvestorDumpOptions extends SpaceOptions {
  /** Tokens released at the first step. */
  initial: number;
  /** Tokens released at the last step. */
  final: number;
  steps: number;
  space?: SpaceKind;
  addOns?: readonly AddOn[];
  name?: string;
}

/** An investor releasing tokens on a spaced schedule. Noise can only add to a release. */
export class InvestorDump implements SupplyController {
  readonly name: string;
  readonly schedule: readonly number[];

  constructor(private readonly options: InvestorDumpOptions) {
    if (!Number.isInteger(options.steps) || options.steps <= 0) {
      throw new ConfigurationError(`InvestorDump steps must be a positive integer, got ${options.steps}`);
    }
    this.name = options.name ?? 'investorDump';
    this.schedule = space(options.space ?? 'linear', options.initial, options.final, options.steps, options)
      .map(v => Math.round(v));
  }

  delta(_supply: number, ctx: StepContext): number {
    const planned = this.schedule[ctx.step];
    if (planned === undefined) return 0;
    return Math.max(planned, applyAddOns(this.options.addOns ?? [], planned, ctx));
  }

  reset(): void {
    resetAddOns(this.options.addOns ?? []);
  }
}

// ── Behavioural ──────────────────────────────────────────────────────────────

export interface AdaptiveStochasticOptions {
  /** Share of the step's token volume that leaves circulation. */
  removal?: Distribution;
  /** Share of the inactive pool that comes back each step. */
  addition?: Distribution;
  /** When false, a step never removes more than it returns. */
  allowNetRemoval?: boolean;
  name?: string;
}

/**
 * Bought tokens partly go dormant and trickle back later.
 * Tracks the dormant pool across steps.
 */
export class AdaptiveStochasticSupply implements SupplyController {
  readonly name: string;
  private inactive = 0;
  private readonly removal: Distribution;
  private readonly addition: Distribution;

  constructor(private readonly options: AdaptiveStochasticOptions = {}) {
    this.name = options.name ?? 'adaptiveStochastic';
    this.removal = options.removal ?? { kind: 'uniform', min: 0, max: 0.1 };
    this.addition = options.addition ?? { kind: 'uniform', min: 0, max: 0.05 };
    assertDistribution(this.removal, 'AdaptiveStochasticSupply.removal');
    assertDistribution(this.addition, 'AdaptiveStochasticSupply.addition');
  }

  get inactiveTokens(): number {
    return this.inactive;
  }

  delta(_supply: number, ctx: StepContext): number {
    const removed = ctx.state.tokenVolume * ctx.sampler.draw(this.removal);
    this.inactive += removed;
    const returned = this.inactive * ctx.sampler.draw(this.addition);
    this.inactive -= returned;
    const change = returned - removed;
    if (change < 0 && this.options.allowNetRemoval === false) return returned;
    return change;
  }

  reset(): void {
    this.inactive = 0;
  }
}

export interface SpeculatorOptions {
  /** Share of the step's fiat volume spent on speculative buys. */
  share?: Distribution;
  /** Sell when price / entry price rises above this. Default 1.1. */
  takeProfit?: number;
  /** Sell when price / entry price falls below this. Default 0.9. */
  stopLoss?: number;
  /** Cap on tokens held, as a share of current supply. Default 0.9. */
  maxShareOfSupply?: number;
  name?: string;
}

interface Position {
  tokens: number;
  entryPrice: number;
}

/**
 * Buy-and-hold speculators: each step they take a share of demand out of circulation
 * at the current price and release positions that hit take-profit or stop-loss.
 */
export class Speculator implements SupplyController {
  readonly name: string;
  private positions: Position[] = [];
  private readonly share: Distribution;
  private readonly takeProfit: number;
  private readonly stopLoss: number;
  private readonly maxShare: number;

  constructor(options: SpeculatorOptions = {}) {
    this.name = options.name ?? 'speculator';
    this.share = options.share ?? { kind: 'uniform', min: 0, max: 0.1 };
    this.takeProfit = options.takeProfit ?? 1.1;
    this.stopLoss = options.stopLoss ?? 0.9;
    this.maxShare = options.maxShareOfSupply ?? 0.9;
    assertDistribution(this.share, 'Speculator.share');
    if (this.stopLoss > this.takeProfit) {
      throw new ConfigurationError(`Speculator stopLoss ${this.stopLoss} exceeds takeProfit ${this.takeProfit}`);
    }
    if (!(this.maxShare >= 0 && this.maxShare <= 1)) {
      throw new ConfigurationError(`Speculator maxShareOfSupply must be in [0, 1], got ${this.maxShare}`);
    }
  }

  get heldTokens(): number {
    return this.positions.reduce((s, p) => s + p.tokens, 0);
  }

  delta(supply: number, ctx: StepContext): number {
    const price = ctx.state.price;

    let released = 0;
    const kept: Position[] = [];
    for (const p of this.positions) {
      const ratio = p.entryPrice > 0 ? price / p.entryPrice : 1;
      if (ratio > this.takeProfit || ratio < this.stopLoss) released += p.tokens;
      else kept.push(p);
    }
    this.positions = kept;

    let bought = 0;
    if (price > 0) {
      const wanted = (ctx.state.fiatVolume * Math.max(0, ctx.sampler.draw(this.share))) / price;
      const room = Math.max(0, supply * this.maxShare - this.heldTokens);
      bought = Math.min(wanted, room);
      if (bought > 0) this.positions.push({ tokens: bought, entryPrice: price });
    }

    return released - bought;
  }

  reset(): void {
    this.positions = [];
  }
}

/** Wraps a plain function as a SupplyController. */
export function supplyController(
  fn: (supply: number, ctx: StepContext) => number,
  name = 'custom',
): SupplyController {
  return { name, delta: fn, reset: () => {} };
}
