// ─────────────────────────────────────────────────────────────────────────────
// TokenSim Core Types
// Every other file imports from here. Keep this file pure (no logic).
// ─────────────────────────────────────────────────────────────────────────────

// ── Distributions ────────────────────────────────────────────────────────────

/** Distribution descriptor: a kind tag plus flat, JSON-friendly parameters. */
export type Distribution =
  | { kind: 'constant'; value: number }
  | { kind: 'uniform'; min: number; max: number }
  | { kind: 'normal'; mean: number; std: number }
  | { kind: 'lognormal'; mu: number; sigma: number; loc?: number }
  | { kind: 'exponential'; rate: number }
  | { kind: 'gamma'; shape: number; scale: number }
  | { kind: 'beta'; alpha: number; beta: number }
  | { kind: 'poisson'; mean: number }
  | { kind: 'binomial'; trials: number; p: number }
  | { kind: 'bernoulli'; p: number }
  | { kind: 'studentT'; df: number; loc?: number; scale?: number };

export type DistributionKind = Distribution['kind'];

/** A distribution that stays fixed, or one per step (the last entry repeats once exhausted). */
export type DistributionSchedule = Distribution | Distribution[];

export interface Sampler {
  /** Seed the sampler was created with. */
  readonly seed: number;
  /** Uniform draw in [0, 1). */
  random(): number;
  draw(distribution: Distribution): number;
  sample(distribution: Distribution, count: number): number[];
}

export type SamplerFactory = (seed: number) => Sampler;

// ── Logging ──────────────────────────────────────────────────────────────────

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

// ── History ──────────────────────────────────────────────────────────────────

/**
 * Read-only view over the recorded series of one run.
 * Rows are steps, columns are variable names. Values staged for the step
 * being computed are visible through `latest` and `column` before the row commits.
 */
export interface HistoryView {
  /** Number of committed rows. */
  readonly length: number;
  has(name: string): boolean;
  names(): string[];
  value(name: string, step: number): number;
  latest(name: string): number | undefined;
  column(name: string): number[];
}

// ── Step context ─────────────────────────────────────────────────────────────

export type UnitOfTime = 'day' | 'week' | 'month' | 'quarter' | 'year';

/** Live economy readings. Values reflect whatever has been computed so far in the step. */
export interface EconomyState {
  readonly token: string;
  readonly fiat: string;
  readonly unitOfTime: UnitOfTime;
  /** Carried price: previous step's price until this step's price is computed. */
  readonly price: number;
  /** Carried supply: previous step's supply until controllers have run. */
  readonly supply: number;
  readonly holdingTime: number;
  readonly users: number;
  /** Positive volume this step, valued in fiat. */
  readonly fiatVolume: number;
  /** Positive volume this step, in tokens. */
  readonly tokenVolume: number;
}

export interface StepContext {
  /** Zero-based index of the step being computed. */
  readonly step: number;
  /** Planned iteration count for the run, when known. */
  readonly iterations: number | undefined;
  readonly sampler: Sampler;
  readonly history: HistoryView;
  readonly state: EconomyState;
  readonly logger: Logger;
}

export interface PoolStepContext extends StepContext {
  readonly pool: {
    readonly name: string;
    readonly currency: string;
    /** Users produced by the pool's growth model this step. */
    readonly users: number;
  };
}

// ── Strategies ───────────────────────────────────────────────────────────────

export interface Resettable {
  reset(): void;
}

export interface AddOn {
  readonly name?: string;
  apply(value: number, ctx: StepContext): number;
  reset?(): void;
}

export interface UserGrowth extends Resettable {
  nextUsers(ctx: StepContext): number;
}

export interface TransactionModel extends Resettable {
  /** Signed volume in the pool's currency. Negative volume is selling. */
  nextVolume(ctx: PoolStepContext): number;
}

export interface HoldingTimeModel extends Resettable {
  nextHoldingTime(ctx: StepContext): number | Distribution;
  /** Called once the step's price is settled. Adaptive models update the next step's value here. */
  observe?(ctx: StepContext): void;
}

export interface SupplyController extends Resettable {
  readonly name: string;
  /** Signed change to `supply`. Burns are negative, mints positive. */
  delta(supply: number, ctx: StepContext): number;
}

export interface PriceFunction {
  readonly name: string;
  compute(history: HistoryView, ctx: StepContext): number;
  reset?(): void;
}

export type SupplyStyle = 'perc' | 'fixed';

export type SpaceKind = 'linear' | 'log' | 'geometric' | 'logSaturated' | 'logisticSaturated';

export type SignPolicy = 'positive' | 'negative' | 'mixed';

// ── Run records ──────────────────────────────────────────────────────────────

export type SeriesRecord = Record<string, number[]>;

export interface RepetitionFailure {
  scenario: string;
  repetition: number;
  seed: number;
  step: number;
  variable: string;
  message: string;
}

export interface RepetitionRecord {
  scenario: string;
  repetition: number;
  seed: number;
  series: SeriesRecord;
  supplyClamps: number;
  priceClamps: number;
}

export interface ScenarioOutcome {
  scenario: string;
  successes: number;
  failures: RepetitionFailure[];
}

export interface ExecutionResult {
  iterations: number;
  repetitions: number;
  baseSeed: number;
  cancelled: boolean;
  scenarios: ScenarioOutcome[];
  durationMs: number;
}

export interface StepBand {
  step: number;
  mean: number;
  median: number;
  std: number;
  p10: number;
  p90: number;
  min: number;
  max: number;
}

export interface VariableReport {
  variable: string;
  scenario: string;
  mean: number;
  std: number;
  min: number;
  max: number;
  p10: number;
  p90: number;
}

export interface DataRow {
  scenario: string;
  repetition: number;
  step: number;
  [variable: string]: string | number;
}
