// TokenMetaSimulator: Monte-Carlo driver over one or more economy scenarios.
// Repetitions run one at a time on the event loop; the loop yields between them so
// callers can cancel through an AbortSignal without ever interrupting a step.

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type {
  DataRow,
  ExecutionResult,
  Logger,
  RepetitionFailure,
  RepetitionRecord,
  SamplerFactory,
  ScenarioOutcome,
  SeriesRecord,
  StepBand,
  VariableReport,
} from './types.js';
import {
  AllRepetitionsFailedError,
  InconsistentSeriesError,
  InvalidParameterError,
  KeyNotFoundError,
  NumericalError,
} from './errors.js';
import { TokenEconomy } from './TokenEconomy.js';
import { deriveSeed, randomSeed } from './Sampler.js';
import { defaultLogger } from './logger.js';
import { DEFAULT_SIMULATOR } from './defaults.js';
import { mean, summarize } from './utils.js';

export interface MetaSimulatorOptions {
  /** Base seed. Repetition i of every scenario uses `deriveSeed(seed, i)`. */
  seed?: number;
  /** Sampler factory for every repetition. Defaults to each economy's own factory. */
  samplerFactory?: SamplerFactory;
  logger?: Logger;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}

export type SimulatorEvent = 'repetition' | 'failure' | 'complete';

export interface SimulatorEventMap {
  repetition: RepetitionRecord;
  failure: RepetitionFailure;
  complete: ExecutionResult;
}

export type SimulatorHandler<E extends SimulatorEvent> = (payload: SimulatorEventMap[E]) => void;

export interface ReportOptions {
  scenario?: string;
  variables?: string[];
  /** Half-open step window [from, to). */
  from?: number;
  to?: number;
}

interface ScenarioAggregate {
  records: RepetitionRecord[];
  failures: RepetitionFailure[];
}

export class TokenMetaSimulator {
  private readonly scenarios = new Map<string, TokenEconomy>();
  /** Overrides each economy's own factory when set. */
  private readonly samplerFactory: SamplerFactory | undefined;
  private readonly logger: Logger;
  private readonly seed: number | undefined;
  private aggregate = new Map<string, ScenarioAggregate>();
  private lastResult: ExecutionResult | null = null;
  private running = false;

  // ── Event handlers ──
  private readonly handlers: { [E in SimulatorEvent]: Array<SimulatorHandler<E>> } = {
    repetition: [],
    failure: [],
    complete: [],
  };

  constructor(
    economies: TokenEconomy | readonly TokenEconomy[] | Record<string, TokenEconomy>,
    options: MetaSimulatorOptions = {},
  ) {
    if (economies instanceof TokenEconomy) {
      this.scenarios.set(economies.name, economies);
    } else if (isEconomyList(economies)) {
      for (const e of economies) this.addScenario(e.name, e);
    } else {
      for (const [name, e] of Object.entries(economies)) this.addScenario(name, e);
    }
    if (this.scenarios.size === 0) {
      throw new InvalidParameterError('economies', 'TokenMetaSimulator needs at least one economy');
    }
    this.seed = options.seed;
    this.samplerFactory = options.samplerFactory;
    this.logger = options.logger ?? defaultLogger;
  }

  private addScenario(name: string, economy: TokenEconomy): void {
    if (this.scenarios.has(name)) {
      throw new InvalidParameterError('economies', `Duplicate scenario name "${name}"`);
    }
    this.scenarios.set(name, economy);
  }

  get scenarioNames(): string[] {
    return [...this.scenarios.keys()];
  }

  get result(): ExecutionResult | null {
    return this.lastResult;
  }

  get isRunning(): boolean {
    return this.running;
  }

  // ── Events ──────────────────────────────────────────────────────────────────

  on<E extends SimulatorEvent>(event: E, handler: SimulatorHandler<E>): this {
    const list = this.handlers[event];
    if (!list.includes(handler)) {
      if (list.length >= DEFAULT_SIMULATOR.maxHandlersPerEvent) {
        throw new InvalidParameterError(
          'handler',
          `Max ${DEFAULT_SIMULATOR.maxHandlersPerEvent} handlers per event reached for '${event}'`,
        );
      }
      list.push(handler);
    }
    return this;
  }

  off<E extends SimulatorEvent>(event: E, handler: SimulatorHandler<E>): this {
    const list = this.handlers[event];
    const idx = list.indexOf(handler);
    if (idx >= 0) list.splice(idx, 1);
    return this;
  }

  private emit<E extends SimulatorEvent>(event: E, payload: SimulatorEventMap[E]): void {
    for (const handler of [...this.handlers[event]]) {
      try {
        handler(payload);
      } catch (err) {
        this.logger.error(`Handler error on '${event}':`, err);
      }
    }
  }

  // ── Execution ───────────────────────────────────────────────────────────────

  /**
   * Runs `repetitions` independent runs of `iterations` steps for every scenario.
   * Replaces the previous aggregate. Resolves with a summary; on cancellation the
   * repetitions completed so far are kept and the result is flagged `cancelled`.
   */
  async execute(iterations: number, repetitions: number, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    if (!Number.isInteger(iterations) || iterations <= 0) {
      throw new InvalidParameterError('iterations', `iterations must be a positive integer, got ${iterations}`);
    }
    if (!Number.isInteger(repetitions) || repetitions <= 0) {
      throw new InvalidParameterError('repetitions', `repetitions must be a positive integer, got ${repetitions}`);
    }
    if (this.running) {
      throw new InvalidParameterError('execute', 'execute() is already running on this simulator');
    }

    const baseSeed = this.seed ?? randomSeed();
    const started = Date.now();
    const aggregate = new Map<string, ScenarioAggregate>();
    for (const name of this.scenarios.keys()) aggregate.set(name, { records: [], failures: [] });
    this.aggregate = aggregate;
    this.lastResult = null;
    this.running = true;

    let cancelled = false;
    try {
      // Configuration problems surface before any step runs
      for (const economy of this.scenarios.values()) economy.reset({ iterations });

      outer: for (const [name, economy] of this.scenarios) {
        const bucket = aggregate.get(name);
        if (!bucket) continue;
        for (let rep = 0; rep < repetitions; rep++) {
          if (options.signal?.aborted) {
            cancelled = true;
            break outer;
          }
          const seed = deriveSeed(baseSeed, rep);
          const outcome = this.runOn(name, economy, iterations, rep, seed);
          if (outcome.ok) {
            this.checkShape(name, bucket.records, outcome.record, iterations);
            bucket.records.push(outcome.record);
            this.emit('repetition', outcome.record);
          } else {
            bucket.failures.push(outcome.failure);
            this.logger.warn(
              `Repetition ${rep} of "${name}" discarded at step ${outcome.failure.step}: ${outcome.failure.message}`,
            );
            this.emit('failure', outcome.failure);
          }
          if ((rep + 1) % DEFAULT_SIMULATOR.yieldEvery === 0) await yieldToEventLoop();
        }

        if (bucket.records.length === 0 && bucket.failures.length === repetitions) {
          throw new AllRepetitionsFailedError(name, bucket.failures.length, repetitions);
        }
      }
    } finally {
      this.running = false;
    }

    const scenarios: ScenarioOutcome[] = [...aggregate].map(([scenario, b]) => ({
      scenario,
      successes: b.records.length,
      failures: b.failures,
    }));
    const result: ExecutionResult = {
      iterations,
      repetitions,
      baseSeed,
      cancelled,
      scenarios,
      durationMs: Date.now() - started,
    };
    this.lastResult = result;
    this.emit('complete', result);
    return result;
  }

  /**
   * Runs one repetition of a scenario in isolation with the seed `execute` would give it.
   * Does not touch the aggregate. Numerical failures are thrown.
   */
  runRepetition(scenario: string, iterations: number, repetition: number, baseSeed?: number): RepetitionRecord {
    const economy = this.scenarios.get(scenario);
    if (!economy) throw new KeyNotFoundError(scenario, `Unknown scenario "${scenario}"`);
    const seed = deriveSeed(baseSeed ?? this.seed ?? randomSeed(), repetition);
    return this.simulate(scenario, economy, iterations, repetition, seed);
  }

  private runOn(
    scenario: string,
    economy: TokenEconomy,
    iterations: number,
    repetition: number,
    seed: number,
  ): { ok: true; record: RepetitionRecord } | { ok: false; failure: RepetitionFailure } {
    try {
      return { ok: true, record: this.simulate(scenario, economy, iterations, repetition, seed) };
    } catch (err) {
      if (!(err instanceof NumericalError)) throw err;
      return {
        ok: false,
        failure: {
          scenario,
          repetition,
          seed,
          step: err.step,
          variable: err.variable,
          message: err.message,
        },
      };
    }
  }

  private simulate(
    scenario: string,
    economy: TokenEconomy,
    iterations: number,
    repetition: number,
    seed: number,
  ): RepetitionRecord {
    economy.reset(this.samplerFactory ? { iterations, sampler: this.samplerFactory(seed) } : { iterations, seed });
    for (let i = 0; i < iterations; i++) economy.step();
    return {
      scenario,
      repetition,
      seed,
      series: economy.getData(),
      supplyClamps: economy.supplyClamps,
      priceClamps: economy.priceClamps,
    };
  }

  private checkShape(scenario: string, existing: RepetitionRecord[], record: RepetitionRecord, iterations: number): void {
    const names = Object.keys(record.series).sort();
    for (const name of names) {
      const len = record.series[name]?.length ?? 0;
      if (len !== iterations) {
        throw new InconsistentSeriesError(
          `Repetition ${record.repetition} of "${scenario}" recorded ${len} steps of "${name}", expected ${iterations}`,
        );
      }
    }
    const reference = existing[0];
    if (!reference) return;
    const refNames = Object.keys(reference.series).sort();
    if (refNames.join('\u0000') !== names.join('\u0000')) {
      throw new InconsistentSeriesError(
        `Repetition ${record.repetition} of "${scenario}" recorded a different variable set than repetition ${reference.repetition}`,
      );
    }
  }

  // ── Queries ─────────────────────────────────────────────────────────────────

  private bucket(scenario?: string): { name: string; data: ScenarioAggregate } {
    const name = scenario ?? this.scenarioNames[0];
    const data = name === undefined ? undefined : this.aggregate.get(name);
    if (name === undefined || !data) {
      throw new KeyNotFoundError(scenario ?? '', `No results for scenario "${scenario ?? ''}"`);
    }
    return { name, data };
  }

  /** Successful repetitions of a scenario (default: the first one). */
  getRepetitions(scenario?: string): RepetitionRecord[] {
    return [...this.bucket(scenario).data.records];
  }

  getFailures(scenario?: string): RepetitionFailure[] {
    return [...this.bucket(scenario).data.failures];
  }

  /** Repetition × step matrix for one variable over successful repetitions. */
  getTimeseries(variable: string, scenario?: string): number[][] {
    const { name, data } = this.bucket(scenario);
    const rows: number[][] = [];
    for (const r of data.records) {
      const series = r.series[variable];
      if (!series) throw new KeyNotFoundError(variable, `Variable "${variable}" was never produced by "${name}"`);
      rows.push([...series]);
    }
    if (rows.length === 0) {
      throw new KeyNotFoundError(variable, `Variable "${variable}" was never produced by "${name}"`);
    }
    return rows;
  }

  /** Long-format table: one row per scenario, repetition and step. */
  getData(): DataRow[] {
    const rows: DataRow[] = [];
    for (const [scenario, data] of this.aggregate) {
      for (const r of data.records) {
        const names = Object.keys(r.series);
        const length = names.length > 0 ? (r.series[names[0] ?? '']?.length ?? 0) : 0;
        for (let step = 0; step < length; step++) {
          const row: DataRow = { scenario, repetition: r.repetition, step };
          for (const n of names) row[n] = r.series[n]?.[step] ?? NaN;
          rows.push(row);
        }
      }
    }
    return rows;
  }

  /** Per-step mean, median, std, 10th/90th percentiles, min and max across repetitions. */
  getSummary(variable: string, scenario?: string): StepBand[] {
    const matrix = this.getTimeseries(variable, scenario);
    const steps = matrix[0]?.length ?? 0;
    const bands: StepBand[] = [];
    for (let step = 0; step < steps; step++) {
      const column = matrix.map(row => row[step] ?? NaN);
      bands.push({ step, ...summarize(column) });
    }
    return bands;
  }

  /**
   * Averages each variable per repetition (optionally over a step window),
   * then summarizes those averages across repetitions.
   */
  getReport(options: ReportOptions = {}): VariableReport[] {
    const { name, data } = this.bucket(options.scenario);
    const first = data.records[0];
    if (!first) return [];
    const variables = options.variables ?? Object.keys(first.series);
    const from = options.from ?? 0;
    const to = options.to;
    if (from < 0 || (to !== undefined && to <= from)) {
      throw new InvalidParameterError('window', `Step window [${from}, ${String(to)}) is empty`);
    }

    return variables.map(variable => {
      const averages = this.getTimeseries(variable, name).map(series => mean(series.slice(from, to)));
      const s = summarize(averages);
      return {
        variable,
        scenario: name,
        mean: s.mean,
        std: s.std,
        min: s.min,
        max: s.max,
        p10: s.p10,
        p90: s.p90,
      };
    });
  }

  /** Raw series of every successful repetition, keyed by scenario. */
  toJSON(): Record<string, SeriesRecord[]> {
    const out: Record<string, SeriesRecord[]> = {};
    for (const [name, data] of this.aggregate) out[name] = data.records.map(r => r.series);
    return out;
  }
}

function isEconomyList(value: readonly TokenEconomy[] | Record<string, TokenEconomy>): value is readonly TokenEconomy[] {
  return Array.isArray(value);
}
