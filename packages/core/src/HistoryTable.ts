// Append-only column store for one run's time series.
// Columns are fixed by the first committed row; every later row must carry the same keys.

import type { HistoryView, SeriesRecord } from './types.js';
import { InconsistentSeriesError, KeyNotFoundError } from './errors.js';

export class HistoryTable implements HistoryView {
  private columns = new Map<string, number[]>();
  private pending: Map<string, number> | null = null;
  private rows = 0;

  get length(): number {
    return this.rows;
  }

  /** Step index of the row being staged (or the next one to stage). */
  get currentStep(): number {
    return this.rows;
  }

  has(name: string): boolean {
    return this.columns.has(name) || (this.pending?.has(name) ?? false);
  }

  names(): string[] {
    const names = new Set(this.columns.keys());
    if (this.pending) for (const key of this.pending.keys()) names.add(key);
    return [...names];
  }

  value(name: string, step: number): number {
    if (step === this.rows) {
      const staged = this.pending?.get(name);
      if (staged !== undefined) return staged;
    }
    const col = this.columns.get(name);
    if (!col) throw new KeyNotFoundError(name);
    const v = col[step];
    if (v === undefined) {
      throw new RangeError(`[TokenSim] Step ${step} of "${name}" is outside 0..${this.rows - 1}`);
    }
    return v;
  }

  latest(name: string): number | undefined {
    const staged = this.pending?.get(name);
    if (staged !== undefined) return staged;
    const col = this.columns.get(name);
    return col ? col[col.length - 1] : undefined;
  }

  column(name: string): number[] {
    const col = this.columns.get(name);
    const staged = this.pending?.get(name);
    if (!col && staged === undefined) throw new KeyNotFoundError(name);
    const out = col ? [...col] : [];
    if (staged !== undefined) out.push(staged);
    return out;
  }

  // ── Writes ──────────────────────────────────────────────────────────────────

  beginRow(): void {
    if (this.pending) {
      throw new InconsistentSeriesError(`Row ${this.rows} was started twice without a commit`);
    }
    this.pending = new Map();
  }

  /** Stages a value for the current row. Setting a key twice overwrites it. */
  set(name: string, value: number): void {
    if (!this.pending) {
      throw new InconsistentSeriesError(`No open row to record "${name}" into`);
    }
    this.pending.set(name, value);
  }

  commitRow(): void {
    const row = this.pending;
    if (!row) throw new InconsistentSeriesError('No open row to commit');

    if (this.rows === 0) {
      for (const [key, v] of row) this.columns.set(key, [v]);
    } else {
      if (row.size !== this.columns.size) {
        throw new InconsistentSeriesError(
          `Row ${this.rows} has ${row.size} variables, expected ${this.columns.size}`,
        );
      }
      for (const [key, v] of row) {
        const col = this.columns.get(key);
        if (!col) throw new InconsistentSeriesError(`Row ${this.rows} introduces unknown variable "${key}"`);
        col.push(v);
      }
    }
    this.rows++;
    this.pending = null;
  }

  /** Drops an open row without committing it. */
  discardRow(): void {
    this.pending = null;
  }

  clear(): void {
    this.columns.clear();
    this.pending = null;
    this.rows = 0;
  }

  /** Copy of every committed column. */
  toRecord(): SeriesRecord {
    const out: SeriesRecord = {};
    for (const [key, col] of this.columns) out[key] = [...col];
    return out;
  }
}
