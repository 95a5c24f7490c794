// Deterministic sequence builders used to pre-compute growth curves and release
// schedules, plus helpers that turn value sequences into per-step distributions.

import type { Distribution, SpaceKind } from './types.js';
import { ConfigurationError } from './errors.js';

export function linspace(start: number, stop: number, num: number): number[] {
  if (num <= 0) return [];
  if (num === 1) return [start];
  const stepSize = (stop - start) / (num - 1);
  const out: number[] = [];
  for (let i = 0; i < num; i++) out.push(start + stepSize * i);
  out[num - 1] = stop;
  return out;
}

/** `base ** linspace(start, stop, num)`. */
export function logspace(start: number, stop: number, num: number, base = 10): number[] {
  return linspace(start, stop, num).map(e => base ** e);
}

/** Geometric progression from `start` to `stop`. Both ends must share a sign and be non-zero. */
export function geomspace(start: number, stop: number, num: number): number[] {
  if (start === 0 || stop === 0 || Math.sign(start) !== Math.sign(stop)) {
    throw new ConfigurationError(`geomspace needs non-zero endpoints of equal sign, got ${start} and ${stop}`);
  }
  const sign = Math.sign(start);
  return logspace(Math.log10(Math.abs(start)), Math.log10(Math.abs(stop)), num).map(v => sign * v);
}

/**
 * Fast early growth that flattens out: `log(linspace(start, stop)) / max * (stop + start)`.
 * `start` must be positive.
 */
export function logSaturatedSpace(start: number, stop: number, num: number): number[] {
  if (start <= 0) {
    throw new ConfigurationError(`logSaturatedSpace needs a positive start, got ${start}`);
  }
  const logs = linspace(start, stop, num).map(v => Math.log(v));
  const max = Math.max(...logs);
  if (max === 0) return logs.map(() => start);
  return logs.map(v => (v / max) * (stop + start));
}

const expit = (x: number): number => 1 / (1 + Math.exp(-x));

/**
 * S-curve between `start` and `stop`. `steepness` sharpens the transition,
 * `takeoff` shifts it earlier (positive) or later (negative).
 */
export function logisticSaturatedSpace(
  start: number,
  stop: number,
  num: number,
  steepness = 1,
  takeoff = 0,
): number[] {
  const base = linspace(start, stop, num);
  const spread = linspace(-6, 6, num);
  const curve = base.map((v, i) => expit(steepness * (v / stop + (spread[i] ?? 0) + takeoff)));
  const max = Math.max(...curve);
  return curve.map(v => (v / max) * (stop + start));
}

export interface SpaceOptions {
  steepness?: number;
  takeoff?: number;
}

export function space(kind: SpaceKind, start: number, stop: number, num: number, options: SpaceOptions = {}): number[] {
  switch (kind) {
    case 'linear': return linspace(start, stop, num);
    case 'log': return logspace(start, stop, num);
    case 'geometric': return geomspace(start, stop, num);
    case 'logSaturated': return logSaturatedSpace(start, stop, num);
    case 'logisticSaturated':
      return logisticSaturatedSpace(start, stop, num, options.steepness, options.takeoff);
  }
}

/** First element followed by successive differences: [a0, a1-a0, a2-a1, ...]. */
export function differences(values: readonly number[]): number[] {
  return values.map((v, i) => (i === 0 ? v : v - (values[i - 1] ?? 0)));
}

// ── Distribution sequences ───────────────────────────────────────────────────

/**
 * Turns a value sequence into one distribution per step, centred on each value.
 * `scale` is the relative spread: normal std = |value| * scale, uniform half-width = |value| * scale.
 */
export function distributionSequence(
  values: readonly number[],
  kind: 'normal' | 'uniform' | 'poisson' = 'normal',
  scale = 0.1,
): Distribution[] {
  return values.map((v): Distribution => {
    switch (kind) {
      case 'normal': return { kind: 'normal', mean: v, std: Math.abs(v) * scale };
      case 'uniform': return { kind: 'uniform', min: v - Math.abs(v) * scale, max: v + Math.abs(v) * scale };
      case 'poisson': return { kind: 'poisson', mean: Math.max(0, v) };
    }
  });
}

/** Pads (by repeating the last entry) or truncates `values` to exactly `length`. */
export function harmonizeSequence<T>(values: readonly T[], length: number): T[] {
  const last = values[values.length - 1];
  if (last === undefined) {
    throw new ConfigurationError('Cannot harmonize an empty sequence');
  }
  const out = values.slice(0, length);
  while (out.length < length) out.push(last);
  return out;
}

/** Concatenates sequences, e.g. a pre-launch curve followed by a growth curve. */
export function mergeSequences(...parts: ReadonlyArray<readonly number[]>): number[] {
  return parts.flatMap(p => [...p]);
}
