// Request validation shared by routes.ts and websocket.ts

import {
  validateScenarioSpec,
  type ValidationError,
  type ValidationWarning,
} from '@tokensim/core';

export interface SimulationLimits {
  maxIterations: number;
  maxRepetitions: number;
  maxScenarios: number;
}

/** A simulation job as submitted over HTTP. Scenarios stay `unknown` until the builder asserts them. */
export interface SimulationRequest {
  scenarios: unknown[];
  iterations: number;
  repetitions: number;
  seed?: number;
}

export type RequestValidation =
  | { valid: true; request: SimulationRequest; warnings: ValidationWarning[] }
  | { valid: false; errors: ValidationError[]; warnings: ValidationWarning[] };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (Array.isArray(value)) return `array(${value.length})`;
  return typeof value;
}

function isCount(value: unknown, max: number): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 && value <= max;
}

/**
 * Validates `{ scenarios | scenario, iterations, repetitions, seed? }`.
 * Scenario errors carry their index in the path, e.g. `scenarios[1].priceFunction`.
 */
export function validateSimulationRequest(body: unknown, limits: SimulationLimits): RequestValidation {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  if (!isRecord(body)) {
    errors.push({ path: '', expected: 'object', received: describeValue(body), message: 'Body must be a JSON object' });
    return { valid: false, errors, warnings };
  }

  const raw = body['scenarios'] ?? (body['scenario'] === undefined ? undefined : [body['scenario']]);
  let scenarios: unknown[] = [];
  if (!Array.isArray(raw) || raw.length === 0) {
    errors.push({
      path: 'scenarios',
      expected: 'non-empty array',
      received: describeValue(raw),
      message: 'At least one scenario is required',
    });
  } else if (raw.length > limits.maxScenarios) {
    errors.push({
      path: 'scenarios',
      expected: `at most ${limits.maxScenarios} scenarios`,
      received: describeValue(raw),
      message: `Too many scenarios (${raw.length})`,
    });
  } else {
    scenarios = raw;
    scenarios.forEach((scenario, i) => {
      const result = validateScenarioSpec(scenario);
      const prefix = `scenarios[${i}]`;
      for (const e of result.errors) errors.push({ ...e, path: e.path ? `${prefix}.${e.path}` : prefix });
      for (const w of result.warnings) warnings.push({ ...w, path: w.path ? `${prefix}.${w.path}` : prefix });
    });
    const names = scenarios.map(s => (isRecord(s) ? (s['name'] ?? s['token']) : undefined));
    names.forEach((name, i) => {
      if (typeof name === 'string' && names.indexOf(name) !== i) {
        errors.push({
          path: `scenarios[${i}].name`,
          expected: 'unique name',
          received: 'string',
          message: `Duplicate scenario name "${name}"`,
        });
      }
    });
  }

  const { iterations, repetitions, seed } = body;
  if (!isCount(iterations, limits.maxIterations)) {
    errors.push({
      path: 'iterations',
      expected: `integer in [1, ${limits.maxIterations}]`,
      received: describeValue(iterations),
      message: 'iterations must be a positive integer within the server limit',
    });
  }
  if (!isCount(repetitions, limits.maxRepetitions)) {
    errors.push({
      path: 'repetitions',
      expected: `integer in [1, ${limits.maxRepetitions}]`,
      received: describeValue(repetitions),
      message: 'repetitions must be a positive integer within the server limit',
    });
  }
  const seedOk = seed === undefined || (typeof seed === 'number' && Number.isInteger(seed) && seed >= 0);
  if (!seedOk) {
    errors.push({
      path: 'seed',
      expected: 'non-negative integer',
      received: describeValue(seed),
      message: 'seed must be a non-negative integer',
    });
  }

  // A supply schedule fixes the run length
  if (typeof iterations === 'number') {
    scenarios.forEach((scenario, i) => {
      const supply = isRecord(scenario) ? scenario['supply'] : undefined;
      if (Array.isArray(supply) && supply.length > 0 && supply.length !== iterations) {
        errors.push({
          path: `scenarios[${i}].supply`,
          expected: `array(${iterations})`,
          received: describeValue(supply),
          message: `Supply schedule has ${supply.length} entries but ${iterations} iterations are requested`,
        });
      }
    });
  }

  if (errors.length > 0 || !isCount(iterations, limits.maxIterations) || !isCount(repetitions, limits.maxRepetitions)) {
    return { valid: false, errors, warnings };
  }
  const request: SimulationRequest = { scenarios, iterations, repetitions };
  if (typeof seed === 'number') request.seed = seed;
  return { valid: true, request, warnings };
}
