// ScenarioValidator: validates scenario descriptions arriving as JSON

import type { DistributionKind } from './types.js';
import type { ScenarioSpec } from './ScenarioSpec.js';
import { ConfigurationError } from './errors.js';
import { UNITS_OF_TIME } from './defaults.js';

export interface ValidationError {
  path: string;
  expected: string;
  received: string;
  message: string;
}

export interface ValidationWarning {
  path: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

// ── Field rules ──

type FieldKind =
  | 'number'
  | 'nonNegativeNumber'
  | 'nonNegativeInteger'
  | 'positiveInteger'
  | 'boolean'
  | 'string'
  | 'numberArray'
  | 'numberOrArray'
  | 'distribution'
  | 'distributionSchedule'
  | 'addOns'
  | 'space'
  | 'sign'
  | 'style';

type Rules = Record<string, { kind: FieldKind; required?: boolean }>;

const req = (kind: FieldKind) => ({ kind, required: true });
const opt = (kind: FieldKind) => ({ kind });

const DISTRIBUTION_PARAMS: Record<DistributionKind, Rules> = {
  constant: { value: req('number') },
  uniform: { min: req('number'), max: req('number') },
  normal: { mean: req('number'), std: req('nonNegativeNumber') },
  lognormal: { mu: req('number'), sigma: req('nonNegativeNumber'), loc: opt('number') },
  exponential: { rate: req('nonNegativeNumber') },
  gamma: { shape: req('nonNegativeNumber'), scale: req('nonNegativeNumber') },
  beta: { alpha: req('nonNegativeNumber'), beta: req('nonNegativeNumber') },
  poisson: { mean: req('nonNegativeNumber') },
  binomial: { trials: req('nonNegativeInteger'), p: req('nonNegativeNumber') },
  bernoulli: { p: req('nonNegativeNumber') },
  studentT: { df: req('nonNegativeNumber'), loc: opt('number'), scale: opt('nonNegativeNumber') },
};

const ADD_ON_RULES: Record<string, Rules> = {
  randomNoise: { distribution: opt('distribution') },
  proportionalNoise: { mean: opt('number'), divisor: opt('number') },
  randomReduction: { distribution: opt('distribution') },
  timedMultiplier: { multiplier: req('number'), from: req('nonNegativeInteger'), to: req('nonNegativeInteger') },
};

const USER_RULES: Record<string, Rules> = {
  spaced: {
    initial: req('number'), final: req('number'), steps: req('positiveInteger'),
    space: opt('space'), useDifference: opt('boolean'), addOns: opt('addOns'),
  },
  stochastic: {
    distribution: req('distributionSchedule'), addToUserbase: opt('boolean'),
    initial: opt('number'), addOns: opt('addOns'),
  },
  logistic: { initial: req('number'), rate: req('number'), capacity: req('number'), addOns: opt('addOns') },
};

const TRANSACTION_RULES: Record<string, Rules> = {
  constant: { perUser: req('number'), ignoreUsers: opt('boolean'), addOns: opt('addOns') },
  trend: {
    initial: req('number'), final: req('number'), steps: req('positiveInteger'),
    space: opt('space'), addOns: opt('addOns'),
  },
  linear: { start: req('number'), increment: req('number'), addOns: opt('addOns') },
  stochastic: {
    activity: opt('numberOrArray'),
    transactionsPerUser: opt('number'),
    transactionsDistribution: opt('distributionSchedule'),
    valuePerTransaction: opt('number'),
    valueDistribution: opt('distributionSchedule'),
    sign: opt('sign'),
    sampleSize: opt('positiveInteger'),
  },
  marketCap: { distribution: opt('distribution'), sign: opt('sign') },
};

const RATE_RULES: Rules = {
  param: req('nonNegativeNumber'), style: opt('style'), selfDestruct: opt('boolean'), name: opt('string'),
};

const SUPPLY_RULES: Record<string, Rules> = {
  burn: RATE_RULES,
  mint: RATE_RULES,
  data: { deltas: req('numberArray'), name: opt('string') },
  cliffVesting: {
    amount: req('nonNegativeNumber'), vestingPeriod: req('nonNegativeInteger'),
    cliff: req('nonNegativeInteger'), delay: opt('nonNegativeInteger'), name: opt('string'),
  },
  investorDump: {
    initial: req('number'), final: req('number'), steps: req('positiveInteger'),
    space: opt('space'), name: opt('string'),
  },
  adaptiveStochastic: {
    removal: opt('distribution'), addition: opt('distribution'),
    allowNetRemoval: opt('boolean'), name: opt('string'),
  },
  speculator: {
    share: opt('distribution'), takeProfit: opt('number'), stopLoss: opt('number'),
    maxShareOfSupply: opt('number'), name: opt('string'),
  },
};

const HOLDING_RULES: Record<string, Rules> = {
  constant: { value: req('number') },
  stochastic: { distribution: opt('distributionSchedule'), minimum: opt('number') },
  adaptive: { initial: req('number'), minimum: opt('number'), maximum: opt('number'), addOns: opt('addOns') },
};

const PRICE_RULES: Record<string, Rules> = {
  equationOfExchange: { useVelocity: opt('boolean'), smoothing: opt('number'), addOns: opt('addOns') },
  constantElasticity: { elasticity: req('number') },
  logLinearRegression: {
    topAppreciation: opt('number'), stdPrior: opt('number'), anchoring: opt('number'),
    proportionalNoise: opt('boolean'), df: opt('number'),
  },
};

const SCENARIO_RULES: Rules = {
  name: opt('string'),
  token: req('string'),
  fiat: opt('string'),
  unitOfTime: opt('string'),
  initialPrice: req('nonNegativeNumber'),
  supply: req('numberOrArray'),
  iterations: opt('positiveInteger'),
  burnMint: opt('boolean'),
  burnSpentTokens: opt('boolean'),
  safeguardSupply: opt('boolean'),
};

const SPACE_KINDS = new Set(['linear', 'log', 'geometric', 'logSaturated', 'logisticSaturated']);
const SIGN_POLICIES = new Set(['positive', 'negative', 'mixed']);
const SUPPLY_STYLES = new Set(['perc', 'fixed']);

// ── Validator ─────────────────────────────────────────────────────────────────

class Collector {
  readonly errors: ValidationError[] = [];
  readonly warnings: ValidationWarning[] = [];

  error(path: string, expected: string, value: unknown, message: string): void {
    this.errors.push({ path, expected, received: describeValue(value), message });
  }

  warn(path: string, message: string): void {
    this.warnings.push({ path, message });
  }
}

export function validateScenarioSpec(spec: unknown): ValidationResult {
  const out = new Collector();

  if (!isRecord(spec)) {
    out.error('', 'object', spec, 'Scenario must be a non-null object');
    return { valid: false, errors: out.errors, warnings: out.warnings };
  }

  const known = new Set([
    ...Object.keys(SCENARIO_RULES),
    'holdingTime', 'priceFunction', 'agentPools', 'supplyControllers', 'addOns',
  ]);
  checkFields(spec, SCENARIO_RULES, '', out, known);

  // ── token / fiat ──
  if (typeof spec['token'] === 'string' && spec['token'].length === 0) {
    out.error('token', 'non-empty string', spec['token'], 'token must be a non-empty string');
  }
  const fiat = typeof spec['fiat'] === 'string' ? spec['fiat'] : '$';
  if (spec['token'] === fiat) {
    out.error('fiat', `label other than "${fiat}"`, spec['fiat'], 'token and fiat labels must differ');
  }
  const unit = spec['unitOfTime'];
  if (typeof unit === 'string' && !UNITS_OF_TIME.some(u => u === unit)) {
    out.error('unitOfTime', UNITS_OF_TIME.join(' | '), unit, `Unknown unit of time "${unit}"`);
  }

  // ── supply vs. iterations ──
  const supply = spec['supply'];
  const iterations = spec['iterations'];
  if (Array.isArray(supply)) {
    if (supply.length === 0) out.error('supply', 'non-empty number[]', supply, 'Supply schedule is empty');
    if (typeof iterations === 'number' && supply.length > 0 && supply.length !== iterations) {
      out.error(
        'supply',
        `array(${iterations})`,
        supply,
        `Supply schedule has ${supply.length} entries but ${iterations} iterations are planned`,
      );
    }
    supply.forEach((s, i) => {
      if (typeof s === 'number' && s < 0) out.error(`supply[${i}]`, 'number >= 0', s, 'Supply cannot be negative');
    });
  } else if (typeof supply === 'number' && supply < 0) {
    out.error('supply', 'number >= 0', supply, 'Supply cannot be negative');
  }

  // ── priceFunction ──
  if (spec['priceFunction'] === undefined) {
    out.error('priceFunction', 'object', undefined, 'A price function is required');
  } else {
    checkTagged(spec['priceFunction'], 'priceFunction', PRICE_RULES, out);
  }

  // ── holdingTime ──
  const holding = spec['holdingTime'];
  if (typeof holding === 'number') {
    if (!(holding > 0)) out.error('holdingTime', 'number > 0', holding, 'holdingTime must be > 0');
  } else if (holding !== undefined) {
    checkTagged(holding, 'holdingTime', HOLDING_RULES, out);
  }

  // ── agentPools ──
  const pools = spec['agentPools'];
  const currencies = new Set([fiat, typeof spec['token'] === 'string' ? spec['token'] : '']);
  const poolNames = new Set<string>();
  if (pools !== undefined) {
    if (!Array.isArray(pools)) {
      out.error('agentPools', 'array', pools, 'agentPools must be an array');
    } else {
      if (pools.length === 0) out.warn('agentPools', 'No agent pools: every step has zero volume');
      pools.forEach((pool, i) => checkPool(pool, `agentPools[${i}]`, currencies, poolNames, out));
    }
  } else {
    out.warn('agentPools', 'No agent pools: every step has zero volume');
  }

  // ── supplyControllers ──
  const controllers = spec['supplyControllers'];
  if (controllers !== undefined) {
    if (!Array.isArray(controllers)) {
      out.error('supplyControllers', 'array', controllers, 'supplyControllers must be an array');
    } else {
      controllers.forEach((c, i) => checkTagged(c, `supplyControllers[${i}]`, SUPPLY_RULES, out));
      if (controllers.length > 0 && spec['burnMint'] === false) {
        out.warn('supplyControllers', 'burnMint is false: supply controllers will not run');
      }
    }
  }

  // ── addOns ──
  const addOns = spec['addOns'];
  if (addOns !== undefined) {
    if (!Array.isArray(addOns)) {
      out.error('addOns', 'array', addOns, 'addOns must be an array');
    } else {
      addOns.forEach((a, i) => {
        const path = `addOns[${i}]`;
        checkTagged(a, path, ADD_ON_RULES, out, ['target']);
        if (isRecord(a) && a['target'] !== undefined && typeof a['target'] !== 'string') {
          out.error(`${path}.target`, 'string', a['target'], 'Add-on target must be a variable name');
        }
      });
    }
  }

  return { valid: out.errors.length === 0, errors: out.errors, warnings: out.warnings };
}

/** Throws a ConfigurationError listing every problem when the description is not a valid scenario. */
export function assertScenarioSpec(spec: unknown): asserts spec is ScenarioSpec {
  const result = validateScenarioSpec(spec);
  if (!result.valid) {
    const detail = result.errors.map(e => `${e.path || '<root>'}: ${e.message}`).join('; ');
    throw new ConfigurationError(`Invalid scenario: ${detail}`);
  }
}

// ── Nested checks ────────────────────────────────────────────────────────────

function checkPool(pool: unknown, path: string, currencies: Set<string>, names: Set<string>, out: Collector): void {
  if (!isRecord(pool)) {
    out.error(path, 'object', pool, 'Agent pool must be an object');
    return;
  }
  checkFields(
    pool,
    { name: opt('string'), currency: req('string'), activationStep: opt('nonNegativeInteger'), buyback: opt('boolean') },
    path,
    out,
    new Set(['name', 'currency', 'activationStep', 'buyback', 'users', 'transactions']),
  );
  const currency = pool['currency'];
  if (typeof currency === 'string' && !currencies.has(currency)) {
    out.error(`${path}.currency`, [...currencies].join(' | '), currency, `Pool trades in unknown currency "${currency}"`);
  }
  const name = typeof pool['name'] === 'string' ? pool['name'] : currency;
  if (typeof name === 'string') {
    if (names.has(name)) out.error(`${path}.name`, 'unique name', name, `Duplicate agent pool name "${name}"`);
    names.add(name);
  }

  checkNumericOrTagged(pool['users'], `${path}.users`, USER_RULES, out);
  checkNumericOrTagged(pool['transactions'], `${path}.transactions`, TRANSACTION_RULES, out);
}

/** Accepts a number, a number array, or a `{ type }` object from `table`. */
function checkNumericOrTagged(value: unknown, path: string, table: Record<string, Rules>, out: Collector): void {
  if (value === undefined) {
    out.error(path, 'number | number[] | object', value, `${path} is required`);
    return;
  }
  if (typeof value === 'number' || Array.isArray(value)) {
    checkField(value, 'numberOrArray', path, out);
    return;
  }
  checkTagged(value, path, table, out);
}

function checkTagged(
  value: unknown,
  path: string,
  table: Record<string, Rules>,
  out: Collector,
  extraKeys: string[] = [],
): void {
  if (!isRecord(value)) {
    out.error(path, 'object', value, `${path} must be an object with a "type"`);
    return;
  }
  const type = value['type'];
  const types = Object.keys(table);
  const rules = typeof type === 'string' && Object.hasOwn(table, type) ? table[type] : undefined;
  if (!rules) {
    out.error(`${path}.type`, types.join(' | '), type, `Unknown ${path} type "${String(type)}"`);
    return;
  }
  checkFields(value, rules, path, out, new Set(['type', ...extraKeys, ...Object.keys(rules)]));
}

function checkFields(
  obj: Record<string, unknown>,
  rules: Rules,
  path: string,
  out: Collector,
  known: Set<string>,
): void {
  for (const [key, rule] of Object.entries(rules)) {
    const fieldPath = path ? `${path}.${key}` : key;
    const value = obj[key];
    if (value === undefined) {
      if (rule.required) out.error(fieldPath, rule.kind, value, `${fieldPath} is required`);
      continue;
    }
    checkField(value, rule.kind, fieldPath, out);
  }
  for (const key of Object.keys(obj)) {
    if (!known.has(key)) out.warn(path ? `${path}.${key}` : key, `Unknown field "${key}" is ignored`);
  }
}

function checkField(value: unknown, kind: FieldKind, path: string, out: Collector): void {
  switch (kind) {
    case 'number':
      if (!isFiniteNumber(value)) out.error(path, 'finite number', value, `${path} must be a finite number`);
      return;
    case 'nonNegativeNumber':
      if (!isFiniteNumber(value) || value < 0) out.error(path, 'number >= 0', value, `${path} must be a number >= 0`);
      return;
    case 'nonNegativeInteger':
      if (!isFiniteNumber(value) || !Number.isInteger(value) || value < 0) {
        out.error(path, 'non-negative integer', value, `${path} must be a non-negative integer`);
      }
      return;
    case 'positiveInteger':
      if (!isFiniteNumber(value) || !Number.isInteger(value) || value <= 0) {
        out.error(path, 'positive integer', value, `${path} must be a positive integer`);
      }
      return;
    case 'boolean':
      if (typeof value !== 'boolean') out.error(path, 'boolean', value, `${path} must be a boolean`);
      return;
    case 'string':
      if (typeof value !== 'string') out.error(path, 'string', value, `${path} must be a string`);
      return;
    case 'numberArray':
      if (!isNumberArray(value)) out.error(path, 'number[]', value, `${path} must be an array of finite numbers`);
      return;
    case 'numberOrArray':
      if (!isFiniteNumber(value) && !isNumberArray(value)) {
        out.error(path, 'number | number[]', value, `${path} must be a finite number or an array of them`);
      }
      return;
    case 'distribution':
      checkDistribution(value, path, out);
      return;
    case 'distributionSchedule':
      if (Array.isArray(value)) {
        if (value.length === 0) out.error(path, 'non-empty array', value, `${path} must not be empty`);
        value.forEach((d, i) => checkDistribution(d, `${path}[${i}]`, out));
      } else {
        checkDistribution(value, path, out);
      }
      return;
    case 'addOns':
      if (!Array.isArray(value)) {
        out.error(path, 'array', value, `${path} must be an array`);
        return;
      }
      value.forEach((a, i) => checkTagged(a, `${path}[${i}]`, ADD_ON_RULES, out));
      return;
    case 'space':
      if (typeof value !== 'string' || !SPACE_KINDS.has(value)) {
        out.error(path, [...SPACE_KINDS].join(' | '), value, `${path} must be a known spacing`);
      }
      return;
    case 'sign':
      if (typeof value !== 'string' || !SIGN_POLICIES.has(value)) {
        out.error(path, [...SIGN_POLICIES].join(' | '), value, `${path} must be positive, negative or mixed`);
      }
      return;
    case 'style':
      if (typeof value !== 'string' || !SUPPLY_STYLES.has(value)) {
        out.error(path, 'perc | fixed', value, `${path} must be "perc" or "fixed"`);
      }
      return;
  }
}

function checkDistribution(value: unknown, path: string, out: Collector): void {
  if (!isRecord(value)) {
    out.error(path, 'distribution object', value, `${path} must be a distribution object`);
    return;
  }
  const kind = value['kind'];
  const rules = typeof kind === 'string' && isDistributionKind(kind) ? DISTRIBUTION_PARAMS[kind] : undefined;
  if (!rules) {
    out.error(`${path}.kind`, Object.keys(DISTRIBUTION_PARAMS).join(' | '), kind, `Unknown distribution "${String(kind)}"`);
    return;
  }
  checkFields(value, rules, path, out, new Set(['kind', ...Object.keys(rules)]));
}

// ── Helpers ──────────────────────────────────────────────────────────────────

function isDistributionKind(kind: string): kind is DistributionKind {
  return Object.hasOwn(DISTRIBUTION_PARAMS, kind);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every(isFiniteNumber);
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (Array.isArray(value)) return `array(${value.length})`;
  return typeof value;
}
