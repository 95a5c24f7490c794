import { describe, it, expect } from 'vitest';
import { assertScenarioSpec, validateScenarioSpec } from '../src/ScenarioValidator.js';
import { ConfigurationError } from '../src/errors.js';

function validSpec(): Record<string, unknown> {
  return {
    token: 'tok',
    initialPrice: 0.03,
    supply: 1_000_000,
    priceFunction: { type: 'equationOfExchange' },
    agentPools: [
      {
        currency: '$',
        users: 1,
        transactions: {
          type: 'stochastic',
          transactionsPerUser: 1,
          valueDistribution: { kind: 'uniform', min: 100, max: 200 },
        },
      },
    ],
  };
}

describe('validateScenarioSpec', () => {
  it('accepts a complete scenario without warnings', () => {
    expect(validateScenarioSpec(validSpec())).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it('rejects non-objects at the root', () => {
    const result = validateScenarioSpec(null);
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      { path: '', expected: 'object', received: 'null', message: 'Scenario must be a non-null object' },
    ]);
  });

  it('requires a price function', () => {
    const spec = validSpec();
    delete spec['priceFunction'];
    const result = validateScenarioSpec(spec);
    expect(result.errors).toEqual([
      { path: 'priceFunction', expected: 'object', received: 'undefined', message: 'A price function is required' },
    ]);
  });

  it('catches a supply schedule that does not match the iteration count', () => {
    const spec = { ...validSpec(), supply: new Array<number>(9).fill(1000), iterations: 270 };
    const result = validateScenarioSpec(spec);
    expect(result.errors).toEqual([
      {
        path: 'supply',
        expected: 'array(270)',
        received: 'array(9)',
        message: 'Supply schedule has 9 entries but 270 iterations are planned',
      },
    ]);
  });

  it('accepts buyback pools and the supply safeguard as booleans only', () => {
    const ok = { ...validSpec(), safeguardSupply: true, agentPools: [{ currency: '$', users: 1, transactions: 5, buyback: true }] };
    expect(validateScenarioSpec(ok).valid).toBe(true);

    const bad = { ...validSpec(), safeguardSupply: 1, agentPools: [{ currency: '$', users: 1, transactions: 5, buyback: 'yes' }] };
    const result = validateScenarioSpec(bad);
    expect(result.errors.map(e => [e.path, e.message])).toEqual([
      ['safeguardSupply', 'safeguardSupply must be a boolean'],
      ['agentPools[0].buyback', 'agentPools[0].buyback must be a boolean'],
    ]);
  });

  it('flags negative supply entries by index', () => {
    const result = validateScenarioSpec({ ...validSpec(), supply: [10, -1] });
    expect(result.errors.map(e => e.path)).toEqual(['supply[1]']);
  });

  it('rejects a token labelled like the fiat currency', () => {
    const result = validateScenarioSpec({ ...validSpec(), token: '$', agentPools: [] });
    expect(result.errors.map(e => e.path)).toEqual(['fiat']);
  });

  it('rejects an unknown unit of time', () => {
    const result = validateScenarioSpec({ ...validSpec(), unitOfTime: 'fortnight' });
    expect(result.errors[0]?.message).toBe('Unknown unit of time "fortnight"');
  });

  it('checks pool currencies and names', () => {
    const pool = { currency: '$', users: 1, transactions: 1 };
    const result = validateScenarioSpec({
      ...validSpec(),
      agentPools: [pool, pool, { currency: 'EUR', users: 1, transactions: 1 }],
    });
    expect(result.errors.map(e => e.path)).toEqual(['agentPools[1].name', 'agentPools[2].currency']);
    expect(result.errors[1]?.expected).toBe('$ | tok');
  });

  it('walks into nested distributions', () => {
    const spec = validSpec();
    spec['agentPools'] = [
      { currency: '$', users: 1, transactions: { type: 'stochastic', valueDistribution: { kind: 'cauchy' } } },
    ];
    const [error] = validateScenarioSpec(spec).errors;
    expect(error?.path).toBe('agentPools[0].transactions.valueDistribution.kind');
    expect(error?.received).toBe('string');
  });

  it('names the accepted types for an unknown tagged component', () => {
    const [error] = validateScenarioSpec({ ...validSpec(), priceFunction: { type: 'magic' } }).errors;
    expect(error).toEqual({
      path: 'priceFunction.type',
      expected: 'equationOfExchange | constantElasticity | logLinearRegression',
      received: 'string',
      message: 'Unknown priceFunction type "magic"',
    });
  });

  it('requires add-on targets to be variable names', () => {
    const result = validateScenarioSpec({
      ...validSpec(),
      addOns: [{ type: 'timedMultiplier', multiplier: 2, from: 0, to: 1, target: 5 }],
    });
    expect(result.errors.map(e => e.path)).toEqual(['addOns[0].target']);
  });

  it('warns about ignored fields, missing pools and disabled controllers', () => {
    const spec = {
      ...validSpec(),
      colour: 'red',
      agentPools: [],
      burnMint: false,
      supplyControllers: [{ type: 'burn', param: 0.1 }],
    };
    const result = validateScenarioSpec(spec);
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      { path: 'colour', message: 'Unknown field "colour" is ignored' },
      { path: 'agentPools', message: 'No agent pools: every step has zero volume' },
      { path: 'supplyControllers', message: 'burnMint is false: supply controllers will not run' },
    ]);
  });
});

describe('assertScenarioSpec', () => {
  it('throws a ConfigurationError listing every problem', () => {
    expect(() => assertScenarioSpec(42)).toThrow(ConfigurationError);
    expect(() => assertScenarioSpec(42)).toThrow('Invalid scenario: <root>: Scenario must be a non-null object');
  });

  it('passes valid input through', () => {
    const input: unknown = validSpec();
    assertScenarioSpec(input);
    expect(input.token).toBe('tok');
  });
});
