import { describe, it, expect, vi } from 'vitest';
import { AgentPool } from '../src/AgentPool.js';
import { ConfigurationError, NumericalError } from '../src/errors.js';
import type { TransactionModel, UserGrowth } from '../src/types.js';
import { makeContext } from './helpers.js';

describe('AgentPool', () => {
  it('produces users, then volume from those users', () => {
    const pool = new AgentPool({ currency: '$', users: 10, transactions: 2 });
    expect(pool.step(makeContext())).toBe(20);
    expect(pool.users).toBe(10);
    expect(pool.volume).toBe(20);
    expect(pool.name).toBe('$');
  });

  it('passes its own users to the transaction model', () => {
    const nextVolume = vi.fn(() => 1);
    const pool = new AgentPool({
      currency: 'tok',
      name: 'holders',
      users: [3, 4],
      transactions: { nextVolume, reset: () => {} },
    });
    pool.step(makeContext(1));
    expect(nextVolume).toHaveBeenCalledWith(
      expect.objectContaining({ step: 1, pool: { name: 'holders', currency: 'tok', users: 4 } }),
    );
  });

  it('reports nothing before its activation step', () => {
    const pool = new AgentPool({ currency: '$', users: 10, transactions: 2, activationStep: 2 });
    expect(pool.step(makeContext(0))).toBe(0);
    expect(pool.users).toBe(0);
    expect(pool.step(makeContext(2))).toBe(20);
  });

  it('rejects an invalid activation step or missing currency', () => {
    expect(() => new AgentPool({ currency: '$', users: 1, transactions: 1, activationStep: -1 })).toThrow(
      ConfigurationError,
    );
    expect(() => new AgentPool({ currency: '', users: 1, transactions: 1 })).toThrow(ConfigurationError);
  });

  it('raises NumericalError on non-finite volume', () => {
    const transactions: TransactionModel = { nextVolume: () => Number.NaN, reset: () => {} };
    const pool = new AgentPool({ currency: '$', name: 'buyers', users: 1, transactions });
    try {
      pool.step(makeContext(3));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(NumericalError);
      if (err instanceof NumericalError) {
        expect(err.variable).toBe('buyers_transactions');
        expect(err.step).toBe(3);
      }
    }
  });

  it('raises NumericalError on negative users from a custom model', () => {
    const users: UserGrowth = { nextUsers: () => -1, reset: () => {} };
    const pool = new AgentPool({ currency: '$', users, transactions: 1 });
    expect(() => pool.step(makeContext())).toThrow(NumericalError);
  });

  it('reset clears readings and resets its models', () => {
    const reset = vi.fn();
    const pool = new AgentPool({ currency: '$', users: { nextUsers: () => 5, reset }, transactions: 1 });
    pool.step(makeContext());
    pool.reset();
    expect(pool.users).toBe(0);
    expect(pool.volume).toBe(0);
    expect(reset).toHaveBeenCalledTimes(1);
  });
});
