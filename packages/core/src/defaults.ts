import type { UnitOfTime } from './types.js';

export const DEFAULT_ECONOMY = {
  fiat: '$',
  unitOfTime: 'day' as UnitOfTime,
  burnMint: true,
  burnSpentTokens: false,
  safeguardSupply: false,
  holdingTime: 1,
};

export const UNITS_OF_TIME: readonly UnitOfTime[] = ['day', 'week', 'month', 'quarter', 'year'];

/** Keeps effective holding time finite when a step has no fiat volume. */
export const VOLUME_EPSILON = 1e-9;

export const DEFAULT_SIMULATOR = {
  /** Yield to the event loop after this many repetitions. */
  yieldEvery: 1,
  maxHandlersPerEvent: 100,
};

