// Declarative scenario description: the JSON shape accepted by the builder and the server.

import type { Distribution, SignPolicy, SpaceKind, SupplyStyle, UnitOfTime } from './types.js';

export type DistributionScheduleSpec = Distribution | Distribution[];

// ── Add-ons ──

export type AddOnSpec =
  | { type: 'randomNoise'; distribution?: Distribution }
  | { type: 'proportionalNoise'; mean?: number; divisor?: number }
  | { type: 'randomReduction'; distribution?: Distribution }
  | { type: 'timedMultiplier'; multiplier: number; from: number; to: number };

export type TargetedAddOnSpec = AddOnSpec & { target?: string };

// ── Pools ──

export type UserGrowthSpec =
  | number
  | number[]
  | { type: 'spaced'; initial: number; final: number; steps: number; space?: SpaceKind; useDifference?: boolean; addOns?: AddOnSpec[] }
  | { type: 'stochastic'; distribution: DistributionScheduleSpec; addToUserbase?: boolean; initial?: number; addOns?: AddOnSpec[] }
  | { type: 'logistic'; initial: number; rate: number; capacity: number; addOns?: AddOnSpec[] };

export type TransactionSpec =
  | number
  | number[]
  | { type: 'constant'; perUser: number; ignoreUsers?: boolean; addOns?: AddOnSpec[] }
  | { type: 'trend'; initial: number; final: number; steps: number; space?: SpaceKind; addOns?: AddOnSpec[] }
  | { type: 'linear'; start: number; increment: number; addOns?: AddOnSpec[] }
  | {
      type: 'stochastic';
      activity?: number | number[];
      transactionsPerUser?: number;
      transactionsDistribution?: DistributionScheduleSpec;
      valuePerTransaction?: number;
      valueDistribution?: DistributionScheduleSpec;
      sign?: SignPolicy;
      sampleSize?: number;
    }
  | { type: 'marketCap'; distribution?: Distribution; sign?: SignPolicy };

export interface AgentPoolSpec {
  name?: string;
  currency: string;
  users: UserGrowthSpec;
  transactions: TransactionSpec;
  activationStep?: number;
  buyback?: boolean;
}

// ── Supply ──

export type SupplyControllerSpec =
  | { type: 'burn' | 'mint'; param: number; style?: SupplyStyle; selfDestruct?: boolean; name?: string }
  | { type: 'data'; deltas: number[]; name?: string }
  | { type: 'cliffVesting'; amount: number; vestingPeriod: number; cliff: number; delay?: number; name?: string }
  | { type: 'investorDump'; initial: number; final: number; steps: number; space?: SpaceKind; name?: string }
  | { type: 'adaptiveStochastic'; removal?: Distribution; addition?: Distribution; allowNetRemoval?: boolean; name?: string }
  | { type: 'speculator'; share?: Distribution; takeProfit?: number; stopLoss?: number; maxShareOfSupply?: number; name?: string };

// ── Holding time / price ──

export type HoldingTimeSpec =
  | number
  | { type: 'constant'; value: number }
  | { type: 'stochastic'; distribution?: DistributionScheduleSpec; minimum?: number }
  | { type: 'adaptive'; initial: number; minimum?: number; maximum?: number; addOns?: AddOnSpec[] };

export type PriceFunctionSpec =
  | { type: 'equationOfExchange'; useVelocity?: boolean; smoothing?: number; addOns?: AddOnSpec[] }
  | { type: 'constantElasticity'; elasticity: number }
  | {
      type: 'logLinearRegression';
      topAppreciation?: number;
      stdPrior?: number;
      anchoring?: number;
      proportionalNoise?: boolean;
      df?: number;
    };

export interface ScenarioSpec {
  name?: string;
  token: string;
  fiat?: string;
  unitOfTime?: UnitOfTime;
  initialPrice: number;
  supply: number | number[];
  iterations?: number;
  burnMint?: boolean;
  burnSpentTokens?: boolean;
  safeguardSupply?: boolean;
  holdingTime?: HoldingTimeSpec;
  priceFunction: PriceFunctionSpec;
  agentPools?: AgentPoolSpec[];
  supplyControllers?: SupplyControllerSpec[];
  addOns?: TargetedAddOnSpec[];
}
