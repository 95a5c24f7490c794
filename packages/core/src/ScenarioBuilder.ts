// ScenarioBuilder: wires components from a declarative scenario description

import type {
  AddOn,
  HoldingTimeModel,
  Logger,
  PriceFunction,
  SamplerFactory,
  SupplyController,
  TransactionModel,
  UserGrowth,
} from './types.js';
import type {
  AddOnSpec,
  AgentPoolSpec,
  HoldingTimeSpec,
  PriceFunctionSpec,
  ScenarioSpec,
  SupplyControllerSpec,
  TransactionSpec,
  UserGrowthSpec,
} from './ScenarioSpec.js';
import { ProportionalNoise, RandomNoise, RandomReduction, TimedMultiplier } from './AddOns.js';
import { AgentPool } from './AgentPool.js';
import { AdaptiveHoldingTime, ConstantHoldingTime, StochasticHoldingTime } from './HoldingTime.js';
import { ConstantElasticity, EquationOfExchange, LogLinearRegression } from './PriceFunctions.js';
import {
  AdaptiveStochasticSupply,
  BurnController,
  CliffVesting,
  InvestorDump,
  MintController,
  Speculator,
  SupplyFromData,
} from './SupplyControllers.js';
import {
  ConstantTransactions,
  LinearTransactions,
  MarketCapTransactions,
  StochasticTransactions,
  TransactionsFromData,
  TrendTransactions,
} from './TransactionModels.js';
import { LogisticUsers, SpacedUsers, StochasticUsers, UsersFromData, ConstantUsers } from './UserGrowth.js';
import { TokenEconomy } from './TokenEconomy.js';
import { TokenMetaSimulator, type MetaSimulatorOptions } from './TokenMetaSimulator.js';
import { assertScenarioSpec } from './ScenarioValidator.js';

export interface BuildOptions {
  samplerFactory?: SamplerFactory;
  logger?: Logger;
  seed?: number;
}

export function buildAddOn(spec: AddOnSpec): AddOn {
  switch (spec.type) {
    case 'randomNoise': return new RandomNoise(spec.distribution);
    case 'proportionalNoise': return new ProportionalNoise({ mean: spec.mean, divisor: spec.divisor });
    case 'randomReduction': return new RandomReduction(spec.distribution);
    case 'timedMultiplier': return new TimedMultiplier(spec.multiplier, { from: spec.from, to: spec.to });
  }
}

function buildAddOns(specs: readonly AddOnSpec[] | undefined): AddOn[] {
  return (specs ?? []).map(buildAddOn);
}

export function buildUserGrowth(spec: UserGrowthSpec): UserGrowth {
  if (typeof spec === 'number') return new ConstantUsers(spec);
  if (Array.isArray(spec)) return new UsersFromData(spec);
  switch (spec.type) {
    case 'spaced':
      return new SpacedUsers({
        initial: spec.initial,
        final: spec.final,
        steps: spec.steps,
        space: spec.space,
        useDifference: spec.useDifference,
        addOns: buildAddOns(spec.addOns),
      });
    case 'stochastic':
      return new StochasticUsers({
        distribution: spec.distribution,
        addToUserbase: spec.addToUserbase,
        initial: spec.initial,
        addOns: buildAddOns(spec.addOns),
      });
    case 'logistic':
      return new LogisticUsers({
        initial: spec.initial,
        rate: spec.rate,
        capacity: spec.capacity,
        addOns: buildAddOns(spec.addOns),
      });
  }
}

export function buildTransactionModel(spec: TransactionSpec): TransactionModel {
  if (typeof spec === 'number') return new ConstantTransactions(spec);
  if (Array.isArray(spec)) return new TransactionsFromData(spec);
  switch (spec.type) {
    case 'constant':
      return new ConstantTransactions(spec.perUser, { ignoreUsers: spec.ignoreUsers, addOns: buildAddOns(spec.addOns) });
    case 'trend':
      return new TrendTransactions({
        initial: spec.initial,
        final: spec.final,
        steps: spec.steps,
        space: spec.space,
        addOns: buildAddOns(spec.addOns),
      });
    case 'linear':
      return new LinearTransactions(spec.start, spec.increment, buildAddOns(spec.addOns));
    case 'stochastic':
      return new StochasticTransactions({
        activity: spec.activity,
        transactionsPerUser: spec.transactionsPerUser,
        transactionsDistribution: spec.transactionsDistribution,
        valuePerTransaction: spec.valuePerTransaction,
        valueDistribution: spec.valueDistribution,
        sign: spec.sign,
        sampleSize: spec.sampleSize,
      });
    case 'marketCap':
      return new MarketCapTransactions({ distribution: spec.distribution, sign: spec.sign });
  }
}

export function buildAgentPool(spec: AgentPoolSpec): AgentPool {
  return new AgentPool({
    currency: spec.currency,
    name: spec.name,
    users: buildUserGrowth(spec.users),
    transactions: buildTransactionModel(spec.transactions),
    activationStep: spec.activationStep,
    buyback: spec.buyback,
  });
}

export function buildSupplyController(spec: SupplyControllerSpec): SupplyController {
  switch (spec.type) {
    case 'burn':
    case 'mint': {
      const options = { param: spec.param, style: spec.style, selfDestruct: spec.selfDestruct, name: spec.name };
      return spec.type === 'burn' ? new BurnController(options) : new MintController(options);
    }
    case 'data':
      return new SupplyFromData(spec.deltas, spec.name);
    case 'cliffVesting':
      return new CliffVesting({
        amount: spec.amount,
        vestingPeriod: spec.vestingPeriod,
        cliff: spec.cliff,
        delay: spec.delay,
        name: spec.name,
      });
    case 'investorDump':
      return new InvestorDump({
        initial: spec.initial,
        final: spec.final,
        steps: spec.steps,
        space: spec.space,
        name: spec.name,
      });
    case 'adaptiveStochastic':
      return new AdaptiveStochasticSupply({
        removal: spec.removal,
        addition: spec.addition,
        allowNetRemoval: spec.allowNetRemoval,
        name: spec.name,
      });
    case 'speculator':
      return new Speculator({
        share: spec.share,
        takeProfit: spec.takeProfit,
        stopLoss: spec.stopLoss,
        maxShareOfSupply: spec.maxShareOfSupply,
        name: spec.name,
      });
  }
}

export function buildHoldingTime(spec: HoldingTimeSpec): HoldingTimeModel {
  if (typeof spec === 'number') return new ConstantHoldingTime(spec);
  switch (spec.type) {
    case 'constant': return new ConstantHoldingTime(spec.value);
    case 'stochastic': return new StochasticHoldingTime({ distribution: spec.distribution, minimum: spec.minimum });
    case 'adaptive':
      return new AdaptiveHoldingTime({
        initial: spec.initial,
        minimum: spec.minimum,
        maximum: spec.maximum,
        addOns: buildAddOns(spec.addOns),
      });
  }
}

export function buildPriceFunction(spec: PriceFunctionSpec): PriceFunction {
  switch (spec.type) {
    case 'equationOfExchange':
      return new EquationOfExchange({
        useVelocity: spec.useVelocity,
        smoothing: spec.smoothing,
        addOns: buildAddOns(spec.addOns),
      });
    case 'constantElasticity':
      return new ConstantElasticity(spec.elasticity);
    case 'logLinearRegression':
      return new LogLinearRegression({
        topAppreciation: spec.topAppreciation,
        stdPrior: spec.stdPrior,
        anchoring: spec.anchoring,
        proportionalNoise: spec.proportionalNoise,
        df: spec.df,
      });
  }
}

/** Validates `input` and builds a ready-to-run economy. Throws ConfigurationError on invalid input. */
export function buildEconomy(input: unknown, options: BuildOptions = {}): TokenEconomy {
  assertScenarioSpec(input);
  const spec: ScenarioSpec = input;
  return new TokenEconomy({
    name: spec.name,
    token: spec.token,
    fiat: spec.fiat,
    unitOfTime: spec.unitOfTime,
    initialPrice: spec.initialPrice,
    supply: spec.supply,
    iterations: spec.iterations,
    burnMint: spec.burnMint,
    burnSpentTokens: spec.burnSpentTokens,
    safeguardSupply: spec.safeguardSupply,
    holdingTime: spec.holdingTime === undefined ? undefined : buildHoldingTime(spec.holdingTime),
    priceFunction: buildPriceFunction(spec.priceFunction),
    agentPools: (spec.agentPools ?? []).map(buildAgentPool),
    supplyControllers: (spec.supplyControllers ?? []).map(buildSupplyController),
    addOns: (spec.addOns ?? []).map(a => ({ addOn: buildAddOn(a), target: a.target })),
    samplerFactory: options.samplerFactory,
    seed: options.seed,
    logger: options.logger,
  });
}

/** Builds one economy per description and a simulator over all of them. */
export function buildSimulator(
  scenarios: readonly unknown[],
  options: MetaSimulatorOptions = {},
): TokenMetaSimulator {
  const economies = scenarios.map(s =>
    buildEconomy(s, { samplerFactory: options.samplerFactory, logger: options.logger }),
  );
  return new TokenMetaSimulator(economies, options);
}
