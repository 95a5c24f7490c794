// @tokensim/core: main entry point

export { TokenEconomy } from './TokenEconomy.js';
export type { TokenEconomyConfig, AddOnBinding, ResetOptions } from './TokenEconomy.js';
export { TokenMetaSimulator } from './TokenMetaSimulator.js';
export type {
  MetaSimulatorOptions,
  ExecuteOptions,
  ReportOptions,
  SimulatorEvent,
  SimulatorEventMap,
  SimulatorHandler,
} from './TokenMetaSimulator.js';
export { AgentPool } from './AgentPool.js';
export type { AgentPoolConfig } from './AgentPool.js';
export { HistoryTable } from './HistoryTable.js';

export {
  RandomNoise,
  ProportionalNoise,
  RandomReduction,
  TimedMultiplier,
  ConditionalAddOn,
  addOn,
  applyAddOns,
  resetAddOns,
} from './AddOns.js';
export type { ConditionPredicate } from './AddOns.js';
export {
  ConstantUsers,
  UsersFromData,
  SpacedUsers,
  StochasticUsers,
  LogisticUsers,
  toUserGrowth,
} from './UserGrowth.js';
export type { SpacedUsersOptions, StochasticUsersOptions } from './UserGrowth.js';
export {
  ConstantTransactions,
  TransactionsFromData,
  TrendTransactions,
  LinearTransactions,
  StochasticTransactions,
  MarketCapTransactions,
  toTransactionModel,
} from './TransactionModels.js';
export type {
  TransactionsFromDataOptions,
  TrendTransactionsOptions,
  StochasticTransactionsOptions,
} from './TransactionModels.js';
export {
  ConstantHoldingTime,
  StochasticHoldingTime,
  AdaptiveHoldingTime,
  toHoldingTimeModel,
} from './HoldingTime.js';
export type { AdaptiveHoldingTimeOptions } from './HoldingTime.js';
export {
  EquationOfExchange,
  ConstantElasticity,
  BondingCurve,
  IssuanceCurve,
  LogLinearRegression,
  priceFunction,
  velocityFromHoldingTime,
} from './PriceFunctions.js';
export type { EquationOfExchangeOptions, LogLinearRegressionOptions } from './PriceFunctions.js';
export {
  BurnController,
  MintController,
  SupplyFromData,
  CliffVesting,
  InvestorDump,
  AdaptiveStochasticSupply,
  Speculator,
  supplyController,
} from './SupplyControllers.js';
export type {
  RateControllerOptions,
  CliffVestingOptions,
  InvestorDumpOptions,
  AdaptiveStochasticOptions,
  SpeculatorOptions,
} from './SupplyControllers.js';

// Scenario descriptions
export { validateScenarioSpec, assertScenarioSpec } from './ScenarioValidator.js';
export type { ValidationError, ValidationWarning, ValidationResult } from './ScenarioValidator.js';
export {
  buildEconomy,
  buildSimulator,
  buildAddOn,
  buildAgentPool,
  buildHoldingTime,
  buildPriceFunction,
  buildSupplyController,
  buildTransactionModel,
  buildUserGrowth,
} from './ScenarioBuilder.js';
export type { BuildOptions } from './ScenarioBuilder.js';
export * from './ScenarioSpec.js';

// Randomness, sequences and statistics
export {
  createSampler,
  defaultSamplerFactory,
  deriveSeed,
  randomSeed,
  distributionAt,
  distributionMean,
  assertDistribution,
} from './Sampler.js';
export {
  linspace,
  logspace,
  geomspace,
  logSaturatedSpace,
  logisticSaturatedSpace,
  space,
  differences,
  distributionSequence,
  harmonizeSequence,
  mergeSequences,
} from './sequences.js';
export type { SpaceOptions } from './sequences.js';
export { mean, std, median, quantile, summarize, clamp } from './utils.js';
export type { Summary } from './utils.js';

export { economyKeys, poolKeys } from './variables.js';
export type { EconomyKeys } from './variables.js';
export { createConsoleLogger, silentLogger, defaultLogger } from './logger.js';
export { DEFAULT_ECONOMY, DEFAULT_SIMULATOR, UNITS_OF_TIME } from './defaults.js';
export {
  SimulationError,
  ConfigurationError,
  NumericalError,
  InvalidParameterError,
  AllRepetitionsFailedError,
  KeyNotFoundError,
  InconsistentSeriesError,
  isSimulationError,
} from './errors.js';
export type { SimulationErrorCode } from './errors.js';
export * from './types.js';
