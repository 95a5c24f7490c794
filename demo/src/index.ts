/**
 * TokenSim demo: a small token launch under three supply policies.
 *
 * Run with `npm run demo`. Prints a per-variable report for each scenario
 * and the price band at a few checkpoints.
 */

import {
  AgentPool,
  BurnController,
  EquationOfExchange,
  MintController,
  RandomNoise,
  SpacedUsers,
  StochasticTransactions,
  TokenEconomy,
  TokenMetaSimulator,
  createConsoleLogger,
  type SupplyController,
} from '@tokensim/core';

const ITERATIONS = 52;
const REPETITIONS = 200;
const logger = createConsoleLogger('[TokenSim Demo]');

function launch(name: string, supplyControllers: SupplyController[]): TokenEconomy {
  return new TokenEconomy({
    name,
    token: 'tok',
    unitOfTime: 'week',
    initialPrice: 0.03,
    supply: 1_000_000,
    holdingTime: 4,
    priceFunction: new EquationOfExchange({ smoothing: 0.5 }),
    agentPools: [
      new AgentPool({
        name: 'buyers',
        currency: '$',
        users: new SpacedUsers({ initial: 50, final: 2000, steps: ITERATIONS, space: 'logisticSaturated' }),
        transactions: new StochasticTransactions({
          activity: 0.6,
          transactionsDistribution: { kind: 'poisson', mean: 2 },
          valueDistribution: { kind: 'lognormal', mu: 3, sigma: 0.8 },
        }),
      }),
      new AgentPool({
        name: 'sellers',
        currency: 'tok',
        users: 20,
        transactions: new StochasticTransactions({
          transactionsPerUser: 1,
          valueDistribution: { kind: 'uniform', min: 100, max: 500 },
          sign: 'negative',
        }),
        activationStep: 12,
      }),
    ],
    supplyControllers,
    addOns: [new RandomNoise({ kind: 'normal', mean: 0, std: 0.0005 })],
    logger,
  });
}

async function main(): Promise<void> {
  const simulator = new TokenMetaSimulator(
    {
      fixed: launch('fixed', []),
      burn: launch('burn', [new BurnController({ param: 0.002 })]),
      emission: launch('emission', [new MintController({ param: 2000, style: 'fixed' })]),
    },
    { seed: 2024, logger },
  );

  simulator.on('failure', f => logger.warn(`${f.scenario} #${f.repetition}: ${f.message}`));

  const result = await simulator.execute(ITERATIONS, REPETITIONS);
  logger.info(`Finished ${result.repetitions} repetitions x ${result.iterations} weeks in ${result.durationMs}ms`);

  for (const scenario of simulator.scenarioNames) {
    console.log(`\n── ${scenario} ──`);
    console.table(
      simulator
        .getReport({ scenario, variables: ['tok_price', 'tok_supply', 'num_users', 'transactions_$'] })
        .map(r => ({ variable: r.variable, mean: r.mean, p10: r.p10, p90: r.p90 })),
    );
    const bands = simulator.getSummary('tok_price', scenario);
    for (const step of [0, 12, 26, ITERATIONS - 1]) {
      const band = bands[step];
      if (band) {
        console.log(`week ${step + 1}: median ${band.median.toFixed(4)}  [${band.p10.toFixed(4)}, ${band.p90.toFixed(4)}]`);
      }
    }
  }
}

main().catch((err: unknown) => {
  logger.error('Demo failed:', err);
  process.exit(1);
});
