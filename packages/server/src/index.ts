export { SimulationServer } from './SimulationServer.js';
export type { ServerConfig, SimulationJob, JobSummary, JobStatus } from './SimulationServer.js';
export { validateSimulationRequest } from './validation.js';
export type { SimulationLimits, SimulationRequest, RequestValidation } from './validation.js';

/**
 * Quick-start helper: creates and starts a simulation server.
 *
 * @example
 * ```ts
 * import { startServer } from '@tokensim/server';
 * const server = await startServer({ port: 3100 });
 * // POST /simulations, GET /simulations/:id, etc.
 * ```
 */
export async function startServer(
  config?: import('./SimulationServer.js').ServerConfig,
): Promise<import('./SimulationServer.js').SimulationServer> {
  const { SimulationServer } = await import('./SimulationServer.js');
  const server = new SimulationServer(config);
  await server.start();
  return server;
}
