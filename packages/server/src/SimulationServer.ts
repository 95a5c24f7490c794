// SimulationServer: HTTP + WebSocket transport for Monte-Carlo runs

import * as http from 'node:http';
import { randomUUID } from 'node:crypto';
import {
  buildSimulator,
  createConsoleLogger,
  isSimulationError,
  type ExecutionResult,
  type Logger,
  type TokenMetaSimulator,
} from '@tokensim/core';
import { createRouteHandler } from './routes.js';
import { createWebSocketHandler, type WebSocketHandle } from './websocket.js';
import type { SimulationLimits, SimulationRequest } from './validation.js';

export interface ServerConfig {
  port?: number;
  host?: string;
  corsOrigin?: string;
  /** API key for authenticating mutation routes. When set, POST routes and WebSocket require `Authorization: Bearer <key>`. */
  apiKey?: string;
  /** Finished jobs kept for querying; the oldest are evicted first. */
  maxStoredJobs?: number;
  limits?: Partial<SimulationLimits>;
  logger?: Logger;
}

export type JobStatus = 'running' | 'completed' | 'cancelled' | 'failed';

export interface SimulationJob {
  readonly id: string;
  readonly createdAt: number;
  readonly iterations: number;
  readonly repetitions: number;
  readonly simulator: TokenMetaSimulator;
  readonly controller: AbortController;
  status: JobStatus;
  completed: number;
  finishedAt: number | null;
  result: ExecutionResult | null;
  error: string | null;
  /** Settles when the run ends, whatever the outcome. Never rejects. */
  done: Promise<void>;
}

export interface JobSummary {
  id: string;
  status: JobStatus;
  scenarios: string[];
  iterations: number;
  repetitions: number;
  progress: { completed: number; total: number };
  createdAt: string;
  finishedAt: string | null;
  result: ExecutionResult | null;
  error: string | null;
}

const DEFAULT_LIMITS: SimulationLimits = {
  maxIterations: 10_000,
  maxRepetitions: 10_000,
  maxScenarios: 16,
};

export class SimulationServer {
  private readonly server: http.Server;
  private readonly jobs = new Map<string, SimulationJob>();
  readonly port: number;
  private readonly host: string;
  private readonly startedAt = Date.now();
  private wsHandle: WebSocketHandle | null = null;
  readonly corsOrigin: string;
  readonly apiKey: string | undefined;
  readonly limits: SimulationLimits;
  readonly logger: Logger;
  private readonly maxStoredJobs: number;

  constructor(config: ServerConfig = {}) {
    this.port = config.port ?? 3100;
    this.host = config.host ?? '127.0.0.1';
    this.apiKey = config.apiKey;
    this.corsOrigin = config.corsOrigin ?? 'http://localhost:3100';
    this.limits = { ...DEFAULT_LIMITS, ...config.limits };
    this.maxStoredJobs = config.maxStoredJobs ?? 50;
    this.logger = config.logger ?? createConsoleLogger('[TokenSim Server]');

    const routeHandler = createRouteHandler(this);
    this.server = http.createServer(routeHandler);
  }

  async start(): Promise<void> {
    // Wire up WebSocket upgrade
    this.wsHandle = createWebSocketHandler(this.server, this);

    return new Promise((resolve) => {
      this.server.listen(this.port, this.host, () => {
        const addr = this.getAddress();
        this.logger.info(`Listening on http://${addr.host}:${addr.port}`);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    const running = [...this.jobs.values()].filter(j => j.status === 'running');
    for (const job of running) job.controller.abort();
    await Promise.all(running.map(j => j.done));
    if (this.wsHandle) this.wsHandle.cleanup();
    return new Promise((resolve, reject) => {
      this.server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  getAddress(): { port: number; host: string } {
    const addr = this.server.address();
    if (addr && typeof addr === 'object') {
      return { port: addr.port, host: addr.address };
    }
    return { port: this.port, host: this.host };
  }

  getUptime(): number {
    return Date.now() - this.startedAt;
  }

  // ── Jobs ──────────────────────────────────────────────────────────────────

  /**
   * Builds every scenario and starts the run in the background.
   * Throws ConfigurationError when a scenario cannot be wired.
   */
  submit(request: SimulationRequest): SimulationJob {
    const simulator = buildSimulator(request.scenarios, { seed: request.seed, logger: this.logger });
    const controller = new AbortController();
    const job: SimulationJob = {
      id: randomUUID(),
      createdAt: Date.now(),
      iterations: request.iterations,
      repetitions: request.repetitions,
      simulator,
      controller,
      status: 'running',
      completed: 0,
      finishedAt: null,
      result: null,
      error: null,
      done: Promise.resolve(),
    };

    simulator
      .on('repetition', (r) => {
        job.completed++;
        this.broadcast({
          type: 'repetition_complete',
          id: job.id,
          scenario: r.scenario,
          repetition: r.repetition,
          completed: job.completed,
          total: this.totalRepetitions(job),
        });
      })
      .on('failure', (f) => {
        job.completed++;
        this.broadcast({ type: 'repetition_failed', id: job.id, ...f });
      });

    this.jobs.set(job.id, job);
    this.evictFinished();
    job.done = this.run(job);
    this.logger.info(
      `Simulation ${job.id} started: ${simulator.scenarioNames.length} scenario(s), ` +
        `${request.repetitions} x ${request.iterations}`,
    );
    return job;
  }

  private async run(job: SimulationJob): Promise<void> {
    try {
      const result = await job.simulator.execute(job.iterations, job.repetitions, { signal: job.controller.signal });
      job.result = result;
      job.status = result.cancelled ? 'cancelled' : 'completed';
      job.finishedAt = Date.now();
      this.broadcast({ type: 'simulation_complete', id: job.id, status: job.status, result });
    } catch (err) {
      job.status = 'failed';
      job.error = err instanceof Error ? err.message : String(err);
      job.finishedAt = Date.now();
      if (isSimulationError(err)) {
        this.logger.warn(`Simulation ${job.id} failed: ${job.error}`);
      } else {
        this.logger.error(`Simulation ${job.id} crashed:`, err);
      }
      this.broadcast({ type: 'simulation_failed', id: job.id, error: job.error });
    }
  }

  getJob(id: string): SimulationJob | undefined {
    return this.jobs.get(id);
  }

  listJobs(): SimulationJob[] {
    return [...this.jobs.values()];
  }

  /** Requests cancellation. Returns false when the job has already finished. */
  cancel(id: string): boolean {
    const job = this.jobs.get(id);
    if (!job || job.status !== 'running') return false;
    job.controller.abort();
    return true;
  }

  summarize(job: SimulationJob): JobSummary {
    return {
      id: job.id,
      status: job.status,
      scenarios: job.simulator.scenarioNames,
      iterations: job.iterations,
      repetitions: job.repetitions,
      progress: { completed: job.completed, total: this.totalRepetitions(job) },
      createdAt: new Date(job.createdAt).toISOString(),
      finishedAt: job.finishedAt === null ? null : new Date(job.finishedAt).toISOString(),
      result: job.result,
      error: job.error,
    };
  }

  private totalRepetitions(job: SimulationJob): number {
    return job.repetitions * job.simulator.scenarioNames.length;
  }

  private evictFinished(): void {
    const finished = [...this.jobs.values()].filter(j => j.status !== 'running');
    let excess = finished.length - this.maxStoredJobs;
    for (const job of finished) {
      if (excess <= 0) break;
      this.jobs.delete(job.id);
      excess--;
    }
  }

  broadcast(data: Record<string, unknown>): void {
    if (this.wsHandle) this.wsHandle.broadcast(data);
  }
}
