// HTTP routes for the simulation server
// Node http module with manual body parsing. CORS on all responses.

import type * as http from 'node:http';
import { timingSafeEqual } from 'node:crypto';
import { ConfigurationError, KeyNotFoundError, validateScenarioSpec } from '@tokensim/core';
import type { SimulationJob, SimulationServer } from './SimulationServer.js';
import { isRecord, validateSimulationRequest } from './validation.js';

function setSecurityHeaders(res: http.ServerResponse): void {
  res.setHeader('X-Content-Type-Options', 'nosniff');
  res.setHeader('X-Frame-Options', 'DENY');
  res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
}

function setCorsHeaders(res: http.ServerResponse, allowedOrigin: string, requestOrigin?: string): void {
  setSecurityHeaders(res);
  // '*' allows all; otherwise reflect the request origin only when it matches.
  // Non-browser requests (no Origin) get the configured origin back.
  let origin: string;
  if (allowedOrigin === '*') {
    origin = '*';
  } else if (requestOrigin === undefined) {
    origin = allowedOrigin;
  } else {
    origin = requestOrigin.toLowerCase() === allowedOrigin.toLowerCase() ? requestOrigin : '';
  }
  if (origin) {
    res.setHeader('Access-Control-Allow-Origin', origin);
  }
  res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
}

/** Strips prototype-polluting keys from parsed JSON objects (recursive). */
export function sanitizeJson(obj: unknown): unknown {
  if (obj === null || typeof obj !== 'object') return obj;
  if (Array.isArray(obj)) return obj.map(sanitizeJson);
  const clean: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(obj)) {
    if (key === '__proto__' || key === 'constructor' || key === 'prototype') continue;
    clean[key] = sanitizeJson(val);
  }
  return clean;
}

function checkAuth(req: http.IncomingMessage, apiKey: string | undefined): boolean {
  if (!apiKey) return true; // no key configured = open
  const header = req.headers['authorization'];
  if (typeof header !== 'string') return false;
  const expected = `Bearer ${apiKey}`;
  if (header.length !== expected.length) return false;
  return timingSafeEqual(Buffer.from(header), Buffer.from(expected));
}

function json(res: http.ServerResponse, status: number, data: unknown, origin: string, reqOrigin?: string): void {
  setCorsHeaders(res, origin, reqOrigin);
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(data));
}

const MAX_BODY_BYTES = 1_048_576; // 1 MB

class PayloadTooLargeError extends Error {
  constructor() {
    super('Request body too large');
  }
}

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let totalBytes = 0;
    req.on('data', (chunk: Buffer) => {
      totalBytes += chunk.length;
      if (totalBytes > MAX_BODY_BYTES) {
        req.destroy();
        reject(new PayloadTooLargeError());
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
    req.on('error', reject);
  });
}

type ParsedBody = { ok: true; value: unknown } | { ok: false };

async function readJson(req: http.IncomingMessage): Promise<ParsedBody> {
  const body = await readBody(req);
  try {
    return { ok: true, value: sanitizeJson(JSON.parse(body)) };
  } catch {
    return { ok: false };
  }
}

// /simulations/:id and /simulations/:id/<action>
const JOB_ROUTE = /^\/simulations\/([^/]+)(?:\/(timeseries|summary|data|cancel))?$/;

export function createRouteHandler(
  server: SimulationServer,
): (req: http.IncomingMessage, res: http.ServerResponse) => Promise<void> {
  const cors = server.corsOrigin;
  const apiKey = server.apiKey;

  return async (req, res) => {
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    const path = url.pathname;
    const method = req.method?.toUpperCase() ?? 'GET';
    const reqOrigin = req.headers['origin'];

    // Scoped json helper: captures cors + reqOrigin for this request
    const respond = (status: number, data: unknown) => json(res, status, data, cors, reqOrigin);

    // CORS preflight
    if (method === 'OPTIONS') {
      setCorsHeaders(res, cors, reqOrigin);
      res.writeHead(204);
      res.end();
      return;
    }

    try {
      // GET /health: uptime and job counts
      if (path === '/health' && method === 'GET') {
        const jobs = server.listJobs();
        respond(200, {
          status: 'ok',
          uptime: server.getUptime(),
          jobs: jobs.length,
          running: jobs.filter(j => j.status === 'running').length,
        });
        return;
      }

      // POST /validate: check a scenario description without running it
      if (path === '/validate' && method === 'POST') {
        if (!checkAuth(req, apiKey)) {
          respond(401, { error: 'Unauthorized' });
          return;
        }
        const parsed = await readJson(req);
        if (!parsed.ok) {
          respond(400, { error: 'Invalid JSON' });
          return;
        }
        const scenario = isRecord(parsed.value) && parsed.value['scenario'] !== undefined
          ? parsed.value['scenario']
          : parsed.value;
        respond(200, validateScenarioSpec(scenario));
        return;
      }

      // POST /simulations: validate, build and start a background run
      if (path === '/simulations' && method === 'POST') {
        if (!checkAuth(req, apiKey)) {
          respond(401, { error: 'Unauthorized' });
          return;
        }
        const parsed = await readJson(req);
        if (!parsed.ok) {
          respond(400, { error: 'Invalid JSON' });
          return;
        }
        const validation = validateSimulationRequest(parsed.value, server.limits);
        if (!validation.valid) {
          respond(400, { error: 'invalid_request', validationErrors: validation.errors });
          return;
        }

        let job: SimulationJob;
        try {
          job = server.submit(validation.request);
        } catch (err) {
          if (err instanceof ConfigurationError) {
            respond(400, { error: 'invalid_scenario', message: err.message });
            return;
          }
          throw err;
        }
        respond(202, {
          id: job.id,
          status: job.status,
          scenarios: job.simulator.scenarioNames,
          ...(validation.warnings.length > 0 ? { validationWarnings: validation.warnings } : {}),
        });
        return;
      }

      // GET /simulations: every stored job, newest last
      if (path === '/simulations' && method === 'GET') {
        respond(200, { simulations: server.listJobs().map(j => server.summarize(j)) });
        return;
      }

      const match = JOB_ROUTE.exec(path);
      if (match) {
        const id = match[1] ?? '';
        const action = match[2];
        const job = server.getJob(id);
        if (!job) {
          respond(404, { error: 'simulation_not_found' });
          return;
        }

        // POST /simulations/:id/cancel
        if (action === 'cancel' && method === 'POST') {
          if (!checkAuth(req, apiKey)) {
            respond(401, { error: 'Unauthorized' });
            return;
          }
          if (!server.cancel(id)) {
            respond(409, { error: 'simulation_not_running', status: job.status });
            return;
          }
          await job.done;
          respond(200, server.summarize(job));
          return;
        }

        if (method === 'GET') {
          const scenario = url.searchParams.get('scenario') ?? undefined;
          const variable = url.searchParams.get('variable');
          try {
            switch (action) {
              case undefined:
                respond(200, server.summarize(job));
                return;
              case 'data':
                respond(200, { rows: job.simulator.getData() });
                return;
              case 'timeseries':
              case 'summary': {
                if (!variable) {
                  respond(400, { error: 'Missing "variable" parameter' });
                  return;
                }
                const data = action === 'timeseries'
                  ? { series: job.simulator.getTimeseries(variable, scenario) }
                  : { bands: job.simulator.getSummary(variable, scenario) };
                respond(200, { variable, scenario: scenario ?? job.simulator.scenarioNames[0], ...data });
                return;
              }
            }
          } catch (err) {
            if (err instanceof KeyNotFoundError) {
              respond(404, { error: 'not_found', message: err.message });
              return;
            }
            throw err;
          }
        }
      }

      // 404
      respond(404, { error: 'Not found' });
    } catch (err) {
      if (err instanceof PayloadTooLargeError) {
        respond(413, { error: 'Payload too large' });
        return;
      }
      server.logger.error('Unhandled route error:', err);
      respond(500, { error: 'Internal server error' });
    }
  };
}
