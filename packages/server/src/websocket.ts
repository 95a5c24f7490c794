// WebSocket handler for the simulation server
// Same port via HTTP upgrade. JSON messages with `type` field.

import type * as http from 'node:http';
import { timingSafeEqual } from 'node:crypto';
import { WebSocketServer, WebSocket } from 'ws';
import type { SimulationServer } from './SimulationServer.js';
import { sanitizeJson } from './routes.js';
import { isRecord } from './validation.js';

function send(ws: WebSocket, data: Record<string, unknown>): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(data));
  }
}

export interface WebSocketHandle {
  cleanup: () => void;
  broadcast: (data: Record<string, unknown>) => void;
}

const MAX_WS_PAYLOAD = 1_048_576; // 1 MB
const MAX_WS_CONNECTIONS = 100;
const HEARTBEAT_MS = 30_000;

export function createWebSocketHandler(
  httpServer: http.Server,
  server: SimulationServer,
): WebSocketHandle {
  const wss = new WebSocketServer({ server: httpServer, maxPayload: MAX_WS_PAYLOAD });

  // Heartbeat: ping every 30s, terminate if the previous ping went unanswered
  const aliveMap = new WeakMap<WebSocket, boolean>();

  const heartbeatInterval = setInterval(() => {
    for (const ws of wss.clients) {
      if (ws.readyState === WebSocket.OPEN) {
        if (aliveMap.get(ws) === false) {
          ws.terminate();
          continue;
        }
        aliveMap.set(ws, false);
        ws.ping();
      }
    }
  }, HEARTBEAT_MS);

  wss.on('connection', (ws, req) => {
    if (wss.clients.size > MAX_WS_CONNECTIONS) {
      ws.close(1013, 'Server at capacity');
      return;
    }

    // Origin check against the CORS policy (skipped for non-browser clients)
    const wsOrigin = req.headers['origin'];
    if (wsOrigin && server.corsOrigin !== '*') {
      if (wsOrigin.toLowerCase() !== server.corsOrigin.toLowerCase()) {
        ws.close(1008, 'Origin not allowed');
        return;
      }
    }

    // Browsers cannot set headers on the upgrade request, so ?token= is accepted too.
    if (server.apiKey) {
      const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
      const authHeader = req.headers['authorization'];
      const token = (authHeader?.startsWith('Bearer ') ? authHeader.slice(7) : undefined)
        ?? url.searchParams.get('token');
      if (!token || token.length !== server.apiKey.length || !timingSafeEqual(Buffer.from(token), Buffer.from(server.apiKey))) {
        ws.close(1008, 'Unauthorized');
        return;
      }
    }

    server.logger.info('Client connected');
    aliveMap.set(ws, true);

    ws.on('pong', () => {
      aliveMap.set(ws, true);
    });

    ws.on('close', () => {
      server.logger.info('Client disconnected');
    });

    ws.on('message', (raw) => {
      let msg: unknown;
      try {
        msg = sanitizeJson(JSON.parse(raw.toString()));
      } catch {
        send(ws, { type: 'error', message: 'Malformed JSON' });
        return;
      }

      const type = isRecord(msg) ? msg['type'] : undefined;
      if (!isRecord(msg) || typeof type !== 'string') {
        send(ws, { type: 'error', message: 'Missing "type" field' });
        return;
      }

      switch (type) {
        case 'health': {
          const jobs = server.listJobs();
          send(ws, {
            type: 'health_result',
            uptime: server.getUptime(),
            jobs: jobs.length,
            running: jobs.filter(j => j.status === 'running').length,
          });
          break;
        }

        case 'status': {
          const id = msg['id'];
          const job = typeof id === 'string' ? server.getJob(id) : undefined;
          if (!job) {
            send(ws, { type: 'error', message: 'Unknown simulation id' });
            break;
          }
          send(ws, { type: 'status_result', simulation: server.summarize(job) });
          break;
        }

        case 'cancel': {
          const id = msg['id'];
          if (typeof id !== 'string' || !server.getJob(id)) {
            send(ws, { type: 'error', message: 'Unknown simulation id' });
            break;
          }
          send(ws, { type: 'cancel_result', id, cancelled: server.cancel(id) });
          break;
        }

        default:
          send(ws, { type: 'error', message: `Unknown message type: "${type.slice(0, 100)}"` });
      }
    });
  });

  function broadcast(data: Record<string, unknown>): void {
    const payload = JSON.stringify(data);
    for (const ws of wss.clients) {
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(payload);
      }
    }
  }

  return {
    cleanup: () => {
      clearInterval(heartbeatInterval);
      for (const ws of wss.clients) ws.terminate();
      wss.close();
    },
    broadcast,
  };
}
