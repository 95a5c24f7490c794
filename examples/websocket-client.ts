/**
 * TokenSim WebSocket Client Example
 *
 * Submits a simulation over HTTP, then follows its progress on the WebSocket
 * and fetches the price series once it completes.
 *
 * Usage:
 *   1. Start the server: TOKENSIM_API_KEY=test-secret npm run serve
 *   2. Run this file with tsx
 */

import WebSocket from 'ws';

const BASE_URL = 'http://localhost:3100';
const WS_URL = 'ws://localhost:3100';
const API_KEY = 'test-secret';

type Message = Record<string, unknown>;

// ─── WebSocket Client ───────────────────────────────────────────────────────

class SimulationClient {
  private ws: WebSocket | null = null;
  private handlers = new Map<string, Array<(data: Message) => void>>();

  constructor(private url: string = WS_URL, private apiKey: string = API_KEY) {}

  connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(this.url, { headers: { Authorization: `Bearer ${this.apiKey}` } });
      this.ws = ws;

      ws.on('open', () => {
        console.log('[TokenSim] WebSocket connected');
        resolve();
      });

      ws.on('message', (raw) => {
        let data: unknown;
        try {
          data = JSON.parse(raw.toString());
        } catch (err) {
          console.error('[TokenSim] Failed to parse message:', err);
          return;
        }
        if (data === null || typeof data !== 'object' || Array.isArray(data)) return;
        const msg: Message = Object.fromEntries(Object.entries(data));
        const type = String(msg['type']);

        const handlers = this.handlers.get(type) ?? [];
        for (const handler of handlers) handler(msg);
        if (handlers.length === 0) console.log(`[TokenSim] ${type}:`, msg);
      });

      ws.on('close', (code) => {
        console.log(`[TokenSim] WebSocket closed (${code})`);
      });

      ws.on('error', (err) => {
        console.error('[TokenSim] WebSocket error:', err);
        reject(err);
      });
    });
  }

  disconnect(): void {
    this.ws?.close();
    this.ws = null;
  }

  on(type: string, handler: (data: Message) => void): void {
    const list = this.handlers.get(type) ?? [];
    list.push(handler);
    this.handlers.set(type, list);
  }

  private send(msg: Message): void {
    if (this.ws?.readyState === WebSocket.OPEN) {
      this.ws.send(JSON.stringify(msg));
    } else {
      console.warn('[TokenSim] WebSocket not connected');
    }
  }

  // ─── Commands ───────────────────────────────────────────────────────────

  requestHealth(): void {
    this.send({ type: 'health' });
  }

  requestStatus(id: string): void {
    this.send({ type: 'status', id });
  }

  cancel(id: string): void {
    this.send({ type: 'cancel', id });
  }

  /** Starts a run over HTTP. Resolves with the job id. */
  async submit(body: Message): Promise<string> {
    const res = await fetch(`${BASE_URL}/simulations`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Authorization: `Bearer ${this.apiKey}` },
      body: JSON.stringify(body),
    });
    const data: unknown = await res.json();
    const id = data !== null && typeof data === 'object' && 'id' in data ? data.id : undefined;
    if (res.status !== 202 || typeof id !== 'string') {
      throw new Error(`Submission failed (${res.status}): ${JSON.stringify(data)}`);
    }
    return id;
  }
}

// ─── Example usage ──────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const client = new SimulationClient();
  await client.connect();

  client.on('repetition_complete', (data) => {
    console.log(`  ${String(data['scenario'])}: ${String(data['completed'])}/${String(data['total'])}`);
  });
  client.on('repetition_failed', (data) => {
    console.warn(`  repetition ${String(data['repetition'])} discarded: ${String(data['message'])}`);
  });

  let id: string | undefined;
  client.on('simulation_complete', (data) => {
    if (data['id'] !== id) return;
    void fetch(`${BASE_URL}/simulations/${String(id)}/summary?variable=tok_price`)
      .then(res => res.json())
      .then(bands => console.log('Price bands:', bands))
      .catch((err: unknown) => console.error('[TokenSim] Failed to fetch bands:', err))
      .finally(() => client.disconnect());
  });
  client.on('simulation_failed', (data) => {
    console.error('Simulation failed:', data['error']);
    client.disconnect();
  });

  id = await client.submit({
    scenario: {
      name: 'launch',
      token: 'tok',
      initialPrice: 0.03,
      supply: 1_000_000,
      priceFunction: { type: 'equationOfExchange' },
      agentPools: [
        {
          currency: '$',
          users: 1,
          transactions: { type: 'stochastic', valueDistribution: { kind: 'uniform', min: 50, max: 150 } },
        },
      ],
    },
    iterations: 10,
    repetitions: 5,
  });
}

export { SimulationClient };
// Uncomment to run: main().catch(console.error);
