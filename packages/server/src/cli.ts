#!/usr/bin/env node

// CLI entry point for @tokensim/server
// Usage: npm run serve
//        node dist/cli.js

import { SimulationServer } from './SimulationServer.js';

const port = parseInt(process.env['TOKENSIM_PORT'] ?? '3100', 10);
const host = process.env['TOKENSIM_HOST'] ?? '127.0.0.1';
const apiKey = process.env['TOKENSIM_API_KEY'] || undefined;
const corsOrigin = process.env['TOKENSIM_CORS_ORIGIN'] ?? undefined;

const server = new SimulationServer({ port, host, apiKey, corsOrigin });

server.start().catch((err: unknown) => {
  server.logger.error('Failed to start:', err);
  process.exit(1);
});

async function shutdown(): Promise<void> {
  server.logger.info('Shutting down...');
  try {
    await server.stop();
    process.exit(0);
  } catch (err) {
    server.logger.error('Shutdown failed:', err);
    process.exit(1);
  }
}

process.on('SIGINT', () => void shutdown());
process.on('SIGTERM', () => void shutdown());
