/**
 * HV Discharge Controller Server
 * Express server with WebSocket control surface for the discharge engine
 */

import { createServer } from 'http';
import express from 'express';
import cors from 'cors';
import { WebSocketServer } from 'ws';
import { loadConfig } from './config.js';
import type { Endpoint, InstrumentLink } from './devices/types.js';
import { createNgiN69200Link } from './devices/drivers/ngi-n69200.js';
import { createTcpTransport } from './devices/transports/tcp.js';
import { createSimulatedInstrument, SIMULATOR_ENDPOINT } from './devices/simulation/index.js';
import { createDischargeEngine } from './discharge/DischargeEngine.js';
import { createDatabase, createDischargeLogStoreSqlite } from './db/index.js';
import { createDischargeRoutes } from './api/discharges.js';
import { createWebSocketHandler } from './websocket/WebSocketHandler.js';

// Configuration (defaults, overridable by config file and ENV)
const configResult = loadConfig();
if (!configResult.ok) {
  console.error(`[Config] ${configResult.error.message}`);
  process.exit(1);
}
const config = configResult.value;

// Instrument: the simulator uses the same driver over an in-process transport
let link: InstrumentLink;
let endpoint: Endpoint;
if (config.testMode) {
  link = createSimulatedInstrument({ ...config.simulator, retry: config.retry }).link;
  endpoint = SIMULATOR_ENDPOINT;
} else {
  link = createNgiN69200Link(
    target => createTcpTransport({
      ...target,
      timeout: config.instrument.requestTimeoutMs,
      connectTimeout: config.instrument.requestTimeoutMs,
    }),
    { mode: 'real', retry: config.retry }
  );
  endpoint = { host: config.instrument.host, port: config.instrument.port };
}

// Persistence
const db = createDatabase(config.dataDir || undefined);
console.log(`[Database] Schema version ${db.getSchemaVersion()}`);
const logStore = createDischargeLogStoreSqlite(db);

// Engine
const engine = createDischargeEngine(link, config.engine);
engine.addSink(logStore);
engine.addSummarySink(logStore);

// Create Express app
const app = express();
app.use(cors());
app.use(express.json());

app.use('/api/discharges', createDischargeRoutes(logStore));

// Engine snapshot
app.get('/api/state', (_req, res) => {
  res.json(engine.getState());
});

// Health check
app.get('/api/health', (_req, res) => {
  const snapshot = engine.getState();
  res.json({
    status: 'ok',
    mode: snapshot.mode,
    engine: snapshot.state,
    instrument: snapshot.connectionState,
    identity: link.getIdentity()?.raw ?? null,
    wsClients: wsHandler.getClientCount(),
  });
});

// Create HTTP server (needed for WebSocket)
const server = createServer(app);

// Create WebSocket server
const wss = new WebSocketServer({ server, path: '/ws' });
const wsHandler = createWebSocketHandler(wss, engine, link);

let reconnectTimer: ReturnType<typeof setInterval> | null = null;

async function tryReconnect(): Promise<void> {
  const connection = link.getConnectionState();
  if (connection === 'connected' || connection === 'connecting') return;

  // Never swap the connection under a running session
  const state = engine.getState().state;
  if (state === 'running' || state === 'paused' || state === 'stopping') return;

  const result = await link.reconnect();
  if (!result.ok) {
    console.warn(`[Server] Reconnect failed: ${result.error.message}`);
  }
}

// Start server
async function start(): Promise<void> {
  console.log('HV Discharge Controller starting...');
  console.log(`  Mode: ${config.testMode ? 'TEST (simulated instrument)' : 'REAL'}`);
  console.log(`  Instrument: ${endpoint.host}:${endpoint.port}`);
  console.log(`  Tick interval: ${config.engine.tickIntervalMs}ms`);
  console.log(`  Retries: ${config.retry.maxRetries} (backoff ${config.retry.baseDelayMs}-${config.retry.maxDelayMs}ms)`);
  console.log('');

  const connected = await link.connect(endpoint);
  if (!connected.ok) {
    console.error(`[Server] Instrument not connected: ${connected.error.message}`);
  }

  if (config.autoReconnect.enabled) {
    reconnectTimer = setInterval(() => {
      tryReconnect().catch((err: unknown) => {
        console.error('[Server] Reconnect attempt failed:', err);
      });
    }, config.autoReconnect.intervalMs);
  }

  server.listen(config.port, () => {
    console.log('');
    console.log(`Server running on http://localhost:${config.port}`);
    console.log('');
    console.log('WebSocket endpoint: ws://localhost:' + config.port + '/ws');
    console.log('');
    console.log('REST API endpoints:');
    console.log('  GET  /api/health          - Server and instrument health');
    console.log('  GET  /api/state           - Engine snapshot');
    console.log('  GET  /api/discharges      - Discharge log');
    console.log('  GET  /api/discharges/:id  - Discharge detail with data points');
  });
}

// Graceful shutdown
async function shutdown(): Promise<void> {
  console.log('Shutting down...');
  if (reconnectTimer) {
    clearInterval(reconnectTimer);
    reconnectTimer = null;
  }

  const state = engine.getState().state;
  if (state === 'running' || state === 'paused') {
    const stopped = await engine.stop('Server shutdown');
    if (!stopped.ok) {
      console.error(`[Server] Stop on shutdown failed: ${stopped.error.message}`);
    }
  }

  wsHandler.close();
  engine.destroy();
  logStore.flush();
  await link.disconnect();
  db.close();

  server.close(() => {
    console.log('Server closed');
    process.exit(0);
  });
}

function onSignal(): void {
  shutdown().catch((err: unknown) => {
    console.error('Shutdown failed:', err);
    process.exit(1);
  });
}

process.on('SIGTERM', onSignal);
process.on('SIGINT', onSignal);

start().catch((err: unknown) => {
  console.error('Server failed to start:', err);
  process.exit(1);
});
