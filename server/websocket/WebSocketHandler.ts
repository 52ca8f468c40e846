/**
 * WebSocketHandler - Control surface for the discharge engine
 *
 * - Parses client command messages and routes them to the engine
 * - Replies to each command with a commandResult
 * - Broadcasts engine events (and live samples, as a SampleSink) to every client
 * - Serves instrument status and verification while no session is active
 */

import type { DischargeEngine } from '../discharge/DischargeEngine.js';
import type { InstrumentLink } from '../devices/types.js';
import type {
  ClientMessage,
  CommandName,
  DischargeProfile,
  Result,
  ServerMessage,
  SessionMetadata,
} from '../../shared/types.js';
import { Ok, Err } from '../../shared/types.js';
import { parseProfileRecords } from '../../shared/profile.js';
import { StateError, ValidationError, toErrorInfo, type DischargeError } from '../errors.js';

export interface WebSocketHandler {
  getClientCount(): number;
  close(): void;
}

/** The parts of a ws client socket the handler uses */
export interface ClientSocket {
  readonly readyState: number;
  send(data: string): void;
  on(event: 'message', listener: (data: Buffer | string) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

/** A ws WebSocketServer, or anything else that announces client sockets */
export interface ConnectionSource {
  on(event: 'connection', listener: (ws: ClientSocket) => void): unknown;
}

/** Instrument queries the control surface may make outside a session */
export type InstrumentQueries = Pick<InstrumentLink, 'queryStatus' | 'verify'>;

interface ClientState {
  id: string;
  ws: ClientSocket;
}

let clientIdCounter = 0;

function generateClientId(): string {
  return `client-${++clientIdCounter}-${Date.now()}`;
}

// ============ Message parsing ============

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(record: Record<string, unknown>, key: string, field: string): Result<string, ValidationError> {
  const value = record[key];
  if (typeof value !== 'string' || value.trim() === '') {
    return Err(new ValidationError(`${field} is required`, { field }));
  }
  return Ok(value);
}

function parseMetadata(raw: unknown): Result<SessionMetadata, ValidationError> {
  if (!isRecord(raw)) {
    return Err(new ValidationError('metadata must be an object', { field: 'metadata' }));
  }
  const operator = requireString(raw, 'operator', 'metadata.operator');
  if (!operator.ok) return operator;
  const registration = requireString(raw, 'registration', 'metadata.registration');
  if (!registration.ok) return registration;
  const location = requireString(raw, 'location', 'metadata.location');
  if (!location.ok) return location;

  const metadata: SessionMetadata = {
    operator: operator.value,
    registration: registration.value,
    location: location.value,
  };
  if (typeof raw.comment === 'string') metadata.comment = raw.comment;
  return Ok(metadata);
}

/** Flatten `{ kind, magnitude, stop: { metric, threshold } }` into a loose step record */
function flattenStep(step: unknown): unknown {
  if (!isRecord(step) || !isRecord(step.stop)) return step;
  return {
    kind: step.kind,
    magnitude: step.magnitude,
    stopMetric: step.stop.metric,
    stopThreshold: step.stop.threshold,
  };
}

function parseProfile(raw: unknown): Result<DischargeProfile, ValidationError> {
  if (!isRecord(raw)) {
    return Err(new ValidationError('profile must be an object', { field: 'profile' }));
  }
  const name = typeof raw.name === 'string' ? raw.name : '';
  const steps = Array.isArray(raw.steps) ? raw.steps.map(flattenStep) : raw.steps;
  const parsed = parseProfileRecords(name, steps);
  if (!parsed.ok) {
    return Err(new ValidationError(parsed.error.message, { field: `profile.${parsed.error.field}` }));
  }
  return Ok(parsed.value);
}

type ParsedMessage =
  | { ok: true; message: ClientMessage }
  | { ok: false; code: string; message: string; command?: CommandName; error?: DischargeError };

function parseClientMessage(data: string): ParsedMessage {
  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch {
    return { ok: false, code: 'INVALID_MESSAGE', message: 'Failed to parse JSON message' };
  }

  if (!isRecord(raw)) {
    return { ok: false, code: 'INVALID_MESSAGE', message: 'Message must be an object with a type' };
  }
  const type = raw.type;
  if (typeof type !== 'string') {
    return { ok: false, code: 'INVALID_MESSAGE', message: 'Message must be an object with a type' };
  }

  switch (type) {
    case 'getState':
    case 'pause':
    case 'resume':
    case 'reset':
    case 'acknowledge':
    case 'getInstrumentStatus':
    case 'verifyInstrument':
      return { ok: true, message: { type } };

    case 'stop':
      return typeof raw.comment === 'string'
        ? { ok: true, message: { type: 'stop', comment: raw.comment } }
        : { ok: true, message: { type: 'stop' } };

    case 'start': {
      const profile = parseProfile(raw.profile);
      if (!profile.ok) {
        return { ok: false, code: profile.error.code, message: profile.error.message, command: 'start', error: profile.error };
      }
      const metadata = parseMetadata(raw.metadata);
      if (!metadata.ok) {
        return { ok: false, code: metadata.error.code, message: metadata.error.message, command: 'start', error: metadata.error };
      }
      return { ok: true, message: { type: 'start', profile: profile.value, metadata: metadata.value } };
    }

    default:
      return { ok: false, code: 'UNKNOWN_MESSAGE_TYPE', message: `Unknown message type: ${type}` };
  }
}

// ============ Handler ============

export function createWebSocketHandler(
  wss: ConnectionSource,
  engine: DischargeEngine,
  instrument: InstrumentQueries
): WebSocketHandler {
  const clients = new Map<ClientSocket, ClientState>();

  // Send a message to a specific client
  function send(ws: ClientSocket, message: ServerMessage): void {
    if (ws.readyState === 1) { // OPEN
      ws.send(JSON.stringify(message));
    }
  }

  function broadcast(message: ServerMessage): void {
    const data = JSON.stringify(message);
    for (const clientState of clients.values()) {
      if (clientState.ws.readyState === 1) { // OPEN
        clientState.ws.send(data);
      }
    }
  }

  // Live samples arrive through the sink; everything else through the event stream
  const removeSink = engine.addSink({
    onSample(sample, session) {
      broadcast({ type: 'sample', sessionId: session.id, sample });
    },
  });
  const unsubscribe = engine.subscribe((event) => {
    if (event.type === 'sample') return;
    broadcast(event);
  });

  function sendResult(clientState: ClientState, command: CommandName, result: Result<void, DischargeError>): void {
    if (result.ok) {
      send(clientState.ws, { type: 'commandResult', command, ok: true });
    } else {
      send(clientState.ws, { type: 'commandResult', command, ok: false, error: result.error.toInfo() });
    }
  }

  function sessionActive(): boolean {
    const { state } = engine.getState();
    return state === 'running' || state === 'paused' || state === 'stopping';
  }

  async function handleGetInstrumentStatus(clientState: ClientState): Promise<void> {
    if (sessionActive()) {
      const error = new StateError('Instrument is busy with a discharge session', { state: engine.getState().state });
      send(clientState.ws, { type: 'error', code: error.code, message: error.message });
      return;
    }
    const result = await instrument.queryStatus();
    if (result.ok) {
      send(clientState.ws, { type: 'instrumentStatus', status: result.value });
    } else {
      send(clientState.ws, { type: 'error', code: result.error.code, message: result.error.message });
    }
  }

  async function handleVerifyInstrument(clientState: ClientState): Promise<void> {
    if (sessionActive()) {
      const error = new StateError('Instrument is busy with a discharge session', { state: engine.getState().state });
      send(clientState.ws, { type: 'error', code: error.code, message: error.message });
      return;
    }
    const result = await instrument.verify();
    if (result.ok) {
      send(clientState.ws, { type: 'verification', entries: result.value });
    } else {
      send(clientState.ws, { type: 'error', code: result.error.code, message: result.error.message });
    }
  }

  async function dispatch(clientState: ClientState, message: ClientMessage): Promise<void> {
    switch (message.type) {
      case 'getState':
        send(clientState.ws, { type: 'engineState', snapshot: engine.getState() });
        break;

      case 'start':
        sendResult(clientState, 'start', await engine.start(message.profile, message.metadata));
        break;

      case 'pause':
        sendResult(clientState, 'pause', await engine.pause());
        break;

      case 'resume':
        sendResult(clientState, 'resume', await engine.resume());
        break;

      case 'stop':
        sendResult(clientState, 'stop', await engine.stop(message.comment));
        break;

      case 'reset':
        sendResult(clientState, 'reset', engine.reset());
        break;

      case 'acknowledge':
        sendResult(clientState, 'acknowledge', engine.acknowledge());
        break;

      case 'getInstrumentStatus':
        await handleGetInstrumentStatus(clientState);
        break;

      case 'verifyInstrument':
        await handleVerifyInstrument(clientState);
        break;
    }
  }

  // Handle incoming messages
  function handleMessage(clientState: ClientState, data: string): void {
    const parsed = parseClientMessage(data);

    if (!parsed.ok) {
      if (parsed.command && parsed.error) {
        sendResult(clientState, parsed.command, Err(parsed.error));
      } else {
        send(clientState.ws, { type: 'error', code: parsed.code, message: parsed.message });
      }
      return;
    }

    dispatch(clientState, parsed.message).catch((err: unknown) => {
      console.error(`[WebSocket] ${parsed.message.type} failed:`, err);
      const info = toErrorInfo(err);
      send(clientState.ws, { type: 'error', code: info.code, message: info.message });
    });
  }

  // Set up connection handler
  wss.on('connection', (ws: ClientSocket) => {
    const clientState: ClientState = {
      id: generateClientId(),
      ws,
    };
    clients.set(ws, clientState);
    console.log(`[WebSocket] ${clientState.id} connected (${clients.size} client(s))`);

    // New clients start from the current snapshot
    send(ws, { type: 'engineState', snapshot: engine.getState() });

    ws.on('message', (data: Buffer | string) => {
      handleMessage(clientState, data.toString());
    });

    ws.on('close', () => {
      clients.delete(ws);
    });

    ws.on('error', (err) => {
      console.error('[WebSocket] Client error:', err);
      clients.delete(ws);
    });
  });

  function getClientCount(): number {
    return clients.size;
  }

  function close(): void {
    removeSink();
    unsubscribe();
    clients.clear();
  }

  return {
    getClientCount,
    close,
  };
}
