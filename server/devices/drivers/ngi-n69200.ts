/**
 * NGITECH N69200 Electronic Load Driver
 * Implements InstrumentLink for the N69200 family over any Transport
 */

import type {
  InstrumentLink,
  InstrumentIdentity,
  Endpoint,
  FaultCode,
  LinkError,
  Measurement,
  RetryPolicy,
  Transport,
  TransportFactory,
} from '../types.js';
import type {
  Result,
  StepKind,
  ConnectionState,
  InstrumentMode,
  InstrumentStatus,
  VerificationEntry,
} from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';
import { ConnectionError, ProtocolError, TimeoutError } from '../../errors.js';
import { QUERIES, ScpiCodec } from '../scpi-codec.js';
import { AbortedError, withRetry } from '../retry.js';
import { TransportError } from '../transports/transport-error.js';

export interface N69200Options {
  mode: InstrumentMode;
  retry: RetryPolicy;
}

const isRetryable = (error: Error): boolean =>
  error instanceof TransportError && error.retryable;

export function createNgiN69200Link(
  transportFactory: TransportFactory,
  options: N69200Options
): InstrumentLink {
  const { mode, retry } = options;

  let transport: Transport | null = null;
  let endpoint: Endpoint | null = null;
  let identity: InstrumentIdentity | null = null;
  let connectionState: ConnectionState = 'disconnected';

  const stateListeners = new Set<(state: ConnectionState) => void>();

  function setConnectionState(next: ConnectionState): void {
    if (next === connectionState) return;
    connectionState = next;
    for (const listener of stateListeners) {
      try {
        listener(next);
      } catch (err) {
        console.error('[Link] Connection state listener error:', err);
      }
    }
  }

  /** Map a failed request to the link error taxonomy, faulting the link when the budget is spent */
  function failure(cmd: string, error: Error, attempts: number): LinkError {
    if (error instanceof AbortedError) {
      return new TimeoutError(`${cmd} aborted`, { command: cmd, attempts });
    }
    if (error instanceof TransportError && error.reason === 'not-open') {
      setConnectionState('faulted');
      return new ConnectionError(`${cmd} failed: ${error.message}`, { command: cmd, attempts }, { cause: error });
    }
    setConnectionState('faulted');
    console.error(`[Link] ${cmd} failed after ${attempts} attempt(s): ${error.message}`);
    return new TimeoutError(
      `No reply to ${cmd} after ${attempts} attempt(s): ${error.message}`,
      { command: cmd, attempts },
      { cause: error }
    );
  }

  function onRetry(cmd: string) {
    return (error: Error, attempt: number, delayMs: number) => {
      console.warn(`[Link] ${cmd} failed (${error.message}), retry ${attempt}/${retry.maxRetries} in ${delayMs}ms`);
    };
  }

  async function write(cmd: string, signal?: AbortSignal): Promise<Result<void, LinkError>> {
    const active = transport;
    if (!active || connectionState !== 'connected') {
      return Err(new ConnectionError(`Not connected (${cmd})`, { command: cmd }));
    }
    const { result, attempts } = await withRetry(() => active.write(cmd), retry, {
      signal,
      isRetryable,
      onRetry: onRetry(cmd),
    });
    if (!result.ok) return Err(failure(cmd, result.error, attempts));
    return Ok();
  }

  async function query(cmd: string, signal?: AbortSignal): Promise<Result<string, LinkError>> {
    const active = transport;
    if (!active || connectionState !== 'connected') {
      return Err(new ConnectionError(`Not connected (${cmd})`, { command: cmd }));
    }
    const { result, attempts } = await withRetry(() => active.query(cmd), retry, {
      signal,
      isRetryable,
      onRetry: onRetry(cmd),
    });
    if (!result.ok) return Err(failure(cmd, result.error, attempts));
    return Ok(result.value);
  }

  async function queryDecoded<T>(
    cmd: string,
    decode: (response: string) => Result<T, string>,
    signal?: AbortSignal
  ): Promise<Result<T, LinkError>> {
    const response = await query(cmd, signal);
    if (!response.ok) return response;
    const decoded = decode(response.value);
    if (!decoded.ok) {
      return Err(new ProtocolError(`Bad reply to ${cmd}: ${decoded.error}`, { command: cmd, response: response.value }));
    }
    return Ok(decoded.value);
  }

  async function closeTransport(): Promise<void> {
    if (!transport) return;
    const closing = transport;
    transport = null;
    const result = await closing.close();
    if (!result.ok) {
      console.warn(`[Link] Close failed: ${result.error.message}`);
    }
  }

  async function open(target: Endpoint): Promise<Result<void, ConnectionError>> {
    setConnectionState('connecting');
    const next = transportFactory(target);
    const opened = await next.open();
    if (!opened.ok) {
      setConnectionState('disconnected');
      console.error(`[Link] Connection to ${target.host}:${target.port} failed: ${opened.error.message}`);
      return Err(new ConnectionError(`Cannot reach ${target.host}:${target.port}: ${opened.error.message}`, {}, { cause: opened.error }));
    }

    transport = next;
    setConnectionState('connected');

    const idn = await query(QUERIES.identify);
    if (!idn.ok) {
      await closeTransport();
      setConnectionState('disconnected');
      return Err(new ConnectionError(`Instrument did not identify: ${idn.error.message}`, { command: QUERIES.identify }, { cause: idn.error }));
    }

    const fields = ScpiCodec.decodeIdentity(idn.value);
    if (!fields.ok) {
      await closeTransport();
      setConnectionState('disconnected');
      return Err(new ConnectionError(`Instrument did not identify: ${fields.error}`, { command: QUERIES.identify, response: idn.value }));
    }

    identity = { ...fields.value, raw: idn.value };
    console.log(`[Link] Connected to ${identity.manufacturer} ${identity.model} at ${target.host}:${target.port}`);
    return Ok();
  }

  return {
    mode,

    async connect(target: Endpoint): Promise<Result<void, ConnectionError>> {
      if (connectionState === 'connecting') {
        return Err(new ConnectionError('Connection attempt already in progress'));
      }
      await closeTransport();
      endpoint = target;
      return open(target);
    },

    async reconnect(): Promise<Result<void, ConnectionError>> {
      if (!endpoint) {
        return Err(new ConnectionError('No endpoint to reconnect to'));
      }
      if (connectionState === 'connecting') {
        return Err(new ConnectionError('Connection attempt already in progress'));
      }
      console.log(`[Link] Reconnecting to ${endpoint.host}:${endpoint.port}`);
      await closeTransport();
      return open(endpoint);
    },

    async disconnect(): Promise<void> {
      if (transport && connectionState === 'connected') {
        // Leave the load with its input off
        const off = await transport.write(ScpiCodec.setInput(false));
        if (!off.ok) {
          console.warn(`[Link] Input off before disconnect failed: ${off.error.message}`);
        }
      }
      await closeTransport();
      identity = null;
      setConnectionState('disconnected');
    },

    async setMode(kind: StepKind, magnitude: number, signal?: AbortSignal): Promise<Result<void, LinkError>> {
      for (const cmd of ScpiCodec.modeCommands(kind, magnitude)) {
        const result = await write(cmd, signal);
        if (!result.ok) return result;
      }
      return Ok();
    },

    async setInput(enabled: boolean, signal?: AbortSignal): Promise<Result<void, LinkError>> {
      return write(ScpiCodec.setInput(enabled), signal);
    },

    async queryMeasurement(signal?: AbortSignal): Promise<Result<Measurement, LinkError>> {
      const voltage = await queryDecoded(QUERIES.voltage, r => ScpiCodec.decodeNumber(r), signal);
      if (!voltage.ok) return voltage;
      const current = await queryDecoded(QUERIES.current, r => ScpiCodec.decodeNumber(r), signal);
      if (!current.ok) return current;
      return Ok({ voltage: voltage.value, current: current.value });
    },

    async queryFault(signal?: AbortSignal): Promise<Result<FaultCode | null, LinkError>> {
      return queryDecoded(QUERIES.error, r => ScpiCodec.decodeFault(r), signal);
    },

    async queryStatus(): Promise<Result<InstrumentStatus, LinkError>> {
      const input = await queryDecoded(QUERIES.inputState, r => ScpiCodec.decodeInputState(r));
      if (!input.ok) return input;
      const fn = await queryDecoded(QUERIES.function, r => ScpiCodec.decodeFunction(r));
      if (!fn.ok) return fn;
      return Ok({
        inputEnabled: input.value,
        functionCode: fn.value.code,
        functionName: fn.value.name,
      });
    },

    async verify(): Promise<Result<VerificationEntry[], LinkError>> {
      const entries: VerificationEntry[] = [];
      const checks = [QUERIES.identify, QUERIES.voltage, QUERIES.current, QUERIES.power, QUERIES.inputState];
      for (const cmd of checks) {
        const response = await query(cmd);
        if (!response.ok) return response;
        entries.push({ query: cmd, response: response.value });
      }
      return Ok(entries);
    },

    getConnectionState(): ConnectionState {
      return connectionState;
    },

    getIdentity(): InstrumentIdentity | null {
      return identity;
    },

    onConnectionStateChange(callback: (state: ConnectionState) => void): () => void {
      stateListeners.add(callback);
      return () => {
        stateListeners.delete(callback);
      };
    },
  };
}
