// Re-export shared types
export * from '../../shared/types.js';

import type {
  Result,
  StepKind,
  ConnectionState,
  InstrumentMode,
  InstrumentStatus,
  VerificationEntry,
} from '../../shared/types.js';
import type { ConnectionError, ProtocolError, TimeoutError } from '../errors.js';

// Server-only types

export interface Transport {
  open(): Promise<Result<void, Error>>;
  close(): Promise<Result<void, Error>>;
  query(cmd: string): Promise<Result<string, Error>>;
  write(cmd: string): Promise<Result<void, Error>>;
  isOpen(): boolean;
}

export interface Endpoint {
  host: string;
  port: number;
}

export type TransportFactory = (endpoint: Endpoint) => Transport;

export interface Measurement {
  voltage: number;
  current: number;
}

export interface FaultCode {
  code: number;
  message: string;
}

export interface InstrumentIdentity {
  manufacturer: string;
  model: string;
  serial: string;
  firmware: string;
  raw: string;
}

/** Errors a request over an established link can end with */
export type LinkError = ProtocolError | TimeoutError | ConnectionError;

/**
 * Capability set shared by the real instrument and the simulator.
 * The engine depends on nothing else.
 */
export interface InstrumentLink {
  /** Whether this link talks to hardware; recorded with the session, never branched on */
  readonly mode: InstrumentMode;

  connect(endpoint: Endpoint): Promise<Result<void, ConnectionError>>;
  reconnect(): Promise<Result<void, ConnectionError>>;
  disconnect(): Promise<void>;

  setMode(kind: StepKind, magnitude: number, signal?: AbortSignal): Promise<Result<void, LinkError>>;
  setInput(enabled: boolean, signal?: AbortSignal): Promise<Result<void, LinkError>>;
  queryMeasurement(signal?: AbortSignal): Promise<Result<Measurement, LinkError>>;
  queryFault(signal?: AbortSignal): Promise<Result<FaultCode | null, LinkError>>;

  queryStatus(): Promise<Result<InstrumentStatus, LinkError>>;
  verify(): Promise<Result<VerificationEntry[], LinkError>>;

  getConnectionState(): ConnectionState;
  getIdentity(): InstrumentIdentity | null;
  onConnectionStateChange(callback: (state: ConnectionState) => void): () => void;
}

export interface RetryPolicy {
  /** Attempts after the first one */
  maxRetries: number;
  /** Backoff before retry n is baseDelayMs * 2^(n-1) */
  baseDelayMs: number;
  /** Backoff ceiling */
  maxDelayMs: number;
}
