/**
 * Consumers of engine output.
 *
 * Sample sinks receive every Sample as it is recorded; summary sinks receive
 * the SessionSummary of each completed session. Neither can affect the engine:
 * exceptions they throw are logged and dropped.
 */

import type {
  DischargeProfile,
  ErrorInfo,
  InstrumentMode,
  Sample,
  SessionMetadata,
  SessionSummary,
} from '../../shared/types.js';

/** The session a sample belongs to */
export interface SessionContext {
  readonly id: string;
  readonly profile: DischargeProfile;
  readonly metadata: SessionMetadata;
  readonly mode: InstrumentMode;
  readonly startedAt: number;
}

export interface SampleSink {
  onSample(sample: Sample, session: SessionContext): void;
  /** Called before the session ends, so buffered samples can be written */
  flush?(): void | Promise<void>;
}

/** What is known about a session that ended in a fault */
export interface FaultedSession {
  session: SessionContext;
  error: ErrorInfo;
  endedAt: number;
  totalEnergyWh: number;
  sampleCount: number;
}

export interface SessionSummarySink {
  onSummary(summary: SessionSummary): void;
  /** Faulted sessions produce no summary, but may still be recorded */
  onFaulted?(faulted: FaultedSession): void;
}
