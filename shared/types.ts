// Shared types for the discharge controller and its control surfaces

// ============ Result Type ============
// Use Result<T, E> instead of throwing exceptions.
// Try/catch only at boundaries (socket, database, JSON parsing).

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function Ok(): Result<void, never>;
export function Ok<T>(value: T): Result<T, never>;
export function Ok<T>(value?: T): Result<T | undefined, never> {
  return { ok: true, value };
}

export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// ============ Profile Types ============

/** CC / CP / CV discharge modes */
export type StepKind = 'CC' | 'CP' | 'CV';

export type StopMetric = 'voltage' | 'current';

/** A step ends when `metric` falls to or below `threshold` */
export interface StopCondition {
  metric: StopMetric;
  threshold: number;
}

export interface DischargeStep {
  kind: StepKind;
  magnitude: number;   // A for CC, W for CP, V for CV
  stop: StopCondition;
}

export interface DischargeProfile {
  name: string;
  steps: DischargeStep[];
}

export interface SessionMetadata {
  operator: string;
  registration: string;
  location: string;
  comment?: string;
}

// ============ Session Types ============

export type EngineState = 'idle' | 'running' | 'paused' | 'stopping' | 'completed' | 'faulted';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'faulted';

export type StopReason = 'profile-complete' | 'user-stop';

export type InstrumentMode = 'real' | 'test';

export interface Sample {
  readonly timestamp: number;        // epoch ms
  readonly elapsedMs: number;        // since session start
  readonly voltage: number;          // V
  readonly current: number;          // A
  readonly power: number;            // W, voltage * current
  readonly energyIncrement: number;  // Wh
  readonly cumulativeEnergy: number; // Wh
  readonly stepIndex: number;
}

export interface StepTimelineEntry {
  stepIndex: number;
  label: string;
  startedAtMs: number;
  endedAtMs: number | null;
}

export interface ErrorInfo {
  code: string;
  message: string;
  context?: Record<string, unknown>;
}

/** Read-only view of the engine and its current (or last) session */
export interface EngineSnapshot {
  state: EngineState;
  connectionState: ConnectionState;
  mode: InstrumentMode;
  session: {
    id: string;
    profile: DischargeProfile;
    metadata: SessionMetadata;
    activeStepIndex: number;
    energyWh: number;
    sampleCount: number;
    lastSample: Sample | null;
    timeline: StepTimelineEntry[];
    startedAt: number;
    endedAt: number | null;
    stopReason?: StopReason;
    error?: ErrorInfo;
  } | null;
}

export interface SessionSummary {
  sessionId: string;
  profile: DischargeProfile;
  metadata: SessionMetadata;
  samples: Sample[];
  timeline: StepTimelineEntry[];
  totalEnergyWh: number;
  totalEnergyKWh: number;
  startedAt: number;
  endedAt: number;
  stopReason: StopReason;
  mode: InstrumentMode;
}

// ============ Instrument Types ============

export interface InstrumentStatus {
  inputEnabled: boolean;
  functionCode: number | null;
  functionName: string;
}

export interface VerificationEntry {
  query: string;
  response: string;
}

// ============ Log Store Types ============

export interface DischargeRecord {
  id: number;
  sessionId: string;
  registration: string;
  operator: string;
  location: string;
  profileName: string;
  mode: InstrumentMode;
  startTime: number;
  endTime: number | null;
  totalEnergyWh: number | null;
  comment: string | null;
  outcome: string | null;
}

export interface DataPointRecord {
  elapsedMs: number;
  voltage: number;
  current: number;
  power: number;
  cumulativeEnergy: number;
  stepIndex: number;
}

export interface ApiError {
  error: string;
  message: string;
}

// ============ WebSocket Types ============

// Client -> Server messages
export type ClientMessage =
  | { type: 'getState' }
  | { type: 'start'; profile: DischargeProfile; metadata: SessionMetadata }
  | { type: 'pause' }
  | { type: 'resume' }
  | { type: 'stop'; comment?: string }
  | { type: 'reset' }
  | { type: 'acknowledge' }
  | { type: 'getInstrumentStatus' }
  | { type: 'verifyInstrument' };

export type CommandName = 'start' | 'pause' | 'resume' | 'stop' | 'reset' | 'acknowledge';

// Engine -> observers
export type EngineEvent =
  | { type: 'engineState'; snapshot: EngineSnapshot }
  | { type: 'sample'; sessionId: string; sample: Sample }
  | { type: 'stepChanged'; sessionId: string; stepIndex: number; label: string }
  | { type: 'sessionCompleted'; summary: SessionSummary }
  | { type: 'sessionFaulted'; sessionId: string; error: ErrorInfo };

// Server -> Client messages
export type ServerMessage =
  | EngineEvent
  | { type: 'commandResult'; command: CommandName; ok: boolean; error?: ErrorInfo }
  | { type: 'instrumentStatus'; status: InstrumentStatus }
  | { type: 'verification'; entries: VerificationEntry[] }
  | { type: 'error'; code: string; message: string };
