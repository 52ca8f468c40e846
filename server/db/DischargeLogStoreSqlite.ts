/**
 * DischargeLogStoreSqlite - Persistent discharge log
 *
 * Acts as both a SampleSink (data points, written in batches) and a
 * SessionSummarySink (closing the discharge row). Faulted sessions keep
 * their data and are marked incomplete.
 */

import type {
  DataPointRecord,
  DischargeRecord,
  ErrorInfo,
  Result,
  Sample,
  SessionSummary,
  StepTimelineEntry,
  StopReason,
} from '../../shared/types.js';
import { Ok, Err } from '../../shared/types.js';
import type { FaultedSession, SampleSink, SessionContext, SessionSummarySink } from '../discharge/sinks.js';
import type { Database } from './database.js';

export interface DischargeLogStoreConfig {
  batchSize?: number;  // Data points buffered before a write (default: 10)
}

export interface DischargeDetail {
  record: DischargeRecord;
  timeline: StepTimelineEntry[];
  dataPoints: DataPointRecord[];
}

export interface ListOptions {
  registration?: string;
  limit?: number;
}

export interface DischargeLogStore extends SampleSink, SessionSummarySink {
  flush(): void;
  onFaulted(faulted: FaultedSession): void;
  listDischarges(options?: ListOptions): Promise<Result<DischargeRecord[], Error>>;
  getDischarge(id: number): Promise<Result<DischargeDetail | null, Error>>;
}

export const OUTCOMES = {
  completed: 'Completed',
  stopped: 'Stopped by operator',
  connectionLost: 'Connection Lost - Incomplete',
  faulted: 'Device Fault - Incomplete',
} as const;

const DEFAULT_CONFIG: Required<DischargeLogStoreConfig> = {
  batchSize: 10,
};

interface DischargeRow {
  id: number;
  session_id: string;
  registration_number: string;
  operator: string;
  location: string;
  profile_name: string;
  mode: string;
  start_time: number;
  end_time: number | null;
  total_energy_wh: number | null;
  discharge_comment: string | null;
  outcome: string | null;
  timeline: string | null;
}

interface DataPointRow {
  elapsed_ms: number;
  voltage: number;
  current: number;
  power: number;
  cumulative_energy: number;
  step_index: number;
}

function toRecord(row: DischargeRow): DischargeRecord {
  return {
    id: row.id,
    sessionId: row.session_id,
    registration: row.registration_number,
    operator: row.operator,
    location: row.location,
    profileName: row.profile_name,
    mode: row.mode === 'real' ? 'real' : 'test',
    startTime: row.start_time,
    endTime: row.end_time,
    totalEnergyWh: row.total_energy_wh,
    comment: row.discharge_comment,
    outcome: row.outcome,
  };
}

function isTimelineEntry(value: unknown): value is StepTimelineEntry {
  if (typeof value !== 'object' || value === null) return false;
  return 'stepIndex' in value && typeof value.stepIndex === 'number' &&
    'label' in value && typeof value.label === 'string' &&
    'startedAtMs' in value && typeof value.startedAtMs === 'number' &&
    'endedAtMs' in value && (value.endedAtMs === null || typeof value.endedAtMs === 'number');
}

function parseTimeline(raw: string | null, discharge: number): StepTimelineEntry[] {
  if (!raw) return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    console.error(`[DischargeLogStore] Failed to parse timeline of discharge ${discharge}:`, err);
    return [];
  }
  return Array.isArray(parsed) ? parsed.filter(isTimelineEntry) : [];
}

function outcomeFor(reason: StopReason): string {
  return reason === 'profile-complete' ? OUTCOMES.completed : OUTCOMES.stopped;
}

function faultOutcome(error: ErrorInfo): string {
  return error.code === 'TIMEOUT' || error.code === 'CONNECTION_FAILED'
    ? OUTCOMES.connectionLost
    : OUTCOMES.faulted;
}

/**
 * Create a SQLite-backed discharge log
 *
 * @param db - Database instance (must be initialized with schema)
 */
export function createDischargeLogStoreSqlite(
  db: Database,
  config: DischargeLogStoreConfig = {}
): DischargeLogStore {
  const cfg = { ...DEFAULT_CONFIG, ...config };
  const sqlite = db.sqlite;

  // Prepared statements for efficient operations
  const insertDischarge = sqlite.prepare<[string, string, string, string, string, string, string, number]>(`
    INSERT INTO discharges (session_id, registration_number, operator, location, profile_name, profile, mode, start_time)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `);
  const selectIdBySession = sqlite.prepare<[string], { id: number }>(
    'SELECT id FROM discharges WHERE session_id = ?'
  );
  const insertDataPoint = sqlite.prepare<[number, number, number, number, number, number, number, number]>(`
    INSERT INTO data_points (discharge_id, timestamp, elapsed_ms, voltage, current, power, cumulative_energy, step_index)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `);
  const closeDischarge = sqlite.prepare<[number, number, string | null, string, string, number]>(`
    UPDATE discharges
    SET end_time = ?, total_energy_wh = ?, discharge_comment = ?, outcome = ?, timeline = ?
    WHERE id = ?
  `);
  const markIncomplete = sqlite.prepare<[number, number, string, string, number]>(`
    UPDATE discharges
    SET end_time = ?, total_energy_wh = ?, discharge_comment = ?, outcome = ?
    WHERE id = ?
  `);
  const selectById = sqlite.prepare<[number], DischargeRow>('SELECT * FROM discharges WHERE id = ?');
  const selectRecent = sqlite.prepare<[number], DischargeRow>(
    'SELECT * FROM discharges ORDER BY start_time DESC, id DESC LIMIT ?'
  );
  const selectByRegistration = sqlite.prepare<[string, number], DischargeRow>(
    'SELECT * FROM discharges WHERE registration_number = ? ORDER BY start_time DESC, id DESC LIMIT ?'
  );
  const selectDataPoints = sqlite.prepare<[number], DataPointRow>(`
    SELECT elapsed_ms, voltage, current, power, cumulative_energy, step_index
    FROM data_points WHERE discharge_id = ? ORDER BY elapsed_ms, id
  `);

  // Session id -> discharge row id
  const dischargeIds = new Map<string, number>();
  let pending: Array<{ dischargeId: number; sample: Sample }> = [];

  function ensureDischarge(session: SessionContext): number {
    const known = dischargeIds.get(session.id) ?? selectIdBySession.get(session.id)?.id;
    if (known !== undefined) {
      dischargeIds.set(session.id, known);
      return known;
    }

    const info = insertDischarge.run(
      session.id,
      session.metadata.registration,
      session.metadata.operator,
      session.metadata.location,
      session.profile.name,
      JSON.stringify(session.profile),
      session.mode,
      session.startedAt
    );
    const id = Number(info.lastInsertRowid);
    dischargeIds.set(session.id, id);
    console.log(`[DischargeLogStore] Opened discharge ${id} for ${session.metadata.registration}`);
    return id;
  }

  const writeBatch = sqlite.transaction((batch: Array<{ dischargeId: number; sample: Sample }>) => {
    for (const { dischargeId, sample } of batch) {
      insertDataPoint.run(
        dischargeId,
        sample.timestamp,
        sample.elapsedMs,
        sample.voltage,
        sample.current,
        sample.power,
        sample.cumulativeEnergy,
        sample.stepIndex
      );
    }
  });

  function flush(): void {
    if (pending.length === 0) return;
    const batch = pending;
    pending = [];
    try {
      writeBatch(batch);
    } catch (err) {
      console.error(`[DischargeLogStore] Failed to write ${batch.length} data point(s):`, err);
    }
  }

  function onSample(sample: Sample, session: SessionContext): void {
    try {
      pending.push({ dischargeId: ensureDischarge(session), sample });
    } catch (err) {
      console.error(`[DischargeLogStore] Failed to open discharge for session ${session.id}:`, err);
      return;
    }
    if (pending.length >= cfg.batchSize) flush();
  }

  function onSummary(summary: SessionSummary): void {
    flush();
    try {
      const id = ensureDischarge({
        id: summary.sessionId,
        profile: summary.profile,
        metadata: summary.metadata,
        mode: summary.mode,
        startedAt: summary.startedAt,
      });
      closeDischarge.run(
        summary.endedAt,
        summary.totalEnergyWh,
        summary.metadata.comment ?? null,
        outcomeFor(summary.stopReason),
        JSON.stringify(summary.timeline),
        id
      );
      dischargeIds.delete(summary.sessionId);
      console.log(`[DischargeLogStore] Closed discharge ${id}: ${summary.totalEnergyWh.toFixed(3)} Wh`);
    } catch (err) {
      console.error(`[DischargeLogStore] Failed to close session ${summary.sessionId}:`, err);
    }
  }

  function onFaulted(faulted: FaultedSession): void {
    flush();
    try {
      const id = ensureDischarge(faulted.session);
      const outcome = faultOutcome(faulted.error);
      markIncomplete.run(faulted.endedAt, faulted.totalEnergyWh, faulted.error.message, outcome, id);
      dischargeIds.delete(faulted.session.id);
      console.warn(`[DischargeLogStore] Discharge ${id} marked "${outcome}" after ${faulted.sampleCount} sample(s)`);
    } catch (err) {
      console.error(`[DischargeLogStore] Failed to mark session ${faulted.session.id} incomplete:`, err);
    }
  }

  async function listDischarges(options: ListOptions = {}): Promise<Result<DischargeRecord[], Error>> {
    const limit = options.limit ?? 100;
    try {
      const rows = options.registration
        ? selectByRegistration.all(options.registration.trim().toUpperCase(), limit)
        : selectRecent.all(limit);
      return Ok(rows.map(toRecord));
    } catch (err) {
      return Err(err instanceof Error ? err : new Error(String(err)));
    }
  }

  async function getDischarge(id: number): Promise<Result<DischargeDetail | null, Error>> {
    try {
      const row = selectById.get(id);
      if (!row) return Ok(null);

      const dataPoints = selectDataPoints.all(id).map(p => ({
        elapsedMs: p.elapsed_ms,
        voltage: p.voltage,
        current: p.current,
        power: p.power,
        cumulativeEnergy: p.cumulative_energy,
        stepIndex: p.step_index,
      }));

      return Ok({
        record: toRecord(row),
        timeline: parseTimeline(row.timeline, id),
        dataPoints,
      });
    } catch (err) {
      return Err(err instanceof Error ? err : new Error(String(err)));
    }
  }

  return {
    onSample,
    flush,
    onSummary,
    onFaulted,
    listDischarges,
    getDischarge,
  };
}
