/**
 * DischargeEngine - Step-based discharge state machine and sampling loop
 *
 * - Drives one InstrumentLink; nothing else talks to the instrument while a session runs
 * - Samples every tickIntervalMs on an absolute schedule to prevent drift
 * - Integrates energy, evaluates stop conditions, advances steps
 * - Commands are serialised and applied between ticks, never during one
 * - Broadcasts engine events to subscribers and pushes samples to sinks
 */

import { randomUUID } from 'crypto';
import type { InstrumentLink, LinkError } from '../devices/types.js';
import type {
  ConnectionState,
  DischargeProfile,
  DischargeStep,
  EngineEvent,
  EngineSnapshot,
  EngineState,
  ErrorInfo,
  Result,
  Sample,
  SessionMetadata,
  SessionSummary,
  StepTimelineEntry,
  StopReason,
} from '../../shared/types.js';
import { Ok, Err } from '../../shared/types.js';
import { formatStepLabel, freezeProfile, validateDischargeProfile } from '../../shared/profile.js';
import {
  ConnectionError,
  DeviceFaultError,
  StateError,
  ValidationError,
  type DischargeError,
} from '../errors.js';
import type { FaultedSession, SampleSink, SessionContext, SessionSummarySink } from './sinks.js';

export interface DischargeEngineConfig {
  tickIntervalMs?: number;       // Sampling period (default: 1000)
  faultCheckInterval?: number;   // Query the fault register every N ticks, 0 disables (default: 5)
  now?: () => number;            // Clock (default: Date.now)
  createId?: () => string;       // Session id source (default: randomUUID)
}

type SubscriberCallback = (event: EngineEvent) => void;

export interface DischargeEngine {
  getState(): EngineSnapshot;
  /** Samples of the current (or last) session */
  getSamples(): readonly Sample[];

  start(profile: DischargeProfile, metadata: SessionMetadata): Promise<Result<void, DischargeError>>;
  pause(): Promise<Result<void, DischargeError>>;
  resume(): Promise<Result<void, DischargeError>>;
  stop(comment?: string): Promise<Result<void, DischargeError>>;
  reset(): Result<void, StateError>;
  acknowledge(): Result<void, StateError>;

  subscribe(callback: SubscriberCallback): () => void;
  addSink(sink: SampleSink): () => void;
  addSummarySink(sink: SessionSummarySink): () => void;

  destroy(): void;
}

const DEFAULT_CONFIG: Required<DischargeEngineConfig> = {
  tickIntervalMs: 1000,
  faultCheckInterval: 5,
  now: () => Date.now(),
  createId: () => randomUUID(),
};

const MS_PER_HOUR = 3_600_000;

interface Session {
  id: string;
  profile: DischargeProfile;
  metadata: SessionMetadata;
  activeStepIndex: number;
  energyWh: number;
  samples: Sample[];
  timeline: StepTimelineEntry[];
  startedAt: number;
  endedAt: number | null;
  pausedAt: number | null;
  pausedTotalMs: number;
  stopReason?: StopReason;
  error?: ErrorInfo;
}

function normalizeMetadata(metadata: SessionMetadata): SessionMetadata {
  const normalized: SessionMetadata = {
    operator: metadata.operator.trim(),
    registration: metadata.registration.trim().toUpperCase(),
    location: metadata.location.trim(),
  };
  if (metadata.comment !== undefined) normalized.comment = metadata.comment;
  return normalized;
}

export function createDischargeEngine(
  link: InstrumentLink,
  config: DischargeEngineConfig = {}
): DischargeEngine {
  const cfg: Required<DischargeEngineConfig> = { ...DEFAULT_CONFIG, ...config };

  // State
  let state: EngineState = 'idle';
  let connectionState: ConnectionState = link.getConnectionState();
  let session: Session | null = null;

  // Loop control
  let tickTimer: ReturnType<typeof setTimeout> | null = null;
  let nextTickAt = 0;
  let tickInProgress: Promise<void> | null = null;
  let tickAbort: AbortController | null = null;
  let skippedTicks = 0;

  // Commands run one at a time
  let commandLock: Promise<void> = Promise.resolve();

  // Subscribers and sinks
  const subscribers = new Set<SubscriberCallback>();
  const sampleSinks = new Set<SampleSink>();
  const summarySinks = new Set<SessionSummarySink>();

  const unsubscribeLink = link.onConnectionStateChange((next) => {
    connectionState = next;
    broadcastState();
  });

  function withLock<T>(fn: () => Promise<T>): Promise<T> {
    const previousLock = commandLock;
    let releaseLock: () => void = () => {};
    commandLock = new Promise<void>(resolve => {
      releaseLock = resolve;
    });
    return previousLock.then(fn).finally(() => releaseLock());
  }

  function broadcast(event: EngineEvent): void {
    for (const callback of subscribers) {
      try {
        callback(event);
      } catch (err) {
        console.error('[Engine] Subscriber callback error:', err);
      }
    }
  }

  function getState(): EngineSnapshot {
    return {
      state,
      connectionState,
      mode: link.mode,
      session: session && {
        id: session.id,
        profile: session.profile,
        metadata: { ...session.metadata },
        activeStepIndex: session.activeStepIndex,
        energyWh: session.energyWh,
        sampleCount: session.samples.length,
        lastSample: session.samples[session.samples.length - 1] ?? null,
        timeline: session.timeline.map(entry => ({ ...entry })),
        startedAt: session.startedAt,
        endedAt: session.endedAt,
        stopReason: session.stopReason,
        error: session.error,
      },
    };
  }

  function broadcastState(): void {
    broadcast({ type: 'engineState', snapshot: getState() });
  }

  function setState(next: EngineState): void {
    if (next === state) return;
    console.log(`[Engine] ${state} -> ${next}`);
    state = next;
    broadcastState();
  }

  function elapsedMs(s: Session): number {
    const end = s.pausedAt ?? cfg.now();
    return end - s.startedAt - s.pausedTotalMs;
  }

  function contextOf(s: Session): SessionContext {
    return {
      id: s.id,
      profile: s.profile,
      metadata: s.metadata,
      mode: link.mode,
      startedAt: s.startedAt,
    };
  }

  // ============ Timeline ============

  function openTimelineEntry(s: Session, stepIndex: number): void {
    s.timeline.push({
      stepIndex,
      label: formatStepLabel(s.profile.steps[stepIndex]),
      startedAtMs: elapsedMs(s),
      endedAtMs: null,
    });
  }

  function closeTimelineEntry(s: Session): void {
    const entry = s.timeline[s.timeline.length - 1];
    if (entry && entry.endedAtMs === null) {
      entry.endedAtMs = elapsedMs(s);
    }
  }

  // ============ Sinks ============

  function pushToSinks(sample: Sample, s: Session): void {
    const context = contextOf(s);
    for (const sink of sampleSinks) {
      try {
        sink.onSample(sample, context);
      } catch (err) {
        console.error('[Engine] Sample sink error:', err);
      }
    }
  }

  async function flushSinks(): Promise<void> {
    for (const sink of sampleSinks) {
      if (!sink.flush) continue;
      try {
        await sink.flush();
      } catch (err) {
        console.error('[Engine] Sample sink flush error:', err);
      }
    }
  }

  function deliverFault(faulted: FaultedSession): void {
    for (const sink of summarySinks) {
      if (!sink.onFaulted) continue;
      try {
        sink.onFaulted(faulted);
      } catch (err) {
        console.error('[Engine] Summary sink error:', err);
      }
    }
  }

  function deliverSummary(summary: SessionSummary): void {
    for (const sink of summarySinks) {
      try {
        sink.onSummary(summary);
      } catch (err) {
        console.error('[Engine] Summary sink error:', err);
      }
    }
  }

  // ============ Loop ============

  function clearTimer(): void {
    if (tickTimer) {
      clearTimeout(tickTimer);
      tickTimer = null;
    }
  }

  function scheduleNextTick(): void {
    if (state !== 'running') return;

    const now = cfg.now();
    nextTickAt += cfg.tickIntervalMs;

    // Drop ticks whose slot has already passed rather than bursting to catch up
    let dropped = 0;
    while (nextTickAt <= now) {
      nextTickAt += cfg.tickIntervalMs;
      dropped++;
    }
    if (dropped > 0) {
      skippedTicks += dropped;
      console.warn(`[Engine] Skipped ${dropped} tick(s) to maintain schedule (${skippedTicks} total)`);
    }

    tickTimer = setTimeout(runTick, nextTickAt - now);
  }

  function runTick(): void {
    tickTimer = null;
    tickInProgress = doTick()
      .catch((err: unknown) => {
        console.error('[Engine] Tick failed unexpectedly:', err);
      })
      .finally(() => {
        tickInProgress = null;
      });
  }

  async function waitForTick(): Promise<void> {
    if (tickInProgress) {
      await tickInProgress;
    }
  }

  async function doTick(): Promise<void> {
    const s = session;
    if (state !== 'running' || !s) return;

    const controller = new AbortController();
    tickAbort = controller;
    try {
      const step = s.profile.steps[s.activeStepIndex];

      const measured = await link.queryMeasurement(controller.signal);
      if (controller.signal.aborted) return;
      if (!measured.ok) {
        await fault(s, measured.error.withContext({ stepIndex: s.activeStepIndex }));
        return;
      }

      const { voltage, current } = measured.value;
      const tickNumber = s.samples.length + 1;

      if (cfg.faultCheckInterval > 0 && tickNumber % cfg.faultCheckInterval === 0) {
        const faultResult = await link.queryFault(controller.signal);
        if (controller.signal.aborted) return;
        if (!faultResult.ok) {
          await fault(s, faultResult.error.withContext({ stepIndex: s.activeStepIndex }));
          return;
        }
        if (faultResult.value) {
          const { code, message } = faultResult.value;
          await fault(s, new DeviceFaultError(`Instrument fault ${code}: ${message}`, {
            faultCode: code,
            stepIndex: s.activeStepIndex,
            measurement: { voltage, current },
          }));
          return;
        }
      }

      // Integrate over the real time since the previous sample, dropped slots included
      const sampleElapsedMs = elapsedMs(s);
      const previousElapsedMs = s.samples.length > 0 ? s.samples[s.samples.length - 1].elapsedMs : 0;
      const power = voltage * current;
      const energyIncrement = power * (sampleElapsedMs - previousElapsedMs) / MS_PER_HOUR;
      const cumulativeEnergy = s.energyWh + energyIncrement;

      const observed = step.stop.metric === 'voltage' ? voltage : current;
      const stopMet = observed <= step.stop.threshold;

      const sample: Sample = Object.freeze({
        timestamp: cfg.now(),
        elapsedMs: sampleElapsedMs,
        voltage,
        current,
        power,
        energyIncrement,
        cumulativeEnergy,
        stepIndex: s.activeStepIndex,
      });

      s.samples.push(sample);
      s.energyWh = cumulativeEnergy;
      pushToSinks(sample, s);
      broadcast({ type: 'sample', sessionId: s.id, sample });

      if (stopMet) {
        if (s.activeStepIndex < s.profile.steps.length - 1) {
          await advanceStep(s, controller.signal);
        } else {
          console.log(`[Engine] Final step reached ${step.stop.metric} <= ${step.stop.threshold}`);
          await finish(s, 'profile-complete');
          return;
        }
      }
    } finally {
      tickAbort = null;
    }

    scheduleNextTick();
  }

  async function advanceStep(s: Session, signal: AbortSignal): Promise<void> {
    closeTimelineEntry(s);
    s.activeStepIndex++;
    const next: DischargeStep = s.profile.steps[s.activeStepIndex];
    openTimelineEntry(s, s.activeStepIndex);

    const label = formatStepLabel(next);
    console.log(`[Engine] Step ${s.activeStepIndex + 1}/${s.profile.steps.length}: ${label}`);
    broadcast({ type: 'stepChanged', sessionId: s.id, stepIndex: s.activeStepIndex, label });

    const result = await link.setMode(next.kind, next.magnitude, signal);
    if (signal.aborted) return;
    if (!result.ok) {
      await fault(s, result.error.withContext({ stepIndex: s.activeStepIndex }));
      return;
    }
    broadcastState();
  }

  // ============ Terminal transitions ============

  async function fault(s: Session, error: DischargeError): Promise<void> {
    clearTimer();
    closeTimelineEntry(s);
    const endedAt = cfg.now();
    const info = error.toInfo();
    s.endedAt = endedAt;
    s.error = info;
    console.error(`[Engine] Session ${s.id} faulted at step ${s.activeStepIndex + 1}: ${error.message}`);
    setState('faulted');

    await flushSinks();

    broadcast({ type: 'sessionFaulted', sessionId: s.id, error: info });
    deliverFault({
      session: contextOf(s),
      error: info,
      endedAt,
      totalEnergyWh: s.energyWh,
      sampleCount: s.samples.length,
    });
  }

  async function finish(s: Session, reason: StopReason): Promise<Result<void, DischargeError>> {
    clearTimer();
    setState('stopping');

    const off = await link.setInput(false);
    if (!off.ok) {
      const error = off.error.withContext({ stepIndex: s.activeStepIndex });
      await fault(s, error);
      return Err(error);
    }

    if (s.pausedAt !== null) {
      s.pausedTotalMs += cfg.now() - s.pausedAt;
      s.pausedAt = null;
    }
    closeTimelineEntry(s);
    const endedAt = cfg.now();
    s.endedAt = endedAt;
    s.stopReason = reason;

    await flushSinks();

    const summary: SessionSummary = {
      sessionId: s.id,
      profile: s.profile,
      metadata: { ...s.metadata },
      samples: [...s.samples],
      timeline: s.timeline.map(entry => ({ ...entry })),
      totalEnergyWh: s.energyWh,
      totalEnergyKWh: s.energyWh / 1000,
      startedAt: s.startedAt,
      endedAt,
      stopReason: reason,
      mode: link.mode,
    };

    console.log(`[Engine] Session ${s.id} completed (${reason}): ${s.samples.length} samples, ${s.energyWh.toFixed(3)} Wh`);
    setState('completed');
    broadcast({ type: 'sessionCompleted', summary });
    deliverSummary(summary);
    return Ok();
  }

  /** Shared failure path for command-issued link requests */
  async function commandFailed(s: Session, error: LinkError): Promise<Result<void, DischargeError>> {
    const withStep = error.withContext({ stepIndex: s.activeStepIndex });
    await fault(s, withStep);
    return Err(withStep);
  }

  // ============ Commands ============

  function stateError(command: string): StateError {
    return new StateError(`Cannot ${command} while ${state}`, { state });
  }

  async function start(profile: DischargeProfile, metadata: SessionMetadata): Promise<Result<void, DischargeError>> {
    if (state !== 'idle' && state !== 'completed' && state !== 'faulted') {
      return Err(stateError('start'));
    }

    const validated = validateDischargeProfile(profile);
    if (!validated.ok) {
      return Err(new ValidationError(validated.error.message, { field: validated.error.field }));
    }

    if (link.getConnectionState() !== 'connected') {
      return Err(new ConnectionError(`Instrument is ${link.getConnectionState()}`));
    }

    return withLock(async () => {
      if (state !== 'idle' && state !== 'completed' && state !== 'faulted') {
        return Err(stateError('start'));
      }

      // Read the pack with the input still off; every threshold must lie below it
      const opening = await link.queryMeasurement();
      if (!opening.ok) {
        console.error(`[Engine] Cannot read starting values: ${opening.error.message}`);
        return Err(opening.error);
      }
      const checked = validateDischargeProfile(validated.value, { voltage: opening.value.voltage });
      if (!checked.ok) {
        return Err(new ValidationError(checked.error.message, {
          field: checked.error.field,
          measurement: opening.value,
        }));
      }

      const frozen = freezeProfile(checked.value);
      const now = cfg.now();
      const s: Session = {
        id: cfg.createId(),
        profile: frozen,
        metadata: normalizeMetadata(metadata),
        activeStepIndex: 0,
        energyWh: 0,
        samples: [],
        timeline: [],
        startedAt: now,
        endedAt: null,
        pausedAt: null,
        pausedTotalMs: 0,
      };
      session = s;
      skippedTicks = 0;
      openTimelineEntry(s, 0);

      console.log(`[Engine] Starting session ${s.id}: ${frozen.name} (${frozen.steps.length} steps) for ${s.metadata.registration}`);
      setState('running');

      const first = frozen.steps[0];
      const modeResult = await link.setMode(first.kind, first.magnitude);
      if (!modeResult.ok) return commandFailed(s, modeResult.error);

      const inputResult = await link.setInput(true);
      if (!inputResult.ok) return commandFailed(s, inputResult.error);

      nextTickAt = now;
      scheduleNextTick();
      return Ok();
    });
  }

  async function pause(): Promise<Result<void, DischargeError>> {
    if (state !== 'running') return Err(stateError('pause'));

    return withLock(async () => {
      clearTimer();
      await waitForTick();
      clearTimer();

      const s = session;
      if (state !== 'running' || !s) return Err(stateError('pause'));

      const result = await link.setInput(false);
      if (!result.ok) return commandFailed(s, result.error);

      s.pausedAt = cfg.now();
      console.log(`[Engine] Paused at step ${s.activeStepIndex + 1}`);
      setState('paused');
      return Ok();
    });
  }

  async function resume(): Promise<Result<void, DischargeError>> {
    if (state !== 'paused') return Err(stateError('resume'));

    return withLock(async () => {
      const s = session;
      if (state !== 'paused' || !s) return Err(stateError('resume'));

      const step = s.profile.steps[s.activeStepIndex];
      const modeResult = await link.setMode(step.kind, step.magnitude);
      if (!modeResult.ok) return commandFailed(s, modeResult.error);

      const inputResult = await link.setInput(true);
      if (!inputResult.ok) return commandFailed(s, inputResult.error);

      const now = cfg.now();
      if (s.pausedAt !== null) {
        s.pausedTotalMs += now - s.pausedAt;
        s.pausedAt = null;
      }

      console.log(`[Engine] Resumed at step ${s.activeStepIndex + 1}`);
      setState('running');
      nextTickAt = now;
      scheduleNextTick();
      return Ok();
    });
  }

  async function stop(comment?: string): Promise<Result<void, DischargeError>> {
    if (state !== 'running' && state !== 'paused') return Err(stateError('stop'));

    // Cancel the in-flight request now rather than after the lock is acquired
    tickAbort?.abort();

    return withLock(async () => {
      clearTimer();
      tickAbort?.abort();
      await waitForTick();
      clearTimer();

      const s = session;
      if ((state !== 'running' && state !== 'paused') || !s) return Err(stateError('stop'));

      if (comment !== undefined) {
        s.metadata = { ...s.metadata, comment };
      }
      console.log(`[Engine] Stop requested at step ${s.activeStepIndex + 1}`);
      return finish(s, 'user-stop');
    });
  }

  function reset(): Result<void, StateError> {
    if (state !== 'idle') return Err(stateError('reset'));
    session = null;
    broadcastState();
    return Ok();
  }

  function acknowledge(): Result<void, StateError> {
    if (state !== 'completed' && state !== 'faulted') return Err(stateError('acknowledge'));
    setState('idle');
    return Ok();
  }

  function subscribe(callback: SubscriberCallback): () => void {
    subscribers.add(callback);
    return () => {
      subscribers.delete(callback);
    };
  }

  function addSink(sink: SampleSink): () => void {
    sampleSinks.add(sink);
    return () => {
      sampleSinks.delete(sink);
    };
  }

  function addSummarySink(sink: SessionSummarySink): () => void {
    summarySinks.add(sink);
    return () => {
      summarySinks.delete(sink);
    };
  }

  function destroy(): void {
    clearTimer();
    tickAbort?.abort();
    unsubscribeLink();
    subscribers.clear();
    sampleSinks.clear();
    summarySinks.clear();
  }

  return {
    getState,
    getSamples: () => session?.samples ?? [],
    start,
    pause,
    resume,
    stop,
    reset,
    acknowledge,
    subscribe,
    addSink,
    addSummarySink,
    destroy,
  };
}
