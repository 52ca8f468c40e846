/**
 * Discharge profile model
 *
 * Contains:
 * - Validation of profiles before a session may use them
 * - Normalisation of loose step records (editor format and the legacy format)
 * - Step label formatting
 */

import type {
  DischargeProfile,
  DischargeStep,
  StepKind,
  StopMetric,
  Result,
} from './types.js';
import { Ok, Err } from './types.js';

// ============ Validation ============

export const PROFILE_LIMITS = {
  /** Maximum steps in one profile */
  MAX_STEPS: 100,
  /** Maximum profile name length */
  MAX_NAME_LENGTH: 100,
} as const;

export const STEP_KINDS: readonly StepKind[] = ['CC', 'CP', 'CV'];
export const STOP_METRICS: readonly StopMetric[] = ['voltage', 'current'];

/** Default stop condition for a legacy CV step, which had no usable stop field */
const LEGACY_CV_STOP_CURRENT = 0.1;

export interface ValidationIssue {
  field: string;
  message: string;
}

/** Known starting values of the instrument; thresholds must lie below them */
export interface StartingValues {
  voltage?: number;
  current?: number;
}

export function isStepKind(value: unknown): value is StepKind {
  return STEP_KINDS.some(kind => kind === value);
}

export function isStopMetric(value: unknown): value is StopMetric {
  return STOP_METRICS.some(metric => metric === value);
}

/**
 * Validate a discharge profile.
 *
 * Returns a normalised copy on success so callers never hold a reference
 * that the profile's owner can still mutate.
 */
export function validateDischargeProfile(
  profile: DischargeProfile,
  starting: StartingValues = {}
): Result<DischargeProfile, ValidationIssue> {
  if (typeof profile.name !== 'string' || profile.name.trim() === '') {
    return Err({ field: 'name', message: 'Profile name is required' });
  }
  if (profile.name.length > PROFILE_LIMITS.MAX_NAME_LENGTH) {
    return Err({ field: 'name', message: `Name must be at most ${PROFILE_LIMITS.MAX_NAME_LENGTH} characters` });
  }

  if (!Array.isArray(profile.steps)) {
    return Err({ field: 'steps', message: 'Steps must be an array' });
  }
  if (profile.steps.length === 0) {
    return Err({ field: 'steps', message: 'At least one step is required' });
  }
  if (profile.steps.length > PROFILE_LIMITS.MAX_STEPS) {
    return Err({ field: 'steps', message: `Maximum ${PROFILE_LIMITS.MAX_STEPS} steps allowed` });
  }

  const steps: DischargeStep[] = [];
  for (let i = 0; i < profile.steps.length; i++) {
    const result = validateStep(profile.steps[i], i, starting);
    if (!result.ok) return result;
    steps.push(result.value);
  }

  return Ok({ name: profile.name.trim(), steps });
}

function validateStep(
  step: DischargeStep,
  index: number,
  starting: StartingValues
): Result<DischargeStep, ValidationIssue> {
  const field = `steps[${index}]`;

  if (!isStepKind(step.kind)) {
    return Err({ field: `${field}.kind`, message: `Unsupported step kind: ${String(step.kind)}` });
  }

  if (!Number.isFinite(step.magnitude)) {
    return Err({ field: `${field}.magnitude`, message: 'Magnitude must be a finite number' });
  }
  if (step.magnitude <= 0) {
    return Err({ field: `${field}.magnitude`, message: 'Magnitude must be greater than zero' });
  }

  if (!step.stop || !isStopMetric(step.stop.metric)) {
    return Err({ field: `${field}.stop.metric`, message: 'Stop metric must be voltage or current' });
  }
  if (!Number.isFinite(step.stop.threshold)) {
    return Err({ field: `${field}.stop.threshold`, message: 'Stop threshold must be a finite number' });
  }
  if (step.stop.threshold < 0) {
    return Err({ field: `${field}.stop.threshold`, message: 'Stop threshold must not be negative' });
  }

  // A discharge only ever falls, so a threshold at or above the starting
  // value would end the step on its first sample.
  const start = starting[step.stop.metric];
  if (start !== undefined && step.stop.threshold >= start) {
    const unit = step.stop.metric === 'voltage' ? 'V' : 'A';
    return Err({
      field: `${field}.stop.threshold`,
      message: `Stop threshold ${step.stop.threshold}${unit} must be below the starting ${step.stop.metric} ${start}${unit}`,
    });
  }

  return Ok({
    kind: step.kind,
    magnitude: step.magnitude,
    stop: { metric: step.stop.metric, threshold: step.stop.threshold },
  });
}

// ============ Record parsing ============

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return NaN;
}

/**
 * Normalise one loose step record.
 *
 * Accepts the editor format `{ kind, magnitude, stopMetric, stopThreshold }`
 * and the legacy format `{ type, value, stop_condition_type, stop_condition_value }`,
 * including legacy steps that predate explicit stop conditions.
 */
export function normalizeStepRecord(record: unknown, index: number): Result<DischargeStep, ValidationIssue> {
  const field = `steps[${index}]`;
  if (!isRecord(record)) {
    return Err({ field, message: 'Step must be an object' });
  }

  const rawKind = record.kind ?? record.type ?? 'CC';
  const kind = typeof rawKind === 'string' ? rawKind.trim().toUpperCase() : rawKind;
  if (!isStepKind(kind)) {
    return Err({ field: `${field}.kind`, message: `Unsupported step kind: ${String(rawKind)}` });
  }

  const magnitude = toNumber(record.magnitude ?? record.value);

  let metric: unknown = record.stopMetric ?? record.stop_condition_type;
  let threshold = toNumber(record.stopThreshold ?? record.stop_condition_value);

  if (metric === undefined) {
    if (kind === 'CV') {
      metric = 'current';
      threshold = LEGACY_CV_STOP_CURRENT;
    } else if (record.stop_voltage !== undefined) {
      metric = 'voltage';
      threshold = toNumber(record.stop_voltage);
    } else {
      metric = 'voltage';
      threshold = 0;
    }
    console.warn(`[Profile] Step ${index + 1} has no stop condition, using ${String(metric)} <= ${threshold}`);
  }

  const normalizedMetric = typeof metric === 'string' ? metric.trim().toLowerCase() : metric;
  if (!isStopMetric(normalizedMetric)) {
    return Err({ field: `${field}.stopMetric`, message: `Unsupported stop metric: ${String(metric)}` });
  }

  return Ok({ kind, magnitude, stop: { metric: normalizedMetric, threshold } });
}

/**
 * Build and validate a profile from loose step records.
 */
export function parseProfileRecords(
  name: string,
  records: unknown,
  starting: StartingValues = {}
): Result<DischargeProfile, ValidationIssue> {
  if (!Array.isArray(records)) {
    return Err({ field: 'steps', message: 'Steps must be an array' });
  }

  const steps: DischargeStep[] = [];
  for (let i = 0; i < records.length; i++) {
    const result = normalizeStepRecord(records[i], i);
    if (!result.ok) return result;
    steps.push(result.value);
  }

  return validateDischargeProfile({ name, steps }, starting);
}

// ============ Formatting ============

const KIND_UNITS: Record<StepKind, string> = { CC: 'A', CP: 'W', CV: 'V' };
const METRIC_UNITS: Record<StopMetric, string> = { voltage: 'V', current: 'A' };

function formatNumber(value: number): string {
  return String(Number(value.toPrecision(6)));
}

/** Short human label, e.g. "CC 10A → 350V" */
export function formatStepLabel(step: DischargeStep): string {
  return `${step.kind} ${formatNumber(step.magnitude)}${KIND_UNITS[step.kind]} → ` +
    `${formatNumber(step.stop.threshold)}${METRIC_UNITS[step.stop.metric]}`;
}

/** Deep-frozen copy, used once a session owns the profile */
export function freezeProfile(profile: DischargeProfile): DischargeProfile {
  const copy: DischargeProfile = {
    name: profile.name,
    steps: profile.steps.map(step => ({
      kind: step.kind,
      magnitude: step.magnitude,
      stop: { metric: step.stop.metric, threshold: step.stop.threshold },
    })),
  };
  for (const step of copy.steps) {
    Object.freeze(step.stop);
    Object.freeze(step);
  }
  Object.freeze(copy.steps);
  return Object.freeze(copy);
}
