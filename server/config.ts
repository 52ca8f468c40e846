/**
 * Server configuration
 *
 * Defaults, overlaid by an optional JSON file (DISCHARGE_CONFIG_FILE), overlaid
 * by environment variables. The file uses the setting names below, e.g.
 *   { "instrumentHost": "10.0.0.20", "tickIntervalMs": 500 }
 */

import { readFileSync } from 'fs';
import type { Result } from '../shared/types.js';
import { Ok, Err } from '../shared/types.js';
import type { RetryPolicy } from './devices/types.js';
import type { DecayModel } from './devices/simulation/index.js';

export interface Settings {
  port: number;
  instrumentHost: string;
  instrumentPort: number;
  testMode: boolean;
  tickIntervalMs: number;
  requestTimeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  faultCheckInterval: number;
  autoReconnect: boolean;
  autoReconnectIntervalMs: number;
  dataDir: string;
  simInitialVoltage: number;
  simDecay: DecayModel;
  simVoltsPerTick: number;
  simResistanceFactor: number;
  simNoiseFraction: number;
  simSeed: number;
  simLatencyMs: number;
  simLatencyJitterMs: number;
}

export interface AppConfig {
  port: number;
  testMode: boolean;
  instrument: { host: string; port: number; requestTimeoutMs: number };
  retry: RetryPolicy;
  engine: { tickIntervalMs: number; faultCheckInterval: number };
  autoReconnect: { enabled: boolean; intervalMs: number };
  /** Empty means the platform default */
  dataDir: string;
  simulator: {
    initialVoltage: number;
    decay: DecayModel;
    voltsPerTick: number;
    resistanceFactor: number;
    noiseFraction: number;
    seed: number;
    latencyMs: number;
    latencyJitterMs: number;
  };
}

export const DEFAULT_SETTINGS: Settings = {
  port: 3001,
  instrumentHost: '192.168.0.123',
  instrumentPort: 7000,
  testMode: false,
  tickIntervalMs: 1000,
  requestTimeoutMs: 5000,
  maxRetries: 3,
  retryBaseDelayMs: 200,
  retryMaxDelayMs: 2000,
  faultCheckInterval: 5,
  autoReconnect: true,
  autoReconnectIntervalMs: 5000,
  dataDir: '',
  simInitialVoltage: 400,
  simDecay: 'internalResistance',
  simVoltsPerTick: 5,
  simResistanceFactor: 0.01,
  simNoiseFraction: 0.02,
  simSeed: 1,
  simLatencyMs: 20,
  simLatencyJitterMs: 5,
};

// ============ Parsers ============

type Parser<T> = (raw: unknown) => T | null;

function toNumber(raw: unknown): number | null {
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null;
  if (typeof raw === 'string' && raw.trim() !== '') {
    const value = Number(raw.trim());
    return Number.isFinite(value) ? value : null;
  }
  return null;
}

const positiveInt: Parser<number> = (raw) => {
  const value = toNumber(raw);
  return value !== null && Number.isInteger(value) && value > 0 ? value : null;
};

const nonNegativeInt: Parser<number> = (raw) => {
  const value = toNumber(raw);
  return value !== null && Number.isInteger(value) && value >= 0 ? value : null;
};

const nonNegativeFloat: Parser<number> = (raw) => {
  const value = toNumber(raw);
  return value !== null && value >= 0 ? value : null;
};

const port: Parser<number> = (raw) => {
  const value = nonNegativeInt(raw);
  return value !== null && value <= 65535 ? value : null;
};

const bool: Parser<boolean> = (raw) => {
  if (typeof raw === 'boolean') return raw;
  if (typeof raw !== 'string') return null;
  const value = raw.trim().toLowerCase();
  if (value === 'true' || value === '1' || value === 'yes') return true;
  if (value === 'false' || value === '0' || value === 'no') return false;
  return null;
};

const text: Parser<string> = (raw) => (typeof raw === 'string' ? raw.trim() : null);

const decay: Parser<DecayModel> = (raw) =>
  raw === 'perTick' || raw === 'internalResistance' ? raw : null;

const SOURCES: { [K in keyof Settings]: { env: string; parse: Parser<Settings[K]> } } = {
  port: { env: 'PORT', parse: port },
  instrumentHost: { env: 'INSTRUMENT_HOST', parse: text },
  instrumentPort: { env: 'INSTRUMENT_PORT', parse: port },
  testMode: { env: 'TEST_MODE', parse: bool },
  tickIntervalMs: { env: 'TICK_INTERVAL_MS', parse: positiveInt },
  requestTimeoutMs: { env: 'REQUEST_TIMEOUT_MS', parse: positiveInt },
  maxRetries: { env: 'MAX_RETRIES', parse: nonNegativeInt },
  retryBaseDelayMs: { env: 'RETRY_BASE_DELAY_MS', parse: nonNegativeInt },
  retryMaxDelayMs: { env: 'RETRY_MAX_DELAY_MS', parse: nonNegativeInt },
  faultCheckInterval: { env: 'FAULT_CHECK_INTERVAL', parse: nonNegativeInt },
  autoReconnect: { env: 'AUTO_RECONNECT', parse: bool },
  autoReconnectIntervalMs: { env: 'AUTO_RECONNECT_INTERVAL_MS', parse: positiveInt },
  dataDir: { env: 'DISCHARGE_DATA_DIR', parse: text },
  simInitialVoltage: { env: 'SIM_INITIAL_VOLTAGE', parse: nonNegativeFloat },
  simDecay: { env: 'SIM_DECAY', parse: decay },
  simVoltsPerTick: { env: 'SIM_VOLTS_PER_TICK', parse: nonNegativeFloat },
  simResistanceFactor: { env: 'SIM_RESISTANCE_FACTOR', parse: nonNegativeFloat },
  simNoiseFraction: { env: 'SIM_NOISE_FRACTION', parse: nonNegativeFloat },
  simSeed: { env: 'SIM_SEED', parse: nonNegativeInt },
  simLatencyMs: { env: 'SIM_LATENCY_MS', parse: nonNegativeFloat },
  simLatencyJitterMs: { env: 'SIM_LATENCY_JITTER_MS', parse: nonNegativeFloat },
};

const SETTING_KEYS = [
  'port', 'instrumentHost', 'instrumentPort', 'testMode', 'tickIntervalMs',
  'requestTimeoutMs', 'maxRetries', 'retryBaseDelayMs', 'retryMaxDelayMs',
  'faultCheckInterval', 'autoReconnect', 'autoReconnectIntervalMs', 'dataDir',
  'simInitialVoltage', 'simDecay', 'simVoltsPerTick', 'simResistanceFactor',
  'simNoiseFraction', 'simSeed', 'simLatencyMs', 'simLatencyJitterMs',
] as const satisfies readonly (keyof Settings)[];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function applySetting<K extends keyof Settings>(
  settings: Settings,
  key: K,
  raw: unknown,
  origin: string
): Result<void, Error> {
  const value = SOURCES[key].parse(raw);
  if (value === null) {
    return Err(new Error(`Invalid ${origin}: ${JSON.stringify(raw)}`));
  }
  settings[key] = value;
  return Ok();
}

function readOverlay(file: string): Result<Record<string, unknown>, Error> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (err) {
    return Err(new Error(`Cannot read config file ${file}: ${err instanceof Error ? err.message : String(err)}`));
  }
  if (!isRecord(parsed)) {
    return Err(new Error(`Config file ${file} must contain a JSON object`));
  }
  return Ok(parsed);
}

/**
 * Resolve settings from defaults, the optional JSON file and the environment.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Result<Settings, Error> {
  const settings: Settings = { ...DEFAULT_SETTINGS };

  const file = env.DISCHARGE_CONFIG_FILE;
  if (file) {
    const overlay = readOverlay(file);
    if (!overlay.ok) return overlay;

    const known = new Set<string>(SETTING_KEYS);
    for (const key of Object.keys(overlay.value)) {
      if (!known.has(key)) {
        console.warn(`[Config] Ignoring unknown setting "${key}" in ${file}`);
      }
    }
    for (const key of SETTING_KEYS) {
      if (overlay.value[key] === undefined) continue;
      const applied = applySetting(settings, key, overlay.value[key], `${key} in ${file}`);
      if (!applied.ok) return applied;
    }
  }

  for (const key of SETTING_KEYS) {
    const name = SOURCES[key].env;
    const raw = env[name];
    if (raw === undefined || raw === '') continue;
    const applied = applySetting(settings, key, raw, name);
    if (!applied.ok) return applied;
  }

  if (settings.retryMaxDelayMs < settings.retryBaseDelayMs) {
    return Err(new Error('RETRY_MAX_DELAY_MS must not be below RETRY_BASE_DELAY_MS'));
  }

  return Ok(settings);
}

export function toAppConfig(settings: Settings): AppConfig {
  return {
    port: settings.port,
    testMode: settings.testMode,
    instrument: {
      host: settings.instrumentHost,
      port: settings.instrumentPort,
      requestTimeoutMs: settings.requestTimeoutMs,
    },
    retry: {
      maxRetries: settings.maxRetries,
      baseDelayMs: settings.retryBaseDelayMs,
      maxDelayMs: settings.retryMaxDelayMs,
    },
    engine: {
      tickIntervalMs: settings.tickIntervalMs,
      faultCheckInterval: settings.faultCheckInterval,
    },
    autoReconnect: {
      enabled: settings.autoReconnect,
      intervalMs: settings.autoReconnectIntervalMs,
    },
    dataDir: settings.dataDir,
    simulator: {
      initialVoltage: settings.simInitialVoltage,
      decay: settings.simDecay,
      voltsPerTick: settings.simVoltsPerTick,
      resistanceFactor: settings.simResistanceFactor,
      noiseFraction: settings.simNoiseFraction,
      seed: settings.simSeed,
      latencyMs: settings.simLatencyMs,
      latencyJitterMs: settings.simLatencyJitterMs,
    },
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Result<AppConfig, Error> {
  const settings = loadSettings(env);
  return settings.ok ? Ok(toAppConfig(settings.value)) : settings;
}
