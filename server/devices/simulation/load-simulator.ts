/**
 * Load Simulator
 * Simulates an NGITECH N69200 electronic load discharging a battery pack
 *
 * Command set:
 * - *IDN?                                   - Identification
 * - INPut:FUNCtion? / INPut:FUNCtion CC|CP|CV - Operating mode
 * - INPut:STATe? / INPut:STATe 1|0          - Input enable
 * - STATic:CC|CP|CV:HIGH:LEVel <value>      - Setpoints
 * - MEASure:VOLTage? / CURRent? / POWer?    - Measurements
 * - SYSTem:ERRor?                           - Error queue
 *
 * Each voltage measurement with the input on advances the battery model by one tick.
 */

import type { StepKind } from '../../../shared/types.js';

export type DecayModel = 'perTick' | 'internalResistance';

export interface LoadSimulatorConfig {
  /** Pack voltage at start (default: 400) */
  initialVoltage?: number;
  /** How voltage falls under load (default: internalResistance) */
  decay?: DecayModel;
  /** Volts lost per tick under the perTick model (default: 5) */
  voltsPerTick?: number;
  /** Ohms-like factor for the internalResistance model (default: 0.01) */
  resistanceFactor?: number;
  /** CV mode current at the start of a CV step (default: 5) */
  cvCurrentStart?: number;
  /** Fraction of the CV mode current lost per tick (default: 0.05) */
  cvCurrentDecay?: number;
  /** Relative measurement noise, 0 disables (default: 0.02) */
  noiseFraction?: number;
  /** Random source in [0, 1) (default: seeded from `seed`) */
  random?: () => number;
  /** Seed for the default random source (default: 1) */
  seed?: number;
  serialNumber?: string;
}

export interface LoadSimulatorState {
  voltage: number;
  current: number;
  inputEnabled: boolean;
  kind: StepKind;
  level: number;
}

export interface LoadSimulator {
  handleCommand(cmd: string): string | null;
  /** Queue an instrument error for SYSTem:ERRor? to report */
  injectFault(code: number, message: string): void;
  getState(): LoadSimulatorState;
  /** Put the pack back at a given voltage (default: the initial one) */
  resetBattery(voltage?: number): void;
}

const DEFAULT_CONFIG: Required<Omit<LoadSimulatorConfig, 'random'>> = {
  initialVoltage: 400,
  decay: 'internalResistance',
  voltsPerTick: 5,
  resistanceFactor: 0.01,
  cvCurrentStart: 5,
  cvCurrentDecay: 0.05,
  noiseFraction: 0.02,
  seed: 1,
  serialNumber: 'N692000000001',
};

/** Below this the pack is considered flat and draws no current */
const FLAT_VOLTAGE = 1;

/** CV current tapers towards this but never below it */
const CV_CURRENT_FLOOR = 0.01;

/** mulberry32 */
export function createSeededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

const FUNCTION_CODE_BY_KIND: Record<StepKind, number> = { CC: 0, CV: 1, CP: 3 };

function parseKind(value: string): StepKind | null {
  const upper = value.trim().toUpperCase();
  if (upper === 'CC' || upper === 'CP' || upper === 'CV') return upper;
  return null;
}

export function createLoadSimulator(config: LoadSimulatorConfig = {}): LoadSimulator {
  const cfg = { ...DEFAULT_CONFIG, ...config };
  const random = config.random ?? createSeededRandom(cfg.seed);

  // Internal state
  let voltage = cfg.initialVoltage;
  let kind: StepKind = 'CC';
  let inputEnabled = false;
  let cvCurrent = cfg.cvCurrentStart;
  const levels: Record<StepKind, number> = { CC: 0, CP: 0, CV: 0 };
  const errorQueue: Array<{ code: number; message: string }> = [];

  function noisy(value: number): number {
    if (cfg.noiseFraction === 0) return value;
    return value * (1 + (random() * 2 - 1) * cfg.noiseFraction);
  }

  /** Current drawn at the present voltage, before noise */
  function drawnCurrent(): number {
    if (!inputEnabled || voltage < FLAT_VOLTAGE) return 0;
    switch (kind) {
      case 'CC': return levels.CC;
      case 'CP': return levels.CP / voltage;
      case 'CV': return cvCurrent;
    }
  }

  function tick(): void {
    if (!inputEnabled) return;

    if (cfg.decay === 'perTick') {
      voltage -= cfg.voltsPerTick;
    } else {
      const current = drawnCurrent();
      switch (kind) {
        case 'CC':
          voltage -= current * cfg.resistanceFactor + 0.01 + random() * 0.04;
          break;
        case 'CP':
          voltage -= current * cfg.resistanceFactor * 0.5 + 0.01 + random() * 0.04;
          break;
        case 'CV':
          voltage += (levels.CV - voltage) * 0.1 + (random() * 0.1 - 0.05);
          cvCurrent = Math.max(CV_CURRENT_FLOOR, cvCurrent * (1 - cfg.cvCurrentDecay));
          break;
      }
    }

    voltage = Math.max(0, voltage);
  }

  function setLevel(target: StepKind, raw: string): void {
    const value = Number(raw.trim());
    if (!Number.isFinite(value) || value < 0) {
      errorQueue.push({ code: -222, message: 'Data out of range' });
      return;
    }
    levels[target] = value;
    if (target === 'CV') cvCurrent = cfg.cvCurrentStart;
  }

  function handleCommand(cmd: string): string | null {
    const normalized = cmd.trim().toUpperCase();

    if (normalized === '*IDN?') {
      return `NGITECH,N69200,${cfg.serialNumber},V1.0.0`;
    }

    if (normalized === 'INPUT:FUNCTION?') {
      return String(FUNCTION_CODE_BY_KIND[kind]);
    }

    if (normalized.startsWith('INPUT:FUNCTION ')) {
      const next = parseKind(normalized.slice('INPUT:FUNCTION '.length));
      if (next) {
        kind = next;
        if (next === 'CV') cvCurrent = cfg.cvCurrentStart;
      } else {
        errorQueue.push({ code: -224, message: 'Illegal parameter value' });
      }
      return null;
    }

    if (normalized === 'INPUT:STATE?') {
      return inputEnabled ? '1' : '0';
    }

    if (normalized.startsWith('INPUT:STATE ')) {
      const state = normalized.slice('INPUT:STATE '.length).trim();
      inputEnabled = state === '1' || state === 'ON';
      return null;
    }

    const level = /^STATIC:(CC|CP|CV):HIGH:LEVEL\s+(.+)$/.exec(normalized);
    if (level) {
      const target = parseKind(level[1]);
      if (target) setLevel(target, level[2]);
      return null;
    }

    if (normalized === 'MEASURE:VOLTAGE?') {
      tick();
      return `${noisy(voltage).toFixed(3)} V`;
    }

    if (normalized === 'MEASURE:CURRENT?') {
      return `${noisy(drawnCurrent()).toFixed(4)} A`;
    }

    if (normalized === 'MEASURE:POWER?') {
      return `${noisy(drawnCurrent() * voltage).toFixed(3)} W`;
    }

    if (normalized === 'SYSTEM:ERROR?') {
      const entry = errorQueue.shift();
      return entry ? `${entry.code},"${entry.message}"` : '0,"No error"';
    }

    // Unknown command
    console.warn(`[Load Simulator] Unknown command: ${cmd}`);
    errorQueue.push({ code: -113, message: 'Undefined header' });
    return '';
  }

  return {
    handleCommand,

    injectFault(code: number, message: string): void {
      errorQueue.push({ code, message });
    },

    getState(): LoadSimulatorState {
      return {
        voltage,
        current: drawnCurrent(),
        inputEnabled,
        kind,
        level: levels[kind],
      };
    },

    resetBattery(to = cfg.initialVoltage): void {
      voltage = to;
      cvCurrent = cfg.cvCurrentStart;
    },
  };
}
