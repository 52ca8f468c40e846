/**
 * Simulation Module
 * Creates a simulated instrument using the real driver with a simulated transport
 *
 * Usage:
 *   const { link, simulator } = createSimulatedInstrument({ decay: 'perTick' });
 *   await link.connect({ host: 'simulator', port: 0 });
 *
 * The link is the same N69200 driver used for hardware; only the transport
 * differs, so the engine cannot tell them apart.
 */

import type { InstrumentLink, RetryPolicy } from '../types.js';
import { createLoadSimulator, type LoadSimulator, type LoadSimulatorConfig } from './load-simulator.js';
import { createSimulatedTransport } from './simulated-transport.js';
import { createNgiN69200Link } from '../drivers/ngi-n69200.js';

export interface SimulatedInstrumentConfig extends LoadSimulatorConfig {
  /** Command latency in ms (default: 0) */
  latencyMs?: number;
  /** Latency jitter in ms (default: 0) */
  latencyJitterMs?: number;
  /** Retry policy handed to the driver */
  retry?: RetryPolicy;
}

export interface SimulatedInstrument {
  link: InstrumentLink;
  simulator: LoadSimulator;
}

const DEFAULT_RETRY: RetryPolicy = { maxRetries: 3, baseDelayMs: 200, maxDelayMs: 2000 };

export const SIMULATOR_ENDPOINT = { host: 'simulator', port: 0 };

/**
 * Create a simulated load. The battery state lives in the simulator and
 * survives reconnects, as a real pack would.
 */
export function createSimulatedInstrument(
  config: SimulatedInstrumentConfig = {}
): SimulatedInstrument {
  const { latencyMs = 0, latencyJitterMs = 0, retry = DEFAULT_RETRY, ...simulatorConfig } = config;

  const simulator = createLoadSimulator(simulatorConfig);

  const link = createNgiN69200Link(
    () => createSimulatedTransport(
      cmd => simulator.handleCommand(cmd),
      { latencyMs, jitterMs: latencyJitterMs, name: 'load-sim', random: simulatorConfig.random }
    ),
    { mode: 'test', retry }
  );

  return { link, simulator };
}

// Re-export types
export type { LoadSimulator, LoadSimulatorConfig, DecayModel } from './load-simulator.js';
