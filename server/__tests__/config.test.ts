import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import os from 'os';
import { DEFAULT_SETTINGS, loadConfig, loadSettings } from '../config.js';

describe('loadSettings', () => {
  it('returns the defaults for an empty environment', () => {
    expect(loadSettings({})).toEqual({ ok: true, value: DEFAULT_SETTINGS });
  });

  it('applies environment overrides', () => {
    const result = loadSettings({
      PORT: '4000',
      TEST_MODE: 'true',
      SIM_DECAY: 'perTick',
      INSTRUMENT_HOST: ' 10.0.0.20 ',
      SIM_NOISE_FRACTION: '0',
    });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toMatchObject({
        port: 4000,
        testMode: true,
        simDecay: 'perTick',
        instrumentHost: '10.0.0.20',
        simNoiseFraction: 0,
      });
    }
  });

  it('ignores empty variables', () => {
    expect(loadSettings({ PORT: '' })).toEqual({ ok: true, value: DEFAULT_SETTINGS });
  });

  it.each([
    ['TICK_INTERVAL_MS', '0'],
    ['TEST_MODE', 'maybe'],
    ['INSTRUMENT_PORT', '70000'],
    ['MAX_RETRIES', '1.5'],
    ['SIM_DECAY', 'linear'],
  ])('rejects %s=%s', (name, value) => {
    const result = loadSettings({ [name]: value });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe(`Invalid ${name}: "${value}"`);
    }
  });

  it('rejects a backoff ceiling below the base delay', () => {
    const result = loadSettings({ RETRY_BASE_DELAY_MS: '500', RETRY_MAX_DELAY_MS: '100' });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('RETRY_MAX_DELAY_MS must not be below RETRY_BASE_DELAY_MS');
    }
  });

  describe('config file', () => {
    let testDir: string;
    let file: string;

    beforeEach(async () => {
      testDir = path.join(os.tmpdir(), `hv-discharge-config-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
      await fs.mkdir(testDir, { recursive: true });
      file = path.join(testDir, 'config.json');
    });

    afterEach(async () => {
      vi.restoreAllMocks();
      await fs.rm(testDir, { recursive: true, force: true });
    });

    it('layers the file between defaults and the environment', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      await fs.writeFile(file, JSON.stringify({ instrumentHost: '10.0.0.20', tickIntervalMs: 500, bogus: 1 }));

      const result = loadSettings({ DISCHARGE_CONFIG_FILE: file, TICK_INTERVAL_MS: '250' });

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.instrumentHost).toBe('10.0.0.20');
        expect(result.value.tickIntervalMs).toBe(250);
      }
      expect(warn).toHaveBeenCalledWith(`[Config] Ignoring unknown setting "bogus" in ${file}`);
    });

    it('names the file in value errors', async () => {
      await fs.writeFile(file, JSON.stringify({ port: 'abc' }));

      const result = loadSettings({ DISCHARGE_CONFIG_FILE: file });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe(`Invalid port in ${file}: "abc"`);
      }
    });

    it('requires a JSON object', async () => {
      await fs.writeFile(file, '[1, 2]');

      const result = loadSettings({ DISCHARGE_CONFIG_FILE: file });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe(`Config file ${file} must contain a JSON object`);
      }
    });

    it('reports a missing file', () => {
      const missing = path.join(testDir, 'missing.json');
      const result = loadSettings({ DISCHARGE_CONFIG_FILE: missing });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message.startsWith(`Cannot read config file ${missing}: `)).toBe(true);
      }
    });
  });
});

describe('loadConfig', () => {
  it('groups settings by concern', () => {
    expect(loadConfig({ MAX_RETRIES: '5', TEST_MODE: '1' })).toEqual({
      ok: true,
      value: {
        port: 3001,
        testMode: true,
        instrument: { host: '192.168.0.123', port: 7000, requestTimeoutMs: 5000 },
        retry: { maxRetries: 5, baseDelayMs: 200, maxDelayMs: 2000 },
        engine: { tickIntervalMs: 1000, faultCheckInterval: 5 },
        autoReconnect: { enabled: true, intervalMs: 5000 },
        dataDir: '',
        simulator: {
          initialVoltage: 400,
          decay: 'internalResistance',
          voltsPerTick: 5,
          resistanceFactor: 0.01,
          noiseFraction: 0.02,
          seed: 1,
          latencyMs: 20,
          latencyJitterMs: 5,
        },
      },
    });
  });
});
