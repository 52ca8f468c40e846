import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createNgiN69200Link } from '../drivers/ngi-n69200.js';
import { createMockTransport, timeoutError, type MockTransport } from './mock-transport.js';
import type { InstrumentLink } from '../types.js';
import { ConnectionError, ProtocolError, TimeoutError } from '../../errors.js';
import { TransportError } from '../transports/transport-error.js';

const ENDPOINT = { host: '192.168.0.123', port: 7000 };
const RETRY = { maxRetries: 2, baseDelayMs: 10, maxDelayMs: 20 };

describe('N69200 link', () => {
  let transport: MockTransport;
  let link: InstrumentLink;

  beforeEach(() => {
    transport = createMockTransport({
      responses: {
        '*IDN?': 'NGITECH,N69200,N692000000001,V1.0.0',
        'MEASure:VOLTage?': '350.000 V',
        'MEASure:CURRent?': '10.0000 A',
        'MEASure:POWer?': '3500.000 W',
        'INPut:STATe?': '1',
        'INPut:FUNCtion?': '0',
        'SYSTem:ERRor?': '0,"No error"',
      },
    });
    link = createNgiN69200Link(() => transport, { mode: 'real', retry: RETRY });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('connect', () => {
    it('identifies the instrument', async () => {
      const states: string[] = [];
      link.onConnectionStateChange(state => states.push(state));

      const result = await link.connect(ENDPOINT);

      expect(result.ok).toBe(true);
      expect(states).toEqual(['connecting', 'connected']);
      expect(link.getConnectionState()).toBe('connected');
      expect(link.getIdentity()).toEqual({
        manufacturer: 'NGITECH',
        model: 'N69200',
        serial: 'N692000000001',
        firmware: 'V1.0.0',
        raw: 'NGITECH,N69200,N692000000001,V1.0.0',
      });
      expect(transport.sentCommands).toEqual(['*IDN?']);
    });

    it('reports an unreachable endpoint', async () => {
      transport = createMockTransport({ openError: new TransportError('io', 'ECONNREFUSED') });
      link = createNgiN69200Link(() => transport, { mode: 'real', retry: RETRY });

      const result = await link.connect(ENDPOINT);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ConnectionError);
        expect(result.error.message).toBe('Cannot reach 192.168.0.123:7000: ECONNREFUSED');
      }
      expect(link.getConnectionState()).toBe('disconnected');
    });

    it('refuses an instrument that does not identify', async () => {
      transport.responses['*IDN?'] = '';

      const result = await link.connect(ENDPOINT);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ConnectionError);
        expect(result.error.message).toBe('Instrument did not identify: unexpected identity: ""');
      }
      expect(link.getConnectionState()).toBe('disconnected');
      expect(transport.isOpen()).toBe(false);
    });

    it('needs an endpoint before reconnecting', async () => {
      const result = await link.reconnect();
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('No endpoint to reconnect to');
      }
    });

    it('reconnects to the last endpoint', async () => {
      await link.connect(ENDPOINT);
      transport.reset();

      const result = await link.reconnect();

      expect(result.ok).toBe(true);
      expect(transport.sentCommands).toEqual(['*IDN?']);
    });
  });

  describe('requests', () => {
    beforeEach(async () => {
      await link.connect(ENDPOINT);
      transport.reset();
    });

    it('writes function then level for setMode', async () => {
      const result = await link.setMode('CP', 3500);

      expect(result.ok).toBe(true);
      expect(transport.sentCommands).toEqual(['INPut:FUNCtion CP', 'STATic:CP:HIGH:LEVel 3500']);
    });

    it('writes the input state', async () => {
      await link.setInput(true);
      await link.setInput(false);
      expect(transport.sentCommands).toEqual(['INPut:STATe 1', 'INPut:STATe 0']);
    });

    it('measures voltage then current', async () => {
      const result = await link.queryMeasurement();

      expect(result).toEqual({ ok: true, value: { voltage: 350, current: 10 } });
      expect(transport.sentCommands).toEqual(['MEASure:VOLTage?', 'MEASure:CURRent?']);
    });

    it('reports an undecodable reply as a protocol error without retrying', async () => {
      transport.responses['MEASure:VOLTage?'] = '****';

      const result = await link.queryMeasurement();

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ProtocolError);
        expect(result.error.context).toEqual({ command: 'MEASure:VOLTage?', response: '****' });
      }
      expect(transport.sentCommands).toEqual(['MEASure:VOLTage?']);
      expect(link.getConnectionState()).toBe('connected');
    });

    it('retries a timed-out request and succeeds', async () => {
      vi.useFakeTimers();
      transport.failNext('MEASure:VOLTage?', timeoutError('MEASure:VOLTage?'), 2);

      const promise = link.queryMeasurement();
      await vi.advanceTimersByTimeAsync(10 + 20);
      const result = await promise;

      expect(result).toEqual({ ok: true, value: { voltage: 350, current: 10 } });
      expect(transport.sentCommands.filter(cmd => cmd === 'MEASure:VOLTage?')).toHaveLength(3);
      expect(link.getConnectionState()).toBe('connected');
    });

    it('faults the link once the retry budget is spent', async () => {
      vi.useFakeTimers();
      const states: string[] = [];
      link.onConnectionStateChange(state => states.push(state));
      transport.failNext('MEASure:VOLTage?', timeoutError('MEASure:VOLTage?'), 5);

      const promise = link.queryMeasurement();
      await vi.advanceTimersByTimeAsync(10 + 20);
      const result = await promise;

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(TimeoutError);
        expect(result.error.context).toEqual({ command: 'MEASure:VOLTage?', attempts: 3 });
      }
      expect(states).toEqual(['faulted']);
    });

    it('abandons a request when the signal aborts', async () => {
      transport.hold('MEASure:VOLTage?');
      const controller = new AbortController();

      const promise = link.queryMeasurement(controller.signal);
      controller.abort();
      const result = await promise;
      transport.release('MEASure:VOLTage?');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(TimeoutError);
        expect(result.error.message).toBe('MEASure:VOLTage? aborted');
      }
      expect(link.getConnectionState()).toBe('connected');
    });

    it('returns null when the fault queue is empty', async () => {
      expect(await link.queryFault()).toEqual({ ok: true, value: null });
    });

    it('returns the queued fault', async () => {
      transport.responses['SYSTem:ERRor?'] = '-310,"Over temperature"';
      expect(await link.queryFault()).toEqual({ ok: true, value: { code: -310, message: 'Over temperature' } });
    });

    it('reads input and function for status', async () => {
      expect(await link.queryStatus()).toEqual({
        ok: true,
        value: { inputEnabled: true, functionCode: 0, functionName: 'CC' },
      });
    });

    it('returns raw replies for verification', async () => {
      const result = await link.verify();
      expect(result).toEqual({
        ok: true,
        value: [
          { query: '*IDN?', response: 'NGITECH,N69200,N692000000001,V1.0.0' },
          { query: 'MEASure:VOLTage?', response: '350.000 V' },
          { query: 'MEASure:CURRent?', response: '10.0000 A' },
          { query: 'MEASure:POWer?', response: '3500.000 W' },
          { query: 'INPut:STATe?', response: '1' },
        ],
      });
    });

    it('turns the input off on disconnect', async () => {
      await link.disconnect();

      expect(transport.sentCommands).toEqual(['INPut:STATe 0']);
      expect(link.getConnectionState()).toBe('disconnected');
      expect(link.getIdentity()).toBeNull();
    });
  });

  it('refuses requests while disconnected', async () => {
    const result = await link.queryMeasurement();

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ConnectionError);
      expect(result.error.message).toBe('Not connected (MEASure:VOLTage?)');
    }
  });
});
