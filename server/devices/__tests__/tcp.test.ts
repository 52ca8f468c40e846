import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createServer, type Server, type Socket } from 'net';
import { createTcpTransport } from '../transports/tcp.js';
import { TransportError } from '../transports/transport-error.js';
import { createNgiN69200Link } from '../drivers/ngi-n69200.js';
import type { Transport } from '../types.js';

const REPLIES: Record<string, string> = {
  '*IDN?': 'NGITECH,N69200,SN0001,V1.0',
  'MEASure:VOLTage?': '395.000 V',
  'MEASure:CURRent?': '10.0000 A',
};

describe('TCP Transport', () => {
  let server: Server;
  let port: number;
  let received: string[];
  let peers: Socket[];
  let replyDelays: Record<string, number[]>;
  let transport: Transport;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    received = [];
    peers = [];
    replyDelays = {};
    // Answers one command at a time, in order, like the instrument
    server = createServer(sock => {
      peers.push(sock);
      let buffer = '';
      let answering = Promise.resolve();
      sock.on('data', chunk => {
        buffer += chunk.toString();
        let newline = buffer.indexOf('\n');
        while (newline !== -1) {
          const line = buffer.slice(0, newline);
          buffer = buffer.slice(newline + 1);
          received.push(line);
          answering = answering.then(async () => {
            const wait = replyDelays[line]?.shift() ?? 0;
            if (wait > 0) await new Promise(resolve => setTimeout(resolve, wait));
            const reply = REPLIES[line];
            if (reply !== undefined && !sock.destroyed) sock.write(reply + '\r\n');
          });
          newline = buffer.indexOf('\n');
        }
      });
    });
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', () => resolve()));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('Expected a TCP address');
    port = address.port;
    transport = createTcpTransport({ host: '127.0.0.1', port, timeout: 100, commandDelay: 0 });
  });

  afterEach(async () => {
    await transport.close();
    for (const peer of peers) peer.destroy();
    await new Promise<void>(resolve => server.close(() => resolve()));
    vi.restoreAllMocks();
  });

  describe('late replies', () => {
    it('should keep a late reply away from the next request', async () => {
      replyDelays['MEASure:VOLTage?'] = [150];
      await transport.open();

      const first = await transport.query('MEASure:VOLTage?');
      expect(first.ok).toBe(false);

      expect(await transport.query('MEASure:CURRent?')).toEqual({ ok: true, value: '10.0000 A' });
      expect(console.warn).toHaveBeenCalledWith(`[TCP] Discarding late reply from 127.0.0.1:${port}: 395.000 V`);
    });

    it('should give up on a reply that never comes', async () => {
      await transport.open();
      await transport.query('SLOW?');

      expect(await transport.query('*IDN?')).toEqual({ ok: true, value: 'NGITECH,N69200,SN0001,V1.0' });
      expect(console.warn).toHaveBeenCalledWith(`[TCP] No late reply from 127.0.0.1:${port} after 100ms, assuming 1 lost`);
    });

    it('should give a retried measurement its own replies', async () => {
      replyDelays['MEASure:VOLTage?'] = [150];
      const link = createNgiN69200Link(() => transport, {
        mode: 'real',
        retry: { maxRetries: 2, baseDelayMs: 10, maxDelayMs: 20 },
      });
      expect((await link.connect({ host: '127.0.0.1', port })).ok).toBe(true);

      const measured = await link.queryMeasurement();

      expect(measured).toEqual({ ok: true, value: { voltage: 395, current: 10 } });
      expect(received).toEqual(['*IDN?', 'MEASure:VOLTage?', 'MEASure:VOLTage?', 'MEASure:CURRent?']);
      expect(link.getConnectionState()).toBe('connected');
    });
  });

  it('should query and trim the reply', async () => {
    expect(await transport.open()).toEqual({ ok: true, value: undefined });
    expect(transport.isOpen()).toBe(true);

    expect(await transport.query('*IDN?')).toEqual({ ok: true, value: 'NGITECH,N69200,SN0001,V1.0' });
    expect(await transport.query('MEASure:VOLTage?')).toEqual({ ok: true, value: '395.000 V' });
  });

  it('should write newline-terminated commands in order', async () => {
    await transport.open();

    await transport.write('INPut:FUNCtion CC');
    await transport.write('INPut:STATe 1');
    await transport.query('*IDN?');

    expect(received).toEqual(['INPut:FUNCtion CC', 'INPut:STATe 1', '*IDN?']);
  });

  it('should serialise concurrent queries', async () => {
    await transport.open();

    const [idn, volts] = await Promise.all([
      transport.query('*IDN?'),
      transport.query('MEASure:VOLTage?'),
    ]);

    expect(idn).toEqual({ ok: true, value: 'NGITECH,N69200,SN0001,V1.0' });
    expect(volts).toEqual({ ok: true, value: '395.000 V' });
  });

  it('should time out an unanswered query and keep working', async () => {
    await transport.open();

    const result = await transport.query('SLOW?');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(TransportError);
      expect(result.error.message).toBe('Timeout waiting for response to: SLOW?');
      expect(result.error instanceof TransportError && result.error.reason).toBe('timeout');
    }

    expect(await transport.query('*IDN?')).toEqual({ ok: true, value: 'NGITECH,N69200,SN0001,V1.0' });
  });

  it('should refuse commands before open', async () => {
    const result = await transport.query('*IDN?');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error instanceof TransportError && result.error.reason).toBe('not-open');
    }
  });

  it('should report a refused connection as an I/O failure', async () => {
    const closed = createServer();
    await new Promise<void>(resolve => closed.listen(0, '127.0.0.1', () => resolve()));
    const address = closed.address();
    if (address === null || typeof address === 'string') throw new Error('Expected a TCP address');
    await new Promise<void>(resolve => closed.close(() => resolve()));

    const unreachable = createTcpTransport({ host: '127.0.0.1', port: address.port, connectTimeout: 1000 });
    const result = await unreachable.open();

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error instanceof TransportError && result.error.reason).toBe('io');
      expect(result.error.message.startsWith(`Connection to 127.0.0.1:${address.port} failed: `)).toBe(true);
    }
    expect(unreachable.isOpen()).toBe(false);
  });

  it('should report a connection closed by the peer', async () => {
    await transport.open();
    await transport.query('*IDN?');

    for (const peer of peers) peer.destroy();
    await vi.waitFor(() => expect(transport.isOpen()).toBe(false));

    const result = await transport.query('*IDN?');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('TCP_DISCONNECTED: Connection closed by peer');
      expect(result.error instanceof TransportError && result.error.retryable).toBe(true);
    }
  });

  it('should reopen after close', async () => {
    await transport.open();
    await transport.close();
    expect(transport.isOpen()).toBe(false);

    await transport.open();
    expect(await transport.query('*IDN?')).toEqual({ ok: true, value: 'NGITECH,N69200,SN0001,V1.0' });
  });
});
