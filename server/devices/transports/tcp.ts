/**
 * TCP Transport
 * Implements newline-terminated SCPI request/response over a raw socket
 */

import { Socket } from 'net';
import { ReadlineParser } from '@serialport/parser-readline';
import type { Transport, Endpoint } from '../types.js';
import type { Result } from '../../../shared/types.js';
import { Ok, Err } from '../../../shared/types.js';
import { TransportError } from './transport-error.js';

export interface TcpConfig extends Endpoint {
  connectTimeout?: number;  // ms to establish the connection (default: 5000)
  timeout?: number;         // per-request deadline in ms (default: 5000)
  commandDelay?: number;    // ms delay after a function change (default: 50)
}

export function createTcpTransport(config: TcpConfig): Transport {
  const { host, port, connectTimeout = 5000, timeout = 5000, commandDelay = 50 } = config;

  let socket: Socket | null = null;
  let parser: ReadlineParser | null = null;
  let opened = false;
  let disconnectError: Error | null = null;

  // The instrument answers in order, so a reply owed to a timed-out request
  // is still on its way and must not reach the next request
  let lateReplies = 0;
  let onDrained: (() => void) | null = null;
  let waiter: ((line: string) => void) | null = null;

  // Mutex to prevent concurrent command/response interleaving
  let commandLock: Promise<void> = Promise.resolve();

  const delay = (ms: number) => new Promise(r => setTimeout(r, ms));

  // Acquire lock for exclusive command access
  function withLock<T>(fn: () => Promise<T>): Promise<T> {
    const previousLock = commandLock;
    let releaseLock: () => void = () => {};
    commandLock = new Promise<void>(resolve => {
      releaseLock = resolve;
    });
    return previousLock.then(fn).finally(() => releaseLock());
  }

  function onLine(line: string): void {
    if (lateReplies > 0) {
      lateReplies--;
      console.warn(`[TCP] Discarding late reply from ${host}:${port}: ${line.trim()}`);
      if (lateReplies === 0) onDrained?.();
      return;
    }
    if (waiter) {
      const deliver = waiter;
      waiter = null;
      deliver(line);
      return;
    }
    console.warn(`[TCP] Discarding unsolicited reply from ${host}:${port}: ${line.trim()}`);
  }

  // Wait up to one request deadline for replies owed to timed-out requests
  async function drainLateReplies(): Promise<void> {
    if (lateReplies === 0) return;
    await new Promise<void>((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        onDrained = null;
        resolve();
      };
      const timer = setTimeout(done, timeout);
      onDrained = done;
    });
    if (lateReplies > 0) {
      console.warn(`[TCP] No late reply from ${host}:${port} after ${timeout}ms, assuming ${lateReplies} lost`);
      lateReplies = 0;
    }
  }

  function resetReplyTracking(): void {
    lateReplies = 0;
    waiter = null;
  }

  function send(sock: Socket, cmd: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      sock.write(cmd + '\n', (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  return {
    async open(): Promise<Result<void, Error>> {
      if (opened) return Ok();

      const sock = new Socket();

      try {
        await new Promise<void>((resolve, reject) => {
          const timer = setTimeout(() => {
            sock.destroy();
            reject(new TransportError('timeout', `Connection to ${host}:${port} timed out after ${connectTimeout}ms`));
          }, connectTimeout);

          sock.once('error', (err) => {
            clearTimeout(timer);
            reject(new TransportError('io', `Connection to ${host}:${port} failed: ${err.message}`, { cause: err }));
          });

          sock.connect(port, host, () => {
            clearTimeout(timer);
            resolve();
          });
        });
      } catch (e) {
        return Err(e instanceof Error ? e : new Error(String(e)));
      }

      sock.removeAllListeners('error');
      sock.setNoDelay(true);

      // Listen for connection loss
      sock.on('close', () => {
        opened = false;
        disconnectError = disconnectError ?? new TransportError('io', 'TCP_DISCONNECTED: Connection closed by peer');
      });

      sock.on('error', (err) => {
        disconnectError = new TransportError('io', `TCP_ERROR: ${err.message}`, { cause: err });
      });

      parser = sock.pipe(new ReadlineParser({ delimiter: '\n' }));
      parser.on('data', onLine);

      socket = sock;
      opened = true;
      disconnectError = null;
      resetReplyTracking();
      return Ok();
    },

    async close(): Promise<Result<void, Error>> {
      if (!socket) return Ok();

      // Acquire lock to wait for any in-flight operations
      await withLock(async () => {
        if (parser) {
          parser.removeAllListeners();
        }
        if (socket) {
          const sock = socket;
          sock.removeAllListeners();
          await new Promise<void>((resolve) => {
            if (sock.destroyed) {
              resolve();
              return;
            }
            sock.end(() => resolve());
            setTimeout(() => {
              sock.destroy();
              resolve();
            }, 500).unref();
          });
        }

        socket = null;
        parser = null;
        opened = false;
        disconnectError = null;
        resetReplyTracking();
      });
      return Ok();
    },

    async query(cmd: string): Promise<Result<string, Error>> {
      return withLock(async () => {
        if (disconnectError) {
          return Err(disconnectError);
        }
        if (!socket || !parser || !opened) {
          return Err(new TransportError('not-open', 'Connection not opened'));
        }

        await drainLateReplies();

        const sock = socket;

        let result: string;
        try {
          result = await new Promise<string>((resolve, reject) => {
            let settled = false;

            const cleanup = () => {
              if (!settled) {
                settled = true;
                clearTimeout(timeoutId);
                waiter = null;
              }
            };

            const timeoutId = setTimeout(() => {
              cleanup();
              lateReplies++;
              reject(new TransportError('timeout', `Timeout waiting for response to: ${cmd}`));
            }, timeout);

            waiter = (line: string) => {
              cleanup();
              resolve(line.trim());
            };

            send(sock, cmd).catch((err: unknown) => {
              cleanup();
              reject(new TransportError('io', `Write failed for ${cmd}: ${err instanceof Error ? err.message : String(err)}`, { cause: err }));
            });
          });
        } catch (e) {
          return Err(e instanceof Error ? e : new Error(String(e)));
        }

        return Ok(result);
      });
    },

    async write(cmd: string): Promise<Result<void, Error>> {
      return withLock(async () => {
        if (disconnectError) {
          return Err(disconnectError);
        }
        if (!socket || !opened) {
          return Err(new TransportError('not-open', 'Connection not opened'));
        }

        try {
          await send(socket, cmd);
        } catch (e) {
          return Err(new TransportError('io', `Write failed for ${cmd}: ${e instanceof Error ? e.message : String(e)}`, { cause: e }));
        }

        // The load needs a moment to settle after a function change
        if (cmd.startsWith('INPut:FUNCtion')) {
          await delay(commandDelay);
        }
        return Ok();
      });
    },

    isOpen(): boolean {
      return opened && disconnectError === null;
    },
  };
}
