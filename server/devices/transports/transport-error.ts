/**
 * Failure raised by a transport. The reason decides whether the link retries.
 */

export type TransportFailure = 'timeout' | 'io' | 'not-open';

export class TransportError extends Error {
  readonly reason: TransportFailure;

  constructor(reason: TransportFailure, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
    this.reason = reason;
  }

  /** Timeouts and socket I/O failures are assumed transient */
  get retryable(): boolean {
    return this.reason === 'timeout' || this.reason === 'io';
  }
}
