/**
 * Discharge error taxonomy
 *
 * Every failure the engine or the instrument link can report is one of these.
 * They travel inside Result values; nothing here is meant to be thrown across
 * module boundaries.
 */

import type { EngineState, ErrorInfo } from '../shared/types.js';

export type DischargeErrorCode =
  | 'CONNECTION_FAILED'
  | 'PROTOCOL_ERROR'
  | 'TIMEOUT'
  | 'DEVICE_FAULT'
  | 'VALIDATION_FAILED'
  | 'INVALID_STATE';

export interface DischargeErrorContext {
  command?: string;
  response?: string;
  stepIndex?: number;
  measurement?: { voltage: number; current: number };
  state?: EngineState;
  field?: string;
  attempts?: number;
  faultCode?: number;
}

export abstract class DischargeError extends Error {
  abstract readonly code: DischargeErrorCode;
  readonly context: DischargeErrorContext;

  constructor(message: string, context: DischargeErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.context = context;
  }

  /** Copy with additional context, e.g. the step index known only to the engine */
  abstract withContext(extra: DischargeErrorContext): DischargeError;

  toInfo(): ErrorInfo {
    return {
      code: this.code,
      message: this.message,
      context: { ...this.context },
    };
  }
}

/** Instrument unreachable or refused at connect time */
export class ConnectionError extends DischargeError {
  readonly code = 'CONNECTION_FAILED';
  withContext(extra: DischargeErrorContext): ConnectionError {
    return new ConnectionError(this.message, { ...this.context, ...extra }, { cause: this.cause });
  }
}

/** Malformed or unexpected reply; never retried */
export class ProtocolError extends DischargeError {
  readonly code = 'PROTOCOL_ERROR';
  withContext(extra: DischargeErrorContext): ProtocolError {
    return new ProtocolError(this.message, { ...this.context, ...extra }, { cause: this.cause });
  }
}

/** No reply within the deadline after the retry budget was spent */
export class TimeoutError extends DischargeError {
  readonly code = 'TIMEOUT';
  withContext(extra: DischargeErrorContext): TimeoutError {
    return new TimeoutError(this.message, { ...this.context, ...extra }, { cause: this.cause });
  }
}

/** Instrument reported an internal fault through its status query */
export class DeviceFaultError extends DischargeError {
  readonly code = 'DEVICE_FAULT';
  withContext(extra: DischargeErrorContext): DeviceFaultError {
    return new DeviceFaultError(this.message, { ...this.context, ...extra }, { cause: this.cause });
  }
}

/** Invalid profile, step or threshold */
export class ValidationError extends DischargeError {
  readonly code = 'VALIDATION_FAILED';
  withContext(extra: DischargeErrorContext): ValidationError {
    return new ValidationError(this.message, { ...this.context, ...extra }, { cause: this.cause });
  }
}

/** Command not valid in the engine's current state */
export class StateError extends DischargeError {
  readonly code = 'INVALID_STATE';
  withContext(extra: DischargeErrorContext): StateError {
    return new StateError(this.message, { ...this.context, ...extra }, { cause: this.cause });
  }
}

/** Serialise anything caught at a boundary */
export function toErrorInfo(err: unknown): ErrorInfo {
  if (err instanceof DischargeError) return err.toInfo();
  if (err instanceof Error) return { code: 'INTERNAL_ERROR', message: err.message };
  return { code: 'INTERNAL_ERROR', message: String(err) };
}
