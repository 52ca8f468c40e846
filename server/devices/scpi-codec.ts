/**
 * N69200 SCPI codec
 *
 * Builds command strings and decodes replies for the NGITECH N69200 family of
 * electronic loads. Pure and stateless; the transport adds the terminator.
 */

import type { StepKind, Result } from '../../shared/types.js';
import { Ok, Err } from '../../shared/types.js';
import { ScpiParser } from './scpi-parser.js';

export const QUERIES = {
  identify: '*IDN?',
  voltage: 'MEASure:VOLTage?',
  current: 'MEASure:CURRent?',
  power: 'MEASure:POWer?',
  inputState: 'INPut:STATe?',
  function: 'INPut:FUNCtion?',
  error: 'SYSTem:ERRor?',
} as const;

/** INPut:FUNCtion? reply codes */
export const FUNCTION_CODES: Record<number, string> = {
  0: 'CC', 1: 'CV', 2: 'CR', 3: 'CP', 4: 'CCD', 5: 'ESR', 6: 'AUTO',
  7: 'DISCHARGE', 8: 'CHARGE', 9: 'OCP', 10: 'CVD', 11: 'CRD', 12: 'MPPT',
  13: 'CVCC', 14: 'CRCC', 15: 'CPCC', 16: 'CVCR', 18: 'CCDWAVE', 19: 'SWEEP',
  20: 'OPP', 21: 'CPD', 22: 'SZ',
};

/** Format a level without exponent notation or trailing zeros */
export function formatLevel(value: number): string {
  return String(Number(value.toFixed(6)));
}

export const ScpiCodec = {
  setFunction(kind: StepKind): string {
    return `INPut:FUNCtion ${kind}`;
  },

  setLevel(kind: StepKind, magnitude: number): string {
    return `STATic:${kind}:HIGH:LEVel ${formatLevel(magnitude)}`;
  },

  /** Both commands needed to put the load into a step's mode */
  modeCommands(kind: StepKind, magnitude: number): string[] {
    return [this.setFunction(kind), this.setLevel(kind, magnitude)];
  },

  setInput(enabled: boolean): string {
    return `INPut:STATe ${enabled ? 1 : 0}`;
  },

  decodeNumber(response: string): Result<number, string> {
    return ScpiParser.parseNumber(response);
  },

  decodeInputState(response: string): Result<boolean, string> {
    return ScpiParser.parseBool(response);
  },

  /** Function code and its name; unknown codes keep their number as name */
  decodeFunction(response: string): Result<{ code: number | null; name: string }, string> {
    const code = ScpiParser.parseInteger(response);
    if (code.ok) {
      return Ok({ code: code.value, name: FUNCTION_CODES[code.value] ?? String(code.value) });
    }
    const name = response.trim();
    if (name === '') return Err('empty response');
    return Ok({ code: null, name: name.toUpperCase() });
  },

  /** Fault code from the error queue, or null when the queue is empty */
  decodeFault(response: string): Result<{ code: number; message: string } | null, string> {
    const entry = ScpiParser.parseErrorEntry(response);
    if (!entry.ok) return entry;
    return Ok(entry.value.code === 0 ? null : entry.value);
  },

  /** Split an *IDN? reply into its four standard fields */
  decodeIdentity(response: string): Result<{ manufacturer: string; model: string; serial: string; firmware: string }, string> {
    const parts = ScpiParser.parseCsv(response);
    if (parts.length < 2 || parts[0] === '') {
      return Err(`unexpected identity: "${response.trim()}"`);
    }
    return Ok({
      manufacturer: parts[0],
      model: parts[1] ?? '',
      serial: parts[2] ?? '',
      firmware: parts[3] ?? '',
    });
  },
};
