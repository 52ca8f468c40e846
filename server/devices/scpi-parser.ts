/**
 * SCPI Response Parser
 *
 * Utilities for parsing SCPI (Standard Commands for Programmable Instruments)
 * responses. Independent of the transport carrying them.
 */

import type { Result } from '../../shared/types.js';
import { Ok, Err } from '../../shared/types.js';

/**
 * Instruments return 9.9E37 for invalid/overflow measurements.
 * Any value above this threshold is considered invalid.
 */
const OVERFLOW_THRESHOLD = 9e36;

/** Marker some instruments return for an invalid reading */
const INVALID_MARKER = '****';

/** Trailing unit suffixes seen on measurement replies ("350.000 V") */
const UNIT_SUFFIX = /\s*(V|A|W|OHM|Ω)$/i;

/** Strict numeric form: sign, digits, optional fraction and exponent */
const NUMERIC = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export interface ScpiErrorEntry {
  code: number;
  message: string;
}

export const ScpiParser = {
  /**
   * Parse a numeric SCPI response.
   *
   * Handles:
   * - Standard numeric responses ("1.234", "-5.67E-3")
   * - A trailing unit ("350.000 V", "10.0A")
   * - Invalid markers ("****") and overflow values (9.9E37)
   * - Empty and non-numeric responses
   *
   * @returns Result with parsed number, or error string describing the issue
   */
  parseNumber(response: string): Result<number, string> {
    const trimmed = response.trim();

    if (trimmed === '') {
      return Err('empty response');
    }

    if (trimmed.includes(INVALID_MARKER)) {
      return Err('invalid measurement (****)');
    }

    const numeric = trimmed.replace(UNIT_SUFFIX, '');
    if (!NUMERIC.test(numeric)) {
      return Err(`non-numeric response: "${trimmed}"`);
    }

    const value = Number(numeric);

    if (Math.abs(value) > OVERFLOW_THRESHOLD) {
      return Err('overflow (9.9E37)');
    }

    return Ok(value);
  },

  /**
   * Parse a boolean SCPI response.
   *
   * Handles "0" / "1" and "OFF" / "ON", case-insensitive.
   */
  parseBool(response: string): Result<boolean, string> {
    const val = response.trim().toUpperCase();
    if (val === '1' || val === 'ON') return Ok(true);
    if (val === '0' || val === 'OFF') return Ok(false);
    return Err(`not a boolean: "${response.trim()}"`);
  },

  /**
   * Parse an integer SCPI response (function codes, error codes).
   */
  parseInteger(response: string): Result<number, string> {
    const trimmed = response.trim();
    if (!/^[+-]?\d+$/.test(trimmed)) {
      return Err(`not an integer: "${trimmed}"`);
    }
    return Ok(parseInt(trimmed, 10));
  },

  /**
   * Parse an entry from the SCPI error queue.
   *
   * Standard format: `0,"No error"` or `-222,"Data out of range"`
   */
  parseErrorEntry(response: string): Result<ScpiErrorEntry, string> {
    const trimmed = response.trim();
    const comma = trimmed.indexOf(',');
    if (comma < 0) {
      return Err(`malformed error entry: "${trimmed}"`);
    }

    const code = this.parseInteger(trimmed.slice(0, comma));
    if (!code.ok) {
      return Err(`malformed error code: "${trimmed}"`);
    }

    const message = trimmed.slice(comma + 1).trim().replace(/^"(.*)"$/, '$1');
    return Ok({ code: code.value, message });
  },

  /**
   * Parse a comma-separated SCPI response into parts.
   */
  parseCsv(response: string): string[] {
    return response.split(',').map(s => s.trim());
  },
};
