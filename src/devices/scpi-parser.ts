/**
 * SCPI Response Parser
 *
 * Utilities for parsing instrument responses. Most drivers here speak SCPI
 * or a SCPI-like ASCII dialect; all of them funnel numeric replies through
 * these helpers so a garbled reply becomes an Err instead of NaN.
 */

import { Result, Ok, Err } from '../shared/types.js';

/**
 * SCPI "not a number" is 9.91E37; anything above this threshold is an
 * invalid or overflowed measurement.
 */
const SCPI_OVERFLOW_THRESHOLD = 9e36;

export const ScpiParser = {
  /**
   * Parse a numeric response.
   *
   * Handles standard and scientific notation ("1.234", "-5.67E-3"),
   * surrounding whitespace, empty replies and the SCPI 9.91E37 overflow value.
   */
  parseNumber(response: string): Result<number, string> {
    const trimmed = response.trim();

    if (trimmed === '') {
      return Err('empty response');
    }

    const value = Number(trimmed);

    if (Number.isNaN(value)) {
      return Err(`non-numeric response: "${trimmed}"`);
    }

    if (Math.abs(value) > SCPI_OVERFLOW_THRESHOLD) {
      return Err('overflow (9.91E37)');
    }

    return Ok(value);
  },

  /** Parse an integer response; rejects fractional values */
  parseInteger(response: string): Result<number, string> {
    return Result.andThen(ScpiParser.parseNumber(response), value =>
      Number.isInteger(value) ? Ok(value) : Err(`not an integer: "${response.trim()}"`)
    );
  },

  /**
   * Parse a comma-separated list of numbers ("1.0,2.5,-3E-2").
   * Fails on the first entry that is not a number.
   */
  parseNumberList(response: string): Result<number[], string> {
    const parts = ScpiParser.parseCsv(response).filter(part => part !== '');
    return Result.all(parts.map(part => ScpiParser.parseNumber(part)));
  },

  /**
   * Parse a boolean response: "0" / "1" or "OFF" / "ON", case-insensitive.
   */
  parseBool(response: string): boolean {
    const val = response.trim();
    return val === '1' || val.toUpperCase() === 'ON';
  },

  /**
   * Parse a response using an enum mapping.
   *
   * @param map - Mapping from instrument values to typed values
   */
  parseEnum<T>(response: string, map: Record<string, T>): Result<T, string> {
    const trimmed = response.trim();

    if (Object.prototype.hasOwnProperty.call(map, trimmed)) {
      return Ok(map[trimmed]);
    }

    for (const [key, value] of Object.entries(map)) {
      if (key.toUpperCase() === trimmed.toUpperCase()) {
        return Ok(value);
      }
    }

    const validKeys = Object.keys(map).join(', ');
    return Err(`unknown value "${trimmed}", expected one of: ${validKeys}`);
  },

  /**
   * Parse an IEEE 488.2 definite length block.
   *
   * Format: #NXXXXXXXX...data...
   * - # is the header marker
   * - N is a single digit indicating how many digits follow for the length
   * - XXXXXXXX is the data length in bytes (N digits)
   * - ...data... is the binary data
   *
   * Used for screenshots and waveform transfers over any transport.
   */
  parseDefiniteLengthBlock(buffer: Buffer): Result<Buffer, string> {
    if (buffer.length < 2) {
      return Err('buffer too short for definite length block');
    }

    if (buffer[0] !== 0x23) {  // '#'
      return Err('missing # header marker');
    }

    const numDigitsChar = String.fromCharCode(buffer[1]);
    const numDigits = parseInt(numDigitsChar, 10);

    if (isNaN(numDigits) || numDigits < 1 || numDigits > 9) {
      return Err(`invalid digit count: "${numDigitsChar}"`);
    }

    if (buffer.length < 2 + numDigits) {
      return Err('buffer too short for length field');
    }

    const lengthStr = buffer.subarray(2, 2 + numDigits).toString('ascii');
    const dataLength = parseInt(lengthStr, 10);

    if (isNaN(dataLength)) {
      return Err(`invalid length field: "${lengthStr}"`);
    }

    const dataStart = 2 + numDigits;
    const dataEnd = dataStart + dataLength;

    if (buffer.length < dataEnd) {
      return Err(`buffer too short: expected ${dataLength} bytes, got ${buffer.length - dataStart}`);
    }

    return Ok(buffer.subarray(dataStart, dataEnd));
  },

  /**
   * Check if a SCPI error response indicates success.
   *
   * Standard SCPI error format: "0,No error" or "+0,No error"
   */
  isErrorResponseOk(response: string): boolean {
    const trimmed = response.trim();
    return trimmed.startsWith('0,') || trimmed.startsWith('+0,');
  },

  /** Split a comma-separated response into trimmed parts */
  parseCsv(response: string): string[] {
    return response.split(',').map(s => s.trim());
  },
};

/** Lift a parser failure into the Error-typed Result drivers return */
export function parsed<T>(result: Result<T, string>, context: string): Result<T, Error> {
  return result.ok ? result : Err(new Error(`${context}: ${result.error}`));
}
