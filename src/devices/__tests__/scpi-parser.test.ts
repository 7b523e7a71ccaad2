import { describe, it, expect } from 'vitest';
import { ScpiParser, parsed } from '../scpi-parser.js';

describe('ScpiParser', () => {
  describe('parseNumber', () => {
    it('parses standard and scientific notation', () => {
      expect(ScpiParser.parseNumber('1.234')).toEqual({ ok: true, value: 1.234 });
      expect(ScpiParser.parseNumber('-5.67E-03')).toEqual({ ok: true, value: -5.67e-3 });
      expect(ScpiParser.parseNumber('1.2E-9')).toEqual({ ok: true, value: 1.2e-9 });
    });

    it('handles whitespace', () => {
      expect(ScpiParser.parseNumber('\t42\r\n')).toEqual({ ok: true, value: 42 });
    });

    it('returns error for empty responses', () => {
      expect(ScpiParser.parseNumber('  ')).toEqual({ ok: false, error: 'empty response' });
    });

    it('returns error for the SCPI overflow value', () => {
      expect(ScpiParser.parseNumber('9.91E37')).toEqual({ ok: false, error: 'overflow (9.91E37)' });
    });

    it('returns error for non-numeric responses', () => {
      expect(ScpiParser.parseNumber('AUTO')).toEqual({ ok: false, error: 'non-numeric response: "AUTO"' });
    });
  });

  describe('parseInteger', () => {
    it('accepts whole numbers, including scientific notation', () => {
      expect(ScpiParser.parseInteger('23')).toEqual({ ok: true, value: 23 });
      expect(ScpiParser.parseInteger('+2.3E+01')).toEqual({ ok: true, value: 23 });
    });

    it('rejects fractions', () => {
      expect(ScpiParser.parseInteger('2.5')).toEqual({ ok: false, error: 'not an integer: "2.5"' });
    });
  });

  describe('parseNumberList', () => {
    it('parses comma separated values', () => {
      expect(ScpiParser.parseNumberList('1.0, 2.5,-3E-2')).toEqual({ ok: true, value: [1, 2.5, -0.03] });
    });

    it('ignores a trailing comma', () => {
      expect(ScpiParser.parseNumberList('1,2,')).toEqual({ ok: true, value: [1, 2] });
    });

    it('fails on the first bad entry', () => {
      expect(ScpiParser.parseNumberList('1,x,y')).toEqual({ ok: false, error: 'non-numeric response: "x"' });
    });
  });

  describe('parseBool', () => {
    it('accepts 1 and ON', () => {
      expect(ScpiParser.parseBool('1')).toBe(true);
      expect(ScpiParser.parseBool('on\n')).toBe(true);
      expect(ScpiParser.parseBool('0')).toBe(false);
      expect(ScpiParser.parseBool('OFF')).toBe(false);
    });
  });

  describe('parseEnum', () => {
    const map = { OK: 'OK', INVALID: 'INVALID' } as const;

    it('maps exact and case-insensitive matches', () => {
      expect(ScpiParser.parseEnum('OK\r', map)).toEqual({ ok: true, value: 'OK' });
      expect(ScpiParser.parseEnum('invalid', map)).toEqual({ ok: true, value: 'INVALID' });
    });

    it('lists the valid keys on a miss', () => {
      expect(ScpiParser.parseEnum('BUSY', map)).toEqual({
        ok: false,
        error: 'unknown value "BUSY", expected one of: OK, INVALID',
      });
    });
  });

  describe('parseDefiniteLengthBlock', () => {
    it('extracts the payload', () => {
      const result = ScpiParser.parseDefiniteLengthBlock(Buffer.from('#15hello\n'));
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.toString('ascii')).toBe('hello');
      }
    });

    it('rejects a missing header marker', () => {
      expect(ScpiParser.parseDefiniteLengthBlock(Buffer.from('15hello'))).toEqual({
        ok: false,
        error: 'missing # header marker',
      });
    });

    it('rejects a truncated payload', () => {
      expect(ScpiParser.parseDefiniteLengthBlock(Buffer.from('#210abc'))).toEqual({
        ok: false,
        error: 'buffer too short: expected 10 bytes, got 3',
      });
    });

    it('rejects an invalid digit count', () => {
      expect(ScpiParser.parseDefiniteLengthBlock(Buffer.from('#0'))).toEqual({
        ok: false,
        error: 'invalid digit count: "0"',
      });
    });
  });

  describe('isErrorResponseOk', () => {
    it('recognizes the no-error reply', () => {
      expect(ScpiParser.isErrorResponseOk('0,"No error"')).toBe(true);
      expect(ScpiParser.isErrorResponseOk('+0,No error')).toBe(true);
      expect(ScpiParser.isErrorResponseOk('-113,"Undefined header"')).toBe(false);
    });
  });

  describe('parseCsv', () => {
    it('splits and trims', () => {
      expect(ScpiParser.parseCsv(' a, b ,c')).toEqual(['a', 'b', 'c']);
    });
  });
});

describe('parsed()', () => {
  it('wraps a parser failure in an Error with context', () => {
    expect(parsed(ScpiParser.parseNumber('x'), 'TSP01 :READ?')).toEqual({
      ok: false,
      error: new Error('TSP01 :READ?: non-numeric response: "x"'),
    });
  });

  it('passes values through', () => {
    expect(parsed(ScpiParser.parseNumber('1'), 'ctx')).toEqual({ ok: true, value: 1 });
  });
});
