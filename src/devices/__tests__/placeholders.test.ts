import { describe, it, expect } from 'vitest';
import {
  SemanticTypes,
  placeholderFor,
  isSynthesizable,
  schemaFor,
  formatType,
  PLACEHOLDER_ARRAY_LENGTH,
  UNKNOWN_PLACEHOLDER,
} from '../placeholders.js';

describe('placeholderFor()', () => {
  it('uses the scalar table', () => {
    expect(placeholderFor('integer')).toBe(123);
    expect(placeholderFor('number')).toBe(1.23);
    expect(placeholderFor('string')).toBe('123');
    expect(placeholderFor('boolean')).toBe(false);
    expect(placeholderFor('void')).toBeUndefined();
    expect(placeholderFor('bytes')).toEqual(Buffer.alloc(4));
  });

  it('builds composites structurally', () => {
    expect(placeholderFor(SemanticTypes.array('number'))).toEqual([1.23, 1.23, 1.23]);
    expect(placeholderFor(SemanticTypes.tuple('integer', 'string'))).toEqual([123, '123']);
    expect(
      placeholderFor(SemanticTypes.record({ points: 'integer', xStart: 'number' }))
    ).toEqual({ points: 123, xStart: 1.23 });
    expect(placeholderFor(SemanticTypes.oneOf('OK', 'INVALID'))).toBe('OK');
  });

  it('nests composites', () => {
    const trace = SemanticTypes.tuple(SemanticTypes.array('number'), SemanticTypes.array('number'));
    const value = placeholderFor(trace);
    expect(value).toEqual([
      Array(PLACEHOLDER_ARRAY_LENGTH).fill(1.23),
      Array(PLACEHOLDER_ARRAY_LENGTH).fill(1.23),
    ]);
  });

  it('falls back to null for unknown', () => {
    expect(placeholderFor('unknown')).toBe(UNKNOWN_PLACEHOLDER);
    expect(placeholderFor(SemanticTypes.array('unknown'))).toEqual([null, null, null]);
  });

  it('returns a fresh value on every call', () => {
    const type = SemanticTypes.array('integer');
    expect(placeholderFor(type)).not.toBe(placeholderFor(type));
  });
});

describe('isSynthesizable()', () => {
  it('is false only where unknown appears', () => {
    expect(isSynthesizable('bytes')).toBe(true);
    expect(isSynthesizable(SemanticTypes.oneOf('A'))).toBe(true);
    expect(isSynthesizable('unknown')).toBe(false);
    expect(isSynthesizable(SemanticTypes.record({ a: 'number', b: SemanticTypes.tuple('unknown') }))).toBe(false);
  });
});

describe('schemaFor()', () => {
  it('accepts every placeholder of its own type', () => {
    const types = [
      'integer',
      'number',
      'string',
      'boolean',
      'void',
      'bytes',
      SemanticTypes.tuple('integer', SemanticTypes.tuple('integer', 'string')),
      SemanticTypes.record({ type: 'string', modelNo: 'string' }),
      SemanticTypes.oneOf('hPascal', 'Torr'),
    ] as const;

    for (const type of types) {
      expect(schemaFor(type).safeParse(placeholderFor(type)).success).toBe(true);
    }
  });

  it('distinguishes integers from numbers', () => {
    expect(schemaFor('integer').safeParse(1.5).success).toBe(false);
    expect(schemaFor('number').safeParse(1.5).success).toBe(true);
  });

  it('checks tuple length and item types', () => {
    const schema = schemaFor(SemanticTypes.tuple('integer', 'number'));
    expect(schema.safeParse([2, 0.001]).success).toBe(true);
    expect(schema.safeParse([2]).success).toBe(false);
    expect(schema.safeParse([2.5, 0.001]).success).toBe(false);
  });

  it('rejects records with extra or missing fields', () => {
    const schema = schemaFor(SemanticTypes.record({ xStart: 'number' }));
    expect(schema.safeParse({ xStart: 1 }).success).toBe(true);
    expect(schema.safeParse({ xStart: 1, extra: 2 }).success).toBe(false);
    expect(schema.safeParse({}).success).toBe(false);
  });

  it('limits oneOf to its values', () => {
    const schema = schemaFor(SemanticTypes.oneOf('OK', 'INVALID'));
    expect(schema.safeParse('INVALID').success).toBe(true);
    expect(schema.safeParse('BUSY').success).toBe(false);
  });
});

describe('formatType()', () => {
  it('renders composites', () => {
    expect(formatType(SemanticTypes.array('number'))).toBe('number[]');
    expect(formatType(SemanticTypes.tuple('integer', 'string'))).toBe('[integer, string]');
    expect(formatType(SemanticTypes.record({ a: 'number', b: 'bytes' }))).toBe('{ a: number; b: bytes }');
    expect(formatType(SemanticTypes.oneOf('OK', 'INVALID'))).toBe("'OK' | 'INVALID'");
  });
});
