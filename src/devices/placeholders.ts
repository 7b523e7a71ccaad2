/**
 * Placeholder Value Policy
 *
 * Every semantic type maps to one canonical stand-in value. Scalars come from
 * a lookup table; composites are assembled member by member. The result
 * depends only on the type, never on call arguments.
 *
 * The same semantic types also produce zod schemas, which is how the verifier
 * checks that a returned value has the declared shape.
 */

import { z } from 'zod';
import type { ScalarType, SemanticType } from './types.js';

/** Builders for composite semantic types */
export const SemanticTypes = {
  array(of: SemanticType): SemanticType {
    return { kind: 'array', of };
  },

  tuple(...items: SemanticType[]): SemanticType {
    return { kind: 'tuple', items };
  },

  record(fields: Record<string, SemanticType>): SemanticType {
    return { kind: 'record', fields };
  },

  oneOf(...values: [string, ...string[]]): SemanticType {
    return { kind: 'oneOf', values };
  },
};

/** Number of elements in a placeholder array */
export const PLACEHOLDER_ARRAY_LENGTH = 3;

/** Returned (and logged) when a member's type cannot be determined */
export const UNKNOWN_PLACEHOLDER = null;

const SCALAR_PLACEHOLDERS: { readonly [K in ScalarType]: () => unknown } = {
  void: () => undefined,
  boolean: () => false,
  integer: () => 123,
  number: () => 1.23,
  string: () => '123',
  bytes: () => Buffer.alloc(4),
};

const SCALAR_SCHEMAS: { readonly [K in ScalarType]: z.ZodTypeAny } = {
  void: z.undefined(),
  boolean: z.boolean(),
  integer: z.number().int(),
  number: z.number(),
  string: z.string(),
  bytes: z.instanceof(Buffer),
};

/** Canonical placeholder for a semantic type. Fresh objects on every call. */
export function placeholderFor(type: SemanticType): unknown {
  if (type === 'unknown') return UNKNOWN_PLACEHOLDER;
  if (typeof type === 'string') return SCALAR_PLACEHOLDERS[type]();

  switch (type.kind) {
    case 'array':
      return Array.from({ length: PLACEHOLDER_ARRAY_LENGTH }, () => placeholderFor(type.of));
    case 'tuple':
      return type.items.map(item => placeholderFor(item));
    case 'record':
      return Object.fromEntries(
        Object.entries(type.fields).map(([key, field]) => [key, placeholderFor(field)])
      );
    case 'oneOf':
      return type.values[0];
  }
}

/** Whether a placeholder can be produced without falling back */
export function isSynthesizable(type: SemanticType): boolean {
  if (type === 'unknown') return false;
  if (typeof type === 'string') return true;

  switch (type.kind) {
    case 'array':
      return isSynthesizable(type.of);
    case 'tuple':
      return type.items.every(isSynthesizable);
    case 'record':
      return Object.values(type.fields).every(isSynthesizable);
    case 'oneOf':
      return true;
  }
}

/** zod schema accepting exactly the values of a semantic type */
export function schemaFor(type: SemanticType): z.ZodTypeAny {
  if (type === 'unknown') return z.unknown();
  if (typeof type === 'string') return SCALAR_SCHEMAS[type];

  switch (type.kind) {
    case 'array':
      return z.array(schemaFor(type.of));
    case 'tuple': {
      const items = type.items.map(schemaFor);
      return z
        .array(z.unknown())
        .length(items.length)
        .superRefine((values, ctx) => {
          values.forEach((value, index) => {
            const parsed = items[index].safeParse(value);
            if (!parsed.success) {
              ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: [index],
                message: parsed.error.issues[0]?.message ?? 'invalid tuple item',
              });
            }
          });
        });
    }
    case 'record': {
      const shape: Record<string, z.ZodTypeAny> = {};
      for (const [key, field] of Object.entries(type.fields)) {
        shape[key] = schemaFor(field);
      }
      return z.object(shape).strict();
    }
    case 'oneOf': {
      const allowed: readonly string[] = type.values;
      return z.string().refine(value => allowed.includes(value), {
        message: `expected one of: ${allowed.join(', ')}`,
      });
    }
  }
}

/** Human-readable form, used in reports and log lines */
export function formatType(type: SemanticType): string {
  if (typeof type === 'string') return type;

  switch (type.kind) {
    case 'array':
      return `${formatType(type.of)}[]`;
    case 'tuple':
      return `[${type.items.map(formatType).join(', ')}]`;
    case 'record':
      return `{ ${Object.entries(type.fields).map(([key, field]) => `${key}: ${formatType(field)}`).join('; ')} }`;
    case 'oneOf':
      return type.values.map(value => `'${value}'`).join(' | ');
  }
}
