/**
 * Device Descriptor derivation
 *
 * A descriptor is the ordered list of a driver's public members. It is
 * derived once per definition by building a probe instance over the null
 * transport (construction performs no I/O) and reading its own and inherited
 * members, then merging the declared signature of each one.
 *
 * Surface rules:
 * - names starting with INTERNAL_MARKER are internal and skipped
 * - accessors are properties, functions are methods (arity = Function.length)
 * - plain data fields are static metadata, not device members
 *
 * Contract members a driver leaves undeclared take the contract's signature.
 */

import type { z } from 'zod';
import type {
  DeviceDescriptor,
  DriverDefinition,
  InstrumentDevice,
  MemberDescriptor,
  MemberKind,
  MemberSignature,
  Transport,
} from './types.js';
import { InvalidParametersError } from './errors.js';
import { createNullTransport } from './transports/null.js';
import { formatType } from './placeholders.js';
import { contractSignature } from './contract.js';

export const INTERNAL_MARKER = '_';

export interface CreateDeviceOptions {
  /** Use this transport instead of the one the definition would build */
  transport?: Transport;
}

/**
 * Validate parameters and build a device. Throws InvalidParametersError
 * before any transport exists when the parameters are malformed.
 */
export function createDevice<S extends z.ZodTypeAny, D extends InstrumentDevice>(
  definition: DriverDefinition<S, D>,
  params: z.input<S>,
  options: CreateDeviceOptions = {}
): D {
  const parsed = definition.params.safeParse(params);
  if (!parsed.success) {
    throw new InvalidParametersError(definition.name, parsed.error.issues);
  }
  const transport = options.transport ?? definition.transport(parsed.data);
  return definition.create(parsed.data, transport);
}

export interface IntrospectedMember {
  name: string;
  kind: MemberKind;
  arity: number;
}

/** Read the public surface of a live object, own members first, then its prototype chain */
export function introspect(target: object): IntrospectedMember[] {
  const members: IntrospectedMember[] = [];
  const seen = new Set<string>(['constructor']);

  let current: object | null = target;
  while (current && current !== Object.prototype) {
    for (const name of Object.getOwnPropertyNames(current)) {
      if (seen.has(name)) continue;
      seen.add(name);
      if (name.startsWith(INTERNAL_MARKER)) continue;

      const property = Object.getOwnPropertyDescriptor(current, name);
      if (!property) continue;

      if (property.get) {
        members.push({ name, kind: 'property', arity: 0 });
      } else if (typeof property.value === 'function') {
        members.push({ name, kind: 'method', arity: property.value.length });
      }
    }
    current = Object.getPrototypeOf(current);
  }

  return members;
}

const descriptorCache = new WeakMap<DriverDefinition, DeviceDescriptor>();

/**
 * Derive (and cache) the descriptor of a driver definition.
 * Undeclared members are typed 'unknown' and logged.
 */
export function describeDriver(definition: DriverDefinition): DeviceDescriptor {
  const cached = descriptorCache.get(definition);
  if (cached) return cached;

  const probe = createDevice(definition, definition.exampleParams, {
    transport: createNullTransport({ name: `${definition.name} probe` }),
  });

  const members = introspect(probe).map(member => {
    const signature = lookupSignature(definition, member.name) ?? contractSignature(member.name);
    let described: MemberDescriptor;

    if (!signature) {
      console.warn(
        `[Descriptor] ${definition.name}.${member.name} has no declared signature; ` +
        'its dummy returns null'
      );
      described = { ...member, params: [], returns: 'unknown', declared: false };
    } else {
      described = {
        ...member,
        params: signature.kind === 'method' ? Object.freeze([...(signature.params ?? [])]) : [],
        returns: signature.returns,
        declared: true,
        placeholder: signature.placeholder,
        mirrors: signature.kind === 'property' ? signature.mirrors : undefined,
      };
    }
    return Object.freeze(described);
  });

  const descriptor: DeviceDescriptor = Object.freeze({
    driver: definition.name,
    family: definition.family,
    parameters: Object.freeze(parameterNames(definition.params)),
    members: Object.freeze(members),
  });

  descriptorCache.set(definition, descriptor);
  return descriptor;
}

/** Declared signature for a member name, if any */
export function lookupSignature(definition: DriverDefinition, name: string): MemberSignature | undefined {
  const table: Readonly<Record<string, MemberSignature | undefined>> = definition.signatures;
  return Object.prototype.hasOwnProperty.call(table, name) ? table[name] : undefined;
}

function parameterNames(schema: z.ZodTypeAny): string[] {
  const shape: unknown = 'shape' in schema ? schema.shape : undefined;
  if (shape && typeof shape === 'object') return Object.keys(shape);
  const inner: unknown = schema._def?.innerType ?? schema._def?.schema;
  return isZodType(inner) ? parameterNames(inner) : [];
}

function isZodType(value: unknown): value is z.ZodTypeAny {
  return typeof value === 'object' && value !== null && 'safeParse' in value && '_def' in value;
}

/** One-line rendering of a member, as `labdev-verify --members` prints it */
export function formatMember(member: MemberDescriptor): string {
  if (member.kind === 'property') {
    return `${member.name}: ${formatType(member.returns)}`;
  }
  const params = member.params
    .map(p => `${p.name}${p.optional ? '?' : ''}: ${formatType(p.type)}`)
    .join(', ');
  return `${member.name}(${params}) -> ${formatType(member.returns)}`;
}
