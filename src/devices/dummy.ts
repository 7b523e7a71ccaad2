/**
 * Dummy Synthesizer
 *
 * Derives a hardware-free driver definition from a real one. The dummy
 * shares the real driver's parameter schema and signature table; its
 * instances are real device objects built over the null transport with
 * every public member replaced by a stand-in of the same arity that:
 *   - performs no I/O
 *   - records the call (see getDummyCalls)
 *   - resolves Ok(placeholder) for the member's declared return type
 *
 * initialize() and close() are always replaced with idempotent success.
 *
 * Accessors are not stateful: setting a value and reading it back returns
 * the placeholder, unless the property signature opts in with `mirrors`.
 */

import type { z } from 'zod';
import type {
  ConnectionStatus,
  DeviceDescriptor,
  DriverDefinition,
  InstrumentDevice,
  MemberDescriptor,
} from './types.js';
import { Ok } from '../shared/types.js';
import { checkContract, LIFECYCLE_MEMBERS } from './contract.js';
import { describeDriver } from './descriptor.js';
import { placeholderFor, schemaFor, formatType } from './placeholders.js';
import { createNullTransport } from './transports/null.js';
import { SynthesisError } from './errors.js';
import { config } from '../config.js';

export const DUMMY_SUFFIX = 'Dummy';

export interface DummyCall {
  member: string;
  args: unknown[];
}

interface DummyState {
  connected: boolean;
  calls: DummyCall[];
  /** Last first-argument per setter, for mirrored properties */
  written: Map<string, unknown>;
}

const dummyStates = new WeakMap<object, DummyState>();
const dummyDefinitions = new WeakSet<DriverDefinition>();

/** Calls recorded on a dummy instance, oldest first. Empty for real drivers. */
export function getDummyCalls(device: object): readonly DummyCall[] {
  return dummyStates.get(device)?.calls ?? [];
}

/** Forget the calls recorded on a dummy instance */
export function clearDummyCalls(device: object): void {
  const state = dummyStates.get(device);
  if (state) state.calls.length = 0;
}

export function isDummy(device: object): boolean {
  return dummyStates.has(device);
}

export function isDummyDefinition(definition: DriverDefinition): boolean {
  return dummyDefinitions.has(definition);
}

/**
 * Synthesize the dummy sibling of a driver definition.
 * Throws SynthesisError immediately when the driver breaks the contract.
 */
export function synthesizeDummy<S extends z.ZodTypeAny, D extends InstrumentDevice>(
  definition: DriverDefinition<S, D>
): DriverDefinition<S, D> {
  const descriptor = deriveForSynthesis(definition);
  const problems = [
    ...checkContract(descriptor).map(p => p.message),
    ...invalidOptIns(descriptor),
  ];
  if (problems.length > 0) {
    throw new SynthesisError(definition.name, problems);
  }

  const name = `${definition.name}${DUMMY_SUFFIX}`;

  const dummy: DriverDefinition<S, D> = {
    name,
    family: definition.family,
    description: definition.description
      ? `${definition.description} (dummy)`
      : `Hardware-free stand-in for ${definition.name}`,
    params: definition.params,
    exampleParams: definition.exampleParams,
    signatures: definition.signatures,

    transport() {
      return createNullTransport({ name: `${name} transport` });
    },

    create(params, transport) {
      const device = definition.create(params, transport);
      installStandIns(device, descriptor, name);
      return device;
    },
  };

  dummyDefinitions.add(dummy);
  return dummy;
}

function deriveForSynthesis(definition: DriverDefinition): DeviceDescriptor {
  try {
    return describeDriver(definition);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new SynthesisError(definition.name, [`probe instance could not be built: ${message}`]);
  }
}

/** Family-declared placeholders must fit their type; mirrors must name a method */
function invalidOptIns(descriptor: DeviceDescriptor): string[] {
  const methods = new Set(descriptor.members.filter(m => m.kind === 'method').map(m => m.name));
  const problems: string[] = [];

  for (const member of descriptor.members) {
    if (member.placeholder !== undefined && !schemaFor(member.returns).safeParse(member.placeholder).success) {
      problems.push(`placeholder for '${member.name}' is not a ${formatType(member.returns)}`);
    }
    if (member.mirrors && !methods.has(member.mirrors)) {
      problems.push(`'${member.name}' mirrors '${member.mirrors}', which is not a method`);
    }
  }
  return problems;
}

function installStandIns(device: object, descriptor: DeviceDescriptor, name: string): void {
  const state: DummyState = { connected: false, calls: [], written: new Map() };
  dummyStates.set(device, state);

  const mirroredSetters = new Set(
    descriptor.members.flatMap(m => (m.mirrors ? [m.mirrors] : []))
  );

  for (const member of descriptor.members) {
    if (LIFECYCLE_MEMBERS.has(member.name)) {
      defineMethod(device, member, lifecycleStandIn(member.name, state, name));
    } else if (member.kind === 'property') {
      Object.defineProperty(device, member.name, {
        configurable: true,
        enumerable: true,
        get: () => {
          state.calls.push({ member: member.name, args: [] });
          return Promise.resolve(Ok(propertyValue(member, state)));
        },
      });
    } else {
      const remember = mirroredSetters.has(member.name);
      defineMethod(device, member, (...args: unknown[]) => {
        state.calls.push({ member: member.name, args });
        if (remember && args.length > 0) state.written.set(member.name, args[0]);
        return Promise.resolve(Ok(valueFor(member)));
      });
    }
  }
}

function lifecycleStandIn(
  member: string,
  state: DummyState,
  name: string
): (...args: unknown[]) => Promise<unknown> {
  if (member === 'initialize') {
    return async () => {
      state.calls.push({ member, args: [] });
      state.connected = true;
      if (config.dummyLogging) console.log(`[${name}] Connected to ${name}`);
      const status: ConnectionStatus = { connected: true, device: name };
      return Ok(status);
    };
  }
  return async () => {
    state.calls.push({ member, args: [] });
    if (state.connected && config.dummyLogging) console.log(`[${name}] Connection closed`);
    state.connected = false;
    return Ok();
  };
}

/** Define a method override whose Function.length matches the original */
function defineMethod(
  device: object,
  member: MemberDescriptor,
  fn: (...args: unknown[]) => Promise<unknown>
): void {
  Object.defineProperty(fn, 'length', { value: member.arity });
  Object.defineProperty(fn, 'name', { value: member.name });
  Object.defineProperty(device, member.name, {
    configurable: true,
    enumerable: true,
    writable: true,
    value: fn,
  });
}

function propertyValue(member: MemberDescriptor, state: DummyState): unknown {
  if (member.mirrors && state.written.has(member.mirrors)) {
    const value = state.written.get(member.mirrors);
    if (schemaFor(member.returns).safeParse(value).success) return value;
  }
  return valueFor(member);
}

function valueFor(member: MemberDescriptor): unknown {
  if (member.placeholder !== undefined) {
    return Buffer.isBuffer(member.placeholder)
      ? Buffer.from(member.placeholder)
      : structuredClone(member.placeholder);
  }
  if (!member.declared || member.returns === 'unknown') {
    console.warn(`[Synth] ${member.name}: return type unknown, returning fallback placeholder`);
  }
  return placeholderFor(member.returns);
}
