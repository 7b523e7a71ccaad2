// Re-export shared types
export * from '../shared/types.js';

import type { z } from 'zod';
import type { Result } from '../shared/types.js';
import type { ConnectionError } from './errors.js';

// ============ Transport ============

/**
 * A link to one physical instrument. Owned exclusively by the driver
 * instance it was created for; nothing shares a transport.
 */
export interface Transport {
  open(): Promise<Result<void, Error>>;
  close(): Promise<Result<void, Error>>;
  query(cmd: string): Promise<Result<string, Error>>;
  queryBinary?(cmd: string): Promise<Result<Buffer, Error>>;
  write(cmd: string): Promise<Result<void, Error>>;
  isOpen(): boolean;
}

// ============ Capability Contract ============

export interface ConnectionStatus {
  connected: true;
  device: string;
}

/**
 * The capability contract every driver and every dummy implements.
 * Families extend it with their own members; all of them resolve a Result.
 */
export interface InstrumentDevice {
  /** Open the transport. Resolves a ConnectionError on failure; may be retried. */
  initialize(): Promise<Result<ConnectionStatus, ConnectionError>>;
  /** Release the transport. Safe before initialize() and when called twice. */
  close(): Promise<Result<void, Error>>;
  /** Send a raw command and return the raw response */
  query(command: string): Promise<Result<string, Error>>;
  /** Send a raw command that produces no response */
  write?(command: string): Promise<Result<void, Error>>;
  /** Human-readable identification string */
  readonly idn: Promise<Result<string, Error>>;
}

// ============ Semantic Types ============

export type ScalarType = 'void' | 'boolean' | 'integer' | 'number' | 'string' | 'bytes';

export type SemanticType =
  | ScalarType
  | 'unknown'
  | { readonly kind: 'array'; readonly of: SemanticType }
  | { readonly kind: 'tuple'; readonly items: readonly SemanticType[] }
  | { readonly kind: 'record'; readonly fields: Readonly<Record<string, SemanticType>> }
  | { readonly kind: 'oneOf'; readonly values: readonly [string, ...string[]] };

// ============ Member Signatures ============

export interface ParamSignature {
  name: string;
  type: SemanticType;
  optional?: boolean;
}

export interface MethodSignature {
  kind: 'method';
  params?: readonly ParamSignature[];
  returns: SemanticType;
  /** Family-specific representative value returned by the dummy */
  placeholder?: unknown;
}

export interface PropertySignature {
  kind: 'property';
  returns: SemanticType;
  placeholder?: unknown;
  /**
   * Opt-in read-after-write for dummies: the property reports the last first
   * argument passed to the named setter method.
   */
  mirrors?: string;
}

export type MemberSignature = MethodSignature | PropertySignature;

/** Declared signatures, keyed by the device's own member names */
export type SignatureTable<D> = {
  readonly [K in keyof D & string]?: MemberSignature;
};

// ============ Driver Definitions ============

export interface DriverDefinition<
  S extends z.ZodTypeAny = z.ZodTypeAny,
  D extends InstrumentDevice = InstrumentDevice,
> {
  /** Selection name, e.g. 'SMC100'; dummies append DUMMY_SUFFIX */
  readonly name: string;
  /** Manufacturer family, e.g. 'newport' */
  readonly family: string;
  readonly description?: string;
  /** Connection parameters, validated before any transport is created */
  readonly params: S;
  /** Valid parameters used for introspection and verification */
  readonly exampleParams: z.input<S>;
  readonly signatures: SignatureTable<D>;
  /** Build (but do not open) the transport the instance will own */
  transport(params: z.output<S>): Transport;
  /** Build the device. Must not perform I/O. */
  create(params: z.output<S>, transport: Transport): D;
}

export type DeviceOf<T> = T extends DriverDefinition<z.ZodTypeAny, infer D> ? D : never;

// ============ Device Descriptor ============

export type MemberKind = MemberSignature['kind'];

export interface MemberDescriptor {
  readonly name: string;
  readonly kind: MemberKind;
  /** Function.length of the method; 0 for properties */
  readonly arity: number;
  readonly params: readonly ParamSignature[];
  readonly returns: SemanticType;
  /** false when no signature was declared (placeholder ambiguity) */
  readonly declared: boolean;
  readonly placeholder?: unknown;
  readonly mirrors?: string;
}

export interface DeviceDescriptor {
  readonly driver: string;
  readonly family: string;
  /** Constructor parameter names (keys of the params schema) */
  readonly parameters: readonly string[];
  readonly members: readonly MemberDescriptor[];
}
