/**
 * Capability Contract
 *
 * The members every driver and every dummy must expose, independent of
 * instrument family. Versioned so reports can say which revision they
 * checked against.
 */

import type {
  DeviceDescriptor,
  MemberKind,
  MemberSignature,
  ParamSignature,
  SemanticType,
} from './types.js';
import { SemanticTypes } from './placeholders.js';

export const CONTRACT_VERSION = 1;

export interface ContractMember {
  name: string;
  kind: MemberKind;
  /** Expected Function.length; undefined for properties */
  arity?: number;
  params?: readonly ParamSignature[];
  returns: SemanticType;
  required: boolean;
  expectation: string;
}

export const CONNECTION_STATUS_TYPE = SemanticTypes.record({
  connected: 'boolean',
  device: 'string',
});

export const CAPABILITY_CONTRACT: readonly ContractMember[] = [
  {
    name: 'initialize',
    kind: 'method',
    arity: 0,
    returns: CONNECTION_STATUS_TYPE,
    required: true,
    expectation: 'connects or resolves a ConnectionError; a failed call may be retried',
  },
  {
    name: 'close',
    kind: 'method',
    arity: 0,
    returns: 'void',
    required: true,
    expectation: 'idempotent; safe before initialize()',
  },
  {
    name: 'query',
    kind: 'method',
    arity: 1,
    params: [{ name: 'command', type: 'string' }],
    returns: 'string',
    required: true,
    expectation: 'sends a raw command and returns the raw response',
  },
  {
    name: 'write',
    kind: 'method',
    arity: 1,
    params: [{ name: 'command', type: 'string' }],
    returns: 'void',
    required: false,
    expectation: 'sends a raw command with no response',
  },
  {
    name: 'idn',
    kind: 'property',
    returns: 'string',
    required: true,
    expectation: 'non-empty identification, readable right after initialize()',
  },
];

/** Members the synthesizer replaces outright instead of deriving */
export const LIFECYCLE_MEMBERS: ReadonlySet<string> = new Set(['initialize', 'close']);

export interface ContractProblem {
  member: string;
  kind: 'missing-member' | 'wrong-kind' | 'bad-arity';
  message: string;
}

/**
 * Compare a descriptor against the contract. Optional members are only
 * checked when present.
 */
export function checkContract(descriptor: DeviceDescriptor): ContractProblem[] {
  const problems: ContractProblem[] = [];
  const members = new Map(descriptor.members.map(m => [m.name, m]));

  for (const required of CAPABILITY_CONTRACT) {
    const member = members.get(required.name);

    if (!member) {
      if (required.required) {
        problems.push({
          member: required.name,
          kind: 'missing-member',
          message: `required ${required.kind} '${required.name}' is missing`,
        });
      }
      continue;
    }

    if (member.kind !== required.kind) {
      problems.push({
        member: required.name,
        kind: 'wrong-kind',
        message: `'${required.name}' must be a ${required.kind}, found a ${member.kind}`,
      });
      continue;
    }

    if (required.arity !== undefined && member.arity !== required.arity) {
      problems.push({
        member: required.name,
        kind: 'bad-arity',
        message: `'${required.name}' must take ${required.arity} argument(s), takes ${member.arity}`,
      });
    }
  }

  return problems;
}

export function getContractMember(name: string): ContractMember | undefined {
  return CAPABILITY_CONTRACT.find(m => m.name === name);
}

/** Signature implied by the contract, used when a driver declares none for a contract member */
export function contractSignature(name: string): MemberSignature | undefined {
  const member = getContractMember(name);
  if (!member) return undefined;
  return member.kind === 'method'
    ? { kind: 'method', params: member.params ?? [], returns: member.returns }
    : { kind: 'property', returns: member.returns };
}
