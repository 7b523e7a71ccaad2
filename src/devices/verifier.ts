/**
 * Contract Verifier
 *
 * Checks a driver definition (and its dummy) against the capability contract
 * without touching hardware. Every problem found is collected into the
 * report; nothing stops at the first violation.
 *
 * Real drivers are only exercised over the refusing null transport. Dummies
 * are constructed and every public member is called with placeholder
 * arguments.
 */

import type {
  DeviceDescriptor,
  DriverDefinition,
  MemberDescriptor,
} from './types.js';
import { CONTRACT_VERSION, checkContract, LIFECYCLE_MEMBERS } from './contract.js';
import { createDevice, describeDriver, lookupSignature } from './descriptor.js';
import { isDummyDefinition, synthesizeDummy } from './dummy.js';
import { ConnectionError, SynthesisError } from './errors.js';
import { isSynthesizable, placeholderFor, schemaFor, formatType } from './placeholders.js';
import { createNullTransport } from './transports/null.js';
import { toError } from '../shared/types.js';

export type ViolationKind =
  | 'missing-member'
  | 'wrong-kind'
  | 'bad-arity'
  | 'unknown-signature'
  | 'signature-mismatch'
  | 'probe-failed'
  | 'synthesis-failed'
  | 'lifecycle'
  | 'parity'
  | 'bad-return'
  | 'threw';

export interface ContractViolation {
  driver: string;
  member: string;
  kind: ViolationKind;
  message: string;
}

export interface VerificationReport {
  driver: string;
  family: string;
  contractVersion: number;
  violations: ContractViolation[];
  /** Soft findings, e.g. members without a declared signature */
  warnings: string[];
  /** Dummy members that were called and checked */
  checkedMembers: string[];
  /** Dummy members that were not called because an argument type is unknown */
  skippedMembers: string[];
}

/** Minimal view of a registry the verifier can walk */
export interface DriverPairSource {
  pairs(family?: string): { driver: DriverDefinition; dummy: DriverDefinition }[];
}

/**
 * Verify a driver definition. When no dummy is passed one is synthesized;
 * a synthesis failure is reported, not thrown.
 */
export async function verifyDriver(
  definition: DriverDefinition,
  dummy?: DriverDefinition
): Promise<VerificationReport> {
  const report: VerificationReport = {
    driver: definition.name,
    family: definition.family,
    contractVersion: CONTRACT_VERSION,
    violations: [],
    warnings: [],
    checkedMembers: [],
    skippedMembers: [],
  };
  const violate = (member: string, kind: ViolationKind, message: string) => {
    report.violations.push({ driver: definition.name, member, kind, message });
  };

  let descriptor: DeviceDescriptor;
  try {
    descriptor = describeDriver(definition);
  } catch (err) {
    violate('(definition)', 'probe-failed', `probe instance could not be built: ${toError(err).message}`);
    return report;
  }

  // Static checks
  const contractProblems = checkContract(descriptor);
  for (const problem of contractProblems) {
    violate(problem.member, problem.kind, problem.message);
  }
  checkSignatures(definition, descriptor, violate);
  for (const member of descriptor.members) {
    if (!member.declared) {
      report.warnings.push(`${member.name} has no declared signature; its dummy returns null`);
    }
  }

  // A driver that breaks the contract has no dummy to compare against
  if (contractProblems.length > 0) {
    return report;
  }

  // A dummy never refuses a connection, so only real drivers get the refusal check
  if (!isDummyDefinition(definition)) {
    await checkRealLifecycle(definition, violate);
  }

  let dummyDefinition: DriverDefinition;
  try {
    dummyDefinition = dummy ?? synthesizeDummy(definition);
  } catch (err) {
    const message = err instanceof SynthesisError ? err.problems.join('; ') : toError(err).message;
    violate('(definition)', 'synthesis-failed', message);
    return report;
  }

  let dummyDescriptor: DeviceDescriptor;
  try {
    dummyDescriptor = describeDriver(dummyDefinition);
  } catch (err) {
    violate('(dummy)', 'probe-failed', `dummy could not be built: ${toError(err).message}`);
    return report;
  }
  checkParity(descriptor, dummyDescriptor, violate);

  await exerciseDummy(dummyDefinition, dummyDescriptor, report, violate);

  return report;
}

/** Verify every driver/dummy pair of a registry, optionally one family only */
export async function verifyRegistry(
  registry: DriverPairSource,
  options: { family?: string } = {}
): Promise<VerificationReport[]> {
  const reports: VerificationReport[] = [];
  for (const { driver, dummy } of registry.pairs(options.family)) {
    reports.push(await verifyDriver(driver, dummy));
  }
  return reports;
}

type Violate = (member: string, kind: ViolationKind, message: string) => void;

/** Declared signatures must name real members of the same kind with a compatible arity */
function checkSignatures(definition: DriverDefinition, descriptor: DeviceDescriptor, violate: Violate): void {
  const members = new Map(descriptor.members.map(m => [m.name, m]));

  for (const name of Object.keys(definition.signatures)) {
    const signature = lookupSignature(definition, name);
    if (!signature) continue;
    const member = members.get(name);

    if (!member) {
      violate(name, 'unknown-signature', `signature declared for '${name}', which the driver does not expose`);
      continue;
    }
    if (member.kind !== signature.kind) {
      violate(name, 'signature-mismatch', `'${name}' is declared as a ${signature.kind} but is a ${member.kind}`);
      continue;
    }
    if (signature.kind === 'method') {
      const params = signature.params ?? [];
      const required = params.filter(p => !p.optional).length;
      // Function.length stops counting at the first parameter with a default
      if (member.arity < required || member.arity > params.length) {
        violate(
          name,
          'signature-mismatch',
          `'${name}' declares ${params.length} parameter(s) (${required} required) but takes ${member.arity}`
        );
      }
    }
  }
}

async function checkRealLifecycle(definition: DriverDefinition, violate: Violate): Promise<void> {
  const device = createDevice(definition, definition.exampleParams, {
    transport: createNullTransport({ refuse: true, name: `${definition.name} verifier` }),
  });

  await guarded('close', violate, async () => {
    const closed = await device.close();
    if (!closed.ok) {
      violate('close', 'lifecycle', `close() before initialize() failed: ${closed.error.message}`);
    }
  });

  for (const attempt of ['initialize()', 'retried initialize()']) {
    await guarded('initialize', violate, async () => {
      const result = await device.initialize();
      if (result.ok) {
        violate('initialize', 'lifecycle', `${attempt} succeeded over a refusing transport`);
      } else if (!(result.error instanceof ConnectionError)) {
        violate('initialize', 'lifecycle', `${attempt} failed without a ConnectionError`);
      }
    });
  }
}

function checkParity(real: DeviceDescriptor, dummy: DeviceDescriptor, violate: Violate): void {
  const shape = (m: MemberDescriptor) => `${m.name}:${m.kind}/${m.arity}`;
  const realShape = real.members.map(shape);
  const dummyShape = dummy.members.map(shape);

  const length = Math.max(realShape.length, dummyShape.length);
  for (let i = 0; i < length; i++) {
    if (realShape[i] !== dummyShape[i]) {
      violate(
        real.members[i]?.name ?? dummy.members[i]?.name ?? '(members)',
        'parity',
        `member ${i}: driver has ${realShape[i] ?? 'nothing'}, dummy has ${dummyShape[i] ?? 'nothing'}`
      );
    }
  }
  if (real.parameters.join(',') !== dummy.parameters.join(',')) {
    violate('(parameters)', 'parity', `constructor parameters differ: [${real.parameters.join(', ')}] vs [${dummy.parameters.join(', ')}]`);
  }
}

async function exerciseDummy(
  dummy: DriverDefinition,
  descriptor: DeviceDescriptor,
  report: VerificationReport,
  violate: Violate
): Promise<void> {
  const device = createDevice(dummy, dummy.exampleParams);

  await guarded('close', violate, async () => {
    const closed = await device.close();
    if (!closed.ok) violate('close', 'lifecycle', 'dummy close() before initialize() failed');
  });

  for (const attempt of ['initialize()', 'second initialize()']) {
    await guarded('initialize', violate, async () => {
      const status = await device.initialize();
      if (!status.ok || !status.value.connected) {
        violate('initialize', 'lifecycle', `dummy ${attempt} did not report connected`);
      }
    });
  }

  await guarded('idn', violate, async () => {
    const idn = await device.idn;
    if (!idn.ok || typeof idn.value !== 'string' || idn.value.length === 0) {
      violate('idn', 'bad-return', 'dummy idn is not a non-empty string');
    }
  });

  for (const member of descriptor.members) {
    if (LIFECYCLE_MEMBERS.has(member.name) || member.name === 'idn') continue;

    const params = member.params.filter(p => !p.optional);
    if (params.some(p => !isSynthesizable(p.type))) {
      report.skippedMembers.push(member.name);
      continue;
    }

    await guarded(member.name, violate, async () => {
      const value: unknown = Reflect.get(device, member.name);
      let outcome: unknown;
      if (member.kind === 'property') {
        outcome = await value;
      } else if (typeof value === 'function') {
        outcome = await Reflect.apply(value, device, params.map(p => placeholderFor(p.type)));
      } else {
        violate(member.name, 'wrong-kind', `dummy member '${member.name}' is not callable`);
        return;
      }
      checkReturn(member, outcome, violate);
      report.checkedMembers.push(member.name);
    });
  }

  for (const attempt of ['close()', 'second close()']) {
    await guarded('close', violate, async () => {
      const closed = await device.close();
      if (!closed.ok) violate('close', 'lifecycle', `dummy ${attempt} failed`);
    });
  }
}

function checkReturn(member: MemberDescriptor, outcome: unknown, violate: Violate): void {
  if (!isResult(outcome)) {
    violate(member.name, 'bad-return', `'${member.name}' did not resolve a Result`);
    return;
  }
  if (!outcome.ok) {
    violate(member.name, 'bad-return', `'${member.name}' resolved an error: ${describeError(outcome.error)}`);
    return;
  }
  const parsed = schemaFor(member.returns).safeParse(outcome.value);
  if (!parsed.success) {
    violate(
      member.name,
      'bad-return',
      `'${member.name}' returned a value that is not a ${formatType(member.returns)}: ${parsed.error.issues[0]?.message ?? ''}`
    );
  }
}

type LooseResult = { ok: true; value: unknown } | { ok: false; error: unknown };

function isResult(value: unknown): value is LooseResult {
  if (typeof value !== 'object' || value === null || !('ok' in value)) return false;
  return value.ok === true ? 'value' in value : value.ok === false && 'error' in value;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Run a check; anything thrown becomes a violation against the member */
async function guarded(member: string, violate: Violate, check: () => Promise<void>): Promise<void> {
  try {
    await check();
  } catch (err) {
    violate(member, 'threw', `'${member}' threw: ${toError(err).message}`);
  }
}
