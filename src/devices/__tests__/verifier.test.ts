import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import type { ConnectionStatus, DriverDefinition } from '../types.js';
import type { Result } from '../../shared/types.js';
import { Ok } from '../../shared/types.js';
import { verifyDriver, verifyRegistry } from '../verifier.js';
import { createDriverRegistry } from '../registry.js';
import { createThermoLogger, ThermoLogger, type ThermoLoggerDevice, thermoParams } from './scenario-driver.js';

type ThermoDefinition = DriverDefinition<typeof thermoParams, ThermoLoggerDevice>;

const kinds = (violations: { member: string; kind: string }[]) => violations.map(v => [v.member, v.kind]);

describe('verifyDriver()', () => {
  let warn: MockInstance<typeof console.warn>;
  let log: MockInstance<typeof console.log>;

  beforeEach(() => {
    warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    warn.mockRestore();
    log.mockRestore();
  });

  it('should pass a conforming driver and its synthesized dummy', async () => {
    const report = await verifyDriver(ThermoLogger);

    expect(report).toEqual({
      driver: 'ThermoLogger',
      family: 'scenario',
      contractVersion: 1,
      violations: [],
      warnings: [],
      checkedMembers: ['query', 'temperature'],
      skippedMembers: [],
    });
  });

  it('should report a missing required member and stop', async () => {
    const NoQuery: ThermoDefinition = {
      ...ThermoLogger,
      name: 'NoQuery',
      create: (_params, transport) => {
        const device = createThermoLogger(transport);
        Reflect.deleteProperty(device, 'query');
        return device;
      },
    };

    const report = await verifyDriver(NoQuery);

    expect(report.violations).toEqual([
      { driver: 'NoQuery', member: 'query', kind: 'missing-member', message: "required method 'query' is missing" },
    ]);
    expect(report.checkedMembers).toEqual([]);
  });

  it('should report signatures that disagree with the driver', async () => {
    const signatures = {
      ...ThermoLogger.signatures,
      temperature: { kind: 'method', returns: 'number' },
      humidity: { kind: 'property', returns: 'number' },
    } as const;
    const Mislabeled: ThermoDefinition = { ...ThermoLogger, name: 'Mislabeled', signatures };

    const report = await verifyDriver(Mislabeled);

    expect(report.violations.map(v => v.message)).toEqual([
      "'temperature' is declared as a method but is a property",
      "signature declared for 'humidity', which the driver does not expose",
    ]);
  });

  it('should warn about members without a declared signature', async () => {
    const Chatty: ThermoDefinition = {
      ...ThermoLogger,
      name: 'ChattyLogger',
      create: (_params, transport) =>
        Object.assign(createThermoLogger(transport), {
          extra: async (): Promise<Result<unknown, Error>> => Ok('real'),
        }),
    };

    const report = await verifyDriver(Chatty);

    expect(report.violations).toEqual([]);
    expect(report.warnings).toEqual(['extra has no declared signature; its dummy returns null']);
    expect(report.checkedMembers).toEqual(['query', 'temperature', 'extra']);
  });

  it('should flag a driver that connects without hardware', async () => {
    const Eager: ThermoDefinition = {
      ...ThermoLogger,
      name: 'Eager',
      create: (_params, transport) => {
        const status: ConnectionStatus = { connected: true, device: 'Eager' };
        return Object.assign(createThermoLogger(transport), { initialize: async () => Ok(status) });
      },
    };

    const report = await verifyDriver(Eager);

    expect(report.violations.map(v => v.message)).toEqual([
      'initialize() succeeded over a refusing transport',
      'retried initialize() succeeded over a refusing transport',
    ]);
  });

  it('should report a probe that cannot be built', async () => {
    const Exploding: ThermoDefinition = {
      ...ThermoLogger,
      name: 'Exploding',
      create: () => {
        throw new Error('boom');
      },
    };

    const report = await verifyDriver(Exploding);

    expect(report.violations).toEqual([
      {
        driver: 'Exploding',
        member: '(definition)',
        kind: 'probe-failed',
        message: 'probe instance could not be built: boom',
      },
    ]);
  });

  it('should compare a hand-written dummy against the driver', async () => {
    const Incomplete: ThermoDefinition = {
      ...ThermoLogger,
      name: 'ThermoLoggerDummy',
      create: (_params, transport) => {
        const device = createThermoLogger(transport);
        Reflect.deleteProperty(device, 'temperature');
        return device;
      },
    };

    const report = await verifyDriver(ThermoLogger, Incomplete);

    // The null transport answers every query with an empty string
    expect(kinds(report.violations)).toEqual([
      ['temperature', 'parity'],
      ['idn', 'bad-return'],
    ]);
    expect(report.violations[0].message).toBe('member 4: driver has temperature:property/0, dummy has nothing');
  });
});

describe('verifyRegistry()', () => {
  it('should verify every pair, or one family', async () => {
    const registry = createDriverRegistry();
    registry.register(ThermoLogger);

    const all = await verifyRegistry(registry);
    expect(all.map(r => [r.driver, r.violations.length])).toEqual([['ThermoLogger', 0]]);

    expect(await verifyRegistry(registry, { family: 'scenario' })).toHaveLength(1);
    expect(await verifyRegistry(registry, { family: 'other' })).toEqual([]);
  });
});
