import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { main, EXIT_OK, EXIT_VIOLATIONS, EXIT_USAGE } from '../verify-devices.js';
import { createDriverRegistry, type DriverRegistry } from '../../devices/registry.js';
import type { ConnectionStatus, DriverDefinition } from '../../devices/types.js';
import { Ok } from '../../shared/types.js';
import {
  createThermoLogger,
  ThermoLogger,
  type ThermoLoggerDevice,
  type thermoParams,
} from '../../devices/__tests__/scenario-driver.js';

/** Claims a connection even when no hardware answers */
const Eager: DriverDefinition<typeof thermoParams, ThermoLoggerDevice> = {
  ...ThermoLogger,
  name: 'Eager',
  create: (_params, transport) => {
    const status: ConnectionStatus = { connected: true, device: 'Eager' };
    return Object.assign(createThermoLogger(transport), { initialize: async () => Ok(status) });
  },
};

function registryWith(...drivers: DriverDefinition[]): DriverRegistry {
  const registry = createDriverRegistry();
  for (const driver of drivers) registry.register(driver);
  return registry;
}

describe('labdev-verify', () => {
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;
  let warn: MockInstance<typeof console.warn>;

  beforeEach(() => {
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
    error = vi.spyOn(console, 'error').mockImplementation(() => {});
    warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    log.mockRestore();
    error.mockRestore();
    warn.mockRestore();
  });

  it('should exit 0 when every shipped driver conforms', async () => {
    expect(await main([])).toBe(EXIT_OK);
    expect(error).not.toHaveBeenCalled();
    expect(log).toHaveBeenLastCalledWith('[Verify] 11 driver(s), 0 violation(s)');
  });

  it('should print one line per driver and a summary', async () => {
    const code = await main(['scenario'], registryWith(ThermoLogger));

    expect(code).toBe(EXIT_OK);
    expect(log.mock.calls).toEqual([
      ['[Verify] OK   ThermoLogger (scenario): 2 dummy members checked'],
      ['[Verify] 1 driver(s), 0 violation(s)'],
    ]);
  });

  it('should exit 1 and list violations', async () => {
    const code = await main([], registryWith(ThermoLogger, Eager));

    expect(code).toBe(EXIT_VIOLATIONS);
    expect(error.mock.calls).toEqual([
      ['[Verify] Eager.initialize (lifecycle): initialize() succeeded over a refusing transport'],
      ['[Verify] Eager.initialize (lifecycle): retried initialize() succeeded over a refusing transport'],
    ]);
    expect(log).toHaveBeenCalledWith('[Verify] FAIL Eager (scenario): 2 dummy members checked');
    expect(log).toHaveBeenLastCalledWith('[Verify] 2 driver(s), 2 violation(s)');
  });

  it('should only print violations when quiet', async () => {
    const code = await main(['--quiet'], registryWith(Eager));

    expect(code).toBe(EXIT_VIOLATIONS);
    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(2);
  });

  it('should list member signatures on request', async () => {
    const code = await main(['--members'], registryWith(ThermoLogger));

    expect(code).toBe(EXIT_OK);
    expect(log.mock.calls).toEqual([
      ['[Verify] OK   ThermoLogger (scenario): 2 dummy members checked'],
      ['[Verify]      initialize() -> { connected: boolean; device: string }'],
      ['[Verify]      close() -> void'],
      ['[Verify]      query(command: string) -> string'],
      ['[Verify]      idn: string'],
      ['[Verify]      temperature: number'],
      ['[Verify] 1 driver(s), 0 violation(s)'],
    ]);
  });

  it('should exit 2 for an unknown family', async () => {
    const code = await main(['acme'], registryWith(ThermoLogger));

    expect(code).toBe(EXIT_USAGE);
    expect(error.mock.calls).toEqual([['Unknown family: acme'], ['Known families: scenario']]);
  });

  it('should exit 2 for bad arguments', async () => {
    expect(await main(['--fast'], registryWith(ThermoLogger))).toBe(EXIT_USAGE);
    expect(error).toHaveBeenCalledWith('Unknown option: --fast');

    expect(await main(['newport', 'keysight'])).toBe(EXIT_USAGE);
    expect(error).toHaveBeenCalledWith('Only one family may be given, got newport and keysight');
  });
});
