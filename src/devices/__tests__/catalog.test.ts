import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import { createDefaultRegistry } from '../catalog.js';
import { describeDriver } from '../descriptor.js';
import { verifyRegistry } from '../verifier.js';

describe('default catalog', () => {
  const registry = createDefaultRegistry();
  const log = vi.spyOn(console, 'log');

  beforeAll(() => {
    log.mockImplementation(() => {});
  });

  afterAll(() => {
    log.mockRestore();
  });

  it('should register every shipped driver', () => {
    expect(registry.getDrivers().map(d => d.name)).toEqual([
      'TSP01',
      'SMC100',
      'TPG362',
      'LocalOscillator',
      'GP350',
      'DG645',
      'KeysightOscilloscope',
      'RTB2000',
      'FPC1000',
      'STF03D',
      'AndoSpectrumAnalyzer',
    ]);
    expect(registry.getFamilies()).toEqual([
      'ando',
      'applied-motion',
      'granville-phillips',
      'keysight',
      'kuhne-electronic',
      'newport',
      'pfeiffer-vacuum',
      'rohde-schwarz',
      'stanford-research-systems',
      'thorlabs',
    ]);
  });

  it('should give every dummy the surface of its driver', () => {
    for (const { driver, dummy } of registry.pairs()) {
      const real = describeDriver(driver);
      const synthesized = describeDriver(dummy);

      expect(synthesized.members).toEqual(real.members);
      expect(synthesized.parameters).toEqual(real.parameters);
      expect(synthesized.family).toBe(real.family);
      expect(synthesized.driver).toBe(`${real.driver}Dummy`);
    }
  });

  it('should declare a signature for every member', () => {
    for (const { driver } of registry.pairs()) {
      const undeclared = describeDriver(driver).members.filter(m => !m.declared).map(m => m.name);
      expect(undeclared, driver.name).toEqual([]);
    }
  });

  it('should verify without violations', async () => {
    const reports = await verifyRegistry(registry);

    expect(reports).toHaveLength(11);
    for (const report of reports) {
      expect(report.violations, report.driver).toEqual([]);
      expect(report.skippedMembers, report.driver).toEqual([]);
    }
  });

  it('should filter by family', async () => {
    const reports = await verifyRegistry(registry, { family: 'rohde-schwarz' });
    expect(reports.map(r => r.driver)).toEqual(['RTB2000', 'FPC1000']);
  });
});
