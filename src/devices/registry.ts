/**
 * Driver Registry
 * Selects a driver or its dummy by name ("TSP01" vs "TSP01Dummy")
 */

import type { z } from 'zod';
import type { DriverDefinition, InstrumentDevice } from './types.js';
import type { CreateDeviceOptions } from './descriptor.js';
import { createDevice } from './descriptor.js';
import { DUMMY_SUFFIX, isDummyDefinition, synthesizeDummy } from './dummy.js';

export interface DriverPair {
  driver: DriverDefinition;
  dummy: DriverDefinition;
}

export interface DriverRegistry {
  /** Register a driver and its dummy (synthesized when not given) */
  register<S extends z.ZodTypeAny, D extends InstrumentDevice>(
    driver: DriverDefinition<S, D>,
    dummy?: DriverDefinition<S, D>
  ): void;
  /** Definition by name; dummies are found under `<name>Dummy` */
  get(name: string): DriverDefinition | undefined;
  getDrivers(): DriverDefinition[];
  getFamilies(): string[];
  pairs(family?: string): DriverPair[];
  /** Validate params and build an instance of the named definition */
  create(name: string, params: unknown, options?: CreateDeviceOptions): InstrumentDevice;
}

export function createDriverRegistry(): DriverRegistry {
  const pairs: Map<string, DriverPair> = new Map();
  const byName: Map<string, DriverDefinition> = new Map();

  return {
    register<S extends z.ZodTypeAny, D extends InstrumentDevice>(
      driver: DriverDefinition<S, D>,
      dummy?: DriverDefinition<S, D>
    ): void {
      if (isDummyDefinition(driver)) {
        throw new Error(`${driver.name} is a dummy; register the real driver instead`);
      }
      const sibling = dummy ?? synthesizeDummy(driver);
      const dummyName = `${driver.name}${DUMMY_SUFFIX}`;
      if (sibling.name !== dummyName) {
        throw new Error(`Dummy for ${driver.name} must be named ${dummyName}, got ${sibling.name}`);
      }
      for (const name of [driver.name, sibling.name]) {
        if (byName.has(name)) {
          throw new Error(`Driver ${name} is already registered`);
        }
      }

      pairs.set(driver.name, { driver, dummy: sibling });
      byName.set(driver.name, driver);
      byName.set(sibling.name, sibling);
    },

    get(name: string): DriverDefinition | undefined {
      return byName.get(name);
    },

    getDrivers(): DriverDefinition[] {
      return [...pairs.values()].map(p => p.driver);
    },

    getFamilies(): string[] {
      return [...new Set([...pairs.values()].map(p => p.driver.family))].sort();
    },

    pairs(family?: string): DriverPair[] {
      return [...pairs.values()].filter(p => !family || p.driver.family === family);
    },

    create(name: string, params: unknown, options?: CreateDeviceOptions): InstrumentDevice {
      const definition = byName.get(name);
      if (!definition) {
        const known = [...byName.keys()].join(', ');
        throw new Error(`Unknown driver ${name}; registered: ${known}`);
      }
      return createDevice(definition, params, options);
    },
  };
}
