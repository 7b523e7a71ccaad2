/**
 * Thorlabs TSP01 Temperature/Humidity Logger Driver
 *
 * USB-TMC device (VID 4883 / PID 33016). Reports the built-in temperature and
 * humidity sensors plus two external thermistor probes, all in SCPI.
 * If the device reports "resource busy", the kernel driver still holds it;
 * the USB-TMC transport detaches it on open.
 */

import { z } from 'zod';
import type { DriverDefinition, InstrumentDevice, Transport } from '../types.js';
import type { Result } from '../../shared/types.js';
import { ScpiParser, parsed } from '../scpi-parser.js';
import { createConnection } from '../connection.js';
import { synthesizeDummy } from '../dummy.js';
import { transportForAddress } from '../transports/visa-address.js';
import { resourceAddress } from './params.js';

const READINGS = {
  temperatureUsb: ':READ?',
  humidityUsb: ':SENSe2:HUMidity:DATA?',
  temperatureProbe1: ':SENSe3:TEMPerature:DATA?',
  temperatureProbe2: ':SENSe4:TEMPerature:DATA?',
} as const;

export interface TSP01Device extends InstrumentDevice {
  write(command: string): Promise<Result<void, Error>>;
  /** Built-in temperature in °C */
  temperatureUsb(): Promise<Result<number, Error>>;
  /** Built-in relative humidity in % */
  humidityUsb(): Promise<Result<number, Error>>;
  /** External probe 1 temperature in °C */
  temperatureProbe1(): Promise<Result<number, Error>>;
  /** External probe 2 temperature in °C */
  temperatureProbe2(): Promise<Result<number, Error>>;
}

const params = z.object({
  address: resourceAddress('usb'),
});

export function createTSP01(transport: Transport): TSP01Device {
  const connection = createConnection(transport, {
    name: 'TSP01',
    identify: t => t.query('*IDN?'),
  });

  async function reading(command: string): Promise<Result<number, Error>> {
    const result = await connection.query(command);
    if (!result.ok) return result;
    // Replies are ASCII value lists; the first entry is the reading
    const [first] = ScpiParser.parseCsv(result.value);
    return parsed(ScpiParser.parseNumber(first), command);
  }

  return {
    initialize: () => connection.initialize(),
    close: () => connection.close(),
    query: (command: string) => connection.query(command),
    write: (command: string) => connection.write(command),

    get idn() {
      return connection.query('*IDN?');
    },

    temperatureUsb: () => reading(READINGS.temperatureUsb),
    humidityUsb: () => reading(READINGS.humidityUsb),
    temperatureProbe1: () => reading(READINGS.temperatureProbe1),
    temperatureProbe2: () => reading(READINGS.temperatureProbe2),
  };
}

export const TSP01: DriverDefinition<typeof params, TSP01Device> = {
  name: 'TSP01',
  family: 'thorlabs',
  description: 'Thorlabs TSP01 temperature and humidity logger',
  params,
  exampleParams: { address: 'USB0::4883::33016::M00416749::0::INSTR' },
  signatures: {
    idn: { kind: 'property', returns: 'string', placeholder: 'Thorlabs,TSP01,M00416749,1.2.0' },
    temperatureUsb: { kind: 'method', returns: 'number', placeholder: 23.973883 },
    humidityUsb: { kind: 'method', returns: 'number', placeholder: 25.24333 },
    temperatureProbe1: { kind: 'method', returns: 'number', placeholder: 21.78577 },
    temperatureProbe2: { kind: 'method', returns: 'number', placeholder: 21.43771 },
  },
  transport: ({ address }) => transportForAddress(address),
  create: (_params, transport) => createTSP01(transport),
};

export const TSP01Dummy = synthesizeDummy(TSP01);
