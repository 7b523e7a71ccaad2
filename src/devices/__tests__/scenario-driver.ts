import { z } from 'zod';
import type { DriverDefinition, InstrumentDevice, Transport } from '../types.js';
import type { Result } from '../../shared/types.js';
import { ScpiParser, parsed } from '../scpi-parser.js';
import { createConnection } from '../connection.js';
import { createNullTransport } from '../transports/null.js';

/** A temperature logger with the smallest surface the contract allows */
export interface ThermoLoggerDevice extends InstrumentDevice {
  readonly temperature: Promise<Result<number, Error>>;
}

export const thermoParams = z.object({
  port: z.string().min(1),
});

export function createThermoLogger(transport: Transport): ThermoLoggerDevice {
  const connection = createConnection(transport, { name: 'ThermoLogger' });

  return {
    initialize: () => connection.initialize(),
    close: () => connection.close(),
    query: (command: string) => connection.query(command),

    get idn() {
      return connection.query('*IDN?');
    },

    get temperature() {
      return connection.query('TEMP?').then(r => (r.ok ? parsed(ScpiParser.parseNumber(r.value), 'TEMP?') : r));
    },
  };
}

export const ThermoLogger: DriverDefinition<typeof thermoParams, ThermoLoggerDevice> = {
  name: 'ThermoLogger',
  family: 'scenario',
  params: thermoParams,
  exampleParams: { port: '/dev/ttyTEST0' },
  signatures: {
    idn: { kind: 'property', returns: 'string', placeholder: 'Scenario,ThermoLogger,0001,1.0' },
    temperature: { kind: 'property', returns: 'number' },
  },
  transport: () => createNullTransport({ name: 'ThermoLogger link' }),
  create: (_params, transport) => createThermoLogger(transport),
};
