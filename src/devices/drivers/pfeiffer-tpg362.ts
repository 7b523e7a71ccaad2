/**
 * Pfeiffer Vacuum TPG 362 Dual Gauge Driver
 *
 * Serial (USB) at 9600 8N1. Every mnemonic is acknowledged before any data
 * moves: the host sends "PR1", the gauge answers ACK (or NAK), and the host
 * then sends ENQ to have the value transmitted.
 */

import { z } from 'zod';
import type { DriverDefinition, InstrumentDevice, Transport } from '../types.js';
import type { Result } from '../../shared/types.js';
import { Ok, Err } from '../../shared/types.js';
import { ScpiParser, parsed } from '../scpi-parser.js';
import { createConnection } from '../connection.js';
import { synthesizeDummy } from '../dummy.js';
import { SemanticTypes } from '../placeholders.js';
import { createSerialTransport } from '../transports/serial.js';
import { serialPath } from './params.js';

export const CONTROL = {
  ETX: '\x03',  // end of text / clear input buffer
  ENQ: '\x05',  // enquiry
  ACK: '\x06',  // positive acknowledge
  NAK: '\x15',  // negative acknowledge
} as const;

export const ERROR_STATUS: Readonly<Record<string, string>> = {
  '0000': 'No error',
  '1000': 'ERROR (see display)',
  '0100': 'No hardware error!',
  '0010': 'Inadmissible parameter error',
  '0001': 'Syntax error',
};

export const MEASUREMENT_STATUS: Readonly<Record<number, string>> = {
  0: 'Measurement data okay',
  1: 'Underrange',
  2: 'Overrange',
  3: 'Sensor error',
  4: 'Sensor off (IKR, PKR, IMR, PBR)',
  5: 'No sensor (output: 5,2.0000E-2 [mbar])',
  6: 'Identification error',
};

export const PRESSURE_UNITS: Readonly<Record<number, string>> = {
  0: 'mbar/bar',
  1: 'Torr',
  2: 'Pascal',
  3: 'Micron',
  4: 'hPascal',
  5: 'Volt',
};

export interface GaugeIdentification {
  type: string;
  modelNo: string;
  serialNo: string;
  firmwareVersion: string;
  hardwareVersion: string;
}

/** [status code, status message] */
export type MeasurementStatus = [number, string];

/** [pressure, status] */
export type GaugeReading = [number, MeasurementStatus];

export interface TPG362Device extends InstrumentDevice {
  /** Send a mnemonic and require an ACK */
  write(command: string): Promise<Result<void, Error>>;
  readonly identification: Promise<Result<GaugeIdentification, Error>>;
  readonly pressureGauge1: Promise<Result<number, Error>>;
  readonly pressureGauge2: Promise<Result<number, Error>>;
  /** Controller temperature in °C (±2) */
  readonly temperature: Promise<Result<number, Error>>;
  /** [hex error code, message] */
  getErrorStatus(): Promise<Result<[string, string], Error>>;
  getGaugePressure(gauge: number): Promise<Result<GaugeReading, Error>>;
  getPressureAll(): Promise<Result<[number, MeasurementStatus, number, MeasurementStatus], Error>>;
  getPressureUnit(): Promise<Result<string, Error>>;
}

const params = z.object({
  port: serialPath,
});

function statusOf(code: number): MeasurementStatus {
  return [code, MEASUREMENT_STATUS[code] ?? `Unknown status ${code}`];
}

export function createTPG362(transport: Transport): TPG362Device {
  const name = 'TPG362';
  const connection = createConnection(transport, { name });

  async function write(command: string): Promise<Result<void, Error>> {
    const result = await connection.query(command);
    if (!result.ok) return result;
    if (result.value === CONTROL.NAK) {
      return Err(new Error(`${name}: negative acknowledge for ${command}`));
    }
    if (result.value !== CONTROL.ACK) {
      return Err(new Error(`${name}: unexpected reply to ${command}: ${JSON.stringify(result.value)}`));
    }
    return Ok();
  }

  async function query(command: string): Promise<Result<string, Error>> {
    const ack = await write(command);
    if (!ack.ok) return ack;
    return connection.query(CONTROL.ENQ);
  }

  async function readInteger(command: string): Promise<Result<number, Error>> {
    const result = await query(command);
    if (!result.ok) return result;
    return parsed(ScpiParser.parseInteger(result.value), `${name} ${command}`);
  }

  // Reply: status,pressure[,status,pressure]
  function parseReadings(command: string, response: string): Result<GaugeReading[], Error> {
    const parts = ScpiParser.parseCsv(response);
    if (parts.length === 0 || parts.length % 2 !== 0) {
      return Err(new Error(`${name} ${command}: malformed reply "${response}"`));
    }
    const readings: GaugeReading[] = [];
    for (let i = 0; i < parts.length; i += 2) {
      const code = parsed(ScpiParser.parseInteger(parts[i]), `${name} ${command} status`);
      if (!code.ok) return code;
      const pressure = parsed(ScpiParser.parseNumber(parts[i + 1]), `${name} ${command} pressure`);
      if (!pressure.ok) return pressure;
      readings.push([pressure.value, statusOf(code.value)]);
    }
    return Ok(readings);
  }

  async function getGaugePressure(gauge: number): Promise<Result<GaugeReading, Error>> {
    if (gauge !== 1 && gauge !== 2) {
      return Err(new Error('The gauge number can only be 1 or 2'));
    }
    const command = `PR${gauge}`;
    const result = await query(command);
    if (!result.ok) return result;
    const readings = parseReadings(command, result.value);
    if (!readings.ok) return readings;
    return Ok(readings.value[0]);
  }

  async function pressureOf(gauge: number): Promise<Result<number, Error>> {
    const reading = await getGaugePressure(gauge);
    return reading.ok ? Ok(reading.value[0]) : reading;
  }

  return {
    initialize: () => connection.initialize(),
    close: () => connection.close(),
    query,
    write,

    get idn() {
      return query('AYT');
    },

    get identification() {
      return query('AYT').then((result): Result<GaugeIdentification, Error> => {
        if (!result.ok) return result;
        const [type, modelNo, serialNo, firmwareVersion, hardwareVersion] = ScpiParser.parseCsv(result.value);
        if (hardwareVersion === undefined) {
          return Err(new Error(`${name} AYT: malformed reply "${result.value}"`));
        }
        return Ok({ type, modelNo, serialNo, firmwareVersion, hardwareVersion });
      });
    },

    get pressureGauge1() {
      return pressureOf(1);
    },

    get pressureGauge2() {
      return pressureOf(2);
    },

    get temperature() {
      return readInteger('TMP');
    },

    async getErrorStatus(): Promise<Result<[string, string], Error>> {
      const result = await query('ERR');
      if (!result.ok) return result;
      const code = result.value;
      const status: [string, string] = [code, ERROR_STATUS[code] ?? `Unknown error ${code}`];
      return Ok(status);
    },

    getGaugePressure,

    async getPressureAll(): Promise<Result<[number, MeasurementStatus, number, MeasurementStatus], Error>> {
      const result = await query('PRX');
      if (!result.ok) return result;
      const readings = parseReadings('PRX', result.value);
      if (!readings.ok) return readings;
      if (readings.value.length !== 2) {
        return Err(new Error(`${name} PRX: expected two gauges, got ${readings.value.length}`));
      }
      const [[pressure1, status1], [pressure2, status2]] = readings.value;
      const both: [number, MeasurementStatus, number, MeasurementStatus] = [pressure1, status1, pressure2, status2];
      return Ok(both);
    },

    async getPressureUnit(): Promise<Result<string, Error>> {
      const code = await readInteger('UNI');
      if (!code.ok) return code;
      const unit = PRESSURE_UNITS[code.value];
      return unit ? Ok(unit) : Err(new Error(`${name}: unknown pressure unit ${code.value}`));
    },
  };
}

const MEASUREMENT_STATUS_TYPE = SemanticTypes.tuple('integer', 'string');
const NO_SENSOR: MeasurementStatus = statusOf(5);

export const TPG362: DriverDefinition<typeof params, TPG362Device> = {
  name: 'TPG362',
  family: 'pfeiffer-vacuum',
  description: 'Pfeiffer Vacuum TPG 362 dual gauge controller',
  params,
  exampleParams: { port: '/dev/ttyUSB0' },
  signatures: {
    idn: { kind: 'property', returns: 'string', placeholder: 'TPG362,PTG28290,44998061,010300,010100' },
    identification: {
      kind: 'property',
      returns: SemanticTypes.record({
        type: 'string',
        modelNo: 'string',
        serialNo: 'string',
        firmwareVersion: 'string',
        hardwareVersion: 'string',
      }),
      placeholder: {
        type: 'TPG362',
        modelNo: 'PTG28290',
        serialNo: '44998061',
        firmwareVersion: '010300',
        hardwareVersion: '010100',
      },
    },
    pressureGauge1: { kind: 'property', returns: 'number', placeholder: 0 },
    pressureGauge2: { kind: 'property', returns: 'number', placeholder: 0 },
    temperature: { kind: 'property', returns: 'integer', placeholder: 23 },
    getErrorStatus: {
      kind: 'method',
      returns: SemanticTypes.tuple('string', 'string'),
      placeholder: ['0000', 'No error'],
    },
    getGaugePressure: {
      kind: 'method',
      params: [{ name: 'gauge', type: 'integer' }],
      returns: SemanticTypes.tuple('number', MEASUREMENT_STATUS_TYPE),
      placeholder: [0, NO_SENSOR],
    },
    getPressureAll: {
      kind: 'method',
      returns: SemanticTypes.tuple('number', MEASUREMENT_STATUS_TYPE, 'number', MEASUREMENT_STATUS_TYPE),
      placeholder: [0, NO_SENSOR, 0, NO_SENSOR],
    },
    getPressureUnit: { kind: 'method', returns: 'string', placeholder: 'hPascal' },
  },
  transport: ({ port }) =>
    createSerialTransport({
      path: port,
      baudRate: 9600,
      writeTermination: '\r\n',
      readTermination: '\r\n',
    }),
  create: (_params, transport) => createTPG362(transport),
};

export const TPG362Dummy = synthesizeDummy(TPG362);
