/**
 * Rohde & Schwarz RTB2000 Oscilloscope Driver
 *
 * LAN (raw socket) or USB-TMC. Replies over USB can carry trailing NUL
 * padding, which is stripped before parsing. Measurements use the first
 * screen measurement slot.
 */

import { z } from 'zod';
import type { DriverDefinition, InstrumentDevice, Transport } from '../types.js';
import type { Result } from '../../shared/types.js';
import { Ok, Err } from '../../shared/types.js';
import { ScpiParser, parsed } from '../scpi-parser.js';
import { createConnection } from '../connection.js';
import { synthesizeDummy } from '../dummy.js';
import { SemanticTypes } from '../placeholders.js';
import { transportForAddress } from '../transports/visa-address.js';
import { resourceAddress } from './params.js';
import { PNG_SIGNATURE, linspace } from './waveform.js';

/** Axis information of a waveform, from CHANnel<n>:DATA:HEADer? */
export interface Preamble {
  /** seconds */
  xStart: number;
  /** seconds */
  xStop: number;
  /** waveform length in samples */
  points: number;
  /** usually 1 */
  valuesPerSample: number;
}

export interface RTB2000Device extends InstrumentDevice {
  write(command: string): Promise<Result<void, Error>>;
  getVoltageAverage(channel: number): Promise<Result<number, Error>>;
  getVoltageMax(channel: number): Promise<Result<number, Error>>;
  getVoltagePeakToPeak(channel: number): Promise<Result<number, Error>>;
  /** Single acquisition; [time in s, voltage in V] */
  getTrace(channel: number): Promise<Result<[number[], number[]], Error>>;
  getPreamble(channel: number): Promise<Result<Preamble, Error>>;
  /** PNG image of the display */
  getScreenshot(): Promise<Result<Buffer, Error>>;
  /** Horizontal scale in seconds per division */
  setTimeScale(seconds: number): Promise<Result<void, Error>>;
}

const params = z.object({
  address: resourceAddress('tcp', 'usb'),
});

export function parsePreamble(response: string): Result<Preamble, string> {
  const values = ScpiParser.parseNumberList(response);
  if (!values.ok) return values;
  if (values.value.length !== 4) {
    return Err(`expected 4 header fields, got ${values.value.length}`);
  }
  const [xStart, xStop, points, valuesPerSample] = values.value;
  if (!Number.isInteger(points) || !Number.isInteger(valuesPerSample)) {
    return Err(`sample counts must be integers: "${response.trim()}"`);
  }
  return Ok({ xStart, xStop, points, valuesPerSample });
}

export function createRTB2000(transport: Transport): RTB2000Device {
  const name = 'RTB2000';
  const connection = createConnection(transport, {
    name,
    identify: t => t.query('*IDN?'),
  });

  async function query(command: string): Promise<Result<string, Error>> {
    const result = await connection.query(command);
    return result.ok ? Ok(result.value.replace(/\0+$/, '').trim()) : result;
  }

  async function measure(channel: number, kind: string): Promise<Result<number, Error>> {
    const setup = await connection.write(`MEASurement:SOURce CH${channel}; MEASurement:MAIN ${kind}`);
    if (!setup.ok) return setup;
    const result = await query('MEASurement:RESult?');
    if (!result.ok) return result;
    return parsed(ScpiParser.parseNumber(result.value), `${name} ${kind} CH${channel}`);
  }

  async function getPreamble(channel: number): Promise<Result<Preamble, Error>> {
    const command = `CHANnel${channel}:DATA:HEADer?`;
    const result = await query(command);
    if (!result.ok) return result;
    return parsed(parsePreamble(result.value), `${name} ${command}`);
  }

  return {
    initialize: () => connection.initialize(),
    close: () => connection.close(),
    query,
    write: (command: string) => connection.write(command),

    get idn() {
      return query('*IDN?');
    },

    getVoltageAverage: (channel: number) => measure(channel, 'MEAN'),
    getVoltageMax: (channel: number) => measure(channel, 'UPEakvalue'),
    getVoltagePeakToPeak: (channel: number) => measure(channel, 'PEAK'),

    async getTrace(channel: number): Promise<Result<[number[], number[]], Error>> {
      const single = await connection.write(`CHANnel${channel}:SINGle`);
      if (!single.ok) return single;

      const command = `FORMat ASC; CHANnel${channel}:DATA?`;
      const data = await query(command);
      if (!data.ok) return data;
      const voltage = parsed(ScpiParser.parseNumberList(data.value), `${name} ${command}`);
      if (!voltage.ok) return voltage;

      const preamble = await getPreamble(channel);
      if (!preamble.ok) return preamble;

      const { xStart, xStop, points } = preamble.value;
      const trace: [number[], number[]] = [linspace(xStart, xStop, points), voltage.value];
      return Ok(trace);
    },

    getPreamble,

    async getScreenshot(): Promise<Result<Buffer, Error>> {
      const language = await connection.write('HCOPy:LANG PNG');
      if (!language.ok) return language;
      const result = await connection.queryBinary('HCOPy:DATA?');
      if (!result.ok) return result;
      return parsed(ScpiParser.parseDefiniteLengthBlock(result.value), `${name} HCOPy:DATA?`);
    },

    setTimeScale: (seconds: number) => connection.write(`:TIMebase:SCALe ${seconds}`),
  };
}

const channel = [{ name: 'channel', type: 'integer' as const }];

export const RTB2000: DriverDefinition<typeof params, RTB2000Device> = {
  name: 'RTB2000',
  family: 'rohde-schwarz',
  description: 'Rohde & Schwarz RTB2000 oscilloscope',
  params,
  exampleParams: { address: '10.0.0.91' },
  signatures: {
    idn: { kind: 'property', returns: 'string', placeholder: 'Rohde&Schwarz,RTB2004,1333.1005k04/000000,02.300' },
    getVoltageAverage: { kind: 'method', params: channel, returns: 'number', placeholder: 0.1 },
    getVoltageMax: { kind: 'method', params: channel, returns: 'number', placeholder: 0.1 },
    getVoltagePeakToPeak: { kind: 'method', params: channel, returns: 'number', placeholder: 0.1 },
    getTrace: {
      kind: 'method',
      params: channel,
      returns: SemanticTypes.tuple(SemanticTypes.array('number'), SemanticTypes.array('number')),
    },
    getPreamble: {
      kind: 'method',
      params: channel,
      returns: SemanticTypes.record({
        xStart: 'number',
        xStop: 'number',
        points: 'integer',
        valuesPerSample: 'integer',
      }),
      placeholder: { xStart: -3e-8, xStop: 2.995e-8, points: 1200, valuesPerSample: 1 },
    },
    getScreenshot: { kind: 'method', returns: 'bytes', placeholder: PNG_SIGNATURE },
    setTimeScale: { kind: 'method', params: [{ name: 'seconds', type: 'number' }], returns: 'void' },
  },
  transport: ({ address }) => transportForAddress(address),
  create: (_params, transport) => createRTB2000(transport),
};

export const RTB2000Dummy = synthesizeDummy(RTB2000);
