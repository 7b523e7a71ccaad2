/**
 * Keysight InfiniiVision Oscilloscope Driver
 * Tested against the 3000T X-Series (DSOX3034T)
 *
 * Reached over LAN (raw socket) or USB-TMC, chosen by the resource address.
 * Waveforms are transferred as unsigned bytes and scaled with the preamble.
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
import { PNG_SIGNATURE } from './waveform.js';

/** Scaling fields of :WAVeform:PREamble? */
export interface WaveformPreamble {
  points: number;
  xIncrement: number;
  xOrigin: number;
  xReference: number;
  yIncrement: number;
  yOrigin: number;
  yReference: number;
}

export interface KeysightOscilloscopeDevice extends InstrumentDevice {
  write(command: string): Promise<Result<void, Error>>;
  /** Horizontal scale in seconds per division */
  setTimeScale(seconds: number): Promise<Result<void, Error>>;
  getVoltageAverage(channel: number): Promise<Result<number, Error>>;
  getVoltageMax(channel: number): Promise<Result<number, Error>>;
  getPeakToPeak(channel: number): Promise<Result<number, Error>>;
  /** [time in s, voltage in V] of the displayed waveform */
  getTrace(channel: number): Promise<Result<[number[], number[]], Error>>;
  /** PNG image of the display */
  getScreenshot(): Promise<Result<Buffer, Error>>;
}

const params = z.object({
  address: resourceAddress('tcp', 'usb'),
});

/**
 * Parse the ten-field preamble:
 * format, type, points, count, xincrement, xorigin, xreference, yincrement, yorigin, yreference
 */
export function parseWaveformPreamble(response: string): Result<WaveformPreamble, string> {
  const fields = ScpiParser.parseCsv(response);
  if (fields.length !== 10) {
    return Err(`expected 10 preamble fields, got ${fields.length}`);
  }
  const values = ScpiParser.parseNumberList(response);
  if (!values.ok) return values;
  const [, , points, , xIncrement, xOrigin, xReference, yIncrement, yOrigin, yReference] = values.value;
  return Ok({ points, xIncrement, xOrigin, xReference, yIncrement, yOrigin, yReference });
}

export function createKeysightOscilloscope(transport: Transport): KeysightOscilloscopeDevice {
  const name = 'KeysightOscilloscope';
  const connection = createConnection(transport, {
    name,
    identify: t => t.query('*IDN?'),
  });

  async function measure(channel: number, command: string): Promise<Result<number, Error>> {
    const source = await connection.write(`:MEASure:SOURce CHANnel${channel}`);
    if (!source.ok) return source;
    const result = await connection.query(command);
    if (!result.ok) return result;
    return parsed(ScpiParser.parseNumber(result.value), `${name} ${command}`);
  }

  async function readBlock(command: string): Promise<Result<Buffer, Error>> {
    const result = await connection.queryBinary(command);
    if (!result.ok) return result;
    return parsed(ScpiParser.parseDefiniteLengthBlock(result.value), `${name} ${command}`);
  }

  async function writeAll(commands: string[]): Promise<Result<void, Error>> {
    for (const command of commands) {
      const result = await connection.write(command);
      if (!result.ok) return result;
    }
    return Ok();
  }

  return {
    initialize: () => connection.initialize(),
    close: () => connection.close(),
    query: (command: string) => connection.query(command),
    write: (command: string) => connection.write(command),

    get idn() {
      return connection.query('*IDN?');
    },

    setTimeScale: (seconds: number) => connection.write(`:TIMebase:SCALe ${seconds}`),

    getVoltageAverage: (channel: number) => measure(channel, ':MEASure:VAVerage?'),
    getVoltageMax: (channel: number) => measure(channel, ':MEASure:VMAX?'),
    getPeakToPeak: (channel: number) => measure(channel, ':MEASure:VPP?'),

    async getTrace(channel: number): Promise<Result<[number[], number[]], Error>> {
      const setup = await writeAll([
        ':ACQuire:TYPE NORMal',
        `:WAVeform:SOURce CHANnel${channel}`,
        ':WAVeform:POINts:MODE NORMal',
        ':WAVeform:FORMat BYTE',
      ]);
      if (!setup.ok) return setup;

      const timeScale = await connection.query(':TIMebase:SCALe?');
      if (!timeScale.ok) return timeScale;

      const preambleResult = await connection.query(':WAVeform:PREamble?');
      if (!preambleResult.ok) return preambleResult;
      const preamble = parsed(parseWaveformPreamble(preambleResult.value), `${name} preamble`);
      if (!preamble.ok) return preamble;

      const data = await readBlock(':WAVeform:DATA?');
      if (!data.ok) return data;

      const { xIncrement, xOrigin, yIncrement, yOrigin, yReference } = preamble.value;
      const voltage = Array.from(data.value, raw => (raw - yReference) * yIncrement + yOrigin);
      const time = voltage.map((_, i) => xOrigin + i * xIncrement);

      // Put the time base back the way the user had it
      const restore = await connection.write(`:TIMebase:SCALe ${timeScale.value}`);
      if (!restore.ok) return restore;

      const trace: [number[], number[]] = [time, voltage];
      return Ok(trace);
    },

    async getScreenshot(): Promise<Result<Buffer, Error>> {
      const inkSaver = await connection.write(':HARDcopy:INKSaver OFF');
      if (!inkSaver.ok) return inkSaver;
      return readBlock(':DISPlay:DATA? PNG, COLor');
    },
  };
}

const channel = [{ name: 'channel', type: 'integer' as const }];

export const KeysightOscilloscope: DriverDefinition<typeof params, KeysightOscilloscopeDevice> = {
  name: 'KeysightOscilloscope',
  family: 'keysight',
  description: 'Keysight InfiniiVision oscilloscope',
  params,
  exampleParams: { address: 'USB0::0x2A8D::0x1760::MY55280218::0::INSTR' },
  signatures: {
    idn: { kind: 'property', returns: 'string', placeholder: 'KEYSIGHT TECHNOLOGIES,DSO-X 3034T,MY55280218,07.20.2019051434' },
    setTimeScale: { kind: 'method', params: [{ name: 'seconds', type: 'number' }], returns: 'void' },
    getVoltageAverage: { kind: 'method', params: channel, returns: 'number', placeholder: 0.1 },
    getVoltageMax: { kind: 'method', params: channel, returns: 'number', placeholder: 0.1 },
    getPeakToPeak: { kind: 'method', params: channel, returns: 'number', placeholder: 0.1 },
    getTrace: {
      kind: 'method',
      params: channel,
      returns: SemanticTypes.tuple(SemanticTypes.array('number'), SemanticTypes.array('number')),
    },
    getScreenshot: { kind: 'method', returns: 'bytes', placeholder: PNG_SIGNATURE },
  },
  transport: ({ address }) => transportForAddress(address),
  create: (_params, transport) => createKeysightOscilloscope(transport),
};

export const KeysightOscilloscopeDummy = synthesizeDummy(KeysightOscilloscope);
