/**
 * Stanford Research Systems DG645 Digital Delay Generator Driver
 *
 * Raw socket on the LAN port. Commands end in LF, replies in CR/LF.
 * Channels are addressed by number; the names below follow the front panel.
 */

import { z } from 'zod';
import type { DriverDefinition, InstrumentDevice, Transport } from '../types.js';
import type { Result } from '../../shared/types.js';
import { Ok, Err } from '../../shared/types.js';
import { ScpiParser, parsed } from '../scpi-parser.js';
import { createConnection } from '../connection.js';
import { synthesizeDummy } from '../dummy.js';
import { SemanticTypes } from '../placeholders.js';
import { createTcpTransport, SCPI_RAW_PORT } from '../transports/tcp.js';
import { host, tcpPort } from './params.js';

export const DELAY_CHANNELS = {
  T0: 0, T1: 1, A: 2, B: 3, C: 4, D: 5, E: 6, F: 7, G: 8, H: 9,
} as const;

export const OUTPUTS = {
  T0: 0, AB: 1, CD: 2, EF: 3, GH: 4,
} as const;

export type DelayChannel = keyof typeof DELAY_CHANNELS;
export type Output = keyof typeof OUTPUTS;

export interface DG645Device extends InstrumentDevice {
  write(command: string): Promise<Result<void, Error>>;
  /** Set `channel` to fire `delay` seconds after `reference` */
  setDelay(channel: DelayChannel | number, delay: number, reference?: DelayChannel | number): Promise<Result<void, Error>>;
  /** [reference channel number, delay in seconds] */
  getDelay(channel: DelayChannel | number): Promise<Result<[number, number], Error>>;
  /** Output amplitude in volts */
  getOutputLevel(output: Output | number): Promise<Result<number, Error>>;
}

const params = z.object({
  host,
  port: tcpPort.default(SCPI_RAW_PORT),
});

/** Time the instrument needs to apply a delay setting */
const SETTLE_AFTER_SET_MS = 100;

const delay = (ms: number) => new Promise(r => setTimeout(r, ms));

function resolveIndex(
  table: Readonly<Record<string, number>>,
  key: string | number,
  what: string
): Result<number, Error> {
  if (typeof key === 'number') {
    const max = Math.max(...Object.values(table));
    return Number.isInteger(key) && key >= 0 && key <= max
      ? Ok(key)
      : Err(new Error(`DG645: ${what} ${key} out of range 0-${max}`));
  }
  return Object.prototype.hasOwnProperty.call(table, key)
    ? Ok(table[key])
    : Err(new Error(`DG645: unknown ${what} ${key}`));
}

export function createDG645(transport: Transport): DG645Device {
  const name = 'DG645';
  const connection = createConnection(transport, {
    name,
    settleMs: 200,
    identify: t => t.query('*IDN?'),
  });

  return {
    initialize: () => connection.initialize(),
    close: () => connection.close(),
    query: (command: string) => connection.query(command),
    write: (command: string) => connection.write(command),

    get idn() {
      return connection.query('*IDN?');
    },

    async setDelay(
      channel: DelayChannel | number,
      delaySeconds: number,
      reference: DelayChannel | number = 'T0'
    ): Promise<Result<void, Error>> {
      const target = resolveIndex(DELAY_CHANNELS, channel, 'channel');
      if (!target.ok) return target;
      const ref = resolveIndex(DELAY_CHANNELS, reference, 'channel');
      if (!ref.ok) return ref;

      const result = await connection.write(`DLAY ${target.value},${ref.value},${delaySeconds}`);
      if (!result.ok) return result;
      await delay(SETTLE_AFTER_SET_MS);
      return Ok();
    },

    async getDelay(channel: DelayChannel | number): Promise<Result<[number, number], Error>> {
      const target = resolveIndex(DELAY_CHANNELS, channel, 'channel');
      if (!target.ok) return target;

      const command = `DLAY? ${target.value}`;
      const result = await connection.query(command);
      if (!result.ok) return result;

      const [refText, delayText = ''] = ScpiParser.parseCsv(result.value);
      const ref = parsed(ScpiParser.parseInteger(refText), `${name} ${command} reference`);
      if (!ref.ok) return ref;
      const seconds = parsed(ScpiParser.parseNumber(delayText), `${name} ${command} delay`);
      if (!seconds.ok) return seconds;
      const reply: [number, number] = [ref.value, seconds.value];
      return Ok(reply);
    },

    async getOutputLevel(output: Output | number): Promise<Result<number, Error>> {
      const target = resolveIndex(OUTPUTS, output, 'output');
      if (!target.ok) return target;

      const command = `LAMP? ${target.value}`;
      const result = await connection.query(command);
      if (!result.ok) return result;
      return parsed(ScpiParser.parseNumber(result.value), `${name} ${command}`);
    },
  };
}

const CHANNEL_TYPE = SemanticTypes.oneOf('T0', 'T1', 'A', 'B', 'C', 'D', 'E', 'F', 'G', 'H');
const OUTPUT_TYPE = SemanticTypes.oneOf('T0', 'AB', 'CD', 'EF', 'GH');

export const DG645: DriverDefinition<typeof params, DG645Device> = {
  name: 'DG645',
  family: 'stanford-research-systems',
  description: 'Stanford Research Systems DG645 digital delay generator',
  params,
  exampleParams: { host: '10.0.0.34', port: SCPI_RAW_PORT },
  signatures: {
    idn: { kind: 'property', returns: 'string', placeholder: 'Stanford Research Systems,DG645,s/n000000,ver1.00' },
    setDelay: {
      kind: 'method',
      params: [
        { name: 'channel', type: CHANNEL_TYPE },
        { name: 'delay', type: 'number' },
        { name: 'reference', type: CHANNEL_TYPE, optional: true },
      ],
      returns: 'void',
    },
    getDelay: {
      kind: 'method',
      params: [{ name: 'channel', type: CHANNEL_TYPE }],
      returns: SemanticTypes.tuple('integer', 'number'),
      placeholder: [2, 0.001],
    },
    getOutputLevel: {
      kind: 'method',
      params: [{ name: 'output', type: OUTPUT_TYPE }],
      returns: 'number',
      placeholder: 0.5,
    },
  },
  transport: ({ host: address, port }) =>
    createTcpTransport({ host: address, port, writeTermination: '\n', readTermination: '\r\n' }),
  create: (_params, transport) => createDG645(transport),
};

export const DG645Dummy = synthesizeDummy(DG645);
