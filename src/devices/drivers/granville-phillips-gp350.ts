/**
 * Granville-Phillips Series 350 UHV Gauge Controller Driver
 *
 * RS-232 at 300 baud, 7 data bits, 2 stop bits, CR/LF terminated.
 * Commands are plain mnemonics from the Series 350 instruction manual.
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

export const MODEL_STRING = 'Granville-Phillips Series 350 UHV Gauge Controller';

export type CommandReply = 'OK' | 'INVALID';

export interface GP350Device extends InstrumentDevice {
  write(command: string): Promise<Result<void, Error>>;
  /** Ion gauge pressure in the controller's display unit */
  getPressure(): Promise<Result<number, Error>>;
  degasStatus(): Promise<Result<boolean, Error>>;
  degas(on: boolean): Promise<Result<CommandReply, Error>>;
  /** Switch ion gauge filament 1 or 2 */
  filament(which: number, on: boolean): Promise<Result<CommandReply, Error>>;
}

const params = z.object({
  port: serialPath,
});

const onOff = (on: boolean) => (on ? 'ON' : 'OFF');

export function createGP350(transport: Transport): GP350Device {
  const name = 'GP350';
  const connection = createConnection(transport, { name });

  async function command(cmd: string): Promise<Result<CommandReply, Error>> {
    const result = await connection.query(cmd);
    if (!result.ok) return result;
    return parsed(ScpiParser.parseEnum<CommandReply>(result.value, { OK: 'OK', INVALID: 'INVALID' }), `${name} ${cmd}`);
  }

  return {
    initialize: () => connection.initialize(),
    close: () => connection.close(),
    query: (cmd: string) => connection.query(cmd),
    write: (cmd: string) => connection.write(cmd),

    get idn() {
      return Promise.resolve(Ok(MODEL_STRING));
    },

    async getPressure(): Promise<Result<number, Error>> {
      const result = await connection.query('DS IG');
      if (!result.ok) return result;
      return parsed(ScpiParser.parseNumber(result.value), `${name} DS IG`);
    },

    async degasStatus(): Promise<Result<boolean, Error>> {
      const result = await connection.query('DGS');
      if (!result.ok) return result;
      return Ok(ScpiParser.parseBool(result.value));
    },

    degas: (on: boolean) => command(`DG ${onOff(on)}`),

    filament(which: number, on: boolean): Promise<Result<CommandReply, Error>> {
      if (which !== 1 && which !== 2) {
        return Promise.resolve(Err(new Error(`${name}: filament must be 1 or 2, got ${which}`)));
      }
      return command(`IG${which} ${onOff(on)}`);
    },
  };
}

const REPLY_TYPE = SemanticTypes.oneOf('OK', 'INVALID');

export const GP350: DriverDefinition<typeof params, GP350Device> = {
  name: 'GP350',
  family: 'granville-phillips',
  description: 'Granville-Phillips Series 350 UHV gauge controller',
  params,
  exampleParams: { port: '/dev/ttyUSB0' },
  signatures: {
    idn: { kind: 'property', returns: 'string', placeholder: MODEL_STRING },
    getPressure: { kind: 'method', returns: 'number', placeholder: 1.2e-9 },
    degasStatus: { kind: 'method', returns: 'boolean' },
    degas: { kind: 'method', params: [{ name: 'on', type: 'boolean' }], returns: REPLY_TYPE },
    filament: {
      kind: 'method',
      params: [{ name: 'which', type: 'integer' }, { name: 'on', type: 'boolean' }],
      returns: REPLY_TYPE,
    },
  },
  transport: ({ port }) =>
    createSerialTransport({
      path: port,
      baudRate: 300,
      dataBits: 7,
      stopBits: 2,
      writeTermination: '\r\n',
      readTermination: '\r\n',
    }),
  create: (_params, transport) => createGP350(transport),
};

export const GP350Dummy = synthesizeDummy(GP350);
