/**
 * Newport SMC100 Positioner Controller Driver
 *
 * Drives motorized translation stages over USB-serial (921600 baud, XON/XOFF,
 * CR/LF terminated). Controllers can be daisy-chained, so every command is
 * prefixed with the controller address and every reply echoes the address and
 * the two-letter command before the value: "1PA?" -> "1PA12.5".
 */

import { z } from 'zod';
import type { DriverDefinition, InstrumentDevice, Transport } from '../types.js';
import type { Result } from '../../shared/types.js';
import { Ok } from '../../shared/types.js';
import { ScpiParser, parsed } from '../scpi-parser.js';
import { createConnection } from '../connection.js';
import { synthesizeDummy } from '../dummy.js';
import { SemanticTypes } from '../placeholders.js';
import { createSerialTransport } from '../transports/serial.js';
import { serialPath } from './params.js';

/** Controller states reported by TS, in hex */
export const CONTROLLER_STATES = {
  configuration: 0x14,
  moving: 0x28,
  readyFromHoming: 0x32,
  readyFromMoving: 0x33,
  readyFromDisable: 0x34,
  readyFromJogging: 0x35,
} as const;

/** Meaning of the code returned by TE */
export const COMMAND_ERRORS: Readonly<Record<string, string>> = {
  '@': 'No error',
  A: 'Unknown message code or floating point controller address',
  B: 'Controller address not correct',
  C: 'Parameter missing or out of range',
  D: 'Execution not allowed',
  E: 'Home sequence already started',
  F: 'ESP stage name unknown',
  G: 'Displacement out of limits',
  H: 'Execution not allowed in NOT REFERENCED state',
  I: 'Execution not allowed in CONFIGURATION state',
  J: 'Execution not allowed in DISABLE state',
  K: 'Execution not allowed in READY state',
  L: 'Execution not allowed in HOMING state',
  M: 'Execution not allowed in MOVING state',
  N: 'Current position out of software limit',
  S: 'Communication Time Out',
  U: 'Error during EEPROM access',
  V: 'Error during command execution',
  W: 'Command not allowed for SMC100PP version',
  X: 'Command not allowed for CC version',
};

export interface SMC100Device extends InstrumentDevice {
  write(command: string): Promise<Result<void, Error>>;
  readonly isMoving: Promise<Result<boolean, Error>>;
  /** Current position in stage units */
  readonly position: Promise<Result<number, Error>>;
  readonly speed: Promise<Result<number, Error>>;
  readonly acceleration: Promise<Result<number, Error>>;
  /** [positioner error bits, controller state], both hex; also clears the error buffer */
  errorAndControllerStatus(): Promise<Result<[string, string], Error>>;
  /** Error code of the last rejected command (see COMMAND_ERRORS); clears it */
  getLastCommandError(): Promise<Result<string, Error>>;
  moveRelative(distance: number): Promise<Result<void, Error>>;
  moveAbsolute(position: number): Promise<Result<void, Error>>;
  home(): Promise<Result<void, Error>>;
  /** Reboot the controller; it comes back NOT REFERENCED */
  reset(): Promise<Result<void, Error>>;
  setSpeed(value: number): Promise<Result<void, Error>>;
  setAcceleration(value: number): Promise<Result<void, Error>>;
  /** Poll isMoving every intervalMs until the stage stops */
  waitMoveFinish(intervalMs: number): Promise<Result<void, Error>>;
}

const params = z.object({
  port: serialPath,
  /** Controller address; 1 unless controllers are chained */
  devNumber: z.number().int().min(1).max(31).default(1),
});

const delay = (ms: number) => new Promise(r => setTimeout(r, ms));

export function createSMC100(transport: Transport, devNumber: number): SMC100Device {
  const name = `SMC100 #${devNumber}`;
  const address = String(devNumber);

  // Drop the echoed address and command: "1TS01000A" -> "01000A"
  const answer = (response: string) => response.slice(address.length + 2);

  const connection = createConnection(transport, {
    name,
    identify: async t => {
      const result = await t.query(`${address}ID?`);
      return result.ok ? Ok(answer(result.value)) : result;
    },
  });

  async function query(command: string): Promise<Result<string, Error>> {
    const result = await connection.query(`${address}${command}`);
    return result.ok ? Ok(answer(result.value)) : result;
  }

  function write(command: string): Promise<Result<void, Error>> {
    return connection.write(`${address}${command}`);
  }

  async function readNumber(command: string): Promise<Result<number, Error>> {
    const result = await query(command);
    if (!result.ok) return result;
    return parsed(ScpiParser.parseNumber(result.value), `${name} ${command}`);
  }

  async function errorAndControllerStatus(): Promise<Result<[string, string], Error>> {
    const result = await query('TS');
    if (!result.ok) return result;
    const status: [string, string] = [result.value.slice(0, 4), result.value.slice(4, 6)];
    return Ok(status);
  }

  async function isMoving(): Promise<Result<boolean, Error>> {
    const status = await errorAndControllerStatus();
    if (!status.ok) return status;
    return Ok(parseInt(status.value[1], 16) === CONTROLLER_STATES.moving);
  }

  return {
    initialize: () => connection.initialize(),
    close: () => connection.close(),
    query,
    write,

    get idn() {
      return query('ID?');
    },

    get isMoving() {
      return isMoving();
    },

    get position() {
      return readNumber('PA?');
    },

    get speed() {
      return readNumber('VA?');
    },

    get acceleration() {
      return readNumber('AC?');
    },

    errorAndControllerStatus,

    getLastCommandError: () => query('TE'),

    moveRelative: (distance: number) => write(`PR${distance}`),
    moveAbsolute: (position: number) => write(`PA${position}`),
    home: () => write('OR'),
    reset: () => write('RS'),
    setSpeed: (value: number) => write(`VA${value}`),
    setAcceleration: (value: number) => write(`AC${value}`),

    async waitMoveFinish(intervalMs: number): Promise<Result<void, Error>> {
      for (;;) {
        const moving = await isMoving();
        if (!moving.ok) return moving;
        if (!moving.value) break;
        await delay(intervalMs);
      }
      console.log(`[${name}] Movement finished`);
      return Ok();
    },
  };
}

const number = (name: string) => ({ name, type: 'number' as const });

export const SMC100: DriverDefinition<typeof params, SMC100Device> = {
  name: 'SMC100',
  family: 'newport',
  description: 'Newport SMC100 single-axis motion controller',
  params,
  exampleParams: { port: '/dev/ttyUSB0', devNumber: 1 },
  signatures: {
    idn: { kind: 'property', returns: 'string', placeholder: 'TRA25CC_PN:B183906_UD:18114' },
    isMoving: { kind: 'property', returns: 'boolean' },
    position: { kind: 'property', returns: 'number', placeholder: 0 },
    speed: { kind: 'property', returns: 'number', placeholder: 0.4, mirrors: 'setSpeed' },
    acceleration: { kind: 'property', returns: 'number', placeholder: 1.6, mirrors: 'setAcceleration' },
    errorAndControllerStatus: {
      kind: 'method',
      returns: SemanticTypes.tuple('string', 'string'),
      placeholder: ['0100', '0A'],
    },
    getLastCommandError: { kind: 'method', returns: 'string', placeholder: '@' },
    moveRelative: { kind: 'method', params: [number('distance')], returns: 'void' },
    moveAbsolute: { kind: 'method', params: [number('position')], returns: 'void' },
    home: { kind: 'method', returns: 'void' },
    reset: { kind: 'method', returns: 'void' },
    setSpeed: { kind: 'method', params: [number('value')], returns: 'void' },
    setAcceleration: { kind: 'method', params: [number('value')], returns: 'void' },
    waitMoveFinish: { kind: 'method', params: [number('intervalMs')], returns: 'void' },
  },
  transport: ({ port }) =>
    createSerialTransport({
      path: port,
      baudRate: 921600,
      xonXoff: true,
      writeTermination: '\r\n',
      readTermination: '\r\n',
    }),
  create: ({ devNumber }, transport) => createSMC100(transport, devNumber),
};

export const SMC100Dummy = synthesizeDummy(SMC100);
