/**
 * Applied Motion Products STF03-D Stepper Drive Driver
 *
 * eSCL over UDP. The drive's IP address is set with the S1 wheel; replies
 * echo the register name before the value ("SP=1200").
 *
 * Positions are in user units once a calibration (units per motor turn) is
 * set: 360/96 for a rotation stage with a 1:96 gear, the screw lead for a
 * linear stage. Steps per turn follow the microstep resolution.
 */

import { z } from 'zod';
import type { DriverDefinition, InstrumentDevice, Transport } from '../types.js';
import type { Result } from '../../shared/types.js';
import { Ok, Err } from '../../shared/types.js';
import { ScpiParser, parsed } from '../scpi-parser.js';
import { createConnection } from '../connection.js';
import { synthesizeDummy } from '../dummy.js';
import { SemanticTypes } from '../placeholders.js';
import { createUdpTransport, ESCL_DEVICE_PORT, ESCL_HOST_PORT } from '../transports/udp.js';
import { host, tcpPort } from './params.js';

export const ALARM_CODES: ReadonlyArray<readonly [number, string]> = [
  [0x0001, 'Position Limit'],
  [0x0002, 'CCW Limit'],
  [0x0004, 'CW Limit'],
  [0x0008, 'Over Temp'],
  [0x0010, 'Internal Voltage'],
  [0x0020, 'Over Voltage'],
  [0x0040, 'Under Voltage'],
  [0x0080, 'Over Current'],
  [0x0100, 'Open Motor Winding'],
  [0x0200, 'Bad Encoder'],
  [0x0400, 'Comm Error'],
  [0x0800, 'Bad Flash'],
  [0x1000, 'No Move'],
  [0x4000, 'Blank Q Segment'],
];

export const STATUS_CODES: ReadonlyArray<readonly [number, string]> = [
  [0x0001, 'Motor enabled'],
  [0x0002, 'Sampling'],
  [0x0004, 'Drive fault'],
  [0x0008, 'In position'],
  [0x0010, 'Moving'],
  [0x0020, 'Jogging'],
  [0x0040, 'Stopping'],
  [0x0080, 'Waiting for input'],
  [0x0100, 'Saving'],
  [0x0200, 'Alarm present'],
  [0x0400, 'Homing'],
  [0x0800, 'Waiting for time'],
  [0x1000, 'Wizard running'],
  [0x2000, 'Checking encoder'],
  [0x4000, 'Q program running'],
  [0x8000, 'Initializing'],
];

const MOVING = 0x0010;

/** Full-turn step count for each microstep resolution setting (MR) */
export const STEPS_PER_TURN: Readonly<Record<number, number>> = {
  0: 200, 1: 400, 3: 2000, 4: 5000, 5: 10000, 6: 12800, 7: 18000, 8: 20000,
  9: 21600, 10: 25000, 11: 25400, 12: 25600, 13: 36000, 14: 50000, 15: 50800,
};

export interface STF03DDevice extends InstrumentDevice {
  write(command: string): Promise<Result<void, Error>>;
  /** Active alarms, or ['No alarms'] */
  readonly alarm: Promise<Result<string[], Error>>;
  /** Status flags, or ['Motor disabled'] */
  readonly status: Promise<Result<string[], Error>>;
  readonly isMoving: Promise<Result<boolean, Error>>;
  readonly microstep: Promise<Result<number, Error>>;
  setMicrostep(resolution: number): Promise<Result<void, Error>>;
  /** Units (degrees, mm, ...) per motor turn; needed for positions and moves */
  setCalibration(unitsPerMotorTurn: number): Promise<Result<void, Error>>;
  /** Position in calibrated units */
  readonly position: Promise<Result<number, Error>>;
  /** Make the current position zero */
  resetPosition(): Promise<Result<void, Error>>;
  /** Calculated trajectory position in steps */
  readonly immediatePosition: Promise<Result<number, Error>>;
  /** Amps */
  readonly maxCurrent: Promise<Result<number, Error>>;
  readonly idleCurrent: Promise<Result<number, Error>>;
  readonly changeCurrent: Promise<Result<number, Error>>;
  setMaxCurrent(amps: number): Promise<Result<void, Error>>;
  setIdleCurrent(amps: number): Promise<Result<void, Error>>;
  setChangeCurrent(amps: number): Promise<Result<void, Error>>;
  /** rps/s */
  readonly acceleration: Promise<Result<number, Error>>;
  readonly deceleration: Promise<Result<number, Error>>;
  /** rps */
  readonly speed: Promise<Result<number, Error>>;
  setAcceleration(value: number): Promise<Result<void, Error>>;
  setDeceleration(value: number): Promise<Result<void, Error>>;
  setSpeed(value: number): Promise<Result<void, Error>>;
  moveRelative(distance: number): Promise<Result<void, Error>>;
  moveAbsolute(position: number): Promise<Result<void, Error>>;
}

const params = z.object({
  host,
  port: tcpPort.default(ESCL_DEVICE_PORT),
  localAddress: z.string().trim().min(1).default('0.0.0.0'),
  localPort: tcpPort.default(ESCL_HOST_PORT),
  unitsPerMotorTurn: z.number().positive().optional(),
});

/** Names of the set bits in a 16-bit code, or `none` when it is zero */
export function decodeFlags(code: number, table: ReadonlyArray<readonly [number, string]>, none: string): string[] {
  if (code === 0) return [none];
  return table.filter(([bit]) => (code & bit) !== 0).map(([, label]) => label);
}

function parseHex(text: string, context: string): Result<number, Error> {
  return /^[0-9A-F]+$/i.test(text)
    ? Ok(parseInt(text, 16))
    : Err(new Error(`${context}: not a hex value: "${text}"`));
}

export function createSTF03D(transport: Transport, unitsPerMotorTurn?: number): STF03DDevice {
  const name = 'STF03D';
  let calibration = unitsPerMotorTurn;

  const connection = createConnection(transport, {
    name,
    settleMs: 0,
    identify: t => t.query('MV'),
  });

  /** Value of a register query: "AC" -> "AC=1.000" -> "1.000" */
  async function register(code: string): Promise<Result<string, Error>> {
    const result = await connection.query(code);
    if (!result.ok) return result;
    const prefix = `${code}=`;
    if (!result.value.startsWith(prefix)) {
      return Err(new Error(`${name} ${code}: unexpected reply "${result.value}"`));
    }
    return Ok(result.value.slice(prefix.length));
  }

  async function readNumber(code: string): Promise<Result<number, Error>> {
    const value = await register(code);
    if (!value.ok) return value;
    return parsed(ScpiParser.parseNumber(value.value), `${name} ${code}`);
  }

  async function readInteger(code: string): Promise<Result<number, Error>> {
    const value = await register(code);
    if (!value.ok) return value;
    return parsed(ScpiParser.parseInteger(value.value), `${name} ${code}`);
  }

  async function readCode(code: string): Promise<Result<number, Error>> {
    const value = await register(code);
    if (!value.ok) return value;
    return parseHex(value.value, `${name} ${code}`);
  }

  async function stepsPerUnit(): Promise<Result<number, Error>> {
    if (calibration === undefined) {
      return Err(new Error(`${name}: set the calibration before using positions`));
    }
    const resolution = await readInteger('MR');
    if (!resolution.ok) return resolution;
    const steps = STEPS_PER_TURN[resolution.value];
    if (steps === undefined) {
      return Err(new Error(`${name}: unknown microstep resolution ${resolution.value}`));
    }
    return Ok(steps / calibration);
  }

  async function move(value: number, start: 'FL' | 'FP', verb: string): Promise<Result<void, Error>> {
    const ratio = await stepsPerUnit();
    if (!ratio.ok) return ratio;
    const steps = Math.round(value * ratio.value);
    console.log(`[${name}] Move ${verb} ${value}, equivalent to ${steps} steps`);

    const distance = await connection.write(`DI${steps}`);
    if (!distance.ok) return distance;
    return connection.write(start);
  }

  return {
    initialize: () => connection.initialize(),
    close: () => connection.close(),
    query: (command: string) => connection.query(command),
    write: (command: string) => connection.write(command),

    get idn() {
      return register('MV');
    },

    get alarm() {
      return readCode('AL').then(code =>
        code.ok ? Ok(decodeFlags(code.value, ALARM_CODES, 'No alarms')) : code
      );
    },

    get status() {
      return readCode('SC').then(code =>
        code.ok ? Ok(decodeFlags(code.value, STATUS_CODES, 'Motor disabled')) : code
      );
    },

    get isMoving() {
      return readCode('SC').then(code => (code.ok ? Ok((code.value & MOVING) !== 0) : code));
    },

    get microstep() {
      return readInteger('MR');
    },

    async setMicrostep(resolution: number): Promise<Result<void, Error>> {
      if (STEPS_PER_TURN[resolution] === undefined) {
        const allowed = Object.keys(STEPS_PER_TURN).join(', ');
        return Err(new Error(`${name}: microstep resolution must be one of ${allowed}, got ${resolution}`));
      }
      return connection.write(`MR${resolution}`);
    },

    async setCalibration(units: number): Promise<Result<void, Error>> {
      if (!(units > 0)) {
        return Err(new Error(`${name}: units per motor turn must be positive, got ${units}`));
      }
      calibration = units;
      return Ok();
    },

    get position() {
      return (async (): Promise<Result<number, Error>> => {
        const ratio = await stepsPerUnit();
        if (!ratio.ok) return ratio;
        const steps = await readInteger('SP');
        if (!steps.ok) return steps;
        return Ok(steps.value / ratio.value);
      })();
    },

    resetPosition: () => connection.write('SP0'),

    get immediatePosition() {
      // 32-bit two's complement
      return readCode('IP').then(code => (code.ok ? Ok(code.value | 0) : code));
    },

    get maxCurrent() {
      return readNumber('MC');
    },

    get idleCurrent() {
      return readNumber('CI');
    },

    get changeCurrent() {
      return readNumber('CC');
    },

    setMaxCurrent: (amps: number) => connection.write(`MC${amps}`),
    setIdleCurrent: (amps: number) => connection.write(`CI${amps}`),
    setChangeCurrent: (amps: number) => connection.write(`CC${amps}`),

    get acceleration() {
      return readNumber('AC');
    },

    get deceleration() {
      return readNumber('DE');
    },

    get speed() {
      return readNumber('VE');
    },

    setAcceleration: (value: number) => connection.write(`AC${value}`),
    setDeceleration: (value: number) => connection.write(`DE${value}`),
    setSpeed: (value: number) => connection.write(`VE${value}`),

    moveRelative: (distance: number) => move(distance, 'FL', 'by'),
    moveAbsolute: (position: number) => move(position, 'FP', 'to'),
  };
}

const number = (name: string) => ({ name, type: 'number' as const });
const FLAGS = SemanticTypes.array('string');

export const STF03D: DriverDefinition<typeof params, STF03DDevice> = {
  name: 'STF03D',
  family: 'applied-motion',
  description: 'Applied Motion Products STF03-D stepper drive (eSCL over UDP)',
  params,
  exampleParams: { host: '10.0.0.51', unitsPerMotorTurn: 3.75 },
  signatures: {
    idn: { kind: 'property', returns: 'string', placeholder: '100F024' },
    alarm: { kind: 'property', returns: FLAGS, placeholder: ['No alarms'] },
    status: { kind: 'property', returns: FLAGS, placeholder: ['Motor enabled', 'In position'] },
    isMoving: { kind: 'property', returns: 'boolean' },
    microstep: { kind: 'property', returns: 'integer', placeholder: 3, mirrors: 'setMicrostep' },
    setMicrostep: { kind: 'method', params: [{ name: 'resolution', type: 'integer' }], returns: 'void' },
    setCalibration: { kind: 'method', params: [number('unitsPerMotorTurn')], returns: 'void' },
    position: { kind: 'property', returns: 'number', placeholder: 0 },
    resetPosition: { kind: 'method', returns: 'void' },
    immediatePosition: { kind: 'property', returns: 'integer', placeholder: 0 },
    maxCurrent: { kind: 'property', returns: 'number', placeholder: 3, mirrors: 'setMaxCurrent' },
    idleCurrent: { kind: 'property', returns: 'number', placeholder: 0.5, mirrors: 'setIdleCurrent' },
    changeCurrent: { kind: 'property', returns: 'number', placeholder: 3, mirrors: 'setChangeCurrent' },
    setMaxCurrent: { kind: 'method', params: [number('amps')], returns: 'void' },
    setIdleCurrent: { kind: 'method', params: [number('amps')], returns: 'void' },
    setChangeCurrent: { kind: 'method', params: [number('amps')], returns: 'void' },
    acceleration: { kind: 'property', returns: 'number', placeholder: 1, mirrors: 'setAcceleration' },
    deceleration: { kind: 'property', returns: 'number', placeholder: 1, mirrors: 'setDeceleration' },
    speed: { kind: 'property', returns: 'number', placeholder: 2, mirrors: 'setSpeed' },
    setAcceleration: { kind: 'method', params: [number('value')], returns: 'void' },
    setDeceleration: { kind: 'method', params: [number('value')], returns: 'void' },
    setSpeed: { kind: 'method', params: [number('value')], returns: 'void' },
    moveRelative: { kind: 'method', params: [number('distance')], returns: 'void' },
    moveAbsolute: { kind: 'method', params: [number('position')], returns: 'void' },
  },
  transport: ({ host: address, port, localAddress, localPort }) =>
    createUdpTransport({ host: address, port, localAddress, localPort }),
  create: ({ unitsPerMotorTurn }, transport) => createSTF03D(transport, unitsPerMotorTurn),
};

export const STF03DDummy = synthesizeDummy(STF03D);
