/**
 * Ando Optical Spectrum Analyzer Driver
 *
 * A GPIB instrument reached through a Prologix GPIB-Ethernet adapter.
 * Wavelengths are in nm. Trace buffers are read in windows of 20 points
 * ("LDATA R1-R20"); each reply starts with the point count.
 */

import { z } from 'zod';
import type { DriverDefinition, InstrumentDevice, Transport } from '../types.js';
import type { Result } from '../../shared/types.js';
import { Ok, Err } from '../../shared/types.js';
import { ScpiParser, parsed } from '../scpi-parser.js';
import { createConnection } from '../connection.js';
import { synthesizeDummy } from '../dummy.js';
import { SemanticTypes } from '../placeholders.js';
import { createPrologixTransport, PROLOGIX_PORT } from '../transports/prologix.js';
import { host, tcpPort } from './params.js';

export const CENTER_RANGE_NM = [350, 1750] as const;
export const SPAN_RANGE_NM = [1, 1500] as const;
export const SAMPLING_RANGE = [11, 1001] as const;

/** Points per trace readout window */
const WINDOW = 20;

export type MeasurementMode = 'pulsed' | 'cw';

export interface AndoDevice extends InstrumentDevice {
  write(command: string): Promise<Result<void, Error>>;
  /** Number of sampling points per sweep */
  readonly sampling: Promise<Result<number, Error>>;
  setSampling(points: number): Promise<Result<void, Error>>;
  readonly center: Promise<Result<number, Error>>;
  setCenter(wavelength: number): Promise<Result<void, Error>>;
  /** 0 means a zero-span sweep */
  readonly span: Promise<Result<number, Error>>;
  setSpan(span: number): Promise<Result<void, Error>>;
  readonly mode: Promise<Result<MeasurementMode, Error>>;
  setMode(mode: MeasurementMode): Promise<Result<void, Error>>;
  /** Pulsed mode trigger using the pulse repetition time */
  peakHold(periodMs: number): Promise<Result<void, Error>>;
  /** Start a single sweep into the trace buffer */
  sweep(): Promise<Result<void, Error>>;
  /** Poll SWEEP? every intervalMs until the sweep has ended */
  waitSweepFinished(intervalMs: number): Promise<Result<void, Error>>;
  /** Wavelength axis of the last sweep */
  getWavelengths(): Promise<Result<number[], Error>>;
  /** Levels of the last sweep */
  getLevels(): Promise<Result<number[], Error>>;
  /** [center wavelength, bandwidth, modes] from the instrument's analysis */
  getAnalysis(): Promise<Result<[number, number, number], Error>>;
}

const params = z.object({
  /** Address of the Prologix adapter */
  host,
  gpibAddress: z.number().int().min(0).max(30).default(1),
  port: tcpPort.default(PROLOGIX_PORT),
});

const delay = (ms: number) => new Promise(r => setTimeout(r, ms));

/** Readout windows covering `points` samples: "R1-R20", "R21-R40", ... */
export function traceWindows(points: number): string[] {
  const windows: string[] = [];
  for (let first = 1; first <= points; first += WINDOW) {
    windows.push(`R${first}-R${Math.min(first + WINDOW - 1, points)}`);
  }
  return windows;
}

const inRange = (value: number, [min, max]: readonly [number, number]) => value >= min && value <= max;

export function createAndoSpectrumAnalyzer(transport: Transport): AndoDevice {
  const name = 'Ando';
  const connection = createConnection(transport, {
    name,
    identify: t => t.query('*IDN?'),
  });

  async function readNumber(command: string): Promise<Result<number, Error>> {
    const result = await connection.query(command);
    if (!result.ok) return result;
    const [first = ''] = ScpiParser.parseCsv(result.value);
    return parsed(ScpiParser.parseNumber(first), `${name} ${command}`);
  }

  async function readInteger(command: string): Promise<Result<number, Error>> {
    const result = await connection.query(command);
    if (!result.ok) return result;
    const [first = ''] = ScpiParser.parseCsv(result.value);
    return parsed(ScpiParser.parseInteger(first), `${name} ${command}`);
  }

  function rejected(message: string): Promise<Result<void, Error>> {
    return Promise.resolve(Err(new Error(`${name}: ${message}`)));
  }

  async function readTrace(command: 'WDATA' | 'LDATA'): Promise<Result<number[], Error>> {
    const points = await readInteger('SMPL?');
    if (!points.ok) return points;

    const trace: number[] = [];
    for (const window of traceWindows(points.value)) {
      const request = `${command} ${window}`;
      const result = await connection.query(request);
      if (!result.ok) return result;
      const values = parsed(ScpiParser.parseNumberList(result.value), `${name} ${request}`);
      if (!values.ok) return values;
      trace.push(...values.value.slice(1));
    }
    return Ok(trace);
  }

  return {
    initialize: () => connection.initialize(),
    close: () => connection.close(),
    query: (command: string) => connection.query(command),
    write: (command: string) => connection.write(command),

    get idn() {
      return connection.query('*IDN?');
    },

    get sampling() {
      return readInteger('SMPL?');
    },

    setSampling(points: number): Promise<Result<void, Error>> {
      if (!Number.isInteger(points) || !inRange(points, SAMPLING_RANGE)) {
        return rejected(`sampling must be an integer from ${SAMPLING_RANGE[0]} to ${SAMPLING_RANGE[1]}, got ${points}`);
      }
      return connection.write(`SMPL${points}`);
    },

    get center() {
      return readNumber('CTRWL?');
    },

    setCenter(wavelength: number): Promise<Result<void, Error>> {
      if (!inRange(wavelength, CENTER_RANGE_NM)) {
        return rejected(`center must be ${CENTER_RANGE_NM[0]}-${CENTER_RANGE_NM[1]} nm, got ${wavelength}`);
      }
      return connection.write(`CTRWL${wavelength.toFixed(2)}`);
    },

    get span() {
      return readNumber('SPAN?');
    },

    setSpan(span: number): Promise<Result<void, Error>> {
      if (span !== 0 && !inRange(span, SPAN_RANGE_NM)) {
        return rejected(`span must be 0 or ${SPAN_RANGE_NM[0]}-${SPAN_RANGE_NM[1]} nm, got ${span}`);
      }
      return connection.write(`SPAN${span.toFixed(2)}`);
    },

    get mode() {
      return readInteger('CWPLS?').then((code): Result<MeasurementMode, Error> => {
        if (!code.ok) return code;
        if (code.value !== 0 && code.value !== 1) {
          return Err(new Error(`${name} CWPLS?: unknown mode ${code.value}`));
        }
        const mode: MeasurementMode = code.value === 1 ? 'cw' : 'pulsed';
        return Ok(mode);
      });
    },

    setMode(mode: MeasurementMode): Promise<Result<void, Error>> {
      return connection.write(mode === 'cw' ? 'CLMES' : 'PLMES');
    },

    peakHold: (periodMs: number) => connection.write(`PKHLD${periodMs}`),

    sweep: () => connection.write('SGL'),

    async waitSweepFinished(intervalMs: number): Promise<Result<void, Error>> {
      for (;;) {
        const state = await readInteger('SWEEP?');
        if (!state.ok) return state;
        if (state.value === 0) break;
        await delay(intervalMs);
      }
      return Ok();
    },

    getWavelengths: () => readTrace('WDATA'),
    getLevels: () => readTrace('LDATA'),

    async getAnalysis(): Promise<Result<[number, number, number], Error>> {
      const result = await connection.query('ANA?');
      if (!result.ok) return result;
      const values = parsed(ScpiParser.parseNumberList(result.value), `${name} ANA?`);
      if (!values.ok) return values;
      if (values.value.length !== 3) {
        return Err(new Error(`${name} ANA?: no analysis data available`));
      }
      const [center, bandwidth, modes] = values.value;
      const analysis: [number, number, number] = [center, bandwidth, modes];
      return Ok(analysis);
    },
  };
}

const MODE_TYPE = SemanticTypes.oneOf('pulsed', 'cw');
const TRACE = SemanticTypes.array('number');

export const AndoSpectrumAnalyzer: DriverDefinition<typeof params, AndoDevice> = {
  name: 'AndoSpectrumAnalyzer',
  family: 'ando',
  description: 'Ando optical spectrum analyzer behind a Prologix GPIB-Ethernet adapter',
  params,
  exampleParams: { host: '10.0.0.40', gpibAddress: 1 },
  signatures: {
    idn: { kind: 'property', returns: 'string', placeholder: 'ANDO,AQ6315A,0,1.00' },
    sampling: { kind: 'property', returns: 'integer', placeholder: 1001, mirrors: 'setSampling' },
    setSampling: { kind: 'method', params: [{ name: 'points', type: 'integer' }], returns: 'void' },
    center: { kind: 'property', returns: 'number', placeholder: 390, mirrors: 'setCenter' },
    setCenter: { kind: 'method', params: [{ name: 'wavelength', type: 'number' }], returns: 'void' },
    span: { kind: 'property', returns: 'number', placeholder: 20, mirrors: 'setSpan' },
    setSpan: { kind: 'method', params: [{ name: 'span', type: 'number' }], returns: 'void' },
    mode: { kind: 'property', returns: MODE_TYPE, mirrors: 'setMode' },
    setMode: { kind: 'method', params: [{ name: 'mode', type: MODE_TYPE }], returns: 'void' },
    peakHold: { kind: 'method', params: [{ name: 'periodMs', type: 'number' }], returns: 'void' },
    sweep: { kind: 'method', returns: 'void' },
    waitSweepFinished: { kind: 'method', params: [{ name: 'intervalMs', type: 'number' }], returns: 'void' },
    getWavelengths: { kind: 'method', returns: TRACE, placeholder: [389.99, 390, 390.01] },
    getLevels: { kind: 'method', returns: TRACE, placeholder: [-60.5, -12.3, -60.5] },
    getAnalysis: {
      kind: 'method',
      returns: SemanticTypes.tuple('number', 'number', 'number'),
      placeholder: [390, 0.05, 1],
    },
  },
  transport: ({ host: address, gpibAddress, port }) => createPrologixTransport({ host: address, gpibAddress, port }),
  create: (_params, transport) => createAndoSpectrumAnalyzer(transport),
};

export const AndoSpectrumAnalyzerDummy = synthesizeDummy(AndoSpectrumAnalyzer);
