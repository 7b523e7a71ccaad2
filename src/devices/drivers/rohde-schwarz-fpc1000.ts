/**
 * Rohde & Schwarz FPC1000 Spectrum Analyzer Driver
 * LAN only. Read-only: the driver exposes no raw write.
 */

import { z } from 'zod';
import type { DriverDefinition, InstrumentDevice, Transport } from '../types.js';
import type { Result } from '../../shared/types.js';
import { Ok } from '../../shared/types.js';
import { ScpiParser, parsed } from '../scpi-parser.js';
import { createConnection } from '../connection.js';
import { synthesizeDummy } from '../dummy.js';
import { SemanticTypes } from '../placeholders.js';
import { createTcpTransport, SCPI_RAW_PORT } from '../transports/tcp.js';
import { host } from './params.js';
import { linspace } from './waveform.js';

export interface FPC1000Device extends InstrumentDevice {
  /** Displayed trace: [frequency in Hz, level in display unit] */
  getTrace(): Promise<Result<[number[], number[]], Error>>;
  /** All queued system errors; reading clears the queue */
  getSystemAlarm(): Promise<Result<string, Error>>;
}

const params = z.object({
  ip: host,
});

// The analyzer needs a moment between the trace transfer and the next query
const TRACE_PAUSE_MS = 100;

const delay = (ms: number) => new Promise(r => setTimeout(r, ms));

export function createFPC1000(transport: Transport): FPC1000Device {
  const name = 'FPC1000';
  const connection = createConnection(transport, {
    name,
    identify: t => t.query('*IDN?'),
  });

  async function readNumber(command: string): Promise<Result<number, Error>> {
    const result = await connection.query(command);
    if (!result.ok) return result;
    return parsed(ScpiParser.parseNumber(result.value), `${name} ${command}`);
  }

  return {
    initialize: () => connection.initialize(),
    close: () => connection.close(),
    query: (command: string) => connection.query(command),

    get idn() {
      return connection.query('*IDN?');
    },

    async getTrace(): Promise<Result<[number[], number[]], Error>> {
      const data = await connection.query('TRAC:DATA? TRACE1');
      if (!data.ok) return data;
      const levels = parsed(ScpiParser.parseNumberList(data.value), `${name} TRAC:DATA?`);
      if (!levels.ok) return levels;

      await delay(TRACE_PAUSE_MS);

      const start = await readNumber('FREQ:STAR?');
      if (!start.ok) return start;
      const stop = await readNumber('FREQ:STOP?');
      if (!stop.ok) return stop;

      const trace: [number[], number[]] = [linspace(start.value, stop.value, levels.value.length), levels.value];
      return Ok(trace);
    },

    getSystemAlarm: () => connection.query('SYST:ERR:ALL?'),
  };
}

export const FPC1000: DriverDefinition<typeof params, FPC1000Device> = {
  name: 'FPC1000',
  family: 'rohde-schwarz',
  description: 'Rohde & Schwarz FPC1000 spectrum analyzer',
  params,
  exampleParams: { ip: '10.0.0.90' },
  signatures: {
    idn: { kind: 'property', returns: 'string', placeholder: 'Rohde&Schwarz,FPC1000,1328.6660K02/000000,1.70' },
    getTrace: {
      kind: 'method',
      returns: SemanticTypes.tuple(SemanticTypes.array('number'), SemanticTypes.array('number')),
    },
    getSystemAlarm: { kind: 'method', returns: 'string', placeholder: "0,'No error'" },
  },
  transport: ({ ip }) => createTcpTransport({ host: ip, port: SCPI_RAW_PORT }),
  create: (_params, transport) => createFPC1000(transport),
};

export const FPC1000Dummy = synthesizeDummy(FPC1000);
