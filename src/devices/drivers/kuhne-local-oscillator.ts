/**
 * Kuhne Electronic MKU LO 8-13 PLL Local Oscillator Driver
 *
 * USB-serial at 115200 baud. Commands carry no terminator and every accepted
 * command is answered with "A". The frequency is programmed in four
 * three-digit groups (GHz, MHz, kHz, Hz). Set to 7.02 GHz, the main output
 * yields the second harmonic at 14.04 GHz.
 */

import { z } from 'zod';
import type { DriverDefinition, InstrumentDevice, Transport } from '../types.js';
import type { Result } from '../../shared/types.js';
import { Ok, Err } from '../../shared/types.js';
import { createConnection } from '../connection.js';
import { synthesizeDummy } from '../dummy.js';
import { transportForAddress } from '../transports/visa-address.js';
import { resourceAddress } from './params.js';

/** The oscillator has no identification command */
export const MODEL_STRING = 'MKU LO 8-13 PLL Oscillator';

const ACCEPTED = 'A';

const DIGIT_GROUPS = {
  giga: 'GF1',
  mega: 'MF1',
  kilo: 'kF1',
  unit: 'HF1',
} as const;

export interface LocalOscillatorDevice extends InstrumentDevice {
  /** Send a command; fails unless the oscillator answers "A" */
  write(command: string): Promise<Result<void, Error>>;
  getStatus(): Promise<Result<string, Error>>;
  /** Set the GHz digits, 0-999 */
  setGigaHz(value: number): Promise<Result<void, Error>>;
  setMegaHz(value: number): Promise<Result<void, Error>>;
  setKiloHz(value: number): Promise<Result<void, Error>>;
  setHz(value: number): Promise<Result<void, Error>>;
  /** Set the full frequency in GHz, down to 1 Hz resolution */
  setFrequency(ghz: number): Promise<Result<void, Error>>;
}

const params = z.object({
  address: resourceAddress('serial'),
});

const delay = (ms: number) => new Promise(r => setTimeout(r, ms));

export function createLocalOscillator(transport: Transport): LocalOscillatorDevice {
  const name = 'LocalOscillator';
  const connection = createConnection(transport, { name });

  async function write(command: string): Promise<Result<void, Error>> {
    const result = await connection.query(command);
    if (!result.ok) return result;
    if (result.value !== ACCEPTED) {
      return Err(new Error(`${name}: command ${command} rejected (${JSON.stringify(result.value)})`));
    }
    return Ok();
  }

  function setDigits(group: keyof typeof DIGIT_GROUPS, value: number): Promise<Result<void, Error>> {
    if (!Number.isInteger(value) || value < 0 || value > 999) {
      return Promise.resolve(Err(new Error(`${name}: digit group must be an integer 0-999, got ${value}`)));
    }
    return write(`${String(value).padStart(3, '0')}${DIGIT_GROUPS[group]}`);
  }

  return {
    initialize: () => connection.initialize(),
    close: () => connection.close(),
    query: (command: string) => connection.query(command),
    write,

    get idn() {
      return Promise.resolve(Ok(MODEL_STRING));
    },

    getStatus: () => connection.query('sa'),

    setGigaHz: (value: number) => setDigits('giga', value),
    setMegaHz: (value: number) => setDigits('mega', value),
    setKiloHz: (value: number) => setDigits('kilo', value),
    setHz: (value: number) => setDigits('unit', value),

    async setFrequency(ghz: number): Promise<Result<void, Error>> {
      const total = Math.round(ghz * 1e9);
      if (!Number.isFinite(total) || total < 0 || total >= 1e12) {
        return Err(new Error(`${name}: frequency out of range: ${ghz} GHz`));
      }
      const groups: [keyof typeof DIGIT_GROUPS, number][] = [
        ['giga', Math.floor(total / 1e9)],
        ['mega', Math.floor(total / 1e6) % 1000],
        ['kilo', Math.floor(total / 1e3) % 1000],
        ['unit', total % 1000],
      ];

      for (const [index, [group, value]] of groups.entries()) {
        if (index > 0) await delay(10);
        const result = await setDigits(group, value);
        if (!result.ok) return result;
      }

      const [giga, mega, kilo, unit] = groups.map(([, value]) => value);
      console.log(
        `[${name}] Frequency set to ${String(giga).padStart(2, '0')} GHz, ` +
        `${String(mega).padStart(3, '0')} MHz, ${String(kilo).padStart(3, '0')} kHz, ` +
        `and ${String(unit).padStart(3, '0')} Hz`
      );
      return Ok();
    },
  };
}

const digits = [{ name: 'value', type: 'integer' as const }];

export const LocalOscillator: DriverDefinition<typeof params, LocalOscillatorDevice> = {
  name: 'LocalOscillator',
  family: 'kuhne-electronic',
  description: 'Kuhne Electronic MKU LO 8-13 PLL local oscillator',
  params,
  exampleParams: { address: 'ASRL/dev/ttyUSB0::INSTR' },
  signatures: {
    idn: { kind: 'property', returns: 'string', placeholder: MODEL_STRING },
    getStatus: { kind: 'method', returns: 'string', placeholder: '???' },
    setGigaHz: { kind: 'method', params: digits, returns: 'void' },
    setMegaHz: { kind: 'method', params: digits, returns: 'void' },
    setKiloHz: { kind: 'method', params: digits, returns: 'void' },
    setHz: { kind: 'method', params: digits, returns: 'void' },
    setFrequency: { kind: 'method', params: [{ name: 'ghz', type: 'number' }], returns: 'void' },
  },
  transport: ({ address }) =>
    transportForAddress(address, {
      writeTermination: '',
      readTermination: '\r\n',
      serial: { baudRate: 115200 },
    }),
  create: (_params, transport) => createLocalOscillator(transport),
};

export const LocalOscillatorDummy = synthesizeDummy(LocalOscillator);
