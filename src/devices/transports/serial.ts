/**
 * Serial Transport
 * Line-oriented serial communication for ASCII instruments
 */

import { SerialPort } from 'serialport';
import { ReadlineParser } from '@serialport/parser-readline';
import type { Transport } from '../types.js';
import type { Result } from '../../shared/types.js';
import { Ok, Err, toError } from '../../shared/types.js';
import { TimeoutError } from '../errors.js';
import { config } from '../../config.js';

export interface SerialConfig {
  path: string;
  baudRate: number;
  dataBits?: 5 | 6 | 7 | 8;         // default: 8
  stopBits?: 1 | 1.5 | 2;           // default: 1
  parity?: 'none' | 'even' | 'odd' | 'mark' | 'space';
  xonXoff?: boolean;                // software flow control
  writeTermination?: string;        // appended to every command (default: '\n')
  readTermination?: string;         // response line delimiter (default: '\n')
  commandDelay?: number;            // ms delay between commands (default: LABDEV_COMMAND_DELAY_MS)
  timeout?: number;                 // query timeout in ms (default: LABDEV_TIMEOUT_MS)
}

export function createSerialTransport(serialConfig: SerialConfig): Transport {
  const {
    path,
    baudRate,
    dataBits = 8,
    stopBits = 1,
    parity = 'none',
    xonXoff = false,
    writeTermination = '\n',
    readTermination = '\n',
    commandDelay = config.commandDelayMs,
    timeout = config.timeoutMs,
  } = serialConfig;

  let port: SerialPort | null = null;
  let parser: ReadlineParser | null = null;
  let opened = false;
  let disconnected = false;
  let disconnectError: Error | null = null;

  // Mutex to prevent concurrent command/response interleaving
  let commandLock: Promise<void> = Promise.resolve();

  const delay = (ms: number) => new Promise(r => setTimeout(r, ms));

  // Acquire lock for exclusive command access
  function withLock<T>(fn: () => Promise<T>): Promise<T> {
    const previousLock = commandLock;
    let releaseLock: () => void = () => {};
    commandLock = new Promise<void>(resolve => {
      releaseLock = resolve;
    });
    return previousLock.then(fn).finally(() => releaseLock());
  }

  function writeLine(target: SerialPort, cmd: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      target.write(cmd + writeTermination, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  return {
    async open(): Promise<Result<void, Error>> {
      if (opened) return Ok();

      const serial = new SerialPort({
        path,
        baudRate,
        dataBits,
        stopBits,
        parity,
        xon: xonXoff,
        xoff: xonXoff,
        autoOpen: false,
      });
      port = serial;

      // Listen for port disconnection events
      serial.on('close', () => {
        disconnected = true;
        disconnectError = new Error('SERIAL_PORT_DISCONNECTED: Port closed');
        opened = false;
      });

      serial.on('error', (err: Error) => {
        disconnected = true;
        disconnectError = new Error(`SERIAL_PORT_ERROR: ${err.message}`);
      });

      parser = serial.pipe(new ReadlineParser({ delimiter: readTermination }));

      try {
        await new Promise<void>((resolve, reject) => {
          serial.open((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      } catch (e) {
        return Err(toError(e));
      }

      opened = true;
      disconnected = false;
      disconnectError = null;
      return Ok();
    },

    async close(): Promise<Result<void, Error>> {
      if (!port) return Ok();

      // Acquire lock to wait for any in-flight operations
      await withLock(async () => {
        parser?.removeAllListeners();
        const serial = port;
        if (serial) {
          serial.removeAllListeners();
          if (opened && !disconnected) {
            await new Promise<void>((resolve) => {
              serial.close(() => resolve());
            });
          }
        }

        port = null;
        parser = null;
        opened = false;
        disconnected = false;
        disconnectError = null;
      });
      return Ok();
    },

    async query(cmd: string): Promise<Result<string, Error>> {
      return withLock(async () => {
        if (disconnected) {
          return Err(disconnectError ?? new Error('SERIAL_PORT_DISCONNECTED'));
        }
        const serial = port;
        const lines = parser;
        if (!serial || !lines) {
          return Err(new Error('Port not opened'));
        }

        let result: string;
        try {
          result = await new Promise<string>((resolve, reject) => {
            let settled = false;

            const cleanup = () => {
              if (!settled) {
                settled = true;
                clearTimeout(timeoutId);
                lines.removeListener('data', onData);
              }
            };

            const onData = (data: string) => {
              cleanup();
              resolve(data.trim());
            };

            const timeoutId = setTimeout(() => {
              cleanup();
              reject(new TimeoutError(cmd, timeout));
            }, timeout);

            lines.once('data', onData);

            writeLine(serial, cmd).catch((err: unknown) => {
              cleanup();
              reject(toError(err));
            });
          });
        } catch (e) {
          return Err(toError(e));
        }

        // Let the instrument settle before the next command
        await delay(commandDelay);

        return Ok(result);
      });
    },

    async write(cmd: string): Promise<Result<void, Error>> {
      return withLock(async () => {
        if (disconnected) {
          return Err(disconnectError ?? new Error('SERIAL_PORT_DISCONNECTED'));
        }
        const serial = port;
        if (!serial) {
          return Err(new Error('Port not opened'));
        }

        try {
          await writeLine(serial, cmd);
        } catch (e) {
          return Err(toError(e));
        }

        // Add delay after write for device to process
        await delay(commandDelay);
        return Ok();
      });
    },

    isOpen(): boolean {
      return opened && !disconnected;
    },
  };
}

// Helper to list available serial ports
export async function listSerialPorts(): Promise<Array<{ path: string; manufacturer?: string }>> {
  const ports = await SerialPort.list();
  return ports.map(p => ({
    path: p.path,
    manufacturer: p.manufacturer,
  }));
}
