/**
 * Prologix GPIB-Ethernet Transport
 *
 * Reaches a GPIB instrument through a Prologix adapter: a TCP socket (port
 * 1234) where lines starting with "++" configure the adapter and every other
 * line is forwarded to the selected GPIB address. The adapter runs in
 * controller mode without read-after-write, so a query is the command followed
 * by an explicit "++read eoi".
 */

import type { Transport } from '../types.js';
import type { Result } from '../../shared/types.js';
import { Ok } from '../../shared/types.js';
import { createTcpTransport } from './tcp.js';
import { config } from '../../config.js';

export const PROLOGIX_PORT = 1234;

/** Longest GPIB read timeout the adapter accepts */
const MAX_READ_TIMEOUT_MS = 3000;

export interface PrologixConfig {
  host: string;
  /** Primary GPIB address of the instrument, 0-30 */
  gpibAddress: number;
  port?: number;     // default: 1234
  timeout?: number;  // default: LABDEV_TIMEOUT_MS
}

/** Adapter setup sent after every open, ending with the address selection */
export function prologixSetup(gpibAddress: number, timeout: number): string[] {
  const readTimeout = Math.max(1, Math.min(timeout, MAX_READ_TIMEOUT_MS));
  return [
    '++mode 1',
    '++auto 0',
    `++read_tmo_ms ${readTimeout}`,
    '++eos 3',
    `++addr ${gpibAddress}`,
  ];
}

/**
 * @param link - Socket to the adapter; a raw TCP transport unless given
 */
export function createPrologixTransport(
  prologixConfig: PrologixConfig,
  link: Transport = createTcpTransport({
    host: prologixConfig.host,
    port: prologixConfig.port ?? PROLOGIX_PORT,
    timeout: prologixConfig.timeout,
  })
): Transport {
  const { gpibAddress, timeout = config.timeoutMs } = prologixConfig;
  let configured = false;

  // The command and its ++read must not be split by another caller
  let commandLock: Promise<void> = Promise.resolve();

  function withLock<T>(fn: () => Promise<T>): Promise<T> {
    const previousLock = commandLock;
    let releaseLock: () => void = () => {};
    commandLock = new Promise<void>(resolve => {
      releaseLock = resolve;
    });
    return previousLock.then(fn).finally(() => releaseLock());
  }

  return {
    async open(): Promise<Result<void, Error>> {
      if (configured && link.isOpen()) return Ok();

      const opened = await link.open();
      if (!opened.ok) return opened;

      for (const line of prologixSetup(gpibAddress, timeout)) {
        const result = await link.write(line);
        if (!result.ok) {
          await link.close();
          return result;
        }
      }
      configured = true;
      return Ok();
    },

    async close(): Promise<Result<void, Error>> {
      configured = false;
      return link.close();
    },

    async query(cmd: string): Promise<Result<string, Error>> {
      return withLock(async () => {
        const sent = await link.write(cmd);
        if (!sent.ok) return sent;
        return link.query('++read eoi');
      });
    },

    async write(cmd: string): Promise<Result<void, Error>> {
      return withLock(() => link.write(cmd));
    },

    isOpen(): boolean {
      return configured && link.isOpen();
    },
  };
}
