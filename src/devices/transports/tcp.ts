/**
 * TCP Socket Transport
 * Raw SCPI-over-socket communication for LAN instruments (port 5025 by convention)
 */

import { Socket } from 'node:net';
import type { Transport } from '../types.js';
import type { Result } from '../../shared/types.js';
import { Ok, Err, toError } from '../../shared/types.js';
import { TimeoutError } from '../errors.js';
import { config } from '../../config.js';

export const SCPI_RAW_PORT = 5025;

export interface TcpConfig {
  host: string;
  port?: number;              // default: 5025
  writeTermination?: string;  // default: '\n'
  readTermination?: string;   // default: '\n'
  timeout?: number;           // connect and query timeout in ms (default: LABDEV_TIMEOUT_MS)
}

/** Bytes needed for a complete IEEE 488.2 definite length block, or null while the header is incomplete */
export function definiteBlockLength(buffer: Buffer): number | null {
  if (buffer.length < 2 || buffer[0] !== 0x23) return null;
  const numDigits = parseInt(String.fromCharCode(buffer[1]), 10);
  if (isNaN(numDigits) || numDigits < 1 || buffer.length < 2 + numDigits) return null;
  const dataLength = parseInt(buffer.subarray(2, 2 + numDigits).toString('ascii'), 10);
  return isNaN(dataLength) ? null : 2 + numDigits + dataLength;
}

export function createTcpTransport(tcpConfig: TcpConfig): Transport {
  const {
    host,
    port = SCPI_RAW_PORT,
    writeTermination = '\n',
    readTermination = '\n',
    timeout = config.timeoutMs,
  } = tcpConfig;

  let socket: Socket | null = null;
  let pending: Buffer = Buffer.alloc(0);
  let onReceive: (() => void) | null = null;
  let opened = false;
  let disconnected = false;
  let disconnectError: Error | null = null;

  // Mutex to prevent concurrent command/response interleaving
  let commandLock: Promise<void> = Promise.resolve();

  function withLock<T>(fn: () => Promise<T>): Promise<T> {
    const previousLock = commandLock;
    let releaseLock: () => void = () => {};
    commandLock = new Promise<void>(resolve => {
      releaseLock = resolve;
    });
    return previousLock.then(fn).finally(() => releaseLock());
  }

  function send(target: Socket, cmd: string): Promise<void> {
    // Bytes left over from an earlier reply (such as the terminator after a block) are stale
    pending = Buffer.alloc(0);
    return new Promise<void>((resolve, reject) => {
      target.write(cmd + writeTermination, 'ascii', (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /**
   * Wait until `complete` finds a full response in the receive buffer,
   * then consume that many bytes.
   */
  function receive(cmd: string, complete: (buffer: Buffer) => number | null): Promise<Buffer> {
    return new Promise<Buffer>((resolve, reject) => {
      const check = () => {
        const end = complete(pending);
        if (end === null) return;
        clearTimeout(timeoutId);
        onReceive = null;
        const response = pending.subarray(0, end);
        pending = pending.subarray(end);
        resolve(response);
      };

      const timeoutId = setTimeout(() => {
        onReceive = null;
        reject(new TimeoutError(cmd, timeout));
      }, timeout);

      onReceive = check;
      check();
    });
  }

  const lineComplete = (buffer: Buffer): number | null => {
    const index = buffer.indexOf(readTermination, 0, 'ascii');
    return index === -1 ? null : index + readTermination.length;
  };

  const blockComplete = (buffer: Buffer): number | null => {
    const length = definiteBlockLength(buffer);
    return length === null || buffer.length < length ? null : length;
  };

  function guard(): Result<Socket, Error> {
    if (disconnected) return Err(disconnectError ?? new Error('TCP connection lost'));
    if (!socket || !opened) return Err(new Error('Socket not opened'));
    return Ok(socket);
  }

  return {
    async open(): Promise<Result<void, Error>> {
      if (opened) return Ok();

      const client = new Socket();
      socket = client;
      pending = Buffer.alloc(0);

      client.on('data', (chunk: Buffer) => {
        pending = Buffer.concat([pending, chunk]);
        onReceive?.();
      });

      client.on('close', () => {
        if (opened) {
          disconnected = true;
          disconnectError = new Error(`TCP connection to ${host}:${port} closed`);
        }
        opened = false;
      });

      try {
        await new Promise<void>((resolve, reject) => {
          const timeoutId = setTimeout(() => {
            client.destroy();
            reject(new TimeoutError(`connect ${host}:${port}`, timeout));
          }, timeout);

          client.once('error', (err) => {
            clearTimeout(timeoutId);
            reject(err);
          });

          client.connect(port, host, () => {
            clearTimeout(timeoutId);
            resolve();
          });
        });
      } catch (e) {
        client.removeAllListeners();
        client.destroy();
        socket = null;
        return Err(toError(e));
      }

      client.on('error', (err) => {
        disconnected = true;
        disconnectError = new Error(`TCP_SOCKET_ERROR: ${err.message}`);
      });

      opened = true;
      disconnected = false;
      disconnectError = null;
      return Ok();
    },

    async close(): Promise<Result<void, Error>> {
      if (!socket) return Ok();

      await withLock(async () => {
        const client = socket;
        if (client) {
          client.removeAllListeners();
          await new Promise<void>((resolve) => {
            client.end(() => resolve());
          });
          client.destroy();
        }

        socket = null;
        pending = Buffer.alloc(0);
        onReceive = null;
        opened = false;
        disconnected = false;
        disconnectError = null;
      });
      return Ok();
    },

    async query(cmd: string): Promise<Result<string, Error>> {
      return withLock(async () => {
        const ready = guard();
        if (!ready.ok) return ready;

        try {
          await send(ready.value, cmd);
          const response = await receive(cmd, lineComplete);
          return Ok(response.toString('ascii').trim());
        } catch (e) {
          return Err(toError(e));
        }
      });
    },

    async write(cmd: string): Promise<Result<void, Error>> {
      return withLock(async () => {
        const ready = guard();
        if (!ready.ok) return ready;

        try {
          await send(ready.value, cmd);
          return Ok();
        } catch (e) {
          return Err(toError(e));
        }
      });
    },

    async queryBinary(cmd: string): Promise<Result<Buffer, Error>> {
      return withLock(async () => {
        const ready = guard();
        if (!ready.ok) return ready;

        try {
          await send(ready.value, cmd);
          const response = await receive(cmd, blockComplete);
          return Ok(Buffer.from(response));
        } catch (e) {
          return Err(toError(e));
        }
      });
    },

    isOpen(): boolean {
      return opened && !disconnected;
    },
  };
}
