/**
 * UDP eSCL Transport
 * Applied Motion drives take SCL commands over UDP ("eSCL"). Every datagram is
 * framed as 0x00 0x07 <command> CR and the drive answers each one with a single
 * datagram in the same framing: a value ("AC=1.000"), an acknowledgement
 * ("%" executed, "*" buffered) or a rejection ("?" plus a code).
 */

import { createSocket, type Socket } from 'node:dgram';
import type { Transport } from '../types.js';
import type { Result } from '../../shared/types.js';
import { Ok, Err, toError } from '../../shared/types.js';
import { TimeoutError } from '../errors.js';
import { config } from '../../config.js';

/** Port the drive listens on for eSCL datagrams */
export const ESCL_DEVICE_PORT = 7775;
/** Local port replies are sent back to */
export const ESCL_HOST_PORT = 15005;

export interface UdpConfig {
  host: string;
  port?: number;          // default: 7775
  localAddress?: string;  // default: '0.0.0.0' (all interfaces)
  localPort?: number;     // default: 15005
  timeout?: number;       // reply timeout in ms (default: LABDEV_TIMEOUT_MS)
}

const HEADER = Buffer.from([0x00, 0x07]);
const TAIL = Buffer.from([0x0d]);

export function frameCommand(cmd: string): Buffer {
  return Buffer.concat([HEADER, Buffer.from(cmd, 'ascii'), TAIL]);
}

export function unframeReply(datagram: Buffer): string {
  return datagram.subarray(HEADER.length).toString('ascii').replace(/\r$/, '');
}

export function createUdpTransport(udpConfig: UdpConfig): Transport {
  const {
    host,
    port = ESCL_DEVICE_PORT,
    localAddress = '0.0.0.0',
    localPort = ESCL_HOST_PORT,
    timeout = config.timeoutMs,
  } = udpConfig;

  let socket: Socket | null = null;
  let inbox: Buffer[] = [];
  let onReceive: (() => void) | null = null;
  let opened = false;
  let failure: Error | null = null;

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
    // Datagrams that arrived after an earlier timeout are stale
    inbox = [];
    return new Promise<void>((resolve, reject) => {
      target.send(frameCommand(cmd), port, host, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  function receive(cmd: string): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const check = () => {
        const datagram = inbox.shift();
        if (!datagram) return;
        clearTimeout(timeoutId);
        onReceive = null;
        resolve(unframeReply(datagram));
      };

      const timeoutId = setTimeout(() => {
        onReceive = null;
        reject(new TimeoutError(cmd, timeout));
      }, timeout);

      onReceive = check;
      check();
    });
  }

  function guard(): Result<Socket, Error> {
    if (failure) return Err(failure);
    if (!socket || !opened) return Err(new Error('UDP socket not bound'));
    return Ok(socket);
  }

  async function exchange(cmd: string): Promise<Result<string, Error>> {
    const ready = guard();
    if (!ready.ok) return ready;

    try {
      await send(ready.value, cmd);
      return Ok(await receive(cmd));
    } catch (e) {
      return Err(toError(e));
    }
  }

  return {
    async open(): Promise<Result<void, Error>> {
      if (opened) return Ok();

      const client = createSocket('udp4');
      socket = client;
      inbox = [];

      client.on('message', (datagram: Buffer) => {
        inbox.push(datagram);
        onReceive?.();
      });

      try {
        await new Promise<void>((resolve, reject) => {
          client.once('error', reject);
          client.bind({ address: localAddress, port: localPort }, () => {
            client.off('error', reject);
            resolve();
          });
        });
      } catch (e) {
        client.removeAllListeners();
        try {
          client.close();
        } catch (closeErr) {
          console.warn('[UDP] Could not release socket after failed bind:', closeErr);
        }
        socket = null;
        return Err(toError(e));
      }

      client.on('error', (err) => {
        failure = new Error(`UDP_SOCKET_ERROR: ${err.message}`);
      });

      opened = true;
      failure = null;
      return Ok();
    },

    async close(): Promise<Result<void, Error>> {
      if (!socket) return Ok();

      await withLock(async () => {
        const client = socket;
        if (client) {
          client.removeAllListeners();
          await new Promise<void>((resolve) => {
            client.close(() => resolve());
          });
        }

        socket = null;
        inbox = [];
        onReceive = null;
        opened = false;
        failure = null;
      });
      return Ok();
    },

    async query(cmd: string): Promise<Result<string, Error>> {
      return withLock(() => exchange(cmd));
    },

    /** Send a command and wait for its acknowledgement */
    async write(cmd: string): Promise<Result<void, Error>> {
      return withLock(async () => {
        const reply = await exchange(cmd);
        if (!reply.ok) return reply;
        if (reply.value.startsWith('?')) {
          return Err(new Error(`Drive rejected ${cmd}: ${reply.value}`));
        }
        return Ok();
      });
    },

    isOpen(): boolean {
      return opened && failure === null;
    },
  };
}
