/**
 * Device Connection
 * The lifecycle half of the capability contract, shared by every driver.
 *
 * Owns the driver's transport: initialize() opens it (and optionally asks
 * the instrument to identify itself), close() releases it. A failed initialize() leaves the
 * transport closed so the next call starts clean.
 */

import type { ConnectionStatus, Transport } from './types.js';
import type { Result } from '../shared/types.js';
import { Ok, Err } from '../shared/types.js';
import { ConnectionError, NotConnectedError } from './errors.js';
import { config } from '../config.js';

export interface ConnectionOptions {
  /** Device name used in log lines and errors */
  name: string;
  /** Pause after the link opens, before the first command (default: LABDEV_SETTLE_MS) */
  settleMs?: number;
  /** Reads an identification once the transport is open; failure aborts initialize() */
  identify?: (transport: Transport) => Promise<Result<string, Error>>;
}

export interface DeviceConnection {
  initialize(): Promise<Result<ConnectionStatus, ConnectionError>>;
  close(): Promise<Result<void, Error>>;
  query(command: string): Promise<Result<string, Error>>;
  write(command: string): Promise<Result<void, Error>>;
  queryBinary(command: string): Promise<Result<Buffer, Error>>;
  isConnected(): boolean;
}

const delay = (ms: number) => new Promise(r => setTimeout(r, ms));

export function createConnection(transport: Transport, options: ConnectionOptions): DeviceConnection {
  const { name, settleMs = config.settleMs, identify } = options;
  let connected = false;

  async function abandon(): Promise<void> {
    const closeResult = await transport.close();
    if (!closeResult.ok) {
      console.error(`[${name}] Failed to release transport after aborted connect:`, closeResult.error);
    }
  }

  return {
    async initialize(): Promise<Result<ConnectionStatus, ConnectionError>> {
      if (connected && transport.isOpen()) {
        return Ok({ connected: true, device: name });
      }

      const openResult = await transport.open();
      if (!openResult.ok) {
        await abandon();
        return Err(ConnectionError.from(openResult.error, `Could not open ${name}`));
      }

      if (settleMs > 0) await delay(settleMs);

      let identity: string | null = null;
      if (identify) {
        const idResult = await identify(transport);
        if (!idResult.ok) {
          await abandon();
          return Err(ConnectionError.from(idResult.error, `${name} did not identify itself`));
        }
        identity = idResult.value;
      }

      connected = true;
      console.log(identity ? `[${name}] Connected to: ${identity}` : `[${name}] Connected`);
      return Ok({ connected: true, device: name });
    },

    async close(): Promise<Result<void, Error>> {
      if (!connected && !transport.isOpen()) return Ok();

      connected = false;
      const result = await transport.close();
      if (result.ok) {
        console.log(`[${name}] Connection closed`);
      }
      return result;
    },

    async query(command: string): Promise<Result<string, Error>> {
      if (!connected) return Err(new NotConnectedError(name));
      return transport.query(command);
    },

    async write(command: string): Promise<Result<void, Error>> {
      if (!connected) return Err(new NotConnectedError(name));
      return transport.write(command);
    },

    async queryBinary(command: string): Promise<Result<Buffer, Error>> {
      if (!connected) return Err(new NotConnectedError(name));
      if (!transport.queryBinary) {
        return Err(new Error(`${name}: transport does not support binary transfers`));
      }
      return transport.queryBinary(command);
    },

    isConnected(): boolean {
      return connected && transport.isOpen();
    },
  };
}
