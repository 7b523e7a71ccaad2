/**
 * USB-TMC (Test & Measurement Class) Transport
 * Implements the USB-TMC protocol for SCPI communication
 */

import { findByIds, findBySerialNumber, getDeviceList } from 'usb';
import type { Device, Interface, InEndpoint, OutEndpoint } from 'usb';
import type { Transport } from '../types.js';
import type { Result } from '../../shared/types.js';
import { Ok, Err, toError } from '../../shared/types.js';
import { ConnectionError, TimeoutError } from '../errors.js';
import { config } from '../../config.js';

// USB-TMC Message IDs
export const DEV_DEP_MSG_OUT = 1;
export const REQUEST_DEV_DEP_MSG_IN = 2;

// Fatal USB errors that indicate device disconnection
const FATAL_USB_ERRORS = [
  'LIBUSB_ERROR_NO_DEVICE',
  'LIBUSB_ERROR_IO',
  'LIBUSB_ERROR_PIPE',
  'LIBUSB_TRANSFER_NO_DEVICE',
];

const BULK_TRANSFER = 2;

export interface UsbDeviceLocator {
  vendorId: number;
  productId: number;
  serialNumber?: string;
}

/** A device handle, or a lookup run when the transport opens */
export type UsbDeviceSource = Device | (() => Promise<Device | undefined>);

export interface USBTMCConfig {
  timeout?: number;  // Query timeout in ms (default: LABDEV_TIMEOUT_MS)
  /** Appended to every command (default: '\n') */
  writeTermination?: string;
}

// Exported for testing
export function buildDevDepMsgOut(message: string, bTag: number): Buffer {
  const msgBytes = Buffer.from(message, 'ascii');

  // Header: 12 bytes + message + padding to 4-byte boundary
  const paddedLen = Math.ceil((12 + msgBytes.length) / 4) * 4;
  const buf = Buffer.alloc(paddedLen);

  buf[0] = DEV_DEP_MSG_OUT;      // MsgID
  buf[1] = bTag;                  // bTag
  buf[2] = ~bTag & 0xFF;         // bTagInverse
  buf[3] = 0;                     // Reserved
  buf.writeUInt32LE(msgBytes.length, 4);  // TransferSize
  buf[8] = 0x01;                  // bmTransferAttributes (EOM)
  buf[9] = 0;                     // Reserved
  buf[10] = 0;                    // Reserved
  buf[11] = 0;                    // Reserved
  msgBytes.copy(buf, 12);

  return buf;
}

// Exported for testing
export function buildRequestDevDepMsgIn(maxLength: number, bTag: number): Buffer {
  const buf = Buffer.alloc(12);

  buf[0] = REQUEST_DEV_DEP_MSG_IN;  // MsgID
  buf[1] = bTag;                     // bTag
  buf[2] = ~bTag & 0xFF;            // bTagInverse
  buf[3] = 0;                        // Reserved
  buf.writeUInt32LE(maxLength, 4);   // TransferSize
  buf[8] = 0;                        // bmTransferAttributes
  buf[9] = 0;                        // TermChar
  buf[10] = 0;                       // Reserved
  buf[11] = 0;                       // Reserved

  return buf;
}

// Exported for testing - parse response from device
export function parseDevDepMsgIn(response: Buffer): string {
  if (response.length < 12) {
    throw new Error(`USBTMC response too short: ${response.length} bytes (need at least 12)`);
  }
  const transferSize = response.readUInt32LE(4);
  const data = response.subarray(12, 12 + transferSize);
  return data.toString('ascii').trim();
}

// Tag generator - cycles 1-255
export function createTagGenerator(): () => number {
  let bTag = 0;
  return () => {
    bTag = (bTag % 255) + 1;
    return bTag;
  };
}

type Endpoint = Interface['endpoints'][number];

function isBulkIn(endpoint: Endpoint): endpoint is InEndpoint {
  return endpoint.transferType === BULK_TRANSFER && endpoint.direction === 'in';
}

function isBulkOut(endpoint: Endpoint): endpoint is OutEndpoint {
  return endpoint.transferType === BULK_TRANSFER && endpoint.direction === 'out';
}

/** Lookup by vendor/product id, or by serial number when one is given */
export function usbDeviceLocator(locator: UsbDeviceLocator): () => Promise<Device | undefined> {
  return async () => {
    if (locator.serialNumber) {
      const device = await findBySerialNumber(locator.serialNumber);
      if (
        device &&
        device.deviceDescriptor.idVendor === locator.vendorId &&
        device.deviceDescriptor.idProduct === locator.productId
      ) {
        return device;
      }
      return undefined;
    }
    return findByIds(locator.vendorId, locator.productId);
  };
}

export function createUSBTMCTransport(source: UsbDeviceSource, usbConfig: USBTMCConfig = {}): Transport {
  const { timeout = config.timeoutMs, writeTermination = '\n' } = usbConfig;
  const nextTag = createTagGenerator();
  let device: Device | null = typeof source === 'function' ? null : source;
  let bulkOutEndpoint: OutEndpoint | null = null;
  let bulkInEndpoint: InEndpoint | null = null;
  let iface: Interface | null = null;
  let opened = false;
  let disconnected = false;
  let disconnectError: Error | null = null;

  // Mutex to prevent concurrent command/response interleaving
  let commandLock: Promise<void> = Promise.resolve();

  // Acquire lock for exclusive command access
  function withLock<T>(fn: () => Promise<T>): Promise<T> {
    const previousLock = commandLock;
    let releaseLock: () => void = () => {};
    commandLock = new Promise<void>(resolve => {
      releaseLock = resolve;
    });
    return previousLock.then(fn).finally(() => releaseLock());
  }

  // Check if an error indicates device disconnection
  function isFatalError(err: Error): boolean {
    return FATAL_USB_ERRORS.some(code => err.message.includes(code));
  }

  // Mark transport as disconnected
  function markDisconnected(err: Error): void {
    disconnected = true;
    disconnectError = err;
    opened = false;
  }

  async function resolveDevice(): Promise<Device | undefined> {
    if (device) return device;
    if (typeof source !== 'function') return source;
    device = (await source()) ?? null;
    return device ?? undefined;
  }

  function transferOut(data: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!bulkOutEndpoint) {
        reject(new Error('Device not opened'));
        return;
      }
      bulkOutEndpoint.transfer(data, (err) => {
        if (err) {
          if (isFatalError(err)) {
            markDisconnected(err);
          }
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  function transferIn(length: number, cmd: string): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      if (!bulkInEndpoint) {
        reject(new Error('Device not opened'));
        return;
      }

      let settled = false;

      const timeoutId = setTimeout(() => {
        if (!settled) {
          settled = true;
          reject(new TimeoutError(cmd, timeout));
        }
      }, timeout);

      bulkInEndpoint.transfer(length, (err, data) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutId);

        if (err) {
          if (isFatalError(err)) {
            markDisconnected(err);
          }
          reject(err);
        } else {
          resolve(data ?? Buffer.alloc(0));
        }
      });
    });
  }

  function releaseDevice(target: Device): void {
    try {
      target.close();
    } catch (e) {
      console.warn('[USBTMC] Failed to close device after aborted open:', toError(e).message);
    }
  }

  return {
    async open(): Promise<Result<void, Error>> {
      if (opened) return Ok();

      let target: Device | undefined;
      try {
        target = await resolveDevice();
      } catch (e) {
        return Err(ConnectionError.from(toError(e), 'USB device lookup failed'));
      }
      if (!target) {
        return Err(new ConnectionError('not_found', 'USB device not found'));
      }

      try {
        target.open();
      } catch (e) {
        return Err(toError(e));
      }

      try {
        if (!target.interfaces || target.interfaces.length === 0) {
          target.close();
          return Err(new Error('No interfaces found on device'));
        }

        const claimed = target.interfaces[0];
        iface = claimed;

        if (claimed.isKernelDriverActive()) {
          claimed.detachKernelDriver();
        }
        claimed.claim();

        for (const endpoint of claimed.endpoints) {
          if (isBulkIn(endpoint)) bulkInEndpoint = endpoint;
          else if (isBulkOut(endpoint)) bulkOutEndpoint = endpoint;
        }

        if (!bulkInEndpoint || !bulkOutEndpoint) {
          target.close();
          return Err(new Error('Could not find bulk endpoints'));
        }

        opened = true;
        disconnected = false;
        disconnectError = null;
        return Ok();
      } catch (err) {
        // Clean up on partial open failure
        releaseDevice(target);
        return Err(toError(err));
      }
    },

    async close(): Promise<Result<void, Error>> {
      if (!opened && !disconnected) return Ok();

      // Acquire lock to wait for any in-flight operations
      return withLock(async () => {
        let failure: Error | null = null;
        try {
          iface?.release(true);
          device?.close();
        } catch (e) {
          failure = toError(e);
        }

        bulkInEndpoint = null;
        bulkOutEndpoint = null;
        iface = null;
        opened = false;
        disconnected = false;
        disconnectError = null;
        return failure ? Err(failure) : Ok();
      });
    },

    async query(cmd: string): Promise<Result<string, Error>> {
      return withLock(async () => {
        // Check for disconnection before attempting query
        if (disconnected) {
          return Err(disconnectError ?? new Error('USB device disconnected'));
        }

        try {
          // Send command
          const outBuf = buildDevDepMsgOut(cmd + writeTermination, nextTag());
          await transferOut(outBuf);

          // Request response
          const reqBuf = buildRequestDevDepMsgIn(1024, nextTag());
          await transferOut(reqBuf);

          // Read response
          const response = await transferIn(1024, cmd);

          return Ok(parseDevDepMsgIn(response));
        } catch (e) {
          return Err(toError(e));
        }
      });
    },

    async write(cmd: string): Promise<Result<void, Error>> {
      return withLock(async () => {
        // Check for disconnection before attempting write
        if (disconnected) {
          return Err(disconnectError ?? new Error('USB device disconnected'));
        }

        try {
          const outBuf = buildDevDepMsgOut(cmd + writeTermination, nextTag());
          await transferOut(outBuf);
          return Ok();
        } catch (e) {
          return Err(toError(e));
        }
      });
    },

    async queryBinary(cmd: string): Promise<Result<Buffer, Error>> {
      return withLock(async () => {
        if (disconnected) {
          return Err(disconnectError ?? new Error('USB device disconnected'));
        }

        try {
          const outBuf = buildDevDepMsgOut(cmd + writeTermination, nextTag());
          await transferOut(outBuf);

          // Collect data from multiple USBTMC messages until EOM
          const allData: Buffer[] = [];
          let eom = false;

          while (!eom) {
            const reqBuf = buildRequestDevDepMsgIn(64 * 1024, nextTag());
            await transferOut(reqBuf);

            // Read one USBTMC message (may span multiple USB packets)
            const msgChunks: Buffer[] = [];
            let msgBytes = 0;
            let transferSize = 0;
            let headerParsed = false;

            for (let i = 0; i < 1000; i++) {
              const chunk = await transferIn(512, cmd);
              if (chunk.length === 0) break;
              msgChunks.push(chunk);
              msgBytes += chunk.length;

              // Parse USBTMC header from first 12 bytes
              if (!headerParsed && msgBytes >= 12) {
                const combined = Buffer.concat(msgChunks);
                transferSize = combined.readUInt32LE(4);
                eom = (combined[8] & 0x01) !== 0;
                headerParsed = true;
              }

              if (headerParsed && msgBytes >= transferSize + 12) break;
            }

            // A message that never delivered a header ends the transfer
            if (!headerParsed) break;

            const msgData = Buffer.concat(msgChunks);
            if (transferSize > 0) {
              allData.push(msgData.subarray(12, 12 + transferSize));
            }
          }

          return Ok(Buffer.concat(allData));
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

export interface USBTMCDeviceInfo {
  vendorId: number;
  productId: number;
  device: Device;
}

// Helper to list attached USB devices
export function findUSBTMCDevices(): USBTMCDeviceInfo[] {
  return getDeviceList().map(device => ({
    vendorId: device.deviceDescriptor.idVendor,
    productId: device.deviceDescriptor.idProduct,
    device,
  }));
}
