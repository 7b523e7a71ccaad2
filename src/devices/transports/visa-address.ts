/**
 * VISA-style resource addresses
 *
 *   ASRL/dev/ttyUSB0::INSTR                       serial port
 *   TCPIP::10.0.0.84::INSTR, TCPIP0::host::5025::SOCKET, or a bare host
 *   USB0::0x2A8D::0x1760::MY55280218::0::INSTR    USB-TMC (ids in hex or decimal)
 *
 * LAN addresses always map to a raw SCPI socket; INSTR resources use port 5025.
 */

import type { Transport } from '../types.js';
import type { Result } from '../../shared/types.js';
import { Ok, Err } from '../../shared/types.js';
import { createSerialTransport, type SerialConfig } from './serial.js';
import { createTcpTransport, SCPI_RAW_PORT } from './tcp.js';
import { createUSBTMCTransport, usbDeviceLocator } from './usbtmc.js';

export type VisaAddress =
  | { kind: 'serial'; path: string }
  | { kind: 'tcp'; host: string; port: number }
  | { kind: 'usb'; vendorId: number; productId: number; serialNumber?: string };

const HOST_PATTERN = /^[A-Za-z0-9]([A-Za-z0-9.-]*[A-Za-z0-9])?$/;

function parseId(text: string): number | null {
  const trimmed = text.trim();
  const value = /^0x[0-9a-f]+$/i.test(trimmed)
    ? parseInt(trimmed.slice(2), 16)
    : /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : NaN;
  return Number.isNaN(value) || value > 0xFFFF ? null : value;
}

export function parseVisaAddress(address: string): Result<VisaAddress, string> {
  const trimmed = address.trim();
  if (trimmed === '') return Err('empty resource address');

  const parts = trimmed.split('::');
  const head = parts[0].toUpperCase();

  if (head.startsWith('ASRL')) {
    const path = parts[0].slice(4);
    if (path === '') return Err(`missing serial port in "${trimmed}"`);
    return Ok({ kind: 'serial', path });
  }

  if (/^TCPIP\d*$/.test(head)) {
    const host = parts[1] ?? '';
    if (!HOST_PATTERN.test(host)) return Err(`invalid host in "${trimmed}"`);
    const resource = parts[parts.length - 1].toUpperCase();
    if (resource === 'SOCKET') {
      const port = parts.length === 4 ? Number(parts[2]) : NaN;
      if (!Number.isInteger(port) || port < 1 || port > 65535) {
        return Err(`invalid socket port in "${trimmed}"`);
      }
      return Ok({ kind: 'tcp', host, port });
    }
    return Ok({ kind: 'tcp', host, port: SCPI_RAW_PORT });
  }

  if (/^USB\d*$/.test(head)) {
    if (parts.length < 3) return Err(`incomplete USB address "${trimmed}"`);
    const vendorId = parseId(parts[1]);
    const productId = parseId(parts[2]);
    if (vendorId === null || productId === null) {
      return Err(`invalid vendor or product id in "${trimmed}"`);
    }
    const serial = parts[3];
    const serialNumber = serial && serial.toUpperCase() !== 'INSTR' ? serial : undefined;
    return Ok(serialNumber
      ? { kind: 'usb', vendorId, productId, serialNumber }
      : { kind: 'usb', vendorId, productId });
  }

  if (parts.length === 1 && HOST_PATTERN.test(trimmed)) {
    return Ok({ kind: 'tcp', host: trimmed, port: SCPI_RAW_PORT });
  }

  return Err(`unrecognized resource address "${trimmed}"`);
}

export interface AddressTransportOptions {
  writeTermination?: string;
  readTermination?: string;
  /** Line settings used when the address names a serial port */
  serial?: Omit<SerialConfig, 'path' | 'writeTermination' | 'readTermination'>;
}

/** Build (without opening) the transport an address calls for */
export function transportForAddress(address: VisaAddress, options: AddressTransportOptions = {}): Transport {
  const { writeTermination, readTermination } = options;
  switch (address.kind) {
    case 'serial':
      return createSerialTransport({
        baudRate: 9600,
        ...options.serial,
        path: address.path,
        writeTermination,
        readTermination,
      });
    case 'tcp':
      return createTcpTransport({
        host: address.host,
        port: address.port,
        writeTermination,
        readTermination,
      });
    case 'usb':
      return createUSBTMCTransport(usbDeviceLocator(address), { writeTermination });
  }
}
