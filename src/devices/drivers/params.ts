/**
 * Connection parameter schemas shared by the drivers
 */

import { z } from 'zod';
import { parseVisaAddress, type VisaAddress } from '../transports/visa-address.js';

/** A VISA-style resource address, parsed into its transport choice */
export function resourceAddress(...allowed: VisaAddress['kind'][]) {
  return z.string().transform((value, ctx): VisaAddress => {
    const parsed = parseVisaAddress(value);
    if (!parsed.ok) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error });
      return z.NEVER;
    }
    if (allowed.length > 0 && !allowed.includes(parsed.value.kind)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `expected a ${allowed.join(' or ')} address, got ${parsed.value.kind}`,
      });
      return z.NEVER;
    }
    return parsed.value;
  });
}

/** Serial device path, e.g. /dev/ttyUSB0 or COM3 */
export const serialPath = z.string().trim().min(1, 'serial port path is required');

/** IPv4 address or host name */
export const host = z
  .string()
  .trim()
  .regex(/^[A-Za-z0-9]([A-Za-z0-9.-]*[A-Za-z0-9])?$/, 'expected an IP address or host name');

export const tcpPort = z.number().int().min(1).max(65535);
