/**
 * Null Transport
 * A transport that never touches hardware.
 *
 * Dummies are built over it, descriptors are introspected over it, and the
 * verifier uses the refusing variant to exercise a failed initialize().
 */

import type { Transport } from '../types.js';
import type { Result } from '../../shared/types.js';
import { Ok, Err } from '../../shared/types.js';
import { ConnectionError } from '../errors.js';

export interface NullTransportOptions {
  /** open() fails with a not_found ConnectionError */
  refuse?: boolean;
  /** Name for error messages */
  name?: string;
}

export function createNullTransport(options: NullTransportOptions = {}): Transport {
  const { refuse = false, name = 'null transport' } = options;
  let opened = false;

  return {
    async open(): Promise<Result<void, Error>> {
      if (refuse) {
        return Err(new ConnectionError('not_found', `${name}: no device attached`));
      }
      opened = true;
      return Ok();
    },

    async close(): Promise<Result<void, Error>> {
      opened = false;
      return Ok();
    },

    async query(_cmd: string): Promise<Result<string, Error>> {
      if (!opened) return Err(new Error(`${name} not opened`));
      return Ok('');
    },

    async write(_cmd: string): Promise<Result<void, Error>> {
      if (!opened) return Err(new Error(`${name} not opened`));
      return Ok();
    },

    isOpen(): boolean {
      return opened;
    },
  };
}
