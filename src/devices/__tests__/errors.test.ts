import { describe, it, expect } from 'vitest';
import { ConnectionError, TimeoutError } from '../errors.js';

describe('ConnectionError.from()', () => {
  it('should keep the reason of a ConnectionError and add the context', () => {
    const original = new ConnectionError('not_found', 'USB device not found');

    const wrapped = ConnectionError.from(original, 'Could not open TSP01');

    expect(wrapped.reason).toBe('not_found');
    expect(wrapped.message).toBe('Could not open TSP01: USB device not found');
    expect(wrapped.cause).toBe(original);
  });

  it('should return a ConnectionError unchanged without context', () => {
    const original = new ConnectionError('refused', 'connect ECONNREFUSED');
    expect(ConnectionError.from(original)).toBe(original);
  });

  it('should classify library failures by errno code and message', () => {
    const denied = Object.assign(new Error('open /dev/ttyUSB0'), { code: 'EACCES' });

    expect(ConnectionError.from(denied).reason).toBe('permission_denied');
    expect(ConnectionError.from(new TimeoutError('*IDN?', 2000)).reason).toBe('timeout');
    expect(ConnectionError.from(new Error('connect ECONNREFUSED 10.0.0.34:5025')).reason).toBe('refused');
    expect(ConnectionError.from(new Error('LIBUSB_ERROR_IO')).reason).toBe('io_error');
  });
});
