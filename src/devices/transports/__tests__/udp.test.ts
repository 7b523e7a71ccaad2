import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { EventEmitter } from 'events';

interface Sent {
  datagram: Buffer;
  port: number;
  address: string;
}

interface FakeDgramSocket extends EventEmitter {
  bound: { address?: string; port?: number } | null;
  sent: Sent[];
  closed: boolean;
}

interface DgramState {
  sockets: FakeDgramSocket[];
  bindError: Error | null;
  /** Reply datagrams for a sent command (unframed text); undefined means no reply */
  responder: ((command: string) => Buffer[] | undefined) | null;
}

const state = vi.hoisted((): DgramState => ({
  sockets: [],
  bindError: null,
  responder: null,
}));

vi.mock('node:dgram', async () => {
  const { EventEmitter } = await import('events');

  class Socket extends EventEmitter implements FakeDgramSocket {
    bound: { address?: string; port?: number } | null = null;
    sent: Sent[] = [];
    closed = false;

    bind(options: { address?: string; port?: number }, cb: () => void): this {
      const failure = state.bindError;
      setImmediate(() => {
        if (failure) {
          this.emit('error', failure);
        } else {
          this.bound = options;
          cb();
        }
      });
      return this;
    }

    send(datagram: Buffer, port: number, address: string, cb: (err: Error | null) => void): void {
      this.sent.push({ datagram, port, address });
      cb(null);
      const command = datagram.subarray(2, datagram.length - 1).toString('ascii');
      const replies = state.responder?.(command);
      if (replies) {
        setImmediate(() => replies.forEach(reply => this.emit('message', reply)));
      }
    }

    close(cb?: () => void): void {
      this.closed = true;
      cb?.();
    }
  }

  return {
    createSocket: () => {
      const socket = new Socket();
      state.sockets.push(socket);
      return socket;
    },
  };
});

import { createUdpTransport, frameCommand, unframeReply, ESCL_DEVICE_PORT } from '../udp.js';
import { TimeoutError } from '../../errors.js';

const reply = (text: string) => Buffer.concat([Buffer.from([0x00, 0x07]), Buffer.from(`${text}\r`, 'ascii')]);

function lastSocket(): FakeDgramSocket {
  const socket = state.sockets.at(-1);
  if (!socket) throw new Error('no socket was created');
  return socket;
}

describe('UDP eSCL Transport', () => {
  beforeEach(() => {
    state.sockets.length = 0;
    state.bindError = null;
    state.responder = null;
  });

  describe('framing', () => {
    it('should wrap a command in the eSCL header and a carriage return', () => {
      expect(frameCommand('SC').toString('hex')).toBe('000753430d');
    });

    it('should strip the header and the carriage return from a reply', () => {
      expect(unframeReply(reply('SC=0009'))).toBe('SC=0009');
    });
  });

  describe('open()', () => {
    it('should bind the local reply port', async () => {
      const transport = createUdpTransport({ host: '10.0.0.51' });

      expect((await transport.open()).ok).toBe(true);
      expect(lastSocket().bound).toEqual({ address: '0.0.0.0', port: 15005 });
      expect(transport.isOpen()).toBe(true);
    });

    it('should return the bind error and release the socket', async () => {
      state.bindError = new Error('bind EADDRINUSE 0.0.0.0:15005');
      const transport = createUdpTransport({ host: '10.0.0.51' });

      expect(await transport.open()).toEqual({ ok: false, error: new Error('bind EADDRINUSE 0.0.0.0:15005') });
      expect(lastSocket().closed).toBe(true);
      expect(transport.isOpen()).toBe(false);
    });
  });

  describe('query()', () => {
    it('should send a framed datagram to the drive and return the reply', async () => {
      state.responder = cmd => (cmd === 'AC' ? [reply('AC=1.000')] : undefined);
      const transport = createUdpTransport({ host: '10.0.0.51' });
      await transport.open();

      expect(await transport.query('AC')).toEqual({ ok: true, value: 'AC=1.000' });
      const [sent] = lastSocket().sent;
      expect(sent.port).toBe(ESCL_DEVICE_PORT);
      expect(sent.address).toBe('10.0.0.51');
    });

    it('should resolve a TimeoutError when the drive stays silent', async () => {
      const transport = createUdpTransport({ host: '10.0.0.51', timeout: 20 });
      await transport.open();

      const result = await transport.query('SP');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(TimeoutError);
      }
    });

    it('should fail before open', async () => {
      const transport = createUdpTransport({ host: '10.0.0.51' });
      expect(await transport.query('SC')).toEqual({ ok: false, error: new Error('UDP socket not bound') });
    });
  });

  describe('write()', () => {
    it('should wait for the acknowledgement', async () => {
      state.responder = () => [reply('%')];
      const transport = createUdpTransport({ host: '10.0.0.51' });
      await transport.open();

      expect(await transport.write('VE2')).toEqual({ ok: true, value: undefined });
    });

    it('should report a rejected command', async () => {
      state.responder = () => [reply('?4')];
      const transport = createUdpTransport({ host: '10.0.0.51' });
      await transport.open();

      expect(await transport.write('MR2')).toEqual({ ok: false, error: new Error('Drive rejected MR2: ?4') });
    });
  });

  describe('close()', () => {
    it('should close the socket and be repeatable', async () => {
      const transport = createUdpTransport({ host: '10.0.0.51' });
      await transport.open();
      const socket = lastSocket();

      expect((await transport.close()).ok).toBe(true);
      expect((await transport.close()).ok).toBe(true);

      expect(socket.closed).toBe(true);
      expect(transport.isOpen()).toBe(false);
    });
  });
});
