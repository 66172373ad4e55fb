import dgram from 'node:dgram';
import { TransportError } from '@/domain/errors';
import type { DatagramTransport } from '@/ports/DatagramTransport';
import { errorMessage } from '@/shared/bestEffort';
import { createLogger } from '@/shared/logging/logger';

export interface UdpDatagramTransportOptions {
  bindHost?: string;
  /** Lets commands go to broadcast addresses. */
  broadcast?: boolean;
}

/**
 * Sends command datagrams from an ephemeral udp4 socket, bound on first use.
 */
export class UdpDatagramTransport implements DatagramTransport {
  private readonly log = createLogger('Network', 'UdpTransport');
  private ready: Promise<dgram.Socket> | null = null;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(private readonly options: UdpDatagramTransportOptions = {}) {}

  public async send(payload: Buffer, address: string, port: number): Promise<void> {
    const socket = await this.ensureSocket();
    const sending = new Promise<void>((resolve, reject) => {
      try {
        socket.send(payload, port, address, (error) => {
          if (error) {
            reject(TransportError.fromSocketError(error, 'send-failed'));
            return;
          }
          resolve();
        });
      } catch (error) {
        // closed between bind and send
        reject(TransportError.fromSocketError(error, 'send-failed'));
      }
    });
    this.inFlight.add(sending);
    try {
      await sending;
    } finally {
      this.inFlight.delete(sending);
    }
    this.log.spam('datagram sent', { to: `${address}:${port}`, payload });
  }

  /**
   * Waits for a bind or send still in progress so the socket is closed after it.
   */
  public async close(): Promise<void> {
    const ready = this.ready;
    this.ready = null;
    if (!ready) {
      return;
    }
    let socket: dgram.Socket;
    try {
      socket = await ready;
    } catch (error) {
      this.log.debug('udp transport closed before binding', { message: errorMessage(error) });
      return;
    }
    await Promise.allSettled([...this.inFlight]);
    await new Promise<void>((resolve) => socket.close(() => resolve()));
    this.log.debug('udp transport closed');
  }

  private ensureSocket(): Promise<dgram.Socket> {
    if (!this.ready) {
      this.ready = this.openSocket();
    }
    return this.ready;
  }

  private openSocket(): Promise<dgram.Socket> {
    const socket = dgram.createSocket({ type: 'udp4', reuseAddr: true });
    socket.on('error', (error) => {
      this.log.warn('udp transport socket error', { message: error.message });
    });
    const opening = new Promise<dgram.Socket>((resolve, reject) => {
      const onBindError = (error: Error) => {
        if (this.ready === opening) {
          this.ready = null;
        }
        socket.close();
        reject(TransportError.fromSocketError(error, 'socket-error'));
      };
      socket.once('error', onBindError);
      socket.bind({ port: 0, address: this.options.bindHost }, () => {
        socket.off('error', onBindError);
        if (this.options.broadcast !== false) {
          socket.setBroadcast(true);
        }
        this.log.debug('udp transport bound', { port: socket.address().port });
        resolve(socket);
      });
    });
    return opening;
  }
}
