import dgram from 'node:dgram';
import { TransportError } from '@/domain/errors';
import type { BeaconSource, DatagramHandler } from '@/ports/BeaconSource';
import { createLogger } from '@/shared/logging/logger';

export interface UdpBeaconSourceOptions {
  port: number;
  bindHost?: string;
}

/**
 * Unprivileged beacon source: a udp4 socket bound to the control port.
 * Probes leave from the same socket so replies come back to it.
 */
export class UdpBeaconSource implements BeaconSource {
  public readonly name = 'udp';
  private readonly log = createLogger('Discovery', 'UdpSource');
  private socket: dgram.Socket | null = null;

  constructor(private readonly options: UdpBeaconSourceOptions) {}

  public async start(handler: DatagramHandler): Promise<void> {
    if (this.socket) {
      return;
    }
    const socket = dgram.createSocket({ type: 'udp4', reuseAddr: true });
    this.socket = socket;

    socket.on('message', (payload, rinfo) => {
      handler({
        address: rinfo.address,
        port: rinfo.port,
        destinationPort: this.options.port,
        payload,
      });
    });

    await new Promise<void>((resolve, reject) => {
      const onBindError = (error: Error) => {
        this.socket = null;
        socket.close();
        reject(TransportError.fromSocketError(error, 'socket-error'));
      };
      socket.once('error', onBindError);
      socket.bind({ port: this.options.port, address: this.options.bindHost }, () => {
        socket.off('error', onBindError);
        socket.setBroadcast(true);
        socket.on('error', (error) => {
          this.log.warn('beacon socket error', { message: error.message });
        });
        this.log.info('beacon listener started', {
          port: socket.address().port,
          host: this.options.bindHost,
        });
        resolve();
      });
    });
  }

  public async send(payload: Buffer, address: string, port: number): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      throw new TransportError('not-started', 'beacon source is not listening');
    }
    await new Promise<void>((resolve, reject) => {
      socket.send(payload, port, address, (error) => {
        if (error) {
          reject(TransportError.fromSocketError(error, 'send-failed'));
          return;
        }
        resolve();
      });
    });
  }

  public async stop(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    if (!socket) {
      return;
    }
    await new Promise<void>((resolve) => socket.close(() => resolve()));
    this.log.info('beacon listener stopped');
  }
}
