import { decodeIpv4UdpFrame } from '@/domain/protocol/ipv4Frame';
import type { BeaconSource, DatagramHandler, RawFrameFeed } from '@/ports/BeaconSource';
import type { DatagramTransport } from '@/ports/DatagramTransport';
import { createLogger } from '@/shared/logging/logger';

/**
 * Beacon source over raw IPv4 capture. Every decoded UDP datagram reaches
 * discovery with its real destination port: probe replies come back to the
 * transport's ephemeral port, beacons to the control port.
 */
export class FrameBeaconSource implements BeaconSource {
  public readonly name = 'raw-capture';
  private readonly log = createLogger('Discovery', 'FrameSource');
  private running = false;

  constructor(
    private readonly feed: RawFrameFeed,
    private readonly transport: DatagramTransport,
  ) {}

  public async start(handler: DatagramHandler): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;
    await this.feed.start((frame) => {
      const datagram = decodeIpv4UdpFrame(frame);
      if (!datagram) {
        this.log.spam('non-udp frame dropped', { length: frame.length });
        return;
      }
      handler({
        address: datagram.sourceAddress,
        port: datagram.sourcePort,
        destinationPort: datagram.destinationPort,
        payload: datagram.payload,
      });
    });
    this.log.info('raw capture started');
  }

  public async send(payload: Buffer, address: string, port: number): Promise<void> {
    await this.transport.send(payload, address, port);
  }

  public async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    await this.feed.stop();
    this.log.info('raw capture stopped');
  }
}
