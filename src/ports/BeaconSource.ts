export interface InboundDatagram {
  address: string;
  port: number;
  /** Destination port when the capture path exposes it. */
  destinationPort: number | null;
  payload: Buffer;
}

export type DatagramHandler = (datagram: InboundDatagram) => void;

/**
 * Capability that delivers device traffic to discovery and carries probes back.
 * Implemented by a plain UDP listener or by a raw-capture frame decoder.
 */
export interface BeaconSource {
  readonly name: string;
  start(handler: DatagramHandler): Promise<void>;
  send(payload: Buffer, address: string, port: number): Promise<void>;
  stop(): Promise<void>;
}

/**
 * Producer of raw IPv4 packets, e.g. a privileged capture helper.
 */
export interface RawFrameFeed {
  start(onFrame: (frame: Buffer) => void): Promise<void>;
  stop(): Promise<void>;
}
