import { formatIpv4 } from '@/shared/utils/net';

const IPV4_VERSION = 4;
const UDP_PROTOCOL = 17;
const MIN_IPV4_HEADER = 20;
const UDP_HEADER = 8;

export interface Ipv4UdpDatagram {
  sourceAddress: string;
  destinationAddress: string;
  sourcePort: number;
  destinationPort: number;
  payload: Buffer;
}

/**
 * Decodes a raw IPv4 packet carrying UDP, as delivered by a raw capture socket.
 * Returns null for anything that is not a complete IPv4/UDP packet.
 */
export function decodeIpv4UdpFrame(frame: Buffer): Ipv4UdpDatagram | null {
  if (frame.length < MIN_IPV4_HEADER + UDP_HEADER) {
    return null;
  }
  const version = frame[0] >> 4;
  const headerLength = (frame[0] & 0x0f) * 4;
  if (version !== IPV4_VERSION || headerLength < MIN_IPV4_HEADER) {
    return null;
  }
  if (frame[9] !== UDP_PROTOCOL || frame.length < headerLength + UDP_HEADER) {
    return null;
  }

  const udpLength = frame.readUInt16BE(headerLength + 4);
  const payloadStart = headerLength + UDP_HEADER;
  // Some capture paths pad or truncate; trust the UDP length only when it fits.
  const payloadEnd =
    udpLength >= UDP_HEADER && headerLength + udpLength <= frame.length ? headerLength + udpLength : frame.length;

  return {
    sourceAddress: formatIpv4(frame.readUInt32BE(12)),
    destinationAddress: formatIpv4(frame.readUInt32BE(16)),
    sourcePort: frame.readUInt16BE(headerLength),
    destinationPort: frame.readUInt16BE(headerLength + 2),
    payload: frame.subarray(payloadStart, payloadEnd),
  };
}
