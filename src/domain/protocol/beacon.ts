import {
  BEACON_OFFSETS,
  DEVICE_IDENTIFIER_BYTES,
  MIN_STATUS_PACKET_LENGTH,
  UPLOAD_OK_MARKER,
} from '@/domain/protocol/constants';
import type { BytePair } from '@/domain/protocol/commands';

/**
 * Fields a device broadcast carries beyond its identifier.
 */
export interface BeaconStatus {
  status: number;
  commandEcho: number;
  /** Must be echoed in play and stop commands. */
  timestamp: BytePair;
}

export interface Beacon {
  /** Null when the packet is too short to carry status fields. */
  status: BeaconStatus | null;
  uploadOk: boolean;
}

export function containsIdentifier(payload: Buffer): boolean {
  return payload.includes(DEVICE_IDENTIFIER_BYTES);
}

/**
 * Returns null for packets that do not carry the device identifier.
 */
export function parseBeacon(payload: Buffer): Beacon | null {
  if (!containsIdentifier(payload)) {
    return null;
  }
  return {
    status: parseStatus(payload),
    uploadOk: payload.toString('latin1').includes(UPLOAD_OK_MARKER),
  };
}

export function parseStatus(payload: Buffer): BeaconStatus | null {
  if (payload.length < MIN_STATUS_PACKET_LENGTH) {
    return null;
  }
  return {
    status: payload[BEACON_OFFSETS.status],
    commandEcho: payload[BEACON_OFFSETS.commandEcho],
    timestamp: [payload[BEACON_OFFSETS.timestampHigh], payload[BEACON_OFFSETS.timestampLow]],
  };
}
