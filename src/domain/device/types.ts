import type { BeaconStatus } from '@/domain/protocol/beacon';

/**
 * Live registry entry for one device. Owned and mutated only by discovery.
 */
export interface DeviceRecord {
  address: string;
  /** Source port of the latest observation. */
  port: number;
  firstSeen: number;
  lastSeen: number;
  /** Raw payload of the latest identifier-bearing packet. */
  statusBytes: Buffer;
  /** Fields of the latest packet long enough to carry them. */
  status: BeaconStatus | null;
  /** Set once the device has reported a completed upload. */
  uploadOk: boolean;
}

/**
 * Detached copy of a `DeviceRecord`, safe to hold across discovery updates.
 */
export type DeviceSnapshot = Readonly<DeviceRecord>;

export function snapshotOf(record: DeviceRecord): DeviceSnapshot {
  return Object.freeze({
    ...record,
    statusBytes: Buffer.from(record.statusBytes),
    status: record.status ? Object.freeze({ ...record.status }) : null,
  });
}

/**
 * Client-side view of what the device is assumed to be doing.
 */
export interface PlaybackSession {
  nextPlayOpId: number;
  lastPlayingOpId: number | null;
  assumedPlaying: boolean;
}
