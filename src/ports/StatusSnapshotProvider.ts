import type { DeviceSnapshot } from '@/domain/device/types';

export interface StatusSnapshotProvider {
  /** Most recently observed device, or the named one. */
  snapshot(address?: string): DeviceSnapshot | null;
}
