import type { EnvironmentConfig } from '@/config/environment';
import { CONTROL_PORT, UPLOAD_PORT } from '@/domain/protocol/constants';
import { DEFAULT_PRG_REFRESH_RATE } from '@/domain/sequence/prgLayout';

/**
 * Network and timing settings for talking to devices on the LAN.
 */
export interface DeviceNetworkConfig {
  controlPort: number;
  uploadPort: number;
  broadcastAddress: string;
  bindHost: string;
  /** Liveness sweep period. */
  receivePollMs: number;
  livenessTimeoutMs: number;
  probeTimeoutMs: number;
  uploadConnectTimeoutMs: number;
  uploadReadTimeoutMs: number;
}

export type PlaybackTarget = 'broadcast' | 'device';
export type StopEcho = 'timestamp' | 'zero';

export interface PlaybackConfig {
  /** Where play and stop commands are sent. */
  target: PlaybackTarget;
  stopEcho: StopEcho;
}

export interface CompileConfig {
  prgRefreshRate: number;
}

export function buildDeviceNetworkConfig(env: EnvironmentConfig): DeviceNetworkConfig {
  return {
    controlPort: CONTROL_PORT,
    uploadPort: UPLOAD_PORT,
    broadcastAddress: '255.255.255.255',
    bindHost: env.bindHost,
    receivePollMs: 1000,
    livenessTimeoutMs: 5000,
    probeTimeoutMs: 1000,
    uploadConnectTimeoutMs: 10000,
    uploadReadTimeoutMs: 5000,
  };
}

export function buildPlaybackConfig(): PlaybackConfig {
  return { target: 'broadcast', stopEcho: 'timestamp' };
}

export function buildCompileConfig(): CompileConfig {
  return { prgRefreshRate: DEFAULT_PRG_REFRESH_RATE };
}
