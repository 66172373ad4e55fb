import path from 'node:path';
import type { AppConfig } from '@/config';
import type { CompileConfig, DeviceNetworkConfig, PlaybackConfig } from '@/config/device';
import type { StoragePort } from '@/ports/StoragePort';
import { isIpv4 } from '@/shared/utils/net';
import { isLogLevel, type LogLevel } from '@/types/logLevel';

export interface LoggingSettings {
  level: LogLevel;
  json: boolean;
}

/**
 * Persisted settings; every field falls back to the built-in default when invalid.
 */
export interface StoredConfig {
  logging: LoggingSettings;
  network: DeviceNetworkConfig;
  playback: PlaybackConfig;
  compile: CompileConfig;
  updatedAt: string;
}

export function defaultConfigPath(dataDir = 'data'): string {
  return path.resolve(process.cwd(), dataDir, 'config.json');
}

/**
 * Minimal configuration store backed by a JSON file on disk.
 */
export class ConfigRepository {
  private config: StoredConfig | null = null;

  constructor(
    private readonly storage: StoragePort,
    private readonly defaults: AppConfig,
    private readonly configPath = defaultConfigPath(defaults.env.dataDir),
  ) {}

  public async load(): Promise<StoredConfig> {
    const raw = await this.storage.readJson(this.configPath);
    const normalized = normalizeConfig(raw, this.defaults);
    this.config = normalized;
    if (raw === undefined || JSON.stringify(raw) !== JSON.stringify(normalized)) {
      await this.storage.writeJson(this.configPath, normalized);
    }
    return normalized;
  }

  public get(): StoredConfig {
    if (!this.config) {
      throw new Error('configuration not loaded');
    }
    return this.config;
  }

  public async save(): Promise<void> {
    await this.storage.writeJson(this.configPath, this.get());
  }

  public async update(mutator: (config: StoredConfig) => void | Promise<void>): Promise<StoredConfig> {
    const current = this.config ?? (await this.load());
    const draft: StoredConfig = structuredClone(current);
    await mutator(draft);
    const next = normalizeConfig(draft, this.defaults);
    if (serializeConfig(next) !== serializeConfig(current)) {
      next.updatedAt = new Date().toISOString();
    }
    this.config = next;
    await this.save();
    return next;
  }
}

function serializeConfig(config: StoredConfig): string {
  return JSON.stringify(config, (key, value: unknown) => (key === 'updatedAt' ? undefined : value));
}

export function normalizeConfig(raw: unknown, defaults: AppConfig): StoredConfig {
  const source = asRecord(raw);
  const logging = asRecord(source.logging);
  const network = asRecord(source.network);
  const playback = asRecord(source.playback);
  const compile = asRecord(source.compile);
  const net = defaults.network;

  return {
    logging: {
      level: isLogLevel(logging.level) ? logging.level : defaults.env.logLevel,
      json: typeof logging.json === 'boolean' ? logging.json : defaults.env.logJson,
    },
    network: {
      controlPort: port(network.controlPort, net.controlPort),
      uploadPort: port(network.uploadPort, net.uploadPort),
      broadcastAddress: address(network.broadcastAddress, net.broadcastAddress),
      bindHost: address(network.bindHost, net.bindHost),
      receivePollMs: positiveInt(network.receivePollMs, net.receivePollMs),
      livenessTimeoutMs: positiveInt(network.livenessTimeoutMs, net.livenessTimeoutMs),
      probeTimeoutMs: positiveInt(network.probeTimeoutMs, net.probeTimeoutMs),
      uploadConnectTimeoutMs: positiveInt(network.uploadConnectTimeoutMs, net.uploadConnectTimeoutMs),
      uploadReadTimeoutMs: positiveInt(network.uploadReadTimeoutMs, net.uploadReadTimeoutMs),
    },
    playback: {
      target: playback.target === 'device' || playback.target === 'broadcast' ? playback.target : defaults.playback.target,
      stopEcho:
        playback.stopEcho === 'zero' || playback.stopEcho === 'timestamp'
          ? playback.stopEcho
          : defaults.playback.stopEcho,
    },
    compile: {
      prgRefreshRate: boundedInt(compile.prgRefreshRate, 1, 0xffff, defaults.compile.prgRefreshRate),
    },
    updatedAt: typeof source.updatedAt === 'string' ? source.updatedAt : new Date().toISOString(),
  };
}

function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) ? { ...value } : {};
}

function positiveInt(value: unknown, fallback: number): number {
  return boundedInt(value, 1, Number.MAX_SAFE_INTEGER, fallback);
}

function port(value: unknown, fallback: number): number {
  return boundedInt(value, 1, 65535, fallback);
}

function boundedInt(value: unknown, min: number, max: number, fallback: number): number {
  return typeof value === 'number' && Number.isInteger(value) && value >= min && value <= max ? value : fallback;
}

function address(value: unknown, fallback: string): string {
  return typeof value === 'string' && isIpv4(value) ? value.trim() : fallback;
}
