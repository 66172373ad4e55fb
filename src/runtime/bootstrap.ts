import { loadConfig, type AppConfig } from '@/config';
import { UdpBeaconSource } from '@/adapters/network/udpBeaconSource';
import { UdpDatagramTransport } from '@/adapters/network/udpDatagramTransport';
import { StorageAdapter } from '@/adapters/storage/StorageAdapter';
import { ConfigRepository, type StoredConfig } from '@/application/config/configRepository';
import { SequenceCompiler } from '@/application/compile/sequenceCompiler';
import { ColorCommander } from '@/application/control/colorCommander';
import { DeviceDiscovery } from '@/application/discovery/deviceDiscovery';
import { PlaybackController } from '@/application/playback/playbackController';
import { PlaybackSessionStore } from '@/application/playback/playbackSessionStore';
import { SequenceUploader } from '@/application/upload/sequenceUploader';
import { cryptoNonceSource } from '@/infrastructure/random/cryptoNonceSource';
import { systemClock } from '@/infrastructure/time/systemClock';
import type { BeaconSource } from '@/ports/BeaconSource';
import type { ClockPort } from '@/ports/ClockPort';
import type { DatagramTransport } from '@/ports/DatagramTransport';
import type { NonceSource } from '@/ports/NonceSource';
import type { StoragePort } from '@/ports/StoragePort';
import { stopWithTimeout } from '@/runtime/stopWithTimeout';
import { errorMessage } from '@/shared/bestEffort';
import { createLogger, logManager } from '@/shared/logging/logger';

/**
 * Replaceable collaborators; the defaults talk to the real network and disk.
 */
export interface RuntimeOptions {
  defaults?: AppConfig;
  storage?: StoragePort;
  configPath?: string;
  sessionPath?: string;
  transport?: DatagramTransport;
  beaconSource?: BeaconSource;
  clock?: ClockPort;
  nonces?: NonceSource;
  stopTimeoutMs?: number;
}

export interface RuntimeServices {
  config: StoredConfig;
  discovery: DeviceDiscovery;
  uploader: SequenceUploader;
  playback: PlaybackController;
  sessions: PlaybackSessionStore;
  colors: ColorCommander;
  compiler: SequenceCompiler;
}

/**
 * Descriptor for services that need graceful shutdown coordination.
 */
type LifecycleService = {
  name: string;
  stop: () => Promise<void>;
};

export type Runtime = {
  start: () => Promise<RuntimeServices>;
  stop: () => Promise<void>;
};

export function createRuntime(options: RuntimeOptions = {}): Runtime {
  const log = createLogger('Runtime');
  const defaults = options.defaults ?? loadConfig();
  const storage = options.storage ?? new StorageAdapter();
  const configRepository = new ConfigRepository(storage, defaults, options.configPath);
  let services: RuntimeServices | null = null;
  let starting: Promise<RuntimeServices> | null = null;
  let lifecycle: LifecycleService[] = [];

  async function startServices(): Promise<RuntimeServices> {
    const config = await configRepository.load();
    logManager.configure({ level: config.logging.level, json: config.logging.json });
    const { network } = config;

    const transport = options.transport ?? new UdpDatagramTransport({ bindHost: network.bindHost, broadcast: true });
    const beaconSource =
      options.beaconSource ?? new UdpBeaconSource({ port: network.controlPort, bindHost: network.bindHost });
    const nonces = options.nonces ?? cryptoNonceSource;

    const discovery = new DeviceDiscovery(beaconSource, options.clock ?? systemClock, {
      controlPort: network.controlPort,
      livenessTimeoutMs: network.livenessTimeoutMs,
      probeTimeoutMs: network.probeTimeoutMs,
      sweepIntervalMs: network.receivePollMs,
    });
    const sessions = new PlaybackSessionStore(storage, options.sessionPath);
    const playback = new PlaybackController(
      transport,
      discovery,
      nonces,
      {
        controlPort: network.controlPort,
        broadcastAddress: network.broadcastAddress,
        target: config.playback.target,
        stopEcho: config.playback.stopEcho,
      },
      await sessions.load(),
    );

    const started: RuntimeServices = {
      config,
      discovery,
      uploader: new SequenceUploader(nonces, {
        port: network.uploadPort,
        connectTimeoutMs: network.uploadConnectTimeoutMs,
        readTimeoutMs: network.uploadReadTimeoutMs,
      }),
      playback,
      sessions,
      colors: new ColorCommander(transport, network.controlPort),
      compiler: new SequenceCompiler(storage, { prgRefreshRate: config.compile.prgRefreshRate }),
    };

    lifecycle = [
      { name: 'discovery', stop: () => discovery.stop() },
      { name: 'transport', stop: () => transport.close() },
      { name: 'session', stop: () => sessions.save(playback.session()) },
    ];
    services = started;
    log.info('runtime ready', {
      controlPort: network.controlPort,
      uploadPort: network.uploadPort,
      target: config.playback.target,
    });
    return started;
  }

  async function stopServices(): Promise<void> {
    if (!starting) {
      return;
    }
    try {
      await starting;
    } catch (error) {
      log.debug('stopping after failed start', { message: errorMessage(error) });
    }
    const timeoutMs = options.stopTimeoutMs ?? 3000;
    for (const service of lifecycle) {
      await stopWithTimeout(service.name, service.stop, timeoutMs, log);
    }
    lifecycle = [];
    services = null;
    starting = null;
  }

  return {
    start: () => {
      if (services) {
        return Promise.resolve(services);
      }
      if (!starting) {
        starting = startServices().catch((error: unknown) => {
          starting = null;
          throw error;
        });
      }
      return starting;
    },
    stop: stopServices,
  };
}
