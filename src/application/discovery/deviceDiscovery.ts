import { snapshotOf, type DeviceRecord, type DeviceSnapshot } from '@/domain/device/types';
import { TransportError } from '@/domain/errors';
import { parseBeacon, type Beacon } from '@/domain/protocol/beacon';
import { buildProbeCommand } from '@/domain/protocol/commands';
import type { BeaconSource, InboundDatagram } from '@/ports/BeaconSource';
import type { ClockPort } from '@/ports/ClockPort';
import type { StatusSnapshotProvider } from '@/ports/StatusSnapshotProvider';
import { createLogger } from '@/shared/logging/logger';

export interface DeviceDiscoveryOptions {
  controlPort: number;
  /** Devices unseen for longer than this are evicted. */
  livenessTimeoutMs: number;
  probeTimeoutMs: number;
  sweepIntervalMs: number;
}

export type ProbeResult =
  | { kind: 'verified'; device: DeviceSnapshot }
  | { kind: 'timeout'; address: string }
  | { kind: 'send-failed'; address: string; error: TransportError };

export type DiscoveryEvent = 'deviceDiscovered' | 'deviceUpdated' | 'deviceLost';

type DeviceListener = (device: DeviceSnapshot) => void;

interface PendingProbe {
  trigger: InboundDatagram | null;
  timer: NodeJS.Timeout;
  waiters: Array<(result: ProbeResult) => void>;
}

/**
 * Keeps the registry of live devices fed by a `BeaconSource`.
 *
 * An unknown address carrying the device identifier is probed first and only
 * registered once it answers. Readers get frozen copies, never live records.
 */
export class DeviceDiscovery implements StatusSnapshotProvider {
  private readonly log = createLogger('Discovery');
  private readonly registry = new Map<string, DeviceRecord>();
  private readonly pending = new Map<string, PendingProbe>();
  private readonly listeners = new Map<DiscoveryEvent, Set<DeviceListener>>();
  private latestAddress: string | null = null;
  private sweepTimer: NodeJS.Timeout | null = null;
  private starting: Promise<void> | null = null;
  private running = false;

  constructor(
    private readonly source: BeaconSource,
    private readonly clock: ClockPort,
    private readonly options: DeviceDiscoveryOptions,
  ) {}

  public start(): Promise<void> {
    if (!this.starting) {
      this.starting = this.startSource();
    }
    return this.starting;
  }

  public async stop(): Promise<void> {
    if (!this.starting) {
      return;
    }
    this.starting = null;
    this.running = false;
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    for (const address of [...this.pending.keys()]) {
      this.settleProbe(address, { kind: 'timeout', address });
    }
    await this.source.stop();
    this.log.info('discovery stopped', { devices: this.registry.size });
  }

  public snapshot(address?: string): DeviceSnapshot | null {
    const key = address ?? this.latestAddress;
    if (key === null) {
      return null;
    }
    const record = this.registry.get(key);
    return record ? snapshotOf(record) : null;
  }

  public devices(): DeviceSnapshot[] {
    return [...this.registry.values()].map(snapshotOf);
  }

  /**
   * Resolves with the first snapshot that carries status fields, or null after `timeoutMs`.
   */
  public waitForStatus(timeoutMs: number, address?: string): Promise<DeviceSnapshot | null> {
    const current = this.snapshot(address);
    if (current?.status) {
      return Promise.resolve(current);
    }
    return new Promise((resolve) => {
      const onDevice = (device: DeviceSnapshot) => {
        if (!device.status || (address !== undefined && device.address !== address)) {
          return;
        }
        finish(device);
      };
      const offDiscovered = this.on('deviceDiscovered', onDevice);
      const offUpdated = this.on('deviceUpdated', onDevice);
      const timer = setTimeout(() => finish(null), timeoutMs);
      const finish = (device: DeviceSnapshot | null) => {
        clearTimeout(timer);
        offDiscovered();
        offUpdated();
        resolve(device);
      };
    });
  }

  /**
   * Sends the harmless probe command and waits for any datagram from `address`.
   */
  public probe(address: string, trigger: InboundDatagram | null = null): Promise<ProbeResult> {
    return new Promise((resolve) => {
      if (!this.running) {
        resolve({
          kind: 'send-failed',
          address,
          error: new TransportError('not-started', 'discovery is not running'),
        });
        return;
      }
      const existing = this.pending.get(address);
      if (existing) {
        existing.waiters.push(resolve);
        return;
      }
      const timer = setTimeout(
        () => this.settleProbe(address, { kind: 'timeout', address }),
        this.options.probeTimeoutMs,
      );
      this.pending.set(address, { trigger, timer, waiters: [resolve] });

      const probe = buildProbeCommand();
      void this.source.send(probe, address, this.options.controlPort).then(
        () => this.log.debug('probe sent', { address, payload: probe }),
        (error: unknown) =>
          this.settleProbe(address, {
            kind: 'send-failed',
            address,
            error: TransportError.fromSocketError(error, 'send-failed'),
          }),
      );
    });
  }

  /**
   * Evicts devices unseen for longer than the liveness timeout.
   */
  public sweep(): DeviceSnapshot[] {
    const now = this.clock.now();
    const lost: DeviceSnapshot[] = [];
    for (const [address, record] of this.registry) {
      if (now - record.lastSeen <= this.options.livenessTimeoutMs) {
        continue;
      }
      this.registry.delete(address);
      const snapshot = snapshotOf(record);
      lost.push(snapshot);
      this.log.info('device lost', { address, unseenMs: now - record.lastSeen });
      this.emit('deviceLost', snapshot);
    }
    if (lost.length > 0 && this.latestAddress !== null && !this.registry.has(this.latestAddress)) {
      this.latestAddress = this.mostRecentAddress();
    }
    return lost;
  }

  public on(event: DiscoveryEvent, listener: DeviceListener): () => void {
    let set = this.listeners.get(event);
    if (!set) {
      set = new Set();
      this.listeners.set(event, set);
    }
    set.add(listener);
    return () => {
      this.listeners.get(event)?.delete(listener);
    };
  }

  /**
   * Entry point for every datagram the source delivers.
   */
  public handleDatagram(datagram: InboundDatagram): void {
    const { address } = datagram;
    this.log.spam('datagram received', {
      from: `${address}:${datagram.port}`,
      payload: datagram.payload,
    });

    const pending = this.pending.get(address);
    if (pending) {
      const record = this.register(pending.trigger ?? datagram);
      this.settleProbe(address, { kind: 'verified', device: snapshotOf(record) });
      if (pending.trigger === null || pending.trigger === datagram) {
        return;
      }
    }

    if (datagram.destinationPort !== null && datagram.destinationPort !== this.options.controlPort) {
      return;
    }
    const beacon = parseBeacon(datagram.payload);
    if (!beacon) {
      return;
    }

    const record = this.registry.get(address);
    if (record) {
      this.observe(record, datagram, beacon);
      return;
    }
    this.log.debug('unverified device beacon', { address, payload: datagram.payload });
    void this.probe(address, datagram).then((result) => {
      if (result.kind === 'timeout') {
        this.log.debug('probe unanswered', { address });
      } else if (result.kind === 'send-failed') {
        this.log.warn('probe send failed', { address, message: result.error.message });
      }
    });
  }

  private async startSource(): Promise<void> {
    try {
      await this.source.start((datagram) => this.handleDatagram(datagram));
    } catch (error) {
      this.starting = null;
      throw error;
    }
    this.running = true;
    this.sweepTimer = setInterval(() => this.sweep(), this.options.sweepIntervalMs);
    this.sweepTimer.unref();
    this.log.info('discovery started', {
      source: this.source.name,
      livenessTimeoutMs: this.options.livenessTimeoutMs,
    });
  }

  private register(observation: InboundDatagram): DeviceRecord {
    const existing = this.registry.get(observation.address);
    const beacon = parseBeacon(observation.payload);
    if (existing) {
      this.observe(existing, observation, beacon);
      return existing;
    }
    const now = this.clock.now();
    const record: DeviceRecord = {
      address: observation.address,
      port: observation.port,
      firstSeen: now,
      lastSeen: now,
      statusBytes: Buffer.from(observation.payload),
      status: beacon?.status ?? null,
      uploadOk: beacon?.uploadOk ?? false,
    };
    this.registry.set(record.address, record);
    this.latestAddress = record.address;
    this.log.info('device discovered', { address: record.address, status: record.status?.status });
    this.emit('deviceDiscovered', snapshotOf(record));
    return record;
  }

  private observe(record: DeviceRecord, datagram: InboundDatagram, beacon: Beacon | null): void {
    record.lastSeen = this.clock.now();
    record.port = datagram.port;
    this.latestAddress = record.address;
    if (beacon) {
      record.statusBytes = Buffer.from(datagram.payload);
      record.status = beacon.status ?? record.status;
      if (beacon.uploadOk && !record.uploadOk) {
        this.log.info('device reported upload ok', { address: record.address });
      }
      record.uploadOk = record.uploadOk || beacon.uploadOk;
    }
    this.emit('deviceUpdated', snapshotOf(record));
  }

  private settleProbe(address: string, result: ProbeResult): void {
    const entry = this.pending.get(address);
    if (!entry) {
      return;
    }
    clearTimeout(entry.timer);
    this.pending.delete(address);
    entry.waiters.forEach((resolve) => resolve(result));
  }

  private mostRecentAddress(): string | null {
    let latest: DeviceRecord | null = null;
    for (const record of this.registry.values()) {
      if (!latest || record.lastSeen > latest.lastSeen) {
        latest = record;
      }
    }
    return latest?.address ?? null;
  }

  private emit(event: DiscoveryEvent, device: DeviceSnapshot): void {
    this.listeners.get(event)?.forEach((listener) => {
      try {
        listener(device);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.log.warn('discovery listener error', { event, message });
      }
    });
  }
}
