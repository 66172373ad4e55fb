import type { PlaybackTarget, StopEcho } from '@/config/device';
import type { DeviceSnapshot, PlaybackSession } from '@/domain/device/types';
import { TransportError } from '@/domain/errors';
import { buildPlayCommand, buildStopCommand, nextPlayOpId, type BytePair } from '@/domain/protocol/commands';
import { FIRST_PLAY_OP_ID, PLAY_NONCE_LENGTH } from '@/domain/protocol/constants';
import type { DatagramTransport } from '@/ports/DatagramTransport';
import type { NonceSource } from '@/ports/NonceSource';
import type { StatusSnapshotProvider } from '@/ports/StatusSnapshotProvider';
import { createLogger } from '@/shared/logging/logger';

export interface PlaybackControllerOptions {
  controlPort: number;
  broadcastAddress: string;
  target: PlaybackTarget;
  stopEcho: StopEcho;
}

export type PlayResult =
  | { kind: 'sent'; opId: number; destination: string; command: Buffer }
  | { kind: 'no-device-status' }
  | { kind: 'already-playing'; opId: number | null }
  | { kind: 'send-failed'; error: TransportError };

export type StopResult =
  | { kind: 'sent'; opId: number; destination: string; command: Buffer; nextPlayOpId: number }
  | { kind: 'no-device-status' }
  | { kind: 'not-playing' }
  | { kind: 'send-failed'; error: TransportError };

export type ConfirmedState = 'playing' | 'idle';

export function initialPlaybackSession(): PlaybackSession {
  return { nextPlayOpId: FIRST_PLAY_OP_ID, lastPlayingOpId: null, assumedPlaying: false };
}

/**
 * Idle/Playing state machine for the device's program trigger.
 *
 * State only changes after a command was handed to the socket; the device never
 * confirms the visual effect, so `assumedPlaying` is what the controller believes.
 */
export class PlaybackController {
  private readonly log = createLogger('Playback');
  private state: PlaybackSession;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly transport: DatagramTransport,
    private readonly status: StatusSnapshotProvider,
    private readonly nonces: NonceSource,
    private readonly options: PlaybackControllerOptions,
    initial: PlaybackSession = initialPlaybackSession(),
  ) {
    this.state = { ...initial };
  }

  public session(): PlaybackSession {
    return { ...this.state };
  }

  public play(address?: string): Promise<PlayResult> {
    return this.serialize(() => this.sendPlay(address));
  }

  public stop(address?: string): Promise<StopResult> {
    return this.serialize(() => this.sendStop(address));
  }

  private async sendPlay(address?: string): Promise<PlayResult> {
    if (this.state.assumedPlaying) {
      this.log.info('play ignored; already playing', { opId: this.state.lastPlayingOpId });
      return { kind: 'already-playing', opId: this.state.lastPlayingOpId };
    }
    const snapshot = this.status.snapshot(address);
    if (!snapshot?.status) {
      this.log.warn('play needs a device status packet first', { address });
      return { kind: 'no-device-status' };
    }

    const opId = this.state.nextPlayOpId;
    const nonce = this.nonces.bytes(PLAY_NONCE_LENGTH);
    const command = buildPlayCommand(opId, [nonce[0], nonce[1]], snapshot.status.timestamp);
    const destination = this.destinationFor(snapshot);
    try {
      await this.transport.send(command, destination, this.options.controlPort);
    } catch (error) {
      const transportError = TransportError.fromSocketError(error, 'send-failed');
      this.log.warn('play command send failed', { destination, message: transportError.message });
      return { kind: 'send-failed', error: transportError };
    }

    this.state = { nextPlayOpId: opId, lastPlayingOpId: opId, assumedPlaying: true };
    this.log.info('play command sent', { opId, destination, command });
    return { kind: 'sent', opId, destination, command };
  }

  private async sendStop(address?: string): Promise<StopResult> {
    const last = this.state.lastPlayingOpId;
    if (!this.state.assumedPlaying || last === null) {
      this.log.info('stop ignored; not playing');
      return { kind: 'not-playing' };
    }
    const snapshot = this.status.snapshot(address);
    const echo: BytePair | null = this.options.stopEcho === 'zero' ? null : snapshot?.status?.timestamp ?? null;
    if ((this.options.stopEcho === 'timestamp' && !echo) || (this.options.target === 'device' && !snapshot)) {
      this.log.warn('stop needs a device status packet first', { address });
      return { kind: 'no-device-status' };
    }

    const command = buildStopCommand(last, echo);
    const destination = this.destinationFor(snapshot);
    try {
      await this.transport.send(command, destination, this.options.controlPort);
    } catch (error) {
      const transportError = TransportError.fromSocketError(error, 'send-failed');
      this.log.warn('stop command send failed', { destination, message: transportError.message });
      return { kind: 'send-failed', error: transportError };
    }

    const next = nextPlayOpId(last);
    this.state = { nextPlayOpId: next, lastPlayingOpId: last, assumedPlaying: false };
    this.log.info('stop command sent', { opId: command[1], destination, nextPlayOpId: next, command });
    return { kind: 'sent', opId: command[1], destination, command, nextPlayOpId: next };
  }

  /**
   * Records what a person (or camera) saw the device do.
   */
  public confirm(state: ConfirmedState): PlaybackSession {
    this.state = { ...this.state, assumedPlaying: state === 'playing' };
    this.log.info('playback state confirmed externally', { state });
    return this.session();
  }

  /** Commands run one at a time so each sees the state the previous one left. */
  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private destinationFor(snapshot: DeviceSnapshot | null): string {
    if (this.options.target === 'device' && snapshot) {
      return snapshot.address;
    }
    return this.options.broadcastAddress;
  }
}
