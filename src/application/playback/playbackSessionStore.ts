import path from 'node:path';
import type { PlaybackSession } from '@/domain/device/types';
import type { StoragePort } from '@/ports/StoragePort';
import { initialPlaybackSession } from '@/application/playback/playbackController';

/**
 * Keeps the op-id state between command invocations in data/session.json.
 */
export class PlaybackSessionStore {
  constructor(
    private readonly storage: StoragePort,
    private readonly filePath = path.resolve(process.cwd(), 'data', 'session.json'),
  ) {}

  public async load(): Promise<PlaybackSession> {
    return normalizeSession(await this.storage.readJson(this.filePath));
  }

  public async save(session: PlaybackSession): Promise<void> {
    await this.storage.writeJson(this.filePath, session);
  }
}

export function normalizeSession(raw: unknown): PlaybackSession {
  const fallback = initialPlaybackSession();
  if (typeof raw !== 'object' || raw === null) {
    return fallback;
  }
  const next = 'nextPlayOpId' in raw ? raw.nextPlayOpId : undefined;
  const last = 'lastPlayingOpId' in raw ? raw.lastPlayingOpId : undefined;
  const playing = 'assumedPlaying' in raw ? raw.assumedPlaying : undefined;
  return {
    nextPlayOpId: isOpId(next) && next !== 0 ? next : fallback.nextPlayOpId,
    lastPlayingOpId: isOpId(last) ? last : null,
    assumedPlaying: playing === true && isOpId(last),
  };
}

function isOpId(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 0xff;
}
