import type { Database } from 'better-sqlite3';
import {
  formatDuration,
  type CaptureTimestampInput,
  type CaptureTimestampResult,
  type EpisodeGuide,
  type RecordingAction,
  type RecordingState,
} from '@showdesk/shared';
import {
  EpisodeGuideItemRepository,
  EpisodeGuideRepository,
  type UpdateEpisodeGuideDTO,
} from '../repositories/index.js';
import { runInTransaction } from '../db/transaction.js';
import { ConflictError, NotFoundError } from '../types/errors.js';
import { withFormattedTimestamp } from './episode-guide-item.service.js';

/** Seconds a client-reported elapsed time may run ahead of the server clock. */
export const ELAPSED_TOLERANCE_SECONDS = 5;

export type Clock = () => Date;

function secondsBetween(startIso: string | null, end: Date): number {
  if (startIso === null) {
    return 0;
  }
  const start = Date.parse(startIso);
  if (Number.isNaN(start)) {
    return 0;
  }
  return Math.max(0, Math.floor((end.getTime() - start) / 1000));
}

export function toRecordingState(guide: EpisodeGuide): RecordingState {
  return {
    status: guide.status,
    recording_started_at: guide.recording_started_at,
    recording_ended_at: guide.recording_ended_at,
    total_duration_seconds: guide.total_duration_seconds,
    formatted_duration: formatDuration(guide.total_duration_seconds),
  };
}

/**
 * Recording timer: draft -> recording -> completed, with reopen back to
 * draft (timestamps kept) and reset to draft (timestamps cleared).
 * Durations are always computed from the server clock.
 */
export class RecordingService {
  private db: Database;
  private guideRepo: EpisodeGuideRepository;
  private itemRepo: EpisodeGuideItemRepository;
  private now: Clock;

  constructor(db: Database, now: Clock = () => new Date()) {
    this.db = db;
    this.guideRepo = new EpisodeGuideRepository(db);
    this.itemRepo = new EpisodeGuideItemRepository(db);
    this.now = now;
  }

  private load(guideId: number): EpisodeGuide {
    const guide = this.guideRepo.findById(guideId);
    if (!guide) {
      throw new NotFoundError('Episode guide', guideId);
    }
    return guide;
  }

  private save(guideId: number, update: UpdateEpisodeGuideDTO): EpisodeGuide {
    const updated = this.guideRepo.update(guideId, update);
    if (!updated) {
      throw new NotFoundError('Episode guide', guideId);
    }
    return updated;
  }

  start(guide: EpisodeGuide): RecordingState {
    const updated = runInTransaction(this.db, () => {
      const current = this.load(guide.id);
      if (current.status !== 'draft') {
        throw new ConflictError(`Cannot start recording: guide is ${current.status}`);
      }
      return this.save(current.id, {
        status: 'recording',
        recording_started_at: this.now().toISOString(),
        recording_ended_at: null,
        total_duration_seconds: null,
      });
    });
    return toRecordingState(updated);
  }

  stop(guide: EpisodeGuide): RecordingState {
    const updated = runInTransaction(this.db, () => {
      const current = this.load(guide.id);
      if (current.status !== 'recording') {
        throw new ConflictError(`Cannot stop recording: guide is ${current.status}`);
      }
      const endedAt = this.now();
      return this.save(current.id, {
        status: 'completed',
        recording_ended_at: endedAt.toISOString(),
        total_duration_seconds: secondsBetween(current.recording_started_at, endedAt),
      });
    });
    return toRecordingState(updated);
  }

  reopen(guide: EpisodeGuide): RecordingState {
    const updated = runInTransaction(this.db, () => {
      const current = this.load(guide.id);
      if (current.status !== 'completed') {
        throw new ConflictError(`Cannot reopen: guide is ${current.status}`);
      }
      return this.save(current.id, { status: 'draft' });
    });
    return toRecordingState(updated);
  }

  /**
   * Back to draft from any state, clearing recording times and every
   * item's timestamp and discussed flag.
   */
  reset(guide: EpisodeGuide): RecordingState {
    const updated = runInTransaction(this.db, () => {
      this.itemRepo.clearRecordingMarks(guide.id);
      return this.save(guide.id, {
        status: 'draft',
        recording_started_at: null,
        recording_ended_at: null,
        total_duration_seconds: null,
      });
    });
    return toRecordingState(updated);
  }

  apply(guide: EpisodeGuide, action: RecordingAction): RecordingState {
    switch (action) {
      case 'start':
        return this.start(guide);
      case 'stop':
        return this.stop(guide);
      case 'reset':
        return this.reset(guide);
    }
  }

  /**
   * Stamp an item with the current elapsed recording time and mark it
   * discussed. A client-reported elapsed value is used when it is within
   * tolerance of the server's; otherwise the server's value is used.
   */
  captureTimestamp(
    guide: EpisodeGuide,
    itemId: number,
    input: CaptureTimestampInput
  ): CaptureTimestampResult {
    const { updated, elapsed } = runInTransaction(this.db, () => {
      const item = this.itemRepo.findInGuide(guide.id, itemId);
      if (!item) {
        throw new NotFoundError('Item', itemId);
      }
      const current = this.load(guide.id);
      if (current.status !== 'recording') {
        throw new ConflictError('Timestamps can only be captured while recording');
      }

      const serverElapsed = secondsBetween(current.recording_started_at, this.now());
      const reported = input.elapsed_seconds;
      const elapsed =
        reported !== undefined && reported <= serverElapsed + ELAPSED_TOLERANCE_SECONDS
          ? reported
          : serverElapsed;

      const updated = this.itemRepo.update(item.id, {
        timestamp_seconds: elapsed,
        discussed: true,
      });
      if (!updated) {
        throw new NotFoundError('Item', itemId);
      }
      return { updated, elapsed };
    });

    return {
      item: withFormattedTimestamp(updated),
      timestamp_seconds: elapsed,
      timestamp_formatted: formatDuration(elapsed),
    };
  }
}
