import type { TimelineEntry } from './timeline';
import type { TransitionState } from './transition';

/**
 * Read-only snapshot of the scheduler's playback state. Consumers get copies;
 * the live state is only mutated by the scheduler.
 */
export interface PlaybackState {
  readonly isPlaying: boolean;
  readonly currentTimeSeconds: number;
  readonly durationSeconds: number;
  readonly volume: number;
  readonly muted: boolean;
  readonly rate: number;
  /** Committed entry, or `null` before the first photo / without photos */
  readonly activeEntryIndex: number | null;
  readonly transition: TransitionState | null;
}

export interface TimeUpdate {
  currentTime: number;
  duration: number;
}

export interface PhotoChange {
  index: number | null;
  entry: TimelineEntry | null;
}
