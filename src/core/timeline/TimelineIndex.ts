/**
 * TimelineIndex - "which entry is active at time T" over a built timeline.
 *
 * Binary search for the rightmost entry whose offset is <= T:
 * - T before the first photo (or no photos, or NaN) -> null, never the last photo
 * - T at or past audio end -> last entry, since the transport clamps position
 *
 * Read-only. A changed photo set means a new Timeline and a new index.
 */

import type { Timeline, TimelineEntry } from '../types/timeline';

export class TimelineIndex {
  private readonly offsets: Float64Array;

  constructor(readonly timeline: Timeline) {
    this.offsets = Float64Array.from(timeline.entries, (entry) => entry.offsetSeconds);
  }

  get size(): number {
    return this.offsets.length;
  }

  get isEmpty(): boolean {
    return this.offsets.length === 0;
  }

  get durationSeconds(): number {
    return this.timeline.audioDurationSeconds;
  }

  getEntries(): readonly TimelineEntry[] {
    return this.timeline.entries;
  }

  getEntry(index: number | null): TimelineEntry | null {
    if (index === null) return null;
    return this.timeline.entries[index] ?? null;
  }

  /** Index of the entry shown at `timeSeconds`, or `null` when none is. O(log n). */
  activeEntryAt(timeSeconds: number): number | null {
    const offsets = this.offsets;
    if (offsets.length === 0 || Number.isNaN(timeSeconds)) return null;

    let lo = 0;
    let hi = offsets.length - 1;
    let found = -1;
    while (lo <= hi) {
      const mid = (lo + hi) >>> 1;
      if ((offsets[mid] ?? Infinity) <= timeSeconds) {
        found = mid;
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }
    return found === -1 ? null : found;
  }

  entryAt(timeSeconds: number): TimelineEntry | null {
    return this.getEntry(this.activeEntryAt(timeSeconds));
  }

  /** Exclusive end of an entry's display window. */
  entryEndSeconds(index: number): number {
    const entry = this.timeline.entries[index];
    if (!entry) return NaN;
    return entry.offsetSeconds + entry.displayDurationSeconds;
  }
}
