/**
 * Scrubber helpers: where each photo sits on a 0..1 track, and which marker a
 * pointer position hits. Pure functions over an immutable Timeline.
 */

import { MARKER_HIT_TOLERANCE } from '../../config/TimelineConfig';
import { clamp } from '../../utils/math';
import { formatClock } from '../../utils/Timecode';
import type { Timeline } from '../types/timeline';

export interface TimelineMarker {
  index: number;
  /** Position on the track, offset / audio duration */
  fraction: number;
  offsetSeconds: number;
  /** Clock label for tooltips, e.g. `02:15` */
  label: string;
}

export function markerPositions(timeline: Timeline): TimelineMarker[] {
  const duration = timeline.audioDurationSeconds;
  return timeline.entries.map((entry, index) => ({
    index,
    fraction: duration > 0 ? entry.offsetSeconds / duration : 0,
    offsetSeconds: entry.offsetSeconds,
    label: formatClock(entry.offsetSeconds),
  }));
}

/**
 * Nearest marker within `tolerance` of a track position, or `null`.
 * Ties go to the earlier marker.
 */
export function findMarkerNear(
  timeline: Timeline,
  fraction: number,
  tolerance: number = MARKER_HIT_TOLERANCE
): number | null {
  let best: number | null = null;
  let bestDistance = Infinity;
  for (const marker of markerPositions(timeline)) {
    const distance = Math.abs(marker.fraction - fraction);
    if (distance <= tolerance && distance < bestDistance) {
      best = marker.index;
      bestDistance = distance;
    }
  }
  return best;
}

/** Track position to playback time, clamped into [0, duration]. */
export function fractionToTime(timeline: Timeline, fraction: number): number {
  if (Number.isNaN(fraction)) return 0;
  return clamp(fraction, 0, 1) * timeline.audioDurationSeconds;
}
