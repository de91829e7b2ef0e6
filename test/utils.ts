/**
 * Test utilities: timeline fixtures built through the real parser and builder.
 */

import { buildTimeline } from '../src/core/timeline/TimelineBuilder';
import { parseTimestamp } from '../src/core/timeline/TimestampParser';
import type { NaiveTimestamp, PhotoInput, Timeline } from '../src/core/types/timeline';

export const AUDIO_NAME = '2025-10-24-14:00:00.mp3';

export function timestampOf(name: string): NaiveTimestamp {
  return parseTimestamp(name).absoluteTime;
}

/** Photo named after the given wall-clock time; resourceRef defaults to the name. */
export function photo(name: string, resourceRef: string = name): PhotoInput {
  return { file: parseTimestamp(name), resourceRef };
}

/**
 * Timeline for a recording starting at 14:00:00 with photos at the given
 * offsets (seconds, < 3600). Photo names are `HH:MM:SS.jpg` stamps, refs are
 * `p<offset>`.
 */
export function timelineAt(offsets: readonly number[], durationSeconds = 600): Timeline {
  const start = timestampOf(AUDIO_NAME);
  const photos = offsets.map((offset) => {
    const minutes = Math.floor(offset / 60);
    const seconds = offset % 60;
    const name = `2025-10-24-14:${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}.jpg`;
    return photo(name, `p${offset}`);
  });
  return buildTimeline(start, durationSeconds, photos);
}
