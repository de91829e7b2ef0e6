/**
 * TimelineBuilder - places parsed photos on the audio timeline.
 *
 * offset = photoTime - audioStart. Photos outside [0, duration) and photos
 * sharing a second with a lexicographically smaller name are excluded and
 * kept as diagnostics. Survivors are sorted and each one is shown until the
 * next, the last until audio end.
 */

import { ParseError, ValidationError } from '../errors';
import { Logger } from '../../utils/Logger';
import { isFiniteNumber } from '../../utils/math';
import { parseFilenames, parseTimestamp, secondsBetween } from './TimestampParser';
import type {
  BuildWarning,
  ExcludedPhoto,
  NaiveTimestamp,
  PhotoInput,
  ResourceRef,
  Timeline,
  TimelineEntry,
} from '../types/timeline';

const log = new Logger('TimelineBuilder');

interface PlacedPhoto {
  input: PhotoInput;
  offsetSeconds: number;
}

function byName(a: PlacedPhoto, b: PlacedPhoto): number {
  const nameA = a.input.file.originalName;
  const nameB = b.input.file.originalName;
  // Code-unit order, independent of locale
  return nameA < nameB ? -1 : nameA > nameB ? 1 : 0;
}

function exclude(
  placed: PlacedPhoto,
  reason: ExcludedPhoto['reason']
): ExcludedPhoto {
  return Object.freeze({
    file: placed.input.file,
    resourceRef: placed.input.resourceRef,
    offsetSeconds: placed.offsetSeconds,
    reason,
  });
}

/**
 * Build the timeline for one audio recording.
 *
 * Never throws for an empty or fully excluded photo set; those produce a
 * valid timeline with no entries.
 *
 * @throws ValidationError when the audio duration is negative or not finite
 */
export function buildTimeline(
  audioStart: NaiveTimestamp,
  audioDurationSeconds: number,
  photos: readonly PhotoInput[]
): Timeline {
  if (!isFiniteNumber(audioDurationSeconds) || audioDurationSeconds < 0) {
    throw new ValidationError(`Audio duration must be a finite number >= 0, got ${audioDurationSeconds}`);
  }

  const excluded: ExcludedPhoto[] = [];
  const byOffset = new Map<number, PlacedPhoto[]>();

  for (const input of photos) {
    const placed: PlacedPhoto = {
      input,
      offsetSeconds: secondsBetween(audioStart, input.file.absoluteTime),
    };

    if (placed.offsetSeconds < 0) {
      excluded.push(exclude(placed, 'before-start'));
    } else if (placed.offsetSeconds >= audioDurationSeconds) {
      excluded.push(exclude(placed, 'after-end'));
    } else {
      const group = byOffset.get(placed.offsetSeconds);
      if (group) {
        group.push(placed);
      } else {
        byOffset.set(placed.offsetSeconds, [placed]);
      }
    }
  }

  const kept: PlacedPhoto[] = [];
  for (const group of byOffset.values()) {
    const [first, ...duplicates] = [...group].sort(byName);
    if (first) kept.push(first);
    for (const duplicate of duplicates) {
      excluded.push(exclude(duplicate, 'duplicate-offset'));
    }
  }

  kept.sort((a, b) => a.offsetSeconds - b.offsetSeconds);

  const entries: TimelineEntry[] = kept.map((placed, i) => {
    const next = kept[i + 1];
    const end = next ? next.offsetSeconds : audioDurationSeconds;
    return Object.freeze({
      offsetSeconds: placed.offsetSeconds,
      resourceRef: placed.input.resourceRef,
      displayDurationSeconds: end - placed.offsetSeconds,
      sourceTimestamp: placed.input.file.absoluteTime,
      sourceName: placed.input.file.originalName,
    });
  });

  for (const item of excluded) {
    log.warn(`Excluded ${item.file.originalName} (${item.reason}, offset ${item.offsetSeconds}s)`);
  }
  log.debug(`Built timeline: ${entries.length} entries, ${excluded.length} excluded`);

  return Object.freeze({
    audioStartTime: audioStart,
    audioDurationSeconds,
    entries: Object.freeze(entries),
    excluded: Object.freeze(excluded),
  });
}

const REASON_TEXT: Record<ExcludedPhoto['reason'], string> = {
  'before-start': 'taken before the recording started',
  'after-end': 'taken after the recording ended',
  'duplicate-offset': 'shares its second with another photo',
};

/** Exclusions of a built timeline as user-facing warnings. */
export function getBuildWarnings(timeline: Timeline): BuildWarning[] {
  return timeline.excluded.map((item) => ({
    reason: item.reason,
    filename: item.file.originalName,
    offsetSeconds: item.offsetSeconds,
    message: `${item.file.originalName} was skipped: ${REASON_TEXT[item.reason]}`,
  }));
}

export interface NamedPhoto {
  name: string;
  resourceRef: ResourceRef;
}

export interface TimelineFromFilenamesResult {
  timeline: Timeline;
  /** Photos whose names failed to parse; not part of the timeline */
  parseErrors: ParseError[];
}

/**
 * Parse the audio and photo names, then build. Unparseable photo names are
 * returned in `parseErrors`; whether they block project creation is the
 * caller's decision.
 *
 * @throws ParseError when the audio file name itself cannot be parsed
 */
export function buildTimelineFromFilenames(
  audioName: string,
  audioDurationSeconds: number,
  photos: readonly NamedPhoto[]
): TimelineFromFilenamesResult {
  const audioStart = parseTimestamp(audioName).absoluteTime;

  const { parsed, errors } = parseFilenames(photos.map((photo) => photo.name));
  for (const error of errors) {
    log.warn(error.message);
  }

  // parseFilenames keeps input order, so match parsed files back by name
  const refsByName = new Map<string, ResourceRef[]>();
  for (const photo of photos) {
    const refs = refsByName.get(photo.name) ?? [];
    refs.push(photo.resourceRef);
    refsByName.set(photo.name, refs);
  }

  const inputs: PhotoInput[] = [];
  for (const file of parsed) {
    const resourceRef = refsByName.get(file.originalName)?.shift();
    if (resourceRef !== undefined) {
      inputs.push({ file, resourceRef });
    }
  }

  return {
    timeline: buildTimeline(audioStart, audioDurationSeconds, inputs),
    parseErrors: errors,
  };
}
