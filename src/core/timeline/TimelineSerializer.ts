/**
 * Timeline Serializer
 *
 * Saves a built timeline as versioned JSON (project metadata, timeline UI
 * data) and restores it. Restoring re-runs the builder over the stored
 * photos, so a loaded timeline always satisfies the builder's invariants even
 * if the stored durations were edited by hand.
 */

import { TIMELINE_JSON_VERSION } from '../../config/TimelineConfig';
import { ParseError, ValidationError } from '../errors';
import { isFiniteNumber } from '../../utils/math';
import { buildTimeline } from './TimelineBuilder';
import { formatTimestamp, parseTimestamp } from './TimestampParser';
import type { ExclusionReason, NaiveTimestamp, PhotoInput, Timeline } from '../types/timeline';

export interface TimelineEntryJSON {
  offsetSeconds: number;
  displayDurationSeconds: number;
  resourceRef: string;
  sourceName: string;
  /** `YYYY-MM-DD-HH:MM:SS` */
  sourceTimestamp: string;
}

export interface ExcludedPhotoJSON {
  offsetSeconds: number;
  resourceRef: string;
  sourceName: string;
  sourceTimestamp: string;
  reason: ExclusionReason;
}

export interface TimelineJSON {
  version: number;
  audioStartTime: string;
  audioDurationSeconds: number;
  entries: TimelineEntryJSON[];
  excluded: ExcludedPhotoJSON[];
}

type JSONRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JSONRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(record: JSONRecord, key: string, where: string): string {
  const value = record[key];
  if (typeof value !== 'string') {
    throw new ValidationError(`${where}.${key} must be a string`);
  }
  return value;
}

function readNumber(record: JSONRecord, key: string, where: string): number {
  const value = record[key];
  if (!isFiniteNumber(value)) {
    throw new ValidationError(`${where}.${key} must be a finite number`);
  }
  return value;
}

function readArray(record: JSONRecord, key: string, where: string): unknown[] {
  const value = record[key];
  if (!Array.isArray(value)) {
    throw new ValidationError(`${where}.${key} must be an array`);
  }
  return value;
}

function readTimestamp(record: JSONRecord, key: string, where: string): NaiveTimestamp {
  const text = readString(record, key, where);
  try {
    return parseTimestamp(text).absoluteTime;
  } catch (error) {
    if (error instanceof ParseError) {
      throw new ValidationError(`${where}.${key}: ${error.message}`);
    }
    throw error;
  }
}

function readPhoto(value: unknown, where: string): PhotoInput {
  if (!isRecord(value)) {
    throw new ValidationError(`${where} must be an object`);
  }
  return {
    file: {
      absoluteTime: readTimestamp(value, 'sourceTimestamp', where),
      originalName: readString(value, 'sourceName', where),
    },
    resourceRef: readString(value, 'resourceRef', where),
  };
}

export class TimelineSerializer {
  static toJSON(timeline: Timeline): TimelineJSON {
    return {
      version: TIMELINE_JSON_VERSION,
      audioStartTime: formatTimestamp(timeline.audioStartTime),
      audioDurationSeconds: timeline.audioDurationSeconds,
      entries: timeline.entries.map((entry) => ({
        offsetSeconds: entry.offsetSeconds,
        displayDurationSeconds: entry.displayDurationSeconds,
        resourceRef: entry.resourceRef,
        sourceName: entry.sourceName,
        sourceTimestamp: formatTimestamp(entry.sourceTimestamp),
      })),
      excluded: timeline.excluded.map((item) => ({
        offsetSeconds: item.offsetSeconds,
        resourceRef: item.resourceRef,
        sourceName: item.file.originalName,
        sourceTimestamp: formatTimestamp(item.file.absoluteTime),
        reason: item.reason,
      })),
    };
  }

  /**
   * Restore a timeline from `toJSON` output (already parsed from text).
   *
   * @throws ValidationError for unknown versions or malformed fields
   */
  static fromJSON(data: unknown): Timeline {
    if (!isRecord(data)) {
      throw new ValidationError('Timeline JSON must be an object');
    }

    const version = readNumber(data, 'version', 'timeline');
    if (version !== TIMELINE_JSON_VERSION) {
      throw new ValidationError(`Unsupported timeline version ${version}`);
    }

    const audioStart = readTimestamp(data, 'audioStartTime', 'timeline');
    const duration = readNumber(data, 'audioDurationSeconds', 'timeline');

    const photos = [
      ...readArray(data, 'entries', 'timeline').map((item, i) => readPhoto(item, `timeline.entries[${i}]`)),
      ...readArray(data, 'excluded', 'timeline').map((item, i) => readPhoto(item, `timeline.excluded[${i}]`)),
    ];

    return buildTimeline(audioStart, duration, photos);
  }

  static stringify(timeline: Timeline): string {
    return JSON.stringify(TimelineSerializer.toJSON(timeline), null, 2);
  }

  /** @throws ValidationError for invalid JSON text or shape */
  static parse(text: string): Timeline {
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new ValidationError(`Timeline JSON is not valid JSON: ${String(error)}`);
    }
    return TimelineSerializer.fromJSON(data);
  }
}
