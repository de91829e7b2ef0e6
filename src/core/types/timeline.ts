/**
 * Timeline value types shared by the parser, builder, index, scheduler and
 * export pipeline.
 */

/**
 * Opaque handle to a photo (id, URL or sandbox-relative name). Validated and
 * resolved by the storage layer; never interpreted as a filesystem path here.
 */
export type ResourceRef = string;

/**
 * Calendar date-time with second precision and no timezone. `epochSeconds`
 * is a linear second count derived from the civil calendar alone, meaningful
 * only for differences between timestamps of the same batch.
 */
export interface NaiveTimestamp {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly epochSeconds: number;
}

/** A file name's parsed identity */
export interface TimestampedFile {
  readonly absoluteTime: NaiveTimestamp;
  /** Name as supplied, kept for diagnostics and tie-breaking */
  readonly originalName: string;
}

/** Builder input: a parsed photo plus the handle used to display it */
export interface PhotoInput {
  readonly file: TimestampedFile;
  readonly resourceRef: ResourceRef;
}

/** One photo's slot on the timeline */
export interface TimelineEntry {
  /** Seconds from audio start, in [0, audioDurationSeconds) */
  readonly offsetSeconds: number;
  readonly resourceRef: ResourceRef;
  /** Seconds until the next entry, or until audio end for the last one */
  readonly displayDurationSeconds: number;
  readonly sourceTimestamp: NaiveTimestamp;
  readonly sourceName: string;
}

export type ExclusionReason = 'before-start' | 'after-end' | 'duplicate-offset';

/** A photo left out of the timeline, reported as a build warning */
export interface ExcludedPhoto {
  readonly file: TimestampedFile;
  readonly resourceRef: ResourceRef;
  readonly offsetSeconds: number;
  readonly reason: ExclusionReason;
}

/** The complete synchronization map for one project (immutable) */
export interface Timeline {
  readonly audioStartTime: NaiveTimestamp;
  readonly audioDurationSeconds: number;
  /** Strictly increasing offsets, gap-free up to audio end */
  readonly entries: readonly TimelineEntry[];
  readonly excluded: readonly ExcludedPhoto[];
}

/** Non-fatal diagnostic produced while building a timeline */
export interface BuildWarning {
  readonly reason: ExclusionReason;
  readonly filename: string;
  readonly offsetSeconds: number;
  readonly message: string;
}
