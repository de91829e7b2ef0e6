import { describe, it, expect } from 'vitest';
import { buildTimeline, buildTimelineFromFilenames, getBuildWarnings } from './TimelineBuilder';
import { ParseError, ValidationError } from '../errors';
import { AUDIO_NAME, photo, timelineAt, timestampOf } from '../../../test/utils';

const start = timestampOf(AUDIO_NAME); // 2025-10-24 14:00:00

describe('TimelineBuilder', () => {
  describe('buildTimeline', () => {
    it('TLB-001: places photos by offset and fills until the next one', () => {
      const timeline = buildTimeline(start, 600, [
        photo('2025-10-24-14:05:00.jpg', 'c'),
        photo('2025-10-24-14:00:30.jpg', 'a'),
        photo('2025-10-24-14:02:00.jpg', 'b'),
      ]);

      expect(timeline.entries.map((e) => [e.resourceRef, e.offsetSeconds, e.displayDurationSeconds])).toEqual([
        ['a', 30, 90],
        ['b', 120, 180],
        ['c', 300, 300],
      ]);
      expect(timeline.excluded).toEqual([]);
    });

    it('TLB-002: photos at the last second are kept, at audio end excluded', () => {
      const timeline = buildTimeline(start, 600, [
        photo('2025-10-24-13:59:59.jpg'),
        photo('2025-10-24-14:00:00.jpg'),
        photo('2025-10-24-14:09:59.jpg'),
        photo('2025-10-24-14:10:00.jpg'),
      ]);

      expect(timeline.entries.map((e) => [e.offsetSeconds, e.displayDurationSeconds])).toEqual([
        [0, 599],
        [599, 1],
      ]);
      expect(timeline.excluded.map((x) => [x.file.originalName, x.reason, x.offsetSeconds])).toEqual([
        ['2025-10-24-13:59:59.jpg', 'before-start', -1],
        ['2025-10-24-14:10:00.jpg', 'after-end', 600],
      ]);
    });

    it('TLB-003: keeps the lexicographically smallest name for a shared second', () => {
      const timeline = buildTimeline(start, 600, [
        photo('2025-10-24-14:02:15.png', 'png'),
        photo('2025-10-24-14:02:15.jpg', 'jpg'),
        photo('2025-10-24-14:01:00.jpg', 'earlier'),
      ]);

      expect(timeline.entries.map((e) => [e.resourceRef, e.offsetSeconds, e.displayDurationSeconds])).toEqual([
        ['earlier', 60, 75],
        ['jpg', 135, 465],
      ]);
      expect(timeline.excluded).toHaveLength(1);
      expect(timeline.excluded[0]).toMatchObject({
        resourceRef: 'png',
        offsetSeconds: 135,
        reason: 'duplicate-offset',
      });
    });

    it('TLB-004: durations cover the audio from the first photo to the end', () => {
      const timeline = timelineAt([5, 17, 18, 250, 251, 599], 600);
      const first = timeline.entries[0];
      const total = timeline.entries.reduce((sum, e) => sum + e.displayDurationSeconds, 0);

      expect(first?.offsetSeconds).toBe(5);
      expect(total).toBe(595);
      const starts = timeline.entries.map((e) => e.offsetSeconds);
      const ends = timeline.entries.map((e) => e.offsetSeconds + e.displayDurationSeconds);
      expect(starts).toEqual([5, 17, 18, 250, 251, 599]);
      expect(ends.slice(0, -1)).toEqual(starts.slice(1));
      expect(ends.at(-1)).toBe(600);
    });

    it('TLB-005: empty and fully excluded inputs give an empty timeline', () => {
      expect(buildTimeline(start, 600, []).entries).toEqual([]);

      const allOut = buildTimeline(start, 10, [photo('2025-10-24-14:00:10.jpg'), photo('2025-10-24-13:00:00.jpg')]);
      expect(allOut.entries).toEqual([]);
      expect(allOut.excluded.map((x) => x.reason)).toEqual(['after-end', 'before-start']);
    });

    it('TLB-006: zero-length audio excludes every photo', () => {
      const timeline = buildTimeline(start, 0, [photo('2025-10-24-14:00:00.jpg')]);
      expect(timeline.entries).toEqual([]);
      expect(timeline.excluded[0]?.reason).toBe('after-end');
    });

    it('TLB-007: rejects negative or non-finite durations', () => {
      expect(() => buildTimeline(start, -1, [])).toThrow(ValidationError);
      expect(() => buildTimeline(start, Number.NaN, [])).toThrow(ValidationError);
      expect(() => buildTimeline(start, Infinity, [])).toThrow(
        'Audio duration must be a finite number >= 0, got Infinity'
      );
    });

    it('TLB-008: returns a frozen timeline', () => {
      const timeline = timelineAt([10]);
      expect(Object.isFrozen(timeline)).toBe(true);
      expect(Object.isFrozen(timeline.entries)).toBe(true);
      expect(Object.isFrozen(timeline.entries[0])).toBe(true);
    });

    it('TLB-009: the result does not depend on input order', () => {
      const photos = [
        photo('2025-10-24-14:03:00.jpg', 'x'),
        photo('2025-10-24-14:01:00.png', 'y'),
        photo('2025-10-24-14:01:00.jpg', 'z'),
      ];
      const forward = buildTimeline(start, 600, photos);
      const reversed = buildTimeline(start, 600, [...photos].reverse());
      expect(reversed.entries).toEqual(forward.entries);
    });
  });

  describe('getBuildWarnings', () => {
    it('TLB-020: describes each exclusion', () => {
      const timeline = buildTimeline(start, 60, [
        photo('2025-10-24-13:59:00.jpg'),
        photo('2025-10-24-14:05:00.jpg'),
        photo('2025-10-24-14:00:10.png'),
        photo('2025-10-24-14:00:10.jpg'),
      ]);

      expect(getBuildWarnings(timeline)).toEqual([
        {
          reason: 'before-start',
          filename: '2025-10-24-13:59:00.jpg',
          offsetSeconds: -60,
          message: '2025-10-24-13:59:00.jpg was skipped: taken before the recording started',
        },
        {
          reason: 'after-end',
          filename: '2025-10-24-14:05:00.jpg',
          offsetSeconds: 300,
          message: '2025-10-24-14:05:00.jpg was skipped: taken after the recording ended',
        },
        {
          reason: 'duplicate-offset',
          filename: '2025-10-24-14:00:10.png',
          offsetSeconds: 10,
          message: '2025-10-24-14:00:10.png was skipped: shares its second with another photo',
        },
      ]);
    });
  });

  describe('buildTimelineFromFilenames', () => {
    it('TLB-030: parses names, keeps refs and reports unparseable photos', () => {
      const { timeline, parseErrors } = buildTimelineFromFilenames(AUDIO_NAME, 600, [
        { name: '2025-10-24-14:01:00.jpg', resourceRef: 'blob:1' },
        { name: 'DSC0001.jpg', resourceRef: 'blob:2' },
        { name: '2025-10-24-14:00:20.jpg', resourceRef: 'blob:3' },
      ]);

      expect(timeline.entries.map((e) => [e.resourceRef, e.offsetSeconds])).toEqual([
        ['blob:3', 20],
        ['blob:1', 60],
      ]);
      expect(parseErrors.map((error) => error.filename)).toEqual(['DSC0001.jpg']);
    });

    it('TLB-031: same file name uploaded twice keeps both refs in order', () => {
      const { timeline } = buildTimelineFromFilenames(AUDIO_NAME, 600, [
        { name: '2025-10-24-14:01:00.jpg', resourceRef: 'first' },
        { name: '2025-10-24-14:01:00.jpg', resourceRef: 'second' },
      ]);

      expect(timeline.entries.map((e) => e.resourceRef)).toEqual(['first']);
      expect(timeline.excluded.map((x) => x.resourceRef)).toEqual(['second']);
    });

    it('TLB-032: an unparseable audio name is fatal', () => {
      expect(() => buildTimelineFromFilenames('recording.mp3', 600, [])).toThrow(ParseError);
    });
  });
});
