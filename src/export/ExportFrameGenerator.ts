/**
 * Export Frame Generator
 *
 * Bakes the playback decisions into a fixed frame grid for an external
 * encoder. Pure functions of (timeline, options): no clock, no I/O, so the
 * same input always yields the same plan.
 *
 * Each entry gets round(displayDuration * frameRate) frames, and the time
 * before the first photo gets round(firstOffset * frameRate) placeholder
 * frames. Rounding per slot means the total can differ from
 * round(audioDuration * frameRate) by a frame or two; the encoder cuts the
 * video to the audio length.
 */

import { DEFAULT_EXPORT_FRAME_RATE, MAX_EXPORT_FRAME_RATE, PLACEHOLDER_RESOURCE } from '../config/ExportConfig';
import { ValidationError } from '../core/errors';
import { isFiniteNumber } from '../utils/math';
import type { ResourceRef, Timeline } from '../core/types/timeline';

// ---------------------------------------------------------------------------
// Data Model
// ---------------------------------------------------------------------------

export interface ExportFrame {
  frameIndex: number;
  resourceRef: ResourceRef;
  /** `null` for placeholder frames */
  entryIndex: number | null;
  /** Set when the frame shows a pre-blended cross-fade still */
  stillId?: string;
}

/** Pre-blended image between two slots; `mix` is the weight of `toRef`. */
export interface CrossfadeStill {
  id: string;
  fromRef: ResourceRef;
  toRef: ResourceRef;
  mix: number;
}

/** Run of consecutive frames showing the same image. */
export interface ExportSegment {
  startFrame: number;
  frameCount: number;
  resourceRef: ResourceRef;
  entryIndex: number | null;
  stillId: string | null;
}

export interface ExportOptions {
  /** Frames per second (default 30, at most 120) */
  frameRate?: number;
  /** Blended frames at the start of each incoming slot (default 0: hard cuts) */
  crossfadeFrames?: number;
  /** Resource id for frames without a photo */
  placeholderRef?: ResourceRef;
}

export interface ExportPlan {
  frameRate: number;
  frames: ExportFrame[];
  segments: ExportSegment[];
  stills: CrossfadeStill[];
  totalFrames: number;
}

// ---------------------------------------------------------------------------
// Frame sequence
// ---------------------------------------------------------------------------

interface Slot {
  resourceRef: ResourceRef;
  entryIndex: number | null;
  frameCount: number;
}

function validateFrameRate(frameRate: number): void {
  if (!isFiniteNumber(frameRate) || frameRate <= 0 || frameRate > MAX_EXPORT_FRAME_RATE) {
    throw new ValidationError(`Frame rate must be in (0, ${MAX_EXPORT_FRAME_RATE}], got ${frameRate}`);
  }
}

function slotsFor(timeline: Timeline, frameRate: number, placeholderRef: ResourceRef): Slot[] {
  const { entries } = timeline;
  const first = entries[0];
  const leadSeconds = first ? first.offsetSeconds : timeline.audioDurationSeconds;

  const slots: Slot[] = [];
  const leadFrames = Math.round(leadSeconds * frameRate);
  if (leadFrames > 0) {
    slots.push({ resourceRef: placeholderRef, entryIndex: null, frameCount: leadFrames });
  }
  entries.forEach((entry, entryIndex) => {
    const frameCount = Math.round(entry.displayDurationSeconds * frameRate);
    if (frameCount > 0) {
      slots.push({ resourceRef: entry.resourceRef, entryIndex, frameCount });
    }
  });
  return slots;
}

/**
 * One frame per slot of the export grid, hard cuts only.
 *
 * @throws ValidationError for a frame rate outside (0, 120]
 */
export function generateFrameSequence(
  timeline: Timeline,
  frameRate: number = DEFAULT_EXPORT_FRAME_RATE,
  placeholderRef: ResourceRef = PLACEHOLDER_RESOURCE
): ExportFrame[] {
  validateFrameRate(frameRate);

  const frames: ExportFrame[] = [];
  for (const slot of slotsFor(timeline, frameRate, placeholderRef)) {
    for (let i = 0; i < slot.frameCount; i++) {
      frames.push({ frameIndex: frames.length, resourceRef: slot.resourceRef, entryIndex: slot.entryIndex });
    }
  }
  return frames;
}

// ---------------------------------------------------------------------------
// Full plan
// ---------------------------------------------------------------------------

function stillId(entryIndex: number | null, step: number): string {
  return `xfade-${entryIndex ?? 'placeholder'}-${step}`;
}

function toSegments(frames: readonly ExportFrame[]): ExportSegment[] {
  const segments: ExportSegment[] = [];
  let current: ExportSegment | null = null;
  for (const frame of frames) {
    const still = frame.stillId ?? null;
    if (current && current.resourceRef === frame.resourceRef && current.stillId === still && current.entryIndex === frame.entryIndex) {
      current.frameCount++;
    } else {
      current = {
        startFrame: frame.frameIndex,
        frameCount: 1,
        resourceRef: frame.resourceRef,
        entryIndex: frame.entryIndex,
        stillId: still,
      };
      segments.push(current);
    }
  }
  return segments;
}

/**
 * Frame grid plus the segment list and cross-fade stills an encoder needs.
 *
 * A cross-fade replaces the first `crossfadeFrames` frames of every slot
 * that follows another slot (capped at the slot's length). Still `k` of `n`
 * blends with weight (k + 1) / (n + 1), so neither endpoint is repeated.
 *
 * @throws ValidationError for an invalid frame rate or cross-fade length
 */
export function planExport(timeline: Timeline, options: ExportOptions = {}): ExportPlan {
  const frameRate = options.frameRate ?? DEFAULT_EXPORT_FRAME_RATE;
  const crossfadeFrames = options.crossfadeFrames ?? 0;
  const placeholderRef = options.placeholderRef ?? PLACEHOLDER_RESOURCE;

  validateFrameRate(frameRate);
  if (!Number.isInteger(crossfadeFrames) || crossfadeFrames < 0) {
    throw new ValidationError(`Cross-fade length must be a whole number of frames >= 0, got ${crossfadeFrames}`);
  }

  const frames: ExportFrame[] = [];
  const stills: CrossfadeStill[] = [];
  let previous: Slot | null = null;

  for (const slot of slotsFor(timeline, frameRate, placeholderRef)) {
    const blended = previous ? Math.min(crossfadeFrames, slot.frameCount) : 0;
    for (let i = 0; i < slot.frameCount; i++) {
      const frame: ExportFrame = { frameIndex: frames.length, resourceRef: slot.resourceRef, entryIndex: slot.entryIndex };
      if (previous && i < blended) {
        const still: CrossfadeStill = {
          id: stillId(slot.entryIndex, i),
          fromRef: previous.resourceRef,
          toRef: slot.resourceRef,
          mix: (i + 1) / (blended + 1),
        };
        stills.push(still);
        frame.stillId = still.id;
      }
      frames.push(frame);
    }
    previous = slot;
  }

  return {
    frameRate,
    frames,
    segments: toSegments(frames),
    stills,
    totalFrames: frames.length,
  };
}
