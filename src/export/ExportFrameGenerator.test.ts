import { describe, it, expect } from 'vitest';
import { generateFrameSequence, planExport } from './ExportFrameGenerator';
import { ValidationError } from '../core/errors';
import { timelineAt } from '../../test/utils';

describe('generateFrameSequence', () => {
  // Photos at 2s and 5s of an 8s recording
  const timeline = timelineAt([2, 5], 8);

  it('EXP-001: fills the time before the first photo with placeholder frames', () => {
    const frames = generateFrameSequence(timeline, 2);

    expect(frames).toHaveLength(16);
    expect(frames.slice(0, 4).every((f) => f.resourceRef === 'placeholder' && f.entryIndex === null)).toBe(true);
    expect(frames.slice(4, 10).every((f) => f.resourceRef === 'p2' && f.entryIndex === 0)).toBe(true);
    expect(frames.slice(10).every((f) => f.resourceRef === 'p5' && f.entryIndex === 1)).toBe(true);
    expect(frames.map((f) => f.frameIndex)).toEqual(Array.from({ length: 16 }, (_, i) => i));
  });

  it('EXP-002: is deterministic', () => {
    expect(generateFrameSequence(timeline, 30)).toEqual(generateFrameSequence(timeline, 30));
  });

  it('EXP-003: defaults to 30 fps', () => {
    expect(generateFrameSequence(timeline)).toHaveLength(240);
  });

  it('EXP-004: an empty timeline is all placeholder', () => {
    const frames = generateFrameSequence(timelineAt([], 3), 2, 'blank');
    expect(frames.map((f) => f.resourceRef)).toEqual(['blank', 'blank', 'blank', 'blank', 'blank', 'blank']);
  });

  it('EXP-005: rounds each slot separately', () => {
    // Slots of 3s and 7.5s at 3 fps: 9 + round(22.5) = 32
    expect(generateFrameSequence(timelineAt([0, 3], 10.5), 3)).toHaveLength(32);
  });

  it.each([0, -1, Number.NaN, 121])('EXP-006: rejects frame rate %s', (rate) => {
    expect(() => generateFrameSequence(timeline, rate)).toThrow(ValidationError);
  });

  it('EXP-007: accepts the maximum frame rate', () => {
    expect(generateFrameSequence(timelineAt([], 1), 120)).toHaveLength(120);
  });
});

describe('planExport', () => {
  const timeline = timelineAt([2, 5], 8);

  it('EXP-010: hard cuts produce one segment per slot', () => {
    const plan = planExport(timeline, { frameRate: 2 });

    expect(plan.totalFrames).toBe(16);
    expect(plan.stills).toEqual([]);
    expect(plan.segments).toEqual([
      { startFrame: 0, frameCount: 4, resourceRef: 'placeholder', entryIndex: null, stillId: null },
      { startFrame: 4, frameCount: 6, resourceRef: 'p2', entryIndex: 0, stillId: null },
      { startFrame: 10, frameCount: 6, resourceRef: 'p5', entryIndex: 1, stillId: null },
    ]);
  });

  it('EXP-011: cross-fades replace the head of every following slot', () => {
    const plan = planExport(timeline, { frameRate: 2, crossfadeFrames: 2 });

    expect(plan.stills).toEqual([
      { id: 'xfade-0-0', fromRef: 'placeholder', toRef: 'p2', mix: 1 / 3 },
      { id: 'xfade-0-1', fromRef: 'placeholder', toRef: 'p2', mix: 2 / 3 },
      { id: 'xfade-1-0', fromRef: 'p2', toRef: 'p5', mix: 1 / 3 },
      { id: 'xfade-1-1', fromRef: 'p2', toRef: 'p5', mix: 2 / 3 },
    ]);
    expect(plan.segments.map((s) => [s.startFrame, s.frameCount, s.stillId ?? s.resourceRef])).toEqual([
      [0, 4, 'placeholder'],
      [4, 1, 'xfade-0-0'],
      [5, 1, 'xfade-0-1'],
      [6, 4, 'p2'],
      [10, 1, 'xfade-1-0'],
      [11, 1, 'xfade-1-1'],
      [12, 4, 'p5'],
    ]);
    expect(plan.totalFrames).toBe(16);
  });

  it('EXP-012: caps a cross-fade at the slot length', () => {
    const plan = planExport(timeline, { frameRate: 2, crossfadeFrames: 10 });
    const firstSlot = plan.stills.filter((s) => s.id.startsWith('xfade-0-'));

    expect(firstSlot).toHaveLength(6);
    expect(firstSlot.map((s) => s.mix)).toEqual([1, 2, 3, 4, 5, 6].map((k) => k / 7));
  });

  it('EXP-013: the first slot never cross-fades', () => {
    const plan = planExport(timelineAt([0, 5], 8), { frameRate: 2, crossfadeFrames: 2 });
    expect(plan.stills.map((s) => s.id)).toEqual(['xfade-1-0', 'xfade-1-1']);
  });

  it.each([-1, 1.5, Number.NaN])('EXP-014: rejects cross-fade length %s', (crossfadeFrames) => {
    expect(() => planExport(timeline, { crossfadeFrames })).toThrow(
      `Cross-fade length must be a whole number of frames >= 0, got ${crossfadeFrames}`
    );
  });

  it('EXP-015: reports an invalid frame rate', () => {
    expect(() => planExport(timeline, { frameRate: 0 })).toThrow('Frame rate must be in (0, 120], got 0');
  });
});
