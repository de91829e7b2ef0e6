import { describe, it, expect, vi, afterEach } from 'vitest';
import { FrameLoop, defaultFrameRequester } from './FrameLoop';
import { ManualFrameRequester } from '../../test/mocks';

describe('FrameLoop', () => {
  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllGlobals();
  });

  it('ticks once per frame until stopped', () => {
    const frames = new ManualFrameRequester();
    const onFrame = vi.fn();
    const loop = new FrameLoop(frames, onFrame);

    loop.start();
    loop.start();
    expect(frames.pending).toBe(1);

    frames.step();
    frames.step();
    expect(onFrame).toHaveBeenCalledTimes(2);

    loop.stop();
    expect(loop.running).toBe(false);
    expect(frames.pending).toBe(0);
    frames.step();
    expect(onFrame).toHaveBeenCalledTimes(2);
  });

  it('stops when the frame callback stops it', () => {
    const frames = new ManualFrameRequester();
    const loop: FrameLoop = new FrameLoop(frames, () => loop.stop());

    loop.start();
    frames.step();
    expect(frames.pending).toBe(0);
  });

  it('keeps a single pending frame when restarted from the callback', () => {
    const frames = new ManualFrameRequester();
    const loop: FrameLoop = new FrameLoop(frames, () => {
      loop.stop();
      loop.start();
    });

    loop.start();
    frames.step();
    expect(frames.pending).toBe(1);
    expect(loop.running).toBe(true);
  });

  it('falls back to a timer without requestAnimationFrame', () => {
    vi.useFakeTimers();
    vi.stubGlobal('requestAnimationFrame', undefined);

    const requester = defaultFrameRequester();
    const callback = vi.fn();
    requester.request(callback);
    const cancelled = requester.request(callback);
    requester.cancel(cancelled);

    vi.advanceTimersByTime(16);
    expect(callback).toHaveBeenCalledTimes(1);
  });
});
