/**
 * FrameLoop - owns the per-frame callback.
 *
 * Runs on `requestAnimationFrame` in a browser and on a 16 ms timer
 * elsewhere. Both the frame source and the clock are injectable so the loop
 * can be stepped by hand in tests.
 */

import type { Disposable } from '../core/Disposable';

export interface Clock {
  /** Milliseconds, monotonic. */
  now(): number;
}

export interface FrameRequester {
  request(callback: () => void): number;
  cancel(handle: number): void;
}

export const performanceClock: Clock = {
  now: () => performance.now(),
};

const TIMER_INTERVAL_MS = 16;

class TimerFrameRequester implements FrameRequester {
  private nextHandle = 1;
  private timers = new Map<number, ReturnType<typeof setTimeout>>();

  request(callback: () => void): number {
    const handle = this.nextHandle++;
    this.timers.set(
      handle,
      setTimeout(() => {
        this.timers.delete(handle);
        callback();
      }, TIMER_INTERVAL_MS)
    );
    return handle;
  }

  cancel(handle: number): void {
    const timer = this.timers.get(handle);
    if (timer !== undefined) {
      clearTimeout(timer);
      this.timers.delete(handle);
    }
  }
}

export function defaultFrameRequester(): FrameRequester {
  if (typeof requestAnimationFrame === 'function' && typeof cancelAnimationFrame === 'function') {
    return {
      request: (callback) => requestAnimationFrame(() => callback()),
      cancel: (handle) => cancelAnimationFrame(handle),
    };
  }
  return new TimerFrameRequester();
}

export class FrameLoop implements Disposable {
  private handle: number | null = null;
  private active = false;

  constructor(
    private readonly requester: FrameRequester,
    private readonly onFrame: () => void
  ) {}

  get running(): boolean {
    return this.active;
  }

  /** Schedule ticks until `stop()` (idempotent). */
  start(): void {
    if (this.active) return;
    this.active = true;
    this.handle = this.requester.request(this.tick);
  }

  /** Cancel the pending tick (idempotent). */
  stop(): void {
    this.active = false;
    if (this.handle !== null) {
      this.requester.cancel(this.handle);
      this.handle = null;
    }
  }

  dispose(): void {
    this.stop();
  }

  private tick = (): void => {
    this.handle = null;
    if (!this.active) return;
    this.onFrame();
    // onFrame may have stopped the loop, or stopped and restarted it
    if (this.active && this.handle === null) {
      this.handle = this.requester.request(this.tick);
    }
  };
}
