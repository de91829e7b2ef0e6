/**
 * Transition types for animated photo changes during live playback.
 */

/** Visual style of a photo change. `none` is a hard cut. */
export type TransitionStyle = 'fade' | 'slide' | 'zoom' | 'none';

export const TRANSITION_STYLES: readonly TransitionStyle[] = ['fade', 'slide', 'zoom', 'none'];

/** Type guard for transition style strings (e.g. from a settings menu) */
export function isTransitionStyle(value: string): value is TransitionStyle {
  return (TRANSITION_STYLES as readonly string[]).includes(value);
}

/**
 * An in-flight photo change. Exists only while the animation runs; `null`
 * entry indices stand for the "no photo" placeholder.
 */
export interface TransitionState {
  readonly fromEntryIndex: number | null;
  readonly toEntryIndex: number | null;
  /** Monotonic clock reading (ms) when the change was detected */
  readonly startWallClock: number;
  readonly durationSeconds: number;
  readonly styleKind: TransitionStyle;
  /** Played seconds accumulated by render ticks; frozen while paused */
  readonly elapsedSeconds: number;
}

/** 2D transform applied to one drawn photo, about the viewport center */
export interface LayerTransform {
  readonly translateX: number;
  readonly translateY: number;
  readonly scale: number;
}

export const IDENTITY_TRANSFORM: LayerTransform = { translateX: 0, translateY: 0, scale: 1 };

/** One photo to draw for the current frame, back to front */
export interface RenderLayer {
  /** Entry index, or `null` for the placeholder */
  readonly entryIndex: number | null;
  readonly opacity: number;
  readonly transform: LayerTransform;
}
