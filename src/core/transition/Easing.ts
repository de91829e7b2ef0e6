/**
 * Easing curves for photo transitions. Each maps progress t in [0, 1] to
 * eased progress in [0, 1] with f(0) = 0 and f(1) = 1.
 */

export type EasingFunction = (t: number) => number;

export const EASINGS = {
  linear: (t: number) => t,
  easeInQuad: (t: number) => t * t,
  easeOutQuad: (t: number) => t * (2 - t),
  easeInOutQuad: (t: number) => (t < 0.5 ? 2 * t * t : -1 + (4 - 2 * t) * t),
  easeInCubic: (t: number) => t * t * t,
  easeOutCubic: (t: number) => {
    const u = t - 1;
    return u * u * u + 1;
  },
  easeInOutCubic: (t: number) => (t < 0.5 ? 4 * t * t * t : (t - 1) * (2 * t - 2) * (2 * t - 2) + 1),
} satisfies Record<string, EasingFunction>;

export type EasingName = keyof typeof EASINGS;

export const DEFAULT_EASING: EasingName = 'easeInOutQuad';

export function isEasingName(value: string): value is EasingName {
  return Object.prototype.hasOwnProperty.call(EASINGS, value);
}

export function getEasing(name: EasingName): EasingFunction {
  return EASINGS[name];
}
