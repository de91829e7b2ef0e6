/**
 * Per-style layer layout for a photo change at eased progress `e`.
 *
 *   fade   from: opacity 1-e                 to: opacity e
 *   slide  from: x = -width*e                to: x = width*(1-e)
 *   zoom   from: scale 1 -> 0.8, fading out  to: scale 1.2 -> 1, fading in
 *
 * Layers are ordered back to front.
 */

import { lerp } from '../../utils/math';
import { IDENTITY_TRANSFORM, type RenderLayer, type TransitionStyle } from '../types/transition';

export function idleLayers(committed: number | null): RenderLayer[] {
  return [{ entryIndex: committed, opacity: 1, transform: IDENTITY_TRANSFORM }];
}

export function transitionLayers(
  style: TransitionStyle,
  from: number | null,
  to: number | null,
  eased: number,
  viewportWidth: number
): RenderLayer[] {
  switch (style) {
    case 'fade':
      return [
        { entryIndex: from, opacity: 1 - eased, transform: IDENTITY_TRANSFORM },
        { entryIndex: to, opacity: eased, transform: IDENTITY_TRANSFORM },
      ];
    case 'slide':
      return [
        { entryIndex: from, opacity: 1, transform: { translateX: -viewportWidth * eased, translateY: 0, scale: 1 } },
        { entryIndex: to, opacity: 1, transform: { translateX: viewportWidth * (1 - eased), translateY: 0, scale: 1 } },
      ];
    case 'zoom':
      return [
        { entryIndex: from, opacity: 1 - eased, transform: { translateX: 0, translateY: 0, scale: lerp(1, 0.8, eased) } },
        { entryIndex: to, opacity: eased, transform: { translateX: 0, translateY: 0, scale: lerp(1.2, 1, eased) } },
      ];
    case 'none':
      return idleLayers(to);
  }
}
