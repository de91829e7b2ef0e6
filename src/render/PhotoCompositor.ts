import type { DrawingSurface } from './DrawingSurface';
import type { RenderLayer } from '../core/types/transition';

/**
 * Draws a layer list onto a surface, back to front.
 *
 * `null` layers (before the first photo) draw the placeholder image when one
 * is configured, or nothing. Layers whose photo is still decoding are drawn
 * the same way.
 */
export class PhotoCompositor<TImage> {
  constructor(
    private readonly surface: DrawingSurface<TImage>,
    private placeholder: TImage | null = null
  ) {}

  setPlaceholder(image: TImage | null): void {
    this.placeholder = image;
  }

  render(layers: readonly RenderLayer[], resolve: (entryIndex: number) => TImage | undefined): void {
    this.surface.clear();
    for (const layer of layers) {
      if (layer.opacity <= 0) continue;
      const image = layer.entryIndex === null ? this.placeholder : resolve(layer.entryIndex) ?? this.placeholder;
      if (image === null) continue;
      this.surface.drawScaledCentered(image, Math.min(1, layer.opacity), layer.transform);
    }
  }
}
