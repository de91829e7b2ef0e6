import type { LayerTransform } from '../core/types/transition';

/** Where photos end up. Implementations decide how an image is fitted. */
export interface DrawingSurface<TImage> {
  readonly width: number;
  readonly height: number;
  /** Draw `image` fitted and centered, with `transform` applied about the center. */
  drawScaledCentered(image: TImage, opacity: number, transform: LayerTransform): void;
  clear(): void;
}

/** Decodes photos by resource reference. */
export interface ImageSource<TImage> {
  load(resourceRef: string): Promise<TImage>;
  /** Free a decoded image once it leaves the cache. */
  release?(image: TImage): void;
}
