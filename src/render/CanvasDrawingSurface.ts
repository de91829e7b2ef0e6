import type { DrawingSurface } from './DrawingSurface';
import type { LayerTransform } from '../core/types/transition';

/** Subset of CanvasRenderingContext2D the surface touches. */
export interface Canvas2DContextLike<TImage> {
  readonly canvas: { readonly width: number; readonly height: number };
  globalAlpha: number;
  fillStyle: string | CanvasGradient | CanvasPattern;
  save(): void;
  restore(): void;
  translate(x: number, y: number): void;
  scale(x: number, y: number): void;
  fillRect(x: number, y: number, width: number, height: number): void;
  drawImage(image: TImage, dx: number, dy: number, dw: number, dh: number): void;
}

/** Decoded image with known pixel size (ImageBitmap, canvas, loaded <img>). */
export type SizedImage = CanvasImageSource & { readonly width: number; readonly height: number };

const BACKGROUND = '#000';

/**
 * 2D canvas surface. Photos are contain-fitted and centered; layer
 * transforms are applied about the viewport center.
 */
export class CanvasDrawingSurface<TImage extends SizedImage = ImageBitmap> implements DrawingSurface<TImage> {
  constructor(private readonly ctx: Canvas2DContextLike<TImage>) {}

  get width(): number {
    return this.ctx.canvas.width;
  }

  get height(): number {
    return this.ctx.canvas.height;
  }

  clear(): void {
    const ctx = this.ctx;
    ctx.save();
    ctx.globalAlpha = 1;
    ctx.fillStyle = BACKGROUND;
    ctx.fillRect(0, 0, this.width, this.height);
    ctx.restore();
  }

  drawScaledCentered(image: TImage, opacity: number, transform: LayerTransform): void {
    const { width: viewW, height: viewH } = this;
    if (image.width <= 0 || image.height <= 0 || viewW <= 0 || viewH <= 0) return;

    const fit = Math.min(viewW / image.width, viewH / image.height);
    const drawW = image.width * fit;
    const drawH = image.height * fit;

    const ctx = this.ctx;
    ctx.save();
    ctx.globalAlpha = opacity;
    ctx.translate(viewW / 2 + transform.translateX, viewH / 2 + transform.translateY);
    ctx.scale(transform.scale, transform.scale);
    ctx.drawImage(image, -drawW / 2, -drawH / 2, drawW, drawH);
    ctx.restore();
  }
}
