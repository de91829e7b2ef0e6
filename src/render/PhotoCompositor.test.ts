import { describe, it, expect } from 'vitest';
import { PhotoCompositor } from './PhotoCompositor';
import { FakeSurface } from '../../test/mocks';
import { IDENTITY_TRANSFORM, type RenderLayer } from '../core/types/transition';

const images = ['img:0', 'img:1'];
const resolve = (index: number) => images[index];

describe('PhotoCompositor', () => {
  it('clears, then draws layers back to front', () => {
    const surface = new FakeSurface();
    const layers: RenderLayer[] = [
      { entryIndex: 0, opacity: 0.75, transform: IDENTITY_TRANSFORM },
      { entryIndex: 1, opacity: 0.25, transform: IDENTITY_TRANSFORM },
    ];

    new PhotoCompositor(surface).render(layers, resolve);
    expect(surface.frames).toBe(1);
    expect(surface.draws.map((d) => [d.image, d.opacity])).toEqual([
      ['img:0', 0.75],
      ['img:1', 0.25],
    ]);
  });

  it('skips invisible layers', () => {
    const surface = new FakeSurface();
    new PhotoCompositor(surface).render([{ entryIndex: 0, opacity: 0, transform: IDENTITY_TRANSFORM }], resolve);
    expect(surface.draws).toEqual([]);
  });

  it('draws blank layers as the placeholder, or nothing without one', () => {
    const blank: RenderLayer[] = [{ entryIndex: null, opacity: 1, transform: IDENTITY_TRANSFORM }];

    const bare = new FakeSurface();
    new PhotoCompositor(bare).render(blank, resolve);
    expect(bare.draws).toEqual([]);

    const branded = new FakeSurface();
    new PhotoCompositor(branded, 'img:logo').render(blank, resolve);
    expect(branded.images).toEqual(['img:logo']);
  });

  it('uses the placeholder while a photo is still decoding', () => {
    const surface = new FakeSurface();
    const compositor = new PhotoCompositor<string>(surface, 'img:logo');
    compositor.render([{ entryIndex: 5, opacity: 1, transform: IDENTITY_TRANSFORM }], resolve);
    expect(surface.images).toEqual(['img:logo']);

    compositor.setPlaceholder(null);
    compositor.render([{ entryIndex: 5, opacity: 1, transform: IDENTITY_TRANSFORM }], resolve);
    expect(surface.images).toEqual([]);
  });
});
