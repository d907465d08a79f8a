import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from '../src/lib/errors';
import { createRaster, fromImageData, getPixel, toImageData } from '../src/lib/raster';

describe('createRaster', () => {
  it('fills with the background color by default', () => {
    const image = createRaster(2, 1);
    expect(Array.from(image.data)).toEqual([41, 41, 41, 41, 41, 41]);
  });

  it('rejects empty sizes', () => {
    expect(() => createRaster(0, 3)).toThrow(InvalidArgumentError);
  });
});

describe('RGBA conversion', () => {
  it('drops alpha without compositing', () => {
    const image = fromImageData({ width: 2, height: 1, data: [1, 2, 3, 0, 4, 5, 6, 255] });
    expect(Array.from(image.data)).toEqual([1, 2, 3, 4, 5, 6]);
    expect(getPixel(image, 1, 0)).toEqual([4, 5, 6]);
  });

  it('expands to opaque RGBA', () => {
    const rgba = toImageData({ width: 1, height: 2, data: new Uint8ClampedArray([9, 8, 7, 6, 5, 4]) });
    expect(Array.from(rgba.data)).toEqual([9, 8, 7, 255, 6, 5, 4, 255]);
  });

  it('rejects buffers of the wrong length', () => {
    expect(() => fromImageData({ width: 2, height: 2, data: [0, 0, 0, 0] })).toThrow(InvalidArgumentError);
    expect(() => toImageData({ width: 2, height: 1, data: new Uint8ClampedArray(3) })).toThrow(InvalidArgumentError);
  });
});
