/**
 * RasterImage: a width × height grid of RGB bytes, row-major, no alpha.
 *
 * Conversions to and from canvas-style RGBA buffers live here so the rest
 * of the pipeline never sees an alpha channel. Alpha is discarded, not
 * composited: a transparent pixel keeps whatever RGB it stores.
 */

import { BACKGROUND, type Rgb } from './color';
import { InvalidArgumentError } from './errors';

export interface RasterImage {
  readonly width: number;
  readonly height: number;
  /** width * height * 3 bytes */
  readonly data: Uint8ClampedArray;
}

/** Structural match for ImageData, so conversions run without a DOM. */
export interface RgbaPixels {
  readonly width: number;
  readonly height: number;
  readonly data: ArrayLike<number>;
}

function assertSize(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new InvalidArgumentError(`Image must have positive integer size, got ${width}x${height}`);
  }
}

export function assertRaster(image: RasterImage): void {
  assertSize(image.width, image.height);
  if (image.data.length !== image.width * image.height * 3) {
    throw new InvalidArgumentError(
      `Raster buffer holds ${image.data.length} bytes, expected ${image.width * image.height * 3}`,
    );
  }
}

/** New raster with every pixel set to `fill`. */
export function createRaster(width: number, height: number, fill: Rgb = BACKGROUND): RasterImage {
  assertSize(width, height);
  const data = new Uint8ClampedArray(width * height * 3);
  const [r, g, b] = fill;
  for (let i = 0; i < data.length; i += 3) {
    data[i] = r;
    data[i + 1] = g;
    data[i + 2] = b;
  }
  return { width, height, data };
}

export function getPixel(image: RasterImage, x: number, y: number): Rgb {
  const i = (y * image.width + x) * 3;
  return [image.data[i], image.data[i + 1], image.data[i + 2]];
}

/** Drop the alpha channel from an RGBA buffer. */
export function fromImageData(pixels: RgbaPixels): RasterImage {
  const { width, height, data: src } = pixels;
  assertSize(width, height);
  if (src.length !== width * height * 4) {
    throw new InvalidArgumentError(`RGBA buffer holds ${src.length} bytes, expected ${width * height * 4}`);
  }

  const data = new Uint8ClampedArray(width * height * 3);
  for (let p = 0, i = 0, o = 0; p < width * height; p++, i += 4, o += 3) {
    data[o] = src[i];
    data[o + 1] = src[i + 1];
    data[o + 2] = src[i + 2];
  }
  return { width, height, data };
}

/** Expand to an opaque RGBA buffer suitable for `new ImageData(...)`. */
export function toImageData(image: RasterImage) {
  assertRaster(image);
  const { width, height, data: src } = image;
  const data = new Uint8ClampedArray(width * height * 4);
  for (let p = 0, i = 0, o = 0; p < width * height; p++, i += 3, o += 4) {
    data[o] = src[i];
    data[o + 1] = src[i + 1];
    data[o + 2] = src[i + 2];
    data[o + 3] = 255;
  }
  return { width, height, data };
}
