/**
 * Raster builders shared by the specs.
 */

import { BACKGROUND, type Rgb } from '../src/lib/color';
import type { RasterImage } from '../src/lib/raster';

export const RED: Rgb = [255, 0, 0];
export const GREEN: Rgb = [0, 255, 0];
export const BLUE: Rgb = [0, 0, 255];

export function rasterFrom(
  width: number,
  height: number,
  colorAt: (x: number, y: number) => Rgb,
): RasterImage {
  const data = new Uint8ClampedArray(width * height * 3);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = (y * width + x) * 3;
      const [r, g, b] = colorAt(x, y);
      data[i] = r;
      data[i + 1] = g;
      data[i + 2] = b;
    }
  }
  return { width, height, data };
}

/** 50x50 image, 25px blocks, only the top-left block red. */
export function redCornerImage(): RasterImage {
  return rasterFrom(50, 50, (x, y) => (x < 25 && y < 25 ? RED : BACKGROUND));
}

export function sortedColors(colors: Iterable<Rgb>): string[] {
  return [...colors].map((c) => c.join(',')).sort();
}
