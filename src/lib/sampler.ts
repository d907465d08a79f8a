/**
 * Downsample a raster into a BlockGrid.
 *
 * Each block takes the exact color of its top-left pixel; there is no
 * averaging. A trailing partial block (blockSize not dividing the image)
 * is sampled the same way. Background-colored blocks are left out.
 */

import { type BlockGrid, type CellKey, assertBlockSize, cellKey, createBlockGrid } from './blockGrid';
import { type Rgb, isBackground } from './color';
import { type RasterImage, assertRaster, getPixel } from './raster';

export function sample(image: RasterImage, blockSize: number): BlockGrid {
  assertBlockSize(blockSize);
  assertRaster(image);

  const cells = new Map<CellKey, Rgb>();
  for (let y = 0, row = 0; y < image.height; y += blockSize, row++) {
    for (let x = 0, column = 0; x < image.width; x += blockSize, column++) {
      const color = getPixel(image, x, y);
      if (isBackground(color)) continue;
      cells.set(cellKey(column, row), color);
    }
  }

  return createBlockGrid(
    { blockSize, pixelWidth: image.width, pixelHeight: image.height },
    cells,
  );
}
