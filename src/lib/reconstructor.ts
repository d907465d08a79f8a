/**
 * Render a BlockGrid back to a full-size raster.
 * The raster starts as BACKGROUND; each stored cell paints its square,
 * clipped at the right and bottom edges.
 */

import { type BlockGrid, assertBlockSize, cellCoord } from './blockGrid';
import { BACKGROUND } from './color';
import { type RasterImage, createRaster } from './raster';

export function reconstruct(grid: BlockGrid): RasterImage {
  const { blockSize, pixelWidth, pixelHeight } = grid;
  assertBlockSize(blockSize);
  const image = createRaster(pixelWidth, pixelHeight, BACKGROUND);
  const { data } = image;

  for (const [key, [r, g, b]] of grid.cells) {
    const { column, row } = cellCoord(key);
    const x0 = column * blockSize;
    const y0 = row * blockSize;
    const x1 = Math.min(x0 + blockSize, pixelWidth);
    const y1 = Math.min(y0 + blockSize, pixelHeight);

    for (let y = y0; y < y1; y++) {
      let i = (y * pixelWidth + x0) * 3;
      for (let x = x0; x < x1; x++, i += 3) {
        data[i] = r;
        data[i + 1] = g;
        data[i + 2] = b;
      }
    }
  }

  return image;
}
