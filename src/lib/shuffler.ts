/**
 * Scatter a grid's colored blocks to random positions.
 *
 * The colors are kept as a multiset; their positions become a uniformly
 * random injective mapping into every position of the grid, not just the
 * ones that were occupied before. The input grid is never touched.
 */

import {
  type BlockGrid,
  type CellKey,
  cellKey,
  createBlockGrid,
  gridColumns,
  gridRows,
} from './blockGrid';
import type { Rgb } from './color';
import { CapacityExceededError } from './errors';
import { type RandomSource, defaultRandom, shuffleInPlace } from './random';

/**
 * What to do when a grid holds more colored cells than it has positions
 * (only reachable with a hand-assembled BlockGrid):
 *   reject   - throw CapacityExceededError
 *   truncate - place as many as fit, in map order, drop the rest
 */
export type OverflowPolicy = 'reject' | 'truncate';

export interface ShuffleOptions {
  overflow?: OverflowPolicy;
}

export function shuffle(
  grid: BlockGrid,
  random: RandomSource = defaultRandom,
  options: ShuffleOptions = {},
): BlockGrid {
  const { overflow = 'reject' } = options;
  const columns = gridColumns(grid);
  const rows = gridRows(grid);
  const available = columns * rows;
  const colors: Rgb[] = [...grid.cells.values()];

  if (colors.length > available && overflow === 'reject') {
    throw new CapacityExceededError(colors.length, available);
  }

  const positions: CellKey[] = [];
  for (let row = 0; row < rows; row++) {
    for (let column = 0; column < columns; column++) {
      positions.push(cellKey(column, row));
    }
  }
  shuffleInPlace(positions, random);

  const placed = Math.min(colors.length, available);
  const entries: [CellKey, Rgb][] = [];
  for (let i = 0; i < placed; i++) {
    entries.push([positions[i], colors[i]]);
  }

  return createBlockGrid(
    { blockSize: grid.blockSize, pixelWidth: grid.pixelWidth, pixelHeight: grid.pixelHeight },
    entries,
  );
}
