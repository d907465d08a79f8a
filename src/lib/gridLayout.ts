/**
 * Flatten a BlockGrid into the square cell list shown by the animated
 * HTML grid. The square's side is the larger of the column and row
 * counts; positions past the grid's own bounds show as background.
 */

import { type BlockGrid, cellKey, gridColumns, gridRows } from './blockGrid';
import { BACKGROUND, formatRgb } from './color';

export interface GridCell {
  column: number;
  row: number;
  /** CSS color, `rgb(r, g, b)` */
  color: string;
  colored: boolean;
}

export interface GridLayout {
  size: number;
  /** size * size cells, row-major */
  cells: GridCell[];
}

const BACKGROUND_CSS = formatRgb(BACKGROUND);

export function layoutGrid(grid: BlockGrid): GridLayout {
  const size = Math.max(gridColumns(grid), gridRows(grid));
  const cells: GridCell[] = [];

  for (let row = 0; row < size; row++) {
    for (let column = 0; column < size; column++) {
      const color = grid.cells.get(cellKey(column, row));
      cells.push(
        color
          ? { column, row, color: formatRgb(color), colored: true }
          : { column, row, color: BACKGROUND_CSS, colored: false },
      );
    }
  }

  return { size, cells };
}
