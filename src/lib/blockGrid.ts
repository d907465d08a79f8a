/**
 * BlockGrid: a sparse map of block coordinates to colors, plus the size of
 * the raster it was sampled from.
 *
 * Coordinates are packed into a single integer key (row * KEY_STRIDE + column)
 * so the map can be keyed directly without formatting or parsing strings.
 * Background blocks are never stored; a missing key means BACKGROUND.
 */

import { type Rgb, assertRgb, isBackground } from './color';
import { InvalidArgumentError } from './errors';

// ── Types ────────────────────────────────────────────────────────────────────

export type CellKey = number;

export interface CellCoord {
  column: number;
  row: number;
}

export interface GridDimensions {
  /** Edge length in source pixels of one square block */
  blockSize: number;
  pixelWidth: number;
  pixelHeight: number;
}

export interface BlockGrid extends Readonly<GridDimensions> {
  readonly cells: ReadonlyMap<CellKey, Rgb>;
}

/** Max columns per row; also the multiplier used to pack a row into a key. */
export const KEY_STRIDE = 65536;

// ── Keys ─────────────────────────────────────────────────────────────────────

export function cellKey(column: number, row: number): CellKey {
  if (!Number.isInteger(column) || column < 0 || column >= KEY_STRIDE) {
    throw new InvalidArgumentError(`Column out of range: ${column}`);
  }
  if (!Number.isInteger(row) || row < 0 || row >= KEY_STRIDE) {
    throw new InvalidArgumentError(`Row out of range: ${row}`);
  }
  return row * KEY_STRIDE + column;
}

export function cellCoord(key: CellKey): CellCoord {
  return { column: key % KEY_STRIDE, row: Math.floor(key / KEY_STRIDE) };
}

// ── Dimensions ───────────────────────────────────────────────────────────────

export function assertBlockSize(blockSize: number): void {
  if (!Number.isInteger(blockSize) || blockSize <= 0) {
    throw new InvalidArgumentError(`Block size must be a positive integer, got ${blockSize}`);
  }
}

/**
 * Number of block columns the sampler visits, counting a trailing partial
 * block when blockSize does not divide the width.
 */
export function gridColumns(dims: GridDimensions): number {
  return Math.ceil(dims.pixelWidth / dims.blockSize);
}

export function gridRows(dims: GridDimensions): number {
  return Math.ceil(dims.pixelHeight / dims.blockSize);
}

function assertDimensions(dims: GridDimensions): void {
  assertBlockSize(dims.blockSize);
  const { pixelWidth, pixelHeight } = dims;
  if (!Number.isInteger(pixelWidth) || !Number.isInteger(pixelHeight) || pixelWidth <= 0 || pixelHeight <= 0) {
    throw new InvalidArgumentError(`Image must have positive integer size, got ${pixelWidth}x${pixelHeight}`);
  }
  if (gridColumns(dims) > KEY_STRIDE || gridRows(dims) > KEY_STRIDE) {
    throw new InvalidArgumentError(`Grid exceeds ${KEY_STRIDE} blocks per axis`);
  }
}

// ── Construction ─────────────────────────────────────────────────────────────

/**
 * Build a frozen BlockGrid, validating every entry.
 * Throws InvalidArgumentError on out-of-range or duplicate coordinates,
 * malformed colors, or entries holding the background color.
 */
export function createBlockGrid(
  dims: GridDimensions,
  entries: Iterable<readonly [CellKey, Rgb]>,
): BlockGrid {
  assertDimensions(dims);
  const columns = gridColumns(dims);
  const rows = gridRows(dims);
  const cells = new Map<CellKey, Rgb>();

  for (const [key, color] of entries) {
    const { column, row } = cellCoord(key);
    if (!Number.isInteger(key) || key < 0 || column >= columns || row >= rows) {
      throw new InvalidArgumentError(`Cell (${column}, ${row}) lies outside a ${columns}x${rows} grid`);
    }
    if (cells.has(key)) {
      throw new InvalidArgumentError(`Duplicate cell (${column}, ${row})`);
    }
    assertRgb(color);
    if (isBackground(color)) {
      throw new InvalidArgumentError(`Cell (${column}, ${row}) holds the background color`);
    }
    cells.set(key, Object.freeze([color[0], color[1], color[2]] as const));
  }

  return Object.freeze({
    blockSize: dims.blockSize,
    pixelWidth: dims.pixelWidth,
    pixelHeight: dims.pixelHeight,
    cells,
  });
}
