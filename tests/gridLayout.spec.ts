import { describe, it, expect } from 'vitest';
import { cellKey, createBlockGrid } from '../src/lib/blockGrid';
import { layoutGrid } from '../src/lib/gridLayout';
import { sample } from '../src/lib/sampler';
import { GREEN, redCornerImage } from './fixtures';

describe('layoutGrid', () => {
  it('lists a square grid row by row', () => {
    const layout = layoutGrid(sample(redCornerImage(), 25));
    expect(layout.size).toBe(2);
    expect(layout.cells).toHaveLength(4);
    expect(layout.cells[0]).toEqual({ column: 0, row: 0, color: 'rgb(255, 0, 0)', colored: true });
    expect(layout.cells[1]).toEqual({ column: 1, row: 0, color: 'rgb(41, 41, 41)', colored: false });
    expect(layout.cells[3]).toEqual({ column: 1, row: 1, color: 'rgb(41, 41, 41)', colored: false });
  });

  it('pads a wide grid to a square of background cells', () => {
    const grid = createBlockGrid(
      { blockSize: 2, pixelWidth: 6, pixelHeight: 2 },
      [[cellKey(2, 0), GREEN]],
    );
    const layout = layoutGrid(grid);
    expect(layout.size).toBe(3);
    expect(layout.cells).toHaveLength(9);
    expect(layout.cells[2]).toEqual({ column: 2, row: 0, color: 'rgb(0, 255, 0)', colored: true });
    expect(layout.cells.filter((c) => c.colored)).toHaveLength(1);
    expect(layout.cells[6]).toEqual({ column: 0, row: 2, color: 'rgb(41, 41, 41)', colored: false });
  });
});
