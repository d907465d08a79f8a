import { describe, it, expect } from 'vitest';
import { cellKey } from '../src/lib/blockGrid';
import { BACKGROUND, isBackground } from '../src/lib/color';
import { InvalidArgumentError } from '../src/lib/errors';
import { sample } from '../src/lib/sampler';
import { GREEN, RED, rasterFrom, redCornerImage } from './fixtures';

describe('sample', () => {
  it('maps a single red block in a 2x2 grid', () => {
    const grid = sample(redCornerImage(), 25);
    expect(grid.blockSize).toBe(25);
    expect(grid.pixelWidth).toBe(50);
    expect(grid.pixelHeight).toBe(50);
    expect([...grid.cells]).toEqual([[0, [255, 0, 0]]]);
  });

  it('yields an empty map for an all-background image', () => {
    const grid = sample(rasterFrom(10, 10, () => BACKGROUND), 5);
    expect(grid.cells.size).toBe(0);
  });

  it('reads only the top-left pixel of each block', () => {
    // Block (1, 0) covers x 2..3; only (2, 0) is green
    const image = rasterFrom(4, 4, (x, y) => (x === 2 && y === 0 ? GREEN : RED));
    const grid = sample(image, 2);
    expect(grid.cells.get(cellKey(1, 0))).toEqual([0, 255, 0]);
    expect(grid.cells.get(cellKey(0, 0))).toEqual([255, 0, 0]);
    expect(grid.cells.size).toBe(4);
  });

  it('samples trailing partial blocks from their top-left pixel', () => {
    const image = rasterFrom(7, 5, (x, y) => [x * 10, y * 10, 100]);
    const grid = sample(image, 3);
    expect(grid.cells.size).toBe(6);
    expect(grid.cells.get(cellKey(2, 0))).toEqual([60, 0, 100]);
    expect(grid.cells.get(cellKey(2, 1))).toEqual([60, 30, 100]);
    expect(grid.cells.get(cellKey(0, 1))).toEqual([0, 30, 100]);
  });

  it('never stores the background color', () => {
    const image = rasterFrom(8, 8, (x, y) => ((x + y) % 4 === 0 ? BACKGROUND : [x, y, 7]));
    const grid = sample(image, 2);
    for (const color of grid.cells.values()) {
      expect(isBackground(color)).toBe(false);
    }
  });

  it('is deterministic', () => {
    const image = rasterFrom(9, 6, (x, y) => [x * 20, y * 30, (x + y) * 5]);
    expect(sample(image, 2)).toEqual(sample(image, 2));
  });

  it('rejects non-positive or fractional block sizes', () => {
    const image = redCornerImage();
    expect(() => sample(image, 0)).toThrow(InvalidArgumentError);
    expect(() => sample(image, -5)).toThrow(InvalidArgumentError);
    expect(() => sample(image, 2.5)).toThrow(InvalidArgumentError);
  });

  it('rejects an image with zero width or height', () => {
    const empty = { width: 0, height: 4, data: new Uint8ClampedArray(0) };
    expect(() => sample(empty, 2)).toThrow(InvalidArgumentError);
  });
});
