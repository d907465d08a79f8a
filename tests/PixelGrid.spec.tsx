import React from 'react';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { cleanup, render, screen } from '@testing-library/react';
import { PixelGrid } from '../src/components/grid/PixelGrid';
import { sample } from '../src/lib/sampler';
import { redCornerImage } from './fixtures';

afterEach(cleanup);

const grid = sample(redCornerImage(), 25);

function cellsOf(container: HTMLElement): HTMLElement[] {
  return Array.from(container.querySelectorAll<HTMLElement>('.pixel'));
}

describe('PixelGrid', () => {
  it('renders one cell per grid position', () => {
    render(<PixelGrid grid={grid} animation="ready" />);
    const root = screen.getByTestId('pixel-grid');
    const cells = cellsOf(root);

    expect(root.className).toBe('pixel-grid ready');
    expect(root.style.gridTemplateColumns).toBe('repeat(2, 1fr)');
    expect(cells).toHaveLength(4);
    expect(cells[0].className).toBe('pixel colored');
    expect(cells[0].style.backgroundColor).toBe('rgb(255, 0, 0)');
    expect(cells[1].className).toBe('pixel');
    expect(cells[1].style.backgroundColor).toBe('rgb(41, 41, 41)');
  });

  it('marks the grid as shaking', () => {
    render(<PixelGrid grid={grid} animation="shaking" />);
    const root = screen.getByTestId('pixel-grid');
    expect(root.className).toBe('pixel-grid shaking');
    expect(root.querySelectorAll('.pixel.colored')).toHaveLength(1);
  });

  it('staggers every cell while initializing', () => {
    const random = vi.fn(() => 0.5);
    render(<PixelGrid grid={grid} animation="initializing" random={random} />);
    const cells = cellsOf(screen.getByTestId('pixel-grid'));

    expect(random).toHaveBeenCalledTimes(4);
    for (const cell of cells) {
      expect(cell.classList.contains('initializing')).toBe(true);
      expect(cell.style.animationDelay).toBe('0.1s');
    }
  });
});
