/**
 * Animated HTML block grid.
 * Colored cells shudder while the image is being shaken; on BUILD every
 * cell pops in with a small random delay.
 */

import React, { useMemo } from 'react';
import { CONFIG } from '../../config';
import type { AnimationState } from '../../context/AppContext';
import type { BlockGrid } from '../../lib/blockGrid';
import { layoutGrid } from '../../lib/gridLayout';
import { type RandomSource, defaultRandom } from '../../lib/random';

interface PixelGridProps {
  grid: BlockGrid;
  animation: AnimationState;
  /** Source for pop-in delays */
  random?: RandomSource;
}

export function PixelGrid({ grid, animation, random = defaultRandom }: PixelGridProps) {
  const layout = useMemo(() => layoutGrid(grid), [grid]);

  const delays = useMemo(
    () => animation === 'initializing'
      ? layout.cells.map(() => random() * CONFIG.initializeDelayMax)
      : null,
    [layout, animation, random],
  );

  return (
    <div
      className={`pixel-grid ${animation}`}
      data-testid="pixel-grid"
      style={{
        gridTemplateColumns: `repeat(${layout.size}, 1fr)`,
        width: CONFIG.gridDisplaySize,
        height: CONFIG.gridDisplaySize,
      }}
    >
      {layout.cells.map((cell, idx) => {
        const classes = ['pixel'];
        if (cell.colored) classes.push('colored');
        if (delays) classes.push('initializing');

        return (
          <div
            key={`${cell.column},${cell.row}`}
            className={classes.join(' ')}
            style={{
              backgroundColor: cell.color,
              animationDelay: delays ? `${delays[idx]}s` : undefined,
            }}
          />
        );
      })}
    </div>
  );
}
