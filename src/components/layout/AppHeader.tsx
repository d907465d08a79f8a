/**
 * Application header bar: title, upload count and a reset action.
 */

import React from 'react';
import { usePixelShuffle } from '../../hooks/usePixelShuffle';

export function AppHeader() {
  const { state, reset } = usePixelShuffle();
  const count = state.order.length;

  return (
    <header className="app-header">
      <div className="header-branding">
        <h1 className="app-title">Pixel Shuffle</h1>
      </div>

      <div className="header-controls">
        {count > 0 && (
          <>
            <span className="header-count">
              {count} image{count === 1 ? '' : 's'}
            </span>
            <button type="button" className="btn btn-sm btn-danger" onClick={reset}>
              Clear All
            </button>
          </>
        )}
      </div>
    </header>
  );
}
