/**
 * Two-column workspace for the selected image.
 * Left: the uploaded original. Right: BUILD / SHAKE controls, the
 * reconstructed block image and the animated grid.
 */

import React from 'react';
import { usePixelShuffle } from '../../hooks/usePixelShuffle';
import { PixelGrid } from '../grid/PixelGrid';

export function ImageWorkspace() {
  const { state, selectedEntry, build, shake } = usePixelShuffle();

  if (!selectedEntry) {
    return (
      <div className="workspace-empty">
        Upload a PNG or JPEG to turn it into shuffleable blocks.
      </div>
    );
  }

  const { name, sourceUrl, original, current, currentImageUrl, shakes } = selectedEntry;
  const isBuilt = current !== null;

  return (
    <div className="workspace">
      <section className="workspace-column">
        <img className="original-image" src={sourceUrl} alt={name} draggable={false} />
        <p className="caption">
          Original Image · {original.pixelWidth}x{original.pixelHeight}px ·{' '}
          {original.cells.size} colored blocks of {original.blockSize}px
        </p>
      </section>

      <section className="workspace-column">
        <div className="workspace-actions">
          <button type="button" className="btn btn-accent" onClick={build}>
            BUILD
          </button>
          {isBuilt && (
            <button type="button" className="btn" onClick={shake}>
              SHAKE
            </button>
          )}
        </div>

        {current && currentImageUrl && (
          <>
            <img
              className="pixelated-image"
              src={currentImageUrl}
              alt={`${name} pixelated`}
              draggable={false}
            />
            <p className="caption">
              Pixelated Image{shakes > 0 ? ` · shaken ${shakes}x` : ''}
            </p>
            <PixelGrid grid={current} animation={state.animation} />
          </>
        )}
      </section>
    </div>
  );
}
