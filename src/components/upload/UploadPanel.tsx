/**
 * Upload panel.
 * Accepts one or more PNG/JPEG files, the block size used to sample new
 * uploads, and selects which uploaded image is being worked on.
 */

import React, { useCallback } from 'react';
import { CONFIG } from '../../config';
import { usePixelShuffle } from '../../hooks/usePixelShuffle';

function clampBlockSize(value: number): number {
  return Math.max(CONFIG.minBlockSize, Math.min(CONFIG.maxBlockSize, value));
}

export function UploadPanel() {
  const { state, addFiles, selectImage, setBlockSize, dispatch } = usePixelShuffle();
  const { blockSize, order, selected } = state;

  const handleFiles = useCallback(
    (e: React.ChangeEvent<HTMLInputElement>) => {
      const files = Array.from(e.target.files ?? []);
      // Allow re-selecting the same files later
      e.target.value = '';
      if (files.length === 0) return;
      addFiles(files).catch((err: unknown) => {
        console.error('[pixel-shuffle] upload failed:', err);
        dispatch({ type: 'SET_STATUS', message: 'Upload failed', statusType: 'error' });
      });
    },
    [addFiles, dispatch],
  );

  const handleBlockSize = useCallback(
    (e: React.ChangeEvent<HTMLInputElement>) => {
      const value = Number.parseInt(e.target.value, 10);
      if (Number.isNaN(value)) return;
      setBlockSize(clampBlockSize(value));
    },
    [setBlockSize],
  );

  return (
    <div className="upload-panel">
      <h2>Images</h2>

      <div className="config-field">
        <label htmlFor="image-files">Choose image files</label>
        <input
          id="image-files"
          type="file"
          accept={CONFIG.acceptedTypes}
          multiple
          onChange={handleFiles}
        />
      </div>

      <div className="config-field">
        <label htmlFor="block-size">Block size (px)</label>
        <input
          id="block-size"
          type="number"
          min={CONFIG.minBlockSize}
          max={CONFIG.maxBlockSize}
          value={blockSize}
          onChange={handleBlockSize}
        />
        <span className="field-hint">Applies to images uploaded after the change.</span>
      </div>

      {order.length > 0 && (
        <div className="config-field">
          <label htmlFor="image-select">Select image to analyze</label>
          <select
            id="image-select"
            value={selected ?? ''}
            onChange={(e) => selectImage(e.target.value)}
          >
            {order.map((name) => (
              <option key={name} value={name}>
                {name}
              </option>
            ))}
          </select>
        </div>
      )}
    </div>
  );
}
