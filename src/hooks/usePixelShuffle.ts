/**
 * Main workflow hook for Pixel Shuffle.
 * Orchestrates: upload → sample → BUILD (reconstruct) → SHAKE (shuffle +
 * reconstruct). Errors are logged and surfaced through the status banner.
 */

import { useCallback } from 'react';
import { useAppContext } from '../context/AppContext';
import { decodeImageFile, encodeRaster } from '../lib/imageIO';
import { type RandomSource, defaultRandom } from '../lib/random';
import { reconstruct } from '../lib/reconstructor';
import { sample } from '../lib/sampler';
import { shuffle } from '../lib/shuffler';

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error';
}

export function usePixelShuffle(random: RandomSource = defaultRandom) {
  const { state, dispatch } = useAppContext();
  const selectedEntry = state.selected ? state.images[state.selected] ?? null : null;

  const addFiles = useCallback(
    async (files: File[]) => {
      const fresh = files.filter((f) => !state.images[f.name]);
      for (const file of fresh) {
        try {
          const { raster, sourceUrl } = await decodeImageFile(file);
          const original = sample(raster, state.blockSize);
          console.info(
            `[pixel-shuffle] sampled ${file.name}: ${raster.width}x${raster.height}px, ` +
            `block ${state.blockSize}px, ${original.cells.size} colored blocks`,
          );
          dispatch({ type: 'IMAGE_LOADED', name: file.name, sourceUrl, original });
        } catch (err: unknown) {
          console.error(`[pixel-shuffle] failed to load ${file.name}:`, err);
          dispatch({
            type: 'SET_STATUS',
            message: `Could not load ${file.name}: ${errorMessage(err)}`,
            statusType: 'error',
          });
        }
      }
    },
    [state.images, state.blockSize, dispatch],
  );

  const build = useCallback(() => {
    if (!selectedEntry) return;
    try {
      const imageUrl = encodeRaster(reconstruct(selectedEntry.original));
      dispatch({ type: 'BUILD_COMPLETE', name: selectedEntry.name, imageUrl });
    } catch (err: unknown) {
      console.error(`[pixel-shuffle] build failed for ${selectedEntry.name}:`, err);
      dispatch({ type: 'SET_STATUS', message: `Build failed: ${errorMessage(err)}`, statusType: 'error' });
    }
  }, [selectedEntry, dispatch]);

  const shake = useCallback(() => {
    if (!selectedEntry || !selectedEntry.current) {
      dispatch({ type: 'SET_STATUS', message: 'Press BUILD before shaking.', statusType: 'warning' });
      return;
    }
    try {
      const grid = shuffle(selectedEntry.current, random);
      const imageUrl = encodeRaster(reconstruct(grid));
      dispatch({ type: 'SHAKE_COMPLETE', name: selectedEntry.name, grid, imageUrl });
    } catch (err: unknown) {
      console.error(`[pixel-shuffle] shake failed for ${selectedEntry.name}:`, err);
      dispatch({ type: 'SET_STATUS', message: `Shake failed: ${errorMessage(err)}`, statusType: 'error' });
    }
  }, [selectedEntry, random, dispatch]);

  const selectImage = useCallback(
    (name: string) => dispatch({ type: 'SELECT_IMAGE', name }),
    [dispatch],
  );

  const setBlockSize = useCallback(
    (blockSize: number) => dispatch({ type: 'SET_BLOCK_SIZE', blockSize }),
    [dispatch],
  );

  const reset = useCallback(() => {
    for (const entry of Object.values(state.images)) {
      URL.revokeObjectURL(entry.sourceUrl);
    }
    dispatch({ type: 'RESET' });
  }, [state.images, dispatch]);

  return {
    state,
    dispatch,
    selectedEntry,
    addFiles,
    build,
    shake,
    selectImage,
    setBlockSize,
    reset,
  };
}
