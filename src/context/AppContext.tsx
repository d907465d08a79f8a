/**
 * Application state context for Pixel Shuffle.
 * Holds one immutable entry per uploaded image: the sampled grid, the grid
 * currently on display (after BUILD / SHAKE) and its rendered PNG.
 *
 * The reducer only stores results. Sampling, shuffling and canvas encoding
 * happen in usePixelShuffle so every transition here is deterministic.
 */

import React, { createContext, useContext, useReducer } from 'react';
import { CONFIG } from '../config';
import type { BlockGrid } from '../lib/blockGrid';

// ── State ────────────────────────────────────────────────────────────────────

export type AnimationState = 'initializing' | 'ready' | 'shaking';

export interface ImageEntry {
  /** Upload file name; also the entry's key */
  name: string;
  /** Object URL of the uploaded original */
  sourceUrl: string;
  /** Grid sampled from the upload; never replaced */
  original: BlockGrid;
  /** Grid on display, null until BUILD */
  current: BlockGrid | null;
  /** PNG data URL of `current` */
  currentImageUrl: string | null;
  shakes: number;
}

export interface AppState {
  blockSize: number;
  images: Record<string, ImageEntry>;
  /** Upload order, for the image selector */
  order: string[];
  selected: string | null;
  animation: AnimationState;

  status: string;
  statusType: 'info' | 'success' | 'error' | 'warning';
}

export const initialState: AppState = {
  blockSize: CONFIG.defaultBlockSize,
  images: {},
  order: [],
  selected: null,
  animation: 'ready',
  status: '',
  statusType: 'info',
};

// ── Actions ──────────────────────────────────────────────────────────────────

type Action =
  | { type: 'SET_BLOCK_SIZE'; blockSize: number }
  | { type: 'IMAGE_LOADED'; name: string; sourceUrl: string; original: BlockGrid }
  | { type: 'SELECT_IMAGE'; name: string }
  | { type: 'BUILD_COMPLETE'; name: string; imageUrl: string }
  | { type: 'SHAKE_COMPLETE'; name: string; grid: BlockGrid; imageUrl: string }
  | { type: 'SET_STATUS'; message: string; statusType: AppState['statusType'] }
  | { type: 'CLEAR_STATUS' }
  | { type: 'RESET' };

function updateEntry(state: AppState, name: string, patch: Partial<ImageEntry>): AppState['images'] {
  return { ...state.images, [name]: { ...state.images[name], ...patch } };
}

export function appReducer(state: AppState, action: Action): AppState {
  switch (action.type) {
    case 'SET_BLOCK_SIZE':
      return { ...state, blockSize: action.blockSize };
    case 'IMAGE_LOADED': {
      // Re-uploading a known file name keeps the existing entry
      if (state.images[action.name]) return state;
      const entry: ImageEntry = {
        name: action.name,
        sourceUrl: action.sourceUrl,
        original: action.original,
        current: null,
        currentImageUrl: null,
        shakes: 0,
      };
      return {
        ...state,
        images: { ...state.images, [action.name]: entry },
        order: [...state.order, action.name],
        selected: state.selected ?? action.name,
        status: `Loaded ${action.name} (${action.original.cells.size} colored blocks)`,
        statusType: 'success',
      };
    }
    case 'SELECT_IMAGE':
      if (!state.images[action.name]) return state;
      return { ...state, selected: action.name, animation: 'ready' };
    case 'BUILD_COMPLETE': {
      const entry = state.images[action.name];
      if (!entry) return state;
      return {
        ...state,
        images: updateEntry(state, action.name, {
          current: entry.original,
          currentImageUrl: action.imageUrl,
          shakes: 0,
        }),
        animation: 'initializing',
      };
    }
    case 'SHAKE_COMPLETE': {
      const entry = state.images[action.name];
      if (!entry || !entry.current) return state;
      return {
        ...state,
        images: updateEntry(state, action.name, {
          current: action.grid,
          currentImageUrl: action.imageUrl,
          shakes: entry.shakes + 1,
        }),
        animation: 'shaking',
      };
    }
    case 'SET_STATUS':
      return { ...state, status: action.message, statusType: action.statusType };
    case 'CLEAR_STATUS':
      return { ...state, status: '', statusType: 'info' };
    case 'RESET':
      return { ...initialState, blockSize: state.blockSize };
    default:
      return state;
  }
}

// ── Context ──────────────────────────────────────────────────────────────────

interface AppContextValue {
  state: AppState;
  dispatch: React.Dispatch<Action>;
}

const AppContext = createContext<AppContextValue | null>(null);

export function AppProvider({
  children,
  initial = initialState,
}: {
  children: React.ReactNode;
  initial?: AppState;
}) {
  const [state, dispatch] = useReducer(appReducer, initial);

  return (
    <AppContext.Provider value={{ state, dispatch }}>
      {children}
    </AppContext.Provider>
  );
}

export function useAppContext() {
  const ctx = useContext(AppContext);
  if (!ctx) throw new Error('useAppContext must be used within AppProvider');
  return ctx;
}

export type { Action };
