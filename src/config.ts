/**
 * App-wide settings for the upload → build → shake workflow.
 */

export interface ShuffleConfig {
  defaultBlockSize: number;    // block edge in source pixels
  minBlockSize: number;
  maxBlockSize: number;
  acceptedTypes: string;       // file input `accept` list
  gridDisplaySize: number;     // animated grid edge in CSS pixels
  initializeDelayMax: number;  // max random pop-in delay per cell, seconds
  statusTimeoutMs: number;     // status banner auto-fade
  statusFadeMs: number;
}

export const CONFIG: ShuffleConfig = {
  defaultBlockSize: 25,
  minBlockSize: 1,
  maxBlockSize: 256,
  acceptedTypes: 'image/png,image/jpeg',
  gridDisplaySize: 500,
  initializeDelayMax: 0.2,
  statusTimeoutMs: 5000,
  statusFadeMs: 300,
};
