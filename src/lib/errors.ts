/**
 * Error taxonomy for the block pipeline.
 * Every failure is a rejected single call; no previously returned grid
 * or raster is affected.
 */

export type PixelShuffleErrorCode = 'INVALID_ARGUMENT' | 'CAPACITY_EXCEEDED';

export class PixelShuffleError extends Error {
  readonly code: PixelShuffleErrorCode;

  constructor(code: PixelShuffleErrorCode, message: string) {
    super(message);
    this.name = 'PixelShuffleError';
    this.code = code;
  }
}

/** Non-positive block size, empty image, malformed color or coordinate. */
export class InvalidArgumentError extends PixelShuffleError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
    this.name = 'InvalidArgumentError';
  }
}

/** More colored cells than the target grid has positions. */
export class CapacityExceededError extends PixelShuffleError {
  readonly requested: number;
  readonly available: number;

  constructor(requested: number, available: number) {
    super(
      'CAPACITY_EXCEEDED',
      `Cannot place ${requested} colored blocks in a grid of ${available} positions`,
    );
    this.name = 'CapacityExceededError';
    this.requested = requested;
    this.available = available;
  }
}
