/**
 * RGB triples and their `rgb(r, g, b)` text form.
 */

import { InvalidArgumentError } from './errors';

export type Rgb = readonly [number, number, number];

/** Reserved color meaning "no block placed here". */
export const BACKGROUND: Rgb = Object.freeze([41, 41, 41] as const);

const RGB_PATTERN = /^rgb\(\s*(\d{1,3})\s*,\s*(\d{1,3})\s*,\s*(\d{1,3})\s*\)$/;

function isChannel(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 255;
}

export function assertRgb(color: Rgb): void {
  if (color.length !== 3 || !color.every(isChannel)) {
    throw new InvalidArgumentError(`Invalid RGB color [${color.join(', ')}]`);
  }
}

export function sameColor(a: Rgb, b: Rgb): boolean {
  return a[0] === b[0] && a[1] === b[1] && a[2] === b[2];
}

export function isBackground(color: Rgb): boolean {
  return sameColor(color, BACKGROUND);
}

export function formatRgb([r, g, b]: Rgb): string {
  return `rgb(${r}, ${g}, ${b})`;
}

export function parseRgb(text: string): Rgb {
  const match = RGB_PATTERN.exec(text.trim());
  if (!match) {
    throw new InvalidArgumentError(`Not an rgb() color: "${text}"`);
  }
  const color: Rgb = [Number(match[1]), Number(match[2]), Number(match[3])];
  assertRgb(color);
  return color;
}
