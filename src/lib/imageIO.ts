/**
 * Browser-side decode/encode between uploaded files, canvases and
 * RasterImage. Everything else in lib/ is DOM-free.
 */

import { type RasterImage, fromImageData, toImageData } from './raster';

export interface DecodedImage {
  raster: RasterImage;
  /** Object URL of the uploaded file, for showing the original */
  sourceUrl: string;
}

function loadImage(url: string, name: string): Promise<HTMLImageElement> {
  return new Promise((resolve, reject) => {
    const img = new Image();
    img.onload = () => resolve(img);
    img.onerror = () => reject(new Error(`Failed to load image ${name}`));
    img.src = url;
  });
}

function context2d(canvas: HTMLCanvasElement): CanvasRenderingContext2D {
  const ctx = canvas.getContext('2d');
  if (!ctx) throw new Error('Canvas 2D context is not available');
  return ctx;
}

export async function decodeImageFile(file: File): Promise<DecodedImage> {
  const sourceUrl = URL.createObjectURL(file);
  try {
    const img = await loadImage(sourceUrl, file.name);
    const canvas = document.createElement('canvas');
    canvas.width = img.naturalWidth;
    canvas.height = img.naturalHeight;
    const ctx = context2d(canvas);
    ctx.imageSmoothingEnabled = false;
    ctx.drawImage(img, 0, 0);
    const raster = fromImageData(ctx.getImageData(0, 0, canvas.width, canvas.height));
    return { raster, sourceUrl };
  } catch (err) {
    URL.revokeObjectURL(sourceUrl);
    throw err;
  }
}

/** Encode a raster as a PNG data URL. */
export function encodeRaster(image: RasterImage): string {
  const { width, height, data } = toImageData(image);
  const canvas = document.createElement('canvas');
  canvas.width = width;
  canvas.height = height;
  context2d(canvas).putImageData(new ImageData(data, width, height), 0, 0);
  return canvas.toDataURL('image/png');
}
