/**
 * Pixel-level comparison of a captured screenshot against a ground-truth
 * screenshot: MSE, RMSE and percentage difference over all channels, plus a
 * pixelmatch count of perceptibly different pixels.
 */

import pixelmatch from 'pixelmatch';
import { PNG } from 'pngjs';
import { DimensionMismatchError } from './errors.js';
import type { PixelDiffResult, RasterImage } from './types.js';

const MAX_CHANNEL_VALUE = 255;

export interface PixelDiffOptions {
  /** Threshold for pixelmatch (0-1), default 0.1 */
  threshold?: number;
  /** Include anti-aliased pixels in the differing-pixel count, default false */
  includeAA?: boolean;
  /** Encode a diff overlay PNG into the result, default false */
  includeDiffImage?: boolean;
  /** Diff mask color [R, G, B], default magenta */
  diffColor?: [number, number, number];
}

export class PixelDiffAnalyzer {
  /**
   * Compare two decoded images of identical dimensions.
   */
  compare(imageA: RasterImage, imageB: RasterImage, options: PixelDiffOptions = {}): PixelDiffResult {
    assertWellFormed(imageA, 'A');
    assertWellFormed(imageB, 'B');

    if (
      imageA.width !== imageB.width ||
      imageA.height !== imageB.height ||
      imageA.channels !== imageB.channels
    ) {
      throw new DimensionMismatchError(
        `Image dimensions do not match: A(${imageA.width}x${imageA.height}x${imageA.channels}) vs B(${imageB.width}x${imageB.height}x${imageB.channels})`
      );
    }

    const { width, height, channels } = imageA;
    const totalPixels = width * height;
    const mse = meanSquaredError(imageA.data, imageB.data);
    const rmse = Math.sqrt(mse);

    const {
      threshold = 0.1,
      includeAA = false,
      includeDiffImage = false,
      diffColor = [255, 0, 255],
    } = options;

    let diffPixels = 0;
    let diffImage: Buffer | undefined;
    if (totalPixels > 0) {
      const diff = includeDiffImage ? new PNG({ width, height }) : undefined;
      diffPixels = pixelmatch(
        toRgba(imageA),
        toRgba(imageB),
        diff ? diff.data : null,
        width,
        height,
        { threshold, includeAA, diffColor }
      );
      if (diff) diffImage = PNG.sync.write(diff);
    }

    return {
      width,
      height,
      channels,
      mse,
      rmse,
      percentageDifference: (rmse / MAX_CHANNEL_VALUE) * 100,
      totalPixels,
      diffPixels,
      diffPercentage: totalPixels > 0 ? (diffPixels / totalPixels) * 100 : 0,
      ...(diffImage ? { diffImage } : {}),
    };
  }

  /**
   * Decode two PNG buffers and compare them.
   */
  compareBuffers(pngA: Buffer, pngB: Buffer, options: PixelDiffOptions = {}): PixelDiffResult {
    return this.compare(decodePng(pngA), decodePng(pngB), options);
  }
}

/**
 * Decode a PNG into an RGB raster. Alpha is dropped so that MSE is taken
 * over the colour channels only.
 */
export function decodePng(buffer: Buffer): RasterImage {
  const png = PNG.sync.read(buffer);
  const { width, height } = png;
  const data = new Uint8Array(width * height * 3);
  for (let i = 0, j = 0; i < width * height; i++, j += 3) {
    data[j] = png.data[i * 4];
    data[j + 1] = png.data[i * 4 + 1];
    data[j + 2] = png.data[i * 4 + 2];
  }
  return { width, height, channels: 3, data };
}

/**
 * Encode an RGB, RGBA, grey or grey+alpha raster as PNG.
 */
export function encodePng(image: RasterImage): Buffer {
  const png = new PNG({ width: image.width, height: image.height });
  png.data = Buffer.from(toRgba(image));
  return PNG.sync.write(png);
}

export function meanSquaredError(a: Uint8Array, b: Uint8Array): number {
  if (a.length === 0) return 0;
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const delta = a[i] - b[i];
    sum += delta * delta;
  }
  return sum / a.length;
}

/**
 * Expand a raster to RGBA (opaque where the source has no alpha).
 */
export function toRgba(image: RasterImage): Uint8Array {
  const { width, height, channels, data } = image;
  if (channels === 4) return data;

  const out = new Uint8Array(width * height * 4);
  for (let i = 0; i < width * height; i++) {
    const src = i * channels;
    const dst = i * 4;
    if (channels >= 3) {
      out[dst] = data[src];
      out[dst + 1] = data[src + 1];
      out[dst + 2] = data[src + 2];
    } else {
      out[dst] = out[dst + 1] = out[dst + 2] = data[src];
    }
    out[dst + 3] = channels === 2 ? data[src + 1] : 255;
  }
  return out;
}

function assertWellFormed(image: RasterImage, label: string): void {
  const { width, height, channels, data } = image;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
    throw new DimensionMismatchError(`Image ${label} has invalid dimensions ${width}x${height}`);
  }
  if (![1, 2, 3, 4].includes(channels)) {
    throw new DimensionMismatchError(`Image ${label} has unsupported channel count ${channels}`);
  }
  if (data.length !== width * height * channels) {
    throw new DimensionMismatchError(
      `Image ${label} data holds ${data.length} values, expected ${width * height * channels}`
    );
  }
}
