/**
 * Annotated component overlay: outlines every component of a layout
 * snapshot on its screenshot, one colour per category.
 */

import { DimensionMismatchError } from './errors.js';
import { decodePng, encodePng, toRgba } from './pixel-diff-analyzer.js';
import type { Bounds, ComponentCategory, CoordinateSpace, LayoutSnapshot, RasterImage } from './types.js';

export type Rgb = readonly [number, number, number];

export const CATEGORY_COLORS: Readonly<Record<ComponentCategory, Rgb>> = {
  video: [0, 0, 255],
  image: [0, 160, 0],
  text_block: [255, 0, 0],
  form_table: [0, 170, 170],
  button: [255, 140, 0],
  nav_bar: [160, 0, 200],
  divider: [120, 120, 120],
};

export interface OverlayOptions {
  /** Outline thickness in pixels, default 2 */
  lineWidth?: number;
  /** Space the snapshot bounds are expressed in, default 'pixels' */
  coordinateSpace?: CoordinateSpace;
}

/**
 * Draw the snapshot's component boxes onto a copy of the screenshot and
 * return it as PNG bytes. Relative bounds are scaled to the image size.
 */
export function renderComponentOverlay(
  snapshot: LayoutSnapshot,
  screenshot: RasterImage | Buffer,
  options: OverlayOptions = {}
): Buffer {
  const image = Buffer.isBuffer(screenshot) ? decodePng(screenshot) : screenshot;
  const { width, height, channels, data } = image;
  if (data.length !== width * height * channels) {
    throw new DimensionMismatchError(
      `Screenshot data holds ${data.length} values, expected ${width * height * channels}`
    );
  }

  const lineWidth = Math.max(1, Math.round(options.lineWidth ?? 2));
  const relative = options.coordinateSpace === 'relative';
  const canvas: RasterImage = { width, height, channels: 4, data: Uint8Array.from(toRgba(image)) };

  for (const component of snapshot.components) {
    const bounds = relative ? scaleBounds(component.bounds, width, height) : component.bounds;
    strokeRect(canvas, bounds, CATEGORY_COLORS[component.category], lineWidth);
  }

  return encodePng(canvas);
}

function scaleBounds(bounds: Readonly<Bounds>, width: number, height: number): Bounds {
  return {
    x: bounds.x * width,
    y: bounds.y * height,
    width: bounds.width * width,
    height: bounds.height * height,
  };
}

// Edges are placed on the unclipped box; only the painted pixels are clipped.
function strokeRect(canvas: RasterImage, bounds: Readonly<Bounds>, color: Rgb, lineWidth: number): void {
  const left = Math.round(bounds.x);
  const top = Math.round(bounds.y);
  const right = Math.round(bounds.x + bounds.width) - 1;
  const bottom = Math.round(bounds.y + bounds.height) - 1;
  if (right < left || bottom < top) return;

  for (let i = 0; i < lineWidth; i++) {
    for (let x = left; x <= right; x++) {
      paint(canvas, x, top + i, color);
      paint(canvas, x, bottom - i, color);
    }
    for (let y = top; y <= bottom; y++) {
      paint(canvas, left + i, y, color);
      paint(canvas, right - i, y, color);
    }
  }
}

function paint(canvas: RasterImage, x: number, y: number, color: Rgb): void {
  if (x < 0 || y < 0 || x >= canvas.width || y >= canvas.height) return;
  const offset = (y * canvas.width + x) * 4;
  canvas.data[offset] = color[0];
  canvas.data[offset + 1] = color[1];
  canvas.data[offset + 2] = color[2];
  canvas.data[offset + 3] = 255;
}
