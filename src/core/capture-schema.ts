/**
 * Capture files: the rendered document plus its per-breakpoint element
 * records, as written by the in-page capture script.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ExtractionError } from './errors.js';
import type { ViewportCapture } from './types.js';

const boundsSchema = z.object({
  x: z.number(),
  y: z.number(),
  width: z.number(),
  height: z.number(),
});

const computedStyleSchema = z.object({
  display: z.string().optional(),
  visibility: z.string().optional(),
  opacity: z.string().optional(),
  fontSize: z.string().optional(),
  lineHeight: z.string().optional(),
});

export const renderedElementSchema = z.object({
  selector: z.string().min(1),
  tagName: z.string().min(1),
  attributes: z.record(z.string()).default({}),
  bounds: boundsSchema.optional(),
  computedStyles: computedStyleSchema,
  textContent: z.string().optional(),
  innerText: z.string().optional(),
});

export const viewportCaptureSchema = z.object({
  breakpoint: z.object({
    name: z.string().min(1),
    width: z.number().positive(),
    height: z.number().positive(),
  }),
  documentSize: z.object({ width: z.number().nonnegative(), height: z.number().nonnegative() }).optional(),
  elements: z.array(renderedElementSchema),
});

export const captureFileSchema = z.object({
  source: z.string().optional(),
  html: z.string().default(''),
  captures: z.array(viewportCaptureSchema),
});

export interface CaptureFile {
  source?: string;
  html: string;
  captures: ViewportCapture[];
}

export function parseCaptureFile(raw: unknown, origin = 'capture file'): CaptureFile {
  const parsed = captureFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ExtractionError(`Invalid ${origin}: ${issues}`);
  }
  return parsed.data;
}

export async function loadCaptureFile(path: string): Promise<CaptureFile> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    throw new ExtractionError(`Could not read capture file ${path}`, { cause: error });
  }
  return parseCaptureFile(raw, path);
}
