/**
 * CSS length parsing and unit classification.
 */

import type { Size } from './types.js';

export type LengthKind = 'relative' | 'absolute' | 'neutral';

export interface CssLength {
  value: number;
  unit: string;
}

export interface LengthContext {
  /** Font size of the element itself (em). */
  fontSize: number;
  /** Font size of the root element (rem). */
  rootFontSize: number;
  viewport: Size;
  /** Base for percentages; defaults to `fontSize`. */
  percentBase?: number;
}

const ABSOLUTE_UNITS: Record<string, number> = {
  px: 1,
  pt: 96 / 72,
  pc: 16,
  in: 96,
  cm: 96 / 2.54,
  mm: 96 / 25.4,
  q: 96 / 101.6,
};

const RELATIVE_UNITS = new Set([
  '%', 'em', 'rem', 'ex', 'ch', 'fr',
  'vw', 'vh', 'vmin', 'vmax',
  'svw', 'svh', 'lvw', 'lvh', 'dvw', 'dvh',
]);

const LENGTH_PATTERN = /^([+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?)([a-z%]*)$/i;
const LENGTH_TOKEN_PATTERN = /([+-]?(?:\d+\.?\d*|\.\d+))([a-z]+|%)?/gi;
const FLUID_FUNCTION_PATTERN = /\b(?:calc|min|max|clamp)\(/i;
const MEDIA_FEATURE_PATTERN = /\(\s*(min-width|max-width|min-height|max-height|orientation)\s*:\s*([^)]+)\)/g;

export function parseCssLength(raw: string | undefined): CssLength | null {
  if (raw === undefined) return null;
  const match = raw.trim().match(LENGTH_PATTERN);
  if (!match) return null;
  const value = Number.parseFloat(match[1]);
  if (!Number.isFinite(value)) return null;
  return { value, unit: match[2].toLowerCase() };
}

/**
 * Resolve a length to pixels. Returns null for keywords, functions and
 * unknown units.
 */
export function toPixels(raw: string | undefined, context: LengthContext): number | null {
  const length = parseCssLength(raw);
  if (!length) return null;
  const { value, unit } = length;

  if (unit === '') return value === 0 ? 0 : null;
  if (Object.hasOwn(ABSOLUTE_UNITS, unit)) return value * ABSOLUTE_UNITS[unit];

  const { width, height } = context.viewport;
  switch (unit) {
    case 'em':
      return value * context.fontSize;
    case 'rem':
      return value * context.rootFontSize;
    case '%':
      return (value / 100) * (context.percentBase ?? context.fontSize);
    case 'vw':
    case 'svw':
    case 'lvw':
    case 'dvw':
      return (value / 100) * width;
    case 'vh':
    case 'svh':
    case 'lvh':
    case 'dvh':
      return (value / 100) * height;
    case 'vmin':
      return (value / 100) * Math.min(width, height);
    case 'vmax':
      return (value / 100) * Math.max(width, height);
    default:
      return null;
  }
}

export function isRelativeUnit(unit: string): boolean {
  return RELATIVE_UNITS.has(unit.toLowerCase());
}

export function isAbsoluteUnit(unit: string): boolean {
  return Object.hasOwn(ABSOLUTE_UNITS, unit.toLowerCase());
}

/**
 * Classify a declaration value.
 *
 * - zero lengths and keywords (`auto`, `none`, `inherit`) are neutral
 * - inside calc()/min()/max()/clamp() any relative term makes the value fluid
 * - otherwise any absolute token makes the whole value absolute
 */
export function classifyLength(raw: string): LengthKind {
  const value = raw.replace(/!important/i, '').trim();
  let hasRelative = false;
  let hasAbsolute = false;

  for (const match of value.matchAll(LENGTH_TOKEN_PATTERN)) {
    const amount = Number.parseFloat(match[1]);
    const unit = (match[2] ?? '').toLowerCase();
    if (amount === 0 || unit === '') continue;
    if (isRelativeUnit(unit)) hasRelative = true;
    else if (isAbsoluteUnit(unit)) hasAbsolute = true;
  }

  if (hasRelative && (!hasAbsolute || FLUID_FUNCTION_PATTERN.test(value))) return 'relative';
  if (hasAbsolute) return 'absolute';
  return 'neutral';
}

/**
 * Whether a media query list holds at a viewport. Width, height and
 * orientation features are evaluated; any other feature is taken to hold.
 * `em` and `rem` in media features resolve against the root font size.
 */
export function mediaMatches(mediaText: string, viewport: Size, rootFontSize = 16): boolean {
  const queries = mediaText
    .toLowerCase()
    .split(',')
    .map((query) => query.trim())
    .filter((query) => query !== '');
  if (queries.length === 0) return true;
  return queries.some((query) => queryMatches(query, viewport, rootFontSize));
}

function queryMatches(query: string, viewport: Size, rootFontSize: number): boolean {
  let rest = query;
  let negated = false;
  if (rest.startsWith('not ')) {
    negated = true;
    rest = rest.slice(4).trim();
  } else if (rest.startsWith('only ')) {
    rest = rest.slice(5).trim();
  }

  const mediaType = /^[a-z-]+/.exec(rest)?.[0];
  let matches = mediaType === undefined || mediaType === 'all' || mediaType === 'screen';
  if (matches) {
    const context: LengthContext = { fontSize: rootFontSize, rootFontSize, viewport };
    for (const [, feature, value] of rest.matchAll(MEDIA_FEATURE_PATTERN)) {
      if (!featureMatches(feature, value.trim(), viewport, context)) {
        matches = false;
        break;
      }
    }
  }
  return negated ? !matches : matches;
}

function featureMatches(feature: string, value: string, viewport: Size, context: LengthContext): boolean {
  if (feature === 'orientation') {
    return value === (viewport.height >= viewport.width ? 'portrait' : 'landscape');
  }
  const limit = toPixels(value, context);
  if (limit === null) return true;
  switch (feature) {
    case 'min-width':
      return viewport.width >= limit;
    case 'max-width':
      return viewport.width <= limit;
    case 'min-height':
      return viewport.height >= limit;
    default:
      return viewport.height <= limit;
  }
}
