/**
 * Evaluation configuration: defaults, overrides and JSON config files.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import {
  COMPONENT_CATEGORIES,
  DEFAULT_BREAKPOINTS,
  DEFAULT_CATEGORY_WEIGHTS,
  THRESHOLDS,
  type Breakpoint,
  type CategoryWeights,
  type CoordinateSpace,
  type Thresholds,
} from './types.js';

export interface EvaluationConfig {
  breakpoints: Breakpoint[];
  categoryWeights: CategoryWeights;
  thresholds: Thresholds;
  mergeTextBlocks: boolean;
  coordinateSpace: CoordinateSpace;
}

export interface EvaluationConfigOverrides {
  breakpoints?: Breakpoint[];
  categoryWeights?: Partial<CategoryWeights>;
  thresholds?: Partial<Thresholds>;
  mergeTextBlocks?: boolean;
  coordinateSpace?: CoordinateSpace;
}

const breakpointSchema = z.object({
  name: z.string().min(1),
  width: z.number().positive(),
  height: z.number().positive(),
});

const weightSchema = z.number().nonnegative().optional();

const categoryWeightsSchema = z
  .object({
    video: weightSchema,
    image: weightSchema,
    text_block: weightSchema,
    form_table: weightSchema,
    button: weightSchema,
    nav_bar: weightSchema,
    divider: weightSchema,
  })
  .strict();

const thresholdsSchema = z
  .object({
    minFontSize: z.number().positive(),
    minTapTarget: z.number().positive(),
    minLineSpacing: z.number().positive(),
    minRelativeUnitRatio: z.number().min(0).max(1),
    normalLineHeight: z.number().positive(),
    baseFontSize: z.number().positive(),
    minLayoutSimilarity: z.number().min(0).max(1),
    maxPixelDifferencePercent: z.number().min(0).max(100),
  })
  .partial()
  .strict();

export const configFileSchema = z
  .object({
    breakpoints: z.array(breakpointSchema).min(1).optional(),
    categoryWeights: categoryWeightsSchema.optional(),
    thresholds: thresholdsSchema.optional(),
    mergeTextBlocks: z.boolean().optional(),
    coordinateSpace: z.enum(['pixels', 'relative']).optional(),
  })
  .strict();

export function defaultThresholds(): Thresholds {
  return {
    minFontSize: THRESHOLDS.minFontSize,
    minTapTarget: THRESHOLDS.minTapTarget,
    minLineSpacing: THRESHOLDS.minLineSpacing,
    minRelativeUnitRatio: THRESHOLDS.minRelativeUnitRatio,
    normalLineHeight: THRESHOLDS.normalLineHeight,
    baseFontSize: THRESHOLDS.baseFontSize,
    minLayoutSimilarity: THRESHOLDS.minLayoutSimilarity,
    maxPixelDifferencePercent: THRESHOLDS.maxPixelDifferencePercent,
  };
}

/**
 * Merge overrides onto the defaults. Weights must stay finite and
 * non-negative; breakpoint names must be unique.
 */
export function resolveConfig(overrides: EvaluationConfigOverrides = {}): EvaluationConfig {
  const categoryWeights = resolveCategoryWeights(overrides.categoryWeights);
  const breakpoints = (overrides.breakpoints ?? DEFAULT_BREAKPOINTS).map((bp) => ({ ...bp }));

  const names = new Set<string>();
  for (const bp of breakpoints) {
    if (names.has(bp.name)) {
      throw new ConfigError(`Duplicate breakpoint name: "${bp.name}"`);
    }
    if (!(bp.width > 0) || !(bp.height > 0)) {
      throw new ConfigError(`Breakpoint "${bp.name}" must have a positive width and height`);
    }
    names.add(bp.name);
  }

  return {
    breakpoints,
    categoryWeights,
    thresholds: { ...defaultThresholds(), ...overrides.thresholds },
    mergeTextBlocks: overrides.mergeTextBlocks ?? true,
    coordinateSpace: overrides.coordinateSpace ?? 'pixels',
  };
}

export function resolveCategoryWeights(overrides: Partial<CategoryWeights> = {}): CategoryWeights {
  const weights: CategoryWeights = { ...DEFAULT_CATEGORY_WEIGHTS };
  const known = new Set<string>(COMPONENT_CATEGORIES);

  for (const [category, weight] of Object.entries(overrides)) {
    if (!known.has(category)) {
      throw new ConfigError(`Unknown component category: "${category}"`);
    }
    if (weight === undefined) continue;
    if (!Number.isFinite(weight) || weight < 0) {
      throw new ConfigError(`Weight for "${category}" must be a non-negative number, got ${weight}`);
    }
  }

  for (const category of COMPONENT_CATEGORIES) {
    const weight = overrides[category];
    if (weight !== undefined) weights[category] = weight;
  }

  return weights;
}

/**
 * Parse and validate a JSON config file, then merge it onto the defaults.
 */
export async function loadConfigFile(path: string): Promise<EvaluationConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Could not read config file ${path}`, { cause: error });
  }
  return parseConfig(raw, path);
}

export function parseConfig(raw: unknown, origin = 'config'): EvaluationConfig {
  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ${origin}: ${issues}`);
  }
  return resolveConfig(parsed.data);
}
