/**
 * Layout Matcher: weighted IoU similarity between a predicted and a
 * reference LayoutSnapshot.
 *
 * Per category, components are paired greedily by highest IoU. The category
 * score divides the summed IoU of matched pairs by the larger of the two
 * component counts, so missing and extra components both count as zero.
 * Category scores are combined with normalised weights into the Layout
 * Similarity Score (LSS).
 */

import { ExtractionError, IncompatibleSnapshotError } from './errors.js';
import { resolveCategoryWeights } from './config.js';
import {
  COMPONENT_CATEGORIES,
  type Bounds,
  type CategoryScore,
  type CategoryWeights,
  type ComponentCategory,
  type LayoutSimilarity,
  type LayoutSnapshot,
  type MatchedPair,
  type VisualComponent,
} from './types.js';

interface CandidatePair {
  predicted: number;
  reference: number;
  iou: number;
  combinedArea: number;
}

export class LayoutMatcher {
  private readonly weights: CategoryWeights;

  constructor(weights: Partial<CategoryWeights> = {}) {
    this.weights = resolveCategoryWeights(weights);
  }

  /**
   * Compare two snapshots taken at the same breakpoint.
   */
  compare(predicted: LayoutSnapshot, reference: LayoutSnapshot): LayoutSimilarity {
    assertCompatible(predicted, reference);

    const predictedByCategory = partition(predicted.components);
    const referenceByCategory = partition(reference.components);

    const present = COMPONENT_CATEGORIES.filter(
      (category) =>
        predictedByCategory[category].length > 0 || referenceByCategory[category].length > 0
    );

    if (present.length === 0) {
      return { breakpoint: reference.breakpoint.name, score: 1, categories: {} };
    }

    const totalWeight = present.reduce((sum, category) => sum + this.weights[category], 0);
    const categories: Partial<Record<ComponentCategory, CategoryScore>> = {};
    let weighted = 0;
    let unweighted = 0;

    for (const category of present) {
      const result = this.scoreCategory(
        category,
        predictedByCategory[category],
        referenceByCategory[category]
      );
      const weight = this.weights[category];
      // all-zero weights fall back to an unweighted mean
      const normalizedWeight = totalWeight > 0 ? weight / totalWeight : 1 / present.length;

      categories[category] = { ...result, weight, normalizedWeight };
      weighted += result.score * weight;
      unweighted += result.score;
    }

    const score = totalWeight > 0 ? weighted / totalWeight : unweighted / present.length;
    return {
      breakpoint: reference.breakpoint.name,
      score: clamp01(score),
      categories,
    };
  }

  private scoreCategory(
    category: ComponentCategory,
    predicted: VisualComponent[],
    reference: VisualComponent[]
  ): Omit<CategoryScore, 'weight' | 'normalizedWeight'> {
    const matches = greedyMatch(predicted, reference);
    const denominator = Math.max(predicted.length, reference.length);
    const total = matches.reduce((sum, match) => sum + match.iou, 0);

    return {
      category,
      score: denominator > 0 ? total / denominator : 0,
      predictedCount: predicted.length,
      referenceCount: reference.length,
      matches,
    };
  }
}

/**
 * Intersection over Union of two axis-aligned boxes. Degenerate boxes and
 * disjoint boxes score 0.
 */
export function computeIoU(a: Bounds, b: Bounds): number {
  const areaA = area(a);
  const areaB = area(b);
  if (areaA === 0 || areaB === 0) return 0;

  const interWidth = Math.min(a.x + a.width, b.x + b.width) - Math.max(a.x, b.x);
  const interHeight = Math.min(a.y + a.height, b.y + b.height) - Math.max(a.y, b.y);
  if (interWidth <= 0 || interHeight <= 0) return 0;

  const intersection = interWidth * interHeight;
  return clamp01(intersection / (areaA + areaB - intersection));
}

/**
 * Pair components by repeatedly taking the unassigned pair with the highest
 * IoU. Ties go to the larger combined area, then the lower predicted index,
 * then the lower reference index. Pairs with zero IoU are never reported.
 */
export function greedyMatch(
  predicted: readonly VisualComponent[],
  reference: readonly VisualComponent[]
): MatchedPair[] {
  const pairs: CandidatePair[] = [];
  predicted.forEach((p, i) => {
    reference.forEach((r, j) => {
      const iou = computeIoU(p.bounds, r.bounds);
      if (iou > 0) {
        pairs.push({ predicted: i, reference: j, iou, combinedArea: area(p.bounds) + area(r.bounds) });
      }
    });
  });

  pairs.sort(
    (a, b) =>
      b.iou - a.iou ||
      b.combinedArea - a.combinedArea ||
      a.predicted - b.predicted ||
      a.reference - b.reference
  );

  const usedPredicted = new Set<number>();
  const usedReference = new Set<number>();
  const matches: MatchedPair[] = [];
  const limit = Math.min(predicted.length, reference.length);

  for (const pair of pairs) {
    if (matches.length === limit) break;
    if (usedPredicted.has(pair.predicted) || usedReference.has(pair.reference)) continue;
    usedPredicted.add(pair.predicted);
    usedReference.add(pair.reference);
    matches.push({
      predicted: predicted[pair.predicted].id,
      reference: reference[pair.reference].id,
      iou: pair.iou,
    });
  }

  return matches;
}

function assertCompatible(predicted: LayoutSnapshot, reference: LayoutSnapshot): void {
  const a = predicted.breakpoint;
  const b = reference.breakpoint;
  if (a.name !== b.name || a.width !== b.width) {
    throw new IncompatibleSnapshotError(
      `Cannot compare snapshots from different breakpoints: ${a.name} (${a.width}px) vs ${b.name} (${b.width}px)`
    );
  }
}

function partition(components: readonly VisualComponent[]): Record<ComponentCategory, VisualComponent[]> {
  const groups: Record<ComponentCategory, VisualComponent[]> = {
    video: [],
    image: [],
    text_block: [],
    form_table: [],
    button: [],
    nav_bar: [],
    divider: [],
  };

  for (const component of components) {
    const group: VisualComponent[] | undefined = groups[component.category];
    if (!group) {
      throw new ExtractionError(`Unknown component category "${component.category}" on ${component.id}`);
    }
    if (area(component.bounds) === 0) continue;
    group.push(component);
  }
  return groups;
}

function area(bounds: Bounds): number {
  return Math.max(0, bounds.width) * Math.max(0, bounds.height);
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}
