import { describe, it, expect } from 'vitest';
import { LayoutMatcher, computeIoU, greedyMatch } from './layout-matcher.js';
import { ConfigError, IncompatibleSnapshotError } from './errors.js';
import {
  COMPONENT_CATEGORIES,
  DEFAULT_CATEGORY_WEIGHTS,
  type Bounds,
  type CategoryWeights,
  type ComponentCategory,
  type LayoutSnapshot,
  type VisualComponent,
} from './types.js';

const desktop = { name: 'desktop', width: 1280, height: 800 };

function component(id: string, category: ComponentCategory, x: number, y: number, width: number, height: number): VisualComponent {
  return { id, category, bounds: { x, y, width, height }, viewport: desktop.name };
}

function snapshot(components: VisualComponent[], breakpoint = desktop): LayoutSnapshot {
  return { breakpoint, components };
}

const box = (x: number, y: number, width: number, height: number): Bounds => ({ x, y, width, height });

describe('computeIoU', () => {
  it('should be 1 for identical boxes', () => {
    expect(computeIoU(box(0, 0, 10, 10), box(0, 0, 10, 10))).toBe(1);
  });

  it('should be intersection over union for overlapping boxes', () => {
    // intersection 5x10 = 50, union 100 + 100 - 50 = 150
    expect(computeIoU(box(0, 0, 10, 10), box(5, 0, 10, 10))).toBeCloseTo(1 / 3, 10);
  });

  it('should be 0 for disjoint and edge-touching boxes', () => {
    expect(computeIoU(box(0, 0, 10, 10), box(20, 20, 5, 5))).toBe(0);
    expect(computeIoU(box(0, 0, 10, 10), box(10, 0, 10, 10))).toBe(0);
  });

  it('should be 0 when either box has no area', () => {
    expect(computeIoU(box(0, 0, 0, 10), box(0, 0, 10, 10))).toBe(0);
    expect(computeIoU(box(0, 0, 10, 10), box(0, 0, 10, 0))).toBe(0);
  });

  it('should be symmetric', () => {
    const a = box(3, 4, 20, 7);
    const b = box(10, 1, 5, 30);
    expect(computeIoU(a, b)).toBe(computeIoU(b, a));
  });
});

describe('greedyMatch', () => {
  it('should pair the highest IoU first and leave the rest unmatched', () => {
    const predicted = [component('p0', 'image', 0, 0, 10, 10), component('p1', 'image', 100, 0, 10, 10)];
    const reference = [component('r0', 'image', 1, 0, 10, 10)];

    expect(greedyMatch(predicted, reference)).toEqual([{ predicted: 'p0', reference: 'r0', iou: 90 / 110 }]);
  });

  it('should not let one reference component absorb two predictions', () => {
    const predicted = [component('p0', 'button', 0, 0, 10, 10), component('p1', 'button', 2, 0, 10, 10)];
    const reference = [component('r0', 'button', 0, 0, 10, 10), component('r1', 'button', 2, 0, 10, 10)];

    const matches = greedyMatch(predicted, reference);
    expect(matches.map((m) => [m.predicted, m.reference, m.iou])).toEqual([
      ['p0', 'r0', 1],
      ['p1', 'r1', 1],
    ]);
  });

  it('should break IoU ties by larger combined area', () => {
    // both pairs are identical boxes (IoU 1); the larger pair is matched first
    const predicted = [component('small', 'image', 0, 0, 10, 10), component('large', 'image', 0, 100, 50, 50)];
    const reference = [component('r-small', 'image', 0, 0, 10, 10), component('r-large', 'image', 0, 100, 50, 50)];

    expect(greedyMatch(predicted, reference).map((m) => m.predicted)).toEqual(['large', 'small']);
  });

  it('should never report zero-IoU pairs', () => {
    const predicted = [component('p0', 'divider', 0, 0, 10, 1)];
    const reference = [component('r0', 'divider', 0, 500, 10, 1)];
    expect(greedyMatch(predicted, reference)).toEqual([]);
  });
});

describe('LayoutMatcher', () => {
  it('should score identical layouts as 1', () => {
    const components = [
      component('nav', 'nav_bar', 0, 0, 1280, 80),
      component('hero', 'image', 0, 80, 1280, 400),
      component('copy', 'text_block', 100, 500, 600, 120),
    ];
    const result = new LayoutMatcher().compare(snapshot(components), snapshot(components));

    expect(result.score).toBeCloseTo(1, 12);
    expect(result.breakpoint).toBe('desktop');
    expect(Object.keys(result.categories).sort()).toEqual(['image', 'nav_bar', 'text_block']);
  });

  it('should score two empty snapshots as 1', () => {
    const result = new LayoutMatcher().compare(snapshot([]), snapshot([]));
    expect(result).toEqual({ breakpoint: 'desktop', score: 1, categories: {} });
  });

  it('should score a missing category as 0 and weight it in', () => {
    // image: perfect match, weight 2; button: missing from prediction, weight 1.5
    const predicted = snapshot([component('img', 'image', 0, 0, 100, 100)]);
    const reference = snapshot([
      component('img', 'image', 0, 0, 100, 100),
      component('cta', 'button', 0, 200, 100, 40),
    ]);
    const result = new LayoutMatcher().compare(predicted, reference);

    expect(result.categories.button).toMatchObject({ score: 0, predictedCount: 0, referenceCount: 1, matches: [] });
    expect(result.categories.image?.normalizedWeight).toBeCloseTo(2 / 3.5, 10);
    expect(result.score).toBeCloseTo(2 / 3.5, 10);
  });

  it('should divide by the larger component count', () => {
    // two predicted text blocks, one reference block matched perfectly
    const predicted = snapshot([
      component('a', 'text_block', 0, 0, 100, 20),
      component('b', 'text_block', 0, 300, 100, 20),
    ]);
    const reference = snapshot([component('a', 'text_block', 0, 0, 100, 20)]);
    const result = new LayoutMatcher().compare(predicted, reference);

    expect(result.categories.text_block?.score).toBe(0.5);
    expect(result.score).toBe(0.5);
  });

  it('should apply custom category weights', () => {
    const predicted = snapshot([
      component('img', 'image', 0, 0, 100, 100),
      component('v', 'video', 500, 0, 100, 100),
    ]);
    const reference = snapshot([
      component('img', 'image', 0, 0, 100, 100),
      component('v', 'video', 0, 500, 100, 100),
    ]);
    const result = new LayoutMatcher({ image: 3, video: 1 }).compare(predicted, reference);

    expect(result.categories.video?.score).toBe(0);
    expect(result.score).toBe(0.75);
  });

  it('should score a single shifted image by its IoU', () => {
    // intersection 50x50 = 2500, union 10000 + 10000 - 2500 = 17500
    const predicted = snapshot([component('hero', 'image', 50, 50, 100, 100)]);
    const reference = snapshot([component('hero', 'image', 0, 0, 100, 100)]);
    const result = new LayoutMatcher().compare(predicted, reference);

    expect(result.categories.image?.matches[0].iou).toBeCloseTo(0.1429, 4);
    expect(result.score).toBeCloseTo(0.1429, 4);
  });

  it('should leave the score unchanged when every weight is scaled by the same factor', () => {
    const predicted = snapshot([
      component('img', 'image', 10, 0, 100, 100),
      component('copy', 'text_block', 0, 120, 300, 40),
    ]);
    const reference = snapshot([
      component('img', 'image', 0, 0, 100, 100),
      component('copy', 'text_block', 0, 130, 300, 40),
      component('cta', 'button', 0, 200, 100, 40),
    ]);
    const scaled: Partial<CategoryWeights> = {};
    for (const category of COMPONENT_CATEGORIES) {
      scaled[category] = DEFAULT_CATEGORY_WEIGHTS[category] * 7;
    }

    const base = new LayoutMatcher().compare(predicted, reference).score;
    expect(base).toBeGreaterThan(0);
    expect(new LayoutMatcher(scaled).compare(predicted, reference).score).toBeCloseTo(base, 12);
  });

  it('should use the unweighted mean when every present weight is zero', () => {
    const predicted = snapshot([component('img', 'image', 0, 0, 100, 100)]);
    const reference = snapshot([
      component('img', 'image', 0, 0, 100, 100),
      component('hr', 'divider', 0, 200, 100, 2),
    ]);
    const result = new LayoutMatcher({ image: 0, divider: 0 }).compare(predicted, reference);

    expect(result.categories.image?.normalizedWeight).toBe(0.5);
    expect(result.score).toBe(0.5);
  });

  it('should ignore zero-area components', () => {
    const predicted = snapshot([component('img', 'image', 0, 0, 100, 100), component('flat', 'divider', 0, 0, 100, 0)]);
    const reference = snapshot([component('img', 'image', 0, 0, 100, 100)]);
    const result = new LayoutMatcher().compare(predicted, reference);

    expect(result.categories.divider).toBeUndefined();
    expect(result.score).toBe(1);
  });

  it('should reject snapshots from different breakpoints', () => {
    const mobile = { name: 'mobile', width: 375, height: 812 };
    expect(() => new LayoutMatcher().compare(snapshot([]), snapshot([], mobile))).toThrow(IncompatibleSnapshotError);
  });

  it('should reject invalid weights at construction', () => {
    expect(() => new LayoutMatcher({ image: -1 })).toThrow(ConfigError);
  });

  it('should be order-independent within a category', () => {
    const a = component('a', 'button', 0, 0, 50, 20);
    const b = component('b', 'button', 30, 0, 50, 20);
    const c = component('c', 'button', 200, 0, 50, 20);
    const reference = snapshot([component('r0', 'button', 5, 0, 50, 20), component('r1', 'button', 190, 0, 50, 20)]);
    const matcher = new LayoutMatcher();

    expect(matcher.compare(snapshot([a, b, c]), reference).score).toBeCloseTo(
      matcher.compare(snapshot([c, b, a]), reference).score,
      12
    );
  });
});
