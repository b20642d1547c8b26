/**
 * Component Extractor
 *
 * Turns the element records of one viewport capture into a LayoutSnapshot of
 * classified visual components. Classification is an ordered list of
 * predicate -> category rules; the first match wins and elements matching
 * no rule are left out of the snapshot.
 */

import { ExtractionError } from './errors.js';
import { SpatialIndex, contains } from './spatial-index.js';
import type {
  Bounds,
  ComponentCategory,
  ComputedStyle,
  CoordinateSpace,
  ExtractionDiagnostic,
  ExtractionResult,
  LayoutSnapshot,
  RenderedElement,
  Size,
  ViewportCapture,
  VisualComponent,
} from './types.js';

export interface ExtractorOptions {
  /** Consolidate nested and adjacent text blocks, default true. */
  mergeTextBlocks?: boolean;
  coordinateSpace?: CoordinateSpace;
  /** Max distance between box centres to count as aligned, default 8px. */
  alignTolerance?: number;
  /** Max gap between box edges to count as adjacent, default 4px. */
  adjacencyTolerance?: number;
}

/** Normalised view of an element used by the classification rules. */
export interface ElementFacts {
  tag: string;
  type: string;
  role: string;
  id: string;
  classes: string[];
  directText: string;
  renderedText: string;
}

export interface ClassificationRule {
  name: string;
  category: ComponentCategory;
  matches(facts: ElementFacts): boolean;
}

const TEXT_TAGS = new Set([
  'p', 'span', 'a', 'strong', 'em', 'b', 'i',
  'h1', 'h2', 'h3', 'h4', 'h5', 'h6',
  'li', 'th', 'td', 'label', 'code', 'pre', 'blockquote',
]);

const NAV_TOKENS = new Set(['nav', 'navbar', 'navigation', 'menu']);
const BUTTON_INPUT_TYPES = new Set(['button', 'submit', 'reset']);

const hasToken = (facts: ElementFacts, tokens: Set<string>): boolean =>
  facts.classes.some((c) => tokens.has(c)) || tokens.has(facts.id);

const mentions = (facts: ElementFacts, fragment: string): boolean =>
  facts.classes.some((c) => c.includes(fragment)) || facts.id.includes(fragment);

/** Evaluated top to bottom: tag names first, then role, then class/id heuristics. */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  { name: 'video-tag', category: 'video', matches: (f) => f.tag === 'video' },
  { name: 'img-tag', category: 'image', matches: (f) => f.tag === 'img' },
  {
    name: 'button-tag',
    category: 'button',
    matches: (f) => f.tag === 'button' || (f.tag === 'input' && BUTTON_INPUT_TYPES.has(f.type)),
  },
  { name: 'nav-tag', category: 'nav_bar', matches: (f) => f.tag === 'nav' },
  { name: 'hr-tag', category: 'divider', matches: (f) => f.tag === 'hr' },
  { name: 'form-table-tag', category: 'form_table', matches: (f) => f.tag === 'form' || f.tag === 'table' },
  { name: 'button-role', category: 'button', matches: (f) => f.role === 'button' },
  {
    name: 'navigation-role',
    category: 'nav_bar',
    matches: (f) => f.role === 'navigation' || f.role === 'menubar',
  },
  { name: 'separator-role', category: 'divider', matches: (f) => f.role === 'separator' },
  { name: 'nav-class', category: 'nav_bar', matches: (f) => hasToken(f, NAV_TOKENS) },
  {
    name: 'divider-class',
    category: 'divider',
    matches: (f) => mentions(f, 'separator') || mentions(f, 'divider'),
  },
  { name: 'form-class', category: 'form_table', matches: (f) => f.classes.includes('form') },
  {
    name: 'text',
    category: 'text_block',
    matches: (f) =>
      (TEXT_TAGS.has(f.tag) && f.renderedText !== '') || (f.tag === 'div' && f.directText !== ''),
  },
];

interface Candidate {
  id: string;
  category: ComponentCategory;
  bounds: Bounds;
  text?: string;
  order: number;
  mergedFrom?: string[];
}

export class ComponentExtractor {
  private readonly mergeTextBlocks: boolean;
  private readonly coordinateSpace: CoordinateSpace;
  private readonly alignTolerance: number;
  private readonly adjacencyTolerance: number;

  constructor(
    options: ExtractorOptions = {},
    private readonly rules: readonly ClassificationRule[] = CLASSIFICATION_RULES
  ) {
    this.mergeTextBlocks = options.mergeTextBlocks ?? true;
    this.coordinateSpace = options.coordinateSpace ?? 'pixels';
    this.alignTolerance = options.alignTolerance ?? 8;
    this.adjacencyTolerance = options.adjacencyTolerance ?? 4;
  }

  /**
   * Extract the visual components of one capture.
   */
  extract(capture: ViewportCapture): ExtractionResult {
    if (!Array.isArray(capture.elements)) {
      throw new ExtractionError('Capture has no element list');
    }
    const { breakpoint } = capture;
    if (!breakpoint?.name || !(breakpoint.width > 0)) {
      throw new ExtractionError('Capture has no valid breakpoint');
    }

    const diagnostics: ExtractionDiagnostic[] = [];
    const excluded = { hidden: 0, zeroArea: 0, unclassified: 0 };
    let candidates: Candidate[] = [];

    capture.elements.forEach((element, order) => {
      const facts = toFacts(element);
      const category = this.classify(facts);
      if (!category) {
        excluded.unclassified++;
        return;
      }
      if (isHidden(element.computedStyles)) {
        excluded.hidden++;
        return;
      }

      const { bounds } = element;
      if (!bounds) {
        diagnostics.push({
          selector: element.selector,
          category,
          reason: 'missing-geometry',
          message: `No bounding box was captured for ${element.selector}`,
        });
        return;
      }
      if (!isValidBounds(bounds)) {
        diagnostics.push({
          selector: element.selector,
          category,
          reason: 'invalid-geometry',
          message: `Bounding box of ${element.selector} is not a finite, non-negative rectangle`,
        });
        return;
      }
      if (bounds.width === 0 || bounds.height === 0) {
        excluded.zeroArea++;
        return;
      }

      candidates.push({
        id: element.selector,
        category,
        bounds: { x: bounds.x, y: bounds.y, width: bounds.width, height: bounds.height },
        text: category === 'text_block' ? facts.renderedText || facts.directText : undefined,
        order,
      });
    });

    if (this.mergeTextBlocks) {
      const text = candidates.filter((c) => c.category === 'text_block');
      const others = candidates.filter((c) => c.category !== 'text_block');
      candidates = [...others, ...this.consolidateTextBlocks(text)].sort((a, b) => a.order - b.order);
    }

    const pageSize = this.coordinateSpace === 'relative' ? resolvePageSize(capture, candidates) : undefined;
    const components = candidates.map((candidate) =>
      freezeComponent(candidate, breakpoint.name, pageSize)
    );

    const snapshot: LayoutSnapshot = Object.freeze({
      breakpoint: Object.freeze({ ...breakpoint }),
      components: Object.freeze(components),
    });

    return { snapshot, diagnostics, excluded };
  }

  classify(facts: ElementFacts): ComponentCategory | undefined {
    return this.rules.find((rule) => rule.matches(facts))?.category;
  }

  /**
   * Drop text blocks nested in other text blocks, then merge adjacent ones,
   * until nothing changes. Merged boxes may become adjacent to further
   * blocks, hence the loop.
   */
  consolidateTextBlocks(blocks: Candidate[]): Candidate[] {
    let current = [...blocks].sort(readingOrder);

    for (;;) {
      current = this.dropNested(current);
      const merged = this.mergeAdjacent(current);
      if (merged.length === current.length) return merged;
      current = merged;
    }
  }

  private dropNested(blocks: Candidate[]): Candidate[] {
    const rank = new Map(blocks.map((block, i) => [block, i]));
    const index = SpatialIndex.from(blocks, (b) => b.bounds);

    return blocks.filter((block) => {
      const position = rank.get(block) ?? 0;
      return !index.findContaining(block.bounds).some((outer) => {
        if (outer === block) return false;
        // identical boxes: keep the first in reading order
        if (contains(block.bounds, outer.bounds)) return (rank.get(outer) ?? 0) < position;
        return true;
      });
    });
  }

  private mergeAdjacent(blocks: Candidate[]): Candidate[] {
    const parent = blocks.map((_, i) => i);
    const find = (i: number): number => {
      while (parent[i] !== i) {
        parent[i] = parent[parent[i]];
        i = parent[i];
      }
      return i;
    };

    const position = new Map(blocks.map((block, i) => [block, i]));
    const index = SpatialIndex.from(blocks, (b) => b.bounds);
    const margin = this.alignTolerance + this.adjacencyTolerance;

    blocks.forEach((block, i) => {
      for (const neighbour of index.findOverlapping(block.bounds, margin)) {
        const j = position.get(neighbour) ?? i;
        if (j <= i) continue;
        if (boxesAdjacent(block.bounds, neighbour.bounds, this.alignTolerance, this.adjacencyTolerance)) {
          const a = find(i);
          const b = find(j);
          if (a !== b) parent[Math.max(a, b)] = Math.min(a, b);
        }
      }
    });

    const groups = new Map<number, Candidate[]>();
    blocks.forEach((block, i) => {
      const root = find(i);
      const group = groups.get(root) ?? [];
      group.push(block);
      groups.set(root, group);
    });

    return Array.from(groups.values())
      .map((group) => (group.length === 1 ? group[0] : mergeGroup(group)))
      .sort(readingOrder);
  }
}

/**
 * Two boxes are adjacent when their centres line up on one axis and their
 * edges touch (within `adjacencyTolerance`) on the other.
 */
export function boxesAdjacent(
  a: Bounds,
  b: Bounds,
  alignTolerance = 8,
  adjacencyTolerance = 4
): boolean {
  const verticallyAligned = Math.abs(a.y + a.height / 2 - (b.y + b.height / 2)) <= alignTolerance;
  const horizontallyAligned = Math.abs(a.x + a.width / 2 - (b.x + b.width / 2)) <= alignTolerance;

  const horizontallyAdjacent =
    (a.x + a.width + adjacencyTolerance >= b.x && a.x < b.x) ||
    (b.x + b.width + adjacencyTolerance >= a.x && b.x < a.x);
  const verticallyAdjacent =
    (a.y + a.height + adjacencyTolerance >= b.y && a.y < b.y) ||
    (b.y + b.height + adjacencyTolerance >= a.y && b.y < a.y);

  return (verticallyAligned && horizontallyAdjacent) || (horizontallyAligned && verticallyAdjacent);
}

export function unionBounds(a: Bounds, b: Bounds): Bounds {
  const x = Math.min(a.x, b.x);
  const y = Math.min(a.y, b.y);
  return {
    x,
    y,
    width: Math.max(a.x + a.width, b.x + b.width) - x,
    height: Math.max(a.y + a.height, b.y + b.height) - y,
  };
}

export function toFacts(element: RenderedElement): ElementFacts {
  const attr = (name: string): string => (element.attributes[name] ?? '').trim().toLowerCase();
  return {
    tag: element.tagName.toLowerCase(),
    type: attr('type'),
    role: attr('role'),
    id: attr('id'),
    classes: attr('class').split(/\s+/).filter(Boolean),
    directText: (element.textContent ?? '').trim(),
    renderedText: (element.innerText ?? element.textContent ?? '').trim(),
  };
}

export function isHidden(style: ComputedStyle): boolean {
  const visibility = style.visibility?.trim();
  return (
    style.display?.trim() === 'none' ||
    visibility === 'hidden' ||
    visibility === 'collapse' ||
    (style.opacity !== undefined && Number.parseFloat(style.opacity) === 0)
  );
}

function isValidBounds(bounds: Bounds): boolean {
  const values = [bounds.x, bounds.y, bounds.width, bounds.height];
  return values.every((v) => typeof v === 'number' && Number.isFinite(v)) && bounds.width >= 0 && bounds.height >= 0;
}

function readingOrder(a: Candidate, b: Candidate): number {
  return a.bounds.y - b.bounds.y || a.bounds.x - b.bounds.x || a.order - b.order;
}

function mergeGroup(group: Candidate[]): Candidate {
  const ordered = [...group].sort(readingOrder);
  const bounds = ordered.map((c) => c.bounds).reduce(unionBounds);
  return {
    id: ordered[0].id,
    category: 'text_block',
    bounds,
    text: ordered
      .map((c) => c.text ?? '')
      .filter(Boolean)
      .join(' '),
    order: Math.min(...ordered.map((c) => c.order)),
    mergedFrom: ordered.flatMap((c) => c.mergedFrom ?? [c.id]),
  };
}

function resolvePageSize(capture: ViewportCapture, candidates: Candidate[]): Size {
  if (capture.documentSize && capture.documentSize.width > 0 && capture.documentSize.height > 0) {
    return capture.documentSize;
  }
  const right = Math.max(capture.breakpoint.width, ...candidates.map((c) => c.bounds.x + c.bounds.width));
  const bottom = Math.max(capture.breakpoint.height, ...candidates.map((c) => c.bounds.y + c.bounds.height));
  return { width: right, height: bottom };
}

function freezeComponent(candidate: Candidate, viewport: string, pageSize?: Size): VisualComponent {
  const { x, y, width, height } = candidate.bounds;
  const bounds = pageSize
    ? { x: x / pageSize.width, y: y / pageSize.height, width: width / pageSize.width, height: height / pageSize.height }
    : { x, y, width, height };

  const component: VisualComponent = {
    id: candidate.id,
    category: candidate.category,
    bounds: Object.freeze(bounds),
    viewport,
    ...(candidate.text !== undefined ? { text: candidate.text } : {}),
    ...(candidate.mergedFrom ? { mergedFrom: Object.freeze([...candidate.mergedFrom]) } : {}),
  };
  return Object.freeze(component);
}
