/**
 * Responsive Rule Checker
 *
 * A fixed battery of independent, stateless validators. Document rules read
 * the parsed HTML and its authored CSS; viewport rules read the computed
 * styles and geometry captured at one breakpoint. A failing page yields a
 * RuleResult with `passed: false`; exceptions are reserved for inputs that
 * carry no style data at all.
 */

import { ValidatorInputError } from './errors.js';
import { classifyLength, toPixels, type LengthContext } from './css-units.js';
import { declarationsAt, findMetaContent, type ParsedDocument, type StyleDeclaration } from './document-parser.js';
import { isHidden } from './component-extractor.js';
import type {
  AffectedElement,
  Breakpoint,
  RenderedElement,
  RuleId,
  RuleResult,
  Size,
  Thresholds,
  ViewportCapture,
} from './types.js';

export interface DocumentRule {
  id: RuleId;
  scope: 'document';
  /** `viewport` decides which declarations nested in `@media` rules apply. */
  check(document: ParsedDocument, thresholds: Thresholds, viewport: Size): RuleResult;
}

export interface ViewportRule {
  id: RuleId;
  /** `strictest-viewport` rules run only at the narrowest captured breakpoint. */
  scope: 'viewport' | 'strictest-viewport';
  check(capture: ViewportCapture, thresholds: Thresholds): RuleResult;
}

export type ResponsiveRule = DocumentRule | ViewportRule;

const MEDIA_SELECTOR = 'img, video';
const CONTAINER_SELECTOR = 'body, main, header, footer, section, article, aside, nav, div, form, ul, ol, table';

const SIZING_PROPERTY_PATTERN =
  /^(?:(?:min-|max-)?(?:width|height)|padding(?:-(?:top|right|bottom|left|inline|block))?|margin(?:-(?:top|right|bottom|left|inline|block))?|(?:row-|column-)?gap|flex-basis|grid-template-columns)$/;

const INTERACTIVE_TAGS = new Set(['button', 'select', 'textarea', 'summary']);
const INTERACTIVE_ROLES = new Set(['button', 'link', 'checkbox', 'radio', 'switch', 'tab', 'menuitem']);

const RATIO_TOLERANCE = 1e-9;

// ── Document rules ──

export const viewportMetaRule: DocumentRule = {
  id: 'viewport-meta',
  scope: 'document',
  check(parsed) {
    const expected = 'width=device-width, initial-scale=1';
    const content = findMetaContent(parsed.document, 'viewport');
    if (content === undefined) {
      return makeResult({
        ruleId: 'viewport-meta',
        passed: false,
        measuredValue: 'missing',
        threshold: expected,
        message: 'No viewport meta tag declared',
      });
    }

    const directives = parseViewportContent(content);
    const width = directives.get('width');
    const scale = Number.parseFloat(directives.get('initial-scale') ?? '');
    const passed = width === 'device-width' && scale === 1;

    const problems: string[] = [];
    if (width !== 'device-width') {
      problems.push(width ? `width is fixed to "${width}"` : 'width=device-width is missing');
    }
    if (scale !== 1) {
      problems.push(Number.isNaN(scale) ? 'initial-scale is missing' : `initial-scale is ${scale}`);
    }

    return makeResult({
      ruleId: 'viewport-meta',
      passed,
      measuredValue: content,
      threshold: expected,
      message: passed ? 'Viewport meta tag scales to the device width' : `Viewport meta tag: ${problems.join(', ')}`,
    });
  },
};

export const responsiveMediaRule: DocumentRule = {
  id: 'responsive-media',
  scope: 'document',
  check(parsed, thresholds, viewport) {
    const media = Array.from(parsed.document.querySelectorAll(MEDIA_SELECTOR));
    const inEffect = declarationsAt(parsed, viewport, thresholds.baseFontSize);
    const affected: AffectedElement[] = [];

    for (const element of media) {
      const declarations = inEffect.filter((d) => d.elements.includes(element));
      const problem = describeMediaSizing(element, declarations);
      if (problem) {
        affected.push({ element: elementLabel(element, declarations), detail: problem });
      }
    }

    return makeResult({
      ruleId: 'responsive-media',
      passed: affected.length === 0,
      measuredValue: affected.length,
      threshold: 0,
      affectedElements: affected,
      diagnostics: selectorDiagnostics(parsed),
      message:
        affected.length === 0
          ? `All ${media.length} media elements use relative sizing`
          : `${affected.length} of ${media.length} media elements use fixed sizing`,
    });
  },
};

export const relativeUnitsRule: DocumentRule = {
  id: 'relative-units',
  scope: 'document',
  check(parsed, thresholds, viewport) {
    const containers = new Set(Array.from(parsed.document.querySelectorAll(CONTAINER_SELECTOR)));
    let relative = 0;
    let absolute = 0;
    const flagged: AffectedElement[] = [];

    for (const declaration of declarationsAt(parsed, viewport, thresholds.baseFontSize)) {
      if (!SIZING_PROPERTY_PATTERN.test(declaration.property)) continue;
      if (!declaration.elements.some((element) => containers.has(element))) continue;

      const kind = classifyLength(declaration.value);
      if (kind === 'relative') {
        relative++;
      } else if (kind === 'absolute') {
        absolute++;
        flagged.push({
          element: declaration.selector,
          detail: `${declaration.property}: ${declaration.value}`,
        });
      }
    }

    const counted = relative + absolute;
    const ratio = counted > 0 ? relative / counted : 1;
    const passed = ratio + RATIO_TOLERANCE >= thresholds.minRelativeUnitRatio;

    return makeResult({
      ruleId: 'relative-units',
      passed,
      measuredValue: round(ratio, 4),
      threshold: thresholds.minRelativeUnitRatio,
      affectedElements: flagged,
      diagnostics: selectorDiagnostics(parsed),
      message:
        counted === 0
          ? 'No fixed container sizing declarations found'
          : `${relative} of ${counted} container sizing declarations use relative units` +
            (passed && absolute > 0 ? ` (${absolute} absolute tolerated)` : ''),
    });
  },
};

export const authoredFontSizeRule: DocumentRule = {
  id: 'authored-font-size',
  scope: 'document',
  check(parsed, thresholds, viewport) {
    const context: LengthContext = {
      fontSize: thresholds.baseFontSize,
      rootFontSize: thresholds.baseFontSize,
      viewport,
      percentBase: thresholds.baseFontSize,
    };
    const affected: AffectedElement[] = [];
    const diagnostics = selectorDiagnostics(parsed);
    let smallest = Number.POSITIVE_INFINITY;
    let measured = 0;

    for (const declaration of declarationsAt(parsed, viewport, thresholds.baseFontSize)) {
      if (declaration.property !== 'font-size') continue;
      const size = toPixels(declaration.value.replace(/!important/i, '').trim(), context);
      if (size === null) {
        diagnostics.push(`${declaration.selector}: font-size "${declaration.value}" could not be resolved`);
        continue;
      }
      measured++;
      smallest = Math.min(smallest, size);
      if (size + RATIO_TOLERANCE < thresholds.minFontSize) {
        affected.push({
          element: declaration.selector,
          detail: `font-size: ${declaration.value} (${formatNumber(size)}px)`,
        });
      }
    }

    return makeResult({
      ruleId: 'authored-font-size',
      passed: affected.length === 0,
      measuredValue: measured > 0 ? round(smallest, 4) : 'no font-size declarations',
      threshold: thresholds.minFontSize,
      affectedElements: affected,
      diagnostics,
      message:
        affected.length === 0
          ? `All ${measured} authored font sizes are at least ${thresholds.minFontSize}px`
          : `${affected.length} of ${measured} authored font sizes are below ${thresholds.minFontSize}px`,
    });
  },
};

// ── Viewport rules ──

export const fontSizeRule: ViewportRule = {
  id: 'font-size',
  scope: 'viewport',
  check(capture, thresholds) {
    assertStyleData(capture, 'font-size');
    const texts = textElements(capture);
    const affected: AffectedElement[] = [];
    const diagnostics: string[] = [];
    let smallest = Number.POSITIVE_INFINITY;
    let measured = 0;

    if (texts.length > 0 && texts.every((el) => el.computedStyles.fontSize === undefined)) {
      throw new ValidatorInputError(`No font-size data captured at ${capture.breakpoint.name}`);
    }

    for (const element of texts) {
      const size = resolveFontSize(element, capture, thresholds);
      if (size === null) {
        diagnostics.push(`${element.selector}: font-size "${element.computedStyles.fontSize ?? ''}" could not be resolved`);
        continue;
      }
      measured++;
      smallest = Math.min(smallest, size);
      if (size < thresholds.minFontSize) {
        affected.push({ element: element.selector, detail: `${formatNumber(size)}px` });
      }
    }

    return makeResult({
      ruleId: 'font-size',
      viewport: capture.breakpoint.name,
      passed: affected.length === 0,
      measuredValue: measured > 0 ? round(smallest, 4) : 'no text',
      threshold: thresholds.minFontSize,
      affectedElements: affected,
      diagnostics,
      message:
        affected.length === 0
          ? `All ${measured} text elements are at least ${thresholds.minFontSize}px at ${capture.breakpoint.name}`
          : `${affected.length} of ${measured} text elements are below ${thresholds.minFontSize}px at ${capture.breakpoint.name}`,
    });
  },
};

export const lineSpacingRule: ViewportRule = {
  id: 'line-spacing',
  scope: 'viewport',
  check(capture, thresholds) {
    assertStyleData(capture, 'line-spacing');
    const texts = textElements(capture);
    const affected: AffectedElement[] = [];
    const diagnostics: string[] = [];
    let smallest = Number.POSITIVE_INFINITY;
    let measured = 0;

    if (texts.length > 0 && texts.every((el) => el.computedStyles.lineHeight === undefined)) {
      throw new ValidatorInputError(`No line-height data captured at ${capture.breakpoint.name}`);
    }

    for (const element of texts) {
      const fontSize = resolveFontSize(element, capture, thresholds);
      const lineHeight =
        fontSize === null ? null : resolveLineHeight(element.computedStyles.lineHeight, fontSize, capture, thresholds);
      if (fontSize === null || fontSize <= 0 || lineHeight === null) {
        diagnostics.push(
          `${element.selector}: line-height "${element.computedStyles.lineHeight ?? ''}" / font-size "${element.computedStyles.fontSize ?? ''}" could not be resolved`
        );
        continue;
      }

      const ratio = lineHeight / fontSize;
      measured++;
      smallest = Math.min(smallest, ratio);
      if (ratio + RATIO_TOLERANCE < thresholds.minLineSpacing) {
        affected.push({ element: element.selector, detail: `line-height ratio ${formatNumber(ratio)}` });
      }
    }

    return makeResult({
      ruleId: 'line-spacing',
      viewport: capture.breakpoint.name,
      passed: affected.length === 0,
      measuredValue: measured > 0 ? round(smallest, 4) : 'no text',
      threshold: thresholds.minLineSpacing,
      affectedElements: affected,
      diagnostics,
      message:
        affected.length === 0
          ? `All ${measured} text elements have a line-height of at least ${thresholds.minLineSpacing}x at ${capture.breakpoint.name}`
          : `${affected.length} of ${measured} text elements have a line-height below ${thresholds.minLineSpacing}x at ${capture.breakpoint.name}`,
    });
  },
};

export const tapTargetRule: ViewportRule = {
  id: 'tap-target',
  scope: 'strictest-viewport',
  check(capture, thresholds) {
    assertStyleData(capture, 'tap-target');
    const min = thresholds.minTapTarget;
    const affected: AffectedElement[] = [];
    const diagnostics: string[] = [];
    let smallest = Number.POSITIVE_INFINITY;
    let measured = 0;

    for (const element of capture.elements) {
      if (!isInteractive(element) || isHidden(element.computedStyles)) continue;
      const { bounds } = element;
      if (!bounds) {
        diagnostics.push(`${element.selector}: no bounding box captured`);
        continue;
      }
      if (bounds.width <= 0 || bounds.height <= 0) continue;

      measured++;
      smallest = Math.min(smallest, bounds.width, bounds.height);
      if (bounds.width < min || bounds.height < min) {
        affected.push({
          element: element.selector,
          detail: `${formatNumber(bounds.width)}x${formatNumber(bounds.height)}px`,
        });
      }
    }

    return makeResult({
      ruleId: 'tap-target',
      viewport: capture.breakpoint.name,
      passed: affected.length === 0,
      measuredValue: measured > 0 ? round(smallest, 4) : 'no interactive elements',
      threshold: `${min}x${min}`,
      affectedElements: affected,
      diagnostics,
      message:
        affected.length === 0
          ? `All ${measured} tap targets are at least ${min}x${min}px at ${capture.breakpoint.name}`
          : `${affected.length} of ${measured} tap targets are smaller than ${min}x${min}px at ${capture.breakpoint.name}`,
    });
  },
};

export const horizontalOverflowRule: ViewportRule = {
  id: 'horizontal-overflow',
  scope: 'viewport',
  check(capture) {
    assertStyleData(capture, 'horizontal-overflow');
    const limit = capture.breakpoint.width;
    const affected: AffectedElement[] = [];
    let rightEdge = 0;

    for (const element of capture.elements) {
      const { bounds } = element;
      if (!bounds || isHidden(element.computedStyles) || bounds.width <= 0 || bounds.height <= 0) continue;
      const right = bounds.x + bounds.width;
      rightEdge = Math.max(rightEdge, right);
      if (right > limit) {
        affected.push({ element: element.selector, detail: `right edge at ${formatNumber(right)}px` });
      }
    }

    const pageWidth = capture.documentSize?.width ?? rightEdge;
    const passed = pageWidth <= limit;

    return makeResult({
      ruleId: 'horizontal-overflow',
      viewport: capture.breakpoint.name,
      passed,
      measuredValue: round(pageWidth, 4),
      threshold: limit,
      affectedElements: passed ? [] : affected,
      message: passed
        ? `Content fits within ${limit}px at ${capture.breakpoint.name}`
        : `Content is ${formatNumber(pageWidth)}px wide at ${capture.breakpoint.name}, causing horizontal scrolling`,
    });
  },
};

export const RESPONSIVE_RULES: readonly ResponsiveRule[] = [
  viewportMetaRule,
  responsiveMediaRule,
  relativeUnitsRule,
  authoredFontSizeRule,
  fontSizeRule,
  lineSpacingRule,
  tapTargetRule,
  horizontalOverflowRule,
];

/**
 * Runs the rule battery. Methods throw ValidatorInputError when a capture
 * carries no style data; callers that need per-rule isolation iterate
 * `rules` themselves.
 */
export class ResponsiveRuleChecker {
  constructor(
    private readonly thresholds: Thresholds,
    readonly rules: readonly ResponsiveRule[] = RESPONSIVE_RULES
  ) {}

  checkDocument(document: ParsedDocument, viewport: Size): RuleResult[] {
    return this.documentRules().map((rule) => rule.check(document, this.thresholds, viewport));
  }

  checkViewport(capture: ViewportCapture, strictest: boolean): RuleResult[] {
    return this.viewportRules(strictest).map((rule) => rule.check(capture, this.thresholds));
  }

  documentRules(): DocumentRule[] {
    return this.rules.filter((rule): rule is DocumentRule => rule.scope === 'document');
  }

  viewportRules(strictest: boolean): ViewportRule[] {
    return this.rules.filter(
      (rule): rule is ViewportRule =>
        rule.scope === 'viewport' || (strictest && rule.scope === 'strictest-viewport')
    );
  }
}

/** Narrowest of the given breakpoints. */
export function narrowestBreakpoint(breakpoints: readonly Breakpoint[]): Breakpoint | undefined {
  let narrowest: Breakpoint | undefined;
  for (const breakpoint of breakpoints) {
    if (!narrowest || breakpoint.width < narrowest.width) narrowest = breakpoint;
  }
  return narrowest;
}

/** Name of the narrowest breakpoint among the captures. */
export function strictestBreakpoint(captures: readonly ViewportCapture[]): string | undefined {
  return narrowestBreakpoint(captures.map((capture) => capture.breakpoint))?.name;
}

// ── Helpers ──

export function parseViewportContent(content: string): Map<string, string> {
  const directives = new Map<string, string>();
  for (const part of content.split(/[,;]/)) {
    const [key, ...rest] = part.split('=');
    const name = key.trim().toLowerCase();
    if (!name) continue;
    directives.set(name, rest.join('=').trim().toLowerCase());
  }
  return directives;
}

export function resolveLineHeight(
  raw: string | undefined,
  fontSize: number,
  capture: ViewportCapture,
  thresholds: Thresholds
): number | null {
  if (raw === undefined) return null;
  const value = raw.trim().toLowerCase();
  if (value === 'normal') return thresholds.normalLineHeight * fontSize;
  if (/^[+-]?(?:\d+\.?\d*|\.\d+)$/.test(value)) return Number.parseFloat(value) * fontSize;
  return toPixels(value, lengthContext(capture, thresholds, fontSize));
}

function resolveFontSize(element: RenderedElement, capture: ViewportCapture, thresholds: Thresholds): number | null {
  return toPixels(element.computedStyles.fontSize, lengthContext(capture, thresholds, thresholds.baseFontSize));
}

function lengthContext(capture: ViewportCapture, thresholds: Thresholds, fontSize: number): LengthContext {
  return {
    fontSize,
    rootFontSize: thresholds.baseFontSize,
    viewport: { width: capture.breakpoint.width, height: capture.breakpoint.height },
    percentBase: fontSize,
  };
}

function textElements(capture: ViewportCapture): RenderedElement[] {
  return capture.elements.filter((element) => {
    if ((element.textContent ?? '').trim() === '') return false;
    if (isHidden(element.computedStyles)) return false;
    const { bounds } = element;
    return !bounds || (bounds.width > 0 && bounds.height > 0);
  });
}

function isInteractive(element: RenderedElement): boolean {
  const tag = element.tagName.toLowerCase();
  const attributes = element.attributes;
  if (tag === 'a') return attributes.href !== undefined;
  if (tag === 'input') return (attributes.type ?? '').toLowerCase() !== 'hidden';
  if (INTERACTIVE_TAGS.has(tag)) return true;
  if (INTERACTIVE_ROLES.has((attributes.role ?? '').toLowerCase())) return true;
  const tabindex = attributes.tabindex;
  return tabindex !== undefined && Number.parseInt(tabindex, 10) >= 0;
}

function selectorDiagnostics(parsed: ParsedDocument): string[] {
  return parsed.skippedSelectors.map((selector) => `Selector "${selector}" could not be matched and was ignored`);
}

function assertStyleData(capture: ViewportCapture, ruleId: RuleId): void {
  if (!Array.isArray(capture.elements) || capture.elements.length === 0) {
    throw new ValidatorInputError(`${ruleId}: capture at ${capture.breakpoint.name} contains no elements`);
  }
  const hasStyles = capture.elements.some(
    (element) => element.computedStyles !== undefined && Object.keys(element.computedStyles).length > 0
  );
  if (!hasStyles) {
    throw new ValidatorInputError(`${ruleId}: no computed style data captured at ${capture.breakpoint.name}`);
  }
}

function describeMediaSizing(element: Element, declarations: StyleDeclaration[]): string | undefined {
  const widthValues = declarations.filter((d) => d.property === 'width' || d.property === 'max-width').map((d) => d.value);
  const heightValues = declarations.filter((d) => d.property === 'height').map((d) => d.value);

  const widthAttr = element.getAttribute('width');
  const heightAttr = element.getAttribute('height');

  const relativeWidth =
    widthValues.some((v) => classifyLength(v) === 'relative') ||
    (widthAttr !== null && widthAttr.trim().endsWith('%'));

  const heightFlexible = heightValues.some((v) => {
    const kind = classifyLength(v);
    return kind === 'relative' || v.trim().toLowerCase() === 'auto';
  });
  const fixedHeight =
    !heightFlexible &&
    (heightValues.some((v) => classifyLength(v) === 'absolute') || isPixelAttribute(heightAttr));

  if (!relativeWidth) {
    const fixed = widthValues.find((v) => classifyLength(v) === 'absolute') ?? (isPixelAttribute(widthAttr) ? `${widthAttr}px` : undefined);
    return fixed ? `fixed width ${fixed}` : 'no relative width or max-width';
  }
  if (fixedHeight) {
    const fixed = heightValues.find((v) => classifyLength(v) === 'absolute') ?? `${heightAttr}px`;
    return `fixed height ${fixed}`;
  }
  return undefined;
}

function isPixelAttribute(value: string | null): boolean {
  return value !== null && /^\s*\d+(?:\.\d+)?(?:px)?\s*$/i.test(value);
}

function elementLabel(element: Element, declarations: StyleDeclaration[]): string {
  const inline = declarations.find((d) => d.source === 'inline');
  if (inline) return inline.selector;
  const tag = element.tagName.toLowerCase();
  const id = element.getAttribute('id');
  const src = element.getAttribute('src');
  if (id) return `${tag}#${id}`;
  return src ? `${tag}[src="${src}"]` : tag;
}

function makeResult(fields: {
  ruleId: RuleId;
  passed: boolean;
  measuredValue: number | string;
  threshold: number | string;
  message: string;
  viewport?: string;
  affectedElements?: AffectedElement[];
  diagnostics?: string[];
}): RuleResult {
  const result: RuleResult = {
    ruleId: fields.ruleId,
    passed: fields.passed,
    measuredValue: fields.measuredValue,
    threshold: fields.threshold,
    affectedElements: Object.freeze((fields.affectedElements ?? []).map((a) => Object.freeze({ ...a }))),
    ...(fields.viewport !== undefined ? { viewport: fields.viewport } : {}),
    message: fields.message,
    ...(fields.diagnostics && fields.diagnostics.length > 0
      ? { diagnostics: Object.freeze([...fields.diagnostics]) }
      : {}),
  };
  return Object.freeze(result);
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function formatNumber(value: number): string {
  return String(round(value, 2));
}
