/**
 * Core type definitions for the responsive layout evaluation engine.
 */

// ── Geometry ──

export interface Bounds {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Size {
  width: number;
  height: number;
}

// ── Breakpoints ──

export interface Breakpoint {
  name: string;
  width: number;
  height: number;
}

export const DEFAULT_BREAKPOINTS: readonly Breakpoint[] = [
  { name: 'mobile', width: 375, height: 812 },
  { name: 'tablet', width: 1024, height: 768 },
  { name: 'desktop', width: 1280, height: 800 },
];

// ── Captured DOM ──

/**
 * Computed style values as reported by the browser (`getComputedStyle`).
 * Absent fields were not captured; nothing is defaulted.
 */
export interface ComputedStyle {
  display?: string;
  visibility?: string;
  opacity?: string;
  fontSize?: string;
  lineHeight?: string;
}

export type ElementAttributes = Record<string, string>;

/** One element of a rendered document, measured at one breakpoint. */
export interface RenderedElement {
  selector: string;
  tagName: string;
  attributes: ElementAttributes;
  /** Absent when the collaborator could not measure the element. */
  bounds?: Bounds;
  computedStyles: ComputedStyle;
  /** Text of the element's own text nodes. */
  textContent?: string;
  /** Rendered text including descendants. */
  innerText?: string;
}

export interface ViewportCapture {
  breakpoint: Breakpoint;
  /** Scroll size of the document at this breakpoint. */
  documentSize?: Size;
  elements: RenderedElement[];
}

// ── Visual components ──

export const COMPONENT_CATEGORIES = [
  'video',
  'image',
  'text_block',
  'form_table',
  'button',
  'nav_bar',
  'divider',
] as const;

export type ComponentCategory = (typeof COMPONENT_CATEGORIES)[number];

export interface VisualComponent {
  readonly id: string;
  readonly category: ComponentCategory;
  readonly bounds: Readonly<Bounds>;
  /** Name of the breakpoint the box was measured at. */
  readonly viewport: string;
  readonly text?: string;
  /** Selectors of the text blocks consolidated into this one. */
  readonly mergedFrom?: readonly string[];
}

export interface LayoutSnapshot {
  readonly breakpoint: Readonly<Breakpoint>;
  readonly components: readonly VisualComponent[];
}

export type CategoryWeights = Record<ComponentCategory, number>;

export const DEFAULT_CATEGORY_WEIGHTS: Readonly<CategoryWeights> = {
  video: 2,
  image: 2,
  text_block: 3,
  form_table: 2,
  button: 1.5,
  nav_bar: 1.5,
  divider: 0.5,
};

export type CoordinateSpace = 'pixels' | 'relative';

export type ExtractionDiagnosticReason = 'missing-geometry' | 'invalid-geometry';

export interface ExtractionDiagnostic {
  selector: string;
  category: ComponentCategory;
  reason: ExtractionDiagnosticReason;
  message: string;
}

export interface ExtractionResult {
  snapshot: LayoutSnapshot;
  diagnostics: ExtractionDiagnostic[];
  excluded: {
    hidden: number;
    zeroArea: number;
    unclassified: number;
  };
}

// ── Layout similarity ──

export interface MatchedPair {
  predicted: string;
  reference: string;
  iou: number;
}

export interface CategoryScore {
  category: ComponentCategory;
  score: number;
  weight: number;
  normalizedWeight: number;
  predictedCount: number;
  referenceCount: number;
  matches: MatchedPair[];
}

export interface LayoutSimilarity {
  breakpoint: string;
  /** Layout Similarity Score in [0, 1]. */
  score: number;
  categories: Partial<Record<ComponentCategory, CategoryScore>>;
}

// ── Pixel diff ──

/** Raw interleaved pixel channels, row-major. */
export interface RasterImage {
  width: number;
  height: number;
  channels: number;
  data: Uint8Array;
}

export interface PixelDiffResult {
  width: number;
  height: number;
  channels: number;
  mse: number;
  rmse: number;
  percentageDifference: number;
  totalPixels: number;
  diffPixels: number;
  diffPercentage: number;
  diffImage?: Buffer;
}

// ── Responsive rules ──

export type RuleId =
  | 'viewport-meta'
  | 'responsive-media'
  | 'relative-units'
  | 'authored-font-size'
  | 'font-size'
  | 'line-spacing'
  | 'tap-target'
  | 'horizontal-overflow';

export type RuleScope = 'document' | 'viewport' | 'strictest-viewport';

export interface AffectedElement {
  readonly element: string;
  readonly detail: string;
}

export interface RuleResult {
  readonly ruleId: RuleId;
  readonly passed: boolean;
  readonly measuredValue: number | string;
  readonly threshold: number | string;
  readonly affectedElements: readonly AffectedElement[];
  readonly viewport?: string;
  readonly message: string;
  readonly diagnostics?: readonly string[];
}

// ── Report ──

export type EvaluationStage = 'parse' | 'extract' | 'rules' | 'layout' | 'pixel-diff';

export interface ReportError {
  stage: EvaluationStage;
  name: string;
  message: string;
  ruleId?: RuleId;
}

export interface ViewportReport {
  breakpoint: Breakpoint;
  extraction?: {
    componentCount: number;
    diagnostics: ExtractionDiagnostic[];
    excluded: ExtractionResult['excluded'];
  };
  rules: RuleResult[];
  layout?: LayoutSimilarity;
  pixelDiff?: PixelDiffResult;
  errors: ReportError[];
}

export type Grade = 'A' | 'B' | 'C' | 'D' | 'F';

export interface EvaluationSummary {
  passed: boolean;
  rulesPassed: number;
  rulesTotal: number;
  errorCount: number;
  meanLayoutSimilarity?: number;
  grade?: Grade;
  maxPixelDifference?: number;
  text: string;
}

export interface EvaluationReport {
  source: string;
  timestamp: number;
  documentRules: RuleResult[];
  viewports: ViewportReport[];
  errors: ReportError[];
  summary: EvaluationSummary;
}

// ── Thresholds ──

export const THRESHOLDS = {
  minFontSize: 12,
  minTapTarget: 48,
  minLineSpacing: 1.5,
  /** Share of relative container sizing declarations required to pass. */
  minRelativeUnitRatio: 0.8,
  /** `line-height: normal` resolves to this multiple of the font size. */
  normalLineHeight: 1.2,
  /** Root font size used to resolve em/rem/% values that are not computed. */
  baseFontSize: 16,
  minLayoutSimilarity: 0.7,
  maxPixelDifferencePercent: 10,
  grade: {
    A: 0.95,
    B: 0.85,
    C: 0.7,
    D: 0.5,
  },
} as const;

export type Thresholds = {
  minFontSize: number;
  minTapTarget: number;
  minLineSpacing: number;
  minRelativeUnitRatio: number;
  normalLineHeight: number;
  baseFontSize: number;
  minLayoutSimilarity: number;
  maxPixelDifferencePercent: number;
};
