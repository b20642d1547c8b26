/**
 * Responsive layout evaluation engine.
 * Barrel export for all core modules and types.
 */

export * from './core/types.js';
export * from './core/errors.js';
export {
  resolveConfig,
  resolveCategoryWeights,
  loadConfigFile,
  parseConfig,
  defaultThresholds,
  configFileSchema,
} from './core/config.js';
export type { EvaluationConfig, EvaluationConfigOverrides } from './core/config.js';
export { parseDocument, declarationsAt, describeElement, findMetaContent } from './core/document-parser.js';
export type { ParsedDocument, StyleDeclaration } from './core/document-parser.js';
export { parseCssLength, toPixels, classifyLength, mediaMatches } from './core/css-units.js';
export type { CssLength, LengthContext, LengthKind } from './core/css-units.js';
export { SpatialIndex } from './core/spatial-index.js';
export { ComponentExtractor, CLASSIFICATION_RULES } from './core/component-extractor.js';
export type { ClassificationRule, ElementFacts, ExtractorOptions } from './core/component-extractor.js';
export { LayoutMatcher, computeIoU, greedyMatch } from './core/layout-matcher.js';
export { PixelDiffAnalyzer, decodePng, encodePng } from './core/pixel-diff-analyzer.js';
export type { PixelDiffOptions } from './core/pixel-diff-analyzer.js';
export { renderComponentOverlay, CATEGORY_COLORS } from './core/component-overlay.js';
export type { OverlayOptions, Rgb } from './core/component-overlay.js';
export { ResponsiveRuleChecker, RESPONSIVE_RULES, narrowestBreakpoint } from './core/responsive-rules.js';
export type { DocumentRule, ResponsiveRule, ViewportRule } from './core/responsive-rules.js';
export { EvaluationOrchestrator, gradeFor } from './core/evaluation-orchestrator.js';
export type { EvaluationInput, ImageSource, OrchestratorOptions } from './core/evaluation-orchestrator.js';
export { captureFileSchema, loadCaptureFile, parseCaptureFile } from './core/capture-schema.js';
export type { CaptureFile } from './core/capture-schema.js';
export { CAPTURE_SCRIPT, toViewportCapture } from './core/capture-script.js';
export { formatTextReport, formatLayoutSimilarity, formatPixelDiff } from './core/report-formatter.js';
