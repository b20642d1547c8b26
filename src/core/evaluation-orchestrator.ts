/**
 * Evaluation Orchestrator
 *
 * Sequences one evaluation run:
 * 1. Parse the document and run the document rules once, at the narrowest breakpoint
 * 2. Per required breakpoint: extract the layout snapshot, run the viewport rules
 * 3. Optionally match against reference snapshots (LSS)
 * 4. Optionally diff screenshots against ground truth
 * 5. Assemble a frozen report with a summary and grade
 *
 * A failure is caught at its stage and recorded; it never suppresses other
 * viewports or stages.
 */

import { ComponentExtractor } from './component-extractor.js';
import { resolveConfig, type EvaluationConfig } from './config.js';
import { parseDocument, type ParsedDocument } from './document-parser.js';
import { EvaluationError, ExtractionError, ValidatorInputError } from './errors.js';
import { LayoutMatcher } from './layout-matcher.js';
import { PixelDiffAnalyzer, decodePng, type PixelDiffOptions } from './pixel-diff-analyzer.js';
import { ResponsiveRuleChecker, narrowestBreakpoint, strictestBreakpoint } from './responsive-rules.js';
import {
  DEFAULT_BREAKPOINTS,
  THRESHOLDS,
  type Breakpoint,
  type EvaluationReport,
  type EvaluationStage,
  type EvaluationSummary,
  type ExtractionResult,
  type Grade,
  type LayoutSnapshot,
  type RasterImage,
  type ReportError,
  type RuleId,
  type RuleResult,
  type ViewportCapture,
  type ViewportReport,
} from './types.js';

/** A decoded raster, or PNG bytes to decode. */
export type ImageSource = RasterImage | Buffer;

export interface EvaluationInput {
  /** Label for the evaluated page, e.g. its file name. */
  source?: string;
  html: string;
  captures: ViewportCapture[];
  /** Reference layouts keyed by their breakpoint name. */
  referenceSnapshots?: LayoutSnapshot[];
  /** Screenshots and ground truth, keyed by breakpoint name. */
  screenshots?: Record<string, ImageSource>;
  groundTruth?: Record<string, ImageSource>;
}

export interface OrchestratorOptions {
  pixelDiff?: PixelDiffOptions;
}

export class EvaluationOrchestrator {
  readonly config: EvaluationConfig;
  private extractor: ComponentExtractor;
  private matcher: LayoutMatcher;
  private pixelAnalyzer: PixelDiffAnalyzer;
  private ruleChecker: ResponsiveRuleChecker;

  constructor(config: EvaluationConfig = resolveConfig(), private readonly options: OrchestratorOptions = {}) {
    this.config = config;
    this.extractor = new ComponentExtractor({
      mergeTextBlocks: config.mergeTextBlocks,
      coordinateSpace: config.coordinateSpace,
    });
    this.matcher = new LayoutMatcher(config.categoryWeights);
    this.pixelAnalyzer = new PixelDiffAnalyzer();
    this.ruleChecker = new ResponsiveRuleChecker(config.thresholds);
  }

  /**
   * Extract one capture with this run's extraction settings.
   */
  extract(capture: ViewportCapture): ExtractionResult {
    return this.extractor.extract(capture);
  }

  evaluate(input: EvaluationInput): EvaluationReport {
    const timestamp = Date.now();
    const errors: ReportError[] = [];

    // 1. Document
    let parsed: ParsedDocument | undefined;
    try {
      parsed = parseDocument(input.html);
    } catch (error) {
      errors.push(toReportError('parse', error));
    }

    const documentRules: RuleResult[] = [];
    if (parsed) {
      const narrowest = narrowestBreakpoint(this.config.breakpoints) ?? DEFAULT_BREAKPOINTS[0];
      const viewport = { width: narrowest.width, height: narrowest.height };
      for (const rule of this.ruleChecker.documentRules()) {
        try {
          documentRules.push(rule.check(parsed, this.config.thresholds, viewport));
        } catch (error) {
          errors.push(toReportError('rules', error, rule.id));
        }
      }
    }

    if (input.captures.length === 0) {
      errors.push(toReportError('rules', new ValidatorInputError('No viewport captures were supplied')));
    }

    // 2-4. Viewports
    const matched = this.config.breakpoints.map((breakpoint) => ({
      breakpoint,
      capture: input.captures.find((c) => c.breakpoint.name === breakpoint.name),
    }));
    const strictest = strictestBreakpoint(
      matched.flatMap(({ capture }) => (capture ? [capture] : []))
    );

    const viewports = matched.map(({ breakpoint, capture }) =>
      this.evaluateViewport(breakpoint, capture, capture?.breakpoint.name === strictest, input)
    );

    const report: EvaluationReport = {
      source: input.source ?? 'document',
      timestamp,
      documentRules,
      viewports,
      errors,
      summary: summarize(documentRules, viewports, errors, this.config),
    };
    return deepFreeze(report);
  }

  private evaluateViewport(
    breakpoint: Breakpoint,
    capture: ViewportCapture | undefined,
    strictest: boolean,
    input: EvaluationInput
  ): ViewportReport {
    const report: ViewportReport = { breakpoint: { ...breakpoint }, rules: [], errors: [] };

    if (!capture) {
      report.errors.push(
        toReportError('extract', new ExtractionError(`No capture supplied for breakpoint "${breakpoint.name}"`))
      );
      return report;
    }
    if (capture.breakpoint.width !== breakpoint.width) {
      report.errors.push(
        toReportError(
          'extract',
          new ExtractionError(
            `Capture "${breakpoint.name}" was taken at ${capture.breakpoint.width}px, expected ${breakpoint.width}px`
          )
        )
      );
      return report;
    }

    let snapshot: LayoutSnapshot | undefined;
    try {
      const extraction = this.extractor.extract(capture);
      snapshot = extraction.snapshot;
      report.extraction = {
        componentCount: extraction.snapshot.components.length,
        diagnostics: extraction.diagnostics,
        excluded: extraction.excluded,
      };
    } catch (error) {
      report.errors.push(toReportError('extract', error));
    }

    for (const rule of this.ruleChecker.viewportRules(strictest)) {
      try {
        report.rules.push(rule.check(capture, this.config.thresholds));
      } catch (error) {
        report.errors.push(toReportError('rules', error, rule.id));
      }
    }

    if (input.referenceSnapshots && snapshot) {
      const reference = input.referenceSnapshots.find((s) => s.breakpoint.name === breakpoint.name);
      if (!reference) {
        report.errors.push(
          toReportError('layout', new ExtractionError(`No reference snapshot for breakpoint "${breakpoint.name}"`))
        );
      } else {
        try {
          report.layout = this.matcher.compare(snapshot, reference);
        } catch (error) {
          report.errors.push(toReportError('layout', error));
        }
      }
    }

    const screenshot = input.screenshots?.[breakpoint.name];
    const groundTruth = input.groundTruth?.[breakpoint.name];
    if (screenshot && groundTruth) {
      try {
        report.pixelDiff = this.pixelAnalyzer.compare(
          toRaster(screenshot),
          toRaster(groundTruth),
          this.options.pixelDiff
        );
      } catch (error) {
        report.errors.push(toReportError('pixel-diff', error));
      }
    } else if (screenshot || groundTruth) {
      const missing = screenshot ? 'ground truth' : 'screenshot';
      report.errors.push(
        toReportError('pixel-diff', new EvaluationError(`No ${missing} supplied for breakpoint "${breakpoint.name}"`))
      );
    }

    return report;
  }
}

/**
 * Grade scale:
 * - A: >95% similarity
 * - B: >85%
 * - C: >70%
 * - D: >50%
 * - F: otherwise
 */
export function gradeFor(score: number): Grade {
  const { grade } = THRESHOLDS;
  if (score > grade.A) return 'A';
  if (score > grade.B) return 'B';
  if (score > grade.C) return 'C';
  if (score > grade.D) return 'D';
  return 'F';
}

function summarize(
  documentRules: RuleResult[],
  viewports: ViewportReport[],
  errors: ReportError[],
  config: EvaluationConfig
): EvaluationSummary {
  const rules = [...documentRules, ...viewports.flatMap((v) => v.rules)];
  const rulesPassed = rules.filter((r) => r.passed).length;
  const errorCount = errors.length + viewports.reduce((sum, v) => sum + v.errors.length, 0);

  const layoutScores = viewports.flatMap((v) => (v.layout ? [v.layout.score] : []));
  const pixelScores = viewports.flatMap((v) => (v.pixelDiff ? [v.pixelDiff.percentageDifference] : []));

  const meanLayoutSimilarity =
    layoutScores.length > 0 ? layoutScores.reduce((a, b) => a + b, 0) / layoutScores.length : undefined;
  const maxPixelDifference = pixelScores.length > 0 ? Math.max(...pixelScores) : undefined;
  const grade = meanLayoutSimilarity !== undefined ? gradeFor(meanLayoutSimilarity) : undefined;

  const passed =
    rulesPassed === rules.length &&
    errorCount === 0 &&
    layoutScores.every((s) => s >= config.thresholds.minLayoutSimilarity) &&
    pixelScores.every((p) => p <= config.thresholds.maxPixelDifferencePercent);

  const parts = [`${rulesPassed}/${rules.length} rules passed`];
  if (meanLayoutSimilarity !== undefined && grade) {
    parts.push(`mean LSS ${meanLayoutSimilarity.toFixed(3)} (${grade})`);
  }
  if (maxPixelDifference !== undefined) {
    parts.push(`max pixel difference ${maxPixelDifference.toFixed(2)}%`);
  }
  if (errorCount > 0) {
    parts.push(`${errorCount} error${errorCount === 1 ? '' : 's'}`);
  }

  return {
    passed,
    rulesPassed,
    rulesTotal: rules.length,
    errorCount,
    ...(meanLayoutSimilarity !== undefined ? { meanLayoutSimilarity } : {}),
    ...(grade ? { grade } : {}),
    ...(maxPixelDifference !== undefined ? { maxPixelDifference } : {}),
    text: `${passed ? 'PASS' : 'FAIL'}: ${parts.join(', ')}`,
  };
}

function toRaster(image: ImageSource): RasterImage {
  return Buffer.isBuffer(image) ? decodePng(image) : image;
}

function toReportError(stage: EvaluationStage, error: unknown, ruleId?: RuleId): ReportError {
  const name = error instanceof Error ? error.name : 'Error';
  const message = error instanceof Error ? error.message : String(error);
  return { stage, name, message, ...(ruleId ? { ruleId } : {}) };
}

/** Freeze a report tree in place. Binary buffers are left as they are. */
function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== 'object' || ArrayBuffer.isView(value) || Object.isFrozen(value)) {
    return value;
  }
  for (const child of Object.values(value)) deepFreeze(child);
  Object.freeze(value);
  return value;
}
