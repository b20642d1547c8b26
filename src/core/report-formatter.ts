/**
 * Human-readable rendering of evaluation results for the terminal.
 */

import chalk, { type ChalkInstance } from 'chalk';
import {
  COMPONENT_CATEGORIES,
  type EvaluationReport,
  type LayoutSimilarity,
  type PixelDiffResult,
  type ReportError,
  type RuleResult,
  type ViewportReport,
} from './types.js';

const MAX_LISTED_ELEMENTS = 5;

export function formatTextReport(report: EvaluationReport, colors: ChalkInstance = chalk): string {
  const lines: string[] = [];
  const title = 'Responsive Layout Evaluation Report';

  lines.push(colors.bold(title));
  lines.push(colors.bold('='.repeat(title.length)));
  lines.push(`Source: ${report.source}`);

  const verdict = report.summary.passed ? colors.green('PASS') : colors.red('FAIL');
  lines.push(`Result: ${verdict} ${report.summary.text.replace(/^(PASS|FAIL): /, '')}`);

  lines.push('');
  lines.push(colors.bold('Document rules:'));
  if (report.documentRules.length === 0) {
    lines.push('  (none evaluated)');
  }
  for (const rule of report.documentRules) {
    lines.push(...formatRule(rule, colors));
  }
  for (const error of report.errors) {
    lines.push(formatError(error, colors));
  }

  for (const viewport of report.viewports) {
    lines.push('');
    lines.push(...formatViewport(viewport, colors));
  }

  return lines.join('\n') + '\n';
}

export function formatLayoutSimilarity(similarity: LayoutSimilarity, colors: ChalkInstance = chalk): string {
  const lines = [`Layout similarity at ${similarity.breakpoint}: ${scoreColor(similarity.score, colors)(similarity.score.toFixed(3))}`];
  for (const name of COMPONENT_CATEGORIES) {
    const category = similarity.categories[name];
    if (!category) continue;
    lines.push(
      `  ${category.category}: ${category.score.toFixed(3)} ` +
        `(weight ${formatWeight(category.normalizedWeight)}, ${category.matches.length} matched, ` +
        `${category.predictedCount} predicted / ${category.referenceCount} reference)`
    );
  }
  return lines.join('\n');
}

export function formatPixelDiff(result: PixelDiffResult): string {
  return (
    `Pixel difference: ${result.percentageDifference.toFixed(2)}% ` +
    `(MSE ${result.mse.toFixed(2)}, RMSE ${result.rmse.toFixed(2)}, ` +
    `${result.diffPixels.toLocaleString('en-US')} / ${result.totalPixels.toLocaleString('en-US')} pixels differ)`
  );
}

function formatViewport(viewport: ViewportReport, colors: ChalkInstance): string[] {
  const { breakpoint } = viewport;
  const lines = [colors.bold(`Viewport ${breakpoint.name} (${breakpoint.width}x${breakpoint.height}):`)];

  if (viewport.extraction) {
    const { componentCount, excluded, diagnostics } = viewport.extraction;
    lines.push(
      `  Components: ${componentCount} (hidden ${excluded.hidden}, zero-area ${excluded.zeroArea}, unclassified ${excluded.unclassified})`
    );
    for (const diagnostic of diagnostics) {
      lines.push(colors.yellow(`  [WARN] ${diagnostic.message}`));
    }
  }

  for (const rule of viewport.rules) {
    lines.push(...formatRule(rule, colors));
  }

  if (viewport.layout) {
    lines.push(...formatLayoutSimilarity(viewport.layout, colors).split('\n').map((line) => `  ${line}`));
  }
  if (viewport.pixelDiff) {
    lines.push(`  ${formatPixelDiff(viewport.pixelDiff)}`);
  }
  for (const error of viewport.errors) {
    lines.push(formatError(error, colors));
  }
  return lines;
}

function formatRule(rule: RuleResult, colors: ChalkInstance): string[] {
  const prefix = rule.passed ? colors.green('[PASS]') : colors.red('[FAIL]');
  const lines = [`  ${prefix} ${rule.ruleId}: ${rule.message}`];

  const listed = rule.affectedElements.slice(0, MAX_LISTED_ELEMENTS);
  for (const affected of listed) {
    lines.push(`      - ${colors.cyan(affected.element)}: ${affected.detail}`);
  }
  const rest = rule.affectedElements.length - listed.length;
  if (rest > 0) {
    lines.push(`      ... and ${rest} more`);
  }
  for (const note of rule.diagnostics ?? []) {
    lines.push(colors.yellow(`      ! ${note}`));
  }
  return lines;
}

function formatError(error: ReportError, colors: ChalkInstance): string {
  const rule = error.ruleId ? ` (${error.ruleId})` : '';
  return colors.red(`  [ERROR] ${error.stage}${rule}: ${error.name}: ${error.message}`);
}

function scoreColor(score: number, colors: ChalkInstance): ChalkInstance {
  if (score > 0.85) return colors.green;
  if (score > 0.7) return colors.yellow;
  return colors.red;
}

function formatWeight(weight: number): string {
  return String(Math.round(weight * 1000) / 1000);
}
