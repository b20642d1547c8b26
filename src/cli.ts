#!/usr/bin/env node
/**
 * layout-eval CLI - evaluate captured pages for responsive layout quality.
 */

import { Command } from 'commander';
import chalk, { type ChalkInstance } from 'chalk';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { pathToFileURL } from 'node:url';
import { loadCaptureFile, type CaptureFile } from './core/capture-schema.js';
import { loadConfigFile, resolveConfig, type EvaluationConfig } from './core/config.js';
import { ComponentExtractor } from './core/component-extractor.js';
import { renderComponentOverlay } from './core/component-overlay.js';
import { ConfigError, IncompatibleSnapshotError } from './core/errors.js';
import { EvaluationOrchestrator } from './core/evaluation-orchestrator.js';
import { LayoutMatcher } from './core/layout-matcher.js';
import { PixelDiffAnalyzer } from './core/pixel-diff-analyzer.js';
import { formatLayoutSimilarity, formatPixelDiff, formatTextReport } from './core/report-formatter.js';
import { THRESHOLDS, type EvaluationReport, type LayoutSimilarity, type PixelDiffResult } from './core/types.js';

export type OutputFormat = 'text' | 'json';

export interface EvaluateCommandOptions {
  capture: string;
  reference?: string;
  screenshot: string[];
  groundTruth: string[];
  config?: string;
  format: string;
  diffDir?: string;
  overlayDir?: string;
}

export interface LayoutCommandOptions {
  predicted: string;
  reference: string;
  viewport?: string;
  config?: string;
  format: string;
}

export interface DiffCommandOptions {
  a: string;
  b: string;
  output?: string;
  maxDifference: string;
}

export interface CommandResult<T> {
  result: T;
  output: string;
  exitCode: number;
}

// ── Argument parsing ──

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Parse repeated `name=path` arguments into a map keyed by breakpoint name.
 */
export function parseNamedPaths(values: string[], option: string): Record<string, string> {
  const paths: Record<string, string> = {};
  for (const value of values) {
    const separator = value.indexOf('=');
    if (separator <= 0 || separator === value.length - 1) {
      throw new ConfigError(`Invalid ${option} value "${value}": expected <breakpoint>=<file>`);
    }
    paths[value.slice(0, separator)] = value.slice(separator + 1);
  }
  return paths;
}

export function parseFormat(value: string): OutputFormat {
  if (value === 'text' || value === 'json') return value;
  throw new ConfigError(`Invalid format "${value}": expected text or json`);
}

async function readImages(paths: Record<string, string>): Promise<Record<string, Buffer>> {
  const entries = await Promise.all(
    Object.entries(paths).map(async ([name, path]) => [name, await readFile(path)] as const)
  );
  return Object.fromEntries(entries);
}

async function loadConfig(path?: string): Promise<EvaluationConfig> {
  return path ? loadConfigFile(path) : resolveConfig();
}

/** Serialize a report without embedded image bytes. */
export function toJson(value: unknown): string {
  return JSON.stringify(value, (key, inner: unknown) => (key === 'diffImage' ? undefined : inner), 2);
}

// ── Commands ──

export async function runEvaluate(
  options: EvaluateCommandOptions,
  colors: ChalkInstance = chalk
): Promise<CommandResult<EvaluationReport>> {
  const format = parseFormat(options.format);
  const screenshotPaths = parseNamedPaths(options.screenshot, '--screenshot');
  const groundTruthPaths = parseNamedPaths(options.groundTruth, '--ground-truth');

  const [config, capture, reference, screenshots, groundTruth] = await Promise.all([
    loadConfig(options.config),
    loadCaptureFile(options.capture),
    options.reference ? loadCaptureFile(options.reference) : Promise.resolve(undefined),
    readImages(screenshotPaths),
    readImages(groundTruthPaths),
  ]);

  const orchestrator = new EvaluationOrchestrator(config, {
    pixelDiff: { includeDiffImage: options.diffDir !== undefined },
  });

  const report = orchestrator.evaluate({
    source: capture.source ?? options.capture,
    html: capture.html,
    captures: capture.captures,
    referenceSnapshots: reference?.captures.map((c) => orchestrator.extract(c).snapshot),
    screenshots,
    groundTruth,
  });

  const notes: string[] = [];
  if (options.diffDir) {
    const written = await writeDiffImages(report, options.diffDir);
    notes.push(...written.map((file) => colors.green(`Diff overlay saved to ${file}`)));
  }
  if (options.overlayDir) {
    const written = await writeComponentOverlays(report, capture, screenshots, orchestrator, options.overlayDir);
    notes.push(...written.map((file) => colors.green(`Component overlay saved to ${file}`)));
  }

  const output = format === 'json' ? toJson(report) : formatTextReport(report, colors) + notes.join('\n');
  return { result: report, output, exitCode: report.summary.passed ? 0 : 1 };
}

export async function runLayout(
  options: LayoutCommandOptions,
  colors: ChalkInstance = chalk
): Promise<CommandResult<LayoutSimilarity[]>> {
  const format = parseFormat(options.format);
  const [config, predicted, reference] = await Promise.all([
    loadConfig(options.config),
    loadCaptureFile(options.predicted),
    loadCaptureFile(options.reference),
  ]);

  const similarities = compareCaptureFiles(predicted, reference, config, options.viewport);
  const output =
    format === 'json'
      ? toJson(similarities)
      : similarities.map((similarity) => formatLayoutSimilarity(similarity, colors)).join('\n\n');

  const failing = similarities.some((s) => s.score < config.thresholds.minLayoutSimilarity);
  return { result: similarities, output, exitCode: failing ? 1 : 0 };
}

export async function runDiff(options: DiffCommandOptions): Promise<CommandResult<PixelDiffResult>> {
  const maxDifference = Number.parseFloat(options.maxDifference);
  if (Number.isNaN(maxDifference) || maxDifference < 0 || maxDifference > 100) {
    throw new ConfigError('--max-difference must be a number between 0 and 100');
  }

  const [imageA, imageB] = await Promise.all([readFile(options.a), readFile(options.b)]);
  const result = new PixelDiffAnalyzer().compareBuffers(imageA, imageB, {
    includeDiffImage: options.output !== undefined,
  });

  const lines = [formatPixelDiff(result)];
  if (result.diffImage && options.output) {
    await writeFile(options.output, result.diffImage);
    lines.push(`Diff overlay saved to ${options.output}`);
  }

  return {
    result,
    output: lines.join('\n'),
    exitCode: result.percentageDifference <= maxDifference ? 0 : 1,
  };
}

/**
 * Extract both capture files and compare them breakpoint by breakpoint.
 */
export function compareCaptureFiles(
  predicted: CaptureFile,
  reference: CaptureFile,
  config: EvaluationConfig,
  viewport?: string
): LayoutSimilarity[] {
  const extractor = new ComponentExtractor({
    mergeTextBlocks: config.mergeTextBlocks,
    coordinateSpace: config.coordinateSpace,
  });
  const matcher = new LayoutMatcher(config.categoryWeights);

  const pairs = predicted.captures
    .filter((capture) => viewport === undefined || capture.breakpoint.name === viewport)
    .flatMap((capture) => {
      const counterpart = reference.captures.find((c) => c.breakpoint.name === capture.breakpoint.name);
      return counterpart ? [{ capture, counterpart }] : [];
    });

  if (pairs.length === 0) {
    throw new IncompatibleSnapshotError(
      viewport
        ? `Breakpoint "${viewport}" is not captured in both files`
        : 'The capture files share no breakpoint'
    );
  }

  return pairs.map(({ capture, counterpart }) =>
    matcher.compare(extractor.extract(capture).snapshot, extractor.extract(counterpart).snapshot)
  );
}

async function writeDiffImages(report: EvaluationReport, directory: string): Promise<string[]> {
  await mkdir(directory, { recursive: true });
  const written: string[] = [];
  for (const viewport of report.viewports) {
    const image = viewport.pixelDiff?.diffImage;
    if (!image) continue;
    const file = join(directory, `${viewport.breakpoint.name}-diff.png`);
    await writeFile(file, image);
    written.push(file);
  }
  return written;
}

/**
 * Outline the extracted components on each screenshot, for viewports whose
 * extraction succeeded.
 */
async function writeComponentOverlays(
  report: EvaluationReport,
  capture: CaptureFile,
  screenshots: Record<string, Buffer>,
  orchestrator: EvaluationOrchestrator,
  directory: string
): Promise<string[]> {
  await mkdir(directory, { recursive: true });
  const written: string[] = [];
  for (const viewport of report.viewports) {
    const name = viewport.breakpoint.name;
    const screenshot = screenshots[name];
    const captured = capture.captures.find((c) => c.breakpoint.name === name);
    if (!screenshot || !captured || !viewport.extraction) continue;

    const { snapshot } = orchestrator.extract(captured);
    const file = join(directory, `${name}-components.png`);
    await writeFile(
      file,
      renderComponentOverlay(snapshot, screenshot, { coordinateSpace: orchestrator.config.coordinateSpace })
    );
    written.push(file);
  }
  return written;
}

function fail(error: unknown): never {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : error);
  process.exit(1);
}

// ── Program ──

export function createProgram(): Command {
  const program = new Command();

  program
    .name('layout-eval')
    .description('Evaluate rendered pages for responsive layout quality')
    .version('0.1.0');

  program
    .command('evaluate')
    .description('Run rules, layout matching and pixel diffs over a capture file')
    .requiredOption('--capture <file>', 'Capture file (HTML plus per-breakpoint element records)')
    .option('--reference <file>', 'Capture file of the reference layout')
    .option('--screenshot <name=png>', 'Screenshot for a breakpoint (repeatable)', collect, [])
    .option('--ground-truth <name=png>', 'Ground-truth screenshot for a breakpoint (repeatable)', collect, [])
    .option('--config <file>', 'JSON configuration file')
    .option('--format <format>', 'Output format (json|text)', 'text')
    .option('--diff-dir <dir>', 'Directory to write pixel diff overlays to')
    .option('--overlay-dir <dir>', 'Directory to write screenshots annotated with the extracted components to')
    .action(async (options: EvaluateCommandOptions) => {
      try {
        const { output, exitCode } = await runEvaluate(options);
        console.log(output);
        process.exit(exitCode);
      } catch (error) {
        fail(error);
      }
    });

  program
    .command('layout')
    .description('Compute the layout similarity score between two capture files')
    .requiredOption('--predicted <file>', 'Capture file of the generated page')
    .requiredOption('--reference <file>', 'Capture file of the reference page')
    .option('--viewport <name>', 'Only compare this breakpoint')
    .option('--config <file>', 'JSON configuration file')
    .option('--format <format>', 'Output format (json|text)', 'text')
    .action(async (options: LayoutCommandOptions) => {
      try {
        const { output, exitCode } = await runLayout(options);
        console.log(output);
        process.exit(exitCode);
      } catch (error) {
        fail(error);
      }
    });

  program
    .command('diff')
    .description('Pixel diff two PNG screenshots')
    .requiredOption('--a <png>', 'First image')
    .requiredOption('--b <png>', 'Second image')
    .option('--output <file>', 'Output file path for diff overlay')
    .option('--max-difference <percent>', 'Largest passing percentage difference', String(THRESHOLDS.maxPixelDifferencePercent))
    .action(async (options: DiffCommandOptions) => {
      try {
        const { output, exitCode } = await runDiff(options);
        console.log(output);
        process.exit(exitCode);
      } catch (error) {
        fail(error);
      }
    });

  return program;
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  createProgram().parseAsync(process.argv).catch(fail);
}
