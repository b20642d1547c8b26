/**
 * CLI tests for layout-eval: argument parsing and command runners.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { Chalk } from 'chalk';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PNG } from 'pngjs';
import { parseFormat, parseNamedPaths, runDiff, runEvaluate, runLayout, toJson } from './cli.js';
import { ConfigError, IncompatibleSnapshotError } from './core/errors.js';
import { encodePng } from './core/pixel-diff-analyzer.js';
import type { RasterImage, RenderedElement } from './core/types.js';

const plain = new Chalk({ level: 0 });

const html = `<!DOCTYPE html>
<html>
<head>
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <style>main { max-width: 100%; padding: 1rem; } img { max-width: 100%; height: auto; }</style>
</head>
<body><main><h1>Title</h1><img src="hero.png"><button>Go</button></main></body>
</html>`;

const text = { fontSize: '16px', lineHeight: '24px', display: 'block' };

const elements: RenderedElement[] = [
  {
    selector: 'main:nth-of-type(1) > h1:nth-of-type(1)',
    tagName: 'h1',
    attributes: {},
    bounds: { x: 16, y: 16, width: 328, height: 40 },
    computedStyles: text,
    textContent: 'Title',
  },
  {
    selector: 'main:nth-of-type(1) > img:nth-of-type(1)',
    tagName: 'img',
    attributes: { src: 'hero.png' },
    bounds: { x: 16, y: 80, width: 328, height: 200 },
    computedStyles: { display: 'block' },
  },
  {
    selector: 'main:nth-of-type(1) > button:nth-of-type(1)',
    tagName: 'button',
    attributes: {},
    bounds: { x: 16, y: 300, width: 120, height: 48 },
    computedStyles: text,
    textContent: 'Go',
  },
];

const captureFile = {
  source: 'landing.html',
  html,
  captures: [
    {
      breakpoint: { name: 'phone', width: 360, height: 640 },
      documentSize: { width: 360, height: 400 },
      elements,
    },
  ],
};

function solid(value: number, size = 2): RasterImage {
  return { width: size, height: size, channels: 3, data: new Uint8Array(size * size * 3).fill(value) };
}

describe('parseNamedPaths', () => {
  it('should map breakpoint names to files', () => {
    expect(parseNamedPaths(['phone=a.png', 'laptop=shots/b=c.png'], '--screenshot')).toEqual({
      phone: 'a.png',
      laptop: 'shots/b=c.png',
    });
  });

  it('should reject values without a name or a file', () => {
    expect(() => parseNamedPaths(['a.png'], '--screenshot')).toThrow(
      'Invalid --screenshot value "a.png": expected <breakpoint>=<file>'
    );
    expect(() => parseNamedPaths(['=a.png'], '--screenshot')).toThrow(ConfigError);
    expect(() => parseNamedPaths(['phone='], '--ground-truth')).toThrow(ConfigError);
  });
});

describe('parseFormat', () => {
  it('should accept text and json only', () => {
    expect(parseFormat('text')).toBe('text');
    expect(parseFormat('json')).toBe('json');
    expect(() => parseFormat('xml')).toThrow('Invalid format "xml": expected text or json');
  });
});

describe('toJson', () => {
  it('should leave diff images out', () => {
    expect(JSON.parse(toJson({ mse: 1, diffImage: Buffer.from([1, 2]) }))).toEqual({ mse: 1 });
  });
});

describe('commands', () => {
  let dir: string;
  let capturePath: string;
  let configPath: string;
  let blackPath: string;
  let greyPath: string;
  let whitePath: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'layout-eval-cli-'));
    capturePath = join(dir, 'capture.json');
    configPath = join(dir, 'config.json');
    blackPath = join(dir, 'black.png');
    greyPath = join(dir, 'grey.png');
    whitePath = join(dir, 'white.png');
    await Promise.all([
      writeFile(capturePath, JSON.stringify(captureFile)),
      writeFile(configPath, JSON.stringify({ breakpoints: [{ name: 'phone', width: 360, height: 640 }] })),
      writeFile(blackPath, encodePng(solid(0))),
      writeFile(greyPath, encodePng(solid(51))),
      writeFile(whitePath, encodePng(solid(255, 40))),
    ]);
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('runEvaluate', () => {
    it('should pass a responsive capture', async () => {
      const { result, output, exitCode } = await runEvaluate(
        { capture: capturePath, config: configPath, screenshot: [], groundTruth: [], format: 'text' },
        plain
      );

      expect(exitCode).toBe(0);
      expect(result.source).toBe('landing.html');
      expect(result.summary.text).toBe('PASS: 8/8 rules passed');
      expect(output.split('\n').slice(0, 4)).toEqual([
        'Responsive Layout Evaluation Report',
        '='.repeat(35),
        'Source: landing.html',
        'Result: PASS 8/8 rules passed',
      ]);
    });

    it('should score layout against a reference capture file', async () => {
      const { result } = await runEvaluate({
        capture: capturePath,
        reference: capturePath,
        config: configPath,
        screenshot: [],
        groundTruth: [],
        format: 'json',
      });
      expect(result.summary.meanLayoutSimilarity).toBe(1);
      expect(result.summary.grade).toBe('A');
    });

    it('should diff screenshots and write overlays', async () => {
      const diffDir = join(dir, 'diffs');
      const { result, output, exitCode } = await runEvaluate({
        capture: capturePath,
        config: configPath,
        screenshot: [`phone=${blackPath}`],
        groundTruth: [`phone=${greyPath}`],
        format: 'json',
        diffDir,
      });

      expect(exitCode).toBe(1);
      expect(result.viewports[0].pixelDiff?.percentageDifference).toBe(20);
      const parsed: unknown = JSON.parse(output);
      expect(parsed).toMatchObject({ viewports: [{ pixelDiff: { mse: 2601 } }] });
      expect(output).not.toContain('diffImage');

      const overlay = PNG.sync.read(await readFile(join(diffDir, 'phone-diff.png')));
      expect(overlay.width).toBe(2);
      expect(overlay.height).toBe(2);
    });

    it('should write component overlays for viewports with a screenshot', async () => {
      const overlayDir = join(dir, 'overlays');
      const { output } = await runEvaluate(
        {
          capture: capturePath,
          config: configPath,
          screenshot: [`phone=${whitePath}`],
          groundTruth: [],
          format: 'text',
          overlayDir,
        },
        plain
      );

      const file = join(overlayDir, 'phone-components.png');
      expect(output.endsWith(`Component overlay saved to ${file}`)).toBe(true);
      const overlay = PNG.sync.read(await readFile(file));
      expect(overlay.width).toBe(40);
      // h1 text block outlined from (16, 16)
      const at = (x: number, y: number) => Array.from(overlay.data.subarray((y * 40 + x) * 4, (y * 40 + x) * 4 + 3));
      expect(at(16, 16)).toEqual([255, 0, 0]);
      expect(at(20, 20)).toEqual([255, 255, 255]);
    });

    it('should reject an invalid capture file', async () => {
      const broken = join(dir, 'broken.json');
      await writeFile(broken, JSON.stringify({ captures: 'none' }));
      await expect(
        runEvaluate({ capture: broken, screenshot: [], groundTruth: [], format: 'text' })
      ).rejects.toThrow(`Invalid ${broken}: captures: `);
    });
  });

  describe('runLayout', () => {
    it('should compare two capture files breakpoint by breakpoint', async () => {
      const { result, output, exitCode } = await runLayout(
        { predicted: capturePath, reference: capturePath, format: 'text' },
        plain
      );

      expect(exitCode).toBe(0);
      expect(result.map((s) => [s.breakpoint, s.score])).toEqual([['phone', 1]]);
      expect(output.split('\n')[0]).toBe('Layout similarity at phone: 1.000');
    });

    it('should fail when the requested breakpoint is not in both files', async () => {
      await expect(
        runLayout({ predicted: capturePath, reference: capturePath, viewport: 'tablet', format: 'json' })
      ).rejects.toThrow(IncompatibleSnapshotError);
    });
  });

  describe('runDiff', () => {
    it('should fail above the maximum difference', async () => {
      const { result, output, exitCode } = await runDiff({ a: blackPath, b: greyPath, maxDifference: '10' });

      expect(result.percentageDifference).toBe(20);
      expect(output.startsWith('Pixel difference: 20.00% (MSE 2601.00, RMSE 51.00, ')).toBe(true);
      expect(exitCode).toBe(1);
    });

    it('should pass within the maximum difference and save the overlay', async () => {
      const outputPath = join(dir, 'overlay.png');
      const { output, exitCode } = await runDiff({
        a: blackPath,
        b: greyPath,
        maxDifference: '25',
        output: outputPath,
      });

      expect(exitCode).toBe(0);
      expect(output.split('\n')[1]).toBe(`Diff overlay saved to ${outputPath}`);
      expect(PNG.sync.read(await readFile(outputPath)).width).toBe(2);
    });

    it('should reject an out-of-range maximum', async () => {
      await expect(runDiff({ a: blackPath, b: greyPath, maxDifference: '150' })).rejects.toThrow(
        '--max-difference must be a number between 0 and 100'
      );
    });
  });
});
