import { describe, it, expect } from 'vitest';
import { classifyLength, mediaMatches, parseCssLength, toPixels, type LengthContext } from './css-units.js';

const context: LengthContext = {
  fontSize: 20,
  rootFontSize: 16,
  viewport: { width: 400, height: 800 },
};

describe('parseCssLength', () => {
  it('should split value and unit', () => {
    expect(parseCssLength('12px')).toEqual({ value: 12, unit: 'px' });
    expect(parseCssLength(' 1.5EM ')).toEqual({ value: 1.5, unit: 'em' });
    expect(parseCssLength('.5rem')).toEqual({ value: 0.5, unit: 'rem' });
    expect(parseCssLength('150%')).toEqual({ value: 150, unit: '%' });
    expect(parseCssLength('2')).toEqual({ value: 2, unit: '' });
  });

  it('should return null for keywords, functions and missing values', () => {
    expect(parseCssLength('auto')).toBeNull();
    expect(parseCssLength('calc(100% - 10px)')).toBeNull();
    expect(parseCssLength(undefined)).toBeNull();
    expect(parseCssLength('')).toBeNull();
  });
});

describe('toPixels', () => {
  it('should convert absolute units', () => {
    expect(toPixels('14px', context)).toBe(14);
    expect(toPixels('12pt', context)).toBeCloseTo(16, 10);
    expect(toPixels('1in', context)).toBe(96);
  });

  it('should resolve font-relative units against the context', () => {
    expect(toPixels('0.5em', context)).toBe(10);
    expect(toPixels('2rem', context)).toBe(32);
    expect(toPixels('50%', context)).toBe(10);
    expect(toPixels('50%', { ...context, percentBase: 100 })).toBe(50);
  });

  it('should resolve viewport units', () => {
    expect(toPixels('10vw', context)).toBeCloseTo(40, 10);
    expect(toPixels('10vh', context)).toBeCloseTo(80, 10);
    expect(toPixels('10vmin', context)).toBeCloseTo(40, 10);
    expect(toPixels('10vmax', context)).toBeCloseTo(80, 10);
  });

  it('should accept unitless zero only', () => {
    expect(toPixels('0', context)).toBe(0);
    expect(toPixels('3', context)).toBeNull();
  });

  it('should return null for unknown units and keywords', () => {
    expect(toPixels('3fr', context)).toBeNull();
    expect(toPixels('12constructor', context)).toBeNull();
    expect(toPixels('12__proto__', context)).toBeNull();
    expect(toPixels('medium', context)).toBeNull();
    expect(toPixels(undefined, context)).toBeNull();
  });
});

describe('classifyLength', () => {
  it('should classify relative values', () => {
    expect(classifyLength('100%')).toBe('relative');
    expect(classifyLength('2rem 1em')).toBe('relative');
    expect(classifyLength('50vw')).toBe('relative');
  });

  it('should classify absolute values', () => {
    expect(classifyLength('960px')).toBe('absolute');
    expect(classifyLength('10px 5%')).toBe('absolute');
    expect(classifyLength('2in')).toBe('absolute');
  });

  it('should treat fluid functions with a relative term as relative', () => {
    expect(classifyLength('calc(100% - 32px)')).toBe('relative');
    expect(classifyLength('min(100%, 600px)')).toBe('relative');
    expect(classifyLength('clamp(1rem, 2vw, 24px)')).toBe('relative');
    expect(classifyLength('calc(20px + 4px)')).toBe('absolute');
  });

  it('should treat zero and keywords as neutral', () => {
    expect(classifyLength('0')).toBe('neutral');
    expect(classifyLength('0px')).toBe('neutral');
    expect(classifyLength('auto')).toBe('neutral');
    expect(classifyLength('0 auto')).toBe('neutral');
    expect(classifyLength('100% !important')).toBe('relative');
  });

  it('should not treat object prototype keys as units', () => {
    expect(classifyLength('12constructor')).toBe('neutral');
  });
});

describe('mediaMatches', () => {
  const phone = { width: 375, height: 812 };
  const desktop = { width: 1280, height: 800 };

  it('should evaluate width features against the viewport', () => {
    expect(mediaMatches('(min-width: 1200px)', phone)).toBe(false);
    expect(mediaMatches('(min-width: 1200px)', desktop)).toBe(true);
    expect(mediaMatches('screen and (max-width: 600px)', phone)).toBe(true);
    expect(mediaMatches('(min-width: 320px) and (max-width: 374px)', phone)).toBe(false);
  });

  it('should resolve em features against the root font size', () => {
    expect(mediaMatches('(min-width: 40em)', phone)).toBe(false);
    expect(mediaMatches('(min-width: 20em)', phone, 16)).toBe(true);
    expect(mediaMatches('(min-width: 20em)', phone, 20)).toBe(false);
  });

  it('should treat a comma-separated list as any-of', () => {
    expect(mediaMatches('print, (max-width: 400px)', phone)).toBe(true);
    expect(mediaMatches('print, (min-width: 400px)', phone)).toBe(false);
  });

  it('should honour media types, not and orientation', () => {
    expect(mediaMatches('print', phone)).toBe(false);
    expect(mediaMatches('only screen', phone)).toBe(true);
    expect(mediaMatches('not print', phone)).toBe(true);
    expect(mediaMatches('(orientation: portrait)', phone)).toBe(true);
    expect(mediaMatches('(orientation: portrait)', desktop)).toBe(false);
  });

  it('should take unknown features and unresolvable values to hold', () => {
    expect(mediaMatches('(prefers-color-scheme: dark)', phone)).toBe(true);
    expect(mediaMatches('(min-width: calc(10px + 2em))', phone)).toBe(true);
    expect(mediaMatches('', phone)).toBe(true);
  });
});
