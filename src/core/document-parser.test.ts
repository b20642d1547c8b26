import { describe, it, expect } from 'vitest';
import { declarationsAt, describeElement, findMetaContent, parseDocument, parseInlineStyle } from './document-parser.js';
import { ExtractionError } from './errors.js';

const html = `<!DOCTYPE html>
<html>
<head>
  <meta name="Viewport" content="width=device-width">
  <style>
    .hero { width: 100%; max-width: 960px; }
    @media (max-width: 600px) {
      .hero { padding: 1rem; }
    }
  </style>
</head>
<body>
  <div class="hero" style="height: 300px; color: red">Welcome</div>
  <section id="main"><p>One</p><p>Two</p></section>
</body>
</html>`;

describe('parseDocument', () => {
  it('should collect stylesheet declarations with their matched elements', () => {
    const parsed = parseDocument(html);
    const hero = parsed.document.querySelector('.hero');
    const width = parsed.declarations.find((d) => d.property === 'width');

    expect(width).toMatchObject({ selector: '.hero', value: '100%', source: 'stylesheet' });
    expect(width?.media).toBeUndefined();
    expect(width?.elements).toEqual([hero]);
    expect(parsed.declarations.find((d) => d.property === 'max-width')?.value).toBe('960px');
  });

  it('should record the media condition of nested rules', () => {
    const parsed = parseDocument(html);
    const padding = parsed.declarations.find((d) => d.property === 'padding');
    expect(padding?.value).toBe('1rem');
    expect(padding?.media).toContain('max-width: 600px');
  });

  it('should collect inline style declarations', () => {
    const parsed = parseDocument(html);
    const inline = parsed.declarations.filter((d) => d.source === 'inline');
    expect(inline.map((d) => [d.selector, d.property, d.value])).toEqual([
      ['div:nth-of-type(1)', 'height', '300px'],
      ['div:nth-of-type(1)', 'color', 'red'],
    ]);
  });

  it('should read every declaration of a style sheet rule', () => {
    const parsed = parseDocument('<style>p { color: red; font-size: 14px }</style><p>x</p>');
    expect(parsed.declarations.map((d) => [d.selector, d.property, d.value, d.source])).toEqual([
      ['p', 'color', 'red', 'stylesheet'],
      ['p', 'font-size', '14px', 'stylesheet'],
    ]);
    expect(parsed.skippedSelectors).toEqual([]);
  });

  it('should record selectors that cannot be matched', () => {
    const parsed = parseDocument('<style>a:unknown-state { width: 10px } p { width: 50% }</style><p>x</p>');
    expect(parsed.skippedSelectors).toEqual(['a:unknown-state']);
    expect(parsed.declarations.map((d) => d.selector)).toEqual(['p']);
  });

  it('should throw ExtractionError for an empty document', () => {
    expect(() => parseDocument('')).toThrow(ExtractionError);
    expect(() => parseDocument('   \n')).toThrow('Document is empty');
  });

  it('should throw ExtractionError for a document without content', () => {
    expect(() => parseDocument('<html><head></head><body></body></html>')).toThrow('Document has no content');
  });

  it('should accept a fragment with only text', () => {
    const parsed = parseDocument('hello');
    expect(parsed.declarations).toEqual([]);
    expect(parsed.document.body.textContent).toBe('hello');
  });
});

describe('declarationsAt', () => {
  const parsed = parseDocument(
    '<style>img { max-width: 100% } @media (min-width: 1200px) { img { width: 600px } } @media print { img { width: 5cm } }</style><img src="a.png">'
  );

  it('should drop declarations whose media query does not hold', () => {
    expect(declarationsAt(parsed, { width: 375, height: 812 }).map((d) => `${d.property}: ${d.value}`)).toEqual([
      'max-width: 100%',
    ]);
  });

  it('should keep declarations whose media query holds', () => {
    expect(declarationsAt(parsed, { width: 1280, height: 800 }).map((d) => `${d.property}: ${d.value}`)).toEqual([
      'max-width: 100%',
      'width: 600px',
    ]);
  });
});

describe('parseInlineStyle', () => {
  it('should lower-case properties and skip malformed parts', () => {
    expect(parseInlineStyle('Color: red; ; width:10px;bad')).toEqual([
      ['color', 'red'],
      ['width', '10px'],
    ]);
  });

  it('should keep colons inside values', () => {
    expect(parseInlineStyle('background: url(http://x/y.png)')).toEqual([['background', 'url(http://x/y.png)']]);
  });
});

describe('describeElement', () => {
  it('should use the id when present', () => {
    const { document } = parseDocument(html);
    const main = document.querySelector('#main');
    expect(main && describeElement(main)).toBe('section#main');
  });

  it('should stop the path at the nearest ancestor with an id', () => {
    const { document } = parseDocument(html);
    const second = document.querySelectorAll('p')[1];
    expect(describeElement(second)).toBe('section#main > p:nth-of-type(2)');
  });

  it('should build an nth-of-type chain otherwise', () => {
    const { document } = parseDocument('<body><div><span>a</span><span>b</span></div></body>');
    const span = document.querySelectorAll('span')[1];
    expect(describeElement(span)).toBe('div:nth-of-type(1) > span:nth-of-type(2)');
  });
});

describe('findMetaContent', () => {
  it('should match meta names case-insensitively', () => {
    const { document } = parseDocument(html);
    expect(findMetaContent(document, 'viewport')).toBe('width=device-width');
  });

  it('should return undefined when the meta tag is missing', () => {
    const { document } = parseDocument('<p>x</p>');
    expect(findMetaContent(document, 'viewport')).toBeUndefined();
  });
});
