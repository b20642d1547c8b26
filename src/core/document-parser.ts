/**
 * Document Parser
 *
 * Parses an HTML document with jsdom and collects its authored style
 * declarations (inline `style` attributes and `<style>` sheets, including
 * rules nested in @media/@supports blocks).
 */

import { JSDOM } from 'jsdom';
import { mediaMatches } from './css-units.js';
import { ExtractionError } from './errors.js';
import type { Size } from './types.js';

export type DeclarationSource = 'inline' | 'stylesheet';

export interface StyleDeclaration {
  /** Selector text of the rule, or the element path for inline styles. */
  selector: string;
  property: string;
  value: string;
  source: DeclarationSource;
  /** Condition text of the enclosing @media rule, if any. */
  media?: string;
  /** Elements of the document the declaration applies to. */
  elements: Element[];
}

export interface ParsedDocument {
  readonly document: Document;
  readonly declarations: readonly StyleDeclaration[];
  /** Selectors that could not be matched against the document. */
  readonly skippedSelectors: readonly string[];
}

export function parseDocument(html: string): ParsedDocument {
  if (html.trim().length === 0) {
    throw new ExtractionError('Document is empty');
  }

  let dom: JSDOM;
  try {
    dom = new JSDOM(html);
  } catch (error) {
    throw new ExtractionError('Document could not be parsed', { cause: error });
  }

  const document = dom.window.document;
  const hasContent =
    document.body.childElementCount > 0 ||
    (document.body.textContent ?? '').trim() !== '' ||
    document.head.childElementCount > 0;
  if (!hasContent) {
    throw new ExtractionError('Document has no content');
  }

  const declarations: StyleDeclaration[] = [];
  const skippedSelectors: string[] = [];

  try {
    for (const sheet of Array.from(document.styleSheets)) {
      collectRuleDeclarations(document, Array.from(sheet.cssRules), undefined, declarations, skippedSelectors);
    }
  } catch (error) {
    throw new ExtractionError('Style sheets could not be read', { cause: error });
  }

  for (const element of Array.from(document.querySelectorAll('[style]'))) {
    const selector = describeElement(element);
    for (const [property, value] of parseInlineStyle(element.getAttribute('style') ?? '')) {
      declarations.push({ selector, property, value, source: 'inline', elements: [element] });
    }
  }

  return { document, declarations, skippedSelectors };
}

/**
 * Split a `style` attribute into lower-cased property/value pairs.
 */
export function parseInlineStyle(style: string): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  for (const part of style.split(';')) {
    const colon = part.indexOf(':');
    if (colon <= 0) continue;
    const property = part.slice(0, colon).trim().toLowerCase();
    const value = part.slice(colon + 1).trim();
    if (property && value) pairs.push([property, value]);
  }
  return pairs;
}

/**
 * Short path identifying an element: `tag#id`, or a chain of
 * `tag:nth-of-type(n)` segments from the body.
 */
export function describeElement(element: Element): string {
  const path: string[] = [];
  let current: Element | null = element;

  while (current && current.tagName.toLowerCase() !== 'body' && current.tagName.toLowerCase() !== 'html') {
    const tag = current.tagName.toLowerCase();
    if (current.id) {
      path.unshift(`${tag}#${current.id}`);
      break;
    }
    let nth = 1;
    let sibling = current.previousElementSibling;
    while (sibling) {
      if (sibling.tagName === current.tagName) nth++;
      sibling = sibling.previousElementSibling;
    }
    path.unshift(`${tag}:nth-of-type(${nth})`);
    current = current.parentElement;
  }

  return path.length > 0 ? path.join(' > ') : element.tagName.toLowerCase();
}

/**
 * Declarations in effect at a viewport: unconditional ones plus those whose
 * enclosing @media list holds there.
 */
export function declarationsAt(parsed: ParsedDocument, viewport: Size, rootFontSize?: number): StyleDeclaration[] {
  return parsed.declarations.filter(
    (declaration) => declaration.media === undefined || mediaMatches(declaration.media, viewport, rootFontSize)
  );
}

export function findMetaContent(document: Document, name: string): string | undefined {
  for (const meta of Array.from(document.querySelectorAll('meta[name]'))) {
    if ((meta.getAttribute('name') ?? '').trim().toLowerCase() === name) {
      return meta.getAttribute('content') ?? '';
    }
  }
  return undefined;
}

function isStyleRule(rule: CSSRule): rule is CSSStyleRule {
  return rule.type === 1;
}

function isGroupingRule(rule: CSSRule): rule is CSSGroupingRule {
  return 'cssRules' in rule;
}

function isMediaRule(rule: CSSRule): rule is CSSMediaRule {
  return rule.type === 4;
}

function collectRuleDeclarations(
  document: Document,
  rules: CSSRule[],
  media: string | undefined,
  out: StyleDeclaration[],
  skipped: string[]
): void {
  for (const rule of rules) {
    if (isStyleRule(rule)) {
      const selector = rule.selectorText;
      let elements: Element[];
      try {
        elements = Array.from(document.querySelectorAll(selector));
      } catch {
        skipped.push(selector);
        continue;
      }
      for (let i = 0; i < rule.style.length; i++) {
        const property = rule.style[i].toLowerCase();
        const value = rule.style.getPropertyValue(property).trim();
        if (!value) continue;
        out.push({ selector, property, value, source: 'stylesheet', media, elements });
      }
    } else if (isGroupingRule(rule)) {
      const condition = isMediaRule(rule) ? rule.media.mediaText : media;
      collectRuleDeclarations(document, Array.from(rule.cssRules), condition, out, skipped);
    }
  }
}
