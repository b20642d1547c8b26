/**
 * In-page capture script.
 *
 * The rendering collaborator (any headless browser) loads the page at a
 * breakpoint, evaluates CAPTURE_SCRIPT and hands the returned value to
 * `toViewportCapture`. Selectors follow `describeElement` so that inline
 * style declarations and captured elements share one naming scheme.
 */

import { ExtractionError } from './errors.js';
import { viewportCaptureSchema } from './capture-schema.js';
import type { Breakpoint, ViewportCapture } from './types.js';

/* Runs in browser context: DOM globals are available at runtime */
export const CAPTURE_SCRIPT = `(() => {
  const properties = {
    display: 'display',
    visibility: 'visibility',
    opacity: 'opacity',
    fontSize: 'font-size',
    lineHeight: 'line-height',
  };
  const describe = (element) => {
    const path = [];
    let current = element;
    while (current && current.tagName.toLowerCase() !== 'body' && current.tagName.toLowerCase() !== 'html') {
      const tag = current.tagName.toLowerCase();
      if (current.id) {
        path.unshift(tag + '#' + current.id);
        break;
      }
      let nth = 1;
      let sibling = current.previousElementSibling;
      while (sibling) {
        if (sibling.tagName === current.tagName) nth++;
        sibling = sibling.previousElementSibling;
      }
      path.unshift(tag + ':nth-of-type(' + nth + ')');
      current = current.parentElement;
    }
    return path.length > 0 ? path.join(' > ') : element.tagName.toLowerCase();
  };
  const elements = [];
  document.body.querySelectorAll('*').forEach((element) => {
    const tagName = element.tagName.toLowerCase();
    if (tagName === 'script' || tagName === 'style') return;
    const computed = window.getComputedStyle(element);
    const computedStyles = {};
    Object.keys(properties).forEach((key) => {
      const value = computed.getPropertyValue(properties[key]);
      if (value) computedStyles[key] = value;
    });
    const attributes = {};
    for (let i = 0; i < element.attributes.length; i++) {
      attributes[element.attributes[i].name] = element.attributes[i].value;
    }
    let directText = '';
    for (let i = 0; i < element.childNodes.length; i++) {
      if (element.childNodes[i].nodeType === 3) directText += element.childNodes[i].textContent;
    }
    const rendered = typeof element.innerText === 'string' ? element.innerText : element.textContent;
    const rect = element.getBoundingClientRect();
    elements.push({
      selector: describe(element),
      tagName,
      attributes,
      bounds: { x: rect.left + (window.scrollX || 0), y: rect.top + (window.scrollY || 0), width: rect.width, height: rect.height },
      computedStyles,
      textContent: directText.trim(),
      innerText: (rendered || '').trim(),
    });
  });
  const root = document.documentElement;
  return {
    documentSize: { width: root.scrollWidth, height: root.scrollHeight },
    elements,
  };
})()`;

/**
 * Validate the value returned by CAPTURE_SCRIPT and attach its breakpoint.
 */
export function toViewportCapture(breakpoint: Breakpoint, raw: unknown): ViewportCapture {
  const candidate = typeof raw === 'object' && raw !== null ? { ...raw, breakpoint } : raw;
  const parsed = viewportCaptureSchema.safeParse(candidate);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first ? `${first.path.join('.') || '(root)'}: ${first.message}` : 'unknown shape';
    throw new ExtractionError(`Capture script returned an invalid result at ${breakpoint.name}: ${where}`);
  }
  return parsed.data;
}
