import * as htmlparser2 from 'htmlparser2';
import { Element } from 'domhandler';
import type { AnyNode, Document } from 'domhandler';
import sax from 'sax';
import { MarkerNotFoundError, ValidationError } from './errors.js';

const { DomUtils } = htmlparser2;

/**
 * An element located in a narrative fragment.
 */
export interface HtmlElementInfo {
  tag: string;
  classNames: string[];
  id: string;
  attributes: Record<string, string>;
  /** Decoded text of the element and its descendants */
  textContent: string;
  /** Outer markup as re-serialized from the parsed tree */
  html: string;
  /** [start, end) offsets into the input string */
  position: [number, number];
}

/**
 * A structural block (section, article, div, main) carrying a class.
 */
export interface HtmlSectionInfo {
  tagName: string;
  className: string;
  id: string;
  start: number;
  end: number;
  content: string;
}

export interface HtmlStructureSummary {
  totalLength: number;
  totalElements: number;
  tagCounts: Record<string, number>;
  classCounts: Record<string, number>;
  hasTables: boolean;
  hasForms: boolean;
  hasLists: boolean;
  textLength: number;
}

export interface WellFormedResult {
  wellFormed: boolean;
  /** First parser complaint, without position details */
  error?: string;
}

export interface NarrativeValidation {
  valid: boolean;
  issues: string[];
}

const STRUCTURAL_TAGS = new Set(['section', 'article', 'div', 'main']);
const WHITESPACE = /\s+/;
const TAG_NAME = /^[A-Za-z][\w:-]*$/;

const FRAGMENT_ROOT = 'epi-narrative-fragment';
const FRAGMENT_ROOT_TAG = new RegExp(`</?${FRAGMENT_ROOT}(?=[\\s/>]|$)`);
const XML_DECLARATION = /<\?xml(?=[\s?]|$)/;

/**
 * Parse a markup fragment. Offsets are recorded on every node.
 */
export function parseHtml(html: string): Document {
  return htmlparser2.parseDocument(html, {
    withStartIndices: true,
    withEndIndices: true,
  });
}

export function serializeHtml(nodes: AnyNode | AnyNode[]): string {
  return DomUtils.getOuterHTML(nodes);
}

/**
 * Check that a fragment is well-formed XHTML. The fragment is wrapped in a
 * synthetic root, so several top-level elements are accepted. A narrative
 * is embedded content and may not carry an XML declaration.
 */
export function checkWellFormed(html: string): WellFormedResult {
  if (XML_DECLARATION.test(html)) {
    return { wellFormed: false, error: 'XML declaration is not allowed in a narrative' };
  }
  if (FRAGMENT_ROOT_TAG.test(html)) {
    return { wellFormed: false, error: `Reserved element name: ${FRAGMENT_ROOT}` };
  }

  const parser = sax.parser(true);
  let firstError: string | undefined;

  parser.onerror = (err) => {
    firstError ??= err.message.split('\n')[0];
    parser.resume();
  };
  parser.write(`<${FRAGMENT_ROOT}>${html}</${FRAGMENT_ROOT}>`).close();

  return firstError === undefined
    ? { wellFormed: true }
    : { wellFormed: false, error: firstError };
}

function classTokens(element: Element): string[] {
  const value = element.attribs['class'] ?? '';
  return value.split(WHITESPACE).filter(token => token.length > 0);
}

function describeElement(element: Element): HtmlElementInfo {
  const start = element.startIndex ?? 0;
  const end = element.endIndex === null ? start : element.endIndex + 1;
  return {
    tag: element.name,
    classNames: classTokens(element),
    id: element.attribs['id'] ?? '',
    attributes: { ...element.attribs },
    textContent: DomUtils.textContent(element),
    html: serializeHtml(element),
    position: [start, end],
  };
}

/**
 * Elements whose class attribute contains `className` as a whole token,
 * in document order. `epi-section-extra` does not match `epi-section`.
 */
export function findElementsByClass(html: string, className: string): HtmlElementInfo[] {
  if (!className) {
    return [];
  }
  const doc = parseHtml(html);
  return DomUtils
    .findAll(element => classTokens(element).includes(className), doc.children)
    .map(describeElement);
}

/**
 * Elements with the given tag name (case-insensitive), in document order.
 */
export function findElementsByTag(html: string, tagName: string): HtmlElementInfo[] {
  const wanted = tagName.toLowerCase();
  const doc = parseHtml(html);
  return DomUtils
    .findAll(element => element.name.toLowerCase() === wanted, doc.children)
    .map(describeElement);
}

/**
 * Replace the span from the first `startMarker` through the first
 * `endMarker` after it, markers included. The input is not modified.
 */
export function replaceHtmlSection(
  html: string,
  startMarker: string,
  endMarker: string,
  replacement: string
): string {
  if (!startMarker || !endMarker) {
    throw new ValidationError('Markers must be non-empty strings');
  }

  const startPos = html.indexOf(startMarker);
  if (startPos === -1) {
    throw new MarkerNotFoundError(`Start marker not found: ${startMarker}`);
  }

  const endPos = html.indexOf(endMarker, startPos + startMarker.length);
  if (endPos === -1) {
    const message = html.includes(endMarker)
      ? `End marker ${endMarker} does not follow start marker ${startMarker}`
      : `End marker not found: ${endMarker}`;
    throw new MarkerNotFoundError(message);
  }

  return html.slice(0, startPos) + replacement + html.slice(endPos + endMarker.length);
}

/**
 * Plain text of a fragment: entities decoded, whitespace collapsed.
 */
export function extractTextContent(html: string): string {
  const doc = parseHtml(html);
  return DomUtils.textContent(doc).replace(/\s+/g, ' ').trim();
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

/**
 * Read-only snapshot of a fragment's element structure.
 */
export function getHtmlStructureSummary(html: string): HtmlStructureSummary {
  const doc = parseHtml(html);
  const elements = DomUtils.findAll(() => true, doc.children);
  const tagCounts = new Map<string, number>();
  const classCounts = new Map<string, number>();

  for (const element of elements) {
    increment(tagCounts, element.name.toLowerCase());
    for (const token of classTokens(element)) {
      increment(classCounts, token);
    }
  }

  return {
    totalLength: html.length,
    totalElements: elements.length,
    tagCounts: Object.fromEntries(tagCounts),
    classCounts: Object.fromEntries(classCounts),
    hasTables: tagCounts.has('table'),
    hasForms: tagCounts.has('form'),
    hasLists: tagCounts.has('ul') || tagCounts.has('ol'),
    textLength: DomUtils.textContent(doc).replace(/\s+/g, ' ').trim().length,
  };
}

/**
 * Classed section/article/div/main blocks, in document order.
 */
export function extractHtmlSections(html: string): HtmlSectionInfo[] {
  const doc = parseHtml(html);
  const blocks = DomUtils.findAll(
    element => STRUCTURAL_TAGS.has(element.name.toLowerCase()) && Boolean(element.attribs['class']),
    doc.children
  );

  return blocks.map(element => {
    const start = element.startIndex ?? 0;
    const end = element.endIndex === null ? start : element.endIndex + 1;
    return {
      tagName: element.name,
      className: element.attribs['class'] ?? '',
      id: element.attribs['id'] ?? '',
      start,
      end,
      content: html.slice(start, end),
    };
  });
}

/**
 * Wrap a markup fragment in a new element.
 *
 * wrapContentWithElement('Hello', 'div', ['highlight'], { id: 'greeting' })
 * gives `<div id="greeting" class="highlight">Hello</div>`.
 */
export function wrapContentWithElement(
  content: string,
  tagName: string,
  classNames: string[] = [],
  attributes: Record<string, string> = {}
): string {
  if (!content) {
    throw new ValidationError('content must be a non-empty string');
  }
  if (!TAG_NAME.test(tagName)) {
    throw new ValidationError(`tagName must be a plain element name, got "${tagName}"`);
  }

  const attribs: Record<string, string> = { ...attributes };
  if (classNames.length > 0) {
    attribs['class'] = classNames.join(' ');
  }

  const wrapper = new Element(tagName, attribs, parseHtml(content).children);
  return serializeHtml(wrapper);
}

/**
 * Common narrative problems, reported rather than thrown.
 */
export function validateNarrative(html: string): NarrativeValidation {
  const issues: string[] = [];

  if (!html.trim()) {
    issues.push('Content is empty');
    return { valid: false, issues };
  }

  const { wellFormed, error } = checkWellFormed(html);
  if (!wellFormed) {
    issues.push(`Markup is not well-formed: ${error}`);
  }

  if (html.includes('\u0000')) {
    issues.push('Content contains null characters');
  }

  const root = parseHtml(html).children.find(DomUtils.isTag);
  const namespaced = root !== undefined
    && (root.name === 'div' || root.name === 'html')
    && root.attribs['xmlns'] === 'http://www.w3.org/1999/xhtml';
  if (!namespaced) {
    issues.push('Missing XHTML namespace declaration');
  }

  return { valid: issues.length === 0, issues };
}
