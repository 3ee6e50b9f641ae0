import { isDirective } from 'domhandler';
import type { AnyNode, ProcessingInstruction } from 'domhandler';

import { DEFAULT_HTML_VERSION } from '../config/constants.js';
import type {
  HeadingHistogram,
  HeadingLevel,
} from '../config/types/analysis.js';

import { elementMatcher, findFirst, tagNameOf, textContent, walk } from './tree-walker.js';

const HEADING_LEVELS: ReadonlySet<string> = new Set([
  'h1',
  'h2',
  'h3',
  'h4',
  'h5',
  'h6',
]);

const QUOTED_IDENTIFIER = /"([^"]*)"|'([^']*)'/g;

const isTitle = elementMatcher('title');

function isHeadingLevel(tagName: string): tagName is HeadingLevel {
  return HEADING_LEVELS.has(tagName);
}

function isDoctype(node: AnyNode): node is ProcessingInstruction {
  return isDirective(node) && node.name.toLowerCase() === '!doctype';
}

/**
 * Public and system identifiers of a doctype, empty ones dropped. parse5
 * exposes them directly; htmlparser2 only keeps the raw declaration text.
 */
export function doctypeIdentifiers(node: ProcessingInstruction): string[] {
  const fromParser = [node['x-publicId'], node['x-systemId']];
  if (fromParser.some((value) => value !== undefined)) {
    return fromParser.filter((value): value is string => Boolean(value));
  }

  const identifiers: string[] = [];
  for (const match of node.data.matchAll(QUOTED_IDENTIFIER)) {
    const value = match[1] ?? match[2];
    if (value) identifiers.push(value);
  }
  return identifiers;
}

export function describeDoctype(identifiers: readonly string[]): string {
  const [first] = identifiers;
  if (first === undefined) return DEFAULT_HTML_VERSION;

  const lowered = first.toLowerCase();
  if (lowered.includes('html5') || lowered.includes('html 5')) return 'HTML5';
  if (lowered.includes('html4') || lowered.includes('html 4')) return 'HTML4';
  if (lowered.includes('xhtml')) return 'XHTML';
  return first;
}

export function extractHtmlVersion(root: AnyNode): string {
  const doctype = findFirst(root, isDoctype);
  if (!doctype) return DEFAULT_HTML_VERSION;
  return describeDoctype(doctypeIdentifiers(doctype));
}

export function extractPageTitle(root: AnyNode): string {
  const title = findFirst(root, isTitle);
  return title ? textContent(title).trim() : '';
}

export function extractHeadings(root: AnyNode): HeadingHistogram {
  const headings: HeadingHistogram = {};

  walk(root, (node) => {
    const tagName = tagNameOf(node);
    if (tagName === undefined || !isHeadingLevel(tagName)) return;
    headings[tagName] = (headings[tagName] ?? 0) + 1;
  });

  return headings;
}
