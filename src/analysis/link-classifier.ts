import type { AnyNode, Element } from 'domhandler';

import type { LinkClass, LinkCounts } from '../config/types/analysis.js';

import { elementMatcher, getAttribute, walk } from './tree-walker.js';

// Any RFC 3986 scheme prefix makes the href absolute, so `localhost:3000/x`
// and `page:2` are read as schemes, not relative paths.
const SCHEME_PATTERN = /^([a-z][a-z\d+.-]*):/i;

// mailto:, tel: and ftp: leave the site whatever their host.
const OFF_SITE_SCHEMES: ReadonlySet<string> = new Set(['mailto', 'tel', 'ftp']);

const isAnchor = elementMatcher('a');

function readScheme(href: string): string | undefined {
  return SCHEME_PATTERN.exec(href)?.[1]?.toLowerCase();
}

function isProtocolRelative(href: string): boolean {
  return href.startsWith('//');
}

function parseAbsolute(href: string): URL | null {
  if (!URL.canParse(href)) return null;
  return new URL(href);
}

/**
 * Classifies anchors relative to one page. Classification is syntactic:
 * nothing is resolved over DNS or fetched.
 */
export class LinkClassifier {
  private readonly scheme: string;
  private readonly hostname: string;

  constructor(pageUrl: string | URL) {
    const base = typeof pageUrl === 'string' ? new URL(pageUrl) : pageUrl;
    this.scheme = base.protocol;
    this.hostname = base.hostname.toLowerCase();
  }

  classify(rawHref: string | undefined): LinkClass {
    const href = rawHref?.trim();
    if (!href) return 'inaccessible';

    const scheme = readScheme(href);
    if (scheme === 'javascript') return 'inaccessible';

    if (scheme === undefined && !isProtocolRelative(href)) return 'internal';
    if (scheme !== undefined && OFF_SITE_SCHEMES.has(scheme)) return 'external';

    const absolute = isProtocolRelative(href) ? `${this.scheme}${href}` : href;
    const target = parseAbsolute(absolute);
    if (!target) return 'inaccessible';

    return target.hostname.toLowerCase() === this.hostname
      ? 'internal'
      : 'external';
  }

  classifyAnchor(anchor: Element): LinkClass {
    return this.classify(getAttribute(anchor, 'href'));
  }
}

export function createLinkCounts(): LinkCounts {
  return { internal: 0, external: 0, inaccessible: 0 };
}

/** Every `<a>` under `root` lands in exactly one bucket. */
export function countLinks(root: AnyNode, pageUrl: string | URL): LinkCounts {
  const classifier = new LinkClassifier(pageUrl);
  const counts = createLinkCounts();

  walk(root, (node) => {
    if (isAnchor(node)) counts[classifier.classifyAnchor(node)] += 1;
  });

  return counts;
}
