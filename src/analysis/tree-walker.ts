import { hasChildren, isTag, isText } from 'domhandler';
import type { AnyNode, Element } from 'domhandler';

/** Returning `false` from a visitor stops the walk. */
type Visitor = (node: AnyNode) => boolean | void;

/**
 * Pre-order depth-first walk in document order. Iterative, so deeply nested
 * markup cannot overflow the call stack.
 */
export function walk(root: AnyNode, visit: Visitor): void {
  const stack: AnyNode[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    if (visit(node) === false) return;

    if (hasChildren(node)) {
      const { children } = node;
      for (let index = children.length - 1; index >= 0; index -= 1) {
        const child = children[index];
        if (child) stack.push(child);
      }
    }
  }
}

export function findFirst<T extends AnyNode>(
  root: AnyNode,
  predicate: (node: AnyNode) => node is T
): T | undefined {
  let found: T | undefined;
  walk(root, (node) => {
    if (!predicate(node)) return true;
    found = node;
    return false;
  });
  return found;
}

export function collect<T extends AnyNode>(
  root: AnyNode,
  predicate: (node: AnyNode) => node is T
): T[] {
  const matches: T[] = [];
  walk(root, (node) => {
    if (predicate(node)) matches.push(node);
  });
  return matches;
}

export function some(
  root: AnyNode,
  predicate: (node: AnyNode) => boolean
): boolean {
  return findFirst(root, (node): node is AnyNode => predicate(node)) !== undefined;
}

export function tagNameOf(node: AnyNode): string | undefined {
  return isTag(node) ? node.name.toLowerCase() : undefined;
}

export function isElementNamed(node: AnyNode, ...names: string[]): node is Element {
  const tagName = tagNameOf(node);
  return tagName !== undefined && names.includes(tagName);
}

export function elementMatcher(
  ...names: string[]
): (node: AnyNode) => node is Element {
  return (node): node is Element => isElementNamed(node, ...names);
}

/** Attribute lookup with a case-insensitive name. */
export function getAttribute(element: Element, name: string): string | undefined {
  const direct = element.attribs[name];
  if (direct !== undefined) return direct;

  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(element.attribs)) {
    if (key.toLowerCase() === wanted) return value;
  }
  return undefined;
}

/** Concatenated text of every text node under `root`. */
export function textContent(root: AnyNode): string {
  const parts: string[] = [];
  walk(root, (node) => {
    if (isText(node)) parts.push(node.data);
  });
  return parts.join('');
}
