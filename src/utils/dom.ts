/**
 * Thin, structurally typed view over linkedom's DOM.
 *
 * The extractors only need a handful of node members, so they work against
 * these interfaces and narrow every node they touch with the guards below.
 */

import { parseHTML } from "linkedom";

export const ELEMENT_NODE = 1;
export const TEXT_NODE = 3;

export interface DomElement {
  readonly nodeType: number;
  readonly tagName: string;
  readonly textContent: string | null;
  readonly childNodes: ArrayLike<unknown>;
  readonly parentNode: unknown;
  getAttribute(name: string): string | null;
  querySelectorAll(selectors: string): ArrayLike<unknown>;
  remove(): void;
}

export interface DomText {
  readonly nodeType: number;
  readonly textContent: string | null;
}

export function isElement(node: unknown): node is DomElement {
  return (
    typeof node === "object" &&
    node !== null &&
    "nodeType" in node &&
    node.nodeType === ELEMENT_NODE &&
    "tagName" in node &&
    typeof node.tagName === "string" &&
    "getAttribute" in node &&
    typeof node.getAttribute === "function" &&
    "querySelectorAll" in node &&
    typeof node.querySelectorAll === "function"
  );
}

export function isText(node: unknown): node is DomText {
  return (
    typeof node === "object" &&
    node !== null &&
    "nodeType" in node &&
    node.nodeType === TEXT_NODE
  );
}

/** Lower-cased tag name, e.g. "td". */
export function tagOf(el: DomElement): string {
  return el.tagName.toLowerCase();
}

/** Parse an HTML fragment and return its `<body>` element. */
export function parseFragment(html: string): DomElement {
  const { document } = parseHTML(
    `<!DOCTYPE html><html><head></head><body>${html}</body></html>`
  );
  const body: unknown = document.body;
  if (!isElement(body)) {
    throw new Error("HTML parser produced no <body> element");
  }
  return body;
}

/** All descendants of `root` matching `selectors`, in document order. */
export function selectAll(root: DomElement, selectors: string): DomElement[] {
  return Array.from(root.querySelectorAll(selectors)).filter(isElement);
}

export function childElements(el: DomElement): DomElement[] {
  return Array.from(el.childNodes).filter(isElement);
}

/** Nearest ancestor (excluding `el`) with the given tag, or null. */
export function closestAncestor(el: DomElement, tag: string): DomElement | null {
  let current: unknown = el.parentNode;
  while (isElement(current)) {
    if (tagOf(current) === tag) return current;
    current = current.parentNode;
  }
  return null;
}
