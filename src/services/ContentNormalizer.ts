/**
 * ContentNormalizer: storage-format HTML → single-line plain text.
 * Uses linkedom for lightweight DOM parsing.
 *
 * Unlike a reading view, the output keeps no paragraph structure: visible
 * text runs are joined with single spaces, which is what the chunkers
 * downstream expect. Adjacent text nodes (linkedom splits at character
 * entities) form one run, so `caf&eacute;` stays one word.
 */

import { isElement, isText, parseFragment, tagOf, type DomElement } from "../utils/dom";

/** Tags removed with their whole subtree before text is collected */
const REMOVE_TAGS = ["script", "style"] as const;

/** Anything that still looks like markup after the DOM pass */
const LEFTOVER_TAG_PATTERN = /<[^>]+>/g;

export interface NormalizeOptions {
  /** Extra elements to drop along with their content (e.g. "table") */
  removeTags?: readonly string[];
}

function collectText(node: DomElement, skip: ReadonlySet<string>, out: string[]): void {
  let run = "";
  const flush = (): void => {
    const text = run.trim();
    if (text) out.push(text);
    run = "";
  };

  for (const child of Array.from(node.childNodes)) {
    if (isText(child)) {
      run += child.textContent || "";
    } else if (isElement(child)) {
      flush();
      if (!skip.has(tagOf(child))) collectText(child, skip, out);
    }
  }
  flush();
}

/**
 * Normalize an HTML fragment to plain text.
 *
 * Never throws: unparseable input falls back to a regex tag strip.
 */
export function normalizeHtml(html: string, options: NormalizeOptions = {}): string {
  if (!html) return "";

  const skip = new Set<string>([
    ...REMOVE_TAGS,
    ...(options.removeTags ?? []).map((tag) => tag.toLowerCase()),
  ]);

  let joined: string;
  try {
    const parts: string[] = [];
    collectText(parseFragment(html), skip, parts);
    joined = parts.join(" ");
  } catch {
    joined = html;
  }

  return joined
    .replace(LEFTOVER_TAG_PATTERN, "")
    .replace(/\s+/g, " ")
    .trim();
}
