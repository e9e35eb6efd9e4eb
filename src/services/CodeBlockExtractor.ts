import { parseFragment, selectAll } from "../utils/dom";
import type { CodeBlock } from "./PageProcessor.types";

const DEFAULT_LANGUAGE = "text";

/**
 * Every `<code>` and `<pre>` element, in document order. A `<pre><code>`
 * pair yields two blocks, one per element.
 */
export function extractCodeBlocks(html: string): CodeBlock[] {
  if (!html) return [];

  return selectAll(parseFragment(html), "code, pre").map((el) => {
    const classes = (el.getAttribute("class") || "").trim().split(/\s+/);
    return {
      language: classes[0] || DEFAULT_LANGUAGE,
      content: (el.textContent || "").trim(),
    };
  });
}
