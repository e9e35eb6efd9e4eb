/**
 * Centralized constants for confluence-rag
 * Avoids magic numbers scattered throughout codebase
 */

export const HTTP_DEFAULTS = {
  TIMEOUT_MS: 20_000,
  USER_AGENT: "confluence-rag/0.1",
} as const;

export const CONFLUENCE_DEFAULTS = {
  /** Page size for space listings */
  PAGE_LIMIT: 100,
  /** Content expansions requested with every page */
  EXPAND: "body.storage,version",
  /** TTL for cached space listings */
  SPACE_CACHE_TTL_MS: 60 * 60 * 1000,
  /** TTL for cached single pages */
  PAGE_CACHE_TTL_MS: 30 * 60 * 1000,
  /** Requests allowed per rate window */
  RATE_LIMIT: 100,
  RATE_WINDOW_MS: 60 * 1000,
} as const;

export const PROCESSING_DEFAULTS = {
  /** Upper bound for a single extractor before its field falls back to the empty default */
  EXTRACTOR_TIMEOUT_MS: 10_000,
  /** Pages processed concurrently during a space extraction */
  PAGE_BATCH_SIZE: 10,
  /** Metrics operation name for page processing */
  METRIC_PROCESS_PAGE: "process_page",
  /** Metrics operation name for Confluence requests */
  METRIC_CONFLUENCE_REQUEST: "confluence_request",
  /** Fixed source label written into every document's metadata */
  SOURCE: "confluence",
} as const;

export const TABLE_DEFAULTS = {
  /** colspan/rowspan values above this mark the table as malformed */
  MAX_SPAN: 1000,
} as const;

export const QUALITY_DEFAULTS = {
  FLESCH_BASE: 206.835,
  FLESCH_WORDS_PER_SENTENCE_WEIGHT: 1.015,
  /** Literal substrings checked by the formatting-quality score */
  FORMATTING_INDICATORS: ["<h1>", "<h2>", "<p>", "<table>", "<code>"],
} as const;

export const EXPORT_DEFAULTS = {
  OUTPUT_DIR: "output",
} as const;
