/**
 * CorpusAnalyzer: pure functions over a set of processed documents.
 *
 * Produces the corpus summary (totals, per-page averages, date range) and
 * the content-quality report. No I/O, no runtime dependency. An empty
 * corpus is a valid input and yields zeros.
 */

import { QUALITY_DEFAULTS } from "../config/constants";
import { ConfluenceRagAnalysisError } from "../errors/AnalysisError";
import { createLogger, type StructuredLogger } from "../utils/logger";
import type {
  CorpusSummary,
  QualityMetric,
  QualityRange,
  QualityReport,
} from "./CorpusAnalyzer.types";
import type { PageMetadata, ProcessedDocument } from "./PageProcessor.types";

export type { CorpusSummary, QualityMetric, QualityRange, QualityReport };

export interface AnalyzerOptions {
  now?: () => Date;
  logger?: StructuredLogger;
}

const defaultLogger = createLogger({ component: "CorpusAnalyzer" });

const QUALITY_METRICS: readonly QualityMetric[] = [
  "readability",
  "contentCompleteness",
  "metadataCompleteness",
  "formattingQuality",
];

const CONTENT_FIELDS = ["content", "metadata", "tables", "codeBlocks", "comments"] as const;

const METADATA_FIELDS: readonly (keyof PageMetadata)[] = [
  "id",
  "title",
  "url",
  "version",
  "lastModified",
];

const ISO_DATE_PREFIX = /^\d{4}-\d{2}-\d{2}/;
const HAS_ZONE = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

/** Count words in a string (split on whitespace, filter empties) */
export function countWords(text: string): number {
  if (!text.trim()) return 0;
  return text.trim().split(/\s+/).length;
}

/** Two decimals, ties to even: 0.125 → 0.12, 0.375 → 0.38. */
export function round2(value: number): number {
  const scaled = value * 100;
  const floor = Math.floor(scaled);
  if (scaled - floor === 0.5) return (floor % 2 === 0 ? floor : floor + 1) / 100;
  return Math.round(scaled) / 100;
}

function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Epoch millis of an ISO-8601 date or date-time, or null when the value is
 * not one. A date-time without zone is read as UTC.
 */
export function parseTimestamp(value: string): number | null {
  const trimmed = value.trim();
  if (!ISO_DATE_PREFIX.test(trimmed)) return null;

  let normalized = trimmed.replace(" ", "T");
  if (normalized.length > 10 && !HAS_ZONE.test(normalized)) normalized += "Z";

  const ms = Date.parse(normalized);
  return Number.isNaN(ms) ? null : ms;
}

function summarize(docs: readonly ProcessedDocument[], now: () => Date): CorpusSummary {
  const totalPages = docs.length;
  let totalWords = 0;
  let totalTables = 0;
  let totalCodeBlocks = 0;
  let totalComments = 0;

  let oldest: { at: number; raw: string } | null = null;
  let newest: { at: number; raw: string } | null = null;

  for (const doc of docs) {
    totalWords += countWords(doc.content);
    totalTables += doc.tables.length;
    totalCodeBlocks += doc.codeBlocks.length;
    totalComments += doc.comments.length;

    const raw = doc.metadata.lastModified;
    if (!raw) continue;
    const at = parseTimestamp(raw);
    if (at === null) continue;
    if (oldest === null || at < oldest.at) oldest = { at, raw };
    if (newest === null || at > newest.at) newest = { at, raw };
  }

  const perPage = (total: number) => (totalPages > 0 ? round2(total / totalPages) : 0);

  return {
    totalPages,
    totalWords,
    totalTables,
    totalCodeBlocks,
    totalComments,
    averages: {
      wordsPerPage: perPage(totalWords),
      tablesPerPage: perPage(totalTables),
      codeBlocksPerPage: perPage(totalCodeBlocks),
      commentsPerPage: perPage(totalComments),
    },
    dateRange: {
      oldestPage: oldest?.raw ?? null,
      newestPage: newest?.raw ?? null,
    },
    generatedAt: now().toISOString(),
  };
}

/**
 * Totals, per-page averages (2 decimals) and lastModified range.
 * Unparseable dates are left out of the range.
 */
export function summarizeCorpus(
  docs: readonly ProcessedDocument[],
  options: AnalyzerOptions = {}
): CorpusSummary {
  try {
    return summarize(docs, options.now ?? (() => new Date()));
  } catch (error) {
    (options.logger ?? defaultLogger).error("Failed to summarize corpus", { corpusSize: docs.length }, error);
    throw ConfluenceRagAnalysisError.failed(
      "summarize corpus",
      docs.length,
      error instanceof Error ? error : undefined
    );
  }
}

/** Flesch-style reading ease on words per sentence, clamped to [0, 100]. */
export function readabilityScore(content: string): number {
  const words = countWords(content);
  const sentences = content.split(/[.!?]+/).length;
  const wordsPerSentence = words / Math.max(sentences, 1);
  const score =
    QUALITY_DEFAULTS.FLESCH_BASE - QUALITY_DEFAULTS.FLESCH_WORDS_PER_SENTENCE_WEIGHT * wordsPerSentence;
  return Math.max(0, Math.min(100, score));
}

function isPresent(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === "object" && value !== null) return Object.keys(value).length > 0;
  return Boolean(value);
}

function contentCompleteness(doc: ProcessedDocument): number {
  const present = CONTENT_FIELDS.filter((field) => isPresent(doc[field])).length;
  return (present / CONTENT_FIELDS.length) * 100;
}

function metadataCompleteness(doc: ProcessedDocument): number {
  const present = METADATA_FIELDS.filter((field) => Boolean(doc.metadata[field])).length;
  return (present / METADATA_FIELDS.length) * 100;
}

/**
 * Share of markup indicators present in the content. Content is already
 * normalized text, so this is 0 unless a page quotes markup literally.
 */
function formattingQuality(doc: ProcessedDocument): number {
  const indicators = QUALITY_DEFAULTS.FORMATTING_INDICATORS;
  const present = indicators.filter((tag) => doc.content.includes(tag)).length;
  return (present / indicators.length) * 100;
}

function emptyByMetric<T>(make: () => T): Record<QualityMetric, T> {
  return {
    readability: make(),
    contentCompleteness: make(),
    metadataCompleteness: make(),
    formattingQuality: make(),
  };
}

function score(docs: readonly ProcessedDocument[]): QualityReport {
  const scores = emptyByMetric<number[]>(() => []);
  for (const doc of docs) {
    scores.readability.push(readabilityScore(doc.content));
    scores.contentCompleteness.push(contentCompleteness(doc));
    scores.metadataCompleteness.push(metadataCompleteness(doc));
    scores.formattingQuality.push(formattingQuality(doc));
  }

  const averages = emptyByMetric(() => 0);
  const ranges = emptyByMetric<QualityRange>(() => [0, 0]);
  for (const metric of QUALITY_METRICS) {
    const values = scores[metric];
    averages[metric] = mean(values);
    if (values.length > 0) {
      ranges[metric] = values.reduce<QualityRange>(
        ([lo, hi], v) => [Math.min(lo, v), Math.max(hi, v)],
        [values[0], values[0]]
      );
    }
  }

  return {
    scores,
    averages,
    ranges,
    qualityScore: mean(QUALITY_METRICS.map((metric) => averages[metric])),
  };
}

/**
 * Per-document quality scores with corpus means, ranges and an overall
 * score (mean of the four means).
 */
export function scoreQuality(
  docs: readonly ProcessedDocument[],
  options: Pick<AnalyzerOptions, "logger"> = {}
): QualityReport {
  try {
    return score(docs);
  } catch (error) {
    (options.logger ?? defaultLogger).error("Failed to score content quality", { corpusSize: docs.length }, error);
    throw ConfluenceRagAnalysisError.failed(
      "score content quality",
      docs.length,
      error instanceof Error ? error : undefined
    );
  }
}
